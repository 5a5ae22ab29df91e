import { BOARD_CELLS } from './board.js';
import type { CellIndex, EngineConfig } from './types.js';

// center, corners, edges
export const DEFAULT_MOVE_ORDER: readonly CellIndex[] = [4, 0, 2, 6, 8, 1, 3, 5, 7];

export const defaultConfig = (): EngineConfig => ({
  moveOrder: [...DEFAULT_MOVE_ORDER],
  aiMark: 'O',
});

export function validateMoveOrder(order: readonly CellIndex[]): { ok: true } | { ok: false; reason: string } {
  if (order.length !== BOARD_CELLS) {
    return { ok: false, reason: `moveOrder must list all ${BOARD_CELLS} cells` };
  }
  const seen = new Set<CellIndex>();
  for (const cell of order) {
    if (!Number.isInteger(cell) || cell < 0 || cell >= BOARD_CELLS) {
      return { ok: false, reason: `moveOrder contains invalid cell ${cell}` };
    }
    if (seen.has(cell)) {
      return { ok: false, reason: `moveOrder lists cell ${cell} twice` };
    }
    seen.add(cell);
  }
  return { ok: true };
}

export function validateConfig(config: EngineConfig): { ok: true } | { ok: false; reason: string } {
  const order = validateMoveOrder(config.moveOrder);
  if (!order.ok) {
    return order;
  }
  if (config.aiMark !== null && config.aiMark !== 'X' && config.aiMark !== 'O') {
    return { ok: false, reason: 'aiMark must be X, O or null' };
  }
  return { ok: true };
}
