import { IllegalMoveError, InvalidBoardError } from './errors.js';
import type { Board, Cell, CellIndex, Mark, Outcome, Side, ValidationResult } from './types.js';

export const BOARD_CELLS = 9;

// rows, then columns, then diagonals
export const WINNING_LINES: readonly (readonly [CellIndex, CellIndex, CellIndex])[] = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

export function createBoard(): Board {
  return Array<Cell>(BOARD_CELLS).fill(null);
}

export function cloneBoard(b: readonly Cell[]): Board {
  return b.slice();
}

export function inBounds(cell: CellIndex): boolean {
  return Number.isInteger(cell) && cell >= 0 && cell < BOARD_CELLS;
}

export function markForSide(side: Side): Mark {
  return side === 1 ? 'X' : 'O';
}

export function sideForMark(mark: Mark): Side {
  return mark === 'X' ? 1 : -1;
}

export function opponent(side: Side): Side {
  return side === 1 ? -1 : 1;
}

/**
 * Places `mark` on an empty cell. Whose turn it is is not checked here: the
 * search places speculative marks for both sides through this function.
 */
export function applyMove(board: Board, cell: CellIndex, mark: Mark): void {
  if (!inBounds(cell)) {
    throw new IllegalMoveError('invalid_cell');
  }
  if (board[cell] !== null) {
    throw new IllegalMoveError('cell_occupied');
  }
  board[cell] = mark;
}

export function undoMove(board: Board, cell: CellIndex): void {
  board[cell] = null;
}

export function emptyCells(board: readonly Cell[]): CellIndex[] {
  const out: CellIndex[] = [];
  for (let i = 0; i < board.length; i++) {
    if (board[i] === null) out.push(i);
  }
  return out;
}

export function isFull(board: readonly Cell[]): boolean {
  for (const cell of board) {
    if (cell === null) return false;
  }
  return true;
}

export function countMarks(board: readonly Cell[]): Record<Mark, number> {
  const counts: Record<Mark, number> = { X: 0, O: 0 };
  for (const cell of board) {
    if (cell !== null) counts[cell]++;
  }
  return counts;
}

/** X moves first, so equal counts mean X is to move. */
export function sideToMove(board: readonly Cell[]): Side {
  const { X, O } = countMarks(board);
  return X === O ? 1 : -1;
}

export function winningLine(board: readonly Cell[]): readonly CellIndex[] | null {
  for (const line of WINNING_LINES) {
    const [a, b, c] = line;
    const v = board[a];
    if (v !== null && v === board[b] && v === board[c]) {
      return line;
    }
  }
  return null;
}

export function winnerOf(board: readonly Cell[]): Mark | null {
  const line = winningLine(board);
  return line ? board[line[0]] ?? null : null;
}

/** +1 when X owns a line, -1 when O does, 0 otherwise. */
export function signedWinner(board: readonly Cell[]): -1 | 0 | 1 {
  const winner = winnerOf(board);
  if (winner === null) return 0;
  return sideForMark(winner);
}

export function evaluateOutcome(board: readonly Cell[]): Outcome {
  const winner = winnerOf(board);
  if (winner === 'X') return 'x-wins';
  if (winner === 'O') return 'o-wins';
  return isFull(board) ? 'draw' : 'in-progress';
}

export function validateMove(board: readonly Cell[], cell: CellIndex, side: Side): ValidationResult {
  if (evaluateOutcome(board) !== 'in-progress') {
    return { valid: false, reason: 'game_over' };
  }
  if (!inBounds(cell)) {
    return { valid: false, reason: 'invalid_cell' };
  }
  if (board[cell] !== null) {
    return { valid: false, reason: 'cell_occupied' };
  }
  if (sideToMove(board) !== side) {
    return { valid: false, reason: 'not_your_turn' };
  }
  return { valid: true };
}

/**
 * Checks that a board could arise from alternating play starting with X.
 */
export function validateBoard(board: readonly Cell[]): { ok: true } | { ok: false; reason: string } {
  if (board.length !== BOARD_CELLS) {
    return { ok: false, reason: `Board must have ${BOARD_CELLS} cells, got ${board.length}` };
  }
  const { X, O } = countMarks(board);
  if (X - O !== 0 && X - O !== 1) {
    return { ok: false, reason: `Mark counts are out of turn order (X=${X}, O=${O})` };
  }
  const lineOwners = new Set<Mark>();
  for (const [a, b, c] of WINNING_LINES) {
    const v = board[a];
    if (v !== null && v === board[b] && v === board[c]) lineOwners.add(v);
  }
  if (lineOwners.size > 1) {
    return { ok: false, reason: 'Both sides own a winning line' };
  }
  if (lineOwners.has('X') && X !== O + 1) {
    return { ok: false, reason: 'X has won but O moved afterwards' };
  }
  if (lineOwners.has('O') && X !== O) {
    return { ok: false, reason: 'O has won but X moved afterwards' };
  }
  return { ok: true };
}

/**
 * Reads row-major notation such as `"XO./.X./..O"`: `X`, `O` and `.` for an
 * empty cell. Whitespace and `/` separators are ignored.
 */
export function parseBoard(text: string): Board {
  const symbols = text.replace(/[\s/]+/g, '');
  if (symbols.length !== BOARD_CELLS) {
    throw new InvalidBoardError(`Board notation needs ${BOARD_CELLS} cells, got ${symbols.length}`);
  }
  const board = createBoard();
  for (let i = 0; i < BOARD_CELLS; i++) {
    const ch = symbols.charAt(i).toUpperCase();
    if (ch === 'X' || ch === 'O') {
      board[i] = ch;
    } else if (ch !== '.') {
      throw new InvalidBoardError(`Unexpected board symbol '${symbols.charAt(i)}' at cell ${i}`);
    }
  }
  return board;
}

export function formatBoard(board: readonly Cell[]): string {
  let out = '';
  for (const cell of board) {
    out += cell === null ? '.' : cell;
  }
  return out;
}
