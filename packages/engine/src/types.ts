export type Mark = 'X' | 'O';
export type Cell = Mark | null;

/** Row-major 3x3 grid: index = row * 3 + col. */
export type Board = Cell[];

export type CellIndex = number;

/** +1 when X is to move, -1 when O is to move. */
export type Side = 1 | -1;

/** Game-theoretic value for the side to move. */
export type Score = -1 | 0 | 1;

export type Outcome = 'in-progress' | 'x-wins' | 'o-wins' | 'draw';

export type IllegalMoveReason = 'invalid_cell' | 'cell_occupied' | 'not_your_turn' | 'game_over';

export type ValidationResult = { valid: true } | { valid: false; reason: IllegalMoveReason };

export interface EngineConfig {
  moveOrder: readonly CellIndex[];
  // null: two human players
  aiMark: Mark | null;
}

export interface MoveEvaluation {
  cell: CellIndex;
  score: Score;
}

export interface SearchResult {
  move: CellIndex | null;
  score: Score | null;
  nodes: number;
}
