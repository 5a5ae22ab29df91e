export * from './types.js';
export { DEFAULT_MOVE_ORDER, defaultConfig, validateConfig, validateMoveOrder } from './config.js';
export {
  BOARD_CELLS,
  WINNING_LINES,
  createBoard,
  cloneBoard,
  applyMove,
  undoMove,
  emptyCells,
  isFull,
  countMarks,
  sideToMove,
  markForSide,
  sideForMark,
  opponent,
  winningLine,
  winnerOf,
  signedWinner,
  evaluateOutcome,
  validateMove,
  validateBoard,
  parseBoard,
  formatBoard,
} from './board.js';
export { negamax, bestMove, searchBestMove, evaluateMoves } from './ai/negamax.js';
export type { SearchOpts } from './ai/negamax.js';
export { GameSession } from './session.js';
export { IllegalMoveError, InvalidBoardError, InvalidConfigError } from './errors.js';
