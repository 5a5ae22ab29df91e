import type { Board, CellIndex, MoveEvaluation, Score, SearchResult, Side } from '../types.js';
import { applyMove, evaluateOutcome, isFull, markForSide, opponent, signedWinner, undoMove } from '../board.js';
import { DEFAULT_MOVE_ORDER, validateMoveOrder } from '../config.js';
import { InvalidConfigError } from '../errors.js';

export interface SearchOpts {
  order?: readonly CellIndex[];
}

interface SearchContext {
  order: readonly CellIndex[];
  nodes: number;
}

function createContext(opts: SearchOpts): SearchContext {
  const order = opts.order ?? DEFAULT_MOVE_ORDER;
  // an order missing a cell would silently skip that move
  const check = validateMoveOrder(order);
  if (!check.ok) {
    throw new InvalidConfigError(check.reason);
  }
  return { order, nodes: 0 };
}

function negate(score: Score): Score {
  return score === 0 ? 0 : score === 1 ? -1 : 1;
}

/**
 * Value of the current board for `side`, searched to the end of the game.
 *
 * Speculative marks are placed on `board` itself and removed before each
 * recursive call returns, so the board is unchanged afterwards.
 */
export function negamax(board: Board, side: Side, opts: SearchOpts = {}): Score {
  return search(board, side, createContext(opts));
}

function search(board: Board, side: Side, ctx: SearchContext): Score {
  ctx.nodes++;

  // A win that fills the last cell is still a win, so this runs before the full check.
  const winner = signedWinner(board);
  if (winner !== 0) {
    return winner === side ? 1 : -1;
  }
  if (isFull(board)) {
    return 0;
  }

  let best: Score = -1;
  const mark = markForSide(side);
  for (const cell of ctx.order) {
    if (board[cell] !== null) continue;

    applyMove(board, cell, mark);
    const val = negate(search(board, opponent(side), ctx));
    undoMove(board, cell);

    if (val > best) best = val;
    if (best === 1) break;
  }
  return best;
}

export function searchBestMove(board: Board, side: Side, opts: SearchOpts = {}): SearchResult {
  const ctx = createContext(opts);
  if (evaluateOutcome(board) !== 'in-progress') {
    return { move: null, score: null, nodes: 0 };
  }

  let bestMove: CellIndex | null = null;
  let bestScore: Score | null = null;
  const mark = markForSide(side);

  for (const cell of ctx.order) {
    if (board[cell] !== null) continue;

    applyMove(board, cell, mark);
    const val = negate(search(board, opponent(side), ctx));
    undoMove(board, cell);

    // strict comparison: the earlier cell in the order keeps ties
    if (bestScore === null || val > bestScore) {
      bestScore = val;
      bestMove = cell;
      if (val === 1) break;
    }
  }

  return { move: bestMove, score: bestScore, nodes: ctx.nodes };
}

export function bestMove(board: Board, side: Side, opts: SearchOpts = {}): CellIndex | null {
  return searchBestMove(board, side, opts).move;
}

/** Every empty cell's value for `side`, in move order, without the root cutoff. */
export function evaluateMoves(board: Board, side: Side, opts: SearchOpts = {}): MoveEvaluation[] {
  const ctx = createContext(opts);
  if (evaluateOutcome(board) !== 'in-progress') {
    return [];
  }

  const out: MoveEvaluation[] = [];
  const mark = markForSide(side);
  for (const cell of ctx.order) {
    if (board[cell] !== null) continue;

    applyMove(board, cell, mark);
    const score = negate(search(board, opponent(side), ctx));
    undoMove(board, cell);
    out.push({ cell, score });
  }
  return out;
}
