import { z } from 'zod';
import type { Board } from '@noughts/engine';
import {
  IllegalMoveError,
  InvalidBoardError,
  evaluateMoves,
  evaluateOutcome,
  formatBoard,
  markForSide,
  searchBestMove,
  sideToMove,
  validateBoard,
} from '@noughts/engine';

const CellSchema = z.enum(['X', 'O']).nullable();
const ScoreSchema = z.union([z.literal(-1), z.literal(0), z.literal(1)]);

export const MoveInput = z.object({
  board: z.array(CellSchema).length(9),
});

export const MoveOutput = z.object({
  move: z.number().int().min(0).max(8),
  score: ScoreSchema,
  side: z.enum(['X', 'O']),
  nodes: z.number().int().nonnegative(),
});

export const AnalyzeOutput = z.object({
  side: z.enum(['X', 'O']),
  outcome: z.enum(['in-progress', 'x-wins', 'o-wins', 'draw']),
  moves: z.array(z.object({ cell: z.number().int().min(0).max(8), score: ScoreSchema })),
});

export interface FlowOptions {
  logSearchStats?: boolean;
}

function readBoard(input: unknown): Board {
  const { board } = MoveInput.parse(input);
  const check = validateBoard(board);
  if (!check.ok) {
    throw new InvalidBoardError(check.reason);
  }
  return board;
}

export function chooseMove(input: unknown, opts: FlowOptions = {}): z.infer<typeof MoveOutput> {
  const board = readBoard(input);
  const side = sideToMove(board);
  console.info('[ai] chooseMove received request', {
    board: formatBoard(board),
    side: markForSide(side),
  });

  if (evaluateOutcome(board) !== 'in-progress') {
    throw new IllegalMoveError('game_over');
  }

  const result = searchBestMove(board, side);
  if (result.move === null || result.score === null) {
    throw new Error(`Search found no move for undecided board ${formatBoard(board)}`);
  }
  if (opts.logSearchStats ?? true) {
    console.debug('[ai] Search finished', { move: result.move, score: result.score, nodes: result.nodes });
  }

  return MoveOutput.parse({
    move: result.move,
    score: result.score,
    side: markForSide(side),
    nodes: result.nodes,
  });
}

export function analyzePosition(input: unknown): z.infer<typeof AnalyzeOutput> {
  const board = readBoard(input);
  const side = sideToMove(board);
  const outcome = evaluateOutcome(board);
  console.info('[ai] analyzePosition received request', { board: formatBoard(board), outcome });

  return AnalyzeOutput.parse({
    side: markForSide(side),
    outcome,
    moves: evaluateMoves(board, side),
  });
}
