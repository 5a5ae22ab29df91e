import type {
  Board,
  Cell,
  CellIndex,
  EngineConfig,
  Mark,
  MoveEvaluation,
  Outcome,
  SearchResult,
  Side,
} from './types.js';
import {
  applyMove,
  cloneBoard,
  createBoard,
  emptyCells,
  evaluateOutcome,
  inBounds,
  markForSide,
  sideForMark,
  sideToMove,
  validateMove,
  winningLine,
} from './board.js';
import { defaultConfig, validateConfig } from './config.js';
import { evaluateMoves, searchBestMove } from './ai/negamax.js';
import { IllegalMoveError, InvalidConfigError } from './errors.js';

/**
 * One game of tic-tac-toe: the board plus the turn protocol around it.
 *
 * The side to move and the outcome are always recomputed from the board, so
 * the only mutation path is {@link GameSession.submitMove}.
 */
export class GameSession {
  private readonly cells: Board = createBoard();
  private readonly config: EngineConfig;

  constructor(config: Partial<EngineConfig> = {}) {
    const defaults = defaultConfig();
    // an explicit undefined keeps the default
    const merged: EngineConfig = {
      moveOrder: config.moveOrder ?? defaults.moveOrder,
      aiMark: config.aiMark === undefined ? defaults.aiMark : config.aiMark,
    };
    const check = validateConfig(merged);
    if (!check.ok) {
      throw new InvalidConfigError(check.reason);
    }
    this.config = { ...merged, moveOrder: [...merged.moveOrder] };
  }

  get aiMark(): Mark | null {
    return this.config.aiMark;
  }

  setAiMark(mark: Mark | null): void {
    this.config.aiMark = mark;
  }

  startNewGame(): void {
    this.cells.fill(null);
  }

  submitMove(cell: CellIndex, side: Side): Outcome {
    const check = validateMove(this.cells, cell, side);
    if (!check.valid) {
      throw new IllegalMoveError(check.reason);
    }
    applyMove(this.cells, cell, markForSide(side));
    return evaluateOutcome(this.cells);
  }

  /**
   * Perfect-play move for the side to move. The move is not applied; pass it
   * to {@link GameSession.submitMove}. Null once the game is over.
   */
  computeAIMove(): CellIndex | null {
    return this.search().move;
  }

  search(): SearchResult {
    return searchBestMove(this.cells, this.sideToMove(), { order: this.config.moveOrder });
  }

  evaluateMoves(): MoveEvaluation[] {
    return evaluateMoves(this.cells, this.sideToMove(), { order: this.config.moveOrder });
  }

  currentOutcome(): Outcome {
    return evaluateOutcome(this.cells);
  }

  cellAt(index: CellIndex): Cell {
    if (!inBounds(index)) {
      throw new IllegalMoveError('invalid_cell');
    }
    return this.cells[index] ?? null;
  }

  sideToMove(): Side {
    return sideToMove(this.cells);
  }

  isAiTurn(): boolean {
    const { aiMark } = this.config;
    return aiMark !== null && this.currentOutcome() === 'in-progress' && sideForMark(aiMark) === this.sideToMove();
  }

  legalMoves(): CellIndex[] {
    return this.currentOutcome() === 'in-progress' ? emptyCells(this.cells) : [];
  }

  winningLine(): readonly CellIndex[] | null {
    return winningLine(this.cells);
  }

  board(): readonly Cell[] {
    return cloneBoard(this.cells);
  }
}
