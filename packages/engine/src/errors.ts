import type { IllegalMoveReason } from './types.js';

const MOVE_MESSAGES: Record<IllegalMoveReason, string> = {
  invalid_cell: 'Cell index must be an integer from 0 to 8',
  cell_occupied: 'Cell is already occupied',
  not_your_turn: 'It is not that side\'s turn',
  game_over: 'The game is already over',
};

export class IllegalMoveError extends Error {
  readonly reason: IllegalMoveReason;

  constructor(reason: IllegalMoveReason, message = MOVE_MESSAGES[reason]) {
    super(message);
    this.name = 'IllegalMoveError';
    this.reason = reason;
  }
}

export class InvalidBoardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBoardError';
  }
}

export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}
