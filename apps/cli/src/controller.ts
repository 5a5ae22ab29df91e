import { IllegalMoveError, markForSide } from '@noughts/engine'
import type { GameSession, Mark } from '@noughts/engine'
import { HELP_LINES, describeStatus, renderBoard } from './render.js'

export interface CommandResult {
  lines: string[]
  quit: boolean
}

const MOVE_KEY = /^[1-9]$/

/**
 * Turns each line typed at the prompt into the text to print back. Holds no
 * game state of its own beyond which mark the computer takes when switched on.
 */
export class CliController {
  private preferredAiMark: Mark

  constructor(private readonly session: GameSession) {
    this.preferredAiMark = session.aiMark ?? 'O'
  }

  start(): string[] {
    const lines = ['Tic-tac-toe. Type a cell number (1-9) to play, or "help".']
    lines.push(...this.playAiTurn())
    lines.push(...this.view())
    return lines
  }

  handle(input: string): CommandResult {
    const command = input.trim().toLowerCase()
    if (command === '') {
      return done([])
    }
    if (MOVE_KEY.test(command)) {
      return done(this.playHuman(Number(command) - 1))
    }

    switch (command) {
      case 'reset':
      case 'r':
        this.session.startNewGame()
        return done(['New game.', ...this.playAiTurn(), ...this.view()])
      case 'ai':
        return done(this.setAi(this.session.aiMark === null))
      case 'ai on':
        return done(this.setAi(true))
      case 'ai off':
        return done(this.setAi(false))
      case 'hint':
        return done(this.hint())
      case 'board':
        return done(this.view())
      case 'help':
      case '?':
        return done([...HELP_LINES])
      case 'quit':
      case 'exit':
      case 'q':
        return { lines: ['Bye.'], quit: true }
      default:
        return done([`Unknown command '${input.trim()}'. Type 'help' for the list of commands.`])
    }
  }

  private playHuman(cell: number): string[] {
    if (this.session.currentOutcome() !== 'in-progress') {
      return ['The game is over. Type \'reset\' to play again.']
    }
    if (this.session.isAiTurn()) {
      return ['Wait for the AI to move.']
    }
    try {
      this.session.submitMove(cell, this.session.sideToMove())
    } catch (err) {
      if (err instanceof IllegalMoveError) {
        return [err.message + '.']
      }
      throw err
    }
    return [...this.playAiTurn(), ...this.view()]
  }

  private playAiTurn(): string[] {
    if (!this.session.isAiTurn()) {
      return []
    }
    const move = this.session.computeAIMove()
    if (move === null) {
      return []
    }
    this.session.submitMove(move, this.session.sideToMove())
    return [`AI plays ${move + 1}.`]
  }

  private setAi(enabled: boolean): string[] {
    if (!enabled) {
      if (this.session.aiMark !== null) {
        this.preferredAiMark = this.session.aiMark
      }
      this.session.setAiMark(null)
      return ['Two-player mode.']
    }
    this.session.setAiMark(this.preferredAiMark)
    return [`Playing against the AI (${this.preferredAiMark}).`, ...this.playAiTurn(), ...this.view()]
  }

  private hint(): string[] {
    const evaluations = this.session.evaluateMoves()
    if (evaluations.length === 0) {
      return ['No moves left.']
    }
    const move = this.session.computeAIMove()
    const mark = markForSide(this.session.sideToMove())
    const values = evaluations.map(({ cell, score }) => `${cell + 1}:${score > 0 ? '+1' : score}`).join(' ')
    return [`Best move for ${mark}: ${move === null ? '-' : move + 1}`, `Values: ${values}`]
  }

  private view(): string[] {
    const board = this.session.board()
    const status = describeStatus(
      this.session.currentOutcome(),
      markForSide(this.session.sideToMove()),
      this.session.aiMark
    )
    return ['', ...renderBoard(board, this.session.winningLine()), '', status]
  }
}

function done(lines: string[]): CommandResult {
  return { lines, quit: false }
}
