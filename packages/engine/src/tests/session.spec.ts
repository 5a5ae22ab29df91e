import { describe, it, expect, beforeEach } from 'vitest'
import { GameSession } from '../session.js'
import { IllegalMoveError, InvalidConfigError } from '../errors.js'
import { formatBoard } from '../board.js'

describe('GameSession', () => {
  let session: GameSession

  beforeEach(() => {
    session = new GameSession()
  })

  it('starts with an empty board, X to move and the AI playing O', () => {
    expect(formatBoard(session.board())).toBe('.........')
    expect(session.sideToMove()).toBe(1)
    expect(session.currentOutcome()).toBe('in-progress')
    expect(session.aiMark).toBe('O')
    expect(session.isAiTurn()).toBe(false)
    expect(session.legalMoves()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8])
  })

  it('reports X winning the top row', () => {
    expect(session.submitMove(0, 1)).toBe('in-progress')
    expect(session.submitMove(3, -1)).toBe('in-progress')
    expect(session.submitMove(1, 1)).toBe('in-progress')
    expect(session.submitMove(4, -1)).toBe('in-progress')

    expect(session.submitMove(2, 1)).toBe('x-wins')
    expect(session.currentOutcome()).toBe('x-wins')
    expect(session.winningLine()).toEqual([0, 1, 2])
    expect(session.legalMoves()).toEqual([])
  })

  it('alternates turns and flags the AI turn', () => {
    session.submitMove(4, 1)

    expect(session.sideToMove()).toBe(-1)
    expect(session.isAiTurn()).toBe(true)
    expect(session.cellAt(4)).toBe('X')
    expect(session.cellAt(0)).toBeNull()
  })

  it('answers a center opening with corner 0 without applying it', () => {
    session.submitMove(4, 1)

    expect(session.computeAIMove()).toBe(0)
    expect(formatBoard(session.board())).toBe('....X....')

    expect(session.submitMove(0, -1)).toBe('in-progress')
    expect(session.cellAt(0)).toBe('O')
  })

  it('rejects moves out of turn, on occupied cells, off the board and after the game ends', () => {
    const reasonFor = (fn: () => void) => {
      try {
        fn()
      } catch (err) {
        return err instanceof IllegalMoveError ? err.reason : 'unexpected'
      }
      return 'accepted'
    }

    expect(reasonFor(() => session.submitMove(0, -1))).toBe('not_your_turn')
    session.submitMove(0, 1)
    expect(reasonFor(() => session.submitMove(0, -1))).toBe('cell_occupied')
    expect(reasonFor(() => session.submitMove(9, -1))).toBe('invalid_cell')
    expect(reasonFor(() => session.cellAt(-1))).toBe('invalid_cell')

    session.submitMove(3, -1)
    session.submitMove(1, 1)
    session.submitMove(4, -1)
    session.submitMove(2, 1)
    expect(reasonFor(() => session.submitMove(5, -1))).toBe('game_over')
    expect(formatBoard(session.board())).toBe('XXXOO....')
  })

  it('returns no AI move once the game is over', () => {
    for (const [cell, side] of [[0, 1], [3, -1], [1, 1], [4, -1], [2, 1]] as const) {
      session.submitMove(cell, side)
    }

    expect(session.computeAIMove()).toBeNull()
    expect(session.search()).toEqual({ move: null, score: null, nodes: 0 })
  })

  it('resets to an empty board on a new game', () => {
    session.submitMove(4, 1)
    session.submitMove(0, -1)
    session.startNewGame()

    expect(formatBoard(session.board())).toBe('.........')
    expect(session.sideToMove()).toBe(1)
    expect(session.currentOutcome()).toBe('in-progress')
  })

  it('hands out a copy of the board', () => {
    const snapshot = session.board()
    session.submitMove(4, 1)

    expect(snapshot[4]).toBeNull()
  })

  it('ends in a draw when the AI plays itself', () => {
    while (session.currentOutcome() === 'in-progress') {
      const move = session.computeAIMove()
      if (move === null) break
      session.submitMove(move, session.sideToMove())
    }

    expect(session.currentOutcome()).toBe('draw')
  })

  it('plays X first when configured to', () => {
    const aiFirst = new GameSession({ aiMark: 'X' })

    expect(aiFirst.isAiTurn()).toBe(true)
    expect(aiFirst.computeAIMove()).toBe(4)
  })

  it('uses the configured move order', () => {
    const custom = new GameSession({ moveOrder: [8, 7, 6, 5, 4, 3, 2, 1, 0] })

    expect(custom.computeAIMove()).toBe(8)
  })

  it('supports two human players', () => {
    session.setAiMark(null)
    session.submitMove(4, 1)

    expect(session.aiMark).toBeNull()
    expect(session.isAiTurn()).toBe(false)
    expect(session.evaluateMoves()).toHaveLength(8)
  })

  it('keeps the defaults for settings passed as undefined', () => {
    const fallback = new GameSession({ moveOrder: undefined, aiMark: undefined })

    expect(fallback.aiMark).toBe('O')
    expect(fallback.computeAIMove()).toBe(4)
  })

  it('rejects an invalid move order', () => {
    expect(() => new GameSession({ moveOrder: [4, 4, 0, 1, 2, 3, 5, 6, 7] })).toThrow(InvalidConfigError)
    expect(() => new GameSession({ moveOrder: [0, 1, 2] })).toThrow('moveOrder must list all 9 cells')
  })
})
