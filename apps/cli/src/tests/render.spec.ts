import { describe, it, expect } from 'vitest'
import { parseBoard } from '@noughts/engine'
import { describeStatus, playerLabel, renderBoard } from '../render.js'

describe('render', () => {
  it('numbers empty cells and draws marks', () => {
    expect(renderBoard(parseBoard('X../.O./..X'))).toEqual([
      ' X | 2 | 3 ',
      '---+---+---',
      ' 4 | O | 6 ',
      '---+---+---',
      ' 7 | 8 | X ',
    ])
  })

  it('brackets the winning line', () => {
    expect(renderBoard(parseBoard('O.X/.OX/XXO'), [0, 4, 8])).toEqual([
      '[O]| 2 | X ',
      '---+---+---',
      ' 4 |[O]| X ',
      '---+---+---',
      ' X | X |[O]',
    ])
  })

  it('labels the computer and the human players', () => {
    expect(playerLabel('O', 'O')).toBe('AI (O)')
    expect(playerLabel('X', 'O')).toBe('Player 1 (X)')
    expect(playerLabel('O', null)).toBe('Player 2 (O)')
  })

  it('describes turns and results', () => {
    expect(describeStatus('in-progress', 'O', 'O')).toBe('Turn: AI (O)')
    expect(describeStatus('in-progress', 'O', null)).toBe('Turn: Player 2 (O)')
    expect(describeStatus('draw', 'X', 'O')).toBe('Result: Draw')
    expect(describeStatus('o-wins', 'X', 'O')).toBe('Winner: AI (O)')
    expect(describeStatus('x-wins', 'O', null)).toBe('Winner: Player 1 (X)')
  })
})
