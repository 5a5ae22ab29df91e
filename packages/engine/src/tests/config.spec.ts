import { describe, it, expect } from 'vitest'
import { DEFAULT_MOVE_ORDER, defaultConfig, validateConfig, validateMoveOrder } from '../config.js'

describe('engine config', () => {
  it('prefers the center, then corners, then edges', () => {
    expect(DEFAULT_MOVE_ORDER).toEqual([4, 0, 2, 6, 8, 1, 3, 5, 7])
    expect(defaultConfig()).toEqual({ moveOrder: [4, 0, 2, 6, 8, 1, 3, 5, 7], aiMark: 'O' })
  })

  it('returns a fresh order each time', () => {
    const a = defaultConfig()
    const b = defaultConfig()

    expect(a.moveOrder).not.toBe(b.moveOrder)
    expect(a.moveOrder).not.toBe(DEFAULT_MOVE_ORDER)
  })

  it('accepts any permutation of the nine cells', () => {
    expect(validateMoveOrder([0, 1, 2, 3, 4, 5, 6, 7, 8])).toEqual({ ok: true })
    expect(validateConfig({ moveOrder: [8, 7, 6, 5, 4, 3, 2, 1, 0], aiMark: null })).toEqual({ ok: true })
  })

  it('rejects orders that skip, repeat or invent cells', () => {
    expect(validateMoveOrder([0, 1, 2, 3, 4, 5, 6, 7])).toEqual({
      ok: false,
      reason: 'moveOrder must list all 9 cells',
    })
    expect(validateMoveOrder([0, 1, 2, 3, 4, 5, 6, 7, 7])).toEqual({
      ok: false,
      reason: 'moveOrder lists cell 7 twice',
    })
    expect(validateMoveOrder([0, 1, 2, 3, 4, 5, 6, 7, 9])).toEqual({
      ok: false,
      reason: 'moveOrder contains invalid cell 9',
    })
  })
})
