import type { Cell, CellIndex, Mark, Outcome } from '@noughts/engine'

const DIVIDER = '---+---+---'

/** Empty cells show the 1-9 key that plays them; a winning line is bracketed. */
export function renderBoard(board: readonly Cell[], line: readonly CellIndex[] | null = null): string[] {
  const rows: string[] = []
  for (let r = 0; r < 3; r++) {
    const cells: string[] = []
    for (let c = 0; c < 3; c++) {
      const idx = r * 3 + c
      const value = board[idx] ?? null
      const label = value ?? String(idx + 1)
      cells.push(line?.includes(idx) ? `[${label}]` : ` ${label} `)
    }
    rows.push(cells.join('|'))
    if (r < 2) rows.push(DIVIDER)
  }
  return rows
}

export function playerLabel(mark: Mark, aiMark: Mark | null): string {
  if (mark === aiMark) {
    return `AI (${mark})`
  }
  return mark === 'X' ? 'Player 1 (X)' : 'Player 2 (O)'
}

export function describeStatus(outcome: Outcome, toMove: Mark, aiMark: Mark | null): string {
  switch (outcome) {
    case 'in-progress':
      return `Turn: ${playerLabel(toMove, aiMark)}`
    case 'draw':
      return 'Result: Draw'
    case 'x-wins':
      return `Winner: ${playerLabel('X', aiMark)}`
    case 'o-wins':
      return `Winner: ${playerLabel('O', aiMark)}`
  }
}

export const HELP_LINES: readonly string[] = [
  'Commands:',
  '  1-9        place your mark on that cell',
  '  hint       show the best move and every cell\'s value',
  '  ai on|off  play against the computer or another person',
  '  reset      start a new game',
  '  board      show the board again',
  '  help       show this list',
  '  quit       leave the game',
]
