import { parseArgs } from 'node:util'
import type { Mark } from '@noughts/engine'

export interface CliArgs {
  aiMark: Mark | null
  help: boolean
}

export const USAGE = [
  'Usage: noughts [--two-player] [--ai x|o]',
  '',
  '  --two-player  two people take turns at the keyboard',
  '  --ai x|o      which mark the computer plays (default: o)',
  '  --help        show this message',
]

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      'two-player': { type: 'boolean', default: false },
      ai: { type: 'string', default: 'o' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  })

  const raw = values.ai ?? 'o'
  const ai = raw.toUpperCase()
  if (ai !== 'X' && ai !== 'O') {
    throw new Error(`--ai must be x or o, got '${raw}'`)
  }

  return {
    aiMark: values['two-player'] ? null : ai,
    help: values.help ?? false,
  }
}
