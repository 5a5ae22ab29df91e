import { createInterface } from 'node:readline'
import { GameSession } from '@noughts/engine'
import { CliController } from './controller.js'
import { USAGE, parseCliArgs } from './args.js'

async function run(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2))
  if (args.help) {
    console.log(USAGE.join('\n'))
    return 0
  }

  const controller = new CliController(new GameSession({ aiMark: args.aiMark }))
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' })
  const print = (lines: string[]) => {
    for (const line of lines) process.stdout.write(`${line}\n`)
  }

  print(controller.start())
  rl.prompt()
  for await (const line of rl) {
    const result = controller.handle(line)
    print(result.lines)
    if (result.quit) break
    rl.prompt()
  }
  rl.close()
  return 0
}

run()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err)
    process.exitCode = 1
  })
