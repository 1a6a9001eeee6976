import { Command, CommanderError } from 'commander'
import { describeError } from '../errors'
import { logger } from '../logger'
import type { HttpTransport, Output } from '../sender'
import { sendCommand } from './commands/send'

export const VERSION = '1.0.0'

export interface RunDeps {
  output?: Output
  transport?: HttpTransport
}

/**
 * Runs one invocation and resolves to the process exit code.
 * `argv` follows process.argv: the first two entries are the node binary and script.
 */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  const output = deps.output ?? console
  let exitCode = 1

  const program = new Command()
  program
    .name('deploy-hook')
    .description('Send a signed webhook to trigger deployments')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.log(text.trimEnd()),
      writeErr: (text) => output.error(text.trimEnd()),
    })

  sendCommand(program, {
    output,
    transport: deps.transport,
    setExitCode: (code) => {
      exitCode = code
    },
  })

  try {
    await program.parseAsync(argv)
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    logger.error({ error }, '[cli] Unexpected failure')
    output.error(`Unexpected failure: ${describeError(error)}`)
    return 1
  }
  return exitCode
}
