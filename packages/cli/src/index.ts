/**
 * @binstash/cli - Command line interface for binstash.
 *
 * A thin argument parsing layer; all behavior lives in the engine.
 */

import { Command } from 'commander'

import { registerAddSourceCommand } from './commands/add-source.js'
import { registerAddCommand } from './commands/add.js'
import { registerBindCommand } from './commands/bind.js'
import { registerClearCommand } from './commands/clear.js'
import { registerCreateCommand } from './commands/create.js'
import { registerExistsCommand } from './commands/exists.js'
import { registerListCommand } from './commands/list.js'
import { registerPathCommand } from './commands/path.js'
import { registerQueryCommand } from './commands/query.js'
import { registerUnbindCommand } from './commands/unbind.js'
import { formatError } from './helpers.js'

export { ManifestNotFoundError, formatError } from './helpers.js'

/**
 * Create the CLI program.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('binstash')
    .description('Content-addressed cache of binary artifacts declared in Artifacts.toml')
    .version('0.1.0')

  registerPathCommand(program)
  registerExistsCommand(program)
  registerClearCommand(program)
  registerListCommand(program)
  registerCreateCommand(program)
  registerBindCommand(program)
  registerUnbindCommand(program)
  registerAddSourceCommand(program)
  registerAddCommand(program)
  registerQueryCommand(program)

  return program
}

/**
 * Main entry point. Errors are printed and turn into exit code 1.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(argv)
  } catch (error) {
    console.error(formatError(error))
    process.exitCode = 1
  }
}
