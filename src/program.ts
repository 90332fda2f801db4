import { Command } from 'commander'
import { constants } from './constants'
import { registerGetEnvVarsCommand } from './commands/get-env-vars'
import { registerSetEnvVarsCommand } from './commands/set-env-vars'
import { registerToEnvFileCommand } from './commands/to-env-file'

export const VERSION: string = '0.1.0'

/**
 * Build the CLI program with every subcommand registered.
 */
export function createProgram(): Command {
  const program: Command = new Command()
  program.name(constants.CLI_NAME)
  program.description('Sync Cloudflare Pages environment variables with a local JSON file')
  program.version(VERSION)
  program.option('--verbose', 'Verbose output (requests, hints)')
  program.option('--quiet', 'Error-only output')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--timestamps', 'Prefix logs with ISO timestamps')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  program.option('--env-file <path>', 'Read option defaults from a dotenv file (process environment wins)')
  registerGetEnvVarsCommand(program)
  registerSetEnvVarsCommand(program)
  registerToEnvFileCommand(program)
  return program
}
