import type { Command } from 'commander'
import { resolveToEnvFileConfig, type EnvLookup, type ToEnvFileConfig, type ToEnvFileOptions } from '../core/config/resolve'
import { parseDocument, type VariableDocument } from '../core/env/document'
import { renderEnvFile, toEnvFile } from '../core/env/env-file'
import { fsx } from '../utils/fs'
import { runAction, writeOutput } from './common'

/**
 * Register the `to-env-file` command.
 */
export function registerToEnvFileCommand(program: Command): void {
  program
    .command('to-env-file')
    .description('Generate .env file for front-end development')
    .argument('[file]', 'Path to the JSON file containing environment variables')
    .option('--environment <name>', 'Environment to export: production|preview (env: CF_PAGES_ENVIRONMENT, default: production)')
    .option('--empty', 'Emit the variable names only, with empty values (env: CF_PAGES_EMPTY)')
    .option('--output <path>', 'Path to save the .env file. Prints to stdout if not provided (env: CF_PAGES_OUTPUT)')
    .action(async (file: string | undefined, opts: Omit<ToEnvFileOptions, 'file'>, cmd: Command): Promise<void> => {
      await runAction(cmd, async (env: EnvLookup): Promise<void> => {
        const config: ToEnvFileConfig = resolveToEnvFileConfig({ ...opts, file }, env)
        const doc: VariableDocument = parseDocument(await fsx.readText(config.file), config.file)
        const lines: string[] = toEnvFile(doc, config.environment, { empty: config.empty })
        await writeOutput(renderEnvFile(lines), config.output)
      })
    })
}
