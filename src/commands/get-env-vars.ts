import type { Command } from 'commander'
import { resolveGetEnvVarsConfig, type EnvLookup, type GetEnvVarsConfig, type GetEnvVarsOptions } from '../core/config/resolve'
import { serializeDocument, type VariableDocument } from '../core/env/document'
import { CloudflarePagesProvider } from '../core/provider-system/providers/cloudflare-pages'
import { logger } from '../utils/logger'
import { runAction, writeOutput } from './common'

/**
 * Register the `get-env-vars` command.
 */
export function registerGetEnvVarsCommand(program: Command): void {
  program
    .command('get-env-vars')
    .description('Download environment variables into a local JSON file')
    .option('--project <name>', 'Name of the Pages project (env: CF_PAGES_PROJECT)')
    .option('--deployment <id>', 'Deployment ID; fetches that deployment\'s snapshot (env: CF_PAGES_DEPLOYMENT)')
    .option('--output <path>', 'Path to save the JSON file. Prints to stdout if not provided (env: CF_PAGES_OUTPUT)')
    .option('--account <id>', 'Cloudflare account ID (env: CLOUDFLARE_ACCOUNT)')
    .option('--token <token>', 'Cloudflare API token (env: CLOUDFLARE_TOKEN)')
    .action(async (opts: GetEnvVarsOptions, cmd: Command): Promise<void> => {
      await runAction(cmd, async (env: EnvLookup): Promise<void> => {
        const config: GetEnvVarsConfig = resolveGetEnvVarsConfig(opts, env)
        logger.addRedactor(config.credentials.token)
        const provider = new CloudflarePagesProvider()
        const doc: VariableDocument = await provider.fetchVariables(config.credentials, config.ref)
        await writeOutput(serializeDocument(doc), config.output)
      })
    })
}
