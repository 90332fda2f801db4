import type { Command } from 'commander'
import { resolveSetEnvVarsConfig, type EnvLookup, type SetEnvVarsConfig, type SetEnvVarsOptions } from '../core/config/resolve'
import { ENVIRONMENTS, parseDocument, type VariableDocument } from '../core/env/document'
import { CloudflarePagesProvider } from '../core/provider-system/providers/cloudflare-pages'
import type { UpdateResult } from '../core/provider-system/provider-types'
import { fsx } from '../utils/fs'
import { logger } from '../utils/logger'
import { runAction } from './common'

function printChanges(changes: UpdateResult['changes']): void {
  for (const env of ENVIRONMENTS) {
    const c = changes[env]
    if (!c) continue
    logger.info(`${env}: ${c.added.length} added, ${c.changed.length} changed, ${c.removed.length} removed`)
  }
}

/**
 * Register the `set-env-vars` command.
 */
export function registerSetEnvVarsCommand(program: Command): void {
  program
    .command('set-env-vars')
    .description('Upload environment variables from a local JSON file')
    .option('--project <name>', 'Name of the Pages project (env: CF_PAGES_PROJECT)')
    .option('--file <path>', 'Path to the file containing desired environment variables (env: CF_PAGES_FILE)')
    .option('--account <id>', 'Cloudflare account ID (env: CLOUDFLARE_ACCOUNT)')
    .option('--token <token>', 'Cloudflare API token (env: CLOUDFLARE_TOKEN)')
    .action(async (opts: SetEnvVarsOptions, cmd: Command): Promise<void> => {
      await runAction(cmd, async (env: EnvLookup): Promise<void> => {
        const config: SetEnvVarsConfig = resolveSetEnvVarsConfig(opts, env)
        logger.addRedactor(config.credentials.token)
        const desired: VariableDocument = parseDocument(await fsx.readText(config.file), config.file)
        const provider = new CloudflarePagesProvider()
        const current: VariableDocument = await provider.fetchVariables(config.credentials, { project: config.ref.project })
        const result: UpdateResult = await provider.updateVariables(config.credentials, config.ref, desired, current)
        if (!result.updated) {
          logger.note('No changes detected. Not submitting patch.')
          return
        }
        logger.success('Environment variables successfully updated')
        printChanges(result.changes)
      })
    })
}
