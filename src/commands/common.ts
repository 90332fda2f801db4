import type { Command } from 'commander'
import { logger } from '../utils/logger'
import { describeError, InvalidConfigurationError, type ErrorInfo } from '../utils/errors'
import { isColorMode, setColorMode } from '../utils/colors'
import { fsx } from '../utils/fs'
import { loadEnvLookup } from '../core/secrets/env'
import type { EnvLookup } from '../core/config/resolve'

export type GlobalOptions = {
  readonly verbose?: boolean
  readonly quiet?: boolean
  readonly emoji?: boolean
  readonly timestamps?: boolean
  readonly color?: string
  readonly envFile?: string
}

export function applyGlobalOptions(opts: GlobalOptions): void {
  if (opts.verbose === true) logger.setLevel('debug')
  if (opts.quiet === true) logger.setLevel('error')
  if (opts.emoji === false) logger.setNoEmoji(true)
  if (opts.timestamps === true) logger.setTimestamps(true)
  if (opts.color !== undefined) {
    if (!isColorMode(opts.color)) throw new InvalidConfigurationError('color', opts.color, 'auto|always|never')
    setColorMode(opts.color)
  }
}

/**
 * Command boundary: applies the global options, loads the environment lookup
 * (honoring `--env-file`) and reports any failure from either step or from
 * the body.
 */
export async function runAction(cmd: Command, body: (env: EnvLookup) => Promise<void>): Promise<void> {
  try {
    const globals: GlobalOptions = cmd.optsWithGlobals<GlobalOptions>()
    applyGlobalOptions(globals)
    await body(await loadEnvLookup({ envFile: globals.envFile }))
  } catch (err) {
    reportFailure(err)
  }
}

/**
 * Writes the fully rendered content to `output`, or to stdout when no path
 * is given.
 */
export async function writeOutput(content: string, output: string | undefined): Promise<void> {
  if (output === undefined) {
    process.stdout.write(content)
    return
  }
  await fsx.writeText(output, content)
  logger.success(`Environment variables written to: ${output}`)
}

/** One error line on stderr and a non-zero exit code. */
export function reportFailure(err: unknown): void {
  const info: ErrorInfo = describeError(err)
  logger.error(info.message)
  if (info.remedy) logger.debug(`Hint: ${info.remedy}`)
  process.exitCode = 1
}
