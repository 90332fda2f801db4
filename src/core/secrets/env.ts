import { parse } from 'dotenv'
import type { EnvLookup } from '../config/resolve'
import { fsx } from '../../utils/fs'

function nonEmpty(env: EnvLookup): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [k, v] of Object.entries(env)) if (typeof v === 'string' && v.length > 0) out[k] = v
  return out
}

/**
 * Environment lookup for the config resolver: the process environment,
 * layered over an optional dotenv file. Never mutates `process.env`.
 */
export async function loadEnvLookup(args: { readonly envFile?: string; readonly processEnv?: EnvLookup } = {}): Promise<EnvLookup> {
  const base: EnvLookup = args.processEnv ?? process.env
  if (args.envFile === undefined || args.envFile.length === 0) return base
  const fromFile: Record<string, string> = parse(await fsx.readText(args.envFile))
  return { ...fromFile, ...nonEmpty(base) }
}
