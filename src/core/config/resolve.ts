import { ENV_VARS, constants } from '../../constants'
import { InvalidConfigurationError, MissingConfigurationError } from '../../utils/errors'
import { isEnvironmentName, type EnvironmentName } from '../env/document'
import type { Credentials, ProjectRef } from '../provider-system/provider-types'

/** Read-only view of environment variables; `process.env` in production. */
export type EnvLookup = Readonly<Record<string, string | undefined>>

type EnvField = keyof typeof ENV_VARS

export interface CredentialsOptions {
  readonly account?: string
  readonly token?: string
}

export interface GetEnvVarsOptions extends CredentialsOptions {
  readonly project?: string
  readonly deployment?: string
  readonly output?: string
}

export interface SetEnvVarsOptions extends CredentialsOptions {
  readonly project?: string
  readonly file?: string
}

export interface ToEnvFileOptions {
  readonly environment?: string
  readonly empty?: boolean
  readonly output?: string
  /** Positional JSON file argument. */
  readonly file?: string
}

export interface GetEnvVarsConfig {
  readonly credentials: Credentials
  readonly ref: ProjectRef
  readonly output?: string
}

export interface SetEnvVarsConfig {
  readonly credentials: Credentials
  readonly ref: ProjectRef
  readonly file: string
}

export interface ToEnvFileConfig {
  readonly environment: EnvironmentName
  readonly empty: boolean
  readonly output?: string
  readonly file: string
}

const TRUE_VALUES: readonly string[] = ['1', 'true', 'yes', 'on']
const FALSE_VALUES: readonly string[] = ['0', 'false', 'no', 'off']

function present(value: string | undefined): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

/** Option first, then its environment variable; empty strings count as unset. */
function pick(option: string | undefined, env: EnvLookup, field: EnvField): string | undefined {
  return present(option) ?? present(env[ENV_VARS[field]])
}

function requireField(option: string | undefined, env: EnvLookup, field: EnvField): string {
  const value: string | undefined = pick(option, env, field)
  if (value === undefined) throw new MissingConfigurationError(field, `pass --${field} or set ${ENV_VARS[field]}`)
  return value
}

function parseBool(raw: string | undefined, field: EnvField): boolean {
  const v: string | undefined = present(raw?.trim().toLowerCase())
  if (v === undefined) return false
  if (TRUE_VALUES.includes(v)) return true
  if (FALSE_VALUES.includes(v)) return false
  throw new InvalidConfigurationError(field, raw ?? '', [...TRUE_VALUES, ...FALSE_VALUES].join('|'))
}

export function resolveCredentials(opts: CredentialsOptions, env: EnvLookup): Credentials {
  return {
    account: requireField(opts.account, env, 'account'),
    token: requireField(opts.token, env, 'token')
  }
}

export function resolveGetEnvVarsConfig(opts: GetEnvVarsOptions, env: EnvLookup): GetEnvVarsConfig {
  const credentials: Credentials = resolveCredentials(opts, env)
  const project: string = requireField(opts.project, env, 'project')
  const deployment: string | undefined = pick(opts.deployment, env, 'deployment')
  const output: string | undefined = pick(opts.output, env, 'output')
  return {
    credentials,
    ref: { project, deployment },
    output
  }
}

export function resolveSetEnvVarsConfig(opts: SetEnvVarsOptions, env: EnvLookup): SetEnvVarsConfig {
  const credentials: Credentials = resolveCredentials(opts, env)
  const project: string = requireField(opts.project, env, 'project')
  const file: string = requireField(opts.file, env, 'file')
  return { credentials, ref: { project }, file }
}

export function resolveToEnvFileConfig(opts: ToEnvFileOptions, env: EnvLookup): ToEnvFileConfig {
  const file: string | undefined = present(opts.file)
  if (file === undefined) throw new MissingConfigurationError('file', 'pass the path of the JSON document as an argument')
  const rawEnvironment: string = pick(opts.environment, env, 'environment') ?? constants.DEFAULT_ENVIRONMENT
  if (!isEnvironmentName(rawEnvironment)) throw new InvalidConfigurationError('environment', rawEnvironment, 'production|preview')
  const empty: boolean = opts.empty === true ? true : parseBool(env[ENV_VARS.empty], 'empty')
  const output: string | undefined = pick(opts.output, env, 'output')
  return {
    environment: rawEnvironment,
    empty,
    file,
    output
  }
}
