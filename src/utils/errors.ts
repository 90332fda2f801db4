import type { EnvironmentName } from '../core/env/document'

export interface ErrorInfo {
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

export type SyncErrorCode =
  | 'MISSING_CONFIGURATION'
  | 'INVALID_CONFIGURATION'
  | 'TRANSPORT_ERROR'
  | 'API_ERROR'
  | 'DECODE_ERROR'
  | 'MALFORMED_DOCUMENT'
  | 'ENVIRONMENT_UNAVAILABLE'
  | 'FILE_IO_ERROR'

/**
 * Base class for every failure the CLI reports. All of them end the current
 * command; none are retried.
 */
export abstract class SyncError extends Error {
  public abstract readonly code: SyncErrorCode

  protected constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class MissingConfigurationError extends SyncError {
  public readonly code = 'MISSING_CONFIGURATION' as const

  public constructor(public readonly field: string, hint?: string) {
    super(`Missing required configuration: ${field}${hint ? ` (${hint})` : ''}`)
  }
}

export class InvalidConfigurationError extends SyncError {
  public readonly code = 'INVALID_CONFIGURATION' as const

  public constructor(public readonly field: string, public readonly value: string, expected: string) {
    super(`Invalid value for ${field}: "${value}" (expected ${expected})`)
  }
}

export class TransportError extends SyncError {
  public readonly code = 'TRANSPORT_ERROR' as const

  public constructor(public readonly url: string, cause: unknown) {
    const reason: string = cause instanceof Error ? cause.message : String(cause)
    super(`Request to ${url} failed: ${reason}`, { cause })
  }
}

export class ApiError extends SyncError {
  public readonly code = 'API_ERROR' as const

  public constructor(public readonly status: number, public readonly apiMessage: string) {
    super(`Cloudflare API error ${status}: ${apiMessage}`)
  }
}

export class DecodeError extends SyncError {
  public readonly code = 'DECODE_ERROR' as const

  public constructor(message: string, cause?: unknown) {
    super(`Unexpected Cloudflare API response: ${message}`, { cause })
  }
}

export class MalformedDocumentError extends SyncError {
  public readonly code = 'MALFORMED_DOCUMENT' as const

  public constructor(public readonly source: string, public readonly details: readonly string[]) {
    super(`Malformed environment variables document ${source}: ${details.join('; ')}`)
  }
}

export class EnvironmentUnavailableError extends SyncError {
  public readonly code = 'ENVIRONMENT_UNAVAILABLE' as const

  public constructor(public readonly environment: EnvironmentName) {
    super(`No variables for environment "${environment}" in document (the field is null)`)
  }
}

export class FileIOError extends SyncError {
  public readonly code = 'FILE_IO_ERROR' as const

  public constructor(public readonly path: string, public readonly operation: 'read' | 'write', cause: unknown) {
    const reason: string = cause instanceof Error ? cause.message : String(cause)
    super(`Could not ${operation} ${path}: ${reason}`, { cause })
  }
}

function remedyFor(err: SyncError): string | undefined {
  if (err instanceof MissingConfigurationError) return 'Pass the option on the command line or export its environment variable.'
  if (err instanceof ApiError) {
    if (err.status === 401 || err.status === 403) return 'Check CLOUDFLARE_TOKEN and that it has the Cloudflare Pages permission for this account.'
    if (err.status === 404) return 'Check CLOUDFLARE_ACCOUNT, the project name and the deployment id.'
    if (err.status === 429 || err.status >= 500) return 'Retry the command. If it persists, check the Cloudflare status page.'
    return undefined
  }
  if (err instanceof TransportError) return 'Check network connectivity and retry the command.'
  if (err instanceof EnvironmentUnavailableError) return 'Fetch the variables for the whole project, or pick the environment the deployment targets.'
  if (err instanceof MalformedDocumentError) return 'Expected { "production": { "KEY": "value" } | null, "preview": { ... } | null }.'
  return undefined
}

/**
 * Map any thrown value to a code, a one-line message and an optional remedy.
 */
export function describeError(err: unknown): ErrorInfo {
  if (err instanceof SyncError) {
    const remedy: string | undefined = remedyFor(err)
    return remedy ? { code: err.code, message: err.message, remedy } : { code: err.code, message: err.message }
  }
  const raw: string = err instanceof Error ? err.message : String(err)
  const message: string = raw.split(/\r?\n/)[0]?.trim() || 'Unknown error.'
  return { code: 'UNKNOWN_ERROR', message }
}
