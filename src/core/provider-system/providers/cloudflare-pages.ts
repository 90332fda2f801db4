/**
 * Cloudflare Pages provider: reads and writes project environment variables
 * through the Cloudflare API v4.
 */
import Ajv2020 from 'ajv/dist/2020'
import type { EnvProvider } from '../provider-interface'
import type { Credentials, EnvVarValue, ProjectRef, UpdateResult } from '../provider-types'
import type { EnvironmentName, VariableDocument, VariableMap } from '../../env/document'
import { buildPatch, isEmptyPatch, type VariablesPatch } from '../../env/patch'
import { cloudflareEnvelopeSchema, pagesDeploymentSchema, pagesProjectSchema } from '../../../schemas/cloudflare-response.schema'
import { ApiError, DecodeError, TransportError } from '../../../utils/errors'
import { logger } from '../../../utils/logger'
import { constants } from '../../../constants'

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export interface CloudflarePagesOptions {
  readonly fetch?: FetchLike
  readonly baseUrl?: string
  readonly timeoutMs?: number
}

type WireEnvVars = Readonly<Record<string, EnvVarValue | null>> | null

interface WireEnvironmentConfig {
  readonly env_vars?: WireEnvVars
}

interface CloudflareEnvelope {
  readonly success: boolean
  readonly errors?: readonly unknown[]
  readonly result?: unknown
}

interface PagesProject {
  readonly name?: string
  readonly deployment_configs: {
    readonly production?: WireEnvironmentConfig | null
    readonly preview?: WireEnvironmentConfig | null
  }
}

interface PagesDeployment {
  readonly id?: string
  readonly environment: EnvironmentName
  readonly env_vars?: WireEnvVars
}

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateEnvelope = ajv.compile<CloudflareEnvelope>(cloudflareEnvelopeSchema)
const validateProject = ajv.compile<PagesProject>(pagesProjectSchema)
const validateDeployment = ajv.compile<PagesDeployment>(pagesDeploymentSchema)

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Prefer a top-level `message`, then the first `errors[].message`. */
function extractApiMessage(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined
  if (typeof body.message === 'string' && body.message.trim().length > 0) return body.message.trim()
  if (Array.isArray(body.errors)) {
    for (const e of body.errors) {
      if (isRecord(e) && typeof e.message === 'string' && e.message.trim().length > 0) return e.message.trim()
    }
  }
  return undefined
}

function tryParseJson(text: string): unknown {
  if (text.trim().length === 0) return undefined
  try { return JSON.parse(text) } catch { return undefined }
}

function schemaErrors(errors: readonly { readonly instancePath: string; readonly message?: string }[] | null | undefined): string {
  const list: string[] = (errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
  return list.length > 0 ? list.join('; ') : 'unexpected shape'
}

/** Secret values are not returned by the API and read as ''. */
export function fromWireEnvVars(envVars: WireEnvVars | undefined): VariableMap {
  if (!envVars) return {}
  return Object.fromEntries(Object.entries(envVars).map(([key, v]): [string, string] => [key, v?.value ?? '']))
}

/**
 * Cloudflare Pages implementation of EnvProvider. The transport and base URL
 * are injectable; the global `fetch` is used by default.
 */
export class CloudflarePagesProvider implements EnvProvider {
  public readonly id: 'cloudflare-pages' = 'cloudflare-pages'
  private readonly fetchImpl: FetchLike
  private readonly baseUrl: string
  private readonly timeoutMs: number

  public constructor(opts: CloudflarePagesOptions = {}) {
    this.fetchImpl = opts.fetch ?? ((input: string, init: RequestInit): Promise<Response> => fetch(input, init))
    this.baseUrl = (opts.baseUrl ?? constants.CLOUDFLARE_API_BASE_URL).replace(/\/+$/, '')
    this.timeoutMs = opts.timeoutMs ?? constants.REQUEST_TIMEOUT_MS
  }

  private projectUrl(credentials: Credentials, project: string): string {
    return `${this.baseUrl}/accounts/${encodeURIComponent(credentials.account)}/pages/projects/${encodeURIComponent(project)}`
  }

  /** One request; returns the envelope's `result` or throws. */
  private async request(method: 'GET' | 'PATCH', url: string, token: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { Authorization: `Bearer ${token}`, Accept: 'application/json' }
    if (body !== undefined) headers['Content-Type'] = 'application/json'
    logger.debug(`${method} ${url}`)
    let res: Response
    let text: string
    try {
      res = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs)
      })
      text = await res.text()
    } catch (err) {
      throw new TransportError(url, err)
    }
    logger.debug(`${method} ${url} -> ${res.status}`)
    const parsed: unknown = tryParseJson(text)
    if (!res.ok) {
      const message: string = extractApiMessage(parsed) ?? `${res.status} ${res.statusText}`.trim()
      throw new ApiError(res.status, message)
    }
    if (parsed === undefined) throw new DecodeError(`${method} ${url} returned a body that is not JSON`)
    if (!validateEnvelope(parsed)) throw new DecodeError(schemaErrors(validateEnvelope.errors))
    if (!parsed.success) throw new ApiError(res.status, extractApiMessage(parsed) ?? 'request was not successful')
    return parsed.result
  }

  private async getProject(credentials: Credentials, project: string): Promise<PagesProject> {
    const result: unknown = await this.request('GET', this.projectUrl(credentials, project), credentials.token)
    if (!validateProject(result)) throw new DecodeError(`project: ${schemaErrors(validateProject.errors)}`)
    return result
  }

  private async getDeployment(credentials: Credentials, project: string, deployment: string): Promise<PagesDeployment> {
    const url: string = `${this.projectUrl(credentials, project)}/deployments/${encodeURIComponent(deployment)}`
    const result: unknown = await this.request('GET', url, credentials.token)
    if (!validateDeployment(result)) throw new DecodeError(`deployment: ${schemaErrors(validateDeployment.errors)}`)
    return result
  }

  public async fetchVariables(credentials: Credentials, ref: ProjectRef): Promise<VariableDocument> {
    if (ref.deployment !== undefined) {
      const deployment: PagesDeployment = await this.getDeployment(credentials, ref.project, ref.deployment)
      const vars: VariableMap = fromWireEnvVars(deployment.env_vars)
      return deployment.environment === 'production'
        ? { production: vars, preview: null }
        : { production: null, preview: vars }
    }
    const project: PagesProject = await this.getProject(credentials, ref.project)
    return {
      production: fromWireEnvVars(project.deployment_configs.production?.env_vars),
      preview: fromWireEnvVars(project.deployment_configs.preview?.env_vars)
    }
  }

  public async updateVariables(credentials: Credentials, ref: ProjectRef, desired: VariableDocument, current: VariableDocument): Promise<UpdateResult> {
    const patch: VariablesPatch = buildPatch(current, desired)
    if (isEmptyPatch(patch)) return { updated: false, changes: patch.changes }
    await this.request('PATCH', this.projectUrl(credentials, ref.project), credentials.token, { deployment_configs: patch.deploymentConfigs })
    return { updated: true, changes: patch.changes }
  }
}
