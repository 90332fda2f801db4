/**
 * Types shared by the provider system.
 */
import type { EnvironmentName } from '../env/document'

/** Account id and API token; both required for any remote call. */
export interface Credentials {
  readonly account: string
  readonly token: string
}

/**
 * Reference to a Pages project. With `deployment` set, reads target that
 * deployment's snapshot instead of the project settings.
 */
export interface ProjectRef {
  readonly project: string
  readonly deployment?: string
}

/**
 * One variable as the API represents it (`plain_text` or `secret_text`;
 * other types are passed through). Secret values are never echoed back.
 */
export interface EnvVarValue {
  readonly type?: string
  readonly value?: string
}

/** `null` deletes the variable on the remote. */
export type EnvVarsPatch = Readonly<Record<string, EnvVarValue | null>>

export interface EnvironmentPatch {
  readonly env_vars: EnvVarsPatch
}

/** Body of `deployment_configs` in a project PATCH; omitted environments are untouched. */
export type DeploymentConfigsPatch = Partial<Readonly<Record<EnvironmentName, EnvironmentPatch>>>

export interface EnvironmentChanges {
  readonly added: readonly string[]
  readonly changed: readonly string[]
  readonly removed: readonly string[]
}

export interface UpdateResult {
  /** False when the remote already matched and no request was sent. */
  readonly updated: boolean
  readonly changes: Partial<Readonly<Record<EnvironmentName, EnvironmentChanges>>>
}
