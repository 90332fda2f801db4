import type { EnvironmentName, VariableDocument, VariableMap } from './document'
import { ENVIRONMENTS } from './document'
import type { DeploymentConfigsPatch, EnvironmentChanges, EnvVarValue } from '../provider-system/provider-types'

export interface VariablesPatch {
  readonly deploymentConfigs: DeploymentConfigsPatch
  readonly changes: Partial<Readonly<Record<EnvironmentName, EnvironmentChanges>>>
}

function has(map: VariableMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key)
}

export function diffEnvironment(current: VariableMap, desired: VariableMap): EnvironmentChanges {
  const added: string[] = []
  const changed: string[] = []
  const removed: string[] = []
  for (const key of Object.keys(desired).sort()) {
    if (!has(current, key)) added.push(key)
    else if (current[key] !== desired[key]) changed.push(key)
  }
  for (const key of Object.keys(current).sort()) {
    if (!has(desired, key)) removed.push(key)
  }
  return { added, changed, removed }
}

function isEmptyChange(c: EnvironmentChanges): boolean {
  return c.added.length === 0 && c.changed.length === 0 && c.removed.length === 0
}

/**
 * Minimal patch turning `current` into `desired`. Environments that are
 * `null` in `desired`, or already match, are left out.
 */
export function buildPatch(current: VariableDocument, desired: VariableDocument): VariablesPatch {
  const deploymentConfigs: Partial<Record<EnvironmentName, { env_vars: Record<string, EnvVarValue | null> }>> = {}
  const changes: Partial<Record<EnvironmentName, EnvironmentChanges>> = {}
  for (const env of ENVIRONMENTS) {
    const want: VariableMap | null = desired[env]
    if (want === null) continue
    const have: VariableMap = current[env] ?? {}
    const diff: EnvironmentChanges = diffEnvironment(have, want)
    if (isEmptyChange(diff)) continue
    const envVars: Record<string, EnvVarValue | null> = Object.fromEntries([
      ...[...diff.added, ...diff.changed].map((key): [string, EnvVarValue] => [key, { type: 'plain_text', value: want[key] ?? '' }]),
      ...diff.removed.map((key): [string, null] => [key, null])
    ])
    deploymentConfigs[env] = { env_vars: envVars }
    changes[env] = diff
  }
  return { deploymentConfigs, changes }
}

export function isEmptyPatch(patch: VariablesPatch): boolean {
  return Object.keys(patch.deploymentConfigs).length === 0
}
