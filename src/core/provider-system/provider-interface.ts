import type { VariableDocument } from '../env/document'
import type { Credentials, ProjectRef, UpdateResult } from './provider-types'

/**
 * Remote store of a project's environment variables.
 */
export interface EnvProvider {
  readonly id: string
  /** Project settings (both environments) or a deployment snapshot (one of them). */
  fetchVariables(credentials: Credentials, ref: ProjectRef): Promise<VariableDocument>
  /**
   * Make the project's variables match `desired`, given the `current` remote
   * state. `null` environments in `desired` are left untouched.
   */
  updateVariables(credentials: Credentials, ref: ProjectRef, desired: VariableDocument, current: VariableDocument): Promise<UpdateResult>
}
