import type { EnvironmentName, VariableDocument, VariableMap } from './document'
import { sortedEntries } from './document'
import { EnvironmentUnavailableError } from '../../utils/errors'

export interface EnvFileOptions {
  /** Emit names only, each with an empty quoted value. */
  readonly empty?: boolean
}

const BARE_VALUE: RegExp = /^[A-Za-z0-9_./:@,+-]+$/
const LINE_BREAK: RegExp = /[\r\n]/

/**
 * Picks the first form dotenv reads back unchanged:
 * - bare, for values made only of safe characters;
 * - `'...'` (literal) when there is no `'` and no line break;
 * - `"..."` with `\n`/`\r` escapes when there is no `"` and no backslash;
 * - `` `...` `` (literal) when there is no backtick and no line break.
 * A value that fits none of them is written as a JSON string literal.
 */
export function formatEnvValue(value: string): string {
  if (BARE_VALUE.test(value)) return value
  const multiline: boolean = LINE_BREAK.test(value)
  if (!multiline && !value.includes("'")) return `'${value}'`
  if (!value.includes('"') && !value.includes('\\')) return `"${value.replace(/\r/g, '\\r').replace(/\n/g, '\\n')}"`
  if (!multiline && !value.includes('`')) return `\`${value}\``
  return JSON.stringify(value)
}

export function selectEnvironment(doc: VariableDocument, environment: EnvironmentName): VariableMap {
  const vars: VariableMap | null = environment === 'production' ? doc.production : doc.preview
  if (vars === null) throw new EnvironmentUnavailableError(environment)
  return vars
}

/** One `KEY=VALUE` line per variable, sorted by key. */
export function toEnvFile(doc: VariableDocument, environment: EnvironmentName, opts: EnvFileOptions = {}): string[] {
  const vars: VariableMap = selectEnvironment(doc, environment)
  return sortedEntries(vars).map(([key, value]) => `${key}=${opts.empty === true ? '""' : formatEnvValue(value)}`)
}

export function renderEnvFile(lines: readonly string[]): string {
  return lines.length === 0 ? '' : lines.join('\n') + '\n'
}
