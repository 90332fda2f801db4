import Ajv2020 from 'ajv/dist/2020'
import { envDocumentSchema } from '../../schemas/env-document.schema'
import { MalformedDocumentError } from '../../utils/errors'

export type EnvironmentName = 'production' | 'preview'

export const ENVIRONMENTS: readonly EnvironmentName[] = ['production', 'preview']

/** Variable name to value. */
export type VariableMap = Readonly<Record<string, string>>

/**
 * Variables per environment. `null` means "no data for this environment"
 * (e.g. a deployment snapshot of the other one) and is distinct from `{}`.
 */
export interface VariableDocument {
  readonly production: VariableMap | null
  readonly preview: VariableMap | null
}

interface RawDocument {
  readonly production?: Record<string, string> | null
  readonly preview?: Record<string, string> | null
}

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateDocument = ajv.compile<RawDocument>(envDocumentSchema)

export function isEnvironmentName(value: string): value is EnvironmentName {
  return value === 'production' || value === 'preview'
}

function byKey(a: readonly [string, string], b: readonly [string, string]): number {
  return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0
}

/** Entries ordered by key (UTF-16 code units), so output diffs cleanly. */
export function sortedEntries(map: VariableMap): Array<[string, string]> {
  return Object.entries(map).sort(byKey)
}

export function sortedMap(map: VariableMap): Record<string, string> {
  return Object.fromEntries(sortedEntries(map))
}

/**
 * Parse the JSON document format. Absent fields read as `null`, unknown
 * top-level fields are ignored.
 */
export function parseDocument(text: string, source: string = '<input>'): VariableDocument {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    const reason: string = err instanceof Error ? err.message : String(err)
    throw new MalformedDocumentError(source, [`invalid JSON (${reason})`])
  }
  if (!validateDocument(raw)) {
    const errs: string[] = (validateDocument.errors ?? []).map(e => {
      const key: string = e.propertyName === undefined ? '' : `key ${JSON.stringify(e.propertyName)} `
      return `${e.instancePath || '/'} ${key}${e.message ?? 'is invalid'}`.trim()
    })
    throw new MalformedDocumentError(source, errs.length > 0 ? errs : ['does not match the document schema'])
  }
  return {
    production: raw.production ? { ...raw.production } : null,
    preview: raw.preview ? { ...raw.preview } : null
  }
}

/** Pretty JSON with sorted keys and a trailing newline; `null` stays `null`. */
export function serializeDocument(doc: VariableDocument): string {
  const body = {
    production: doc.production === null ? null : sortedMap(doc.production),
    preview: doc.preview === null ? null : sortedMap(doc.preview)
  }
  return JSON.stringify(body, null, 2) + '\n'
}
