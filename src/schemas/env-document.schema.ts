/** Names dotenv can read back as a key: letters, digits, `_`, `.` and `-`. */
export const VARIABLE_NAME_PATTERN: string = '^[\\w.-]+$'

const variableMapOrNull = {
  type: ['object', 'null'],
  propertyNames: { pattern: VARIABLE_NAME_PATTERN },
  additionalProperties: { type: 'string' }
} as const

export const envDocumentSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  properties: {
    production: variableMapOrNull,
    preview: variableMapOrNull
  }
} as const
