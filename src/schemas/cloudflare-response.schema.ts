/** Envelope shared by every Cloudflare API v4 response. */
export const cloudflareEnvelopeSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['success'],
  properties: {
    success: { type: 'boolean' },
    errors: { type: 'array' },
    result: {}
  }
} as const

const envVarsSchema = {
  type: ['object', 'null'],
  additionalProperties: {
    anyOf: [
      { type: 'null' },
      {
        type: 'object',
        additionalProperties: true,
        properties: {
          type: { type: 'string' },
          value: { type: 'string' }
        }
      }
    ]
  }
} as const

const environmentConfigSchema = {
  type: ['object', 'null'],
  additionalProperties: true,
  properties: { env_vars: envVarsSchema }
} as const

/** `result` of GET /accounts/:account/pages/projects/:project */
export const pagesProjectSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['deployment_configs'],
  properties: {
    name: { type: 'string' },
    deployment_configs: {
      type: 'object',
      additionalProperties: true,
      properties: {
        production: environmentConfigSchema,
        preview: environmentConfigSchema
      }
    }
  }
} as const

/** `result` of GET /accounts/:account/pages/projects/:project/deployments/:id */
export const pagesDeploymentSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['environment'],
  properties: {
    id: { type: 'string' },
    environment: { enum: ['production', 'preview'] },
    env_vars: envVarsSchema
  }
} as const
