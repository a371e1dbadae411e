/**
 * JSON Schema for the settings file.
 */

const serviceEndpoint = {
  type: 'object',
  additionalProperties: false,
  required: ['baseUrl', 'token'],
  properties: {
    baseUrl: { type: 'string', format: 'uri' },
    token: { type: 'string', minLength: 1 },
  },
} as const;

export const ListbridgeConfigSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    qualtrics: {
      type: 'object',
      additionalProperties: false,
      required: ['dataCenter', 'apiToken'],
      properties: {
        dataCenter: { type: 'string', pattern: '^[a-z0-9]+$' },
        apiToken: { type: 'string', minLength: 1 },
        directoryId: { type: 'string', minLength: 1 },
      },
    },
    workgroup: {
      ...serviceEndpoint,
      properties: {
        ...serviceEndpoint.properties,
        stem: { type: 'string', minLength: 1 },
      },
    },
    profiles: serviceEndpoint,
    sync: {
      type: 'object',
      additionalProperties: false,
      properties: {
        maxAttempts: { type: 'integer', minimum: 1 },
      },
    },
    export: {
      type: 'object',
      additionalProperties: false,
      properties: {
        maxPollAttempts: { type: 'integer', minimum: 1 },
        maxIntervalSeconds: { type: 'number', exclusiveMinimum: 0 },
      },
    },
    logLevel: { enum: ['debug', 'info', 'warn', 'error', 'silent'] },
  },
} as const;
