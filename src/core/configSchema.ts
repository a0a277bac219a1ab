/**
 * @fileoverview JSON Schema for `toolwright.config.json`.
 *
 * @module core/configSchema
 */

const positiveMs = { type: 'integer', minimum: 1 };
const nonNegativeMs = { type: 'integer', minimum: 0 };

const debugSwitches = {
  type: 'object',
  properties: {
    process: { type: 'boolean' },
    locator: { type: 'boolean' },
    tasks: { type: 'boolean' },
    git: { type: 'boolean' },
    build: { type: 'boolean' },
    tree: { type: 'boolean' },
    config: { type: 'boolean' },
    services: { type: 'boolean' },
  },
  additionalProperties: false,
};

export const configSchema = {
  $id: 'toolwright-config',
  type: 'object',
  properties: {
    process: {
      type: 'object',
      properties: {
        killGraceMs: nonNegativeMs,
      },
      additionalProperties: false,
    },
    locator: {
      type: 'object',
      properties: {
        probeTimeoutMs: positiveMs,
      },
      additionalProperties: false,
    },
    git: {
      type: 'object',
      properties: {
        executablePath: { type: 'string' },
        statusTimeoutMs: positiveMs,
        networkTimeoutMs: positiveMs,
        pushTimeoutMs: positiveMs,
        autoRefreshIntervalMs: nonNegativeMs,
      },
      additionalProperties: false,
    },
    build: {
      type: 'object',
      properties: {
        executablePath: { type: 'string' },
        useWrapper: { type: 'boolean' },
        modelTimeoutMs: positiveMs,
        taskTimeoutMs: nonNegativeMs,
        recentRequestLimit: { type: 'integer', minimum: 0, maximum: 100 },
      },
      additionalProperties: false,
    },
    logging: {
      type: 'object',
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
        debug: debugSwitches,
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};
