/**
 * @fileoverview JSON Schema definitions for library inputs.
 *
 * Used by Ajv to validate retry strategies and the runtime configuration
 * before they reach the retry operator or the work queue.
 *
 * ⚠️ MAINTENANCE: When adding a wait policy to `WaitPolicy` in
 * src/future/types.ts, add a matching branch to `waitPolicySchema` below and
 * a case to the retry validation tests.
 *
 * @module core/validation/schemas
 */

const immediateWaitSchema = {
  type: 'object',
  required: ['kind'],
  additionalProperties: false,
  properties: {
    kind: { type: 'string', const: 'immediate' },
  },
} as const;

const constantWaitSchema = {
  type: 'object',
  required: ['kind', 'delayMs'],
  additionalProperties: false,
  properties: {
    kind: { type: 'string', const: 'constant' },
    delayMs: { type: 'number', minimum: 0 },
  },
} as const;

const sequenceWaitSchema = {
  type: 'object',
  required: ['kind', 'delaysMs'],
  additionalProperties: false,
  properties: {
    kind: { type: 'string', const: 'sequence' },
    delaysMs: { type: 'array', items: { type: 'number', minimum: 0 } },
  },
} as const;

export const waitPolicySchema = {
  oneOf: [immediateWaitSchema, constantWaitSchema, sequenceWaitSchema],
} as const;

export const timerKindSchema = {
  type: 'string',
  enum: ['deadline', 'wallClock'],
} as const;

export const retryStrategySchema = {
  type: 'object',
  required: ['maxAttempts', 'waitPolicy', 'timerKind'],
  additionalProperties: false,
  properties: {
    maxAttempts: { type: 'integer', minimum: 1 },
    waitPolicy: waitPolicySchema,
    timerKind: timerKindSchema,
  },
} as const;

export const runtimeConfigSchema = {
  type: 'object',
  required: ['queue', 'timers', 'retry', 'logging'],
  additionalProperties: false,
  properties: {
    queue: {
      type: 'object',
      required: ['maxConcurrentOperations'],
      additionalProperties: false,
      properties: {
        maxConcurrentOperations: { type: 'integer', minimum: 1 },
      },
    },
    timers: {
      type: 'object',
      required: ['wallClockCheckIntervalMs'],
      additionalProperties: false,
      properties: {
        wallClockCheckIntervalMs: { type: 'integer', minimum: 1, maximum: 2147483647 },
      },
    },
    retry: {
      type: 'object',
      required: ['defaultStrategy'],
      additionalProperties: false,
      properties: {
        defaultStrategy: retryStrategySchema,
      },
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
      },
    },
  },
} as const;
