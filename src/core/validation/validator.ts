/**
 * @fileoverview Input validator using Ajv.
 *
 * Compiles the schemas in {@link ./schemas} once and exposes type-guarding
 * validators for retry strategies and the runtime configuration.
 *
 * @module core/validation/validator
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { retryStrategySchema, runtimeConfigSchema } from './schemas';
import type { RetryStrategy } from '../../future/types';
import type { RuntimeConfig } from '../config';

/**
 * Shared Ajv instance configured for strict validation.
 *
 * Configuration:
 * - allErrors: true - Collect all errors, not just the first
 * - strict: true - Enforce strict mode
 * - coerceTypes: false - Never coerce caller values
 * - useDefaults: false - Never modify the input
 */
const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
  useDefaults: false,
});

const validateRetryStrategyFn: ValidateFunction<RetryStrategy> =
  ajv.compile<RetryStrategy>(retryStrategySchema);

const validateRuntimeConfigFn: ValidateFunction<RuntimeConfig> =
  ajv.compile<RuntimeConfig>(runtimeConfigSchema);

/**
 * Result of schema validation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** One line per distinct problem, e.g. `/maxAttempts must be >= 1` */
  details: string[];
}

/**
 * Collapse Ajv errors into one message per path and keyword.
 */
export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }

  const messages: string[] = [];
  const seen = new Set<string>();

  for (const err of errors) {
    const path = err.instancePath || '/';
    const key = `${path}:${err.keyword}`;
    if (seen.has(key)) continue;
    seen.add(key);

    switch (err.keyword) {
      case 'required':
        messages.push(`${path} is missing required field '${err.params.missingProperty}'`);
        break;
      case 'additionalProperties':
        messages.push(`${path} has unknown property '${err.params.additionalProperty}'`);
        break;
      default:
        messages.push(`${path} ${err.message ?? `failed ${err.keyword}`}`);
    }
  }

  return messages;
}

/**
 * Check a value against the retry strategy schema.
 */
export function validateRetryStrategy(input: unknown): ValidationResult {
  if (validateRetryStrategyFn(input)) {
    return { valid: true, details: [] };
  }
  return { valid: false, details: formatErrors(validateRetryStrategyFn.errors) };
}

/**
 * Type guard form of {@link validateRetryStrategy}.
 */
export function isRetryStrategy(input: unknown): input is RetryStrategy {
  return validateRetryStrategyFn(input);
}

/**
 * Type guard for a fully-populated runtime configuration. Errors from the
 * last call are available through {@link lastRuntimeConfigErrors}.
 */
export function isRuntimeConfig(input: unknown): input is RuntimeConfig {
  return validateRuntimeConfigFn(input);
}

export function lastRuntimeConfigErrors(): string[] {
  return formatErrors(validateRuntimeConfigFn.errors);
}
