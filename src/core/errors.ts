/**
 * @fileoverview Library error types.
 *
 * Futures carry caller-typed failures and never throw them. The classes here
 * are reserved for misuse of the library itself: invalid configuration,
 * invalid retry strategies and illegal operation lifecycle calls.
 *
 * @module core/errors
 */

/**
 * Thrown when a {@link RetryStrategy} fails schema validation.
 *
 * @example
 * ```typescript
 * try {
 *   retry({ maxAttempts: 0, waitPolicy: { kind: 'immediate' }, timerKind: 'deadline' }, produce);
 * } catch (e) {
 *   if (e instanceof InvalidRetryStrategyError) {
 *     console.error(e.details); // ['/maxAttempts must be >= 1']
 *   }
 * }
 * ```
 */
export class InvalidRetryStrategyError extends Error {
  constructor(message: string, public details: string[] = []) {
    super(message);
    this.name = 'InvalidRetryStrategyError';
  }
}

/**
 * Thrown by {@link loadRuntimeConfig} when configured values are out of range.
 */
export class ConfigValidationError extends Error {
  constructor(message: string, public details: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Thrown on illegal operation lifecycle calls, such as adding a dependency
 * to an operation that already started or enqueueing an operation twice.
 */
export class OperationStateError extends Error {
  constructor(message: string, public readonly operationId: string) {
    super(message);
    this.name = 'OperationStateError';
  }
}

/**
 * Render an error and its `cause` chain on one line for log output.
 *
 * @example
 * ```typescript
 * describeError(Object.assign(new Error('write failed'), { cause: new Error('disk full') }));
 * // => 'write failed: disk full'
 * ```
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      parts.push(current.message);
      current = 'cause' in current ? current.cause : undefined;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts.join(': ');
}
