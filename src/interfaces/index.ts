/**
 * @fileoverview Central export for all interfaces.
 *
 * Import interfaces from this module for convenience:
 * ```typescript
 * import type { IOperationQueue, IExclusivityController } from './interfaces';
 * ```
 *
 * @module interfaces
 */

export type { ILogger } from './ILogger';
export type { IConfigProvider } from './IConfigProvider';
export type { ExecutionContext, ScheduledJob } from './IExecutionContext';
export type { IOperationQueue } from './IOperationQueue';
export type { IExclusivityController } from './IExclusivityController';
