/**
 * @fileoverview Cancellable one-shot timers used by `delay` and `retry`.
 *
 * Deadline timers are `setTimeout`, which runs on the monotonic clock,
 * chained in slices of at most {@link MAX_TIMEOUT_MS} for longer delays.
 * Wall-clock timers sleep in slices of at most `wallClockCheckIntervalMs`
 * and compare `Date.now()` with their target after every slice, so a sleep
 * or a forward clock jump makes them fire within one slice.
 *
 * @module future/timers
 */

import type { TimerKind } from './types';
import { Logger } from '../core/logger';

const log = Logger.for('timer');

/** Default slice length of wall-clock timers. */
export const DEFAULT_WALL_CLOCK_CHECK_INTERVAL_MS = 1000;

/** Longest delay `setTimeout` honours; longer ones fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export interface TimerHandle {
  /** Stop the timer. No-op after it fired. */
  cancel(): void;
}

/**
 * Source of timers, injectable so the composition root can pass the
 * configured check interval.
 */
export interface ITimerFactory {
  schedule(kind: TimerKind, delayMs: number, callback: () => void): TimerHandle;
}

class DeadlineTimer implements TimerHandle {
  private handle: ReturnType<typeof setTimeout> | undefined;
  private readonly fireAt: number;
  private done = false;

  constructor(delayMs: number, private readonly callback: () => void) {
    this.fireAt = performance.now() + delayMs;
    this.sleep(delayMs);
  }

  private sleep(ms: number): void {
    if (ms <= MAX_TIMEOUT_MS) {
      this.handle = setTimeout(() => {
        this.handle = undefined;
        this.done = true;
        this.callback();
      }, ms);
      return;
    }
    this.handle = setTimeout(() => {
      this.handle = undefined;
      this.sleep(Math.max(0, this.fireAt - performance.now()));
    }, MAX_TIMEOUT_MS);
  }

  cancel(): void {
    if (this.done) return;
    this.done = true;
    if (this.handle !== undefined) {
      clearTimeout(this.handle);
      this.handle = undefined;
    }
  }
}

class WallClockTimer implements TimerHandle {
  private handle: ReturnType<typeof setTimeout> | undefined;
  private readonly fireAt: number;
  private done = false;

  constructor(
    delayMs: number,
    private readonly checkIntervalMs: number,
    private readonly callback: () => void,
  ) {
    this.fireAt = Date.now() + delayMs;
    this.sleep(Math.min(delayMs, checkIntervalMs, MAX_TIMEOUT_MS));
  }

  private sleep(ms: number): void {
    this.handle = setTimeout(() => {
      this.handle = undefined;
      this.check();
    }, ms);
  }

  private check(): void {
    const remaining = this.fireAt - Date.now();
    if (remaining <= 0) {
      this.done = true;
      this.callback();
      return;
    }
    this.sleep(Math.min(remaining, this.checkIntervalMs, MAX_TIMEOUT_MS));
  }

  cancel(): void {
    if (this.done) return;
    this.done = true;
    if (this.handle !== undefined) {
      clearTimeout(this.handle);
      this.handle = undefined;
    }
  }
}

/**
 * Timers backed by the global `setTimeout` and `Date.now`.
 */
export class SystemTimerFactory implements ITimerFactory {
  constructor(readonly wallClockCheckIntervalMs: number = DEFAULT_WALL_CLOCK_CHECK_INTERVAL_MS) {}

  schedule(kind: TimerKind, delayMs: number, callback: () => void): TimerHandle {
    const ms = Math.max(0, delayMs);
    log.debug(`Scheduling ${kind} timer`, { delayMs: ms });
    return kind === 'wallClock'
      ? new WallClockTimer(ms, this.wallClockCheckIntervalMs, callback)
      : new DeadlineTimer(ms, callback);
  }
}

/** Shared factory used when no factory is injected. */
export const systemTimers: ITimerFactory = new SystemTimerFactory();
