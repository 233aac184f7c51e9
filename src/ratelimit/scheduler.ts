/**
 * Monotonic clock and single-shot timers used by rate limit handlers.
 */

import { performance } from 'node:perf_hooks';

export interface TimerHandle {
  /** Monotonic time (ms) the callback is due */
  readonly when: number;
  cancel(): void;
}

export interface Scheduler {
  /** Monotonic time in milliseconds */
  now(): number;
  /** Runs `callback` once the monotonic clock reaches `when` */
  callAt(when: number, callback: () => void): TimerHandle;
  sleep(ms: number): Promise<void>;
}

/**
 * Scheduler backed by `performance.now()` and `setTimeout`.
 */
export class SystemScheduler implements Scheduler {
  now(): number {
    return performance.now();
  }

  callAt(when: number, callback: () => void): TimerHandle {
    const timeout = setTimeout(callback, Math.max(0, when - this.now()));
    return {
      when,
      cancel: () => clearTimeout(timeout),
    };
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

interface ManualTimer {
  when: number;
  order: number;
  callback: () => void;
  cancelled: boolean;
}

/**
 * Scheduler whose clock only moves when told to. For tests.
 */
export class ManualScheduler implements Scheduler {
  private current: number;
  private timers: ManualTimer[] = [];
  private sequence = 0;

  constructor(start: number = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  callAt(when: number, callback: () => void): TimerHandle {
    const timer: ManualTimer = { when, order: this.sequence++, callback, cancelled: false };
    this.timers.push(timer);
    return {
      when,
      cancel: () => {
        timer.cancelled = true;
      },
    };
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.callAt(this.current + ms, () => resolve());
    });
  }

  /**
   * Moves the clock forward, firing due timers in order of their due time.
   */
  advance(ms: number): void {
    const target = this.current + ms;

    for (;;) {
      const next = this.nextDue(target);
      if (next === undefined) {
        break;
      }
      this.timers = this.timers.filter((timer) => timer !== next);
      this.current = Math.max(this.current, next.when);
      next.callback();
    }

    this.current = target;
  }

  /**
   * Timers that are armed and not yet fired.
   */
  pendingTimers(): number {
    return this.timers.filter((timer) => !timer.cancelled).length;
  }

  private nextDue(target: number): ManualTimer | undefined {
    this.timers = this.timers.filter((timer) => !timer.cancelled);
    let next: ManualTimer | undefined;
    for (const timer of this.timers) {
      if (timer.when > target) {
        continue;
      }
      if (
        next === undefined ||
        timer.when < next.when ||
        (timer.when === next.when && timer.order < next.order)
      ) {
        next = timer;
      }
    }
    return next;
  }
}
