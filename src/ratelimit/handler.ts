/**
 * Rate limit handler: admission control for one group in one scope.
 *
 * A handler admits up to `group.size` requests at a time. Each finished
 * request turns its slot into a cooldown reservation that expires when the
 * response headers say the window resets; a single timer, armed for the
 * earliest reservation, frees those slots again and lets queued requests in.
 */

import { RateLimitWaitAbortedError } from '../errors/index.js';
import { Logger, NoopLogger } from '../observability/index.js';
import { CooldownLedger, CooldownEntry } from './cooldown-ledger.js';
import {
  RateLimitGroup,
  LimiterScope,
  UNLIMITED_SIZE,
  GLOBALLY_LIMITED,
  NO_SPECIFIC_RATE_LIMITER,
  effectiveSize,
} from './group.js';
import { parseRateLimitHeaders, computeCooldownDelay } from './headers.js';
import { Scheduler, SystemScheduler, TimerHandle } from './scheduler.js';

/** Cooldown recorded for responses that carry no limit header */
export const DEFAULT_OPTIMISTIC_COOLDOWN_MS = 1000;

/** Ceiling an optimistic size estimate grows to */
export const DEFAULT_MAX_OPTIMISTIC_PARALLELISM = 50;

export interface HandlerSettings {
  scheduler: Scheduler;
  logger: Logger;
  optimisticCooldownMs: number;
  maxOptimisticParallelism: number;
}

export const DEFAULT_HANDLER_SETTINGS: HandlerSettings = {
  scheduler: new SystemScheduler(),
  logger: new NoopLogger(),
  optimisticCooldownMs: DEFAULT_OPTIMISTIC_COOLDOWN_MS,
  maxOptimisticParallelism: DEFAULT_MAX_OPTIMISTIC_PARALLELISM,
};

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Registry key of the handler of `groupId` in scope `limiterId`.
 */
export function handlerKey(groupId: number, limiterId: string): string {
  return `${groupId}:${limiterId}`;
}

/**
 * One admitted request. Exiting twice is a no-op, so the lease can be
 * closed unconditionally in a `finally` block after the response was fed in.
 */
export class RateLimitLease {
  readonly handler: RateLimitHandler;
  private exited = false;

  constructor(handler: RateLimitHandler) {
    this.handler = handler;
  }

  get isExited(): boolean {
    return this.exited;
  }

  /**
   * Returns the slot, feeding the response headers (or `null` when the
   * request never got a response) into the handler.
   */
  exit(headers: Headers | null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.handler.exit(headers);
  }

  close(): void {
    this.exit(null);
  }
}

export class RateLimitHandler {
  readonly parent: RateLimitGroup;
  readonly limiterId: string;
  readonly key: string;

  private activeCount = 0;
  private queue?: Waiter[];
  private readonly drops = new CooldownLedger();
  private wakeupTimer?: TimerHandle;
  private readonly settings: HandlerSettings;
  private idleListener?: (handler: RateLimitHandler) => void;

  constructor(
    parent: RateLimitGroup,
    limiterId: string,
    settings: HandlerSettings = DEFAULT_HANDLER_SETTINGS
  ) {
    if (parent.limiter === LimiterScope.Unlimited) {
      limiterId = NO_SPECIFIC_RATE_LIMITER;
    } else if (parent.limiter === LimiterScope.Global) {
      limiterId = GLOBALLY_LIMITED;
    }

    this.parent = parent;
    this.limiterId = limiterId;
    this.key = handlerKey(parent.groupId, limiterId);
    this.settings = settings;
  }

  /**
   * A detached handler for the same group and scope, with fresh state.
   */
  copy(): RateLimitHandler {
    return new RateLimitHandler(this.parent, this.limiterId, this.settings);
  }

  /** Requests currently in flight */
  get active(): number {
    return this.activeCount;
  }

  /** Requests queued for a slot */
  get waiting(): number {
    return this.queue?.length ?? 0;
  }

  /** Whether any request has entered this handler yet */
  get hasInfo(): boolean {
    return this.queue !== undefined;
  }

  /** Earliest pending cooldown */
  get nextDrop(): Readonly<CooldownEntry> | undefined {
    return this.drops.head();
  }

  countDrops(): number {
    return this.drops.countDrops();
  }

  cooldowns(): CooldownEntry[] {
    return this.drops.toArray();
  }

  isIdle(): boolean {
    return this.activeCount === 0 && this.drops.isEmpty() && this.waiting === 0;
  }

  equals(other: RateLimitHandler): boolean {
    return this.key === other.key;
  }

  /**
   * Called whenever the handler may have become idle.
   */
  setIdleListener(listener: ((handler: RateLimitHandler) => void) | undefined): void {
    this.idleListener = listener;
  }

  /**
   * Waits for a free slot.
   *
   * Requests are admitted in arrival order: once anyone is queued, later
   * callers queue behind them even if a slot looks free.
   */
  async enter(signal?: AbortSignal): Promise<RateLimitLease> {
    const size = this.parent.size;
    if (size === UNLIMITED_SIZE) {
      return new RateLimitLease(this);
    }

    if (signal?.aborted) {
      this.notifyIfIdle();
      throw new RateLimitWaitAbortedError(this.key);
    }

    const queue = (this.queue ??= []);
    const free = effectiveSize(size) - this.activeCount - this.drops.countDrops();

    if (free > 0 && queue.length === 0) {
      this.activeCount += 1;
      return new RateLimitLease(this);
    }

    this.settings.logger.debug('Rate limit slot unavailable, queueing request', {
      handler: this.key,
      active: this.activeCount,
      queued: queue.length,
    });

    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = queue.indexOf(waiter);
        if (index === -1) {
          return;
        }
        queue.splice(index, 1);
        reject(new RateLimitWaitAbortedError(this.key));
        this.notifyIfIdle();
      };

      const detach = (): void => signal?.removeEventListener('abort', onAbort);
      const waiter: Waiter = {
        resolve: () => {
          detach();
          resolve();
        },
        reject: (error) => {
          detach();
          reject(error);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      queue.push(waiter);
    });

    return new RateLimitLease(this);
  }

  /**
   * Enters, runs `operation`, and returns the slot on every exit path.
   * `operation` should exit the lease with the response headers; if it
   * does not, the slot is returned as a failed request.
   */
  async withSlot<T>(
    operation: (lease: RateLimitLease) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const lease = await this.enter(signal);
    try {
      return await operation(lease);
    } finally {
      lease.close();
    }
  }

  /**
   * Returns a slot taken by `enter`.
   *
   * @param headers - Response headers, or `null` when no response arrived
   */
  exit(headers: Headers | null): void {
    const currentSize = this.parent.size;
    if (currentSize === UNLIMITED_SIZE) {
      this.notifyIfIdle();
      return;
    }

    this.activeCount -= 1;

    // No response: free what we can right away rather than stall the queue.
    if (headers === null) {
      this.cancelWakeup();
      this.wakeup();
      return;
    }

    const info = parseRateLimitHeaders(headers);
    let allocates = 1;
    let delay: number;

    if (info.limit === undefined) {
      if (currentSize < 0 && currentSize > -this.settings.maxOptimisticParallelism) {
        this.parent.size = currentSize - 1;
        this.releaseWaiters(1);
        this.settings.logger.debug('Widened optimistic rate limit', {
          group: this.parent.groupId,
          size: this.parent.size,
        });
      }
      delay = this.settings.optimisticCooldownMs;
    } else {
      const size = info.limit;
      if (size !== currentSize) {
        this.parent.size = size;

        if (currentSize < 0 && info.remaining !== undefined) {
          // Requests sent under the estimate already used part of the window.
          allocates = Math.max(0, size - info.remaining);
        }

        const grown = effectiveSize(size) - effectiveSize(currentSize);
        if (grown > 0) {
          this.releaseWaiters(grown);
        }

        this.settings.logger.debug('Rate limit size changed', {
          group: this.parent.groupId,
          from: currentSize,
          to: size,
        });
      }
      delay = computeCooldownDelay(info) ?? this.settings.optimisticCooldownMs;
    }

    this.recordCooldown(this.settings.scheduler.now() + delay, allocates);
  }

  /**
   * Expires the earliest cooldown and admits as many queued requests as
   * the freed capacity allows.
   */
  wakeup(): void {
    this.drops.shift();

    const head = this.drops.head();
    this.wakeupTimer =
      head === undefined ? undefined : this.settings.scheduler.callAt(head.drop, () => this.wakeup());

    if (this.waiting > 0 && this.parent.size !== UNLIMITED_SIZE) {
      const free =
        effectiveSize(this.parent.size) - this.activeCount - this.drops.countDrops();
      this.releaseWaiters(free);
    }

    this.notifyIfIdle();
  }

  /**
   * Cancels the wakeup timer and rejects every queued request.
   */
  dispose(): void {
    this.cancelWakeup();
    this.drops.clear();

    const queue = this.queue;
    if (queue !== undefined) {
      for (const waiter of queue.splice(0)) {
        waiter.reject(new RateLimitWaitAbortedError(this.key));
      }
    }
  }

  toString(): string {
    if (this.parent.limiter === LimiterScope.Unlimited) {
      return 'RateLimitHandler(unlimited)';
    }

    const size = this.parent.size === -1 ? 'unset' : String(this.parent.size);
    const scope =
      this.parent.limiter === LimiterScope.Global
        ? 'limited globally'
        : `limited by ${this.parent.limiter}: ${this.limiterId}`;

    return (
      `RateLimitHandler(size: ${size}, active: ${this.activeCount}, ` +
      `cooldown drops: ${this.drops.countDrops()}, queue length: ${this.waiting}, ` +
      `${scope}, group id: ${this.parent.groupId})`
    );
  }

  private recordCooldown(drop: number, allocates: number): void {
    this.drops.updateWith(drop, allocates);

    const head = this.drops.head();
    if (head === undefined) {
      return;
    }

    const timer = this.wakeupTimer;
    if (timer !== undefined && timer.when <= head.drop) {
      return;
    }

    timer?.cancel();
    this.wakeupTimer = this.settings.scheduler.callAt(head.drop, () => this.wakeup());
  }

  /**
   * Admits up to `count` queued requests. Their slots are taken here, not
   * when they resume, so nobody can slip in between.
   */
  private releaseWaiters(count: number): void {
    const queue = this.queue;
    if (queue === undefined) {
      return;
    }

    let remaining = Math.min(count, queue.length);
    while (remaining > 0) {
      const waiter = queue.shift();
      if (waiter === undefined) {
        break;
      }
      this.activeCount += 1;
      waiter.resolve();
      remaining -= 1;
    }
  }

  private cancelWakeup(): void {
    this.wakeupTimer?.cancel();
    this.wakeupTimer = undefined;
  }

  private notifyIfIdle(): void {
    if (this.idleListener !== undefined && this.isIdle()) {
      this.idleListener(this);
    }
  }
}
