/**
 * Rate limit coordinator: the per-client owner of groups, shared handlers
 * and the global lock.
 */

import { Logger, NoopLogger, MetricsCollector, NoopMetricsCollector, MetricNames } from '../observability/index.js';
import { RateLimitScope } from '../types/index.js';
import { GroupIdAllocator, RateLimitGroup } from './group.js';
import { RateLimitGroups, RateLimitGroupName } from './groups.js';
import {
  RateLimitHandler,
  RateLimitLease,
  HandlerSettings,
  DEFAULT_OPTIMISTIC_COOLDOWN_MS,
  DEFAULT_MAX_OPTIMISTIC_PARALLELISM,
} from './handler.js';
import { RateLimitProxy } from './proxy.js';
import { HandlerRegistry } from './registry.js';
import { Scheduler, SystemScheduler } from './scheduler.js';

export interface RateLimiterOptions {
  scheduler?: Scheduler;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Cooldown recorded for responses without a limit header */
  optimisticCooldownMs?: number;
  /** Ceiling optimistic size estimates grow to */
  maxOptimisticParallelism?: number;
  /** Alternative endpoint group table, validated on load */
  groupTable?: unknown;
}

export interface HandlerStats {
  key: string;
  groupId: number;
  limiterId: string;
  size: number;
  active: number;
  waiting: number;
  cooldownDrops: number;
  pinned: boolean;
}

export interface RateLimitStats {
  handlerCount: number;
  activeRequests: number;
  queuedRequests: number;
  cooldownDrops: number;
  /** Milliseconds left on the global lock, 0 when unlocked */
  globalLockRemainingMs: number;
  handlers: HandlerStats[];
}

export class RateLimiter {
  readonly scheduler: Scheduler;
  readonly handlers: HandlerRegistry = new HandlerRegistry();
  readonly allocator: GroupIdAllocator = new GroupIdAllocator();
  readonly groups: RateLimitGroups;

  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly settings: HandlerSettings;
  private globalLockUntil = 0;

  constructor(options: RateLimiterOptions = {}) {
    this.scheduler = options.scheduler ?? new SystemScheduler();
    this.logger = (options.logger ?? new NoopLogger()).child({ component: 'ratelimit' });
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.settings = {
      scheduler: this.scheduler,
      logger: this.logger,
      optimisticCooldownMs: options.optimisticCooldownMs ?? DEFAULT_OPTIMISTIC_COOLDOWN_MS,
      maxOptimisticParallelism: options.maxOptimisticParallelism ?? DEFAULT_MAX_OPTIMISTIC_PARALLELISM,
    };
    this.groups =
      options.groupTable === undefined
        ? new RateLimitGroups(this.allocator)
        : new RateLimitGroups(this.allocator, options.groupTable);
  }

  /**
   * A detached handler sharing this limiter's clock and settings. It is not
   * registered.
   */
  createHandler(group: RateLimitGroup, limiterId: string): RateLimitHandler {
    return new RateLimitHandler(group, limiterId, this.settings);
  }

  /**
   * Runs `operation` in a slot of the shared handler of `group` in scope
   * `limiterId`. The handler is registered and entered in the same tick, and
   * dropped again once the request leaves it idle.
   */
  withSlot<T>(
    group: RateLimitGroup,
    limiterId: string,
    operation: (lease: RateLimitLease) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const handler = this.handlers.obtain(this.createHandler(group, limiterId));
    return handler.withSlot(operation, signal);
  }

  /**
   * A proxy for `group` (or the named endpoint group) in the scope of `scope`.
   *
   * @throws RateLimitScopeError if `scope` does not fit the group's limiter
   */
  proxy(
    group: RateLimitGroup | RateLimitGroupName,
    scope?: RateLimitScope,
    options: { keepAlive?: boolean } = {}
  ): RateLimitProxy {
    const resolved = typeof group === 'string' ? this.groups.get(group) : group;
    return new RateLimitProxy(this, resolved, scope, options.keepAlive ?? false);
  }

  /**
   * Holds back every request for `ms`. An earlier lock that ends later wins.
   */
  lockGlobally(ms: number): void {
    const until = this.scheduler.now() + ms;
    if (until <= this.globalLockUntil) {
      return;
    }
    this.globalLockUntil = until;
    this.metrics.incrementCounter(MetricNames.GLOBAL_LOCKS);
    this.logger.warn('Globally rate limited', { retryAfterMs: ms });
  }

  isGloballyLocked(): boolean {
    return this.scheduler.now() < this.globalLockUntil;
  }

  async waitForGlobalLock(): Promise<void> {
    for (;;) {
      const remaining = this.globalLockUntil - this.scheduler.now();
      if (remaining <= 0) {
        return;
      }
      await this.scheduler.sleep(remaining);
    }
  }

  getStats(): RateLimitStats {
    const handlers: HandlerStats[] = this.handlers.values().map((handler) => ({
      key: handler.key,
      groupId: handler.parent.groupId,
      limiterId: handler.limiterId,
      size: handler.parent.size,
      active: handler.active,
      waiting: handler.waiting,
      cooldownDrops: handler.countDrops(),
      pinned: this.handlers.isPinned(handler),
    }));

    return {
      handlerCount: handlers.length,
      activeRequests: handlers.reduce((sum, h) => sum + h.active, 0),
      queuedRequests: handlers.reduce((sum, h) => sum + h.waiting, 0),
      cooldownDrops: handlers.reduce((sum, h) => sum + h.cooldownDrops, 0),
      globalLockRemainingMs: Math.max(0, this.globalLockUntil - this.scheduler.now()),
      handlers,
    };
  }

  /**
   * Drops every handler and the global lock. Queued requests are rejected.
   */
  reset(): void {
    this.handlers.clear();
    this.globalLockUntil = 0;
  }
}
