/**
 * Rate limit proxy: a caller-side view of the handler a request would use.
 */

import { KeepAliveConflictError, RateLimitScopeError } from '../errors/index.js';
import { RateLimitScope } from '../types/index.js';
import {
  RateLimitGroup,
  LimiterScope,
  GLOBALLY_LIMITED,
  NO_SPECIFIC_RATE_LIMITER,
} from './group.js';
import { RateLimitHandler, RateLimitLease } from './handler.js';
import type { RateLimiter } from './rate-limiter.js';

function describeScope(scope: RateLimitScope | undefined): string {
  return scope === undefined ? 'no scope' : `a ${scope.type}`;
}

/**
 * Resolves the scope instance a request of `group` is limited by.
 *
 * @throws RateLimitScopeError if `scope` cannot provide the id the group's
 *   limiter needs
 */
export function resolveLimiterId(group: RateLimitGroup, scope?: RateLimitScope): string {
  switch (group.limiter) {
    case LimiterScope.Global:
      return GLOBALLY_LIMITED;

    case LimiterScope.Unlimited:
      return NO_SPECIFIC_RATE_LIMITER;

    case LimiterScope.Channel:
      if (scope?.type === 'channel') {
        return scope.channel.id;
      }
      if (scope?.type === 'message') {
        return scope.message.channel_id;
      }
      break;

    case LimiterScope.Guild: {
      let guildId: string | null | undefined;
      switch (scope?.type) {
        case 'guild':
          return scope.guild.id;
        case 'channel':
          guildId = scope.channel.guild_id;
          break;
        case 'message':
          guildId = scope.message.guild_id;
          break;
        case 'role':
          guildId = scope.role.guild_id;
          break;
        case 'webhook':
          guildId = scope.webhook.guild_id;
          break;
        default:
          break;
      }
      if (guildId !== undefined && guildId !== null) {
        return guildId;
      }
      if (scope !== undefined) {
        throw new RateLimitScopeError(group.limiter, `${scope.type} has no guild`);
      }
      break;
    }

    case LimiterScope.Webhook:
      if (scope?.type === 'webhook') {
        return scope.webhook.id;
      }
      break;
  }

  throw new RateLimitScopeError(group.limiter, `got ${describeScope(scope)}`);
}

/**
 * Looks at (and optionally pins) the shared handler of a group and scope.
 *
 * Without `keepAlive` the proxy holds a detached template and only observes
 * the shared handler while requests keep it alive. With `keepAlive` the
 * shared handler stays registered until the proxy lets go of it.
 */
export class RateLimitProxy {
  readonly rateLimiter: RateLimiter;
  readonly group: RateLimitGroup;

  private key: RateLimitHandler;
  private cached?: RateLimitHandler;
  private pinned = false;

  constructor(
    rateLimiter: RateLimiter,
    group: RateLimitGroup,
    scope?: RateLimitScope,
    keepAlive: boolean = false
  ) {
    this.rateLimiter = rateLimiter;
    this.group = group;
    this.key = rateLimiter.createHandler(group, resolveLimiterId(group, scope));

    if (keepAlive) {
      this.keepAlive = true;
    }
  }

  get keepAlive(): boolean {
    return this.pinned;
  }

  set keepAlive(value: boolean) {
    if (value === this.pinned) {
      return;
    }

    const handlers = this.rateLimiter.handlers;
    if (value) {
      const shared = handlers.pin(this.key);
      this.key = shared;
      this.cached = shared;
      this.pinned = true;
      return;
    }

    const shared = this.key;
    this.key = shared.copy();
    this.pinned = false;
    handlers.unpin(shared);
  }

  get limiterId(): string {
    return this.key.limiterId;
  }

  get size(): number {
    return this.group.size;
  }

  /**
   * The shared handler, if one is registered right now.
   */
  get handler(): RateLimitHandler | undefined {
    const handlers = this.rateLimiter.handlers;
    const cached = this.cached;
    if (cached !== undefined && handlers.has(cached)) {
      return cached;
    }

    const found = handlers.get(this.key.key);
    this.cached = found;
    return found;
  }

  /**
   * Runs `operation` in a slot of the shared handler, registering the
   * handler if needed.
   */
  async withSlot<T>(
    operation: (lease: RateLimitLease) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const handler = this.rateLimiter.handlers.obtain(this.pinned ? this.key : this.key.copy());
    this.cached = handler;
    return handler.withSlot(operation, signal);
  }

  /**
   * Resolves once the current shared handler has drained and been dropped.
   *
   * @throws KeepAliveConflictError when this proxy pins the handler, as a
   *   pinned handler is never dropped
   */
  async waitTillLimitsExpire(): Promise<void> {
    if (this.pinned) {
      throw new KeepAliveConflictError();
    }

    const handler = this.handler;
    if (handler === undefined) {
      return;
    }
    await this.rateLimiter.handlers.whenReleased(handler);
  }

  isLimitedByChannel(): boolean {
    return this.group.limiter === LimiterScope.Channel;
  }

  isLimitedByGuild(): boolean {
    return this.group.limiter === LimiterScope.Guild;
  }

  isLimitedByWebhook(): boolean {
    return this.group.limiter === LimiterScope.Webhook;
  }

  isLimitedGlobally(): boolean {
    return this.group.limiter === LimiterScope.Global;
  }

  isUnlimited(): boolean {
    return this.group.limiter === LimiterScope.Unlimited;
  }

  isAlive(): boolean {
    return this.handler !== undefined;
  }

  hasInfo(): boolean {
    return this.handler?.hasInfo ?? false;
  }

  hasSizeSet(): boolean {
    return this.group.hasSizeSet();
  }

  /** Slots in flight or cooling down */
  get usedCount(): number {
    const handler = this.handler;
    if (handler === undefined) {
      return 0;
    }
    return handler.active + handler.countDrops();
  }

  /** Slots a new request could take right now */
  get freeCount(): number {
    const size = this.group.effectiveSize();
    if (size === Infinity) {
      return Infinity;
    }
    return size - this.usedCount;
  }

  get waitingCount(): number {
    return this.handler?.waiting ?? 0;
  }

  /** Monotonic time (ms) of the next cooldown expiry, 0 if none */
  get nextResetAt(): number {
    return this.handler?.nextDrop?.drop ?? 0;
  }

  /** Milliseconds until the next cooldown expiry, 0 if none */
  get nextResetAfter(): number {
    const drop = this.handler?.nextDrop?.drop;
    if (drop === undefined) {
      return 0;
    }
    return drop - this.rateLimiter.scheduler.now();
  }
}
