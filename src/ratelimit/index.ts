/**
 * Rate limiting - public exports.
 */

export {
  LimiterScope,
  RateLimitGroup,
  GroupIdAllocator,
  UNLIMITED_SIZE,
  GLOBALLY_LIMITED,
  NO_SPECIFIC_RATE_LIMITER,
  effectiveSize,
} from './group.js';

export { CooldownLedger, CooldownEntry, DROP_ROUND_MS } from './cooldown-ledger.js';

export {
  RateLimitHeader,
  RateLimitHeaders,
  parseRateLimitHeaders,
  computeCooldownDelay,
} from './headers.js';

export {
  Scheduler,
  TimerHandle,
  SystemScheduler,
  ManualScheduler,
} from './scheduler.js';

export {
  RateLimitHandler,
  RateLimitLease,
  HandlerSettings,
  DEFAULT_HANDLER_SETTINGS,
  handlerKey,
  DEFAULT_OPTIMISTIC_COOLDOWN_MS,
  DEFAULT_MAX_OPTIMISTIC_PARALLELISM,
} from './handler.js';

export { HandlerRegistry } from './registry.js';

export { RateLimitProxy, resolveLimiterId } from './proxy.js';

export {
  RateLimitGroups,
  RateLimitGroupName,
  RateLimitGroupTable,
  RateLimitGroupTableSchema,
} from './groups.js';

export {
  RateLimiter,
  RateLimiterOptions,
  RateLimitStats,
  HandlerStats,
} from './rate-limiter.js';
