/**
 * Rate limit group descriptors.
 *
 * A group describes one class of endpoints that Discord limits together:
 * which scope object the limit is keyed by and the concurrency the endpoint
 * was last observed to allow. Handlers read `size` from their group, so every
 * handler of a group learns from every response of that group.
 */

/**
 * What a rate limit group is keyed by.
 */
export type LimiterScope = 'channel_id' | 'guild_id' | 'webhook_id' | 'global' | 'unlimited';

export const LimiterScope = {
  Channel: 'channel_id',
  Guild: 'guild_id',
  Webhook: 'webhook_id',
  Global: 'global',
  Unlimited: 'unlimited',
} as const satisfies Record<string, LimiterScope>;

/** Size sentinel of groups that never block */
export const UNLIMITED_SIZE = -10000;

/** Limiter id of globally limited handlers */
export const GLOBALLY_LIMITED = '4611686018427387904';

/** Limiter id of unlimited handlers */
export const NO_SPECIFIC_RATE_LIMITER = '0';

const FIRST_GROUP_ID = 105 << 8;
const GROUP_ID_STRIDE = 7 << 8;

/**
 * Concurrency a size value admits: unknown (0) admits one request, an
 * optimistic estimate admits its magnitude.
 */
export function effectiveSize(size: number): number {
  if (size === UNLIMITED_SIZE) {
    return Infinity;
  }
  if (size === 0) {
    return 1;
  }
  return Math.abs(size);
}

export class RateLimitGroup {
  private static unlimitedGroup?: RateLimitGroup;

  readonly groupId: number;
  readonly limiter: LimiterScope;

  /**
   * Positive: known limit. 0: unknown. Negative: optimistic estimate.
   * `UNLIMITED_SIZE`: never blocks.
   */
  size: number;

  constructor(groupId: number, limiter: LimiterScope, size: number) {
    this.groupId = groupId;
    this.limiter = limiter;
    this.size = size;
  }

  /**
   * The process-wide group of endpoints without a rate limit.
   */
  static unlimited(): RateLimitGroup {
    let group = RateLimitGroup.unlimitedGroup;
    if (group === undefined) {
      group = new RateLimitGroup(0, LimiterScope.Unlimited, UNLIMITED_SIZE);
      RateLimitGroup.unlimitedGroup = group;
    }
    return group;
  }

  get isUnlimited(): boolean {
    return this.size === UNLIMITED_SIZE;
  }

  get isOptimistic(): boolean {
    return this.size < 0 && this.size !== UNLIMITED_SIZE;
  }

  hasSizeSet(): boolean {
    return this.size > 0;
  }

  effectiveSize(): number {
    return effectiveSize(this.size);
  }

  equals(other: RateLimitGroup): boolean {
    return this.groupId === other.groupId;
  }

  toString(): string {
    let scope: string;
    if (this.limiter === LimiterScope.Global) {
      scope = 'limited globally';
    } else if (this.limiter === LimiterScope.Unlimited) {
      scope = 'unlimited';
    } else {
      scope = `limited by ${this.limiter}`;
    }
    return `RateLimitGroup(id=${this.groupId}, size=${this.size}, ${scope})`;
  }
}

/**
 * Hands out group ids. Each rate limiter owns one, so ids are unique per
 * client and stable across runs for the same table.
 */
export class GroupIdAllocator {
  private nextId: number = FIRST_GROUP_ID;

  create(limiter: LimiterScope = LimiterScope.Global, optimistic: boolean = false): RateLimitGroup {
    const groupId = this.nextId;
    this.nextId += GROUP_ID_STRIDE;
    return new RateLimitGroup(groupId, limiter, optimistic ? -1 : 0);
  }

  /**
   * Id the next `create` call will hand out.
   */
  peek(): number {
    return this.nextId;
  }
}
