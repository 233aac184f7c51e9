/**
 * Named rate limit groups of the Discord REST endpoints.
 *
 * The table lives in `rate-limit-groups.json`. Endpoints listed with
 * `shared` reuse one group, since Discord counts them against the same
 * limit; `unlimited` endpoints all map onto `RateLimitGroup.unlimited()`.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { GroupIdAllocator, LimiterScope, RateLimitGroup } from './group.js';
import groupTable from './rate-limit-groups.json';

export type RateLimitGroupName = keyof typeof groupTable.endpoints;

const limiterSchema = z.enum(['channel_id', 'guild_id', 'webhook_id', 'global', 'unlimited']);

const groupDefinitionSchema = z
  .object({
    limiter: limiterSchema.default('global'),
    optimistic: z.boolean().default(false),
  })
  .strict();

const endpointDefinitionSchema = z.union([
  z.object({ shared: z.string().min(1) }).strict(),
  groupDefinitionSchema,
]);

export const RateLimitGroupTableSchema = z
  .object({
    shared: z.record(groupDefinitionSchema),
    endpoints: z.record(endpointDefinitionSchema),
  })
  .superRefine((table, ctx) => {
    for (const [name, definition] of Object.entries(table.endpoints)) {
      if ('shared' in definition && !(definition.shared in table.shared)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['endpoints', name, 'shared'],
          message: `Unknown shared group: ${definition.shared}`,
        });
      }
    }
  });

export type RateLimitGroupTable = z.infer<typeof RateLimitGroupTableSchema>;

type GroupDefinition = z.infer<typeof groupDefinitionSchema>;

function createGroup(allocator: GroupIdAllocator, definition: GroupDefinition): RateLimitGroup {
  if (definition.limiter === LimiterScope.Unlimited) {
    return RateLimitGroup.unlimited();
  }
  return allocator.create(definition.limiter, definition.optimistic);
}

export class RateLimitGroups {
  private readonly groups: Map<string, RateLimitGroup> = new Map();

  /**
   * @throws ConfigurationError if the table does not validate
   */
  constructor(allocator: GroupIdAllocator, table: unknown = groupTable) {
    const parsed = RateLimitGroupTableSchema.safeParse(table);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid rate limit group table (${issues.join('; ')})`);
    }

    const shared = new Map<string, RateLimitGroup>();
    for (const [name, definition] of Object.entries(parsed.data.shared)) {
      shared.set(name, createGroup(allocator, definition));
    }

    for (const [name, definition] of Object.entries(parsed.data.endpoints)) {
      const group = 'shared' in definition ? shared.get(definition.shared) : createGroup(allocator, definition);
      if (group !== undefined) {
        this.groups.set(name, group);
      }
    }
  }

  get(name: RateLimitGroupName): RateLimitGroup {
    return this.lookup(name);
  }

  /**
   * Looks a group up by a name that is not known at compile time.
   * @throws ConfigurationError for unknown names
   */
  lookup(name: string): RateLimitGroup {
    const group = this.groups.get(name);
    if (group === undefined) {
      throw new ConfigurationError(`Unknown rate limit group: ${name}`);
    }
    return group;
  }

  has(name: string): boolean {
    return this.groups.has(name);
  }

  names(): string[] {
    return [...this.groups.keys()];
  }

  get size(): number {
    return this.groups.size;
  }
}
