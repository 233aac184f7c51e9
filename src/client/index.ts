/**
 * Discord client - main entry point for Discord API operations.
 *
 * Each operation names the rate limit group of its endpoint and the object
 * it acts on; the client resolves the scope and routes the request through
 * the matching shared handler.
 */

import { z } from 'zod';
import {
  DiscordConfig,
  DiscordConfigBuilder,
  parseWebhookUrl,
} from '../config/index.js';
import { ConfigurationError, ValidationError } from '../errors/index.js';
import { RateLimiter, RateLimitStats } from '../ratelimit/rate-limiter.js';
import { RateLimitGroupName } from '../ratelimit/groups.js';
import { RateLimitProxy, resolveLimiterId } from '../ratelimit/proxy.js';
import { Scheduler, SystemScheduler } from '../ratelimit/scheduler.js';
import { RetryExecutor } from '../resilience/retry.js';
import { DiscordTransport, FetchFunction, HttpMethod } from '../transport/index.js';
import {
  Logger,
  MetricsCollector,
  NoopLogger,
  NoopMetricsCollector,
  MetricNames,
} from '../observability/index.js';
import {
  Snowflake,
  User,
  Channel,
  Message,
  Guild,
  Role,
  Webhook,
  RateLimitScope,
  channelScope,
  messageScope,
  guildScope,
  roleScope,
  webhookScope,
  UserSchema,
  ChannelSchema,
  MessageSchema,
  GuildSchema,
  RoleSchema,
  WebhookSchema,
  EmptySchema,
} from '../types/index.js';

export const MAX_MESSAGE_CONTENT_LENGTH = 2000;

// ============================================================================
// Parameter Types
// ============================================================================

export type ChannelRef = Pick<Channel, 'id' | 'guild_id'>;
export type MessageRef = Pick<Message, 'id' | 'channel_id' | 'guild_id'>;
export type GuildRef = Pick<Guild, 'id'>;
export type RoleRef = Pick<Role, 'id' | 'guild_id'>;
export type WebhookRef = Pick<Webhook, 'id' | 'guild_id'>;

export interface SendMessageParams {
  content: string;
  /** Message ID to reply to */
  replyTo?: Snowflake;
  tts?: boolean;
}

export interface EditChannelParams {
  name?: string;
  topic?: string | null;
  nsfw?: boolean;
  /** Slowmode delay in seconds */
  rateLimitPerUser?: number;
  parentId?: Snowflake | null;
}

export interface RoleParams {
  name?: string;
  color?: number;
  hoist?: boolean;
  mentionable?: boolean;
  permissions?: string;
}

export interface WebhookParams {
  /** Webhook URL (uses default if not provided) */
  url?: string;
  content: string;
  /** Override webhook username */
  username?: string;
  /** Override webhook avatar URL */
  avatarUrl?: string;
  /** Thread to post in */
  threadId?: Snowflake;
  /** Wait for the message to be created and return it */
  wait?: boolean;
}

export interface EditWebhookParams {
  name?: string;
  /** Channel to move the webhook to */
  channelId?: Snowflake;
}

export interface DiscordClientOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  scheduler?: Scheduler;
  fetch?: FetchFunction;
}

interface Call<T> {
  method: HttpMethod;
  path: string;
  operation: string;
  group: RateLimitGroupName;
  scope?: RateLimitScope;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  body?: unknown;
  query?: Record<string, string | boolean | number>;
  auth?: 'bot' | 'none';
  reason?: string;
}

// ============================================================================
// Discord Client
// ============================================================================

export class DiscordClient {
  private readonly config: DiscordConfig;
  private readonly transport: DiscordTransport;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;

  private constructor(
    config: DiscordConfig,
    transport: DiscordTransport,
    rateLimiter: RateLimiter,
    logger: Logger
  ) {
    this.config = config;
    this.transport = transport;
    this.rateLimiter = rateLimiter;
    this.logger = logger;
  }

  static create(config: DiscordConfig, options: DiscordClientOptions = {}): DiscordClient {
    const logger = options.logger ?? new NoopLogger();
    const metrics = options.metrics ?? new NoopMetricsCollector();
    const scheduler = options.scheduler ?? new SystemScheduler();

    const rateLimiter = new RateLimiter({
      scheduler,
      logger,
      metrics,
      optimisticCooldownMs: config.rateLimitConfig.optimisticCooldownMs,
      maxOptimisticParallelism: config.rateLimitConfig.maxOptimisticParallelism,
    });
    const retryExecutor = new RetryExecutor(
      config.retryConfig,
      {
        onRetry: (attempt, error, delay) => {
          logger.warn('Retrying Discord request', { attempt, error: error.message, delayMs: delay });
          metrics.incrementCounter(MetricNames.RETRY_ATTEMPTS, 1);
        },
      },
      { sleep: (ms) => scheduler.sleep(ms) }
    );

    const transport = new DiscordTransport({
      config,
      rateLimiter,
      retryExecutor,
      logger,
      metrics,
      fetch: options.fetch,
    });

    return new DiscordClient(config, transport, rateLimiter, logger);
  }

  static fromBuilder(builder: DiscordConfigBuilder, options?: DiscordClientOptions): DiscordClient {
    return DiscordClient.create(builder.build(), options);
  }

  static fromEnv(options?: DiscordClientOptions): DiscordClient {
    return DiscordClient.fromBuilder(DiscordConfigBuilder.fromEnv(), options);
  }

  // ==========================================================================
  // Message Operations
  // ==========================================================================

  async sendMessage(channel: ChannelRef, params: SendMessageParams): Promise<Message> {
    this.validateContent(params.content);

    const body: Record<string, unknown> = { content: params.content };
    if (params.tts) body.tts = true;
    if (params.replyTo !== undefined) {
      body.message_reference = { message_id: params.replyTo, fail_if_not_exists: false };
    }

    return this.call({
      method: 'POST',
      path: `/channels/${channel.id}/messages`,
      operation: 'message:send',
      group: 'messageCreate',
      scope: channelScope(channel),
      schema: MessageSchema,
      body,
    });
  }

  async editMessage(message: MessageRef, content: string): Promise<Message> {
    this.validateContent(content);

    return this.call({
      method: 'PATCH',
      path: `/channels/${message.channel_id}/messages/${message.id}`,
      operation: 'message:edit',
      group: 'messageEdit',
      scope: messageScope(message),
      schema: MessageSchema,
      body: { content },
    });
  }

  async deleteMessage(message: MessageRef, reason?: string): Promise<void> {
    await this.call({
      method: 'DELETE',
      path: `/channels/${message.channel_id}/messages/${message.id}`,
      operation: 'message:delete',
      group: 'messageDelete',
      scope: messageScope(message),
      schema: EmptySchema,
      reason,
    });
  }

  /**
   * @param emoji - Unicode emoji or custom emoji as `name:id`
   */
  async addReaction(message: MessageRef, emoji: string): Promise<void> {
    await this.call({
      method: 'PUT',
      path: `${this.reactionPath(message, emoji)}/@me`,
      operation: 'reaction:add',
      group: 'reactionAdd',
      scope: messageScope(message),
      schema: EmptySchema,
    });
  }

  async removeOwnReaction(message: MessageRef, emoji: string): Promise<void> {
    await this.call({
      method: 'DELETE',
      path: `${this.reactionPath(message, emoji)}/@me`,
      operation: 'reaction:remove',
      group: 'reactionDeleteOwn',
      scope: messageScope(message),
      schema: EmptySchema,
    });
  }

  async pinMessage(message: MessageRef, reason?: string): Promise<void> {
    await this.call({
      method: 'PUT',
      path: `/channels/${message.channel_id}/pins/${message.id}`,
      operation: 'message:pin',
      group: 'messagePin',
      scope: messageScope(message),
      schema: EmptySchema,
      reason,
    });
  }

  async unpinMessage(message: MessageRef, reason?: string): Promise<void> {
    await this.call({
      method: 'DELETE',
      path: `/channels/${message.channel_id}/pins/${message.id}`,
      operation: 'message:unpin',
      group: 'messageUnpin',
      scope: messageScope(message),
      schema: EmptySchema,
      reason,
    });
  }

  async triggerTyping(channel: ChannelRef): Promise<void> {
    await this.call({
      method: 'POST',
      path: `/channels/${channel.id}/typing`,
      operation: 'channel:typing',
      group: 'typing',
      scope: channelScope(channel),
      schema: EmptySchema,
    });
  }

  // ==========================================================================
  // Channel & Guild Operations
  // ==========================================================================

  async editChannel(
    channel: ChannelRef,
    params: EditChannelParams,
    reason?: string
  ): Promise<Channel> {
    const body: Record<string, unknown> = {};
    if (params.name !== undefined) body.name = params.name;
    if (params.topic !== undefined) body.topic = params.topic;
    if (params.nsfw !== undefined) body.nsfw = params.nsfw;
    if (params.rateLimitPerUser !== undefined) body.rate_limit_per_user = params.rateLimitPerUser;
    if (params.parentId !== undefined) body.parent_id = params.parentId;

    return this.call({
      method: 'PATCH',
      path: `/channels/${channel.id}`,
      operation: 'channel:edit',
      group: 'channelEdit',
      scope: channelScope(channel),
      schema: ChannelSchema,
      body,
      reason,
    });
  }

  async deleteChannel(channel: ChannelRef, reason?: string): Promise<Channel> {
    return this.call({
      method: 'DELETE',
      path: `/channels/${channel.id}`,
      operation: 'channel:delete',
      group: 'channelDelete',
      scope: channelScope(channel),
      schema: ChannelSchema,
      reason,
    });
  }

  async getGuild(guild: GuildRef): Promise<Guild> {
    return this.call({
      method: 'GET',
      path: `/guilds/${guild.id}`,
      operation: 'guild:get',
      group: 'guildGet',
      scope: guildScope(guild),
      schema: GuildSchema,
    });
  }

  /**
   * The returned role carries `guild_id`, so it can scope later role calls.
   */
  async createRole(guild: GuildRef, params: RoleParams = {}, reason?: string): Promise<Role> {
    const role = await this.call({
      method: 'POST',
      path: `/guilds/${guild.id}/roles`,
      operation: 'role:create',
      group: 'roleCreate',
      scope: guildScope(guild),
      schema: RoleSchema,
      body: { ...params },
      reason,
    });
    return { ...role, guild_id: guild.id };
  }

  /**
   * @throws RateLimitScopeError if `role` has no `guild_id`
   */
  async editRole(role: RoleRef, params: RoleParams, reason?: string): Promise<Role> {
    const scope = roleScope(role);
    const guildId = resolveLimiterId(this.rateLimiter.groups.get('roleEdit'), scope);

    const edited = await this.call({
      method: 'PATCH',
      path: `/guilds/${guildId}/roles/${role.id}`,
      operation: 'role:edit',
      group: 'roleEdit',
      scope,
      schema: RoleSchema,
      body: { ...params },
      reason,
    });
    return { ...edited, guild_id: guildId };
  }

  async createDMChannel(userId: Snowflake): Promise<Channel> {
    return this.call({
      method: 'POST',
      path: '/users/@me/channels',
      operation: 'channel:createDM',
      group: 'channelPrivateCreate',
      schema: ChannelSchema,
      body: { recipient_id: userId },
    });
  }

  async getCurrentUser(): Promise<User> {
    return this.call({
      method: 'GET',
      path: '/users/@me',
      operation: 'user:me',
      group: 'clientUser',
      schema: UserSchema,
    });
  }

  // ==========================================================================
  // Webhook Operations
  // ==========================================================================

  /**
   * Executes a webhook. Returns the created message when `wait` is set.
   */
  async executeWebhook(params: WebhookParams): Promise<Message | undefined> {
    const webhookUrl = params.url ?? this.config.defaultWebhookUrl?.expose();
    if (webhookUrl === undefined) {
      throw new ConfigurationError('No webhook URL configured');
    }
    this.validateContent(params.content);

    const { webhookId, webhookToken } = parseWebhookUrl(webhookUrl);
    const query: Record<string, string | boolean> = {};
    if (params.wait) query.wait = true;
    if (params.threadId !== undefined) query.thread_id = params.threadId;

    const body: Record<string, unknown> = { content: params.content };
    if (params.username !== undefined) body.username = params.username;
    if (params.avatarUrl !== undefined) body.avatar_url = params.avatarUrl;

    const call = {
      method: 'POST',
      path: `/webhooks/${webhookId}/${webhookToken}`,
      operation: 'webhook:execute',
      group: 'webhookSend',
      scope: webhookScope({ id: webhookId }),
      auth: 'none',
      body,
      query,
    } as const;

    if (params.wait) {
      return this.call({ ...call, schema: MessageSchema });
    }
    await this.call({ ...call, schema: EmptySchema });
    return undefined;
  }

  async editWebhook(
    webhook: WebhookRef,
    params: EditWebhookParams,
    reason?: string
  ): Promise<Webhook> {
    const body: Record<string, unknown> = {};
    if (params.name !== undefined) body.name = params.name;
    if (params.channelId !== undefined) body.channel_id = params.channelId;

    return this.call({
      method: 'PATCH',
      path: `/webhooks/${webhook.id}`,
      operation: 'webhook:edit',
      group: 'webhookEdit',
      scope: webhookScope(webhook),
      schema: WebhookSchema,
      body,
      reason,
    });
  }

  // ==========================================================================
  // Rate Limits
  // ==========================================================================

  /**
   * A proxy onto the handler the named endpoint uses for `scope`.
   *
   * @throws RateLimitScopeError if `scope` does not fit the group's limiter
   */
  rateLimitProxy(
    group: RateLimitGroupName,
    scope?: RateLimitScope,
    keepAlive: boolean = false
  ): RateLimitProxy {
    return this.rateLimiter.proxy(group, scope, { keepAlive });
  }

  getRateLimitStats(): RateLimitStats {
    return this.rateLimiter.getStats();
  }

  /**
   * Drops every rate limit handler. Requests still queued are rejected.
   */
  close(): void {
    const stats = this.rateLimiter.getStats();
    this.rateLimiter.reset();
    this.logger.info('Discord client closed', {
      handlers: stats.handlerCount,
      queuedRequests: stats.queuedRequests,
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async call<T>(call: Call<T>): Promise<T> {
    const group = this.rateLimiter.groups.get(call.group);
    const limiterId = resolveLimiterId(group, call.scope);

    const response = await this.transport.execute(
      {
        method: call.method,
        path: call.path,
        body: call.body,
        query: call.query,
        auth: call.auth ?? 'bot',
        operation: call.operation,
        reason: call.reason,
        rateLimit: { group, limiterId },
      },
      call.schema
    );
    return response.data;
  }

  private reactionPath(message: MessageRef, emoji: string): string {
    return `/channels/${message.channel_id}/messages/${message.id}/reactions/${encodeURIComponent(emoji)}`;
  }

  private validateContent(content: string): void {
    const errors: string[] = [];

    if (content.length === 0) {
      errors.push('Content cannot be empty');
    }
    if (content.length > MAX_MESSAGE_CONTENT_LENGTH) {
      errors.push(`Content exceeds ${MAX_MESSAGE_CONTENT_LENGTH} characters`);
    }

    if (errors.length > 0) {
      throw new ValidationError(errors);
    }
  }
}
