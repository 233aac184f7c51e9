/**
 * Discord client configuration and builder.
 */

import { z } from 'zod';
import { Snowflake } from '../types/index.js';
import { ConfigurationError, InvalidWebhookUrlError, NoAuthenticationError } from '../errors/index.js';
import {
  DEFAULT_OPTIMISTIC_COOLDOWN_MS,
  DEFAULT_MAX_OPTIMISTIC_PARALLELISM,
} from '../ratelimit/handler.js';

/**
 * Rate limit configuration.
 */
export interface RateLimitConfig {
  /** Route requests through the rate limit handlers. Default: true */
  enabled: boolean;
  /** Cooldown (ms) recorded for responses without a limit header. Default: 1000 */
  optimisticCooldownMs: number;
  /** Ceiling optimistic size estimates grow to. Default: 50 */
  maxOptimisticParallelism: number;
}

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Maximum retry attempts. Default: 3 */
  maxRetries: number;
  /** Initial backoff delay (ms). Default: 1000 */
  initialBackoffMs: number;
  /** Maximum backoff delay (ms). Default: 30000 */
  maxBackoffMs: number;
  /** Backoff multiplier. Default: 2 */
  backoffMultiplier: number;
  /** Jitter factor (0-1). Default: 0.1 */
  jitterFactor: number;
}

export interface DiscordConfig {
  /** Bot token for REST API authentication */
  botToken?: SecretString;
  /** Default webhook URL for webhook operations */
  defaultWebhookUrl?: SecretString;
  baseUrl: string;
  rateLimitConfig: RateLimitConfig;
  retryConfig: RetryConfig;
  requestTimeoutMs: number;
  userAgent: string;
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  enabled: true,
  optimisticCooldownMs: DEFAULT_OPTIMISTIC_COOLDOWN_MS,
  maxOptimisticParallelism: DEFAULT_MAX_OPTIMISTIC_PARALLELISM,
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Discord API v10 base URL.
 */
export const DISCORD_API_BASE_URL = 'https://discord.com/api/v10';

export const DEFAULT_USER_AGENT = 'DiscordBot (discord-rest-ratelimit, 0.1.0)';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

const WEBHOOK_URL_PATTERN =
  /^https:\/\/(?:discord\.com|discordapp\.com)\/api(?:\/v\d+)?\/webhooks\/(\d+)\/([\w-]+)$/;

const rateLimitConfigSchema = z.object({
  enabled: z.boolean(),
  optimisticCooldownMs: z.number().int().positive(),
  maxOptimisticParallelism: z.number().int().min(1),
});

const retryConfigSchema = z
  .object({
    maxRetries: z.number().int().nonnegative().max(10),
    initialBackoffMs: z.number().positive(),
    maxBackoffMs: z.number().positive(),
    backoffMultiplier: z.number().min(1),
    jitterFactor: z.number().min(0).max(1),
  })
  .refine((config) => config.initialBackoffMs <= config.maxBackoffMs, {
    message: 'initialBackoffMs must not exceed maxBackoffMs',
    path: ['initialBackoffMs'],
  });

const configSchema = z.object({
  baseUrl: z.string().url().startsWith('https://', 'must be HTTPS'),
  rateLimitConfig: rateLimitConfigSchema,
  retryConfig: retryConfigSchema,
  requestTimeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
});

function validate<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${[what, ...i.path].join('.')}: ${i.message}`);
    throw new ConfigurationError(issues.join(', '));
  }
  return result.data;
}

/**
 * Wraps a secret so it never shows up in logs or JSON. Only `expose()`
 * returns the value.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

export class DiscordConfigBuilder {
  private botToken?: SecretString;
  private defaultWebhookUrl?: SecretString;
  private baseUrl: string = DISCORD_API_BASE_URL;
  private rateLimitConfig: RateLimitConfig = { ...DEFAULT_RATE_LIMIT_CONFIG };
  private retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG };
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;

  /**
   * @param token - The bot token, without the "Bot " prefix
   */
  withBotToken(token: string): this {
    const trimmed = token.trim();
    if (trimmed.length === 0) {
      throw new ConfigurationError('Bot token cannot be empty');
    }
    this.botToken = new SecretString(trimmed);
    return this;
  }

  withWebhook(url: string): this {
    const trimmed = url.trim();
    if (trimmed.length === 0) {
      throw new ConfigurationError('Webhook URL cannot be empty');
    }
    if (!WEBHOOK_URL_PATTERN.test(trimmed)) {
      throw new InvalidWebhookUrlError();
    }
    this.defaultWebhookUrl = new SecretString(trimmed);
    return this;
  }

  withBaseUrl(url: string): this {
    this.baseUrl = url.replace(/\/$/, '');
    return this;
  }

  withRateLimitConfig(config: Partial<RateLimitConfig>): this {
    this.rateLimitConfig = { ...this.rateLimitConfig, ...config };
    return this;
  }

  withRetryConfig(config: Partial<RetryConfig>): this {
    this.retryConfig = { ...this.retryConfig, ...config };
    return this;
  }

  withRequestTimeout(timeoutMs: number): this {
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * - DISCORD_BOT_TOKEN: bot token
   * - DISCORD_WEBHOOK_URL: default webhook URL
   * - DISCORD_API_BASE_URL: API base URL
   * - DISCORD_RATE_LIMIT_ENABLED: "false" turns client-side limiting off
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): DiscordConfigBuilder {
    const builder = new DiscordConfigBuilder();

    const botToken = env.DISCORD_BOT_TOKEN;
    if (botToken) {
      builder.withBotToken(botToken);
    }

    const webhookUrl = env.DISCORD_WEBHOOK_URL;
    if (webhookUrl) {
      builder.withWebhook(webhookUrl);
    }

    const baseUrl = env.DISCORD_API_BASE_URL;
    if (baseUrl) {
      builder.withBaseUrl(baseUrl);
    }

    if (env.DISCORD_RATE_LIMIT_ENABLED === 'false') {
      builder.withRateLimitConfig({ enabled: false });
    }

    return builder;
  }

  /**
   * @throws NoAuthenticationError if neither bot token nor webhook URL is configured
   * @throws ConfigurationError if any setting is out of range
   */
  build(): DiscordConfig {
    if (!this.botToken && !this.defaultWebhookUrl) {
      throw new NoAuthenticationError();
    }

    const validated = validate(
      configSchema,
      {
        baseUrl: this.baseUrl,
        rateLimitConfig: this.rateLimitConfig,
        retryConfig: this.retryConfig,
        requestTimeoutMs: this.requestTimeoutMs,
        userAgent: this.userAgent,
      },
      'config'
    );

    return {
      botToken: this.botToken,
      defaultWebhookUrl: this.defaultWebhookUrl,
      ...validated,
    };
  }
}

/**
 * @throws InvalidWebhookUrlError if the URL is not a Discord webhook URL
 */
export function parseWebhookUrl(url: string): { webhookId: Snowflake; webhookToken: string } {
  const match = WEBHOOK_URL_PATTERN.exec(url.trim());
  if (match === null) {
    throw new InvalidWebhookUrlError();
  }
  const [, webhookId, webhookToken] = match;
  return { webhookId, webhookToken };
}

export function buildWebhookUrl(
  webhookId: Snowflake,
  webhookToken: string,
  baseUrl: string = DISCORD_API_BASE_URL
): string {
  return `${baseUrl}/webhooks/${webhookId}/${webhookToken}`;
}
