/**
 * Discord REST client with header-driven rate limiting.
 *
 * ## Features
 *
 * - Per-scope rate limit handlers that learn limits from response headers
 * - Shared groups for endpoints Discord counts together
 * - Global lock after a global 429
 * - Rate limit proxies for introspection and keep-alive
 *
 * ## Quick Start
 *
 * ```typescript
 * import { DiscordClient, DiscordConfigBuilder, channelScope } from 'discord-rest-ratelimit';
 *
 * const client = DiscordClient.fromBuilder(
 *   new DiscordConfigBuilder().withBotToken(token)
 * );
 *
 * const channel = { id: '123456789012345678' };
 * await client.sendMessage(channel, { content: 'Hello' });
 *
 * const proxy = client.rateLimitProxy('messageCreate', channelScope(channel));
 * console.log(proxy.freeCount, proxy.nextResetAfter);
 * await proxy.waitTillLimitsExpire();
 * ```
 *
 * @module discord-rest-ratelimit
 */

// Client
export {
  DiscordClient,
  DiscordClientOptions,
  ChannelRef,
  MessageRef,
  GuildRef,
  RoleRef,
  WebhookRef,
  SendMessageParams,
  EditChannelParams,
  RoleParams,
  WebhookParams,
  EditWebhookParams,
  MAX_MESSAGE_CONTENT_LENGTH,
} from './client/index.js';

// Configuration
export {
  DiscordConfig,
  DiscordConfigBuilder,
  RateLimitConfig,
  RetryConfig,
  SecretString,
  parseWebhookUrl,
  buildWebhookUrl,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DISCORD_API_BASE_URL,
  DEFAULT_USER_AGENT,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './config/index.js';

// Errors
export {
  DiscordErrorCode,
  DiscordApiErrorResponse,
  DiscordError,
  RateLimitedError,
  RateLimitScopeError,
  KeepAliveConflictError,
  RateLimitWaitAbortedError,
  NoAuthenticationError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  InvalidWebhookUrlError,
  BadRequestError,
  ValidationError,
  ServerError,
  NetworkError,
  ConfigurationError,
  parseDiscordApiError,
  isDiscordError,
  isRetryableError,
} from './errors/index.js';

// Types
export * from './types/index.js';

// Rate limiting
export * from './ratelimit/index.js';

// Resilience
export {
  RetryHooks,
  RetryExecutor,
  SleepFunction,
  createRetryExecutor,
} from './resilience/index.js';

// Transport
export {
  DiscordTransport,
  DiscordRequest,
  DiscordResponse,
  FetchFunction,
  HttpMethod,
  RequestRateLimit,
} from './transport/index.js';

// Observability
export {
  LogLevel,
  Logger,
  LogRecord,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  redactSensitive,
  MetricsCollector,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
} from './observability/index.js';
