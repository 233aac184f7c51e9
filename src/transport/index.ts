/**
 * HTTP transport layer for Discord API.
 *
 * Every attempt of a request takes a slot from the shared rate limit handler
 * of its group and scope, and hands the response headers back to it before
 * the body is read.
 */

import { z } from 'zod';
import { DiscordConfig } from '../config/index.js';
import {
  parseDiscordApiError,
  NetworkError,
  NoAuthenticationError,
  ValidationError,
  RateLimitedError,
} from '../errors/index.js';
import { RateLimiter } from '../ratelimit/rate-limiter.js';
import { RateLimitGroup } from '../ratelimit/group.js';
import { RateLimitHeader, parseRateLimitHeaders } from '../ratelimit/headers.js';
import { RetryExecutor } from '../resilience/retry.js';
import { ApiErrorBodySchema } from '../types/index.js';
import { Logger, MetricsCollector, MetricNames } from '../observability/index.js';

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

/**
 * Which handler a request is admitted through.
 */
export interface RequestRateLimit {
  group: RateLimitGroup;
  /** Id of the channel, guild or webhook the group is keyed by */
  limiterId: string;
}

export interface DiscordRequest {
  method: HttpMethod;
  /** API endpoint path, relative to the base URL */
  path: string;
  body?: unknown;
  query?: Record<string, string | boolean | number>;
  /** `none` for webhook requests, which authenticate through the URL */
  auth: 'bot' | 'none';
  /** Operation name for logging and metrics */
  operation: string;
  /** Audit log reason */
  reason?: string;
  rateLimit: RequestRateLimit;
  signal?: AbortSignal;
}

export interface DiscordResponse<T> {
  data: T;
  status: number;
  headers: Headers;
}

interface RawResponse {
  data: unknown;
  status: number;
  headers: Headers;
}

export class DiscordTransport {
  private readonly config: DiscordConfig;
  private readonly rateLimiter: RateLimiter;
  private readonly retryExecutor: RetryExecutor;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly fetch: FetchFunction;

  constructor(options: {
    config: DiscordConfig;
    rateLimiter: RateLimiter;
    retryExecutor: RetryExecutor;
    logger: Logger;
    metrics: MetricsCollector;
    fetch?: FetchFunction;
  }) {
    this.config = options.config;
    this.rateLimiter = options.rateLimiter;
    this.retryExecutor = options.retryExecutor;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Executes a request, retrying transient failures, and validates the
   * response body against `schema`.
   */
  async execute<T>(
    request: DiscordRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<DiscordResponse<T>> {
    if (request.auth === 'bot' && this.config.botToken === undefined) {
      throw new NoAuthenticationError();
    }

    const scheduler = this.rateLimiter.scheduler;
    const startTime = scheduler.now();
    const labels = { operation: request.operation };

    this.logger.debug('Executing Discord request', {
      operation: request.operation,
      method: request.method,
      path: request.path,
    });
    this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, {
      operation: request.operation,
      method: request.method,
    });

    try {
      const response = await this.retryExecutor.execute(() => this.attempt(request));
      const parsed = schema.safeParse(response.data);
      if (!parsed.success) {
        throw new ValidationError(
          parsed.error.issues.map((i) => `response.${i.path.join('.')}: ${i.message}`)
        );
      }

      const durationMs = scheduler.now() - startTime;
      this.metrics.incrementCounter(MetricNames.REQUESTS_SUCCESS, 1, labels);
      this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs / 1000, labels);

      return { data: parsed.data, status: response.status, headers: response.headers };
    } catch (error) {
      const durationMs = scheduler.now() - startTime;
      this.metrics.incrementCounter(MetricNames.REQUESTS_FAILED, 1, labels);
      this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs / 1000, labels);

      this.logger.error('Discord request failed', {
        operation: request.operation,
        error: error instanceof Error ? error.message : String(error),
        durationMs,
      });

      throw error;
    }
  }

  /**
   * One attempt: global lock, then a slot of the group's handler.
   */
  private async attempt(request: DiscordRequest): Promise<RawResponse> {
    request.signal?.throwIfAborted();

    if (!this.config.rateLimitConfig.enabled) {
      const response = await this.send(request);
      return this.readResponse(response);
    }

    await this.rateLimiter.waitForGlobalLock();

    const { group, limiterId } = request.rateLimit;
    const scheduler = this.rateLimiter.scheduler;
    const queuedAt = scheduler.now();

    return this.rateLimiter.withSlot(group, limiterId, async (lease) => {
      this.metrics.setGauge(MetricNames.RATE_LIMIT_QUEUE_DEPTH, lease.handler.waiting, {
        group: String(group.groupId),
      });

      const waitedMs = scheduler.now() - queuedAt;
      if (waitedMs > 0) {
        this.metrics.recordHistogram(MetricNames.RATE_LIMIT_WAIT, waitedMs / 1000, {
          operation: request.operation,
        });
      }

      // A failed send leaves the lease to withSlot, which exits it without headers.
      const response = await this.send(request);
      lease.exit(response.headers);
      return this.readResponse(response);
    }, request.signal);
  }

  private async send(request: DiscordRequest): Promise<Response> {
    const init: RequestInit = {
      method: request.method,
      headers: this.buildHeaders(request),
      signal: this.buildSignal(request.signal),
    };
    if (request.body !== undefined) {
      init.body = JSON.stringify(request.body);
    }

    try {
      return await this.fetch(this.buildUrl(request.path, request.query), init);
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'AbortError' || error.name === 'TimeoutError') {
          throw new NetworkError('Request timeout', error);
        }
        throw new NetworkError(error.message, error);
      }
      throw new NetworkError('Unknown network error');
    }
  }

  private async readResponse(response: Response): Promise<RawResponse> {
    let data: unknown;
    const contentType = response.headers.get('content-type');
    if (contentType?.includes('application/json')) {
      data = await response.json();
    } else {
      const text = await response.text();
      data = text || null;
    }

    if (response.ok) {
      return { data, status: response.status, headers: response.headers };
    }

    const body = ApiErrorBodySchema.safeParse(data);
    const error = parseDiscordApiError(
      response.status,
      body.success ? body.data : null,
      response.headers.get(RateLimitHeader.RetryAfter) ?? undefined
    );

    if (error instanceof RateLimitedError) {
      const global = error.isGlobal || parseRateLimitHeaders(response.headers).global;
      this.metrics.incrementCounter(MetricNames.RATE_LIMITS_HIT, 1, {
        scope: global ? 'global' : 'route',
      });
      if (global) {
        this.rateLimiter.lockGlobally(error.retryAfterMs ?? 0);
      } else {
        this.logger.warn('Rate limited by Discord', { retryAfterMs: error.retryAfterMs });
      }
    }

    throw error;
  }

  private buildSignal(signal: AbortSignal | undefined): AbortSignal {
    const timeout = AbortSignal.timeout(this.config.requestTimeoutMs);
    return signal === undefined ? timeout : AbortSignal.any([signal, timeout]);
  }

  private buildUrl(path: string, query?: Record<string, string | boolean | number>): string {
    let url = `${this.config.baseUrl}${path}`;

    if (query && Object.keys(query).length > 0) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        params.append(key, String(value));
      }
      url += `?${params.toString()}`;
    }

    return url;
  }

  private buildHeaders(request: DiscordRequest): Headers {
    const headers = new Headers({
      'Content-Type': 'application/json',
      'User-Agent': this.config.userAgent,
    });

    const token = this.config.botToken;
    if (request.auth === 'bot' && token !== undefined) {
      headers.set('Authorization', `Bot ${token.expose()}`);
    }
    if (request.reason !== undefined) {
      headers.set('X-Audit-Log-Reason', encodeURIComponent(request.reason));
    }

    return headers;
  }
}
