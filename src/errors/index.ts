/**
 * Discord error types and handling.
 *
 * Errors are split into retryable failures (429s, 5xx, network) and
 * programmer errors that surface synchronously (bad configuration, a rate
 * limit scope that does not fit its group).
 */

/**
 * Error codes for Discord errors.
 */
export enum DiscordErrorCode {
  // Rate limiting
  RateLimited = 'RATE_LIMITED',
  RateLimitScope = 'RATE_LIMIT_SCOPE',
  KeepAliveConflict = 'KEEP_ALIVE_CONFLICT',
  RateLimitWaitAborted = 'RATE_LIMIT_WAIT_ABORTED',

  // Authentication
  NoAuthentication = 'NO_AUTHENTICATION',
  Unauthorized = 'UNAUTHORIZED',
  Forbidden = 'FORBIDDEN',

  // Resource errors
  NotFound = 'NOT_FOUND',
  InvalidWebhookUrl = 'INVALID_WEBHOOK_URL',

  // Request errors
  BadRequest = 'BAD_REQUEST',
  ValidationError = 'VALIDATION_ERROR',

  // Server errors
  ServerError = 'SERVER_ERROR',
  NetworkError = 'NETWORK_ERROR',

  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
}

/**
 * Discord API error response structure.
 */
export interface DiscordApiErrorResponse {
  /** Discord error code */
  code?: number;
  /** Error message */
  message?: string;
  /** Detailed errors per field */
  errors?: Record<string, unknown>;
  /** Retry-After value in seconds (present on 429) */
  retry_after?: number;
  /** Whether this is a global rate limit */
  global?: boolean;
}

/**
 * Base Discord error class.
 */
export class DiscordError extends Error {
  readonly code: DiscordErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  readonly retryable: boolean;
  /** Retry-after duration in milliseconds */
  readonly retryAfterMs?: number;
  /** Discord API error code */
  readonly discordCode?: number;
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: DiscordErrorCode;
    message: string;
    statusCode?: number;
    retryable?: boolean;
    retryAfterMs?: number;
    discordCode?: number;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'DiscordError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.discordCode = options.discordCode;
    this.details = options.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      discordCode: this.discordCode,
      details: this.details,
    };
  }
}

// ============================================================================
// Rate Limiting Errors
// ============================================================================

/**
 * Rate limited by Discord API (HTTP 429).
 */
export class RateLimitedError extends DiscordError {
  constructor(retryAfterMs: number, isGlobal: boolean = false) {
    super({
      code: DiscordErrorCode.RateLimited,
      message: `Rate limited${isGlobal ? ' (global)' : ''}, retry after ${retryAfterMs}ms`,
      statusCode: 429,
      retryable: true,
      retryAfterMs,
      details: { isGlobal },
    });
    this.name = 'RateLimitedError';
  }

  get isGlobal(): boolean {
    return this.details?.isGlobal === true;
  }
}

/**
 * The scope object handed to a rate limit proxy does not fit the group's limiter.
 */
export class RateLimitScopeError extends DiscordError {
  constructor(limiter: string, reason: string) {
    super({
      code: DiscordErrorCode.RateLimitScope,
      message: `Cannot resolve ${limiter} rate limit scope: ${reason}`,
      retryable: false,
      details: { limiter },
    });
    this.name = 'RateLimitScopeError';
  }
}

/**
 * `waitTillLimitsExpire` called on a proxy that pins its handler.
 */
export class KeepAliveConflictError extends DiscordError {
  constructor() {
    super({
      code: DiscordErrorCode.KeepAliveConflict,
      message: 'Cannot wait for rate limits to expire while keepAlive is enabled',
      retryable: false,
    });
    this.name = 'KeepAliveConflictError';
  }
}

/**
 * A queued request was aborted before it was admitted.
 */
export class RateLimitWaitAbortedError extends DiscordError {
  constructor(handlerKey: string) {
    super({
      code: DiscordErrorCode.RateLimitWaitAborted,
      message: `Aborted while waiting for rate limit slot (${handlerKey})`,
      retryable: false,
      details: { handlerKey },
    });
    this.name = 'RateLimitWaitAbortedError';
  }
}

// ============================================================================
// Authentication Errors (Non-Retryable)
// ============================================================================

export class NoAuthenticationError extends DiscordError {
  constructor() {
    super({
      code: DiscordErrorCode.NoAuthentication,
      message: 'No authentication configured (bot token or webhook URL required)',
      retryable: false,
    });
    this.name = 'NoAuthenticationError';
  }
}

export class UnauthorizedError extends DiscordError {
  constructor(message: string = 'Invalid or expired authentication token') {
    super({
      code: DiscordErrorCode.Unauthorized,
      message,
      statusCode: 401,
      retryable: false,
    });
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends DiscordError {
  constructor(message: string = 'Missing permissions for this operation') {
    super({
      code: DiscordErrorCode.Forbidden,
      message,
      statusCode: 403,
      retryable: false,
    });
    this.name = 'ForbiddenError';
  }
}

// ============================================================================
// Resource & Request Errors (Non-Retryable)
// ============================================================================

export class NotFoundError extends DiscordError {
  constructor(resource: string) {
    super({
      code: DiscordErrorCode.NotFound,
      message: `Resource not found: ${resource}`,
      statusCode: 404,
      retryable: false,
      details: { resource },
    });
    this.name = 'NotFoundError';
  }
}

export class InvalidWebhookUrlError extends DiscordError {
  constructor() {
    super({
      code: DiscordErrorCode.InvalidWebhookUrl,
      message: 'Invalid webhook URL format',
      retryable: false,
    });
    this.name = 'InvalidWebhookUrlError';
  }
}

export class BadRequestError extends DiscordError {
  constructor(message: string, discordCode?: number, errors?: Record<string, unknown>) {
    super({
      code: DiscordErrorCode.BadRequest,
      message,
      statusCode: 400,
      retryable: false,
      discordCode,
      details: errors ? { errors } : undefined,
    });
    this.name = 'BadRequestError';
  }
}

/**
 * Pre-request validation failed.
 */
export class ValidationError extends DiscordError {
  constructor(errors: string[]) {
    super({
      code: DiscordErrorCode.ValidationError,
      message: `Validation failed: ${errors.join(', ')}`,
      retryable: false,
      details: { errors },
    });
    this.name = 'ValidationError';
  }
}

// ============================================================================
// Server Errors (Retryable)
// ============================================================================

export class ServerError extends DiscordError {
  constructor(statusCode: number, message: string = 'Discord server error') {
    super({
      code: DiscordErrorCode.ServerError,
      message,
      statusCode,
      retryable: true,
    });
    this.name = 'ServerError';
  }
}

/**
 * The request never produced a response (connection failure, timeout).
 */
export class NetworkError extends DiscordError {
  constructor(message: string, cause?: Error) {
    super({
      code: DiscordErrorCode.NetworkError,
      message: `Network error: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'NetworkError';
  }
}

// ============================================================================
// Configuration Errors (Non-Retryable)
// ============================================================================

export class ConfigurationError extends DiscordError {
  constructor(message: string) {
    super({
      code: DiscordErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      retryable: false,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

/**
 * Maps a non-2xx Discord response onto the matching error type.
 */
export function parseDiscordApiError(
  statusCode: number,
  body: DiscordApiErrorResponse | null,
  retryAfterHeader?: string
): DiscordError {
  const message = body?.message ?? `HTTP ${statusCode}`;
  const discordCode = body?.code;
  const errors = body?.errors;

  switch (statusCode) {
    case 400:
      return new BadRequestError(message, discordCode, errors);

    case 401:
      return new UnauthorizedError(message);

    case 403:
      return new ForbiddenError(message);

    case 404:
      return new NotFoundError(message);

    case 429: {
      let retryAfterMs = 1000;
      if (body?.retry_after !== undefined) {
        retryAfterMs = body.retry_after * 1000;
      } else if (retryAfterHeader !== undefined) {
        const seconds = Number(retryAfterHeader);
        if (Number.isFinite(seconds)) {
          retryAfterMs = seconds * 1000;
        }
      }
      return new RateLimitedError(retryAfterMs, body?.global ?? false);
    }

    default:
      if (statusCode >= 500) {
        return new ServerError(statusCode, message);
      }
      return new BadRequestError(message, discordCode, errors);
  }
}

export function isDiscordError(error: unknown): error is DiscordError {
  return error instanceof DiscordError;
}

export function isRetryableError(error: unknown): boolean {
  if (isDiscordError(error)) {
    return error.retryable;
  }
  return false;
}
