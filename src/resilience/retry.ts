/**
 * Retry executor with exponential backoff for Discord API.
 */

import { RetryConfig, DEFAULT_RETRY_CONFIG } from '../config/index.js';
import { DiscordError, isRetryableError } from '../errors/index.js';

/**
 * Retry hook callbacks.
 */
export interface RetryHooks {
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when all retries are exhausted */
  onExhausted?: (error: Error, attempts: number) => void;
}

export type SleepFunction = (ms: number) => Promise<void>;

const defaultSleep: SleepFunction = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retry executor for handling transient failures.
 *
 * A retryable error that carries `retryAfterMs` (a 429) waits exactly that
 * long; anything else backs off exponentially with jitter.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly hooks: RetryHooks;
  private readonly sleep: SleepFunction;
  private readonly random: () => number;

  constructor(
    config: RetryConfig,
    hooks: RetryHooks = {},
    options: { sleep?: SleepFunction; random?: () => number } = {}
  ) {
    this.config = config;
    this.hooks = hooks;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Executes an operation with retry logic.
   * @param operation - Called with the 1-based attempt number
   * @throws The last error if all retries are exhausted
   */
  async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(String(caught));

        if (!isRetryableError(error)) {
          throw error;
        }
        if (attempt >= attempts) {
          this.hooks.onExhausted?.(error, attempt);
          throw error;
        }

        const delayMs = this.calculateDelay(error, attempt);
        this.hooks.onRetry?.(attempt, error, delayMs);
        await this.sleep(delayMs);
      }
    }
  }

  calculateDelay(error: Error, attempt: number): number {
    if (error instanceof DiscordError && error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }

    const exponentialDelay =
      this.config.initialBackoffMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxBackoffMs);
    const jitter = cappedDelay * this.config.jitterFactor * this.random();

    return Math.floor(cappedDelay + jitter);
  }
}

/**
 * Creates a retry executor, filling unset fields from the defaults.
 */
export function createRetryExecutor(
  config: Partial<RetryConfig> = {},
  hooks: RetryHooks = {},
  options: { sleep?: SleepFunction; random?: () => number } = {}
): RetryExecutor {
  return new RetryExecutor({ ...DEFAULT_RETRY_CONFIG, ...config }, hooks, options);
}
