/**
 * Rate limit response headers.
 *
 * Discord reports limits as headers on every response. Values that are
 * missing or malformed read as absent, so a broken header never blocks the
 * handler that consumes it.
 */

import { z } from 'zod';

export const RateLimitHeader = {
  Limit: 'X-RateLimit-Limit',
  Remaining: 'X-RateLimit-Remaining',
  Reset: 'X-RateLimit-Reset',
  ResetAfter: 'X-RateLimit-Reset-After',
  Bucket: 'X-RateLimit-Bucket',
  Global: 'X-RateLimit-Global',
  RetryAfter: 'Retry-After',
  Date: 'Date',
} as const;

const countSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform((value) => Number.parseInt(value, 10));

/** Decimal seconds, read as milliseconds */
const secondsSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/)
  .transform((value) => Number(value) * 1000);

/** RFC 2822 date, read as epoch milliseconds */
const httpDateSchema = z
  .string()
  .transform((value) => Date.parse(value))
  .pipe(z.number().finite());

const flagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false']))
  .transform((value) => value === 'true');

export interface RateLimitHeaders {
  /** Requests the endpoint admits per window */
  limit?: number;
  /** Requests left in the current window */
  remaining?: number;
  /** Epoch milliseconds at which the window resets */
  resetAt?: number;
  /** Milliseconds until the window resets */
  resetAfterMs?: number;
  /** Server time of the response, epoch milliseconds */
  dateMs?: number;
  bucket?: string;
  global: boolean;
  retryAfterMs?: number;
}

function readHeader<T>(
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  value: string | null
): T | undefined {
  if (value === null) {
    return undefined;
  }
  const result = schema.safeParse(value);
  return result.success ? result.data : undefined;
}

export function parseRateLimitHeaders(headers: Headers): RateLimitHeaders {
  const bucket = headers.get(RateLimitHeader.Bucket);

  return {
    limit: readHeader(countSchema, headers.get(RateLimitHeader.Limit)),
    remaining: readHeader(countSchema, headers.get(RateLimitHeader.Remaining)),
    resetAt: readHeader(secondsSchema, headers.get(RateLimitHeader.Reset)),
    resetAfterMs: readHeader(secondsSchema, headers.get(RateLimitHeader.ResetAfter)),
    dateMs: readHeader(httpDateSchema, headers.get(RateLimitHeader.Date)),
    bucket: bucket === null || bucket === '' ? undefined : bucket,
    global: readHeader(flagSchema, headers.get(RateLimitHeader.Global)) ?? false,
    retryAfterMs: readHeader(secondsSchema, headers.get(RateLimitHeader.RetryAfter)),
  };
}

/**
 * Milliseconds until the reported window resets.
 *
 * The absolute reset is measured against the response's own Date header,
 * which cancels out clock skew between us and Discord; the shorter of that
 * and the relative reset wins.
 *
 * @returns undefined when the headers carry no reset information
 */
export function computeCooldownDelay(info: RateLimitHeaders): number | undefined {
  const candidates: number[] = [];

  if (info.resetAt !== undefined && info.dateMs !== undefined) {
    candidates.push(info.resetAt - info.dateMs);
  }
  if (info.resetAfterMs !== undefined) {
    candidates.push(info.resetAfterMs);
  }

  if (candidates.length === 0) {
    return undefined;
  }
  return Math.max(0, Math.min(...candidates));
}
