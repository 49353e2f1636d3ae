/**
 * Rate-limit handling for the GitHub client.
 *
 * GitHub signals both primary and secondary ("abuse") rate limits with 403
 * or 429. When auto-retry is on, the engine asks this module whether a
 * failed response is rate-limit shaped and how long to wait before trying
 * again.
 *
 * @module resilience
 */

import { parseEpochSeconds, parseJsonBody } from './errors.js';
import type { TransportResponse } from './transport.js';
import { isJsonObject } from './types.js';

/** Wait used when the server gives no hint, in seconds. */
export const DEFAULT_RETRY_WAIT_SECONDS = 60;

/** Shortest wait derived from `X-RateLimit-Reset`, in seconds. */
export const MIN_RESET_WAIT_SECONDS = 1;

/**
 * Retry policy of a single engine call.
 */
export interface RetryPolicy {
  /** Whether rate-limit responses are retried at all. */
  autoRetry: boolean;
  /** Retries allowed on top of the first attempt. */
  maxRetries: number;
}

/**
 * Checks whether a response is rate-limit shaped.
 *
 * Only 403 and 429 qualify, and then only when `X-RateLimit-Remaining` is
 * `"0"`, the status is 429, or the JSON `message` mentions a rate limit or
 * abuse detection.
 */
export function isRateLimitResponse(response: TransportResponse): boolean {
  if (response.status !== 403 && response.status !== 429) {
    return false;
  }
  if (response.headers['x-ratelimit-remaining'] === '0' || response.status === 429) {
    return true;
  }

  const data = parseJsonBody(response.body);
  if (!isJsonObject(data) || typeof data.message !== 'string') {
    return false;
  }
  const message = data.message.toLowerCase();
  return message.includes('rate limit') || message.includes('abuse');
}

function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * Computes how long to wait before retrying, in seconds.
 *
 * `Retry-After` wins; otherwise the time left until `X-RateLimit-Reset`
 * (at least one second); otherwise {@link DEFAULT_RETRY_WAIT_SECONDS}.
 *
 * @param headers - Response headers, keys lowercased
 * @param nowSeconds - Current epoch time in seconds
 */
export function computeRetryDelay(
  headers: Readonly<Record<string, string>>,
  nowSeconds: number = Date.now() / 1000
): number {
  const retryAfter = parseSeconds(headers['retry-after']);
  if (retryAfter !== undefined) {
    return retryAfter;
  }

  const resetAt = parseEpochSeconds(headers['x-ratelimit-reset']);
  if (resetAt !== undefined) {
    return Math.max(resetAt - nowSeconds, MIN_RESET_WAIT_SECONDS);
  }

  return DEFAULT_RETRY_WAIT_SECONDS;
}

/**
 * Decides whether a failed response should be retried, returning the wait
 * in seconds or `undefined` when the failure must be raised.
 *
 * @param retries - Retries already performed by this call
 */
export function nextRetryDelay(
  response: TransportResponse,
  policy: RetryPolicy,
  retries: number,
  nowSeconds?: number
): number | undefined {
  if (!policy.autoRetry || retries >= policy.maxRetries || !isRateLimitResponse(response)) {
    return undefined;
  }
  return computeRetryDelay(response.headers, nowSeconds);
}
