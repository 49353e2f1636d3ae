/**
 * Tests for rate-limit detection and retry delays.
 */

import {
  DEFAULT_RETRY_WAIT_SECONDS,
  computeRetryDelay,
  isRateLimitResponse,
  nextRetryDelay,
  type TransportResponse,
} from '../index.js';

function response(status: number, headers: Record<string, string> = {}, body = '{}'): TransportResponse {
  return { status, headers, body };
}

describe('isRateLimitResponse', () => {
  it('should accept 429 unconditionally', () => {
    expect(isRateLimitResponse(response(429))).toBe(true);
  });

  it('should accept 403 with an exhausted quota', () => {
    expect(isRateLimitResponse(response(403, { 'x-ratelimit-remaining': '0' }))).toBe(true);
  });

  it('should accept 403 whose message mentions rate limits or abuse', () => {
    expect(isRateLimitResponse(response(403, {}, '{"message":"API Rate Limit exceeded for user"}'))).toBe(true);
    expect(isRateLimitResponse(response(403, {}, '{"message":"You have triggered an abuse detection mechanism"}'))).toBe(true);
  });

  it('should reject plain permission failures', () => {
    expect(isRateLimitResponse(response(403, { 'x-ratelimit-remaining': '42' }, '{"message":"Resource not accessible"}'))).toBe(false);
    expect(isRateLimitResponse(response(403, {}, 'Forbidden'))).toBe(false);
  });

  it('should reject other statuses', () => {
    expect(isRateLimitResponse(response(500, { 'x-ratelimit-remaining': '0' }))).toBe(false);
  });
});

describe('computeRetryDelay', () => {
  it('should prefer Retry-After', () => {
    expect(computeRetryDelay({ 'retry-after': '7', 'x-ratelimit-reset': '2000' }, 1000)).toBe(7);
  });

  it('should wait until the reset time', () => {
    expect(computeRetryDelay({ 'x-ratelimit-reset': '1005' }, 1000)).toBe(5);
  });

  it('should wait at least one second for a past reset', () => {
    expect(computeRetryDelay({ 'x-ratelimit-reset': '990' }, 1000)).toBe(1);
  });

  it('should default to sixty seconds', () => {
    expect(computeRetryDelay({}, 1000)).toBe(DEFAULT_RETRY_WAIT_SECONDS);
    expect(DEFAULT_RETRY_WAIT_SECONDS).toBe(60);
  });

  it('should ignore malformed headers', () => {
    expect(computeRetryDelay({ 'retry-after': 'later', 'x-ratelimit-reset': 'never' }, 1000)).toBe(60);
  });

  it('should use the clock when no time is given', () => {
    const reset = String(Math.floor(Date.now() / 1000) + 5);
    const delay = computeRetryDelay({ 'x-ratelimit-reset': reset });
    expect(delay).toBeGreaterThanOrEqual(4);
    expect(delay).toBeLessThanOrEqual(6);
  });
});

describe('nextRetryDelay', () => {
  const limited = response(429, { 'retry-after': '2' });

  it('should not retry when auto-retry is off', () => {
    expect(nextRetryDelay(limited, { autoRetry: false, maxRetries: 3 }, 0)).toBeUndefined();
  });

  it('should retry until the budget is spent', () => {
    const policy = { autoRetry: true, maxRetries: 2 };
    expect(nextRetryDelay(limited, policy, 0)).toBe(2);
    expect(nextRetryDelay(limited, policy, 1)).toBe(2);
    expect(nextRetryDelay(limited, policy, 2)).toBeUndefined();
  });

  it('should not retry other failures', () => {
    expect(nextRetryDelay(response(500), { autoRetry: true, maxRetries: 3 }, 0)).toBeUndefined();
  });
});
