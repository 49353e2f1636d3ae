/**
 * Error types for the GitHub client.
 * @module errors
 */

import type { JsonValue } from './types.js';
import { isJsonObject } from './types.js';

/**
 * Error kinds for categorizing GitHub errors.
 *
 * The set is closed: every failed response maps to exactly one kind.
 */
export enum GitHubErrorKind {
  /** Authentication failed (401). */
  Authentication = 'authentication',
  /** Resource not found (404). */
  NotFound = 'not_found',
  /** Rate limit or abuse detection (403/429). */
  RateLimit = 'rate_limit',
  /** Request validation failed (422). */
  Validation = 'validation',
  /** Any other failure, including transport errors without a status. */
  Api = 'api',
}

/**
 * Options accepted by {@link GitHubError} constructors.
 */
export interface GitHubErrorOptions {
  /** HTTP status code. */
  statusCode?: number;
  /** Raw response payload. */
  responseData?: JsonValue;
  /** Underlying cause. */
  cause?: unknown;
}

/**
 * GitHub API error with detailed information.
 */
export class GitHubError extends Error {
  /** Error kind. */
  public readonly kind: GitHubErrorKind = GitHubErrorKind.Api;
  /** HTTP status code. */
  public readonly statusCode?: number;
  /** Raw response payload, `{}` when the body was not JSON. */
  public readonly responseData: JsonValue;

  constructor(message: string, options: GitHubErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GitHubError';
    this.statusCode = options.statusCode;
    this.responseData = options.responseData ?? {};

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Creates an error for a request that never produced a response.
   */
  static transport(message: string, cause: unknown): GitHubError {
    return new GitHubError(message, { cause });
  }

  /**
   * Creates an error for a response body that does not have the expected shape.
   */
  static unexpectedFormat(message: string, statusCode?: number): GitHubError {
    return new GitHubError(message, { statusCode });
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    if (this.statusCode) {
      return `[${this.statusCode}] ${this.message}`;
    }
    return this.message;
  }
}

/**
 * Raised when authentication fails (401).
 */
export class AuthenticationError extends GitHubError {
  public override readonly kind = GitHubErrorKind.Authentication;

  constructor(message: string, options?: GitHubErrorOptions) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * Raised when a resource is not found (404).
 */
export class NotFoundError extends GitHubError {
  public override readonly kind = GitHubErrorKind.NotFound;

  constructor(message: string, options?: GitHubErrorOptions) {
    super(message, options);
    this.name = 'NotFoundError';
  }
}

/**
 * Raised when the rate limit is exceeded (403/429).
 */
export class RateLimitError extends GitHubError {
  public override readonly kind = GitHubErrorKind.RateLimit;
  /** Epoch seconds at which the quota resets, if the server said so. */
  public readonly resetAt?: number;

  constructor(message: string, options?: GitHubErrorOptions & { resetAt?: number }) {
    super(message, options);
    this.name = 'RateLimitError';
    this.resetAt = options?.resetAt;
  }
}

/**
 * Raised when request validation fails (422).
 */
export class ValidationError extends GitHubError {
  public override readonly kind = GitHubErrorKind.Validation;

  constructor(message: string, options?: GitHubErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when a context-dependent model method is called on a model that was
 * built without a client or repository.
 */
export class UnboundModelError extends Error {
  constructor(model: string, target: 'repository' | 'client') {
    super(`${model} not bound to a ${target}`);
    this.name = 'UnboundModelError';
  }
}

/**
 * Raised when client configuration fails validation.
 */
export class ConfigurationError extends Error {
  /** Individual validation problems. */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Parses a response body as JSON, returning `undefined` when it is not JSON.
 */
export function parseJsonBody(body: string): JsonValue | undefined {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * Extracts the human-readable message from an error response.
 *
 * Reads the `message` field of a JSON body; anything else falls back to the
 * raw response text.
 */
export function extractErrorMessage(body: string): string {
  const data = parseJsonBody(body);
  if (isJsonObject(data) && typeof data.message === 'string') {
    return data.message;
  }
  return body;
}

/**
 * Parses an epoch-seconds header value. Non-integer values yield `undefined`.
 */
export function parseEpochSeconds(value: string | undefined): number | undefined {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) {
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Classifies a failed response into the error taxonomy.
 *
 * @param status - HTTP status code (>= 400)
 * @param headers - Response headers, keys lowercased
 * @param body - Raw response text
 */
export function classifyResponse(
  status: number,
  headers: Readonly<Record<string, string>>,
  body: string
): GitHubError {
  const responseData = parseJsonBody(body) ?? {};
  const message = extractErrorMessage(body);
  const options: GitHubErrorOptions = { statusCode: status, responseData };

  switch (status) {
    case 401:
      return new AuthenticationError(message, options);
    case 404:
      return new NotFoundError(message, options);
    case 403:
    case 429:
      return new RateLimitError(message, {
        ...options,
        resetAt: parseEpochSeconds(headers['x-ratelimit-reset']),
      });
    case 422:
      return new ValidationError(message, options);
    default:
      return new GitHubError(message, options);
  }
}

/**
 * Type guard for GitHubError.
 */
export function isGitHubError(error: unknown): error is GitHubError {
  return error instanceof GitHubError;
}

/**
 * Checks if an error is a not-found error.
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Checks if an error is a rate limit error.
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}
