/**
 * Configuration types for the GitHub client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { NoopLogger, type Logger } from './observability.js';

/** Default GitHub API base URL. */
export const DEFAULT_BASE_URL = 'https://api.github.com';

/** Default host for release asset uploads. */
export const DEFAULT_UPLOAD_URL = 'https://uploads.github.com';

/** Default GitHub API version (date-based). */
export const DEFAULT_API_VERSION = '2022-11-28';

/** Default hostname used for credential lookup. */
export const DEFAULT_HOSTNAME = 'github.com';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'github-rest-kit/0.1.0';

/** Default number of rate-limit retries. */
export const DEFAULT_MAX_RETRIES = 3;

/**
 * GitHub client configuration.
 */
export interface GitHubConfig {
  /** API base URL. */
  baseUrl: string;
  /** Host for release asset uploads. */
  uploadUrl: string;
  /** API version header. */
  apiVersion: string;
  /**
   * Bearer token. `undefined` means "discover one", `null` disables
   * authentication.
   */
  token?: string | null;
  /** Hostname used when discovering a token. */
  hostname: string;
  /** Request timeout in milliseconds, per HTTP call. */
  timeout: number;
  /** User-Agent header. */
  userAgent: string;
  /** Sleep and retry when a response is rate-limit shaped. */
  autoRetry: boolean;
  /** Retries allowed per call when `autoRetry` is on. */
  maxRetries: number;
  /** Apply auto-retry to search pages as well. */
  retrySearch: boolean;
  /** Logger for requests, backoff and credential discovery. */
  logger: Logger;
}

/**
 * Caller-supplied configuration; every field is optional.
 */
export type GitHubConfigInput = Partial<GitHubConfig>;

function isLogger(value: unknown): value is Logger {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const methods = ['debug', 'info', 'warn', 'error'];
  return methods.every((name) => typeof Reflect.get(value, name) === 'function');
}

const httpUrl = z
  .string()
  .url()
  .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
    message: 'must start with http:// or https://',
  });

const configSchema = z.object({
  baseUrl: httpUrl.default(DEFAULT_BASE_URL),
  uploadUrl: httpUrl.default(DEFAULT_UPLOAD_URL),
  apiVersion: z.string().min(1).default(DEFAULT_API_VERSION),
  token: z.string().nullable().optional(),
  hostname: z.string().min(1).default(DEFAULT_HOSTNAME),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  userAgent: z.string().trim().min(1, 'User-Agent is required by GitHub API').default(DEFAULT_USER_AGENT),
  autoRetry: z.boolean().default(false),
  maxRetries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
  retrySearch: z.boolean().default(false),
  logger: z
    .custom<Logger>(isLogger, { message: 'must implement the Logger interface' })
    .default(() => new NoopLogger()),
});

/**
 * Merges caller options over the defaults and validates the result.
 *
 * @throws {ConfigurationError} If any field is invalid.
 */
export function createConfig(input: GitHubConfigInput = {}): GitHubConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`
    );
    throw new ConfigurationError('Invalid GitHub client configuration', issues);
  }
  return result.data;
}

/**
 * Creates a default GitHub configuration.
 */
export function createDefaultConfig(): GitHubConfig {
  return createConfig();
}

function parseFlag(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Reads configuration overrides from environment variables.
 *
 * Recognized: `GITHUB_API_URL`, `GITHUB_UPLOAD_URL`, `GITHUB_TIMEOUT`,
 * `GITHUB_MAX_RETRIES`, `GITHUB_AUTO_RETRY`. Unset or empty variables are
 * skipped; numeric values that do not parse are left for
 * {@link createConfig} to reject.
 *
 * @example
 * ```typescript
 * const client = await createClient({ ...configFromEnv(), autoRetry: true });
 * ```
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env
): GitHubConfigInput {
  const config: GitHubConfigInput = {};

  if (env.GITHUB_API_URL) {
    config.baseUrl = env.GITHUB_API_URL;
  }
  if (env.GITHUB_UPLOAD_URL) {
    config.uploadUrl = env.GITHUB_UPLOAD_URL;
  }
  if (env.GITHUB_TIMEOUT) {
    config.timeout = Number(env.GITHUB_TIMEOUT);
  }
  if (env.GITHUB_MAX_RETRIES) {
    config.maxRetries = Number(env.GITHUB_MAX_RETRIES);
  }
  if (env.GITHUB_AUTO_RETRY) {
    config.autoRetry = parseFlag(env.GITHUB_AUTO_RETRY);
  }

  return config;
}
