/**
 * Credential discovery for the GitHub API.
 *
 * Tokens are looked up in this order:
 * 1. `GH_TOKEN`, then `GITHUB_TOKEN`
 * 2. `gh auth token --hostname <host>`
 * 3. the `gh` CLI's `hosts.yml`
 *
 * Every source reports "no token" instead of throwing.
 *
 * @module auth
 */

import { execFile, execFileSync } from 'node:child_process';
import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_HOSTNAME } from './config.js';
import { NoopLogger, type Logger } from './observability.js';

const execFileAsync = promisify(execFile);

/** Timeout for `gh auth token`, in milliseconds. */
export const GH_CLI_TIMEOUT = 5000;

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * Runs a command and resolves with its stdout. Rejects on a non-zero exit,
 * a missing binary or a timeout.
 */
export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<string>;

/**
 * Blocking counterpart of {@link CommandRunner}.
 */
export type SyncCommandRunner = (command: string, args: string[], timeoutMs: number) => string;

/**
 * Environment used by the credential sources.
 */
export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Overrides for the credential sources, mostly for tests.
 */
export interface TokenSourceOptions<R = CommandRunner> {
  /** Environment variables (defaults to `process.env`). */
  env?: Environment;
  /** Home directory (defaults to `os.homedir()`). */
  homeDir?: string;
  /** Command runner used for the `gh` CLI. */
  runCommand?: R;
  /** Logger for source diagnostics. */
  logger?: Logger;
}

const defaultRunner: CommandRunner = async (command, args, timeoutMs) => {
  const { stdout } = await execFileAsync(command, args, {
    timeout: timeoutMs,
    encoding: 'utf8',
  });
  return stdout;
};

const defaultSyncRunner: SyncCommandRunner = (command, args, timeoutMs) =>
  execFileSync(command, args, {
    timeout: timeoutMs,
    encoding: 'utf8',
    stdio: ['ignore', 'pipe', 'ignore'],
  });

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads the token from `GH_TOKEN` or `GITHUB_TOKEN`. Empty values count as
 * absent.
 */
export function getTokenFromEnv(env: Environment = process.env): string | undefined {
  return env.GH_TOKEN || env.GITHUB_TOKEN || undefined;
}

/**
 * Asks the `gh` CLI for its token.
 */
export async function getTokenFromGhCli(
  hostname: string = DEFAULT_HOSTNAME,
  options: TokenSourceOptions = {}
): Promise<string | undefined> {
  const run = options.runCommand ?? defaultRunner;
  try {
    const output = await run('gh', ['auth', 'token', '--hostname', hostname], GH_CLI_TIMEOUT);
    return output.trim() || undefined;
  } catch (error) {
    options.logger?.debug('gh CLI did not provide a token', { reason: reasonOf(error) });
    return undefined;
  }
}

/**
 * Blocking variant of {@link getTokenFromGhCli}.
 */
export function getTokenFromGhCliSync(
  hostname: string = DEFAULT_HOSTNAME,
  options: TokenSourceOptions<SyncCommandRunner> = {}
): string | undefined {
  const run = options.runCommand ?? defaultSyncRunner;
  try {
    const output = run('gh', ['auth', 'token', '--hostname', hostname], GH_CLI_TIMEOUT);
    return output.trim() || undefined;
  } catch (error) {
    options.logger?.debug('gh CLI did not provide a token', { reason: reasonOf(error) });
    return undefined;
  }
}

/**
 * Resolves the `gh` CLI config directory: `GH_CONFIG_DIR`, else
 * `<XDG_CONFIG_HOME or ~/.config>/gh`.
 */
export function ghConfigDir(env: Environment = process.env, homeDir: string = homedir()): string {
  if (env.GH_CONFIG_DIR) {
    return env.GH_CONFIG_DIR;
  }
  const xdgConfig = env.XDG_CONFIG_HOME || join(homeDir, '.config');
  return join(xdgConfig, 'gh');
}

const hostsSchema = z.record(z.unknown());

const hostEntrySchema = z.object({
  oauth_token: z.string().optional(),
});

/**
 * Extracts a host's `oauth_token` from the text of a `hosts.yml` file.
 * Returns `undefined` for malformed YAML or an unexpected shape.
 */
export function parseHostsFile(text: string, hostname: string): string | undefined {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch {
    return undefined;
  }

  const hosts = hostsSchema.safeParse(document ?? {});
  if (!hosts.success) {
    return undefined;
  }
  const entry = hostEntrySchema.safeParse(hosts.data[hostname] ?? {});
  if (!entry.success) {
    return undefined;
  }
  return entry.data.oauth_token || undefined;
}

/**
 * Reads the token from the `gh` CLI's `hosts.yml`.
 */
export async function getTokenFromHostsFile(
  hostname: string = DEFAULT_HOSTNAME,
  options: TokenSourceOptions = {}
): Promise<string | undefined> {
  const path = join(ghConfigDir(options.env, options.homeDir), 'hosts.yml');
  try {
    return parseHostsFile(await readFile(path, 'utf8'), hostname);
  } catch (error) {
    options.logger?.debug('hosts.yml not readable', { path, reason: reasonOf(error) });
    return undefined;
  }
}

/**
 * Blocking variant of {@link getTokenFromHostsFile}.
 */
export function getTokenFromHostsFileSync(
  hostname: string = DEFAULT_HOSTNAME,
  options: TokenSourceOptions<SyncCommandRunner> = {}
): string | undefined {
  const path = join(ghConfigDir(options.env, options.homeDir), 'hosts.yml');
  try {
    return parseHostsFile(readFileSync(path, 'utf8'), hostname);
  } catch (error) {
    options.logger?.debug('hosts.yml not readable', { path, reason: reasonOf(error) });
    return undefined;
  }
}

/**
 * Resolves a token from the environment, the `gh` CLI, then `hosts.yml`.
 *
 * @example
 * ```typescript
 * const token = await resolveToken('github.com');
 * ```
 */
export async function resolveToken(
  hostname: string = DEFAULT_HOSTNAME,
  options: TokenSourceOptions = {}
): Promise<string | undefined> {
  const logger = options.logger ?? new NoopLogger();
  const sourceOptions = { ...options, logger };

  const fromEnv = getTokenFromEnv(options.env);
  if (fromEnv) {
    logger.debug('Using token from environment', { hostname });
    return fromEnv;
  }

  const fromCli = await getTokenFromGhCli(hostname, sourceOptions);
  if (fromCli) {
    logger.debug('Using token from gh CLI', { hostname });
    return fromCli;
  }

  const fromFile = await getTokenFromHostsFile(hostname, sourceOptions);
  if (fromFile) {
    logger.debug('Using token from hosts.yml', { hostname });
    return fromFile;
  }

  logger.debug('No token found', { hostname });
  return undefined;
}

/**
 * Blocking variant of {@link resolveToken}.
 */
export function resolveTokenSync(
  hostname: string = DEFAULT_HOSTNAME,
  options: TokenSourceOptions<SyncCommandRunner> = {}
): string | undefined {
  const logger = options.logger ?? new NoopLogger();
  const sourceOptions = { ...options, logger };

  const fromEnv = getTokenFromEnv(options.env);
  if (fromEnv) {
    logger.debug('Using token from environment', { hostname });
    return fromEnv;
  }

  const fromCli = getTokenFromGhCliSync(hostname, sourceOptions);
  if (fromCli) {
    logger.debug('Using token from gh CLI', { hostname });
    return fromCli;
  }

  const fromFile = getTokenFromHostsFileSync(hostname, sourceOptions);
  if (fromFile) {
    logger.debug('Using token from hosts.yml', { hostname });
    return fromFile;
  }

  logger.debug('No token found', { hostname });
  return undefined;
}
