/**
 * Logging for the GitHub client.
 *
 * The client logs through a {@link Logger} supplied in its config and
 * defaults to {@link NoopLogger}. Entries are flat: a message plus a few
 * fields such as `method`, `url`, `status` or `attempt`.
 *
 * @module observability
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Fields attached to a log entry.
 */
export type LogFields = Record<string, unknown>;

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

/**
 * A captured log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  fields: LogFields;
}

const CREDENTIAL_KEYS = ['token', 'oauth_token', 'authorization', 'password', 'secret'];

/**
 * Masks credential-looking fields, one level deep into nested records.
 */
export function redactCredentials(fields: LogFields): LogFields {
  return Object.fromEntries(
    Object.entries(fields).map(([key, value]) => {
      if (CREDENTIAL_KEYS.includes(key.toLowerCase())) {
        return [key, '[REDACTED]'];
      }
      if (value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date)) {
        return [key, redactCredentials(Object.fromEntries(Object.entries(value)))];
      }
      return [key, value];
    })
  );
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Renders an entry as one `key=value` line, e.g.
 * `WARN Rate limited, retrying method=GET url=https://api.github.com/user status=429 waitSeconds=3`.
 */
export function formatLine(level: LogLevel, message: string, fields: LogFields = {}): string {
  const pairs = Object.entries(redactCredentials(fields))
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${renderValue(value)}`);
  return [level.toUpperCase(), message, ...pairs].join(' ');
}

/**
 * Options for {@link ConsoleLogger}.
 */
export interface ConsoleLoggerOptions {
  /** Lowest level written (default `info`). */
  level?: LogLevel;
  /** Line sink (defaults to `console.error`, keeping stdout free for the caller). */
  write?: (line: string) => void;
}

/**
 * Writes each entry as a single `key=value` line.
 *
 * @example
 * ```typescript
 * const client = await createClient({ logger: new ConsoleLogger({ level: 'debug' }) });
 * ```
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_RANK[options.level ?? 'info'];
    this.write = options.write ?? ((line) => console.error(line));
  }

  debug(message: string, fields?: LogFields): void {
    this.emit('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.emit('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.emit('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.emit('error', message, fields);
  }

  private emit(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_RANK[level] >= this.threshold) {
      this.write(formatLine(level, message, fields));
    }
  }
}

/**
 * Discards everything. The client default.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Keeps entries in memory, for tests.
 */
export class InMemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, fields?: LogFields): void {
    this.push('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.push('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.push('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.push('error', message, fields);
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  private push(level: LogLevel, message: string, fields: LogFields = {}): void {
    this.entries.push({ level, message, fields: redactCredentials(fields) });
  }
}
