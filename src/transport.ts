/**
 * HTTP transport for the GitHub client.
 *
 * The engine only ever talks to a {@link Transport} (or, for the blocking
 * client, a {@link SyncTransport}), so tests can swap in a scripted double.
 *
 * @module transport
 */

import { Agent, request, type Dispatcher } from 'undici';
import { GitHubError } from './errors.js';
import type { HttpMethod } from './types.js';

/**
 * A fully built HTTP request.
 */
export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL including the query string. */
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
  /** Per-call timeout in milliseconds. */
  timeout: number;
}

/**
 * A received HTTP response. Header names are lowercased.
 */
export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Promise-based transport.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

/**
 * Blocking transport.
 */
export interface SyncTransport {
  send(request: TransportRequest): TransportResponse;
  close(): void;
}

/**
 * Options for {@link UndiciTransport}.
 */
export interface UndiciTransportOptions {
  /**
   * Dispatcher to send through. When omitted the transport creates and owns
   * a keep-alive `Agent`.
   */
  dispatcher?: Dispatcher;
}

/**
 * Flattens undici's header record into lowercased single values.
 */
export function normalizeHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}

/**
 * Transport backed by undici.
 *
 * @example
 * ```typescript
 * const transport = new UndiciTransport();
 * try {
 *   const response = await transport.send({
 *     method: 'GET',
 *     url: 'https://api.github.com/rate_limit',
 *     headers: { Accept: 'application/vnd.github+json' },
 *     timeout: 30000,
 *   });
 *   console.log(response.status);
 * } finally {
 *   await transport.close();
 * }
 * ```
 */
export class UndiciTransport implements Transport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private closed = false;

  constructor(options: UndiciTransportOptions = {}) {
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? new Agent({
      keepAliveTimeout: 10000,
      keepAliveMaxTimeout: 60000,
      pipelining: 1,
    });
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    if (this.closed) {
      throw new GitHubError('Transport is closed');
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), req.timeout);

    try {
      const response = await request(req.url, {
        dispatcher: this.dispatcher,
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: controller.signal,
      });
      const body = await response.body.text();

      return {
        status: response.statusCode,
        headers: normalizeHeaders(response.headers),
        body,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw GitHubError.transport(`Request timed out after ${req.timeout}ms`, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw GitHubError.transport(`Request failed: ${reason}`, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
