/**
 * Mocks for testing GitHub API integrations.
 *
 * Responses are scripted up front and consumed in order; each one answers a
 * single request. A request nothing matches fails loudly.
 *
 * @example
 * ```typescript
 * const transport = new MockTransport()
 *   .mock('GET /repos/octocat/hello-world', { body: { id: 1, name: 'hello-world', full_name: 'octocat/hello-world' } });
 * const client = await createClient({ token: 'test-token', transport });
 * ```
 */

import type { SyncTransport, Transport, TransportRequest, TransportResponse } from '../transport.js';
import type { JsonValue } from '../types.js';

/**
 * Mock response configuration
 */
export interface MockResponse {
  status?: number;
  headers?: Record<string, string>;
  /** JSON value, or a string sent verbatim */
  body?: JsonValue;
  /** Send the body string as-is instead of JSON-encoding it */
  raw?: boolean;
}

/**
 * Mock request matcher
 *
 * A string `url` matches the request path (query string ignored); a RegExp
 * is tested against the full URL.
 */
export interface MockMatcher {
  method?: string;
  url?: string | RegExp;
}

interface ScriptedResponse {
  matcher: MockMatcher;
  response: MockResponse;
}

function parseMatcher(matcher: MockMatcher | string): MockMatcher {
  if (typeof matcher !== 'string') {
    return matcher;
  }
  const space = matcher.indexOf(' ');
  return space === -1 ? { url: matcher } : { method: matcher.slice(0, space), url: matcher.slice(space + 1) };
}

function matches(matcher: MockMatcher, request: TransportRequest): boolean {
  if (matcher.method && matcher.method !== request.method) {
    return false;
  }
  if (matcher.url === undefined) {
    return true;
  }
  if (typeof matcher.url === 'string') {
    return new URL(request.url).pathname === matcher.url;
  }
  return matcher.url.test(request.url);
}

function lowercaseKeys(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

/**
 * Scripted responses and recorded calls shared by both mock transports.
 */
class MockScript {
  readonly calls: TransportRequest[] = [];
  private queue: ScriptedResponse[] = [];
  closed = false;

  add(matcher: MockMatcher | string, response: MockResponse): void {
    this.queue.push({ matcher: parseMatcher(matcher), response });
  }

  answer(request: TransportRequest): TransportResponse {
    this.calls.push(request);
    const index = this.queue.findIndex((entry) => matches(entry.matcher, request));
    if (index === -1) {
      throw new Error(`No mock response for ${request.method} ${request.url}`);
    }
    const [{ response }] = this.queue.splice(index, 1);
    return {
      status: response.status ?? 200,
      headers: lowercaseKeys(response.headers ?? {}),
      body: encodeBody(response),
    };
  }

  get pending(): number {
    return this.queue.length;
  }

  reset(): void {
    this.queue = [];
    this.calls.length = 0;
  }
}

function encodeBody(response: MockResponse): string {
  if (response.body === undefined) {
    return '';
  }
  if (response.raw && typeof response.body === 'string') {
    return response.body;
  }
  return JSON.stringify(response.body);
}

/**
 * Parses the JSON body of a recorded request.
 */
export function requestJson(request: TransportRequest): unknown {
  if (typeof request.body !== 'string') {
    throw new Error(`${request.method} ${request.url} has no JSON body`);
  }
  return JSON.parse(request.body);
}

/**
 * Query parameters of a recorded request.
 */
export function requestQuery(request: TransportRequest): Record<string, string> {
  return Object.fromEntries(new URL(request.url).searchParams);
}

/**
 * Mock transport for the promise-based client
 */
export class MockTransport implements Transport {
  private readonly script = new MockScript();

  /**
   * Add mock response. `matcher` may be `"METHOD /path"`.
   */
  mock(matcher: MockMatcher | string, response: MockResponse = {}): this {
    this.script.add(matcher, response);
    return this;
  }

  /**
   * Get all calls made
   */
  getCalls(): TransportRequest[] {
    return this.script.calls;
  }

  /** Responses not yet consumed */
  get pending(): number {
    return this.script.pending;
  }

  get closed(): boolean {
    return this.script.closed;
  }

  reset(): this {
    this.script.reset();
    return this;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    return this.script.answer(request);
  }

  async close(): Promise<void> {
    this.script.closed = true;
  }
}

/**
 * Mock transport for the blocking client
 */
export class MockSyncTransport implements SyncTransport {
  private readonly script = new MockScript();

  mock(matcher: MockMatcher | string, response: MockResponse = {}): this {
    this.script.add(matcher, response);
    return this;
  }

  getCalls(): TransportRequest[] {
    return this.script.calls;
  }

  get pending(): number {
    return this.script.pending;
  }

  get closed(): boolean {
    return this.script.closed;
  }

  reset(): this {
    this.script.reset();
    return this;
  }

  send(request: TransportRequest): TransportResponse {
    return this.script.answer(request);
  }

  close(): void {
    this.script.closed = true;
  }
}
