/**
 * Core data types shared across the client.
 *
 * Raw API payloads are modeled as JSON values; typed projections live in
 * `models.ts`. The {@link Mode} helpers let one service or model definition
 * serve both the promise-based client and the blocking client.
 *
 * @module types
 */

/**
 * A JSON primitive.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Any value that can appear in a JSON document.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/**
 * A JSON object, as returned for most REST resources.
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * HTTP method types
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Query parameter value. `undefined` entries are dropped from the URL.
 */
export type QueryValue = string | number | boolean | undefined;

/**
 * Query parameters for a request.
 */
export type QueryParams = Record<string, QueryValue>;

/**
 * Operating mode of a client.
 *
 * - `async`: requests and backoff waits suspend only the calling task.
 * - `sync`: requests and backoff waits block the calling thread.
 */
export type Mode = 'async' | 'sync';

interface ModeResults<T> {
  async: Promise<T>;
  sync: T;
}

interface ModeStreams<T> {
  async: AsyncIterableIterator<T>;
  sync: IterableIterator<T>;
}

/**
 * Result of a single operation in mode `M`.
 */
export type Result<M extends Mode, T> = ModeResults<T>[M];

/**
 * Lazy item sequence in mode `M`.
 */
export type Stream<M extends Mode, T> = ModeStreams<T>[M];

/**
 * Type guard for JSON objects (not arrays, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
