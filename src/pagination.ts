/**
 * Pagination for GitHub list and search endpoints.
 *
 * List endpoints return bare arrays and are walked page by page until an
 * empty page. Search endpoints wrap results in
 * `{ total_count, incomplete_results, items }` and always use pages of 100.
 *
 * @module pagination
 */

import { GitHubError } from './errors.js';
import type { ItemSteps, Steps } from './engine.js';
import { isJsonObject, type JsonObject, type JsonValue } from './types.js';

/** Default page size for list endpoints. */
export const DEFAULT_PER_PAGE = 30;

/** Largest page size GitHub accepts. */
export const MAX_PER_PAGE = 100;

/** Fixed page size for search endpoints. */
export const SEARCH_PAGE_SIZE = 100;

/**
 * Fetches one page by its 1-based index.
 */
export type PageFetcher = (page: number) => Steps<JsonValue | undefined>;

/**
 * Clamps a requested page size to what GitHub accepts.
 */
export function pageSize(perPage: number = DEFAULT_PER_PAGE): number {
  return Math.min(perPage, MAX_PER_PAGE);
}

/**
 * Narrows a list element to a JSON object.
 */
export function expectObject(value: JsonValue | undefined, source: string): JsonObject {
  if (!isJsonObject(value)) {
    throw GitHubError.unexpectedFormat(`Expected a JSON object from ${source}`);
  }
  return value;
}

/**
 * Emits the items of a bare-array list endpoint, page by page, stopping at
 * the first empty page.
 */
export function* pageItems(fetchPage: PageFetcher, source: string): ItemSteps<JsonObject> {
  for (let page = 1; ; page++) {
    const data = yield* fetchPage(page);
    if (data === undefined) {
      return;
    }
    if (!Array.isArray(data)) {
      throw GitHubError.unexpectedFormat(`Expected a list from ${source}`);
    }
    if (data.length === 0) {
      return;
    }
    for (const item of data) {
      yield { type: 'emit', item: expectObject(item, source) };
    }
  }
}

/**
 * Emits the items of a search endpoint.
 *
 * Stops on an empty page, on a short page, or once `page * 100` reaches
 * `total_count`.
 */
export function* searchItems(fetchPage: PageFetcher, source: string): ItemSteps<JsonObject> {
  for (let page = 1; ; page++) {
    const data = yield* fetchPage(page);
    const envelope = expectObject(data, source);
    const items = envelope.items;
    if (!Array.isArray(items)) {
      throw GitHubError.unexpectedFormat(`Expected search results from ${source}`);
    }
    if (items.length === 0) {
      return;
    }
    for (const item of items) {
      yield { type: 'emit', item: expectObject(item, source) };
    }

    const total = typeof envelope.total_count === 'number' ? envelope.total_count : 0;
    if (items.length < SEARCH_PAGE_SIZE || page * SEARCH_PAGE_SIZE >= total) {
      return;
    }
  }
}

/**
 * Collects every item of an async stream.
 *
 * @example
 * ```typescript
 * const repos = await collectAll(client.repos.listForUser('octocat'));
 * ```
 */
export async function collectAll<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of stream) {
    items.push(item);
  }
  return items;
}

/**
 * Collects at most `count` items of an async stream. Pages past the last
 * needed item are never fetched.
 */
export async function take<T>(stream: AsyncIterable<T>, count: number): Promise<T[]> {
  const items: T[] = [];
  if (count <= 0) {
    return items;
  }
  for await (const item of stream) {
    items.push(item);
    if (items.length >= count) {
      break;
    }
  }
  return items;
}

/**
 * Blocking variant of {@link take}.
 */
export function takeSync<T>(stream: Iterable<T>, count: number): T[] {
  const items: T[] = [];
  if (count <= 0) {
    return items;
  }
  for (const item of stream) {
    items.push(item);
    if (items.length >= count) {
      break;
    }
  }
  return items;
}
