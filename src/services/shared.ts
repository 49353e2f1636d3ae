/**
 * Helpers shared by the resource services.
 *
 * @module services/shared
 */

import { z } from 'zod';
import type { Steps } from '../engine.js';
import { GitHubError } from '../errors.js';
import { expectObject } from '../pagination.js';
import type { JsonObject, JsonValue } from '../types.js';

/**
 * Page size option accepted by list methods.
 */
export interface PageParams {
  /** Results per page (max 100). */
  per_page?: number;
}

/**
 * Builds a JSON body, dropping `undefined` fields.
 */
export function compact(values: Record<string, JsonValue | undefined>): JsonObject {
  const body: JsonObject = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      body[key] = value;
    }
  }
  return body;
}

/**
 * Expects a JSON object response.
 */
export function* object(steps: Steps<JsonValue | undefined>, source: string): Steps<JsonObject> {
  return expectObject(yield* steps, source);
}

/**
 * Expects a JSON array of objects.
 */
export function* objects(steps: Steps<JsonValue | undefined>, source: string): Steps<JsonObject[]> {
  const data = yield* steps;
  if (!Array.isArray(data)) {
    throw GitHubError.unexpectedFormat(`Expected a list from ${source}`);
  }
  return data.map((item) => expectObject(item, source));
}

/**
 * Discards the response body.
 */
export function* nothing(steps: Steps<JsonValue | undefined>): Steps<void> {
  yield* steps;
}

const byteCounts = z.record(z.number());

/**
 * Expects a map of names to numbers, as returned for repository languages.
 */
export function* counts(steps: Steps<JsonValue | undefined>, source: string): Steps<Record<string, number>> {
  const result = byteCounts.safeParse(yield* steps);
  if (!result.success) {
    throw GitHubError.unexpectedFormat(`Expected a map of counts from ${source}`);
  }
  return result.data;
}

/**
 * Encodes a free-form path segment such as a label or tag name.
 */
export function segment(value: string): string {
  return encodeURIComponent(value);
}
