/**
 * Request, retry and pagination engine.
 *
 * Every API call is written once as a generator of effects. A step yields
 * `send` to perform an HTTP request, `wait` to back off, `read` to load a
 * file and (for lists) `emit` to hand an item to the consumer. A driver
 * (see `drivers.ts`) executes the effects, either awaiting them or
 * blocking on them, so the async and blocking clients share one state
 * machine.
 *
 * @module engine
 */

import type { SecretString } from './auth.js';
import { classifyResponse, GitHubError, NotFoundError, parseJsonBody } from './errors.js';
import type { Logger } from './observability.js';
import { pageItems, pageSize, searchItems, SEARCH_PAGE_SIZE } from './pagination.js';
import { nextRetryDelay, type RetryPolicy } from './resilience.js';
import type { TransportRequest, TransportResponse } from './transport.js';
import type { HttpMethod, JsonObject, JsonValue, QueryParams } from './types.js';

/**
 * An effect the driver must perform before the step can continue.
 */
export type IoEffect =
  | { type: 'send'; request: TransportRequest }
  | { type: 'wait'; seconds: number }
  | { type: 'read'; path: string };

/**
 * An item handed to the consumer of a lazy list.
 */
export interface EmitEffect<I> {
  type: 'emit';
  item: I;
}

/**
 * What the driver feeds back into a step.
 */
export type EffectResult =
  | { type: 'response'; response: TransportResponse }
  | { type: 'file'; data: Uint8Array }
  | { type: 'resumed' };

/** A computation producing `T`. */
export type Steps<T> = Generator<IoEffect, T, EffectResult>;

/** A lazy list of `I`. */
export type ItemSteps<I> = Generator<IoEffect | EmitEffect<I>, void, EffectResult>;

/** Result fed back after `wait` and `emit`. */
export const RESUMED: EffectResult = { type: 'resumed' };

/**
 * Sends one request and returns the response.
 */
export function* send(request: TransportRequest): Steps<TransportResponse> {
  const result = yield { type: 'send', request };
  if (result.type !== 'response') {
    throw new GitHubError(`Driver answered a send effect with ${result.type}`);
  }
  return result.response;
}

/**
 * Reads a file and returns its bytes.
 */
export function* readFile(path: string): Steps<Uint8Array> {
  const result = yield { type: 'read', path };
  if (result.type !== 'file') {
    throw new GitHubError(`Driver answered a read effect with ${result.type}`);
  }
  return result.data;
}

/**
 * Transforms the result of a computation.
 */
export function* mapSteps<A, B>(steps: Steps<A>, fn: (value: A) => B): Steps<B> {
  return fn(yield* steps);
}

/**
 * Replaces each item of a lazy list with zero or more items. IO effects
 * and driver failures pass through to the source; closing the result closes
 * the source.
 */
export function* flatMapItems<A, B>(
  source: ItemSteps<A>,
  fn: (item: A) => Iterable<B>
): ItemSteps<B> {
  try {
    let step = source.next(RESUMED);
    while (!step.done) {
      const effect = step.value;
      if (effect.type === 'emit') {
        for (const item of fn(effect.item)) {
          yield { type: 'emit', item };
        }
        step = source.next(RESUMED);
        continue;
      }

      let result: EffectResult;
      try {
        result = yield effect;
      } catch (error) {
        step = source.throw(error);
        continue;
      }
      step = source.next(result);
    }
  } finally {
    source.return(undefined);
  }
}

/**
 * Maps each item of a lazy list.
 */
export function mapItems<A, B>(source: ItemSteps<A>, fn: (item: A) => B): ItemSteps<B> {
  return flatMapItems(source, (item) => [fn(item)]);
}

/**
 * Keeps the items of a lazy list that satisfy `predicate`.
 */
export function filterItems<A>(source: ItemSteps<A>, predicate: (item: A) => boolean): ItemSteps<A> {
  return flatMapItems(source, (item) => (predicate(item) ? [item] : []));
}

/**
 * Turns a request that answers 404 for "no" into a boolean. Every other
 * failure propagates.
 */
export function* probe(steps: Steps<unknown>): Steps<boolean> {
  try {
    yield* steps;
    return true;
  } catch (error) {
    if (error instanceof NotFoundError) {
      return false;
    }
    throw error;
  }
}

/**
 * Options for a single API request.
 */
export interface RequestOptions {
  /** Query parameters; `undefined` values are dropped. */
  query?: QueryParams;
  /** JSON body. */
  body?: JsonValue;
}

/**
 * Parameters for {@link Engine.searchPaginate}.
 */
export interface SearchParams {
  q: string;
  order?: 'asc' | 'desc';
  sort?: string;
}

/**
 * Binary upload.
 */
export interface UploadRequest {
  /** Path on the upload host, e.g. `/repos/o/r/releases/1/assets`. */
  path: string;
  /** Raw bytes, or the path of a file to read. */
  data: Uint8Array | { file: string };
  /** Asset name sent as `?name=`. */
  name: string;
  contentType: string;
}

/**
 * Settings the engine needs from the client configuration.
 */
export interface EngineSettings {
  baseUrl: string;
  uploadUrl: string;
  apiVersion: string;
  userAgent: string;
  timeout: number;
  token?: SecretString;
  autoRetry: boolean;
  maxRetries: number;
  retrySearch: boolean;
  logger: Logger;
}

/**
 * Builds a request URL from a base, a path and query parameters.
 */
export function buildUrl(base: string, path: string, query: QueryParams = {}): string {
  const url = `${base.replace(/\/+$/, '')}${path}`;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  const search = params.toString();
  if (!search) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${search}`;
}

/**
 * The single chokepoint for GitHub API calls.
 */
export class Engine {
  private readonly settings: EngineSettings;
  private readonly logger: Logger;

  constructor(settings: EngineSettings) {
    this.settings = settings;
    this.logger = settings.logger;
  }

  /** Whether requests carry a bearer token. */
  get authenticated(): boolean {
    return this.settings.token !== undefined;
  }

  private get retryPolicy(): RetryPolicy {
    return { autoRetry: this.settings.autoRetry, maxRetries: this.settings.maxRetries };
  }

  /**
   * Builds the headers sent with every request.
   */
  buildHeaders(extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': this.settings.apiVersion,
      'User-Agent': this.settings.userAgent,
    };
    if (this.settings.token) {
      headers.Authorization = `Bearer ${this.settings.token.expose()}`;
    }
    return { ...headers, ...extra };
  }

  /**
   * Performs one API request.
   *
   * Resolves to the parsed JSON body, or `undefined` for 204 and empty
   * bodies. Rate-limit shaped failures are retried when auto-retry is on;
   * every other failure throws the classified error.
   */
  *perform(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
    policy: RetryPolicy = this.retryPolicy
  ): Steps<JsonValue | undefined> {
    const hasBody = options.body !== undefined;
    const request: TransportRequest = {
      method,
      url: buildUrl(this.settings.baseUrl, path, options.query),
      headers: this.buildHeaders(hasBody ? { 'Content-Type': 'application/json' } : {}),
      body: hasBody ? JSON.stringify(options.body) : undefined,
      timeout: this.settings.timeout,
    };
    return yield* this.execute(request, policy);
  }

  /**
   * Lazily emits the items of a list endpoint.
   */
  *paginate(
    method: HttpMethod,
    path: string,
    perPage?: number,
    options: RequestOptions = {}
  ): ItemSteps<JsonObject> {
    const size = pageSize(perPage);
    yield* pageItems(
      (page) => this.perform(method, path, {
        ...options,
        query: { ...options.query, per_page: size, page },
      }),
      path
    );
  }

  /**
   * Lazily emits the items of a search endpoint.
   *
   * Search pages only auto-retry when `retrySearch` is set.
   */
  *searchPaginate(path: string, params: SearchParams): ItemSteps<JsonObject> {
    const policy: RetryPolicy = {
      autoRetry: this.settings.autoRetry && this.settings.retrySearch,
      maxRetries: this.settings.maxRetries,
    };
    yield* searchItems(
      (page) => this.perform('GET', path, {
        query: {
          q: params.q,
          order: params.order ?? 'desc',
          sort: params.sort,
          per_page: SEARCH_PAGE_SIZE,
          page,
        },
      }, policy),
      path
    );
  }

  /**
   * Uploads raw bytes to the upload host. Never retried.
   */
  *upload(upload: UploadRequest): Steps<JsonValue | undefined> {
    const data = upload.data instanceof Uint8Array
      ? upload.data
      : yield* readFile(upload.data.file);
    const request: TransportRequest = {
      method: 'POST',
      url: buildUrl(this.settings.uploadUrl, upload.path, { name: upload.name }),
      headers: this.buildHeaders({ 'Content-Type': upload.contentType }),
      body: data,
      timeout: this.settings.timeout,
    };
    return yield* this.execute(request, { autoRetry: false, maxRetries: 0 });
  }

  private *execute(request: TransportRequest, policy: RetryPolicy): Steps<JsonValue | undefined> {
    let retries = 0;

    for (;;) {
      this.logger.debug('GitHub API request', { method: request.method, url: request.url });
      const response = yield* send(request);

      if (response.status < 400) {
        return this.parseSuccess(response, request);
      }

      const delay = nextRetryDelay(response, policy, retries);
      if (delay === undefined) {
        const error = classifyResponse(response.status, response.headers, response.body);
        this.logger.debug('GitHub API request failed', {
          method: request.method,
          url: request.url,
          status: response.status,
          kind: error.kind,
        });
        throw error;
      }

      retries++;
      this.logger.warn('Rate limited, retrying', {
        method: request.method,
        url: request.url,
        status: response.status,
        waitSeconds: delay,
        attempt: retries,
        maxRetries: policy.maxRetries,
      });
      yield { type: 'wait', seconds: delay };
    }
  }

  private parseSuccess(response: TransportResponse, request: TransportRequest): JsonValue | undefined {
    if (response.status === 204 || response.body.trim() === '') {
      return undefined;
    }
    const data = parseJsonBody(response.body);
    if (data === undefined) {
      throw GitHubError.unexpectedFormat(
        `Invalid JSON in response to ${request.method} ${request.url}`,
        response.status
      );
    }
    return data;
  }
}
