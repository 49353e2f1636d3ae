/**
 * GitHub Search Service
 *
 * Search repositories, code, commits, issues and users. Search results are
 * paged 100 at a time and stop once the reported `total_count` is reached.
 *
 * @module services/search
 */

import { repoContext, type ApiContext } from '../context.js';
import { mapItems, mapSteps, type Engine, type ItemSteps, type Steps } from '../engine.js';
import { Issue, Repository, SearchResult, User } from '../models.js';
import { SEARCH_PAGE_SIZE } from '../pagination.js';
import type { JsonObject, Mode, Result, Stream } from '../types.js';
import { object } from './shared.js';

/**
 * Searchable resource kinds
 */
export type SearchKind = 'issues' | 'repositories' | 'code' | 'users' | 'commits';

/**
 * Common search options
 */
export interface SearchOptions {
  /** Sort field; relevance when omitted */
  sort?: string;
  /** Sort order (default desc) */
  order?: 'asc' | 'desc';
}

/**
 * Options for fetching a single page of results
 */
export interface SearchPageOptions extends SearchOptions {
  /** 1-based page number */
  page?: number;
  /** Results per page (max 100) */
  per_page?: number;
}

const REPOSITORY_URL = /\/repos\/([^/]+)\/([^/]+)$/;

/**
 * Step builders for search endpoints.
 */
export class SearchEndpoints {
  constructor(private readonly engine: Engine) {}

  issues(query: string, options: SearchOptions = {}): ItemSteps<JsonObject> {
    return this.search('issues', query, options);
  }

  repositories(query: string, options: SearchOptions = {}): ItemSteps<JsonObject> {
    return this.search('repositories', query, options);
  }

  code(query: string, options: SearchOptions = {}): ItemSteps<JsonObject> {
    return this.search('code', query, options);
  }

  users(query: string, options: SearchOptions = {}): ItemSteps<JsonObject> {
    return this.search('users', query, options);
  }

  commits(query: string, options: SearchOptions = {}): ItemSteps<JsonObject> {
    return this.search('commits', query, options);
  }

  /**
   * Fetches one result envelope without following further pages.
   */
  page(kind: SearchKind, query: string, options: SearchPageOptions = {}): Steps<JsonObject> {
    return object(
      this.engine.perform('GET', `/search/${kind}`, {
        query: {
          q: query,
          order: options.order ?? 'desc',
          sort: options.sort,
          per_page: Math.min(options.per_page ?? SEARCH_PAGE_SIZE, SEARCH_PAGE_SIZE),
          page: options.page ?? 1,
        },
      }),
      `/search/${kind}`
    );
  }

  private search(kind: SearchKind, query: string, options: SearchOptions): ItemSteps<JsonObject> {
    return this.engine.searchPaginate(`/search/${kind}`, { q: query, ...options });
  }
}

/**
 * Service for GitHub search
 *
 * @example
 * ```typescript
 * for await (const repo of client.search.repositories('language:typescript stars:>1000')) {
 *   console.log(repo.full_name, repo.stars);
 * }
 * ```
 */
export class SearchService<M extends Mode> {
  constructor(private readonly api: ApiContext<M>) {}

  private get endpoints(): SearchEndpoints {
    return this.api.endpoints.search;
  }

  /**
   * Search issues and pull requests. Results are bound to the repository
   * named in their `repository_url`.
   */
  issues(query: string, options?: SearchOptions): Stream<M, Issue<M>> {
    return this.api.driver.stream(mapItems(this.endpoints.issues(query, options), (raw) => this.toIssue(raw)));
  }

  repositories(query: string, options?: SearchOptions): Stream<M, Repository<M>> {
    return this.api.driver.stream(
      mapItems(this.endpoints.repositories(query, options), (raw) => Repository.fromRaw(raw, this.api))
    );
  }

  code(query: string, options?: SearchOptions): Stream<M, JsonObject> {
    return this.api.driver.stream(this.endpoints.code(query, options));
  }

  users(query: string, options?: SearchOptions): Stream<M, User> {
    return this.api.driver.stream(mapItems(this.endpoints.users(query, options), (raw) => User.fromRaw(raw)));
  }

  commits(query: string, options?: SearchOptions): Stream<M, JsonObject> {
    return this.api.driver.stream(this.endpoints.commits(query, options));
  }

  /**
   * Fetch a single page of raw search results
   */
  page(kind: SearchKind, query: string, options?: SearchPageOptions): Result<M, SearchResult<JsonObject>> {
    return this.api.driver.run(mapSteps(this.endpoints.page(kind, query, options), (raw) => SearchResult.fromRaw(raw)));
  }

  private toIssue(raw: JsonObject): Issue<M> {
    const url = raw.repository_url;
    const match = typeof url === 'string' ? REPOSITORY_URL.exec(url) : null;
    if (!match) {
      return Issue.fromRaw(raw);
    }
    return Issue.fromRaw(raw, repoContext(this.api, match[1], match[2]));
  }
}
