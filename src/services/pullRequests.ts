/**
 * GitHub Pull Requests Service
 *
 * Pull request lifecycle, merging, reviews and reviewer requests.
 *
 * @module services/pullRequests
 */

import { repoContext, type ApiContext } from '../context.js';
import { mapItems, mapSteps, probe, type Engine, type ItemSteps, type Steps } from '../engine.js';
import { PullRequest } from '../models.js';
import type { JsonObject, Mode, Result, Stream } from '../types.js';
import { compact, object, type PageParams } from './shared.js';

/**
 * Parameters for listing pull requests
 */
export interface ListPullRequestsParams extends PageParams {
  /** Filter by state */
  state?: 'open' | 'closed' | 'all';
  /** Filter by head user/org and branch, as `user:ref-name` */
  head?: string;
  /** Filter by base branch name */
  base?: string;
  sort?: 'created' | 'updated' | 'popularity' | 'long-running';
  direction?: 'asc' | 'desc';
}

/**
 * Request to create a pull request
 */
export interface CreatePullRequestRequest {
  title: string;
  /** Branch containing the changes */
  head: string;
  /** Branch to merge into */
  base: string;
  body?: string;
  draft?: boolean;
  maintainer_can_modify?: boolean;
}

/**
 * Request to update a pull request
 */
export interface UpdatePullRequestRequest {
  title?: string;
  body?: string;
  state?: 'open' | 'closed';
  base?: string;
  maintainer_can_modify?: boolean;
}

/**
 * Merge method
 */
export type MergeMethod = 'merge' | 'squash' | 'rebase';

/**
 * Request to merge a pull request
 */
export interface MergePullRequestRequest {
  commit_title?: string;
  commit_message?: string;
  /** Head SHA that must match for the merge to proceed */
  sha?: string;
  merge_method?: MergeMethod;
}

/**
 * Review event
 */
export type ReviewEvent = 'APPROVE' | 'REQUEST_CHANGES' | 'COMMENT';

/**
 * Inline comment attached to a review
 */
export type ReviewComment = {
  path: string;
  body: string;
  position?: number;
  line?: number;
  side?: 'LEFT' | 'RIGHT';
};

/**
 * Request to create a review
 */
export interface CreateReviewRequest {
  body?: string;
  event?: ReviewEvent;
  comments?: ReviewComment[];
}

/**
 * Request to add reviewers
 */
export interface RequestReviewersRequest {
  reviewers?: string[];
  team_reviewers?: string[];
}

/**
 * Step builders for pull request endpoints.
 */
export class PullRequestEndpoints {
  constructor(private readonly engine: Engine) {}

  get(owner: string, repo: string, pullNumber: number): Steps<JsonObject> {
    return object(this.engine.perform('GET', `/repos/${owner}/${repo}/pulls/${pullNumber}`), 'pull request');
  }

  list(owner: string, repo: string, params: ListPullRequestsParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/pulls`, params.per_page, {
      query: {
        state: params.state ?? 'open',
        sort: params.sort ?? 'created',
        direction: params.direction ?? 'desc',
        head: params.head,
        base: params.base,
      },
    });
  }

  create(owner: string, repo: string, request: CreatePullRequestRequest): Steps<JsonObject> {
    const body = compact({
      ...request,
      draft: request.draft ?? false,
      maintainer_can_modify: request.maintainer_can_modify ?? true,
    });
    return object(this.engine.perform('POST', `/repos/${owner}/${repo}/pulls`, { body }), 'pull request');
  }

  update(owner: string, repo: string, pullNumber: number, request: UpdatePullRequestRequest): Steps<JsonObject> {
    return object(
      this.engine.perform('PATCH', `/repos/${owner}/${repo}/pulls/${pullNumber}`, { body: compact({ ...request }) }),
      'pull request'
    );
  }

  close(owner: string, repo: string, pullNumber: number): Steps<JsonObject> {
    return this.update(owner, repo, pullNumber, { state: 'closed' });
  }

  merge(owner: string, repo: string, pullNumber: number, request: MergePullRequestRequest = {}): Steps<JsonObject> {
    const body = compact({ ...request, merge_method: request.merge_method ?? 'merge' });
    return object(
      this.engine.perform('PUT', `/repos/${owner}/${repo}/pulls/${pullNumber}/merge`, { body }),
      'merge'
    );
  }

  /**
   * 204 when merged, 404 when not.
   */
  isMerged(owner: string, repo: string, pullNumber: number): Steps<boolean> {
    return probe(this.engine.perform('GET', `/repos/${owner}/${repo}/pulls/${pullNumber}/merge`));
  }

  listCommits(owner: string, repo: string, pullNumber: number, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/pulls/${pullNumber}/commits`, params.per_page);
  }

  listFiles(owner: string, repo: string, pullNumber: number, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/pulls/${pullNumber}/files`, params.per_page);
  }

  listReviews(owner: string, repo: string, pullNumber: number, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/pulls/${pullNumber}/reviews`, params.per_page);
  }

  createReview(owner: string, repo: string, pullNumber: number, request: CreateReviewRequest): Steps<JsonObject> {
    const body = compact({
      event: request.event ?? 'COMMENT',
      body: request.body,
      comments: request.comments?.map((comment) => compact({ ...comment })),
    });
    return object(
      this.engine.perform('POST', `/repos/${owner}/${repo}/pulls/${pullNumber}/reviews`, { body }),
      'review'
    );
  }

  requestReviewers(
    owner: string,
    repo: string,
    pullNumber: number,
    request: RequestReviewersRequest
  ): Steps<JsonObject> {
    return object(
      this.engine.perform('POST', `/repos/${owner}/${repo}/pulls/${pullNumber}/requested_reviewers`, {
        body: compact({ ...request }),
      }),
      'pull request'
    );
  }
}

/**
 * Service for managing pull requests
 *
 * @example
 * ```typescript
 * const pr = await client.pulls.create('octocat', 'hello-world', {
 *   title: 'Add feature',
 *   head: 'feature',
 *   base: 'main',
 * });
 * await pr.approve('LGTM');
 * await pr.merge({ merge_method: 'squash' });
 * ```
 */
export class PullRequestsService<M extends Mode> {
  constructor(private readonly api: ApiContext<M>) {}

  private get endpoints(): PullRequestEndpoints {
    return this.api.endpoints.pulls;
  }

  get(owner: string, repo: string, pullNumber: number): Result<M, PullRequest<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(
      mapSteps(this.endpoints.get(owner, repo, pullNumber), (raw) => PullRequest.fromRaw(raw, ctx))
    );
  }

  list(owner: string, repo: string, params?: ListPullRequestsParams): Stream<M, PullRequest<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.stream(
      mapItems(this.endpoints.list(owner, repo, params), (raw) => PullRequest.fromRaw(raw, ctx))
    );
  }

  create(owner: string, repo: string, request: CreatePullRequestRequest): Result<M, PullRequest<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(
      mapSteps(this.endpoints.create(owner, repo, request), (raw) => PullRequest.fromRaw(raw, ctx))
    );
  }

  update(
    owner: string,
    repo: string,
    pullNumber: number,
    request: UpdatePullRequestRequest
  ): Result<M, PullRequest<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(
      mapSteps(this.endpoints.update(owner, repo, pullNumber, request), (raw) => PullRequest.fromRaw(raw, ctx))
    );
  }

  close(owner: string, repo: string, pullNumber: number): Result<M, PullRequest<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(
      mapSteps(this.endpoints.close(owner, repo, pullNumber), (raw) => PullRequest.fromRaw(raw, ctx))
    );
  }

  /**
   * Merge a pull request
   *
   * @returns The merge result (`sha`, `merged`, `message`)
   */
  merge(owner: string, repo: string, pullNumber: number, request?: MergePullRequestRequest): Result<M, JsonObject> {
    return this.api.driver.run(this.endpoints.merge(owner, repo, pullNumber, request));
  }

  isMerged(owner: string, repo: string, pullNumber: number): Result<M, boolean> {
    return this.api.driver.run(this.endpoints.isMerged(owner, repo, pullNumber));
  }

  listCommits(owner: string, repo: string, pullNumber: number, params?: PageParams): Stream<M, JsonObject> {
    return this.api.driver.stream(this.endpoints.listCommits(owner, repo, pullNumber, params));
  }

  listFiles(owner: string, repo: string, pullNumber: number, params?: PageParams): Stream<M, JsonObject> {
    return this.api.driver.stream(this.endpoints.listFiles(owner, repo, pullNumber, params));
  }

  listReviews(owner: string, repo: string, pullNumber: number, params?: PageParams): Stream<M, JsonObject> {
    return this.api.driver.stream(this.endpoints.listReviews(owner, repo, pullNumber, params));
  }

  createReview(
    owner: string,
    repo: string,
    pullNumber: number,
    request: CreateReviewRequest
  ): Result<M, JsonObject> {
    return this.api.driver.run(this.endpoints.createReview(owner, repo, pullNumber, request));
  }

  requestReviewers(
    owner: string,
    repo: string,
    pullNumber: number,
    request: RequestReviewersRequest
  ): Result<M, PullRequest<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(
      mapSteps(this.endpoints.requestReviewers(owner, repo, pullNumber, request), (raw) =>
        PullRequest.fromRaw(raw, ctx)
      )
    );
  }
}
