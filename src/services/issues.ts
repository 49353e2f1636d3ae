/**
 * GitHub Issues Service
 *
 * Provides issue management functionality including:
 * - Issue CRUD operations
 * - Locking
 * - Comments management
 * - Labels on an issue
 *
 * @module services/issues
 */

import { repoContext, type ApiContext } from '../context.js';
import { filterItems, mapItems, mapSteps, type Engine, type ItemSteps, type Steps } from '../engine.js';
import { Comment, Issue, Label } from '../models.js';
import type { JsonObject, Mode, Result, Stream } from '../types.js';
import { compact, nothing, object, objects, segment, type PageParams } from './shared.js';

/**
 * Parameters for listing issues
 */
export interface ListIssuesParams extends PageParams {
  /** Filter by issue state */
  state?: 'open' | 'closed' | 'all';
  /** Sort by: created, updated, or comments */
  sort?: 'created' | 'updated' | 'comments';
  /** Sort direction: asc or desc */
  direction?: 'asc' | 'desc';
  /** Filter by comma-separated label names */
  labels?: string;
  /** Filter by assignee: username, 'none', or '*' for any */
  assignee?: string;
  /** Filter by creator username */
  creator?: string;
  /** Filter by username mentioned */
  mentioned?: string;
  /** Filter by milestone: number, 'none', or '*' for any */
  milestone?: string | number;
  /** Filter by issues updated since timestamp (ISO 8601) */
  since?: string;
}

/**
 * Request to create an issue
 */
export interface CreateIssueRequest {
  /** Issue title */
  title: string;
  /** Issue body/description */
  body?: string;
  /** Usernames to assign */
  assignees?: string[];
  /** Milestone number */
  milestone?: number;
  /** Label names */
  labels?: string[];
}

/**
 * Request to update an issue
 */
export interface UpdateIssueRequest {
  /** Issue title */
  title?: string;
  /** Issue body/description */
  body?: string;
  /** Issue state */
  state?: 'open' | 'closed';
  /** State reason */
  state_reason?: 'completed' | 'not_planned' | 'reopened';
  /** Usernames to assign */
  assignees?: string[];
  /** Milestone number (null to remove) */
  milestone?: number | null;
  /** Label names */
  labels?: string[];
}

/**
 * Lock reason
 */
export type LockReason = 'off-topic' | 'too heated' | 'resolved' | 'spam';

/**
 * Step builders for issue endpoints.
 */
export class IssueEndpoints {
  constructor(private readonly engine: Engine) {}

  get(owner: string, repo: string, issueNumber: number): Steps<JsonObject> {
    return object(this.engine.perform('GET', `/repos/${owner}/${repo}/issues/${issueNumber}`), 'issue');
  }

  /**
   * Lists issues. GitHub returns pull requests on this endpoint too; they
   * are filtered out.
   */
  list(owner: string, repo: string, params: ListIssuesParams = {}): ItemSteps<JsonObject> {
    const items = this.engine.paginate('GET', `/repos/${owner}/${repo}/issues`, params.per_page, {
      query: {
        state: params.state ?? 'open',
        sort: params.sort ?? 'created',
        direction: params.direction ?? 'desc',
        labels: params.labels,
        assignee: params.assignee,
        creator: params.creator,
        mentioned: params.mentioned,
        milestone: params.milestone,
        since: params.since,
      },
    });
    return filterItems(items, (item) => !('pull_request' in item));
  }

  create(owner: string, repo: string, request: CreateIssueRequest): Steps<JsonObject> {
    return object(
      this.engine.perform('POST', `/repos/${owner}/${repo}/issues`, { body: compact({ ...request }) }),
      'issue'
    );
  }

  update(owner: string, repo: string, issueNumber: number, request: UpdateIssueRequest): Steps<JsonObject> {
    return object(
      this.engine.perform('PATCH', `/repos/${owner}/${repo}/issues/${issueNumber}`, {
        body: compact({ ...request }),
      }),
      'issue'
    );
  }

  close(owner: string, repo: string, issueNumber: number): Steps<JsonObject> {
    return this.update(owner, repo, issueNumber, { state: 'closed' });
  }

  reopen(owner: string, repo: string, issueNumber: number): Steps<JsonObject> {
    return this.update(owner, repo, issueNumber, { state: 'open' });
  }

  lock(owner: string, repo: string, issueNumber: number, lockReason?: LockReason): Steps<void> {
    return nothing(
      this.engine.perform('PUT', `/repos/${owner}/${repo}/issues/${issueNumber}/lock`, {
        body: compact({ lock_reason: lockReason }),
      })
    );
  }

  unlock(owner: string, repo: string, issueNumber: number): Steps<void> {
    return nothing(this.engine.perform('DELETE', `/repos/${owner}/${repo}/issues/${issueNumber}/lock`));
  }

  listComments(owner: string, repo: string, issueNumber: number, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/issues/${issueNumber}/comments`, params.per_page);
  }

  createComment(owner: string, repo: string, issueNumber: number, body: string): Steps<JsonObject> {
    return object(
      this.engine.perform('POST', `/repos/${owner}/${repo}/issues/${issueNumber}/comments`, { body: { body } }),
      'comment'
    );
  }

  updateComment(owner: string, repo: string, commentId: number, body: string): Steps<JsonObject> {
    return object(
      this.engine.perform('PATCH', `/repos/${owner}/${repo}/issues/comments/${commentId}`, { body: { body } }),
      'comment'
    );
  }

  deleteComment(owner: string, repo: string, commentId: number): Steps<void> {
    return nothing(this.engine.perform('DELETE', `/repos/${owner}/${repo}/issues/comments/${commentId}`));
  }

  listLabels(owner: string, repo: string, issueNumber: number, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/issues/${issueNumber}/labels`, params.per_page);
  }

  addLabels(owner: string, repo: string, issueNumber: number, labels: string[]): Steps<JsonObject[]> {
    return objects(
      this.engine.perform('POST', `/repos/${owner}/${repo}/issues/${issueNumber}/labels`, { body: { labels } }),
      'labels'
    );
  }

  removeLabel(owner: string, repo: string, issueNumber: number, label: string): Steps<void> {
    return nothing(
      this.engine.perform('DELETE', `/repos/${owner}/${repo}/issues/${issueNumber}/labels/${segment(label)}`)
    );
  }
}

/**
 * Service for managing GitHub issues
 *
 * @example
 * ```typescript
 * const issue = await client.issues.create('octocat', 'hello-world', {
 *   title: 'Found a bug',
 *   labels: ['bug'],
 * });
 * await issue.addComment('Reproduced on main');
 * ```
 */
export class IssuesService<M extends Mode> {
  constructor(private readonly api: ApiContext<M>) {}

  private get endpoints(): IssueEndpoints {
    return this.api.endpoints.issues;
  }

  /**
   * Get a specific issue
   *
   * @param owner - Repository owner
   * @param repo - Repository name
   * @param issueNumber - Issue number
   */
  get(owner: string, repo: string, issueNumber: number): Result<M, Issue<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(mapSteps(this.endpoints.get(owner, repo, issueNumber), (raw) => Issue.fromRaw(raw, ctx)));
  }

  /**
   * List issues for a repository, excluding pull requests
   *
   * @example
   * ```typescript
   * for await (const issue of client.issues.list('octocat', 'hello-world', { labels: 'bug' })) {
   *   console.log(issue.number, issue.title);
   * }
   * ```
   */
  list(owner: string, repo: string, params?: ListIssuesParams): Stream<M, Issue<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.stream(mapItems(this.endpoints.list(owner, repo, params), (raw) => Issue.fromRaw(raw, ctx)));
  }

  create(owner: string, repo: string, request: CreateIssueRequest): Result<M, Issue<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(mapSteps(this.endpoints.create(owner, repo, request), (raw) => Issue.fromRaw(raw, ctx)));
  }

  update(owner: string, repo: string, issueNumber: number, request: UpdateIssueRequest): Result<M, Issue<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(
      mapSteps(this.endpoints.update(owner, repo, issueNumber, request), (raw) => Issue.fromRaw(raw, ctx))
    );
  }

  close(owner: string, repo: string, issueNumber: number): Result<M, Issue<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(mapSteps(this.endpoints.close(owner, repo, issueNumber), (raw) => Issue.fromRaw(raw, ctx)));
  }

  reopen(owner: string, repo: string, issueNumber: number): Result<M, Issue<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(mapSteps(this.endpoints.reopen(owner, repo, issueNumber), (raw) => Issue.fromRaw(raw, ctx)));
  }

  /**
   * Lock an issue's conversation
   */
  lock(owner: string, repo: string, issueNumber: number, lockReason?: LockReason): Result<M, void> {
    return this.api.driver.run(this.endpoints.lock(owner, repo, issueNumber, lockReason));
  }

  unlock(owner: string, repo: string, issueNumber: number): Result<M, void> {
    return this.api.driver.run(this.endpoints.unlock(owner, repo, issueNumber));
  }

  listComments(owner: string, repo: string, issueNumber: number, params?: PageParams): Stream<M, Comment<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.stream(
      mapItems(this.endpoints.listComments(owner, repo, issueNumber, params), (raw) => Comment.fromRaw(raw, ctx))
    );
  }

  createComment(owner: string, repo: string, issueNumber: number, body: string): Result<M, Comment<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(
      mapSteps(this.endpoints.createComment(owner, repo, issueNumber, body), (raw) => Comment.fromRaw(raw, ctx))
    );
  }

  updateComment(owner: string, repo: string, commentId: number, body: string): Result<M, Comment<M>> {
    const ctx = repoContext(this.api, owner, repo);
    return this.api.driver.run(
      mapSteps(this.endpoints.updateComment(owner, repo, commentId, body), (raw) => Comment.fromRaw(raw, ctx))
    );
  }

  deleteComment(owner: string, repo: string, commentId: number): Result<M, void> {
    return this.api.driver.run(this.endpoints.deleteComment(owner, repo, commentId));
  }

  listLabels(owner: string, repo: string, issueNumber: number, params?: PageParams): Stream<M, Label> {
    return this.api.driver.stream(
      mapItems(this.endpoints.listLabels(owner, repo, issueNumber, params), (raw) => Label.fromRaw(raw))
    );
  }

  /**
   * Add labels to an issue
   *
   * @returns Every label now on the issue
   */
  addLabels(owner: string, repo: string, issueNumber: number, labels: string[]): Result<M, Label[]> {
    return this.api.driver.run(
      mapSteps(this.endpoints.addLabels(owner, repo, issueNumber, labels), (items) =>
        items.map((raw) => Label.fromRaw(raw))
      )
    );
  }

  removeLabel(owner: string, repo: string, issueNumber: number, label: string): Result<M, void> {
    return this.api.driver.run(this.endpoints.removeLabel(owner, repo, issueNumber, label));
  }
}
