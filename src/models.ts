/**
 * Typed models for GitHub API responses.
 *
 * Each model is an immutable snapshot of one payload. Field names mirror
 * the wire format, `raw` keeps a frozen copy of the payload, and `fromRaw`
 * validates it with zod: a missing required field throws a `ZodError`,
 * absent optional fields get defaults, and timestamps become `Date`s.
 *
 * Issues, pull requests, comments and repositories may be bound to the
 * client that produced them. Their action methods return fresh models and
 * follow the client's mode (promises for `createClient`, plain values for
 * `createSyncClient`). Calling an action on an unbound model throws
 * {@link UnboundModelError}.
 *
 * @module models
 */

import { z } from 'zod';
import type { ApiContext, RepoContext } from './context.js';
import { mapItems, mapSteps } from './engine.js';
import { UnboundModelError } from './errors.js';
import { isJsonObject, type JsonObject, type JsonValue, type Mode, type Result, type Stream } from './types.js';
import type { LockReason, MergePullRequestRequest } from './services/index.js';

const jsonObject = z.custom<JsonObject>(isJsonObject, { message: 'Expected an object' });

const text = (fallback: string) => z.string().nullish().transform((value) => value ?? fallback);
const optionalText = z.string().nullish().transform((value) => value ?? null);
const count = z.number().nullish().transform((value) => value ?? 0);
const optionalCount = z.number().nullish().transform((value) => value ?? null);
const flag = z.boolean().nullish().transform((value) => value ?? false);
const timestamp = z
  .string()
  .datetime({ offset: true })
  .nullish()
  .transform((value) => (value ? new Date(value) : null));

function freezeJson(value: JsonValue): void {
  if (Array.isArray(value)) {
    value.forEach(freezeJson);
  } else if (isJsonObject(value)) {
    Object.values(value).forEach(freezeJson);
  } else {
    return;
  }
  Object.freeze(value);
}

// Later changes to the caller's payload must not leak into the model.
function snapshot(raw: JsonObject): Readonly<JsonObject> {
  const copy = structuredClone(raw);
  freezeJson(copy);
  return copy;
}

function nested<T>(parse: (raw: JsonObject) => T) {
  return jsonObject.nullish().transform((value) => (value ? parse(value) : null));
}

function listOf<T>(parse: (raw: JsonObject) => T) {
  return z.array(jsonObject).nullish().transform((values) => (values ?? []).map((value) => parse(value)));
}

// ---------------------------------------------------------------------------
// User
// ---------------------------------------------------------------------------

const userSchema = z.object({
  login: z.string(),
  id: z.number(),
  avatar_url: text(''),
  html_url: text(''),
  type: text('User'),
  name: optionalText,
  email: optionalText,
  bio: optionalText,
  company: optionalText,
  location: optionalText,
  blog: optionalText,
  twitter_username: optionalText,
  public_repos: optionalCount,
  public_gists: optionalCount,
  followers: optionalCount,
  following: optionalCount,
  created_at: timestamp,
  updated_at: timestamp,
});

type UserData = z.output<typeof userSchema>;

/**
 * A GitHub user or organization account.
 */
export interface User extends Readonly<UserData> {}

export class User {
  readonly raw: Readonly<JsonObject>;

  private constructor(data: UserData, raw: JsonObject) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
  }

  static fromRaw(raw: JsonObject): User {
    return new User(userSchema.parse(raw), raw);
  }
}

// ---------------------------------------------------------------------------
// Label, Milestone
// ---------------------------------------------------------------------------

const labelSchema = z.object({
  id: z.number(),
  name: z.string(),
  color: text(''),
  description: optionalText,
  default: flag,
});

type LabelData = z.output<typeof labelSchema>;

/**
 * An issue label.
 */
export interface Label extends Readonly<LabelData> {}

export class Label {
  readonly raw: Readonly<JsonObject>;

  private constructor(data: LabelData, raw: JsonObject) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
  }

  static fromRaw(raw: JsonObject): Label {
    return new Label(labelSchema.parse(raw), raw);
  }
}

const milestoneSchema = z.object({
  id: z.number(),
  number: z.number(),
  title: z.string(),
  description: optionalText,
  state: text('open'),
  open_issues: count,
  closed_issues: count,
  created_at: timestamp,
  updated_at: timestamp,
  due_on: timestamp,
  closed_at: timestamp,
});

type MilestoneData = z.output<typeof milestoneSchema>;

/**
 * A milestone issues can be grouped under.
 */
export interface Milestone extends Readonly<MilestoneData> {}

export class Milestone {
  readonly raw: Readonly<JsonObject>;

  private constructor(data: MilestoneData, raw: JsonObject) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
  }

  static fromRaw(raw: JsonObject): Milestone {
    return new Milestone(milestoneSchema.parse(raw), raw);
  }
}

// ---------------------------------------------------------------------------
// Comment
// ---------------------------------------------------------------------------

const commentSchema = z.object({
  id: z.number(),
  body: text(''),
  user: nested(User.fromRaw),
  html_url: text(''),
  created_at: timestamp,
  updated_at: timestamp,
});

type CommentData = z.output<typeof commentSchema>;

/**
 * A comment on an issue or pull request.
 */
export interface Comment<M extends Mode = Mode> extends Readonly<CommentData> {}

export class Comment<M extends Mode = Mode> {
  readonly raw: Readonly<JsonObject>;
  private readonly context?: RepoContext<M>;

  private constructor(data: CommentData, raw: JsonObject, context?: RepoContext<M>) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
    this.context = context;
  }

  static fromRaw<M extends Mode = Mode>(raw: JsonObject, context?: RepoContext<M>): Comment<M> {
    return new Comment(commentSchema.parse(raw), raw, context);
  }

  private bound(): RepoContext<M> {
    if (!this.context) {
      throw new UnboundModelError('Comment', 'repository');
    }
    return this.context;
  }

  /**
   * Replaces the comment body.
   */
  edit(body: string): Result<M, Comment<M>> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      mapSteps(ctx.api.endpoints.issues.updateComment(ctx.owner, ctx.name, this.id, body), (raw) =>
        Comment.fromRaw(raw, ctx)
      )
    );
  }

  /**
   * Deletes the comment.
   */
  delete(): Result<M, void> {
    const ctx = this.bound();
    return ctx.api.driver.run(ctx.api.endpoints.issues.deleteComment(ctx.owner, ctx.name, this.id));
  }
}

// ---------------------------------------------------------------------------
// Issue
// ---------------------------------------------------------------------------

const issueSchema = z.object({
  id: z.number(),
  number: z.number(),
  title: z.string(),
  body: optionalText,
  state: text('open'),
  locked: flag,
  user: nested(User.fromRaw),
  assignee: nested(User.fromRaw),
  assignees: listOf(User.fromRaw),
  labels: listOf(Label.fromRaw),
  milestone: nested(Milestone.fromRaw),
  html_url: text(''),
  comments: count,
  created_at: timestamp,
  updated_at: timestamp,
  closed_at: timestamp,
  closed_by: nested(User.fromRaw),
});

type IssueData = z.output<typeof issueSchema>;

/**
 * A repository issue.
 *
 * @example
 * ```typescript
 * for await (const issue of client.repo('octocat/hello-world').issues.list()) {
 *   if (issue.title.startsWith('[stale]')) {
 *     await issue.close();
 *   }
 * }
 * ```
 */
export interface Issue<M extends Mode = Mode> extends Readonly<IssueData> {}

export class Issue<M extends Mode = Mode> {
  readonly raw: Readonly<JsonObject>;
  private readonly context?: RepoContext<M>;

  private constructor(data: IssueData, raw: JsonObject, context?: RepoContext<M>) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
    this.context = context;
  }

  static fromRaw<M extends Mode = Mode>(raw: JsonObject, context?: RepoContext<M>): Issue<M> {
    return new Issue(issueSchema.parse(raw), raw, context);
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  private bound(): RepoContext<M> {
    if (!this.context) {
      throw new UnboundModelError('Issue', 'repository');
    }
    return this.context;
  }

  close(): Result<M, Issue<M>> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      mapSteps(ctx.api.endpoints.issues.close(ctx.owner, ctx.name, this.number), (raw) => Issue.fromRaw(raw, ctx))
    );
  }

  reopen(): Result<M, Issue<M>> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      mapSteps(ctx.api.endpoints.issues.reopen(ctx.owner, ctx.name, this.number), (raw) => Issue.fromRaw(raw, ctx))
    );
  }

  addComment(body: string): Result<M, Comment<M>> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      mapSteps(ctx.api.endpoints.issues.createComment(ctx.owner, ctx.name, this.number, body), (raw) =>
        Comment.fromRaw(raw, ctx)
      )
    );
  }

  /**
   * Adds labels and returns every label now on the issue.
   */
  addLabels(...labels: string[]): Result<M, Label[]> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      mapSteps(ctx.api.endpoints.issues.addLabels(ctx.owner, ctx.name, this.number, labels), (items) =>
        items.map((raw) => Label.fromRaw(raw))
      )
    );
  }

  removeLabel(label: string): Result<M, void> {
    const ctx = this.bound();
    return ctx.api.driver.run(ctx.api.endpoints.issues.removeLabel(ctx.owner, ctx.name, this.number, label));
  }

  lock(reason?: LockReason): Result<M, void> {
    const ctx = this.bound();
    return ctx.api.driver.run(ctx.api.endpoints.issues.lock(ctx.owner, ctx.name, this.number, reason));
  }

  unlock(): Result<M, void> {
    const ctx = this.bound();
    return ctx.api.driver.run(ctx.api.endpoints.issues.unlock(ctx.owner, ctx.name, this.number));
  }

  listComments(): Stream<M, Comment<M>> {
    const ctx = this.bound();
    return ctx.api.driver.stream(
      mapItems(ctx.api.endpoints.issues.listComments(ctx.owner, ctx.name, this.number), (raw) =>
        Comment.fromRaw(raw, ctx)
      )
    );
  }
}

// ---------------------------------------------------------------------------
// PullRequest
// ---------------------------------------------------------------------------

const branchRef = z
  .object({ ref: z.string().nullish(), sha: z.string().nullish() })
  .nullish()
  .transform((value) => ({ ref: value?.ref ?? '', sha: value?.sha ?? '' }));

const pullRequestSchema = z
  .object({
    id: z.number(),
    number: z.number(),
    title: z.string(),
    body: optionalText,
    state: text('open'),
    locked: flag,
    draft: flag,
    merged: flag,
    mergeable: z.boolean().nullish().transform((value) => value ?? null),
    user: nested(User.fromRaw),
    assignee: nested(User.fromRaw),
    assignees: listOf(User.fromRaw),
    labels: listOf(Label.fromRaw),
    milestone: nested(Milestone.fromRaw),
    html_url: text(''),
    head: branchRef,
    base: branchRef,
    comments: count,
    commits: count,
    additions: count,
    deletions: count,
    changed_files: count,
    created_at: timestamp,
    updated_at: timestamp,
    closed_at: timestamp,
    merged_at: timestamp,
    merged_by: nested(User.fromRaw),
  })
  .transform(({ head, base, ...rest }) => ({
    ...rest,
    head_ref: head.ref,
    head_sha: head.sha,
    base_ref: base.ref,
    base_sha: base.sha,
  }));

type PullRequestData = z.output<typeof pullRequestSchema>;

/**
 * A pull request.
 */
export interface PullRequest<M extends Mode = Mode> extends Readonly<PullRequestData> {}

export class PullRequest<M extends Mode = Mode> {
  readonly raw: Readonly<JsonObject>;
  private readonly context?: RepoContext<M>;

  private constructor(data: PullRequestData, raw: JsonObject, context?: RepoContext<M>) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
    this.context = context;
  }

  static fromRaw<M extends Mode = Mode>(raw: JsonObject, context?: RepoContext<M>): PullRequest<M> {
    return new PullRequest(pullRequestSchema.parse(raw), raw, context);
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  private bound(): RepoContext<M> {
    if (!this.context) {
      throw new UnboundModelError('PullRequest', 'repository');
    }
    return this.context;
  }

  /**
   * Closes the pull request without merging.
   */
  close(): Result<M, PullRequest<M>> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      mapSteps(ctx.api.endpoints.pulls.close(ctx.owner, ctx.name, this.number), (raw) =>
        PullRequest.fromRaw(raw, ctx)
      )
    );
  }

  /**
   * Merges the pull request and returns the merge result payload.
   */
  merge(request: MergePullRequestRequest = {}): Result<M, JsonObject> {
    const ctx = this.bound();
    return ctx.api.driver.run(ctx.api.endpoints.pulls.merge(ctx.owner, ctx.name, this.number, request));
  }

  /**
   * Asks GitHub whether the pull request has been merged.
   */
  isMerged(): Result<M, boolean> {
    const ctx = this.bound();
    return ctx.api.driver.run(ctx.api.endpoints.pulls.isMerged(ctx.owner, ctx.name, this.number));
  }

  approve(body?: string): Result<M, JsonObject> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      ctx.api.endpoints.pulls.createReview(ctx.owner, ctx.name, this.number, { body, event: 'APPROVE' })
    );
  }

  requestChanges(body: string): Result<M, JsonObject> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      ctx.api.endpoints.pulls.createReview(ctx.owner, ctx.name, this.number, { body, event: 'REQUEST_CHANGES' })
    );
  }

  /**
   * Leaves a review comment.
   */
  comment(body: string): Result<M, JsonObject> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      ctx.api.endpoints.pulls.createReview(ctx.owner, ctx.name, this.number, { body, event: 'COMMENT' })
    );
  }

  /**
   * Leaves a conversation (issue) comment.
   */
  addComment(body: string): Result<M, Comment<M>> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      mapSteps(ctx.api.endpoints.issues.createComment(ctx.owner, ctx.name, this.number, body), (raw) =>
        Comment.fromRaw(raw, ctx)
      )
    );
  }

  requestReviewers(reviewers?: string[], teamReviewers?: string[]): Result<M, PullRequest<M>> {
    const ctx = this.bound();
    return ctx.api.driver.run(
      mapSteps(
        ctx.api.endpoints.pulls.requestReviewers(ctx.owner, ctx.name, this.number, {
          reviewers,
          team_reviewers: teamReviewers,
        }),
        (raw) => PullRequest.fromRaw(raw, ctx)
      )
    );
  }

  listCommits(): Stream<M, JsonObject> {
    const ctx = this.bound();
    return ctx.api.driver.stream(ctx.api.endpoints.pulls.listCommits(ctx.owner, ctx.name, this.number));
  }

  listFiles(): Stream<M, JsonObject> {
    const ctx = this.bound();
    return ctx.api.driver.stream(ctx.api.endpoints.pulls.listFiles(ctx.owner, ctx.name, this.number));
  }
}

// ---------------------------------------------------------------------------
// Repository, Branch
// ---------------------------------------------------------------------------

const repositorySchema = z.object({
  id: z.number(),
  name: z.string(),
  full_name: z.string(),
  owner: nested(User.fromRaw),
  private: flag,
  description: optionalText,
  fork: flag,
  html_url: text(''),
  clone_url: text(''),
  ssh_url: text(''),
  homepage: optionalText,
  language: optionalText,
  forks_count: count,
  stargazers_count: count,
  watchers_count: count,
  open_issues_count: count,
  default_branch: text('main'),
  archived: flag,
  disabled: flag,
  pushed_at: timestamp,
  created_at: timestamp,
  updated_at: timestamp,
});

type RepositoryData = z.output<typeof repositorySchema>;

/**
 * A repository. The `fork` field says whether this repository is a fork;
 * {@link Repository.createFork} forks it.
 */
export interface Repository<M extends Mode = Mode> extends Readonly<RepositoryData> {}

export class Repository<M extends Mode = Mode> {
  readonly raw: Readonly<JsonObject>;
  private readonly context?: ApiContext<M>;

  private constructor(data: RepositoryData, raw: JsonObject, context?: ApiContext<M>) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
    this.context = context;
  }

  static fromRaw<M extends Mode = Mode>(raw: JsonObject, context?: ApiContext<M>): Repository<M> {
    return new Repository(repositorySchema.parse(raw), raw, context);
  }

  get stars(): number {
    return this.stargazers_count;
  }

  get forks(): number {
    return this.forks_count;
  }

  private bound(): { api: ApiContext<M>; owner: string; repo: string } {
    if (!this.context) {
      throw new UnboundModelError('Repository', 'client');
    }
    const [owner = '', repo = this.name] = this.full_name.split('/');
    return { api: this.context, owner, repo };
  }

  star(): Result<M, void> {
    const { api, owner, repo } = this.bound();
    return api.driver.run(api.endpoints.repos.star(owner, repo));
  }

  unstar(): Result<M, void> {
    const { api, owner, repo } = this.bound();
    return api.driver.run(api.endpoints.repos.unstar(owner, repo));
  }

  isStarred(): Result<M, boolean> {
    const { api, owner, repo } = this.bound();
    return api.driver.run(api.endpoints.repos.isStarred(owner, repo));
  }

  /**
   * Forks the repository, optionally into an organization.
   */
  createFork(organization?: string): Result<M, Repository<M>> {
    const { api, owner, repo } = this.bound();
    return api.driver.run(
      mapSteps(api.endpoints.repos.fork(owner, repo, { organization }), (raw) => Repository.fromRaw(raw, api))
    );
  }

  subscribe(): Result<M, void> {
    const { api, owner, repo } = this.bound();
    return api.driver.run(api.endpoints.repos.subscribe(owner, repo));
  }

  unsubscribe(): Result<M, void> {
    const { api, owner, repo } = this.bound();
    return api.driver.run(api.endpoints.repos.unsubscribe(owner, repo));
  }
}

const branchSchema = z
  .object({
    name: z.string(),
    protected: flag,
    commit: z.object({ sha: z.string().nullish() }).nullish(),
  })
  .transform(({ commit, ...rest }) => ({ ...rest, sha: commit?.sha ?? '' }));

type BranchData = z.output<typeof branchSchema>;

/**
 * A branch and the commit it points at.
 */
export interface Branch extends Readonly<BranchData> {}

export class Branch {
  readonly raw: Readonly<JsonObject>;

  private constructor(data: BranchData, raw: JsonObject) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
  }

  static fromRaw(raw: JsonObject): Branch {
    return new Branch(branchSchema.parse(raw), raw);
  }
}

// ---------------------------------------------------------------------------
// Release, ReleaseAsset
// ---------------------------------------------------------------------------

const releaseAssetSchema = z.object({
  id: z.number(),
  name: z.string(),
  label: optionalText,
  content_type: text('application/octet-stream'),
  state: text('uploaded'),
  size: count,
  download_count: count,
  browser_download_url: text(''),
  uploader: nested(User.fromRaw),
  created_at: timestamp,
  updated_at: timestamp,
});

type ReleaseAssetData = z.output<typeof releaseAssetSchema>;

/**
 * A file attached to a release.
 */
export interface ReleaseAsset extends Readonly<ReleaseAssetData> {}

export class ReleaseAsset {
  readonly raw: Readonly<JsonObject>;

  private constructor(data: ReleaseAssetData, raw: JsonObject) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
  }

  static fromRaw(raw: JsonObject): ReleaseAsset {
    return new ReleaseAsset(releaseAssetSchema.parse(raw), raw);
  }
}

const releaseSchema = z.object({
  id: z.number(),
  tag_name: z.string(),
  name: optionalText,
  body: optionalText,
  target_commitish: text(''),
  draft: flag,
  prerelease: flag,
  html_url: text(''),
  upload_url: text(''),
  tarball_url: optionalText,
  zipball_url: optionalText,
  author: nested(User.fromRaw),
  assets: listOf(ReleaseAsset.fromRaw),
  created_at: timestamp,
  published_at: timestamp,
});

type ReleaseData = z.output<typeof releaseSchema>;

/**
 * A published or draft release.
 */
export interface Release extends Readonly<ReleaseData> {}

export class Release {
  readonly raw: Readonly<JsonObject>;

  private constructor(data: ReleaseData, raw: JsonObject) {
    Object.assign(this, data);
    this.raw = snapshot(raw);
  }

  static fromRaw(raw: JsonObject): Release {
    return new Release(releaseSchema.parse(raw), raw);
  }
}

// ---------------------------------------------------------------------------
// SearchResult
// ---------------------------------------------------------------------------

const searchEnvelopeSchema = z.object({
  total_count: count,
  incomplete_results: flag,
  items: z.array(jsonObject).nullish().transform((value) => value ?? []),
});

/**
 * One page of search results.
 */
export class SearchResult<T = JsonObject> {
  readonly total_count: number;
  readonly incomplete_results: boolean;
  readonly items: readonly T[];
  readonly raw: Readonly<JsonObject>;

  private constructor(totalCount: number, incomplete: boolean, items: T[], raw: JsonObject) {
    this.total_count = totalCount;
    this.incomplete_results = incomplete;
    this.items = items;
    this.raw = snapshot(raw);
  }

  static fromRaw(raw: JsonObject): SearchResult<JsonObject>;
  static fromRaw<T>(raw: JsonObject, parseItem: (item: JsonObject) => T): SearchResult<T>;
  static fromRaw<T>(raw: JsonObject, parseItem?: (item: JsonObject) => T): SearchResult<T | JsonObject> {
    const data = searchEnvelopeSchema.parse(raw);
    const items: Array<T | JsonObject> = parseItem ? data.items.map((item) => parseItem(item)) : data.items;
    return new SearchResult(data.total_count, data.incomplete_results, items, raw);
  }
}
