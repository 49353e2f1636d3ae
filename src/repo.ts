/**
 * Repository-bound facade.
 *
 * `client.repo('octocat/hello-world')` fixes the owner and name once so
 * call sites only pass what varies. Everything returned is bound to the
 * same repository.
 *
 * @module repo
 */

import type { ApiContext } from './context.js';
import type { Branch, Comment, Issue, Label, PullRequest, Release, Repository, User } from './models.js';
import {
  IssuesService,
  PullRequestsService,
  ReleasesService,
  RepositoriesService,
  type CreateIssueRequest,
  type CreatePullRequestRequest,
  type CreateReleaseRequest,
  type CreateReviewRequest,
  type ListBranchesParams,
  type ListContributorsParams,
  type ListIssuesParams,
  type ListPullRequestsParams,
  type LockReason,
  type MergePullRequestRequest,
  type PageParams,
  type RequestReviewersRequest,
  type UpdateIssueRequest,
  type UpdatePullRequestRequest,
  type UpdateRepoRequest,
} from './services/index.js';
import type { JsonObject, Mode, Result, Stream } from './types.js';

/**
 * Issue operations on one repository.
 */
export class RepoIssues<M extends Mode> {
  private readonly service: IssuesService<M>;

  constructor(api: ApiContext<M>, readonly owner: string, readonly name: string) {
    this.service = new IssuesService(api);
  }

  get(issueNumber: number): Result<M, Issue<M>> {
    return this.service.get(this.owner, this.name, issueNumber);
  }

  list(params?: ListIssuesParams): Stream<M, Issue<M>> {
    return this.service.list(this.owner, this.name, params);
  }

  create(request: CreateIssueRequest): Result<M, Issue<M>> {
    return this.service.create(this.owner, this.name, request);
  }

  update(issueNumber: number, request: UpdateIssueRequest): Result<M, Issue<M>> {
    return this.service.update(this.owner, this.name, issueNumber, request);
  }

  close(issueNumber: number): Result<M, Issue<M>> {
    return this.service.close(this.owner, this.name, issueNumber);
  }

  reopen(issueNumber: number): Result<M, Issue<M>> {
    return this.service.reopen(this.owner, this.name, issueNumber);
  }

  lock(issueNumber: number, lockReason?: LockReason): Result<M, void> {
    return this.service.lock(this.owner, this.name, issueNumber, lockReason);
  }

  unlock(issueNumber: number): Result<M, void> {
    return this.service.unlock(this.owner, this.name, issueNumber);
  }

  listComments(issueNumber: number, params?: PageParams): Stream<M, Comment<M>> {
    return this.service.listComments(this.owner, this.name, issueNumber, params);
  }

  createComment(issueNumber: number, body: string): Result<M, Comment<M>> {
    return this.service.createComment(this.owner, this.name, issueNumber, body);
  }

  addLabels(issueNumber: number, labels: string[]): Result<M, Label[]> {
    return this.service.addLabels(this.owner, this.name, issueNumber, labels);
  }

  removeLabel(issueNumber: number, label: string): Result<M, void> {
    return this.service.removeLabel(this.owner, this.name, issueNumber, label);
  }
}

/**
 * Pull request operations on one repository.
 */
export class RepoPulls<M extends Mode> {
  private readonly service: PullRequestsService<M>;

  constructor(api: ApiContext<M>, readonly owner: string, readonly name: string) {
    this.service = new PullRequestsService(api);
  }

  get(pullNumber: number): Result<M, PullRequest<M>> {
    return this.service.get(this.owner, this.name, pullNumber);
  }

  list(params?: ListPullRequestsParams): Stream<M, PullRequest<M>> {
    return this.service.list(this.owner, this.name, params);
  }

  create(request: CreatePullRequestRequest): Result<M, PullRequest<M>> {
    return this.service.create(this.owner, this.name, request);
  }

  update(pullNumber: number, request: UpdatePullRequestRequest): Result<M, PullRequest<M>> {
    return this.service.update(this.owner, this.name, pullNumber, request);
  }

  close(pullNumber: number): Result<M, PullRequest<M>> {
    return this.service.close(this.owner, this.name, pullNumber);
  }

  merge(pullNumber: number, request?: MergePullRequestRequest): Result<M, JsonObject> {
    return this.service.merge(this.owner, this.name, pullNumber, request);
  }

  isMerged(pullNumber: number): Result<M, boolean> {
    return this.service.isMerged(this.owner, this.name, pullNumber);
  }

  listCommits(pullNumber: number, params?: PageParams): Stream<M, JsonObject> {
    return this.service.listCommits(this.owner, this.name, pullNumber, params);
  }

  listFiles(pullNumber: number, params?: PageParams): Stream<M, JsonObject> {
    return this.service.listFiles(this.owner, this.name, pullNumber, params);
  }

  listReviews(pullNumber: number, params?: PageParams): Stream<M, JsonObject> {
    return this.service.listReviews(this.owner, this.name, pullNumber, params);
  }

  createReview(pullNumber: number, request: CreateReviewRequest): Result<M, JsonObject> {
    return this.service.createReview(this.owner, this.name, pullNumber, request);
  }

  requestReviewers(pullNumber: number, request: RequestReviewersRequest): Result<M, PullRequest<M>> {
    return this.service.requestReviewers(this.owner, this.name, pullNumber, request);
  }
}

/**
 * Release operations on one repository.
 */
export class RepoReleases<M extends Mode> {
  private readonly service: ReleasesService<M>;

  constructor(api: ApiContext<M>, readonly owner: string, readonly name: string) {
    this.service = new ReleasesService(api);
  }

  list(params?: PageParams): Stream<M, Release> {
    return this.service.list(this.owner, this.name, params);
  }

  get(releaseId: number): Result<M, Release> {
    return this.service.get(this.owner, this.name, releaseId);
  }

  getLatest(): Result<M, Release> {
    return this.service.getLatest(this.owner, this.name);
  }

  getByTag(tag: string): Result<M, Release> {
    return this.service.getByTag(this.owner, this.name, tag);
  }

  create(request: CreateReleaseRequest): Result<M, Release> {
    return this.service.create(this.owner, this.name, request);
  }
}

/**
 * A repository addressed by owner and name.
 *
 * @example
 * ```typescript
 * const repo = client.repo('octocat/hello-world');
 * const issue = await repo.issues.create({ title: 'Found a bug' });
 * for await (const pr of repo.pulls.list({ state: 'all' })) {
 *   console.log(pr.number, await pr.isMerged());
 * }
 * ```
 */
export class Repo<M extends Mode> {
  readonly issues: RepoIssues<M>;
  readonly pulls: RepoPulls<M>;
  readonly releases: RepoReleases<M>;
  private readonly repos: RepositoriesService<M>;

  constructor(api: ApiContext<M>, readonly owner: string, readonly name: string) {
    this.repos = new RepositoriesService(api);
    this.issues = new RepoIssues(api, owner, name);
    this.pulls = new RepoPulls(api, owner, name);
    this.releases = new RepoReleases(api, owner, name);
  }

  /** `owner/name` */
  get fullName(): string {
    return `${this.owner}/${this.name}`;
  }

  get(): Result<M, Repository<M>> {
    return this.repos.get(this.owner, this.name);
  }

  update(request: UpdateRepoRequest): Result<M, Repository<M>> {
    return this.repos.update(this.owner, this.name, request);
  }

  delete(): Result<M, void> {
    return this.repos.delete(this.owner, this.name);
  }

  contributors(params?: ListContributorsParams): Stream<M, User> {
    return this.repos.listContributors(this.owner, this.name, params);
  }

  /**
   * Languages mapped to bytes of code
   */
  languages(): Result<M, Record<string, number>> {
    return this.repos.listLanguages(this.owner, this.name);
  }

  tags(params?: PageParams): Stream<M, JsonObject> {
    return this.repos.listTags(this.owner, this.name, params);
  }

  branches(params?: ListBranchesParams): Stream<M, Branch> {
    return this.repos.listBranches(this.owner, this.name, params);
  }

  star(): Result<M, void> {
    return this.repos.star(this.owner, this.name);
  }

  unstar(): Result<M, void> {
    return this.repos.unstar(this.owner, this.name);
  }

  isStarred(): Result<M, boolean> {
    return this.repos.isStarred(this.owner, this.name);
  }

  /**
   * Fork into the authenticated account, or into `organization`
   */
  createFork(organization?: string): Result<M, Repository<M>> {
    return this.repos.fork(this.owner, this.name, { organization });
  }

  subscribe(): Result<M, void> {
    return this.repos.subscribe(this.owner, this.name);
  }

  unsubscribe(): Result<M, void> {
    return this.repos.unsubscribe(this.owner, this.name);
  }
}
