/**
 * GitHub Repositories Service
 *
 * Repository CRUD, listings, contributors, languages, tags, branches,
 * stars, forks and subscriptions.
 *
 * @module services/repositories
 */

import type { ApiContext } from '../context.js';
import { mapItems, mapSteps, probe, type Engine, type ItemSteps, type Steps } from '../engine.js';
import { Branch, Repository, User } from '../models.js';
import type { JsonObject, Mode, Result, Stream } from '../types.js';
import { compact, counts, nothing, object, type PageParams } from './shared.js';

/**
 * Parameters for listing a user's or organization's repositories
 */
export interface ListReposParams extends PageParams {
  /** Filter by type */
  type?: 'all' | 'owner' | 'public' | 'private' | 'forks' | 'sources' | 'member';
  /** Sort by: created, updated, pushed, full_name */
  sort?: 'created' | 'updated' | 'pushed' | 'full_name';
  /** Sort direction: asc or desc */
  direction?: 'asc' | 'desc';
}

/**
 * Parameters for listing the authenticated user's repositories
 */
export interface ListAuthenticatedReposParams extends PageParams {
  /** Filter by visibility: public, private, or all */
  visibility?: 'public' | 'private' | 'all';
  /** Comma-separated list of values: owner, collaborator, organization_member */
  affiliation?: string;
  /** Sort by: created, updated, pushed, full_name */
  sort?: 'created' | 'updated' | 'pushed' | 'full_name';
  /** Sort direction: asc or desc */
  direction?: 'asc' | 'desc';
}

/**
 * Request to create a new repository
 */
export interface CreateRepoRequest {
  /** Repository name */
  name: string;
  /** Repository description */
  description?: string;
  /** Homepage URL */
  homepage?: string;
  /** Make repository private */
  private?: boolean;
  /** Enable issues */
  has_issues?: boolean;
  /** Enable projects */
  has_projects?: boolean;
  /** Enable wiki */
  has_wiki?: boolean;
  /** Make this a template repository */
  is_template?: boolean;
  /** Initialize with README */
  auto_init?: boolean;
  /** .gitignore template name */
  gitignore_template?: string;
  /** License template name */
  license_template?: string;
}

/**
 * Request to update a repository
 */
export interface UpdateRepoRequest {
  name?: string;
  description?: string;
  homepage?: string;
  private?: boolean;
  has_issues?: boolean;
  has_projects?: boolean;
  has_wiki?: boolean;
  default_branch?: string;
  allow_squash_merge?: boolean;
  allow_merge_commit?: boolean;
  allow_rebase_merge?: boolean;
  delete_branch_on_merge?: boolean;
  archived?: boolean;
}

/**
 * Request to fork a repository
 */
export interface ForkRequest {
  /** Organization to fork into */
  organization?: string;
  /** Name for the fork */
  name?: string;
  /** Fork only the default branch */
  default_branch_only?: boolean;
}

/**
 * Parameters for listing contributors
 */
export interface ListContributorsParams extends PageParams {
  /** Include anonymous contributors */
  anon?: boolean;
}

/**
 * Parameters for listing branches
 */
export interface ListBranchesParams extends PageParams {
  /** Only protected (true) or unprotected (false) branches */
  protected?: boolean;
}

/**
 * Step builders for repository endpoints.
 */
export class RepositoryEndpoints {
  constructor(private readonly engine: Engine) {}

  get(owner: string, repo: string): Steps<JsonObject> {
    return object(this.engine.perform('GET', `/repos/${owner}/${repo}`), 'repository');
  }

  listForUser(username: string, params: ListReposParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/users/${username}/repos`, params.per_page, {
      query: {
        type: params.type ?? 'owner',
        sort: params.sort ?? 'full_name',
        direction: params.direction ?? 'asc',
      },
    });
  }

  listForOrg(org: string, params: ListReposParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/orgs/${org}/repos`, params.per_page, {
      query: {
        type: params.type ?? 'all',
        sort: params.sort ?? 'full_name',
        direction: params.direction ?? 'asc',
      },
    });
  }

  listForAuthenticatedUser(params: ListAuthenticatedReposParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', '/user/repos', params.per_page, {
      query: {
        visibility: params.visibility ?? 'all',
        affiliation: params.affiliation ?? 'owner,collaborator,organization_member',
        sort: params.sort ?? 'full_name',
        direction: params.direction ?? 'asc',
      },
    });
  }

  create(request: CreateRepoRequest): Steps<JsonObject> {
    return object(
      this.engine.perform('POST', '/user/repos', {
        body: compact({
          ...request,
          private: request.private ?? false,
          auto_init: request.auto_init ?? false,
        }),
      }),
      'repository'
    );
  }

  createForOrg(org: string, request: CreateRepoRequest): Steps<JsonObject> {
    return object(
      this.engine.perform('POST', `/orgs/${org}/repos`, {
        body: compact({ ...request, private: request.private ?? false }),
      }),
      'repository'
    );
  }

  update(owner: string, repo: string, request: UpdateRepoRequest): Steps<JsonObject> {
    return object(
      this.engine.perform('PATCH', `/repos/${owner}/${repo}`, { body: compact({ ...request }) }),
      'repository'
    );
  }

  delete(owner: string, repo: string): Steps<void> {
    return nothing(this.engine.perform('DELETE', `/repos/${owner}/${repo}`));
  }

  listContributors(owner: string, repo: string, params: ListContributorsParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/contributors`, params.per_page, {
      query: { anon: params.anon ? 'true' : 'false' },
    });
  }

  listLanguages(owner: string, repo: string): Steps<Record<string, number>> {
    return counts(this.engine.perform('GET', `/repos/${owner}/${repo}/languages`), 'languages');
  }

  listTags(owner: string, repo: string, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/tags`, params.per_page);
  }

  listBranches(owner: string, repo: string, params: ListBranchesParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/branches`, params.per_page, {
      query: {
        protected: params.protected === undefined ? undefined : String(params.protected),
      },
    });
  }

  star(owner: string, repo: string): Steps<void> {
    return nothing(this.engine.perform('PUT', `/user/starred/${owner}/${repo}`));
  }

  unstar(owner: string, repo: string): Steps<void> {
    return nothing(this.engine.perform('DELETE', `/user/starred/${owner}/${repo}`));
  }

  isStarred(owner: string, repo: string): Steps<boolean> {
    return probe(this.engine.perform('GET', `/user/starred/${owner}/${repo}`));
  }

  /**
   * Forks a repository. The body is omitted when no option is set.
   */
  fork(owner: string, repo: string, request: ForkRequest = {}): Steps<JsonObject> {
    const body = compact({ ...request });
    return object(
      this.engine.perform('POST', `/repos/${owner}/${repo}/forks`, {
        body: Object.keys(body).length > 0 ? body : undefined,
      }),
      'fork'
    );
  }

  subscribe(owner: string, repo: string): Steps<void> {
    return nothing(
      this.engine.perform('PUT', `/repos/${owner}/${repo}/subscription`, { body: { subscribed: true } })
    );
  }

  unsubscribe(owner: string, repo: string): Steps<void> {
    return nothing(this.engine.perform('DELETE', `/repos/${owner}/${repo}/subscription`));
  }
}

/**
 * Repositories service.
 *
 * @example
 * ```typescript
 * const repo = await client.repos.get('octocat', 'hello-world');
 * console.log(repo.full_name, repo.stars);
 *
 * for await (const r of client.repos.listForOrg('github', { type: 'public' })) {
 *   console.log(r.name);
 * }
 * ```
 */
export class RepositoriesService<M extends Mode> {
  constructor(private readonly api: ApiContext<M>) {}

  private get endpoints(): RepositoryEndpoints {
    return this.api.endpoints.repos;
  }

  private toModel(raw: JsonObject): Repository<M> {
    return Repository.fromRaw(raw, this.api);
  }

  /**
   * Get a repository
   *
   * @param owner - Repository owner
   * @param repo - Repository name
   */
  get(owner: string, repo: string): Result<M, Repository<M>> {
    return this.api.driver.run(mapSteps(this.endpoints.get(owner, repo), (raw) => this.toModel(raw)));
  }

  /**
   * List public repositories for a user
   */
  listForUser(username: string, params?: ListReposParams): Stream<M, Repository<M>> {
    return this.api.driver.stream(mapItems(this.endpoints.listForUser(username, params), (raw) => this.toModel(raw)));
  }

  /**
   * List repositories for an organization
   */
  listForOrg(org: string, params?: ListReposParams): Stream<M, Repository<M>> {
    return this.api.driver.stream(mapItems(this.endpoints.listForOrg(org, params), (raw) => this.toModel(raw)));
  }

  /**
   * List repositories the authenticated user can access
   */
  listForAuthenticatedUser(params?: ListAuthenticatedReposParams): Stream<M, Repository<M>> {
    return this.api.driver.stream(mapItems(this.endpoints.listForAuthenticatedUser(params), (raw) => this.toModel(raw)));
  }

  /**
   * Create a repository for the authenticated user
   *
   * @example
   * ```typescript
   * const repo = await client.repos.create({ name: 'scratch', private: true });
   * ```
   */
  create(request: CreateRepoRequest): Result<M, Repository<M>> {
    return this.api.driver.run(mapSteps(this.endpoints.create(request), (raw) => this.toModel(raw)));
  }

  /**
   * Create a repository in an organization
   */
  createForOrg(org: string, request: CreateRepoRequest): Result<M, Repository<M>> {
    return this.api.driver.run(mapSteps(this.endpoints.createForOrg(org, request), (raw) => this.toModel(raw)));
  }

  update(owner: string, repo: string, request: UpdateRepoRequest): Result<M, Repository<M>> {
    return this.api.driver.run(mapSteps(this.endpoints.update(owner, repo, request), (raw) => this.toModel(raw)));
  }

  delete(owner: string, repo: string): Result<M, void> {
    return this.api.driver.run(this.endpoints.delete(owner, repo));
  }

  listContributors(owner: string, repo: string, params?: ListContributorsParams): Stream<M, User> {
    return this.api.driver.stream(
      mapItems(this.endpoints.listContributors(owner, repo, params), (raw) => User.fromRaw(raw))
    );
  }

  /**
   * Languages used in a repository, mapped to bytes of code
   */
  listLanguages(owner: string, repo: string): Result<M, Record<string, number>> {
    return this.api.driver.run(this.endpoints.listLanguages(owner, repo));
  }

  listTags(owner: string, repo: string, params?: PageParams): Stream<M, JsonObject> {
    return this.api.driver.stream(this.endpoints.listTags(owner, repo, params));
  }

  listBranches(owner: string, repo: string, params?: ListBranchesParams): Stream<M, Branch> {
    return this.api.driver.stream(
      mapItems(this.endpoints.listBranches(owner, repo, params), (raw) => Branch.fromRaw(raw))
    );
  }

  star(owner: string, repo: string): Result<M, void> {
    return this.api.driver.run(this.endpoints.star(owner, repo));
  }

  unstar(owner: string, repo: string): Result<M, void> {
    return this.api.driver.run(this.endpoints.unstar(owner, repo));
  }

  /**
   * Whether the authenticated user has starred a repository
   */
  isStarred(owner: string, repo: string): Result<M, boolean> {
    return this.api.driver.run(this.endpoints.isStarred(owner, repo));
  }

  fork(owner: string, repo: string, request?: ForkRequest): Result<M, Repository<M>> {
    return this.api.driver.run(mapSteps(this.endpoints.fork(owner, repo, request), (raw) => this.toModel(raw)));
  }

  subscribe(owner: string, repo: string): Result<M, void> {
    return this.api.driver.run(this.endpoints.subscribe(owner, repo));
  }

  unsubscribe(owner: string, repo: string): Result<M, void> {
    return this.api.driver.run(this.endpoints.unsubscribe(owner, repo));
  }
}
