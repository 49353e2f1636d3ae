/**
 * Back-references that let models issue follow-up requests.
 *
 * A context holds the driver and the endpoint set of the client that
 * produced a model. The client must outlive every model bound to it.
 *
 * @module context
 */

import type { Driver } from './drivers.js';
import type { IssueEndpoints } from './services/issues.js';
import type { PullRequestEndpoints } from './services/pullRequests.js';
import type { ReleaseEndpoints } from './services/releases.js';
import type { RepositoryEndpoints } from './services/repositories.js';
import type { SearchEndpoints } from './services/search.js';
import type { UserEndpoints } from './services/users.js';
import type { Mode } from './types.js';

/**
 * Mode-agnostic step builders for every resource family.
 */
export interface Endpoints {
  repos: RepositoryEndpoints;
  issues: IssueEndpoints;
  pulls: PullRequestEndpoints;
  users: UserEndpoints;
  search: SearchEndpoints;
  releases: ReleaseEndpoints;
}

/**
 * Client handle carried by {@link Repository} models and services.
 */
export interface ApiContext<M extends Mode> {
  driver: Driver<M>;
  endpoints: Endpoints;
}

/**
 * Client handle plus repository coordinates, carried by issues, pull
 * requests and comments.
 */
export interface RepoContext<M extends Mode> {
  api: ApiContext<M>;
  owner: string;
  name: string;
}

/**
 * Binds an API context to a repository.
 */
export function repoContext<M extends Mode>(api: ApiContext<M>, owner: string, name: string): RepoContext<M> {
  return { api, owner, name };
}
