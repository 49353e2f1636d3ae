/**
 * GitHub REST Services
 *
 * This module exports the service classes for repositories, issues,
 * pull requests, releases, users and search, together with the
 * mode-agnostic endpoint builders they run.
 *
 * @module services
 */

// Export all services
export { RepositoriesService, RepositoryEndpoints } from './repositories.js';
export { IssuesService, IssueEndpoints } from './issues.js';
export { PullRequestsService, PullRequestEndpoints } from './pullRequests.js';
export { ReleasesService, ReleaseEndpoints } from './releases.js';
export { UsersService, UserEndpoints } from './users.js';
export { SearchService, SearchEndpoints } from './search.js';
export { compact, segment } from './shared.js';

// Export types from repositories service
export type {
  ListReposParams,
  ListAuthenticatedReposParams,
  CreateRepoRequest,
  UpdateRepoRequest,
  ForkRequest,
  ListContributorsParams,
  ListBranchesParams,
} from './repositories.js';

// Export types from issues service
export type { ListIssuesParams, CreateIssueRequest, UpdateIssueRequest, LockReason } from './issues.js';

// Export types from pull requests service
export type {
  ListPullRequestsParams,
  CreatePullRequestRequest,
  UpdatePullRequestRequest,
  MergeMethod,
  MergePullRequestRequest,
  ReviewEvent,
  ReviewComment,
  CreateReviewRequest,
  RequestReviewersRequest,
} from './pullRequests.js';

// Export types from releases service
export type { CreateReleaseRequest, UpdateReleaseRequest, AssetSource } from './releases.js';

// Export types from users service
export type { UpdateUserRequest } from './users.js';

// Export types from search service
export type { SearchKind, SearchOptions, SearchPageOptions } from './search.js';

export type { PageParams } from './shared.js';
