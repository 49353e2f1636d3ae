/**
 * GitHub REST client library
 *
 * A typed GitHub REST API client with:
 * - Repositories, issues, pull requests, releases, users and search
 * - Typed models that can act on themselves (`issue.close()`, `pr.merge()`)
 * - Lazy pagination
 * - Optional waiting on rate limits
 * - Token discovery from the environment, the gh CLI and hosts.yml
 * - Promise-based and blocking clients
 *
 * @example
 * ```typescript
 * import { createClient } from 'github-rest-kit';
 *
 * const client = await createClient({ autoRetry: true });
 * const repo = client.repo('octocat/hello-world');
 *
 * for await (const issue of repo.issues.list({ state: 'open' })) {
 *   console.log(issue.number, issue.title);
 * }
 *
 * await client.close();
 * ```
 *
 * @module github-rest-kit
 */

// Core modules
export * from './config.js';
export * from './errors.js';
export * from './auth.js';
export * from './client.js';
export * from './repo.js';
export * from './models.js';
export * from './pagination.js';
export * from './resilience.js';
export * from './types.js';
export * from './observability.js';

// Request execution
export { Engine, buildUrl } from './engine.js';
export type { RequestOptions, SearchParams, UploadRequest, EngineSettings, Steps, ItemSteps } from './engine.js';
export * from './drivers.js';
export * from './transport.js';
export * from './transport-sync.js';
export type { ApiContext, RepoContext, Endpoints } from './context.js';

// Services
export * from './services/index.js';
