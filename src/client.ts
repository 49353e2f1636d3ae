/**
 * GitHub API Client
 *
 * Main client implementation for the GitHub REST API with support for:
 * - Token discovery (environment, gh CLI, hosts.yml)
 * - Lazy pagination
 * - Optional waiting and retrying on rate limits
 * - Promise-based and blocking modes over the same request logic
 *
 * @module client
 */

import { resolveToken, resolveTokenSync, SecretString, type SyncCommandRunner, type TokenSourceOptions } from './auth.js';
import { createConfig, type GitHubConfig, type GitHubConfigInput } from './config.js';
import type { ApiContext, Endpoints } from './context.js';
import {
  AsyncDriver,
  SyncDriver,
  type Driver,
  type FileLoader,
  type FileLoaderSync,
  type Sleep,
  type SleepSync,
} from './drivers.js';
import { Engine, type RequestOptions } from './engine.js';
import { Repo } from './repo.js';
import {
  IssueEndpoints,
  IssuesService,
  PullRequestEndpoints,
  PullRequestsService,
  ReleaseEndpoints,
  ReleasesService,
  RepositoriesService,
  RepositoryEndpoints,
  SearchEndpoints,
  SearchService,
  UserEndpoints,
  UsersService,
} from './services/index.js';
import { object } from './services/shared.js';
import { UndiciTransport, type SyncTransport, type Transport } from './transport.js';
import { WorkerSyncTransport } from './transport-sync.js';
import type { HttpMethod, JsonObject, JsonValue, Mode, QueryParams, Result, Stream } from './types.js';

/**
 * Options for {@link GitHubClient.paginate}
 */
export interface PaginateOptions {
  /** Results per page (default 30, max 100) */
  per_page?: number;
  /** Extra query parameters */
  query?: QueryParams;
}

/**
 * Options for {@link createClient}
 */
export interface ClientOptions extends GitHubConfigInput {
  /** Transport to send requests through (defaults to {@link UndiciTransport}) */
  transport?: Transport;
  /** Backoff sleep, replaceable in tests */
  sleep?: Sleep;
  /** Loader for release asset files */
  readFile?: FileLoader;
  /** Overrides for token discovery */
  tokenSources?: TokenSourceOptions;
}

/**
 * Options for {@link createSyncClient}
 */
export interface SyncClientOptions extends GitHubConfigInput {
  /** Transport to send requests through (defaults to {@link WorkerSyncTransport}) */
  transport?: SyncTransport;
  sleep?: SleepSync;
  readFile?: FileLoaderSync;
  tokenSources?: TokenSourceOptions<SyncCommandRunner>;
}

/**
 * GitHub API client
 *
 * `GitHubClient<'async'>` returns promises and async iterators;
 * `GitHubClient<'sync'>` returns plain values and iterators. The client
 * must outlive every model it returns.
 */
export class GitHubClient<M extends Mode> {
  readonly repos: RepositoriesService<M>;
  readonly issues: IssuesService<M>;
  readonly pulls: PullRequestsService<M>;
  readonly users: UsersService<M>;
  readonly search: SearchService<M>;
  readonly releases: ReleasesService<M>;

  private readonly config: GitHubConfig;
  private readonly engine: Engine;
  private readonly api: ApiContext<M>;

  constructor(driver: Driver<M>, config: GitHubConfig, token?: string) {
    this.config = config;
    this.engine = new Engine({
      baseUrl: config.baseUrl,
      uploadUrl: config.uploadUrl,
      apiVersion: config.apiVersion,
      userAgent: config.userAgent,
      timeout: config.timeout,
      token: token ? new SecretString(token) : undefined,
      autoRetry: config.autoRetry,
      maxRetries: config.maxRetries,
      retrySearch: config.retrySearch,
      logger: config.logger,
    });

    const endpoints: Endpoints = {
      repos: new RepositoryEndpoints(this.engine),
      issues: new IssueEndpoints(this.engine),
      pulls: new PullRequestEndpoints(this.engine),
      users: new UserEndpoints(this.engine),
      search: new SearchEndpoints(this.engine),
      releases: new ReleaseEndpoints(this.engine),
    };
    this.api = { driver, endpoints };

    this.repos = new RepositoriesService(this.api);
    this.issues = new IssuesService(this.api);
    this.pulls = new PullRequestsService(this.api);
    this.users = new UsersService(this.api);
    this.search = new SearchService(this.api);
    this.releases = new ReleasesService(this.api);
  }

  get mode(): M {
    return this.api.driver.mode;
  }

  /** Whether requests carry a token */
  get authenticated(): boolean {
    return this.engine.authenticated;
  }

  /**
   * Get the client configuration
   */
  getConfig(): Readonly<GitHubConfig> {
    return { ...this.config };
  }

  /**
   * Make a raw API request
   *
   * @returns The parsed JSON body, or `undefined` for empty responses
   *
   * @example
   * ```typescript
   * const meta = await client.request('GET', '/meta');
   * ```
   */
  request(method: HttpMethod, path: string, options?: RequestOptions): Result<M, JsonValue | undefined> {
    return this.api.driver.run(this.engine.perform(method, path, options));
  }

  /**
   * Lazily iterate a list endpoint
   */
  paginate(path: string, options: PaginateOptions = {}): Stream<M, JsonObject> {
    return this.api.driver.stream(this.engine.paginate('GET', path, options.per_page, { query: options.query }));
  }

  /**
   * Current rate limit status (`GET /rate_limit`)
   */
  rateLimit(): Result<M, JsonObject> {
    return this.api.driver.run(object(this.engine.perform('GET', '/rate_limit'), '/rate_limit'));
  }

  /**
   * Bind to one repository
   *
   * @param owner - Owner login, or `owner/name` when `name` is omitted
   */
  repo(owner: string, name?: string): Repo<M> {
    if (name !== undefined) {
      return new Repo(this.api, owner, name);
    }
    const parts = owner.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new TypeError(`Expected "owner/name", got "${owner}"`);
    }
    return new Repo(this.api, parts[0], parts[1]);
  }

  /**
   * Release the transport
   */
  close(): Result<M, void> {
    return this.api.driver.close();
  }
}

/**
 * Create a promise-based client
 *
 * A `token` of `undefined` triggers discovery; `null` sends no token.
 *
 * @example
 * ```typescript
 * const client = await createClient({ autoRetry: true });
 * const repo = await client.repos.get('octocat', 'hello-world');
 * await client.close();
 * ```
 */
export async function createClient(options: ClientOptions = {}): Promise<GitHubClient<'async'>> {
  const { transport, sleep, readFile, tokenSources, ...input } = options;
  const config = createConfig(input);
  const token =
    config.token === undefined
      ? await resolveToken(config.hostname, { logger: config.logger, ...tokenSources })
      : config.token ?? undefined;
  const driver = new AsyncDriver(transport ?? new UndiciTransport(), { sleep, readFile });
  return new GitHubClient(driver, config, token);
}

/**
 * Create a blocking client
 *
 * @example
 * ```typescript
 * const client = createSyncClient();
 * for (const issue of client.repo('octocat/hello-world').issues.list()) {
 *   console.log(issue.title);
 * }
 * client.close();
 * ```
 */
export function createSyncClient(options: SyncClientOptions = {}): GitHubClient<'sync'> {
  const { transport, sleep, readFile, tokenSources, ...input } = options;
  const config = createConfig(input);
  const token =
    config.token === undefined
      ? resolveTokenSync(config.hostname, { logger: config.logger, ...tokenSources })
      : config.token ?? undefined;
  const driver = new SyncDriver(transport ?? new WorkerSyncTransport({ logger: config.logger }), {
    sleep,
    readFile,
  });
  return new GitHubClient(driver, config, token);
}

/**
 * Run `fn` with a client that is closed afterwards, whether `fn` resolves
 * or throws.
 */
export async function withClient<T>(
  options: ClientOptions,
  fn: (client: GitHubClient<'async'>) => Promise<T>
): Promise<T> {
  const client = await createClient(options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

/**
 * Blocking counterpart of {@link withClient}.
 */
export function withSyncClient<T>(options: SyncClientOptions, fn: (client: GitHubClient<'sync'>) => T): T {
  const client = createSyncClient(options);
  try {
    return fn(client);
  } finally {
    client.close();
  }
}
