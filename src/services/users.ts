/**
 * GitHub Users Service
 * Provides access to GitHub users, emails, SSH keys, GPG keys, and followers
 *
 * @module services/users
 */

import type { ApiContext } from '../context.js';
import { mapItems, mapSteps, probe, type Engine, type ItemSteps, type Steps } from '../engine.js';
import { User } from '../models.js';
import type { JsonObject, Mode, Result, Stream } from '../types.js';
import { compact, nothing, object, objects, type PageParams } from './shared.js';

export interface UpdateUserRequest {
  name?: string;
  email?: string;
  blog?: string;
  twitter_username?: string;
  company?: string;
  location?: string;
  hireable?: boolean;
  bio?: string;
}

/**
 * Step builders for user endpoints.
 */
export class UserEndpoints {
  constructor(private readonly engine: Engine) {}

  get(username: string): Steps<JsonObject> {
    return object(this.engine.perform('GET', `/users/${username}`), 'user');
  }

  getAuthenticated(): Steps<JsonObject> {
    return object(this.engine.perform('GET', '/user'), 'user');
  }

  updateAuthenticated(request: UpdateUserRequest): Steps<JsonObject> {
    return object(this.engine.perform('PATCH', '/user', { body: compact({ ...request }) }), 'user');
  }

  listFollowers(username: string, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/users/${username}/followers`, params.per_page);
  }

  listFollowing(username: string, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/users/${username}/following`, params.per_page);
  }

  isFollowing(username: string, target: string): Steps<boolean> {
    return probe(this.engine.perform('GET', `/users/${username}/following/${target}`));
  }

  follow(username: string): Steps<void> {
    return nothing(this.engine.perform('PUT', `/user/following/${username}`));
  }

  unfollow(username: string): Steps<void> {
    return nothing(this.engine.perform('DELETE', `/user/following/${username}`));
  }

  listEmails(): Steps<JsonObject[]> {
    return objects(this.engine.perform('GET', '/user/emails'), 'emails');
  }

  addEmails(emails: string[]): Steps<JsonObject[]> {
    return objects(this.engine.perform('POST', '/user/emails', { body: { emails } }), 'emails');
  }

  deleteEmails(emails: string[]): Steps<void> {
    return nothing(this.engine.perform('DELETE', '/user/emails', { body: { emails } }));
  }

  listSshKeys(username: string, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/users/${username}/keys`, params.per_page);
  }

  listGpgKeys(username: string, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/users/${username}/gpg_keys`, params.per_page);
  }
}

/**
 * Service for GitHub users and the authenticated account
 */
export class UsersService<M extends Mode> {
  constructor(private readonly api: ApiContext<M>) {}

  private get endpoints(): UserEndpoints {
    return this.api.endpoints.users;
  }

  /**
   * Get a user by username
   */
  get(username: string): Result<M, User> {
    return this.api.driver.run(mapSteps(this.endpoints.get(username), (raw) => User.fromRaw(raw)));
  }

  /**
   * Get the authenticated user
   */
  getAuthenticated(): Result<M, User> {
    return this.api.driver.run(mapSteps(this.endpoints.getAuthenticated(), (raw) => User.fromRaw(raw)));
  }

  updateAuthenticated(request: UpdateUserRequest): Result<M, User> {
    return this.api.driver.run(mapSteps(this.endpoints.updateAuthenticated(request), (raw) => User.fromRaw(raw)));
  }

  listFollowers(username: string, params?: PageParams): Stream<M, User> {
    return this.api.driver.stream(mapItems(this.endpoints.listFollowers(username, params), (raw) => User.fromRaw(raw)));
  }

  listFollowing(username: string, params?: PageParams): Stream<M, User> {
    return this.api.driver.stream(mapItems(this.endpoints.listFollowing(username, params), (raw) => User.fromRaw(raw)));
  }

  /**
   * Check if a user follows another user
   */
  isFollowing(username: string, target: string): Result<M, boolean> {
    return this.api.driver.run(this.endpoints.isFollowing(username, target));
  }

  follow(username: string): Result<M, void> {
    return this.api.driver.run(this.endpoints.follow(username));
  }

  unfollow(username: string): Result<M, void> {
    return this.api.driver.run(this.endpoints.unfollow(username));
  }

  // Emails

  listEmails(): Result<M, JsonObject[]> {
    return this.api.driver.run(this.endpoints.listEmails());
  }

  addEmails(emails: string[]): Result<M, JsonObject[]> {
    return this.api.driver.run(this.endpoints.addEmails(emails));
  }

  deleteEmails(emails: string[]): Result<M, void> {
    return this.api.driver.run(this.endpoints.deleteEmails(emails));
  }

  // Keys

  listSshKeys(username: string, params?: PageParams): Stream<M, JsonObject> {
    return this.api.driver.stream(this.endpoints.listSshKeys(username, params));
  }

  listGpgKeys(username: string, params?: PageParams): Stream<M, JsonObject> {
    return this.api.driver.stream(this.endpoints.listGpgKeys(username, params));
  }
}
