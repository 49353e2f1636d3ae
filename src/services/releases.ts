/**
 * GitHub Releases Service
 *
 * Releases and their assets. Asset uploads go to the upload host rather
 * than the API host.
 *
 * @module services/releases
 */

import { basename } from 'node:path';
import type { ApiContext } from '../context.js';
import { mapItems, mapSteps, type Engine, type ItemSteps, type Steps } from '../engine.js';
import { Release, ReleaseAsset } from '../models.js';
import type { JsonObject, Mode, Result, Stream } from '../types.js';
import { compact, nothing, object, segment, type PageParams } from './shared.js';

/**
 * Request to create a release
 */
export interface CreateReleaseRequest {
  /** Tag to create or reference */
  tag_name: string;
  /** Branch or commit the tag is created from */
  target_commitish?: string;
  name?: string;
  body?: string;
  draft?: boolean;
  prerelease?: boolean;
  generate_release_notes?: boolean;
}

/**
 * Request to update a release
 */
export interface UpdateReleaseRequest {
  tag_name?: string;
  target_commitish?: string;
  name?: string;
  body?: string;
  draft?: boolean;
  prerelease?: boolean;
}

/**
 * Bytes to upload as a release asset, given either as a file path or as
 * in-memory data.
 */
export type AssetSource =
  | {
      /** Path of the file to upload */
      file: string;
      /** Asset name; defaults to the file's base name */
      name?: string;
      contentType?: string;
    }
  | {
      data: Uint8Array;
      name: string;
      contentType?: string;
    };

const DEFAULT_ASSET_CONTENT_TYPE = 'application/octet-stream';

/**
 * Step builders for release endpoints.
 */
export class ReleaseEndpoints {
  constructor(private readonly engine: Engine) {}

  list(owner: string, repo: string, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/releases`, params.per_page);
  }

  get(owner: string, repo: string, releaseId: number): Steps<JsonObject> {
    return object(this.engine.perform('GET', `/repos/${owner}/${repo}/releases/${releaseId}`), 'release');
  }

  getLatest(owner: string, repo: string): Steps<JsonObject> {
    return object(this.engine.perform('GET', `/repos/${owner}/${repo}/releases/latest`), 'release');
  }

  getByTag(owner: string, repo: string, tag: string): Steps<JsonObject> {
    return object(
      this.engine.perform('GET', `/repos/${owner}/${repo}/releases/tags/${segment(tag)}`),
      'release'
    );
  }

  create(owner: string, repo: string, request: CreateReleaseRequest): Steps<JsonObject> {
    const body = compact({
      ...request,
      draft: request.draft ?? false,
      prerelease: request.prerelease ?? false,
      generate_release_notes: request.generate_release_notes ?? false,
    });
    return object(this.engine.perform('POST', `/repos/${owner}/${repo}/releases`, { body }), 'release');
  }

  update(owner: string, repo: string, releaseId: number, request: UpdateReleaseRequest): Steps<JsonObject> {
    return object(
      this.engine.perform('PATCH', `/repos/${owner}/${repo}/releases/${releaseId}`, {
        body: compact({ ...request }),
      }),
      'release'
    );
  }

  delete(owner: string, repo: string, releaseId: number): Steps<void> {
    return nothing(this.engine.perform('DELETE', `/repos/${owner}/${repo}/releases/${releaseId}`));
  }

  listAssets(owner: string, repo: string, releaseId: number, params: PageParams = {}): ItemSteps<JsonObject> {
    return this.engine.paginate('GET', `/repos/${owner}/${repo}/releases/${releaseId}/assets`, params.per_page);
  }

  getAsset(owner: string, repo: string, assetId: number): Steps<JsonObject> {
    return object(this.engine.perform('GET', `/repos/${owner}/${repo}/releases/assets/${assetId}`), 'asset');
  }

  deleteAsset(owner: string, repo: string, assetId: number): Steps<void> {
    return nothing(this.engine.perform('DELETE', `/repos/${owner}/${repo}/releases/assets/${assetId}`));
  }

  uploadAsset(owner: string, repo: string, releaseId: number, source: AssetSource): Steps<JsonObject> {
    const contentType = source.contentType ?? DEFAULT_ASSET_CONTENT_TYPE;
    const upload =
      'file' in source
        ? { data: { file: source.file }, name: source.name ?? basename(source.file) }
        : { data: source.data, name: source.name };
    return object(
      this.engine.upload({
        path: `/repos/${owner}/${repo}/releases/${releaseId}/assets`,
        contentType,
        ...upload,
      }),
      'asset upload'
    );
  }
}

/**
 * Service for managing releases
 *
 * @example
 * ```typescript
 * const release = await client.releases.create('octocat', 'hello-world', { tag_name: 'v1.0.0' });
 * await client.releases.uploadAsset('octocat', 'hello-world', release.id, { file: './dist/app.tar.gz' });
 * ```
 */
export class ReleasesService<M extends Mode> {
  constructor(private readonly api: ApiContext<M>) {}

  private get endpoints(): ReleaseEndpoints {
    return this.api.endpoints.releases;
  }

  list(owner: string, repo: string, params?: PageParams): Stream<M, Release> {
    return this.api.driver.stream(mapItems(this.endpoints.list(owner, repo, params), (raw) => Release.fromRaw(raw)));
  }

  get(owner: string, repo: string, releaseId: number): Result<M, Release> {
    return this.api.driver.run(mapSteps(this.endpoints.get(owner, repo, releaseId), (raw) => Release.fromRaw(raw)));
  }

  getLatest(owner: string, repo: string): Result<M, Release> {
    return this.api.driver.run(mapSteps(this.endpoints.getLatest(owner, repo), (raw) => Release.fromRaw(raw)));
  }

  getByTag(owner: string, repo: string, tag: string): Result<M, Release> {
    return this.api.driver.run(mapSteps(this.endpoints.getByTag(owner, repo, tag), (raw) => Release.fromRaw(raw)));
  }

  create(owner: string, repo: string, request: CreateReleaseRequest): Result<M, Release> {
    return this.api.driver.run(mapSteps(this.endpoints.create(owner, repo, request), (raw) => Release.fromRaw(raw)));
  }

  update(owner: string, repo: string, releaseId: number, request: UpdateReleaseRequest): Result<M, Release> {
    return this.api.driver.run(
      mapSteps(this.endpoints.update(owner, repo, releaseId, request), (raw) => Release.fromRaw(raw))
    );
  }

  delete(owner: string, repo: string, releaseId: number): Result<M, void> {
    return this.api.driver.run(this.endpoints.delete(owner, repo, releaseId));
  }

  listAssets(owner: string, repo: string, releaseId: number, params?: PageParams): Stream<M, ReleaseAsset> {
    return this.api.driver.stream(
      mapItems(this.endpoints.listAssets(owner, repo, releaseId, params), (raw) => ReleaseAsset.fromRaw(raw))
    );
  }

  getAsset(owner: string, repo: string, assetId: number): Result<M, ReleaseAsset> {
    return this.api.driver.run(
      mapSteps(this.endpoints.getAsset(owner, repo, assetId), (raw) => ReleaseAsset.fromRaw(raw))
    );
  }

  /**
   * Upload a release asset
   *
   * The request is sent once; rate-limited uploads are not retried.
   */
  uploadAsset(owner: string, repo: string, releaseId: number, source: AssetSource): Result<M, ReleaseAsset> {
    return this.api.driver.run(
      mapSteps(this.endpoints.uploadAsset(owner, repo, releaseId, source), (raw) => ReleaseAsset.fromRaw(raw))
    );
  }

  deleteAsset(owner: string, repo: string, assetId: number): Result<M, void> {
    return this.api.driver.run(this.endpoints.deleteAsset(owner, repo, assetId));
  }
}
