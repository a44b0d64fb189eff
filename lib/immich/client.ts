import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { addDays, addHours } from 'date-fns';
import type { z } from 'zod';
import { DestinationApiError, type DestinationErrorKind } from '../errors';
import { log } from '../logger';
import { RetryPolicy } from '../retry';
import { hasTimeOfDay } from '../scraper/dates';
import {
  AlbumSchema,
  AssetSchema,
  BulkIdResultSchema,
  ErrorBodySchema,
  SearchResultSchema,
  TagSchema,
  UserSchema,
  type BulkIdResult,
  type ImmichAlbum,
  type ImmichAsset,
} from './schemas';

// ============================================
// DESTINATION MODEL
// ============================================

export interface DestinationUser {
  id: string;
  email: string;
  name: string;
}

export interface DestinationAlbum {
  id: string;
  albumName: string;
  description: string | null;
  ownerId: string;
  /** Users the album is shared with, owner excluded */
  memberIds: string[];
  /** Empty in album listings; filled by getAlbum */
  assetIds: string[];
  assetCount: number;
}

export interface DestinationAsset {
  id: string;
  ownerId: string;
  originalFileName: string;
  takenAt: string | null;
  tagIds: string[];
}

export interface DestinationTag {
  id: string;
  name: string;
}

export interface CreateUserInput {
  email: string;
  name: string;
  password: string;
}

export interface CreateAlbumInput {
  albumName: string;
  description?: string;
  /** Honoured by servers that allow creating albums on behalf of a user */
  ownerId?: string;
  memberIds?: string[];
}

export interface AssetQuery {
  filename: string;
  /** `yyyy-MM-dd` or `yyyy-MM-ddTHH:mm:ss` */
  takenAt: string | null;
}

export type AlbumRole = 'editor' | 'viewer';

/** Operations the reconciler issues; implemented over HTTP by ImmichClient */
export interface DestinationApi {
  createUser(input: CreateUserInput): Promise<DestinationUser>;
  updateUser(id: string, patch: { email?: string; name?: string }): Promise<DestinationUser>;
  listUsers(): Promise<DestinationUser[]>;

  createAlbum(input: CreateAlbumInput): Promise<DestinationAlbum>;
  updateAlbum(id: string, patch: { albumName?: string; description?: string }): Promise<DestinationAlbum>;
  addAlbumMembers(id: string, userIds: string[], role?: AlbumRole): Promise<void>;
  addAlbumAssets(id: string, assetIds: string[]): Promise<BulkIdResult[]>;
  /** Owned and shared albums; `shared` narrows to one side */
  listAlbums(options?: { shared?: boolean }): Promise<DestinationAlbum[]>;
  getAlbum(id: string): Promise<DestinationAlbum | null>;

  getAsset(id: string): Promise<DestinationAsset | null>;
  findAsset(query: AssetQuery): Promise<DestinationAsset | null>;
  reassignAssetOwner(assetId: string, ownerId: string): Promise<DestinationAsset>;

  listTags(): Promise<DestinationTag[]>;
  createTag(name: string): Promise<DestinationTag>;
  setTags(tagId: string, assetIds: string[]): Promise<BulkIdResult[]>;
  getTagAssets(tagId: string): Promise<string[]>;
  deleteTag(tagId: string): Promise<void>;
}

export interface ImmichClientOptions {
  endpoint: string;
  apiKey: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
  /** Passed to axios; tests replace the transport with it */
  adapter?: AxiosRequestConfig['adapter'];
}

const SEARCH_PAGE_SIZE = 250;
const TIME_WINDOW_HOURS = 2;

function toAlbum(album: ImmichAlbum): DestinationAlbum {
  return {
    id: album.id,
    albumName: album.albumName,
    description: album.description ?? null,
    ownerId: album.ownerId,
    memberIds: album.albumUsers.map(member => member.user.id).filter(id => id !== album.ownerId),
    assetIds: album.assets.map(asset => asset.id),
    assetCount: album.assetCount ?? album.assets.length,
  };
}

function toAsset(asset: ImmichAsset): DestinationAsset {
  return {
    id: asset.id,
    ownerId: asset.ownerId,
    originalFileName: asset.originalFileName,
    takenAt: asset.localDateTime ?? asset.fileCreatedAt ?? null,
    tagIds: (asset.tags ?? []).map(tag => tag.id),
  };
}

export function classifyStatus(status: number): DestinationErrorKind {
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'transient_network';
  if (status === 409) return 'conflict';
  if (status === 400 || status === 422) return 'validation';
  if (status === 404) return 'not_found';
  if (status === 401 || status === 403) return 'auth';
  return 'unknown';
}

/** Seconds from a Retry-After header (delta-seconds or HTTP date) */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds);
  const date = Date.parse(String(value));
  if (Number.isNaN(date)) return null;
  return Math.max(0, Math.ceil((date - now) / 1000));
}

export function toDestinationError(operation: string, error: unknown): DestinationApiError {
  if (error instanceof DestinationApiError) return error;

  if (axios.isAxiosError(error)) {
    const response = error.response;
    if (!response) {
      return new DestinationApiError(operation, 'transient_network', error.message, null, null, { cause: error });
    }
    const body = ErrorBodySchema.safeParse(response.data);
    const detail = body.success && body.data.message !== undefined
      ? [body.data.message].flat().join('; ')
      : error.message;
    return new DestinationApiError(
      operation,
      classifyStatus(response.status),
      detail,
      response.status,
      parseRetryAfter(response.headers['retry-after']),
      { cause: error }
    );
  }

  return new DestinationApiError(operation, 'unknown', error instanceof Error ? error.message : String(error), null, null, { cause: error });
}

function isRetryable(error: unknown): boolean {
  return error instanceof DestinationApiError && (error.kind === 'rate_limited' || error.kind === 'transient_network');
}

/**
 * The Immich REST API over axios. Rate limits and transient failures are
 * retried here; every other failure surfaces as a DestinationApiError.
 */
export class ImmichClient implements DestinationApi {
  private readonly http: AxiosInstance;
  private readonly retry: RetryPolicy;

  constructor(options: ImmichClientOptions) {
    this.http = axios.create({
      baseURL: `${options.endpoint.replace(/\/+$/, '')}/api`,
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'x-api-key': options.apiKey,
        Accept: 'application/json',
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
    this.retry = (options.retry ?? new RetryPolicy({ maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 30000 })).with({
      retryOn: isRetryable,
      delayFor: error => (error instanceof DestinationApiError && error.retryAfter !== null ? error.retryAfter * 1000 : null),
      scope: 'immich',
    });
  }

  private async request<S extends z.ZodTypeAny>(
    operation: string,
    config: AxiosRequestConfig,
    schema: S
  ): Promise<z.output<S>> {
    const data = await this.retry.run(async () => {
      try {
        const response = await this.http.request<unknown>(config);
        return response.data;
      } catch (error) {
        throw toDestinationError(operation, error);
      }
    }, operation);

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DestinationApiError(
        operation,
        'unknown',
        `Unexpected response shape${issue ? ` at ${issue.path.join('.') || '<root>'}: ${issue.message}` : ''}`
      );
    }
    return parsed.data;
  }

  private async requestVoid(operation: string, config: AxiosRequestConfig): Promise<void> {
    await this.retry.run(async () => {
      try {
        await this.http.request<unknown>(config);
      } catch (error) {
        throw toDestinationError(operation, error);
      }
    }, operation);
  }

  /** Resolves to null on 404 */
  private async maybe<T>(fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof DestinationApiError && error.kind === 'not_found') return null;
      throw error;
    }
  }

  // ============================================
  // USERS
  // ============================================

  async createUser(input: CreateUserInput): Promise<DestinationUser> {
    log.debug('immich', 'Creating user', { email: input.email });
    return this.request('create-user', {
      method: 'POST',
      url: '/admin/users',
      data: { email: input.email, name: input.name, password: input.password, shouldChangePassword: true },
    }, UserSchema);
  }

  async updateUser(id: string, patch: { email?: string; name?: string }): Promise<DestinationUser> {
    return this.request('update-user', { method: 'PUT', url: `/admin/users/${id}`, data: patch }, UserSchema);
  }

  async listUsers(): Promise<DestinationUser[]> {
    return this.request('list-users', { method: 'GET', url: '/users' }, UserSchema.array());
  }

  // ============================================
  // ALBUMS
  // ============================================

  async createAlbum(input: CreateAlbumInput): Promise<DestinationAlbum> {
    const album = await this.request('create-album', {
      method: 'POST',
      url: '/albums',
      data: {
        albumName: input.albumName,
        ...(input.description !== undefined ? { description: input.description } : {}),
        ...(input.ownerId !== undefined ? { ownerId: input.ownerId } : {}),
        ...(input.memberIds && input.memberIds.length > 0
          ? { albumUsers: input.memberIds.map(userId => ({ userId, role: 'editor' })) }
          : {}),
      },
    }, AlbumSchema);
    return toAlbum(album);
  }

  async updateAlbum(id: string, patch: { albumName?: string; description?: string }): Promise<DestinationAlbum> {
    return toAlbum(await this.request('update-album', { method: 'PATCH', url: `/albums/${id}`, data: patch }, AlbumSchema));
  }

  async addAlbumMembers(id: string, userIds: string[], role: AlbumRole = 'editor'): Promise<void> {
    if (userIds.length === 0) return;
    await this.requestVoid('add-album-members', {
      method: 'PUT',
      url: `/albums/${id}/users`,
      data: { albumUsers: userIds.map(userId => ({ userId, role })) },
    });
  }

  async addAlbumAssets(id: string, assetIds: string[]): Promise<BulkIdResult[]> {
    if (assetIds.length === 0) return [];
    return this.request('add-album-assets', {
      method: 'PUT',
      url: `/albums/${id}/assets`,
      data: { ids: assetIds },
    }, BulkIdResultSchema.array());
  }

  async listAlbums(options: { shared?: boolean } = {}): Promise<DestinationAlbum[]> {
    if (options.shared !== undefined) {
      const albums = await this.request(
        'list-albums',
        { method: 'GET', url: '/albums', params: { shared: options.shared } },
        AlbumSchema.array()
      );
      return albums.map(toAlbum);
    }

    const [owned, shared] = await Promise.all([
      this.request('list-albums', { method: 'GET', url: '/albums' }, AlbumSchema.array()),
      this.request('list-albums', { method: 'GET', url: '/albums', params: { shared: true } }, AlbumSchema.array()),
    ]);
    const byId = new Map<string, DestinationAlbum>();
    for (const album of [...owned, ...shared]) {
      byId.set(album.id, toAlbum(album));
    }
    return [...byId.values()];
  }

  async getAlbum(id: string): Promise<DestinationAlbum | null> {
    return this.maybe(async () =>
      toAlbum(await this.request('get-album', { method: 'GET', url: `/albums/${id}` }, AlbumSchema))
    );
  }

  // ============================================
  // ASSETS
  // ============================================

  async getAsset(id: string): Promise<DestinationAsset | null> {
    return this.maybe(async () =>
      toAsset(await this.request('get-asset', { method: 'GET', url: `/assets/${id}` }, AssetSchema))
    );
  }

  /**
   * Find an asset by original filename, inside a capture-time window: two
   * hours either side when the time is known, the whole day otherwise.
   */
  async findAsset(query: AssetQuery): Promise<DestinationAsset | null> {
    const body: Record<string, unknown> = { originalFileName: query.filename, size: SEARCH_PAGE_SIZE };

    if (query.takenAt) {
      const takenAt = new Date(`${hasTimeOfDay(query.takenAt) ? query.takenAt : `${query.takenAt}T00:00:00`}Z`);
      if (!Number.isNaN(takenAt.getTime())) {
        if (hasTimeOfDay(query.takenAt)) {
          body.takenAfter = addHours(takenAt, -TIME_WINDOW_HOURS).toISOString();
          body.takenBefore = addHours(takenAt, TIME_WINDOW_HOURS).toISOString();
        } else {
          body.takenAfter = takenAt.toISOString();
          body.takenBefore = addDays(takenAt, 1).toISOString();
        }
      }
    }

    const result = await this.request('find-asset', { method: 'POST', url: '/search/metadata', data: body }, SearchResultSchema);
    const wanted = query.filename.toLowerCase();
    const matches = result.assets.items
      .filter(asset => asset.originalFileName.toLowerCase() === wanted)
      .map(toAsset);
    if (matches.length <= 1 || !query.takenAt) return matches[0] ?? null;

    const target = Date.parse(`${query.takenAt}Z`);
    const distance = (asset: DestinationAsset): number => {
      const at = asset.takenAt ? Date.parse(asset.takenAt) : Number.NaN;
      return Number.isNaN(at) || Number.isNaN(target) ? Number.POSITIVE_INFINITY : Math.abs(at - target);
    };
    return matches.reduce((best, asset) => (distance(asset) < distance(best) ? asset : best));
  }

  async reassignAssetOwner(assetId: string, ownerId: string): Promise<DestinationAsset> {
    return toAsset(await this.request('reassign-asset-owner', {
      method: 'PUT',
      url: `/assets/${assetId}`,
      data: { ownerId },
    }, AssetSchema));
  }

  // ============================================
  // TAGS
  // ============================================

  async listTags(): Promise<DestinationTag[]> {
    return this.request('list-tags', { method: 'GET', url: '/tags' }, TagSchema.array());
  }

  async createTag(name: string): Promise<DestinationTag> {
    return this.request('create-tag', { method: 'POST', url: '/tags', data: { name } }, TagSchema);
  }

  async setTags(tagId: string, assetIds: string[]): Promise<BulkIdResult[]> {
    if (assetIds.length === 0) return [];
    return this.request('set-tag-assets', {
      method: 'PUT',
      url: `/tags/${tagId}/assets`,
      data: { ids: assetIds },
    }, BulkIdResultSchema.array());
  }

  async getTagAssets(tagId: string): Promise<string[]> {
    const ids: string[] = [];
    let page: string | null = '1';
    while (page) {
      const result: z.output<typeof SearchResultSchema> = await this.request('get-tag-assets', {
        method: 'POST',
        url: '/search/metadata',
        data: { tagIds: [tagId], size: SEARCH_PAGE_SIZE, page: Number(page) },
      }, SearchResultSchema);
      ids.push(...result.assets.items.map(asset => asset.id));
      page = result.assets.nextPage ?? null;
    }
    return ids;
  }

  async deleteTag(tagId: string): Promise<void> {
    await this.requestVoid('delete-tag', { method: 'DELETE', url: `/tags/${tagId}` });
  }
}
