import { ExtractionSchemaError } from '../errors';
import { log } from '../logger';
import type { RetryPolicy } from '../retry';
import { albumSourceIdFromUrl, assetSourceIdFromUrl, normalizeName, userSourceId } from '../identity';
import type {
  AlbumAssetRecord,
  AlbumRecord,
  AssetRecord,
  MediaType,
  SavedFlag,
  UserRecord,
} from '../types';
import { parseTakenAt } from './dates';
import type { FieldValue, ListingItem, PageHandle } from './page-navigator';
import type { AccountIdentity } from './session-manager';
import { ALBUM_ASSETS, ALBUM_DETAIL, ALBUM_LIST, ASSET_INFO, SHARING_MEMBERS } from './selectors';

export interface ExtractorContext {
  baseUrl: string;
  account: AccountIdentity | null;
  retry: RetryPolicy;
  /** Source id of an already known user with this display name */
  resolveUser?: (displayName: string) => string | null;
}

/** Records of one extraction plus where to continue (null when complete) */
export interface ExtractionResult<R> {
  records: R[];
  continuation: string | null;
}

export interface AssetRef {
  sourceId: string;
  mediaType: MediaType;
  position: number;
}

export interface AlbumDetailResult extends ExtractionResult<AlbumRecord | AlbumAssetRecord> {
  assets: AssetRef[];
}

function text(value: FieldValue | undefined): string | null {
  if (value === undefined || value === null) return null;
  if (Array.isArray(value)) return value[0] ?? null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function list(value: FieldValue | undefined): string[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function lines(value: string | null): string[] {
  if (!value) return [];
  return value
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

function absoluteUrl(baseUrl: string, href: string): string {
  return new URL(href.replace(/^\.\//, '/'), `${baseUrl}/`).toString();
}

/** "12 items · Shared" -> 12 */
export function parseItemCount(description: string | null): number | null {
  if (!description) return null;
  const match = description.match(/([\d,.]+)\s+items?\b/i);
  if (!match?.[1]) return null;
  const count = Number.parseInt(match[1].replace(/[,.]/g, ''), 10);
  return Number.isFinite(count) ? count : null;
}

function accountUser(account: AccountIdentity): UserRecord {
  return {
    kind: 'user',
    sourceId: account.sourceId,
    displayName: account.displayName,
    email: account.email,
    role: 'owner',
  };
}

// ============================================
// ALBUM LIST
// ============================================

/**
 * Every album tile of the albums view, in listing order. Albums that are not
 * shared belong to the signed-in account.
 */
export async function extractAlbumList(
  handle: PageHandle,
  ctx: ExtractorContext
): Promise<ExtractionResult<UserRecord | AlbumRecord>> {
  const items = await ctx.retry.run(() => handle.extractListing(ALBUM_LIST), ALBUM_LIST.name);
  const records: Array<UserRecord | AlbumRecord> = [];

  if (ctx.account) {
    records.push(accountUser(ctx.account));
  }

  let position = 0;
  for (const item of items) {
    const album = parseAlbumTile(item, position, ctx);
    if (!album) continue;
    records.push(album);
    position++;
  }

  log.info('scraper', `Found ${position} album(s)`);
  return { records, continuation: null };
}

function parseAlbumTile(item: ListingItem, position: number, ctx: ExtractorContext): AlbumRecord | null {
  const href = item.key ?? '';
  const sourceId = albumSourceIdFromUrl(href);
  const [firstLine, description = null] = lines(item.fields.text ?? null);
  const title = firstLine ?? text(item.fields.label ?? null);

  if (!sourceId || !title) {
    log.warn('scraper', 'Skipping album tile without id or title', { href });
    return null;
  }

  const shared = description !== null && /\bshared\b/i.test(description);
  return {
    kind: 'album',
    sourceId,
    title,
    url: absoluteUrl(ctx.baseUrl, href),
    ownerSourceId: !shared && ctx.account ? ctx.account.sourceId : null,
    shared,
    itemCount: parseItemCount(description) ?? 0,
    position,
  };
}

// ============================================
// ALBUM DETAIL
// ============================================

/** Album page: title, item count and the ordered asset grid */
export async function extractAlbumDetail(
  handle: PageHandle,
  ctx: ExtractorContext,
  album: AlbumRecord
): Promise<AlbumDetailResult> {
  const fields = await ctx.retry.run(() => handle.extract(ALBUM_DETAIL), ALBUM_DETAIL.name);
  const listedCount = parseItemCount(text(fields.subtitle));
  const items = listedCount === 0
    ? []
    : await ctx.retry.run(() => handle.extractListing(ALBUM_ASSETS), ALBUM_ASSETS.name);

  const assets: AssetRef[] = [];
  for (const item of items) {
    const sourceId = item.key ? assetSourceIdFromUrl(item.key) : null;
    if (!sourceId) continue;
    const label = item.fields.label ?? '';
    assets.push({
      sourceId,
      mediaType: /^video\b/i.test(label) ? 'video' : 'photo',
      position: assets.length,
    });
  }

  const updated: AlbumRecord = {
    ...album,
    title: text(fields.title) ?? album.title,
    itemCount: listedCount ?? Math.max(album.itemCount, assets.length),
  };

  const links: AlbumAssetRecord[] = assets.map(asset => ({
    kind: 'album-asset',
    albumSourceId: album.sourceId,
    assetSourceId: asset.sourceId,
    position: asset.position,
  }));

  return { records: [updated, ...links], continuation: null, assets };
}

// ============================================
// SHARING PANEL
// ============================================

/**
 * Members of a shared album. The returned album record carries the member
 * list and, when the panel names one, the owner.
 */
export async function extractSharingUsers(
  handle: PageHandle,
  ctx: ExtractorContext,
  album: AlbumRecord
): Promise<ExtractionResult<UserRecord | AlbumRecord>> {
  const items = await ctx.retry.run(() => handle.extractListing(SHARING_MEMBERS), SHARING_MEMBERS.name);
  const users = new Map<string, UserRecord>();
  let ownerSourceId = album.ownerSourceId;

  for (const item of items) {
    const [name, ...rest] = lines(item.fields.text ?? null);
    if (!name) continue;

    const email = text(item.fields.email ?? null) ?? rest.find(line => line.includes('@')) ?? null;
    const isOwner = rest.some(line => /\bowner\b/i.test(line));
    // The panel lists the signed-in account under its display name too
    const isAccount = ctx.account !== null && normalizeName(name) === normalizeName(ctx.account.displayName);
    const user: UserRecord = {
      kind: 'user',
      sourceId: isAccount && ctx.account ? ctx.account.sourceId : userSourceId(name, item.fields.profileId ?? null),
      displayName: name,
      email,
      role: isOwner ? 'owner' : 'shared',
    };
    users.set(user.sourceId, user);
    if (isOwner) ownerSourceId = user.sourceId;
  }

  if (ctx.account && !users.has(ctx.account.sourceId)) {
    // The signed-in account is a member of every album it can see
    users.set(ctx.account.sourceId, { ...accountUser(ctx.account), role: 'shared' });
  }

  const updated: AlbumRecord = {
    ...album,
    ownerSourceId,
    memberSourceIds: [...users.keys()],
  };

  return { records: [...users.values(), updated], continuation: null };
}

// ============================================
// ASSET (info panel)
// ============================================

/**
 * One asset from its detail view. The continuation is the URL of the next
 * asset in the album, when the view links one. The media type comes from the
 * view's player when there is one, else from the hint.
 */
export async function extractAsset(
  handle: PageHandle,
  ctx: ExtractorContext,
  hint: { mediaType?: MediaType } = {}
): Promise<ExtractionResult<UserRecord | AssetRecord>> {
  const fields = await ctx.retry.run(() => handle.extract(ASSET_INFO), ASSET_INFO.name);

  const sourceId = assetSourceIdFromUrl(handle.currentUrl());
  if (!sourceId) {
    throw new ExtractionSchemaError(ASSET_INFO.name, ['sourceId']);
  }

  const records: Array<UserRecord | AssetRecord> = [];
  const sharedBy = text(fields.sharedBy)?.replace(/^shared by\s*/i, '').trim() || null;

  let ownerSourceId: string | null = ctx.account?.sourceId ?? null;
  if (sharedBy) {
    const owner: UserRecord = {
      kind: 'user',
      sourceId: ctx.resolveUser?.(sharedBy) ?? userSourceId(sharedBy),
      displayName: sharedBy,
      email: null,
      role: 'shared',
    };
    records.push(owner);
    ownerSourceId = owner.sourceId;
  }

  const savedBy: SavedFlag[] = [];
  if (ctx.account && ownerSourceId !== ctx.account.sourceId) {
    savedBy.push({ userSourceId: ctx.account.sourceId, saved: text(fields.saved) !== null });
  }

  const tags = list(fields.tags)
    .map(label => label.replace(/^tag:\s*/i, '').trim())
    .filter(label => label.length > 0);

  records.push({
    kind: 'asset',
    sourceId,
    filename: text(fields.filename),
    mediaType: text(fields.video) !== null ? 'video' : hint.mediaType ?? 'photo',
    takenAt: parseTakenAt(text(fields.date), text(fields.time)),
    ownerSourceId,
    savedBy,
    tags: [...new Set(tags)],
  });

  const next = text(fields.next);
  return { records, continuation: next ? absoluteUrl(ctx.baseUrl, next) : null };
}
