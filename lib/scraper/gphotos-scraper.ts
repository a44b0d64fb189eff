import { EventEmitter } from 'events';
import { ConfigError, PorterError, errorCategory, errorMessage } from '../errors';
import { log } from '../logger';
import { RetryPolicy } from '../retry';
import { ALBUM_LIST_UNIT, albumUnit, type LocalStore } from '../db/store';
import { assetSourceIdFromUrl, normalizeName } from '../identity';
import { WarningCollector, type ReportWarning } from '../report';
import type {
  AlbumRecord,
  MediaType,
  ScrapeRunKind,
  ScrapeRunStatus,
  SourceRecord,
  StoredAlbum,
} from '../types';
import {
  extractAlbumDetail,
  extractAlbumList,
  extractAsset,
  extractSharingUsers,
  type ExtractorContext,
} from './extractors';
import { PageNavigator } from './page-navigator';
import { SHARING_TRIGGER } from './selectors';
import type { Session, SessionManager } from './session-manager';

export interface GPhotosScraperOptions {
  store: LocalStore;
  sessions: SessionManager;
  baseUrl: string;
  navigationTimeoutMs?: number;
  waitCeilingMs?: number;
  stablePolls?: number;
  /** Policy for transient extraction failures (timeouts, stale elements) */
  retry?: RetryPolicy;
  /** Session re-acquisitions allowed per album before the run fails */
  maxSessionRecoveries?: number;
  /** Passed to the navigator; tests drive time through these */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface ExportPhotosOptions {
  /** Ignore album checkpoints and extract every album again */
  fresh?: boolean;
  /** Stop after this many albums have been extracted */
  maxAlbums?: number;
  /** Re-open assets that are already stored */
  refreshAssets?: boolean;
  /** Skip albums listed before this one (source id or title) */
  startAlbum?: string;
}

export interface RunReport {
  runId: number;
  kind: ScrapeRunKind;
  status: ScrapeRunStatus;
  completed: number;
  skipped: number;
  failed: number;
  /** Albums with entities that failed; left without a checkpoint */
  incomplete: number;
  assets: number;
  warnings: ReportWarning[];
}

type RunCounts = Omit<RunReport, 'runId' | 'kind' | 'status' | 'warnings'>;

export interface AlbumProgressEvent {
  albumSourceId: string;
  title: string;
  index: number;
  total: number;
}

export interface AlbumCompletedEvent extends AlbumProgressEvent {
  assets: number;
}

export interface AlbumFailedEvent extends AlbumProgressEvent {
  error: string;
}

export interface AlbumIncompleteEvent extends AlbumProgressEvent {
  assets: number;
  /** Entities skipped after a failure */
  failures: number;
}

/** Something that may fail one entity without stopping the album */
interface EntityFailure {
  entityKind: 'album' | 'asset';
  entityId: string;
  operation: string;
}

/** Bookkeeping of one album pass */
interface AlbumScope {
  runId: number;
  album: StoredAlbum;
  warnings: WarningCollector;
  failures: number;
}

interface AlbumOutcome {
  /** Assets opened and stored by this pass */
  extracted: number;
  /** Asset links found, grid and continuation */
  found: number;
  expected: number;
  failures: number;
}

/** Index of the album to start at, by source id or case-insensitive title */
export function findStartAlbum(albums: StoredAlbum[], start: string): number {
  const byId = albums.findIndex(album => album.sourceId === start);
  if (byId >= 0) return byId;
  const title = start.trim().toLowerCase();
  return albums.findIndex(album => album.title.toLowerCase() === title);
}

const DEFAULT_MAX_SESSION_RECOVERIES = 3;

function toAlbumRecord(album: StoredAlbum): AlbumRecord {
  return {
    kind: 'album',
    sourceId: album.sourceId,
    title: album.title,
    url: album.url,
    ownerSourceId: album.ownerSourceId,
    shared: album.shared,
    itemCount: album.itemCount,
    position: album.position,
    sourceCreatedAt: album.sourceCreatedAt,
    sourceModifiedAt: album.sourceModifiedAt,
  };
}

/**
 * Drives the source web UI and writes what it finds into the local store.
 *
 * Albums are the unit of work: an album's records are all upserted before its
 * checkpoint is written, so an interrupted run resumes at the first album
 * without one.
 *
 * An album where an entity failed keeps no checkpoint, so the next run visits
 * it again and only opens the assets still missing.
 *
 * Events: 'run-started', 'album-started', 'album-completed', 'album-skipped',
 * 'album-incomplete', 'album-failed', 'run-completed'.
 */
export class GPhotosScraper extends EventEmitter {
  private readonly options: GPhotosScraperOptions;
  private readonly store: LocalStore;
  private readonly sessions: SessionManager;
  private readonly retry: RetryPolicy;
  private shouldStop = false;

  constructor(options: GPhotosScraperOptions) {
    super();
    this.options = options;
    this.store = options.store;
    this.sessions = options.sessions;
    this.retry = (options.retry ?? new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000 }))
      .with({ scope: 'scraper' });
  }

  /** Finish the album in progress, then stop */
  requestStop(): void {
    if (!this.shouldStop) {
      log.warn('scraper', 'Stop requested, finishing the current album');
    }
    this.shouldStop = true;
  }

  get stopRequested(): boolean {
    return this.shouldStop;
  }

  login() {
    return this.sessions.login();
  }

  private createNavigator(session: Session): PageNavigator {
    return new PageNavigator(session.page, {
      baseUrl: this.options.baseUrl,
      navigationTimeoutMs: this.options.navigationTimeoutMs,
      waitCeilingMs: this.options.waitCeilingMs,
      stablePolls: this.options.stablePolls,
      sharingTrigger: SHARING_TRIGGER,
      guard: () => this.sessions.ensureActive(session),
      sleep: this.options.sleep,
      now: this.options.now,
    });
  }

  private context(session: Session, knownUsers: Map<string, string>): ExtractorContext {
    return {
      baseUrl: this.options.baseUrl,
      account: session.account,
      retry: this.retry,
      resolveUser: name => knownUsers.get(normalizeName(name)) ?? null,
    };
  }

  /** Run `fn` in a session, re-acquiring it when it is lost mid-way */
  private async withRecoveredSession<T>(what: string, fn: (session: Session) => Promise<T>): Promise<T> {
    const maxRecoveries = this.options.maxSessionRecoveries ?? DEFAULT_MAX_SESSION_RECOVERIES;
    let session = await this.sessions.acquire();
    let recoveries = 0;

    try {
      while (true) {
        try {
          return await fn(session);
        } catch (error) {
          if (errorCategory(error) !== 'session' || recoveries >= maxRecoveries) throw error;
          recoveries++;
          log.warn('scraper', `Session lost during ${what}, re-acquiring`, { attempt: recoveries }, error);
          session = await this.sessions.reacquire();
        }
      }
    } finally {
      await this.sessions.release();
    }
  }

  // ============================================
  // ALBUM LIST
  // ============================================

  async exportAlbums(options: { fresh?: boolean } = {}): Promise<RunReport> {
    this.shouldStop = false;
    const run = await this.store.startRun('albums');
    const warnings = new WarningCollector();
    this.emit('run-started', { runId: run.id, kind: 'albums' });

    if (options.fresh) {
      await this.store.clearCheckpoints(ALBUM_LIST_UNIT);
    } else if (await this.store.isCheckpointed(ALBUM_LIST_UNIT)) {
      log.info('scraper', 'Album list already exported (use --fresh to extract it again)');
      await this.store.completeRun(run.id, 'completed');
      return this.finish(run.id, 'albums', 'completed', { completed: 0, skipped: 1, failed: 0, incomplete: 0, assets: 0 }, warnings);
    }

    try {
      const albums = await this.withRecoveredSession('album list', async session => {
        const navigator = this.createNavigator(session);
        await navigator.checkLocale();
        const handle = await navigator.goto('albums');
        const result = await extractAlbumList(handle, this.context(session, new Map()));
        await this.store.upsertAll(result.records);
        return result.records.filter(record => record.kind === 'album').length;
      });

      await this.store.checkpoint(ALBUM_LIST_UNIT, run.id);
      await this.store.updateRunProgress(run.id, { completed: 1, failed: 0 });
      await this.store.completeRun(run.id, 'completed');
      log.info('scraper', `Stored ${albums} album(s)`);
      return this.finish(run.id, 'albums', 'completed', { completed: 1, skipped: 0, failed: 0, incomplete: 0, assets: 0 }, warnings);
    } catch (error) {
      await this.store.completeRun(run.id, 'failed', errorMessage(error));
      throw error;
    }
  }

  // ============================================
  // ALBUM CONTENTS
  // ============================================

  async exportPhotos(options: ExportPhotosOptions = {}): Promise<RunReport> {
    this.shouldStop = false;
    const albums = await this.store.query('album');
    const start = options.startAlbum === undefined ? 0 : findStartAlbum(albums, options.startAlbum);
    if (start < 0) {
      throw new ConfigError(`No stored album matches --start-album "${options.startAlbum ?? ''}"`);
    }

    const run = await this.store.startRun('photos');
    const warnings = new WarningCollector();
    const counts: RunCounts = { completed: 0, skipped: 0, failed: 0, incomplete: 0, assets: 0 };
    this.emit('run-started', { runId: run.id, kind: 'photos' });

    if (options.fresh) {
      const cleared = await this.store.clearCheckpoints('album:');
      log.info('scraper', `Cleared ${cleared} album checkpoint(s)`);
    }

    if (albums.length === 0) {
      log.warn('scraper', 'No albums in the store: run "gphoto export-albums" first');
      await this.store.completeRun(run.id, 'completed');
      return this.finish(run.id, 'photos', 'completed', counts, warnings);
    }

    const knownUsers = new Map<string, string>();
    for (const user of await this.store.query('user')) {
      knownUsers.set(normalizeName(user.displayName), user.sourceId);
    }

    let session: Session | null = null;
    let status: ScrapeRunStatus = 'completed';

    try {
      session = await this.sessions.acquire();

      for (const [index, album] of albums.entries()) {
        if (index < start) continue;
        if (this.shouldStop) {
          status = 'stopped';
          break;
        }
        if (options.maxAlbums !== undefined && counts.completed + counts.incomplete + counts.failed >= options.maxAlbums) {
          log.info('scraper', `Reached --max-albums ${options.maxAlbums}`);
          break;
        }

        const event: AlbumProgressEvent = {
          albumSourceId: album.sourceId,
          title: album.title,
          index,
          total: albums.length,
        };

        if (await this.store.isCheckpointed(albumUnit(album.sourceId))) {
          counts.skipped++;
          this.emit('album-skipped', event);
          continue;
        }

        this.emit('album-started', event);
        let recoveries = 0;

        while (true) {
          try {
            const scope: AlbumScope = { runId: run.id, album, warnings, failures: 0 };
            const outcome = await this.processAlbum(session, scope, knownUsers, options);
            counts.assets += outcome.extracted;
            if (outcome.failures > 0) {
              counts.incomplete++;
              log.warn('scraper', `Album "${album.title}" is incomplete, the next run extracts it again`, {
                failures: outcome.failures,
              });
              this.emit('album-incomplete', {
                ...event,
                assets: outcome.extracted,
                failures: outcome.failures,
              } satisfies AlbumIncompleteEvent);
              break;
            }
            if (outcome.found < outcome.expected) {
              await this.warnShortAlbum(scope, outcome);
            }
            await this.store.checkpoint(albumUnit(album.sourceId), run.id);
            counts.completed++;
            this.emit('album-completed', { ...event, assets: outcome.extracted } satisfies AlbumCompletedEvent);
            break;
          } catch (error) {
            const category = errorCategory(error);

            if (category === 'session' && recoveries < (this.options.maxSessionRecoveries ?? DEFAULT_MAX_SESSION_RECOVERIES)) {
              recoveries++;
              log.warn('scraper', `Session lost during "${album.title}", re-acquiring`, { attempt: recoveries }, error);
              session = await this.sessions.reacquire();
              continue;
            }
            if (category === 'session' || category === 'fatal') {
              throw error;
            }

            counts.failed++;
            warnings.add(error);
            await this.store.recordError({
              runId: run.id,
              albumSourceId: album.sourceId,
              entityKind: 'album',
              entityId: album.sourceId,
              operation: 'export-album',
              category: category ?? 'unknown',
              message: errorMessage(error),
            });
            log.error('scraper', `Album "${album.title}" failed`, { album: album.sourceId }, error);
            this.emit('album-failed', { ...event, error: errorMessage(error) } satisfies AlbumFailedEvent);
            break;
          }
        }

        await this.store.updateRunProgress(run.id, { completed: counts.completed, failed: counts.failed });
      }
    } catch (error) {
      await this.store.updateRunProgress(run.id, { completed: counts.completed, failed: counts.failed });
      await this.store.completeRun(run.id, 'failed', errorMessage(error));
      throw error;
    } finally {
      await this.sessions.release();
    }

    await this.store.completeRun(run.id, status);
    return this.finish(run.id, 'photos', status, counts, warnings);
  }

  /**
   * Extract one album: detail, sharing members, then every asset. Entity
   * failures are counted on the scope.
   */
  private async processAlbum(
    session: Session,
    scope: AlbumScope,
    knownUsers: Map<string, string>,
    options: ExportPhotosOptions
  ): Promise<AlbumOutcome> {
    const { album } = scope;
    const navigator = this.createNavigator(session);
    const ctx = this.context(session, knownUsers);
    const albumRecords: SourceRecord[] = [];

    const detailHandle = await navigator.goto('album', { albumUrl: album.url });
    const detail = await extractAlbumDetail(detailHandle, ctx, toAlbumRecord(album));
    albumRecords.push(...detail.records);

    if (album.shared) {
      const sharingRecords = await this.guardEntity(
        { entityKind: 'album', entityId: album.sourceId, operation: 'extract-sharing' },
        scope,
        async () => {
          const sharingHandle = await navigator.goto('sharing', { albumUrl: album.url });
          return (await extractSharingUsers(sharingHandle, ctx, toAlbumRecord(album))).records;
        }
      );
      for (const record of sharingRecords ?? []) {
        if (record.kind === 'user') {
          knownUsers.set(normalizeName(record.displayName), record.sourceId);
          albumRecords.push(record);
        } else {
          // Keep the detail's title and count, take members and owner from the panel
          const detailAlbum = detail.records.find((r): r is AlbumRecord => r.kind === 'album');
          albumRecords.push(detailAlbum
            ? { ...detailAlbum, ownerSourceId: record.ownerSourceId, memberSourceIds: record.memberSourceIds }
            : record);
        }
      }
    }

    const known = options.refreshAssets
      ? new Set<string>()
      : new Set((await this.store.query('asset', { sourceIds: detail.assets.map(a => a.sourceId) })).map(a => a.sourceId));

    const seen = new Set(detail.assets.map(asset => asset.sourceId));
    let found = detail.assets.length;
    let extracted = 0;
    let continuation: string | null = null;

    for (const ref of detail.assets) {
      continuation = null;
      if (known.has(ref.sourceId)) continue;
      const result = await this.extractOne(navigator, ctx, scope, { assetSourceId: ref.sourceId }, ref.sourceId, ref.mediaType);
      if (result) extracted++;
      continuation = result?.continuation ?? null;
    }

    // The grid can stop rendering before the end of a large album; follow the
    // viewer's next links from the last asset until the count is reached.
    const expected = Math.max(album.itemCount, detail.assets.length);
    const last = detail.assets[detail.assets.length - 1];
    if (found < expected && last && known.has(last.sourceId)) {
      // Stored already, opened again only for its next link
      const reopened = await this.extractOne(navigator, ctx, scope, { assetSourceId: last.sourceId }, last.sourceId, last.mediaType);
      continuation = reopened?.continuation ?? null;
    }

    while (continuation && found < expected) {
      const nextId = assetSourceIdFromUrl(continuation);
      if (!nextId || seen.has(nextId)) break;
      seen.add(nextId);
      albumRecords.push({ kind: 'album-asset', albumSourceId: album.sourceId, assetSourceId: nextId, position: found });
      found++;
      const result = await this.extractOne(navigator, ctx, scope, { url: continuation }, nextId);
      if (result) extracted++;
      continuation = result?.continuation ?? null;
    }

    await this.store.upsertAll(albumRecords);
    log.info('scraper', `Album "${album.title}" done`, { assets: found, extracted });
    return { extracted, found, expected, failures: scope.failures };
  }

  /** Extract and store one asset; null when it failed and was recorded */
  private async extractOne(
    navigator: PageNavigator,
    ctx: ExtractorContext,
    scope: AlbumScope,
    target: { assetSourceId?: string; url?: string },
    assetSourceId: string,
    mediaType?: MediaType
  ): Promise<{ continuation: string | null } | null> {
    return this.guardEntity(
      { entityKind: 'asset', entityId: assetSourceId, operation: 'extract-asset' },
      scope,
      async () => {
        const handle = await navigator.goto('asset', { albumUrl: scope.album.url, ...target });
        const result = await extractAsset(handle, ctx, mediaType ? { mediaType } : {});
        await this.store.upsertAll(result.records);
        return { continuation: result.continuation };
      }
    );
  }

  /**
   * Run `fn`; a structural failure, or a transient one that outlived its
   * retries, is recorded against the entity and turned into null. Session and
   * fatal errors propagate to the album.
   */
  private async guardEntity<T>(
    failure: EntityFailure,
    scope: AlbumScope,
    fn: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await fn();
    } catch (error) {
      const category = errorCategory(error);
      if (category !== 'structural' && category !== 'transient') throw error;
      scope.failures++;
      scope.warnings.add(error);
      await this.store.recordError({
        runId: scope.runId,
        albumSourceId: scope.album.sourceId,
        entityKind: failure.entityKind,
        entityId: failure.entityId,
        operation: failure.operation,
        category,
        message: errorMessage(error),
      });
      log.warn('scraper', `Skipped ${failure.entityKind} ${failure.entityId}`, { operation: failure.operation }, error);
      return null;
    }
  }

  /** The album shows fewer items than its count; kept, with a recorded warning */
  private async warnShortAlbum(scope: AlbumScope, outcome: AlbumOutcome): Promise<void> {
    const warning = new PorterError(
      `Album "${scope.album.title}" lists ${outcome.expected} item(s) but only ${outcome.found} were reachable`,
      'structural'
    );
    scope.warnings.add(warning);
    await this.store.recordError({
      runId: scope.runId,
      albumSourceId: scope.album.sourceId,
      entityKind: 'album',
      entityId: scope.album.sourceId,
      operation: 'count-album-items',
      category: warning.category,
      message: warning.message,
    });
    log.warn('scraper', warning.message, { album: scope.album.sourceId });
  }

  private finish(
    runId: number,
    kind: ScrapeRunKind,
    status: ScrapeRunStatus,
    counts: RunCounts,
    warnings: WarningCollector
  ): RunReport {
    const report: RunReport = { runId, kind, status, ...counts, warnings: warnings.list() };
    this.emit('run-completed', report);
    return report;
  }
}
