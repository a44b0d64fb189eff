import { Database, DEFAULT_DATABASE_PATH, type SqlExecutor } from './index';
import { log } from '../logger';
import type {
  AlbumAssetRecord,
  AlbumRecord,
  AlbumStats,
  AssetRecord,
  Checkpoint,
  EntityKind,
  EntityRows,
  MediaType,
  QueryFilter,
  QueryKind,
  SavedFlag,
  ScrapeErrorEntry,
  ScrapeRun,
  ScrapeRunKind,
  ScrapeRunStatus,
  SourceRecord,
  StoreStats,
  StoredAlbum,
  StoredAlbumAsset,
  StoredAsset,
  StoredScrapeError,
  StoredTag,
  StoredUser,
  UserRecord,
  UserRole,
} from '../types';

// ============================================
// ROW SHAPES
// ============================================

interface UserRow {
  source_id: string;
  display_name: string;
  email: string | null;
  role: UserRole;
  add_to_destination: number;
  destination_email: string | null;
  destination_name: string | null;
}

interface AlbumRow {
  source_id: string;
  title: string;
  url: string;
  owner_source_id: string | null;
  shared: number;
  item_count: number;
  position: number;
  source_created_at: string | null;
  source_modified_at: string | null;
  stored_items: number;
}

interface AssetRow {
  source_id: string;
  filename: string | null;
  media_type: MediaType;
  taken_at: string | null;
  owner_source_id: string | null;
}

interface ScrapeRunRow {
  id: number;
  kind: ScrapeRunKind;
  status: ScrapeRunStatus;
  units_completed: number;
  units_failed: number;
  error_message: string | null;
  started_at: string;
  completed_at: string | null;
}

interface ScrapeErrorRow {
  id: number;
  run_id: number | null;
  album_source_id: string | null;
  entity_kind: string;
  entity_id: string;
  operation: string;
  category: string;
  message: string;
  created_at: string;
}

const ID_CHUNK = 500;
const ALBUM_UNIT_PREFIX = 'album:';

export function albumUnit(albumSourceId: string): string {
  return `${ALBUM_UNIT_PREFIX}${albumSourceId}`;
}

export const ALBUM_LIST_UNIT = 'albums-list';

function placeholders(count: number): string {
  return new Array(count).fill('?').join(', ');
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function groupBy<T>(rows: T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    const group = groups.get(k);
    if (group) {
      group.push(row);
    } else {
      groups.set(k, [row]);
    }
  }
  return groups;
}

function toRun(row: ScrapeRunRow): ScrapeRun {
  return {
    id: row.id,
    kind: row.kind,
    status: row.status,
    unitsCompleted: row.units_completed,
    unitsFailed: row.units_failed,
    errorMessage: row.error_message,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

export interface UserOverrides {
  email?: string | null;
  name?: string | null;
  addToDestination?: boolean;
}

/**
 * Normalized local store of everything extracted from the source.
 *
 * Every write is an idempotent merge keyed by source id, so re-extracting an
 * entity never needs an undo. Checkpoints mark fully extracted units.
 */
export class LocalStore {
  readonly db: Database;

  private readonly queries: { [K in QueryKind]: (filter: QueryFilter) => Promise<EntityRows[K][]> } = {
    user: filter => this.queryUsers(filter),
    album: filter => this.queryAlbums(filter),
    asset: filter => this.queryAssets(filter),
    'album-asset': filter => this.queryAlbumAssets(filter),
    tag: filter => this.queryTags(filter),
  };

  constructor(db: Database) {
    this.db = db;
  }

  static async open(databasePath: string = DEFAULT_DATABASE_PATH): Promise<LocalStore> {
    const db = new Database(databasePath);
    await db.open();
    return new LocalStore(db);
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // ============================================
  // UPSERTS
  // ============================================

  async upsert(record: SourceRecord): Promise<void> {
    await this.db.transaction(tx => this.upsertOn(tx, record));
  }

  /** Upsert a batch of records in one transaction, in order */
  async upsertAll(records: SourceRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.db.transaction(async tx => {
      for (const record of records) {
        await this.upsertOn(tx, record);
      }
    });
  }

  private async upsertOn(tx: SqlExecutor, record: SourceRecord): Promise<void> {
    switch (record.kind) {
      case 'user':
        return this.upsertUser(tx, record);
      case 'album':
        return this.upsertAlbum(tx, record);
      case 'asset':
        return this.upsertAsset(tx, record);
      case 'album-asset':
        return this.upsertAlbumAsset(tx, record);
      case 'tag':
        await tx.runAsync('INSERT OR IGNORE INTO tags (label) VALUES (?)', [record.label]);
        return;
    }
  }

  private async upsertUser(tx: SqlExecutor, user: UserRecord): Promise<void> {
    await tx.runAsync(
      `INSERT INTO users (source_id, display_name, email, role)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(source_id) DO UPDATE SET
         display_name = excluded.display_name,
         email = COALESCE(excluded.email, users.email),
         role = CASE WHEN users.role = 'owner' THEN 'owner' ELSE excluded.role END,
         updated_at = datetime('now')`,
      [user.sourceId, user.displayName, user.email, user.role]
    );
  }

  private async upsertAlbum(tx: SqlExecutor, album: AlbumRecord): Promise<void> {
    await tx.runAsync(
      `INSERT INTO albums (
         source_id, title, url, owner_source_id, shared, item_count, position,
         source_created_at, source_modified_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(source_id) DO UPDATE SET
         title = excluded.title,
         url = excluded.url,
         owner_source_id = COALESCE(excluded.owner_source_id, albums.owner_source_id),
         shared = excluded.shared,
         item_count = excluded.item_count,
         position = excluded.position,
         source_created_at = COALESCE(excluded.source_created_at, albums.source_created_at),
         source_modified_at = COALESCE(excluded.source_modified_at, albums.source_modified_at),
         updated_at = datetime('now')`,
      [
        album.sourceId,
        album.title,
        album.url,
        album.ownerSourceId,
        album.shared ? 1 : 0,
        album.itemCount,
        album.position,
        album.sourceCreatedAt ?? null,
        album.sourceModifiedAt ?? null,
      ]
    );

    if (album.memberSourceIds) {
      await tx.runAsync('DELETE FROM album_members WHERE album_source_id = ?', [album.sourceId]);
      for (const member of album.memberSourceIds) {
        await tx.runAsync(
          'INSERT OR IGNORE INTO album_members (album_source_id, user_source_id) VALUES (?, ?)',
          [album.sourceId, member]
        );
      }
    }

    // The owner is always a member
    await tx.runAsync(
      `INSERT OR IGNORE INTO album_members (album_source_id, user_source_id)
       SELECT source_id, owner_source_id FROM albums
       WHERE source_id = ? AND owner_source_id IS NOT NULL`,
      [album.sourceId]
    );
  }

  private async upsertAsset(tx: SqlExecutor, asset: AssetRecord): Promise<void> {
    await tx.runAsync(
      `INSERT INTO assets (source_id, filename, media_type, taken_at, owner_source_id)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(source_id) DO UPDATE SET
         filename = COALESCE(excluded.filename, assets.filename),
         media_type = excluded.media_type,
         taken_at = COALESCE(excluded.taken_at, assets.taken_at),
         owner_source_id = COALESCE(excluded.owner_source_id, assets.owner_source_id),
         updated_at = datetime('now')`,
      [asset.sourceId, asset.filename, asset.mediaType, asset.takenAt, asset.ownerSourceId]
    );

    if (asset.savedBy) {
      await tx.runAsync('DELETE FROM asset_saved WHERE asset_source_id = ?', [asset.sourceId]);
      for (const flag of asset.savedBy) {
        await tx.runAsync(
          `INSERT INTO asset_saved (asset_source_id, user_source_id, saved) VALUES (?, ?, ?)
           ON CONFLICT(asset_source_id, user_source_id) DO UPDATE SET saved = excluded.saved`,
          [asset.sourceId, flag.userSourceId, flag.saved ? 1 : 0]
        );
      }
    }

    if (asset.tags) {
      await tx.runAsync('DELETE FROM asset_tags WHERE asset_source_id = ?', [asset.sourceId]);
      for (const label of asset.tags) {
        await tx.runAsync('INSERT OR IGNORE INTO tags (label) VALUES (?)', [label]);
        await tx.runAsync(
          'INSERT OR IGNORE INTO asset_tags (label, asset_source_id) VALUES (?, ?)',
          [label, asset.sourceId]
        );
      }
    }
  }

  private async upsertAlbumAsset(tx: SqlExecutor, link: AlbumAssetRecord): Promise<void> {
    await tx.runAsync(
      `INSERT INTO album_assets (album_source_id, asset_source_id, position) VALUES (?, ?, ?)
       ON CONFLICT(album_source_id, asset_source_id) DO UPDATE SET position = excluded.position`,
      [link.albumSourceId, link.assetSourceId, link.position]
    );
  }

  // ============================================
  // QUERIES
  // ============================================

  query<K extends QueryKind>(kind: K, filter: QueryFilter = {}): Promise<EntityRows[K][]> {
    return this.queries[kind](filter);
  }

  private async selectByIds<T>(
    sql: string,
    column: string,
    ids: string[] | undefined,
    orderBy: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const hasWhere = /\bWHERE\b/i.test(sql);
    if (!ids) {
      return this.db.allAsync<T>(`${sql} ORDER BY ${orderBy}`, params);
    }
    const rows: T[] = [];
    for (const batch of chunk(ids, ID_CHUNK)) {
      const clause = `${hasWhere ? ' AND' : ' WHERE'} ${column} IN (${placeholders(batch.length)})`;
      rows.push(...await this.db.allAsync<T>(`${sql}${clause} ORDER BY ${orderBy}`, [...params, ...batch]));
    }
    return rows;
  }

  private async queryUsers(filter: QueryFilter): Promise<StoredUser[]> {
    const base = filter.onlyForDestination
      ? 'SELECT * FROM users WHERE add_to_destination = 1'
      : 'SELECT * FROM users';
    const rows = await this.selectByIds<UserRow>(base, 'source_id', filter.sourceIds, 'display_name, source_id');
    return rows.map(row => ({
      sourceId: row.source_id,
      displayName: row.display_name,
      email: row.email,
      role: row.role,
      addToDestination: row.add_to_destination === 1,
      destinationEmail: row.destination_email,
      destinationName: row.destination_name,
    }));
  }

  private async queryAlbums(filter: QueryFilter): Promise<StoredAlbum[]> {
    let base = `SELECT a.*, (SELECT COUNT(*) FROM album_assets aa WHERE aa.album_source_id = a.source_id) AS stored_items
                FROM albums a`;
    if (filter.notFinished) {
      base += ` WHERE NOT EXISTS (SELECT 1 FROM checkpoints c WHERE c.unit = '${ALBUM_UNIT_PREFIX}' || a.source_id)`;
    }
    const rows = await this.selectByIds<AlbumRow>(base, 'a.source_id', filter.sourceIds, 'a.position, a.source_id');

    const members = groupBy(
      await this.db.allAsync<{ album_source_id: string; user_source_id: string }>(
        'SELECT album_source_id, user_source_id FROM album_members ORDER BY rowid'
      ),
      row => row.album_source_id
    );

    return rows.map(row => ({
      sourceId: row.source_id,
      title: row.title,
      url: row.url,
      ownerSourceId: row.owner_source_id,
      shared: row.shared === 1,
      itemCount: row.item_count,
      position: row.position,
      memberSourceIds: (members.get(row.source_id) ?? []).map(m => m.user_source_id),
      sourceCreatedAt: row.source_created_at,
      sourceModifiedAt: row.source_modified_at,
      storedItems: row.stored_items,
    }));
  }

  private async queryAssets(filter: QueryFilter): Promise<StoredAsset[]> {
    const rows = await this.selectByIds<AssetRow>('SELECT * FROM assets', 'source_id', filter.sourceIds, 'source_id');
    const ids = rows.map(row => row.source_id);

    const saved = groupBy(
      await this.selectByIds<{ asset_source_id: string; user_source_id: string; saved: number }>(
        'SELECT asset_source_id, user_source_id, saved FROM asset_saved',
        'asset_source_id',
        filter.sourceIds ? ids : undefined,
        'rowid'
      ),
      row => row.asset_source_id
    );
    const tags = groupBy(
      await this.selectByIds<{ asset_source_id: string; label: string }>(
        'SELECT asset_source_id, label FROM asset_tags',
        'asset_source_id',
        filter.sourceIds ? ids : undefined,
        'label'
      ),
      row => row.asset_source_id
    );

    return rows.map(row => ({
      sourceId: row.source_id,
      filename: row.filename,
      mediaType: row.media_type,
      takenAt: row.taken_at,
      ownerSourceId: row.owner_source_id,
      savedBy: (saved.get(row.source_id) ?? []).map((s): SavedFlag => ({
        userSourceId: s.user_source_id,
        saved: s.saved === 1,
      })),
      tags: (tags.get(row.source_id) ?? []).map(t => t.label),
    }));
  }

  private async queryAlbumAssets(filter: QueryFilter): Promise<StoredAlbumAsset[]> {
    const rows = filter.albumSourceId
      ? await this.db.allAsync<{ album_source_id: string; asset_source_id: string; position: number }>(
          'SELECT * FROM album_assets WHERE album_source_id = ? ORDER BY position',
          [filter.albumSourceId]
        )
      : await this.db.allAsync<{ album_source_id: string; asset_source_id: string; position: number }>(
          'SELECT * FROM album_assets ORDER BY album_source_id, position'
        );
    return rows.map(row => ({
      albumSourceId: row.album_source_id,
      assetSourceId: row.asset_source_id,
      position: row.position,
    }));
  }

  private async queryTags(filter: QueryFilter): Promise<StoredTag[]> {
    const base = filter.includeDeleted
      ? 'SELECT label, deleted_at FROM tags'
      : 'SELECT label, deleted_at FROM tags WHERE deleted_at IS NULL';
    const rows = await this.selectByIds<{ label: string; deleted_at: string | null }>(
      base, 'label', filter.sourceIds, 'label'
    );
    const links = groupBy(
      await this.db.allAsync<{ label: string; asset_source_id: string }>(
        'SELECT label, asset_source_id FROM asset_tags ORDER BY asset_source_id'
      ),
      row => row.label
    );
    return rows.map(row => ({
      label: row.label,
      deletedAt: row.deleted_at,
      assetSourceIds: (links.get(row.label) ?? []).map(link => link.asset_source_id),
    }));
  }

  // ============================================
  // CHECKPOINTS
  // ============================================

  /**
   * Mark a unit as fully extracted. Only call after every record of the unit
   * has been upserted.
   */
  async checkpoint(unit: string, runId: number | null = null): Promise<void> {
    await this.db.runAsyncQueued(
      `INSERT INTO checkpoints (unit, run_id, seq, completed_at)
       VALUES (?, ?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM checkpoints), datetime('now'))
       ON CONFLICT(unit) DO UPDATE SET
         run_id = excluded.run_id,
         seq = excluded.seq,
         completed_at = excluded.completed_at`,
      [unit, runId]
    );
  }

  async lastCheckpoint(): Promise<Checkpoint | null> {
    const row = await this.db.getAsync<{ unit: string; run_id: number | null; completed_at: string }>(
      'SELECT unit, run_id, completed_at FROM checkpoints ORDER BY seq DESC LIMIT 1'
    );
    return row ? { unit: row.unit, runId: row.run_id, completedAt: row.completed_at } : null;
  }

  async isCheckpointed(unit: string): Promise<boolean> {
    const row = await this.db.getAsync<{ unit: string }>('SELECT unit FROM checkpoints WHERE unit = ?', [unit]);
    return row !== undefined;
  }

  /** Clear every checkpoint, or only those whose unit starts with `prefix` */
  async clearCheckpoints(prefix?: string): Promise<number> {
    const { changes } = prefix === undefined
      ? await this.db.runAsyncQueued('DELETE FROM checkpoints')
      : await this.db.runAsyncQueued('DELETE FROM checkpoints WHERE substr(unit, 1, ?) = ?', [prefix.length, prefix]);
    return changes;
  }

  // ============================================
  // MAPPINGS
  // ============================================

  async getMapping(kind: EntityKind, sourceId: string): Promise<string | null> {
    const row = await this.db.getAsync<{ destination_id: string }>(
      'SELECT destination_id FROM mappings WHERE entity_kind = ? AND source_id = ?',
      [kind, sourceId]
    );
    return row?.destination_id ?? null;
  }

  async getMappings(kind: EntityKind): Promise<Map<string, string>> {
    const rows = await this.db.allAsync<{ source_id: string; destination_id: string }>(
      'SELECT source_id, destination_id FROM mappings WHERE entity_kind = ?',
      [kind]
    );
    return new Map(rows.map(row => [row.source_id, row.destination_id]));
  }

  async setMapping(kind: EntityKind, sourceId: string, destinationId: string): Promise<void> {
    await this.db.runAsyncQueued(
      `INSERT INTO mappings (entity_kind, source_id, destination_id, updated_at)
       VALUES (?, ?, ?, datetime('now'))
       ON CONFLICT(entity_kind, source_id) DO UPDATE SET
         destination_id = excluded.destination_id,
         updated_at = excluded.updated_at`,
      [kind, sourceId, destinationId]
    );
  }

  async deleteMapping(kind: EntityKind, sourceId: string): Promise<void> {
    await this.db.runAsyncQueued(
      'DELETE FROM mappings WHERE entity_kind = ? AND source_id = ?',
      [kind, sourceId]
    );
  }

  // ============================================
  // TAGS
  // ============================================

  /** Turn a tag into a tombstone. Returns false when no live tag has that label */
  async markTagDeleted(label: string): Promise<boolean> {
    const { changes } = await this.db.runAsyncQueued(
      `UPDATE tags SET deleted_at = datetime('now') WHERE label = ? AND deleted_at IS NULL`,
      [label]
    );
    return changes > 0;
  }

  /** Remove a tombstone and its mapping once the destination no longer has the tag */
  async purgeTag(label: string): Promise<void> {
    await this.db.transaction(async tx => {
      await tx.runAsync('DELETE FROM asset_tags WHERE label = ?', [label]);
      await tx.runAsync('DELETE FROM tags WHERE label = ?', [label]);
      await tx.runAsync(`DELETE FROM mappings WHERE entity_kind = 'tag' AND source_id = ?`, [label]);
    });
  }

  // ============================================
  // USERS
  // ============================================

  /** Apply manual overrides to a user. Returns false when the user is unknown */
  async setUserOverrides(sourceId: string, overrides: UserOverrides): Promise<boolean> {
    const updates: string[] = [];
    const params: unknown[] = [];

    if (overrides.email !== undefined) {
      updates.push('destination_email = ?');
      params.push(overrides.email);
    }
    if (overrides.name !== undefined) {
      updates.push('destination_name = ?');
      params.push(overrides.name);
    }
    if (overrides.addToDestination !== undefined) {
      updates.push('add_to_destination = ?');
      params.push(overrides.addToDestination ? 1 : 0);
    }

    if (updates.length === 0) {
      const row = await this.db.getAsync<{ source_id: string }>('SELECT source_id FROM users WHERE source_id = ?', [sourceId]);
      return row !== undefined;
    }

    updates.push(`updated_at = datetime('now')`);
    params.push(sourceId);
    const { changes } = await this.db.runAsyncQueued(
      `UPDATE users SET ${updates.join(', ')} WHERE source_id = ?`,
      params
    );
    return changes > 0;
  }

  // ============================================
  // RUNS & ERRORS
  // ============================================

  async startRun(kind: ScrapeRunKind): Promise<ScrapeRun> {
    const { lastID } = await this.db.runAsyncQueued(
      `INSERT INTO scrape_runs (kind, status, started_at) VALUES (?, 'running', datetime('now'))`,
      [kind]
    );
    const run = await this.getRun(lastID);
    if (!run) {
      throw new Error(`Scrape run ${lastID} vanished after insert`);
    }
    return run;
  }

  async getRun(runId: number): Promise<ScrapeRun | null> {
    const row = await this.db.getAsync<ScrapeRunRow>('SELECT * FROM scrape_runs WHERE id = ?', [runId]);
    return row ? toRun(row) : null;
  }

  async updateRunProgress(runId: number, progress: { completed: number; failed: number }): Promise<void> {
    await this.db.runAsyncQueued(
      'UPDATE scrape_runs SET units_completed = ?, units_failed = ? WHERE id = ?',
      [progress.completed, progress.failed, runId]
    );
  }

  async completeRun(runId: number, status: Exclude<ScrapeRunStatus, 'running'>, errorMessage: string | null = null): Promise<void> {
    await this.db.runAsyncQueued(
      `UPDATE scrape_runs SET status = ?, error_message = ?, completed_at = datetime('now') WHERE id = ?`,
      [status, errorMessage, runId]
    );
  }

  async recordError(entry: ScrapeErrorEntry): Promise<void> {
    await this.db.runAsyncQueued(
      `INSERT INTO scrape_errors (run_id, album_source_id, entity_kind, entity_id, operation, category, message)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        entry.runId,
        entry.albumSourceId ?? null,
        entry.entityKind,
        entry.entityId,
        entry.operation,
        entry.category,
        entry.message,
      ]
    );
    log.debug('db', 'Recorded scrape error', { entity: `${entry.entityKind}:${entry.entityId}`, operation: entry.operation });
  }

  async listErrors(options: { runId?: number; limit?: number } = {}): Promise<StoredScrapeError[]> {
    const rows = options.runId !== undefined
      ? await this.db.allAsync<ScrapeErrorRow>(
          'SELECT * FROM scrape_errors WHERE run_id = ? ORDER BY id DESC LIMIT ?',
          [options.runId, options.limit ?? 100]
        )
      : await this.db.allAsync<ScrapeErrorRow>(
          'SELECT * FROM scrape_errors ORDER BY id DESC LIMIT ?',
          [options.limit ?? 100]
        );
    return rows.map(row => ({
      id: row.id,
      runId: row.run_id,
      albumSourceId: row.album_source_id,
      entityKind: row.entity_kind,
      entityId: row.entity_id,
      operation: row.operation,
      category: row.category,
      message: row.message,
      createdAt: row.created_at,
    }));
  }

  // ============================================
  // STATS
  // ============================================

  async getStats(): Promise<StoreStats> {
    const count = async (sql: string, params: unknown[] = []) =>
      (await this.db.getAsync<{ n: number }>(sql, params))?.n ?? 0;

    const [users, usersForDestination, albums, albumsFinished, assets, albumAssets, tags, tagTombstones, errors] =
      await Promise.all([
        count('SELECT COUNT(*) AS n FROM users'),
        count('SELECT COUNT(*) AS n FROM users WHERE add_to_destination = 1'),
        count('SELECT COUNT(*) AS n FROM albums'),
        count(`SELECT COUNT(*) AS n FROM albums a
               WHERE EXISTS (SELECT 1 FROM checkpoints c WHERE c.unit = '${ALBUM_UNIT_PREFIX}' || a.source_id)`),
        count('SELECT COUNT(*) AS n FROM assets'),
        count('SELECT COUNT(*) AS n FROM album_assets'),
        count('SELECT COUNT(*) AS n FROM tags WHERE deleted_at IS NULL'),
        count('SELECT COUNT(*) AS n FROM tags WHERE deleted_at IS NOT NULL'),
        count('SELECT COUNT(*) AS n FROM scrape_errors'),
      ]);

    const mappingRows = await this.db.allAsync<{ entity_kind: EntityKind; n: number }>(
      'SELECT entity_kind, COUNT(*) AS n FROM mappings GROUP BY entity_kind'
    );
    const mappings: Record<EntityKind, number> = { user: 0, album: 0, asset: 0, tag: 0 };
    for (const row of mappingRows) {
      mappings[row.entity_kind] = row.n;
    }

    const lastRunRow = await this.db.getAsync<ScrapeRunRow>('SELECT * FROM scrape_runs ORDER BY id DESC LIMIT 1');

    const albumDetails = await this.db.allAsync<{
      source_id: string;
      title: string;
      item_count: number;
      stored_items: number;
      finished: number;
      errors: number;
    }>(
      `SELECT a.source_id, a.title, a.item_count,
              (SELECT COUNT(*) FROM album_assets aa WHERE aa.album_source_id = a.source_id) AS stored_items,
              EXISTS (SELECT 1 FROM checkpoints c WHERE c.unit = '${ALBUM_UNIT_PREFIX}' || a.source_id) AS finished,
              (SELECT COUNT(*) FROM scrape_errors e WHERE e.album_source_id = a.source_id) AS errors
       FROM albums a
       ORDER BY a.position, a.source_id`
    );

    return {
      users,
      usersForDestination,
      albums,
      albumsFinished,
      assets,
      albumAssets,
      tags,
      tagTombstones,
      mappings,
      errors,
      lastRun: lastRunRow ? toRun(lastRunRow) : null,
      albumDetails: albumDetails.map((row): AlbumStats => ({
        sourceId: row.source_id,
        title: row.title,
        itemCount: row.item_count,
        storedItems: row.stored_items,
        finished: row.finished === 1,
        errors: row.errors,
      })),
      databaseSizeBytes: await this.db.getDatabaseSize(),
    };
  }
}
