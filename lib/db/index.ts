import sqlite3 from 'sqlite3';
import { promises as fs } from 'fs';
import path from 'path';
import { StoreCorruptionError } from '../errors';
import { log } from '../logger';
import { RetryPolicy } from '../retry';

export const DEFAULT_DATABASE_PATH = './photos.db';

const BUSY_TIMEOUT_MS = 30000;
const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

export type SqlParams = ReadonlyArray<unknown>;

export interface RunResult {
  lastID: number;
  changes: number;
}

/** Read/write surface handed to transaction callbacks */
export interface SqlExecutor {
  runAsync(sql: string, params?: SqlParams): Promise<RunResult>;
  getAsync<T>(sql: string, params?: SqlParams): Promise<T | undefined>;
  allAsync<T>(sql: string, params?: SqlParams): Promise<T[]>;
}

// Check if an error is a SQLite busy/locked error
export function isBusyError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return message.includes('sqlite_busy') ||
           message.includes('database is locked') ||
           message.includes('sqlite_locked');
  }
  return false;
}

const busyRetry = new RetryPolicy({
  maxAttempts: 10,
  baseDelayMs: 50,
  maxDelayMs: 2000,
  retryOn: isBusyError,
  scope: 'db',
});

export class Database implements SqlExecutor {
  readonly path: string;
  private db: sqlite3.Database | null = null;
  private initPromise: Promise<sqlite3.Database> | null = null;

  // Write queue to serialize write operations
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(databasePath: string = DEFAULT_DATABASE_PATH) {
    this.path = databasePath;
  }

  get isMemory(): boolean {
    return this.path === ':memory:';
  }

  private async ensureDirectoryExists() {
    if (this.isMemory) return;
    await fs.mkdir(path.dirname(path.resolve(this.path)), { recursive: true });
  }

  private initialize(): Promise<sqlite3.Database> {
    if (!this.initPromise) {
      this.initPromise = this.doInitialize().catch((error: unknown) => {
        this.initPromise = null;
        throw error;
      });
    }
    return this.initPromise;
  }

  private async doInitialize(): Promise<sqlite3.Database> {
    await this.ensureDirectoryExists();

    const handle = await new Promise<sqlite3.Database>((resolve, reject) => {
      const opened = new sqlite3.Database(this.path, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(opened);
      });
    });

    // WAL mode lets reporting queries read while the scraper writes
    await runOn(handle, 'PRAGMA journal_mode = WAL');
    await runOn(handle, `PRAGMA busy_timeout = ${BUSY_TIMEOUT_MS}`);
    await runOn(handle, 'PRAGMA foreign_keys = ON');
    await runOn(handle, 'PRAGMA synchronous = NORMAL');

    const check = await allOn<{ quick_check: string }>(handle, 'PRAGMA quick_check');
    const problems = check.map(row => row.quick_check).filter(result => result !== 'ok');
    if (problems.length > 0) {
      await closeHandle(handle);
      throw new StoreCorruptionError(this.path, problems.slice(0, 3).join('; '));
    }

    const schema = await fs.readFile(SCHEMA_PATH, 'utf-8');
    const statements = schema
      .split(';')
      .map(s => s.trim())
      .filter(s => s.length > 0);

    for (const statement of statements) {
      await runOn(handle, statement);
    }

    log.debug('db', 'Database opened', { path: this.path });
    this.db = handle;
    return handle;
  }

  private async getDb(): Promise<sqlite3.Database> {
    return this.db ?? this.initialize();
  }

  async open(): Promise<void> {
    await this.getDb();
  }

  // Raw run without retry
  private async runAsyncRaw(sql: string, params: SqlParams = []): Promise<RunResult> {
    return runOn(await this.getDb(), sql, params);
  }

  async runAsync(sql: string, params: SqlParams = []): Promise<RunResult> {
    return busyRetry.run(() => this.runAsyncRaw(sql, params), sql.substring(0, 50));
  }

  // Queued run - serializes write operations to prevent lock contention
  async runAsyncQueued(sql: string, params: SqlParams = []): Promise<RunResult> {
    return this.queueWrite(() => this.runAsync(sql, params));
  }

  async getAsync<T>(sql: string, params: SqlParams = []): Promise<T | undefined> {
    const handle = await this.getDb();
    return busyRetry.run(() => getOn<T>(handle, sql, params), sql.substring(0, 50));
  }

  async allAsync<T>(sql: string, params: SqlParams = []): Promise<T[]> {
    const handle = await this.getDb();
    return busyRetry.run(() => allOn<T>(handle, sql, params), sql.substring(0, 50));
  }

  // Queue write operations to serialize them
  private async queueWrite<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.writeQueue.then(operation);

    // A failed write must not poison the writes queued behind it
    this.writeQueue = result.then(
      () => undefined,
      () => undefined
    );

    return result;
  }

  /**
   * Run `fn` inside one IMMEDIATE transaction, serialized with every other
   * queued write. Transactions do not nest.
   */
  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return this.queueWrite(() => busyRetry.run(async () => {
      await this.runAsyncRaw('BEGIN IMMEDIATE TRANSACTION');
      try {
        const result = await fn(this);
        await this.runAsyncRaw('COMMIT');
        return result;
      } catch (error) {
        try {
          await this.runAsyncRaw('ROLLBACK');
        } catch (rollbackError) {
          log.error('db', 'Rollback failed', undefined, rollbackError);
        }
        throw error;
      }
    }, 'transaction'));
  }

  async dropAll(): Promise<void> {
    const tables = await this.allAsync<{ name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'`
    );
    await this.queueWrite(async () => {
      await this.runAsyncRaw('PRAGMA foreign_keys = OFF');
      for (const table of tables) {
        await this.runAsyncRaw(`DROP TABLE IF EXISTS "${table.name}"`);
      }
      await this.runAsyncRaw('PRAGMA foreign_keys = ON');
    });
    // The schema is recreated on next open
    await this.close();
  }

  async getDatabaseSize(): Promise<number> {
    if (this.isMemory) return 0;
    try {
      const stats = await fs.stat(this.path);
      return stats.size;
    } catch {
      return 0;
    }
  }

  async close(): Promise<void> {
    // Wait for any pending writes to complete
    await this.writeQueue;

    if (this.db) {
      const handle = this.db;
      this.db = null;
      this.initPromise = null;
      await closeHandle(handle);
    }
  }
}

function runOn(handle: sqlite3.Database, sql: string, params: SqlParams = []): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    handle.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
      if (err) {
        reject(err);
      } else {
        resolve({
          lastID: this.lastID ?? 0,
          changes: this.changes ?? 0,
        });
      }
    });
  });
}

function getOn<T>(handle: sqlite3.Database, sql: string, params: SqlParams = []): Promise<T | undefined> {
  return new Promise((resolve, reject) => {
    handle.get(sql, params, (err: Error | null, row: unknown) => {
      if (err) {
        reject(err);
      } else {
        resolve((row as T) ?? undefined);
      }
    });
  });
}

function allOn<T>(handle: sqlite3.Database, sql: string, params: SqlParams = []): Promise<T[]> {
  return new Promise((resolve, reject) => {
    handle.all(sql, params, (err: Error | null, rows: unknown[]) => {
      if (err) {
        reject(err);
      } else {
        resolve(rows as T[]);
      }
    });
  });
}

function closeHandle(handle: sqlite3.Database): Promise<void> {
  return new Promise((resolve, reject) => {
    handle.close((err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
