import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../../utils/logger.js';
import { isCoreError, StorageError, toStorageError } from '../../utils/errors.js';
import type { StoreConfig } from '../../config/index.js';
import { WorkerPool } from './WorkerPool.js';
import { withRetry, type RetryPolicy } from './retry.js';

export type Connection = Database.Database;

type Mode = 'read' | 'write';

/**
 * Single-file SQLite store. Every unit of work is handed to a bounded worker
 * pool and runs in its own transaction: committed when the callback returns,
 * rolled back when it throws. Lock contention is retried with backoff.
 */
export class SqliteStore {
  private db: Connection | null;
  private readonly pool: WorkerPool;
  private readonly retryPolicy: RetryPolicy;
  private closing: Promise<void> | null = null;

  constructor(private readonly storeConfig: StoreConfig) {
    const { path } = storeConfig;
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }

    const db = new Database(path);
    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${storeConfig.busyTimeoutMs}`);
    if (path !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.function('casefold', { deterministic: true }, (value: unknown) =>
      typeof value === 'string' ? value.toLowerCase() : null
    );

    this.db = db;
    this.pool = new WorkerPool(storeConfig.workers);
    this.retryPolicy = {
      maxRetries: storeConfig.maxRetries,
      baseDelayMs: storeConfig.retryBaseDelayMs,
      maxDelayMs: storeConfig.retryMaxDelayMs,
    };

    logger.info({ path, workers: storeConfig.workers }, 'SQLite store opened');
  }

  get path(): string {
    return this.storeConfig.path;
  }

  get searchIndexEnabled(): boolean {
    return this.storeConfig.searchIndex;
  }

  read<T>(label: string, fn: (db: Connection) => T): Promise<T> {
    return this.execute('read', label, fn);
  }

  write<T>(label: string, fn: (db: Connection) => T): Promise<T> {
    return this.execute('write', label, fn);
  }

  testConnection(): boolean {
    if (!this.db) return false;
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      logger.warn({ error }, 'SQLite connection check failed');
      return false;
    }
  }

  /** Waits for queued work, then releases the file handle. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.pool.onIdle().then(() => {
        this.db?.close();
        this.db = null;
        logger.info({ path: this.storeConfig.path }, 'SQLite store closed');
      });
    }
    return this.closing;
  }

  private execute<T>(mode: Mode, label: string, fn: (db: Connection) => T): Promise<T> {
    if (this.closing) {
      return Promise.reject(new StorageError(`${label} failed: store is closed`));
    }

    return this.pool.submit(async () => {
      const db = this.connection();
      const unit = db.transaction(fn);
      try {
        return await withRetry(
          () => (mode === 'write' ? unit.immediate(db) : unit.deferred(db)),
          this.retryPolicy,
          {
            onRetry: (attempt, delayMs, error) =>
              logger.warn({ label, attempt, delayMs, error }, 'Store contention, retrying'),
          }
        );
      } catch (error) {
        if (isCoreError(error)) throw error;
        logger.error({ label, error }, 'Store operation failed');
        throw toStorageError(error, label);
      }
    });
  }

  private connection(): Connection {
    if (!this.db) {
      throw new StorageError('SQLite store is closed');
    }
    return this.db;
  }
}
