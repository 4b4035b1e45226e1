import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { testStoreConfig } from '../../test-helpers.js';
import { logger } from '../../utils/logger.js';
import { StorageError, ValidationError } from '../../utils/errors.js';
import { SqliteStore } from './SqliteStore.js';

describe('SqliteStore on a file', () => {
  let dir: string;
  let path: string;
  let store: SqliteStore;
  let blocker: Database.Database;

  const count = () => store.read('t', db => db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM notes').get()?.n);

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'isms-store-'));
    path = join(dir, 'store.db');
    store = new SqliteStore(testStoreConfig({ path, maxRetries: 2, retryBaseDelayMs: 1, retryMaxDelayMs: 4 }));
    await store.write('setup', db => void db.exec('CREATE TABLE notes (body TEXT NOT NULL)'));
    blocker = new Database(path, { timeout: 0 });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    blocker.close();
    await store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('retries a locked write and gives up with StorageError', async () => {
    const warn = vi.spyOn(logger, 'warn');
    blocker.exec('BEGIN IMMEDIATE');

    const attempt = store.write('notes.insert', db => db.prepare('INSERT INTO notes (body) VALUES (?)').run('a'));
    await expect(attempt).rejects.toThrow(new StorageError('notes.insert failed: a database error occurred'));
    await expect(attempt).rejects.toMatchObject({ details: { sqliteCode: 'SQLITE_BUSY' } });
    expect(warn.mock.calls.filter(([, message]) => message === 'Store contention, retrying')).toHaveLength(2);

    blocker.exec('ROLLBACK');
    await expect(count()).resolves.toBe(0);
  });

  it('completes a write once the other connection releases its lock', async () => {
    await store.close();
    store = new SqliteStore(testStoreConfig({ path, maxRetries: 8, retryBaseDelayMs: 5, retryMaxDelayMs: 20 }));
    blocker.exec('BEGIN IMMEDIATE');
    setTimeout(() => blocker.exec('COMMIT'), 15);

    await store.write('notes.insert', db => db.prepare('INSERT INTO notes (body) VALUES (?)').run('a'));
    await expect(count()).resolves.toBe(1);
  });

  it('rolls back a unit of work that throws', async () => {
    const attempt = store.write('notes.insert', db => {
      db.prepare('INSERT INTO notes (body) VALUES (?)').run('a');
      throw new ValidationError('rejected');
    });
    await expect(attempt).rejects.toThrow(ValidationError);
    await expect(count()).resolves.toBe(0);
  });

  it('rejects work after close', async () => {
    await store.close();
    await expect(count()).rejects.toThrow('t failed: store is closed');
  });
});
