import { describe, it, expect } from 'vitest';
import {
  NotFoundError,
  SchemaMissingError,
  StorageError,
  ValidationError,
  isCoreError,
  sqliteCode,
  toStorageError,
} from './errors.js';

const driverError = (message: string, code: string) => Object.assign(new Error(message), { code });

describe('core errors', () => {
  it('carries kind, code and details', () => {
    const err = new NotFoundError('Requirement not found: 9.9.9', { itemCode: '9.9.9' });
    expect(err.kind).toBe('NotFound');
    expect(err.code).toBe('NOT_FOUND');
    expect(err.name).toBe('NotFoundError');
    expect(err.details).toEqual({ itemCode: '9.9.9' });
    expect(err).toBeInstanceOf(Error);
  });

  it('recognises every core error and nothing else', () => {
    expect(isCoreError(new ValidationError('x'))).toBe(true);
    expect(isCoreError(new NotFoundError('x'))).toBe(true);
    expect(isCoreError(new SchemaMissingError('x'))).toBe(true);
    expect(isCoreError(new StorageError('x'))).toBe(true);
    expect(isCoreError(new Error('x'))).toBe(false);
    expect(isCoreError('x')).toBe(false);
  });
});

describe('sqliteCode', () => {
  it('returns SQLite result codes only', () => {
    expect(sqliteCode(driverError('database is locked', 'SQLITE_BUSY'))).toBe('SQLITE_BUSY');
    expect(sqliteCode(driverError('no such file', 'ENOENT'))).toBeUndefined();
    expect(sqliteCode(new Error('plain'))).toBeUndefined();
    expect(sqliteCode({ code: 'SQLITE_BUSY' })).toBeUndefined();
  });
});

describe('toStorageError', () => {
  it('summarises constraint failures without the SQL text', () => {
    const err = toStorageError(
      driverError('UNIQUE constraint failed: requirements.item_code', 'SQLITE_CONSTRAINT_PRIMARYKEY'),
      'catalog.provision'
    );
    expect(err).toBeInstanceOf(StorageError);
    expect(err.message).toBe('catalog.provision failed: a record with this identifier already exists');
    expect(err.details).toEqual({
      cause: 'UNIQUE constraint failed: requirements.item_code',
      sqliteCode: 'SQLITE_CONSTRAINT_PRIMARYKEY',
    });
  });

  it('maps CHECK and NOT NULL failures', () => {
    expect(toStorageError(new Error('CHECK constraint failed: status'), 'evidence.insert').message).toBe(
      'evidence.insert failed: a value violates a column constraint'
    );
    expect(toStorageError(new Error('NOT NULL constraint failed: evidences.content'), 'evidence.insert').message).toBe(
      'evidence.insert failed: a required column was missing'
    );
  });

  it('falls back to a generic message for other values', () => {
    const err = toStorageError('disk I/O error', 'report.build');
    expect(err.message).toBe('report.build failed: a database error occurred');
    expect(err.details).toEqual({ cause: 'disk I/O error', sqliteCode: undefined });
  });

  it('passes storage errors through untouched', () => {
    const original = new StorageError('already wrapped');
    expect(toStorageError(original, 'x')).toBe(original);
  });
});
