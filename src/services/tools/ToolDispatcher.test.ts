import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createTestService } from '../../test-helpers.js';
import type { ComplianceService } from './ComplianceService.js';
import { ToolDispatcher } from './ToolDispatcher.js';

describe('ToolDispatcher', () => {
  let service: ComplianceService;
  let dispatcher: ToolDispatcher;

  beforeEach(async () => {
    ({ service } = createTestService());
    dispatcher = new ToolDispatcher(service);
    await service.provisioner.provision([
      { itemCode: '1.1.1', category: '관리체계 기반 마련', title: '정책 수립' },
      { itemCode: '2.7.1', category: '암호화 적용', title: '암호정책 수립' },
      { itemCode: '3.2.2', category: '개인정보 보호', title: '개인정보 암호화' },
    ]);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await service.close();
  });

  it('records evidence and reflects it in the compliance check', async () => {
    const before = await dispatcher.call('check_compliance', { category: '관리체계 기반 마련' });
    expect(before.ok && before.operation === 'check_compliance' && before.data.overall).toEqual({
      total: 1,
      covered: 0,
      rate: 0,
    });

    await expect(
      dispatcher.call('generate_evidence', { item_code: '1.1.1', evidence_type: '문서', content: '정책문서' })
    ).resolves.toEqual({
      ok: true,
      operation: 'generate_evidence',
      data: {
        id: 1,
        itemCode: '1.1.1',
        title: '정책 수립',
        evidenceType: '문서',
        content: '정책문서',
        status: 'completed',
        createdAt: '2026-03-15T09:30:00.000Z',
      },
    });

    const after = await dispatcher.call('check_compliance', { category: '관리체계 기반 마련' });
    expect(after.ok && after.operation === 'check_compliance' && after.data.overall).toEqual({
      total: 1,
      covered: 1,
      rate: 100,
    });
  });

  it('returns search hits ordered by item code', async () => {
    const result = await dispatcher.call('search_requirements', { keyword: '암호' });
    expect(result.ok).toBe(true);
    if (result.ok && result.operation === 'search_requirements') {
      expect(result.data.keyword).toBe('암호');
      expect(result.data.count).toBe(2);
      expect(result.data.requirements.map(r => r.itemCode)).toEqual(['2.7.1', '3.2.2']);
    }
  });

  it('returns a requirement with its evidence', async () => {
    await dispatcher.call('generate_evidence', { item_code: '2.7.1', evidence_type: '문서', content: '암호정책' });
    const result = await dispatcher.call('get_requirement_detail', { item_code: ' 2.7.1 ' });
    expect(result.ok && result.operation === 'get_requirement_detail' && result.data.evidenceCount).toBe(1);
  });

  it('answers generate_evidence from the insert transaction alone', async () => {
    const get = vi.spyOn(service.catalog, 'get').mockRejectedValue(new Error('read failed'));
    const result = await dispatcher.call('generate_evidence', {
      item_code: '2.7.1',
      evidence_type: '문서',
      content: '암호정책',
    });

    expect(result.ok && result.operation === 'generate_evidence' && result.data.title).toBe('암호정책 수립');
    expect(get).not.toHaveBeenCalled();
  });

  it('reports an unknown item code as NotFound without writing', async () => {
    await expect(
      dispatcher.call('generate_evidence', { item_code: '9.9.9', evidence_type: '문서', content: 'x' })
    ).resolves.toEqual({
      ok: false,
      operation: 'generate_evidence',
      error: { kind: 'NotFound', code: 'NOT_FOUND', message: 'Requirement not found: 9.9.9' },
    });
    await expect(service.evidence.countDistinctCovered()).resolves.toBe(0);
  });

  it('reports unknown operations and bad arguments', async () => {
    await expect(dispatcher.call('drop_tables', {})).resolves.toEqual({
      ok: false,
      operation: 'drop_tables',
      error: { kind: 'NotFound', code: 'NOT_FOUND', message: 'Unknown operation: drop_tables' },
    });
    await expect(dispatcher.call('create_audit_report', { start_date: '2026-13-01' })).resolves.toEqual({
      ok: false,
      operation: 'create_audit_report',
      error: {
        kind: 'ValidationError',
        code: 'VALIDATION_ERROR',
        message: "start_date must be a calendar date in YYYY-MM-DD form, got '2026-13-01'",
      },
    });
  });

  it('wraps unexpected failures as StorageError', async () => {
    vi.spyOn(service, 'searchRequirements').mockRejectedValue(new Error('boom'));
    await expect(dispatcher.call('search_requirements', { keyword: '암호' })).resolves.toEqual({
      ok: false,
      operation: 'search_requirements',
      error: {
        kind: 'StorageError',
        code: 'STORAGE_ERROR',
        message: 'search_requirements failed: a database error occurred',
      },
    });
  });

  it('lists the five operations', () => {
    expect(dispatcher.listTools()).toHaveLength(5);
  });
});

describe('ToolDispatcher without a catalog', () => {
  it('reports SchemaMissing', async () => {
    const { service } = createTestService();
    const result = await new ToolDispatcher(service).call('check_compliance', {});
    expect(result).toEqual({
      ok: false,
      operation: 'check_compliance',
      error: {
        kind: 'SchemaMissing',
        code: 'SCHEMA_MISSING',
        message: 'No usable requirement catalog: no known catalog tables found',
      },
    });
    await service.close();
  });

  it('reports a closed store as StorageError', async () => {
    const { service } = createTestService();
    await service.close();
    const result = await new ToolDispatcher(service).call('search_requirements', { keyword: '암호' });
    expect(result).toEqual({
      ok: false,
      operation: 'search_requirements',
      error: { kind: 'StorageError', code: 'STORAGE_ERROR', message: 'ensureSchema failed: store is closed' },
    });
  });
});
