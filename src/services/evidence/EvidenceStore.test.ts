import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createTestService, SAMPLE_REQUIREMENTS, type TestClock } from '../../test-helpers.js';
import type { ComplianceService } from '../tools/ComplianceService.js';
import { NotFoundError, SchemaMissingError, ValidationError } from '../../utils/errors.js';

describe('EvidenceStore', () => {
  let service: ComplianceService;
  let clock: TestClock;

  const evidenceRows = () =>
    service.store.read('t', db => db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM evidences').get()?.n);

  beforeEach(async () => {
    ({ service, clock } = createTestService());
    await service.provisioner.provision(SAMPLE_REQUIREMENTS);
  });

  afterEach(async () => {
    await service.close();
  });

  it('inserts a completed record stamped with the clock', async () => {
    await expect(
      service.evidence.insert({ itemCode: ' 1.1.1 ', evidenceType: '문서', content: '정책문서' })
    ).resolves.toEqual({
      id: 1,
      itemCode: '1.1.1',
      evidenceType: '문서',
      content: '정책문서',
      status: 'completed',
      createdAt: '2026-03-15T09:30:00.000Z',
      updatedAt: '2026-03-15T09:30:00.000Z',
      title: '정책 수립',
    });
  });

  it('fails with NotFound and writes nothing for an unknown item code', async () => {
    await expect(service.evidence.insert({ itemCode: '9.9.9', evidenceType: '문서', content: 'x' })).rejects.toThrow(
      NotFoundError
    );
    expect(await evidenceRows()).toBe(0);
  });

  it('rejects blank fields', async () => {
    await expect(service.evidence.insert({ itemCode: '1.1.1', evidenceType: ' ', content: '' })).rejects.toThrow(
      new ValidationError('Missing required field(s): evidence_type, content')
    );
    expect(await evidenceRows()).toBe(0);
  });

  it('returns recent records newest first, ties in insertion order', async () => {
    const first = await service.evidence.insert({ itemCode: '2.7.1', evidenceType: '문서', content: 'a' });
    const second = await service.evidence.insert({ itemCode: '2.7.1', evidenceType: '로그', content: 'b' });
    clock.advance(1000);
    const third = await service.evidence.insert({ itemCode: '2.7.1', evidenceType: '스크린샷', content: 'c' });

    const ids = async (limit: number) => (await service.evidence.recent('2.7.1', limit)).map(e => e.id);
    expect(await ids(5)).toEqual([third.id, first.id, second.id]);
    expect(await ids(2)).toEqual([third.id, first.id]);
    await expect(service.evidence.recent('2.7.1', 0)).rejects.toThrow(ValidationError);
    await expect(service.evidence.countFor('2.7.1')).resolves.toBe(3);
  });

  it('counts distinct covered requirements, optionally per category', async () => {
    await service.evidence.insert({ itemCode: '1.1.1', evidenceType: '문서', content: 'a' });
    await service.evidence.insert({ itemCode: '1.1.1', evidenceType: '문서', content: 'b' });
    await service.evidence.insert({ itemCode: '2.7.1', evidenceType: '문서', content: 'c' });

    await expect(service.evidence.countDistinctCovered()).resolves.toBe(2);
    await expect(service.evidence.countDistinctCovered('암호화 적용')).resolves.toBe(1);
    await expect(service.evidence.countDistinctCovered('인적 보안')).resolves.toBe(0);
  });
});

describe('EvidenceStore without a catalog', () => {
  it('fails with SchemaMissing', async () => {
    const { service } = createTestService();
    await expect(service.evidence.insert({ itemCode: '1.1.1', evidenceType: '문서', content: 'x' })).rejects.toThrow(
      SchemaMissingError
    );
    await service.close();
  });
});
