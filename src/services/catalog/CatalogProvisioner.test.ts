import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createTestService, SAMPLE_REQUIREMENTS, type TestClock } from '../../test-helpers.js';
import type { ComplianceService } from '../tools/ComplianceService.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';

describe('CatalogProvisioner', () => {
  let service: ComplianceService;
  let clock: TestClock;

  beforeEach(() => {
    ({ service, clock } = createTestService());
  });

  afterEach(async () => {
    await service.close();
  });

  it('creates the catalog table and inserts every row', async () => {
    await expect(service.provisioner.provision(SAMPLE_REQUIREMENTS)).resolves.toEqual({ inserted: 5, updated: 0 });
    expect(await service.catalog.list()).toHaveLength(5);
  });

  it('upserts by item code', async () => {
    await service.provisioner.provision(SAMPLE_REQUIREMENTS);
    clock.advance(60_000);

    const result = await service.provisioner.provision([
      { itemCode: '1.1.1', category: '관리체계 기반 마련', title: '정책 수립 및 승인' },
      { itemCode: '1.1.2', title: '최고책임자 지정' },
    ]);

    expect(result).toEqual({ inserted: 1, updated: 1 });
    expect((await service.catalog.get('1.1.1')).title).toBe('정책 수립 및 승인');
    expect((await service.catalog.get('1.1.2')).category).toBe('1');
    const updatedAt = await service.store.read('t', db =>
      db.prepare<[string], { updated_at: string }>('SELECT updated_at FROM requirements WHERE item_code = ?').get('1.1.1')
    );
    expect(updatedAt?.updated_at).toBe('2026-03-15T09:31:00.000Z');
  });

  it('rejects malformed rows before writing anything', async () => {
    const attempt = service.provisioner.provision([
      { itemCode: '1.1.1', title: '정책 수립' },
      { itemCode: 'one', title: ' ' },
    ]);
    await expect(attempt).rejects.toThrow(ValidationError);
    await expect(attempt).rejects.toThrow(
      'Invalid requirements (1.itemCode: item code must look like <chapter>.<section>.<item>; 1.title: title is required)'
    );
    expect((await service.schema.ensureSchema()).ok).toBe(false);
  });

  it('keeps the search index in step with inserts, updates and removals', async () => {
    await service.provisioner.provision(SAMPLE_REQUIREMENTS);
    expect((await service.searchRequirements('baseline')).requirements.map(r => r.itemCode)).toEqual(['2.10.1']);

    await service.provisioner.provision([{ itemCode: '2.10.1', category: '시스템 및 서비스 보안관리', title: '보안 설정' }]);
    expect((await service.searchRequirements('baseline')).count).toBe(0);

    await service.provisioner.provision([{ itemCode: '2.10.2', title: 'Baseline review' }]);
    expect((await service.searchRequirements('baseline')).requirements.map(r => r.itemCode)).toEqual(['2.10.2']);

    await service.provisioner.remove('2.10.2');
    expect((await service.searchRequirements('baseline')).count).toBe(0);
  });

  it('refuses to remove an unknown or referenced requirement', async () => {
    await service.provisioner.provision(SAMPLE_REQUIREMENTS);
    await service.generateEvidence('1.1.1', '문서', '정책문서');

    await expect(service.provisioner.remove('9.9.9')).rejects.toThrow(NotFoundError);
    await expect(service.provisioner.remove('1.1.1')).rejects.toThrow(
      'Requirement 1.1.1 is referenced by 1 evidence record(s)'
    );
    expect(await service.catalog.find('1.1.1')).not.toBeNull();
  });

  it('refuses to write through a compatibility view', async () => {
    await service.store.write('fixture', db => void db.exec(`CREATE TABLE isms_requirements (item_code TEXT, title TEXT)`));
    await service.schema.ensureSchema();

    await expect(service.provisioner.provision([{ itemCode: '1.1.1', title: '정책 수립' }])).rejects.toThrow(
      'requirements is a read-only compatibility view'
    );
  });
});
