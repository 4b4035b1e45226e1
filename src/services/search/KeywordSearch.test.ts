import { afterEach, describe, it, expect } from 'vitest';
import { createTestService, SAMPLE_REQUIREMENTS } from '../../test-helpers.js';
import type { ComplianceService } from '../tools/ComplianceService.js';
import { ValidationError } from '../../utils/errors.js';
import { toPhrase } from './KeywordSearch.js';

const services: ComplianceService[] = [];

async function seeded(searchIndex: boolean): Promise<ComplianceService> {
  const { service } = createTestService({ store: { searchIndex } });
  await service.provisioner.provision(SAMPLE_REQUIREMENTS);
  services.push(service);
  return service;
}

const codes = async (service: ComplianceService, keyword: string) =>
  (await service.search.search(keyword)).map(r => r.itemCode);

afterEach(async () => {
  await Promise.all(services.splice(0).map(s => s.close()));
});

describe.each([true, false])('KeywordSearch (search index %s)', searchIndex => {
  it('matches a substring in any text field, ordered by item code', async () => {
    const service = await seeded(searchIndex);
    expect(await codes(service, '암호')).toEqual(['2.7.1', '3.2.2']);
    expect(await codes(service, '암호화')).toEqual(['2.7.1', '3.2.2']);
    expect(await codes(service, '접근권한')).toEqual(['2.2.1']);
    expect(await codes(service, '인적 보안')).toEqual(['2.2.1']);
  });

  it('ignores case', async () => {
    const service = await seeded(searchIndex);
    expect(await codes(service, 'HARDENED')).toEqual(['2.10.1']);
    expect(await codes(service, 'security BASELINE')).toEqual(['2.10.1']);
  });

  it('keeps surrounding whitespace as part of the keyword', async () => {
    const service = await seeded(searchIndex);
    expect(await codes(service, ' hardened')).toEqual([]);
    expect(await codes(service, ' HARDENED ')).toEqual([]);
    expect(await codes(service, 'hardened ')).toEqual(['2.10.1']);
    expect(await codes(service, '   ')).toEqual([]);
  });

  it('folds non-ASCII capitals the same way on every path', async () => {
    const service = await seeded(searchIndex);
    await service.provisioner.provision([{ itemCode: '9.1.1', title: 'İstanbul office' }]);
    expect(await codes(service, 'İst')).toEqual(['9.1.1']);
    expect(await codes(service, 'İSTANBUL')).toEqual(['9.1.1']);
  });

  it('treats LIKE wildcards literally', async () => {
    const service = await seeded(searchIndex);
    expect(await codes(service, '%')).toEqual([]);
    expect(await codes(service, '_')).toEqual([]);
  });

  it('returns nothing when no field matches', async () => {
    const service = await seeded(searchIndex);
    expect(await codes(service, '클라우드')).toEqual([]);
  });
});

describe('KeywordSearch', () => {
  it('rejects an empty keyword', async () => {
    const service = await seeded(true);
    await expect(service.search.search('')).rejects.toThrow(new ValidationError('keyword is required'));
  });
});

describe('toPhrase', () => {
  it('quotes the needle as one phrase', () => {
    expect(toPhrase('baseline')).toBe('"baseline"');
    expect(toPhrase('say "hi"')).toBe('"say ""hi"""');
  });
});
