import type { ComplianceConfig, StoreConfig } from './config/index.js';
import type { RequirementInput } from './services/catalog/CatalogProvisioner.js';
import { ComplianceService } from './services/tools/ComplianceService.js';

export const testStoreConfig = (overrides: Partial<StoreConfig> = {}): StoreConfig => ({
  path: ':memory:',
  busyTimeoutMs: 0,
  maxRetries: 2,
  retryBaseDelayMs: 1,
  retryMaxDelayMs: 4,
  workers: 1,
  searchIndex: true,
  ...overrides,
});

export const testComplianceConfig = (overrides: Partial<ComplianceConfig> = {}): ComplianceConfig => ({
  okThreshold: 80,
  warnThreshold: 50,
  reportEpoch: '2020-01-01',
  recentEvidenceLimit: 5,
  ...overrides,
});

/** Manually advanced clock; starts at 2026-03-15T09:30:00Z. */
export class TestClock {
  private current: number;

  constructor(start = '2026-03-15T09:30:00.000Z') {
    this.current = Date.parse(start);
  }

  readonly now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  set(iso: string): void {
    this.current = Date.parse(iso);
  }
}

export function createTestService(
  options: { store?: Partial<StoreConfig>; compliance?: Partial<ComplianceConfig>; clock?: TestClock } = {}
): { service: ComplianceService; clock: TestClock } {
  const clock = options.clock ?? new TestClock();
  const service = ComplianceService.open(
    { store: testStoreConfig(options.store), compliance: testComplianceConfig(options.compliance) },
    { clock: clock.now }
  );
  return { service, clock };
}

export const SAMPLE_REQUIREMENTS: RequirementInput[] = [
  {
    itemCode: '1.1.1',
    category: '관리체계 기반 마련',
    title: '정책 수립',
    description: '정보보호 정책을 수립하고 승인받아야 한다',
  },
  {
    itemCode: '2.10.1',
    category: '시스템 및 서비스 보안관리',
    title: 'Security Baseline',
    description: 'Hardened Configuration for servers',
  },
  {
    itemCode: '2.2.1',
    category: '인적 보안',
    title: '주요 직무자 지정',
    requirementText: '접근권한 보유자를 주요 직무자로 지정',
  },
  {
    itemCode: '2.7.1',
    category: '암호화 적용',
    title: '암호정책 수립',
    description: '암호화 대상과 알고리즘 기준',
  },
  {
    itemCode: '3.2.2',
    category: '개인정보 보호',
    title: '개인정보 암호화',
    requirementText: '고유식별정보는 저장 시 보호',
  },
];
