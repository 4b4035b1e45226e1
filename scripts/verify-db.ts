import { existsSync, statSync } from 'fs';
import { loadConfig } from '../src/config/index.js';
import { ComplianceService } from '../src/services/tools/ComplianceService.js';
import { chapterOf } from '../src/domain/entities/Requirement.js';

const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;

async function main(): Promise<boolean> {
  const config = loadConfig();
  const path = config.store.path;

  console.log('='.repeat(60));
  console.log('Requirement catalog verification');
  console.log('='.repeat(60));

  if (path !== ':memory:' && !existsSync(path)) {
    console.log(red(`❌ ${path} not found`));
    return false;
  }
  if (path !== ':memory:') {
    console.log(green(`✅ Database: ${path} (${(statSync(path).size / 1024).toFixed(1)} KB)`));
  }

  const service = ComplianceService.open(config);
  try {
    const resolution = await service.schema.ensureSchema();
    if (!resolution.ok) {
      resolution.reasons.forEach(reason => console.log(red(`❌ ${reason}`)));
      return false;
    }
    console.log(
      green(`✅ Catalog source: ${resolution.source.probe} v${resolution.source.version} (${resolution.source.kind})`)
    );
    console.log(resolution.searchIndex ? green('✅ Search index active') : yellow('⚠️  No search index; search scans'));

    const requirements = await service.catalog.list();
    const { overall } = await service.checkCompliance();
    console.log(`\n📊 Requirements: ${requirements.length}`);
    console.log(`   Covered: ${overall.covered} (${overall.rate.toFixed(1)}%)`);

    const byChapter = new Map<string, number>();
    requirements.forEach(r => byChapter.set(chapterOf(r.itemCode), (byChapter.get(chapterOf(r.itemCode)) ?? 0) + 1));
    console.log('\n📈 By chapter:');
    [...byChapter.entries()].forEach(([chapter, count]) => console.log(`   Chapter ${chapter}: ${count}`));
    return true;
  } finally {
    await service.close();
  }
}

main()
  .then(ok => process.exit(ok ? 0 : 1))
  .catch(error => {
    console.error(red(`Verification failed: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
