import { readFileSync } from 'fs';
import { z } from 'zod';
import { loadConfig } from '../src/config/index.js';
import { ComplianceService } from '../src/services/tools/ComplianceService.js';
import { requirementInputSchema } from '../src/services/catalog/CatalogProvisioner.js';

const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;

async function main() {
  const config = loadConfig();
  const source = process.argv[2] ?? new URL('../data/requirements.json', import.meta.url);
  const requirements = z.array(requirementInputSchema).parse(JSON.parse(readFileSync(source, 'utf-8')));

  console.log(`📁 Initializing database: ${config.store.path}`);
  const service = ComplianceService.open(config);
  try {
    const { inserted, updated } = await service.provisioner.provision(requirements);
    console.log(green(`✅ ${inserted} requirements inserted, ${updated} updated`));

    const sample = (await service.catalog.list()).slice(0, 5);
    console.log('\n📋 Sample data:');
    sample.forEach(r => console.log(`  - ${r.itemCode}: ${r.title}`));
  } finally {
    await service.close();
  }
}

main().catch(error => {
  console.error(red(`Database initialization failed: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
