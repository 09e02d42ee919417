/**
 * Demo: load the bundled sample catalog and run a few searches.
 * Usage: npx tsx scripts/demo.ts
 */
import { loadConfig } from '../src/core/config.js';
import { CsvCatalogLoader } from '../src/data-sources/catalog-loader.js';
import { CatalogStore, buildCatalogSnapshot } from '../src/data-sources/catalog-store.js';
import { DiagnosisSearchPipeline } from '../src/domain/diagnosis/search-pipeline.js';
import type { QuerySpec } from '../src/domain/diagnosis/types.js';

const config = loadConfig();
const store = new CatalogStore(buildCatalogSnapshot(await new CsvCatalogLoader(config.sources).load()));
const pipeline = new DiagnosisSearchPipeline(store, config.search);

const stats = pipeline.stats();
console.log(`Catalog: ${stats.terms} terms, ${stats.macros} macrogroupings, ${stats.groups} groups, ${stats.sites} sites`);
console.log(`Macrogroupings: ${pipeline.filterOptions('macro').map((n) => n.name).join(', ')}`);

// ── Queries ─────────────────────────────────────────────────────────
const queries: Array<{ label: string; spec: QuerySpec }> = [
  { label: 'typo, no filter', spec: { text: 'well differenciated', threshold: 50 } },
  { label: 'word order swapped', spec: { text: 'liposarcoma myxoid' } },
  { label: 'soft tissue only', spec: { text: 'sarcoma', macroId: 'Soft tissue', threshold: 60 } },
  { label: 'filter only (CNS)', spec: { macroId: 'CNS' } },
  { label: 'filter only (CNS > Brain > Cerebrum)', spec: { macroId: 'CNS', groupId: 'CNS::Brain', siteId: 'CNS::Brain::Cerebrum' } },
];

for (const { label, spec } of queries) {
  const result = pipeline.query(spec);
  console.log(`\n── ${label} ── count=${result.count} truncated=${result.truncated}`);
  if (result.matches.length === 0) {
    console.log(`  ids: ${result.ids.join(',')}`);
    continue;
  }
  for (const m of result.matches) {
    console.log(`  ${String(m.score).padStart(3)}  ${m.code.padEnd(8)} ${m.name}`);
  }
}

// ── Cascading selection ─────────────────────────────────────────────
let selection = pipeline.newSelection().selectMacro('CNS');
console.log(`\nGroups under CNS: ${selection.options('group').map((n) => n.name).join(', ')}`);
selection = selection.selectGroup('CNS::Brain');
console.log(`Sites under CNS > Brain: ${selection.options('site').map((n) => n.name).join(', ')}`);
selection = selection.clear();
try {
  selection.options('group');
} catch (err) {
  console.log(`After clear: ${err instanceof Error ? err.message : String(err)}`);
}
