#!/usr/bin/env node
/**
 * Build per-region stunting statistics from the screening CSV and the kecamatan boundaries.
 *
 * Input:  SCREENING_CSV (default data/screening.csv), REGIONS_GEOJSON (default data/regions.geojson)
 * Output: OUT_DIR (default data/out)/stats.json, regions-joined.geojson, diagnostics.json
 *
 * Run: npm run build:stats
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from './lib/config';
import { LoadError } from './lib/errors';
import { formatMismatchWarning } from './lib/join';
import { DatasetLoader } from './lib/loader';
import { runPipeline } from './lib/pipeline';

async function main(): Promise<void> {
  const config = loadConfig();
  console.log('Building region stunting statistics...\n');

  const loader = new DatasetLoader(config);
  const records = loader.records();
  console.log(`  Records: ${records.length} (${config.screeningCsv})`);
  const catalog = await loader.catalog();
  console.log(`  Boundary features: ${catalog.featureCount} in ${catalog.size} region(s) (${config.regionsPath})`);
  if (catalog.skipped > 0) {
    console.warn(`  Skipped ${catalog.skipped} boundary feature(s) without geometry`);
  }

  const { table, joined, diagnostics, summary } = runPipeline(records, catalog);

  if (!fs.existsSync(config.outDir)) fs.mkdirSync(config.outDir, { recursive: true });
  const statsPath = path.join(config.outDir, 'stats.json');
  const joinedPath = path.join(config.outDir, 'regions-joined.geojson');
  const diagnosticsPath = path.join(config.outDir, 'diagnostics.json');
  fs.writeFileSync(statsPath, JSON.stringify({ rows: table, summary }, null, 2));
  fs.writeFileSync(joinedPath, JSON.stringify(joined));
  fs.writeFileSync(diagnosticsPath, JSON.stringify(diagnostics, null, 2));

  console.log(`  Regions with data: ${summary.regionCount}`);
  console.log(`  Overall: ${summary.totalStunting}/${summary.totalRecords} stunting (${summary.percentage.toFixed(2)}%)`);
  console.log(`  Wrote ${statsPath}`);
  console.log(`  Wrote ${joinedPath}`);
  console.log(`  Wrote ${diagnosticsPath}\n`);

  const warning = formatMismatchWarning(diagnostics);
  if (warning) {
    console.warn(`  ${warning}`);
    diagnostics.unmatchedStatsKeys.forEach((key, i) => {
      const hints = diagnostics.suggestions[key] ?? [];
      const name = diagnostics.unmatchedStatsNames[i];
      if (hints.length) console.warn(`    "${name}" closest: ${hints.map((h) => `"${h}"`).join(', ')}`);
    });
  }
  if (diagnostics.unmatchedFeatureKeys.length) {
    console.log(`  Regions without records: ${diagnostics.unmatchedFeatureKeys.join(', ')}`);
  }
  if (diagnostics.duplicateFeatureKeys.length) {
    console.warn(`  Boundary names split across features (merged): ${diagnostics.duplicateFeatureKeys.join(', ')}`);
  }

  console.log('');
  for (const row of table) {
    console.log(`  ${row.key.padEnd(24)} ${row.percentage.toFixed(2).padStart(6)}%  ${row.category}`);
  }
}

main().catch((e) => {
  console.error(e instanceof LoadError ? `${e.name}: ${e.message}` : e);
  process.exit(1);
});
