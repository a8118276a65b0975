/**
 * Load a JSON archive file into the historical tables
 * Usage: npx ts-node scripts/import-historical-data.ts [file]
 * Defaults to data/historical-sample.json. Run src/db/migrate.ts first.
 */
import { readFileSync } from 'fs';
import * as path from 'path';
import { env } from '../src/config/env.config';
import { closePool, createPool } from '../src/db/pool';
import {
  importHistoricalArchive,
  parseHistoricalArchive,
} from '../src/integrations/historical/historical-import';
import { HistoricalRepository } from '../src/integrations/historical/historical.repository';

async function main() {
  const file = path.resolve(process.argv[2] ?? path.join(__dirname, '..', 'data', 'historical-sample.json'));

  if (!env.DATABASE_URL) {
    console.error('ERROR: DATABASE_URL environment variable is not set');
    process.exit(1);
  }

  console.log(`Importing historical archive from ${file}...`);
  const archive = parseHistoricalArchive(JSON.parse(readFileSync(file, 'utf-8')));

  const pool = createPool(env.DATABASE_URL);
  try {
    const summary = await importHistoricalArchive(new HistoricalRepository(pool), archive);
    console.log('\nImport complete!');
    console.log(`  Teams: ${summary.teams}`);
    console.log(`  Players: ${summary.players}`);
    console.log(`  Batting seasons: ${summary.battingSeasons}`);
    console.log(`  Pitching seasons: ${summary.pitchingSeasons}`);
  } finally {
    await closePool(pool);
  }
}

main().catch((error) => {
  console.error('Import failed:', error);
  process.exit(1);
});
