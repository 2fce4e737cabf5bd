#!/usr/bin/env npx tsx
/**
 * Seed the cosmetic catalog and loot tables from data/catalog.json.
 * Safe to re-run: rows already present by name are skipped.
 *
 * Usage: npx tsx scripts/seed-catalog.ts [path/to/catalog.json]
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '../src/config.js';
import { initializeDatabase, openDatabase, withUnitOfWork } from '../src/db/index.js';
import { catalogFileSchema, seedCatalog } from '../src/db/seed.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function main() {
  const config = loadConfig();
  const catalogPath = process.argv[2] ?? path.join(__dirname, '..', 'data', 'catalog.json');

  const parsed = catalogFileSchema.safeParse(JSON.parse(fs.readFileSync(catalogPath, 'utf-8')));
  if (!parsed.success) {
    console.error(`❌ ${catalogPath} is not a valid catalog:`);
    for (const issue of parsed.error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  const { db, sqlite } = openDatabase(config.dbPath);
  initializeDatabase(sqlite);

  const summary = withUnitOfWork(db, (uow) => seedCatalog(uow, parsed.data));
  sqlite.close();

  console.log(`Seeded ${config.dbPath} from ${catalogPath}`);
  console.log(`  Cosmetics:   ${summary.cosmeticsInserted} inserted, ${summary.cosmeticsSkipped} already present`);
  console.log(`  Loot tables: ${summary.lootTablesInserted} inserted, ${summary.lootTablesSkipped} already present`);
}

main();
