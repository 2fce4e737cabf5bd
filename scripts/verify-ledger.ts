#!/usr/bin/env npx tsx
/**
 * Replay every player's currency ledger and compare it with the stored balance.
 * Exits 1 when any player is inconsistent.
 *
 * Usage: npx tsx scripts/verify-ledger.ts [playerId]
 */

import { loadConfig } from '../src/config.js';
import { openDatabase, schema } from '../src/db/index.js';
import { replayLedger } from '../src/engine/ledger.js';
import { parsePlayerIdArgument } from '../src/schemas/common.js';

function main() {
  const only = parsePlayerIdArgument(process.argv[2]);
  if (only === null) {
    console.error(`Invalid player id: ${process.argv[2]}`);
    process.exit(1);
  }

  const config = loadConfig();
  const { db, sqlite } = openDatabase(config.dbPath);

  const playerIds = only !== undefined
    ? [only]
    : db.select({ playerId: schema.playerProgression.playerId }).from(schema.playerProgression).all().map((row) => row.playerId);

  let inconsistent = 0;
  for (const playerId of playerIds) {
    const report = replayLedger(db, playerId);
    if (report.consistent) continue;

    inconsistent++;
    console.log(`Player ${playerId}: stored ${report.storedBalance}, replayed ${report.replayedBalance} over ${report.transactionCount} rows`);
    for (const mismatch of report.mismatches) {
      console.log(`  tx ${mismatch.transactionId}: recorded ${mismatch.recordedBalance}, expected ${mismatch.expectedBalance}`);
    }
  }
  sqlite.close();

  console.log(`Checked ${playerIds.length} players, ${inconsistent} inconsistent`);
  process.exit(inconsistent > 0 ? 1 : 0);
}

main();
