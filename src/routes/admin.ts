import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import type { EngineContext } from '../engine/context.js';
import { adjustCurrency, replayLedger } from '../engine/ledger.js';
import {
  createLootTable,
  createLootTableEntry,
  deleteLootTable,
  deleteLootTableEntry,
  getLootTable,
  getLootTableEntry,
  listLootTableEntries,
  listLootTables,
  updateLootTable,
  updateLootTableEntry,
} from '../engine/loot.js';
import { currencyAdjustSchema, lootEntryCreateSchema, lootEntryPatchSchema, lootTableCreateSchema, lootTablePatchSchema } from '../schemas/admin.js';
import { parseWith, positiveId, readJson } from '../schemas/common.js';
import type { AppEnv } from './env.js';

export function adminRoutes(ctx: EngineContext, guard: MiddlewareHandler<AppEnv>) {
  const admin = new Hono<AppEnv>();
  admin.use('*', guard);

  // ─── Loot tables ───

  admin.get('/loot/tables', (c) => {
    return c.json({ tables: listLootTables(ctx.db) });
  });

  admin.post('/loot/tables', async (c) => {
    const input = parseWith(lootTableCreateSchema, await readJson(c.req));
    return c.json(createLootTable(ctx, input, c.req.raw.signal), 201);
  });

  admin.get('/loot/tables/:id', (c) => {
    const lootTableId = parseWith(positiveId, c.req.param('id'));
    return c.json({
      ...getLootTable(ctx.db, lootTableId),
      entries: listLootTableEntries(ctx.db, lootTableId),
    });
  });

  admin.patch('/loot/tables/:id', async (c) => {
    const lootTableId = parseWith(positiveId, c.req.param('id'));
    const patch = parseWith(lootTablePatchSchema, await readJson(c.req));
    return c.json(updateLootTable(ctx, lootTableId, patch, c.req.raw.signal));
  });

  admin.delete('/loot/tables/:id', (c) => {
    deleteLootTable(ctx, parseWith(positiveId, c.req.param('id')), c.req.raw.signal);
    return c.json({ success: true });
  });

  // ─── Loot entries ───

  admin.post('/loot/tables/:id/entries', async (c) => {
    const lootTableId = parseWith(positiveId, c.req.param('id'));
    const input = parseWith(lootEntryCreateSchema, await readJson(c.req));
    return c.json(createLootTableEntry(ctx, { ...input, lootTableId }, c.req.raw.signal), 201);
  });

  admin.get('/loot/entries/:id', (c) => {
    return c.json(getLootTableEntry(ctx.db, parseWith(positiveId, c.req.param('id'))));
  });

  admin.patch('/loot/entries/:id', async (c) => {
    const lootEntryId = parseWith(positiveId, c.req.param('id'));
    const patch = parseWith(lootEntryPatchSchema, await readJson(c.req));
    return c.json(updateLootTableEntry(ctx, lootEntryId, patch, c.req.raw.signal));
  });

  admin.delete('/loot/entries/:id', (c) => {
    deleteLootTableEntry(ctx, parseWith(positiveId, c.req.param('id')), c.req.raw.signal);
    return c.json({ success: true });
  });

  // ─── Currency ───

  admin.post('/currency', async (c) => {
    const input = parseWith(currencyAdjustSchema, await readJson(c.req));
    const transaction = adjustCurrency(ctx, input.playerId, input.amount, input.kind, input.referenceId ?? null, c.req.raw.signal);
    return c.json({ success: true, transaction }, 201);
  });

  admin.get('/ledger/:playerId/verify', (c) => {
    return c.json(replayLedger(ctx.db, parseWith(positiveId, c.req.param('playerId'))));
  });

  return admin;
}
