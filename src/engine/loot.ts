import { eq, asc } from 'drizzle-orm';
import { schema } from '../db/index.js';
import type { Reader } from '../db/index.js';
import type { LootDrop, LootTable, LootTableEntry, LootTableEntryDetails } from '../types.js';
import type { EngineContext, RandomSource } from './context.js';
import { runOperation } from './context.js';
import { grantCosmetic, requireCosmetic, toCosmetic } from './cosmetics.js';
import {
  EmptyLootTableError,
  InvalidInputError,
  LootTableEntryNotFoundError,
  LootTableNotFoundError,
  NoActiveLootTablesError,
  NoDropFromAnyTableError,
  NonPositiveWeightError,
} from './errors.js';
import { now } from './store.js';

type LootTableRow = typeof schema.lootTables.$inferSelect;
type LootEntryRow = typeof schema.lootTableEntries.$inferSelect;

function toLootTable(row: LootTableRow): LootTable {
  return {
    lootTableId: row.lootTableId,
    name: row.name,
    description: row.description,
    dropChance: row.dropChance,
    isActive: row.isActive,
  };
}

function toLootEntry(row: LootEntryRow): LootTableEntry {
  return {
    lootEntryId: row.lootEntryId,
    lootTableId: row.lootTableId,
    cosmeticId: row.cosmeticId,
    weight: row.weight,
    minQuantity: row.minQuantity,
    maxQuantity: row.maxQuantity,
  };
}

// ─── Selection ───

/** First table whose draw lands under its drop chance, one draw per table in order. */
export function selectLootTable<T extends { dropChance: number }>(tables: readonly T[], random: RandomSource): T | null {
  for (const table of tables) {
    if (random.float() < table.dropChance) {
      return table;
    }
  }
  return null;
}

export function totalWeight(entries: readonly { weight: number }[]): number {
  return entries.reduce((sum, entry) => sum + entry.weight, 0);
}

/** Cumulative-weight walk over one integer draw in [0, total). Null when nothing is pickable. */
export function pickWeightedEntry<T extends { weight: number }>(entries: readonly T[], random: RandomSource): T | null {
  const total = totalWeight(entries);
  if (entries.length === 0 || total <= 0) return null;

  const roll = random.int(total);
  let cumulative = 0;
  for (const entry of entries) {
    cumulative += entry.weight;
    if (roll < cumulative) {
      return entry;
    }
  }
  return null;
}

// ─── Drop ───

export function generateLootDrop(ctx: EngineContext, playerId: number, signal?: AbortSignal): LootDrop {
  const drop = runOperation(ctx, 'generateLootDrop', playerId, (uow) => {
    const tables = listActiveLootTables(uow);
    if (tables.length === 0) {
      throw new NoActiveLootTablesError();
    }

    const table = selectLootTable(tables, ctx.random);
    if (!table) {
      throw new NoDropFromAnyTableError();
    }

    const entries = uow
      .select()
      .from(schema.lootTableEntries)
      .where(eq(schema.lootTableEntries.lootTableId, table.lootTableId))
      .orderBy(asc(schema.lootTableEntries.lootEntryId))
      .all();
    if (entries.length === 0) {
      throw new EmptyLootTableError(table.lootTableId);
    }

    const weight = totalWeight(entries);
    if (weight <= 0) {
      throw new NonPositiveWeightError(table.lootTableId, weight);
    }

    const entry = pickWeightedEntry(entries, ctx.random);
    if (!entry) {
      throw new NonPositiveWeightError(table.lootTableId, weight);
    }

    const cosmetic = requireCosmetic(uow, entry.cosmeticId);
    const newlyGranted = grantCosmetic(uow, playerId, cosmetic.cosmeticId, 'loot_drop');
    return { cosmetic, lootTableId: table.lootTableId, newlyGranted };
  }, signal);

  if (drop.newlyGranted) {
    ctx.logger.info('[Loot] Granted cosmetic', {
      playerId,
      cosmeticId: drop.cosmetic.cosmeticId,
      lootTableId: drop.lootTableId,
    });
  } else {
    ctx.logger.debug('[Loot] Duplicate drop ignored', {
      playerId,
      cosmeticId: drop.cosmetic.cosmeticId,
      lootTableId: drop.lootTableId,
    });
  }
  return drop;
}

// ─── Table administration ───

export interface LootTableInput {
  name: string;
  description?: string | null;
  dropChance: number;
  isActive?: boolean;
}

function validateDropChance(dropChance: number): void {
  if (!Number.isFinite(dropChance) || dropChance < 0 || dropChance > 1) {
    throw new InvalidInputError(`drop chance must be between 0 and 1, got ${dropChance}`);
  }
}

function validateName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new InvalidInputError('loot table name must not be empty');
  }
  return trimmed;
}

export function listLootTables(reader: Reader): LootTable[] {
  return reader
    .select()
    .from(schema.lootTables)
    .orderBy(asc(schema.lootTables.lootTableId))
    .all()
    .map(toLootTable);
}

export function listActiveLootTables(reader: Reader): LootTable[] {
  return reader
    .select()
    .from(schema.lootTables)
    .where(eq(schema.lootTables.isActive, true))
    .orderBy(asc(schema.lootTables.lootTableId))
    .all()
    .map(toLootTable);
}

export function getLootTable(reader: Reader, lootTableId: number): LootTable {
  const row = reader
    .select()
    .from(schema.lootTables)
    .where(eq(schema.lootTables.lootTableId, lootTableId))
    .get();
  if (!row) {
    throw new LootTableNotFoundError(lootTableId);
  }
  return toLootTable(row);
}

export function createLootTable(ctx: EngineContext, input: LootTableInput, signal?: AbortSignal): LootTable {
  const name = validateName(input.name);
  validateDropChance(input.dropChance);

  return runOperation(ctx, 'createLootTable', null, (uow) => {
    const row = uow
      .insert(schema.lootTables)
      .values({
        name,
        description: input.description ?? null,
        dropChance: input.dropChance,
        isActive: input.isActive ?? true,
        createdAt: now(),
      })
      .returning()
      .get();
    return toLootTable(row);
  }, signal);
}

export function updateLootTable(
  ctx: EngineContext,
  lootTableId: number,
  patch: Partial<LootTableInput>,
  signal?: AbortSignal,
): LootTable {
  const name = patch.name === undefined ? undefined : validateName(patch.name);
  if (patch.dropChance !== undefined) validateDropChance(patch.dropChance);

  return runOperation(ctx, 'updateLootTable', null, (uow) => {
    const current = getLootTable(uow, lootTableId);
    const row = uow
      .update(schema.lootTables)
      .set({
        name: name ?? current.name,
        description: patch.description === undefined ? current.description : patch.description,
        dropChance: patch.dropChance ?? current.dropChance,
        isActive: patch.isActive ?? current.isActive,
      })
      .where(eq(schema.lootTables.lootTableId, lootTableId))
      .returning()
      .get();
    return toLootTable(row);
  }, signal);
}

/** Entries go with the table (ON DELETE CASCADE). */
export function deleteLootTable(ctx: EngineContext, lootTableId: number, signal?: AbortSignal): void {
  runOperation(ctx, 'deleteLootTable', null, (uow) => {
    getLootTable(uow, lootTableId);
    uow.delete(schema.lootTables).where(eq(schema.lootTables.lootTableId, lootTableId)).run();
  }, signal);
}

// ─── Entry administration ───

export interface LootEntryInput {
  lootTableId: number;
  cosmeticId: number;
  weight: number;
  minQuantity?: number;
  maxQuantity?: number;
}

export type LootEntryPatch = Partial<Pick<LootEntryInput, 'weight' | 'minQuantity' | 'maxQuantity'>>;

function validateEntry(weight: number, minQuantity: number, maxQuantity: number): void {
  if (!Number.isInteger(weight) || weight < 1) {
    throw new InvalidInputError(`weight must be a positive integer, got ${weight}`);
  }
  if (!Number.isInteger(minQuantity) || !Number.isInteger(maxQuantity) || minQuantity < 1) {
    throw new InvalidInputError('quantities must be positive integers');
  }
  if (minQuantity > maxQuantity) {
    throw new InvalidInputError(`min quantity ${minQuantity} exceeds max quantity ${maxQuantity}`);
  }
}

export function getLootTableEntry(reader: Reader, lootEntryId: number): LootTableEntry {
  const row = reader
    .select()
    .from(schema.lootTableEntries)
    .where(eq(schema.lootTableEntries.lootEntryId, lootEntryId))
    .get();
  if (!row) {
    throw new LootTableEntryNotFoundError(lootEntryId);
  }
  return toLootEntry(row);
}

/** Entries with the cosmetic's name, rarity and slot, in entry order. */
export function listLootTableEntries(reader: Reader, lootTableId: number): LootTableEntryDetails[] {
  getLootTable(reader, lootTableId);

  const e = schema.lootTableEntries;
  return reader
    .select({ entry: e, cosmetic: schema.cosmeticItems })
    .from(e)
    .innerJoin(schema.cosmeticItems, eq(e.cosmeticId, schema.cosmeticItems.cosmeticId))
    .where(eq(e.lootTableId, lootTableId))
    .orderBy(asc(e.lootEntryId))
    .all()
    .map((row) => {
      const cosmetic = toCosmetic(row.cosmetic);
      return {
        ...toLootEntry(row.entry),
        cosmeticName: cosmetic.name,
        cosmeticRarity: cosmetic.rarity,
        cosmeticSlot: cosmetic.slot,
      };
    });
}

export function createLootTableEntry(ctx: EngineContext, input: LootEntryInput, signal?: AbortSignal): LootTableEntry {
  const minQuantity = input.minQuantity ?? 1;
  const maxQuantity = input.maxQuantity ?? minQuantity;
  validateEntry(input.weight, minQuantity, maxQuantity);

  return runOperation(ctx, 'createLootTableEntry', null, (uow) => {
    getLootTable(uow, input.lootTableId);
    requireCosmetic(uow, input.cosmeticId);

    const row = uow
      .insert(schema.lootTableEntries)
      .values({
        lootTableId: input.lootTableId,
        cosmeticId: input.cosmeticId,
        weight: input.weight,
        minQuantity,
        maxQuantity,
      })
      .returning()
      .get();
    return toLootEntry(row);
  }, signal);
}

export function updateLootTableEntry(
  ctx: EngineContext,
  lootEntryId: number,
  patch: LootEntryPatch,
  signal?: AbortSignal,
): LootTableEntry {
  return runOperation(ctx, 'updateLootTableEntry', null, (uow) => {
    const current = getLootTableEntry(uow, lootEntryId);
    const next = {
      weight: patch.weight ?? current.weight,
      minQuantity: patch.minQuantity ?? current.minQuantity,
      maxQuantity: patch.maxQuantity ?? current.maxQuantity,
    };
    validateEntry(next.weight, next.minQuantity, next.maxQuantity);

    const row = uow
      .update(schema.lootTableEntries)
      .set(next)
      .where(eq(schema.lootTableEntries.lootEntryId, lootEntryId))
      .returning()
      .get();
    return toLootEntry(row);
  }, signal);
}

export function deleteLootTableEntry(ctx: EngineContext, lootEntryId: number, signal?: AbortSignal): void {
  runOperation(ctx, 'deleteLootTableEntry', null, (uow) => {
    getLootTableEntry(uow, lootEntryId);
    uow.delete(schema.lootTableEntries).where(eq(schema.lootTableEntries.lootEntryId, lootEntryId)).run();
  }, signal);
}
