import { eq, and, asc, desc, inArray } from 'drizzle-orm';
import { schema, isUniqueViolation } from '../db/index.js';
import type { Reader, UnitOfWork } from '../db/index.js';
import { CACHE_KEYS } from '../services/cache.js';
import type {
  CosmeticItem,
  CosmeticSlot,
  CurrencyTransaction,
  Loadout,
  OwnedCosmetic,
  Rarity,
  UnlockMethod,
} from '../types.js';
import { COSMETIC_SLOTS, RARITIES } from '../types.js';
import type { EngineContext } from './context.js';
import { runOperation } from './context.js';
import {
  CosmeticAlreadyOwnedError,
  CosmeticNotFoundError,
  CosmeticNotOwnedError,
  InsufficientCurrencyError,
  InvalidInputError,
  LoadoutNotFoundError,
  PrestigeOnlyCosmeticError,
} from './errors.js';
import { applyCurrencyDelta } from './ledger.js';
import { ensureProgression, getBalance, now } from './store.js';

const DEFAULT_LOADOUT_NAME = 'Default';
const MAX_LOADOUT_NAME_LENGTH = 64;

type CosmeticRow = typeof schema.cosmeticItems.$inferSelect;

// ─── Mapping ───

export function isCosmeticSlot(value: string): value is CosmeticSlot {
  return COSMETIC_SLOTS.some((slot) => slot === value);
}

function isRarity(value: string): value is Rarity {
  return RARITIES.some((rarity) => rarity === value);
}

const UNLOCK_METHODS: readonly UnlockMethod[] = ['level_up', 'purchase', 'loot_drop', 'prestige'];

function toUnlockMethod(value: string): UnlockMethod {
  return UNLOCK_METHODS.find((method) => method === value) ?? 'level_up';
}

export function toCosmetic(row: CosmeticRow): CosmeticItem {
  return {
    cosmeticId: row.cosmeticId,
    name: row.name,
    description: row.description,
    slot: isCosmeticSlot(row.slot) ? row.slot : 'other',
    rarity: isRarity(row.rarity) ? row.rarity : 'common',
    unlockLevel: row.unlockLevel,
    currencyCost: row.currencyCost,
    isPrestigeOnly: row.isPrestigeOnly,
  };
}

// ─── Catalog ───

function loadCatalog(reader: Reader): CosmeticItem[] {
  return reader
    .select()
    .from(schema.cosmeticItems)
    .orderBy(asc(schema.cosmeticItems.cosmeticId))
    .all()
    .map(toCosmetic);
}

export function getCosmeticCatalog(ctx: EngineContext): CosmeticItem[] {
  return ctx.cache.getOrSet(CACHE_KEYS.catalog(), ctx.config.catalogCacheTtlSeconds, () => loadCatalog(ctx.db));
}

export function getCosmetic(reader: Reader, cosmeticId: number): CosmeticItem | null {
  const row = reader
    .select()
    .from(schema.cosmeticItems)
    .where(eq(schema.cosmeticItems.cosmeticId, cosmeticId))
    .get();
  return row ? toCosmetic(row) : null;
}

export function requireCosmetic(reader: Reader, cosmeticId: number): CosmeticItem {
  const cosmetic = getCosmetic(reader, cosmeticId);
  if (!cosmetic) {
    throw new CosmeticNotFoundError(cosmeticId);
  }
  return cosmetic;
}

// ─── Ownership ───

export function ownsCosmetic(reader: Reader, playerId: number, cosmeticId: number): boolean {
  const pc = schema.playerCosmetics;
  const row = reader
    .select({ cosmeticId: pc.cosmeticId })
    .from(pc)
    .where(and(eq(pc.playerId, playerId), eq(pc.cosmeticId, cosmeticId)))
    .get();
  return row !== undefined;
}

/** Newest unlock first. */
export function getOwnedCosmetics(reader: Reader, playerId: number): OwnedCosmetic[] {
  const pc = schema.playerCosmetics;
  return reader
    .select({ item: schema.cosmeticItems, unlockedAt: pc.unlockedAt, unlockMethod: pc.unlockMethod })
    .from(pc)
    .innerJoin(schema.cosmeticItems, eq(pc.cosmeticId, schema.cosmeticItems.cosmeticId))
    .where(eq(pc.playerId, playerId))
    .orderBy(desc(pc.unlockedAt), desc(pc.cosmeticId))
    .all()
    .map((row) => ({
      ...toCosmetic(row.item),
      unlockedAt: row.unlockedAt,
      unlockMethod: toUnlockMethod(row.unlockMethod),
    }));
}

/** Strict insert: a second grant of the same pair raises a primary-key violation. */
export function insertOwnership(uow: UnitOfWork, playerId: number, cosmeticId: number, method: UnlockMethod): void {
  uow
    .insert(schema.playerCosmetics)
    .values({ playerId, cosmeticId, unlockedAt: now(), unlockMethod: method })
    .run();
}

/** Idempotent grant. Returns false when the player already owned the cosmetic. */
export function grantCosmetic(uow: UnitOfWork, playerId: number, cosmeticId: number, method: UnlockMethod): boolean {
  const result = uow
    .insert(schema.playerCosmetics)
    .values({ playerId, cosmeticId, unlockedAt: now(), unlockMethod: method })
    .onConflictDoNothing()
    .run();
  return result.changes > 0;
}

// ─── Purchase ───

export interface PurchaseResult {
  cosmetic: CosmeticItem;
  currencyBalance: number;
  transaction: CurrencyTransaction | null;
}

export function purchaseCosmetic(
  ctx: EngineContext,
  playerId: number,
  cosmeticId: number,
  signal?: AbortSignal,
): PurchaseResult {
  const result = runOperation(ctx, 'purchaseCosmetic', playerId, (uow) => {
    const cosmetic = requireCosmetic(uow, cosmeticId);
    if (cosmetic.isPrestigeOnly) {
      throw new PrestigeOnlyCosmeticError(cosmeticId);
    }
    if (ownsCosmetic(uow, playerId, cosmeticId)) {
      throw new CosmeticAlreadyOwnedError(playerId, cosmeticId);
    }

    ensureProgression(uow, playerId);
    const balance = getBalance(uow, playerId);
    if (balance < cosmetic.currencyCost) {
      throw new InsufficientCurrencyError(playerId, cosmetic.currencyCost, balance);
    }

    const transaction = applyCurrencyDelta(uow, playerId, -cosmetic.currencyCost, 'purchase', cosmeticId);

    try {
      insertOwnership(uow, playerId, cosmeticId, 'purchase');
    } catch (err) {
      // A concurrent grant landed between the ownership check and the insert
      if (isUniqueViolation(err)) {
        throw new CosmeticAlreadyOwnedError(playerId, cosmeticId);
      }
      throw err;
    }

    return { cosmetic, currencyBalance: transaction?.balanceAfter ?? balance, transaction };
  }, signal);

  ctx.logger.info('[Cosmetics] Purchased', {
    playerId,
    cosmeticId,
    cost: result.cosmetic.currencyCost,
    balanceAfter: result.currencyBalance,
  });
  return result;
}

// ─── Loadouts ───

type LoadoutRow = typeof schema.loadouts.$inferSelect;

function slotAssignments(reader: Reader, loadoutIds: number[]): Map<number, Loadout['slots']> {
  const assignments = new Map<number, Loadout['slots']>();
  if (loadoutIds.length === 0) return assignments;

  const rows = reader
    .select()
    .from(schema.loadoutCosmetics)
    .where(inArray(schema.loadoutCosmetics.loadoutId, loadoutIds))
    .all();

  for (const row of rows) {
    if (!isCosmeticSlot(row.slot)) continue;
    const slots = assignments.get(row.loadoutId) ?? {};
    slots[row.slot] = row.cosmeticId;
    assignments.set(row.loadoutId, slots);
  }
  return assignments;
}

function toLoadouts(reader: Reader, rows: LoadoutRow[]): Loadout[] {
  const assignments = slotAssignments(reader, rows.map((row) => row.loadoutId));
  return rows.map((row) => ({
    loadoutId: row.loadoutId,
    playerId: row.playerId,
    name: row.name,
    isActive: row.isActive,
    slots: assignments.get(row.loadoutId) ?? {},
  }));
}

export function listLoadouts(reader: Reader, playerId: number): Loadout[] {
  const rows = reader
    .select()
    .from(schema.loadouts)
    .where(eq(schema.loadouts.playerId, playerId))
    .orderBy(asc(schema.loadouts.loadoutId))
    .all();
  return toLoadouts(reader, rows);
}

export function getActiveLoadout(reader: Reader, playerId: number): Loadout | null {
  const l = schema.loadouts;
  const row = reader
    .select()
    .from(l)
    .where(and(eq(l.playerId, playerId), eq(l.isActive, true)))
    .get();
  return row ? toLoadouts(reader, [row])[0] ?? null : null;
}

function activeLoadoutId(uow: UnitOfWork, playerId: number): number {
  const l = schema.loadouts;
  const existing = uow
    .select({ loadoutId: l.loadoutId })
    .from(l)
    .where(and(eq(l.playerId, playerId), eq(l.isActive, true)))
    .get();
  if (existing) return existing.loadoutId;

  const timestamp = now();
  const created = uow
    .insert(l)
    .values({ playerId, name: DEFAULT_LOADOUT_NAME, isActive: true, createdAt: timestamp, updatedAt: timestamp })
    .returning({ loadoutId: l.loadoutId })
    .get();
  return created.loadoutId;
}

export interface EquipResult {
  loadoutId: number;
  slot: CosmeticSlot;
  cosmeticId: number;
}

export function equipCosmetic(
  ctx: EngineContext,
  playerId: number,
  cosmeticId: number,
  signal?: AbortSignal,
): EquipResult {
  return runOperation(ctx, 'equipCosmetic', playerId, (uow) => {
    const cosmetic = requireCosmetic(uow, cosmeticId);
    if (!ownsCosmetic(uow, playerId, cosmeticId)) {
      throw new CosmeticNotOwnedError(playerId, cosmeticId);
    }

    const loadoutId = activeLoadoutId(uow, playerId);
    const lc = schema.loadoutCosmetics;
    uow.delete(lc).where(and(eq(lc.loadoutId, loadoutId), eq(lc.slot, cosmetic.slot))).run();
    uow.insert(lc).values({ loadoutId, slot: cosmetic.slot, cosmeticId }).run();
    uow.update(schema.loadouts).set({ updatedAt: now() }).where(eq(schema.loadouts.loadoutId, loadoutId)).run();

    return { loadoutId, slot: cosmetic.slot, cosmeticId };
  }, signal);
}

export function createLoadout(ctx: EngineContext, playerId: number, name: string, signal?: AbortSignal): Loadout {
  const trimmed = name.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_LOADOUT_NAME_LENGTH) {
    throw new InvalidInputError(`loadout name must be 1-${MAX_LOADOUT_NAME_LENGTH} characters`);
  }

  return runOperation(ctx, 'createLoadout', playerId, (uow) => {
    const l = schema.loadouts;
    const hasActive = uow
      .select({ loadoutId: l.loadoutId })
      .from(l)
      .where(and(eq(l.playerId, playerId), eq(l.isActive, true)))
      .get();

    const timestamp = now();
    const row = uow
      .insert(l)
      // A player's first loadout starts active
      .values({ playerId, name: trimmed, isActive: !hasActive, createdAt: timestamp, updatedAt: timestamp })
      .returning()
      .get();
    return { loadoutId: row.loadoutId, playerId, name: row.name, isActive: row.isActive, slots: {} };
  }, signal);
}

export function activateLoadout(ctx: EngineContext, playerId: number, loadoutId: number, signal?: AbortSignal): Loadout {
  return runOperation(ctx, 'activateLoadout', playerId, (uow) => {
    const l = schema.loadouts;
    const target = uow
      .select()
      .from(l)
      .where(and(eq(l.loadoutId, loadoutId), eq(l.playerId, playerId)))
      .get();
    if (!target) {
      throw new LoadoutNotFoundError(loadoutId);
    }

    const timestamp = now();
    // Deactivate first: the partial unique index allows one active row per player
    uow.update(l).set({ isActive: false, updatedAt: timestamp }).where(and(eq(l.playerId, playerId), eq(l.isActive, true))).run();
    uow.update(l).set({ isActive: true, updatedAt: timestamp }).where(eq(l.loadoutId, loadoutId)).run();

    const [loadout] = toLoadouts(uow, [{ ...target, isActive: true, updatedAt: timestamp }]);
    if (!loadout) {
      throw new LoadoutNotFoundError(loadoutId);
    }
    return loadout;
  }, signal);
}

/** Returns false when there is no active loadout or the slot was already empty. */
export function unequipSlot(ctx: EngineContext, playerId: number, slot: CosmeticSlot, signal?: AbortSignal): boolean {
  return runOperation(ctx, 'unequipSlot', playerId, (uow) => {
    const active = getActiveLoadout(uow, playerId);
    if (!active) return false;

    const lc = schema.loadoutCosmetics;
    const result = uow.delete(lc).where(and(eq(lc.loadoutId, active.loadoutId), eq(lc.slot, slot))).run();
    return result.changes > 0;
  }, signal);
}
