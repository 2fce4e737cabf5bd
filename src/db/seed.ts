import { z } from 'zod';
import { eq } from 'drizzle-orm';
import { schema } from './index.js';
import type { UnitOfWork } from './index.js';
import { COSMETIC_SLOTS, RARITIES } from '../types.js';
import type { CosmeticSlot, Rarity } from '../types.js';

const slot = z.string().refine((value): value is CosmeticSlot => COSMETIC_SLOTS.some((s) => s === value));
const rarity = z.string().refine((value): value is Rarity => RARITIES.some((r) => r === value));

export const catalogFileSchema = z.object({
  cosmetics: z.array(z.object({
    name: z.string().min(1),
    description: z.string().nullable().default(null),
    slot,
    rarity,
    unlockLevel: z.number().int().min(0).default(1),
    currencyCost: z.number().int().min(0).default(0),
    isPrestigeOnly: z.boolean().default(false),
  })),
  lootTables: z.array(z.object({
    name: z.string().min(1),
    description: z.string().nullable().default(null),
    dropChance: z.number().min(0).max(1),
    isActive: z.boolean().default(true),
    // Entries reference cosmetics by name
    entries: z.array(z.object({ cosmetic: z.string(), weight: z.number().int().min(1) })).min(1),
  })).default([]),
});

export type CatalogFile = z.infer<typeof catalogFileSchema>;

export interface SeedSummary {
  cosmeticsInserted: number;
  cosmeticsSkipped: number;
  lootTablesInserted: number;
  lootTablesSkipped: number;
}

/** Inserts catalog items and loot tables missing by name. Existing rows are left alone. */
export function seedCatalog(uow: UnitOfWork, catalog: CatalogFile): SeedSummary {
  const summary: SeedSummary = { cosmeticsInserted: 0, cosmeticsSkipped: 0, lootTablesInserted: 0, lootTablesSkipped: 0 };
  const timestamp = new Date().toISOString();
  const idsByName = new Map<string, number>();

  for (const item of catalog.cosmetics) {
    const existing = uow
      .select({ cosmeticId: schema.cosmeticItems.cosmeticId })
      .from(schema.cosmeticItems)
      .where(eq(schema.cosmeticItems.name, item.name))
      .get();

    if (existing) {
      idsByName.set(item.name, existing.cosmeticId);
      summary.cosmeticsSkipped++;
      continue;
    }

    const row = uow
      .insert(schema.cosmeticItems)
      .values({ ...item, createdAt: timestamp })
      .returning({ cosmeticId: schema.cosmeticItems.cosmeticId })
      .get();
    idsByName.set(item.name, row.cosmeticId);
    summary.cosmeticsInserted++;
  }

  for (const table of catalog.lootTables) {
    const existing = uow
      .select({ lootTableId: schema.lootTables.lootTableId })
      .from(schema.lootTables)
      .where(eq(schema.lootTables.name, table.name))
      .get();
    if (existing) {
      summary.lootTablesSkipped++;
      continue;
    }

    const { lootTableId } = uow
      .insert(schema.lootTables)
      .values({
        name: table.name,
        description: table.description,
        dropChance: table.dropChance,
        isActive: table.isActive,
        createdAt: timestamp,
      })
      .returning({ lootTableId: schema.lootTables.lootTableId })
      .get();

    for (const entry of table.entries) {
      const cosmeticId = idsByName.get(entry.cosmetic);
      if (cosmeticId === undefined) {
        throw new Error(`loot table "${table.name}" references unknown cosmetic "${entry.cosmetic}"`);
      }
      uow.insert(schema.lootTableEntries).values({ lootTableId, cosmeticId, weight: entry.weight }).run();
    }
    summary.lootTablesInserted++;
  }

  return summary;
}
