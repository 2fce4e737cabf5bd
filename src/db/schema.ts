import { sqliteTable, text, integer, real, index, primaryKey } from 'drizzle-orm/sqlite-core';

// ─── Player Progression ───
export const playerProgression = sqliteTable('player_progression', {
  playerId: integer('player_id').primaryKey(),
  level: integer('level').notNull().default(1),
  experience: integer('experience').notNull().default(0),
  prestigeTier: integer('prestige_tier').notNull().default(0),
  currencyBalance: integer('currency_balance').notNull().default(0), // CHECK >= 0
  matchesPlayed: integer('matches_played').notNull().default(0),
  kills: integer('kills').notNull().default(0),
  deaths: integer('deaths').notNull().default(0),
  wavesSurvived: integer('waves_survived').notNull().default(0),
  scrapEarned: integer('scrap_earned').notNull().default(0),
  currencyEarned: integer('currency_earned').notNull().default(0),
  updatedAt: text('updated_at').notNull(),
}, (table) => ({
  levelIdx: index('player_progression_level_idx').on(table.level),
  prestigeIdx: index('player_progression_prestige_idx').on(table.prestigeTier),
}));

// ─── Currency Ledger (append-only) ───
export const currencyTransactions = sqliteTable('currency_transactions', {
  transactionId: integer('transaction_id').primaryKey({ autoIncrement: true }),
  playerId: integer('player_id').notNull(),
  amount: integer('amount').notNull(),
  balanceAfter: integer('balance_after').notNull(),
  kind: text('kind').notNull(), // match_reward | purchase | prestige_reward | admin_grant | refund | other
  referenceId: integer('reference_id'),
  createdAt: text('created_at').notNull(),
}, (table) => ({
  playerIdx: index('currency_transactions_player_idx').on(table.playerId),
  createdIdx: index('currency_transactions_created_idx').on(table.createdAt),
}));

// ─── Cosmetic Catalog ───
export const cosmeticItems = sqliteTable('cosmetic_items', {
  cosmeticId: integer('cosmetic_id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  description: text('description'),
  slot: text('slot').notNull(),
  rarity: text('rarity').notNull(),
  unlockLevel: integer('unlock_level').notNull().default(1),
  currencyCost: integer('currency_cost').notNull().default(0),
  isPrestigeOnly: integer('is_prestige_only', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull(),
});

// ─── Ownership ───
export const playerCosmetics = sqliteTable('player_cosmetics', {
  playerId: integer('player_id').notNull(),
  cosmeticId: integer('cosmetic_id').notNull().references(() => cosmeticItems.cosmeticId),
  unlockedAt: text('unlocked_at').notNull(),
  unlockMethod: text('unlock_method').notNull(), // level_up | purchase | loot_drop | prestige
}, (table) => ({
  pk: primaryKey({ columns: [table.playerId, table.cosmeticId] }),
  cosmeticIdx: index('player_cosmetics_cosmetic_idx').on(table.cosmeticId),
}));

// ─── Loadouts ───
export const loadouts = sqliteTable('loadouts', {
  loadoutId: integer('loadout_id').primaryKey({ autoIncrement: true }),
  playerId: integer('player_id').notNull(),
  name: text('name').notNull(),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => ({
  playerIdx: index('loadouts_player_idx').on(table.playerId),
}));

// One row per (loadout, slot): equipping replaces the occupant
export const loadoutCosmetics = sqliteTable('loadout_cosmetics', {
  loadoutId: integer('loadout_id').notNull().references(() => loadouts.loadoutId),
  slot: text('slot').notNull(),
  cosmeticId: integer('cosmetic_id').notNull().references(() => cosmeticItems.cosmeticId),
}, (table) => ({
  pk: primaryKey({ columns: [table.loadoutId, table.slot] }),
}));

// ─── Loot Tables ───
export const lootTables = sqliteTable('loot_tables', {
  lootTableId: integer('loot_table_id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  description: text('description'),
  dropChance: real('drop_chance').notNull(),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  createdAt: text('created_at').notNull(),
});

export const lootTableEntries = sqliteTable('loot_table_entries', {
  lootEntryId: integer('loot_entry_id').primaryKey({ autoIncrement: true }),
  lootTableId: integer('loot_table_id').notNull().references(() => lootTables.lootTableId),
  cosmeticId: integer('cosmetic_id').notNull().references(() => cosmeticItems.cosmeticId),
  weight: integer('weight').notNull(),
  minQuantity: integer('min_quantity').notNull().default(1),
  maxQuantity: integer('max_quantity').notNull().default(1),
}, (table) => ({
  tableIdx: index('loot_table_entries_table_idx').on(table.lootTableId),
  cosmeticIdx: index('loot_table_entries_cosmetic_idx').on(table.cosmeticId),
}));

// ─── Matches ───
export const matches = sqliteTable('matches', {
  matchId: text('match_id').primaryKey(),
  serverId: integer('server_id').notNull(),
  mapName: text('map_name').notNull(),
  gameMode: text('game_mode').notNull(),
  outcome: text('outcome').notNull(),
  wavesSurvived: integer('waves_survived').notNull().default(0),
  startedAt: text('started_at').notNull(),
  endedAt: text('ended_at'),
  recordedAt: text('recorded_at').notNull(),
});

export const playerMatchStats = sqliteTable('player_match_stats', {
  matchId: text('match_id').notNull().references(() => matches.matchId),
  playerId: integer('player_id').notNull(),
  kills: integer('kills').notNull().default(0),
  deaths: integer('deaths').notNull().default(0),
  wavesSurvived: integer('waves_survived').notNull().default(0),
  scrapEarned: integer('scrap_earned').notNull().default(0),
  currencyEarned: integer('currency_earned').notNull().default(0),
  xpAwarded: integer('xp_awarded').notNull().default(0),
}, (table) => ({
  pk: primaryKey({ columns: [table.matchId, table.playerId] }),
  playerIdx: index('player_match_stats_player_idx').on(table.playerId),
}));
