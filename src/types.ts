// ─── Core Types ───

export type CosmeticSlot =
  | 'character_skin'
  | 'weapon_skin'
  | 'emote'
  | 'taunt'
  | 'badge'
  | 'title'
  | 'particle_effect'
  | 'other';

export const COSMETIC_SLOTS: readonly CosmeticSlot[] = [
  'character_skin',
  'weapon_skin',
  'emote',
  'taunt',
  'badge',
  'title',
  'particle_effect',
  'other',
];

export type Rarity = 'common' | 'uncommon' | 'rare' | 'epic' | 'legendary';

export const RARITIES: readonly Rarity[] = ['common', 'uncommon', 'rare', 'epic', 'legendary'];

export type UnlockMethod = 'level_up' | 'purchase' | 'loot_drop' | 'prestige';

export type TransactionKind =
  | 'match_reward'
  | 'purchase'
  | 'prestige_reward'
  | 'admin_grant'
  | 'refund'
  | 'other';

export const TRANSACTION_KINDS: readonly TransactionKind[] = [
  'match_reward',
  'purchase',
  'prestige_reward',
  'admin_grant',
  'refund',
  'other',
];

// ─── Progression ───

export interface LifetimeCounters {
  matchesPlayed: number;
  kills: number;
  deaths: number;
  wavesSurvived: number;
  scrapEarned: number;
  currencyEarned: number;
}

export interface PlayerProgression {
  playerId: number;
  level: number;
  experience: number;
  prestigeTier: number;
  currencyBalance: number;
  lifetime: LifetimeCounters;
  lastUpdated: string | null; // null until the first write
}

export interface ProgressionView extends PlayerProgression {
  xpIntoLevel: number;
  xpToNextLevel: number;
}

// ─── Ledger ───

export interface CurrencyTransaction {
  transactionId: number;
  playerId: number;
  amount: number;
  balanceAfter: number;
  kind: TransactionKind;
  referenceId: number | null;
  createdAt: string;
}

export interface LedgerMismatch {
  transactionId: number;
  expectedBalance: number;
  recordedBalance: number;
}

export interface LedgerReplay {
  playerId: number;
  transactionCount: number;
  replayedBalance: number;
  storedBalance: number;
  mismatches: LedgerMismatch[];
  consistent: boolean;
}

// ─── Cosmetics ───

export interface CosmeticItem {
  cosmeticId: number;
  name: string;
  description: string | null;
  slot: CosmeticSlot;
  rarity: Rarity;
  unlockLevel: number; // prestige tier for prestige-only items
  currencyCost: number;
  isPrestigeOnly: boolean;
}

export interface OwnedCosmetic extends CosmeticItem {
  unlockedAt: string;
  unlockMethod: UnlockMethod;
}

export interface Loadout {
  loadoutId: number;
  playerId: number;
  name: string;
  isActive: boolean;
  slots: Partial<Record<CosmeticSlot, number>>; // slot -> cosmeticId
}

// ─── Loot ───

export interface LootTable {
  lootTableId: number;
  name: string;
  description: string | null;
  dropChance: number;
  isActive: boolean;
}

export interface LootTableEntry {
  lootEntryId: number;
  lootTableId: number;
  cosmeticId: number;
  weight: number;
  minQuantity: number;
  maxQuantity: number;
}

export interface LootTableEntryDetails extends LootTableEntry {
  cosmeticName: string;
  cosmeticRarity: Rarity;
  cosmeticSlot: CosmeticSlot;
}

export interface LootDrop {
  cosmetic: CosmeticItem;
  lootTableId: number;
  newlyGranted: boolean;
}

// ─── Matches ───

export interface MatchStats {
  kills: number;
  deaths: number;
  wavesSurvived: number;
  scrapEarned: number;
  currencyEarned: number;
}

export interface PlayerMatchReport extends MatchStats {
  playerId: number;
}

export interface MatchReport {
  serverId: number;
  mapName: string;
  gameMode: string;
  outcome: string;
  wavesSurvived: number;
  startedAt: string;
  endedAt: string | null;
  players: PlayerMatchReport[];
}

export interface MatchRewardResult {
  playerId: number;
  xpAwarded: number;
  experience: number;
  previousLevel: number;
  level: number;
  leveledUp: boolean;
  currencyAwarded: number;
  currencyBalance: number;
}

export interface RecordedMatch {
  matchId: string;
  rewards: MatchRewardResult[];
}

export interface MatchHistoryEntry extends MatchStats {
  matchId: string;
  mapName: string;
  gameMode: string;
  outcome: string;
  xpAwarded: number;
  startedAt: string;
  endedAt: string | null;
}

// ─── Prestige ───

export interface PrestigeResult {
  playerId: number;
  prestigeTier: number;
  grantedCosmeticIds: number[];
}
