import { describe, it, expect, beforeEach } from 'vitest';
import { adjustCurrency, countTransactions } from '../engine/ledger.js';
import { prestigePlayer } from '../engine/prestige.js';
import { getBalance, getProgression } from '../engine/store.js';
import { grantCosmetic } from '../engine/cosmetics.js';
import { withUnitOfWork } from '../db/index.js';
import { createTestHarness, ownershipRows, seedCosmetic, seedProgression } from './helpers.js';
import type { TestHarness } from './helpers.js';

describe('prestigePlayer', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createTestHarness();
  });

  it('grants the tier 1 cosmetic once and never re-grants it at tier 2', () => {
    const veteran = seedCosmetic(h.db, { isPrestigeOnly: true, unlockLevel: 1 });

    const first = prestigePlayer(h.ctx, 1);
    expect(first).toEqual({ playerId: 1, prestigeTier: 1, grantedCosmeticIds: [veteran] });

    const second = prestigePlayer(h.ctx, 1);
    expect(second).toEqual({ playerId: 1, prestigeTier: 2, grantedCosmeticIds: [] });

    const rows = ownershipRows(h.db, 1);
    expect(rows.map((row) => [row.cosmeticId, row.unlockMethod])).toEqual([[veteran, 'prestige']]);
  });

  it('only grants prestige-only items unlocked at exactly the new tier', () => {
    seedCosmetic(h.db, { isPrestigeOnly: false, unlockLevel: 1 });
    seedCosmetic(h.db, { isPrestigeOnly: true, unlockLevel: 2 });
    const tierOne = seedCosmetic(h.db, { isPrestigeOnly: true, unlockLevel: 1 });

    expect(prestigePlayer(h.ctx, 1).grantedCosmeticIds).toEqual([tierOne]);
  });

  it('resets level and experience without touching currency', () => {
    seedProgression(h.db, 1, { experience: 5400, level: 6 });
    adjustCurrency(h.ctx, 1, 300, 'admin_grant');

    prestigePlayer(h.ctx, 1);

    const progression = getProgression(h.db, 1, 1000);
    expect(progression).toMatchObject({ level: 1, experience: 0, prestigeTier: 1, currencyBalance: 300 });
    expect(getBalance(h.db, 1)).toBe(300);
    expect(countTransactions(h.db, 1)).toBe(1);
  });

  it('skips a tier cosmetic the player already owns', () => {
    const owned = seedCosmetic(h.db, { isPrestigeOnly: true, unlockLevel: 1 });
    const fresh = seedCosmetic(h.db, { isPrestigeOnly: true, unlockLevel: 1 });
    withUnitOfWork(h.db, (uow) => grantCosmetic(uow, 1, owned, 'loot_drop'));

    expect(prestigePlayer(h.ctx, 1).grantedCosmeticIds).toEqual([fresh]);
    expect(ownershipRows(h.db, 1)).toHaveLength(2);
  });

  it('logs a failed grant and still advances the tier', () => {
    const blocked = seedCosmetic(h.db, { isPrestigeOnly: true, unlockLevel: 1 });
    const granted = seedCosmetic(h.db, { isPrestigeOnly: true, unlockLevel: 1 });
    h.sqlite.exec(`
      CREATE TRIGGER block_grant BEFORE INSERT ON player_cosmetics
      WHEN NEW.cosmetic_id = ${blocked}
      BEGIN SELECT RAISE(ABORT, 'grant blocked'); END;
    `);

    const result = prestigePlayer(h.ctx, 1);

    expect(result).toEqual({ playerId: 1, prestigeTier: 1, grantedCosmeticIds: [granted] });
    expect(ownershipRows(h.db, 1).map((row) => row.cosmeticId)).toEqual([granted]);

    const warnings = h.logger.at('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.message).toBe('[FollowUp] grantPrestigeCosmetic failed');
    expect(warnings[0]?.context).toMatchObject({ playerId: 1, cosmeticId: blocked, prestigeTier: 1 });
  });
});
