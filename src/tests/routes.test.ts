import { describe, it, expect, beforeEach } from 'vitest';
import { createApp } from '../app.js';
import { createLootTable, createLootTableEntry } from '../engine/loot.js';
import { adjustCurrency } from '../engine/ledger.js';
import { createTestHarness, scriptedRandom, seedCosmetic } from './helpers.js';
import type { TestHarness } from './helpers.js';

const ADMIN_KEY = 'test-admin-key';
const SERVER_KEY = 'test-server-key';

function json(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

const asPlayer = (playerId: number) => ({ 'X-Player-Id': String(playerId) });

describe('HTTP surface', () => {
  let h: TestHarness;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    h = createTestHarness({ random: scriptedRandom([0.5, 0, 0], [0, 0]) });
    app = createApp(h.ctx, { adminApiKey: ADMIN_KEY, serverApiKey: SERVER_KEY });
  });

  it('reports health without identity', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('requires a player id on player routes', async () => {
    expect((await app.request('/progression')).status).toBe(401);
    expect((await app.request('/progression', { headers: { 'X-Player-Id': 'abc' } })).status).toBe(401);
    expect((await app.request('/cosmetics/owned', { headers: { 'X-Player-Id': '0' } })).status).toBe(401);
  });

  it('returns default progression for a new player', async () => {
    const res = await app.request('/progression', { headers: asPlayer(5) });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      playerId: 5,
      level: 1,
      experience: 0,
      prestigeTier: 0,
      currencyBalance: 0,
      lifetime: { matchesPlayed: 0, kills: 0, deaths: 0, wavesSurvived: 0, scrapEarned: 0, currencyEarned: 0 },
      lastUpdated: null,
      xpIntoLevel: 0,
      xpToNextLevel: 1000,
    });
  });

  it('maps purchase failures to status codes', async () => {
    const cosmeticId = seedCosmetic(h.db, { currencyCost: 150 });

    const poor = await app.request('/cosmetics/purchase', { method: 'POST', ...json({ cosmeticId }, asPlayer(1)) });
    expect(poor.status).toBe(402);
    expect(await poor.json()).toEqual({ error: 'insufficient currency: need 150, have 0', kind: 'insufficient_currency' });

    adjustCurrency(h.ctx, 1, 200, 'admin_grant');
    const bought = await app.request('/cosmetics/purchase', { method: 'POST', ...json({ cosmeticId }, asPlayer(1)) });
    expect(bought.status).toBe(200);
    expect(await bought.json()).toMatchObject({ success: true, currencyBalance: 50, cosmetic: { cosmeticId } });

    const again = await app.request('/cosmetics/purchase', { method: 'POST', ...json({ cosmeticId }, asPlayer(1)) });
    expect(again.status).toBe(409);

    const missing = await app.request('/cosmetics/purchase', { method: 'POST', ...json({ cosmeticId: 999 }, asPlayer(1)) });
    expect(missing.status).toBe(404);

    const malformed = await app.request('/cosmetics/purchase', { method: 'POST', ...json({ cosmeticId: 'one' }, asPlayer(1)) });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ kind: 'invalid_input' });
  });

  it('refuses to sell prestige-only cosmetics with 403', async () => {
    const cosmeticId = seedCosmetic(h.db, { isPrestigeOnly: true, currencyCost: 0 });

    const res = await app.request('/cosmetics/purchase', { method: 'POST', ...json({ cosmeticId }, asPlayer(1)) });
    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: `cosmetic ${cosmeticId} is unlocked by prestige only`, kind: 'prestige_only' });
  });

  it('rejects equipping an unowned cosmetic with 403', async () => {
    const cosmeticId = seedCosmetic(h.db);
    const res = await app.request('/cosmetics/equip', { method: 'PUT', ...json({ cosmeticId }, asPlayer(1)) });
    expect(res.status).toBe(403);
  });

  it('returns 503 without loot tables and a miss as dropped: false', async () => {
    const none = await app.request('/loot/drop', { method: 'POST', headers: asPlayer(1) });
    expect(none.status).toBe(503);

    createLootTable(h.ctx, { name: 'Stingy', dropChance: 0.3 });
    const miss = await app.request('/loot/drop', { method: 'POST', headers: asPlayer(1) });
    expect(miss.status).toBe(200);
    expect(await miss.json()).toEqual({ dropped: false });
  });

  it('returns the full catalog record on a drop', async () => {
    const table = createLootTable(h.ctx, { name: 'Sure Thing', dropChance: 1 });
    const cosmeticId = seedCosmetic(h.db, { name: 'Salute', slot: 'emote', rarity: 'common', unlockLevel: 1, currencyCost: 25 });
    createLootTableEntry(h.ctx, { lootTableId: table.lootTableId, cosmeticId, weight: 1 });

    // The scripted 0.5 draw is under the table's chance of 1
    const res = await app.request('/loot/drop', { method: 'POST', headers: asPlayer(1) });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      dropped: true,
      newlyGranted: true,
      cosmetic: {
        cosmeticId,
        name: 'Salute',
        description: null,
        slot: 'emote',
        rarity: 'common',
        unlockLevel: 1,
        currencyCost: 25,
        isPrestigeOnly: false,
      },
    });
  });

  it('records matches only for game servers holding the key', async () => {
    const match = {
      serverId: 2,
      mapName: 'Dockyard',
      gameMode: 'survival',
      outcome: 'victory',
      wavesSurvived: 10,
      startedAt: '2026-03-01T18:00:00.000Z',
      players: [{ playerId: 8, kills: 5, deaths: 0, wavesSurvived: 10, scrapEarned: 12, currencyEarned: 20 }],
    };

    expect((await app.request('/matches', { method: 'POST', ...json(match) })).status).toBe(401);
    expect((await app.request('/matches', { method: 'POST', ...json(match, { 'X-Server-Key': 'wrong' }) })).status).toBe(401);

    const res = await app.request('/matches', { method: 'POST', ...json(match, { 'X-Server-Key': SERVER_KEY }) });
    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body).toMatchObject({ rewards: [{ playerId: 8, xpAwarded: 100 + 50 + 500 + 12, currencyBalance: 20 }] });

    const history = await app.request('/matches/history?limit=5', { headers: asPlayer(8) });
    expect(history.status).toBe(200);
    expect(await history.json()).toMatchObject({ matches: [{ outcome: 'victory', xpAwarded: 662 }] });
  });

  it('maps negative match stats to 400 invalid_stats', async () => {
    const res = await app.request('/matches', {
      method: 'POST',
      ...json({
        serverId: 2,
        mapName: 'Dockyard',
        gameMode: 'survival',
        outcome: 'defeat',
        wavesSurvived: 1,
        startedAt: '2026-03-01T18:00:00.000Z',
        players: [{ playerId: 8, kills: -1, deaths: 0, wavesSurvived: 1, scrapEarned: 0 }],
      }, { 'X-Server-Key': SERVER_KEY }),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'match stat kills must be a non-negative integer, got -1', kind: 'invalid_stats' });
  });

  it('advances prestige tiers on explicit request', async () => {
    const veteran = seedCosmetic(h.db, { isPrestigeOnly: true, unlockLevel: 1 });

    const res = await app.request('/progression/prestige', { method: 'POST', headers: asPlayer(3) });

    expect(await res.json()).toEqual({ success: true, prestigeTier: 1, grantedCosmetics: [veteran] });
  });

  it('guards admin routes and replays ledgers', async () => {
    expect((await app.request('/admin/loot/tables')).status).toBe(401);

    const grant = await app.request('/admin/currency', {
      method: 'POST',
      ...json({ playerId: 6, amount: 75, kind: 'admin_grant' }, { 'X-Admin-Key': ADMIN_KEY }),
    });
    expect(grant.status).toBe(201);

    const verify = await app.request('/admin/ledger/6/verify', { headers: { 'X-Admin-Key': ADMIN_KEY } });
    expect(await verify.json()).toEqual({
      playerId: 6,
      transactionCount: 1,
      replayedBalance: 75,
      storedBalance: 75,
      mismatches: [],
      consistent: true,
    });

    const transactions = await app.request('/progression/transactions', { headers: asPlayer(6) });
    expect(await transactions.json()).toMatchObject({ total: 1, limit: 50, offset: 0, transactions: [{ amount: 75, kind: 'admin_grant' }] });
  });

  it('only lets the other kind debit through admin adjustments', async () => {
    const headers = { 'X-Admin-Key': ADMIN_KEY };
    const adjust = (amount: number, kind: string) =>
      app.request('/admin/currency', { method: 'POST', ...json({ playerId: 8, amount, kind }, headers) });

    expect((await adjust(100, 'admin_grant')).status).toBe(201);

    const negativeGrant = await adjust(-40, 'admin_grant');
    expect(negativeGrant.status).toBe(400);
    expect(await negativeGrant.json()).toEqual({ error: 'amount: admin_grant amount must be positive', kind: 'invalid_input' });
    expect((await adjust(-40, 'refund')).status).toBe(400);
    expect((await adjust(0, 'other')).status).toBe(400);

    expect((await adjust(-40, 'other')).status).toBe(201);

    const transactions = await app.request('/progression/transactions', { headers: asPlayer(8) });
    expect(await transactions.json()).toMatchObject({
      total: 2,
      transactions: [
        { kind: 'other', amount: -40, balanceAfter: 60 },
        { kind: 'admin_grant', amount: 100, balanceAfter: 100 },
      ],
    });
  });

  it('creates loot tables through the admin API', async () => {
    const headers = { 'X-Admin-Key': ADMIN_KEY };
    const created = await app.request('/admin/loot/tables', { method: 'POST', ...json({ name: 'Crate', dropChance: 0.4 }, headers) });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ lootTableId: 1, name: 'Crate', description: null, dropChance: 0.4, isActive: true });

    const cosmeticId = seedCosmetic(h.db, { name: 'Signal Flare', slot: 'other', rarity: 'uncommon' });
    const entry = await app.request('/admin/loot/tables/1/entries', { method: 'POST', ...json({ cosmeticId, weight: 4 }, headers) });
    expect(entry.status).toBe(201);

    const table = await app.request('/admin/loot/tables/1', { headers });
    expect(await table.json()).toMatchObject({
      name: 'Crate',
      entries: [{ cosmeticId, weight: 4, cosmeticName: 'Signal Flare', cosmeticSlot: 'other', cosmeticRarity: 'uncommon' }],
    });

    expect((await app.request('/admin/loot/tables/77', { headers })).status).toBe(404);
  });

  it('disables keyed routes when no key is configured', async () => {
    const open = createApp(h.ctx, {});
    expect((await open.request('/admin/loot/tables', { headers: { 'X-Admin-Key': 'anything' } })).status).toBe(404);
  });

  it('hides storage failures behind a generic 500', async () => {
    const cosmeticId = seedCosmetic(h.db);
    h.sqlite.exec(`
      CREATE TRIGGER block_all_grants BEFORE INSERT ON player_cosmetics
      BEGIN SELECT RAISE(ABORT, 'disk full'); END;
    `);

    const res = await app.request('/cosmetics/purchase', { method: 'POST', ...json({ cosmeticId }, asPlayer(1)) });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'internal server error' });
    expect(h.logger.at('error').map((entry) => entry.context)).toEqual([
      { operation: 'purchaseCosmetic', playerId: 1, error: 'SqliteError: disk full' },
    ]);
  });
});
