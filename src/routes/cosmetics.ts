import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import type { EngineContext } from '../engine/context.js';
import {
  activateLoadout,
  createLoadout,
  equipCosmetic,
  getCosmeticCatalog,
  getOwnedCosmetics,
  listLoadouts,
  purchaseCosmetic,
  unequipSlot,
} from '../engine/cosmetics.js';
import { parseWith, positiveId, readJson } from '../schemas/common.js';
import { cosmeticIdSchema, createLoadoutSchema, slotParamSchema } from '../schemas/cosmetics.js';
import type { AppEnv } from './env.js';

export function cosmeticRoutes(ctx: EngineContext, guard: MiddlewareHandler<AppEnv>) {
  const cosmetics = new Hono<AppEnv>();
  cosmetics.use('*', guard);

  // GET /cosmetics/catalog
  cosmetics.get('/catalog', (c) => {
    return c.json({ cosmetics: getCosmeticCatalog(ctx) });
  });

  // GET /cosmetics/owned
  cosmetics.get('/owned', (c) => {
    return c.json({ cosmetics: getOwnedCosmetics(ctx.db, c.get('playerId')) });
  });

  // PUT /cosmetics/equip — Into the active loadout, replacing the slot's occupant
  cosmetics.put('/equip', async (c) => {
    const { cosmeticId } = parseWith(cosmeticIdSchema, await readJson(c.req));
    const result = equipCosmetic(ctx, c.get('playerId'), cosmeticId, c.req.raw.signal);
    return c.json({ success: true, ...result });
  });

  // POST /cosmetics/purchase
  cosmetics.post('/purchase', async (c) => {
    const { cosmeticId } = parseWith(cosmeticIdSchema, await readJson(c.req));
    const result = purchaseCosmetic(ctx, c.get('playerId'), cosmeticId, c.req.raw.signal);
    return c.json({
      success: true,
      cosmetic: result.cosmetic,
      currencyBalance: result.currencyBalance,
    });
  });

  // ─── Loadouts ───

  cosmetics.get('/loadouts', (c) => {
    return c.json({ loadouts: listLoadouts(ctx.db, c.get('playerId')) });
  });

  cosmetics.post('/loadouts', async (c) => {
    const { name } = parseWith(createLoadoutSchema, await readJson(c.req));
    return c.json(createLoadout(ctx, c.get('playerId'), name, c.req.raw.signal), 201);
  });

  cosmetics.put('/loadouts/:id/activate', (c) => {
    const loadoutId = parseWith(positiveId, c.req.param('id'));
    return c.json(activateLoadout(ctx, c.get('playerId'), loadoutId, c.req.raw.signal));
  });

  cosmetics.delete('/loadouts/active/slots/:slot', (c) => {
    const slot = parseWith(slotParamSchema, c.req.param('slot'));
    return c.json({ removed: unequipSlot(ctx, c.get('playerId'), slot, c.req.raw.signal) });
  });

  return cosmetics;
}
