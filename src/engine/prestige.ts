import { eq, and, notExists, asc } from 'drizzle-orm';
import { schema } from '../db/index.js';
import type { UnitOfWork } from '../db/index.js';
import type { PrestigeResult } from '../types.js';
import type { EngineContext } from './context.js';
import { runOperation } from './context.js';
import { insertOwnership } from './cosmetics.js';
import { runFollowUps } from './effects.js';
import type { FollowUpEffect } from './effects.js';
import { ensureProgression, resetForPrestige } from './store.js';

/** Prestige-only cosmetics unlocked at exactly `tier` that the player does not own yet. */
function tierCosmeticIds(uow: UnitOfWork, playerId: number, tier: number): number[] {
  const c = schema.cosmeticItems;
  const pc = schema.playerCosmetics;
  return uow
    .select({ cosmeticId: c.cosmeticId })
    .from(c)
    .where(and(
      eq(c.isPrestigeOnly, true),
      eq(c.unlockLevel, tier),
      notExists(
        uow
          .select({ one: pc.cosmeticId })
          .from(pc)
          .where(and(eq(pc.playerId, playerId), eq(pc.cosmeticId, c.cosmeticId))),
      ),
    ))
    .orderBy(asc(c.cosmeticId))
    .all()
    .map((row) => row.cosmeticId);
}

/**
 * Resets level and experience, advances the tier by one and grants the new
 * tier's exclusive cosmetics. Not idempotent: every call advances a tier.
 */
export function prestigePlayer(ctx: EngineContext, playerId: number, signal?: AbortSignal): PrestigeResult {
  const result = runOperation(ctx, 'prestigePlayer', playerId, (uow) => {
    ensureProgression(uow, playerId);
    const prestigeTier = resetForPrestige(uow, playerId);

    const cosmeticIds = tierCosmeticIds(uow, playerId, prestigeTier);
    const grants: FollowUpEffect[] = cosmeticIds.map((cosmeticId) => ({
      name: 'grantPrestigeCosmetic',
      context: { playerId, cosmeticId, prestigeTier },
      apply: (savepoint) => insertOwnership(savepoint, playerId, cosmeticId, 'prestige'),
    }));

    const outcomes = runFollowUps(uow, grants, ctx.logger);
    const grantedCosmeticIds = cosmeticIds.filter((_, index) => outcomes[index]?.status === 'applied');

    return { playerId, prestigeTier, grantedCosmeticIds };
  }, signal);

  ctx.logger.info('[Prestige] Tier advanced', {
    playerId,
    prestigeTier: result.prestigeTier,
    granted: result.grantedCosmeticIds.length,
  });
  return result;
}
