import { z } from 'zod';
import { COSMETIC_SLOTS } from '../types.js';
import type { CosmeticSlot } from '../types.js';

export const cosmeticIdSchema = z.object({
  cosmeticId: z.number().int().positive(),
});

export const createLoadoutSchema = z.object({
  name: z.string().trim().min(1).max(64),
});

export const slotParamSchema = z
  .string()
  .refine((value): value is CosmeticSlot => COSMETIC_SLOTS.some((slot) => slot === value), {
    message: `slot must be one of ${COSMETIC_SLOTS.join(', ')}`,
  });
