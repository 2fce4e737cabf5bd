import { z } from 'zod';

const dropChance = z.number().min(0).max(1);

export const lootTableCreateSchema = z.object({
  name: z.string().trim().min(1).max(64),
  description: z.string().max(256).nullable().optional(),
  dropChance,
  isActive: z.boolean().optional(),
});

export const lootTablePatchSchema = lootTableCreateSchema.partial();

export const lootEntryCreateSchema = z.object({
  cosmeticId: z.number().int().positive(),
  weight: z.number().int().min(1),
  minQuantity: z.number().int().min(1).optional(),
  maxQuantity: z.number().int().min(1).optional(),
});

export const lootEntryPatchSchema = lootEntryCreateSchema.omit({ cosmeticId: true }).partial();

// Grants and refunds credit; 'other' may also debit
export const currencyAdjustSchema = z
  .object({
    playerId: z.number().int().positive(),
    amount: z.number().int(),
    kind: z.enum(['admin_grant', 'refund', 'other']),
    referenceId: z.number().int().positive().nullable().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.kind === 'other' ? value.amount === 0 : value.amount <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['amount'],
        message: value.kind === 'other' ? 'amount must not be zero' : `${value.kind} amount must be positive`,
      });
    }
  });
