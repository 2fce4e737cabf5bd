import { z } from 'zod';
import { TRANSACTION_KINDS } from '../types.js';
import type { TransactionKind } from '../types.js';

const transactionKind = z
  .string()
  .refine((value): value is TransactionKind => TRANSACTION_KINDS.some((kind) => kind === value), {
    message: `kind must be one of ${TRANSACTION_KINDS.join(', ')}`,
  });

export const transactionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  kind: transactionKind.optional(),
});
