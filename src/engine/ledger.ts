import { eq, and, asc, desc, count } from 'drizzle-orm';
import { schema } from '../db/index.js';
import type { Reader, UnitOfWork } from '../db/index.js';
import type { CurrencyTransaction, LedgerMismatch, LedgerReplay, TransactionKind } from '../types.js';
import { TRANSACTION_KINDS } from '../types.js';
import type { EngineContext } from './context.js';
import { runOperation } from './context.js';
import { InsufficientBalanceError, InvalidInputError } from './errors.js';
import { creditBalance, debitBalance, ensureProgression, getBalance, now } from './store.js';

type TransactionRow = typeof schema.currencyTransactions.$inferSelect;

function isTransactionKind(value: string): value is TransactionKind {
  return TRANSACTION_KINDS.some((kind) => kind === value);
}

function toTransaction(row: TransactionRow): CurrencyTransaction {
  return {
    transactionId: row.transactionId,
    playerId: row.playerId,
    amount: row.amount,
    balanceAfter: row.balanceAfter,
    // The table CHECK restricts kind; anything else is an out-of-band write
    kind: isTransactionKind(row.kind) ? row.kind : 'other',
    referenceId: row.referenceId,
    createdAt: row.createdAt,
  };
}

// ─── Apply ───

/**
 * Moves a player's balance by `amount` and appends the matching ledger row,
 * both inside the caller's unit of work. Zero is a no-op.
 */
export function applyCurrencyDelta(
  uow: UnitOfWork,
  playerId: number,
  amount: number,
  kind: TransactionKind,
  referenceId: number | null = null,
): CurrencyTransaction | null {
  if (!Number.isInteger(amount)) {
    throw new InvalidInputError(`currency amount must be an integer, got ${amount}`);
  }
  if (amount === 0) return null;

  ensureProgression(uow, playerId);

  let balanceAfter: number;
  if (amount > 0) {
    balanceAfter = creditBalance(uow, playerId, amount);
  } else {
    const debited = debitBalance(uow, playerId, -amount);
    if (debited === null) {
      throw new InsufficientBalanceError(playerId, -amount, getBalance(uow, playerId));
    }
    balanceAfter = debited;
  }

  const row = uow
    .insert(schema.currencyTransactions)
    .values({ playerId, amount, balanceAfter, kind, referenceId, createdAt: now() })
    .returning()
    .get();

  return toTransaction(row);
}

/** Standalone credit or debit (admin grants, refunds) in its own unit of work. */
export function adjustCurrency(
  ctx: EngineContext,
  playerId: number,
  amount: number,
  kind: TransactionKind,
  referenceId: number | null = null,
  signal?: AbortSignal,
): CurrencyTransaction | null {
  const transaction = runOperation(ctx, 'adjustCurrency', playerId, (uow) =>
    applyCurrencyDelta(uow, playerId, amount, kind, referenceId), signal);

  if (transaction) {
    ctx.logger.info('[Ledger] Balance adjusted', {
      playerId,
      amount,
      kind,
      balanceAfter: transaction.balanceAfter,
    });
  }
  return transaction;
}

// ─── History ───

export interface TransactionQuery {
  limit?: number;
  offset?: number;
  kind?: TransactionKind;
}

function playerFilter(playerId: number, kind?: TransactionKind) {
  const t = schema.currencyTransactions;
  return kind ? and(eq(t.playerId, playerId), eq(t.kind, kind)) : eq(t.playerId, playerId);
}

/** Newest first. */
export function listTransactions(reader: Reader, playerId: number, query: TransactionQuery = {}): CurrencyTransaction[] {
  const t = schema.currencyTransactions;
  const limit = Math.min(Math.max(query.limit ?? 50, 1), 200);
  const offset = Math.max(query.offset ?? 0, 0);

  return reader
    .select()
    .from(t)
    .where(playerFilter(playerId, query.kind))
    .orderBy(desc(t.createdAt), desc(t.transactionId))
    .limit(limit)
    .offset(offset)
    .all()
    .map(toTransaction);
}

export function countTransactions(reader: Reader, playerId: number, kind?: TransactionKind): number {
  const row = reader
    .select({ total: count() })
    .from(schema.currencyTransactions)
    .where(playerFilter(playerId, kind))
    .get();
  return row?.total ?? 0;
}

// ─── Replay ───

/** Re-sums the log in (createdAt, transactionId) order and compares every snapshot. */
export function replayLedger(reader: Reader, playerId: number): LedgerReplay {
  const t = schema.currencyTransactions;
  const rows = reader
    .select()
    .from(t)
    .where(eq(t.playerId, playerId))
    .orderBy(asc(t.createdAt), asc(t.transactionId))
    .all();

  let running = 0;
  const mismatches: LedgerMismatch[] = [];
  for (const row of rows) {
    running += row.amount;
    if (row.balanceAfter !== running) {
      mismatches.push({ transactionId: row.transactionId, expectedBalance: running, recordedBalance: row.balanceAfter });
    }
  }

  const storedBalance = getBalance(reader, playerId);
  return {
    playerId,
    transactionCount: rows.length,
    replayedBalance: running,
    storedBalance,
    mismatches,
    consistent: mismatches.length === 0 && running === storedBalance,
  };
}
