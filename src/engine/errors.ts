/**
 * Business-rule failures raised by the progression engine.
 *
 * Every failure carries a stable `kind`; the HTTP layer maps kinds to status
 * codes and never needs the concrete class. Anything that is not a
 * `ProgressionError` and escapes a unit of work is wrapped in
 * `StorageFailureError`.
 */

export type ProgressionErrorKind =
  | 'not_found'
  | 'already_owned'
  | 'not_owned'
  | 'prestige_only'
  | 'insufficient_currency'
  | 'invalid_stats'
  | 'invalid_input'
  | 'no_active_loot_tables'
  | 'no_drop'
  | 'empty_loot_table'
  | 'non_positive_weight'
  | 'storage_failure';

export abstract class ProgressionError extends Error {
  abstract readonly kind: ProgressionErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// ─── Not found ───

export abstract class NotFoundError extends ProgressionError {
  readonly kind = 'not_found';
}

export class CosmeticNotFoundError extends NotFoundError {
  constructor(public readonly cosmeticId: number) {
    super(`cosmetic ${cosmeticId} not found`);
  }
}

export class LootTableNotFoundError extends NotFoundError {
  constructor(public readonly lootTableId: number) {
    super(`loot table ${lootTableId} not found`);
  }
}

export class LootTableEntryNotFoundError extends NotFoundError {
  constructor(public readonly lootEntryId: number) {
    super(`loot table entry ${lootEntryId} not found`);
  }
}

export class LoadoutNotFoundError extends NotFoundError {
  constructor(public readonly loadoutId: number) {
    super(`loadout ${loadoutId} not found`);
  }
}

// ─── Ownership ───

export class CosmeticAlreadyOwnedError extends ProgressionError {
  readonly kind = 'already_owned';

  constructor(public readonly playerId: number, public readonly cosmeticId: number) {
    super(`cosmetic ${cosmeticId} already owned`);
  }
}

export class CosmeticNotOwnedError extends ProgressionError {
  readonly kind = 'not_owned';

  constructor(public readonly playerId: number, public readonly cosmeticId: number) {
    super(`cosmetic ${cosmeticId} not owned`);
  }
}

/** Tier-exclusive cosmetics come from prestige only. */
export class PrestigeOnlyCosmeticError extends ProgressionError {
  readonly kind = 'prestige_only';

  constructor(public readonly cosmeticId: number) {
    super(`cosmetic ${cosmeticId} is unlocked by prestige only`);
  }
}

// ─── Currency ───

export class InsufficientCurrencyError extends ProgressionError {
  readonly kind = 'insufficient_currency';

  constructor(
    public readonly playerId: number,
    public readonly required: number,
    public readonly available: number,
  ) {
    super(`insufficient currency: need ${required}, have ${available}`);
  }
}

/** Raised by the ledger itself when a debit would take the balance below zero. */
export class InsufficientBalanceError extends InsufficientCurrencyError {}

// ─── Input ───

export class InvalidStatsError extends ProgressionError {
  readonly kind = 'invalid_stats';

  constructor(public readonly field: string, public readonly value: number) {
    super(`match stat ${field} must be a non-negative integer, got ${value}`);
  }
}

export class InvalidInputError extends ProgressionError {
  readonly kind = 'invalid_input';
}

// ─── Loot configuration ───

export class NoActiveLootTablesError extends ProgressionError {
  readonly kind = 'no_active_loot_tables';

  constructor() {
    super('no active loot tables');
  }
}

export class NoDropFromAnyTableError extends ProgressionError {
  readonly kind = 'no_drop';

  constructor() {
    super('no drop from any loot table');
  }
}

export class EmptyLootTableError extends ProgressionError {
  readonly kind = 'empty_loot_table';

  constructor(public readonly lootTableId: number) {
    super(`loot table ${lootTableId} has no entries`);
  }
}

export class NonPositiveWeightError extends ProgressionError {
  readonly kind = 'non_positive_weight';

  constructor(public readonly lootTableId: number, public readonly totalWeight: number) {
    super(`loot table ${lootTableId} total weight must be positive, got ${totalWeight}`);
  }
}

// ─── Storage ───

export class StorageFailureError extends ProgressionError {
  readonly kind = 'storage_failure';

  constructor(public readonly operation: string, options?: ErrorOptions) {
    super(`${operation} failed`, options);
  }
}
