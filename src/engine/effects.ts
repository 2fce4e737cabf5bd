import type { UnitOfWork } from '../db/index.js';
import type { Logger, LogContext } from '../logging.js';
import { describeError } from '../logging.js';

// ─── Follow-up Effects ───
// A primary mutation must succeed; follow-ups may fail. Each follow-up runs in
// its own savepoint so a failure rolls back only its own writes.

export interface FollowUpEffect {
  name: string;
  context: LogContext;
  apply(uow: UnitOfWork): void;
}

export type FollowUpOutcome =
  | { name: string; status: 'applied' }
  | { name: string; status: 'failed'; error: string };

export function runFollowUps(uow: UnitOfWork, effects: FollowUpEffect[], logger: Logger): FollowUpOutcome[] {
  return effects.map((effect) => {
    try {
      uow.transaction((savepoint) => effect.apply(savepoint));
      return { name: effect.name, status: 'applied' };
    } catch (err) {
      const error = describeError(err);
      logger.warn(`[FollowUp] ${effect.name} failed`, { ...effect.context, error });
      return { name: effect.name, status: 'failed', error };
    }
  });
}
