import { DEFAULT_BASE_XP_PER_LEVEL } from '../config.js';

// ─── Leveling ───
// level = floor(xp / base) + 1, never below 1

export function resolveBaseXpPerLevel(base: number): number {
  return Number.isFinite(base) && base > 0 ? base : DEFAULT_BASE_XP_PER_LEVEL;
}

export function levelForExperience(experience: number, base: number): number {
  const perLevel = resolveBaseXpPerLevel(base);
  return Math.max(1, Math.floor(experience / perLevel) + 1);
}

/** Cumulative experience at which `level` starts. */
export function experienceForLevel(level: number, base: number): number {
  return (Math.max(1, Math.floor(level)) - 1) * resolveBaseXpPerLevel(base);
}

export function experienceToNextLevel(experience: number, base: number): number {
  const next = levelForExperience(experience, base) + 1;
  return experienceForLevel(next, base) - Math.max(0, experience);
}

export function crossesLevelBoundary(before: number, after: number, base: number): boolean {
  return levelForExperience(after, base) > levelForExperience(before, base);
}
