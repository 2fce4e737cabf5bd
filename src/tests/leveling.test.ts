import { describe, it, expect } from 'vitest';
import {
  crossesLevelBoundary,
  experienceForLevel,
  experienceToNextLevel,
  levelForExperience,
  resolveBaseXpPerLevel,
} from '../engine/leveling.js';

describe('levelForExperience', () => {
  it('starts at level 1 and steps every base xp', () => {
    expect(levelForExperience(0, 1000)).toBe(1);
    expect(levelForExperience(999, 1000)).toBe(1);
    expect(levelForExperience(1000, 1000)).toBe(2);
    expect(levelForExperience(1060, 1000)).toBe(2);
    expect(levelForExperience(25_000, 1000)).toBe(26);
  });

  it('is non-decreasing, at least 1 and stable across calls', () => {
    let previous = levelForExperience(0, 750);
    for (let xp = 0; xp <= 20_000; xp += 37) {
      const level = levelForExperience(xp, 750);
      expect(level).toBeGreaterThanOrEqual(1);
      expect(level).toBeGreaterThanOrEqual(previous);
      expect(levelForExperience(xp, 750)).toBe(level);
      previous = level;
    }
  });

  it('never drops below 1 for negative xp', () => {
    expect(levelForExperience(-5000, 1000)).toBe(1);
  });

  it('falls back to the default base when misconfigured', () => {
    expect(resolveBaseXpPerLevel(0)).toBe(1000);
    expect(resolveBaseXpPerLevel(-20)).toBe(1000);
    expect(resolveBaseXpPerLevel(Number.NaN)).toBe(1000);
    expect(resolveBaseXpPerLevel(500)).toBe(500);
    expect(levelForExperience(1500, 0)).toBe(2);
  });
});

describe('level thresholds', () => {
  it('computes the xp at which a level starts', () => {
    expect(experienceForLevel(1, 1000)).toBe(0);
    expect(experienceForLevel(3, 1000)).toBe(2000);
  });

  it('computes xp remaining to the next level', () => {
    expect(experienceToNextLevel(0, 1000)).toBe(1000);
    expect(experienceToNextLevel(1060, 1000)).toBe(940);
    expect(experienceToNextLevel(2000, 1000)).toBe(1000);
  });

  it('detects boundary crossings', () => {
    expect(crossesLevelBoundary(950, 1060, 1000)).toBe(true);
    expect(crossesLevelBoundary(1000, 1999, 1000)).toBe(false);
  });
});
