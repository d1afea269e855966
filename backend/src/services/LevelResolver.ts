/**
 * Level Resolver
 *
 * Pure mapping from a cumulative XP balance to a level tier. No I/O.
 * Lower bounds are inclusive: 500 XP is Silver.
 */

import type { LevelTier } from '../types';

export interface LevelTierInfo {
  level: LevelTier;
  displayName: string;
  minXP: number;
  /** Exclusive upper bound; null for the top tier. */
  maxXP: number | null;
  color: string;
}

export const LEVEL_TIERS: readonly LevelTierInfo[] = [
  { level: 'bronze', displayName: 'Bronze', minXP: 0, maxXP: 500, color: '#CD7F32' },
  { level: 'silver', displayName: 'Silver', minXP: 500, maxXP: 1500, color: '#C0C0C0' },
  { level: 'gold', displayName: 'Gold', minXP: 1500, maxXP: 5000, color: '#FFD700' },
  { level: 'platinum', displayName: 'Platinum', minXP: 5000, maxXP: null, color: '#E5E4E2' },
];

const LEVEL_ORDER: Record<LevelTier, number> = {
  bronze: 0,
  silver: 1,
  gold: 2,
  platinum: 3,
};

export function tierInfo(level: LevelTier): LevelTierInfo {
  return LEVEL_TIERS[LEVEL_ORDER[level]];
}

export function resolveLevel(xp: number): LevelTier {
  let resolved: LevelTier = 'bronze';
  for (const tier of LEVEL_TIERS) {
    if (xp >= tier.minXP) {
      resolved = tier.level;
    }
  }
  return resolved;
}

/**
 * XP still needed to reach the next tier's lower bound. 0 at Platinum.
 */
export function xpToNext(xp: number, level: LevelTier = resolveLevel(xp)): number {
  const { maxXP } = tierInfo(level);
  if (maxXP === null) return 0;
  return Math.max(0, maxXP - xp);
}

/**
 * Position inside the tier's band, clamped to [0, 100]. Platinum is always 100.
 */
export function progressPercent(xp: number, level: LevelTier = resolveLevel(xp)): number {
  const { minXP, maxXP } = tierInfo(level);
  if (maxXP === null) return 100;
  const percent = ((xp - minXP) / (maxXP - minXP)) * 100;
  return Math.min(100, Math.max(0, percent));
}

export function compareLevels(a: LevelTier, b: LevelTier): number {
  return LEVEL_ORDER[a] - LEVEL_ORDER[b];
}

export function isLevelUp(from: LevelTier, to: LevelTier): boolean {
  return compareLevels(to, from) > 0;
}

export interface LevelInfo extends LevelTierInfo {
  xp: number;
  xpToNext: number;
  progressPercent: number;
}

export function getLevelInfo(xp: number): LevelInfo {
  const level = resolveLevel(xp);
  return {
    ...tierInfo(level),
    xp,
    xpToNext: xpToNext(xp, level),
    progressPercent: progressPercent(xp, level),
  };
}
