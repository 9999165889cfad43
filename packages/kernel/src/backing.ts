/**
 * How a voucher's face value is backed, and whether it can be split
 *
 * - FIXED: backed 1:1, never split
 * - MINIMAL: coarse splits only
 * - PROPORTIONAL: backed at issuanceRatio, fine-grained splits
 */

export const BackingStrategy = {
  FIXED: 'FIXED',
  MINIMAL: 'MINIMAL',
  PROPORTIONAL: 'PROPORTIONAL',
} as const;

export type BackingStrategy = (typeof BackingStrategy)[keyof typeof BackingStrategy];

export const BACKING_STRATEGIES: readonly BackingStrategy[] = Object.values(BackingStrategy);

export function isBackingStrategy(value: unknown): value is BackingStrategy {
  return typeof value === 'string' && BACKING_STRATEGIES.some((s) => s === value);
}

export function isSplittable(strategy: BackingStrategy): boolean {
  return strategy !== BackingStrategy.FIXED;
}

export function hasFineGrainedSplits(strategy: BackingStrategy): boolean {
  return strategy === BackingStrategy.PROPORTIONAL;
}
