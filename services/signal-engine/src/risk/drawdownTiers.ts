import { roundTo } from '@signalbridge/shared-utils';

export interface DrawdownTier {
  size: number;
  name: string;
}

/**
 * Balance floor (90% of each tier) -> tier. Checked top-down.
 */
const TIER_BANDS: ReadonlyArray<{ threshold: number; tier: DrawdownTier }> = [
  { threshold: 90_000, tier: { size: 100_000, name: '100K' } },
  { threshold: 45_000, tier: { size: 50_000, name: '50K' } },
  { threshold: 22_500, tier: { size: 25_000, name: '25K' } },
  { threshold: 9_000, tier: { size: 10_000, name: '10K' } },
  { threshold: 4_500, tier: { size: 5_000, name: '5K' } },
];

export function tierFor(balance: number): DrawdownTier {
  const band = TIER_BANDS.find(({ threshold }) => balance >= threshold);
  return band ? band.tier : { size: balance, name: 'custom' };
}

/**
 * starting_balance - tier(starting_balance) * percentage / 100
 */
export function computeMaxDrawdownBalance(startingBalance: number, percentage: number): number {
  const limit = (tierFor(startingBalance).size * percentage) / 100;
  return roundTo(startingBalance - limit, 2);
}

/**
 * Percentage of the tier that the persisted floor sits below the starting balance
 */
export function impliedDrawdownPercentage(startingBalance: number, maxDrawdownBalance: number): number {
  const tierSize = tierFor(startingBalance).size;
  if (tierSize <= 0) {
    return 0;
  }
  return ((startingBalance - maxDrawdownBalance) / tierSize) * 100;
}
