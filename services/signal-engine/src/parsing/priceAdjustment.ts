import { roundTo } from '@signalbridge/shared-utils';
import { ExtractedSignal } from './signalValidation';

export interface PriceAdjustmentPolicy {
  // Canonical instrument -> additive offset for entry, stop and every take profit
  offsets: Record<string, number>;
  // Take profits on this index are pulled toward entry by `points`
  indexTpBuffer: { instrument: string; points: number };
}

const PRICE_DECIMALS = 5;

/**
 * Shift provider prices onto the broker's price feed
 */
export function applyPriceAdjustment(
  signal: ExtractedSignal,
  policy: PriceAdjustmentPolicy
): ExtractedSignal {
  const offset = policy.offsets[signal.instrument] ?? 0;
  const buffer =
    policy.indexTpBuffer.instrument === signal.instrument ? policy.indexTpBuffer.points : 0;
  const tpShift = offset + (signal.side === 'buy' ? -buffer : buffer);

  if (offset === 0 && tpShift === 0) {
    return signal;
  }

  return {
    ...signal,
    entryPoint: roundTo(signal.entryPoint + offset, PRICE_DECIMALS),
    stopLoss: roundTo(signal.stopLoss + offset, PRICE_DECIMALS),
    takeProfits: signal.takeProfits.map(tp => roundTo(tp + tpShift, PRICE_DECIMALS)),
  };
}
