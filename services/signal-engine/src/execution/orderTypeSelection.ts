import { OrderKind, OrderSide, Quote } from '@signalbridge/shared-types';
import { roundTo } from '@signalbridge/shared-utils';
import { pipSize } from '../instruments/InstrumentClassifier';

const PRICE_DECIMALS = 5;

export interface OrderTypeDecision {
  kind: OrderKind;
  price: number | null; // limit price; null for market
  stopLoss: number;
  currentPrice: number | null;
  pipDistance: number | null;
  reason: string;
}

export interface OrderTypeInput {
  instrument: string;
  side: OrderSide;
  entryPoint: number;
  stopLoss: number;
}

/**
 * Market when price is within `thresholdPips` of entry or already better
 * than entry; the stop then moves by the entry/price gap (+ for buy, - for
 * sell). Otherwise a limit at the signal's entry.
 */
export function selectOrderType(
  input: OrderTypeInput,
  quote: Quote | null,
  thresholdPips: number
): OrderTypeDecision {
  if (!quote) {
    return {
      kind: 'limit',
      price: input.entryPoint,
      stopLoss: input.stopLoss,
      currentPrice: null,
      pipDistance: null,
      reason: 'no quote available',
    };
  }

  const currentPrice = input.side === 'buy' ? quote.ask : quote.bid;
  const diff = Math.abs(input.entryPoint - currentPrice);
  const pipDistance = diff / pipSize(input.instrument);
  const favorable = input.side === 'buy' ? currentPrice < input.entryPoint : currentPrice > input.entryPoint;

  if (pipDistance <= thresholdPips || favorable) {
    const stopLoss = roundTo(input.side === 'buy' ? input.stopLoss + diff : input.stopLoss - diff, PRICE_DECIMALS);
    return {
      kind: 'market',
      price: null,
      stopLoss,
      currentPrice,
      pipDistance,
      reason: favorable ? 'price already better than entry' : `within ${thresholdPips} pips of entry`,
    };
  }

  return {
    kind: 'limit',
    price: input.entryPoint,
    stopLoss: input.stopLoss,
    currentPrice,
    pipDistance,
    reason: `${pipDistance.toFixed(1)} pips from entry`,
  };
}
