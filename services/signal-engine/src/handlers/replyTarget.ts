/**
 * Correlation of follow-up messages to the signal whose orders they refer to:
 * by the replied-to message ID first, then by the trade the text describes.
 */

import { InboundMessage } from '@signalbridge/shared-types';
import { SignalHistoryStore } from '../correlation/SignalHistoryStore';
import { OrderCache } from '../correlation/OrderCache';
import { normalize } from '../instruments/InstrumentNormalizer';
import { signalKey } from '../parsing/signalRecord';
import { TradingParameters } from './contentMatching';

export interface CorrelatedSignal {
  signalId: string;
  instrument: string;
  orderIds: string[];
}

/**
 * The signal a reply answers, looked up within the reply's channel
 */
export function resolveReplyTarget(
  message: InboundMessage,
  history: SignalHistoryStore,
  orderCache: OrderCache
): CorrelatedSignal | null {
  if (!message.replyToId) {
    return null;
  }
  const signal = history.findByMessage(message.replyToId, message.channelId);
  const signalId = signal?.signalId ?? signalKey(message.channelId, message.replyToId);
  const cached = orderCache.getEntry(signalId);
  const instrument = signal?.instrument ?? cached?.instrument ?? null;
  if (!instrument) {
    return null;
  }
  return {
    signalId,
    instrument: normalize(instrument),
    orderIds: Array.from(new Set([...(signal?.relatedOrders ?? []), ...(cached?.orders ?? [])])),
  };
}

/**
 * Cached orders whose entry, stop and take profits match the trade quoted in
 * the text, e.g. a forwarded signal
 */
export function findCachedTrade(
  params: TradingParameters,
  orderCache: OrderCache,
  maxAgeHours: number
): CorrelatedSignal | null {
  if (!params.instrument) {
    return null;
  }
  const match = orderCache.findOrdersByContent(
    {
      instrument: params.instrument,
      entryPrice: params.entry,
      stopLoss: params.stopLoss,
      takeProfits: params.takeProfits,
    },
    maxAgeHours
  );
  return match ? { signalId: match.messageId, instrument: normalize(params.instrument), orderIds: match.orders } : null;
}
