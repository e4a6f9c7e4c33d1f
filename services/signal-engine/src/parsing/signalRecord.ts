import { InboundMessage, ParsedSignal, Signal } from '@signalbridge/shared-types';
import { ValidationError } from '@signalbridge/shared-utils';

function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number`, field);
  }
  return value;
}

/**
 * Key for a message's signal. Message IDs are only unique within a channel.
 */
export function signalKey(channelId: string | null, messageId: string): string {
  return channelId ? `${channelId}:${messageId}` : messageId;
}

/**
 * Build the history record for a parsed signal, keyed by `signalKey`. Without
 * a message ID, `${instrument}-${epoch ms}` stands in for it.
 */
export function createSignalRecord(parsed: ParsedSignal, message: InboundMessage): Signal {
  if (!parsed.instrument) {
    throw new ValidationError('instrument is required', 'instrument');
  }
  if (parsed.side !== 'buy' && parsed.side !== 'sell') {
    throw new ValidationError(`invalid side: ${String(parsed.side)}`, 'side');
  }
  if (parsed.takeProfits.length === 0) {
    throw new ValidationError('at least one take profit is required', 'takeProfits');
  }
  if (Number.isNaN(message.timestamp.getTime())) {
    throw new ValidationError('timestamp is invalid', 'timestamp');
  }

  const messageId = message.messageId || `${parsed.instrument}-${message.timestamp.getTime()}`;
  return Object.freeze({
    signalId: signalKey(message.channelId, messageId),
    messageId,
    instrument: parsed.instrument,
    side: parsed.side,
    entryPoint: requireFinite(parsed.entryPoint, 'entryPoint'),
    stopLoss: requireFinite(parsed.stopLoss, 'stopLoss'),
    takeProfits: Object.freeze(parsed.takeProfits.map(tp => requireFinite(tp, 'takeProfits'))),
    reducedRisk: parsed.reducedRisk,
    channelId: message.channelId,
    channelName: message.channelName,
    rawMessage: message.text,
    timestamp: message.timestamp,
    relatedOrders: Object.freeze([]),
  });
}
