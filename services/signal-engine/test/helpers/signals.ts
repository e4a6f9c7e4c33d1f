import { Signal } from '@signalbridge/shared-types';

export const NOW = new Date('2024-05-01T12:00:00Z');

export function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * 3_600_000);
}

export function makeSignal(signalId: string, overrides: Partial<Signal> = {}): Signal {
  return {
    signalId,
    messageId: signalId,
    instrument: 'EURUSD',
    side: 'buy',
    entryPoint: 1.1,
    stopLoss: 1.095,
    takeProfits: [1.105, 1.11],
    reducedRisk: false,
    channelId: 'chan-1',
    channelName: 'Signals',
    rawMessage: `BUY EURUSD 1.1000 (${signalId})`,
    timestamp: hoursAgo(1),
    relatedOrders: [],
    ...overrides,
  };
}
