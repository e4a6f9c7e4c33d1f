import { describe, it, expect, beforeEach } from '@jest/globals';
import { SignalParser } from '../../src/parsing/SignalParser';
import { SignalExtractionClient, parseExtractionReply } from '../../src/parsing/ExtractionClient';
import { createSignalRecord, signalKey } from '../../src/parsing/signalRecord';
import { ValidationError } from '@signalbridge/shared-utils';
import { message } from '../helpers/FakeBroker';

class FakeExtraction implements SignalExtractionClient {
  calls: string[] = [];
  reply: unknown = null;
  error: Error | null = null;

  async extract(text: string): Promise<unknown> {
    this.calls.push(text);
    if (this.error) {
      throw this.error;
    }
    return this.reply;
  }
}

const SIGNAL_TEXT = 'SELL GBPUSD 1.2500 SL 1.2550 TP 1.2450 high risk';

describe('SignalParser', () => {
  let extraction: FakeExtraction;
  let parser: SignalParser;

  beforeEach(() => {
    extraction = new FakeExtraction();
    extraction.reply = {
      instrument: 'GBPUSD',
      order_type: 'sell',
      entry_point: 1.25,
      stop_loss: 1.255,
      take_profits: [1.245],
    };
    parser = new SignalParser(extraction, {
      priceAdjustment: { offsets: {}, indexTpBuffer: { instrument: 'DJI30', points: 0 } },
      cacheClearIntervalMs: 60_000,
    });
  });

  it('parses a signal and flags reduced risk from the raw text', async () => {
    expect(await parser.parse(SIGNAL_TEXT)).toEqual({
      instrument: 'GBPUSD',
      side: 'sell',
      entryPoint: 1.25,
      stopLoss: 1.255,
      takeProfits: [1.245],
      reducedRisk: true,
    });
  });

  it('calls extraction once per distinct message', async () => {
    await parser.parse(SIGNAL_TEXT);
    await parser.parse(SIGNAL_TEXT);
    expect(extraction.calls).toHaveLength(1);
    expect(parser.cacheSize).toBe(1);
  });

  it('never calls extraction for pre-filtered messages', async () => {
    expect(await parser.parse('good morning traders')).toBeNull();
    expect(extraction.calls).toHaveLength(0);
  });

  it('caches negative results from failed extraction', async () => {
    extraction.error = new Error('timeout');
    expect(await parser.parse(SIGNAL_TEXT)).toBeNull();
    extraction.error = null;
    expect(await parser.parse(SIGNAL_TEXT)).toBeNull();
    expect(extraction.calls).toHaveLength(1);
  });

  it('re-extracts after the cache is cleared', async () => {
    await parser.parse(SIGNAL_TEXT);
    parser.clearCache();
    await parser.parse(SIGNAL_TEXT);
    expect(extraction.calls).toHaveLength(2);
  });
});

describe('parseExtractionReply', () => {
  it('strips code fences', () => {
    expect(parseExtractionReply('```json\n{"instrument":"EURUSD"}\n```')).toEqual({ instrument: 'EURUSD' });
    expect(parseExtractionReply('null')).toBeNull();
  });
});

describe('createSignalRecord', () => {
  const parsed = {
    instrument: 'EURUSD',
    side: 'buy' as const,
    entryPoint: 1.1,
    stopLoss: 1.095,
    takeProfits: [1.105, 1.11],
    reducedRisk: false,
  };

  it('builds a frozen record keyed by channel and message id', () => {
    const signal = createSignalRecord(parsed, message('BUY EURUSD', { messageId: '42' }));
    expect(signal.signalId).toBe('chan-1:42');
    expect(signal.messageId).toBe('42');
    expect(signal.channelId).toBe('chan-1');
    expect(signal.relatedOrders).toEqual([]);
    expect(Object.isFrozen(signal)).toBe(true);
    expect(Object.isFrozen(signal.takeProfits)).toBe(true);
  });

  it('synthesizes an id without a message id', () => {
    const signal = createSignalRecord(parsed, message('BUY EURUSD', { messageId: '', channelId: null }));
    expect(signal.signalId).toBe(`EURUSD-${Date.parse('2024-05-01T12:00:00Z')}`);
  });

  it('uses the bare message id without a channel', () => {
    expect(signalKey(null, '42')).toBe('42');
    expect(signalKey('chan-2', '42')).toBe('chan-2:42');
  });

  it('rejects non-finite prices', () => {
    expect(() => createSignalRecord({ ...parsed, stopLoss: NaN }, message('x'))).toThrow(ValidationError);
  });
});
