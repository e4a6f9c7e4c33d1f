import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs/promises';
import path from 'path';
import { InboundMessage } from '@signalbridge/shared-types';
import { SignalEngineConfig } from '../../src/config';
import { SignalExtractionClient } from '../../src/parsing/ExtractionClient';
import { MessageListener, MessageSource, SignalEngine, createSignalEngine } from '../../src/engine/SignalEngine';
import { FakeBroker, makeTempDir, message, position } from '../helpers/FakeBroker';

const SIGNAL_TEXT = 'BUY EURUSD 1.1000 SL 1.0950 TP 1.1050 TP 1.1100';

class FakeExtraction implements SignalExtractionClient {
  calls = 0;

  async extract(): Promise<unknown> {
    this.calls += 1;
    return {
      instrument: 'EURUSD',
      order_type: 'buy',
      entry_point: 1.1,
      stop_loss: 1.095,
      take_profits: [1.105, 1.11],
    };
  }
}

class FakeSource implements MessageSource {
  listener: MessageListener | null = null;

  subscribe(listener: MessageListener): () => void {
    this.listener = listener;
    return () => {
      this.listener = null;
    };
  }

  async emit(msg: InboundMessage): Promise<void> {
    if (this.listener) {
      await this.listener(msg);
    }
  }
}

function testConfig(dir: string): SignalEngineConfig {
  return {
    timezone: 'America/New_York',
    riskSettingsPath: path.join(dir, 'risk_settings.json'),
    drawdownStatePath: path.join(dir, 'drawdown_state.json'),
    orderCachePath: path.join(dir, 'order_cache.json'),
    accountsConfigPath: path.join(dir, 'accounts.json'),
    brokerPriceOffsets: {},
    indexTpBuffer: { instrument: 'DJI30', points: 0 },
    parseCacheClearHours: 24,
    instrumentCacheTtlMinutes: 60,
    marketThresholdPips: 10,
    marginRetryAttempts: 3,
    maxSignalAgeSeconds: 180,
    broker: { baseUrl: 'http://broker.test', apiKey: 'test-secret', timeoutMs: 1_000, maxAttempts: 1, writeSpacingMs: 0 },
    extraction: { openaiApiKey: 'test-secret', model: 'test-model', timeoutMs: 1_000 },
    drawdown: { resetCron: '0 19 * * *', timezone: 'America/New_York', retryBaseMinutes: 5, retryMaxMinutes: 60 },
    monitor: {
      enabled: false,
      activeIntervalSeconds: 3,
      idleIntervalSeconds: 10,
      cooldownSeconds: 30,
      breakevenThresholdPips: 40,
      runnerIndexThresholdPips: 100,
      runnerGoldThresholdPips: 40,
      trailingPullbackPips: 20,
      maxConsecutiveFailures: 10,
      failureBackoffSeconds: 300,
    },
    correlation: {
      maxSignalAgeHours: 48,
      sameSourceOnly: true,
      fallbackProtection: false,
      tpPriceTolerance: 0.001,
      perInstrumentCapacity: 10,
      globalCapacity: 50,
      orderCacheRetentionDays: 2,
      breakevenBufferPips: 2,
      minContentMatchScore: 40,
    },
  };
}

describe('SignalEngine', () => {
  let dir: string;
  let broker: FakeBroker;
  let extraction: FakeExtraction;
  let engine: SignalEngine;

  beforeEach(async () => {
    dir = await makeTempDir('engine');
    await fs.writeFile(
      path.join(dir, 'accounts.json'),
      JSON.stringify([{ id: 'acc-1', acc_num: '1', name: 'Primary', channels: ['chan-1'] }])
    );
    broker = new FakeBroker();
    broker.quotes.EURUSD = { bid: 1.1003, ask: 1.1005 };
    extraction = new FakeExtraction();
    engine = createSignalEngine(testConfig(dir), {
      broker,
      extraction,
      now: () => new Date('2024-05-01T12:01:00Z'),
    });
    await engine.start();
  });

  afterEach(async () => {
    await engine.stop();
  });

  it('places a new signal on the subscribed account', async () => {
    const outcomes = await engine.handleMessage(message(SIGNAL_TEXT));

    expect(outcomes).toHaveLength(1);
    const [outcome] = outcomes;
    expect(outcome).toMatchObject({ kind: 'signal', accountId: 'acc-1', signalId: 'chan-1:msg-1' });
    if (outcome.kind !== 'signal') {
      throw new Error(`unexpected outcome ${outcome.kind}`);
    }
    expect(outcome.placement.status).toBe('placed');
    expect(broker.created.map(request => [request.kind, request.quantity, request.stopLoss, request.takeProfit])).toEqual([
      ['market', 0.1, 1.0955, 1.105],
      ['market', 0.1, 1.0955, 1.11],
    ]);

    const cache = JSON.parse(await fs.readFile(path.join(dir, 'order_cache.json'), 'utf8'));
    expect(cache['chan-1:msg-1'].orders).toEqual(['ord-1', 'ord-2']);
  });

  it('cancels the pending orders of a signal whose TP was announced without a fill', async () => {
    await engine.handleMessage(message(SIGNAL_TEXT));

    const [outcome] = await engine.handleMessage(message('TP1 hit!', { messageId: 'msg-2', replyToId: 'msg-1' }));

    expect(outcome).toMatchObject({
      kind: 'tp_hit',
      accountId: 'acc-1',
      outcome: { action: 'cancelled', signalId: 'chan-1:msg-1', cancelled: ['ord-1', 'ord-2'] },
    });
    expect(broker.orders).toEqual([]);
  });

  it('routes management instructions to the handler', async () => {
    const [outcome] = await engine.handleMessage(message('close EURUSD now', { messageId: 'msg-3' }));
    expect(outcome).toMatchObject({ kind: 'management', accountId: 'acc-1', outcome: { status: 'no_targets' } });
  });

  it('places a signal that also carries a management instruction', async () => {
    const outcomes = await engine.handleMessage(
      message(`${SIGNAL_TEXT}. Move SL to BE after TP1`, { messageId: 'msg-4' })
    );

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]).toMatchObject({ kind: 'signal', accountId: 'acc-1', signalId: 'chan-1:msg-4' });
    expect(broker.created).toHaveLength(2);
    expect(extraction.calls).toBe(1);
  });

  it('keeps a management instruction that found trades to act on', async () => {
    broker.positions = [position({ id: 'pos-1', stopLoss: 1.0955 })];

    const [outcome] = await engine.handleMessage(
      message(`${SIGNAL_TEXT}. Move SL to BE after TP1`, { messageId: 'msg-5' })
    );

    expect(outcome).toMatchObject({
      kind: 'management',
      accountId: 'acc-1',
      outcome: { status: 'applied', positionsUpdated: ['pos-1'] },
    });
    expect(extraction.calls).toBe(0);
    expect(broker.created).toEqual([]);
  });

  it('skips chatter without calling extraction', async () => {
    expect(await engine.handleMessage(message('Good morning everyone, coffee time'))).toEqual([
      { kind: 'skipped', accountId: null, reason: 'not_a_signal' },
    ]);
    expect(extraction.calls).toBe(0);
  });

  it('ignores channels no account follows', async () => {
    expect(await engine.handleMessage(message(SIGNAL_TEXT, { channelId: 'chan-5', channelName: 'Other' }))).toEqual([
      { kind: 'skipped', accountId: null, reason: 'no_subscribed_account' },
    ]);
  });

  it('reports per-account failures as outcomes', async () => {
    broker.failReads = true;
    const [outcome] = await engine.handleMessage(message(SIGNAL_TEXT));
    expect(outcome).toEqual({ kind: 'error', accountId: 'acc-1', reason: 'broker unavailable' });
  });

  it('takes messages from an attached source until stopped', async () => {
    const source = new FakeSource();
    engine.attach(source);

    await source.emit(message(SIGNAL_TEXT));
    expect(broker.created).toHaveLength(2);

    await engine.stop();
    expect(source.listener).toBeNull();
    expect(engine.running).toBe(false);
    expect(await engine.handleMessage(message(SIGNAL_TEXT, { messageId: 'msg-9' }))).toEqual([
      { kind: 'skipped', accountId: null, reason: 'engine_stopping' },
    ]);
    expect(engine.pendingTasks).toBe(0);
  });
});
