import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import path from 'path';
import { SignalHistoryStore } from '../../src/correlation/SignalHistoryStore';
import { OrderCache } from '../../src/correlation/OrderCache';
import { BrokerRateLimiter } from '../../src/utils/BrokerRateLimiter';
import { MissedSignalHandler } from '../../src/handlers/MissedSignalHandler';
import { ACCOUNT, FakeBroker, makeTempDir, message, pendingOrder, position } from '../helpers/FakeBroker';
import { NOW, makeSignal } from '../helpers/signals';

describe('MissedSignalHandler', () => {
  let broker: FakeBroker;
  let history: SignalHistoryStore;
  let orderCache: OrderCache;
  let rateLimiter: BrokerRateLimiter;

  beforeEach(async () => {
    broker = new FakeBroker();
    history = new SignalHistoryStore({}, () => NOW);
    orderCache = new OrderCache(path.join(await makeTempDir('missed'), 'order_cache.json'), 2, () => NOW);
    rateLimiter = new BrokerRateLimiter(0);

    history.add(makeSignal('s1'));
    history.registerOrders('EURUSD', 's1', ['o1', 'o2']);
    await orderCache.storeOrders('s1', ['o1', 'o2'], {
      instrument: 'EURUSD',
      entryPrice: 1.1,
      stopLoss: 1.095,
      takeProfits: [1.105, 1.11],
    });
    broker.orders = [
      pendingOrder({ id: 'o1' }),
      pendingOrder({ id: 'o2' }),
      pendingOrder({ id: 'o3' }),
      pendingOrder({ id: 'g1', instrument: 'GBPUSD' }),
    ];
  });

  afterEach(async () => {
    await rateLimiter.stop();
  });

  function handler(fallbackProtection: boolean = false): MissedSignalHandler {
    return new MissedSignalHandler({ broker, history, orderCache, rateLimiter }, { fallbackProtection });
  }

  it('cancels exactly the orders of the signal a reply points at', async () => {
    const result = await handler().handle(message('TP1 hit!', { replyToId: 's1' }), ACCOUNT);

    expect(result).toEqual({
      action: 'cancelled',
      reason: 'cancelled_matched_orders',
      instrument: 'EURUSD',
      signalId: 's1',
      matchMethod: 'reply',
      cancelled: ['o1', 'o2'],
      alreadyResolved: [],
      failed: [],
      fallbackUsed: false,
    });
    expect(broker.orders.map(order => order.id)).toEqual(['o3', 'g1']);
    expect(history.get('s1')?.relatedOrders).toEqual([]);
    expect(orderCache.getOrders('s1')).toEqual([]);
  });

  it('keeps replies within their own channel when message IDs repeat', async () => {
    history.add(makeSignal('chan-1:100', { messageId: '100', channelId: 'chan-1' }));
    history.add(makeSignal('chan-2:100', { messageId: '100', channelId: 'chan-2', channelName: 'Other' }));
    history.registerOrders('EURUSD', 'chan-1:100', ['a1', 'a2']);
    history.registerOrders('EURUSD', 'chan-2:100', ['b1']);
    broker.orders.push(pendingOrder({ id: 'a1' }), pendingOrder({ id: 'a2' }), pendingOrder({ id: 'b1' }));

    const result = await handler().handle(
      message('TP1 hit!', { messageId: '101', channelId: 'chan-1', replyToId: '100' }),
      ACCOUNT
    );

    expect(result).toMatchObject({ action: 'cancelled', signalId: 'chan-1:100', matchMethod: 'reply', cancelled: ['a1', 'a2'] });
    expect(broker.orders.map(order => order.id)).toEqual(['o1', 'o2', 'o3', 'g1', 'b1']);
    expect(history.get('chan-1:100')?.relatedOrders).toEqual([]);
    expect(history.get('chan-2:100')?.relatedOrders).toEqual(['b1']);
  });

  it('falls back to the cached trade the message quotes', async () => {
    await orderCache.storeOrders('chan-1:g7', ['g1'], {
      instrument: 'GBPUSD',
      entryPrice: 1.25,
      stopLoss: 1.245,
      takeProfits: [1.255, 1.26],
    });

    const result = await handler().handle(message('GBPUSD TP1 hit! SL 1.2450 TP1 1.2550'), ACCOUNT);

    expect(result).toMatchObject({
      action: 'cancelled',
      instrument: 'GBPUSD',
      signalId: 'chan-1:g7',
      matchMethod: 'order_cache_content',
      cancelled: ['g1'],
      fallbackUsed: false,
    });
    expect(broker.orders.map(order => order.id)).toEqual(['o1', 'o2', 'o3']);
    expect(orderCache.getEntry('chan-1:g7')).toBeNull();
  });

  it('matches by the cited take-profit price', async () => {
    const result = await handler().handle(message('EURUSD TP2 hit @ 1.1100'), ACCOUNT);

    expect(result.signalId).toBe('s1');
    expect(result.matchMethod).toBe('tp_price');
    expect(result.cancelled).toEqual(['o1', 'o2']);
  });

  it('does nothing while a position is open on the instrument', async () => {
    broker.positions = [position({ id: 'p1' })];

    const result = await handler().handle(message('EURUSD TP1 hit'), ACCOUNT);

    expect(result.action).toBe('none');
    expect(result.reason).toBe('existing_positions');
    expect(broker.callsTo('cancelOrder')).toHaveLength(0);
  });

  it('counts a 404 on cancel as already resolved', async () => {
    broker.notFound.add('o2');

    const result = await handler().handle(message('TP1 hit', { replyToId: 's1' }), ACCOUNT);

    expect(result.cancelled).toEqual(['o1']);
    expect(result.alreadyResolved).toEqual(['o2']);
    expect(orderCache.getOrders('s1')).toEqual([]);
  });

  it('leaves unmatched pending orders alone without fallback protection', async () => {
    const result = await handler(false).handle(message('GBPUSD TP1 hit'), ACCOUNT);

    expect(result.reason).toBe('fallback_protection_disabled');
    expect(result.instrument).toBe('GBPUSD');
    expect(broker.callsTo('cancelOrder')).toHaveLength(0);
  });

  it('cancels every pending order on the instrument with fallback protection', async () => {
    const result = await handler(true).handle(message('GBPUSD TP1 hit'), ACCOUNT);

    expect(result.reason).toBe('cancelled_all_pending');
    expect(result.fallbackUsed).toBe(true);
    expect(result.signalId).toBeNull();
    expect(result.cancelled).toEqual(['g1']);
    expect(broker.orders.map(order => order.id)).toEqual(['o1', 'o2', 'o3']);
  });

  it('ignores a TP hit that names no instrument and replies to nothing', async () => {
    const result = await handler(true).handle(message('TP1 hit'), ACCOUNT);
    expect(result.reason).toBe('unknown_instrument');
  });

  it('reports broker lookup failures', async () => {
    broker.failReads = true;
    const result = await handler().handle(message('EURUSD TP1 hit'), ACCOUNT);
    expect(result.reason).toBe('broker_error');
  });
});
