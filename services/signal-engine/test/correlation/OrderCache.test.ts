import { describe, it, expect, beforeEach } from '@jest/globals';
import fs from 'fs/promises';
import path from 'path';
import { OrderCache, OrderDetails } from '../../src/correlation/OrderCache';
import { makeTempDir } from '../helpers/FakeBroker';

const DETAILS: OrderDetails = { instrument: 'EURUSD', entryPrice: 1.1, stopLoss: 1.095, takeProfits: [1.105, 1.11] };

describe('OrderCache', () => {
  let filePath: string;
  let clock: Date;
  let cache: OrderCache;

  beforeEach(async () => {
    filePath = path.join(await makeTempDir('orders'), 'order_cache.json');
    clock = new Date('2024-05-01T12:00:00Z');
    cache = new OrderCache(filePath, 2, () => clock);
  });

  it('persists stored orders and reloads them', async () => {
    await cache.storeOrders('m1', ['o1', 'o2'], DETAILS);
    await cache.storeOrders('m1', ['o2', 'o3'], DETAILS);

    const reloaded = new OrderCache(filePath, 2, () => clock);
    await reloaded.load();
    expect(reloaded.getOrders('m1')).toEqual(['o1', 'o2', 'o3']);
    expect(reloaded.getEntry('m1')).toEqual({
      orders: ['o1', 'o2', 'o3'],
      take_profits: [1.105, 1.11],
      instrument: 'EURUSD',
      entry_price: 1.1,
      stop_loss: 1.095,
      timestamp: '2024-05-01T12:00:00.000Z',
    });
  });

  it('writes a backup before overwriting', async () => {
    await cache.storeOrders('m1', ['o1'], DETAILS);
    await cache.storeOrders('m2', ['o2'], DETAILS);

    const backup = JSON.parse(await fs.readFile(`${filePath}.bak`, 'utf8'));
    expect(Object.keys(backup)).toEqual(['m1']);
  });

  it('loads the backup when the cache file is corrupt', async () => {
    await cache.storeOrders('m1', ['o1'], DETAILS);
    await cache.storeOrders('m2', ['o2'], DETAILS);
    await fs.writeFile(filePath, '{');

    const reloaded = new OrderCache(filePath, 2, () => clock);
    await reloaded.load();
    expect(reloaded.size).toBe(1);
    expect(reloaded.getOrders('m1')).toEqual(['o1']);
  });

  it('drops a message once its last order is removed', async () => {
    await cache.storeOrders('m1', ['o1', 'o2'], DETAILS);

    expect(await cache.removeOrder('o1')).toBe('m1');
    expect(cache.getOrders('m1')).toEqual(['o2']);
    expect(await cache.removeOrder('o2')).toBe('m1');
    expect(cache.getEntry('m1')).toBeNull();
    expect(await cache.removeOrder('o9')).toBeNull();
  });

  it('removes several orders and whole messages', async () => {
    await cache.storeOrders('m1', ['o1', 'o2'], DETAILS);
    await cache.storeOrders('m2', ['o3'], DETAILS);

    expect(await cache.removeOrders(['o1', 'o3', 'o9'])).toBe(2);
    expect(await cache.removeMessage('m1')).toBe(true);
    expect(await cache.removeMessage('m1')).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('cleans up entries past the retention window', async () => {
    await cache.storeOrders('old', ['o1'], DETAILS);
    clock = new Date('2024-05-03T13:00:00Z');
    await cache.storeOrders('new', ['o2'], DETAILS);

    expect(await cache.cleanupOldEntries()).toBe(1);
    expect(cache.getEntry('old')).toBeNull();
    expect(cache.getOrders('new')).toEqual(['o2']);
  });

  describe('findOrdersByContent', () => {
    beforeEach(async () => {
      await cache.storeOrders('m1', ['o1'], DETAILS);
      await cache.storeOrders('m2', ['o2'], { ...DETAILS, instrument: 'GBPUSD', entryPrice: 1.25 });
    });

    it('scores instrument, entry, stop and take profits', () => {
      expect(
        cache.findOrdersByContent({ instrument: 'eur/usd', entryPrice: 1.1, stopLoss: 1.095, takeProfits: [1.105] })
      ).toEqual({ messageId: 'm1', orders: ['o1'], score: 85 });
    });

    it('requires more than the instrument and one TP', () => {
      expect(cache.findOrdersByContent({ instrument: 'EURUSD', takeProfits: [1.105] })).toBeNull();
      expect(cache.findOrdersByContent({ instrument: 'EURUSD', entryPrice: 1.1 })?.score).toBe(55);
    });

    it('ignores entries older than the age limit', () => {
      clock = new Date('2024-05-03T13:00:00Z');
      expect(cache.findOrdersByContent({ instrument: 'EURUSD', entryPrice: 1.1, stopLoss: 1.095 })).toBeNull();
    });
  });
});
