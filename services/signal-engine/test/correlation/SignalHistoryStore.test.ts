import { describe, it, expect, beforeEach } from '@jest/globals';
import { MatchCriteria, SignalHistoryStore } from '../../src/correlation/SignalHistoryStore';
import { NOW, hoursAgo, makeSignal } from '../helpers/signals';

function criteria(overrides: Partial<MatchCriteria> = {}): MatchCriteria {
  return { instrument: 'EURUSD', tpLevel: null, tpPrice: null, hint: null, channelId: 'chan-1', ...overrides };
}

describe('SignalHistoryStore', () => {
  let history: SignalHistoryStore;

  beforeEach(() => {
    history = new SignalHistoryStore({}, () => NOW);
  });

  describe('findMatching', () => {
    it('prefers the signal whose TP matches the cited price', () => {
      history.add(makeSignal('older', { takeProfits: [1.105, 1.11], timestamp: hoursAgo(3) }));
      history.registerOrders('EURUSD', 'older', ['o1', 'o2']);
      history.add(makeSignal('newer', { takeProfits: [1.102, 1.107], timestamp: hoursAgo(2) }));

      const match = history.findMatching(criteria({ tpLevel: 2, tpPrice: 1.107 }));
      expect(match?.signalId).toBe('newer');
      expect(match?.method).toBe('tp_price');
      expect(match?.orderIds).toEqual([]);
    });

    it('never matches a signal whose TP contradicts the cited price', () => {
      history.add(makeSignal('s1', { takeProfits: [1.1, 1.105] }));
      history.registerOrders('EURUSD', 's1', ['o1']);

      expect(history.findMatching(criteria({ tpLevel: 2, tpPrice: 1.107 }))).toBeNull();
    });

    it('matches a hint against the signal id or entry price', () => {
      history.add(makeSignal('s1', { entryPoint: 1.1 }));
      history.add(makeSignal('s2', { entryPoint: 1.12 }));

      expect(history.findMatching(criteria({ hint: 's1' }))?.signalId).toBe('s1');
      expect(history.findMatching(criteria({ hint: '1.1200' }))).toMatchObject({ signalId: 's2', method: 'hint_equality' });
    });

    it('falls back to raw message containment', () => {
      history.add(makeSignal('s1', { rawMessage: 'BUY EURUSD swing setup 1.1000' }));
      history.add(makeSignal('s2'));

      expect(history.findMatching(criteria({ hint: 'Swing Setup' }))).toMatchObject({
        signalId: 's1',
        method: 'hint_substring',
      });
    });

    it('uses the newest signal with registered orders as a last resort', () => {
      history.add(makeSignal('s1', { timestamp: hoursAgo(5) }));
      history.registerOrders('EURUSD', 's1', ['o1']);
      history.add(makeSignal('s2', { timestamp: hoursAgo(4) }));
      history.registerOrders('EURUSD', 's2', ['o2', 'o3']);
      history.add(makeSignal('s3', { timestamp: hoursAgo(3) }));

      expect(history.findMatching(criteria({ tpLevel: 1 }))).toEqual({
        signal: history.get('s2'),
        signalId: 's2',
        orderIds: ['o2', 'o3'],
        method: 'registered_orders',
      });
    });

    it('returns null when nothing has orders or matches', () => {
      history.add(makeSignal('s1'));
      expect(history.findMatching(criteria({ tpLevel: 1 }))).toBeNull();
    });

    it('filters out stale and foreign-source signals', () => {
      history.add(makeSignal('stale', { timestamp: hoursAgo(49) }));
      history.registerOrders('EURUSD', 'stale', ['o1']);
      history.add(makeSignal('foreign', { channelId: 'chan-2' }));
      history.registerOrders('EURUSD', 'foreign', ['o2']);

      expect(history.findMatching(criteria({ tpLevel: 1 }))).toBeNull();

      const relaxed = new SignalHistoryStore({ sameSourceOnly: false }, () => NOW);
      relaxed.add(makeSignal('foreign', { channelId: 'chan-2', relatedOrders: ['o2'] }));
      expect(relaxed.findMatching(criteria({ tpLevel: 1 }))?.signalId).toBe('foreign');
    });

    it('skips signals with fewer TPs than the level hit', () => {
      history.add(makeSignal('two-tps', { relatedOrders: ['o1'] }));
      expect(history.findMatching(criteria({ tpLevel: 3 }))).toBeNull();
    });
  });

  it('evicts the oldest signal per instrument and globally', () => {
    const small = new SignalHistoryStore({ perInstrumentCapacity: 2, globalCapacity: 3 }, () => NOW);
    small.add(makeSignal('e1'));
    small.add(makeSignal('e2'));
    small.add(makeSignal('e3'));
    expect(small.get('e1')).toBeNull();

    small.add(makeSignal('g1', { instrument: 'GBPUSD' }));
    small.add(makeSignal('g2', { instrument: 'GBPUSD' }));
    expect(small.size).toBe(3);
    expect(small.all().map(signal => signal.signalId)).toEqual(['g2', 'g1', 'e3']);
  });

  it('keeps at most ten signals per instrument by default', () => {
    for (let i = 1; i <= 11; i++) {
      history.add(makeSignal(`s${i}`));
    }
    expect(history.signalsFor('EURUSD')).toHaveLength(10);
    expect(history.get('s1')).toBeNull();
    expect(history.signalsFor('eur/usd')[0].signalId).toBe('s11');
  });

  it('registers and unregisters orders without mutating earlier records', () => {
    const recorded = makeSignal('s1');
    history.add(recorded);

    expect(history.registerOrders('EURUSD', 's1', ['o1', 'o2'])).toBe(true);
    expect(history.registerOrders('EURUSD', 's1', ['o2', 'o3'])).toBe(true);
    expect(history.registerOrders('GBPUSD', 's1', ['o4'])).toBe(false);
    expect(history.get('s1')?.relatedOrders).toEqual(['o1', 'o2', 'o3']);
    expect(recorded.relatedOrders).toEqual([]);

    history.unregisterOrders('s1', ['o1', 'o3']);
    expect(history.get('s1')?.relatedOrders).toEqual(['o2']);
  });

  it('replaces a signal added twice', () => {
    history.add(makeSignal('s1', { entryPoint: 1.1 }));
    history.add(makeSignal('s1', { entryPoint: 1.2 }));
    expect(history.size).toBe(1);
    expect(history.get('s1')?.entryPoint).toBe(1.2);
  });
});
