/**
 * Signal History / Correlation Store
 *
 * Recent signals per instrument with the broker order IDs they produced.
 * Matches follow-up messages (TP hits, management replies) back to a signal.
 *
 * Mutations are synchronous, so each one completes without interleaving on
 * the event loop; concurrent message tasks see either the old or new record.
 */

import { Signal } from '@signalbridge/shared-types';
import { Logger, hoursSince } from '@signalbridge/shared-utils';
import { normalize } from '../instruments/InstrumentNormalizer';
import { MatchStrategy, runStrategyChain } from '../utils/strategyChain';

const logger = new Logger('SignalHistoryStore');

export interface SignalHistoryOptions {
  perInstrumentCapacity: number;
  globalCapacity: number;
  maxSignalAgeHours: number;
  sameSourceOnly: boolean;
  tpPriceTolerance: number; // fraction of the TP price
}

export const DEFAULT_HISTORY_OPTIONS: SignalHistoryOptions = {
  perInstrumentCapacity: 10,
  globalCapacity: 50,
  maxSignalAgeHours: 48,
  sameSourceOnly: true,
  tpPriceTolerance: 0.001,
};

export interface MatchCriteria {
  instrument: string;
  tpLevel: number | null; // 1-based
  tpPrice: number | null;
  hint: string | null; // signal ID, entry price or free text
  channelId: string | null;
}

export type MatchMethod = 'tp_price' | 'hint_equality' | 'hint_substring' | 'registered_orders';

export interface SignalMatch {
  signal: Signal;
  signalId: string;
  orderIds: string[];
  method: MatchMethod;
}

interface MatchInput {
  candidates: Signal[]; // newest first
  criteria: MatchCriteria;
}

export class SignalHistoryStore {
  private byInstrument: Map<string, Signal[]> = new Map(); // oldest first
  private insertionOrder: string[] = []; // signal IDs, oldest first
  private options: SignalHistoryOptions;
  private strategies: ReadonlyArray<MatchStrategy<MatchInput, Signal>>;

  constructor(options: Partial<SignalHistoryOptions> = {}, private now: () => Date = () => new Date()) {
    this.options = { ...DEFAULT_HISTORY_OPTIONS, ...options };
    this.strategies = this.buildStrategies();
  }

  add(signal: Signal): string {
    if (this.get(signal.signalId)) {
      this.remove(signal.signalId);
    }
    const instrument = normalize(signal.instrument);
    const list = this.byInstrument.get(instrument) ?? [];
    list.push(signal);
    this.byInstrument.set(instrument, list);
    this.insertionOrder.push(signal.signalId);

    while (list.length > this.options.perInstrumentCapacity) {
      const evicted = list[0];
      this.remove(evicted.signalId);
      logger.debug(`[SignalHistoryStore] Evicted ${evicted.signalId} (${instrument} capacity)`);
    }
    while (this.insertionOrder.length > this.options.globalCapacity) {
      const evictedId = this.insertionOrder[0];
      this.remove(evictedId);
      logger.debug(`[SignalHistoryStore] Evicted ${evictedId} (global capacity)`);
    }

    logger.info(`[SignalHistoryStore] Recorded ${signal.signalId} (${instrument} ${signal.side})`);
    return signal.signalId;
  }

  registerOrders(instrument: string, signalId: string, orderIds: readonly string[]): boolean {
    const list = this.byInstrument.get(normalize(instrument));
    const index = list ? list.findIndex(signal => signal.signalId === signalId) : -1;
    if (!list || index === -1) {
      logger.warn(`[SignalHistoryStore] Cannot register orders: ${signalId} not in ${instrument} history`);
      return false;
    }
    const current = list[index];
    const relatedOrders = Array.from(new Set([...current.relatedOrders, ...orderIds]));
    list[index] = Object.freeze({ ...current, relatedOrders: Object.freeze(relatedOrders) });
    logger.info(`[SignalHistoryStore] ${signalId}: registered order(s) ${orderIds.join(', ')}`);
    return true;
  }

  /**
   * Drop order IDs from a signal after they were cancelled or filled
   */
  unregisterOrders(signalId: string, orderIds: readonly string[]): void {
    for (const list of this.byInstrument.values()) {
      const index = list.findIndex(signal => signal.signalId === signalId);
      if (index !== -1) {
        const current = list[index];
        const remaining = current.relatedOrders.filter(id => !orderIds.includes(id));
        list[index] = Object.freeze({ ...current, relatedOrders: Object.freeze(remaining) });
        return;
      }
    }
  }

  get(signalId: string): Signal | null {
    for (const list of this.byInstrument.values()) {
      const signal = list.find(candidate => candidate.signalId === signalId);
      if (signal) {
        return signal;
      }
    }
    return null;
  }

  /**
   * Newest signal recorded for a message. Only a signal from the same channel
   * matches when both sides know their channel.
   */
  findByMessage(messageId: string, channelId: string | null): Signal | null {
    return (
      this.all().find(
        signal =>
          signal.messageId === messageId &&
          (channelId === null || signal.channelId === null || signal.channelId === channelId)
      ) ?? null
    );
  }

  /**
   * Signals for an instrument, newest first
   */
  signalsFor(instrument: string): Signal[] {
    return [...(this.byInstrument.get(normalize(instrument)) ?? [])].reverse();
  }

  /**
   * All signals, newest first
   */
  all(): Signal[] {
    return this.insertionOrder
      .map(id => this.get(id))
      .filter((signal): signal is Signal => signal !== null)
      .reverse();
  }

  get size(): number {
    return this.insertionOrder.length;
  }

  clear(): void {
    this.byInstrument.clear();
    this.insertionOrder = [];
  }

  /**
   * True when `price` is within tolerance of `expected`
   */
  priceMatches(expected: number, price: number): boolean {
    return Math.abs(expected - price) <= Math.abs(expected) * this.options.tpPriceTolerance;
  }

  /**
   * Whether the signal satisfies the recency and same-source constraints
   */
  isEligible(signal: Signal, channelId: string | null): boolean {
    if (hoursSince(signal.timestamp, this.now()) > this.options.maxSignalAgeHours) {
      return false;
    }
    if (this.options.sameSourceOnly && channelId && signal.channelId && channelId !== signal.channelId) {
      return false;
    }
    return true;
  }

  findMatching(criteria: MatchCriteria): SignalMatch | null {
    const candidates = this.signalsFor(criteria.instrument).filter(signal =>
      this.isCandidate(signal, criteria)
    );
    if (candidates.length === 0) {
      logger.info(`[SignalHistoryStore] No eligible ${criteria.instrument} signals to match`);
      return null;
    }

    const match = runStrategyChain(this.strategies, { candidates, criteria });
    if (!match) {
      return null;
    }
    const signal = match.result;
    logger.info(`[SignalHistoryStore] Matched ${signal.signalId} by ${match.strategy}`);
    return {
      signal,
      signalId: signal.signalId,
      orderIds: [...signal.relatedOrders],
      method: this.toMethod(match.strategy),
    };
  }

  private isCandidate(signal: Signal, criteria: MatchCriteria): boolean {
    if (!this.isEligible(signal, criteria.channelId)) {
      return false;
    }
    if (criteria.tpLevel !== null && signal.takeProfits.length < criteria.tpLevel) {
      return false;
    }
    // A cited price that contradicts the signal's TP rules the signal out entirely
    if (criteria.tpPrice !== null && !this.tpPriceMatches(signal, criteria)) {
      return false;
    }
    return true;
  }

  private tpPriceMatches(signal: Signal, criteria: MatchCriteria): boolean {
    const price = criteria.tpPrice;
    if (price === null) {
      return false;
    }
    if (criteria.tpLevel !== null) {
      const expected = signal.takeProfits[criteria.tpLevel - 1];
      return expected !== undefined && this.priceMatches(expected, price);
    }
    return signal.takeProfits.some(tp => this.priceMatches(tp, price));
  }

  private buildStrategies(): ReadonlyArray<MatchStrategy<MatchInput, Signal>> {
    return [
      {
        name: 'tp_price',
        match: ({ candidates, criteria }) =>
          candidates.find(signal => this.tpPriceMatches(signal, criteria)) ?? null,
      },
      {
        name: 'hint_equality',
        match: ({ candidates, criteria }) => {
          const hint = criteria.hint?.trim();
          if (!hint) {
            return null;
          }
          const hintPrice = Number(hint);
          return (
            candidates.find(
              signal =>
                signal.signalId === hint ||
                signal.messageId === hint ||
                (Number.isFinite(hintPrice) && Math.abs(signal.entryPoint - hintPrice) < 1e-9)
            ) ?? null
          );
        },
      },
      {
        name: 'hint_substring',
        match: ({ candidates, criteria }) => {
          const hint = criteria.hint?.trim().toLowerCase();
          if (!hint) {
            return null;
          }
          return candidates.find(signal => signal.rawMessage.toLowerCase().includes(hint)) ?? null;
        },
      },
      {
        name: 'registered_orders',
        match: ({ candidates }) => candidates.find(signal => signal.relatedOrders.length > 0) ?? null,
      },
    ];
  }

  private toMethod(strategy: string): MatchMethod {
    switch (strategy) {
      case 'tp_price':
      case 'hint_equality':
      case 'hint_substring':
        return strategy;
      default:
        return 'registered_orders';
    }
  }

  private remove(signalId: string): void {
    for (const [instrument, list] of this.byInstrument) {
      const index = list.findIndex(signal => signal.signalId === signalId);
      if (index !== -1) {
        list.splice(index, 1);
        if (list.length === 0) {
          this.byInstrument.delete(instrument);
        }
        break;
      }
    }
    this.insertionOrder = this.insertionOrder.filter(id => id !== signalId);
  }
}
