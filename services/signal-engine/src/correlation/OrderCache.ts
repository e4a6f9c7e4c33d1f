/**
 * Order Cache
 *
 * message_id -> orders placed for it, persisted to order_cache.json. Used to
 * correlate replies by message ID, and by content when the ID is unknown.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger, errorMessage, hoursSince } from '@signalbridge/shared-utils';
import { normalize } from '../instruments/InstrumentNormalizer';
import { SerialLock } from '../utils/SerialLock';

const logger = new Logger('OrderCache');

export interface OrderCacheEntry {
  orders: string[];
  take_profits: number[];
  instrument: string;
  entry_price: number;
  stop_loss: number;
  timestamp: string; // ISO 8601
}

export interface OrderDetails {
  instrument: string;
  entryPrice: number;
  stopLoss: number;
  takeProfits: readonly number[];
}

export interface ContentQuery {
  instrument: string;
  entryPrice?: number | null;
  stopLoss?: number | null;
  takeProfits?: readonly number[];
}

export interface ContentMatch {
  messageId: string;
  orders: string[];
  score: number;
}

// Content score weights (max 100)
const SCORE_INSTRUMENT = 30;
const SCORE_ENTRY = 25;
const SCORE_STOP = 20;
const SCORE_PER_TP = 10;
const SCORE_TP_CAP = 25;
const MIN_CONTENT_SCORE = 50;
const PRICE_TOLERANCE = 0.001;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeEntry(value: unknown): OrderCacheEntry | null {
  if (!isRecord(value) || !Array.isArray(value.orders) || typeof value.instrument !== 'string') {
    return null;
  }
  const orders = value.orders.filter((id): id is string => typeof id === 'string');
  const takeProfits = Array.isArray(value.take_profits)
    ? value.take_profits.filter((tp): tp is number => typeof tp === 'number')
    : [];
  if (typeof value.entry_price !== 'number' || typeof value.stop_loss !== 'number') {
    return null;
  }
  const timestamp = typeof value.timestamp === 'string' ? value.timestamp : new Date(0).toISOString();
  return {
    orders,
    take_profits: takeProfits,
    instrument: value.instrument,
    entry_price: value.entry_price,
    stop_loss: value.stop_loss,
    timestamp,
  };
}

function near(expected: number, actual: number): boolean {
  return Math.abs(expected - actual) <= Math.abs(expected) * PRICE_TOLERANCE;
}

export class OrderCache {
  private entries: Map<string, OrderCacheEntry> = new Map();
  private writeLock = new SerialLock();
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(
    private filePath: string,
    private retentionDays: number = 2,
    private now: () => Date = () => new Date()
  ) {}

  async load(): Promise<void> {
    for (const candidate of [this.filePath, `${this.filePath}.bak`]) {
      let raw: unknown;
      try {
        raw = JSON.parse(await fs.readFile(candidate, 'utf8'));
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
          logger.error(`[OrderCache] Unreadable cache at ${candidate}`, error);
        }
        continue;
      }
      this.entries = new Map();
      if (isRecord(raw)) {
        for (const [messageId, value] of Object.entries(raw)) {
          const entry = decodeEntry(value);
          if (entry) {
            this.entries.set(messageId, entry);
          }
        }
      }
      logger.info(`[OrderCache] Loaded ${this.entries.size} cached message(s) from ${candidate}`);
      return;
    }
    logger.info('[OrderCache] No order cache on disk, starting empty');
  }

  /**
   * Periodically drop entries older than the retention window
   */
  startCleanup(intervalMs: number = 60 * 60 * 1000): void {
    if (this.cleanupTimer) {
      return;
    }
    this.cleanupTimer = setInterval(() => {
      this.cleanupOldEntries().catch(error =>
        logger.error(`[OrderCache] Cleanup failed: ${errorMessage(error)}`)
      );
    }, intervalMs);
    this.cleanupTimer.unref();
  }

  /**
   * Stop the cleanup timer and wait for pending writes
   */
  async close(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    await this.writeLock.drain();
  }

  async storeOrders(messageId: string, orderIds: readonly string[], details: OrderDetails): Promise<void> {
    const existing = this.entries.get(messageId);
    this.entries.set(messageId, {
      orders: Array.from(new Set([...(existing?.orders ?? []), ...orderIds])),
      take_profits: [...details.takeProfits],
      instrument: normalize(details.instrument),
      entry_price: details.entryPrice,
      stop_loss: details.stopLoss,
      timestamp: this.now().toISOString(),
    });
    logger.info(`[OrderCache] ${messageId}: stored ${orderIds.length} order(s)`);
    await this.persist();
  }

  getOrders(messageId: string): string[] {
    return [...(this.entries.get(messageId)?.orders ?? [])];
  }

  getEntry(messageId: string): OrderCacheEntry | null {
    const entry = this.entries.get(messageId);
    return entry ? { ...entry, orders: [...entry.orders], take_profits: [...entry.take_profits] } : null;
  }

  /**
   * Remove one order ID wherever it is cached. Returns the message it belonged to.
   */
  async removeOrder(orderId: string): Promise<string | null> {
    const messageId = this.detachOrder(orderId);
    if (messageId !== null) {
      await this.persist();
    }
    return messageId;
  }

  async removeOrders(orderIds: readonly string[]): Promise<number> {
    const removed = orderIds.filter(orderId => this.detachOrder(orderId) !== null).length;
    if (removed > 0) {
      await this.persist();
    }
    return removed;
  }

  async removeMessage(messageId: string): Promise<boolean> {
    if (!this.entries.delete(messageId)) {
      return false;
    }
    await this.persist();
    return true;
  }

  async cleanupOldEntries(days: number = this.retentionDays): Promise<number> {
    const now = this.now();
    let removed = 0;
    for (const [messageId, entry] of this.entries) {
      if (hoursSince(new Date(entry.timestamp), now) > days * 24) {
        this.entries.delete(messageId);
        removed += 1;
      }
    }
    if (removed > 0) {
      logger.info(`[OrderCache] Removed ${removed} entr${removed === 1 ? 'y' : 'ies'} older than ${days} day(s)`);
      await this.persist();
    }
    return removed;
  }

  /**
   * Best cached message for the described trade, scored on instrument,
   * entry, stop and take profits
   */
  findOrdersByContent(query: ContentQuery, maxAgeHours: number = 48): ContentMatch | null {
    const instrument = normalize(query.instrument);
    const now = this.now();
    let best: ContentMatch | null = null;

    for (const [messageId, entry] of this.entries) {
      if (entry.orders.length === 0 || entry.instrument !== instrument) {
        continue;
      }
      if (hoursSince(new Date(entry.timestamp), now) > maxAgeHours) {
        continue;
      }
      let score = SCORE_INSTRUMENT;
      if (query.entryPrice != null && near(entry.entry_price, query.entryPrice)) {
        score += SCORE_ENTRY;
      }
      if (query.stopLoss != null && near(entry.stop_loss, query.stopLoss)) {
        score += SCORE_STOP;
      }
      const tpHits = (query.takeProfits ?? []).filter(tp =>
        entry.take_profits.some(cached => near(cached, tp))
      ).length;
      score += Math.min(SCORE_TP_CAP, tpHits * SCORE_PER_TP);

      if (score >= MIN_CONTENT_SCORE && (best === null || score > best.score)) {
        best = { messageId, orders: [...entry.orders], score };
      }
    }

    if (best) {
      logger.info(`[OrderCache] Content match ${best.messageId} (score ${best.score})`);
    }
    return best;
  }

  get size(): number {
    return this.entries.size;
  }

  private detachOrder(orderId: string): string | null {
    for (const [messageId, entry] of this.entries) {
      if (entry.orders.includes(orderId)) {
        const remaining = entry.orders.filter(id => id !== orderId);
        if (remaining.length === 0) {
          this.entries.delete(messageId);
        } else {
          this.entries.set(messageId, { ...entry, orders: remaining });
        }
        return messageId;
      }
    }
    return null;
  }

  private async persist(): Promise<void> {
    const snapshot = JSON.stringify(Object.fromEntries(this.entries), null, 2);
    try {
      await this.writeLock.run(async () => {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        try {
          await fs.copyFile(this.filePath, `${this.filePath}.bak`);
        } catch (error) {
          if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
            throw error;
          }
        }
        await fs.writeFile(this.filePath, snapshot, 'utf8');
      });
    } catch (error) {
      logger.error(`[OrderCache] Failed to persist ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}
