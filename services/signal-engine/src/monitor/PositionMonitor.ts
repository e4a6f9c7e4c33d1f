/**
 * Position Monitor
 *
 * Polls open positions and manages their stops:
 *  a) once favorable movement reaches the threshold, stop-loss -> entry
 *  b) afterwards, a pullback of `trailingPullbackPips` from the best excursion
 *     locks in half of that excursion, kept `trailingPullbackPips` behind the current price
 * Tracking state lives in memory only; after a restart the breakeven trigger re-arms.
 * A newly seen position acknowledges its originating order as filled in the order cache.
 */

import { AccountRef, BrokerClient, OpenPosition, Quote } from '@signalbridge/shared-types';
import { PositionMonitorConfig } from '@signalbridge/shared-config';
import { Logger, errorMessage, roundTo } from '@signalbridge/shared-utils';
import { classifyInstrument, pipSize } from '../instruments/InstrumentClassifier';
import { InstrumentCatalog } from '../instruments/InstrumentCatalog';
import { RunnerRegistry } from '../execution/RunnerRegistry';
import { OrderCache } from '../correlation/OrderCache';
import { BrokerRateLimiter } from '../utils/BrokerRateLimiter';

const logger = new Logger('PositionMonitor');

const MAX_FAILURE_DELAY_SECONDS = 30;

export interface TrackedPosition {
  orderId: string | null;
  stopMoved: boolean;
  bestFavorablePips: number;
  lastTrailBest: number;
  lastUpdateAt: number | null;
}

export type StopDecision =
  | { action: 'none' }
  | { action: 'breakeven' | 'trail'; stopLoss: number; favorablePips: number };

export interface PositionMonitorDeps {
  broker: BrokerClient;
  catalog: InstrumentCatalog;
  runners: RunnerRegistry;
  rateLimiter: BrokerRateLimiter;
  orderCache: OrderCache;
}

export class PositionMonitor {
  private tracking: Map<string, TrackedPosition> = new Map();
  private timer: NodeJS.Timeout | null = null;
  private currentCycle: Promise<void> | null = null;
  private isRunning: boolean = false;
  private consecutiveFailures: number = 0;

  constructor(
    private deps: PositionMonitorDeps,
    private accounts: () => AccountRef[],
    private config: PositionMonitorConfig,
    private now: () => number = Date.now
  ) {}

  start(): void {
    if (this.isRunning) {
      logger.warn('[PositionMonitor] Already running');
      return;
    }
    this.isRunning = true;
    logger.info(
      `[PositionMonitor] Started (active ${this.config.activeIntervalSeconds}s, idle ${this.config.idleIntervalSeconds}s)`
    );
    this.schedule(0);
  }

  /**
   * Stop polling and wait for the cycle in progress
   */
  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.currentCycle) {
      await this.currentCycle;
    }
    logger.info('[PositionMonitor] Stopped');
  }

  getTracking(positionId: string): TrackedPosition | null {
    const tracked = this.tracking.get(positionId);
    return tracked ? { ...tracked } : null;
  }

  /**
   * One pass over every account. Returns the number of open positions seen.
   */
  async runCycle(): Promise<number> {
    let total = 0;
    const seen = new Set<string>();
    for (const account of this.accounts()) {
      const positions = await this.deps.broker.getPositions(account);
      total += positions.length;
      positions.forEach(position => seen.add(position.id));
      for (const position of positions) {
        try {
          if (!this.tracking.has(position.id)) {
            await this.acknowledgeFill(position);
          }
          await this.evaluate(account, position);
        } catch (error) {
          logger.warn(`[PositionMonitor] ${position.id} (${position.instrument}): ${errorMessage(error)}`);
        }
      }
    }
    this.prune(seen);
    return total;
  }

  /**
   * Stop rule for one position given its quote. Mutates the tracking entry
   * for excursion bookkeeping only.
   */
  decide(position: OpenPosition, quote: Quote, tracked: TrackedPosition, isRunner: boolean): StopDecision {
    const pip = pipSize(position.instrument);
    const current = position.side === 'buy' ? quote.bid : quote.ask;
    const direction = position.side === 'buy' ? 1 : -1;
    const favorablePips = ((current - position.entryPrice) * direction) / pip;

    if (!tracked.stopMoved) {
      if (favorablePips < this.thresholdFor(position, isRunner)) {
        return { action: 'none' };
      }
      tracked.bestFavorablePips = Math.max(tracked.bestFavorablePips, favorablePips);
      return { action: 'breakeven', stopLoss: roundTo(position.entryPrice, 5), favorablePips };
    }

    tracked.bestFavorablePips = Math.max(tracked.bestFavorablePips, favorablePips);
    const pullback = tracked.bestFavorablePips - favorablePips;
    if (pullback < this.config.trailingPullbackPips || tracked.bestFavorablePips <= tracked.lastTrailBest) {
      return { action: 'none' };
    }

    const halfBest = tracked.bestFavorablePips / 2;
    const lockedPips = Math.min(halfBest, favorablePips - this.config.trailingPullbackPips);
    const stopLoss = roundTo(position.entryPrice + direction * lockedPips * pip, 5);
    const improves =
      position.stopLoss === null || (direction === 1 ? stopLoss > position.stopLoss : stopLoss < position.stopLoss);
    if (!improves) {
      // A stop capped by the current price may still trail this excursion after a recovery
      if (lockedPips === halfBest) {
        tracked.lastTrailBest = tracked.bestFavorablePips;
      }
      return { action: 'none' };
    }
    return { action: 'trail', stopLoss, favorablePips };
  }

  thresholdFor(position: Pick<OpenPosition, 'instrument'>, isRunner: boolean): number {
    if (!isRunner) {
      return this.config.breakevenThresholdPips;
    }
    switch (classifyInstrument(position.instrument)) {
      case 'US30':
      case 'NASDAQ':
        return this.config.runnerIndexThresholdPips;
      case 'GOLD':
        return this.config.runnerGoldThresholdPips;
      default:
        return this.config.breakevenThresholdPips;
    }
  }

  private async evaluate(account: AccountRef, position: OpenPosition): Promise<void> {
    const tracked = this.track(position);
    const instrument = await this.deps.catalog.findByName(account, position.instrument);
    if (!instrument) {
      logger.debug(`[PositionMonitor] ${position.instrument} not in instrument list, skipping ${position.id}`);
      return;
    }
    const quote = await this.deps.broker.getQuote(account, instrument);
    const isRunner = this.deps.runners.isRunner(position);
    const decision = this.decide(position, quote, tracked, isRunner);
    if (decision.action === 'none') {
      return;
    }
    if (tracked.lastUpdateAt !== null && this.now() - tracked.lastUpdateAt < this.config.cooldownSeconds * 1000) {
      logger.debug(`[PositionMonitor] ${position.id}: ${decision.action} deferred, stop updated less than ${this.config.cooldownSeconds}s ago`);
      return;
    }

    const result = await this.deps.rateLimiter.schedule('position', () =>
      this.deps.broker.modifyPositionStopLoss(account, position.id, decision.stopLoss)
    );
    tracked.lastUpdateAt = this.now();
    if (!result.ok) {
      logger.warn(`[PositionMonitor] ${position.id}: stop update failed: ${result.error}`);
      return;
    }

    if (decision.action === 'breakeven') {
      tracked.stopMoved = true;
    } else {
      tracked.lastTrailBest = tracked.bestFavorablePips;
    }
    logger.info(
      `[PositionMonitor] ${position.id} ${position.instrument}${isRunner ? ' (runner)' : ''}: ${decision.action} ` +
        `stop -> ${decision.stopLoss} at +${decision.favorablePips.toFixed(1)} pips`
    );
  }

  private async acknowledgeFill(position: OpenPosition): Promise<void> {
    if (position.orderId === null) {
      return;
    }
    const messageId = await this.deps.orderCache.removeOrder(position.orderId);
    if (messageId !== null) {
      logger.info(`[PositionMonitor] Order ${position.orderId} filled as ${position.id}; removed from cache entry ${messageId}`);
    }
  }

  private track(position: OpenPosition): TrackedPosition {
    let tracked = this.tracking.get(position.id);
    if (!tracked) {
      const alreadyProtected =
        position.stopLoss !== null &&
        (position.side === 'buy' ? position.stopLoss >= position.entryPrice : position.stopLoss <= position.entryPrice);
      tracked = {
        orderId: position.orderId,
        stopMoved: alreadyProtected,
        bestFavorablePips: 0,
        lastTrailBest: 0,
        lastUpdateAt: null,
      };
      this.tracking.set(position.id, tracked);
    }
    return tracked;
  }

  private prune(open: Set<string>): void {
    for (const [id, tracked] of this.tracking) {
      if (!open.has(id)) {
        this.tracking.delete(id);
        this.deps.runners.forget(id);
        if (tracked.orderId !== null) {
          this.deps.runners.forget(tracked.orderId);
        }
        logger.debug(`[PositionMonitor] Stopped tracking closed position ${id}`);
      }
    }
  }

  private schedule(delayMs: number): void {
    if (!this.isRunning) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      const cycle = this.tick();
      this.currentCycle = cycle;
      cycle.finally(() => {
        if (this.currentCycle === cycle) {
          this.currentCycle = null;
        }
      }).catch(error => logger.error(`[PositionMonitor] Cycle bookkeeping failed: ${errorMessage(error)}`));
    }, delayMs);
  }

  private async tick(): Promise<void> {
    let delayMs: number;
    try {
      const positions = await this.runCycle();
      this.consecutiveFailures = 0;
      delayMs = (positions > 0 ? this.config.activeIntervalSeconds : this.config.idleIntervalSeconds) * 1000;
    } catch (error) {
      this.consecutiveFailures += 1;
      if (this.consecutiveFailures >= this.config.maxConsecutiveFailures) {
        logger.error(
          `[PositionMonitor] ${this.consecutiveFailures} consecutive failures, backing off ${this.config.failureBackoffSeconds}s: ${errorMessage(error)}`
        );
        this.consecutiveFailures = 0;
        delayMs = this.config.failureBackoffSeconds * 1000;
      } else {
        delayMs = Math.min(MAX_FAILURE_DELAY_SECONDS, Math.pow(2, this.consecutiveFailures)) * 1000;
        logger.warn(`[PositionMonitor] Cycle failed (${this.consecutiveFailures}), retrying in ${delayMs / 1000}s: ${errorMessage(error)}`);
      }
    }
    this.schedule(delayMs);
  }
}
