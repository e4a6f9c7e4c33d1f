/**
 * Order Orchestrator
 *
 * Signal + sizing -> broker orders. One order per take profit, or for index
 * CFDs two target legs plus a runner. Legs are dispatched in parallel and
 * failures are reported per leg. Stale signals and drawdown breaches are
 * rejected before the broker is touched.
 */

import {
  AccountRef,
  BrokerClient,
  BrokerInstrument,
  CreateOrderRequest,
  OrderKind,
  Quote,
  Signal,
} from '@signalbridge/shared-types';
import { Logger, errorMessage, roundTo } from '@signalbridge/shared-utils';
import { pipSize } from '../instruments/InstrumentClassifier';
import { DrawdownGuard } from '../risk/DrawdownGuard';
import { SizingResult } from '../risk/PositionSizer';
import { SignalHistoryStore } from '../correlation/SignalHistoryStore';
import { OrderCache } from '../correlation/OrderCache';
import { RunnerRegistry } from './RunnerRegistry';
import { OrderTypeDecision, selectOrderType } from './orderTypeSelection';

const logger = new Logger('OrderOrchestrator');

const MARGIN_ERROR = /(?:not\s+enough|insufficient)\s+(?:free\s+)?margin/i;
const PRICE_DECIMALS = 5;

export interface OrderLeg {
  takeProfit: number;
  quantity: number;
  isRunner: boolean;
}

export interface PlacedLeg extends OrderLeg {
  orderId: string;
}

export interface FailedLeg extends OrderLeg {
  error: string;
}

export type PlacementStatus = 'placed' | 'partial' | 'failed' | 'rejected';

export interface PlacementResult {
  status: PlacementStatus;
  signalId: string;
  orderKind: OrderKind | null;
  successful: PlacedLeg[];
  failed: FailedLeg[];
  reason?: string;
}

export interface OrderOrchestratorOptions {
  marketThresholdPips: number;
  marginRetryAttempts: number;
  runnerDistancePoints: number; // in pips/points of the instrument
  maxSignalAgeSeconds: number; // 0 disables
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrderOrchestratorOptions = {
  marketThresholdPips: 10,
  marginRetryAttempts: 3,
  runnerDistancePoints: 500,
  maxSignalAgeSeconds: 180,
};

export interface OrderOrchestratorDeps {
  broker: BrokerClient;
  drawdown: DrawdownGuard;
  history: SignalHistoryStore;
  orderCache: OrderCache;
  runners: RunnerRegistry;
}

export class OrderOrchestrator {
  private options: OrderOrchestratorOptions;

  constructor(
    private deps: OrderOrchestratorDeps,
    options: Partial<OrderOrchestratorOptions> = {},
    private now: () => Date = () => new Date()
  ) {
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...options };
  }

  /**
   * Seconds since the signal was posted
   */
  signalAgeSeconds(signal: Signal): number {
    return Math.max(0, Math.floor((this.now().getTime() - signal.timestamp.getTime()) / 1000));
  }

  /**
   * Legs for a signal. Index CFDs always get three: the two take profits
   * closest to entry and a runner placed `runnerDistancePoints` away.
   */
  buildLegs(signal: Signal, sizing: SizingResult): OrderLeg[] {
    const sizes = sizing.positionSizes;
    const sizeAt = (index: number): number => sizes[index] ?? sizes[0] ?? 0.01;

    if (!sizing.cfdLayout) {
      return signal.takeProfits.map((takeProfit, index) => ({
        takeProfit,
        quantity: sizeAt(index),
        isRunner: false,
      }));
    }

    const closestFirst = [...signal.takeProfits].sort((a, b) => (signal.side === 'buy' ? a - b : b - a));
    const targets = closestFirst.length >= 2 ? closestFirst.slice(0, 2) : [closestFirst[0], closestFirst[0]];
    const runnerDistance = this.options.runnerDistancePoints * pipSize(signal.instrument);
    const runnerTakeProfit = roundTo(
      signal.side === 'buy' ? signal.entryPoint + runnerDistance : signal.entryPoint - runnerDistance,
      PRICE_DECIMALS
    );

    return [
      { takeProfit: targets[0], quantity: sizeAt(0), isRunner: false },
      { takeProfit: targets[1], quantity: sizeAt(1), isRunner: false },
      { takeProfit: runnerTakeProfit, quantity: sizeAt(2), isRunner: true },
    ];
  }

  async place(
    signal: Signal,
    sizing: SizingResult,
    account: AccountRef,
    instrument: BrokerInstrument,
    balance: number
  ): Promise<PlacementResult> {
    const maxAge = this.options.maxSignalAgeSeconds;
    const age = this.signalAgeSeconds(signal);
    if (maxAge > 0 && age > maxAge) {
      const reason = `signal too old: ${age}s > ${maxAge}s`;
      logger.warn(`[OrderOrchestrator] Rejected ${signal.signalId} (${signal.instrument}): ${reason}`);
      return { status: 'rejected', signalId: signal.signalId, orderKind: null, successful: [], failed: [], reason };
    }

    const drawdown = this.deps.drawdown.check(account.id, balance, sizing.totalRiskAmount);
    if (drawdown.exceeded) {
      const reason =
        `drawdown limit: ${balance} - ${sizing.totalRiskAmount} = ${drawdown.balanceAfterRisk} ` +
        `is below ${drawdown.maxDrawdownBalance}`;
      logger.warn(`[OrderOrchestrator] Rejected ${signal.signalId} (${signal.instrument}): ${reason}`);
      return { status: 'rejected', signalId: signal.signalId, orderKind: null, successful: [], failed: [], reason };
    }

    const quote = await this.fetchQuote(account, instrument);
    const decision = selectOrderType(signal, quote, this.options.marketThresholdPips);
    logger.info(
      `[OrderOrchestrator] ${signal.signalId}: ${decision.kind.toUpperCase()} ${signal.side} ${instrument.name} ` +
        `(${decision.reason}) sl=${decision.stopLoss}`
    );

    let legs = this.buildLegs(signal, sizing);
    let outcome = await this.dispatch(account, instrument, signal, decision, legs);

    for (let attempt = 1; attempt <= this.options.marginRetryAttempts; attempt++) {
      if (outcome.successful.length > 0 || !outcome.failed.every(leg => MARGIN_ERROR.test(leg.error))) {
        break;
      }
      const halved = legs.map(leg => ({ ...leg, quantity: Math.max(0.01, roundTo(leg.quantity / 2, 2)) }));
      if (halved.every((leg, index) => leg.quantity === legs[index].quantity)) {
        break;
      }
      logger.warn(`[OrderOrchestrator] ${signal.signalId}: insufficient margin, retrying at half size (attempt ${attempt})`);
      legs = halved;
      outcome = await this.dispatch(account, instrument, signal, decision, legs);
    }

    if (outcome.successful.length > 0) {
      await this.register(signal, outcome.successful);
    }

    const status: PlacementStatus =
      outcome.failed.length === 0 ? 'placed' : outcome.successful.length > 0 ? 'partial' : 'failed';
    logger.info(
      `[OrderOrchestrator] ${signal.signalId}: ${outcome.successful.length} placed, ${outcome.failed.length} failed` +
        (outcome.successful.length > 0 ? ` [${outcome.successful.map(leg => leg.orderId).join(', ')}]` : '')
    );
    for (const leg of outcome.failed) {
      logger.warn(`[OrderOrchestrator] ${signal.signalId}: leg TP ${leg.takeProfit} failed: ${leg.error}`);
    }

    return {
      status,
      signalId: signal.signalId,
      orderKind: decision.kind,
      successful: outcome.successful,
      failed: outcome.failed,
    };
  }

  private async fetchQuote(account: AccountRef, instrument: BrokerInstrument): Promise<Quote | null> {
    try {
      return await this.deps.broker.getQuote(account, instrument);
    } catch (error) {
      logger.warn(`[OrderOrchestrator] No quote for ${instrument.name}, using limit order: ${errorMessage(error)}`);
      return null;
    }
  }

  private async dispatch(
    account: AccountRef,
    instrument: BrokerInstrument,
    signal: Signal,
    decision: OrderTypeDecision,
    legs: OrderLeg[]
  ): Promise<{ successful: PlacedLeg[]; failed: FailedLeg[] }> {
    const results = await Promise.allSettled(
      legs.map(leg => {
        const request: CreateOrderRequest = {
          instrument,
          side: signal.side,
          quantity: leg.quantity,
          kind: decision.kind,
          price: decision.price,
          stopLoss: decision.stopLoss,
          takeProfit: leg.takeProfit,
        };
        return this.deps.broker.createOrder(account, request);
      })
    );

    const successful: PlacedLeg[] = [];
    const failed: FailedLeg[] = [];
    results.forEach((result, index) => {
      const leg = legs[index];
      if (result.status === 'rejected') {
        failed.push({ ...leg, error: errorMessage(result.reason) });
      } else if (result.value.ok) {
        successful.push({ ...leg, orderId: result.value.orderId });
      } else {
        failed.push({ ...leg, error: result.value.error });
      }
    });
    return { successful, failed };
  }

  private async register(signal: Signal, placed: PlacedLeg[]): Promise<void> {
    const orderIds = placed.map(leg => leg.orderId);
    for (const leg of placed) {
      if (leg.isRunner) {
        this.deps.runners.mark(leg.orderId);
      }
    }
    this.deps.history.registerOrders(signal.instrument, signal.signalId, orderIds);
    await this.deps.orderCache.storeOrders(signal.signalId, orderIds, {
      instrument: signal.instrument,
      entryPrice: signal.entryPoint,
      stopLoss: signal.stopLoss,
      takeProfits: signal.takeProfits,
    });
  }
}
