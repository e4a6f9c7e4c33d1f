/**
 * Signal Management Handler
 *
 * Applies "move SL to breakeven" / "close" / "close 50%" instructions to the
 * positions and pending orders they refer to. Targets are resolved through an
 * ordered strategy chain; an unresolved instruction is reported, never guessed.
 * Broker writes run one at a time through the rate limiter, positions first,
 * then orders.
 */

import {
  AccountRef,
  BrokerClient,
  BrokerWriteResult,
  InboundMessage,
  OpenPosition,
  PendingOrder,
} from '@signalbridge/shared-types';
import { Logger, errorMessage, roundTo } from '@signalbridge/shared-utils';
import { SignalHistoryStore } from '../correlation/SignalHistoryStore';
import { OrderCache } from '../correlation/OrderCache';
import { RiskProfileStore } from '../risk/RiskProfileStore';
import { ManagementSettings } from '../risk/riskProfiles';
import { normalize } from '../instruments/InstrumentNormalizer';
import { pipSize } from '../instruments/InstrumentClassifier';
import { BrokerOperationClass, BrokerRateLimiter } from '../utils/BrokerRateLimiter';
import { MatchStrategy, runStrategyChain } from '../utils/strategyChain';
import { ManagementInstruction, detectManagementInstruction } from './rules/managementRules';
import { TradingParameters, extractTradingParameters, scorePosition, scoreSignal } from './contentMatching';
import { pendingOrdersFor, positionsFor } from './pendingOrders';
import { CorrelatedSignal, findCachedTrade, resolveReplyTarget } from './replyTarget';

const logger = new Logger('SignalManagementHandler');

export type ManagementStatus =
  | 'applied'
  | 'partial'
  | 'failed'
  | 'unresolved'
  | 'no_targets'
  | 'disabled'
  | 'declined'
  | 'awaiting_confirmation';

export interface ManagementFailure {
  id: string;
  error: string;
}

export interface ManagementOutcome {
  status: ManagementStatus;
  intent: ManagementInstruction['intent'];
  instrument: string | null;
  resolution: string | null;
  signalId: string | null;
  positionsUpdated: string[];
  ordersCancelled: string[];
  failures: ManagementFailure[];
}

export interface ManagementLogEntry {
  timestamp: string;
  messageId: string;
  text: string;
  intent: ManagementInstruction['intent'];
  status: ManagementStatus;
  instrument: string | null;
}

/**
 * Interactive confirmation for profiles that require it
 */
export interface ConfirmationPrompt {
  confirm(question: string): Promise<boolean>;
}

export interface SignalManagementDeps {
  broker: BrokerClient;
  history: SignalHistoryStore;
  orderCache: OrderCache;
  riskProfiles: RiskProfileStore;
  rateLimiter: BrokerRateLimiter;
  confirmation?: ConfirmationPrompt;
}

export interface SignalManagementOptions {
  breakevenBufferPips: number;
  minContentMatchScore: number;
  contentMatchMaxAgeHours: number;
  logCapacity: number;
}

export const DEFAULT_MANAGEMENT_OPTIONS: SignalManagementOptions = {
  breakevenBufferPips: 2,
  minContentMatchScore: 40,
  contentMatchMaxAgeHours: 48,
  logCapacity: 200,
};

interface ManagementTarget {
  instrument: string;
  // Order/position IDs registered to the referenced signal; null means every match on the instrument
  scope: ReadonlySet<string> | null;
  signalId: string | null;
}

interface ResolveInput {
  message: InboundMessage;
  params: TradingParameters;
  positions: OpenPosition[];
}

export class SignalManagementHandler {
  private options: SignalManagementOptions;
  private messageLog: ManagementLogEntry[] = [];
  private resolvers: ReadonlyArray<MatchStrategy<ResolveInput, ManagementTarget>>;

  constructor(private deps: SignalManagementDeps, options: Partial<SignalManagementOptions> = {}) {
    this.options = { ...DEFAULT_MANAGEMENT_OPTIONS, ...options };
    this.resolvers = this.buildResolvers();
  }

  detect(text: string): ManagementInstruction | null {
    return detectManagementInstruction(text);
  }

  getMessageLog(): ManagementLogEntry[] {
    return [...this.messageLog];
  }

  async handle(
    message: InboundMessage,
    account: AccountRef,
    instruction: ManagementInstruction | null = detectManagementInstruction(message.text)
  ): Promise<ManagementOutcome | null> {
    if (!instruction) {
      return null;
    }
    const result = await this.execute(message, account, instruction);
    this.record(message, instruction, result);
    return result;
  }

  private async execute(
    message: InboundMessage,
    account: AccountRef,
    instruction: ManagementInstruction
  ): Promise<ManagementOutcome> {
    const base: ManagementOutcome = {
      status: 'unresolved',
      intent: instruction.intent,
      instrument: null,
      resolution: null,
      signalId: null,
      positionsUpdated: [],
      ordersCancelled: [],
      failures: [],
    };

    const settings = this.deps.riskProfiles.getManagementSettings(account.id);
    const enabled = instruction.intent === 'breakeven' ? settings.auto_breakeven : settings.auto_close_early;
    if (!enabled) {
      logger.info(`[SignalManagementHandler] ${instruction.intent} instructions are disabled for ${account.id}`);
      return { ...base, status: 'disabled' };
    }

    let positions: OpenPosition[];
    let orders: PendingOrder[];
    try {
      positions = await this.deps.broker.getPositions(account);
      orders = await this.deps.broker.getPendingOrders(account);
    } catch (error) {
      logger.error(`[SignalManagementHandler] Broker lookup failed: ${errorMessage(error)}`);
      return { ...base, status: 'failed', failures: [{ id: 'broker', error: errorMessage(error) }] };
    }

    const params = extractTradingParameters(message.text);
    const match = runStrategyChain(this.resolvers, { message, params, positions });
    if (!match) {
      logger.warn(`[SignalManagementHandler] Could not resolve a target for "${message.text}" (${instruction.ruleId})`);
      return base;
    }
    const target = match.result;
    const resolved = {
      ...base,
      instrument: target.instrument,
      resolution: match.strategy,
      signalId: target.signalId,
    };
    logger.info(
      `[SignalManagementHandler] ${instruction.intent} -> ${target.instrument} via ${match.strategy}` +
        (target.scope ? ` (scoped to ${target.signalId})` : '')
    );

    const targetPositions = positionsFor(positions, target.instrument).filter(position =>
      this.inScope(target.scope, position.id, position.orderId)
    );
    const targetOrders =
      instruction.intent === 'breakeven'
        ? []
        : pendingOrdersFor(orders, target.instrument).filter(order => this.inScope(target.scope, order.id, null));

    if (targetPositions.length === 0 && targetOrders.length === 0) {
      logger.info(`[SignalManagementHandler] No ${target.instrument} positions or orders to ${instruction.intent}`);
      return { ...resolved, status: 'no_targets' };
    }

    if (settings.require_confirmation) {
      const confirmed = await this.confirm(instruction, target, targetPositions.length, targetOrders.length);
      if (confirmed !== 'yes') {
        return { ...resolved, status: confirmed === 'no' ? 'declined' : 'awaiting_confirmation' };
      }
    }

    const positionsUpdated: string[] = [];
    const ordersCancelled: string[] = [];
    const failures: ManagementFailure[] = [];

    for (const position of targetPositions) {
      const write = this.positionWrite(account, instruction, settings, position);
      await this.runWrite('position', position.id, write, positionsUpdated, failures);
    }
    for (const order of targetOrders) {
      const write = () => this.deps.broker.cancelOrder(account, order.id);
      await this.runWrite('order', order.id, write, ordersCancelled, failures);
    }
    if (ordersCancelled.length > 0) {
      await this.deps.orderCache.removeOrders(ordersCancelled);
      if (target.signalId) {
        this.deps.history.unregisterOrders(target.signalId, ordersCancelled);
      }
    }

    const succeeded = positionsUpdated.length + ordersCancelled.length;
    const status: ManagementStatus = failures.length === 0 ? 'applied' : succeeded > 0 ? 'partial' : 'failed';
    logger.info(
      `[SignalManagementHandler] ${instruction.intent} on ${target.instrument}: ${positionsUpdated.length} position(s), ` +
        `${ordersCancelled.length} order(s), ${failures.length} failure(s)`
    );
    return { ...resolved, status, positionsUpdated, ordersCancelled, failures };
  }

  /**
   * Stop-loss a few pips behind entry on the losing side
   */
  breakevenStop(position: OpenPosition): number {
    const buffer = this.options.breakevenBufferPips * pipSize(position.instrument);
    const stop = position.side === 'buy' ? position.entryPrice - buffer : position.entryPrice + buffer;
    return roundTo(stop, 5);
  }

  private positionWrite(
    account: AccountRef,
    instruction: ManagementInstruction,
    settings: ManagementSettings,
    position: OpenPosition
  ): () => Promise<BrokerWriteResult> {
    switch (instruction.intent) {
      case 'breakeven': {
        const stop = this.breakevenStop(position);
        return () => this.deps.broker.modifyPositionStopLoss(account, position.id, stop);
      }
      case 'partial_close': {
        const percentage = instruction.percentage ?? settings.partial_close_percentage;
        const quantity = Math.max(0.01, roundTo((position.quantity * percentage) / 100, 2));
        if (quantity >= position.quantity) {
          return () => this.deps.broker.closePosition(account, position.id);
        }
        return () => this.deps.broker.closePosition(account, position.id, quantity);
      }
      default:
        return () => this.deps.broker.closePosition(account, position.id);
    }
  }

  /**
   * One rate-limited broker write. A 404 on an order cancel means it is already gone.
   */
  private async runWrite(
    operationClass: BrokerOperationClass,
    id: string,
    write: () => Promise<BrokerWriteResult>,
    succeeded: string[],
    failures: ManagementFailure[]
  ): Promise<void> {
    try {
      const result = await this.deps.rateLimiter.schedule(operationClass, write);
      if (result.ok || (operationClass === 'order' && result.status === 'not_found')) {
        succeeded.push(id);
      } else {
        logger.warn(`[SignalManagementHandler] ${operationClass} ${id}: ${result.error}`);
        failures.push({ id, error: result.error });
      }
    } catch (error) {
      logger.warn(`[SignalManagementHandler] ${operationClass} ${id}: ${errorMessage(error)}`);
      failures.push({ id, error: errorMessage(error) });
    }
  }

  private inScope(scope: ReadonlySet<string> | null, id: string, orderId: string | null): boolean {
    return scope === null || scope.has(id) || (orderId !== null && scope.has(orderId));
  }

  private async confirm(
    instruction: ManagementInstruction,
    target: ManagementTarget,
    positionCount: number,
    orderCount: number
  ): Promise<'yes' | 'no' | 'unavailable'> {
    if (!this.deps.confirmation) {
      logger.warn(`[SignalManagementHandler] Confirmation required but no prompt is configured; skipping ${instruction.intent}`);
      return 'unavailable';
    }
    const question =
      `Apply ${instruction.intent.replace('_', ' ')} to ${target.instrument} ` +
      `(${positionCount} position(s), ${orderCount} pending order(s))?`;
    try {
      return (await this.deps.confirmation.confirm(question)) ? 'yes' : 'no';
    } catch (error) {
      logger.warn(`[SignalManagementHandler] Confirmation prompt failed: ${errorMessage(error)}`);
      return 'unavailable';
    }
  }

  private record(message: InboundMessage, instruction: ManagementInstruction, result: ManagementOutcome): void {
    this.messageLog.push({
      timestamp: message.timestamp.toISOString(),
      messageId: message.messageId,
      text: message.text,
      intent: instruction.intent,
      status: result.status,
      instrument: result.instrument,
    });
    if (this.messageLog.length > this.options.logCapacity) {
      this.messageLog.splice(0, this.messageLog.length - this.options.logCapacity);
    }
  }

  /**
   * A named instrument always decides the instrument. A reply target or a
   * cached trade on that same instrument only narrows the scope to its orders.
   */
  private buildResolvers(): ReadonlyArray<MatchStrategy<ResolveInput, ManagementTarget>> {
    const scoped = (correlated: CorrelatedSignal | null, named: string | null): ManagementTarget | null => {
      if (!correlated || (named !== null && named !== correlated.instrument)) {
        return null;
      }
      return { instrument: correlated.instrument, scope: new Set(correlated.orderIds), signalId: correlated.signalId };
    };

    return [
      {
        name: 'reply_target',
        match: ({ message, params }) =>
          scoped(resolveReplyTarget(message, this.deps.history, this.deps.orderCache), params.instrument),
      },
      {
        name: 'order_cache_content',
        match: ({ params }) =>
          scoped(findCachedTrade(params, this.deps.orderCache, this.options.contentMatchMaxAgeHours), params.instrument),
      },
      {
        name: 'named_instrument',
        match: ({ params }) => (params.instrument ? { instrument: params.instrument, scope: null, signalId: null } : null),
      },
      {
        name: 'content_match',
        match: ({ message, params }) => {
          let best: { score: number; target: ManagementTarget } | null = null;
          for (const signal of this.deps.history.all()) {
            if (!this.deps.history.isEligible(signal, message.channelId)) {
              continue;
            }
            const score = scoreSignal(signal, params, message.text);
            if (score >= this.options.minContentMatchScore && (best === null || score > best.score)) {
              const scope = signal.relatedOrders.length > 0 ? new Set(signal.relatedOrders) : null;
              best = { score, target: { instrument: normalize(signal.instrument), scope, signalId: signal.signalId } };
            }
          }
          return best ? best.target : null;
        },
      },
      {
        name: 'best_position',
        match: ({ params, positions }) => {
          let best: { score: number; position: OpenPosition } | null = null;
          for (const position of positions) {
            const score = scorePosition(position, params);
            if (score >= this.options.minContentMatchScore && (best === null || score > best.score)) {
              best = { score, position };
            }
          }
          return best ? { instrument: normalize(best.position.instrument), scope: null, signalId: null } : null;
        },
      },
      {
        name: 'single_open_instrument',
        match: ({ positions }) => {
          const instruments = new Set(positions.map(position => normalize(position.instrument)));
          if (instruments.size !== 1) {
            return null;
          }
          const [instrument] = Array.from(instruments);
          return { instrument, scope: null, signalId: null };
        },
      },
    ];
  }
}
