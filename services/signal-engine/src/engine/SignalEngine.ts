/**
 * Signal Engine
 *
 * Routes each inbound message to management, TP-hit or new-signal handling for every
 * account subscribed to its channel. Owns the lifecycle of the stores and timers.
 *
 * A management instruction or TP hit that correlates to nothing falls through to
 * the parser when the text could itself be a signal ("... move SL to BE after TP1").
 */

import { AccountRef, BrokerClient, InboundMessage, Signal } from '@signalbridge/shared-types';
import { Logger, errorMessage } from '@signalbridge/shared-utils';
import { SignalEngineConfig } from '../config';
import { AccountEntry, AccountRegistry } from '../accounts/AccountRegistry';
import { InstrumentCatalog } from '../instruments/InstrumentCatalog';
import { SignalExtractionClient } from '../parsing/ExtractionClient';
import { SignalParser } from '../parsing/SignalParser';
import { evaluatePreFilter } from '../parsing/SignalPreFilter';
import { createSignalRecord } from '../parsing/signalRecord';
import { RiskProfileStore } from '../risk/RiskProfileStore';
import { PositionSizer } from '../risk/PositionSizer';
import { selectTakeProfits } from '../risk/takeProfitSelection';
import { DrawdownGuard } from '../risk/DrawdownGuard';
import { DrawdownResetScheduler } from '../risk/DrawdownResetScheduler';
import { SignalHistoryStore } from '../correlation/SignalHistoryStore';
import { OrderCache } from '../correlation/OrderCache';
import { OrderOrchestrator, PlacementResult } from '../execution/OrderOrchestrator';
import { RunnerRegistry } from '../execution/RunnerRegistry';
import { MissedSignalHandler, MissedSignalOutcome } from '../handlers/MissedSignalHandler';
import {
  ConfirmationPrompt,
  ManagementOutcome,
  SignalManagementHandler,
} from '../handlers/SignalManagementHandler';
import { PositionMonitor } from '../monitor/PositionMonitor';
import { BrokerRateLimiter } from '../utils/BrokerRateLimiter';

const logger = new Logger('SignalEngine');

const ORDER_CACHE_CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

export type MessageOutcome =
  | { kind: 'management'; accountId: string; outcome: ManagementOutcome }
  | { kind: 'tp_hit'; accountId: string; outcome: MissedSignalOutcome }
  | { kind: 'signal'; accountId: string; signalId: string; placement: PlacementResult }
  | { kind: 'skipped'; accountId: string | null; reason: string }
  | { kind: 'error'; accountId: string | null; reason: string };

/**
 * True when a handler outcome left the message unhandled for this account
 */
export function isUncorrelated(outcome: MessageOutcome): boolean {
  switch (outcome.kind) {
    case 'management':
      return outcome.outcome.status === 'unresolved' || outcome.outcome.status === 'no_targets';
    case 'tp_hit':
      return outcome.outcome.action === 'none' && outcome.outcome.signalId === null;
    case 'skipped':
      return true;
    default:
      return false;
  }
}

export type MessageListener = (message: InboundMessage) => Promise<void>;

/**
 * Inbound message feed. `subscribe` returns the unsubscribe function.
 */
export interface MessageSource {
  subscribe(listener: MessageListener): () => void;
}

export interface SignalEngineComponents {
  broker: BrokerClient;
  accounts: AccountRegistry;
  catalog: InstrumentCatalog;
  parser: SignalParser;
  riskProfiles: RiskProfileStore;
  sizer: PositionSizer;
  drawdown: DrawdownGuard;
  resetScheduler: DrawdownResetScheduler;
  history: SignalHistoryStore;
  orderCache: OrderCache;
  orchestrator: OrderOrchestrator;
  missedSignals: MissedSignalHandler;
  management: SignalManagementHandler;
  monitor: PositionMonitor;
  rateLimiter: BrokerRateLimiter;
}

export interface SignalEngineOptions {
  monitorEnabled: boolean;
  orderCacheCleanupIntervalMs: number;
}

export class SignalEngine {
  private inFlight: Set<Promise<MessageOutcome[]>> = new Set();
  private unsubscribe: (() => void) | null = null;
  private isRunning: boolean = false;
  private isStopping: boolean = false;
  private options: SignalEngineOptions;

  constructor(private components: SignalEngineComponents, options: Partial<SignalEngineOptions> = {}) {
    this.options = {
      monitorEnabled: true,
      orderCacheCleanupIntervalMs: ORDER_CACHE_CLEANUP_INTERVAL_MS,
      ...options,
    };
  }

  get running(): boolean {
    return this.isRunning;
  }

  get pendingTasks(): number {
    return this.inFlight.size;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('[SignalEngine] Already running');
      return;
    }
    const { accounts, riskProfiles, drawdown, orderCache, parser, resetScheduler, monitor } = this.components;

    await riskProfiles.load();
    await accounts.loadAccounts();
    await drawdown.load(accounts.getAllAccounts());
    await orderCache.load();

    parser.start();
    resetScheduler.start();
    if (this.options.monitorEnabled) {
      monitor.start();
    }
    orderCache.startCleanup(this.options.orderCacheCleanupIntervalMs);

    this.isStopping = false;
    this.isRunning = true;
    logger.info(`[SignalEngine] Started for ${accounts.getAllAccounts().length} account(s)`);
  }

  /**
   * Refuse new messages, stop timers, wait for in-flight work, then flush the stores
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }
    this.isStopping = true;
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }

    const { parser, resetScheduler, monitor, orderCache, drawdown, rateLimiter } = this.components;
    parser.stop();
    await resetScheduler.stop();
    await monitor.stop();

    const pending = Array.from(this.inFlight);
    if (pending.length > 0) {
      logger.info(`[SignalEngine] Waiting for ${pending.length} in-flight message(s)`);
      await Promise.allSettled(pending);
    }

    await orderCache.close();
    await drawdown.close();
    await rateLimiter.stop();

    this.isRunning = false;
    logger.info('[SignalEngine] Stopped');
  }

  attach(source: MessageSource): void {
    if (this.unsubscribe) {
      this.unsubscribe();
    }
    this.unsubscribe = source.subscribe(async message => {
      await this.handleMessage(message);
    });
  }

  /**
   * Process one message for every subscribed account. Never rejects.
   */
  handleMessage(message: InboundMessage): Promise<MessageOutcome[]> {
    if (this.isStopping) {
      logger.warn(`[SignalEngine] Stopping; message ${message.messageId} not processed`);
      return Promise.resolve([{ kind: 'skipped', accountId: null, reason: 'engine_stopping' }]);
    }

    const task = this.process(message).catch((error): MessageOutcome[] => {
      logger.error(`[SignalEngine] Message ${message.messageId} failed: ${errorMessage(error)}`);
      return [{ kind: 'error', accountId: null, reason: errorMessage(error) }];
    });
    this.inFlight.add(task);
    return task.finally(() => {
      this.inFlight.delete(task);
    });
  }

  private async process(message: InboundMessage): Promise<MessageOutcome[]> {
    const accounts = this.components.accounts.accountsForChannel(message.channelId, message.channelName);
    if (accounts.length === 0) {
      logger.debug(`[SignalEngine] No account follows channel ${message.channelName ?? message.channelId ?? '(none)'}`);
      return [{ kind: 'skipped', accountId: null, reason: 'no_subscribed_account' }];
    }

    const { management, missedSignals, parser, history } = this.components;
    const couldBeSignal = evaluatePreFilter(message.text).pass;
    let unhandled: MessageOutcome[] | null = null;

    const instruction = management.detect(message.text);
    if (instruction) {
      const outcomes = await this.forEachAccount(accounts, async account => {
        const outcome = await management.handle(message, account, instruction);
        return outcome
          ? { kind: 'management', accountId: account.id, outcome }
          : { kind: 'skipped', accountId: account.id, reason: 'not_management' };
      });
      if (!couldBeSignal || !outcomes.every(isUncorrelated)) {
        return outcomes;
      }
      unhandled = outcomes;
    }

    const tpHit = missedSignals.detect(message.text);
    if (tpHit) {
      const outcomes = await this.forEachAccount(accounts, async account => ({
        kind: 'tp_hit',
        accountId: account.id,
        outcome: await missedSignals.handle(message, account, tpHit),
      }));
      if (!couldBeSignal || !outcomes.every(isUncorrelated)) {
        return outcomes;
      }
      unhandled = unhandled ?? outcomes;
    }

    if (unhandled) {
      logger.info(`[SignalEngine] Message ${message.messageId} matched no tracked trade; parsing it as a signal`);
    }
    const parsed = await parser.parse(message.text);
    if (!parsed) {
      return unhandled ?? [{ kind: 'skipped', accountId: null, reason: 'not_a_signal' }];
    }
    const signal = createSignalRecord(parsed, message);
    history.add(signal);

    return this.forEachAccount(accounts, account => this.executeSignal(signal, account));
  }

  private async executeSignal(signal: Signal, account: AccountRef): Promise<MessageOutcome> {
    const { riskProfiles, catalog, broker, sizer, orchestrator } = this.components;

    const takeProfits = selectTakeProfits(signal.takeProfits, riskProfiles.getTpSelection(account.id));
    const selected: Signal = { ...signal, takeProfits };

    const instrument = await catalog.resolve(account, signal.instrument);
    if (!instrument) {
      logger.warn(`[SignalEngine] ${signal.signalId}: ${signal.instrument} is not tradable on account ${account.id}`);
      return { kind: 'skipped', accountId: account.id, reason: 'instrument_unavailable' };
    }

    const state = await broker.getAccountState(account);
    const sizing = sizer.size({
      instrument: signal.instrument,
      entryPoint: signal.entryPoint,
      stopLoss: signal.stopLoss,
      takeProfits,
      balance: state.balance,
      reducedRisk: signal.reducedRisk,
      accountId: account.id,
      brokerType: instrument.type,
    });

    const placement = await orchestrator.place(selected, sizing, account, instrument, state.balance);
    logger.info(
      `[SignalEngine] ${signal.signalId} ${signal.instrument} on ${account.id}: ${placement.status} ` +
        `(${placement.successful.length} placed, ${placement.failed.length} failed)` +
        (placement.reason ? ` - ${placement.reason}` : '')
    );
    return { kind: 'signal', accountId: account.id, signalId: signal.signalId, placement };
  }

  private async forEachAccount(
    accounts: AccountEntry[],
    run: (account: AccountEntry) => Promise<MessageOutcome>
  ): Promise<MessageOutcome[]> {
    const outcomes: MessageOutcome[] = [];
    for (const account of accounts) {
      try {
        outcomes.push(await run(account));
      } catch (error) {
        logger.error(`[SignalEngine] Account ${account.id} failed: ${errorMessage(error)}`);
        outcomes.push({ kind: 'error', accountId: account.id, reason: errorMessage(error) });
      }
    }
    return outcomes;
  }
}

export interface SignalEngineDeps {
  broker: BrokerClient;
  extraction: SignalExtractionClient;
  confirmation?: ConfirmationPrompt;
  now?: () => Date;
}

/**
 * Wire every component from configuration
 */
export function createSignalEngine(config: SignalEngineConfig, deps: SignalEngineDeps): SignalEngine {
  const now = deps.now ?? (() => new Date());
  const clockMs = (): number => now().getTime();
  const { broker } = deps;

  const accounts = new AccountRegistry(config.accountsConfigPath);
  const rateLimiter = new BrokerRateLimiter(config.broker.writeSpacingMs);
  const catalog = new InstrumentCatalog(broker, config.instrumentCacheTtlMinutes * 60_000, clockMs);
  const parser = new SignalParser(deps.extraction, {
    priceAdjustment: { offsets: config.brokerPriceOffsets, indexTpBuffer: config.indexTpBuffer },
    cacheClearIntervalMs: config.parseCacheClearHours * 3_600_000,
  });
  const riskProfiles = new RiskProfileStore(config.riskSettingsPath);
  const sizer = new PositionSizer(riskProfiles);
  const drawdown = new DrawdownGuard(broker, riskProfiles, config.drawdownStatePath, now);
  const resetScheduler = new DrawdownResetScheduler(drawdown, () => accounts.getAllAccounts(), config.drawdown);
  const history = new SignalHistoryStore(
    {
      perInstrumentCapacity: config.correlation.perInstrumentCapacity,
      globalCapacity: config.correlation.globalCapacity,
      maxSignalAgeHours: config.correlation.maxSignalAgeHours,
      sameSourceOnly: config.correlation.sameSourceOnly,
      tpPriceTolerance: config.correlation.tpPriceTolerance,
    },
    now
  );
  const orderCache = new OrderCache(config.orderCachePath, config.correlation.orderCacheRetentionDays, now);
  const runners = new RunnerRegistry();
  const orchestrator = new OrderOrchestrator(
    { broker, drawdown, history, orderCache, runners },
    {
      marketThresholdPips: config.marketThresholdPips,
      marginRetryAttempts: config.marginRetryAttempts,
      maxSignalAgeSeconds: config.maxSignalAgeSeconds,
    },
    now
  );
  const missedSignals = new MissedSignalHandler(
    { broker, history, orderCache, rateLimiter },
    {
      fallbackProtection: config.correlation.fallbackProtection,
      contentMatchMaxAgeHours: config.correlation.maxSignalAgeHours,
    }
  );
  const management = new SignalManagementHandler(
    { broker, history, orderCache, riskProfiles, rateLimiter, confirmation: deps.confirmation },
    {
      breakevenBufferPips: config.correlation.breakevenBufferPips,
      minContentMatchScore: config.correlation.minContentMatchScore,
      contentMatchMaxAgeHours: config.correlation.maxSignalAgeHours,
    }
  );
  const monitor = new PositionMonitor(
    { broker, catalog, runners, rateLimiter, orderCache },
    () => accounts.getAllAccounts(),
    config.monitor,
    clockMs
  );

  return new SignalEngine(
    {
      broker,
      accounts,
      catalog,
      parser,
      riskProfiles,
      sizer,
      drawdown,
      resetScheduler,
      history,
      orderCache,
      orchestrator,
      missedSignals,
      management,
      monitor,
      rateLimiter,
    },
    { monitorEnabled: config.monitor.enabled }
  );
}
