/**
 * Missed-Signal Handler
 *
 * A "TP hit" announcement for a signal we never got filled on means its
 * pending orders are stale. When the instrument has no open position, the
 * matched signal's pending orders are cancelled. Cancelling every pending
 * order for the instrument without a match requires fallbackProtection.
 *
 * Match order: reply target, signal history, then cached orders whose trade
 * the message quotes.
 */

import { AccountRef, BrokerClient, InboundMessage, PendingOrder } from '@signalbridge/shared-types';
import { Logger, errorMessage } from '@signalbridge/shared-utils';
import { SignalHistoryStore } from '../correlation/SignalHistoryStore';
import { OrderCache } from '../correlation/OrderCache';
import { BrokerRateLimiter } from '../utils/BrokerRateLimiter';
import { TpHitDetection, detectTpHit } from './rules/tpHitRules';
import { pendingOrdersFor, positionsFor } from './pendingOrders';
import { findCachedTrade, resolveReplyTarget } from './replyTarget';
import { extractTradingParameters } from './contentMatching';

const logger = new Logger('MissedSignalHandler');

export type MissedSignalReason =
  | 'not_tp_hit'
  | 'unknown_instrument'
  | 'existing_positions'
  | 'no_pending_orders'
  | 'no_matching_orders'
  | 'fallback_protection_disabled'
  | 'cancelled_matched_orders'
  | 'cancelled_all_pending'
  | 'broker_error';

export interface MissedSignalOutcome {
  action: 'none' | 'cancelled';
  reason: MissedSignalReason;
  instrument: string | null;
  signalId: string | null;
  matchMethod: string | null;
  cancelled: string[];
  alreadyResolved: string[];
  failed: string[];
  fallbackUsed: boolean;
}

export interface MissedSignalHandlerDeps {
  broker: BrokerClient;
  history: SignalHistoryStore;
  orderCache: OrderCache;
  rateLimiter: BrokerRateLimiter;
}

export interface MissedSignalOptions {
  fallbackProtection: boolean;
  contentMatchMaxAgeHours?: number;
}

const DEFAULT_CONTENT_MATCH_MAX_AGE_HOURS = 48;

interface ResolvedTarget {
  instrument: string;
  signalId: string | null;
  orderIds: string[] | null; // null when no signal matched
  method: string | null;
}

function outcome(
  reason: MissedSignalReason,
  partial: Partial<MissedSignalOutcome> = {}
): MissedSignalOutcome {
  return {
    action: 'none',
    reason,
    instrument: null,
    signalId: null,
    matchMethod: null,
    cancelled: [],
    alreadyResolved: [],
    failed: [],
    fallbackUsed: false,
    ...partial,
  };
}

export class MissedSignalHandler {
  constructor(private deps: MissedSignalHandlerDeps, private options: MissedSignalOptions) {}

  detect(text: string): TpHitDetection | null {
    return detectTpHit(text);
  }

  async handle(
    message: InboundMessage,
    account: AccountRef,
    detection: TpHitDetection | null = detectTpHit(message.text)
  ): Promise<MissedSignalOutcome> {
    if (!detection) {
      return outcome('not_tp_hit');
    }

    const target = this.resolveTarget(message, detection);
    if (!target) {
      logger.info(`[MissedSignalHandler] TP hit (${detection.ruleId}) names no known instrument, ignoring`);
      return outcome('unknown_instrument');
    }
    const context = {
      instrument: target.instrument,
      signalId: target.signalId,
      matchMethod: target.method,
    };

    let pending: PendingOrder[];
    try {
      const positions = positionsFor(await this.deps.broker.getPositions(account), target.instrument);
      if (positions.length > 0) {
        logger.info(
          `[MissedSignalHandler] ${target.instrument} has ${positions.length} open position(s); signal was caught, no action`
        );
        return outcome('existing_positions', context);
      }
      pending = pendingOrdersFor(await this.deps.broker.getPendingOrders(account), target.instrument);
    } catch (error) {
      logger.error(`[MissedSignalHandler] Broker lookup failed for ${target.instrument}: ${errorMessage(error)}`);
      return outcome('broker_error', context);
    }

    if (pending.length === 0) {
      logger.info(`[MissedSignalHandler] No pending ${target.instrument} orders, nothing to cancel`);
      return outcome('no_pending_orders', context);
    }

    let toCancel: PendingOrder[];
    let fallbackUsed = false;
    if (target.orderIds !== null) {
      const registered = new Set(target.orderIds);
      toCancel = pending.filter(order => registered.has(order.id));
      if (toCancel.length === 0) {
        logger.info(
          `[MissedSignalHandler] ${target.signalId}: none of its orders [${target.orderIds.join(', ')}] are pending`
        );
        return outcome('no_matching_orders', context);
      }
    } else if (this.options.fallbackProtection) {
      logger.warn(
        `[MissedSignalHandler] No signal matched; fallback protection cancels all ${pending.length} pending ${target.instrument} order(s)`
      );
      toCancel = pending;
      fallbackUsed = true;
    } else {
      logger.info(
        `[MissedSignalHandler] No signal matched for ${target.instrument}; ${pending.length} pending order(s) left alone (fallback protection off)`
      );
      return outcome('fallback_protection_disabled', context);
    }

    const results = await this.cancelSequentially(account, toCancel.map(order => order.id));
    const resolved = [...results.cancelled, ...results.alreadyResolved];
    if (resolved.length > 0) {
      await this.deps.orderCache.removeOrders(resolved);
      if (target.signalId) {
        this.deps.history.unregisterOrders(target.signalId, resolved);
      }
    }

    logger.info(
      `[MissedSignalHandler] ${target.instrument} ${target.signalId ?? '(fallback)'}: cancelled ${results.cancelled.length}, ` +
        `already resolved ${results.alreadyResolved.length}, failed ${results.failed.length}`
    );
    return {
      action: results.cancelled.length > 0 ? 'cancelled' : 'none',
      reason: fallbackUsed ? 'cancelled_all_pending' : 'cancelled_matched_orders',
      ...context,
      ...results,
      fallbackUsed,
    };
  }

  private resolveTarget(message: InboundMessage, detection: TpHitDetection): ResolvedTarget | null {
    // A reply names its signal directly
    const reply = resolveReplyTarget(message, this.deps.history, this.deps.orderCache);
    if (reply && (!detection.instrument || detection.instrument === reply.instrument)) {
      logger.info(`[MissedSignalHandler] Reply to ${message.replyToId} resolves to ${reply.signalId} (${reply.instrument})`);
      return { instrument: reply.instrument, signalId: reply.signalId, orderIds: reply.orderIds, method: 'reply' };
    }

    const instrument = detection.instrument;
    if (!instrument) {
      return null;
    }
    const match = this.deps.history.findMatching({
      instrument,
      tpLevel: detection.tpLevel,
      tpPrice: detection.tpPrice,
      hint: detection.hint,
      channelId: message.channelId,
    });
    if (match) {
      return { instrument, signalId: match.signalId, orderIds: match.orderIds, method: match.method };
    }

    const cached = findCachedTrade(
      { ...extractTradingParameters(message.text), instrument },
      this.deps.orderCache,
      this.options.contentMatchMaxAgeHours ?? DEFAULT_CONTENT_MATCH_MAX_AGE_HOURS
    );
    if (cached) {
      return { instrument, signalId: cached.signalId, orderIds: cached.orderIds, method: 'order_cache_content' };
    }
    return { instrument, signalId: null, orderIds: null, method: null };
  }

  private async cancelSequentially(
    account: AccountRef,
    orderIds: string[]
  ): Promise<{ cancelled: string[]; alreadyResolved: string[]; failed: string[] }> {
    const cancelled: string[] = [];
    const alreadyResolved: string[] = [];
    const failed: string[] = [];

    for (const orderId of orderIds) {
      try {
        const result = await this.deps.rateLimiter.schedule('order', () =>
          this.deps.broker.cancelOrder(account, orderId)
        );
        if (result.ok) {
          cancelled.push(orderId);
        } else if (result.status === 'not_found') {
          logger.info(`[MissedSignalHandler] Order ${orderId} already gone (404)`);
          alreadyResolved.push(orderId);
        } else {
          logger.warn(`[MissedSignalHandler] Cancel ${orderId} failed: ${result.error}`);
          failed.push(orderId);
        }
      } catch (error) {
        logger.warn(`[MissedSignalHandler] Cancel ${orderId} failed: ${errorMessage(error)}`);
        failed.push(orderId);
      }
    }
    return { cancelled, alreadyResolved, failed };
  }
}
