/**
 * Drawdown Guard
 *
 * Per-account daily floor balance. New risk is vetoed when
 * balance - risk would drop below max_drawdown_balance.
 * All mutations of the state go through one lock.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AccountRef, BrokerClient } from '@signalbridge/shared-types';
import { Logger, errorMessage } from '@signalbridge/shared-utils';
import { SerialLock } from '../utils/SerialLock';
import { RiskProfileStore } from './RiskProfileStore';
import { computeMaxDrawdownBalance, impliedDrawdownPercentage, tierFor } from './drawdownTiers';

const logger = new Logger('DrawdownGuard');

// Max deviation (percentage points) tolerated between persisted and configured drawdown
const VALIDATION_TOLERANCE_PCT = 0.1;

export interface DrawdownAccountState {
  starting_balance: number;
  max_drawdown_balance: number;
  tier_size: number;
  tier_name: string;
  drawdown_percentage: number;
  last_reset: string; // ISO 8601
}

interface DrawdownStateFile {
  accounts: Record<string, DrawdownAccountState>;
  last_updated: string;
}

export interface DrawdownCheck {
  exceeded: boolean;
  balanceAfterRisk: number;
  maxDrawdownBalance: number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeAccountState(value: unknown): DrawdownAccountState | null {
  if (!isRecord(value)) {
    return null;
  }
  const starting = value.starting_balance;
  const floor = value.max_drawdown_balance;
  if (typeof starting !== 'number' || typeof floor !== 'number' || !Number.isFinite(starting)) {
    return null;
  }
  const tier = tierFor(starting);
  return {
    starting_balance: starting,
    max_drawdown_balance: floor,
    tier_size: typeof value.tier_size === 'number' ? value.tier_size : tier.size,
    tier_name: typeof value.tier_name === 'string' ? value.tier_name : tier.name,
    drawdown_percentage:
      typeof value.drawdown_percentage === 'number'
        ? value.drawdown_percentage
        : impliedDrawdownPercentage(starting, floor),
    last_reset: typeof value.last_reset === 'string' ? value.last_reset : new Date(0).toISOString(),
  };
}

export class DrawdownGuard {
  private states: Map<string, DrawdownAccountState> = new Map();
  private lock = new SerialLock();

  constructor(
    private broker: BrokerClient,
    private riskProfiles: RiskProfileStore,
    private filePath: string,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Load persisted state, validate it against the configured percentages and
   * seed accounts that have none from their current balance.
   */
  async load(accounts: AccountRef[]): Promise<void> {
    await this.lock.run(async () => {
      const persisted = await this.readStateFile(accounts);
      this.states = new Map(Object.entries(persisted));

      for (const account of accounts) {
        if (this.states.has(account.id)) {
          this.validateUnlocked(account.id);
          continue;
        }
        try {
          const state = await this.broker.getAccountState(account);
          this.states.set(account.id, this.buildState(account.id, state.balance));
          logger.info(`[DrawdownGuard] Seeded ${account.id} from current balance ${state.balance}`);
        } catch (error) {
          logger.error(`[DrawdownGuard] Could not seed drawdown state for ${account.id}: ${errorMessage(error)}`);
        }
      }
      await this.persistUnlocked();
    });
  }

  /**
   * Correct max_drawdown_balance when it disagrees with the configured
   * percentage. starting_balance is never changed here.
   */
  async validate(accountId: string): Promise<boolean> {
    return this.lock.run(async () => {
      const corrected = this.validateUnlocked(accountId);
      if (corrected) {
        await this.persistUnlocked();
      }
      return corrected;
    });
  }

  wouldExceed(accountId: string, balance: number, riskAmount: number): boolean {
    return this.check(accountId, balance, riskAmount).exceeded;
  }

  check(accountId: string, balance: number, riskAmount: number): DrawdownCheck {
    const balanceAfterRisk = balance - riskAmount;
    const state = this.states.get(accountId);
    if (!state) {
      logger.warn(`[DrawdownGuard] No drawdown state for ${accountId}, allowing trade`);
      return { exceeded: false, balanceAfterRisk, maxDrawdownBalance: null };
    }
    const exceeded = balanceAfterRisk < state.max_drawdown_balance;
    if (exceeded) {
      logger.warn(
        `[DrawdownGuard] ${accountId}: ${balance} - ${riskAmount} = ${balanceAfterRisk} is below floor ${state.max_drawdown_balance}`
      );
    }
    return { exceeded, balanceAfterRisk, maxDrawdownBalance: state.max_drawdown_balance };
  }

  getState(accountId: string): DrawdownAccountState | null {
    const state = this.states.get(accountId);
    return state ? { ...state } : null;
  }

  /**
   * Start a new trading day from current equity (balance + unrealized P&L)
   */
  async reset(account: AccountRef): Promise<DrawdownAccountState> {
    return this.lock.run(async () => {
      const accountState = await this.broker.getAccountState(account);
      const equity = accountState.balance + (accountState.unrealizedPnl ?? 0);
      const state = this.buildState(account.id, equity);
      this.states.set(account.id, state);
      await this.persistUnlocked();
      logger.info(
        `[DrawdownGuard] Reset ${account.id}: start=${state.starting_balance} floor=${state.max_drawdown_balance} ` +
          `tier=${state.tier_name} (${state.drawdown_percentage}%)`
      );
      return { ...state };
    });
  }

  /**
   * Reset every account; returns the IDs that failed
   */
  async resetAll(accounts: AccountRef[]): Promise<string[]> {
    const failed: string[] = [];
    for (const account of accounts) {
      try {
        await this.reset(account);
      } catch (error) {
        logger.error(`[DrawdownGuard] Reset failed for ${account.id}: ${errorMessage(error)}`);
        failed.push(account.id);
      }
    }
    return failed;
  }

  /**
   * Wait for queued state operations to finish
   */
  async close(): Promise<void> {
    await this.lock.drain();
  }

  private buildState(accountId: string, startingBalance: number): DrawdownAccountState {
    const percentage = this.riskProfiles.getDrawdownPercentage(accountId);
    const tier = tierFor(startingBalance);
    return {
      starting_balance: startingBalance,
      max_drawdown_balance: computeMaxDrawdownBalance(startingBalance, percentage),
      tier_size: tier.size,
      tier_name: tier.name,
      drawdown_percentage: percentage,
      last_reset: this.now().toISOString(),
    };
  }

  private validateUnlocked(accountId: string): boolean {
    const state = this.states.get(accountId);
    if (!state) {
      return false;
    }
    const configured = this.riskProfiles.getDrawdownPercentage(accountId);
    const implied = impliedDrawdownPercentage(state.starting_balance, state.max_drawdown_balance);
    const tier = tierFor(state.starting_balance);
    const floorAboveStart = state.max_drawdown_balance > state.starting_balance;

    if (!floorAboveStart && Math.abs(implied - configured) <= VALIDATION_TOLERANCE_PCT) {
      return false;
    }

    const expected = computeMaxDrawdownBalance(state.starting_balance, configured);
    logger.warn(
      `[DrawdownGuard] ${accountId}: persisted floor implies ${implied.toFixed(2)}%, configured ${configured}%. ` +
        `Correcting ${state.max_drawdown_balance} -> ${expected}`
    );
    this.states.set(accountId, {
      ...state,
      max_drawdown_balance: expected,
      tier_size: tier.size,
      tier_name: tier.name,
      drawdown_percentage: configured,
    });
    return true;
  }

  private async readStateFile(accounts: AccountRef[]): Promise<Record<string, DrawdownAccountState>> {
    for (const candidate of [this.filePath, `${this.filePath}.bak`]) {
      let raw: unknown;
      try {
        raw = JSON.parse(await fs.readFile(candidate, 'utf8'));
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
          logger.error(`[DrawdownGuard] Unreadable drawdown state at ${candidate}`, error);
        }
        continue;
      }
      return this.decodeStateFile(raw, accounts);
    }
    logger.warn('[DrawdownGuard] No persisted drawdown state found');
    return {};
  }

  private decodeStateFile(raw: unknown, accounts: AccountRef[]): Record<string, DrawdownAccountState> {
    const result: Record<string, DrawdownAccountState> = {};
    if (!isRecord(raw)) {
      return result;
    }

    // Single-account file: {starting_balance, max_drawdown_balance}
    if (!isRecord(raw.accounts)) {
      const legacy = decodeAccountState(raw);
      if (legacy && accounts.length > 0) {
        logger.info(`[DrawdownGuard] Migrating single-account drawdown state to ${accounts[0].id}`);
        result[accounts[0].id] = legacy;
      }
      return result;
    }

    for (const [accountId, value] of Object.entries(raw.accounts)) {
      const state = decodeAccountState(value);
      if (state) {
        result[accountId] = state;
      } else {
        logger.warn(`[DrawdownGuard] Discarding invalid drawdown state for ${accountId}`);
      }
    }
    return result;
  }

  private async persistUnlocked(): Promise<void> {
    const file: DrawdownStateFile = {
      accounts: Object.fromEntries(this.states),
      last_updated: this.now().toISOString(),
    };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        logger.warn(`[DrawdownGuard] Could not write backup: ${errorMessage(error)}`);
      }
    }
    await fs.writeFile(this.filePath, JSON.stringify(file, null, 2), 'utf8');
  }
}
