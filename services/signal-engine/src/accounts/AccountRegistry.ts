/**
 * Account Registry
 *
 * Trading accounts and the signal channels each one follows, loaded from configs/accounts.json.
 */

import fs from 'fs/promises';
import { AccountRef } from '@signalbridge/shared-types';
import { Logger, ValidationError } from '@signalbridge/shared-utils';

const logger = new Logger('AccountRegistry');

export const ALL_CHANNELS = '*';

export interface AccountEntry extends AccountRef {
  name: string;
  channels: string[]; // channel ids or names; '*' follows every channel
  enabled: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeAccount(record: unknown, index: number): AccountEntry {
  if (!isRecord(record)) {
    throw new ValidationError(`Account #${index} is not an object`);
  }
  const id = record.id;
  const accNum = record.acc_num;
  if (typeof id !== 'string' || id.length === 0) {
    throw new ValidationError(`Account #${index} has no id`, 'id');
  }
  if (typeof accNum !== 'string' && typeof accNum !== 'number') {
    throw new ValidationError(`Account ${id} has no acc_num`, 'acc_num');
  }
  const channels = Array.isArray(record.channels)
    ? record.channels.filter((channel): channel is string => typeof channel === 'string')
    : [ALL_CHANNELS];

  return {
    id,
    accNum: String(accNum),
    name: typeof record.name === 'string' ? record.name : id,
    channels,
    enabled: record.enabled !== false,
  };
}

export async function loadAccountsFromConfig(configPath: string): Promise<AccountEntry[]> {
  const content = await fs.readFile(configPath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new ValidationError(`${configPath} must contain a list of accounts`);
  }
  const accounts = parsed.map((raw, index) => decodeAccount(raw, index));
  const ids = new Set<string>();
  for (const account of accounts) {
    if (ids.has(account.id)) {
      throw new ValidationError(`Duplicate account id '${account.id}'`, 'id');
    }
    ids.add(account.id);
  }
  return accounts;
}

export class AccountRegistry {
  private accounts: Map<string, AccountEntry> = new Map();

  constructor(private configPath: string) {}

  async loadAccounts(): Promise<void> {
    const accounts = await loadAccountsFromConfig(this.configPath);
    this.accounts.clear();
    for (const account of accounts) {
      if (account.enabled) {
        this.accounts.set(account.id, account);
      }
    }
    logger.info(`[AccountRegistry] Loaded ${this.accounts.size} enabled account(s) from ${this.configPath}`);
  }

  getAccount(accountId: string): AccountEntry | undefined {
    return this.accounts.get(accountId);
  }

  getAllAccounts(): AccountEntry[] {
    return Array.from(this.accounts.values());
  }

  /**
   * Accounts that follow the channel a message arrived on. Messages without a
   * channel only reach wildcard subscribers.
   */
  accountsForChannel(channelId: string | null, channelName: string | null = null): AccountEntry[] {
    const keys = [channelId, channelName]
      .filter((key): key is string => key !== null && key.length > 0)
      .map(key => key.toLowerCase());

    return this.getAllAccounts().filter(account =>
      account.channels.some(channel => channel === ALL_CHANNELS || keys.includes(channel.toLowerCase()))
    );
  }
}
