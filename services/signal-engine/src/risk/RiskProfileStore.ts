/**
 * Risk Profile Store
 *
 * Global and per-account risk profiles persisted to risk_settings.json.
 * Loaded once at startup; every mutating call writes the file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { RiskClass } from '@signalbridge/shared-types';
import { Logger, NotFoundError, ValidationError } from '@signalbridge/shared-utils';
import { SerialLock } from '../utils/SerialLock';
import {
  DEFAULT_PRESET,
  ManagementSettings,
  RISK_CLASSES,
  RISK_PRESETS,
  RiskPresetName,
  RiskProfileName,
  RiskProfileSettings,
  RiskSettingsFile,
  TpSelection,
  TpSelectionMode,
  cloneProfile,
  isValidDrawdownPercentage,
  isValidRiskFraction,
} from './riskProfiles';
import { decodeRiskSettings } from './riskSettingsSchema';

const logger = new Logger('RiskProfileStore');

const PRESET_NAMES: readonly RiskPresetName[] = ['conservative', 'balanced', 'aggressive'];
const FRACTION_EPSILON = 1e-9;

export const GLOBAL_SCOPE = 'global';

export class RiskProfileStore {
  private settings: RiskSettingsFile = {
    global_default: cloneProfile(RISK_PRESETS[DEFAULT_PRESET]),
    accounts: {},
  };
  private writeLock = new SerialLock();

  constructor(private filePath: string) {}

  /**
   * Load settings from disk. A missing or invalid file is replaced by defaults
   * and written back.
   */
  async load(): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.filePath, 'utf8'));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.warn(`[RiskProfileStore] ${this.filePath} not found, creating ${DEFAULT_PRESET} defaults`);
      } else {
        logger.error(`[RiskProfileStore] Could not read ${this.filePath}, restoring defaults`, error);
      }
      await this.save();
      return;
    }

    const decoded = decodeRiskSettings(raw);
    this.settings = decoded.settings;
    if (decoded.migrated) {
      logger.info('[RiskProfileStore] Migrated legacy flat settings into global_default');
    }
    if (decoded.repairs.length > 0) {
      logger.warn(`[RiskProfileStore] Repaired settings: ${decoded.repairs.join('; ')}`);
    }
    if (decoded.migrated || decoded.repairs.length > 0) {
      await this.save();
    }
    logger.info(
      `[RiskProfileStore] Loaded risk settings (${Object.keys(this.settings.accounts).length} account override(s))`
    );
  }

  async save(): Promise<void> {
    const snapshot = JSON.stringify(this.settings, null, 2);
    await this.writeLock.run(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, snapshot, 'utf8');
    });
  }

  /**
   * Effective profile for an account (its override, else the global default)
   */
  getProfile(accountId?: string): RiskProfileSettings {
    const profile = (accountId && this.settings.accounts[accountId]) || this.settings.global_default;
    return cloneProfile(profile);
  }

  getRiskFraction(riskClass: RiskClass, reduced: boolean, accountId?: string): number {
    const fractions = this.getProfile(accountId)[riskClass];
    return reduced ? fractions.reduced : fractions.default;
  }

  getDrawdownPercentage(accountId?: string): number {
    return this.getProfile(accountId).drawdown.daily_percentage;
  }

  getTpSelection(accountId?: string): TpSelection {
    return this.getProfile(accountId).tp_selection;
  }

  getManagementSettings(accountId?: string): ManagementSettings {
    return this.getProfile(accountId).management;
  }

  /**
   * Preset whose risk fractions match the profile, otherwise 'custom'
   */
  detectProfileName(accountId?: string): RiskProfileName {
    const profile = this.getProfile(accountId);
    const match = PRESET_NAMES.find(name =>
      RISK_CLASSES.every(
        riskClass =>
          Math.abs(profile[riskClass].default - RISK_PRESETS[name][riskClass].default) < FRACTION_EPSILON &&
          Math.abs(profile[riskClass].reduced - RISK_PRESETS[name][riskClass].reduced) < FRACTION_EPSILON
      )
    );
    return match ?? 'custom';
  }

  async applyPreset(name: RiskPresetName, accountId?: string): Promise<void> {
    const current = this.getProfile(accountId);
    const next = cloneProfile(RISK_PRESETS[name]);
    next.tp_selection = current.tp_selection;
    this.setProfile(next, accountId);
    await this.save();
    logger.info(`[RiskProfileStore] Applied ${name} preset to ${accountId ?? GLOBAL_SCOPE}`);
  }

  async updateRiskFraction(
    riskClass: RiskClass,
    kind: 'default' | 'reduced',
    fraction: number,
    accountId?: string
  ): Promise<void> {
    if (!isValidRiskFraction(fraction)) {
      throw new ValidationError(`Risk fraction must be in (0, 0.10], got ${fraction}`, `${riskClass}.${kind}`);
    }
    const profile = this.getProfile(accountId);
    profile[riskClass] = { ...profile[riskClass], [kind]: fraction };
    this.setProfile(profile, accountId);
    await this.save();
    logger.info(`[RiskProfileStore] ${accountId ?? GLOBAL_SCOPE}: ${riskClass}.${kind} = ${fraction}`);
  }

  async updateDrawdownPercentage(percentage: number, accountId?: string): Promise<void> {
    if (!isValidDrawdownPercentage(percentage)) {
      throw new ValidationError(`Drawdown percentage must be in (0, 100], got ${percentage}`, 'drawdown');
    }
    const profile = this.getProfile(accountId);
    profile.drawdown = { daily_percentage: percentage };
    this.setProfile(profile, accountId);
    await this.save();
    logger.info(`[RiskProfileStore] ${accountId ?? GLOBAL_SCOPE}: daily drawdown = ${percentage}%`);
  }

  async updateTpSelection(
    mode: TpSelectionMode,
    customSelection: number[] = [1, 2, 3],
    accountId?: string
  ): Promise<void> {
    const selection = customSelection.filter(index => Number.isInteger(index) && index >= 1);
    if (mode === 'custom' && selection.length === 0) {
      throw new ValidationError('Custom TP selection needs at least one 1-based index', 'tp_selection');
    }
    const profile = this.getProfile(accountId);
    profile.tp_selection = {
      mode,
      custom_selection: selection.length > 0 ? selection : [1, 2, 3],
    };
    this.setProfile(profile, accountId);
    await this.save();
    logger.info(`[RiskProfileStore] ${accountId ?? GLOBAL_SCOPE}: TP selection = ${mode}`);
  }

  async updateManagementSettings(updates: Partial<ManagementSettings>, accountId?: string): Promise<void> {
    const percentage = updates.partial_close_percentage;
    if (percentage !== undefined && !(percentage > 0 && percentage <= 100)) {
      throw new ValidationError(`Partial close percentage must be in (0, 100], got ${percentage}`, 'management');
    }
    const profile = this.getProfile(accountId);
    profile.management = { ...profile.management, ...updates };
    this.setProfile(profile, accountId);
    await this.save();
  }

  listAccountIds(): string[] {
    return Object.keys(this.settings.accounts);
  }

  hasAccountSettings(accountId: string): boolean {
    return accountId in this.settings.accounts;
  }

  async deleteAccountSettings(accountId: string): Promise<boolean> {
    if (!this.hasAccountSettings(accountId)) {
      return false;
    }
    delete this.settings.accounts[accountId];
    await this.save();
    logger.info(`[RiskProfileStore] Removed override for account ${accountId}`);
    return true;
  }

  /**
   * Copy a profile to an account. `fromAccountId` of 'global' copies the global default.
   */
  async copyAccountSettings(fromAccountId: string, toAccountId: string): Promise<void> {
    const source =
      fromAccountId === GLOBAL_SCOPE ? this.settings.global_default : this.settings.accounts[fromAccountId];
    if (!source) {
      throw new NotFoundError(`Risk settings for account ${fromAccountId}`);
    }
    this.settings.accounts[toAccountId] = cloneProfile(source);
    await this.save();
    logger.info(`[RiskProfileStore] Copied settings ${fromAccountId} -> ${toAccountId}`);
  }

  private setProfile(profile: RiskProfileSettings, accountId?: string): void {
    if (accountId) {
      this.settings.accounts[accountId] = profile;
    } else {
      this.settings.global_default = profile;
    }
  }
}
