import { RiskClass } from '@signalbridge/shared-types';

export type RiskPresetName = 'conservative' | 'balanced' | 'aggressive';
export type RiskProfileName = RiskPresetName | 'custom';

export type TpSelectionMode = 'all' | 'first_only' | 'first_two' | 'custom';

export const RISK_CLASSES: readonly RiskClass[] = ['FOREX', 'CFD', 'XAUUSD'];
export const TP_SELECTION_MODES: readonly TpSelectionMode[] = ['all', 'first_only', 'first_two', 'custom'];

export const MAX_RISK_FRACTION = 0.1;

export interface RiskFractions {
  default: number;
  reduced: number;
}

export interface TpSelection {
  mode: TpSelectionMode;
  custom_selection: number[]; // 1-based TP indices, used when mode is 'custom'
}

export interface ManagementSettings {
  auto_breakeven: boolean;
  auto_close_early: boolean;
  require_confirmation: boolean;
  partial_close_percentage: number;
}

/**
 * Persisted profile shape (snake_case, as stored in risk_settings.json)
 */
export interface RiskProfileSettings {
  FOREX: RiskFractions;
  CFD: RiskFractions;
  XAUUSD: RiskFractions;
  drawdown: { daily_percentage: number };
  tp_selection: TpSelection;
  management: ManagementSettings;
}

export interface RiskSettingsFile {
  global_default: RiskProfileSettings;
  accounts: Record<string, RiskProfileSettings>;
}

function preset(
  defaultFraction: number,
  dailyPercentage: number,
  management: ManagementSettings
): RiskProfileSettings {
  const fractions = { default: defaultFraction, reduced: defaultFraction / 2 };
  return {
    FOREX: { ...fractions },
    CFD: { ...fractions },
    XAUUSD: { ...fractions },
    drawdown: { daily_percentage: dailyPercentage },
    tp_selection: { mode: 'all', custom_selection: [1, 2, 3, 4] },
    management,
  };
}

export const RISK_PRESETS: Readonly<Record<RiskPresetName, RiskProfileSettings>> = {
  conservative: preset(0.005, 3, {
    auto_breakeven: true,
    auto_close_early: false,
    require_confirmation: true,
    partial_close_percentage: 50,
  }),
  balanced: preset(0.01, 4, {
    auto_breakeven: true,
    auto_close_early: true,
    require_confirmation: false,
    partial_close_percentage: 50,
  }),
  aggressive: preset(0.015, 5, {
    auto_breakeven: true,
    auto_close_early: true,
    require_confirmation: false,
    partial_close_percentage: 50,
  }),
};

export const DEFAULT_PRESET: RiskPresetName = 'balanced';

export function cloneProfile(profile: RiskProfileSettings): RiskProfileSettings {
  return {
    FOREX: { ...profile.FOREX },
    CFD: { ...profile.CFD },
    XAUUSD: { ...profile.XAUUSD },
    drawdown: { ...profile.drawdown },
    tp_selection: { mode: profile.tp_selection.mode, custom_selection: [...profile.tp_selection.custom_selection] },
    management: { ...profile.management },
  };
}

export function isValidRiskFraction(value: number): boolean {
  return Number.isFinite(value) && value > 0 && value <= MAX_RISK_FRACTION;
}

export function isValidDrawdownPercentage(value: number): boolean {
  return Number.isFinite(value) && value > 0 && value <= 100;
}
