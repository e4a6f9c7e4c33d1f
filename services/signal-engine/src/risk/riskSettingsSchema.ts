/**
 * Decoding of risk_settings.json. Sections that are missing or invalid are
 * replaced by the default preset and reported as repairs.
 */

import {
  DEFAULT_PRESET,
  ManagementSettings,
  RISK_CLASSES,
  RISK_PRESETS,
  RiskFractions,
  RiskProfileSettings,
  RiskSettingsFile,
  TP_SELECTION_MODES,
  TpSelection,
  TpSelectionMode,
  cloneProfile,
  isValidDrawdownPercentage,
  isValidRiskFraction,
} from './riskProfiles';

export interface DecodedRiskSettings {
  settings: RiskSettingsFile;
  repairs: string[];
  migrated: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeFractions(value: unknown): RiskFractions | null {
  if (!isRecord(value)) {
    return null;
  }
  const { default: defaultFraction, reduced } = value;
  if (typeof defaultFraction !== 'number' || typeof reduced !== 'number') {
    return null;
  }
  if (!isValidRiskFraction(defaultFraction) || !isValidRiskFraction(reduced)) {
    return null;
  }
  return { default: defaultFraction, reduced };
}

function isTpSelectionMode(value: unknown): value is TpSelectionMode {
  return TP_SELECTION_MODES.some(mode => mode === value);
}

function decodeTpSelection(value: unknown): TpSelection | null {
  if (!isRecord(value) || !isTpSelectionMode(value.mode)) {
    return null;
  }
  const selection = Array.isArray(value.custom_selection)
    ? value.custom_selection.filter((n): n is number => Number.isInteger(n) && n >= 1)
    : [];
  return { mode: value.mode, custom_selection: selection.length > 0 ? selection : [1, 2, 3] };
}

function decodeManagement(value: unknown, fallback: ManagementSettings): ManagementSettings {
  if (!isRecord(value)) {
    return { ...fallback };
  }
  const pick = (key: 'auto_breakeven' | 'auto_close_early' | 'require_confirmation'): boolean => {
    const flag = value[key];
    return typeof flag === 'boolean' ? flag : fallback[key];
  };
  const percentage = value.partial_close_percentage;
  return {
    auto_breakeven: pick('auto_breakeven'),
    auto_close_early: pick('auto_close_early'),
    require_confirmation: pick('require_confirmation'),
    partial_close_percentage:
      typeof percentage === 'number' && percentage > 0 && percentage <= 100
        ? percentage
        : fallback.partial_close_percentage,
  };
}

export function decodeProfile(value: unknown, label: string, repairs: string[]): RiskProfileSettings {
  const fallback = RISK_PRESETS[DEFAULT_PRESET];
  if (!isRecord(value)) {
    repairs.push(`${label}: not an object, using ${DEFAULT_PRESET} preset`);
    return cloneProfile(fallback);
  }

  const profile = cloneProfile(fallback);
  for (const riskClass of RISK_CLASSES) {
    const fractions = decodeFractions(value[riskClass]);
    if (fractions) {
      profile[riskClass] = fractions;
    } else {
      repairs.push(`${label}.${riskClass}: invalid risk fractions`);
    }
  }

  const drawdown = isRecord(value.drawdown) ? value.drawdown.daily_percentage : undefined;
  if (typeof drawdown === 'number' && isValidDrawdownPercentage(drawdown)) {
    profile.drawdown = { daily_percentage: drawdown };
  } else {
    repairs.push(`${label}.drawdown: invalid daily_percentage`);
  }

  if (value.tp_selection !== undefined) {
    const selection = decodeTpSelection(value.tp_selection);
    if (selection) {
      profile.tp_selection = selection;
    } else {
      repairs.push(`${label}.tp_selection: invalid`);
    }
  }

  profile.management = decodeManagement(value.management, fallback.management);
  return profile;
}

/**
 * Decode file contents. A legacy flat file (a bare profile with neither
 * `global_default` nor `accounts`) becomes the global default.
 */
export function decodeRiskSettings(raw: unknown): DecodedRiskSettings {
  const repairs: string[] = [];
  if (!isRecord(raw)) {
    repairs.push('settings file is not an object');
    return {
      settings: { global_default: cloneProfile(RISK_PRESETS[DEFAULT_PRESET]), accounts: {} },
      repairs,
      migrated: false,
    };
  }

  if (!('global_default' in raw) && !('accounts' in raw)) {
    return {
      settings: { global_default: decodeProfile(raw, 'global_default', repairs), accounts: {} },
      repairs,
      migrated: true,
    };
  }

  const accounts: Record<string, RiskProfileSettings> = {};
  if (isRecord(raw.accounts)) {
    for (const [accountId, profile] of Object.entries(raw.accounts)) {
      accounts[accountId] = decodeProfile(profile, `accounts.${accountId}`, repairs);
    }
  } else if (raw.accounts !== undefined) {
    repairs.push('accounts: not an object');
  }

  return {
    settings: {
      global_default: decodeProfile(raw.global_default, 'global_default', repairs),
      accounts,
    },
    repairs,
    migrated: false,
  };
}
