import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  getBrokerConfig,
  getCorrelationConfig,
  getDrawdownConfig,
  getPositionMonitorConfig,
  getSignalEngineConfig,
} from '../src';

const KEYS = [
  'BROKER_BASE_URL',
  'BROKER_MAX_ATTEMPTS',
  'BROKER_WRITE_SPACING_MS',
  'DRAWDOWN_RESET_CRON',
  'SIGNALBRIDGE_TIMEZONE',
  'POSITION_MONITOR_ENABLED',
  'MONITOR_BREAKEVEN_THRESHOLD_PIPS',
  'FALLBACK_PROTECTION',
  'SIGNAL_SAME_SOURCE_ONLY',
  'MARKET_THRESHOLD_PIPS',
  'MAX_SIGNAL_AGE_SECONDS',
];

describe('shared config', () => {
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = {};
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('falls back to defaults', () => {
    expect(getBrokerConfig()).toMatchObject({ baseUrl: 'http://localhost:4001', maxAttempts: 3, writeSpacingMs: 1100 });
    expect(getDrawdownConfig()).toEqual({
      resetCron: '0 19 * * *',
      timezone: 'America/New_York',
      retryBaseMinutes: 5,
      retryMaxMinutes: 60,
    });
    expect(getPositionMonitorConfig()).toMatchObject({ enabled: true, breakevenThresholdPips: 40, cooldownSeconds: 30 });
    expect(getCorrelationConfig()).toMatchObject({ fallbackProtection: false, sameSourceOnly: true, maxSignalAgeHours: 48 });
    expect(getSignalEngineConfig()).toMatchObject({ marketThresholdPips: 10, maxSignalAgeSeconds: 180 });
  });

  it('reads overrides from the environment', () => {
    process.env.BROKER_WRITE_SPACING_MS = '250';
    process.env.SIGNALBRIDGE_TIMEZONE = 'Europe/London';
    process.env.POSITION_MONITOR_ENABLED = 'false';
    process.env.MONITOR_BREAKEVEN_THRESHOLD_PIPS = '25';
    process.env.FALLBACK_PROTECTION = 'true';
    process.env.SIGNAL_SAME_SOURCE_ONLY = 'false';
    process.env.MAX_SIGNAL_AGE_SECONDS = '0';

    expect(getBrokerConfig().writeSpacingMs).toBe(250);
    expect(getDrawdownConfig().timezone).toBe('Europe/London');
    expect(getPositionMonitorConfig()).toMatchObject({ enabled: false, breakevenThresholdPips: 25 });
    expect(getCorrelationConfig()).toMatchObject({ fallbackProtection: true, sameSourceOnly: false });
    expect(getSignalEngineConfig().maxSignalAgeSeconds).toBe(0);
  });
});
