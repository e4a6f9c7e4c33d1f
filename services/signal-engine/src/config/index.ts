import path from 'path';
import {
  getSignalEngineConfig as getBaseConfig,
  getBrokerConfig,
  getExtractionConfig,
  getDrawdownConfig,
  getPositionMonitorConfig,
  getCorrelationConfig,
  BrokerConfig,
  ExtractionConfig,
  DrawdownConfig,
  PositionMonitorConfig,
  CorrelationConfig,
} from '@signalbridge/shared-config';

export interface SignalEngineConfig {
  timezone: string;

  // Persisted state
  riskSettingsPath: string;
  drawdownStatePath: string;
  orderCachePath: string;
  accountsConfigPath: string;

  // Parsing
  brokerPriceOffsets: Record<string, number>; // canonical instrument -> additive offset
  indexTpBuffer: { instrument: string; points: number };
  parseCacheClearHours: number;
  instrumentCacheTtlMinutes: number;

  // Execution
  marketThresholdPips: number;
  marginRetryAttempts: number;
  maxSignalAgeSeconds: number;

  broker: BrokerConfig;
  extraction: ExtractionConfig;
  drawdown: DrawdownConfig;
  monitor: PositionMonitorConfig;
  correlation: CorrelationConfig;
}

/**
 * Parse "SYMBOL:offset,SYMBOL:offset" (e.g. "DJI30:46,NDX100:0")
 */
export function parsePriceOffsets(raw: string): Record<string, number> {
  const offsets: Record<string, number> = {};
  if (!raw) {
    return offsets;
  }
  raw.split(',').forEach(entry => {
    const [symbol, value] = entry.split(':');
    const offset = value !== undefined ? parseFloat(value) : NaN;
    if (symbol && Number.isFinite(offset)) {
      offsets[symbol.trim().toUpperCase()] = offset;
    }
  });
  return offsets;
}

export function getConfig(): SignalEngineConfig {
  const baseConfig = getBaseConfig();
  const dataDir = baseConfig.dataDir || path.resolve(__dirname, '../../data');

  return {
    timezone: baseConfig.timezone,

    riskSettingsPath: path.join(dataDir, 'risk_settings.json'),
    drawdownStatePath: path.join(dataDir, 'drawdown_state.json'),
    orderCachePath: path.join(dataDir, 'order_cache.json'),
    accountsConfigPath:
      baseConfig.accountsConfigPath || path.resolve(__dirname, '../../configs/accounts.json'),

    brokerPriceOffsets: parsePriceOffsets(baseConfig.brokerPriceOffsets),
    indexTpBuffer: {
      instrument: baseConfig.indexTpBufferInstrument.toUpperCase(),
      points: baseConfig.indexTpBufferPoints,
    },
    parseCacheClearHours: baseConfig.parseCacheClearHours,
    instrumentCacheTtlMinutes: baseConfig.instrumentCacheTtlMinutes,

    marketThresholdPips: baseConfig.marketThresholdPips,
    marginRetryAttempts: baseConfig.marginRetryAttempts,
    maxSignalAgeSeconds: baseConfig.maxSignalAgeSeconds,

    broker: getBrokerConfig(),
    extraction: getExtractionConfig(),
    drawdown: getDrawdownConfig(),
    monitor: getPositionMonitorConfig(),
    correlation: getCorrelationConfig(),
  };
}
