import dotenv from 'dotenv';
import path from 'path';

// Load .env from root (works with CommonJS output)
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });

export * from './DrawdownConfig';
export * from './PositionMonitorConfig';
export * from './CorrelationConfig';

export interface SignalEngineConfig {
  timezone: string;
  dataDir: string;
  accountsConfigPath: string;
  marketThresholdPips: number;
  brokerPriceOffsets: string; // "DJI30:46,NDX100:0"
  indexTpBufferInstrument: string;
  indexTpBufferPoints: number;
  parseCacheClearHours: number;
  instrumentCacheTtlMinutes: number;
  marginRetryAttempts: number;
  maxSignalAgeSeconds: number; // 0 disables the check
}

export interface BrokerConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  maxAttempts: number;
  writeSpacingMs: number;
}

export interface ExtractionConfig {
  openaiApiKey: string;
  model: string;
  timeoutMs: number;
}

export function getSignalEngineConfig(): SignalEngineConfig {
  return {
    timezone: process.env.SIGNALBRIDGE_TIMEZONE || 'America/New_York',
    dataDir: process.env.SIGNALBRIDGE_DATA_DIR || '',
    accountsConfigPath: process.env.ACCOUNTS_CONFIG_PATH || '',
    marketThresholdPips: parseFloat(process.env.MARKET_THRESHOLD_PIPS || '10'),
    brokerPriceOffsets: process.env.BROKER_PRICE_OFFSETS || '',
    indexTpBufferInstrument: process.env.INDEX_TP_BUFFER_INSTRUMENT || 'DJI30',
    indexTpBufferPoints: parseFloat(process.env.INDEX_TP_BUFFER_POINTS || '0'),
    parseCacheClearHours: parseFloat(process.env.PARSE_CACHE_CLEAR_HOURS || '24'),
    instrumentCacheTtlMinutes: parseFloat(process.env.INSTRUMENT_CACHE_TTL_MINUTES || '60'),
    marginRetryAttempts: parseInt(process.env.MARGIN_RETRY_ATTEMPTS || '3', 10),
    maxSignalAgeSeconds: parseInt(process.env.MAX_SIGNAL_AGE_SECONDS || '180', 10),
  };
}

export function getBrokerConfig(): BrokerConfig {
  return {
    baseUrl: process.env.BROKER_BASE_URL || 'http://localhost:4001',
    apiKey: process.env.BROKER_API_KEY || '',
    timeoutMs: parseInt(process.env.BROKER_TIMEOUT_MS || '10000', 10),
    maxAttempts: parseInt(process.env.BROKER_MAX_ATTEMPTS || '3', 10),
    writeSpacingMs: parseInt(process.env.BROKER_WRITE_SPACING_MS || '1100', 10),
  };
}

export function getExtractionConfig(): ExtractionConfig {
  return {
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.EXTRACTION_MODEL || 'gpt-4o',
    timeoutMs: parseInt(process.env.EXTRACTION_TIMEOUT_MS || '20000', 10),
  };
}
