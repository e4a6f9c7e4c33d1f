export interface CorrelationConfig {
  maxSignalAgeHours: number;
  sameSourceOnly: boolean;
  fallbackProtection: boolean; // cancel every pending order when no signal matches
  tpPriceTolerance: number; // fraction of the expected TP price
  perInstrumentCapacity: number;
  globalCapacity: number;
  orderCacheRetentionDays: number;
  breakevenBufferPips: number;
  minContentMatchScore: number;
}

export function getCorrelationConfig(): CorrelationConfig {
  return {
    maxSignalAgeHours: parseFloat(process.env.SIGNAL_MAX_AGE_HOURS || '48'),
    sameSourceOnly: process.env.SIGNAL_SAME_SOURCE_ONLY !== 'false', // Default: true
    fallbackProtection: process.env.FALLBACK_PROTECTION === 'true', // Default: false
    tpPriceTolerance: parseFloat(process.env.TP_PRICE_TOLERANCE || '0.001'),
    perInstrumentCapacity: parseInt(process.env.SIGNAL_HISTORY_PER_INSTRUMENT || '10', 10),
    globalCapacity: parseInt(process.env.SIGNAL_HISTORY_GLOBAL || '50', 10),
    orderCacheRetentionDays: parseFloat(process.env.ORDER_CACHE_RETENTION_DAYS || '2'),
    breakevenBufferPips: parseFloat(process.env.BREAKEVEN_BUFFER_PIPS || '2'),
    minContentMatchScore: parseFloat(process.env.MIN_CONTENT_MATCH_SCORE || '40'),
  };
}
