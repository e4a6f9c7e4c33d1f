import { InstrumentClass, RiskClass } from '@signalbridge/shared-types';
import { normalize } from './InstrumentNormalizer';

/**
 * Instrument family from the name alone (suffixes and aliases allowed)
 */
export function classifyInstrument(name: string): InstrumentClass {
  const canonical = normalize(name).toUpperCase();
  switch (canonical) {
    case 'XAUUSD':
      return 'GOLD';
    case 'XAGUSD':
      return 'SILVER';
    case 'DJI30':
      return 'US30';
    case 'NDX100':
      return 'NASDAQ';
  }
  if (/^[A-Z]{6}$/.test(canonical)) {
    return canonical.endsWith('JPY') ? 'JPY_FOREX' : 'FOREX';
  }
  return 'OTHER';
}

export function isIndexClass(instrumentClass: InstrumentClass): boolean {
  return instrumentClass === 'US30' || instrumentClass === 'NASDAQ';
}

/**
 * Price change of one pip (or index point) for the instrument
 */
export function pipSize(name: string): number {
  switch (classifyInstrument(name)) {
    case 'JPY_FOREX':
      return 0.01;
    case 'GOLD':
      return 0.1;
    case 'SILVER':
      return 0.01;
    case 'US30':
    case 'NASDAQ':
      return 1.0;
    default:
      return 0.0001;
  }
}

/**
 * Risk profile bucket. The broker's type only decides for unrecognised names.
 */
export function riskClassFor(name: string, brokerType: string | null = null): RiskClass {
  switch (classifyInstrument(name)) {
    case 'GOLD':
      return 'XAUUSD';
    case 'FOREX':
    case 'JPY_FOREX':
      return 'FOREX';
    case 'SILVER':
    case 'US30':
    case 'NASDAQ':
      return 'CFD';
    default:
      return brokerType && brokerType.toUpperCase().includes('CFD') ? 'CFD' : 'FOREX';
  }
}
