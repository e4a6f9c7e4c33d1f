/**
 * Instrument Normalizer
 *
 * Maps free-text / broker instrument names to canonical symbols and back to
 * the platform's tradable names.
 */

import { Logger } from '@signalbridge/shared-utils';
import { MatchStrategy, runStrategyChain } from '../utils/strategyChain';

const logger = new Logger('InstrumentNormalizer');

export const STANDARD_INSTRUMENTS: readonly string[] = [
  'EURUSD',
  'GBPUSD',
  'USDJPY',
  'AUDUSD',
  'USDCAD',
  'NZDUSD',
  'USDCHF',
  'XAUUSD',
  'XAGUSD',
  'DJI30',
  'NDX100',
];

export const INDEX_INSTRUMENTS: readonly string[] = ['DJI30', 'NDX100'];

/**
 * Alias -> canonical symbol. Matched case-insensitively, exact first, then as a substring.
 */
export const INSTRUMENT_ALIASES: Readonly<Record<string, string>> = {
  US30: 'DJI30',
  DOW: 'DJI30',
  DJ30: 'DJI30',
  NAS100: 'NDX100',
  NSDQ: 'NDX100',
  NASDAQ: 'NDX100',
  GOLD: 'XAUUSD',
  SILVER: 'XAGUSD',
};

/**
 * Canonical symbol -> platform names to try, in preference order
 */
export const PLATFORM_NAMES: Readonly<Record<string, readonly string[]>> = {
  DJI30: ['DJI30', 'DOW.C', 'US30.C', 'US30', 'DOW'],
  NDX100: ['NDX100', 'NSDQ.C', 'NAS100.C', 'NAS100'],
  XAUUSD: ['XAUUSD', 'XAUUSD.C', 'GOLD'],
  XAGUSD: ['XAGUSD', 'XAGUSD.C', 'SILVER'],
};

export const PLATFORM_SUFFIXES: readonly string[] = ['.C', '.X', '.Z'];

const SUFFIX_PATTERN = /\.(C|X|Z)$/;
const FOREX_PAIR_PATTERN = /^[A-Z]{6}$/;

// Longest alias first so NASDAQ wins over any shorter alias it contains
const ALIASES_BY_LENGTH = Object.entries(INSTRUMENT_ALIASES).sort(
  ([a], [b]) => b.length - a.length
);

function compact(name: string): string {
  return name.trim().toUpperCase().replace(/[\s/]+/g, '');
}

export function stripPlatformSuffix(name: string): string {
  return name.replace(SUFFIX_PATTERN, '');
}

/**
 * Canonical symbol for an instrument name. Unknown names that are not a
 * 6-letter forex pair come back unchanged.
 */
export function normalize(name: string): string {
  const key = compact(name);
  if (!key) {
    return name;
  }
  const base = stripPlatformSuffix(key);

  if (STANDARD_INSTRUMENTS.includes(base)) {
    return base;
  }
  const exact = INSTRUMENT_ALIASES[base];
  if (exact) {
    return exact;
  }
  for (const [alias, canonical] of ALIASES_BY_LENGTH) {
    if (base.includes(alias)) {
      return canonical;
    }
  }
  if (FOREX_PAIR_PATTERN.test(base)) {
    return base;
  }
  return name;
}

export function isIndexInstrument(name: string): boolean {
  return INDEX_INSTRUMENTS.includes(normalize(name));
}

interface ResolveInput {
  canonical: string;
  available: readonly string[];
}

const PLATFORM_RESOLVERS: ReadonlyArray<MatchStrategy<ResolveInput, string>> = [
  {
    name: 'exact',
    match: ({ canonical, available }) => (available.includes(canonical) ? canonical : null),
  },
  {
    name: 'platform-table',
    match: ({ canonical, available }) =>
      (PLATFORM_NAMES[canonical] ?? []).find(candidate => available.includes(candidate)) ?? null,
  },
  {
    name: 'suffix',
    match: ({ canonical, available }) =>
      PLATFORM_SUFFIXES.map(suffix => `${canonical}${suffix}`).find(candidate =>
        available.includes(candidate)
      ) ?? null,
  },
  {
    name: 'case-insensitive',
    match: ({ canonical, available }) =>
      available.find(candidate => candidate.toUpperCase() === canonical.toUpperCase()) ?? null,
  },
  {
    name: 'normalized',
    match: ({ canonical, available }) =>
      available.find(candidate => normalize(candidate) === canonical) ?? null,
  },
];

/**
 * Platform name for a canonical symbol, given the broker's instrument names.
 * Falls back to the canonical name when nothing resolves.
 */
export function resolvePlatformName(canonical: string, available: readonly string[]): string {
  const match = runStrategyChain(PLATFORM_RESOLVERS, { canonical, available });
  if (!match) {
    logger.warn(`[InstrumentNormalizer] No platform name for ${canonical}, using canonical name`);
    return canonical;
  }
  if (match.result !== canonical) {
    logger.debug(`[InstrumentNormalizer] ${canonical} -> ${match.result} (${match.strategy})`);
  }
  return match.result;
}
