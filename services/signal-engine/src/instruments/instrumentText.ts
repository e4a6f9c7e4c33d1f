import { STANDARD_INSTRUMENTS } from './InstrumentNormalizer';

export const CURRENCY_CODES: readonly string[] = [
  'USD', 'EUR', 'GBP', 'JPY', 'AUD', 'NZD', 'CAD', 'CHF',
];

const FOREX_CROSSES: readonly string[] = [
  'EURGBP', 'EURJPY', 'EURAUD', 'EURCAD', 'EURCHF', 'EURNZD',
  'GBPJPY', 'GBPAUD', 'GBPCAD', 'GBPCHF', 'GBPNZD',
  'AUDJPY', 'AUDCAD', 'AUDNZD', 'AUDCHF',
  'CADJPY', 'CHFJPY', 'NZDJPY', 'NZDCAD',
];

function pairPattern(pair: string): RegExp {
  const base = pair.slice(0, 3);
  const quote = pair.slice(3);
  return new RegExp(`\\b${base}\\s*\\/?\\s*${quote}(?:\\.[cxz])?\\b`, 'i');
}

/**
 * Canonical instrument -> pattern recognising it in free text
 */
const NAMED_PATTERNS: ReadonlyArray<[string, RegExp]> = [
  ['XAUUSD', /\b(?:xau\s*\/?\s*usd(?:\.[cxz])?|gold)\b/i],
  ['XAGUSD', /\b(?:xag\s*\/?\s*usd(?:\.[cxz])?|silver)\b/i],
  ['DJI30', /\b(?:dji\s*30|us\s*30(?:\.[cxz])?|dj\s*30|dow(?:\s*jones)?(?:\.[cxz])?)\b/i],
  ['NDX100', /\b(?:ndx\s*100|nas\s*100(?:\.[cxz])?|nsdq(?:\.[cxz])?|nasdaq)\b/i],
];

const INSTRUMENT_PATTERNS: ReadonlyArray<[string, RegExp]> = [
  ...NAMED_PATTERNS,
  ...[...STANDARD_INSTRUMENTS, ...FOREX_CROSSES]
    .filter(symbol => /^[A-Z]{6}$/.test(symbol) && !symbol.startsWith('XA'))
    .map((pair): [string, RegExp] => [pair, pairPattern(pair)]),
];

const GENERIC_PAIR = /\b([A-Za-z]{3})\s*\/?\s*([A-Za-z]{3})\b/g;

/**
 * Canonical instrument named in free text, or null. When several are named,
 * the one appearing first wins.
 */
export function extractInstrumentFromText(text: string): string | null {
  let best: { symbol: string; index: number } | null = null;
  for (const [symbol, pattern] of INSTRUMENT_PATTERNS) {
    const match = pattern.exec(text);
    if (match && (best === null || match.index < best.index)) {
      best = { symbol, index: match.index };
    }
  }
  if (best) {
    return best.symbol;
  }

  // Any pair of known currency codes, e.g. "NZD/CHF"
  for (const match of text.matchAll(GENERIC_PAIR)) {
    const base = match[1].toUpperCase();
    const quote = match[2].toUpperCase();
    if (base !== quote && CURRENCY_CODES.includes(base) && CURRENCY_CODES.includes(quote)) {
      return `${base}${quote}`;
    }
  }
  return null;
}
