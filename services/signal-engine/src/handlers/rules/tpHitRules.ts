import { extractInstrumentFromText } from '../../instruments/instrumentText';
import { TextRule, captureFirst, matchRule } from './ruleTable';

const NUMBER = '(\\d+(?:\\.\\d+)?)';

export const TP_HIT_RULES: ReadonlyArray<TextRule<'tp_hit'>> = [
  { id: 'tp_n_hit', intent: 'tp_hit', pattern: /\btp\s*[1-4]\s*(?:is\s+)?(?:hit|reached|done|smashed)\b/i },
  { id: 'take_profit_n_hit', intent: 'tp_hit', pattern: /\btake\s*profit\s*[1-4]\s*(?:hit|reached)\b/i },
  { id: 'target_n_hit', intent: 'tp_hit', pattern: /\btarget\s*[1-4]\s*(?:hit|reached|done)\b/i },
  { id: 'secured_at_tp', intent: 'tp_hit', pattern: /\bsecured\s*[1-4]\s*at\s*tp\b/i },
  { id: 'closed_at_profit', intent: 'tp_hit', pattern: /\bclosed\s*[1-4]\s*at\s*profit\b/i },
];

const TP_LEVEL_PATTERNS: readonly RegExp[] = [
  /\btp\s*([1-4])\b/i,
  /\btake\s*profit\s*([1-4])\b/i,
  /\btarget\s*([1-4])\b/i,
  /\bsecured\s*([1-4])\b/i,
  /\bclosed\s*([1-4])\b/i,
];

const TP_PRICE_PATTERNS: readonly RegExp[] = [
  new RegExp(`@\\s*${NUMBER}`),
  new RegExp(`\\bat\\s*${NUMBER}`, 'i'),
  new RegExp(`\\bprice\\s*:?\\s*${NUMBER}`, 'i'),
  /\btp\s*[1-4]\s*:\s*(\d+(?:\.\d+)?)/i,
];

const HINT_PATTERNS: readonly RegExp[] = [
  /\bsignal\s*id\s*:?\s*([A-Za-z0-9_-]+)/i,
  /\bref\s*:?\s*([A-Za-z0-9_-]+)/i,
  new RegExp(`\\bentry\\s*:?\\s*${NUMBER}`, 'i'),
];

export interface TpHitDetection {
  ruleId: string;
  instrument: string | null;
  tpLevel: number | null;
  tpPrice: number | null;
  hint: string | null;
}

export function detectTpHit(text: string): TpHitDetection | null {
  const rule = matchRule(TP_HIT_RULES, text);
  if (!rule) {
    return null;
  }
  const level = captureFirst(TP_LEVEL_PATTERNS, text);
  const price = captureFirst(TP_PRICE_PATTERNS, text);
  return {
    ruleId: rule.id,
    instrument: extractInstrumentFromText(text),
    tpLevel: level !== null ? parseInt(level, 10) : null,
    tpPrice: price !== null ? parseFloat(price) : null,
    hint: captureFirst(HINT_PATTERNS, text),
  };
}
