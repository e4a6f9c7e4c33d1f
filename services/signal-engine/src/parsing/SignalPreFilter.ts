/**
 * Cheap checks run before a message is sent for structured extraction
 */

import { extractInstrumentFromText } from '../instruments/instrumentText';

const ACTION_TERMS = /\b(?:buy|sell|long|short|entry|enter)\b/i;

// A decimal price or a whole number of 3+ digits ("TP 1" does not count)
const PRICE_PATTERN = /\b\d+\.\d+\b|\b\d{3,}\b/;

const EMOJI_PATTERN = /\p{Extended_Pictographic}/gu;
const MAX_EMOJIS = 5;
const MAX_EMOJI_PER_WORD = 0.5;

const MIN_WORDS = 3;

// Result announcements: "80 pips secured", "TP2 hit", "SL hit"
const NON_ACTIONABLE_PATTERNS: readonly RegExp[] = [
  /\b\d+\s*pips?\s*(?:secured|hit|banked|locked|in\s+profit|running)\b/i,
  /\bpips?\s+(?:secured|banked)\b/i,
  /\b(?:tp|target)\s*\d?\s*(?:hit|reached|smashed)\b/i,
  /\bsl\s*hit\b/i,
  /\bstopped\s+out\b/i,
];

export type PreFilterRejection =
  | 'no_action_term'
  | 'no_instrument'
  | 'no_price'
  | 'too_short'
  | 'emoji_announcement'
  | 'result_announcement';

export type PreFilterResult = { pass: true } | { pass: false; reason: PreFilterRejection };

function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

export function evaluatePreFilter(text: string): PreFilterResult {
  const words = countWords(text);
  if (words < MIN_WORDS) {
    return { pass: false, reason: 'too_short' };
  }
  if (!ACTION_TERMS.test(text)) {
    return { pass: false, reason: 'no_action_term' };
  }
  if (extractInstrumentFromText(text) === null) {
    return { pass: false, reason: 'no_instrument' };
  }
  if (!PRICE_PATTERN.test(text)) {
    return { pass: false, reason: 'no_price' };
  }
  const emojis = text.match(EMOJI_PATTERN)?.length ?? 0;
  if (emojis > MAX_EMOJIS || emojis / words > MAX_EMOJI_PER_WORD) {
    return { pass: false, reason: 'emoji_announcement' };
  }
  if (NON_ACTIONABLE_PATTERNS.some(pattern => pattern.test(text))) {
    return { pass: false, reason: 'result_announcement' };
  }
  return { pass: true };
}

export function isPotentialTradingSignal(text: string): boolean {
  return evaluatePreFilter(text).pass;
}
