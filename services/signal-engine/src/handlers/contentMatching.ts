/**
 * Scoring of free-text management messages against recorded signals and
 * open positions, for messages that name neither an instrument nor a reply target
 */

import { OpenPosition, OrderSide, Signal } from '@signalbridge/shared-types';
import { extractInstrumentFromText } from '../instruments/instrumentText';
import { normalize } from '../instruments/InstrumentNormalizer';

export interface TradingParameters {
  instrument: string | null;
  side: OrderSide | null;
  entry: number | null;
  stopLoss: number | null;
  takeProfits: number[];
  prices: number[];
}

const SCORE_INSTRUMENT = 30;
const SCORE_SIDE = 20;
const SCORE_PRICE = 25;
const SCORE_WORDS = 25;
const PRICE_TOLERANCE = 0.01;

const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'to', 'at', 'in', 'on', 'of', 'for', 'is', 'it', 'this', 'that',
  'now', 'be', 'we', 'you', 'your', 'our', 'all', 'with', 'move', 'sl', 'tp', 'close', 'guys',
]);

function firstNumber(pattern: RegExp, text: string): number | null {
  const match = pattern.exec(text);
  return match ? parseFloat(match[1]) : null;
}

export function extractTradingParameters(text: string): TradingParameters {
  const side = /\b(?:buy|long)\b/i.test(text) ? 'buy' : /\b(?:sell|short)\b/i.test(text) ? 'sell' : null;
  const takeProfits = Array.from(text.matchAll(/\btp\s*\d?\s*:?\s*(\d+(?:\.\d+)?)/gi), match =>
    parseFloat(match[1])
  );
  const prices = Array.from(text.matchAll(/\b\d+\.\d+\b|\b\d{3,}\b/g), match => parseFloat(match[0]));
  return {
    instrument: extractInstrumentFromText(text),
    side,
    entry: firstNumber(/\b(?:entry|enter|price)\s*:?\s*@?\s*(\d+(?:\.\d+)?)/i, text) ?? firstNumber(/@\s*(\d+(?:\.\d+)?)/, text),
    stopLoss: firstNumber(/\b(?:sl|stop\s*loss|stop)\s*:?\s*(\d+(?:\.\d+)?)/i, text),
    takeProfits,
    prices,
  };
}

function significantWords(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9.]+/)
      .filter(word => word.length > 1 && !STOP_WORDS.has(word))
  );
}

/**
 * Jaccard similarity of significant words
 */
export function wordSimilarity(a: string, b: string): number {
  const wordsA = significantWords(a);
  const wordsB = significantWords(b);
  if (wordsA.size === 0 || wordsB.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) {
      shared += 1;
    }
  }
  return shared / (wordsA.size + wordsB.size - shared);
}

function near(reference: number, price: number): boolean {
  return Math.abs(reference - price) <= Math.abs(reference) * PRICE_TOLERANCE;
}

export function scoreSignal(signal: Signal, params: TradingParameters, text: string): number {
  let score = 0;
  if (params.instrument && params.instrument === normalize(signal.instrument)) {
    score += SCORE_INSTRUMENT;
  }
  if (params.side && params.side === signal.side) {
    score += SCORE_SIDE;
  }
  const levels = [signal.entryPoint, signal.stopLoss, ...signal.takeProfits];
  if (params.prices.some(price => levels.some(level => near(level, price)))) {
    score += SCORE_PRICE;
  }
  score += Math.round(wordSimilarity(text, signal.rawMessage) * SCORE_WORDS);
  return score;
}

export function scorePosition(position: OpenPosition, params: TradingParameters): number {
  let score = 0;
  if (params.instrument && params.instrument === normalize(position.instrument)) {
    score += SCORE_INSTRUMENT;
  }
  if (params.side && params.side === position.side) {
    score += SCORE_SIDE;
  }
  if (params.prices.some(price => near(position.entryPrice, price))) {
    score += SCORE_PRICE;
  }
  return score;
}
