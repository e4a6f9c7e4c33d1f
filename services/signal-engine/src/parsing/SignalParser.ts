/**
 * Signal Parser
 *
 * Raw message text -> ParsedSignal. Pre-filter first, then structured
 * extraction, validation, risk flag and broker price adjustment.
 * Results, including nulls, are cached by exact message text.
 */

import { ParsedSignal } from '@signalbridge/shared-types';
import { Logger, errorMessage } from '@signalbridge/shared-utils';
import { SignalExtractionClient } from './ExtractionClient';
import { evaluatePreFilter } from './SignalPreFilter';
import { validateExtraction } from './signalValidation';
import { detectReducedRisk } from './reducedRisk';
import { PriceAdjustmentPolicy, applyPriceAdjustment } from './priceAdjustment';

const logger = new Logger('SignalParser');

export interface SignalParserOptions {
  priceAdjustment: PriceAdjustmentPolicy;
  cacheClearIntervalMs: number;
}

export class SignalParser {
  private cache: Map<string, ParsedSignal | null> = new Map();
  private clearTimer: NodeJS.Timeout | null = null;

  constructor(
    private extraction: SignalExtractionClient,
    private options: SignalParserOptions
  ) {}

  /**
   * Start the periodic cache clear
   */
  start(): void {
    if (this.clearTimer) {
      return;
    }
    this.clearTimer = setInterval(() => this.clearCache(), this.options.cacheClearIntervalMs);
    this.clearTimer.unref();
  }

  stop(): void {
    if (this.clearTimer) {
      clearInterval(this.clearTimer);
      this.clearTimer = null;
    }
  }

  clearCache(): void {
    const size = this.cache.size;
    this.cache.clear();
    logger.info(`[SignalParser] Cleared ${size} cached parse result(s)`);
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  async parse(message: string): Promise<ParsedSignal | null> {
    const cached = this.cache.get(message);
    if (cached !== undefined) {
      return cached;
    }

    const result = await this.parseUncached(message);
    this.cache.set(message, result);
    return result;
  }

  private async parseUncached(message: string): Promise<ParsedSignal | null> {
    const preFilter = evaluatePreFilter(message);
    if (!preFilter.pass) {
      logger.debug(`[SignalParser] Pre-filter rejected message (${preFilter.reason})`);
      return null;
    }

    let reply: unknown;
    try {
      reply = await this.extraction.extract(message);
    } catch (error) {
      logger.warn(`[SignalParser] Extraction failed: ${errorMessage(error)}`);
      return null;
    }

    const validation = validateExtraction(reply);
    if (!validation.ok) {
      logger.info(`[SignalParser] Message dropped: ${validation.reason}`);
      return null;
    }

    const adjusted = applyPriceAdjustment(validation.signal, this.options.priceAdjustment);
    const parsed: ParsedSignal = {
      ...adjusted,
      reducedRisk: detectReducedRisk(message),
    };

    logger.info(
      `[SignalParser] Parsed ${parsed.side.toUpperCase()} ${parsed.instrument} entry=${parsed.entryPoint} ` +
        `sl=${parsed.stopLoss} tps=[${parsed.takeProfits.join(', ')}]` +
        (parsed.reducedRisk ? ' (reduced risk)' : '')
    );
    return parsed;
  }
}
