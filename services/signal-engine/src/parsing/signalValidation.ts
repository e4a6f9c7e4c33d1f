import { OrderSide } from '@signalbridge/shared-types';
import { isIndexInstrument, normalize } from '../instruments/InstrumentNormalizer';

export const MAX_TAKE_PROFITS = 3;

/**
 * Extraction reply after validation (before risk flags and price adjustment)
 */
export interface ExtractedSignal {
  instrument: string;
  side: OrderSide;
  entryPoint: number;
  stopLoss: number;
  takeProfits: number[];
}

export type ExtractionValidation =
  | { ok: true; signal: ExtractedSignal }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finite number from a number or numeric string
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function validateExtraction(raw: unknown): ExtractionValidation {
  if (raw === null) {
    return { ok: false, reason: 'not a signal' };
  }
  if (!isRecord(raw)) {
    return { ok: false, reason: 'reply is not an object' };
  }

  const instrument = typeof raw.instrument === 'string' ? raw.instrument.trim() : '';
  if (!instrument) {
    return { ok: false, reason: 'missing instrument' };
  }

  const orderType = typeof raw.order_type === 'string' ? raw.order_type.trim().toLowerCase() : '';
  if (orderType !== 'buy' && orderType !== 'sell') {
    return { ok: false, reason: `invalid order_type: ${String(raw.order_type)}` };
  }

  const entryPoint = toNumber(raw.entry_point);
  if (entryPoint === null) {
    return { ok: false, reason: 'entry_point is not numeric' };
  }
  const stopLoss = toNumber(raw.stop_loss);
  if (stopLoss === null) {
    return { ok: false, reason: 'stop_loss is not numeric' };
  }

  if (raw.take_profits === undefined || raw.take_profits === null) {
    return { ok: false, reason: 'missing take_profits' };
  }
  const rawTakeProfits = Array.isArray(raw.take_profits) ? raw.take_profits : [raw.take_profits];
  const takeProfits: number[] = [];
  for (const value of rawTakeProfits) {
    const tp = toNumber(value);
    if (tp === null) {
      return { ok: false, reason: `take profit is not numeric: ${String(value)}` };
    }
    takeProfits.push(tp);
  }
  if (takeProfits.length === 0) {
    return { ok: false, reason: 'no take profits' };
  }

  const canonical = normalize(instrument);
  return {
    ok: true,
    signal: {
      instrument: canonical,
      side: orderType,
      entryPoint,
      stopLoss,
      takeProfits: isIndexInstrument(canonical) ? takeProfits : takeProfits.slice(0, MAX_TAKE_PROFITS),
    },
  };
}
