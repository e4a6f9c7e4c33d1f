/**
 * Risk & Position Sizing
 *
 * Balance x profile risk fraction -> total risk, split equally across legs,
 * converted to lots with the per-instrument constants. Never throws: any
 * failure returns the fixed fallback size.
 */

import { InstrumentClass } from '@signalbridge/shared-types';
import { Logger, errorMessage, roundTo } from '@signalbridge/shared-utils';
import { classifyInstrument, isIndexClass, riskClassFor } from '../instruments/InstrumentClassifier';
import { RiskProfileStore } from './RiskProfileStore';
import { DEFAULT_SIZING_CONSTANTS, SizingConstants } from './sizingConstants';

const logger = new Logger('PositionSizer');

export interface SizingRequest {
  instrument: string;
  entryPoint: number;
  stopLoss: number;
  takeProfits: readonly number[];
  balance: number;
  reducedRisk: boolean;
  accountId?: string;
  brokerType?: string | null;
}

export interface SizingResult {
  positionSizes: number[];
  totalRiskAmount: number;
  riskFraction: number;
  instrumentClass: InstrumentClass;
  // true when the instrument takes the fixed three-leg index layout
  cfdLayout: boolean;
  usedFallback: boolean;
}

export class PositionSizer {
  private constants: SizingConstants;

  constructor(
    private riskProfiles: RiskProfileStore,
    overrides: Partial<SizingConstants> = {}
  ) {
    this.constants = { ...DEFAULT_SIZING_CONSTANTS, ...overrides };
  }

  /**
   * Instruments placed as two targets plus a runner
   */
  usesCfdLayout(instrument: string, brokerType: string | null = null): boolean {
    const instrumentClass = classifyInstrument(instrument);
    if (isIndexClass(instrumentClass)) {
      return true;
    }
    return instrumentClass === 'OTHER' && riskClassFor(instrument, brokerType) === 'CFD';
  }

  size(request: SizingRequest): SizingResult {
    const instrumentClass = classifyInstrument(request.instrument);
    const cfdLayout = this.usesCfdLayout(request.instrument, request.brokerType ?? null);
    const legCount = cfdLayout ? this.constants.cfdLegCount : Math.max(1, request.takeProfits.length);

    try {
      if (!Number.isFinite(request.balance) || request.balance <= 0) {
        throw new Error(`invalid balance ${request.balance}`);
      }
      const stopDistance = Math.abs(request.entryPoint - request.stopLoss);
      if (!Number.isFinite(stopDistance) || stopDistance <= 0) {
        throw new Error(`invalid stop distance ${stopDistance}`);
      }

      const riskClass = riskClassFor(request.instrument, request.brokerType ?? null);
      const riskFraction = this.riskProfiles.getRiskFraction(riskClass, request.reducedRisk, request.accountId);
      const totalRisk = request.balance * riskFraction;
      const riskPerLeg = totalRisk / legCount;

      const rawLots = this.lotsFor(instrumentClass, request.instrument, riskPerLeg, stopDistance);
      if (!Number.isFinite(rawLots)) {
        throw new Error(`non-finite lot size for ${request.instrument}`);
      }
      const lots = this.clampLots(rawLots);

      logger.info(
        `[PositionSizer] ${request.instrument} (${instrumentClass}/${riskClass}) balance=${request.balance} ` +
          `risk=${(riskFraction * 100).toFixed(2)}% total=${totalRisk.toFixed(2)} perLeg=${riskPerLeg.toFixed(2)} ` +
          `legs=${legCount} lots=${lots}`
      );

      return {
        positionSizes: new Array<number>(legCount).fill(lots),
        totalRiskAmount: Math.round(totalRisk),
        riskFraction,
        instrumentClass,
        cfdLayout,
        usedFallback: false,
      };
    } catch (error) {
      logger.warn(`[PositionSizer] Sizing failed for ${request.instrument}, using fallback: ${errorMessage(error)}`);
      return this.fallback(request, instrumentClass, cfdLayout, legCount);
    }
  }

  private lotsFor(
    instrumentClass: InstrumentClass,
    instrument: string,
    riskPerLeg: number,
    stopDistance: number
  ): number {
    const c = this.constants;
    switch (instrumentClass) {
      case 'GOLD':
        return riskPerLeg / stopDistance / c.goldLotDivisor;
      case 'SILVER':
        return riskPerLeg / (stopDistance * c.silverContractSize);
      case 'US30':
        return riskPerLeg / (stopDistance * c.us30PointValue);
      case 'NASDAQ':
        return riskPerLeg / (stopDistance * c.nasdaqPointValue);
      case 'JPY_FOREX':
      case 'FOREX': {
        const pip = instrumentClass === 'JPY_FOREX' ? 0.01 : 0.0001;
        const stopPips = stopDistance / pip;
        return riskPerLeg / (stopPips * c.forexPipValue) / c.forexLotDivisor;
      }
      default:
        logger.debug(`[PositionSizer] No sizing rule for ${instrument}, using generic point value`);
        return riskPerLeg / (stopDistance * c.otherPointValue);
    }
  }

  private clampLots(lots: number): number {
    const { minLotSize, maxLotSize, lotDecimals } = this.constants;
    return roundTo(Math.min(maxLotSize, Math.max(minLotSize, lots)), lotDecimals);
  }

  private fallback(
    request: SizingRequest,
    instrumentClass: InstrumentClass,
    cfdLayout: boolean,
    legCount: number
  ): SizingResult {
    const balance = Number.isFinite(request.balance) && request.balance > 0 ? request.balance : 0;
    return {
      positionSizes: new Array<number>(legCount).fill(this.constants.fallbackLotSize),
      totalRiskAmount: Math.round(balance * this.constants.fallbackRiskFraction),
      riskFraction: this.constants.fallbackRiskFraction,
      instrumentClass,
      cfdLayout,
      usedFallback: true,
    };
  }
}
