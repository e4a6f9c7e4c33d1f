/**
 * Lot-sizing policy table. These are tuned broker constants, not derived
 * values; override per deployment through PositionSizer options.
 */
export interface SizingConstants {
  // Gold: lots = (riskPerLeg / slDistance) / goldLotDivisor
  goldLotDivisor: number;
  // Silver: account currency per 1.00 price move per lot
  silverContractSize: number;
  // Forex: lots = (riskPerLeg / (slPips * forexPipValue)) / forexLotDivisor
  forexPipValue: number;
  forexLotDivisor: number;
  // Indices: account currency per index point per lot
  us30PointValue: number;
  nasdaqPointValue: number;
  // Unrecognised instruments: account currency per 1.00 price move per lot
  otherPointValue: number;

  minLotSize: number;
  maxLotSize: number;
  lotDecimals: number;

  // Returned when sizing fails
  fallbackLotSize: number;
  fallbackRiskFraction: number;

  // Legs placed for index CFDs (two targets and one runner)
  cfdLegCount: number;
}

export const DEFAULT_SIZING_CONSTANTS: Readonly<SizingConstants> = {
  goldLotDivisor: 100,
  silverContractSize: 5000,
  forexPipValue: 0.1,
  forexLotDivisor: 100,
  us30PointValue: 5,
  nasdaqPointValue: 20,
  otherPointValue: 1,

  minLotSize: 0.01,
  maxLotSize: 10.0,
  lotDecimals: 2,

  fallbackLotSize: 0.01,
  fallbackRiskFraction: 0.005,

  cfdLegCount: 3,
};
