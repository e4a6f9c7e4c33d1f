export { getConfig, parsePriceOffsets } from './config';
export type { SignalEngineConfig } from './config';

export * from './instruments/InstrumentNormalizer';
export * from './instruments/InstrumentClassifier';
export * from './instruments/InstrumentCatalog';
export { extractInstrumentFromText } from './instruments/instrumentText';

export * from './parsing/SignalPreFilter';
export * from './parsing/ExtractionClient';
export * from './parsing/SignalParser';
export { createSignalRecord } from './parsing/signalRecord';
export { detectReducedRisk } from './parsing/reducedRisk';

export * from './risk/riskProfiles';
export * from './risk/RiskProfileStore';
export * from './risk/PositionSizer';
export * from './risk/drawdownTiers';
export * from './risk/DrawdownGuard';
export * from './risk/DrawdownResetScheduler';
export { selectTakeProfits } from './risk/takeProfitSelection';

export * from './correlation/SignalHistoryStore';
export * from './correlation/OrderCache';

export * from './execution/OrderOrchestrator';
export * from './execution/RunnerRegistry';

export * from './handlers/MissedSignalHandler';
export * from './handlers/SignalManagementHandler';
export { detectTpHit } from './handlers/rules/tpHitRules';
export { detectManagementInstruction } from './handlers/rules/managementRules';

export * from './monitor/PositionMonitor';
export * from './broker/HttpBrokerClient';
export * from './accounts/AccountRegistry';
export * from './engine/SignalEngine';
