export interface PositionMonitorConfig {
  enabled: boolean;
  activeIntervalSeconds: number; // when positions are open
  idleIntervalSeconds: number;
  cooldownSeconds: number; // per position, between stop updates
  breakevenThresholdPips: number;
  runnerIndexThresholdPips: number;
  runnerGoldThresholdPips: number;
  trailingPullbackPips: number;
  maxConsecutiveFailures: number;
  failureBackoffSeconds: number;
}

export function getPositionMonitorConfig(): PositionMonitorConfig {
  return {
    enabled: process.env.POSITION_MONITOR_ENABLED !== 'false', // Default: true
    activeIntervalSeconds: parseFloat(process.env.MONITOR_ACTIVE_INTERVAL_SECONDS || '3'),
    idleIntervalSeconds: parseFloat(process.env.MONITOR_IDLE_INTERVAL_SECONDS || '10'),
    cooldownSeconds: parseFloat(process.env.MONITOR_COOLDOWN_SECONDS || '30'),
    breakevenThresholdPips: parseFloat(process.env.MONITOR_BREAKEVEN_THRESHOLD_PIPS || '40'),
    runnerIndexThresholdPips: parseFloat(process.env.MONITOR_RUNNER_INDEX_THRESHOLD_PIPS || '100'),
    runnerGoldThresholdPips: parseFloat(process.env.MONITOR_RUNNER_GOLD_THRESHOLD_PIPS || '40'),
    trailingPullbackPips: parseFloat(process.env.MONITOR_TRAILING_PULLBACK_PIPS || '20'),
    maxConsecutiveFailures: parseInt(process.env.MONITOR_MAX_FAILURES || '10', 10),
    failureBackoffSeconds: parseFloat(process.env.MONITOR_FAILURE_BACKOFF_SECONDS || '300'),
  };
}
