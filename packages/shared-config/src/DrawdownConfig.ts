export interface DrawdownConfig {
  resetCron: string; // minute hour * * *, evaluated in `timezone`
  timezone: string;
  retryBaseMinutes: number;
  retryMaxMinutes: number;
}

export function getDrawdownConfig(): DrawdownConfig {
  return {
    resetCron: process.env.DRAWDOWN_RESET_CRON || '0 19 * * *',
    timezone: process.env.SIGNALBRIDGE_TIMEZONE || 'America/New_York',
    retryBaseMinutes: parseFloat(process.env.DRAWDOWN_RETRY_BASE_MINUTES || '5'),
    retryMaxMinutes: parseFloat(process.env.DRAWDOWN_RETRY_MAX_MINUTES || '60'),
  };
}
