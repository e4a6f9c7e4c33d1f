// Date/Time utilities using Luxon
import { DateTime } from 'luxon';

const DEFAULT_TIMEZONE = 'America/New_York';

/**
 * Operator timezone (SIGNALBRIDGE_TIMEZONE, defaults to America/New_York)
 */
export function getOperatorTimezone(): string {
  return process.env.SIGNALBRIDGE_TIMEZONE || DEFAULT_TIMEZONE;
}

/**
 * Get current time in the operator timezone
 */
export function getNowInOperatorTimezone(): DateTime {
  return DateTime.now().setZone(getOperatorTimezone());
}

/**
 * Calendar date (YYYY-MM-DD) of `date` in the given timezone
 */
export function formatDateForOperator(date: Date = new Date(), timezone: string = getOperatorTimezone()): string {
  return DateTime.fromJSDate(date).setZone(timezone).toFormat('yyyy-MM-dd');
}

/**
 * Age of a timestamp in hours relative to `now`
 */
export function hoursSince(timestamp: Date, now: Date = new Date()): number {
  return (now.getTime() - timestamp.getTime()) / 3_600_000;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Round to a fixed number of decimals (avoids 0.1 + 0.2 style drift in prices)
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

function serializeArg(arg: unknown): unknown {
  if (arg instanceof Error) {
    return { name: arg.name, message: arg.message };
  }
  return arg;
}

/**
 * Logger utility
 */
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  private formatMessage(level: string, message: string, ...args: unknown[]): string {
    const timestamp = getNowInOperatorTimezone().toISO();
    const argsStr = args.length > 0 ? ` ${JSON.stringify(args.map(serializeArg))}` : '';
    return `[${timestamp}] [${level}] [${this.context}] ${message}${argsStr}`;
  }

  info(message: string, ...args: unknown[]): void {
    console.log(this.formatMessage('INFO', message, ...args));
  }

  error(message: string, ...args: unknown[]): void {
    console.error(this.formatMessage('ERROR', message, ...args));
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.formatMessage('WARN', message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    if (process.env.DEBUG === 'true') {
      console.debug(this.formatMessage('DEBUG', message, ...args));
    }
  }
}

/**
 * Custom error classes
 */
export class SignalBridgeError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'SignalBridgeError';
  }
}

export class ValidationError extends SignalBridgeError {
  constructor(message: string, public field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends SignalBridgeError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Broker call failure. `status` is the HTTP status when the broker answered.
 */
export class BrokerError extends SignalBridgeError {
  constructor(message: string, public status?: number) {
    super(message, 'BROKER_ERROR', status ?? 502);
    this.name = 'BrokerError';
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }

  get isTransient(): boolean {
    return this.status === undefined || this.status >= 500;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
