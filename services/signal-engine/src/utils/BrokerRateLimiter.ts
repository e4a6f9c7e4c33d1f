import Bottleneck from 'bottleneck';
import { Logger } from '@signalbridge/shared-utils';

const logger = new Logger('BrokerRateLimiter');

/**
 * Broker write operation classes. The broker rate-limits each class separately.
 */
export type BrokerOperationClass = 'position' | 'order';

/**
 * Spaces sequential broker writes per operation class (~1 req/s observed limit)
 */
export class BrokerRateLimiter {
  private limiters: Map<BrokerOperationClass, Bottleneck> = new Map();

  constructor(private minSpacingMs: number = 1100) {}

  private getLimiter(operationClass: BrokerOperationClass): Bottleneck {
    let limiter = this.limiters.get(operationClass);
    if (!limiter) {
      limiter = new Bottleneck({ minTime: this.minSpacingMs, maxConcurrent: 1 });
      this.limiters.set(operationClass, limiter);
    }
    return limiter;
  }

  schedule<T>(operationClass: BrokerOperationClass, fn: () => Promise<T>): Promise<T> {
    return this.getLimiter(operationClass).schedule(fn);
  }

  /**
   * Let queued writes finish, then refuse new ones
   */
  async stop(): Promise<void> {
    const limiters = Array.from(this.limiters.values());
    this.limiters.clear();
    await Promise.all(limiters.map(limiter => limiter.stop({ dropWaitingJobs: false })));
    logger.debug(`[BrokerRateLimiter] Stopped ${limiters.length} limiter(s)`);
  }
}
