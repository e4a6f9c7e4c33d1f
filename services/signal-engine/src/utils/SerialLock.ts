import Bottleneck from 'bottleneck';

/**
 * Single-writer lock: tasks run one at a time in submission order.
 * Not reentrant; a locked task must not call `run` on the same lock.
 */
export class SerialLock {
  private queue = new Bottleneck({ maxConcurrent: 1 });

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.schedule(task);
  }

  /**
   * Resolves once every task submitted so far has settled
   */
  async drain(): Promise<void> {
    await this.queue.schedule(() => Promise.resolve());
  }
}
