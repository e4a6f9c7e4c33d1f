import { OpenPosition } from '@signalbridge/shared-types';

/**
 * Order IDs placed as runner legs. Tagged when the order is created; a
 * position counts as a runner when its own ID or its originating order ID is tagged.
 */
export class RunnerRegistry {
  private orderIds: Set<string> = new Set();

  mark(orderId: string): void {
    this.orderIds.add(orderId);
  }

  isRunner(position: Pick<OpenPosition, 'id' | 'orderId'>): boolean {
    return this.orderIds.has(position.id) || (position.orderId !== null && this.orderIds.has(position.orderId));
  }

  forget(orderId: string): void {
    this.orderIds.delete(orderId);
  }

  get size(): number {
    return this.orderIds.size;
  }
}
