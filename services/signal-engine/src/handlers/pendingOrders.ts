import { OpenPosition, PendingOrder } from '@signalbridge/shared-types';
import { normalize } from '../instruments/InstrumentNormalizer';

export const PENDING_STATUSES: readonly string[] = ['new', 'accepted', 'working', 'partiallyfilled', 'pending', 'placed'];

export function isPending(order: PendingOrder): boolean {
  return PENDING_STATUSES.includes(order.status.replace(/[\s_-]/g, '').toLowerCase());
}

export function pendingOrdersFor(orders: readonly PendingOrder[], instrument: string): PendingOrder[] {
  return orders.filter(order => isPending(order) && normalize(order.instrument) === instrument);
}

export function positionsFor(positions: readonly OpenPosition[], instrument: string): OpenPosition[] {
  return positions.filter(position => normalize(position.instrument) === instrument);
}
