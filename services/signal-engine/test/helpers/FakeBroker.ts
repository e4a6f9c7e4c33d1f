import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import {
  AccountRef,
  AccountState,
  BrokerClient,
  BrokerInstrument,
  BrokerWriteResult,
  CreateOrderRequest,
  CreateOrderResult,
  InboundMessage,
  OpenPosition,
  PendingOrder,
  Quote,
} from '@signalbridge/shared-types';

export const ACCOUNT: AccountRef = { id: 'acc-1', accNum: '1' };

export const INSTRUMENTS: BrokerInstrument[] = [
  { name: 'EURUSD', tradableInstrumentId: '101', type: 'FOREX' },
  { name: 'GBPUSD', tradableInstrumentId: '102', type: 'FOREX' },
  { name: 'USDJPY', tradableInstrumentId: '103', type: 'FOREX' },
  { name: 'XAUUSD', tradableInstrumentId: '201', type: 'METAL' },
  { name: 'DOW.C', tradableInstrumentId: '301', type: 'EQUITY_CFD' },
  { name: 'NSDQ.C', tradableInstrumentId: '302', type: 'EQUITY_CFD' },
];

export interface CallRecord {
  method: string;
  args: unknown[];
  at: number; // epoch ms
}

/**
 * In-memory broker. Orders and positions are plain arrays tests can edit.
 */
export class FakeBroker implements BrokerClient {
  accountState: AccountState = { balance: 10000, unrealizedPnl: 0 };
  positions: OpenPosition[] = [];
  orders: PendingOrder[] = [];
  instruments: BrokerInstrument[] = [...INSTRUMENTS];
  quotes: Record<string, Quote> = {};
  created: CreateOrderRequest[] = [];
  calls: CallRecord[] = [];
  notFound: Set<string> = new Set();
  failingWrites: Set<string> = new Set();
  rejectOrder: (request: CreateOrderRequest) => string | null = () => null;
  failReads: boolean = false;
  private nextOrderId = 1;

  async getAccountState(account: AccountRef): Promise<AccountState> {
    this.record('getAccountState', account.id);
    this.checkReads();
    return { ...this.accountState };
  }

  async getPositions(account: AccountRef): Promise<OpenPosition[]> {
    this.record('getPositions', account.id);
    this.checkReads();
    return this.positions.map(position => ({ ...position }));
  }

  async getPendingOrders(account: AccountRef): Promise<PendingOrder[]> {
    this.record('getPendingOrders', account.id);
    this.checkReads();
    return this.orders.map(order => ({ ...order }));
  }

  async createOrder(account: AccountRef, request: CreateOrderRequest): Promise<CreateOrderResult> {
    this.record('createOrder', account.id, request);
    const rejection = this.rejectOrder(request);
    if (rejection) {
      return { ok: false, error: rejection };
    }
    this.created.push(request);
    const orderId = `ord-${this.nextOrderId++}`;
    this.orders.push({
      id: orderId,
      instrument: request.instrument.name,
      side: request.side,
      quantity: request.quantity,
      price: request.price,
      status: 'Working',
      stopLoss: request.stopLoss,
      takeProfit: request.takeProfit,
    });
    return { ok: true, orderId };
  }

  async cancelOrder(account: AccountRef, orderId: string): Promise<BrokerWriteResult> {
    this.record('cancelOrder', account.id, orderId);
    const failure = this.writeFailure(orderId);
    if (failure) {
      return failure;
    }
    this.orders = this.orders.filter(order => order.id !== orderId);
    return { ok: true };
  }

  async closePosition(account: AccountRef, positionId: string, quantity?: number): Promise<BrokerWriteResult> {
    this.record('closePosition', account.id, positionId, quantity);
    const failure = this.writeFailure(positionId);
    if (failure) {
      return failure;
    }
    this.positions = this.positions.filter(position => position.id !== positionId || quantity !== undefined);
    return { ok: true };
  }

  async modifyPositionStopLoss(account: AccountRef, positionId: string, stopLoss: number): Promise<BrokerWriteResult> {
    this.record('modifyPositionStopLoss', account.id, positionId, stopLoss);
    const failure = this.writeFailure(positionId);
    if (failure) {
      return failure;
    }
    this.positions = this.positions.map(position =>
      position.id === positionId ? { ...position, stopLoss } : position
    );
    return { ok: true };
  }

  async getQuote(account: AccountRef, instrument: BrokerInstrument): Promise<Quote> {
    this.record('getQuote', account.id, instrument.name);
    const quote = this.quotes[instrument.name];
    if (!quote) {
      throw new Error(`no quote for ${instrument.name}`);
    }
    return quote;
  }

  async listInstruments(account: AccountRef): Promise<BrokerInstrument[]> {
    this.record('listInstruments', account.id);
    return [...this.instruments];
  }

  callsTo(method: string): unknown[][] {
    return this.calls.filter(call => call.method === method).map(call => call.args);
  }

  private record(method: string, ...args: unknown[]): void {
    this.calls.push({ method, args, at: Date.now() });
  }

  private checkReads(): void {
    if (this.failReads) {
      throw new Error('broker unavailable');
    }
  }

  private writeFailure(id: string): BrokerWriteResult | null {
    if (this.notFound.has(id)) {
      return { ok: false, status: 'not_found', error: `${id} not found` };
    }
    if (this.failingWrites.has(id)) {
      return { ok: false, status: 'error', error: `${id} rejected` };
    }
    return null;
  }
}

export function position(overrides: Partial<OpenPosition> & Pick<OpenPosition, 'id'>): OpenPosition {
  return {
    instrument: 'EURUSD',
    side: 'buy',
    quantity: 0.1,
    entryPrice: 1.1,
    stopLoss: null,
    takeProfit: null,
    orderId: null,
    ...overrides,
  };
}

export function pendingOrder(overrides: Partial<PendingOrder> & Pick<PendingOrder, 'id'>): PendingOrder {
  return {
    instrument: 'EURUSD',
    side: 'buy',
    quantity: 0.1,
    price: 1.1,
    status: 'Working',
    stopLoss: null,
    takeProfit: null,
    ...overrides,
  };
}

export function message(text: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    text,
    messageId: 'msg-1',
    channelId: 'chan-1',
    channelName: 'Signals',
    replyToId: null,
    timestamp: new Date('2024-05-01T12:00:00Z'),
    ...overrides,
  };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `signalbridge-${prefix}-`));
}
