// Trade intent types
export type OrderSide = 'buy' | 'sell';
export type OrderKind = 'market' | 'limit';

/**
 * Instrument families used for sizing and pip arithmetic
 */
export type InstrumentClass =
  | 'GOLD'
  | 'SILVER'
  | 'US30'
  | 'NASDAQ'
  | 'JPY_FOREX'
  | 'FOREX'
  | 'OTHER';

/**
 * Risk profile buckets (each holds {default, reduced} fractions)
 */
export type RiskClass = 'FOREX' | 'CFD' | 'XAUUSD';

/**
 * Message as delivered by the message source
 */
export interface InboundMessage {
  text: string;
  messageId: string;
  channelId: string | null;
  channelName: string | null;
  replyToId: string | null;
  timestamp: Date;
}

/**
 * Fields extracted from a message, after validation and price adjustment
 */
export interface ParsedSignal {
  instrument: string; // canonical, e.g. 'XAUUSD', 'DJI30'
  side: OrderSide;
  entryPoint: number;
  stopLoss: number;
  takeProfits: number[];
  reducedRisk: boolean;
}

/**
 * Signal record kept in history. Only relatedOrders changes after creation,
 * and the store swaps in a new record when it does.
 */
export interface Signal {
  readonly signalId: string; // `${channelId}:${messageId}`, or the bare message ID without a channel
  readonly messageId: string;
  readonly instrument: string;
  readonly side: OrderSide;
  readonly entryPoint: number;
  readonly stopLoss: number;
  readonly takeProfits: readonly number[];
  readonly reducedRisk: boolean;
  readonly channelId: string | null;
  readonly channelName: string | null;
  readonly rawMessage: string;
  readonly timestamp: Date;
  readonly relatedOrders: readonly string[];
}

// Broker types
export interface AccountRef {
  id: string;
  accNum: string;
  name?: string;
}

export interface AccountState {
  balance: number;
  unrealizedPnl: number | null;
}

export interface Quote {
  bid: number;
  ask: number;
}

export interface BrokerInstrument {
  name: string; // platform symbol, e.g. 'DOW.C'
  tradableInstrumentId: string;
  type: string | null; // broker category, e.g. 'FOREX', 'EQUITY_CFD'
}

export interface OpenPosition {
  id: string;
  instrument: string;
  side: OrderSide;
  quantity: number;
  entryPrice: number;
  stopLoss: number | null;
  takeProfit: number | null;
  orderId: string | null; // order the position was filled from, when the broker reports it
}

export interface PendingOrder {
  id: string;
  instrument: string;
  side: OrderSide;
  quantity: number;
  price: number | null;
  status: string; // 'New' | 'Accepted' | 'Working' | 'PartiallyFilled' | ...
  stopLoss: number | null;
  takeProfit: number | null;
}

export interface CreateOrderRequest {
  instrument: BrokerInstrument;
  side: OrderSide;
  quantity: number;
  kind: OrderKind;
  price: number | null; // null for market orders
  stopLoss: number;
  takeProfit: number;
}

export type CreateOrderResult =
  | { ok: true; orderId: string }
  | { ok: false; error: string };

export type BrokerWriteResult =
  | { ok: true }
  | { ok: false; status: 'not_found' | 'error'; error: string };

/**
 * Broker API consumed by the core. Auth and transport live behind it.
 */
export interface BrokerClient {
  getAccountState(account: AccountRef): Promise<AccountState>;
  getPositions(account: AccountRef): Promise<OpenPosition[]>;
  getPendingOrders(account: AccountRef): Promise<PendingOrder[]>;
  createOrder(account: AccountRef, request: CreateOrderRequest): Promise<CreateOrderResult>;
  cancelOrder(account: AccountRef, orderId: string): Promise<BrokerWriteResult>;
  closePosition(account: AccountRef, positionId: string, quantity?: number): Promise<BrokerWriteResult>;
  modifyPositionStopLoss(account: AccountRef, positionId: string, stopLoss: number): Promise<BrokerWriteResult>;
  getQuote(account: AccountRef, instrument: BrokerInstrument): Promise<Quote>;
  listInstruments(account: AccountRef): Promise<BrokerInstrument[]>;
}
