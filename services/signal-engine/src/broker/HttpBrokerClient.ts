/**
 * HTTP Broker Client
 *
 * axios implementation of BrokerClient against the trading REST API.
 * Every route is scoped by account id; the account number travels in the `accNum` header.
 * Timeouts, connection failures and 5xx responses are retried with exponential backoff.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import {
  AccountRef,
  AccountState,
  BrokerClient,
  BrokerInstrument,
  BrokerWriteResult,
  CreateOrderRequest,
  CreateOrderResult,
  OpenPosition,
  OrderSide,
  PendingOrder,
  Quote,
} from '@signalbridge/shared-types';
import { BrokerConfig } from '@signalbridge/shared-config';
import { BrokerError, Logger, errorMessage, sleep } from '@signalbridge/shared-utils';

const logger = new Logger('HttpBrokerClient');

export interface HttpBrokerClientOptions {
  adapter?: AxiosAdapter; // in-process transport (tests)
  retryBaseMs?: number;
}

type WireRecord = Record<string, unknown>;

function isRecord(value: unknown): value is WireRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown, what: string): WireRecord {
  if (!isRecord(value)) {
    throw new BrokerError(`Malformed ${what} payload`);
  }
  return value;
}

function asList(value: unknown, what: string): WireRecord[] {
  if (!Array.isArray(value)) {
    throw new BrokerError(`Malformed ${what} payload: expected a list`);
  }
  return value.map(item => asRecord(item, what));
}

function requiredNumber(record: WireRecord, key: string): number {
  const value = record[key];
  const parsed = typeof value === 'string' ? parseFloat(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new BrokerError(`Field '${key}' is not a number`);
  }
  return parsed;
}

function optionalNumber(record: WireRecord, key: string): number | null {
  const value = record[key];
  if (value === null || value === undefined || value === '' || value === 0) {
    return null;
  }
  return requiredNumber(record, key);
}

function requiredString(record: WireRecord, key: string): string {
  const value = record[key];
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new BrokerError(`Field '${key}' is missing`);
  }
  return value;
}

function optionalString(record: WireRecord, key: string): string | null {
  const value = record[key];
  if (value === null || value === undefined || value === '') {
    return null;
  }
  return requiredString(record, key);
}

function side(record: WireRecord): OrderSide {
  const value = requiredString(record, 'side').toLowerCase();
  if (value !== 'buy' && value !== 'sell') {
    throw new BrokerError(`Unknown side '${value}'`);
  }
  return value;
}

export function decodePosition(raw: WireRecord): OpenPosition {
  return {
    id: requiredString(raw, 'id'),
    instrument: requiredString(raw, 'instrument'),
    side: side(raw),
    quantity: requiredNumber(raw, 'qty'),
    entryPrice: requiredNumber(raw, 'avg_price'),
    stopLoss: optionalNumber(raw, 'stop_loss'),
    takeProfit: optionalNumber(raw, 'take_profit'),
    orderId: optionalString(raw, 'order_id'),
  };
}

export function decodeOrder(raw: WireRecord): PendingOrder {
  return {
    id: requiredString(raw, 'id'),
    instrument: requiredString(raw, 'instrument'),
    side: side(raw),
    quantity: requiredNumber(raw, 'qty'),
    price: optionalNumber(raw, 'price'),
    status: requiredString(raw, 'status'),
    stopLoss: optionalNumber(raw, 'stop_loss'),
    takeProfit: optionalNumber(raw, 'take_profit'),
  };
}

export class HttpBrokerClient implements BrokerClient {
  private httpClient: AxiosInstance;
  private retryBaseMs: number;

  constructor(private config: BrokerConfig, options: HttpBrokerClientOptions = {}) {
    this.httpClient = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
      },
      validateStatus: status => status < 500,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
    this.retryBaseMs = options.retryBaseMs ?? 500;

    logger.info(`[HttpBrokerClient] Initialized: baseUrl=${config.baseUrl}, timeout=${config.timeoutMs}ms`);
  }

  async getAccountState(account: AccountRef): Promise<AccountState> {
    const data = asRecord(await this.request(account, { method: 'GET', url: this.path(account, 'state') }), 'state');
    return {
      balance: requiredNumber(data, 'balance'),
      unrealizedPnl: data.unrealized_pnl === undefined || data.unrealized_pnl === null
        ? null
        : requiredNumber(data, 'unrealized_pnl'),
    };
  }

  async getPositions(account: AccountRef): Promise<OpenPosition[]> {
    const data = await this.request(account, { method: 'GET', url: this.path(account, 'positions') });
    return asList(data, 'positions').map(decodePosition);
  }

  async getPendingOrders(account: AccountRef): Promise<PendingOrder[]> {
    const data = await this.request(account, { method: 'GET', url: this.path(account, 'orders') });
    return asList(data, 'orders').map(decodeOrder);
  }

  async createOrder(account: AccountRef, request: CreateOrderRequest): Promise<CreateOrderResult> {
    try {
      const data = await this.request(account, {
        method: 'POST',
        url: this.path(account, 'orders'),
        data: {
          tradable_instrument_id: request.instrument.tradableInstrumentId,
          side: request.side,
          qty: request.quantity,
          type: request.kind,
          price: request.price,
          stop_loss: request.stopLoss,
          take_profit: request.takeProfit,
        },
      });
      return { ok: true, orderId: requiredString(asRecord(data, 'order'), 'order_id') };
    } catch (error) {
      logger.error(
        `[HttpBrokerClient] Order rejected: ${request.instrument.name} ${request.side} ${request.quantity}: ${errorMessage(error)}`
      );
      return { ok: false, error: errorMessage(error) };
    }
  }

  async cancelOrder(account: AccountRef, orderId: string): Promise<BrokerWriteResult> {
    return this.write(account, { method: 'DELETE', url: this.path(account, `orders/${encodeURIComponent(orderId)}`) });
  }

  async closePosition(account: AccountRef, positionId: string, quantity?: number): Promise<BrokerWriteResult> {
    return this.write(account, {
      method: 'DELETE',
      url: this.path(account, `positions/${encodeURIComponent(positionId)}`),
      ...(quantity !== undefined ? { data: { qty: quantity } } : {}),
    });
  }

  async modifyPositionStopLoss(account: AccountRef, positionId: string, stopLoss: number): Promise<BrokerWriteResult> {
    return this.write(account, {
      method: 'PATCH',
      url: this.path(account, `positions/${encodeURIComponent(positionId)}`),
      data: { stop_loss: stopLoss },
    });
  }

  async getQuote(account: AccountRef, instrument: BrokerInstrument): Promise<Quote> {
    const data = asRecord(
      await this.request(account, {
        method: 'GET',
        url: this.path(account, `quotes/${encodeURIComponent(instrument.tradableInstrumentId)}`),
      }),
      'quote'
    );
    return { bid: requiredNumber(data, 'bid'), ask: requiredNumber(data, 'ask') };
  }

  async listInstruments(account: AccountRef): Promise<BrokerInstrument[]> {
    const data = await this.request(account, { method: 'GET', url: this.path(account, 'instruments') });
    return asList(data, 'instruments').map(raw => ({
      name: requiredString(raw, 'name'),
      tradableInstrumentId: requiredString(raw, 'tradable_instrument_id'),
      type: optionalString(raw, 'type'),
    }));
  }

  private path(account: AccountRef, resource: string): string {
    return `/accounts/${encodeURIComponent(account.id)}/${resource}`;
  }

  private async write(account: AccountRef, request: AxiosRequestConfig): Promise<BrokerWriteResult> {
    try {
      await this.request(account, request);
      return { ok: true };
    } catch (error) {
      if (error instanceof BrokerError && error.isNotFound) {
        return { ok: false, status: 'not_found', error: error.message };
      }
      return { ok: false, status: 'error', error: errorMessage(error) };
    }
  }

  /**
   * Send with retries. Resolves to the response body of a 2xx; anything else becomes a BrokerError.
   */
  private async request(account: AccountRef, request: AxiosRequestConfig): Promise<unknown> {
    const label = `${request.method ?? 'GET'} ${request.url ?? ''}`;
    let lastError: BrokerError = new BrokerError(`${label}: no attempt made`);

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        const response = await this.httpClient.request<unknown>({
          ...request,
          headers: { accNum: account.accNum },
        });
        if (response.status >= 200 && response.status < 300) {
          return response.data;
        }
        lastError = new BrokerError(`${label} returned status ${response.status}: ${describeBody(response.data)}`, response.status);
      } catch (error) {
        lastError = axios.isAxiosError(error)
          ? new BrokerError(`${label} failed: ${error.response ? describeBody(error.response.data) : error.message}`, error.response?.status)
          : new BrokerError(`${label} failed: ${errorMessage(error)}`);
      }

      if (!lastError.isTransient || attempt === this.config.maxAttempts) {
        break;
      }
      const delayMs = this.retryBaseMs * Math.pow(2, attempt - 1);
      logger.warn(`[HttpBrokerClient] ${lastError.message}; retry ${attempt}/${this.config.maxAttempts - 1} in ${delayMs}ms`);
      await sleep(delayMs);
    }

    throw lastError;
  }
}

function describeBody(body: unknown): string {
  if (isRecord(body)) {
    const detail = body.error ?? body.message;
    if (typeof detail === 'string') {
      return detail;
    }
  }
  return typeof body === 'string' && body.length > 0 ? body : 'no detail';
}
