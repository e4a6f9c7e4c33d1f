import { describe, it, expect } from '@jest/globals';
import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { BrokerConfig } from '@signalbridge/shared-config';
import { BrokerError } from '@signalbridge/shared-utils';
import { HttpBrokerClient } from '../../src/broker/HttpBrokerClient';
import { ACCOUNT, INSTRUMENTS } from '../helpers/FakeBroker';

const CONFIG: BrokerConfig = {
  baseUrl: 'http://broker.test',
  apiKey: 'test-secret',
  timeoutMs: 1_000,
  maxAttempts: 3,
  writeSpacingMs: 0,
};

interface SeenRequest {
  method: string;
  url: string;
  accNum: string;
  authorization: string;
  body: unknown;
}

type Reply = [number, unknown] | Error;

/**
 * In-process transport: replies are consumed in order, the last one repeats
 */
function transport(replies: Reply[]): { adapter: AxiosAdapter; seen: SeenRequest[] } {
  const seen: SeenRequest[] = [];
  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    seen.push({
      method: (config.method ?? '').toUpperCase(),
      url: config.url ?? '',
      accNum: String(config.headers.get('accNum')),
      authorization: String(config.headers.get('Authorization')),
      body: typeof config.data === 'string' ? JSON.parse(config.data) : null,
    });
    const reply = replies.length > 1 ? replies.shift() : replies[0];
    if (reply === undefined) {
      throw new Error('no reply configured');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    const response: AxiosResponse = { data: reply[1], status: reply[0], statusText: String(reply[0]), headers: {}, config };
    return response;
  };
  return { adapter, seen };
}

function client(replies: Reply[]): { broker: HttpBrokerClient; seen: SeenRequest[] } {
  const { adapter, seen } = transport(replies);
  return { broker: new HttpBrokerClient(CONFIG, { adapter, retryBaseMs: 1 }), seen };
}

describe('HttpBrokerClient', () => {
  it('decodes positions and sends the account headers', async () => {
    const { broker, seen } = client([
      [
        200,
        [
          {
            id: 1001,
            instrument: 'EURUSD',
            side: 'BUY',
            qty: '0.1',
            avg_price: 1.1,
            stop_loss: 0,
            take_profit: 1.105,
            order_id: 77,
          },
        ],
      ],
    ]);

    expect(await broker.getPositions(ACCOUNT)).toEqual([
      {
        id: '1001',
        instrument: 'EURUSD',
        side: 'buy',
        quantity: 0.1,
        entryPrice: 1.1,
        stopLoss: null,
        takeProfit: 1.105,
        orderId: '77',
      },
    ]);
    expect(seen).toEqual([
      { method: 'GET', url: '/accounts/acc-1/positions', accNum: '1', authorization: 'Bearer test-secret', body: null },
    ]);
  });

  it('posts orders in wire format', async () => {
    const { broker, seen } = client([[200, { order_id: 'ord-9' }]]);

    const result = await broker.createOrder(ACCOUNT, {
      instrument: INSTRUMENTS[0],
      side: 'buy',
      quantity: 0.03,
      kind: 'limit',
      price: 1.1,
      stopLoss: 1.095,
      takeProfit: 1.105,
    });

    expect(result).toEqual({ ok: true, orderId: 'ord-9' });
    expect(seen[0].method).toBe('POST');
    expect(seen[0].url).toBe('/accounts/acc-1/orders');
    expect(seen[0].body).toEqual({
      tradable_instrument_id: '101',
      side: 'buy',
      qty: 0.03,
      type: 'limit',
      price: 1.1,
      stop_loss: 1.095,
      take_profit: 1.105,
    });
  });

  it('returns a rejected order without retrying', async () => {
    const { broker, seen } = client([[400, { error: 'Invalid take profit' }]]);

    const result = await broker.createOrder(ACCOUNT, {
      instrument: INSTRUMENTS[0],
      side: 'sell',
      quantity: 0.01,
      kind: 'market',
      price: null,
      stopLoss: 1.105,
      takeProfit: 1.2,
    });

    expect(result).toEqual({ ok: false, error: 'POST /accounts/acc-1/orders returned status 400: Invalid take profit' });
    expect(seen).toHaveLength(1);
  });

  it('maps 404 on a write to not_found', async () => {
    const { broker } = client([[404, { message: 'Order not found' }]]);

    expect(await broker.cancelOrder(ACCOUNT, 'o1')).toEqual({
      ok: false,
      status: 'not_found',
      error: 'DELETE /accounts/acc-1/orders/o1 returned status 404: Order not found',
    });
  });

  it('sends the quantity of a partial close', async () => {
    const { broker, seen } = client([[200, {}]]);

    expect(await broker.closePosition(ACCOUNT, 'p1', 0.05)).toEqual({ ok: true });
    expect(seen[0]).toMatchObject({ method: 'DELETE', url: '/accounts/acc-1/positions/p1', body: { qty: 0.05 } });
  });

  it('retries a server error and then succeeds', async () => {
    const { broker, seen } = client([
      [500, { message: 'busy' }],
      [200, { balance: '10000.5', unrealized_pnl: null }],
    ]);

    expect(await broker.getAccountState(ACCOUNT)).toEqual({ balance: 10000.5, unrealizedPnl: null });
    expect(seen).toHaveLength(2);
  });

  it('gives up after the configured attempts', async () => {
    const { broker, seen } = client([[503, '']]);

    await expect(broker.getPositions(ACCOUNT)).rejects.toThrow(
      'GET /accounts/acc-1/positions returned status 503: no detail'
    );
    expect(seen).toHaveLength(3);
  });

  it('retries connection failures', async () => {
    const { broker, seen } = client([new AxiosError('socket hang up', 'ECONNRESET')]);

    const failure = await broker.getQuote(ACCOUNT, INSTRUMENTS[0]).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(BrokerError);
    expect(failure).toMatchObject({ message: 'GET /accounts/acc-1/quotes/101 failed: socket hang up', status: undefined });
    expect(seen).toHaveLength(3);
  });

  it('rejects a malformed list payload', async () => {
    const { broker } = client([[200, { positions: [] }]]);
    await expect(broker.getPositions(ACCOUNT)).rejects.toThrow('Malformed positions payload: expected a list');
  });

  it('lists instruments with their broker type', async () => {
    const { broker } = client([[200, [{ name: 'DOW.C', tradable_instrument_id: 301, type: 'EQUITY_CFD' }, { name: 'EURUSD', tradable_instrument_id: '101' }]]]);

    expect(await broker.listInstruments(ACCOUNT)).toEqual([
      { name: 'DOW.C', tradableInstrumentId: '301', type: 'EQUITY_CFD' },
      { name: 'EURUSD', tradableInstrumentId: '101', type: null },
    ]);
  });
});
