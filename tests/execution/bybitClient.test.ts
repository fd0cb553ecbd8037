import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import crypto from 'crypto';
import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ExchangeError } from '../../src/errors/index.js';
import { BybitClient, generateSignature, retCodeError, transportError } from '../../src/execution/bybitClient.js';

type Reply = { retCode: number; retMsg?: string; result?: unknown } | { status: number } | { code: string };

interface FakeBybit {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
}

/** In-process stand-in for the Bybit REST API, keyed by path. */
function fakeBybit(routes: Record<string, Reply>): FakeBybit {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const path = (config.url ?? '').split('?')[0] ?? '';
    const reply = routes[path];
    if (!reply) throw new AxiosError(`no route for ${path}`, 'ERR_BAD_REQUEST', config);
    if ('code' in reply) throw new AxiosError('timeout of 100ms exceeded', reply.code, config);

    if ('status' in reply) {
      const response: AxiosResponse = { data: {}, status: reply.status, statusText: 'ERR', headers: {}, config };
      throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, null, response);
    }
    return {
      data: { retCode: reply.retCode, retMsg: reply.retMsg ?? 'OK', result: reply.result ?? {}, time: 0 },
      status: 200,
      statusText: 'OK',
      headers: {},
      config,
    };
  };
  return { adapter, requests };
}

function client(fake: FakeBybit): BybitClient {
  return new BybitClient({
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    testnet: true,
    recvWindow: 5000,
    timeoutMs: 100,
    adapter: fake.adapter,
  });
}

function kind(expected: ExchangeError['kind']) {
  return (err: unknown) => err instanceof ExchangeError && err.kind === expected;
}

const wallet = { retCode: 0, result: { list: [{ totalEquity: '1234.5', coin: [] }] } };

describe('generateSignature', () => {
  it('signs timestamp + key + recvWindow + params with HMAC-SHA256', () => {
    const expected = crypto
      .createHmac('sha256', 'test-secret')
      .update('1700000000000test-key5000category=linear')
      .digest('hex');
    assert.equal(generateSignature('test-secret', '1700000000000', 'test-key', '5000', 'category=linear'), expected);
  });
});

describe('error mapping', () => {
  it('maps retCodes to error kinds', () => {
    const err = retCodeError(110007, 'ab not enough for new order', 'POST /v5/order/create');
    assert.equal(err.kind, 'INSUFFICIENT_BALANCE');
    assert.equal(err.retCode, 110007);
    assert.equal(err.message, 'POST /v5/order/create failed: ab not enough for new order (retCode 110007)');
    assert.equal(retCodeError(10006, 'too many visits', 'x').kind, 'RATE_LIMITED');
    assert.equal(retCodeError(10003, 'invalid api key', 'x').kind, 'AUTH');
    assert.equal(retCodeError(110001, 'order not exists', 'x').kind, 'NOT_FOUND');
    assert.equal(retCodeError(170130, 'anything else', 'x').kind, 'REJECTED');
  });

  it('maps transport failures to error kinds', () => {
    const withStatus = (status: number) =>
      new AxiosError('failed', 'ERR_BAD_RESPONSE', undefined, null, {
        data: {},
        status,
        statusText: '',
        headers: {},
        config: { headers: new AxiosHeaders() },
      });
    assert.equal(transportError(new AxiosError('timeout', 'ECONNABORTED'), 'x').kind, 'TIMEOUT');
    assert.equal(transportError(new AxiosError('socket hang up', 'ECONNRESET'), 'x').kind, 'NETWORK');
    assert.equal(transportError(withStatus(429), 'x').kind, 'RATE_LIMITED');
    assert.equal(transportError(withStatus(403), 'x').kind, 'AUTH');
    assert.equal(transportError(withStatus(502), 'x').kind, 'NETWORK');
    assert.equal(transportError(withStatus(400), 'x').kind, 'REJECTED');
    assert.equal(transportError(new Error('boom'), 'x').kind, 'NETWORK');
  });
});

describe('BybitClient', () => {
  it('fetches the last price without signing', async () => {
    const fake = fakeBybit({
      '/v5/market/tickers': {
        retCode: 0,
        result: { category: 'linear', list: [{ symbol: 'BTCUSDT', lastPrice: '60000.5', markPrice: '60001', bid1Price: '60000', ask1Price: '60001' }] },
      },
    });
    const snap = await client(fake).getPrice('BTCUSDT');

    assert.equal(snap.price, 60000.5);
    assert.equal(snap.symbol, 'BTCUSDT');
    const [req] = fake.requests;
    assert.equal(req?.url, '/v5/market/tickers?category=linear&symbol=BTCUSDT');
    assert.equal(req?.baseURL, 'https://api-testnet.bybit.com');
    assert.equal(req?.headers['X-BAPI-SIGN'], undefined);
  });

  it('signs private requests and connects with a wallet call', async () => {
    const fake = fakeBybit({ '/v5/account/wallet-balance': wallet });
    const bybit = client(fake);
    await bybit.connect();

    assert.equal(bybit.isConnected(), true);
    assert.equal(await bybit.getEquity(), 1234.5);
    const [req] = fake.requests;
    assert.equal(req?.headers['X-BAPI-API-KEY'], 'test-key');
    assert.equal(req?.headers['X-BAPI-RECV-WINDOW'], '5000');
    const timestamp = String(req?.headers['X-BAPI-TIMESTAMP']);
    assert.equal(
      req?.headers['X-BAPI-SIGN'],
      generateSignature('test-secret', timestamp, 'test-key', '5000', 'accountType=UNIFIED&coin=USDT'),
    );
  });

  it('places a limit order with our client id', async () => {
    const fake = fakeBybit({ '/v5/order/create': { retCode: 0, result: { orderId: 'b-1', orderLinkId: 'gb-abc' } } });
    const orderId = await client(fake).placeOrder({
      symbol: 'BTCUSDT',
      side: 'Buy',
      orderType: 'Limit',
      qty: 0.01,
      price: 59000,
      clientOrderId: 'gb-abc',
    });

    assert.equal(orderId, 'b-1');
    const body: unknown = JSON.parse(String(fake.requests[0]?.data));
    assert.deepEqual(body, {
      category: 'linear',
      symbol: 'BTCUSDT',
      side: 'Buy',
      orderType: 'Limit',
      qty: '0.01',
      timeInForce: 'GTC',
      reduceOnly: false,
      orderLinkId: 'gb-abc',
      price: '59000',
    });
  });

  it('raises classified errors for non-zero retCodes', async () => {
    const fake = fakeBybit({ '/v5/order/create': { retCode: 110007, retMsg: 'ab not enough for new order' } });
    await assert.rejects(
      client(fake).placeOrder({ symbol: 'BTCUSDT', side: 'Buy', orderType: 'Market', qty: 1, clientOrderId: 'gb-x' }),
      kind('INSUFFICIENT_BALANCE'),
    );
  });

  it('raises classified errors for transport failures', async () => {
    await assert.rejects(client(fakeBybit({ '/v5/order/realtime': { status: 429 } })).getOpenOrders('BTCUSDT'), kind('RATE_LIMITED'));
    await assert.rejects(client(fakeBybit({ '/v5/order/realtime': { code: 'ECONNABORTED' } })).getOpenOrders('BTCUSDT'), kind('TIMEOUT'));
  });

  it('returns a signed position size', async () => {
    const row = { symbol: 'BTCUSDT', side: 'Sell', size: '0.25', avgPrice: '61000', markPrice: '60500', unrealisedPnl: '125', leverage: '10' };
    const pos = await client(fakeBybit({ '/v5/position/list': { retCode: 0, result: { category: 'linear', list: [row] } } })).getPosition('BTCUSDT');
    assert.deepEqual(pos, { symbol: 'BTCUSDT', size: -0.25, entryPrice: 61000, markPrice: 60500, unrealizedPnl: 125, leverage: 10 });

    const flatRow = { ...row, side: '', size: '0' };
    const flat = await client(fakeBybit({ '/v5/position/list': { retCode: 0, result: { category: 'linear', list: [flatRow] } } })).getPosition('BTCUSDT');
    assert.equal(flat.size, 0);
    assert.equal(flat.entryPrice, 0);
  });

  it('maps open orders', async () => {
    const row = { orderId: 'b-2', orderLinkId: 'gb-def', symbol: 'BTCUSDT', side: 'Sell', price: '62000', qty: '0.01', orderStatus: 'New' };
    const orders = await client(fakeBybit({ '/v5/order/realtime': { retCode: 0, result: { category: 'linear', list: [row] } } })).getOpenOrders('BTCUSDT');
    assert.deepEqual(orders, [{ orderId: 'b-2', clientOrderId: 'gb-def', symbol: 'BTCUSDT', side: 'Sell', price: 62000, qty: 0.01 }]);
  });

  it('treats an unchanged leverage as success', async () => {
    await client(fakeBybit({ '/v5/position/set-leverage': { retCode: 110043, retMsg: 'leverage not modified' } })).setLeverage('BTCUSDT', 10);
    await assert.rejects(
      client(fakeBybit({ '/v5/position/set-leverage': { retCode: 10001, retMsg: 'params error' } })).setLeverage('BTCUSDT', 500),
      kind('REJECTED'),
    );
  });
});
