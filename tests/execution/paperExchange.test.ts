import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ExchangeError } from '../../src/errors/index.js';
import { PaperExchange, SLIPPAGE } from '../../src/execution/paperExchange.js';
import type { OrderRequest } from '../../src/types/index.js';
import { ManualClock } from '../helpers/manualClock.js';

const SYMBOL = 'BTCUSDT';

function order(overrides: Partial<OrderRequest>): OrderRequest {
  return { symbol: SYMBOL, side: 'Buy', orderType: 'Limit', qty: 1, price: 100, clientOrderId: 'gb-test', ...overrides };
}

function kind(expected: ExchangeError['kind']) {
  return (err: unknown) => err instanceof ExchangeError && err.kind === expected;
}

describe('PaperExchange', () => {
  let clock: ManualClock;
  let ex: PaperExchange;

  beforeEach(async () => {
    clock = new ManualClock();
    ex = new PaperExchange({ symbol: SYMBOL, initialEquity: 1000, leverage: 10, initialPrice: 100, clock });
    await ex.connect();
  });

  it('fills a crossing limit order at its limit and tracks PnL', async () => {
    await ex.placeOrder(order({ side: 'Buy', price: 100 }));
    let pos = await ex.getPosition(SYMBOL);
    assert.equal(pos.size, 1);
    assert.equal(pos.entryPrice, 100);

    ex.setPrice(110);
    pos = await ex.getPosition(SYMBOL);
    assert.equal(pos.unrealizedPnl, 10);
    assert.equal(await ex.getEquity(), 1010);

    await ex.placeOrder(order({ side: 'Sell', price: 110 }));
    assert.equal((await ex.getPosition(SYMBOL)).size, 0);
    assert.equal(ex.getRealizedPnl(), 10);
    assert.equal(await ex.getEquity(), 1010);
  });

  it('rests a limit order until the price trades through it', async () => {
    const id = await ex.placeOrder(order({ price: 95, qty: 0.5 }));
    assert.deepEqual(await ex.getOpenOrders(SYMBOL), [
      { orderId: id, clientOrderId: 'gb-test', symbol: SYMBOL, side: 'Buy', price: 95, qty: 0.5 },
    ]);

    ex.setPrice(96);
    assert.equal((await ex.getOpenOrders(SYMBOL)).length, 1);

    ex.setPrice(95);
    assert.deepEqual(await ex.getOpenOrders(SYMBOL), []);
    const pos = await ex.getPosition(SYMBOL);
    assert.equal(pos.size, 0.5);
    assert.equal(pos.entryPrice, 95);
  });

  it('applies adverse slippage to market orders', async () => {
    const fills = ex.streamFills(new AbortController().signal)[Symbol.asyncIterator]();
    const next = fills.next();
    await ex.placeOrder(order({ orderType: 'Market', price: undefined }));

    const { value } = await next;
    assert.equal(value?.price, 100 * (1 + SLIPPAGE));
    assert.equal(value?.leavesQty, 0);
    assert.equal(value?.timestamp, clock.now());
  });

  it('clips reduce-only orders to the position and refuses ones that would grow it', async () => {
    await assert.rejects(ex.placeOrder(order({ side: 'Sell', orderType: 'Market', reduceOnly: true })), kind('REJECTED'));

    await ex.placeOrder(order({ price: 100 }));
    await ex.placeOrder(order({ side: 'Sell', orderType: 'Market', qty: 5, reduceOnly: true, price: undefined }));
    assert.equal((await ex.getPosition(SYMBOL)).size, 0);
  });

  it('rejects orders beyond the available margin', async () => {
    await assert.rejects(ex.placeOrder(order({ qty: 200 })), kind('INSUFFICIENT_BALANCE'));
  });

  it('rejects invalid orders', async () => {
    await assert.rejects(ex.placeOrder(order({ qty: 0 })), kind('REJECTED'));
    await assert.rejects(ex.placeOrder(order({ price: undefined })), kind('REJECTED'));
  });

  it('reports NOT_FOUND when cancelling an unknown order', async () => {
    await assert.rejects(ex.cancelOrder(SYMBOL, 'paper-99'), kind('NOT_FOUND'));

    const id = await ex.placeOrder(order({ price: 90 }));
    await ex.cancelOrder(SYMBOL, id);
    assert.deepEqual(await ex.getOpenOrders(SYMBOL), []);
    assert.ok(ex.calls.includes(`cancel:${id}`));
  });

  it('closes the position when the stop is hit', async () => {
    await assert.rejects(ex.setStopLoss(SYMBOL, 98), kind('REJECTED'));

    await ex.placeOrder(order({ price: 100 }));
    await ex.setStopLoss(SYMBOL, 98);
    assert.equal(ex.getStopLoss(), 98);

    ex.setPrice(97);
    assert.equal((await ex.getPosition(SYMBOL)).size, 0);
    assert.equal(ex.getRealizedPnl(), -2);
    assert.equal(ex.getStopLoss(), null);
    assert.equal(await ex.getEquity(), 998);
  });

  it('fails calls while disconnected', async () => {
    await ex.disconnect();
    assert.equal(ex.isConnected(), false);
    await assert.rejects(ex.getPrice(SYMBOL), kind('NETWORK'));
    // Leverage can be set before connecting
    await ex.setLeverage(SYMBOL, 5);
  });

  it('throws injected failures in order, once each', async () => {
    ex.failNext('getPrice', new ExchangeError('TIMEOUT', 'injected'));
    await assert.rejects(ex.getPrice(SYMBOL), { message: 'injected' });
    assert.equal((await ex.getPrice(SYMBOL)).price, 100);
  });

  it('records every call', async () => {
    await ex.placeOrder(order({ price: 90 }));
    await ex.getOpenOrders(SYMBOL);
    assert.deepEqual(ex.calls, ['connect', 'placeOrder', 'place:Buy:Limit', 'getOpenOrders']);
  });

  it('ends the fill stream on disconnect', async () => {
    const fills = ex.streamFills(new AbortController().signal)[Symbol.asyncIterator]();
    const next = fills.next();
    await ex.disconnect();
    assert.equal((await next).done, true);
  });
});
