import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MemoryStateStore } from '../../src/database/stateStore.js';
import { FillFeed } from '../../src/engine/fillFeed.js';
import { GridEngine } from '../../src/engine/gridEngine.js';
import type { GridEngineOptions } from '../../src/engine/gridEngine.js';
import { TickLoop } from '../../src/engine/tickLoop.js';
import { EngineError, ExchangeError } from '../../src/errors/index.js';
import { OrderBookState } from '../../src/execution/orderBook.js';
import { PaperExchange } from '../../src/execution/paperExchange.js';
import { RiskManager } from '../../src/execution/riskManager.js';
import { RISK_DEFAULTS } from '../../src/config/risk.js';
import { flush } from '../helpers/async.js';
import { FlakyDca } from '../helpers/flakyDca.js';
import { FlakyGrid } from '../helpers/flakyGrid.js';
import { ManualClock } from '../helpers/manualClock.js';
import { RecordingNotifier } from '../helpers/notifier.js';

const SYMBOL = 'BTCUSDT';

const gridOptions: GridEngineOptions = {
  range: { kind: 'BOUNDS', lower: 90, upper: 110 },
  levels: 4,
  orderSize: 0.5,
  profitOffsetPercent: 1,
  maxRetries: 2,
  priceDecimals: 2,
};

interface Harness {
  clock: ManualClock;
  exchange: PaperExchange;
  book: OrderBookState;
  grid: FlakyGrid | null;
  dca: FlakyDca | null;
  risk: RiskManager;
  feed: FillFeed;
  store: MemoryStateStore;
  notifier: RecordingNotifier;
  loop: TickLoop;
}

/** Buy 1 at market (fills at 100.05) outside any engine. */
async function openLong(h: Harness): Promise<void> {
  await h.exchange.placeOrder({ symbol: SYMBOL, side: 'Buy', orderType: 'Market', qty: 1, clientOrderId: 'manual-1' });
  await flush();
}

async function setup(opts: { grid?: boolean; dca?: boolean } = {}): Promise<Harness> {
  const clock = new ManualClock();
  const exchange = new PaperExchange({ symbol: SYMBOL, initialEquity: 1000, leverage: 10, initialPrice: 100, clock });
  await exchange.connect();
  const book = new OrderBookState(SYMBOL);
  const grid = opts.grid === false ? null : new FlakyGrid(gridOptions);
  const dca = opts.dca
    ? new FlakyDca({
        direction: 'LONG',
        triggerPercent: 2,
        orderSize: 0.1,
        maxOrders: 3,
        scalingFactor: 1,
        recoveryPercent: 3,
        qtyDecimals: 3,
      })
    : null;
  const risk = new RiskManager({ ...RISK_DEFAULTS, qtyDecimals: 3 }, 1000);
  const feed = new FillFeed(exchange);
  feed.start();
  const store = new MemoryStateStore(SYMBOL);
  const notifier = new RecordingNotifier();
  const loop = new TickLoop({
    symbol: SYMBOL,
    exchange,
    book,
    grid,
    dca,
    risk,
    fillFeed: feed,
    store,
    notifier,
    clock,
    retry: { attempts: 1, baseDelayMs: 0, maxDelayMs: 0, timeoutMs: 0 },
    tickIntervalMs: 1000,
  });
  return { clock, exchange, book, grid, dca, risk, feed, store, notifier, loop };
}

describe('TickLoop', () => {
  it('seeds the grid on the first tick and checkpoints', async () => {
    const h = await setup();
    const result = await h.loop.tick();

    assert.deepEqual(result, { tick: 1, action: 'NONE', placed: 4, cancelled: 0, fills: 0, changed: true, sessionEnded: false });
    assert.deepEqual(
      h.book.liveOrders().map((o) => [o.ref, o.orderId, o.price]),
      [
        ['grid:0', 'paper-1', 90],
        ['grid:1', 'paper-2', 95],
        ['grid:2', 'paper-3', 105],
        ['grid:3', 'paper-4', 110],
      ],
    );
    assert.ok(h.book.liveOrders().every((o) => o.clientOrderId.startsWith('gb-')));
    assert.equal(h.notifier.ofType('ORDER_PLACED').length, 4);
    assert.equal(h.store.saves, 1);
    await h.feed.stop();
  });

  it('joins a concurrent tick instead of running a second one', async () => {
    const h = await setup();
    const first = h.loop.tick();
    const second = h.loop.tick();

    assert.equal(first, second);
    const [a, b] = await Promise.all([first, second]);
    assert.equal(a, b);
    assert.equal(a.tick, 1);
    assert.equal(h.book.liveOrders().length, 4);
    assert.equal((await h.loop.tick()).tick, 2);
    await h.feed.stop();
  });

  it('publishes a frozen snapshot', async () => {
    const h = await setup();
    await h.loop.tick();

    const snap = h.loop.getSnapshot();
    assert.ok(snap);
    assert.ok(Object.isFrozen(snap));
    assert.ok(Object.isFrozen(snap.grid));
    assert.equal(snap.tick, 1);
    assert.equal(snap.equity, 1000);
    assert.equal(snap.price.price, 100);
    assert.ok(snap.grid.every((l) => l.state === 'OPEN'));
    await h.feed.stop();
  });

  it('routes a fill to the grid, which flips the level', async () => {
    const h = await setup();
    await h.loop.tick();
    h.exchange.setPrice(95);
    await flush();

    const result = await h.loop.tick();
    assert.equal(result.fills, 1);
    assert.equal(result.placed, 1);
    const [fill] = h.notifier.ofType('FILL');
    assert.equal(fill?.fill.ref, 'grid:1');
    assert.equal(fill?.fill.price, 95);
    assert.equal(fill?.fill.synthesized, false);

    const level = h.grid?.getLevels()[1];
    assert.equal(level?.side, 'Sell');
    assert.equal(level?.price, 95.95);
    assert.equal(level?.orderId, 'paper-6');
    assert.equal(h.loop.getSnapshot()?.position.size, 0.5);
    await h.feed.stop();
  });

  it('enters a DCA order when the trend moves against it', async () => {
    const h = await setup({ grid: false, dca: true });
    await h.loop.tick();
    h.exchange.setPrice(98);

    const result = await h.loop.tick();
    assert.equal(result.placed, 1);
    assert.deepEqual(h.exchange.calls.filter((c) => c.startsWith('place:')), ['place:Buy:Market']);
    assert.equal(h.dca?.getLadder()[0]?.orderId, 'paper-1');

    await flush();
    await h.loop.tick();
    assert.equal(h.dca?.getLadder()[0]?.state, 'FILLED');
    await h.feed.stop();
  });

  it('parks a rejected level and retries it next tick', async () => {
    const h = await setup();
    h.exchange.failNext('placeOrder', new ExchangeError('REJECTED', 'price out of band'));

    const first = await h.loop.tick();
    assert.equal(first.placed, 3);
    assert.deepEqual(h.notifier.ofType('ORDER_REJECTED'), [
      { type: 'ORDER_REJECTED', ref: 'grid:0', reason: 'price out of band' },
    ]);
    assert.equal(h.grid?.getLevels()[0]?.state, 'CANCELLED');

    const second = await h.loop.tick();
    assert.equal(second.placed, 1);
    assert.equal(h.grid?.getLevels()[0]?.state, 'OPEN');
    await h.feed.stop();
  });

  it('counts transient failures and clears them on success', async () => {
    const h = await setup();
    h.exchange.failNext('getPrice', new ExchangeError('NETWORK', 'socket hang up'));

    await assert.rejects(h.loop.tick(), { message: 'socket hang up' });
    assert.equal(h.loop.getHealth().consecutiveFailures, 1);
    assert.equal(h.loop.getHealth().lastError, 'socket hang up');

    await h.loop.tick();
    assert.equal(h.loop.getHealth().consecutiveFailures, 0);
    assert.equal(h.loop.getHealth().lastTickAt, h.clock.now());
    await h.feed.stop();
  });

  it('hands unsubmitted placements back to the grid after a transient failure', async () => {
    const h = await setup();
    h.exchange.failNext('placeOrder', new ExchangeError('TIMEOUT', 'slow'));

    await assert.rejects(h.loop.tick());
    assert.ok(h.grid?.getLevels().every((l) => l.state === 'PENDING'));

    const retry = await h.loop.tick();
    assert.equal(retry.placed, 4);
    await h.feed.stop();
  });

  it('cancels orphaned orders carrying our client id', async () => {
    const h = await setup({ grid: false });
    await h.exchange.placeOrder({ symbol: SYMBOL, side: 'Buy', orderType: 'Limit', qty: 0.1, price: 80, clientOrderId: 'gb-left-behind' });

    const result = await h.loop.tick();
    assert.equal(result.cancelled, 1);
    assert.ok(h.exchange.calls.includes('cancel:paper-1'));
    assert.deepEqual(await h.exchange.getOpenOrders(SYMBOL), []);
    await h.feed.stop();
  });

  it('infers a fill for an order that vanished without a report', async () => {
    const h = await setup();
    await h.loop.tick();
    await h.exchange.cancelOrder(SYMBOL, 'paper-1');

    assert.equal((await h.loop.tick()).fills, 0);
    const third = await h.loop.tick();
    assert.equal(third.fills, 1);
    const [fill] = h.notifier.ofType('FILL');
    assert.equal(fill?.fill.ref, 'grid:0');
    assert.equal(fill?.fill.synthesized, true);
    assert.equal(h.grid?.getLevels()[0]?.side, 'Sell');
    await h.feed.stop();
  });

  describe('kill switch', () => {
    it('cancels everything, flattens and ends the session', async () => {
      const h = await setup();
      await h.loop.tick();
      h.exchange.setPrice(95);
      await flush();
      h.risk.requestKillSwitch('test');

      const result = await h.loop.tick();
      assert.equal(result.action, 'KILL_SWITCH');
      assert.equal(result.sessionEnded, true);
      assert.equal(result.cancelled, 3);
      assert.equal(result.placed, 1);
      assert.deepEqual(await h.exchange.getOpenOrders(SYMBOL), []);
      assert.equal((await h.exchange.getPosition(SYMBOL)).size, 0);
      assert.ok(h.exchange.calls.includes('place:Sell:Market:reduce'));
      assert.equal(h.grid?.isInitialized(), false);
      assert.equal(h.loop.getSnapshot()?.position.size, 0);
      assert.equal(h.notifier.alerts[0], '🛑 <b>KILL SWITCH</b>\nManual kill: test\nCancelling all orders and flattening BTCUSDT');
      assert.equal(h.notifier.ofType('RISK')[0]?.action, 'KILL_SWITCH');

      const after = await h.loop.tick();
      assert.equal(after.sessionEnded, true);
      assert.equal(after.placed, 0);
      assert.equal(h.loop.isSessionEnded(), true);
      await h.feed.stop();
    });

    it('retries the shutdown on the next tick when it fails', async () => {
      const h = await setup();
      await h.loop.tick();
      h.risk.requestKillSwitch('test');
      h.exchange.failNext('cancelAll', new ExchangeError('NETWORK', 'down'));

      await assert.rejects(h.loop.tick(), { message: 'down' });
      assert.equal(h.loop.isSessionEnded(), false);

      const retry = await h.loop.tick();
      assert.equal(retry.action, 'NONE');
      assert.equal(retry.sessionEnded, true);
      assert.deepEqual(await h.exchange.getOpenOrders(SYMBOL), []);
      await h.feed.stop();
    });
  });

  describe('risk actions', () => {
    it('retries a partial profit whose order did not go out', async () => {
      const h = await setup({ grid: false });
      await openLong(h);
      h.exchange.setPrice(250);
      h.exchange.failNext('placeOrder', new ExchangeError('NETWORK', 'socket hang up'));

      await assert.rejects(h.loop.tick(), { message: 'socket hang up' });
      assert.equal(h.risk.getState().partialProfitTaken, false);

      const retry = await h.loop.tick();
      assert.equal(retry.action, 'TAKE_PARTIAL_PROFIT');
      assert.equal(retry.placed, 1);
      assert.equal((await h.exchange.getPosition(SYMBOL)).size, 0.5);
      assert.equal(h.risk.getState().partialProfitTaken, true);

      const next = await h.loop.tick();
      assert.equal(next.action, 'ARM_BREAKEVEN');
      const { entryPrice } = await h.exchange.getPosition(SYMBOL);
      assert.equal(h.exchange.getStopLoss(), entryPrice);
      assert.equal((await h.loop.tick()).action, 'NONE');
      await h.feed.stop();
    });

    it('keeps ticking when the breakeven stop is rejected and sets it next tick', async () => {
      const h = await setup({ grid: false });
      await openLong(h);
      h.exchange.setPrice(101);
      h.exchange.failNext('setStopLoss', new ExchangeError('REJECTED', 'stop rejected'));

      const first = await h.loop.tick();
      assert.equal(first.action, 'ARM_BREAKEVEN');
      assert.equal(h.exchange.getStopLoss(), null);
      assert.equal(h.risk.getState().breakevenArmed, false);
      assert.deepEqual(
        h.notifier.ofType('ORDER_REJECTED').map((e) => [e.ref, e.reason]),
        [['risk:breakeven', 'stop rejected']],
      );
      assert.equal(h.loop.getHealth().consecutiveFailures, 0);

      const second = await h.loop.tick();
      assert.equal(second.action, 'ARM_BREAKEVEN');
      assert.equal(h.exchange.getStopLoss(), (await h.exchange.getPosition(SYMBOL)).entryPrice);
      assert.equal(h.risk.getState().breakevenArmed, true);
      assert.equal((await h.loop.tick()).action, 'NONE');
      await h.feed.stop();
    });

    it('keeps the grid placing when the stop is rejected in the same tick', async () => {
      const h = await setup();
      await openLong(h);
      h.exchange.setPrice(101);
      h.exchange.failNext('setStopLoss', new ExchangeError('REJECTED', 'stop rejected'));

      const result = await h.loop.tick();
      assert.equal(result.action, 'ARM_BREAKEVEN');
      assert.equal(result.placed, 4);
      await h.feed.stop();
    });
  });

  describe('engine crashes', () => {
    it('hands the grid its placements back when DCA crashes in the same tick', async () => {
      const h = await setup({ dca: true });
      if (h.dca) h.dca.explode = true;

      await assert.rejects(h.loop.tick(), (err: unknown) => err instanceof EngineError && err.engine === 'DCA');
      assert.deepEqual(h.book.liveOrders(), []);
      assert.ok(h.grid?.getLevels().every((l) => l.state === 'PENDING'));

      if (h.dca) h.dca.explode = false;
      assert.deepEqual(h.loop.restartCrashedEngines(), ['DCA']);
      const result = await h.loop.tick();
      assert.equal(result.placed, 4);
      assert.deepEqual(
        h.book.liveOrders().map((o) => [o.ref, o.orderId]),
        [
          ['grid:0', 'paper-1'],
          ['grid:1', 'paper-2'],
          ['grid:2', 'paper-3'],
          ['grid:3', 'paper-4'],
        ],
      );
      await h.feed.stop();
    });

    it('keeps queued engine cancels when a later engine crashes', async () => {
      const h = await setup({ dca: true });
      await h.loop.tick();
      if (h.grid) h.grid.explode = true;
      await assert.rejects(h.loop.tick(), { message: 'GRID engine failed: boom' });
      if (h.grid) h.grid.explode = false;
      h.loop.restartCrashedEngines();

      if (h.dca) h.dca.explode = true;
      await assert.rejects(h.loop.tick(), { message: 'DCA engine failed: dca boom' });
      assert.equal(h.book.liveOrders().length, 4);

      if (h.dca) h.dca.explode = false;
      h.loop.restartCrashedEngines();
      const result = await h.loop.tick();
      assert.equal(result.cancelled, 4);
      assert.equal(result.placed, 4);
      await h.feed.stop();
    });

    it('surfaces an engine throw as EngineError and restarts the engine cleanly', async () => {
      const h = await setup();
      await h.loop.tick();
      if (h.grid) h.grid.explode = true;

      await assert.rejects(h.loop.tick(), (err: unknown) => {
        return err instanceof EngineError && err.engine === 'GRID' && err.message === 'GRID engine failed: boom';
      });

      if (h.grid) h.grid.explode = false;
      assert.deepEqual(h.loop.restartCrashedEngines(), ['GRID']);
      const result = await h.loop.tick();
      assert.equal(result.cancelled, 4);
      assert.equal(result.placed, 4);
      assert.deepEqual(
        h.book.liveOrders().map((o) => o.orderId),
        ['paper-5', 'paper-6', 'paper-7', 'paper-8'],
      );
      await h.feed.stop();
    });
  });

  it('restores from its own checkpoint without re-placing orders', async () => {
    const h = await setup();
    await h.loop.tick();
    const saved = await h.store.loadState();
    assert.ok(saved);

    const book = new OrderBookState(SYMBOL);
    const grid = new GridEngine(gridOptions);
    const loop = new TickLoop({
      symbol: SYMBOL,
      exchange: h.exchange,
      book,
      grid,
      dca: null,
      risk: new RiskManager({ ...RISK_DEFAULTS, qtyDecimals: 3 }, 1000),
      fillFeed: h.feed,
      store: h.store,
      notifier: h.notifier,
      clock: h.clock,
      retry: { attempts: 1, baseDelayMs: 0, maxDelayMs: 0, timeoutMs: 0 },
      tickIntervalMs: 1000,
    });
    loop.restore(saved);

    const result = await loop.tick();
    assert.equal(result.placed, 0);
    assert.equal(result.cancelled, 0);
    assert.equal(book.liveOrders().length, 4);
    await h.feed.stop();
  });

  describe('run loop', () => {
    it('ticks once per interval until stopped', async () => {
      const h = await setup();
      h.loop.start({ onCrash: () => assert.fail('unexpected crash'), onSessionEnd: () => assert.fail('unexpected end') });
      assert.equal(h.loop.isRunning(), true);

      await flush();
      assert.equal(h.loop.getSnapshot(), null);
      h.clock.advance(1000);
      await flush();
      assert.equal(h.loop.getSnapshot()?.tick, 1);
      h.clock.advance(1000);
      await flush();
      assert.equal(h.loop.getSnapshot()?.tick, 2);

      await h.loop.stop();
      assert.equal(h.loop.isRunning(), false);
      await h.feed.stop();
    });

    it('reports the end of the session', async () => {
      const h = await setup();
      const ended: string[] = [];
      h.loop.start({ onCrash: () => assert.fail('unexpected crash'), onSessionEnd: (reason) => ended.push(reason) });
      h.risk.requestKillSwitch('operator');

      await flush();
      h.clock.advance(1000);
      await flush();
      assert.deepEqual(ended, ['Manual kill: operator']);
      assert.equal(h.loop.isRunning(), false);
      await h.feed.stop();
    });

    it('stops and reports an engine crash', async () => {
      const h = await setup();
      await h.loop.tick();
      if (h.grid) h.grid.explode = true;
      const crashes: Error[] = [];
      h.loop.start({ onCrash: (err) => crashes.push(err), onSessionEnd: () => assert.fail('unexpected end') });

      await flush();
      h.clock.advance(1000);
      await flush();
      assert.equal(crashes.length, 1);
      assert.ok(crashes[0] instanceof EngineError);
      assert.equal(h.loop.getHealth().crashed, true);
      assert.equal(h.loop.isRunning(), false);
      await h.feed.stop();
    });
  });
});
