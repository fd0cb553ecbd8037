// ============================================================
// Tick Loop
// ============================================================
// One tick:
//   1. price → position → equity → open orders (retried, timed out)
//   2. drain fills into the order book, reconcile with the exchange
//   3. risk evaluation; a kill switch short-circuits both engines
//   4. intents: risk → orphan cancels → grid → DCA
//   5. sequential submission, outcome routed to the owning engine
//      (risk actions included: they latch only once accepted)
//   6. publish an immutable snapshot; checkpoint if anything changed
//
// tick() is single-flight: a concurrent call joins the running tick.
// ============================================================

import { EngineError, errorMessage, isNotFound, isRejection, isUnrecoverable } from '../errors/index.js';
import { killSwitchIntents } from '../execution/riskManager.js';
import { newClientOrderId } from '../execution/exchange.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { deepFreeze } from '../utils/freeze.js';
import { withRetry } from '../utils/retry.js';
import type { DcaEngine } from './dcaEngine.js';
import type { FillFeed } from './fillFeed.js';
import type { GridEngine } from './gridEngine.js';
import type { StateStore } from '../database/stateStore.js';
import type { ExchangeClient } from '../execution/exchange.js';
import type { OrderBookState } from '../execution/orderBook.js';
import type { RiskManager } from '../execution/riskManager.js';
import type { Notifier } from '../monitoring/notifier.js';
import type { Clock } from '../utils/clock.js';
import type { RetryOptions } from '../utils/retry.js';
import type {
  BotSnapshot,
  CompletedFill,
  IntentOwner,
  IntentSource,
  OrderIntent,
  PersistedState,
  Position,
  RiskAction,
} from '../types/index.js';

const log = createModuleLogger('TickLoop');

type PlaceIntent = Extract<OrderIntent, { kind: 'PLACE' }>;
type StopIntent = Extract<OrderIntent, { kind: 'SET_STOP' }>;
export type EngineName = EngineError['engine'];

export interface TickLoopDeps {
  symbol: string;
  exchange: ExchangeClient;
  book: OrderBookState;
  grid: GridEngine | null;
  dca: DcaEngine | null;
  risk: RiskManager;
  fillFeed: FillFeed;
  store: StateStore;
  notifier: Notifier;
  clock: Clock;
  retry: RetryOptions;
  tickIntervalMs: number;
}

export interface TickResult {
  tick: number;
  action: RiskAction;
  placed: number;
  cancelled: number;
  fills: number;
  changed: boolean;
  sessionEnded: boolean;
}

export interface LoopHandlers {
  /** Loop stopped on an engine error or an unrecoverable exchange error */
  onCrash(err: Error): void;
  /** Kill switch completed: orders cancelled, position flat */
  onSessionEnd(reason: string): void;
}

export interface TickHealth {
  lastTickAt: number | null;
  consecutiveFailures: number;
  lastError: string | null;
  crashed: boolean;
}

export class TickLoop {
  private tickCount = 0;
  private inFlight: Promise<TickResult> | null = null;
  private snapshot: BotSnapshot | null = null;
  private lastTickAt: number | null = null;
  private consecutiveFailures = 0;
  private lastError: string | null = null;
  private crash: Error | null = null;
  private sessionEnded = false;
  private readonly crashedEngines = new Set<EngineName>();
  private pendingCancels: OrderIntent[] = [];
  private loop: { controller: AbortController; done: Promise<void> } | null = null;

  constructor(private readonly deps: TickLoopDeps) {}

  // --------------- Lifecycle ---------------

  /** Tick every `tickIntervalMs` (first tick after one interval) until stopped, crashed or the session ends. */
  start(handlers: LoopHandlers): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.crash = null;
    this.loop = { controller, done: this.run(controller.signal, handlers) };
    log.info(`Tick loop started (every ${this.deps.tickIntervalMs}ms)`);
  }

  /** Cooperative stop: resolves after the in-flight tick has finished. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (loop) {
      loop.controller.abort();
      await loop.done;
    }
    if (this.inFlight) {
      await this.inFlight.then(
        () => undefined,
        (err: unknown) => log.debug(`In-flight tick ended with error during stop: ${errorMessage(err)}`),
      );
    }
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  isSessionEnded(): boolean {
    return this.sessionEnded;
  }

  getHealth(): TickHealth {
    return {
      lastTickAt: this.lastTickAt,
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError,
      crashed: this.crash !== null,
    };
  }

  getSnapshot(): BotSnapshot | null {
    return this.snapshot;
  }

  /**
   * Bring crashed engines back: their state is cleared and their resting
   * orders are cancelled on the next tick. Risk state is kept as is.
   */
  restartCrashedEngines(): EngineName[] {
    const restarted = [...this.crashedEngines];
    for (const engine of restarted) {
      if (engine === 'GRID' && this.deps.grid) {
        this.deps.grid.reset();
        this.queueCancels('GRID');
      } else if (engine === 'DCA' && this.deps.dca) {
        this.deps.dca.reset();
        this.queueCancels('DCA');
      }
      log.info(`${engine} engine restarted`);
    }
    this.crashedEngines.clear();
    this.crash = null;
    return restarted;
  }

  /** Cancel every order the book tracks; orders already gone are ignored. */
  async cancelOpenOrders(): Promise<number> {
    let cancelled = 0;
    for (const order of this.deps.book.liveOrders()) {
      try {
        await this.cancel(order.orderId);
        cancelled += 1;
      } catch (err) {
        log.warn(`Could not cancel ${order.orderId} (${order.ref}): ${errorMessage(err)}`);
      }
    }
    return cancelled;
  }

  // --------------- Persistence ---------------

  restore(state: PersistedState): void {
    const { book, risk, grid, dca } = this.deps;
    book.restore(state.orders, state.position);
    risk.restore(state.risk);
    if (grid && state.grid) grid.restore(state.grid);
    dca?.restore(state.dca);
    this.sessionEnded = false;
    log.info(`Restored checkpoint from ${new Date(state.savedAt).toISOString()} (${state.orders.length} tracked orders)`);
  }

  buildCheckpoint(): PersistedState {
    const { symbol, book, risk, grid, dca, clock } = this.deps;
    return {
      version: 1,
      symbol,
      savedAt: clock.now(),
      position: book.getPosition(),
      risk: risk.getState(),
      grid: grid?.snapshot() ?? null,
      dca: dca?.snapshot() ?? { reference: null, ladder: [] },
      orders: book.snapshot(),
    };
  }

  /** Save a checkpoint; failures are logged, never thrown. */
  async checkpoint(): Promise<boolean> {
    try {
      await this.deps.store.saveState(this.buildCheckpoint());
      return true;
    } catch (err) {
      log.warn(`Checkpoint failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // --------------- Tick ---------------

  tick(): Promise<TickResult> {
    if (this.inFlight) return this.inFlight;
    const running = this.runTick().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = running;
    return running;
  }

  private async run(signal: AbortSignal, handlers: LoopHandlers): Promise<void> {
    try {
      while (!signal.aborted) {
        await this.deps.clock.sleep(this.deps.tickIntervalMs, signal);
        if (signal.aborted) break;
        try {
          const result = await this.tick();
          if (result.sessionEnded) {
            handlers.onSessionEnd(this.deps.risk.getState().killReason ?? 'kill switch');
            return;
          }
        } catch (err) {
          if (err instanceof EngineError || isUnrecoverable(err)) {
            this.crash = err instanceof Error ? err : new Error(errorMessage(err));
            log.error(`Tick loop crashed: ${this.crash.message}`);
            handlers.onCrash(this.crash);
            return;
          }
          // Counted in runTick; the next tick runs on schedule
        }
      }
    } finally {
      if (this.loop?.controller.signal === signal) this.loop = null;
    }
  }

  private async runTick(): Promise<TickResult> {
    const n = ++this.tickCount;
    try {
      const result = await this.executeTick(n);
      this.consecutiveFailures = 0;
      this.lastError = null;
      this.lastTickAt = this.deps.clock.now();
      return result;
    } catch (err) {
      this.consecutiveFailures += 1;
      this.lastError = errorMessage(err);
      log.warn(`Tick #${n} failed (${this.consecutiveFailures} consecutive): ${this.lastError}`);
      throw err;
    }
  }

  private async executeTick(n: number): Promise<TickResult> {
    const { symbol, exchange, book, grid, dca, risk, fillFeed, notifier, clock } = this.deps;

    if (this.sessionEnded) {
      return { tick: n, action: 'NONE', placed: 0, cancelled: 0, fills: 0, changed: false, sessionEnded: true };
    }

    // 1. Market view
    const price = await this.call('getPrice', () => exchange.getPrice(symbol));
    const position = await this.call('getPosition', () => exchange.getPosition(symbol));
    const equity = await this.call('getEquity', () => exchange.getEquity());
    const open = await this.call('getOpenOrders', () => exchange.getOpenOrders(symbol));
    const now = clock.now();

    // 2. Reconcile
    book.setPosition(position);
    const reported = book.applyFills(fillFeed.drain());
    const { orphans, synthesized } = book.reconcile(open, price.price, now);
    const fills: CompletedFill[] = [...reported, ...synthesized];
    for (const fill of fills) notifier.record({ type: 'FILL', symbol, fill });

    // 3. Risk
    const wasLatched = risk.isKillSwitchArmed();
    const decision = this.guard('RISK', () => risk.evaluate(position, [equity]));
    if (decision.action !== 'NONE') {
      notifier.record({ type: 'RISK', action: decision.action, state: decision.state });
    }

    // 4. Intents
    let intents: OrderIntent[];
    const killActive = decision.action === 'KILL_SWITCH' || wasLatched;
    if (killActive) {
      const reason = decision.state.killReason ?? 'kill switch';
      if (decision.action === 'KILL_SWITCH') {
        grid?.reset();
        dca?.reset();
        this.pendingCancels = [];
        notifier.alert(`🛑 <b>KILL SWITCH</b>\n${reason}\nCancelling all orders and flattening ${symbol}`);
      }
      intents = decision.action === 'KILL_SWITCH' ? decision.intents : killSwitchIntents(reason);
    } else {
      intents = [...decision.intents, ...this.pendingCancels];
      this.pendingCancels = [];
      for (const orphan of orphans) {
        intents.push({ kind: 'CANCEL', source: 'RECONCILE', ref: 'orphan', orderId: orphan.orderId });
      }
      try {
        if (grid && !this.crashedEngines.has('GRID')) {
          if (!grid.isInitialized()) this.guard('GRID', () => grid.initialize(price.price));
          intents.push(...this.guard('GRID', () => grid.onTick(price.price, fills)));
        }
        if (dca && !this.crashedEngines.has('DCA')) {
          intents.push(...this.guard('DCA', () => dca.onTick(price.price, fills)));
        }
      } catch (err) {
        // Nothing was submitted: hand collected work back before the crash surfaces
        this.abandon(intents, errorMessage(err));
        throw err;
      }
    }

    // 5. Submit
    const outcome = await this.execute(intents);

    let sessionEnded = false;
    if (killActive) {
      book.setPosition(await this.call('getPosition', () => exchange.getPosition(symbol)));
      this.sessionEnded = true;
      sessionEnded = true;
      notifier.alert(`🛑 <b>Session ended</b>\n${symbol} flat, all orders cancelled. Trading stopped.`);
    }

    // 6. Publish
    const changed = fills.length > 0 || decision.action !== 'NONE' || outcome.placed > 0 || outcome.cancelled > 0 || outcome.rejected > 0;
    this.publish(n, price, book.getPosition() ?? position, equity);
    if (changed) await this.checkpoint();

    log.debug(
      `Tick #${n} @ ${price.price}: ${fills.length} fills, ${outcome.placed} placed, ${outcome.cancelled} cancelled${decision.action !== 'NONE' ? `, risk ${decision.action}` : ''}`,
    );
    return {
      tick: n,
      action: decision.action,
      placed: outcome.placed,
      cancelled: outcome.cancelled,
      fills: fills.length,
      changed,
      sessionEnded,
    };
  }

  // --------------- Submission ---------------

  private async execute(intents: readonly OrderIntent[]): Promise<{ placed: number; cancelled: number; rejected: number }> {
    const { symbol, exchange, book } = this.deps;
    const counts = { placed: 0, cancelled: 0, rejected: 0 };

    for (let i = 0; i < intents.length; i++) {
      const intent = intents[i];
      try {
        switch (intent.kind) {
          case 'PLACE':
            if (await this.place(intent)) counts.placed += 1;
            else counts.rejected += 1;
            break;
          case 'CANCEL':
            await this.cancel(intent.orderId);
            counts.cancelled += 1;
            break;
          case 'CANCEL_ALL':
            await this.call('cancelAll', () => exchange.cancelAll(symbol));
            counts.cancelled += book.liveOrders().length;
            book.clear();
            break;
          case 'FLATTEN':
            if (await this.flatten()) counts.placed += 1;
            break;
          case 'SET_STOP':
            if (!(await this.setStop(intent))) counts.rejected += 1;
            break;
        }
      } catch (err) {
        this.failRemaining(intents.slice(i + 1), errorMessage(err));
        throw err;
      }
    }
    return counts;
  }

  /** Returns false when the exchange rejected the order. */
  private async place(intent: PlaceIntent): Promise<boolean> {
    const { symbol, exchange, book, notifier, clock } = this.deps;
    const owner = this.ownerOf(intent.source);
    const clientOrderId = newClientOrderId();

    let orderId: string;
    try {
      orderId = await this.call(`placeOrder ${intent.ref}`, () =>
        exchange.placeOrder({
          symbol,
          side: intent.side,
          orderType: intent.orderType,
          qty: intent.qty,
          price: intent.price,
          reduceOnly: intent.reduceOnly,
          clientOrderId,
        }),
      );
    } catch (err) {
      const reason = errorMessage(err);
      if (isRejection(err)) {
        notifier.record({ type: 'ORDER_REJECTED', ref: intent.ref, reason });
        if (owner) this.guard(intent.source, () => owner.onOrderRejected(intent.ref, reason));
        else log.warn(`${intent.ref} rejected: ${reason}`);
        return false;
      }
      if (owner) this.guard(intent.source, () => owner.onOrderFailed(intent.ref, reason));
      throw err;
    }

    book.track(
      {
        orderId,
        clientOrderId,
        ref: intent.ref,
        source: intent.source,
        side: intent.side,
        orderType: intent.orderType,
        price: intent.price ?? null,
        qty: intent.qty,
      },
      clock.now(),
    );
    if (owner) this.guard(intent.source, () => owner.onOrderPlaced(intent.ref, orderId));
    notifier.record({
      type: 'ORDER_PLACED',
      ref: intent.ref,
      orderId,
      side: intent.side,
      orderType: intent.orderType,
      qty: intent.qty,
      price: intent.price ?? null,
    });
    return true;
  }

  /** Returns false when the exchange rejected the stop. */
  private async setStop(intent: StopIntent): Promise<boolean> {
    const { symbol, exchange, risk, notifier } = this.deps;
    try {
      await this.call('setStopLoss', () => exchange.setStopLoss(symbol, intent.price));
    } catch (err) {
      const reason = errorMessage(err);
      if (isRejection(err)) {
        notifier.record({ type: 'ORDER_REJECTED', ref: intent.ref, reason });
        this.guard('RISK', () => risk.onOrderRejected(intent.ref, reason));
        return false;
      }
      this.guard('RISK', () => risk.onOrderFailed(intent.ref, reason));
      throw err;
    }
    this.guard('RISK', () => risk.onOrderPlaced(intent.ref, ''));
    return true;
  }

  private async cancel(orderId: string): Promise<void> {
    const { symbol, exchange, book } = this.deps;
    try {
      await this.call('cancelOrder', () => exchange.cancelOrder(symbol, orderId));
    } catch (err) {
      if (!isNotFound(err)) throw err;
      log.debug(`Order ${orderId} already gone`);
    }
    book.remove(orderId);
  }

  /** Close the whole position at market. Any failure, rejection included, fails the tick. */
  private async flatten(): Promise<boolean> {
    const { symbol, exchange, book, clock } = this.deps;
    const position: Position = await this.call('getPosition', () => exchange.getPosition(symbol));
    if (position.size === 0) return false;

    const qty = Math.abs(position.size);
    const side = position.size > 0 ? 'Sell' : 'Buy';
    const clientOrderId = newClientOrderId();
    const orderId = await this.call('flatten', () =>
      exchange.placeOrder({ symbol, side, orderType: 'Market', qty, reduceOnly: true, clientOrderId }),
    );
    book.track(
      { orderId, clientOrderId, ref: 'risk:flatten', source: 'RISK', side, orderType: 'Market', price: null, qty },
      clock.now(),
    );
    log.warn(`Flattened ${symbol}: ${side} ${qty} at market`);
    return true;
  }

  /** Tell owners their not-yet-submitted intents did not go out. */
  private failRemaining(rest: readonly OrderIntent[], reason: string): void {
    for (const intent of rest) {
      if (intent.kind !== 'PLACE' && intent.kind !== 'SET_STOP') continue;
      const owner = this.ownerOf(intent.source);
      if (owner) this.guard(intent.source, () => owner.onOrderFailed(intent.ref, `not submitted: ${reason}`));
    }
  }

  /** Intents built in a tick that then failed: owners are told, engine cancels are kept for the next tick. */
  private abandon(intents: readonly OrderIntent[], reason: string): void {
    for (const intent of intents) {
      if (intent.kind === 'CANCEL' && intent.source !== 'RECONCILE') this.pendingCancels.push(intent);
    }
    try {
      this.failRemaining(intents, reason);
    } catch (err) {
      log.error(`Could not hand back unsubmitted intents: ${errorMessage(err)}`);
    }
  }

  // --------------- Helpers ---------------

  private call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, this.deps.retry, this.deps.clock, label);
  }

  private ownerOf(source: IntentSource): IntentOwner | null {
    if (source === 'GRID') return this.deps.grid;
    if (source === 'DCA') return this.deps.dca;
    if (source === 'RISK') return this.deps.risk;
    return null;
  }

  /** Run engine code; a throw marks the engine crashed and surfaces as EngineError. */
  private guard<T>(source: IntentSource, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof EngineError) throw err;
      const engine: EngineName = source === 'GRID' || source === 'DCA' ? source : 'RISK';
      this.crashedEngines.add(engine);
      throw new EngineError(engine, `${engine} engine failed: ${errorMessage(err)}`, err);
    }
  }

  private queueCancels(source: IntentSource): void {
    for (const order of this.deps.book.liveOrders(source)) {
      this.pendingCancels.push({ kind: 'CANCEL', source, ref: order.ref, orderId: order.orderId });
    }
  }

  private publish(n: number, price: BotSnapshot['price'], position: Position, equity: number): void {
    const { risk, grid, dca, book, clock } = this.deps;
    this.snapshot = deepFreeze({
      tick: n,
      price: { ...price },
      position: { ...position },
      equity,
      risk: risk.getState(),
      grid: grid?.getLevels() ?? [],
      dca: dca?.getLadder() ?? [],
      orders: book.liveOrders(),
      publishedAt: clock.now(),
    });
  }
}
