// ============================================================
// Paper Exchange
// ============================================================
// Simulated exchange driven by a price feed. No real orders are
// ever placed.
//
// Fill rules:
//   Market → immediately, 0.05% adverse slippage
//   Limit  → when price trades through the limit (at the limit)
//   Stop   → when price crosses the stop (at the stop)
//
// Equity = initial capital + realized PnL + unrealized PnL
// ============================================================

import { EventEmitter } from 'events';
import { ExchangeError } from '../errors/index.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { systemClock } from '../utils/clock.js';
import { roundTo } from '../utils/precision.js';
import type { Clock } from '../utils/clock.js';
import type { ExchangeClient } from './exchange.js';
import type { FillEvent, OpenOrder, OrderRequest, OrderSide, Position, PriceSnapshot } from '../types/index.js';

const log = createModuleLogger('PaperExchange');

/** Conservative slippage applied to market fills */
export const SLIPPAGE = 0.0005; // 0.05%
const SIZE_DECIMALS = 8;

export type PaperMethod =
  | 'connect'
  | 'getPrice'
  | 'placeOrder'
  | 'cancelOrder'
  | 'cancelAll'
  | 'getOpenOrders'
  | 'getPosition'
  | 'getEquity'
  | 'setLeverage'
  | 'setStopLoss';

export interface PaperExchangeOptions {
  symbol: string;
  initialEquity: number;
  leverage: number;
  /** Starting price when no price source is given */
  initialPrice?: number;
  /** Pulls the market price on every getPrice (e.g. the public Bybit ticker) */
  priceSource?: (symbol: string) => Promise<number>;
  clock?: Clock;
}

interface RestingOrder {
  orderId: string;
  request: OrderRequest;
  price: number;
}

export class PaperExchange implements ExchangeClient {
  /** Method calls in order, for inspection */
  readonly calls: string[] = [];

  private connected = false;
  private price: number;
  private leverage: number;
  private size = 0;
  private entryPrice = 0;
  private realizedPnl = 0;
  private stopLoss: number | null = null;
  private seq = 0;
  private readonly resting = new Map<string, RestingOrder>();
  private readonly failures = new Map<PaperMethod, ExchangeError[]>();
  private readonly events = new EventEmitter();
  private readonly clock: Clock;

  constructor(private readonly opts: PaperExchangeOptions) {
    this.price = opts.initialPrice ?? 0;
    this.leverage = opts.leverage;
    this.clock = opts.clock ?? systemClock;
    this.events.setMaxListeners(50);
  }

  // --------------- Test / simulation controls ---------------

  /** Make the next call to `method` fail with `err`. Queued failures apply in order. */
  failNext(method: PaperMethod, err: ExchangeError): void {
    const queue = this.failures.get(method) ?? [];
    queue.push(err);
    this.failures.set(method, queue);
  }

  /** End every open fill stream with `err`, as a dropped or refused socket would. */
  failStream(err: ExchangeError): void {
    this.events.emit('streamError', err);
  }

  /** Move the market; resting limit orders and the stop are matched against it. */
  setPrice(price: number): void {
    this.price = price;
    this.matchResting();
    this.checkStop();
  }

  getRealizedPnl(): number {
    return this.realizedPnl;
  }

  getStopLoss(): number | null {
    return this.stopLoss;
  }

  // --------------- ExchangeClient ---------------

  async connect(): Promise<void> {
    this.enter('connect', false);
    this.connected = true;
    log.info(`Paper exchange connected (${this.opts.symbol}, equity ${this.opts.initialEquity} USDT)`);
  }

  async disconnect(): Promise<void> {
    this.calls.push('disconnect');
    if (!this.connected) return;
    this.connected = false;
    this.events.emit('disconnect');
  }

  isConnected(): boolean {
    return this.connected;
  }

  async getPrice(symbol: string): Promise<PriceSnapshot> {
    this.enter('getPrice');
    if (this.opts.priceSource) {
      this.setPrice(await this.opts.priceSource(symbol));
    }
    if (!(this.price > 0)) {
      throw new ExchangeError('NETWORK', `No paper price available for ${symbol}`);
    }
    return Object.freeze({ symbol, price: this.price, timestamp: this.clock.now() });
  }

  async placeOrder(request: OrderRequest): Promise<string> {
    this.enter('placeOrder');
    this.calls.push(`place:${request.side}:${request.orderType}${request.reduceOnly ? ':reduce' : ''}`);

    if (!(request.qty > 0)) {
      throw new ExchangeError('REJECTED', `Invalid quantity ${request.qty}`);
    }
    if (request.orderType === 'Limit' && !(request.price !== undefined && request.price > 0)) {
      throw new ExchangeError('REJECTED', 'Limit order requires a positive price');
    }

    let qty = request.qty;
    if (request.reduceOnly) {
      const reduces = (request.side === 'Sell' && this.size > 0) || (request.side === 'Buy' && this.size < 0);
      if (!reduces) {
        throw new ExchangeError('REJECTED', 'Reduce-only order would increase position');
      }
      qty = Math.min(qty, Math.abs(this.size));
    } else {
      const refPrice = request.price ?? this.price;
      const margin = (qty * refPrice) / this.leverage;
      if (margin > this.equity()) {
        throw new ExchangeError(
          'INSUFFICIENT_BALANCE',
          `Insufficient balance: margin ${margin.toFixed(2)} > equity ${this.equity().toFixed(2)}`,
        );
      }
    }

    const orderId = `paper-${++this.seq}`;
    const order: OrderRequest = { ...request, qty };

    if (request.orderType === 'Market') {
      const fillPrice = request.side === 'Buy' ? this.price * (1 + SLIPPAGE) : this.price * (1 - SLIPPAGE);
      this.fill(orderId, order, fillPrice);
      return orderId;
    }

    const limit = request.price ?? this.price;
    const crosses = request.side === 'Buy' ? limit >= this.price : limit <= this.price;
    if (crosses) {
      this.fill(orderId, order, limit);
    } else {
      this.resting.set(orderId, { orderId, request: order, price: limit });
    }
    return orderId;
  }

  async cancelOrder(symbol: string, orderId: string): Promise<void> {
    this.enter('cancelOrder');
    this.calls.push(`cancel:${orderId}`);
    if (!this.resting.delete(orderId)) {
      throw new ExchangeError('NOT_FOUND', `Order ${orderId} not found on ${symbol}`);
    }
  }

  async cancelAll(symbol: string): Promise<void> {
    this.enter('cancelAll');
    log.info(`Cancelled ${this.resting.size} paper orders on ${symbol}`);
    this.resting.clear();
  }

  async getOpenOrders(symbol: string): Promise<OpenOrder[]> {
    this.enter('getOpenOrders');
    return [...this.resting.values()].map((o) => ({
      orderId: o.orderId,
      clientOrderId: o.request.clientOrderId,
      symbol,
      side: o.request.side,
      price: o.price,
      qty: o.request.qty,
    }));
  }

  async getPosition(symbol: string): Promise<Position> {
    this.enter('getPosition');
    return {
      symbol,
      size: this.size,
      entryPrice: this.entryPrice,
      markPrice: this.price,
      unrealizedPnl: this.unrealizedPnl(),
      leverage: this.leverage,
    };
  }

  async getEquity(): Promise<number> {
    this.enter('getEquity');
    return this.equity();
  }

  async setLeverage(symbol: string, leverage: number): Promise<void> {
    this.enter('setLeverage', false);
    if (!Number.isInteger(leverage) || leverage < 1 || leverage > 100) {
      throw new ExchangeError('REJECTED', `Leverage ${leverage} out of range for ${symbol}`);
    }
    this.leverage = leverage;
  }

  async setStopLoss(symbol: string, price: number): Promise<void> {
    this.enter('setStopLoss');
    if (this.size === 0) {
      throw new ExchangeError('REJECTED', `No open position on ${symbol} to protect`);
    }
    this.stopLoss = price;
    log.info(`Paper stop-loss set @ ${price}`);
  }

  async *streamFills(signal: AbortSignal): AsyncIterable<FillEvent> {
    const queue: FillEvent[] = [];
    let wake: (() => void) | null = null;
    const onFill = (fill: FillEvent) => {
      queue.push(fill);
      wake?.();
    };
    const onEnd = () => wake?.();
    const stream: { failure: ExchangeError | null } = { failure: null };
    const onError = (err: ExchangeError) => {
      stream.failure = err;
      wake?.();
    };

    this.events.on('fill', onFill);
    this.events.on('disconnect', onEnd);
    this.events.on('streamError', onError);
    signal.addEventListener('abort', onEnd);
    try {
      while (!signal.aborted && this.connected) {
        if (stream.failure) throw stream.failure;
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = null;
      }
    } finally {
      this.events.off('fill', onFill);
      this.events.off('disconnect', onEnd);
      this.events.off('streamError', onError);
      signal.removeEventListener('abort', onEnd);
    }
  }

  // --------------- Simulation ---------------

  private enter(method: PaperMethod, requireConnection = true): void {
    this.calls.push(method);
    const injected = this.failures.get(method)?.shift();
    if (injected) throw injected;
    if (requireConnection && !this.connected) {
      throw new ExchangeError('NETWORK', `Paper exchange disconnected (${method})`);
    }
  }

  private equity(): number {
    return this.opts.initialEquity + this.realizedPnl + this.unrealizedPnl();
  }

  private unrealizedPnl(): number {
    return this.size === 0 ? 0 : this.size * (this.price - this.entryPrice);
  }

  private matchResting(): void {
    for (const order of [...this.resting.values()]) {
      const hit = order.request.side === 'Buy' ? this.price <= order.price : this.price >= order.price;
      if (hit) {
        this.resting.delete(order.orderId);
        this.fill(order.orderId, order.request, order.price);
      }
    }
  }

  private checkStop(): void {
    if (this.stopLoss === null || this.size === 0) return;
    const hit = this.size > 0 ? this.price <= this.stopLoss : this.price >= this.stopLoss;
    if (!hit) return;

    const side: OrderSide = this.size > 0 ? 'Sell' : 'Buy';
    const stop = this.stopLoss;
    log.info(`Paper stop-loss hit @ ${stop}`);
    this.fill(`paper-${++this.seq}`, {
      symbol: this.opts.symbol,
      side,
      orderType: 'Market',
      qty: Math.abs(this.size),
      reduceOnly: true,
      clientOrderId: 'paper-stop',
    }, stop);
  }

  private fill(orderId: string, request: OrderRequest, price: number): void {
    this.applyToPosition(request.side, request.qty, price);
    const event: FillEvent = {
      execId: `exec-${++this.seq}`,
      orderId,
      clientOrderId: request.clientOrderId,
      symbol: request.symbol,
      side: request.side,
      price,
      qty: request.qty,
      leavesQty: 0,
      timestamp: this.clock.now(),
    };
    log.debug(`Paper fill: ${request.side} ${request.qty} @ ${price.toFixed(2)} (${orderId})`);
    this.events.emit('fill', event);
  }

  private applyToPosition(side: OrderSide, qty: number, price: number): void {
    const signed = side === 'Buy' ? qty : -qty;

    if (this.size === 0 || Math.sign(this.size) === Math.sign(signed)) {
      const total = Math.abs(this.size) + qty;
      this.entryPrice = (Math.abs(this.size) * this.entryPrice + qty * price) / total;
      this.size = roundTo(this.size + signed, SIZE_DECIMALS);
      return;
    }

    const closing = Math.min(qty, Math.abs(this.size));
    this.realizedPnl += closing * (price - this.entryPrice) * Math.sign(this.size);
    const before = this.size;
    this.size = roundTo(this.size + signed, SIZE_DECIMALS);

    if (this.size === 0) {
      this.entryPrice = 0;
      this.stopLoss = null;
    } else if (Math.sign(this.size) !== Math.sign(before)) {
      // Flipped through zero: the remainder opened at this price
      this.entryPrice = price;
      this.stopLoss = null;
    }
  }
}
