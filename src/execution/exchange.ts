// ============================================================
// Exchange Client contract
// ============================================================
// Implemented by BybitClient (live) and PaperExchange (simulated).
// Failures surface as ExchangeError with a classified kind.
// ============================================================

import { v4 as uuidv4 } from 'uuid';
import type { FillEvent, OpenOrder, OrderRequest, Position, PriceSnapshot } from '../types/index.js';

/** Every order this bot places carries a client id with this prefix. */
export const CLIENT_ID_PREFIX = 'gb-';

/** Bybit caps orderLinkId at 36 characters. */
export function newClientOrderId(): string {
  return `${CLIENT_ID_PREFIX}${uuidv4().replace(/-/g, '')}`;
}

export interface ExchangeClient {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  getPrice(symbol: string): Promise<PriceSnapshot>;
  /** Resolves with the exchange order id */
  placeOrder(request: OrderRequest): Promise<string>;
  /** Rejects with NOT_FOUND when the order is already gone */
  cancelOrder(symbol: string, orderId: string): Promise<void>;
  cancelAll(symbol: string): Promise<void>;
  getOpenOrders(symbol: string): Promise<OpenOrder[]>;
  /** Flat positions are returned with size 0 */
  getPosition(symbol: string): Promise<Position>;
  getEquity(): Promise<number>;
  setLeverage(symbol: string, leverage: number): Promise<void>;
  setStopLoss(symbol: string, price: number): Promise<void>;
  /** Lazy, infinite stream of executions; ends when `signal` aborts or the connection drops. */
  streamFills(signal: AbortSignal): AsyncIterable<FillEvent>;
}
