// ============================================================
// Bybit API v5 Client
// ============================================================
// Linear perpetuals over REST; fills over the private WebSocket.
// Set BYBIT_TESTNET=true to route to testnet.
//
// Every failure is raised as an ExchangeError whose kind decides
// how the core reacts (retry, park, or stop).
// ============================================================

import crypto from 'crypto';
import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { ExchangeError, errorMessage } from '../errors/index.js';
import type { ExchangeErrorKind } from '../errors/index.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { BybitFillStream } from './bybitFillStream.js';
import type { ExchangeClient } from './exchange.js';
import type {
  BybitOpenOrdersResult,
  BybitOrderResult,
  BybitPositionResult,
  BybitResponse,
  BybitTickerResult,
  BybitWalletResult,
  FillEvent,
  OpenOrder,
  OrderRequest,
  Position,
  PriceSnapshot,
} from '../types/index.js';

const log = createModuleLogger('BybitClient');
const MAINNET_URL = 'https://api.bybit.com';
const TESTNET_URL = 'https://api-testnet.bybit.com';

/** Leverage already at the requested value */
const RET_LEVERAGE_NOT_MODIFIED = 110043;

const RETCODE_KINDS: ReadonlyMap<number, ExchangeErrorKind> = new Map<number, ExchangeErrorKind>([
  [10006, 'RATE_LIMITED'],
  [10018, 'RATE_LIMITED'],
  [10003, 'AUTH'],
  [10004, 'AUTH'],
  [10005, 'AUTH'],
  [33004, 'AUTH'],
  [110007, 'INSUFFICIENT_BALANCE'],
  [110012, 'INSUFFICIENT_BALANCE'],
  [110052, 'INSUFFICIENT_BALANCE'],
  [110001, 'NOT_FOUND'],
  [110008, 'NOT_FOUND'],
  [110010, 'NOT_FOUND'],
]);

export interface BybitClientOptions {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
  recvWindow: number;
  timeoutMs: number;
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter;
}

type Params = Record<string, string | number | boolean>;

/**
 * Generate Bybit v5 API HMAC-SHA256 signature.
 * preSign = timestamp + apiKey + recvWindow + params
 */
export function generateSignature(
  apiSecret: string,
  timestamp: string,
  apiKey: string,
  recvWindow: string,
  params: string,
): string {
  const preSign = timestamp + apiKey + recvWindow + params;
  return crypto.createHmac('sha256', apiSecret).update(preSign).digest('hex');
}

/** Map a non-zero retCode to an ExchangeError. */
export function retCodeError(retCode: number, retMsg: string, label: string): ExchangeError {
  const kind = RETCODE_KINDS.get(retCode) ?? 'REJECTED';
  return new ExchangeError(kind, `${label} failed: ${retMsg} (retCode ${retCode})`, retCode);
}

/** Map a transport failure (timeout, no response, HTTP status) to an ExchangeError. */
export function transportError(err: unknown, label: string): ExchangeError {
  if (err instanceof ExchangeError) return err;
  if (!axios.isAxiosError(err)) {
    return new ExchangeError('NETWORK', `${label} failed: ${errorMessage(err)}`, undefined, err);
  }
  if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
    return new ExchangeError('TIMEOUT', `${label} timed out`, undefined, err);
  }
  const status = err.response?.status;
  if (status === undefined) {
    return new ExchangeError('NETWORK', `${label} failed: ${err.message}`, undefined, err);
  }
  if (status === 429) return new ExchangeError('RATE_LIMITED', `${label} rate limited (HTTP 429)`, undefined, err);
  if (status === 401 || status === 403) {
    return new ExchangeError('AUTH', `${label} unauthorized (HTTP ${status})`, undefined, err);
  }
  if (status >= 500) return new ExchangeError('NETWORK', `${label} failed: HTTP ${status}`, undefined, err);
  return new ExchangeError('REJECTED', `${label} failed: HTTP ${status}`, undefined, err);
}

/**
 * Bybit v5 REST client implementing the ExchangeClient contract.
 * Handles base URL selection (mainnet / testnet) and auth headers.
 */
export class BybitClient implements ExchangeClient {
  private readonly http: AxiosInstance;
  private readonly fills: BybitFillStream;
  private connected = false;

  constructor(private readonly opts: BybitClientOptions) {
    const baseURL = opts.testnet ? TESTNET_URL : MAINNET_URL;
    log.info(`BybitClient initialised — ${opts.testnet ? 'TESTNET' : 'MAINNET'}`);

    this.http = axios.create({
      baseURL,
      timeout: opts.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
      ...(opts.adapter && { adapter: opts.adapter }),
    });
    this.fills = new BybitFillStream({ apiKey: opts.apiKey, apiSecret: opts.apiSecret, testnet: opts.testnet });
  }

  // --------------- Connection ---------------

  /** Verifies credentials with an authenticated call. */
  async connect(): Promise<void> {
    const equity = await this.getEquity();
    this.connected = true;
    log.info(`Connected to Bybit — equity ${equity.toFixed(2)} USDT`);
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  // --------------- Market Data ---------------

  async getPrice(symbol: string): Promise<PriceSnapshot> {
    const result = await this.request<BybitTickerResult>('GET', '/v5/market/tickers', { category: 'linear', symbol }, false);
    const ticker = result.list[0];
    if (!ticker) throw new ExchangeError('REJECTED', `No ticker found for ${symbol}`);
    return Object.freeze({ symbol, price: parseFloat(ticker.lastPrice), timestamp: Date.now() });
  }

  // --------------- Orders ---------------

  async placeOrder(request: OrderRequest): Promise<string> {
    const body: Params = {
      category: 'linear',
      symbol: request.symbol,
      side: request.side,
      orderType: request.orderType,
      qty: String(request.qty),
      timeInForce: request.orderType === 'Limit' ? 'GTC' : 'IOC',
      reduceOnly: request.reduceOnly ?? false,
      orderLinkId: request.clientOrderId,
    };
    if (request.orderType === 'Limit' && request.price !== undefined) body['price'] = String(request.price);

    const result = await this.request<BybitOrderResult>('POST', '/v5/order/create', body);
    log.info(
      `Order placed: ${request.side} ${request.orderType} ${request.qty}${request.price !== undefined ? ` @ ${request.price}` : ''} → ${result.orderId}`,
    );
    return result.orderId;
  }

  async cancelOrder(symbol: string, orderId: string): Promise<void> {
    await this.request('POST', '/v5/order/cancel', { category: 'linear', symbol, orderId });
  }

  async cancelAll(symbol: string): Promise<void> {
    await this.request('POST', '/v5/order/cancel-all', { category: 'linear', symbol });
    log.info(`All orders cancelled on ${symbol}`);
  }

  async getOpenOrders(symbol: string): Promise<OpenOrder[]> {
    const result = await this.request<BybitOpenOrdersResult>('GET', '/v5/order/realtime', {
      category: 'linear',
      symbol,
      openOnly: 0,
      limit: 50,
    });
    return result.list.map((o) => ({
      orderId: o.orderId,
      clientOrderId: o.orderLinkId,
      symbol: o.symbol,
      side: o.side,
      price: parseFloat(o.price),
      qty: parseFloat(o.qty),
    }));
  }

  // --------------- Position & Account ---------------

  async getPosition(symbol: string): Promise<Position> {
    const result = await this.request<BybitPositionResult>('GET', '/v5/position/list', { category: 'linear', symbol });
    const pos = result.list[0];
    const size = pos ? parseFloat(pos.size) : 0;
    if (!pos || pos.side === '' || size === 0) {
      return { symbol, size: 0, entryPrice: 0, markPrice: pos ? parseFloat(pos.markPrice) : 0, unrealizedPnl: 0, leverage: pos ? parseFloat(pos.leverage) : 0 };
    }
    return {
      symbol,
      size: pos.side === 'Sell' ? -size : size,
      entryPrice: parseFloat(pos.avgPrice),
      markPrice: parseFloat(pos.markPrice),
      unrealizedPnl: parseFloat(pos.unrealisedPnl),
      leverage: parseFloat(pos.leverage),
    };
  }

  /** Total equity of the Unified Trading Account in USDT. */
  async getEquity(): Promise<number> {
    const result = await this.request<BybitWalletResult>('GET', '/v5/account/wallet-balance', {
      accountType: 'UNIFIED',
      coin: 'USDT',
    });
    const account = result.list[0];
    if (!account) throw new ExchangeError('REJECTED', 'Wallet balance returned no account');
    return parseFloat(account.totalEquity);
  }

  async setLeverage(symbol: string, leverage: number): Promise<void> {
    try {
      await this.request('POST', '/v5/position/set-leverage', {
        category: 'linear',
        symbol,
        buyLeverage: String(leverage),
        sellLeverage: String(leverage),
      });
    } catch (err) {
      if (err instanceof ExchangeError && err.retCode === RET_LEVERAGE_NOT_MODIFIED) return;
      throw err;
    }
    log.info(`Leverage set to ${leverage}x on ${symbol}`);
  }

  async setStopLoss(symbol: string, price: number): Promise<void> {
    await this.request('POST', '/v5/position/trading-stop', {
      category: 'linear',
      symbol,
      stopLoss: String(price),
      slTriggerBy: 'MarkPrice',
      tpslMode: 'Full',
      positionIdx: 0,
    });
    log.info(`Stop-loss set @ ${price} on ${symbol}`);
  }

  streamFills(signal: AbortSignal): AsyncIterable<FillEvent> {
    return this.fills.stream(signal);
  }

  // --------------- Transport ---------------

  private async request<T>(method: 'GET' | 'POST', path: string, params: Params, signed = true): Promise<T> {
    const label = `${method} ${path}`;
    const query = method === 'GET' ? new URLSearchParams(Object.entries(params).map(([k, v]): [string, string] => [k, String(v)])).toString() : '';
    const body = method === 'POST' ? JSON.stringify(params) : undefined;
    const headers = signed ? this.getAuthHeaders(method === 'GET' ? query : (body ?? '')) : {};

    let data: BybitResponse<T>;
    try {
      const response = await this.http.request<BybitResponse<T>>({
        method,
        url: query ? `${path}?${query}` : path,
        data: body,
        headers,
      });
      data = response.data;
    } catch (err) {
      throw transportError(err, label);
    }

    if (data.retCode !== 0) throw retCodeError(data.retCode, data.retMsg, label);
    return data.result;
  }

  private getAuthHeaders(params: string): Record<string, string> {
    const timestamp = Date.now().toString();
    const recvWindow = String(this.opts.recvWindow);
    const sign = generateSignature(this.opts.apiSecret, timestamp, this.opts.apiKey, recvWindow, params);

    return {
      'X-BAPI-API-KEY': this.opts.apiKey,
      'X-BAPI-SIGN': sign,
      'X-BAPI-SIGN-TYPE': '2',
      'X-BAPI-TIMESTAMP': timestamp,
      'X-BAPI-RECV-WINDOW': recvWindow,
      'Content-Type': 'application/json',
    };
  }
}
