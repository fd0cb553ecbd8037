// ============================================================
// Bybit private execution stream
// ============================================================
// wss://stream.bybit.com/v5/private
//   → {op:'auth', args:[key, expires, sign]}   sign = HMAC("GET/realtime" + expires)
//   → {op:'subscribe', args:['execution']}
//   ← {topic:'execution', data:[...]}          only execType "Trade" is a fill
// Keepalive ping every 20s.
// ============================================================

import crypto from 'crypto';
import WebSocket from 'ws';
import { z } from 'zod';
import { ExchangeError } from '../errors/index.js';
import { createModuleLogger } from '../monitoring/logger.js';
import type { FillEvent } from '../types/index.js';

const log = createModuleLogger('BybitFillStream');

const MAINNET_WS = 'wss://stream.bybit.com/v5/private';
const TESTNET_WS = 'wss://stream-testnet.bybit.com/v5/private';
const PING_INTERVAL_MS = 20_000;
const AUTH_TTL_MS = 10_000;

export interface FillStreamOptions {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
}

const executionMessageSchema = z.object({
  topic: z.literal('execution'),
  data: z.array(
    z.object({
      symbol: z.string(),
      execId: z.string(),
      orderId: z.string(),
      orderLinkId: z.string().default(''),
      side: z.enum(['Buy', 'Sell']),
      execPrice: z.string(),
      execQty: z.string(),
      leavesQty: z.string().default('0'),
      execType: z.string(),
      execTime: z.string(),
    }),
  ),
});

const controlMessageSchema = z.object({
  op: z.string(),
  success: z.boolean().optional(),
  ret_msg: z.string().optional(),
});

export function authMessage(apiKey: string, apiSecret: string, expires: number): { op: 'auth'; args: [string, number, string] } {
  const signature = crypto.createHmac('sha256', apiSecret).update(`GET/realtime${expires}`).digest('hex');
  return { op: 'auth', args: [apiKey, expires, signature] };
}

/** Fills carried by one raw stream message; anything else yields []. */
export function parseExecutionMessage(raw: string): FillEvent[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    log.debug('Dropping non-JSON stream message');
    return [];
  }
  const parsed = executionMessageSchema.safeParse(json);
  if (!parsed.success) return [];

  return parsed.data.data
    .filter((e) => e.execType === 'Trade')
    .map((e) => ({
      execId: e.execId,
      orderId: e.orderId,
      clientOrderId: e.orderLinkId,
      symbol: e.symbol,
      side: e.side,
      price: parseFloat(e.execPrice),
      qty: parseFloat(e.execQty),
      leavesQty: parseFloat(e.leavesQty),
      timestamp: Number(e.execTime),
    }));
}

export class BybitFillStream {
  constructor(private readonly opts: FillStreamOptions) {}

  /** Yields fills until `signal` aborts; throws if the socket fails or auth is refused. */
  async *stream(signal: AbortSignal): AsyncIterable<FillEvent> {
    const url = this.opts.testnet ? TESTNET_WS : MAINNET_WS;
    const ws = new WebSocket(url);
    const queue: FillEvent[] = [];
    const status: { failure: Error | null; closed: boolean } = { failure: null, closed: false };
    let wake: (() => void) | null = null;
    let pingTimer: NodeJS.Timeout | undefined;

    const notify = () => wake?.();

    ws.on('open', () => {
      log.info(`Connected to ${url}, authenticating...`);
      ws.send(JSON.stringify(authMessage(this.opts.apiKey, this.opts.apiSecret, Date.now() + AUTH_TTL_MS)));
      pingTimer = setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify({ op: 'ping' }));
      }, PING_INTERVAL_MS);
    });

    ws.on('message', (data) => {
      const text = data.toString();
      const fills = parseExecutionMessage(text);
      if (fills.length > 0) {
        queue.push(...fills);
        notify();
        return;
      }
      this.handleControl(ws, text, (err) => {
        status.failure = err;
        notify();
      });
    });

    ws.on('error', (err) => {
      log.error(`Stream error: ${err.message}`);
      status.failure = new ExchangeError('NETWORK', `Execution stream error: ${err.message}`, undefined, err);
      notify();
    });

    ws.on('close', () => {
      status.closed = true;
      notify();
    });

    signal.addEventListener('abort', notify);
    try {
      while (!signal.aborted) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (status.failure) throw status.failure;
        if (status.closed) {
          log.warn('Execution stream closed by server');
          return;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = null;
      }
    } finally {
      signal.removeEventListener('abort', notify);
      clearInterval(pingTimer);
      ws.removeAllListeners();
      ws.on('error', (err) => log.debug(`Error while closing stream: ${err.message}`));
      // A socket still connecting cannot be closed cleanly
      if (ws.readyState === WebSocket.CONNECTING) ws.terminate();
      else ws.close();
    }
  }

  private handleControl(ws: WebSocket, text: string, fail: (err: Error) => void): void {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return;
    }
    const msg = controlMessageSchema.safeParse(json);
    if (!msg.success) return;

    const { op, success, ret_msg: retMsg } = msg.data;
    if (op === 'auth') {
      if (success) {
        ws.send(JSON.stringify({ op: 'subscribe', args: ['execution'] }));
      } else {
        fail(new ExchangeError('AUTH', `Execution stream auth refused: ${retMsg ?? 'unknown'}`));
      }
    } else if (op === 'subscribe' && success) {
      log.info('Subscribed to execution stream');
    } else if (op === 'subscribe') {
      fail(new ExchangeError('REJECTED', `Execution subscribe failed: ${retMsg ?? 'unknown'}`));
    }
  }
}
