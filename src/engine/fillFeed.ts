// ============================================================
// Fill Feed
// ============================================================
// Pumps the exchange's execution stream into a buffer that the
// tick loop drains once per tick. Restarted on every reconnect.
// ============================================================

import { errorMessage } from '../errors/index.js';
import { createModuleLogger } from '../monitoring/logger.js';
import type { ExchangeClient } from '../execution/exchange.js';
import type { FillEvent } from '../types/index.js';

const log = createModuleLogger('FillFeed');

export class FillFeed {
  private buffer: FillEvent[] = [];
  private controller: AbortController | null = null;
  private pump: Promise<void> | null = null;
  private alive = false;
  private failure: Error | null = null;

  constructor(private readonly exchange: ExchangeClient) {}

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.alive = true;
    this.failure = null;
    this.pump = this.run(controller.signal);
    log.info('Fill feed started');
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    this.controller = null;
    controller.abort();
    await this.pump;
    this.pump = null;
  }

  /** Take every buffered fill, oldest first. */
  drain(): FillEvent[] {
    const fills = this.buffer;
    this.buffer = [];
    return fills;
  }

  isAlive(): boolean {
    return this.alive;
  }

  getLastError(): string | null {
    return this.failure?.message ?? null;
  }

  /** The error that ended the stream, kept whole so callers can classify it. */
  getFailure(): Error | null {
    return this.failure;
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      for await (const fill of this.exchange.streamFills(signal)) {
        this.buffer.push(fill);
      }
      if (!signal.aborted) {
        this.failure = new Error('fill stream ended');
        log.warn('Fill stream ended unexpectedly');
      }
    } catch (err) {
      if (!signal.aborted) {
        this.failure = err instanceof Error ? err : new Error(errorMessage(err));
        log.error(`Fill stream failed: ${this.failure.message}`);
      }
    } finally {
      this.alive = false;
    }
  }
}
