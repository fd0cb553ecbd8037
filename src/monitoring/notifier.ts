// ============================================================
// Notifier - fire-and-forget event and alert fan-out
// ============================================================
// Sinks run detached from the caller; a failing sink is logged
// and never reaches the trading core.
// ============================================================

import { errorMessage } from '../errors/index.js';
import { createModuleLogger } from './logger.js';
import type {
  CompletedFill,
  OrderSide,
  OrderType,
  RiskAction,
  RiskState,
  SupervisorState,
} from '../types/index.js';

const log = createModuleLogger('Notifier');

export type BotEvent =
  | { type: 'FILL'; symbol: string; fill: CompletedFill }
  | {
      type: 'ORDER_PLACED';
      ref: string;
      orderId: string;
      side: OrderSide;
      orderType: OrderType;
      qty: number;
      price: number | null;
    }
  | { type: 'ORDER_REJECTED'; ref: string; reason: string }
  | { type: 'RISK'; action: RiskAction; state: RiskState }
  | { type: 'SUPERVISOR'; from: SupervisorState; to: SupervisorState; reason: string };

export interface Notifier {
  record(event: BotEvent): void;
  alert(message: string): void;
}

export interface NotifierSink {
  name: string;
  record?(event: BotEvent): Promise<void> | void;
  alert?(message: string): Promise<void> | void;
}

export class FanOutNotifier implements Notifier {
  constructor(private readonly sinks: readonly NotifierSink[]) {}

  record(event: BotEvent): void {
    for (const sink of this.sinks) {
      if (sink.record) this.dispatch(sink.name, () => sink.record?.(event));
    }
  }

  alert(message: string): void {
    log.warn(`ALERT: ${message.replace(/<[^>]+>/g, '')}`);
    for (const sink of this.sinks) {
      if (sink.alert) this.dispatch(sink.name, () => sink.alert?.(message));
    }
  }

  private dispatch(name: string, fn: () => Promise<void> | void): void {
    void Promise.resolve()
      .then(fn)
      .catch((err: unknown) => log.warn(`Notifier sink ${name} failed: ${errorMessage(err)}`));
  }
}
