// ============================================================
// Order Book State
// ============================================================
// This process's view of its own live orders and the last
// authoritative position. Written only by the tick loop's
// reconciliation step.
// ============================================================

import { createModuleLogger } from '../monitoring/logger.js';
import { CLIENT_ID_PREFIX } from './exchange.js';
import type {
  CompletedFill,
  FillEvent,
  IntentSource,
  OpenOrder,
  OrderSide,
  OrderType,
  Position,
  TrackedOrder,
} from '../types/index.js';

const log = createModuleLogger('OrderBook');

/** Reconciliations an order may be missing from the exchange before it counts as filled */
export const MISSING_RECONCILES_BEFORE_FILL = 2;
const MAX_SEEN_EXEC_IDS = 5000;
const QTY_EPSILON = 1e-9;

export interface NewOrder {
  orderId: string;
  clientOrderId: string;
  ref: string;
  source: IntentSource;
  side: OrderSide;
  orderType: OrderType;
  price: number | null;
  qty: number;
}

export interface ReconcileResult {
  /** Exchange orders carrying our client-id prefix that nothing tracks */
  orphans: OpenOrder[];
  /** Completions inferred for tracked orders that vanished */
  synthesized: CompletedFill[];
}

export class OrderBookState {
  private readonly orders = new Map<string, TrackedOrder>();
  private readonly seenExecIds = new Set<string>();
  private position: Position | null = null;

  constructor(private readonly symbol: string) {}

  track(order: NewOrder, placedAt: number): void {
    this.orders.set(order.orderId, {
      ...order,
      filledQty: 0,
      filledNotional: 0,
      missedReconciles: 0,
      placedAt,
    });
  }

  remove(orderId: string): TrackedOrder | undefined {
    const order = this.orders.get(orderId);
    this.orders.delete(orderId);
    return order;
  }

  get(orderId: string): TrackedOrder | undefined {
    const order = this.orders.get(orderId);
    return order ? { ...order } : undefined;
  }

  liveOrders(source?: IntentSource): TrackedOrder[] {
    const all = [...this.orders.values()].map((o) => ({ ...o }));
    return source ? all.filter((o) => o.source === source) : all;
  }

  clear(): void {
    this.orders.clear();
  }

  setPosition(position: Position): void {
    this.position = { ...position };
  }

  getPosition(): Position | null {
    return this.position ? { ...this.position } : null;
  }

  /**
   * Fold execution reports into tracked orders. Duplicate exec ids are
   * ignored; an order completes when nothing is left resting.
   */
  applyFills(events: readonly FillEvent[]): CompletedFill[] {
    const completed: CompletedFill[] = [];
    for (const ev of events) {
      if (ev.symbol !== this.symbol || this.seenExecIds.has(ev.execId)) continue;
      this.rememberExecId(ev.execId);

      const order = this.orders.get(ev.orderId);
      if (!order) {
        log.debug(`Fill ${ev.execId} for untracked order ${ev.orderId} ignored`);
        continue;
      }
      order.filledQty += ev.qty;
      order.filledNotional += ev.price * ev.qty;

      if (ev.leavesQty <= QTY_EPSILON || order.filledQty >= order.qty - QTY_EPSILON) {
        this.orders.delete(order.orderId);
        completed.push({
          orderId: order.orderId,
          ref: order.ref,
          source: order.source,
          side: order.side,
          price: order.filledNotional / order.filledQty,
          qty: order.filledQty,
          timestamp: ev.timestamp,
          synthesized: false,
        });
      }
    }
    return completed;
  }

  /**
   * Compare tracked orders with the exchange's open orders.
   * An order absent for MISSING_RECONCILES_BEFORE_FILL consecutive
   * reconciliations is treated as filled at its limit price (market
   * orders at `currentPrice`).
   */
  reconcile(open: readonly OpenOrder[], currentPrice: number, now: number): ReconcileResult {
    const openIds = new Set(open.map((o) => o.orderId));
    const orphans = open.filter((o) => !this.orders.has(o.orderId) && o.clientOrderId.startsWith(CLIENT_ID_PREFIX));

    const synthesized: CompletedFill[] = [];
    for (const order of [...this.orders.values()]) {
      if (openIds.has(order.orderId)) {
        order.missedReconciles = 0;
        continue;
      }
      order.missedReconciles += 1;
      if (order.missedReconciles < MISSING_RECONCILES_BEFORE_FILL) continue;

      const remaining = Math.max(0, order.qty - order.filledQty);
      const price = order.price ?? currentPrice;
      const notional = order.filledNotional + remaining * price;
      this.orders.delete(order.orderId);
      synthesized.push({
        orderId: order.orderId,
        ref: order.ref,
        source: order.source,
        side: order.side,
        price: notional / order.qty,
        qty: order.qty,
        timestamp: now,
        synthesized: true,
      });
      log.warn(`Order ${order.orderId} (${order.ref}) vanished from the exchange; treating as filled @ ${price}`);
    }

    if (orphans.length > 0) {
      log.warn(`${orphans.length} orphaned order(s) found: ${orphans.map((o) => o.orderId).join(', ')}`);
    }
    return { orphans, synthesized };
  }

  snapshot(): TrackedOrder[] {
    return this.liveOrders();
  }

  restore(orders: readonly TrackedOrder[], position: Position | null): void {
    this.orders.clear();
    for (const o of orders) this.orders.set(o.orderId, { ...o });
    this.position = position ? { ...position } : null;
  }

  private rememberExecId(execId: string): void {
    this.seenExecIds.add(execId);
    if (this.seenExecIds.size > MAX_SEEN_EXEC_IDS) {
      const oldest = this.seenExecIds.values().next();
      if (!oldest.done) this.seenExecIds.delete(oldest.value);
    }
  }
}
