// ============================================================
// Grid Engine
// ============================================================
// Maintains a fixed ladder of limit orders across [lower, upper].
//
// Level lifecycle:
//   PENDING → OPEN (placed) → FILLED → flipped → PENDING
//   PENDING → CANCELLED (rejected) → retried until maxRetries, then parked
//
// A level is never rebuilt: a fill flips it between its anchor
// side/price and the opposite side at anchor × (1 ± offset).
// ============================================================

import { createModuleLogger } from '../monitoring/logger.js';
import { roundTo } from '../utils/precision.js';
import type {
  CompletedFill,
  GridLevel,
  GridRange,
  IntentOwner,
  OrderIntent,
  OrderSide,
  PersistedGrid,
} from '../types/index.js';

const log = createModuleLogger('GridEngine');

const REF_PREFIX = 'grid:';

export interface GridEngineOptions {
  range: GridRange;
  levels: number;
  orderSize: number;
  profitOffsetPercent: number;
  maxRetries: number;
  priceDecimals: number;
}

// --------------- Level Generation ---------------

/** Resolve the configured range into concrete bounds around `referencePrice`. */
export function resolveBounds(
  referencePrice: number,
  range: GridRange,
  priceDecimals: number,
): { lower: number; upper: number } {
  if (range.kind === 'BOUNDS') {
    return { lower: range.lower, upper: range.upper };
  }
  const fraction = range.percent / 100;
  return {
    lower: roundTo(referencePrice * (1 - fraction), priceDecimals),
    upper: roundTo(referencePrice * (1 + fraction), priceDecimals),
  };
}

/**
 * Compute `levelCount` strictly increasing prices spanning [lower, upper].
 *
 * levelCount + 1 points are spaced evenly and the interior point closest
 * to the reference (the seed slot) is left without an order. When the
 * reference sits on or beyond a bound there is no interior seed slot, so
 * levelCount points are spread across the full range instead.
 */
export function computeLevelPrices(
  referencePrice: number,
  lower: number,
  upper: number,
  levelCount: number,
  priceDecimals: number,
): number[] {
  if (!(lower > 0) || !(upper > lower)) {
    throw new Error(`Invalid grid bounds [${lower}, ${upper}]`);
  }
  if (!Number.isInteger(levelCount) || levelCount < 2) {
    throw new Error(`Grid needs at least 2 levels, got ${levelCount}`);
  }

  const step = (upper - lower) / levelCount;
  const seed = Math.round((referencePrice - lower) / step);

  let prices: number[];
  if (seed >= 1 && seed <= levelCount - 1) {
    prices = [];
    for (let i = 0; i <= levelCount; i++) {
      if (i !== seed) prices.push(roundTo(lower + step * i, priceDecimals));
    }
  } else {
    const spread = (upper - lower) / (levelCount - 1);
    prices = Array.from({ length: levelCount }, (_, i) => roundTo(lower + spread * i, priceDecimals));
  }

  for (let i = 1; i < prices.length; i++) {
    if (prices[i] <= prices[i - 1]) {
      throw new Error(`Grid spacing ${step} is below price precision (${priceDecimals} decimals)`);
    }
  }
  return prices;
}

export function gridRef(index: number): string {
  return `${REF_PREFIX}${index}`;
}

function parseGridRef(ref: string): number | null {
  if (!ref.startsWith(REF_PREFIX)) return null;
  const index = Number(ref.slice(REF_PREFIX.length));
  return Number.isInteger(index) ? index : null;
}

function opposite(side: OrderSide): OrderSide {
  return side === 'Buy' ? 'Sell' : 'Buy';
}

// --------------- Engine ---------------

export class GridEngine implements IntentOwner {
  private levels: GridLevel[] = [];
  private bounds: { lower: number; upper: number } | null = null;
  private reference: number | null = null;
  /** Levels with a PLACE intent awaiting its outcome */
  private readonly inFlight = new Set<number>();

  constructor(private readonly opts: GridEngineOptions) {}

  isInitialized(): boolean {
    return this.bounds !== null;
  }

  initialize(
    referencePrice: number,
    range: GridRange = this.opts.range,
    levelCount: number = this.opts.levels,
    orderSize: number = this.opts.orderSize,
  ): readonly GridLevel[] {
    const { lower, upper } = resolveBounds(referencePrice, range, this.opts.priceDecimals);
    const prices = computeLevelPrices(referencePrice, lower, upper, levelCount, this.opts.priceDecimals);

    this.levels = prices.map((price, index) => {
      const side: OrderSide = price < referencePrice ? 'Buy' : 'Sell';
      return {
        index,
        anchorPrice: price,
        anchorSide: side,
        price,
        side,
        size: orderSize,
        orderId: null,
        state: 'PENDING',
        rejections: 0,
        fills: 0,
      };
    });
    this.bounds = { lower, upper };
    this.reference = referencePrice;
    this.inFlight.clear();

    const buys = this.levels.filter((l) => l.side === 'Buy').length;
    log.info(
      `Grid initialized around ${referencePrice}: [${lower}, ${upper}] | ${buys} buy / ${this.levels.length - buys} sell levels`,
    );
    return this.getLevels();
  }

  /**
   * Fold completed fills into the ladder, then emit PLACE intents for
   * every level that needs an order and is not crossed by `currentPrice`.
   */
  onTick(currentPrice: number, fills: readonly CompletedFill[]): OrderIntent[] {
    for (const fill of fills) {
      if (fill.source === 'GRID') this.applyFill(fill);
    }

    const intents: OrderIntent[] = [];
    for (const level of this.levels) {
      if (!this.needsOrder(level) || this.inFlight.has(level.index)) continue;
      const crossed = level.side === 'Buy' ? level.price >= currentPrice : level.price <= currentPrice;
      if (crossed) continue;

      this.inFlight.add(level.index);
      intents.push({
        kind: 'PLACE',
        source: 'GRID',
        ref: gridRef(level.index),
        side: level.side,
        orderType: 'Limit',
        qty: level.size,
        price: level.price,
        reduceOnly: false,
      });
    }
    return intents;
  }

  onOrderPlaced(ref: string, orderId: string): void {
    const level = this.levelFor(ref);
    if (!level) return;
    this.inFlight.delete(level.index);
    level.orderId = orderId;
    level.state = 'OPEN';
  }

  onOrderRejected(ref: string, reason: string): void {
    const level = this.levelFor(ref);
    if (!level) return;
    this.inFlight.delete(level.index);
    level.orderId = null;
    level.state = 'CANCELLED';
    level.rejections += 1;
    if (level.rejections >= this.opts.maxRetries) {
      log.warn(`Level ${level.index} ${level.side} @ ${level.price} parked after ${level.rejections} rejections: ${reason}`);
    } else {
      log.warn(`Level ${level.index} ${level.side} @ ${level.price} rejected (${level.rejections}/${this.opts.maxRetries}): ${reason}`);
    }
  }

  onOrderFailed(ref: string, reason: string): void {
    const level = this.levelFor(ref);
    if (!level) return;
    this.inFlight.delete(level.index);
    level.state = 'PENDING';
    log.debug(`Level ${level.index} not submitted, retrying next tick: ${reason}`);
  }

  /** Clear the ladder; returns CANCEL intents for every live level order. */
  reset(): OrderIntent[] {
    const intents: OrderIntent[] = [];
    for (const level of this.levels) {
      if (level.state === 'OPEN' && level.orderId !== null) {
        intents.push({ kind: 'CANCEL', source: 'GRID', ref: gridRef(level.index), orderId: level.orderId });
      }
    }
    if (this.levels.length > 0) {
      log.info(`Grid reset: cancelling ${intents.length} live orders`);
    }
    this.levels = [];
    this.bounds = null;
    this.reference = null;
    this.inFlight.clear();
    return intents;
  }

  getLevels(): readonly GridLevel[] {
    return this.levels.map((l) => ({ ...l }));
  }

  snapshot(): PersistedGrid | null {
    if (!this.bounds || this.reference === null) return null;
    return { ...this.bounds, reference: this.reference, levels: this.levels.map((l) => ({ ...l })) };
  }

  restore(state: PersistedGrid): void {
    this.bounds = { lower: state.lower, upper: state.upper };
    this.reference = state.reference;
    this.levels = state.levels.map((l) => ({ ...l }));
    this.inFlight.clear();
    log.info(`Grid restored: ${this.levels.length} levels, ${this.levels.filter((l) => l.state === 'OPEN').length} open`);
  }

  // --------------- Internals ---------------

  private needsOrder(level: GridLevel): boolean {
    if (level.state === 'PENDING') return true;
    return level.state === 'CANCELLED' && level.rejections < this.opts.maxRetries;
  }

  private levelFor(ref: string): GridLevel | undefined {
    const index = parseGridRef(ref);
    if (index === null) return undefined;
    return this.levels.find((l) => l.index === index);
  }

  private applyFill(fill: CompletedFill): void {
    const level = this.levelFor(fill.ref);
    // Only the order currently resting on the level can flip it
    if (!level || level.state !== 'OPEN' || level.orderId !== fill.orderId) return;

    level.state = 'FILLED';
    level.fills += 1;
    const offset = this.opts.profitOffsetPercent / 100;
    const filledSide = level.side;

    if (level.side === level.anchorSide) {
      level.side = opposite(level.anchorSide);
      level.price = roundTo(
        level.anchorSide === 'Buy' ? level.anchorPrice * (1 + offset) : level.anchorPrice * (1 - offset),
        this.opts.priceDecimals,
      );
    } else {
      level.side = level.anchorSide;
      level.price = level.anchorPrice;
    }
    level.orderId = null;
    level.rejections = 0;
    level.state = 'PENDING';

    log.info(
      `Level ${level.index} ${filledSide} filled @ ${fill.price}${fill.synthesized ? ' (inferred)' : ''} → ${level.side} @ ${level.price}`,
    );
  }
}
