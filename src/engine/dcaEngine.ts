// ============================================================
// DCA Engine - scaling trend entries
// ============================================================
// LONG ladders buy as price falls away from the trend reference,
// SHORT ladders sell as it rises. Each trigger ratchets the
// reference to the trigger price, so the next entry needs a
// further full move.
//
// Entry n is sized orderSize × scalingFactor^(n-1).
// ============================================================

import { createModuleLogger } from '../monitoring/logger.js';
import { roundTo } from '../utils/precision.js';
import type {
  CompletedFill,
  DcaLadderEntry,
  IntentOwner,
  OrderIntent,
  PersistedDca,
  TrendDirection,
} from '../types/index.js';

const log = createModuleLogger('DCAEngine');

const REF_PREFIX = 'dca:';
/** Absorbs float error in displacement ratios such as 1176 / 58800 */
const EPSILON = 1e-12;

export interface DcaEngineOptions {
  direction: TrendDirection;
  triggerPercent: number;
  orderSize: number;
  maxOrders: number;
  scalingFactor: number;
  recoveryPercent: number;
  qtyDecimals: number;
}

export function dcaRef(index: number): string {
  return `${REF_PREFIX}${index}`;
}

function parseDcaRef(ref: string): number | null {
  if (!ref.startsWith(REF_PREFIX)) return null;
  const index = Number(ref.slice(REF_PREFIX.length));
  return Number.isInteger(index) ? index : null;
}

export class DcaEngine implements IntentOwner {
  private reference: number | null = null;
  private ladder: DcaLadderEntry[] = [];
  private readonly inFlight = new Set<number>();

  constructor(private readonly opts: DcaEngineOptions) {}

  /**
   * Evaluate one tick. The first price seen becomes the trend reference;
   * pass `trendReferencePrice` to re-anchor explicitly.
   */
  onTick(currentPrice: number, fills: readonly CompletedFill[] = [], trendReferencePrice?: number): OrderIntent[] {
    for (const fill of fills) {
      if (fill.source === 'DCA') this.applyFill(fill);
    }

    if (trendReferencePrice !== undefined) this.reference = trendReferencePrice;
    if (this.reference === null) {
      this.reference = currentPrice;
      log.info(`Trend reference set to ${currentPrice} (${this.opts.direction})`);
    }
    const reference = this.reference;

    // Positive = adverse to the ladder direction
    const displacement =
      this.opts.direction === 'LONG'
        ? (reference - currentPrice) / reference
        : (currentPrice - reference) / reference;

    if (this.ladder.length > 0 && -displacement >= this.opts.recoveryPercent / 100 - EPSILON) {
      log.info(
        `Trend recovered ${(-displacement * 100).toFixed(2)}% from ${reference} → ladder of ${this.ladder.length} reset`,
      );
      this.resetLadder(currentPrice);
      return [];
    }

    const intents: OrderIntent[] = [];
    for (const entry of this.ladder) {
      if (entry.state === 'PENDING' && entry.orderId === null && !this.inFlight.has(entry.index)) {
        intents.push(this.placeIntent(entry));
      }
    }

    if (displacement >= this.opts.triggerPercent / 100 - EPSILON) {
      if (this.ladder.length >= this.opts.maxOrders) {
        log.debug(`DCA trigger at ${currentPrice} ignored: ladder full (${this.opts.maxOrders})`);
        return intents;
      }
      const index = this.ladder.length + 1;
      const sizeMultiplier = this.opts.scalingFactor ** (index - 1);
      const size = roundTo(this.opts.orderSize * sizeMultiplier, this.opts.qtyDecimals);
      if (size <= 0) {
        log.warn(`DCA entry #${index} rounds to zero size; skipped`);
        return intents;
      }

      const entry: DcaLadderEntry = {
        index,
        triggerPrice: currentPrice,
        sizeMultiplier,
        size,
        orderId: null,
        state: 'PENDING',
      };
      this.ladder.push(entry);
      this.reference = currentPrice;
      intents.push(this.placeIntent(entry));

      log.info(
        `DCA entry #${index}/${this.opts.maxOrders}: ${this.opts.direction} ${size} @ ~${currentPrice} (${(displacement * 100).toFixed(2)}% from ${reference})`,
      );
    }
    return intents;
  }

  onOrderPlaced(ref: string, orderId: string): void {
    const entry = this.entryFor(ref);
    if (!entry) return;
    this.inFlight.delete(entry.index);
    entry.orderId = orderId;
  }

  /** A rejected entry keeps its slot in the sequence. */
  onOrderRejected(ref: string, reason: string): void {
    const entry = this.entryFor(ref);
    if (!entry) return;
    this.inFlight.delete(entry.index);
    entry.state = 'PARKED';
    log.warn(`DCA entry #${entry.index} rejected and parked: ${reason}`);
  }

  onOrderFailed(ref: string, reason: string): void {
    const entry = this.entryFor(ref);
    if (!entry) return;
    this.inFlight.delete(entry.index);
    log.debug(`DCA entry #${entry.index} not submitted, retrying next tick: ${reason}`);
  }

  /** Clear the ladder. Entries are market orders, so there is nothing to cancel. */
  reset(): void {
    this.resetLadder(null);
  }

  getLadder(): readonly DcaLadderEntry[] {
    return this.ladder.map((e) => ({ ...e }));
  }

  getReference(): number | null {
    return this.reference;
  }

  snapshot(): PersistedDca {
    return { reference: this.reference, ladder: this.ladder.map((e) => ({ ...e })) };
  }

  restore(state: PersistedDca): void {
    this.reference = state.reference;
    this.ladder = state.ladder.map((e) => ({ ...e }));
    this.inFlight.clear();
    log.info(`DCA restored: ${this.ladder.length} entries, reference ${state.reference ?? 'unset'}`);
  }

  // --------------- Internals ---------------

  private resetLadder(reference: number | null): void {
    this.ladder = [];
    this.reference = reference;
    this.inFlight.clear();
  }

  private placeIntent(entry: DcaLadderEntry): OrderIntent {
    this.inFlight.add(entry.index);
    return {
      kind: 'PLACE',
      source: 'DCA',
      ref: dcaRef(entry.index),
      side: this.opts.direction === 'LONG' ? 'Buy' : 'Sell',
      orderType: 'Market',
      qty: entry.size,
      reduceOnly: false,
    };
  }

  private entryFor(ref: string): DcaLadderEntry | undefined {
    const index = parseDcaRef(ref);
    if (index === null) return undefined;
    return this.ladder.find((e) => e.index === index);
  }

  private applyFill(fill: CompletedFill): void {
    const entry = this.entryFor(fill.ref);
    if (!entry || entry.state === 'FILLED') return;
    if (entry.orderId !== null && entry.orderId !== fill.orderId) return;
    entry.orderId = fill.orderId;
    entry.state = 'FILLED';
    log.info(`DCA entry #${entry.index} filled: ${fill.qty} @ ${fill.price}`);
  }
}
