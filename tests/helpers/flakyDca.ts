import { DcaEngine } from '../../src/engine/dcaEngine.js';
import type { CompletedFill, OrderIntent } from '../../src/types/index.js';

/** DCA engine that throws from onTick while `explode` is set. */
export class FlakyDca extends DcaEngine {
  explode = false;

  onTick(currentPrice: number, fills: readonly CompletedFill[] = [], trendReferencePrice?: number): OrderIntent[] {
    if (this.explode) throw new Error('dca boom');
    return super.onTick(currentPrice, fills, trendReferencePrice);
  }
}
