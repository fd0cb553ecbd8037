// ============================================================
// Risk Manager
// ============================================================
// Evaluated once per tick against the reconciled position.
//
// Priority (at most one action per evaluation):
//   1. Kill switch - drawdown ≥ max or manual request; latched
//   2. Partial profit - mark at `multiple` × entry; once per position
//   3. Breakeven - PnL beyond buffer; stop moves to entry, once per position
//
// Partial profit and breakeven latch only when the tick loop reports
// the order or stop as accepted. A failed submission is emitted again
// next evaluation; an action rejected RISK_MAX_REJECTIONS times is parked
// for the rest of the position.
// ============================================================

import { createModuleLogger } from '../monitoring/logger.js';
import { roundTo } from '../utils/precision.js';
import type { RiskConfig } from '../config/env.js';
import type { IntentOwner, OrderIntent, Position, RiskAction, RiskState, TrendDirection } from '../types/index.js';

const log = createModuleLogger('RiskManager');

const EPSILON = 1e-12;
export const RISK_MAX_REJECTIONS = 3;

export const PARTIAL_PROFIT_REF = 'risk:partial';
export const BREAKEVEN_REF = 'risk:breakeven';

export interface RiskManagerOptions extends RiskConfig {
  qtyDecimals: number;
}

export interface RiskDecision {
  action: RiskAction;
  intents: OrderIntent[];
  state: RiskState;
}

/** Cancel everything, then close the position at market. */
export function killSwitchIntents(reason: string): OrderIntent[] {
  return [
    { kind: 'CANCEL_ALL', source: 'RISK', reason },
    { kind: 'FLATTEN', source: 'RISK', reason },
  ];
}

function sideOf(position: Position): TrendDirection | null {
  if (position.size > 0) return 'LONG';
  if (position.size < 0) return 'SHORT';
  return null;
}

function freshState(equity: number): RiskState {
  return {
    peakEquity: equity,
    currentEquity: equity,
    drawdownPct: 0,
    breakevenArmed: false,
    partialProfitTaken: false,
    killSwitchArmed: false,
    killReason: null,
    positionSide: null,
  };
}

export class RiskManager implements IntentOwner {
  private state: RiskState;
  private manualKillReason: string | null = null;
  private readonly rejections = new Map<string, number>();

  constructor(
    private readonly opts: RiskManagerOptions,
    initialEquity: number,
  ) {
    this.state = freshState(initialEquity);
  }

  /**
   * @param equityHistory - equity observations since the last evaluation, oldest first
   */
  evaluate(position: Position, equityHistory: readonly number[]): RiskDecision {
    if (this.state.killSwitchArmed) {
      return this.decide('NONE', []);
    }

    const s = this.state;
    if (equityHistory.length > 0) {
      s.currentEquity = equityHistory[equityHistory.length - 1];
      s.peakEquity = Math.max(s.peakEquity, ...equityHistory);
    }
    const drawdown = s.peakEquity > 0 ? (s.peakEquity - s.currentEquity) / s.peakEquity : 0;
    s.drawdownPct = drawdown * 100;

    const side = sideOf(position);
    if (side !== s.positionSide) {
      if (side !== null) {
        s.breakevenArmed = false;
        s.partialProfitTaken = false;
        this.rejections.clear();
      }
      s.positionSide = side;
    }

    // 1. Kill switch
    const drawdownBreached = this.opts.killSwitchEnabled && drawdown >= this.opts.maxDrawdownPercent / 100 - EPSILON;
    if (this.manualKillReason !== null || drawdownBreached) {
      const reason =
        this.manualKillReason ??
        `Drawdown ${s.drawdownPct.toFixed(2)}% ≥ ${this.opts.maxDrawdownPercent}% (peak ${s.peakEquity.toFixed(2)}, equity ${s.currentEquity.toFixed(2)})`;
      s.killSwitchArmed = true;
      s.killReason = reason;
      this.manualKillReason = null;
      log.error(`KILL SWITCH: ${reason}`);
      return this.decide('KILL_SWITCH', killSwitchIntents(reason));
    }

    if (side === null || position.entryPrice <= 0) {
      return this.decide('NONE', []);
    }

    // 2. Partial profit
    if (this.opts.partialProfitEnabled && !s.partialProfitTaken) {
      const target =
        side === 'LONG'
          ? position.entryPrice * this.opts.partialProfitMultiple
          : position.entryPrice / this.opts.partialProfitMultiple;
      const reached = side === 'LONG' ? position.markPrice >= target : position.markPrice <= target;
      if (reached) {
        const qty = roundTo((Math.abs(position.size) * this.opts.partialProfitPercent) / 100, this.opts.qtyDecimals);
        if (qty <= 0) {
          s.partialProfitTaken = true;
          log.warn(`Partial profit target ${target} reached but ${this.opts.partialProfitPercent}% of ${position.size} rounds to zero`);
          return this.decide('NONE', []);
        }
        log.info(`Partial profit: mark ${position.markPrice} reached ${target}; reducing ${side} by ${qty}`);
        return this.decide('TAKE_PARTIAL_PROFIT', [
          {
            kind: 'PLACE',
            source: 'RISK',
            ref: PARTIAL_PROFIT_REF,
            side: side === 'LONG' ? 'Sell' : 'Buy',
            orderType: 'Market',
            qty,
            reduceOnly: true,
          },
        ]);
      }
    }

    // 3. Breakeven
    if (this.opts.breakevenEnabled && !s.breakevenArmed) {
      const notional = Math.abs(position.size) * position.entryPrice;
      if (position.unrealizedPnl > (notional * this.opts.breakevenBufferPercent) / 100) {
        log.info(`Breakeven: uPnL ${position.unrealizedPnl.toFixed(2)} → stop to entry ${position.entryPrice}`);
        return this.decide('ARM_BREAKEVEN', [
          { kind: 'SET_STOP', source: 'RISK', ref: BREAKEVEN_REF, price: position.entryPrice },
        ]);
      }
    }

    return this.decide('NONE', []);
  }

  // --------------- Outcomes ---------------

  onOrderPlaced(ref: string, orderId: string): void {
    this.latch(ref);
    this.rejections.delete(ref);
    log.info(`${ref} accepted${orderId ? ` (${orderId})` : ''}`);
  }

  onOrderRejected(ref: string, reason: string): void {
    const count = (this.rejections.get(ref) ?? 0) + 1;
    this.rejections.set(ref, count);
    if (count >= RISK_MAX_REJECTIONS) {
      this.latch(ref);
      log.error(`${ref} rejected ${count} times, parked for this position: ${reason}`);
    } else {
      log.warn(`${ref} rejected (${count}/${RISK_MAX_REJECTIONS}): ${reason}`);
    }
  }

  onOrderFailed(ref: string, reason: string): void {
    log.warn(`${ref} not applied, retrying next tick: ${reason}`);
  }

  /** Latch the kill switch on the next evaluation (operator request). */
  requestKillSwitch(reason: string): void {
    if (this.state.killSwitchArmed) return;
    this.manualKillReason = `Manual kill: ${reason}`;
    log.warn(`Kill switch requested: ${reason}`);
  }

  isKillSwitchArmed(): boolean {
    return this.state.killSwitchArmed;
  }

  /** Start a new session: clears every latch and re-seeds peak equity. */
  resetSession(equity: number): void {
    this.state = freshState(equity);
    this.manualKillReason = null;
    this.rejections.clear();
    log.info(`Risk session reset at equity ${equity.toFixed(2)}`);
  }

  getState(): RiskState {
    return { ...this.state };
  }

  restore(state: RiskState): void {
    this.state = { ...state };
    log.info(
      `Risk state restored: peak=${state.peakEquity.toFixed(2)} dd=${state.drawdownPct.toFixed(2)}%${state.killSwitchArmed ? ' [KILL SWITCH ARMED]' : ''}`,
    );
  }

  private latch(ref: string): void {
    if (ref === PARTIAL_PROFIT_REF) this.state.partialProfitTaken = true;
    else if (ref === BREAKEVEN_REF) this.state.breakevenArmed = true;
  }

  private decide(action: RiskAction, intents: OrderIntent[]): RiskDecision {
    return { action, intents, state: this.getState() };
  }
}
