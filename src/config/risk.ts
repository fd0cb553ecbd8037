// ============================================================
// Risk Management Defaults
// ============================================================

export const RISK_DEFAULTS = {
  killSwitchEnabled: true,
  /** 20% from peak equity latches the kill switch */
  maxDrawdownPercent: 20,
  breakevenEnabled: true,
  /** Unrealized PnL must exceed 0.1% of notional before the stop moves to entry */
  breakevenBufferPercent: 0.1,
  partialProfitEnabled: true,
  /** Close 50% of the position when the profit multiple is reached */
  partialProfitPercent: 50,
  /** Mark price at 2x entry (long) or entry / 2 (short) */
  partialProfitMultiple: 2,
} as const;
