// ============================================================
// Strategy Defaults (Grid + DCA)
// ============================================================

export const TRADING_DEFAULTS = {
  symbol: 'BTCUSDT',
  leverage: 10,
  maxLeverage: 100,
  initialCapital: 1000,
  /** BTCUSDT perpetual tick size is 0.1; 2 decimals covers most linear pairs */
  priceDecimals: 2,
  qtyDecimals: 3,
} as const;

export const GRID_DEFAULTS = {
  enabled: true,
  /** Symmetric band around the seed price when no explicit bounds are set */
  rangePercent: 3,
  levels: 20,
  orderSize: 0.01,
  /** A filled level flips to the other side this far from its anchor */
  profitOffsetPercent: 0.5,
  /** Rejections before a level is parked */
  maxRetries: 3,
} as const;

export const DCA_DEFAULTS = {
  enabled: true,
  direction: 'LONG',
  triggerPercent: 2,
  orderSize: 0.02,
  maxOrders: 5,
  scalingFactor: 1.5,
  /** Favourable move from the reference that ends the ladder */
  recoveryPercent: 3,
} as const;
