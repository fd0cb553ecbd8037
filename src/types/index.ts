// ============================================================
// Grid / DCA Bot - Shared TypeScript Types
// ============================================================

// --------------- Orders ---------------

export type OrderSide = 'Buy' | 'Sell';
export type OrderType = 'Limit' | 'Market';
export type TrendDirection = 'LONG' | 'SHORT';

export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  orderType: OrderType;
  qty: number;
  /** Required for Limit orders */
  price?: number;
  reduceOnly?: boolean;
  /** Our own id (Bybit orderLinkId), used to recognise orphans */
  clientOrderId: string;
}

export interface OpenOrder {
  orderId: string;
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  price: number;
  qty: number;
}

/** One execution reported by the exchange (may be a partial fill). */
export interface FillEvent {
  execId: string;
  orderId: string;
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  price: number;
  qty: number;
  /** Quantity still resting after this execution; 0 = order complete */
  leavesQty: number;
  timestamp: number;
}

export type IntentSource = 'GRID' | 'DCA' | 'RISK' | 'RECONCILE';

/** An order fully filled, attributed to the component that owns it. */
export interface CompletedFill {
  orderId: string;
  ref: string;
  source: IntentSource;
  side: OrderSide;
  /** Volume-weighted fill price */
  price: number;
  qty: number;
  timestamp: number;
  /** True when inferred from the order vanishing rather than reported */
  synthesized: boolean;
}

export type OrderIntent =
  | {
      kind: 'PLACE';
      source: IntentSource;
      ref: string;
      side: OrderSide;
      orderType: OrderType;
      qty: number;
      price?: number;
      reduceOnly: boolean;
    }
  | { kind: 'CANCEL'; source: IntentSource; ref: string; orderId: string }
  | { kind: 'CANCEL_ALL'; source: 'RISK'; reason: string }
  | { kind: 'FLATTEN'; source: 'RISK'; reason: string }
  | { kind: 'SET_STOP'; source: 'RISK'; ref: string; price: number };

/** Receives the outcome of every PLACE (and SET_STOP) intent it emitted; a stop has no order id. */
export interface IntentOwner {
  onOrderPlaced(ref: string, orderId: string): void;
  onOrderRejected(ref: string, reason: string): void;
  /** Not submitted (transient failure); the owner may retry next tick */
  onOrderFailed(ref: string, reason: string): void;
}

export interface TrackedOrder {
  orderId: string;
  clientOrderId: string;
  ref: string;
  source: IntentSource;
  side: OrderSide;
  orderType: OrderType;
  price: number | null;
  qty: number;
  filledQty: number;
  filledNotional: number;
  /** Consecutive reconciliations in which the exchange did not list the order */
  missedReconciles: number;
  placedAt: number;
}

// --------------- Market & Position ---------------

export interface PriceSnapshot {
  readonly symbol: string;
  readonly price: number;
  readonly timestamp: number;
}

export interface Position {
  symbol: string;
  /** Signed: > 0 long, < 0 short, 0 flat */
  size: number;
  entryPrice: number;
  markPrice: number;
  unrealizedPnl: number;
  leverage: number;
}

// --------------- Grid ---------------

export type GridLevelState = 'PENDING' | 'OPEN' | 'FILLED' | 'CANCELLED';

export type GridRange =
  | { kind: 'PERCENT'; percent: number }
  | { kind: 'BOUNDS'; lower: number; upper: number };

export interface GridLevel {
  index: number;
  /** Price and side the level was generated with */
  anchorPrice: number;
  anchorSide: OrderSide;
  price: number;
  side: OrderSide;
  size: number;
  orderId: string | null;
  state: GridLevelState;
  rejections: number;
  fills: number;
}

// --------------- DCA ---------------

export type DcaEntryState = 'PENDING' | 'FILLED' | 'PARKED';

export interface DcaLadderEntry {
  /** 1..maxOrders */
  index: number;
  triggerPrice: number;
  sizeMultiplier: number;
  size: number;
  orderId: string | null;
  state: DcaEntryState;
}

// --------------- Risk ---------------

export type RiskAction = 'NONE' | 'ARM_BREAKEVEN' | 'TAKE_PARTIAL_PROFIT' | 'KILL_SWITCH';

export interface RiskState {
  peakEquity: number;
  currentEquity: number;
  /** Percent, e.g. 21 for 21% */
  drawdownPct: number;
  breakevenArmed: boolean;
  partialProfitTaken: boolean;
  killSwitchArmed: boolean;
  killReason: string | null;
  /** Side of the position the breakeven/partial latches belong to */
  positionSide: TrendDirection | null;
}

// --------------- Supervisor ---------------

export type SupervisorState = 'STARTING' | 'RUNNING' | 'DEGRADED' | 'RECOVERING' | 'STOPPED';
export type ConnectionState = 'CONNECTED' | 'RECONNECTING' | 'FAILED';

export interface HealthStatus {
  state: SupervisorState;
  lastTickAt: number | null;
  consecutiveFailures: number;
  connection: ConnectionState;
  restartsInWindow: number;
  suppressedRestarts: number;
  lastError: string | null;
}

// --------------- Snapshots ---------------

/** Published at the end of every tick; never mutated afterwards. */
export interface BotSnapshot {
  readonly tick: number;
  readonly price: PriceSnapshot;
  readonly position: Position;
  readonly equity: number;
  readonly risk: RiskState;
  readonly grid: readonly GridLevel[];
  readonly dca: readonly DcaLadderEntry[];
  readonly orders: readonly TrackedOrder[];
  readonly publishedAt: number;
}

export interface PersistedGrid {
  lower: number;
  upper: number;
  reference: number;
  levels: GridLevel[];
}

export interface PersistedDca {
  reference: number | null;
  ladder: DcaLadderEntry[];
}

export interface PersistedState {
  version: 1;
  symbol: string;
  savedAt: number;
  position: Position | null;
  risk: RiskState;
  grid: PersistedGrid | null;
  dca: PersistedDca;
  orders: TrackedOrder[];
}

// --------------- Bybit API Response Types ---------------

export interface BybitResponse<T> {
  retCode: number;
  retMsg: string;
  result: T;
  time: number;
}

export interface BybitTickerResult {
  category: string;
  list: Array<{
    symbol: string;
    lastPrice: string;
    markPrice: string;
    bid1Price: string;
    ask1Price: string;
  }>;
}

export interface BybitPositionResult {
  category: string;
  list: Array<{
    symbol: string;
    side: 'Buy' | 'Sell' | '';
    size: string;
    avgPrice: string;
    markPrice: string;
    unrealisedPnl: string;
    leverage: string;
  }>;
}

export interface BybitOrderResult {
  orderId: string;
  orderLinkId: string;
}

export interface BybitOpenOrdersResult {
  category: string;
  list: Array<{
    orderId: string;
    orderLinkId: string;
    symbol: string;
    side: 'Buy' | 'Sell';
    price: string;
    qty: string;
    orderStatus: string;
  }>;
}

export interface BybitWalletResult {
  list: Array<{
    totalEquity: string;
    coin: Array<{ coin: string; equity: string; walletBalance: string }>;
  }>;
}
