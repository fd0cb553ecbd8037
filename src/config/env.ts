// ============================================================
// Environment Configuration
// ============================================================
// Resolved once at startup into an immutable BotConfig; nothing
// downstream reads process.env for strategy settings.
// ============================================================

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { GridRange, TrendDirection } from '../types/index.js';
import type { RetryOptions } from '../utils/retry.js';
import { RISK_DEFAULTS } from './risk.js';
import { DCA_DEFAULTS, GRID_DEFAULTS, TRADING_DEFAULTS } from './strategy.js';
import { NETWORK_DEFAULTS, SUPERVISOR_DEFAULTS } from './supervisor.js';
import { deepFreeze } from '../utils/freeze.js';

// --------------- Config Shape ---------------

export interface ExchangeConfig {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
  paperTrading: boolean;
  recvWindow: number;
}

export interface TradingConfig {
  symbol: string;
  leverage: number;
  initialCapital: number;
  priceDecimals: number;
  qtyDecimals: number;
}

export interface GridConfig {
  enabled: boolean;
  range: GridRange;
  levels: number;
  orderSize: number;
  profitOffsetPercent: number;
  maxRetries: number;
}

export interface DcaConfig {
  enabled: boolean;
  direction: TrendDirection;
  triggerPercent: number;
  orderSize: number;
  maxOrders: number;
  scalingFactor: number;
  recoveryPercent: number;
}

export interface RiskConfig {
  killSwitchEnabled: boolean;
  maxDrawdownPercent: number;
  breakevenEnabled: boolean;
  breakevenBufferPercent: number;
  partialProfitEnabled: boolean;
  partialProfitPercent: number;
  partialProfitMultiple: number;
}

export interface SupervisorConfig {
  tickIntervalMs: number;
  healthCheckIntervalMs: number;
  restartDelayMs: number;
  maxRestartsPerHour: number;
  restartWindowMs: number;
  failureThreshold: number;
  staleTickMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface BotConfig {
  exchange: ExchangeConfig;
  trading: TradingConfig;
  grid: GridConfig;
  dca: DcaConfig;
  risk: RiskConfig;
  supervisor: SupervisorConfig;
  network: RetryOptions;
  persistence: { stateFile: string };
}

// --------------- Schema ---------------

const flag = (fallback: boolean) =>
  z
    .preprocess(
      (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
      z.enum(['true', 'false']).default(fallback ? 'true' : 'false'),
    )
    .transform((v) => v === 'true');

const positive = (fallback: number) => z.coerce.number().positive().default(fallback);
const nonNegative = (fallback: number) => z.coerce.number().nonnegative().default(fallback);
const integer = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z
  .object({
    BYBIT_API_KEY: z.string().default(''),
    BYBIT_API_SECRET: z.string().default(''),
    BYBIT_TESTNET: flag(false),
    PAPER_TRADING: flag(true),
    BYBIT_RECV_WINDOW: integer(5000, 1000, 60_000),

    SYMBOL: z.string().regex(/^[A-Z0-9]{2,20}$/, 'must be an uppercase symbol such as BTCUSDT').default(TRADING_DEFAULTS.symbol),
    LEVERAGE: integer(TRADING_DEFAULTS.leverage, 1, TRADING_DEFAULTS.maxLeverage),
    INITIAL_CAPITAL: positive(TRADING_DEFAULTS.initialCapital),
    PRICE_DECIMALS: integer(TRADING_DEFAULTS.priceDecimals, 0, 8),
    QTY_DECIMALS: integer(TRADING_DEFAULTS.qtyDecimals, 0, 8),

    GRID_ENABLED: flag(GRID_DEFAULTS.enabled),
    GRID_RANGE_PERCENT: z.coerce.number().gt(0).lt(100).default(GRID_DEFAULTS.rangePercent),
    GRID_LOWER_PRICE: z.coerce.number().positive().optional(),
    GRID_UPPER_PRICE: z.coerce.number().positive().optional(),
    GRID_LEVELS: integer(GRID_DEFAULTS.levels, 2, 200),
    GRID_ORDER_SIZE: positive(GRID_DEFAULTS.orderSize),
    GRID_PROFIT_OFFSET_PERCENT: z.coerce.number().gt(0).lt(50).default(GRID_DEFAULTS.profitOffsetPercent),
    GRID_MAX_RETRIES: integer(GRID_DEFAULTS.maxRetries, 1, 20),

    DCA_ENABLED: flag(DCA_DEFAULTS.enabled),
    DCA_DIRECTION: z
      .preprocess((v) => (typeof v === 'string' ? v.trim().toUpperCase() : v), z.enum(['LONG', 'SHORT']))
      .default(DCA_DEFAULTS.direction),
    DCA_TRIGGER_PERCENT: z.coerce.number().gt(0).lt(100).default(DCA_DEFAULTS.triggerPercent),
    DCA_ORDER_SIZE: positive(DCA_DEFAULTS.orderSize),
    DCA_MAX_ORDERS: integer(DCA_DEFAULTS.maxOrders, 1, 50),
    DCA_SCALING_FACTOR: z.coerce.number().min(1).default(DCA_DEFAULTS.scalingFactor),
    DCA_RECOVERY_PERCENT: z.coerce.number().gt(0).lt(100).default(DCA_DEFAULTS.recoveryPercent),

    KILL_SWITCH_ENABLED: flag(RISK_DEFAULTS.killSwitchEnabled),
    MAX_DRAWDOWN_PERCENT: z.coerce.number().gt(0).lt(100).default(RISK_DEFAULTS.maxDrawdownPercent),
    BREAKEVEN_ENABLED: flag(RISK_DEFAULTS.breakevenEnabled),
    BREAKEVEN_BUFFER_PERCENT: nonNegative(RISK_DEFAULTS.breakevenBufferPercent),
    PARTIAL_PROFIT_ENABLED: flag(RISK_DEFAULTS.partialProfitEnabled),
    PARTIAL_PROFIT_PERCENT: z.coerce.number().gt(0).max(100).default(RISK_DEFAULTS.partialProfitPercent),
    PARTIAL_PROFIT_MULTIPLE: z.coerce.number().gt(1).default(RISK_DEFAULTS.partialProfitMultiple),

    TICK_INTERVAL_MS: integer(SUPERVISOR_DEFAULTS.tickIntervalMs, 100),
    HEALTH_CHECK_INTERVAL_MS: integer(SUPERVISOR_DEFAULTS.healthCheckIntervalMs, 100),
    RESTART_DELAY_MS: integer(SUPERVISOR_DEFAULTS.restartDelayMs, 0),
    MAX_RESTARTS_PER_HOUR: integer(SUPERVISOR_DEFAULTS.maxRestartsPerHour, 1, 1000),
    FAILURE_THRESHOLD: integer(SUPERVISOR_DEFAULTS.failureThreshold, 1, 1000),
    STALE_TICK_MS: integer(SUPERVISOR_DEFAULTS.staleTickMs, 1000),
    RESTART_BACKOFF_BASE_MS: integer(SUPERVISOR_DEFAULTS.backoffBaseMs, 0),
    RESTART_BACKOFF_MAX_MS: integer(SUPERVISOR_DEFAULTS.backoffMaxMs, 0),

    REQUEST_TIMEOUT_MS: integer(NETWORK_DEFAULTS.timeoutMs, 100),
    REQUEST_MAX_RETRIES: integer(NETWORK_DEFAULTS.attempts, 1, 10),
    REQUEST_RETRY_BASE_MS: integer(NETWORK_DEFAULTS.baseDelayMs, 0),

    STATE_FILE: z.string().default('data/bot-state.json'),
  })
  .superRefine((env, ctx) => {
    const hasLower = env.GRID_LOWER_PRICE !== undefined;
    const hasUpper = env.GRID_UPPER_PRICE !== undefined;
    if (hasLower !== hasUpper) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [hasLower ? 'GRID_UPPER_PRICE' : 'GRID_LOWER_PRICE'],
        message: 'GRID_LOWER_PRICE and GRID_UPPER_PRICE must be set together',
      });
    }
    if (hasLower && hasUpper && (env.GRID_LOWER_PRICE ?? 0) >= (env.GRID_UPPER_PRICE ?? 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GRID_LOWER_PRICE'],
        message: 'must be below GRID_UPPER_PRICE',
      });
    }
    if (!env.PAPER_TRADING && (!env.BYBIT_API_KEY || !env.BYBIT_API_SECRET)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BYBIT_API_KEY'],
        message: 'Bybit API credentials are required when PAPER_TRADING=false',
      });
    }
    if (env.RESTART_BACKOFF_MAX_MS < env.RESTART_BACKOFF_BASE_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RESTART_BACKOFF_MAX_MS'],
        message: 'must be >= RESTART_BACKOFF_BASE_MS',
      });
    }
  });

// --------------- Loader ---------------

/**
 * Parse and validate the environment into a BotConfig.
 * Blank variables count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, issues);
  }
  const e = parsed.data;

  const range: GridRange =
    e.GRID_LOWER_PRICE !== undefined && e.GRID_UPPER_PRICE !== undefined
      ? { kind: 'BOUNDS', lower: e.GRID_LOWER_PRICE, upper: e.GRID_UPPER_PRICE }
      : { kind: 'PERCENT', percent: e.GRID_RANGE_PERCENT };

  const config: BotConfig = {
    exchange: {
      apiKey: e.BYBIT_API_KEY,
      apiSecret: e.BYBIT_API_SECRET,
      testnet: e.BYBIT_TESTNET,
      paperTrading: e.PAPER_TRADING,
      recvWindow: e.BYBIT_RECV_WINDOW,
    },
    trading: {
      symbol: e.SYMBOL,
      leverage: e.LEVERAGE,
      initialCapital: e.INITIAL_CAPITAL,
      priceDecimals: e.PRICE_DECIMALS,
      qtyDecimals: e.QTY_DECIMALS,
    },
    grid: {
      enabled: e.GRID_ENABLED,
      range,
      levels: e.GRID_LEVELS,
      orderSize: e.GRID_ORDER_SIZE,
      profitOffsetPercent: e.GRID_PROFIT_OFFSET_PERCENT,
      maxRetries: e.GRID_MAX_RETRIES,
    },
    dca: {
      enabled: e.DCA_ENABLED,
      direction: e.DCA_DIRECTION,
      triggerPercent: e.DCA_TRIGGER_PERCENT,
      orderSize: e.DCA_ORDER_SIZE,
      maxOrders: e.DCA_MAX_ORDERS,
      scalingFactor: e.DCA_SCALING_FACTOR,
      recoveryPercent: e.DCA_RECOVERY_PERCENT,
    },
    risk: {
      killSwitchEnabled: e.KILL_SWITCH_ENABLED,
      maxDrawdownPercent: e.MAX_DRAWDOWN_PERCENT,
      breakevenEnabled: e.BREAKEVEN_ENABLED,
      breakevenBufferPercent: e.BREAKEVEN_BUFFER_PERCENT,
      partialProfitEnabled: e.PARTIAL_PROFIT_ENABLED,
      partialProfitPercent: e.PARTIAL_PROFIT_PERCENT,
      partialProfitMultiple: e.PARTIAL_PROFIT_MULTIPLE,
    },
    supervisor: {
      tickIntervalMs: e.TICK_INTERVAL_MS,
      healthCheckIntervalMs: e.HEALTH_CHECK_INTERVAL_MS,
      restartDelayMs: e.RESTART_DELAY_MS,
      maxRestartsPerHour: e.MAX_RESTARTS_PER_HOUR,
      restartWindowMs: SUPERVISOR_DEFAULTS.restartWindowMs,
      failureThreshold: e.FAILURE_THRESHOLD,
      staleTickMs: e.STALE_TICK_MS,
      backoffBaseMs: e.RESTART_BACKOFF_BASE_MS,
      backoffMaxMs: e.RESTART_BACKOFF_MAX_MS,
    },
    network: {
      attempts: e.REQUEST_MAX_RETRIES,
      baseDelayMs: e.REQUEST_RETRY_BASE_MS,
      maxDelayMs: NETWORK_DEFAULTS.maxDelayMs,
      timeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    persistence: { stateFile: e.STATE_FILE },
  };

  return deepFreeze(config);
}
