// ============================================================
// State Store - durable checkpoints of the trading session
// ============================================================
// FileStateStore      → JSON file, atomic write (temp + rename)
// SupabaseStateStore  → bot_state row keyed by symbol
// MemoryStateStore    → in-process, for tests
// ============================================================

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { SupabaseClient } from '@supabase/supabase-js';
import { PersistenceError, errorMessage } from '../errors/index.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { fetchBotState, upsertBotState } from './supabase.js';
import type { PersistedState } from '../types/index.js';

const log = createModuleLogger('StateStore');

export const STATE_VERSION = 1;

export interface StateStore {
  saveState(snapshot: PersistedState): Promise<void>;
  /** null when nothing usable has been saved for this symbol */
  loadState(): Promise<PersistedState | null>;
}

// --------------- Schema ---------------

const sideSchema = z.enum(['Buy', 'Sell']);
const sourceSchema = z.enum(['GRID', 'DCA', 'RISK', 'RECONCILE']);

const positionSchema = z.object({
  symbol: z.string(),
  size: z.number(),
  entryPrice: z.number(),
  markPrice: z.number(),
  unrealizedPnl: z.number(),
  leverage: z.number(),
});

const riskSchema = z.object({
  peakEquity: z.number(),
  currentEquity: z.number(),
  drawdownPct: z.number(),
  breakevenArmed: z.boolean(),
  partialProfitTaken: z.boolean(),
  killSwitchArmed: z.boolean(),
  killReason: z.string().nullable(),
  positionSide: z.enum(['LONG', 'SHORT']).nullable(),
});

const gridLevelSchema = z.object({
  index: z.number().int(),
  anchorPrice: z.number(),
  anchorSide: sideSchema,
  price: z.number(),
  side: sideSchema,
  size: z.number(),
  orderId: z.string().nullable(),
  state: z.enum(['PENDING', 'OPEN', 'FILLED', 'CANCELLED']),
  rejections: z.number().int(),
  fills: z.number().int(),
});

const dcaEntrySchema = z.object({
  index: z.number().int().positive(),
  triggerPrice: z.number(),
  sizeMultiplier: z.number(),
  size: z.number(),
  orderId: z.string().nullable(),
  state: z.enum(['PENDING', 'FILLED', 'PARKED']),
});

const trackedOrderSchema = z.object({
  orderId: z.string(),
  clientOrderId: z.string(),
  ref: z.string(),
  source: sourceSchema,
  side: sideSchema,
  orderType: z.enum(['Limit', 'Market']),
  price: z.number().nullable(),
  qty: z.number(),
  filledQty: z.number(),
  filledNotional: z.number(),
  missedReconciles: z.number().int(),
  placedAt: z.number(),
});

const persistedStateSchema = z.object({
  version: z.literal(STATE_VERSION),
  symbol: z.string(),
  savedAt: z.number(),
  position: positionSchema.nullable(),
  risk: riskSchema,
  grid: z
    .object({
      lower: z.number(),
      upper: z.number(),
      reference: z.number(),
      levels: z.array(gridLevelSchema),
    })
    .nullable(),
  dca: z.object({
    reference: z.number().nullable(),
    ladder: z.array(dcaEntrySchema),
  }),
  orders: z.array(trackedOrderSchema),
});

/**
 * Validate a raw checkpoint. Snapshots for another symbol or an
 * unknown version are ignored (null) with a warning.
 */
export function parsePersistedState(raw: unknown, symbol: string): PersistedState | null {
  if (raw === null || raw === undefined) return null;

  const parsed = persistedStateSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    log.warn(`Ignoring saved state: ${first ? `${first.path.join('.')}: ${first.message}` : 'invalid'}`);
    return null;
  }
  if (parsed.data.symbol !== symbol) {
    log.warn(`Ignoring saved state for ${parsed.data.symbol} (running ${symbol})`);
    return null;
  }
  return parsed.data;
}

// --------------- File ---------------

export class FileStateStore implements StateStore {
  private readonly filePath: string;

  constructor(filePath: string, private readonly symbol: string) {
    this.filePath = path.resolve(process.cwd(), filePath);
  }

  async saveState(snapshot: PersistedState): Promise<void> {
    const tmp = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(snapshot, null, 2), 'utf8');
      await fs.rename(tmp, this.filePath);
    } catch (err) {
      throw new PersistenceError(`Could not write ${this.filePath}: ${errorMessage(err)}`, err);
    }
  }

  async loadState(): Promise<PersistedState | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw new PersistenceError(`Could not read ${this.filePath}: ${errorMessage(err)}`, err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      log.warn(`Ignoring corrupt state file ${this.filePath}: ${errorMessage(err)}`);
      return null;
    }
    return parsePersistedState(raw, this.symbol);
  }
}

// --------------- Supabase ---------------

export class SupabaseStateStore implements StateStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly symbol: string,
  ) {}

  async saveState(snapshot: PersistedState): Promise<void> {
    try {
      await upsertBotState(this.client, this.symbol, snapshot, snapshot.savedAt);
    } catch (err) {
      throw new PersistenceError(errorMessage(err), err);
    }
  }

  async loadState(): Promise<PersistedState | null> {
    try {
      return parsePersistedState(await fetchBotState(this.client, this.symbol), this.symbol);
    } catch (err) {
      throw new PersistenceError(errorMessage(err), err);
    }
  }
}

// --------------- Memory ---------------

export class MemoryStateStore implements StateStore {
  /** Number of successful saves */
  saves = 0;
  private json: string | null = null;
  private failure: Error | null = null;

  constructor(private readonly symbol: string) {}

  /** Make every save fail with `err` until cleared with null. */
  failSaves(err: Error | null): void {
    this.failure = err;
  }

  async saveState(snapshot: PersistedState): Promise<void> {
    if (this.failure) throw new PersistenceError(this.failure.message, this.failure);
    this.json = JSON.stringify(snapshot);
    this.saves += 1;
  }

  async loadState(): Promise<PersistedState | null> {
    if (this.json === null) return null;
    const raw: unknown = JSON.parse(this.json);
    return parsePersistedState(raw, this.symbol);
  }
}
