// ============================================================
// Supabase Client & Query Helpers
// ============================================================
// Tables:
//   bot_state         (symbol PK, state jsonb, saved_at)
//   fills             (order_id PK, symbol, ref, source, side, price, qty, ...)
//   equity_snapshots  (timestamp, symbol, equity, drawdown_pct, position_size)
// ============================================================

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import type { CompletedFill } from '../types/index.js';

let supabaseInstance: SupabaseClient | null = null;

/**
 * Initialize and return the Supabase client (singleton).
 * Returns null if env vars are not configured.
 */
export function getSupabaseClient(): SupabaseClient | null {
  if (supabaseInstance) return supabaseInstance;

  const url = process.env['SUPABASE_URL'];
  const key = process.env['SUPABASE_ANON_KEY'];

  if (!url || !key) {
    return null;
  }

  supabaseInstance = createClient(url, key, {
    auth: { persistSession: false },
  });

  return supabaseInstance;
}

// --------------- Bot State ---------------

/**
 * Upsert the checkpoint row for a symbol.
 */
export async function upsertBotState(
  client: SupabaseClient,
  symbol: string,
  state: unknown,
  savedAt: number,
): Promise<void> {
  const { error } = await client
    .from('bot_state')
    .upsert({ symbol, state, saved_at: new Date(savedAt).toISOString() }, { onConflict: 'symbol' });

  if (error) throw new Error(`upsertBotState failed: ${error.message}`);
}

/**
 * Fetch the raw checkpoint for a symbol; null when no row exists.
 */
export async function fetchBotState(client: SupabaseClient, symbol: string): Promise<unknown> {
  const { data, error } = await client
    .from('bot_state')
    .select('state')
    .eq('symbol', symbol)
    .limit(1)
    .maybeSingle();

  if (error) throw new Error(`fetchBotState failed: ${error.message}`);
  if (data === null) return null;
  const row: Record<string, unknown> = data;
  return row['state'] ?? null;
}

// --------------- Audit Trail ---------------

export async function insertFill(client: SupabaseClient, symbol: string, fill: CompletedFill): Promise<void> {
  const { error } = await client.from('fills').upsert(
    {
      order_id: fill.orderId,
      symbol,
      ref: fill.ref,
      source: fill.source,
      side: fill.side,
      price: fill.price,
      qty: fill.qty,
      synthesized: fill.synthesized,
      timestamp: new Date(fill.timestamp).toISOString(),
    },
    { onConflict: 'order_id' },
  );

  if (error) throw new Error(`insertFill failed: ${error.message}`);
}

export interface EquitySnapshotRow {
  timestamp: number;
  symbol: string;
  equity: number;
  drawdownPct: number;
  positionSize: number;
}

export async function insertEquitySnapshot(client: SupabaseClient, row: EquitySnapshotRow): Promise<void> {
  const { error } = await client.from('equity_snapshots').insert({
    timestamp: new Date(row.timestamp).toISOString(),
    symbol: row.symbol,
    equity: row.equity,
    drawdown_pct: row.drawdownPct,
    position_size: row.positionSize,
  });

  if (error) throw new Error(`insertEquitySnapshot failed: ${error.message}`);
}
