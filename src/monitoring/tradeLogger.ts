// ============================================================
// Trade Logger
// ============================================================
// Persists every completed fill and the hourly equity snapshot
// to local CSV files and, when configured, Supabase.
// CSV paths: ./logs/fills.csv, ./logs/equity.csv
// ============================================================

import fs from 'fs';
import path from 'path';
import { errorMessage } from '../errors/index.js';
import { getSupabaseClient, insertEquitySnapshot, insertFill } from '../database/supabase.js';
import type { EquitySnapshotRow } from '../database/supabase.js';
import { createModuleLogger, logsDir } from './logger.js';
import type { NotifierSink } from './notifier.js';
import type { CompletedFill } from '../types/index.js';

const log = createModuleLogger('TradeLogger');
const FILLS_CSV = path.join(logsDir, 'fills.csv');
const EQUITY_CSV = path.join(logsDir, 'equity.csv');

const FILLS_HEADER = ['timestamp', 'symbol', 'orderId', 'ref', 'source', 'side', 'price', 'qty', 'synthesized'].join(',');
const EQUITY_HEADER = ['timestamp', 'symbol', 'equity', 'drawdownPct', 'positionSize'].join(',');

// --------------- Formatting ---------------

export function fillToCsvRow(symbol: string, fill: CompletedFill): string {
  return [
    new Date(fill.timestamp).toISOString(),
    symbol,
    fill.orderId,
    fill.ref,
    fill.source,
    fill.side,
    fill.price.toFixed(4),
    fill.qty,
    fill.synthesized ? '1' : '0',
  ].join(',');
}

export function equityToCsvRow(row: EquitySnapshotRow): string {
  return [
    new Date(row.timestamp).toISOString(),
    row.symbol,
    row.equity.toFixed(4),
    row.drawdownPct.toFixed(4),
    row.positionSize,
  ].join(',');
}

// --------------- Public API ---------------

/**
 * Log a completed fill to both CSV and Supabase (in parallel).
 * A failing sink does not stop the other.
 */
export async function logFill(symbol: string, fill: CompletedFill): Promise<void> {
  await Promise.allSettled([
    appendCsv(FILLS_CSV, FILLS_HEADER, fillToCsvRow(symbol, fill)),
    toSupabase('fill', (client) => insertFill(client, symbol, fill)),
  ]);
}

export async function logEquitySnapshot(row: EquitySnapshotRow): Promise<void> {
  await Promise.allSettled([
    appendCsv(EQUITY_CSV, EQUITY_HEADER, equityToCsvRow(row)),
    toSupabase('equity snapshot', (client) => insertEquitySnapshot(client, row)),
  ]);
}

/** Notifier sink writing FILL events to the audit trail. */
export function tradeLoggerSink(): NotifierSink {
  return {
    name: 'trade-logger',
    record: async (event) => {
      if (event.type === 'FILL') await logFill(event.symbol, event.fill);
    },
  };
}

// --------------- Sinks ---------------

async function appendCsv(file: string, header: string, row: string): Promise<void> {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    if (!fs.existsSync(file)) {
      fs.writeFileSync(file, header + '\n', 'utf8');
    }
    fs.appendFileSync(file, row + '\n', 'utf8');
  } catch (err) {
    log.warn(`CSV logging to ${path.basename(file)} failed: ${errorMessage(err)}`);
  }
}

async function toSupabase(
  what: string,
  write: (client: NonNullable<ReturnType<typeof getSupabaseClient>>) => Promise<void>,
): Promise<void> {
  const client = getSupabaseClient();
  if (!client) return; // Supabase not configured

  try {
    await write(client);
    log.debug(`${what} logged to Supabase`);
  } catch (err) {
    log.warn(`Supabase ${what} logging failed: ${errorMessage(err)}`);
  }
}
