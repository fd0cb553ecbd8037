// ============================================================
// Grid / DCA Bot - Main Entry Point
// ============================================================
// Wires config → exchange → engines → tick loop → supervisor,
// then hands control to the supervisor until a signal or the
// kill switch stops it.
// ============================================================

import 'dotenv/config';
import cron from 'node-cron';
import rootLogger, { createModuleLogger } from './monitoring/logger.js';
import { ConfigurationError, errorMessage } from './errors/index.js';
import { loadConfig } from './config/env.js';
import type { BotConfig } from './config/env.js';
import { getSupabaseClient } from './database/supabase.js';
import { FileStateStore, SupabaseStateStore } from './database/stateStore.js';
import type { StateStore } from './database/stateStore.js';
import { DcaEngine } from './engine/dcaEngine.js';
import { FillFeed } from './engine/fillFeed.js';
import { GridEngine } from './engine/gridEngine.js';
import { TickLoop } from './engine/tickLoop.js';
import { BybitClient } from './execution/bybitClient.js';
import type { ExchangeClient } from './execution/exchange.js';
import { OrderBookState } from './execution/orderBook.js';
import { PaperExchange } from './execution/paperExchange.js';
import { RiskManager } from './execution/riskManager.js';
import { FanOutNotifier } from './monitoring/notifier.js';
import { initTelegramBot, sendAlert, setBotContext, stopTelegramBot, telegramSink } from './monitoring/telegramBot.js';
import { logEquitySnapshot, tradeLoggerSink } from './monitoring/tradeLogger.js';
import { SupervisorLoop } from './supervisor/supervisorLoop.js';
import { systemClock } from './utils/clock.js';
import { withRetry } from './utils/retry.js';

const log = createModuleLogger('Main');

let supervisor: SupervisorLoop | null = null;
let tickLoop: TickLoop | null = null;
let shuttingDown = false;

// --------------- Wiring ---------------

function createExchange(config: BotConfig): ExchangeClient {
  const { exchange, trading, network } = config;
  const bybit = new BybitClient({
    apiKey: exchange.apiKey,
    apiSecret: exchange.apiSecret,
    testnet: exchange.testnet,
    recvWindow: exchange.recvWindow,
    timeoutMs: network.timeoutMs,
  });
  if (!exchange.paperTrading) return bybit;

  return new PaperExchange({
    symbol: trading.symbol,
    initialEquity: trading.initialCapital,
    leverage: trading.leverage,
    priceSource: async (symbol) => (await bybit.getPrice(symbol)).price,
  });
}

function createStore(config: BotConfig): StateStore {
  const db = getSupabaseClient();
  if (db) {
    log.info('Supabase connected — checkpoints stored in bot_state');
    return new SupabaseStateStore(db, config.trading.symbol);
  }
  log.info(`Supabase not configured — checkpoints stored in ${config.persistence.stateFile}`);
  return new FileStateStore(config.persistence.stateFile, config.trading.symbol);
}

// --------------- Startup ---------------

async function startup(): Promise<void> {
  const config = loadConfig();
  const { trading, grid, dca, risk } = config;
  const mode = config.exchange.paperTrading ? 'PAPER' : config.exchange.testnet ? 'TESTNET' : 'LIVE';

  log.info('==============================================');
  log.info(` Grid / DCA Bot starting — ${trading.symbol} (${mode})`);
  log.info('==============================================');

  initTelegramBot();

  const exchange = createExchange(config);
  await withRetry(() => exchange.setLeverage(trading.symbol, trading.leverage), config.network, systemClock, 'setLeverage');

  const initialEquity = config.exchange.paperTrading
    ? trading.initialCapital
    : await withRetry(() => exchange.getEquity(), config.network, systemClock, 'getEquity');

  const gridEngine = grid.enabled
    ? new GridEngine({
        range: grid.range,
        levels: grid.levels,
        orderSize: grid.orderSize,
        profitOffsetPercent: grid.profitOffsetPercent,
        maxRetries: grid.maxRetries,
        priceDecimals: trading.priceDecimals,
      })
    : null;
  const dcaEngine = dca.enabled
    ? new DcaEngine({
        direction: dca.direction,
        triggerPercent: dca.triggerPercent,
        orderSize: dca.orderSize,
        maxOrders: dca.maxOrders,
        scalingFactor: dca.scalingFactor,
        recoveryPercent: dca.recoveryPercent,
        qtyDecimals: trading.qtyDecimals,
      })
    : null;
  const riskManager = new RiskManager({ ...risk, qtyDecimals: trading.qtyDecimals }, initialEquity);

  const fillFeed = new FillFeed(exchange);
  const store = createStore(config);
  const notifier = new FanOutNotifier([tradeLoggerSink(), telegramSink()]);

  const loop = new TickLoop({
    symbol: trading.symbol,
    exchange,
    book: new OrderBookState(trading.symbol),
    grid: gridEngine,
    dca: dcaEngine,
    risk: riskManager,
    fillFeed,
    store,
    notifier,
    clock: systemClock,
    retry: config.network,
    tickIntervalMs: config.supervisor.tickIntervalMs,
  });
  tickLoop = loop;

  const sup = new SupervisorLoop({
    config: config.supervisor,
    symbol: trading.symbol,
    exchange,
    tickLoop: loop,
    fillFeed,
    store,
    notifier,
    clock: systemClock,
  });
  supervisor = sup;

  setBotContext({
    symbol: trading.symbol,
    getSnapshot: () => loop.getSnapshot(),
    getHealth: () => sup.getHealth(),
    requestKillSwitch: (reason) => riskManager.requestKillSwitch(reason),
  });

  const state = await sup.start();
  await sendAlert(
    `🚀 <b>Grid / DCA Bot Started</b>\n` +
      `Mode: ${mode} | Symbol: ${trading.symbol}\n` +
      `Grid: ${grid.enabled ? `${grid.levels} levels` : 'off'} | DCA: ${dca.enabled ? dca.direction : 'off'}\n` +
      `Supervisor: ${state}`,
  );

  if (state === 'STOPPED') {
    await exit(1);
    return;
  }

  scheduleCronJobs(trading.symbol);
  // Kill switch or unrecoverable error; signals exit through shutdown()
  void sup.whenStopped().then(async () => {
    if (!shuttingDown) await exit(0);
  });
}

// --------------- Cron Jobs ---------------

function scheduleCronJobs(symbol: string): void {
  // Hourly: equity snapshot
  cron.schedule('0 * * * *', async () => {
    const snap = tickLoop?.getSnapshot();
    if (!snap) return;
    try {
      await logEquitySnapshot({
        timestamp: snap.publishedAt,
        symbol,
        equity: snap.equity,
        drawdownPct: snap.risk.drawdownPct,
        positionSize: snap.position.size,
      });
    } catch (err) {
      log.error(`Equity snapshot error: ${errorMessage(err)}`);
    }
  });

  // Daily 00:00 UTC: status report
  cron.schedule(
    '0 0 * * *',
    async () => {
      const snap = tickLoop?.getSnapshot();
      const health = supervisor?.getHealth();
      if (!snap || !health) return;
      await sendAlert(
        `📊 <b>Daily Report — ${symbol}</b>\n` +
          `State: ${health.state} | Restarts this hour: ${health.restartsInWindow}\n` +
          `Equity: $${snap.equity.toFixed(2)} | Drawdown: ${snap.risk.drawdownPct.toFixed(2)}%\n` +
          `Position: ${snap.position.size} | Open orders: ${snap.orders.length}`,
      );
    },
    { timezone: 'UTC' },
  );

  log.info('Cron jobs scheduled');
}

// --------------- Graceful Shutdown ---------------

async function exit(code: number): Promise<void> {
  await stopTelegramBot();
  process.exit(code);
}

function setupShutdownHandlers(): void {
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal} — shutting down gracefully...`);
    try {
      await supervisor?.stop(`received ${signal}`, { cancelOrders: true });
    } catch (err) {
      log.error(`Shutdown error: ${errorMessage(err)}`);
    }
    await sendAlert(`⛔ Grid / DCA Bot stopping (${signal})`);
    await exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (err) => {
    log.error(`Uncaught exception: ${err.message}`, { stack: err.stack });
  });

  process.on('unhandledRejection', (reason) => {
    log.error(`Unhandled rejection: ${String(reason)}`);
  });
}

// --------------- Run ---------------

setupShutdownHandlers();
startup().catch(async (err: unknown) => {
  if (err instanceof ConfigurationError) {
    rootLogger.error(err.message);
  } else {
    rootLogger.error(`Fatal startup error: ${errorMessage(err)}`);
  }
  await exit(1);
});
