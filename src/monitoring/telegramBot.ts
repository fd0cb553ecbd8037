// ============================================================
// Telegram Bot - Alerts & Status Commands
// /status /grid /dca /risk /health /kill /help
// ============================================================

import TelegramBot from 'node-telegram-bot-api';
import { errorMessage } from '../errors/index.js';
import { createModuleLogger } from './logger.js';
import type { NotifierSink } from './notifier.js';
import type { BotSnapshot, HealthStatus } from '../types/index.js';

const log = createModuleLogger('TelegramBot');

let bot: TelegramBot | null = null;
let chatId: string | null = null;

// --------------- Shared Bot State ---------------

/** Read-only views and the one control the commands need. */
export interface BotContext {
  symbol: string;
  getSnapshot(): BotSnapshot | null;
  getHealth(): HealthStatus;
  requestKillSwitch(reason: string): void;
}

let context: BotContext | null = null;

/** Called by index.ts once the supervisor is wired. */
export function setBotContext(ctx: BotContext): void {
  context = ctx;
}

// --------------- Initialization ---------------

export function initTelegramBot(): void {
  const token = process.env['TELEGRAM_BOT_TOKEN'];
  chatId = process.env['TELEGRAM_CHAT_ID'] ?? null;

  if (!token) {
    log.info('TELEGRAM_BOT_TOKEN not set — Telegram alerts disabled');
    return;
  }

  try {
    bot = new TelegramBot(token, { polling: true });
    bot.on('polling_error', (err) => log.warn(`Telegram polling error: ${err.message}`));
    registerCommands();
    log.info('Telegram bot initialized');
  } catch (err) {
    log.warn(`Telegram bot init failed: ${errorMessage(err)}`);
    bot = null;
  }
}

export async function stopTelegramBot(): Promise<void> {
  if (!bot) return;
  try {
    await bot.stopPolling();
  } catch (err) {
    log.warn(`Telegram stop failed: ${errorMessage(err)}`);
  }
  bot = null;
}

// --------------- Commands ---------------

/** Map a command line to its reply; exported for tests. */
export function handleCommand(text: string, ctx: BotContext | null): string | null {
  const [command = '', ...args] = text.trim().split(/\s+/);
  if (command === '/help') return helpText();
  if (!command.startsWith('/')) return null;
  if (!ctx) return '⏳ Bot is still starting';

  switch (command) {
    case '/status':
      return statusText(ctx);
    case '/grid':
      return gridText(ctx);
    case '/dca':
      return dcaText(ctx);
    case '/risk':
      return riskText(ctx);
    case '/health':
      return healthText(ctx.getHealth());
    case '/kill': {
      const reason = args.join(' ') || 'requested via Telegram';
      ctx.requestKillSwitch(reason);
      return `🛑 Kill switch requested (${reason}). Orders will be cancelled and the position closed on the next tick.`;
    }
    default:
      return null;
  }
}

function registerCommands(): void {
  if (!bot) return;

  bot.on('message', (msg) => {
    const reply = handleCommand(msg.text ?? '', context);
    if (reply) send(String(msg.chat.id), reply);
  });
}

function statusText(ctx: BotContext): string {
  const snap = ctx.getSnapshot();
  const health = ctx.getHealth();
  if (!snap) return `🤖 <b>${ctx.symbol}</b> — ${health.state}, no tick completed yet`;

  const { position, risk } = snap;
  const side = position.size > 0 ? 'LONG' : position.size < 0 ? 'SHORT' : 'FLAT';
  return [
    `🤖 <b>${ctx.symbol} — ${health.state}</b>`,
    `Price: ${snap.price.price} | Tick #${snap.tick}`,
    `Position: ${side} ${Math.abs(position.size)}${position.size !== 0 ? ` @ ${position.entryPrice}` : ''}`,
    `Equity: $${snap.equity.toFixed(2)} | Drawdown: ${risk.drawdownPct.toFixed(2)}%`,
    `Open orders: ${snap.orders.length}`,
    `Kill switch: ${risk.killSwitchArmed ? '🔴 ACTIVE' : '🟢 inactive'}`,
  ].join('\n');
}

function gridText(ctx: BotContext): string {
  const levels = ctx.getSnapshot()?.grid ?? [];
  if (levels.length === 0) return '📐 Grid not initialised';

  const lines = ['📐 <b>Grid Levels</b>'];
  for (const l of [...levels].sort((a, b) => b.price - a.price)) {
    lines.push(`${l.side === 'Buy' ? '🟢' : '🔴'} ${l.price} ${l.side} — ${l.state} (fills ${l.fills})`);
  }
  return lines.join('\n');
}

function dcaText(ctx: BotContext): string {
  const ladder = ctx.getSnapshot()?.dca ?? [];
  if (ladder.length === 0) return '🪜 DCA ladder empty';

  const lines = ['🪜 <b>DCA Ladder</b>'];
  for (const e of ladder) {
    lines.push(`#${e.index} @ ${e.triggerPrice} — ${e.size} (${e.sizeMultiplier}x) ${e.state}`);
  }
  return lines.join('\n');
}

function riskText(ctx: BotContext): string {
  const risk = ctx.getSnapshot()?.risk;
  if (!risk) return '🛡️ Risk state not yet initialized';

  return [
    '🛡️ <b>Risk</b>',
    `Equity: $${risk.currentEquity.toFixed(2)} (peak $${risk.peakEquity.toFixed(2)})`,
    `Drawdown: ${risk.drawdownPct.toFixed(2)}%`,
    `Breakeven armed: ${risk.breakevenArmed ? '✅' : '—'}`,
    `Partial profit taken: ${risk.partialProfitTaken ? '✅' : '—'}`,
    `Kill switch: ${risk.killSwitchArmed ? `🔴 ${risk.killReason ?? 'ACTIVE'}` : '🟢 inactive'}`,
  ].join('\n');
}

function healthText(health: HealthStatus): string {
  const lastTick = health.lastTickAt === null ? 'never' : new Date(health.lastTickAt).toISOString();
  return [
    `❤️ <b>Health — ${health.state}</b>`,
    `Connection: ${health.connection}`,
    `Last tick: ${lastTick}`,
    `Consecutive failures: ${health.consecutiveFailures}`,
    `Restarts this hour: ${health.restartsInWindow} | Suppressed: ${health.suppressedRestarts}`,
    `Last error: ${health.lastError ?? 'none'}`,
  ].join('\n');
}

function helpText(): string {
  return [
    '<b>Commands</b>',
    '/status — price, position, equity',
    '/grid — grid levels',
    '/dca — DCA ladder',
    '/risk — drawdown and latches',
    '/health — supervisor health',
    '/kill [reason] — cancel everything, flatten, stop',
  ].join('\n');
}

// --------------- Sending ---------------

function send(targetChatId: string, message: string): void {
  sendToChat(targetChatId, message).catch((err: unknown) => {
    log.warn(`Failed to reply on Telegram: ${errorMessage(err)}`);
  });
}

async function sendToChat(targetChatId: string, message: string): Promise<void> {
  if (!bot) return;
  await bot.sendMessage(targetChatId, message, { parse_mode: 'HTML' });
}

/** Send an HTML alert to the configured chat; logs instead when Telegram is off. */
export async function sendAlert(message: string): Promise<void> {
  if (!bot || !chatId) {
    log.info(`[ALERT] ${message}`);
    return;
  }
  try {
    await bot.sendMessage(chatId, message, { parse_mode: 'HTML' });
  } catch (err) {
    log.warn(`Failed to send Telegram alert: ${errorMessage(err)}`);
  }
}

export function telegramSink(): NotifierSink {
  return { name: 'telegram', alert: sendAlert };
}
