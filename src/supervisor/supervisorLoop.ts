// ============================================================
// Supervisor Loop
// ============================================================
// State machine:
//   STARTING → RUNNING → DEGRADED → RECOVERING → RUNNING
//   any → STOPPED (shutdown, unrecoverable error, session end)
//
// Health is checked every healthCheckIntervalMs. Transitions into
// RECOVERING are budgeted by RestartRateLimiter; when the budget is
// spent the supervisor stays DEGRADED and backs off exponentially.
// ============================================================

import { errorMessage, isUnrecoverable } from '../errors/index.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { backoffDelay } from '../utils/retry.js';
import { RestartRateLimiter } from './restartLimiter.js';
import type { SupervisorConfig } from '../config/env.js';
import type { StateStore } from '../database/stateStore.js';
import type { FillFeed } from '../engine/fillFeed.js';
import type { TickLoop } from '../engine/tickLoop.js';
import type { ExchangeClient } from '../execution/exchange.js';
import type { Notifier } from '../monitoring/notifier.js';
import type { CancelTimer, Clock } from '../utils/clock.js';
import type { ConnectionState, HealthStatus, SupervisorState } from '../types/index.js';

const log = createModuleLogger('Supervisor');

export interface SupervisorDeps {
  config: SupervisorConfig;
  symbol: string;
  exchange: ExchangeClient;
  tickLoop: TickLoop;
  fillFeed: FillFeed;
  store: StateStore;
  notifier: Notifier;
  clock: Clock;
  limiter?: RestartRateLimiter;
}

export interface StopOptions {
  /** Cancel the orders this bot has resting before disconnecting */
  cancelOrders?: boolean;
}

export class SupervisorLoop {
  private state: SupervisorState = 'STARTING';
  private readonly limiter: RestartRateLimiter;
  private suppressedRestarts = 0;
  private consecutiveSuppressions = 0;
  private nextRecoveryAt = 0;
  private lastError: string | null = null;
  private stateLoaded = false;
  private checking = false;
  private cancelHealthTimer: CancelTimer | null = null;
  private stopping: Promise<void> | null = null;
  private readonly stopped: Promise<void>;
  private resolveStopped: () => void = () => undefined;

  constructor(private readonly deps: SupervisorDeps) {
    this.limiter =
      deps.limiter ?? new RestartRateLimiter(deps.config.maxRestartsPerHour, deps.config.restartWindowMs, deps.clock);
    this.stopped = new Promise<void>((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  // --------------- Public API ---------------

  /**
   * Connect, restore the last checkpoint and run the first tick.
   * Ends in RUNNING, DEGRADED (transient failure) or STOPPED.
   */
  async start(): Promise<SupervisorState> {
    if (this.state !== 'STARTING') return this.state;
    const { exchange, fillFeed, tickLoop } = this.deps;
    log.info(`Supervisor starting (${this.deps.symbol})`);

    try {
      await exchange.connect();
      await this.loadState();
      fillFeed.start();
      const first = await tickLoop.tick();
      if (first.sessionEnded) {
        await this.stop('kill switch session ended');
        return this.getState();
      }
      this.transition('RUNNING', 'first tick completed');
      this.startTickLoop();
    } catch (err) {
      this.lastError = errorMessage(err);
      if (isUnrecoverable(err)) {
        await this.stop(`unrecoverable: ${this.lastError}`);
        return this.getState();
      }
      this.enterDegraded(`startup failed: ${this.lastError}`);
    }

    this.scheduleHealthCheck();
    return this.getState();
  }

  /** One health-check pass: diagnose while RUNNING, attempt recovery while DEGRADED. */
  async checkHealth(): Promise<void> {
    if (this.checking) return;
    const state = this.getState();
    if (state !== 'RUNNING' && state !== 'DEGRADED') return;

    this.checking = true;
    try {
      const feedFailure = this.deps.fillFeed.getFailure();
      if (isUnrecoverable(feedFailure)) {
        this.lastError = errorMessage(feedFailure);
        await this.stop(`unrecoverable: ${this.lastError}`);
        return;
      }
      if (state === 'RUNNING') {
        const problem = this.diagnose();
        if (problem) this.enterDegraded(problem);
      }
      if (this.getState() === 'DEGRADED' && this.deps.clock.now() >= this.nextRecoveryAt) {
        await this.attemptRecovery();
      }
    } finally {
      this.checking = false;
    }
  }

  /** Idempotent shutdown; resolves once STOPPED. */
  stop(reason: string, opts: StopOptions = {}): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown(reason, opts);
    return this.stopping;
  }

  whenStopped(): Promise<void> {
    return this.stopped;
  }

  getState(): SupervisorState {
    return this.state;
  }

  getHealth(): HealthStatus {
    const tick = this.deps.tickLoop.getHealth();
    return {
      state: this.state,
      lastTickAt: tick.lastTickAt,
      consecutiveFailures: tick.consecutiveFailures,
      connection: this.connectionState(),
      restartsInWindow: this.limiter.count(),
      suppressedRestarts: this.suppressedRestarts,
      lastError: this.lastError ?? tick.lastError,
    };
  }

  // --------------- Health ---------------

  private diagnose(): string | null {
    const { exchange, fillFeed, tickLoop, config, clock } = this.deps;
    const tick = tickLoop.getHealth();

    if (!exchange.isConnected()) return 'exchange connection lost';
    if (tick.crashed) return `tick loop crashed: ${tick.lastError ?? 'engine failure'}`;
    if (!tickLoop.isRunning()) return 'tick loop not running';
    if (!fillFeed.isAlive()) return `fill feed down: ${fillFeed.getLastError() ?? 'stream closed'}`;
    if (tick.consecutiveFailures >= config.failureThreshold) {
      return `${tick.consecutiveFailures} consecutive tick failures (last: ${tick.lastError ?? 'unknown'})`;
    }
    if (tick.lastTickAt !== null && clock.now() - tick.lastTickAt > config.staleTickMs) {
      return `no successful tick for ${Math.round((clock.now() - tick.lastTickAt) / 1000)}s`;
    }
    return null;
  }

  private enterDegraded(reason: string): void {
    this.lastError = reason;
    this.nextRecoveryAt = this.deps.clock.now() + this.deps.config.restartDelayMs;
    this.transition('DEGRADED', reason);
  }

  private async attemptRecovery(): Promise<void> {
    const { config, clock, exchange, fillFeed, tickLoop, notifier } = this.deps;

    if (!this.limiter.tryAcquire()) {
      this.suppressedRestarts += 1;
      this.consecutiveSuppressions += 1;
      const backoff = backoffDelay(this.consecutiveSuppressions, config.backoffBaseMs, config.backoffMaxMs);
      this.nextRecoveryAt = clock.now() + backoff;
      const freeInMin = Math.ceil(this.limiter.msUntilAvailable() / 60_000);
      log.warn(
        `Restart suppressed: ${this.limiter.count()}/${config.maxRestartsPerHour} restarts in window; next attempt in ${Math.round(backoff / 1000)}s, next slot in ${freeInMin} min`,
      );
      if (this.consecutiveSuppressions === 1) {
        notifier.alert(
          `⚠️ <b>Restart budget exhausted</b>\n${config.maxRestartsPerHour} restarts within the hour. Backing off; next slot in ${freeInMin} min.`,
        );
      }
      return;
    }

    this.transition('RECOVERING', `restart ${this.limiter.count()}/${config.maxRestartsPerHour}`);
    try {
      await tickLoop.stop();
      await fillFeed.stop();
      await exchange.disconnect();
      await exchange.connect();
      if (!this.stateLoaded) await this.loadState();
      const restarted = tickLoop.restartCrashedEngines();
      if (restarted.length > 0) log.info(`Restarted engines: ${restarted.join(', ')}`);
      fillFeed.start();

      const result = await tickLoop.tick();
      this.consecutiveSuppressions = 0;
      if (result.sessionEnded) {
        await this.stop('kill switch session ended');
        return;
      }
      this.lastError = null;
      this.transition('RUNNING', 'recovered');
      this.startTickLoop();
    } catch (err) {
      const message = errorMessage(err);
      if (isUnrecoverable(err)) {
        this.lastError = message;
        await this.stop(`unrecoverable: ${message}`);
        return;
      }
      this.enterDegraded(`recovery failed: ${message}`);
    }
  }

  private scheduleHealthCheck(): void {
    if (this.getState() === 'STOPPED' || this.stopping) return;
    this.cancelHealthTimer = this.deps.clock.schedule(this.deps.config.healthCheckIntervalMs, () => {
      void this.runScheduledCheck();
    });
  }

  private async runScheduledCheck(): Promise<void> {
    try {
      await this.checkHealth();
    } catch (err) {
      log.error(`Health check failed: ${errorMessage(err)}`);
    } finally {
      this.scheduleHealthCheck();
    }
  }

  // --------------- Transitions ---------------

  private startTickLoop(): void {
    if (this.stopping) return;
    this.deps.tickLoop.start({
      onCrash: (err) => {
        if (isUnrecoverable(err)) {
          this.lastError = err.message;
          void this.stop(`unrecoverable: ${err.message}`);
        } else if (this.getState() === 'RUNNING') {
          this.enterDegraded(`tick loop crashed: ${err.message}`);
        }
      },
      onSessionEnd: (reason) => {
        void this.stop(`kill switch session ended: ${reason}`);
      },
    });
  }

  private async loadState(): Promise<void> {
    try {
      const saved = await this.deps.store.loadState();
      if (saved) this.deps.tickLoop.restore(saved);
      else log.info('No saved state; starting fresh');
      this.stateLoaded = true;
    } catch (err) {
      log.warn(`Could not load saved state: ${errorMessage(err)}`);
    }
  }

  private async shutdown(reason: string, opts: StopOptions): Promise<void> {
    const { exchange, fillFeed, tickLoop } = this.deps;
    log.info(`Supervisor stopping: ${reason}`);
    this.cancelHealthTimer?.();
    this.cancelHealthTimer = null;

    await tickLoop.stop();
    if (opts.cancelOrders && exchange.isConnected()) {
      const cancelled = await tickLoop.cancelOpenOrders();
      log.info(`Cancelled ${cancelled} open orders`);
    }
    if (this.stateLoaded) await tickLoop.checkpoint();
    await fillFeed.stop();
    try {
      await exchange.disconnect();
    } catch (err) {
      log.warn(`Disconnect failed: ${errorMessage(err)}`);
    }

    this.transition('STOPPED', reason);
    this.resolveStopped();
  }

  private transition(to: SupervisorState, reason: string): void {
    const from = this.state;
    if (from === to || from === 'STOPPED') return;
    this.state = to;

    const line = `${from} → ${to}: ${reason}`;
    if (to === 'DEGRADED' || to === 'STOPPED') log.warn(line);
    else log.info(line);

    this.deps.notifier.record({ type: 'SUPERVISOR', from, to, reason });
    if (to === 'DEGRADED') this.deps.notifier.alert(`⚠️ <b>Bot degraded</b>\n${reason}`);
    if (to === 'STOPPED') this.deps.notifier.alert(`⛔ <b>Bot stopped</b>\n${reason}`);
  }

  private connectionState(): ConnectionState {
    if (this.deps.exchange.isConnected()) return 'CONNECTED';
    return this.state === 'RECOVERING' ? 'RECONNECTING' : 'FAILED';
  }
}
