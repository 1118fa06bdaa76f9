import type { TradingLimits } from "../config.js";
import { systemClock, utcDay, type Clock } from "../clock.js";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { withRetry } from "../retry.js";
import { ExecutionSimulator } from "../execution/simulator.js";
import { collectResolutions, processSignal, settleResolution, type PipelineContext } from "../execution/pipeline.js";
import { feeModelFromLimits, type FeeModel } from "../strategy/edge.js";
import { KillSwitchPolicy } from "../strategy/kill-switch.js";
import { RiskManager } from "../strategy/risk-manager.js";
import {
  equityRecord,
  performanceRecord,
  readEquityCurve,
  signalRecord,
  type PersistenceSink,
} from "../tracking/ledger.js";
import { dailyMetrics, maxDrawdown, realizedEquityCurve, summarize } from "../tracking/performance.js";
import type { SnapshotStore } from "../tracking/snapshots.js";
import type { StateStore } from "../tracking/state-store.js";
import type {
  AgentState,
  AgentStatus,
  Article,
  EquitySample,
  MarketDataSource,
  MarketQuote,
  NewsSource,
  PerformanceMetrics,
  RawSignal,
  Resolution,
  Strategy,
  TradingMode,
} from "../types.js";

/** Schedules a callback; returns a function that cancels it. */
export interface Ticker {
  schedule(fn: () => void, delayMs: number): () => void;
}

export const timerTicker: Ticker = {
  schedule(fn, delayMs) {
    const timer = setTimeout(fn, delayMs);
    return () => clearTimeout(timer);
  },
};

export interface AgentLoopOptions {
  mode: TradingMode;
  limits: TradingLimits;
  tickIntervalMs: number;
  fetch: { timeoutMs: number; retries: number; delayMs?: number };
  news: NewsSource;
  markets: MarketDataSource;
  strategies: Strategy[];
  sink: PersistenceSink;
  initialBankroll: number;
  fees?: FeeModel;
  killSwitch?: KillSwitchPolicy;
  clock?: Clock;
  ticker?: Ticker;
  snapshots?: SnapshotStore;
  stateStore?: StateStore;
}

export interface TickReport {
  startedAt: Date;
  ok: boolean;
  articles: number;
  signals: number;
  placed: number;
  rejected: number;
  resolved: number;
  error: string | null;
}

/**
 * Sense -> think -> act -> track, one tick at a time.
 *
 * Per-tick failures are caught here and never escape: the tick is counted
 * as failed, the loop sleeps and tries again on the next slot. Bets that
 * were committed before the failure stay committed.
 */
export class AgentLoop {
  private opts: AgentLoopOptions;
  private clock: Clock;
  private ticker: Ticker;
  private risk: RiskManager;
  private fees: FeeModel;
  private killSwitch: KillSwitchPolicy;
  private simulator: ExecutionSimulator;

  private state: AgentState = "idle";
  private running = false;
  private initialized = false;
  private inflight: Promise<TickReport> | null = null;
  private cancelNext: (() => void) | null = null;

  private equity: EquitySample[] = [];
  private recentTicks: boolean[] = [];
  private suspendReason: string | null = null;
  private lastTickAt: Date | null = null;
  private lastError: string | null = null;
  private ticksCompleted = 0;
  private ticksFailed = 0;
  private ticksSkipped = 0;

  constructor(opts: AgentLoopOptions) {
    this.opts = opts;
    this.clock = opts.clock ?? systemClock;
    this.ticker = opts.ticker ?? timerTicker;
    this.risk = new RiskManager(opts.limits);
    this.fees = opts.fees ?? feeModelFromLimits(opts.limits);
    this.killSwitch = opts.killSwitch ?? new KillSwitchPolicy({ maxDrawdownKill: 0, maxErrorRateKill: 0 });
    this.simulator = new ExecutionSimulator(opts.initialBankroll);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Checks the sink and restores state. A FatalError here means the loop
   * must not start.
   */
  async init(): Promise<void> {
    if (this.initialized) return;
    await this.opts.sink.ping();

    const saved = await this.opts.stateStore?.load();
    if (saved) {
      this.simulator = ExecutionSimulator.restore(saved);
      log.info("Restored simulator state", {
        bankroll: saved.bankroll,
        positions: saved.positions.length,
        bets: saved.bets.length,
      });
    }

    this.equity = await readEquityCurve(this.opts.sink, "0000-01-01", "9999-12-31");
    this.initialized = true;
  }

  async start(): Promise<void> {
    if (this.running) return;
    await this.init();
    this.running = true;
    log.info("Agent started", { mode: this.opts.mode, intervalMs: this.opts.tickIntervalMs });
    this.scheduleNext(0);
  }

  /** Cooperative: the tick in progress finishes before this resolves. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.cancelNext?.();
    this.cancelNext = null;
    if (this.inflight) await this.inflight;
    this.state = "idle";
    log.info("Agent stopped", { ticksCompleted: this.ticksCompleted });
  }

  isRunning(): boolean {
    return this.running;
  }

  private scheduleNext(delayMs: number): void {
    this.cancelNext = this.ticker.schedule(() => {
      this.cancelNext = null;
      this.onSlot().catch((err) => {
        log.error("Scheduled tick crashed", { error: errorMessage(err) });
      });
    }, delayMs);
  }

  private async onSlot(): Promise<void> {
    if (!this.running) return;
    const startedAt = this.clock.now().getTime();
    await this.runTick();
    if (!this.running) return;

    // Slots that passed while the tick ran are dropped, not queued
    const interval = this.opts.tickIntervalMs;
    const elapsed = Math.max(0, this.clock.now().getTime() - startedAt);
    const missed = Math.floor(elapsed / interval);
    if (missed > 0) {
      this.ticksSkipped += missed;
      log.warn("Tick overran its interval", { elapsedMs: elapsed, skipped: missed });
    }
    this.scheduleNext(interval - (elapsed % interval));
  }

  // ---------------------------------------------------------------------------
  // Tick
  // ---------------------------------------------------------------------------

  /** Runs one tick. While a tick is running, returns that tick instead of starting another. */
  runTick(): Promise<TickReport> {
    if (this.inflight) return this.inflight;
    const tick = this.tick().finally(() => {
      this.inflight = null;
    });
    this.inflight = tick;
    return tick;
  }

  private async tick(): Promise<TickReport> {
    const now = this.clock.now();
    const report: TickReport = {
      startedAt: now,
      ok: true,
      articles: 0,
      signals: 0,
      placed: 0,
      rejected: 0,
      resolved: 0,
      error: null,
    };

    try {
      await this.init();
      this.simulator.beginDay(now);

      this.state = "sensing";
      const { articles, markets } = await this.sense(report);

      this.state = "thinking";
      const candidates = await this.think(articles, markets);
      report.signals = candidates.length;

      this.state = "acting";
      await this.act(candidates, markets, now, report);

      this.state = "tracking";
      await this.track(markets, now, report);
    } catch (err) {
      report.ok = false;
      report.error = errorMessage(err);
      log.error("Tick failed", { state: this.state, error: report.error });
    }

    await this.saveState(report);
    this.finishTick(report);
    return report;
  }

  /** Saved after every tick, failed ones included. */
  private async saveState(report: TickReport): Promise<void> {
    if (!this.initialized || !this.opts.stateStore || this.opts.mode !== "paper") return;
    try {
      await this.opts.stateStore.save(this.simulator.snapshot());
    } catch (err) {
      report.ok = false;
      report.error = `save state: ${errorMessage(err)}`;
      log.error("Failed to save simulator state", { error: errorMessage(err) });
    }
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      label,
      retries: this.opts.fetch.retries,
      delayMs: this.opts.fetch.delayMs,
      timeoutMs: this.opts.fetch.timeoutMs,
    });
  }

  /** Fetch failures are soft: the tick goes on with what it has and is marked failed. */
  private async soft<T>(label: string, fn: () => Promise<T>, fallback: T, report: TickReport): Promise<T> {
    try {
      return await this.call(label, fn);
    } catch (err) {
      report.ok = false;
      report.error = `${label}: ${errorMessage(err)}`;
      log.warn("Skipping failed fetch for this tick", { label, error: errorMessage(err) });
      return fallback;
    }
  }

  private async sense(report: TickReport): Promise<{ articles: Article[]; markets: MarketQuote[] }> {
    const articles = await this.soft("fetch news", () => this.opts.news.fetchNewArticles(), [], report);
    const markets = await this.soft("fetch markets", () => this.opts.markets.fetchMarkets(), [], report);
    report.articles = articles.length;

    const snapshots = this.opts.snapshots;
    if (snapshots) {
      try {
        if (markets.length > 0) await snapshots.recordMarkets(markets, this.clock.now());
        if (articles.length > 0) await snapshots.recordNews(articles);
      } catch (err) {
        log.warn("Failed to record snapshots", { error: errorMessage(err) });
      }
    }

    log.debug("Sensed", { articles: articles.length, markets: markets.length });
    return { articles, markets };
  }

  private async think(articles: Article[], markets: MarketQuote[]): Promise<RawSignal[]> {
    if (articles.length === 0) return [];
    const open = markets.filter((m) => !m.resolved);
    const candidates: RawSignal[] = [];
    for (const strategy of this.opts.strategies) {
      const signals = await strategy.generateSignals(articles, open);
      log.debug("Strategy produced signals", { strategy: strategy.name, signals: signals.length });
      candidates.push(...signals);
    }
    return candidates;
  }

  private async act(candidates: RawSignal[], markets: MarketQuote[], now: Date, report: TickReport): Promise<void> {
    if (candidates.length === 0) return;

    if (this.suspendReason) {
      log.warn("New bets suspended", { reason: this.suspendReason, candidates: candidates.length });
      for (const raw of candidates) {
        await this.opts.sink.append(
          signalRecord(now, utcDay(now), {
            marketId: raw.marketId,
            direction: raw.direction,
            rejected: `SUSPENDED: ${this.suspendReason}`,
          }),
        );
      }
      report.rejected += candidates.length;
      return;
    }

    const quotes = new Map(markets.map((m) => [m.marketId, m]));
    const ctx: PipelineContext = {
      limits: this.opts.limits,
      fees: this.fees,
      risk: this.risk,
      simulator: this.simulator,
      mode: this.opts.mode,
      sink: this.opts.sink,
    };

    for (const raw of candidates) {
      const decision = await processSignal(raw, quotes.get(raw.marketId), ctx, now);
      if (decision.status === "placed") {
        report.placed++;
      } else {
        report.rejected++;
        log.debug("Signal rejected", {
          marketId: raw.marketId,
          stage: decision.stage,
          reason: decision.reason,
          detail: decision.detail,
        });
      }
    }
  }

  private async track(markets: MarketQuote[], now: Date, report: TickReport): Promise<void> {
    const openIds = this.simulator.openPositions().map((p) => p.marketId);
    const events: Resolution[] =
      openIds.length > 0
        ? await this.soft("fetch resolutions", () => this.opts.markets.fetchResolutions(openIds), [], report)
        : [];

    const resolutions = collectResolutions(markets, events, now).filter((r) => openIds.includes(r.marketId));
    for (const resolution of resolutions) {
      if (await settleResolution(resolution, this.simulator, this.opts.sink)) report.resolved++;
    }

    if (this.opts.snapshots && resolutions.length > 0) {
      try {
        await this.opts.snapshots.recordResolutions(resolutions);
      } catch (err) {
        log.warn("Failed to record resolutions", { error: errorMessage(err) });
      }
    }

    // First tick of a UTC day: close out the previous day, then open this one
    const today = utcDay(now);
    const previous = this.equity[this.equity.length - 1]?.date;
    if (previous !== today) {
      if (previous !== undefined) {
        const closed = dailyMetrics(this.simulator.getResults(), previous);
        await this.opts.sink.append(performanceRecord(closed, previous, now));
      }
      const sample = { date: today, bankroll: this.simulator.getBankroll() };
      await this.opts.sink.append(equityRecord(sample, now));
      this.equity.push(sample);
    }
  }

  private finishTick(report: TickReport): void {
    if (report.ok) this.ticksCompleted++;
    else this.ticksFailed++;
    if (report.error) this.lastError = report.error;
    this.lastTickAt = report.startedAt;

    this.recentTicks.push(report.ok);
    if (this.recentTicks.length > this.killSwitch.errorWindow) {
      this.recentTicks.splice(0, this.recentTicks.length - this.killSwitch.errorWindow);
    }

    const decision = this.killSwitch.evaluate({ maxDrawdown: this.policyDrawdown() }, this.recentTicks);
    if (decision.suspendNewBets && !this.suspendReason) {
      log.error("Kill switch tripped; suspending new bets", { reason: decision.reason });
    } else if (!decision.suspendNewBets && this.suspendReason) {
      log.info("Kill switch cleared; resuming new bets");
    }
    this.suspendReason = decision.suspendNewBets ? decision.reason : null;

    this.state = "sleeping";
    log.info("Tick finished", {
      ok: report.ok,
      articles: report.articles,
      signals: report.signals,
      placed: report.placed,
      rejected: report.rejected,
      resolved: report.resolved,
      bankroll: Number(this.simulator.getBankroll().toFixed(2)),
    });
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  metrics(): PerformanceMetrics {
    const curve = [...this.equity];
    const today = utcDay(this.clock.now());
    const bankroll = this.simulator.getBankroll();
    if (curve.length === 0 || curve[curve.length - 1].date !== today) {
      curve.push({ date: today, bankroll });
    } else {
      curve[curve.length - 1] = { date: today, bankroll };
    }
    return summarize(this.simulator.getResults(), curve);
  }

  /** Drawdown of realized capital; the kill switch reads this, not the cash curve. */
  policyDrawdown(): number {
    return maxDrawdown(realizedEquityCurve(this.opts.initialBankroll, this.simulator.getResults()));
  }

  getEquityCurve(): EquitySample[] {
    return [...this.equity];
  }

  getSimulator(): ExecutionSimulator {
    return this.simulator;
  }

  getStatus(): AgentStatus {
    const risk = this.simulator.riskState();
    return {
      state: this.state,
      running: this.running,
      suspended: this.suspendReason !== null,
      suspendReason: this.suspendReason,
      mode: this.opts.mode,
      bankroll: risk.bankroll,
      openPositions: this.simulator.openPositions(),
      todayPnl: risk.dailyPnl,
      lastTickAt: this.lastTickAt?.toISOString() ?? null,
      lastError: this.lastError,
      ticksCompleted: this.ticksCompleted,
      ticksFailed: this.ticksFailed,
      ticksSkipped: this.ticksSkipped,
    };
  }
}
