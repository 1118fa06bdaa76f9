import type { TradingLimits } from "../config.js";
import { addDays, utcDay } from "../clock.js";
import { log } from "../logger.js";
import { ExecutionSimulator } from "../execution/simulator.js";
import { collectResolutions, processSignal, settleResolution, type PipelineContext } from "../execution/pipeline.js";
import { feeModelFromLimits, type FeeModel } from "../strategy/edge.js";
import { RiskManager } from "../strategy/risk-manager.js";
import { equityRecord, type PersistenceSink } from "../tracking/ledger.js";
import { maxDrawdown, sharpeRatio, dailyReturns, winRate } from "../tracking/performance.js";
import type { HistoricalSource } from "../tracking/snapshots.js";
import type { Bet, BetResult, EquitySample, MarketQuote, Strategy } from "../types.js";

export interface BacktestOptions {
  /** First day replayed (UTC). */
  start: Date;
  /** Exclusive end day (UTC). */
  end: Date;
  initialBankroll: number;
  limits: TradingLimits;
  strategies: Strategy[];
  source: HistoricalSource;
  fees?: FeeModel;
  sink?: PersistenceSink;
}

export interface BacktestResult {
  totalPnl: number;
  winRate: number;
  numTrades: number;
  sharpeRatio: number;
  maxDrawdown: number;
  finalBankroll: number;
  bets: Bet[];
  trades: BetResult[];
  equityCurve: EquitySample[];
}

function startOfUtcDay(date: Date): Date {
  return new Date(`${utcDay(date)}T00:00:00.000Z`);
}

/**
 * Replays daily historical periods through the live decision pipeline.
 * Same data in, same bets out: nothing here reads the wall clock.
 */
export class BacktestRunner {
  private opts: BacktestOptions;

  constructor(opts: BacktestOptions) {
    this.opts = opts;
  }

  async run(): Promise<BacktestResult> {
    const { limits, strategies, source, sink, initialBankroll } = this.opts;
    const simulator = new ExecutionSimulator(initialBankroll);
    const ctx: PipelineContext = {
      limits,
      fees: this.opts.fees ?? feeModelFromLimits(limits),
      risk: new RiskManager(limits),
      simulator,
      mode: "backtest",
      sink,
    };

    const first = startOfUtcDay(this.opts.start);
    const end = startOfUtcDay(this.opts.end);
    const equityCurve: EquitySample[] = [{ date: utcDay(addDays(first, -1)), bankroll: initialBankroll }];

    for (let now = first; now < end; now = addDays(now, 1)) {
      const day = utcDay(now);
      simulator.beginDay(now);
      const period = await source.loadPeriod(day, now);
      const quotes = new Map<string, MarketQuote>(period.markets.map((m) => [m.marketId, m]));
      const open = period.markets.filter((m) => !m.resolved);

      let placed = 0;
      for (const strategy of strategies) {
        const signals = await strategy.generateSignals(period.articles, open);
        for (const raw of signals) {
          const decision = await processSignal(raw, quotes.get(raw.marketId), ctx, now);
          if (decision.status === "placed") placed++;
        }
      }

      for (const resolution of collectResolutions(period.markets, period.resolutions, now)) {
        await settleResolution(resolution, simulator, sink);
      }

      const sample = { date: day, bankroll: simulator.getBankroll() };
      equityCurve.push(sample);
      if (sink) await sink.append(equityRecord(sample, now));

      log.debug("Backtest period", { day, articles: period.articles.length, placed, bankroll: sample.bankroll });
    }

    const trades = [...simulator.getResults()];
    const curve = equityCurve.map((s) => s.bankroll);
    const result: BacktestResult = {
      totalPnl: trades.reduce((sum, t) => sum + t.pnl, 0),
      winRate: winRate(trades),
      numTrades: trades.length,
      sharpeRatio: sharpeRatio(dailyReturns(curve)),
      maxDrawdown: maxDrawdown(curve),
      finalBankroll: simulator.getBankroll(),
      bets: [...simulator.getBets()],
      trades,
      equityCurve,
    };

    log.info("Backtest complete", {
      from: utcDay(first),
      to: utcDay(end),
      bets: result.bets.length,
      trades: result.numTrades,
      totalPnl: Number(result.totalPnl.toFixed(2)),
      finalBankroll: Number(result.finalBankroll.toFixed(2)),
    });
    return result;
  }
}
