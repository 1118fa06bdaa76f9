import { describe, it, expect, vi } from "vitest";
import type { TradingLimits } from "../config.js";
import { BacktestRunner } from "../backtest/runner.js";
import { MemoryLedger } from "../tracking/ledger.js";
import type { HistoricalPeriod, HistoricalSource } from "../tracking/snapshots.js";
import type { Article, MarketQuote, RawSignal, Strategy } from "../types.js";

vi.mock("../logger.js", () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const limits: TradingLimits = {
  maxBetPct: 0.05,
  maxDailyLossPct: 0.1,
  minEdge: 0.05,
  minConfidence: 6,
  kellyFraction: 0.5,
  maxConcurrentPositions: 10,
  maxVolumePct: 0.1,
  takerFeeRate: 0,
  slippageImpact: 0,
  maxQuoteAgeMs: 5 * 60_000,
};

function createQuote(fetchedAt: Date, overrides?: Partial<MarketQuote>): MarketQuote {
  return {
    marketId: "m1",
    question: "Will the bridge reopen by Friday?",
    yesPrice: 0.6,
    noPrice: 0.4,
    volume24h: 10_000,
    resolved: false,
    outcome: null,
    fetchedAt,
    ...overrides,
  };
}

const article: Article = {
  headline: "Engineers sign off on bridge repairs",
  summary: "Inspection passed",
  source: "wire",
  url: "https://news.test/bridge",
  publishedAt: new Date("2024-03-01T08:00:00.000Z"),
};

/** Two days: a bet on the first, the market resolves YES on the second. */
const source: HistoricalSource = {
  async loadPeriod(day: string, start: Date): Promise<HistoricalPeriod> {
    if (day === "2024-03-01") {
      return { day, articles: [article], markets: [createQuote(start)], resolutions: [] };
    }
    if (day === "2024-03-02") {
      return {
        day,
        articles: [],
        markets: [createQuote(start)],
        resolutions: [{ marketId: "m1", outcome: "YES", resolvedAt: new Date("2024-03-02T16:00:00.000Z") }],
      };
    }
    return { day, articles: [], markets: [], resolutions: [] };
  },
};

const bullish: Strategy = {
  name: "bullish",
  async generateSignals(articles: Article[]): Promise<RawSignal[]> {
    if (articles.length === 0) return [];
    return [{ marketId: "m1", direction: "YES", estimatedProb: 0.75, confidence: 8, reasoning: "repairs done" }];
  },
};

function createRunner(sink?: MemoryLedger): BacktestRunner {
  return new BacktestRunner({
    start: new Date("2024-03-01T00:00:00.000Z"),
    end: new Date("2024-03-03T00:00:00.000Z"),
    initialBankroll: 1000,
    limits,
    strategies: [bullish],
    source,
    sink,
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("BacktestRunner", () => {
  it("places, settles and reports over the replayed days", async () => {
    const result = await createRunner().run();

    expect(result.bets).toHaveLength(1);
    expect(result.bets[0].stakeAmount).toBeCloseTo(50);
    expect(result.bets[0].mode).toBe("backtest");
    expect(result.numTrades).toBe(1);
    expect(result.winRate).toBe(1);
    expect(result.totalPnl).toBeCloseTo(33.3333, 3);
    expect(result.finalBankroll).toBeCloseTo(1033.3333, 3);
    expect(result.maxDrawdown).toBeCloseTo(0.05);
    expect(result.equityCurve.map((s) => s.date)).toEqual(["2024-02-29", "2024-03-01", "2024-03-02"]);
    expect(result.equityCurve[1].bankroll).toBeCloseTo(950);
  });

  it("produces the same result for the same history", async () => {
    const first = await createRunner().run();
    const second = await createRunner().run();
    expect(second).toEqual(first);
  });

  it("writes bets, settlements and daily equity to the sink", async () => {
    const sink = new MemoryLedger();
    await createRunner(sink).run();

    expect(sink.records.map((r) => r.kind)).toEqual(["bet", "signal", "equity", "resolution", "equity"]);
    expect(sink.records[3].date).toBe("2024-03-02");
  });

  it("returns an empty result when nothing happens", async () => {
    const runner = new BacktestRunner({
      start: new Date("2024-04-01T00:00:00.000Z"),
      end: new Date("2024-04-02T00:00:00.000Z"),
      initialBankroll: 500,
      limits,
      strategies: [bullish],
      source,
    });
    const result = await runner.run();

    expect(result.numTrades).toBe(0);
    expect(result.totalPnl).toBe(0);
    expect(result.winRate).toBe(0);
    expect(result.sharpeRatio).toBe(0);
    expect(result.finalBankroll).toBe(500);
    expect(result.equityCurve).toEqual([
      { date: "2024-03-31", bankroll: 500 },
      { date: "2024-04-01", bankroll: 500 },
    ]);
  });
});
