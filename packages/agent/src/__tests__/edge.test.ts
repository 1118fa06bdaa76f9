import { describe, it, expect } from "vitest";
import { evaluateEdge, linearSlippage, noSlippage, type EdgeThresholds, type FeeModel } from "../strategy/edge.js";
import { InvalidSignalError, StaleMarketDataError } from "../errors.js";
import type { MarketQuote, RawSignal } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date("2024-05-01T12:00:00.000Z");

const thresholds: EdgeThresholds = { minEdge: 0.05, minConfidence: 6, maxQuoteAgeMs: 5 * 60_000 };
const noFees: FeeModel = { takerFeeRate: 0, slippage: noSlippage };

function createQuote(overrides?: Partial<MarketQuote>): MarketQuote {
  return {
    marketId: "m1",
    question: "Will the central bank cut rates in June?",
    yesPrice: 0.6,
    noPrice: 0.4,
    volume24h: 1000,
    resolved: false,
    outcome: null,
    fetchedAt: NOW,
    ...overrides,
  };
}

function createRaw(overrides?: Partial<RawSignal>): RawSignal {
  return {
    marketId: "m1",
    direction: "YES",
    estimatedProb: 0.75,
    confidence: 8,
    reasoning: "surprise inflation print",
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Pricing
// ---------------------------------------------------------------------------

describe("evaluateEdge pricing", () => {
  it("computes the fee-free expected value per dollar", () => {
    const result = evaluateEdge(createRaw(), createQuote(), noFees, thresholds, NOW);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.signal.edge).toBeCloseTo(0.15, 10);
    expect(result.signal.quotedPrice).toBe(0.6);
    expect(result.signal.effectivePrice).toBe(0.6);
    expect(result.signal.timestamp).toEqual(NOW);
  });

  it("subtracts the taker fee", () => {
    const result = evaluateEdge(createRaw(), createQuote(), { ...noFees, takerFeeRate: 0.02 }, thresholds, NOW);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.signal.edge).toBeCloseTo(0.13, 10);
  });

  it("prices NO signals off the NO side", () => {
    const result = evaluateEdge(
      createRaw({ direction: "NO", estimatedProb: 0.7 }),
      createQuote({ noPrice: 0.5 }),
      noFees,
      thresholds,
      NOW,
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.signal.quotedPrice).toBe(0.5);
    expect(result.signal.edge).toBeCloseTo(0.2, 10);
  });

  it("applies linear slippage for the contemplated stake", () => {
    const fees: FeeModel = { takerFeeRate: 0, slippage: linearSlippage(0.5) };
    const result = evaluateEdge(createRaw(), createQuote(), fees, thresholds, NOW, 100);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.signal.effectivePrice).toBeCloseTo(0.65, 10);
    expect(result.signal.edge).toBeCloseTo(0.1, 10);
  });

  it("clamps the slipped price to 1", () => {
    const fees: FeeModel = { takerFeeRate: 0, slippage: linearSlippage(100) };
    const result = evaluateEdge(createRaw({ estimatedProb: 1 }), createQuote(), fees, { ...thresholds, minEdge: -1 }, NOW, 100);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.signal.effectivePrice).toBe(1);
    expect(result.signal.edge).toBe(0);
  });

  it("is deterministic for identical inputs", () => {
    const a = evaluateEdge(createRaw(), createQuote(), noFees, thresholds, NOW);
    const b = evaluateEdge(createRaw(), createQuote(), noFees, thresholds, NOW);
    expect(a).toEqual(b);
  });
});

describe("linearSlippage", () => {
  it("leaves the price alone without stake or depth", () => {
    const slip = linearSlippage(0.5);
    expect(slip(0.6, 0, 1000)).toBe(0.6);
    expect(slip(0.6, 100, 0)).toBe(0.6);
  });
});

// ---------------------------------------------------------------------------
// Thresholds
// ---------------------------------------------------------------------------

describe("evaluateEdge thresholds", () => {
  it("rejects an edge at or below the minimum", () => {
    const result = evaluateEdge(createRaw({ estimatedProb: 0.63 }), createQuote(), noFees, thresholds, NOW);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason).toBe("BELOW_MIN_EDGE");
    expect(result.edge).toBeCloseTo(0.03, 10);
  });

  it("rejects low confidence before looking at the edge", () => {
    const result = evaluateEdge(createRaw({ confidence: 5, estimatedProb: 0.63 }), createQuote(), noFees, thresholds, NOW);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason).toBe("LOW_CONFIDENCE");
    expect(result.detail).toBe("confidence 5 below 6");
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("evaluateEdge validation", () => {
  it("throws InvalidSignalError for out-of-range candidates", () => {
    expect(() => evaluateEdge(createRaw({ estimatedProb: 1.2 }), createQuote(), noFees, thresholds, NOW)).toThrow(
      InvalidSignalError,
    );
    expect(() => evaluateEdge(createRaw({ estimatedProb: Number.NaN }), createQuote(), noFees, thresholds, NOW)).toThrow(
      InvalidSignalError,
    );
    expect(() => evaluateEdge(createRaw({ confidence: 11 }), createQuote(), noFees, thresholds, NOW)).toThrow(
      InvalidSignalError,
    );
  });

  it("throws StaleMarketDataError for missing, old, resolved or unusable quotes", () => {
    expect(() => evaluateEdge(createRaw(), undefined, noFees, thresholds, NOW)).toThrow(StaleMarketDataError);

    const old = createQuote({ fetchedAt: new Date(NOW.getTime() - 10 * 60_000) });
    expect(() => evaluateEdge(createRaw(), old, noFees, thresholds, NOW)).toThrow(StaleMarketDataError);

    const resolved = createQuote({ resolved: true, outcome: "YES" });
    expect(() => evaluateEdge(createRaw(), resolved, noFees, thresholds, NOW)).toThrow(StaleMarketDataError);

    const zeroPrice = createQuote({ yesPrice: 0 });
    expect(() => evaluateEdge(createRaw(), zeroPrice, noFees, thresholds, NOW)).toThrow(StaleMarketDataError);
  });
});
