import { InvalidSignalError, StaleMarketDataError } from "../errors.js";
import type { Direction, MarketQuote, RawSignal, Signal } from "../types.js";

/** Price actually paid for `stake` dollars given the quoted price and book depth. */
export type SlippageFn = (quotedPrice: number, stake: number, depth: number) => number;

export interface FeeModel {
  takerFeeRate: number;
  slippage: SlippageFn;
}

export interface EdgeThresholds {
  minEdge: number;
  minConfidence: number;
  maxQuoteAgeMs: number;
}

export type EdgeRejection = "BELOW_MIN_EDGE" | "LOW_CONFIDENCE";

export type EdgeResult =
  | { ok: true; signal: Signal }
  | { ok: false; reason: EdgeRejection; edge: number; detail: string };

export const noSlippage: SlippageFn = (quotedPrice) => quotedPrice;

/**
 * Linear price impact: every dollar staked moves the price by
 * `impact / depth`. Depth is the market's 24h volume.
 */
export function linearSlippage(impact: number): SlippageFn {
  return (quotedPrice, stake, depth) => {
    if (impact <= 0 || stake <= 0 || depth <= 0) return quotedPrice;
    return quotedPrice + (impact * stake) / depth;
  };
}

export function feeModelFromLimits(limits: { takerFeeRate: number; slippageImpact: number }): FeeModel {
  return {
    takerFeeRate: limits.takerFeeRate,
    slippage: limits.slippageImpact > 0 ? linearSlippage(limits.slippageImpact) : noSlippage,
  };
}

/**
 * Expected value per dollar staked on a binary contract bought at `price`:
 * win (1 - price) with probability p, lose price otherwise, minus the taker fee.
 */
export function expectedValuePerDollar(estimatedProb: number, price: number, takerFeeRate: number): number {
  return estimatedProb * (1 - price) - (1 - estimatedProb) * price - takerFeeRate;
}

export function quotedPriceFor(quote: MarketQuote, direction: Direction): number {
  return direction === "YES" ? quote.yesPrice : quote.noPrice;
}

function validateCandidate(raw: RawSignal): void {
  if (raw.direction !== "YES" && raw.direction !== "NO") {
    throw new InvalidSignalError(`Invalid direction for ${raw.marketId}: ${String(raw.direction)}`);
  }
  if (!Number.isFinite(raw.estimatedProb) || raw.estimatedProb < 0 || raw.estimatedProb > 1) {
    throw new InvalidSignalError(`Probability out of range for ${raw.marketId}: ${raw.estimatedProb}`);
  }
  if (!Number.isFinite(raw.confidence) || raw.confidence < 1 || raw.confidence > 10) {
    throw new InvalidSignalError(`Confidence out of range for ${raw.marketId}: ${raw.confidence}`);
  }
}

function validateQuote(raw: RawSignal, quote: MarketQuote | undefined, now: Date, maxAgeMs: number): MarketQuote {
  if (!quote || quote.marketId !== raw.marketId) {
    throw new StaleMarketDataError(`No quote for market ${raw.marketId}`);
  }
  if (quote.resolved) {
    throw new StaleMarketDataError(`Market ${raw.marketId} is already resolved`);
  }
  const age = now.getTime() - quote.fetchedAt.getTime();
  if (age > maxAgeMs) {
    throw new StaleMarketDataError(`Quote for ${raw.marketId} is ${age}ms old (max ${maxAgeMs}ms)`);
  }
  const price = quotedPriceFor(quote, raw.direction);
  if (!Number.isFinite(price) || price <= 0 || price >= 1) {
    throw new StaleMarketDataError(`Unusable ${raw.direction} price for ${raw.marketId}: ${price}`);
  }
  return quote;
}

/**
 * Turn an untrusted candidate into a Signal priced for `stake` dollars.
 *
 * Throws InvalidSignalError / StaleMarketDataError for inputs that can never
 * produce a signal; returns a rejection for candidates that fall short of the
 * thresholds. Pure: the timestamp is taken from `now`.
 */
export function evaluateEdge(
  raw: RawSignal,
  quote: MarketQuote | undefined,
  fees: FeeModel,
  thresholds: EdgeThresholds,
  now: Date,
  stake = 0,
): EdgeResult {
  validateCandidate(raw);
  const market = validateQuote(raw, quote, now, thresholds.maxQuoteAgeMs);

  const quotedPrice = quotedPriceFor(market, raw.direction);
  const slipped = fees.slippage(quotedPrice, stake, market.volume24h);
  const effectivePrice = Math.min(1, Math.max(quotedPrice, slipped));
  const edge = expectedValuePerDollar(raw.estimatedProb, effectivePrice, fees.takerFeeRate);

  if (raw.confidence < thresholds.minConfidence) {
    return {
      ok: false,
      reason: "LOW_CONFIDENCE",
      edge,
      detail: `confidence ${raw.confidence} below ${thresholds.minConfidence}`,
    };
  }
  if (edge <= thresholds.minEdge) {
    return {
      ok: false,
      reason: "BELOW_MIN_EDGE",
      edge,
      detail: `edge ${edge.toFixed(4)} not above ${thresholds.minEdge.toFixed(4)}`,
    };
  }

  return {
    ok: true,
    signal: {
      timestamp: now,
      marketId: market.marketId,
      question: market.question,
      direction: raw.direction,
      quotedPrice,
      effectivePrice,
      estimatedProb: raw.estimatedProb,
      edge,
      confidence: raw.confidence,
      reasoning: raw.reasoning,
      headline: raw.headline ?? "",
    },
  };
}
