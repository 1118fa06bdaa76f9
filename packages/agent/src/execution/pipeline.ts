import type { TradingLimits } from "../config.js";
import { utcDay } from "../clock.js";
import { InsufficientBankrollError, InvalidSignalError, StaleMarketDataError, StateConflictError } from "../errors.js";
import { log } from "../logger.js";
import { evaluateEdge, type EdgeThresholds, type FeeModel } from "../strategy/edge.js";
import { sizeStake } from "../strategy/kelly.js";
import type { RiskManager } from "../strategy/risk-manager.js";
import { betRecord, resolutionRecord, signalRecord, type PersistenceSink } from "../tracking/ledger.js";
import type { Bet, MarketQuote, Position, RawSignal, Resolution, Signal, TradingMode } from "../types.js";
import type { BetPreview, ExecutionSimulator, ResolveOutcome } from "./simulator.js";

export type RejectionStage = "validation" | "edge" | "sizing" | "risk" | "execution" | "policy";

export type Decision =
  | { status: "placed"; bet: Bet; position: Position }
  | { status: "rejected"; stage: RejectionStage; reason: string; detail: string; edge?: number };

export interface PipelineContext {
  limits: TradingLimits;
  fees: FeeModel;
  risk: RiskManager;
  simulator: ExecutionSimulator;
  mode: TradingMode;
  sink?: PersistenceSink;
}

function thresholdsOf(limits: TradingLimits): EdgeThresholds {
  return {
    minEdge: limits.minEdge,
    minConfidence: limits.minConfidence,
    maxQuoteAgeMs: limits.maxQuoteAgeMs,
  };
}

function rejected(stage: RejectionStage, reason: string, detail: string, edge?: number): Decision {
  return { status: "rejected", stage, reason, detail, edge };
}

/**
 * Price and size a candidate. The stake is computed at the unslipped price,
 * the signal is re-priced for that stake, and the smaller of the two Kelly
 * stakes is kept.
 */
function priceAndSize(
  raw: RawSignal,
  quote: MarketQuote | undefined,
  ctx: PipelineContext,
  bankroll: number,
  now: Date,
): { signal: Signal; stake: number } | Decision {
  const thresholds = thresholdsOf(ctx.limits);
  const sizingFor = (signal: Signal) =>
    sizeStake({
      estimatedProb: signal.estimatedProb,
      effectivePrice: signal.effectivePrice,
      edge: signal.edge,
      bankroll,
      kellyFraction: ctx.limits.kellyFraction,
      maxBetPct: ctx.limits.maxBetPct,
    });

  const first = evaluateEdge(raw, quote, ctx.fees, thresholds, now);
  if (!first.ok) return rejected("edge", first.reason, first.detail, first.edge);

  const initial = sizingFor(first.signal);
  if (initial.stakeAmount <= 0) {
    return rejected("sizing", "ZERO_STAKE", "kelly sizing returned 0", first.signal.edge);
  }

  const slipped = evaluateEdge(raw, quote, ctx.fees, thresholds, now, initial.stakeAmount);
  if (!slipped.ok) return rejected("edge", slipped.reason, `after slippage: ${slipped.detail}`, slipped.edge);

  const stake = Math.min(initial.stakeAmount, sizingFor(slipped.signal).stakeAmount);
  if (stake <= 0) {
    return rejected("sizing", "ZERO_STAKE", "kelly sizing returned 0 after slippage", slipped.signal.edge);
  }
  return { signal: slipped.signal, stake };
}

async function recordRejection(ctx: PipelineContext, now: Date, raw: RawSignal, decision: Decision): Promise<void> {
  if (!ctx.sink || decision.status !== "rejected") return;
  await ctx.sink.append(
    signalRecord(now, utcDay(now), {
      marketId: raw.marketId,
      direction: raw.direction,
      edge: decision.edge,
      rejected: `${decision.reason}: ${decision.detail}`,
    }),
  );
}

/**
 * Edge -> sizing -> risk gate -> execution for a single candidate.
 *
 * Validation, threshold, risk and venue rejections come back as a rejected
 * Decision. Persistence failures propagate; in that case the bet was not
 * committed.
 */
export async function processSignal(
  raw: RawSignal,
  quote: MarketQuote | undefined,
  ctx: PipelineContext,
  now: Date,
): Promise<Decision> {
  const risk = ctx.simulator.riskState();

  let priced: { signal: Signal; stake: number } | Decision;
  try {
    priced = priceAndSize(raw, quote, ctx, risk.bankroll, now);
  } catch (err) {
    if (err instanceof InvalidSignalError || err instanceof StaleMarketDataError) {
      const decision = rejected("validation", err.name, err.message);
      await recordRejection(ctx, now, raw, decision);
      return decision;
    }
    throw err;
  }
  if ("status" in priced) {
    await recordRejection(ctx, now, raw, priced);
    return priced;
  }

  const { signal, stake } = priced;
  const existing = ctx.simulator.getPosition(signal.marketId);
  const gate = ctx.risk.check({
    signal,
    stake,
    risk,
    volume24h: quote?.volume24h ?? 0,
    existing,
  });
  if (!gate.accepted) {
    const decision = rejected("risk", gate.reason, gate.detail, signal.edge);
    await recordRejection(ctx, now, raw, decision);
    return decision;
  }

  const bet: Bet = {
    id: `${ctx.mode}-${ctx.simulator.getBets().length + 1}`,
    signal,
    stakeAmount: stake,
    kellyFractionApplied: ctx.limits.kellyFraction,
    mode: ctx.mode,
    executionPrice: signal.effectivePrice,
    shares: stake / signal.effectivePrice,
    placedAt: now,
  };

  let preview: BetPreview;
  try {
    preview = ctx.simulator.previewBet(bet);
  } catch (err) {
    if (err instanceof StateConflictError || err instanceof InsufficientBankrollError) {
      const decision = rejected("execution", err.name, err.message, signal.edge);
      await recordRejection(ctx, now, raw, decision);
      return decision;
    }
    throw err;
  }

  // Persist before committing so a failed write leaves no partial state.
  if (ctx.sink) await ctx.sink.append(betRecord(bet, utcDay(now)));
  const position = ctx.simulator.commit(preview);

  log.info("Bet placed", {
    betId: bet.id,
    marketId: signal.marketId,
    direction: signal.direction,
    stake: Number(stake.toFixed(2)),
    price: Number(signal.effectivePrice.toFixed(4)),
    edge: Number(signal.edge.toFixed(4)),
  });

  if (ctx.sink) {
    await ctx.sink.append(
      signalRecord(now, utcDay(now), {
        marketId: raw.marketId,
        direction: raw.direction,
        signal,
        stake,
      }),
    );
  }
  return { status: "placed", bet, position };
}

/**
 * Settles one resolution. The settlement is persisted before it is applied;
 * redelivered and unknown markets are skipped without a record.
 */
export async function settleResolution(
  resolution: Resolution,
  simulator: ExecutionSimulator,
  sink: PersistenceSink | undefined,
): Promise<ResolveOutcome | null> {
  const preview = simulator.previewResolution(resolution);
  if (!preview) return simulator.resolve(resolution);

  if (sink) await sink.append(resolutionRecord(resolution, utcDay(resolution.resolvedAt), preview));
  const outcome = simulator.resolve(resolution);

  if (outcome) {
    log.info("Position resolved", {
      marketId: resolution.marketId,
      outcome: resolution.outcome,
      payout: Number(outcome.payout.toFixed(2)),
      pnl: Number(outcome.pnl.toFixed(2)),
    });
  }
  return outcome;
}

/** Resolutions implied by resolved quotes, merged with explicit events. */
export function collectResolutions(quotes: readonly MarketQuote[], events: readonly Resolution[], now: Date): Resolution[] {
  const byMarket = new Map<string, Resolution>();
  for (const q of quotes) {
    if (q.resolved && q.outcome) byMarket.set(q.marketId, { marketId: q.marketId, outcome: q.outcome, resolvedAt: now });
  }
  for (const r of events) byMarket.set(r.marketId, r);
  return [...byMarket.values()];
}
