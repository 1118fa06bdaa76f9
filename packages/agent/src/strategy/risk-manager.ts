import type { TradingLimits } from "../config.js";
import type { Position, RiskState, Signal } from "../types.js";

export type RiskReason =
  | "PASSED"
  | "MIN_EDGE"
  | "MAX_POSITIONS"
  | "DAILY_LOSS"
  | "LIQUIDITY"
  | "MARKET_EXPOSURE";

export interface RiskDecision {
  accepted: boolean;
  reason: RiskReason;
  detail: string;
}

export interface RiskCheckInput {
  signal: Signal;
  stake: number;
  risk: RiskState;
  volume24h: number;
  /** Open position in the signal's market, if any. */
  existing?: Position;
}

type RiskLimits = Pick<
  TradingLimits,
  "minEdge" | "maxConcurrentPositions" | "maxDailyLossPct" | "maxVolumePct" | "maxBetPct"
>;

const PASS: RiskDecision = { accepted: true, reason: "PASSED", detail: "passed" };

function reject(reason: RiskReason, detail: string): RiskDecision {
  return { accepted: false, reason, detail };
}

export class RiskManager {
  private limits: RiskLimits;

  constructor(limits: RiskLimits) {
    this.limits = limits;
  }

  checkEdge(edge: number): RiskDecision {
    if (edge < this.limits.minEdge) {
      return reject("MIN_EDGE", `edge ${edge.toFixed(3)} below min_edge ${this.limits.minEdge.toFixed(3)}`);
    }
    return PASS;
  }

  checkPositionLimit(openPositionCount: number, addsPosition: boolean): RiskDecision {
    if (addsPosition && openPositionCount >= this.limits.maxConcurrentPositions) {
      return reject("MAX_POSITIONS", `max positions reached (${this.limits.maxConcurrentPositions})`);
    }
    return PASS;
  }

  checkDailyLoss(dailyPnl: number, startOfDayBankroll: number): RiskDecision {
    if (startOfDayBankroll <= 0) {
      return reject("DAILY_LOSS", "start-of-day bankroll <= 0");
    }
    const limit = -this.limits.maxDailyLossPct * startOfDayBankroll;
    if (dailyPnl < limit) {
      return reject("DAILY_LOSS", `daily loss ${dailyPnl.toFixed(2)} exceeds limit ${limit.toFixed(2)}`);
    }
    return PASS;
  }

  checkLiquidity(stake: number, volume24h: number): RiskDecision {
    if (!(volume24h > 0)) {
      return reject("LIQUIDITY", "market volume unavailable");
    }
    if (stake > this.limits.maxVolumePct * volume24h) {
      return reject(
        "LIQUIDITY",
        `stake ${stake.toFixed(2)} exceeds ${(this.limits.maxVolumePct * 100).toFixed(0)}% of 24h volume`,
      );
    }
    return PASS;
  }

  checkMarketExposure(existingCost: number, stake: number, bankroll: number): RiskDecision {
    const cap = this.limits.maxBetPct * bankroll;
    if (existingCost + stake > cap) {
      return reject(
        "MARKET_EXPOSURE",
        `exposure ${(existingCost + stake).toFixed(2)} exceeds ${cap.toFixed(2)} for this market`,
      );
    }
    return PASS;
  }

  /** Runs every gate in order and stops at the first failure. */
  check(input: RiskCheckInput): RiskDecision {
    const existingOpen = input.existing?.status === "open" ? input.existing : undefined;
    const gates: Array<() => RiskDecision> = [
      () => this.checkEdge(input.signal.edge),
      () => this.checkPositionLimit(input.risk.openPositionCount, existingOpen === undefined),
      () => this.checkDailyLoss(input.risk.dailyPnl, input.risk.startOfDayBankroll),
      () => this.checkLiquidity(input.stake, input.volume24h),
      () => this.checkMarketExposure(existingOpen?.costBasis ?? 0, input.stake, input.risk.bankroll),
    ];
    for (const gate of gates) {
      const decision = gate();
      if (!decision.accepted) return decision;
    }
    return PASS;
  }
}
