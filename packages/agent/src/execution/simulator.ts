import { utcDay } from "../clock.js";
import { InsufficientBankrollError, StateConflictError } from "../errors.js";
import { log } from "../logger.js";
import type { Bet, BetResult, Position, Resolution, RiskState } from "../types.js";

export interface BetPreview {
  bet: Bet;
  /** Position as it will look after the bet is committed. */
  position: Position;
  bankrollAfter: number;
  opensPosition: boolean;
  /** State version the preview was computed against. */
  version: number;
}

export interface ResolveOutcome {
  position: Position;
  payout: number;
  pnl: number;
  results: BetResult[];
}

export interface SimulatorSnapshot {
  bankroll: number;
  positions: Position[];
  bets: Bet[];
  results: BetResult[];
  day: string | null;
  startOfDayBankroll: number;
  dailyPnl: number;
}

const EPSILON = 1e-9;

function clonePosition(p: Position): Position {
  return { ...p, betIds: [...p.betIds] };
}

/**
 * Paper/backtest venue. Sole owner of the bankroll and of every Position;
 * everything else reads copies.
 *
 * Per market: NoPosition -> Open -> Resolved (terminal).
 */
export class ExecutionSimulator {
  private bankroll: number;
  private positions = new Map<string, Position>();
  private bets: Bet[] = [];
  private betsById = new Map<string, Bet>();
  private results: BetResult[] = [];
  private day: string | null = null;
  private startOfDayBankroll: number;
  private dailyPnl = 0;
  private version = 0;

  constructor(initialBankroll: number) {
    this.bankroll = initialBankroll;
    this.startOfDayBankroll = initialBankroll;
  }

  static restore(snapshot: SimulatorSnapshot): ExecutionSimulator {
    const sim = new ExecutionSimulator(snapshot.bankroll);
    for (const p of snapshot.positions) sim.positions.set(p.marketId, clonePosition(p));
    for (const b of snapshot.bets) {
      sim.bets.push(b);
      sim.betsById.set(b.id, b);
    }
    sim.results = [...snapshot.results];
    sim.day = snapshot.day;
    sim.startOfDayBankroll = snapshot.startOfDayBankroll;
    sim.dailyPnl = snapshot.dailyPnl;
    return sim;
  }

  snapshot(): SimulatorSnapshot {
    return {
      bankroll: this.bankroll,
      positions: [...this.positions.values()].map(clonePosition),
      bets: [...this.bets],
      results: [...this.results],
      day: this.day,
      startOfDayBankroll: this.startOfDayBankroll,
      dailyPnl: this.dailyPnl,
    };
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  getBankroll(): number {
    return this.bankroll;
  }

  getPosition(marketId: string): Position | undefined {
    const p = this.positions.get(marketId);
    return p ? clonePosition(p) : undefined;
  }

  openPositions(): Position[] {
    return [...this.positions.values()].filter((p) => p.status === "open").map(clonePosition);
  }

  resolvedPositions(): Position[] {
    return [...this.positions.values()].filter((p) => p.status === "resolved").map(clonePosition);
  }

  getBets(): readonly Bet[] {
    return this.bets;
  }

  getResults(): readonly BetResult[] {
    return this.results;
  }

  riskState(): RiskState {
    return {
      date: this.day ?? "",
      dailyPnl: this.dailyPnl,
      startOfDayBankroll: this.startOfDayBankroll,
      openPositionCount: this.openPositions().length,
      bankroll: this.bankroll,
    };
  }

  /** Rolls the daily risk figures over when `now` falls on a new UTC day. */
  beginDay(now: Date): void {
    const day = utcDay(now);
    if (this.day === day) return;
    this.day = day;
    this.startOfDayBankroll = this.bankroll;
    this.dailyPnl = 0;
  }

  // ---------------------------------------------------------------------------
  // Placement
  // ---------------------------------------------------------------------------

  /** Computes the effect of a bet without applying it. */
  previewBet(bet: Bet): BetPreview {
    if (!(bet.stakeAmount > 0)) {
      throw new StateConflictError(`Bet ${bet.id} has non-positive stake ${bet.stakeAmount}`);
    }
    if (!(bet.executionPrice > 0) || bet.executionPrice > 1) {
      throw new StateConflictError(`Bet ${bet.id} has invalid execution price ${bet.executionPrice}`);
    }
    if (this.betsById.has(bet.id)) {
      throw new StateConflictError(`Bet ${bet.id} was already placed`);
    }
    if (bet.stakeAmount > this.bankroll + EPSILON) {
      throw new InsufficientBankrollError(bet.stakeAmount, this.bankroll);
    }

    const marketId = bet.signal.marketId;
    const shares = bet.stakeAmount / bet.executionPrice;
    const existing = this.positions.get(marketId);

    let position: Position;
    if (!existing) {
      position = {
        marketId,
        direction: bet.signal.direction,
        shares,
        avgPrice: bet.executionPrice,
        costBasis: bet.stakeAmount,
        status: "open",
        openedAt: bet.placedAt,
        betIds: [bet.id],
      };
    } else if (existing.status === "resolved") {
      throw new StateConflictError(`Market ${marketId} is already resolved`);
    } else if (existing.direction !== bet.signal.direction) {
      throw new StateConflictError(
        `Market ${marketId} holds ${existing.direction}; refusing ${bet.signal.direction}`,
      );
    } else {
      const totalShares = existing.shares + shares;
      position = {
        ...clonePosition(existing),
        shares: totalShares,
        avgPrice: (existing.shares * existing.avgPrice + shares * bet.executionPrice) / totalShares,
        costBasis: existing.costBasis + bet.stakeAmount,
        betIds: [...existing.betIds, bet.id],
      };
    }

    return {
      bet,
      position,
      bankrollAfter: Math.max(0, this.bankroll - bet.stakeAmount),
      opensPosition: !existing,
      version: this.version,
    };
  }

  /** Applies a preview: debit and position change happen together. */
  commit(preview: BetPreview): Position {
    if (preview.version !== this.version) {
      throw new StateConflictError(`Preview for bet ${preview.bet.id} is out of date`);
    }
    this.bankroll = preview.bankrollAfter;
    this.positions.set(preview.position.marketId, preview.position);
    this.bets.push(preview.bet);
    this.betsById.set(preview.bet.id, preview.bet);
    this.version++;
    return clonePosition(preview.position);
  }

  placeBet(bet: Bet): Position {
    return this.commit(this.previewBet(bet));
  }

  // ---------------------------------------------------------------------------
  // Resolution
  // ---------------------------------------------------------------------------

  /**
   * Computes the settlement of a resolution without applying it. Returns null
   * for unknown markets and for markets that are already resolved.
   */
  previewResolution(resolution: Resolution): ResolveOutcome | null {
    const position = this.positions.get(resolution.marketId);
    if (!position || position.status === "resolved") return null;

    const won = position.direction === resolution.outcome;
    const payout = won ? position.shares : 0;
    const pnl = payout - position.costBasis;

    const results: BetResult[] = [];
    for (const betId of position.betIds) {
      const bet = this.betsById.get(betId);
      if (!bet) continue;
      results.push({
        betId,
        marketId: position.marketId,
        direction: position.direction,
        stake: bet.stakeAmount,
        shares: bet.shares,
        executionPrice: bet.executionPrice,
        outcome: resolution.outcome,
        won,
        pnl: won ? bet.shares - bet.stakeAmount : -bet.stakeAmount,
        edgeAtEntry: bet.signal.edge,
        resolvedAt: resolution.resolvedAt,
      });
    }

    return {
      position: {
        ...clonePosition(position),
        status: "resolved",
        outcome: resolution.outcome,
        payout,
        realizedPnl: pnl,
        resolvedAt: resolution.resolvedAt,
      },
      payout,
      pnl,
      results,
    };
  }

  /**
   * Settles the open position in the resolved market: the winning side is
   * credited $1 per share, the losing side forfeits its cost basis.
   * Unknown markets and redelivered resolutions are no-ops and return null.
   */
  resolve(resolution: Resolution): ResolveOutcome | null {
    const settlement = this.previewResolution(resolution);
    if (!settlement) {
      log.debug("Resolution ignored", {
        marketId: resolution.marketId,
        known: this.positions.has(resolution.marketId),
      });
      return null;
    }

    this.bankroll += settlement.payout;
    this.dailyPnl += settlement.pnl;
    this.positions.set(resolution.marketId, settlement.position);
    this.results.push(...settlement.results);
    this.version++;

    return { ...settlement, position: clonePosition(settlement.position) };
  }
}
