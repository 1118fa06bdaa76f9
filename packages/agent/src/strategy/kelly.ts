/**
 * Fractional Kelly sizing for binary contracts.
 *
 * kelly = (p * b - q) / b
 * where b = 1/price - 1 (net decimal odds), q = 1 - p
 * fraction = max(0, kelly) * kellyFraction
 */
export function kellyFraction(estimatedProb: number, b: number, fraction = 0.5): number {
  if (!(b > 0) || !(fraction > 0)) return 0;
  const raw = (estimatedProb * b - (1 - estimatedProb)) / b;
  return Math.max(0, raw) * fraction;
}

export function oddsFromPrice(price: number): number {
  if (!(price > 0)) return 0;
  return 1 / price - 1;
}

export interface SizingInput {
  estimatedProb: number;
  effectivePrice: number;
  edge: number;
  bankroll: number;
  kellyFraction: number;
  maxBetPct: number;
}

export interface Sizing {
  stakeAmount: number;
  /** Bankroll fraction staked after the kelly multiplier and the cap. */
  stakeFraction: number;
}

export function sizeStake(input: SizingInput): Sizing {
  if (input.edge <= 0 || input.bankroll <= 0 || input.maxBetPct <= 0) {
    return { stakeAmount: 0, stakeFraction: 0 };
  }
  const b = oddsFromPrice(input.effectivePrice);
  const fraction = Math.min(kellyFraction(input.estimatedProb, b, input.kellyFraction), input.maxBetPct);
  if (fraction <= 0) return { stakeAmount: 0, stakeFraction: 0 };
  return { stakeAmount: fraction * input.bankroll, stakeFraction: fraction };
}
