import type { PerformanceMetrics } from "../types.js";

export interface KillSwitchLimits {
  maxDrawdownKill: number;
  maxErrorRateKill: number;
  /** Number of most recent ticks the error rate is measured over. */
  errorWindow?: number;
  /** Ticks required in the window before the error rate counts. */
  minTicks?: number;
}

export interface KillDecision {
  suspendNewBets: boolean;
  reason: string | null;
}

/**
 * Policy evaluated after each tick. It never touches state itself: the loop
 * stops opening positions while it says so and keeps tracking open ones.
 */
export class KillSwitchPolicy {
  private limits: Required<KillSwitchLimits>;

  constructor(limits: KillSwitchLimits) {
    this.limits = { errorWindow: 20, minTicks: 5, ...limits };
  }

  get errorWindow(): number {
    return this.limits.errorWindow;
  }

  evaluate(metrics: Pick<PerformanceMetrics, "maxDrawdown">, recentTicks: boolean[]): KillDecision {
    if (this.limits.maxDrawdownKill > 0 && metrics.maxDrawdown >= this.limits.maxDrawdownKill) {
      return {
        suspendNewBets: true,
        reason: `max drawdown ${(metrics.maxDrawdown * 100).toFixed(1)}% >= ${(this.limits.maxDrawdownKill * 100).toFixed(1)}%`,
      };
    }

    const window = recentTicks.slice(-this.limits.errorWindow);
    if (this.limits.maxErrorRateKill > 0 && window.length >= this.limits.minTicks) {
      const failures = window.filter((ok) => !ok).length;
      const rate = failures / window.length;
      if (rate >= this.limits.maxErrorRateKill) {
        return {
          suspendNewBets: true,
          reason: `tick error rate ${(rate * 100).toFixed(0)}% over last ${window.length} ticks`,
        };
      }
    }

    return { suspendNewBets: false, reason: null };
  }
}
