import { utcDay } from "../clock.js";
import type { BetResult, EquitySample, PerformanceMetrics } from "../types.js";

const TRADING_DAYS_PER_YEAR = 365;

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function winRate(results: readonly BetResult[]): number {
  if (results.length === 0) return 0;
  return results.filter((r) => r.pnl > 0).length / results.length;
}

export function avgEdge(results: readonly BetResult[]): number {
  if (results.length === 0) return 0;
  return mean(results.map((r) => r.edgeAtEntry));
}

export function dailyReturns(equity: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < equity.length; i++) {
    const prev = equity[i - 1];
    returns.push(prev > 0 ? (equity[i] - prev) / prev : 0);
  }
  return returns;
}

/** Annualized Sharpe of daily returns; 0 when undefined. */
export function sharpeRatio(returns: readonly number[]): number {
  if (returns.length < 2) return 0;
  const avg = mean([...returns]);
  const variance = returns.reduce((sum, r) => sum + (r - avg) ** 2, 0) / returns.length;
  const stdDev = Math.sqrt(variance);
  if (stdDev === 0 || !Number.isFinite(stdDev)) return 0;
  return (avg / stdDev) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * Capital after each settled bet, starting from `initial`. Open positions
 * count at cost, so staking alone never moves this curve.
 */
export function realizedEquityCurve(initial: number, results: readonly BetResult[]): number[] {
  const curve = [initial];
  let value = initial;
  for (const r of results) {
    value += r.pnl;
    curve.push(value);
  }
  return curve;
}

/** Largest peak-to-trough decline as a fraction of the peak. */
export function maxDrawdown(equity: readonly number[]): number {
  if (equity.length < 2) return 0;
  let peak = equity[0];
  let worst = 0;
  for (const value of equity) {
    if (value > peak) peak = value;
    if (peak <= 0) continue;
    const dd = (peak - value) / peak;
    if (dd > worst) worst = dd;
  }
  return worst;
}

export function summarize(
  results: readonly BetResult[],
  equity: readonly EquitySample[],
): PerformanceMetrics {
  const curve = equity.map((s) => s.bankroll);
  const wins = results.filter((r) => r.pnl > 0).length;
  return {
    totalPnl: results.reduce((sum, r) => sum + r.pnl, 0),
    numBets: results.length,
    wins,
    losses: results.length - wins,
    winRate: winRate(results),
    avgEdge: avgEdge(results),
    sharpeRatio: sharpeRatio(dailyReturns(curve)),
    maxDrawdown: maxDrawdown(curve),
  };
}

/** Metrics for bets resolved on one UTC day. Drawdown needs a curve, so it is 0 here. */
export function dailyMetrics(results: readonly BetResult[], day: string): PerformanceMetrics {
  const sameDay = results.filter((r) => utcDay(r.resolvedAt) === day);
  return { ...summarize(sameDay, []), maxDrawdown: 0 };
}
