import { describe, it, expect } from "vitest";
import { KillSwitchPolicy } from "../strategy/kill-switch.js";

describe("KillSwitchPolicy", () => {
  const policy = new KillSwitchPolicy({ maxDrawdownKill: 0.3, maxErrorRateKill: 0.5 });

  it("trips on drawdown", () => {
    expect(policy.evaluate({ maxDrawdown: 0.35 }, [])).toEqual({
      suspendNewBets: true,
      reason: "max drawdown 35.0% >= 30.0%",
    });
  });

  it("trips on the tick error rate once enough ticks ran", () => {
    expect(policy.evaluate({ maxDrawdown: 0 }, [true, false, false, true, false])).toEqual({
      suspendNewBets: true,
      reason: "tick error rate 60% over last 5 ticks",
    });
    expect(policy.evaluate({ maxDrawdown: 0 }, [false, false])).toEqual({ suspendNewBets: false, reason: null });
  });

  it("only looks at the most recent window", () => {
    const small = new KillSwitchPolicy({ maxDrawdownKill: 0.3, maxErrorRateKill: 0.5, errorWindow: 4, minTicks: 4 });
    expect(small.evaluate({ maxDrawdown: 0 }, [false, false, false, true, true, true, false])).toEqual({
      suspendNewBets: false,
      reason: null,
    });
  });

  it("is disabled by zero limits", () => {
    const off = new KillSwitchPolicy({ maxDrawdownKill: 0, maxErrorRateKill: 0 });
    expect(off.evaluate({ maxDrawdown: 0.9 }, [false, false, false, false, false]).suspendNewBets).toBe(false);
  });
});
