import { describe, it, expect, vi } from "vitest";
import { createServer, type AgentControl } from "../api/server.js";
import type { TickReport } from "../agent/loop.js";
import type { AgentStatus, Position } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const AUTH = { Authorization: "Bearer test-secret" };

const status: AgentStatus = {
  state: "sleeping",
  running: true,
  suspended: false,
  suspendReason: null,
  mode: "paper",
  bankroll: 950,
  openPositions: [],
  todayPnl: 0,
  lastTickAt: "2024-03-01T12:00:00.000Z",
  lastError: null,
  ticksCompleted: 3,
  ticksFailed: 0,
  ticksSkipped: 0,
};

const open: Position = {
  marketId: "m1",
  direction: "YES",
  shares: 100,
  avgPrice: 0.5,
  costBasis: 50,
  status: "open",
  openedAt: new Date("2024-03-01T12:00:00.000Z"),
  betIds: ["paper-1"],
};

const report: TickReport = {
  startedAt: new Date("2024-03-01T12:01:00.000Z"),
  ok: true,
  articles: 2,
  signals: 1,
  placed: 0,
  rejected: 1,
  resolved: 0,
  error: null,
};

function createAgent(overrides?: Partial<AgentControl>): AgentControl {
  return {
    getStatus: () => status,
    metrics: () => ({
      totalPnl: 0,
      numBets: 0,
      wins: 0,
      losses: 0,
      winRate: 0,
      avgEdge: 0,
      sharpeRatio: 0,
      maxDrawdown: 0,
    }),
    getEquityCurve: () => [{ date: "2024-03-01", bankroll: 950 }],
    getSimulator: () => ({ openPositions: () => [open], resolvedPositions: () => [] }),
    runTick: vi.fn(async () => report),
    start: vi.fn(async () => {}),
    stop: vi.fn(async () => {}),
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("createServer", () => {
  it("rejects requests without the bearer token", async () => {
    const app = createServer(createAgent(), { apiKey: "test-secret" });
    const res = await app.request("/api/status");
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "unauthorized" });
  });

  it("serves the agent status", async () => {
    const app = createServer(createAgent(), { apiKey: "test-secret" });
    const res = await app.request("/api/status", { headers: AUTH });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(status);
  });

  it("runs a tick on demand", async () => {
    const agent = createAgent();
    const app = createServer(agent, { apiKey: "test-secret" });
    const res = await app.request("/api/tick", { method: "POST", headers: AUTH });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ...report, startedAt: "2024-03-01T12:01:00.000Z" });
    expect(agent.runTick).toHaveBeenCalledTimes(1);
  });

  it("lists open positions by default", async () => {
    const app = createServer(createAgent());
    const res = await app.request("/api/positions");
    expect(await res.json()).toEqual([{ ...open, openedAt: "2024-03-01T12:00:00.000Z" }]);
  });

  it("rejects an unknown position filter", async () => {
    const app = createServer(createAgent());
    const res = await app.request("/api/positions?status=bogus");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "unknown status: bogus" });
  });

  it("reports a failed start as a server error", async () => {
    const agent = createAgent({
      start: async () => {
        throw new Error("sink unavailable");
      },
    });
    const app = createServer(agent);
    const res = await app.request("/api/agent/start", { method: "POST" });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "sink unavailable" });
  });
});
