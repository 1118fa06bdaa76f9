import { Hono } from "hono";
import { cors } from "hono/cors";
import { errorMessage } from "../errors.js";
import type { TickReport } from "../agent/loop.js";
import type { AgentStatus, EquitySample, PerformanceMetrics, Position } from "../types.js";

/** The parts of the agent the HTTP API drives. */
export interface AgentControl {
  getStatus(): AgentStatus;
  metrics(): PerformanceMetrics;
  getEquityCurve(): EquitySample[];
  getSimulator(): { openPositions(): Position[]; resolvedPositions(): Position[] };
  runTick(): Promise<TickReport>;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createServer(agent: AgentControl, opts: { apiKey?: string } = {}): Hono {
  const app = new Hono();

  // CORS for dev
  app.use("*", cors());

  // Auth middleware for all routes
  app.use("*", async (c, next) => {
    if (opts.apiKey) {
      const auth = c.req.header("Authorization");
      if (auth !== `Bearer ${opts.apiKey}`) {
        return c.json({ error: "unauthorized" }, 401);
      }
    }
    await next();
  });

  app.get("/api/status", (c) => {
    return c.json(agent.getStatus());
  });

  app.get("/api/positions", (c) => {
    const simulator = agent.getSimulator();
    const status = c.req.query("status") ?? "open";
    if (status === "open") return c.json(simulator.openPositions());
    if (status === "resolved") return c.json(simulator.resolvedPositions());
    return c.json({ error: `unknown status: ${status}` }, 400);
  });

  app.get("/api/performance", (c) => {
    return c.json({ metrics: agent.metrics(), equity: agent.getEquityCurve() });
  });

  app.post("/api/tick", async (c) => {
    const report = await agent.runTick();
    return c.json(report);
  });

  app.post("/api/agent/start", async (c) => {
    try {
      await agent.start();
      return c.json({ ok: true });
    } catch (err) {
      return c.json({ error: errorMessage(err) }, 500);
    }
  });

  app.post("/api/agent/stop", async (c) => {
    await agent.stop();
    return c.json({ ok: true });
  });

  return app;
}
