import { join } from "node:path";
import { serve } from "@hono/node-server";
import { loadConfig, type Config } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { AgentLoop } from "./agent/loop.js";
import { createServer } from "./api/server.js";
import { OpenAISignalExtractor } from "./extraction/openai-extractor.js";
import { WatermarkNewsSource } from "./news/feed-source.js";
import { createFeeds } from "./news/rss-feed.js";
import { GammaProvider } from "./providers/gamma-provider.js";
import { KillSwitchPolicy } from "./strategy/kill-switch.js";
import { NewsSpeedStrategy } from "./strategy/news-speed.js";
import { FileLedger, type PersistenceSink } from "./tracking/ledger.js";
import { PostgresLedger } from "./tracking/postgres-ledger.js";
import { SnapshotStore } from "./tracking/snapshots.js";
import { StateStore } from "./tracking/state-store.js";

function createSink(config: Config): PersistenceSink {
  if (config.databaseUrl) return new PostgresLedger(config.databaseUrl);
  return new FileLedger(join(config.dataDir, "logs"));
}

function createAgent(config: Config): AgentLoop {
  if (config.mode !== "paper") {
    throw new ConfigError(`TRADING_MODE=${config.mode} is not supported by the agent; use paper, or the backtest script`);
  }
  if (!config.openaiApiKey) {
    throw new ConfigError("OPENAI_API_KEY is required");
  }

  const news = new WatermarkNewsSource(createFeeds(config.newsCategories, config.newsFeedUrls), {
    retry: { retries: config.fetchRetries, timeoutMs: config.fetchTimeoutMs },
  });
  // The loop owns retries for market calls
  const markets = new GammaProvider({
    apiBase: config.gammaApiBase,
    limit: config.marketFetchLimit,
    timeoutMs: config.fetchTimeoutMs,
    retries: 0,
  });
  const extractor = new OpenAISignalExtractor({
    apiKey: config.openaiApiKey,
    model: config.openaiModel,
    timeoutMs: config.fetchTimeoutMs * 2,
  });

  return new AgentLoop({
    mode: config.mode,
    limits: config,
    tickIntervalMs: config.tickIntervalMs,
    fetch: { timeoutMs: config.fetchTimeoutMs, retries: config.fetchRetries },
    news,
    markets,
    strategies: [new NewsSpeedStrategy(extractor, config.maxMarketsPerArticle)],
    sink: createSink(config),
    initialBankroll: config.bankroll,
    killSwitch: new KillSwitchPolicy({
      maxDrawdownKill: config.maxDrawdownKill,
      maxErrorRateKill: config.maxErrorRateKill,
    }),
    snapshots: new SnapshotStore(join(config.dataDir, "historical")),
    stateStore: new StateStore(join(config.dataDir, "state.json")),
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const agent = createAgent(config);
  await agent.start();

  const app = createServer(agent, { apiKey: config.apiKey });
  const server = serve({ fetch: app.fetch, port: config.port });
  log.info("API listening", { port: config.port });

  const shutdown = (signal: string) => {
    log.info("Shutting down", { signal });
    agent
      .stop()
      .then(() => new Promise<void>((resolve) => server.close(() => resolve())))
      .then(() => process.exit(0))
      .catch((err) => {
        log.error("Shutdown failed", { error: errorMessage(err) });
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  log.error("Fatal", { error: errorMessage(err) });
  process.exit(1);
});
