import "dotenv/config";
import { ConfigError } from "./errors.js";
import type { TradingMode } from "./types.js";

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`Invalid number for ${name}: ${raw}`);
  }
  return value;
}

function readFraction(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (value < 0 || value > 1) {
    throw new ConfigError(`${name} must be within [0, 1], got ${value}`);
  }
  return value;
}

function readPositive(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (value <= 0) {
    throw new ConfigError(`${name} must be positive, got ${value}`);
  }
  return value;
}

function readMode(env: Env): TradingMode {
  const raw = (env.TRADING_MODE ?? "paper").trim().toLowerCase();
  if (raw === "paper" || raw === "live" || raw === "backtest") return raw;
  throw new ConfigError(`Invalid TRADING_MODE: ${raw}`);
}

function readList(env: Env, name: string): string[] {
  return (env[name] ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env) {
  const config = {
    mode: readMode(env),
    bankroll: readPositive(env, "BANKROLL", 500),

    // Sizing and risk limits
    maxBetPct: readFraction(env, "MAX_BET_PCT", 0.05),
    maxDailyLossPct: readFraction(env, "MAX_DAILY_LOSS_PCT", 0.1),
    minEdge: readNumber(env, "MIN_EDGE", 0.05),
    minConfidence: readNumber(env, "MIN_CONFIDENCE", 6),
    kellyFraction: readFraction(env, "KELLY_FRACTION", 0.5),
    maxConcurrentPositions: Math.floor(readPositive(env, "MAX_CONCURRENT_POSITIONS", 10)),
    maxVolumePct: readFraction(env, "MAX_VOLUME_PCT", 0.1),

    // Fee model
    takerFeeRate: readFraction(env, "TAKER_FEE_RATE", 0),
    slippageImpact: readNumber(env, "SLIPPAGE_IMPACT", 0),
    maxQuoteAgeMs: readPositive(env, "MAX_QUOTE_AGE_MS", 5 * 60_000),

    // Loop and external calls
    tickIntervalMs: readPositive(env, "TICK_INTERVAL_MS", 60_000),
    fetchTimeoutMs: readPositive(env, "FETCH_TIMEOUT_MS", 15_000),
    fetchRetries: Math.floor(readNumber(env, "FETCH_RETRIES", 3)),

    // Kill criteria
    maxDrawdownKill: readFraction(env, "MAX_DRAWDOWN_KILL", 0.3),
    maxErrorRateKill: readFraction(env, "MAX_ERROR_RATE_KILL", 0.5),

    // Collaborators
    gammaApiBase: env.GAMMA_API_BASE ?? "https://gamma-api.polymarket.com",
    marketFetchLimit: Math.floor(readPositive(env, "MARKET_FETCH_LIMIT", 200)),
    newsCategories: readList(env, "NEWS_CATEGORIES"),
    newsFeedUrls: readList(env, "NEWS_FEED_URLS"),
    openaiApiKey: env.OPENAI_API_KEY,
    openaiModel: env.OPENAI_MODEL ?? "gpt-4o",
    maxMarketsPerArticle: Math.floor(readPositive(env, "MAX_MARKETS_PER_ARTICLE", 5)),
    dataDir: env.DATA_DIR ?? "data",
    databaseUrl: env.DATABASE_URL,
    apiKey: env.API_KEY,
    port: Math.floor(readPositive(env, "PORT", 3001)),
  } as const;

  if (config.fetchRetries < 0) {
    throw new ConfigError(`FETCH_RETRIES must be >= 0, got ${config.fetchRetries}`);
  }
  if (config.slippageImpact < 0) {
    throw new ConfigError(`SLIPPAGE_IMPACT must be >= 0, got ${config.slippageImpact}`);
  }
  if (config.minConfidence < 1 || config.minConfidence > 10) {
    throw new ConfigError(`MIN_CONFIDENCE must be within [1, 10], got ${config.minConfidence}`);
  }

  return config;
}

export type Config = ReturnType<typeof loadConfig>;

/** Subset of the configuration the decision pipeline reads. */
export type TradingLimits = Pick<
  Config,
  | "maxBetPct"
  | "maxDailyLossPct"
  | "minEdge"
  | "minConfidence"
  | "kellyFraction"
  | "maxConcurrentPositions"
  | "maxVolumePct"
  | "takerFeeRate"
  | "slippageImpact"
  | "maxQuoteAgeMs"
>;
