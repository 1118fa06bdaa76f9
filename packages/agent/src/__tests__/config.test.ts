import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";
import { ConfigError } from "../errors.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({});
    expect(config.mode).toBe("paper");
    expect(config.bankroll).toBe(500);
    expect(config.maxBetPct).toBe(0.05);
    expect(config.kellyFraction).toBe(0.5);
    expect(config.minEdge).toBe(0.05);
    expect(config.minConfidence).toBe(6);
    expect(config.maxConcurrentPositions).toBe(10);
    expect(config.tickIntervalMs).toBe(60_000);
    expect(config.newsCategories).toEqual([]);
    expect(config.newsFeedUrls).toEqual([]);
    expect(config.dataDir).toBe("data");
    expect(config.apiKey).toBeUndefined();
  });

  it("reads overrides", () => {
    const config = loadConfig({
      TRADING_MODE: "Backtest",
      BANKROLL: "2500",
      TAKER_FEE_RATE: "0.02",
      MAX_CONCURRENT_POSITIONS: "3.7",
      NEWS_FEED_URLS: " https://feeds.test/a.json, ,https://feeds.test/b.json ",
      API_KEY: "test-secret",
    });
    expect(config.mode).toBe("backtest");
    expect(config.bankroll).toBe(2500);
    expect(config.takerFeeRate).toBe(0.02);
    expect(config.maxConcurrentPositions).toBe(3);
    expect(config.newsFeedUrls).toEqual(["https://feeds.test/a.json", "https://feeds.test/b.json"]);
    expect(config.apiKey).toBe("test-secret");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ BANKROLL: "  " }).bankroll).toBe(500);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ BANKROLL: "lots" })).toThrow(ConfigError);
    expect(() => loadConfig({ BANKROLL: "-1" })).toThrow(ConfigError);
    expect(() => loadConfig({ MAX_BET_PCT: "1.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ TRADING_MODE: "yolo" })).toThrow(ConfigError);
    expect(() => loadConfig({ MIN_CONFIDENCE: "12" })).toThrow(ConfigError);
    expect(() => loadConfig({ FETCH_RETRIES: "-2" })).toThrow(ConfigError);
  });
});
