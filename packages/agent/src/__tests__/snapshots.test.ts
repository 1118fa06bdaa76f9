import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SnapshotStore } from "../tracking/snapshots.js";
import type { Article, MarketQuote } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FETCHED_AT = new Date("2024-05-01T09:30:00.000Z");
const PERIOD_START = new Date("2024-05-01T00:00:00.000Z");

const market: MarketQuote = {
  marketId: "m1",
  question: "Will the strike end this week?",
  yesPrice: 0.3,
  noPrice: 0.7,
  volume24h: 420,
  resolved: false,
  outcome: null,
  fetchedAt: FETCHED_AT,
};

function createArticle(headline: string, publishedAt: string): Article {
  return {
    headline,
    summary: "details",
    source: "wire",
    url: `https://news.test/${headline.toLowerCase().replace(/\s+/g, "-")}`,
    publishedAt: new Date(publishedAt),
  };
}

let dir: string;
let store: SnapshotStore;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "snapshots-test-"));
  store = new SnapshotStore(dir);
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("SnapshotStore", () => {
  it("writes the market snapshot once per day", async () => {
    expect(await store.recordMarkets([market], FETCHED_AT)).toBe(true);
    expect(await store.recordMarkets([{ ...market, yesPrice: 0.9 }], new Date("2024-05-01T20:00:00.000Z"))).toBe(false);

    const raw: unknown = JSON.parse(await readFile(join(dir, "markets", "2024-05-01.json"), "utf8"));
    expect(raw).toEqual([{ ...market, fetchedAt: "2024-05-01T09:30:00.000Z" }]);
  });

  it("stamps loaded quotes with the period start", async () => {
    await store.recordMarkets([market], FETCHED_AT);
    expect(await store.loadMarkets("2024-05-01", PERIOD_START)).toEqual([{ ...market, fetchedAt: PERIOD_START }]);
  });

  it("appends news by publication day without duplicates", async () => {
    const a = createArticle("Union talks resume", "2024-05-01T08:00:00.000Z");
    const b = createArticle("Deal reached", "2024-05-01T18:00:00.000Z");
    const c = createArticle("Trains back on time", "2024-05-02T07:00:00.000Z");

    expect(await store.recordNews([b, a])).toBe(2);
    expect(await store.recordNews([a, c])).toBe(1);

    const period = await store.loadPeriod("2024-05-01", PERIOD_START);
    expect(period.articles.map((x) => x.headline)).toEqual(["Union talks resume", "Deal reached"]);
    expect(period.articles[0].publishedAt).toEqual(a.publishedAt);
    expect((await store.loadNews("2024-05-02")).map((x) => x.headline)).toEqual(["Trains back on time"]);
  });

  it("keeps one resolution per market and day", async () => {
    const resolvedAt = new Date("2024-05-03T12:00:00.000Z");
    expect(await store.recordResolutions([{ marketId: "m1", outcome: "YES", resolvedAt }])).toBe(1);
    expect(await store.recordResolutions([{ marketId: "m1", outcome: "YES", resolvedAt }])).toBe(0);
    expect(await store.loadResolutions("2024-05-03")).toEqual([{ marketId: "m1", outcome: "YES", resolvedAt }]);
  });

  it("returns an empty period for days without data", async () => {
    expect(await store.loadPeriod("2023-01-01", PERIOD_START)).toEqual({
      day: "2023-01-01",
      articles: [],
      markets: [],
      resolutions: [],
    });
  });
});
