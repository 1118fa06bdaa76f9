import { describe, it, expect, vi } from "vitest";
import { WatermarkNewsSource, parseJsonFeed, type NewsFeed } from "../news/feed-source.js";
import type { Article } from "../types.js";

vi.mock("../logger.js", () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createArticle(headline: string, publishedAt: string): Article {
  return {
    headline,
    summary: "",
    source: "wire",
    url: `https://news.test/${encodeURIComponent(headline)}`,
    publishedAt: new Date(publishedAt),
  };
}

function staticFeed(name: string, batches: Article[][]): NewsFeed {
  let call = 0;
  return {
    name,
    fetchArticles: async () => batches[Math.min(call++, batches.length - 1)],
  };
}

// ---------------------------------------------------------------------------
// parseJsonFeed
// ---------------------------------------------------------------------------

describe("parseJsonFeed", () => {
  it("maps items and skips incomplete ones", () => {
    const articles = parseJsonFeed(
      {
        title: "Wire",
        items: [
          {
            id: 1,
            url: "https://news.test/a",
            title: " Court blocks merger ",
            summary: "Ruling expected to stand",
            date_published: "2024-05-01T10:00:00Z",
            tags: ["business"],
          },
          { id: 2, url: "https://news.test/b", date_published: "2024-05-01T10:00:00Z" },
          { id: 3, url: "https://news.test/c", title: "Bad date", date_published: "yesterday" },
        ],
      },
      "https://feeds.test/wire.json",
    );

    expect(articles).toEqual([
      {
        headline: "Court blocks merger",
        summary: "Ruling expected to stand",
        source: "Wire",
        url: "https://news.test/a",
        publishedAt: new Date("2024-05-01T10:00:00Z"),
        category: "business",
      },
    ]);
  });

  it("throws on a body that is not a feed", () => {
    expect(() => parseJsonFeed({ entries: [] }, "x")).toThrow();
  });
});

// ---------------------------------------------------------------------------
// WatermarkNewsSource
// ---------------------------------------------------------------------------

describe("WatermarkNewsSource", () => {
  it("hands out each article once, oldest first", async () => {
    const early = createArticle("Early", "2024-05-01T09:00:00Z");
    const late = createArticle("Late", "2024-05-01T11:00:00Z");
    const later = createArticle("Later", "2024-05-01T12:00:00Z");
    const source = new WatermarkNewsSource([staticFeed("wire", [[late, early], [late, early, later]])]);

    expect((await source.fetchNewArticles()).map((a) => a.headline)).toEqual(["Early", "Late"]);
    expect((await source.fetchNewArticles()).map((a) => a.headline)).toEqual(["Later"]);
    expect(await source.fetchNewArticles()).toEqual([]);
    expect(source.getWatermark()).toEqual(new Date("2024-05-01T12:00:00Z"));
  });

  it("ignores articles at or before the starting watermark", async () => {
    const source = new WatermarkNewsSource(
      [staticFeed("wire", [[createArticle("Old", "2024-05-01T09:00:00Z"), createArticle("New", "2024-05-01T10:00:00Z")]])],
      { since: new Date("2024-05-01T09:00:00Z") },
    );
    expect((await source.fetchNewArticles()).map((a) => a.headline)).toEqual(["New"]);
  });

  it("skips a failing feed and keeps the others", async () => {
    const broken: NewsFeed = {
      name: "broken",
      fetchArticles: async () => {
        throw new Error("ECONNRESET");
      },
    };
    const source = new WatermarkNewsSource(
      [broken, staticFeed("wire", [[createArticle("Still here", "2024-05-01T09:00:00Z")]])],
      { retry: { retries: 0 } },
    );
    expect((await source.fetchNewArticles()).map((a) => a.headline)).toEqual(["Still here"]);
  });

  it("de-duplicates the same story across feeds", async () => {
    const story = createArticle("Shared", "2024-05-01T09:00:00Z");
    const source = new WatermarkNewsSource([staticFeed("a", [[story]]), staticFeed("b", [[{ ...story }]])]);
    expect(await source.fetchNewArticles()).toHaveLength(1);
  });
});
