import { describe, it, expect, vi, afterEach } from "vitest";
import { TransientIOError } from "../errors.js";
import { JsonFeed } from "../news/feed-source.js";
import { RssFeed, createFeeds, parseRssFeed, resolveCategories } from "../news/rss-feed.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Capitol Wire</title>
    <item>
      <title>Senate passes budget &amp; tax bill</title>
      <link>https://news.test/budget</link>
      <description><![CDATA[<p>The vote was 51-49</p>]]></description>
      <pubDate>Tue, 05 Mar 2024 14:00:00 GMT</pubDate>
    </item>
    <item>
      <title>No date here</title>
      <link>https://news.test/undated</link>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="text">Chain Daily</title>
  <entry>
    <title>Bitcoin ETF inflows hit record</title>
    <link rel="self" href="https://news.test/self/1"/>
    <link rel="alternate" href="https://news.test/etf"/>
    <updated>2024-03-06T09:30:00Z</updated>
    <summary>Funds took in more than expected</summary>
  </entry>
</feed>`;

afterEach(() => {
  vi.unstubAllGlobals();
});

// ---------------------------------------------------------------------------
// parseRssFeed
// ---------------------------------------------------------------------------

describe("parseRssFeed", () => {
  it("reads RSS items and skips undated ones", () => {
    expect(parseRssFeed(RSS, "https://feeds.test/capitol", "politics")).toEqual([
      {
        headline: "Senate passes budget & tax bill",
        summary: "The vote was 51-49",
        source: "Capitol Wire",
        url: "https://news.test/budget",
        publishedAt: new Date("2024-03-05T14:00:00.000Z"),
        category: "politics",
      },
    ]);
  });

  it("reads Atom entries using the alternate link", () => {
    const [article] = parseRssFeed(ATOM, "https://feeds.test/chain");
    expect(article.headline).toBe("Bitcoin ETF inflows hit record");
    expect(article.url).toBe("https://news.test/etf");
    expect(article.source).toBe("Chain Daily");
    expect(article.summary).toBe("Funds took in more than expected");
    expect(article.publishedAt).toEqual(new Date("2024-03-06T09:30:00.000Z"));
    expect(article.category).toBeUndefined();
  });

  it("rejects documents that are not feeds", () => {
    expect(() => parseRssFeed("<html><body>hi</body></html>", "https://feeds.test/page")).toThrow(
      "https://feeds.test/page is not an RSS or Atom document",
    );
  });
});

// ---------------------------------------------------------------------------
// Feed selection
// ---------------------------------------------------------------------------

describe("resolveCategories", () => {
  it("accepts names and rss_ aliases", () => {
    expect(resolveCategories(["RSS_Crypto", "weather", "crypto"])).toEqual(["crypto"]);
  });

  it("falls back to every category", () => {
    expect(resolveCategories([])).toEqual(["politics", "crypto"]);
    expect(resolveCategories(["weather"])).toEqual(["politics", "crypto"]);
  });
});

describe("createFeeds", () => {
  it("lists built-in feeds for the categories, then extra urls by format", () => {
    const feeds = createFeeds(["politics"], ["https://feeds.test/x.json", "https://feeds.test/y.xml"]);
    expect(feeds.map((f) => f.name)).toEqual([
      "https://feeds.npr.org/1001/rss.xml",
      "https://rss.politico.com/politics-news.xml",
      "https://feeds.test/x.json",
      "https://feeds.test/y.xml",
    ]);
    expect(feeds.map((f) => f instanceof JsonFeed)).toEqual([false, false, true, false]);
    expect(feeds[3]).toBeInstanceOf(RssFeed);
  });
});

// ---------------------------------------------------------------------------
// RssFeed
// ---------------------------------------------------------------------------

describe("RssFeed", () => {
  it("fetches and parses the feed", async () => {
    const fetchMock = vi.fn(async () => ({ ok: true, status: 200, text: async () => RSS }));
    vi.stubGlobal("fetch", fetchMock);

    const articles = await new RssFeed("https://feeds.test/capitol", "politics").fetchArticles();
    expect(articles.map((a) => a.headline)).toEqual(["Senate passes budget & tax bill"]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("treats an error status as transient", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => ({ ok: false, status: 503, text: async () => "" })));
    await expect(new RssFeed("https://feeds.test/capitol").fetchArticles()).rejects.toThrow(TransientIOError);
  });
});
