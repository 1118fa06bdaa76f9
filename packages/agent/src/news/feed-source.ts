import { z } from "zod";
import { log } from "../logger.js";
import { withRetry, type RetryOptions } from "../retry.js";
import { TransientIOError, errorMessage } from "../errors.js";
import type { Article, NewsSource } from "../types.js";

export interface NewsFeed {
  readonly name: string;
  fetchArticles(): Promise<Article[]>;
}

// JSON Feed 1.1 (https://jsonfeed.org/version/1.1), items only
const jsonFeedSchema = z.object({
  title: z.string().optional(),
  items: z.array(
    z.object({
      id: z.union([z.string(), z.number()]).optional(),
      url: z.string().optional(),
      title: z.string().optional(),
      summary: z.string().optional(),
      content_text: z.string().optional(),
      date_published: z.string().optional(),
      tags: z.array(z.string()).optional(),
    }),
  ),
});

export function parseJsonFeed(body: unknown, fallbackSource: string, category?: string): Article[] {
  const feed = jsonFeedSchema.parse(body);
  const source = feed.title ?? fallbackSource;
  const articles: Article[] = [];
  for (const item of feed.items) {
    const headline = item.title?.trim() ?? "";
    const url = item.url?.trim() ?? "";
    const publishedAt = item.date_published ? new Date(item.date_published) : null;
    if (!headline || !url || !publishedAt || Number.isNaN(publishedAt.getTime())) continue;
    articles.push({
      headline,
      summary: (item.summary ?? item.content_text ?? "").trim(),
      source,
      url,
      publishedAt,
      category: category ?? item.tags?.[0],
    });
  }
  return articles;
}

export class JsonFeed implements NewsFeed {
  readonly name: string;
  private url: string;
  private category?: string;

  constructor(url: string, category?: string) {
    this.url = url;
    this.name = url;
    this.category = category;
  }

  async fetchArticles(): Promise<Article[]> {
    const res = await fetch(this.url, { headers: { Accept: "application/feed+json, application/json" } });
    if (!res.ok) {
      throw new TransientIOError(`Feed ${this.url} returned ${res.status}`);
    }
    return parseJsonFeed(await res.json(), this.url, this.category);
  }
}

function articleKey(a: Article): string {
  return `${a.url}\u0000${a.headline}`;
}

/**
 * Merges several feeds and hands out each article once: only articles newer
 * than the watermark that have not been seen before are returned.
 */
export class WatermarkNewsSource implements NewsSource {
  private feeds: NewsFeed[];
  private retry: Omit<RetryOptions, "label">;
  private watermark: Date | null;
  private seen = new Set<string>();
  private maxSeen: number;

  constructor(
    feeds: NewsFeed[],
    opts: { retry?: Omit<RetryOptions, "label">; since?: Date; maxSeen?: number } = {},
  ) {
    this.feeds = feeds;
    this.retry = opts.retry ?? {};
    this.watermark = opts.since ?? null;
    this.maxSeen = opts.maxSeen ?? 10_000;
  }

  getWatermark(): Date | null {
    return this.watermark;
  }

  async fetchNewArticles(): Promise<Article[]> {
    const fresh: Article[] = [];

    for (const feed of this.feeds) {
      let articles: Article[];
      try {
        articles = await withRetry(() => feed.fetchArticles(), { ...this.retry, label: `news ${feed.name}` });
      } catch (err) {
        log.warn("Failed to fetch news feed", { feed: feed.name, error: errorMessage(err) });
        continue;
      }

      for (const article of articles) {
        if (this.watermark && article.publishedAt <= this.watermark) continue;
        const key = articleKey(article);
        if (this.seen.has(key)) continue;
        this.seen.add(key);
        fresh.push(article);
      }
    }

    if (this.seen.size > this.maxSeen) {
      // Sets iterate in insertion order; drop the oldest keys
      const excess = this.seen.size - this.maxSeen;
      let i = 0;
      for (const key of this.seen) {
        if (i++ >= excess) break;
        this.seen.delete(key);
      }
    }

    fresh.sort((a, b) => a.publishedAt.getTime() - b.publishedAt.getTime());
    if (fresh.length > 0) {
      const newest = fresh[fresh.length - 1].publishedAt;
      if (!this.watermark || newest > this.watermark) this.watermark = newest;
    }
    return fresh;
  }
}
