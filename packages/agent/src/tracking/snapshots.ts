import { mkdir, readFile, writeFile, access } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { utcDay } from "../clock.js";
import { PersistenceUnavailableError, isNotFound, errorMessage } from "../errors.js";
import type { Article, MarketQuote, Resolution } from "../types.js";

// ---------------------------------------------------------------------------
// Historical data for backtests
// ---------------------------------------------------------------------------

/** Everything the engine saw during one UTC day. */
export interface HistoricalPeriod {
  day: string;
  articles: Article[];
  markets: MarketQuote[];
  resolutions: Resolution[];
}

export interface HistoricalSource {
  /** `start` is the period's decision time; quotes are stamped with it. */
  loadPeriod(day: string, start: Date): Promise<HistoricalPeriod>;
}

const direction = z.enum(["YES", "NO"]);

const articleSchema = z.object({
  headline: z.string(),
  summary: z.string().default(""),
  source: z.string().default(""),
  url: z.string(),
  publishedAt: z.coerce.date(),
  category: z.string().optional(),
});

const marketSchema = z.object({
  marketId: z.string(),
  question: z.string().default(""),
  yesPrice: z.number(),
  noPrice: z.number(),
  volume24h: z.number().default(0),
  resolved: z.boolean().default(false),
  outcome: direction.nullable().default(null),
  fetchedAt: z.coerce.date().optional(),
  endDate: z.string().optional(),
});

const resolutionSchema = z.object({
  marketId: z.string(),
  outcome: direction,
  resolvedAt: z.coerce.date(),
});

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

function articleKey(a: Pick<Article, "url" | "headline">): string {
  return `${a.url}\u0000${a.headline}`;
}

/**
 * Daily JSON files under `<baseDir>/{markets,news,resolutions}/<YYYY-MM-DD>.json`.
 * The market snapshot is written once per day; news and resolutions are
 * appended and de-duplicated.
 */
export class SnapshotStore implements HistoricalSource {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  private path(kind: "markets" | "news" | "resolutions", day: string): string {
    return join(this.baseDir, kind, `${day}.json`);
  }

  private async readArray(file: string): Promise<unknown[]> {
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : [];
  }

  private async writeArray(file: string, rows: unknown[]): Promise<void> {
    try {
      await mkdir(dirname(file), { recursive: true });
      await writeFile(file, JSON.stringify(rows, null, 2), "utf8");
    } catch (err) {
      throw new PersistenceUnavailableError(`Failed to write snapshot ${file}: ${errorMessage(err)}`, { cause: err });
    }
  }

  // ---------------------------------------------------------------------------
  // Recording
  // ---------------------------------------------------------------------------

  /** Returns false when today's market snapshot already exists. */
  async recordMarkets(markets: MarketQuote[], now: Date): Promise<boolean> {
    const file = this.path("markets", utcDay(now));
    if (await exists(file)) return false;
    await this.writeArray(
      file,
      markets.map((m) => ({ ...m, fetchedAt: m.fetchedAt.toISOString() })),
    );
    return true;
  }

  /** Appends unseen articles to their publication day's file. Returns the number added. */
  async recordNews(articles: Article[]): Promise<number> {
    const byDay = new Map<string, Article[]>();
    for (const a of articles) {
      const day = utcDay(a.publishedAt);
      byDay.set(day, [...(byDay.get(day) ?? []), a]);
    }

    let added = 0;
    for (const [day, fresh] of byDay) {
      const existing = await this.loadNews(day);
      const seen = new Set(existing.map(articleKey));
      const merged = [...existing];
      for (const a of fresh) {
        if (seen.has(articleKey(a))) continue;
        seen.add(articleKey(a));
        merged.push(a);
        added++;
      }
      if (merged.length === existing.length) continue;
      await this.writeArray(
        this.path("news", day),
        merged.map((a) => ({ ...a, publishedAt: a.publishedAt.toISOString() })),
      );
    }
    return added;
  }

  async recordResolutions(resolutions: Resolution[]): Promise<number> {
    const byDay = new Map<string, Resolution[]>();
    for (const r of resolutions) {
      const day = utcDay(r.resolvedAt);
      byDay.set(day, [...(byDay.get(day) ?? []), r]);
    }

    let added = 0;
    for (const [day, fresh] of byDay) {
      const existing = await this.loadResolutions(day);
      const seen = new Set(existing.map((r) => r.marketId));
      const merged = [...existing];
      for (const r of fresh) {
        if (seen.has(r.marketId)) continue;
        seen.add(r.marketId);
        merged.push(r);
        added++;
      }
      if (merged.length === existing.length) continue;
      await this.writeArray(
        this.path("resolutions", day),
        merged.map((r) => ({ ...r, resolvedAt: r.resolvedAt.toISOString() })),
      );
    }
    return added;
  }

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  async loadNews(day: string): Promise<Article[]> {
    const rows = await this.readArray(this.path("news", day));
    return z.array(articleSchema).parse(rows);
  }

  async loadMarkets(day: string, fetchedAt: Date): Promise<MarketQuote[]> {
    const rows = await this.readArray(this.path("markets", day));
    return z
      .array(marketSchema)
      .parse(rows)
      .map((m) => ({ ...m, fetchedAt }));
  }

  async loadResolutions(day: string): Promise<Resolution[]> {
    const rows = await this.readArray(this.path("resolutions", day));
    return z.array(resolutionSchema).parse(rows);
  }

  async loadPeriod(day: string, start: Date): Promise<HistoricalPeriod> {
    const [articles, markets, resolutions] = await Promise.all([
      this.loadNews(day),
      this.loadMarkets(day, start),
      this.loadResolutions(day),
    ]);
    articles.sort((a, b) => a.publishedAt.getTime() - b.publishedAt.getTime());
    return { day, articles, markets, resolutions };
  }
}
