import { log } from "../logger.js";
import type { Article, MarketQuote, RawSignal, SignalExtractor, Strategy } from "../types.js";

const STOP_WORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "has", "he", "in", "is",
  "it", "its", "of", "on", "or", "that", "the", "to", "was", "were", "will", "with",
]);

export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return words.filter((w) => w.length > 2 && !STOP_WORDS.has(w));
}

/**
 * Ranks markets by how many keywords their question shares with the article.
 * Falls back to the first `max` markets when nothing overlaps.
 */
export function selectCandidateMarkets(article: Article, markets: MarketQuote[], max: number): MarketQuote[] {
  const limit = Math.max(1, max);
  const tokens = new Set(tokenize(`${article.headline}\n${article.summary}`));
  if (tokens.size === 0) return markets.slice(0, limit);

  const scored: Array<{ score: number; index: number; market: MarketQuote }> = [];
  markets.forEach((market, index) => {
    const question = market.question.trim();
    if (!question) return;
    const score = new Set(tokenize(question).filter((t) => tokens.has(t))).size;
    if (score > 0) scored.push({ score, index, market });
  });

  scored.sort((a, b) => b.score - a.score || a.index - b.index);
  const candidates = scored.slice(0, limit).map((s) => s.market);
  return candidates.length > 0 ? candidates : markets.slice(0, limit);
}

/** Trades on breaking news faster than the market reprices it. */
export class NewsSpeedStrategy implements Strategy {
  readonly name = "news_speed";
  private extractor: SignalExtractor;
  private maxMarketsPerArticle: number;

  constructor(extractor: SignalExtractor, maxMarketsPerArticle = 5) {
    this.extractor = extractor;
    this.maxMarketsPerArticle = maxMarketsPerArticle;
  }

  async generateSignals(articles: Article[], markets: MarketQuote[]): Promise<RawSignal[]> {
    const open = markets.filter((m) => !m.resolved);
    if (articles.length === 0 || open.length === 0) return [];

    const signals: RawSignal[] = [];
    for (const article of articles) {
      const candidates = selectCandidateMarkets(article, open, this.maxMarketsPerArticle);
      const ids = new Set(candidates.map((m) => m.marketId));
      const rows = await this.extractor.extract(article, candidates);
      for (const row of rows) {
        if (!ids.has(row.marketId)) {
          log.debug("Dropping signal for market outside candidates", { marketId: row.marketId });
          continue;
        }
        signals.push({ ...row, headline: row.headline || article.headline });
      }
    }
    return signals;
  }
}
