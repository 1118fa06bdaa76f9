import OpenAI from "openai";
import { z } from "zod";
import { log } from "../logger.js";
import { withRetry } from "../retry.js";
import type { Article, Direction, MarketQuote, RawSignal, SignalExtractor } from "../types.js";

const affectedMarketSchema = z.object({
  market_id: z.union([z.string(), z.number()]).transform(String),
  direction: z.string(),
  estimated_prob: z.coerce.number(),
  confidence: z.coerce.number(),
  reasoning: z.string().optional().default(""),
});

const responseSchema = z.object({
  affected_markets: z.array(z.unknown()).default([]),
});

const JSON_BLOCK_RE = /\{[\s\S]*\}/;

function normalizeDirection(value: string): Direction | null {
  const text = value.trim().toUpperCase();
  return text === "YES" || text === "NO" ? text : null;
}

export function parseJsonLoose(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    const match = JSON_BLOCK_RE.exec(text);
    if (!match) return null;
    try {
      return JSON.parse(match[0]);
    } catch {
      return null;
    }
  }
}

/**
 * Parses the model's reply into candidates. Rows that are malformed are
 * dropped; values are passed through unclamped so the edge evaluator can
 * reject them.
 */
export function parseExtractorResponse(text: string, headline = ""): RawSignal[] {
  const parsed = responseSchema.safeParse(parseJsonLoose(text.trim()));
  if (!parsed.success) return [];

  const signals: RawSignal[] = [];
  for (const row of parsed.data.affected_markets) {
    const candidate = affectedMarketSchema.safeParse(row);
    if (!candidate.success) continue;
    const direction = normalizeDirection(candidate.data.direction);
    if (!direction) continue;
    signals.push({
      marketId: candidate.data.market_id,
      direction,
      estimatedProb: candidate.data.estimated_prob,
      confidence: Math.round(candidate.data.confidence),
      reasoning: candidate.data.reasoning.trim(),
      headline,
    });
  }
  return signals;
}

export function buildExtractionPrompt(article: Article, markets: MarketQuote[]): string {
  const simplified = markets.map((m) => ({
    market_id: m.marketId,
    question: m.question,
    yes_price: m.yesPrice,
    no_price: m.noPrice,
    end_date: m.endDate ?? null,
    volume_24h: m.volume24h,
  }));

  return [
    "You are a careful prediction market analyst. Return ONLY valid JSON.",
    "",
    "Breaking news:",
    `"${article.headline}"`,
    `"${article.summary}"`,
    "",
    "Active markets (subset):",
    JSON.stringify(simplified),
    "",
    "Task:",
    "1) Identify which markets are directly affected by this news.",
    "2) For each affected market, output:",
    "- market_id (string)",
    '- direction ("YES" or "NO") for the side to buy',
    "- estimated_prob (0.0-1.0) for that side being correct",
    "- confidence (1-10)",
    "- reasoning (short)",
    "",
    'Respond with JSON: { "affected_markets": [{ "market_id": "123", "direction": "YES", "estimated_prob": 0.75, "confidence": 8, "reasoning": "..." }] }',
    'If none, return { "affected_markets": [] }.',
  ].join("\n");
}

export class OpenAISignalExtractor implements SignalExtractor {
  private client: OpenAI;
  private model: string;
  private timeoutMs: number;
  private retries: number;

  constructor(params: { apiKey: string; model?: string; timeoutMs?: number; retries?: number }) {
    this.client = new OpenAI({ apiKey: params.apiKey });
    this.model = params.model ?? "gpt-4o";
    this.timeoutMs = params.timeoutMs ?? 30_000;
    this.retries = params.retries ?? 2;
  }

  async extract(article: Article, candidates: MarketQuote[]): Promise<RawSignal[]> {
    if (candidates.length === 0) return [];
    const prompt = buildExtractionPrompt(article, candidates);

    const content = await withRetry(
      async () => {
        const response = await this.client.chat.completions.create({
          model: this.model,
          temperature: 0,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: "You output strict JSON and nothing else." },
            { role: "user", content: prompt },
          ],
        });
        const text = response.choices[0]?.message?.content;
        if (!text) throw new Error("Empty LLM response");
        return text;
      },
      { label: "LLM signal extraction", retries: this.retries, delayMs: 1000, timeoutMs: this.timeoutMs },
    );

    const signals = parseExtractorResponse(content, article.headline);
    log.info("LLM signal extraction", {
      headline: article.headline,
      candidates: candidates.length,
      signals: signals.length,
    });
    return signals;
  }
}
