import { z } from "zod";
import { MarketProvider } from "./base.js";
import { log } from "../logger.js";
import { withRetry } from "../retry.js";
import { TransientIOError, errorMessage } from "../errors.js";
import type { Direction, MarketQuote, Resolution } from "../types.js";

// Polymarket Gamma REST API. Binary markets expose outcomes and prices as
// JSON-encoded string arrays, e.g. outcomes='["Yes","No"]', outcomePrices='["0.61","0.39"]'.

const numeric = z.union([z.number(), z.string()]).optional().nullable();

const gammaMarketSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    question: z.string().optional().nullable(),
    outcomes: z.union([z.string(), z.array(z.string())]).optional().nullable(),
    outcomePrices: z.union([z.string(), z.array(z.union([z.string(), z.number()]))]).optional().nullable(),
    volume24hr: numeric,
    volume24hrClob: numeric,
    volume: numeric,
    closed: z.boolean().optional().nullable(),
    endDate: z.string().optional().nullable(),
    umaResolutionStatus: z.string().optional().nullable(),
    closedTime: z.string().optional().nullable(),
  })
  .passthrough();

type GammaMarket = z.infer<typeof gammaMarketSchema>;

/** Price at or above which a closed market's side is treated as the winner. */
const SETTLED_PRICE = 0.99;

function toNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function toList(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (typeof value !== "string") return null;
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function normalizeOutcome(value: unknown): Direction | null {
  if (typeof value !== "string") return null;
  const text = value.trim().toLowerCase();
  if (text === "yes" || text === "y") return "YES";
  if (text === "no" || text === "n") return "NO";
  return null;
}

export function extractYesNoPrices(market: Pick<GammaMarket, "outcomes" | "outcomePrices">): {
  yes: number | null;
  no: number | null;
} {
  const outcomes = toList(market.outcomes);
  const prices = toList(market.outcomePrices);
  let yes: number | null = null;
  let no: number | null = null;
  if (!outcomes || !prices) return { yes, no };

  for (let i = 0; i < outcomes.length && i < prices.length; i++) {
    const side = normalizeOutcome(outcomes[i]);
    const price = toNumber(prices[i]);
    if (price === null) continue;
    if (side === "YES") yes = price;
    if (side === "NO") no = price;
  }
  return { yes, no };
}

function detectOutcome(market: GammaMarket, yes: number | null, no: number | null): Direction | null {
  for (const key of ["outcome", "winningOutcome", "resolvedOutcome"]) {
    const explicit = normalizeOutcome(market[key]);
    if (explicit) return explicit;
  }
  if (!market.closed) return null;
  if (yes !== null && yes >= SETTLED_PRICE) return "YES";
  if (no !== null && no >= SETTLED_PRICE) return "NO";
  return null;
}

export function parseGammaMarket(raw: unknown, fetchedAt: Date): MarketQuote | null {
  const parsed = gammaMarketSchema.safeParse(raw);
  if (!parsed.success) return null;
  const market = parsed.data;

  const { yes, no } = extractYesNoPrices(market);
  if (yes === null || no === null) return null;

  const outcome = detectOutcome(market, yes, no);
  const volume24h =
    toNumber(market.volume24hr) ?? toNumber(market.volume24hrClob) ?? toNumber(market.volume) ?? 0;

  return {
    marketId: String(market.id),
    question: market.question ?? "",
    yesPrice: yes,
    noPrice: no,
    volume24h,
    resolved: outcome !== null,
    outcome,
    fetchedAt,
    endDate: market.endDate ?? undefined,
  };
}

export class GammaProvider extends MarketProvider {
  private apiBase: string;
  private limit: number;
  private timeoutMs: number;
  private retries: number;

  constructor(params: { apiBase: string; limit?: number; timeoutMs?: number; retries?: number }) {
    super("Gamma");
    this.apiBase = params.apiBase.replace(/\/+$/, "");
    this.limit = params.limit ?? 200;
    this.timeoutMs = params.timeoutMs ?? 15_000;
    this.retries = params.retries ?? 3;
  }

  private async getJson(path: string): Promise<unknown> {
    return withRetry(
      async () => {
        const res = await fetch(`${this.apiBase}${path}`, { headers: { Accept: "application/json" } });
        if (!res.ok) {
          throw new TransientIOError(`Gamma ${path} returned ${res.status}`);
        }
        return res.json();
      },
      { label: `Gamma ${path}`, retries: this.retries, timeoutMs: this.timeoutMs },
    );
  }

  async fetchMarkets(): Promise<MarketQuote[]> {
    const body = await this.getJson(`/markets?active=true&closed=false&limit=${this.limit}`);
    const rows = Array.isArray(body) ? body : [];
    const fetchedAt = new Date();
    const quotes: MarketQuote[] = [];
    for (const row of rows) {
      const quote = parseGammaMarket(row, fetchedAt);
      if (quote) quotes.push(quote);
    }
    log.debug("Fetched Gamma markets", { received: rows.length, usable: quotes.length });
    return quotes;
  }

  async fetchResolutions(marketIds: string[]): Promise<Resolution[]> {
    const resolutions: Resolution[] = [];
    for (const marketId of marketIds) {
      try {
        const body = await this.getJson(`/markets/${encodeURIComponent(marketId)}`);
        const quote = parseGammaMarket(body, new Date());
        if (!quote?.outcome) continue;
        resolutions.push({ marketId: quote.marketId, outcome: quote.outcome, resolvedAt: new Date() });
      } catch (err) {
        log.warn("Failed to fetch market for resolution", { marketId, error: errorMessage(err) });
      }
    }
    return resolutions;
  }
}
