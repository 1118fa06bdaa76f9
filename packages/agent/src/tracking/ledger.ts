import { appendFile, mkdir, readFile, readdir, access } from "node:fs/promises";
import { constants } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { PersistenceUnavailableError, errorMessage, isNotFound } from "../errors.js";
import type { Bet, BetResult, EquitySample, PerformanceMetrics, Resolution, Signal } from "../types.js";

export const LEDGER_KINDS = ["signal", "bet", "resolution", "equity", "performance"] as const;

export type LedgerKind = (typeof LEDGER_KINDS)[number];

export const ledgerRecordSchema = z.object({
  kind: z.enum(LEDGER_KINDS),
  /** UTC day the record belongs to (YYYY-MM-DD). */
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  at: z.string(),
  payload: z.record(z.unknown()),
});

export type LedgerRecord = z.infer<typeof ledgerRecordSchema>;

/** Append-only, date-keyed record log. */
export interface PersistenceSink {
  /** Throws PersistenceUnavailableError when the sink cannot accept writes. */
  ping(): Promise<void>;
  append(record: LedgerRecord): Promise<void>;
  /** Records of `kind` dated within [fromDate, toDate], in append order. */
  read(kind: LedgerKind, fromDate: string, toDate: string): Promise<LedgerRecord[]>;
  close?(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Record builders
// ---------------------------------------------------------------------------

function serializeSignal(signal: Signal): Record<string, unknown> {
  return {
    timestamp: signal.timestamp.toISOString(),
    marketId: signal.marketId,
    question: signal.question,
    direction: signal.direction,
    quotedPrice: signal.quotedPrice,
    effectivePrice: signal.effectivePrice,
    estimatedProb: signal.estimatedProb,
    edge: signal.edge,
    confidence: signal.confidence,
    reasoning: signal.reasoning,
    headline: signal.headline,
  };
}

function serializeResult(r: BetResult): Record<string, unknown> {
  return { ...r, resolvedAt: r.resolvedAt.toISOString() };
}

function record(kind: LedgerKind, at: Date, date: string, payload: Record<string, unknown>): LedgerRecord {
  return { kind, date, at: at.toISOString(), payload };
}

export function signalRecord(
  at: Date,
  date: string,
  entry: { marketId: string; direction: string; edge?: number; signal?: Signal; rejected?: string; stake?: number },
): LedgerRecord {
  const { signal, ...rest } = entry;
  return record("signal", at, date, { ...rest, ...(signal ? { signal: serializeSignal(signal) } : {}) });
}

export function betRecord(bet: Bet, date: string): LedgerRecord {
  return record("bet", bet.placedAt, date, {
    id: bet.id,
    marketId: bet.signal.marketId,
    direction: bet.signal.direction,
    stakeAmount: bet.stakeAmount,
    kellyFractionApplied: bet.kellyFractionApplied,
    mode: bet.mode,
    executionPrice: bet.executionPrice,
    shares: bet.shares,
    signal: serializeSignal(bet.signal),
  });
}

export function resolutionRecord(
  resolution: Resolution,
  date: string,
  settlement?: { payout: number; pnl: number; results: BetResult[] },
): LedgerRecord {
  return record("resolution", resolution.resolvedAt, date, {
    marketId: resolution.marketId,
    outcome: resolution.outcome,
    resolvedAt: resolution.resolvedAt.toISOString(),
    payout: settlement?.payout ?? 0,
    pnl: settlement?.pnl ?? 0,
    results: (settlement?.results ?? []).map(serializeResult),
  });
}

export function equityRecord(sample: EquitySample, at: Date): LedgerRecord {
  return record("equity", at, sample.date, { date: sample.date, bankroll: sample.bankroll });
}

export function performanceRecord(metrics: PerformanceMetrics, date: string, at: Date): LedgerRecord {
  return record("performance", at, date, { ...metrics });
}

// ---------------------------------------------------------------------------
// Readback
// ---------------------------------------------------------------------------

const equityPayloadSchema = z.object({ date: z.string(), bankroll: z.number() });

/** Rebuilds the daily equity curve from persisted records. */
export async function readEquityCurve(sink: PersistenceSink, fromDate: string, toDate: string): Promise<EquitySample[]> {
  const samples = await sink.read("equity", fromDate, toDate);
  return samples.map((r) => equityPayloadSchema.parse(r.payload));
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

export class MemoryLedger implements PersistenceSink {
  readonly records: LedgerRecord[] = [];

  async ping(): Promise<void> {}

  async append(entry: LedgerRecord): Promise<void> {
    this.records.push(entry);
  }

  async read(kind: LedgerKind, fromDate: string, toDate: string): Promise<LedgerRecord[]> {
    return this.records.filter((r) => r.kind === kind && r.date >= fromDate && r.date <= toDate);
  }
}

/** JSONL files laid out as `<dir>/<kind>/<YYYY-MM-DD>.jsonl`. */
export class FileLedger implements PersistenceSink {
  private dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  private kindDir(kind: LedgerKind): string {
    return join(this.dir, kind);
  }

  async ping(): Promise<void> {
    try {
      await mkdir(this.dir, { recursive: true });
      await access(this.dir, constants.W_OK);
    } catch (err) {
      throw new PersistenceUnavailableError(`Ledger directory ${this.dir} is not writable: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async append(entry: LedgerRecord): Promise<void> {
    const dir = this.kindDir(entry.kind);
    try {
      await mkdir(dir, { recursive: true });
      await appendFile(join(dir, `${entry.date}.jsonl`), `${JSON.stringify(entry)}\n`, "utf8");
    } catch (err) {
      throw new PersistenceUnavailableError(`Failed to append ${entry.kind} record: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async read(kind: LedgerKind, fromDate: string, toDate: string): Promise<LedgerRecord[]> {
    let files: string[];
    try {
      files = await readdir(this.kindDir(kind));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const days = files
      .filter((f) => f.endsWith(".jsonl"))
      .map((f) => f.slice(0, -".jsonl".length))
      .filter((d) => d >= fromDate && d <= toDate)
      .sort();

    const out: LedgerRecord[] = [];
    for (const day of days) {
      const text = await readFile(join(this.kindDir(kind), `${day}.jsonl`), "utf8");
      for (const line of text.split("\n")) {
        if (!line.trim()) continue;
        out.push(ledgerRecordSchema.parse(JSON.parse(line)));
      }
    }
    return out;
  }
}
