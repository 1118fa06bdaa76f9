import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { PersistenceUnavailableError, errorMessage, isNotFound } from "../errors.js";
import type { SimulatorSnapshot } from "../execution/simulator.js";

const direction = z.enum(["YES", "NO"]);

const signalSchema = z.object({
  timestamp: z.coerce.date(),
  marketId: z.string(),
  question: z.string(),
  direction,
  quotedPrice: z.number(),
  effectivePrice: z.number(),
  estimatedProb: z.number(),
  edge: z.number(),
  confidence: z.number(),
  reasoning: z.string(),
  headline: z.string(),
});

const betSchema = z.object({
  id: z.string(),
  signal: signalSchema,
  stakeAmount: z.number(),
  kellyFractionApplied: z.number(),
  mode: z.enum(["backtest", "paper", "live"]),
  executionPrice: z.number(),
  shares: z.number(),
  placedAt: z.coerce.date(),
});

const positionSchema = z.object({
  marketId: z.string(),
  direction,
  shares: z.number(),
  avgPrice: z.number(),
  costBasis: z.number(),
  status: z.enum(["open", "resolved"]),
  openedAt: z.coerce.date(),
  betIds: z.array(z.string()),
  outcome: direction.optional(),
  payout: z.number().optional(),
  realizedPnl: z.number().optional(),
  resolvedAt: z.coerce.date().optional(),
});

const resultSchema = z.object({
  betId: z.string(),
  marketId: z.string(),
  direction,
  stake: z.number(),
  shares: z.number(),
  executionPrice: z.number(),
  outcome: direction,
  won: z.boolean(),
  pnl: z.number(),
  edgeAtEntry: z.number(),
  resolvedAt: z.coerce.date(),
});

export const snapshotSchema = z.object({
  bankroll: z.number(),
  positions: z.array(positionSchema),
  bets: z.array(betSchema),
  results: z.array(resultSchema),
  day: z.string().nullable(),
  startOfDayBankroll: z.number(),
  dailyPnl: z.number(),
});

/** Simulator state persisted between restarts (paper mode). */
export class StateStore {
  private file: string;

  constructor(file: string) {
    this.file = file;
  }

  /** Returns null when nothing has been saved yet. */
  async load(): Promise<SimulatorSnapshot | null> {
    let text: string;
    try {
      text = await readFile(this.file, "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return snapshotSchema.parse(JSON.parse(text));
  }

  async save(snapshot: SimulatorSnapshot): Promise<void> {
    const tmp = `${this.file}.tmp`;
    try {
      await mkdir(dirname(this.file), { recursive: true });
      // Write then rename; readers see the old file or the new one
      await writeFile(tmp, JSON.stringify(snapshot), "utf8");
      await rename(tmp, this.file);
    } catch (err) {
      throw new PersistenceUnavailableError(`Failed to save state to ${this.file}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
