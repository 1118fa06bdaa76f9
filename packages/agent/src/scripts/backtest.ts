import { join } from "node:path";
import { loadConfig } from "../config.js";
import { BacktestRunner, type BacktestResult } from "../backtest/runner.js";
import { OpenAISignalExtractor } from "../extraction/openai-extractor.js";
import { NewsSpeedStrategy } from "../strategy/news-speed.js";
import { SnapshotStore } from "../tracking/snapshots.js";

// ---------------------------------------------------------------------------
// CLI flags
// ---------------------------------------------------------------------------

const USAGE = "Usage: npm run backtest -- --from YYYY-MM-DD --to YYYY-MM-DD [--json]";

function flagValue(name: string): string | undefined {
  const i = process.argv.indexOf(name);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

function parseDay(value: string | undefined, name: string): Date {
  if (!value || !/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new Error(`${name} must be a date (YYYY-MM-DD).\n${USAGE}`);
  }
  return new Date(`${value}T00:00:00.000Z`);
}

// ---------------------------------------------------------------------------
// Print helpers
// ---------------------------------------------------------------------------

function printReport(result: BacktestResult): void {
  console.log("\n========================================");
  console.log(" Backtest Results");
  console.log("========================================\n");
  console.log(`Trades settled:   ${result.numTrades}`);
  console.log(`Bets placed:      ${result.bets.length}`);
  console.log(`Win rate:         ${(result.winRate * 100).toFixed(1)}%`);
  console.log(`Total P&L:        $${result.totalPnl.toFixed(2)}`);
  console.log(`Final bankroll:   $${result.finalBankroll.toFixed(2)}`);
  console.log(`Sharpe ratio:     ${result.sharpeRatio.toFixed(2)}`);
  console.log(`Max drawdown:     ${(result.maxDrawdown * 100).toFixed(1)}%`);

  if (result.equityCurve.length > 1) {
    console.log("\n--- Equity ---\n");
    for (const sample of result.equityCurve) {
      console.log(`  ${sample.date}  $${sample.bankroll.toFixed(2)}`);
    }
  }
  console.log("\n========================================\n");
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const config = loadConfig();
  const start = parseDay(flagValue("--from"), "--from");
  const end = parseDay(flagValue("--to"), "--to");
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY env var required.");
  }

  const extractor = new OpenAISignalExtractor({ apiKey: config.openaiApiKey, model: config.openaiModel });
  const runner = new BacktestRunner({
    start,
    end,
    initialBankroll: config.bankroll,
    limits: config,
    strategies: [new NewsSpeedStrategy(extractor, config.maxMarketsPerArticle)],
    source: new SnapshotStore(join(config.dataDir, "historical")),
  });

  const result = await runner.run();
  if (process.argv.includes("--json")) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printReport(result);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
