import { fileURLToPath } from "node:url";
import { loadConfig } from "../config.js";
import { getProvider, listAvailableModels } from "../evaluation/llm-providers.js";
import { ModelEvaluator, loadScenarios } from "../evaluation/model-evaluator.js";

// ---------------------------------------------------------------------------
// CLI flags
// ---------------------------------------------------------------------------

const USAGE =
  "Usage: npm run evaluate -- [--models gpt-4o,gpt-4o-mini] [--scenarios FILE] [--max-scenarios N] [--output FILE] [--list-models] [--dry-run]";

const SAMPLE_SCENARIOS = fileURLToPath(new URL("../../scenarios/sample.json", import.meta.url));

function flagValue(name: string): string | undefined {
  const i = process.argv.indexOf(name);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

function parseCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`--max-scenarios must be a positive integer.\n${USAGE}`);
  }
  return n;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  if (process.argv.includes("--list-models")) {
    console.log("Available models:");
    for (const model of listAvailableModels()) console.log(`  - ${model}`);
    return;
  }

  const config = loadConfig();
  const models = (flagValue("--models") ?? "gpt-4o,gpt-4o-mini")
    .split(",")
    .map((m) => m.trim())
    .filter(Boolean);
  const scenariosPath = flagValue("--scenarios") ?? SAMPLE_SCENARIOS;
  const maxScenarios = parseCount(flagValue("--max-scenarios"));
  const output = flagValue("--output");

  const available = listAvailableModels();
  const unknown = models.filter((m) => !available.includes(m));
  if (unknown.length > 0) {
    throw new Error(`Unknown models: ${unknown.join(", ")}\nAvailable: ${available.join(", ")}`);
  }

  const evaluator = new ModelEvaluator(await loadScenarios(scenariosPath));
  console.log(`Loaded ${evaluator.scenarioCount} scenarios from ${scenariosPath}`);
  if (maxScenarios) console.log(`Limiting to ${maxScenarios} scenarios per model`);

  if (process.argv.includes("--dry-run")) {
    console.log(`\nDry run - would evaluate: ${models.join(", ")}`);
    return;
  }

  const providers = models.map((m) => getProvider(m, config.openaiApiKey));
  console.log(`\nEvaluating models: ${models.join(", ")}`);
  console.log("-".repeat(60));

  const results = await evaluator.compareModels(providers, maxScenarios);
  const now = new Date();
  console.log(`\n${evaluator.generateReport(results, now)}`);

  if (output) {
    await evaluator.saveResults(output, results, now);
    console.log(`\nResults saved to: ${output}`);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
