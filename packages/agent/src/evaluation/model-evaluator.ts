import { readFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { parseJsonLoose } from "../extraction/openai-extractor.js";
import type { Direction } from "../types.js";
import type { LLMProvider } from "./llm-providers.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const scenarioSchema = z.object({
  scenario_id: z.union([z.string(), z.number()]).transform(String),
  news_headline: z.string().default(""),
  news_summary: z.string().default(""),
  market_question: z.string(),
  market_yes_price: z.coerce.number().default(0.5),
  market_no_price: z.coerce.number().default(0.5),
  actual_outcome: z
    .string()
    .transform((s) => s.trim().toUpperCase())
    .pipe(z.enum(["YES", "NO"])),
  category: z.string().optional(),
  resolution_date: z.string().optional(),
});

const scenarioFileSchema = z.object({ scenarios: z.array(scenarioSchema).default([]) });

/** A resolved market plus the news that moved it. */
export interface Scenario {
  id: string;
  headline: string;
  summary: string;
  question: string;
  yesPrice: number;
  noPrice: number;
  outcome: Direction;
  category?: string;
  resolutionDate?: string;
}

export interface ModelPrediction {
  scenarioId: string;
  model: string;
  direction: Direction | null;
  /** Probability for `direction`. */
  estimatedProb: number;
  confidence: number;
  reasoning: string;
  latencyMs: number;
  inputTokens?: number;
  outputTokens?: number;
  costUsd?: number;
  error?: string;
}

export interface EvaluationResult {
  model: string;
  numPredictions: number;
  /** Mean squared error of the YES probability; 0 is perfect. */
  brierScore: number;
  calibrationError: number;
  accuracy: number;
  avgConfidence: number;
  avgLatencyMs: number;
  p95LatencyMs: number;
  totalCostUsd: number;
  predictions: ModelPrediction[];
  categoryBrier: Record<string, number>;
  categoryAccuracy: Record<string, number>;
}

const predictionSchema = z.object({
  direction: z.string().optional(),
  estimated_prob: z.coerce.number().optional(),
  confidence: z.coerce.number().optional(),
  reasoning: z.coerce.string().optional(),
});

const SYSTEM_PROMPT = "You output strict JSON and nothing else.";

function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function parseScenarios(body: unknown): Scenario[] {
  return scenarioFileSchema.parse(body).scenarios.map((s) => ({
    id: s.scenario_id,
    headline: s.news_headline,
    summary: s.news_summary,
    question: s.market_question,
    yesPrice: s.market_yes_price,
    noPrice: s.market_no_price,
    outcome: s.actual_outcome,
    category: s.category,
    resolutionDate: s.resolution_date,
  }));
}

export async function loadScenarios(path: string): Promise<Scenario[]> {
  return parseScenarios(JSON.parse(await readFile(path, "utf8")));
}

export function buildEvaluationPrompt(scenario: Scenario): string {
  return [
    "You are analyzing a prediction market. Given breaking news and a related market, estimate the probability of the market resolving YES.",
    "",
    `**Breaking News:**\n"${scenario.headline}"\n"${scenario.summary}"`,
    "",
    `**Market Question:** ${scenario.question}`,
    `**Current YES Price:** ${scenario.yesPrice.toFixed(2)}`,
    `**Current NO Price:** ${scenario.noPrice.toFixed(2)}`,
    "",
    "**Task:** Estimate the probability (0.0-1.0) that the market resolves YES.",
    "",
    "Return JSON:",
    "{",
    '  "direction": "YES" or "NO" (which side to bet),',
    '  "estimated_prob": 0.75 (probability for that direction),',
    '  "confidence": 8 (1-10),',
    '  "reasoning": "brief explanation"',
    "}",
  ].join("\n");
}

/** Reads a model answer. Unknown directions count as YES, numbers are clamped. */
export function parsePrediction(content: string): Pick<ModelPrediction, "direction" | "estimatedProb" | "confidence" | "reasoning"> {
  const parsed = predictionSchema.parse(parseJsonLoose(content) ?? {});
  const direction = (parsed.direction ?? "").trim().toUpperCase();
  return {
    direction: direction === "NO" ? "NO" : "YES",
    estimatedProb: clamp(parsed.estimated_prob ?? 0.5, 0, 1),
    confidence: Math.trunc(clamp(parsed.confidence ?? 5, 1, 10)),
    reasoning: parsed.reasoning ?? "",
  };
}

// ---------------------------------------------------------------------------
// Evaluator
// ---------------------------------------------------------------------------

export class ModelEvaluator {
  private scenarios: Scenario[];
  private predictions = new Map<string, ModelPrediction[]>();

  constructor(scenarios: Scenario[] = []) {
    this.scenarios = [...scenarios];
  }

  get scenarioCount(): number {
    return this.scenarios.length;
  }

  /** Asks the provider about every scenario. A failed call is kept as an errored prediction. */
  async evaluateModel(provider: LLMProvider, maxScenarios?: number): Promise<ModelPrediction[]> {
    const scenarios = maxScenarios ? this.scenarios.slice(0, maxScenarios) : this.scenarios;
    const predictions: ModelPrediction[] = [];

    for (const scenario of scenarios) {
      try {
        const response = await provider.invoke(buildEvaluationPrompt(scenario), SYSTEM_PROMPT);
        predictions.push({
          scenarioId: scenario.id,
          model: provider.model,
          ...parsePrediction(response.content),
          latencyMs: response.latencyMs,
          inputTokens: response.inputTokens,
          outputTokens: response.outputTokens,
          costUsd: response.costUsd,
        });
      } catch (err) {
        log.warn("Evaluation call failed", { model: provider.model, scenario: scenario.id, error: errorMessage(err) });
        predictions.push({
          scenarioId: scenario.id,
          model: provider.model,
          direction: null,
          estimatedProb: 0.5,
          confidence: 0,
          reasoning: "",
          latencyMs: 0,
          error: errorMessage(err),
        });
      }
    }

    this.predictions.set(provider.model, predictions);
    return predictions;
  }

  calculateMetrics(model: string): EvaluationResult {
    const predictions = this.predictions.get(model) ?? [];
    const byId = new Map(this.scenarios.map((s) => [s.id, s]));
    const valid = predictions.filter((p) => !p.error);

    const briers: number[] = [];
    const calibration: number[] = [];
    const confidences: number[] = [];
    const latencies: number[] = [];
    const categoryBriers = new Map<string, number[]>();
    const categoryHits = new Map<string, { correct: number; total: number }>();
    let correct = 0;
    let totalCost = 0;

    for (const p of valid) {
      const scenario = byId.get(p.scenarioId);
      if (!scenario) continue;

      const actual = scenario.outcome === "YES" ? 1 : 0;
      const yesProb = p.direction === "YES" ? p.estimatedProb : 1 - p.estimatedProb;
      const brier = (yesProb - actual) ** 2;
      const hit = p.direction === scenario.outcome;

      briers.push(brier);
      calibration.push(Math.abs(yesProb - actual));
      if (hit) correct++;
      confidences.push(p.confidence);
      latencies.push(p.latencyMs);
      totalCost += p.costUsd ?? 0;

      const category = scenario.category ?? "unknown";
      categoryBriers.set(category, [...(categoryBriers.get(category) ?? []), brier]);
      const counts = categoryHits.get(category) ?? { correct: 0, total: 0 };
      categoryHits.set(category, { correct: counts.correct + (hit ? 1 : 0), total: counts.total + 1 });
    }

    const sorted = [...latencies].sort((a, b) => a - b);
    const p95 = sorted.length > 0 ? sorted[Math.min(Math.floor(sorted.length * 0.95), sorted.length - 1)] : 0;

    return {
      model,
      numPredictions: valid.length,
      brierScore: briers.length > 0 ? mean(briers) : 1,
      calibrationError: calibration.length > 0 ? mean(calibration) : 1,
      accuracy: valid.length > 0 ? correct / valid.length : 0,
      avgConfidence: confidences.length > 0 ? mean(confidences) : 0,
      avgLatencyMs: latencies.length > 0 ? mean(latencies) : 0,
      p95LatencyMs: p95,
      totalCostUsd: totalCost,
      predictions,
      categoryBrier: Object.fromEntries([...categoryBriers].map(([c, scores]) => [c, mean(scores)])),
      categoryAccuracy: Object.fromEntries(
        [...categoryHits].map(([c, { correct: hits, total }]) => [c, total > 0 ? hits / total : 0]),
      ),
    };
  }

  /** Evaluates each provider in turn; best Brier score first. */
  async compareModels(providers: LLMProvider[], maxScenarios?: number): Promise<EvaluationResult[]> {
    const results: EvaluationResult[] = [];
    for (const provider of providers) {
      await this.evaluateModel(provider, maxScenarios);
      results.push(this.calculateMetrics(provider.model));
    }
    return results.sort((a, b) => a.brierScore - b.brierScore);
  }

  generateReport(results: EvaluationResult[], generatedAt: Date): string {
    const lines = [
      "# Model Evaluation Report",
      "",
      `**Generated:** ${generatedAt.toISOString()}`,
      `**Scenarios:** ${this.scenarios.length}`,
      "",
      "## Summary (sorted by Brier Score)",
      "",
      "| Model | Brier Score | Accuracy | Avg Latency | P95 Latency | Cost |",
      "|-------|-------------|----------|-------------|-------------|------|",
    ];
    for (const r of results) {
      const cost = r.totalCostUsd > 0 ? `$${r.totalCostUsd.toFixed(4)}` : "N/A";
      lines.push(
        `| ${r.model} | ${r.brierScore.toFixed(4)} | ${(r.accuracy * 100).toFixed(1)}% | ` +
          `${r.avgLatencyMs.toFixed(0)}ms | ${r.p95LatencyMs.toFixed(0)}ms | ${cost} |`,
      );
    }

    const categories = [...new Set(results.flatMap((r) => Object.keys(r.categoryBrier)))].sort();
    if (categories.length > 0) {
      lines.push("", "## Category Breakdown (Brier Score)", "");
      lines.push(`| Model | ${categories.join(" | ")} |`);
      lines.push(`|-------|${categories.map(() => "-------").join("|")}|`);
      for (const r of results) {
        lines.push(`| ${r.model} |${categories.map((c) => ` ${(r.categoryBrier[c] ?? 1).toFixed(4)} |`).join("")}`);
      }
    }

    const [best] = results;
    if (best) {
      lines.push(
        "",
        "## Recommendation",
        "",
        `**Best Overall:** ${best.model} (Brier: ${best.brierScore.toFixed(4)}, Accuracy: ${(best.accuracy * 100).toFixed(1)}%)`,
      );

      // Brier weighted by order of magnitude of cost; lower is better
      const value = results
        .filter((r) => r.totalCostUsd > 0)
        .map((r) => ({ r, score: r.brierScore * (1 + Math.log10(Math.max(r.totalCostUsd, 0.0001))) }))
        .sort((a, b) => a.score - b.score)[0];
      if (value && value.r.model !== best.model) {
        lines.push(
          `**Best Value:** ${value.r.model} (Brier: ${value.r.brierScore.toFixed(4)}, Cost: $${value.r.totalCostUsd.toFixed(4)})`,
        );
      }
    }

    return lines.join("\n");
  }

  async saveResults(path: string, results: EvaluationResult[], generatedAt: Date): Promise<void> {
    const body = {
      generatedAt: generatedAt.toISOString(),
      numScenarios: this.scenarios.length,
      results: results.map(({ predictions: _predictions, ...summary }) => summary),
    };
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(body, null, 2), "utf8");
  }
}
