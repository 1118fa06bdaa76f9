import OpenAI from "openai";
import { ConfigError } from "../errors.js";
import { withRetry } from "../retry.js";

export interface LLMResponse {
  content: string;
  latencyMs: number;
  model: string;
  inputTokens?: number;
  outputTokens?: number;
  costUsd?: number;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  invoke(prompt: string, system?: string): Promise<LLMResponse>;
}

// USD per 1M tokens
export const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  "gpt-4o": { input: 2.5, output: 10 },
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "gpt-4-turbo": { input: 10, output: 30 },
};

export function estimateCost(model: string, inputTokens: number, outputTokens: number): number | undefined {
  const pricing = MODEL_PRICING[model];
  if (!pricing) return undefined;
  return (inputTokens / 1_000_000) * pricing.input + (outputTokens / 1_000_000) * pricing.output;
}

export class OpenAIProvider implements LLMProvider {
  readonly name = "openai";
  readonly model: string;
  private client: OpenAI;
  private timeoutMs: number;

  constructor(params: { apiKey: string; model?: string; timeoutMs?: number }) {
    this.client = new OpenAI({ apiKey: params.apiKey });
    this.model = params.model ?? "gpt-4o";
    this.timeoutMs = params.timeoutMs ?? 60_000;
  }

  async invoke(prompt: string, system?: string): Promise<LLMResponse> {
    const started = performance.now();
    const response = await withRetry(
      () =>
        this.client.chat.completions.create({
          model: this.model,
          temperature: 0,
          response_format: { type: "json_object" },
          messages: system
            ? [
                { role: "system", content: system },
                { role: "user", content: prompt },
              ]
            : [{ role: "user", content: prompt }],
        }),
      { label: `LLM ${this.model}`, retries: 2, delayMs: 1000, timeoutMs: this.timeoutMs },
    );
    const latencyMs = performance.now() - started;

    const inputTokens = response.usage?.prompt_tokens;
    const outputTokens = response.usage?.completion_tokens;
    return {
      content: response.choices[0]?.message?.content ?? "",
      latencyMs,
      model: this.model,
      inputTokens,
      outputTokens,
      costUsd:
        inputTokens !== undefined && outputTokens !== undefined
          ? estimateCost(this.model, inputTokens, outputTokens)
          : undefined,
    };
  }
}

export function listAvailableModels(): string[] {
  return Object.keys(MODEL_PRICING);
}

export function getProvider(model: string, apiKey: string | undefined): LLMProvider {
  if (!listAvailableModels().includes(model)) {
    throw new ConfigError(`Unknown model: ${model}`);
  }
  if (!apiKey) {
    throw new ConfigError(`OPENAI_API_KEY is required for ${model}`);
  }
  return new OpenAIProvider({ apiKey, model });
}
