import type { UsageMetrics, ModelPricing } from "@plansmith/schemas";

export interface ModelUsage {
  input_tokens: number;
  output_tokens: number;
  calls: number;
}

export interface UsageSummary {
  total_input_tokens: number;
  total_output_tokens: number;
  total_tokens: number;
  total_cost_usd: number;
  call_count: number;
  by_model: Record<string, ModelUsage>;
}

/** Token and cost totals for one pipeline run, with a per-model breakdown. */
export class UsageAccumulator {
  private inputTokens = 0;
  private outputTokens = 0;
  private tokens = 0;
  private costUsd = 0;
  private calls = 0;
  private byModel = new Map<string, ModelUsage>();
  private pricing: ModelPricing | undefined;

  constructor(pricing?: ModelPricing) {
    this.pricing = pricing;
  }

  record(usage: UsageMetrics): void {
    this.inputTokens += usage.input_tokens;
    this.outputTokens += usage.output_tokens;
    this.tokens += usage.total_tokens;
    this.calls++;

    const entry = this.byModel.get(usage.model) ?? { input_tokens: 0, output_tokens: 0, calls: 0 };
    entry.input_tokens += usage.input_tokens;
    entry.output_tokens += usage.output_tokens;
    entry.calls++;
    this.byModel.set(usage.model, entry);

    if (usage.cost_usd !== undefined) {
      this.costUsd += usage.cost_usd;
    } else if (this.pricing) {
      this.costUsd +=
        (usage.input_tokens / 1000) * this.pricing.input_cost_per_1k_tokens +
        (usage.output_tokens / 1000) * this.pricing.output_cost_per_1k_tokens;
    }
  }

  getSummary(): UsageSummary {
    const by_model: Record<string, ModelUsage> = {};
    for (const [model, entry] of this.byModel) by_model[model] = { ...entry };
    return {
      total_input_tokens: this.inputTokens,
      total_output_tokens: this.outputTokens,
      total_tokens: this.tokens,
      total_cost_usd: this.costUsd,
      call_count: this.calls,
      by_model,
    };
  }

  get totalTokens(): number {
    return this.tokens;
  }

  get callCount(): number {
    return this.calls;
  }
}
