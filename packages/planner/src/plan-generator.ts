import type { ModelCallFn, PlanDocument } from "@plansmith/schemas";
import { REQUIRED_PLAN_KEYS } from "@plansmith/schemas";
import { extractJsonObject } from "./extract.js";
import type { PlannerEventHook } from "./events.js";
import { buildPlannerSystemPrompt, buildPlannerUserPrompt, PLANNER_REMINDER } from "./prompts.js";

export const DEFAULT_GENERATOR_RETRIES = 2;

export interface PlanGeneratorOptions {
  /** Extra attempts after the first, each with the reminder appended. */
  retries?: number;
  onEvent?: PlannerEventHook;
}

/** Fallback when no attempt produced a usable document. */
export function createSkeletonPlan(task: string): PlanDocument {
  return {
    objective: task,
    assumptions: ["TBD", "TBD", "TBD"],
    timeline: [],
    workstreams: [],
    risks: [],
    metrics: [],
  };
}

export function missingPlanKeys(plan: PlanDocument): string[] {
  return REQUIRED_PLAN_KEYS.filter((key) => !(key in plan));
}

export class PlanGenerator {
  private callModel: ModelCallFn;
  private retries: number;
  private onEvent: PlannerEventHook | undefined;

  constructor(callModel: ModelCallFn, opts?: PlanGeneratorOptions) {
    this.callModel = callModel;
    this.retries = opts?.retries ?? DEFAULT_GENERATOR_RETRIES;
    this.onEvent = opts?.onEvent;
  }

  /** Model calls one generate() can make at most. */
  get maxCalls(): number {
    return 1 + this.retries;
  }

  async generate(task: string): Promise<PlanDocument> {
    const systemPrompt = buildPlannerSystemPrompt();
    const userPrompt = buildPlannerUserPrompt(task);

    for (let attempt = 1; attempt <= this.maxCalls; attempt++) {
      await this.emit("planner.requested", { attempt });
      const prompt = attempt === 1 ? userPrompt : userPrompt + PLANNER_REMINDER;
      const { text } = await this.callModel(systemPrompt, prompt);
      const plan = extractJsonObject(text);
      if (plan === null) {
        await this.emit("planner.attempt_rejected", { attempt, reason: "unparsable" });
        continue;
      }
      const missing = missingPlanKeys(plan);
      if (missing.length > 0) {
        await this.emit("planner.attempt_rejected", { attempt, reason: "missing_keys", missing_keys: missing });
        continue;
      }
      await this.emit("planner.plan_received", { attempt });
      return plan;
    }

    await this.emit("planner.fallback", { attempts: this.maxCalls });
    return createSkeletonPlan(task);
  }

  private async emit(type: Parameters<PlannerEventHook>[0], payload: Record<string, unknown>): Promise<void> {
    if (this.onEvent) await this.onEvent(type, payload);
  }
}
