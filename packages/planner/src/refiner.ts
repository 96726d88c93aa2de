import type { ModelCallFn, PlanDocument } from "@plansmith/schemas";
import { extractJsonObject } from "./extract.js";
import type { PlannerEventHook } from "./events.js";
import { buildReviewerSystemPrompt, buildReviewerUserPrompt } from "./prompts.js";

export interface PlanRefinerOptions {
  onEvent?: PlannerEventHook;
}

/**
 * One corrective pass: sends the plan and its violation codes back to the
 * model. An unparsable answer leaves the plan as it was.
 */
export class PlanRefiner {
  private callModel: ModelCallFn;
  private onEvent: PlannerEventHook | undefined;

  constructor(callModel: ModelCallFn, opts?: PlanRefinerOptions) {
    this.callModel = callModel;
    this.onEvent = opts?.onEvent;
  }

  async refine(plan: PlanDocument, task: string, violations: readonly string[]): Promise<PlanDocument> {
    await this.onEvent?.("refiner.requested", { violations: [...violations] });
    const { text } = await this.callModel(
      buildReviewerSystemPrompt(),
      buildReviewerUserPrompt(task, plan, violations)
    );
    const fixed = extractJsonObject(text);
    if (fixed === null) {
      await this.onEvent?.("refiner.unparsable", { response_chars: text.length });
      return plan;
    }
    await this.onEvent?.("refiner.plan_received", {});
    return fixed;
  }
}
