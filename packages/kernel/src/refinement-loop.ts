import type { LoopPhase, PlanDocument, RefinementOutcome, RefinementState } from "@plansmith/schemas";
import { findPlanViolations } from "@plansmith/schemas";
import type { PlannerEventHook } from "@plansmith/planner";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_MAX_STEPS = 20;
const STEP_MARGIN = 4;

/** Produces the first candidate plan for a task. */
export interface PlanSource {
  generate(task: string): Promise<PlanDocument>;
}

/** Produces a corrected candidate from a plan and its violation codes. */
export interface PlanCorrector {
  refine(plan: PlanDocument, task: string, violations: readonly string[]): Promise<PlanDocument>;
}

export interface RefinementLoopConfig {
  generator: PlanSource;
  refiner: PlanCorrector;
  maxAttempts?: number;
  maxSteps?: number;
  onEvent?: PlannerEventHook;
}

export class LoopStepLimitError extends Error {
  constructor(public readonly maxSteps: number, public readonly phase: LoopPhase) {
    super(`Refinement loop exceeded ${maxSteps} steps (in ${phase})`);
    this.name = "LoopStepLimitError";
  }
}

const VALID_TRANSITIONS: Record<LoopPhase, LoopPhase[]> = {
  generating: ["validating"],
  validating: ["refining", "done"],
  refining: ["validating"],
  done: [],
};

function assertCount(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

/** Transitions a run takes when it refines all the way to the ceiling. */
export function minLoopSteps(maxAttempts: number): number {
  return 2 * maxAttempts + 2;
}

/** Never below DEFAULT_MAX_STEPS; grows with the refinement ceiling. */
export function defaultMaxSteps(maxAttempts: number): number {
  return Math.max(DEFAULT_MAX_STEPS, minLoopSteps(maxAttempts) + STEP_MARGIN);
}

export function assertLoopLimits(maxAttempts: number, maxSteps: number): void {
  assertCount("max_attempts", maxAttempts, 0);
  assertCount("max_steps", maxSteps, 1);
  const needed = minLoopSteps(maxAttempts);
  if (maxSteps < needed) {
    throw new Error(`max_steps must be >= ${needed} for max_attempts ${maxAttempts}, got ${maxSteps}`);
  }
}

/**
 * Generate → validate → (refine → validate)* until the plan passes the
 * structural rules or the attempt ceiling is hit. Ceiling exhaustion is an
 * outcome, not an error: the latest plan is forwarded with validated=false.
 */
export class RefinementLoop {
  private generator: PlanSource;
  private refiner: PlanCorrector;
  private onEvent: PlannerEventHook | undefined;
  readonly maxAttempts: number;
  readonly maxSteps: number;

  constructor(config: RefinementLoopConfig) {
    this.generator = config.generator;
    this.refiner = config.refiner;
    this.onEvent = config.onEvent;
    this.maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.maxSteps = config.maxSteps ?? defaultMaxSteps(this.maxAttempts);
    assertLoopLimits(this.maxAttempts, this.maxSteps);
  }

  async run(task: string): Promise<RefinementOutcome> {
    // All loop state is local to this call, so runs for different tasks never interfere
    const state: RefinementState = {
      task,
      plan: null,
      phase: "generating",
      attempt_count: 0,
      max_attempts: this.maxAttempts,
      validated: false,
      violation_log: [],
      attempts: [],
    };
    let steps = 0;

    const transition = (next: LoopPhase): void => {
      if (!VALID_TRANSITIONS[state.phase].includes(next)) {
        throw new Error(`Invalid loop transition: ${state.phase} → ${next}`);
      }
      if (++steps > this.maxSteps) throw new LoopStepLimitError(this.maxSteps, state.phase);
      state.phase = next;
    };

    let plan = await this.generator.generate(task);
    state.plan = plan;
    transition("validating");

    while (state.phase !== "done") {
      const violations = findPlanViolations(plan, task);
      state.attempts.push({ attempt: state.attempt_count, violations });
      await this.emit("plan.validated", { attempt: state.attempt_count, violations });

      if (violations.length === 0) {
        state.validated = true;
        state.violation_log.push(
          `Validator: plan passed structural checks (attempt ${state.attempt_count}/${state.max_attempts}).`
        );
        transition("done");
        await this.emit("plan.accepted", { attempt: state.attempt_count });
        break;
      }

      state.violation_log.push(
        `Validator: plan still has issues -> ${violations.join(", ")} (attempt ${state.attempt_count}/${state.max_attempts}).`
      );

      if (state.attempt_count >= state.max_attempts) {
        state.violation_log.push(
          `Validator: refinement ceiling reached after ${state.attempt_count} attempt(s); forwarding plan with ${violations.length} open issue(s).`
        );
        transition("done");
        await this.emit("plan.ceiling_reached", { attempt: state.attempt_count, violations });
        break;
      }

      transition("refining");
      state.attempt_count++;
      await this.emit("plan.rejected", { attempt: state.attempt_count, violations });
      plan = await this.refiner.refine(plan, task, violations);
      state.plan = plan;
      transition("validating");
    }

    return {
      plan,
      validated: state.validated,
      attempt_count: state.attempt_count,
      max_attempts: state.max_attempts,
      violation_log: [...state.violation_log],
      attempts: state.attempts.map((a) => ({ attempt: a.attempt, violations: [...a.violations] })),
      steps,
    };
  }

  private async emit(type: Parameters<PlannerEventHook>[0], payload: Record<string, unknown>): Promise<void> {
    if (this.onEvent) await this.onEvent(type, payload);
  }
}
