export {
  RefinementLoop,
  LoopStepLimitError,
  assertLoopLimits,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_STEPS,
  defaultMaxSteps,
  minLoopSteps,
} from "./refinement-loop.js";
export type { RefinementLoopConfig, PlanSource, PlanCorrector } from "./refinement-loop.js";
export { Pipeline, resolveLimits, DEFAULT_REQUEST_TIMEOUT_MS } from "./pipeline.js";
export type { PipelineConfig, PipelineOutcome } from "./pipeline.js";
export { UsageAccumulator } from "./usage-accumulator.js";
export type { UsageSummary, ModelUsage } from "./usage-accumulator.js";
