export { extractJsonObject, isPlainObject } from "./extract.js";
export {
  wrapUntrusted,
  untrustedBlocks,
  roleOf,
  AgentRole,
  UNTRUSTED_BEGIN,
  UNTRUSTED_END,
  PLANNER_REMINDER,
  buildPlannerSystemPrompt,
  buildPlannerUserPrompt,
  buildReviewerSystemPrompt,
  buildReviewerUserPrompt,
} from "./prompts.js";
export type { AgentRoleLine } from "./prompts.js";
export type { PlannerEventHook } from "./events.js";
export { PlanGenerator, createSkeletonPlan, missingPlanKeys, DEFAULT_GENERATOR_RETRIES } from "./plan-generator.js";
export type { PlanGeneratorOptions } from "./plan-generator.js";
export { PlanRefiner } from "./refiner.js";
export type { PlanRefinerOptions } from "./refiner.js";
export { createMockModelCall, buildMockPlan } from "./mock-model.js";
