export * from "./types.js";
export {
  findPlanViolations,
  isGranularScheduleTask,
  phaseViolation,
  workstreamViolation,
  riskViolation,
  Violation,
  GRANULAR_SCHEDULE_TOKENS,
  MIN_ASSUMPTIONS,
  MIN_TIMELINE_PHASES,
  MIN_GRANULAR_TIMELINE_PHASES,
  MIN_WORKSTREAMS,
  MIN_RISKS,
  MIN_METRICS,
} from "./plan-rules.js";
export { validateJournalEventData, validateResearchData, isResearch, isJournalEvent } from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { JournalEventSchema, JOURNAL_EVENT_TYPES } from "./journal-event.schema.js";
export { ResearchSchema } from "./research.schema.js";
export { TimeoutError, withTimeout, withRequestTimeout } from "./timeout.js";
