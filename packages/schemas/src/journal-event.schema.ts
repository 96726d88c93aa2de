export const JOURNAL_EVENT_TYPES = [
  "session.created", "session.started", "session.completed", "session.failed",
  "planner.requested", "planner.attempt_rejected", "planner.plan_received", "planner.fallback",
  "plan.validated", "plan.rejected", "plan.accepted", "plan.ceiling_reached",
  "refiner.requested", "refiner.plan_received", "refiner.unparsable",
  "research.started", "research.skipped", "research.fetch_failed", "research.summary_failed",
  "research.completed",
  "report.started", "report.completed",
  "usage.recorded",
] as const;

export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "session_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    session_id: { type: "string", minLength: 1 },
    type: { type: "string", enum: JOURNAL_EVENT_TYPES },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
