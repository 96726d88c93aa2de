/**
 * plansmith core types
 *
 * Canonical data models shared by every package. Plans arrive from a model
 * as untrusted JSON, so the loop carries them as `PlanDocument` and only the
 * plan rules decide whether one is acceptable.
 */

// ─── Session ────────────────────────────────────────────────────────

export type SessionStatus =
  | "created"
  | "planning"
  | "researching"
  | "reporting"
  | "completed"
  | "failed";

export interface SessionLimits {
  /** Refinement ceiling: corrective attempts before the loop forwards the plan as-is. */
  max_attempts: number;
  /** Hard ceiling on loop state transitions; at least 2 * max_attempts + 2. */
  max_steps: number;
  /** Per-request timeout for model calls. 0 disables it. */
  request_timeout_ms: number;
}

export interface Session {
  session_id: string;
  status: SessionStatus;
  task: string;
  limits: SessionLimits;
  created_at: string;
  updated_at: string;
}

// ─── Plan ───────────────────────────────────────────────────────────

/** A candidate plan as returned by a model: any JSON object, fields unverified. */
export type PlanDocument = Record<string, unknown>;

/** Keys a generated plan must carry before the generator hands it to the loop. */
export const REQUIRED_PLAN_KEYS = ["timeline", "workstreams", "risks", "metrics", "assumptions"] as const;

// ─── Refinement ─────────────────────────────────────────────────────

export type LoopPhase = "generating" | "validating" | "refining" | "done";

export interface ValidationAttempt {
  /** Value of attempt_count when this validation ran. */
  attempt: number;
  violations: string[];
}

export interface RefinementState {
  task: string;
  plan: PlanDocument | null;
  phase: LoopPhase;
  attempt_count: number;
  readonly max_attempts: number;
  validated: boolean;
  violation_log: string[];
  attempts: ValidationAttempt[];
}

export interface RefinementOutcome {
  plan: PlanDocument;
  validated: boolean;
  attempt_count: number;
  max_attempts: number;
  violation_log: string[];
  attempts: ValidationAttempt[];
  /** State transitions taken, counted against max_steps. */
  steps: number;
}

// ─── Research ───────────────────────────────────────────────────────

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
  extracted_text: string;
  score: number;
}

/** Search capability. May return fewer results than requested. */
export interface SearchProvider {
  search(query: string, count: number): Promise<SearchResult[]>;
}

export interface ResearchResource {
  workstream: string;
  tools: string[];
  templates: string[];
  citations: number[];
}

export interface ResearchEstimate {
  workstream: string;
  effort: "S" | "M" | "L";
  notes: string;
  citations: number[];
}

export interface ResearchChecklist {
  workstream: string;
  checklist: string[];
  citations: number[];
}

export interface Research {
  resources: ResearchResource[];
  estimates: ResearchEstimate[];
  validation_checklists: ResearchChecklist[];
  open_questions: string[];
  used_sources: number[];
}

// ─── Model Contract ─────────────────────────────────────────────────

export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
  model: string;
  cost_usd?: number;
}

export interface ModelPricing {
  input_cost_per_1k_tokens: number;
  output_cost_per_1k_tokens: number;
}

export interface ModelCallResult {
  text: string;
  usage?: UsageMetrics;
}

/**
 * Generation capability: system instruction + user instruction in, free text
 * out. Rejections are transport failures and are never retried by the loop.
 */
export type ModelCallFn = (systemPrompt: string, userPrompt: string) => Promise<ModelCallResult>;

// ─── Journal Events ─────────────────────────────────────────────────

export type JournalEventType =
  | "session.created"
  | "session.started"
  | "session.completed"
  | "session.failed"
  | "planner.requested"
  | "planner.attempt_rejected"
  | "planner.plan_received"
  | "planner.fallback"
  | "plan.validated"
  | "plan.rejected"
  | "plan.accepted"
  | "plan.ceiling_reached"
  | "refiner.requested"
  | "refiner.plan_received"
  | "refiner.unparsable"
  | "research.started"
  | "research.skipped"
  | "research.fetch_failed"
  | "research.summary_failed"
  | "research.completed"
  | "report.started"
  | "report.completed"
  | "usage.recorded";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  session_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}
