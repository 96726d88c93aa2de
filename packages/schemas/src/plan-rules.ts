import type { PlanDocument } from "./types.js";

// ─── Structural plan rules ──────────────────────────────────────────
// Deterministic and side-effect free: the refinement loop's termination
// never depends on anything a model does, only on these rules and the
// attempt ceiling.

export const MIN_ASSUMPTIONS = 3;
export const MIN_TIMELINE_PHASES = 4;
export const MIN_GRANULAR_TIMELINE_PHASES = 7;
export const MIN_WORKSTREAMS = 4;
export const MIN_RISKS = 4;
export const MIN_METRICS = 3;

/** Substrings of a task that call for a day- or week-level schedule. */
export const GRANULAR_SCHEDULE_TOKENS = ["day", "week", "itinerary"] as const;

const RISK_IMPACTS = ["low", "medium", "high"] as const;

export const Violation = {
  PLAN_MISSING: "plan_missing",
  ASSUMPTIONS_MIN: "assumptions_min",
  TIMELINE_MIN: "timeline_min",
  TIMELINE_GRANULARITY_REQUIRED: "timeline_granularity_required",
  WORKSTREAMS_MIN: "workstreams_min",
  WORKSTREAMS_UNIQUE: "workstreams_unique",
  RISKS_MIN: "risks_min",
  RISKS_UNIQUE: "risks_unique",
  METRICS_MIN: "metrics_min",
} as const;

/** Per-entry codes carry the 1-based entry position. */
export const phaseViolation = (n: number, defect: "not_object" | "milestones_missing" | "deliverables_missing"): string =>
  `timeline_phase_${n}_${defect}`;

export const workstreamViolation = (
  n: number,
  defect: "not_object" | "tasks_missing" | "owner_missing" | "dependencies_missing",
): string => `workstream_${n}_${defect}`;

export const riskViolation = (
  n: number,
  defect: "not_object" | "name_missing" | "impact_missing" | "impact_invalid" | "mitigation_missing",
): string => `risk_${n}_${defect}`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function isNonEmptyList(value: unknown): boolean {
  return Array.isArray(value) && value.length > 0;
}

function text(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function isGranularScheduleTask(task: string): boolean {
  const lowered = task.toLowerCase();
  return GRANULAR_SCHEDULE_TOKENS.some((token) => lowered.includes(token));
}

function checkTimeline(plan: PlanDocument, task: string, out: string[]): void {
  const timeline = listOf(plan.timeline);
  if (timeline.length < MIN_TIMELINE_PHASES) {
    out.push(Violation.TIMELINE_MIN);
  } else {
    timeline.forEach((phase, i) => {
      const n = i + 1;
      if (!isRecord(phase)) {
        out.push(phaseViolation(n, "not_object"));
        return;
      }
      if (!isNonEmptyList(phase.milestones)) out.push(phaseViolation(n, "milestones_missing"));
      if (!isNonEmptyList(phase.deliverables)) out.push(phaseViolation(n, "deliverables_missing"));
    });
  }
  if (isGranularScheduleTask(task) && timeline.length < MIN_GRANULAR_TIMELINE_PHASES) {
    out.push(Violation.TIMELINE_GRANULARITY_REQUIRED);
  }
}

function checkWorkstreams(plan: PlanDocument, out: string[]): void {
  const workstreams = listOf(plan.workstreams);
  if (workstreams.length < MIN_WORKSTREAMS) {
    out.push(Violation.WORKSTREAMS_MIN);
    return;
  }
  const seen = new Set<string>();
  let duplicate = false;
  workstreams.forEach((ws, i) => {
    const n = i + 1;
    if (!isRecord(ws)) {
      out.push(workstreamViolation(n, "not_object"));
      return;
    }
    if (!isNonEmptyList(ws.tasks)) out.push(workstreamViolation(n, "tasks_missing"));
    if (!text(ws.owner)) out.push(workstreamViolation(n, "owner_missing"));
    if (!Array.isArray(ws.dependencies)) out.push(workstreamViolation(n, "dependencies_missing"));
    const name = text(ws.name).toLowerCase();
    if (name) {
      if (seen.has(name)) duplicate = true;
      seen.add(name);
    }
  });
  if (duplicate) out.push(Violation.WORKSTREAMS_UNIQUE);
}

function checkRisks(plan: PlanDocument, out: string[]): void {
  const risks = listOf(plan.risks);
  if (risks.length < MIN_RISKS) {
    out.push(Violation.RISKS_MIN);
    return;
  }
  const seen = new Set<string>();
  let duplicate = false;
  risks.forEach((r, i) => {
    const n = i + 1;
    if (!isRecord(r)) {
      out.push(riskViolation(n, "not_object"));
      return;
    }
    const name = text(r.risk).toLowerCase();
    if (!name) {
      out.push(riskViolation(n, "name_missing"));
    } else {
      if (seen.has(name)) duplicate = true;
      seen.add(name);
    }
    const impact = text(r.impact).toLowerCase();
    if (!impact) {
      out.push(riskViolation(n, "impact_missing"));
    } else if (!RISK_IMPACTS.some((level) => level === impact)) {
      out.push(riskViolation(n, "impact_invalid"));
    }
    if (!text(r.mitigation)) out.push(riskViolation(n, "mitigation_missing"));
  });
  if (duplicate) out.push(Violation.RISKS_UNIQUE);
}

/**
 * Classifies a candidate plan. Returns every violation code found, in rule
 * order; an empty list means the plan is structurally valid for `task`.
 */
export function findPlanViolations(plan: unknown, task: string): string[] {
  if (!isRecord(plan) || Object.keys(plan).length === 0) {
    return [Violation.PLAN_MISSING];
  }
  const out: string[] = [];
  if (listOf(plan.assumptions).length < MIN_ASSUMPTIONS) out.push(Violation.ASSUMPTIONS_MIN);
  checkTimeline(plan, task, out);
  checkWorkstreams(plan, out);
  checkRisks(plan, out);
  if (listOf(plan.metrics).length < MIN_METRICS) out.push(Violation.METRICS_MIN);
  return out;
}
