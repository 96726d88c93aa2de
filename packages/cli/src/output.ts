// Pure formatting for CLI output. Callers decide where the strings go.
import type { JournalEvent, RefinementOutcome } from "@plansmith/schemas";
import type { PipelineOutcome, UsageSummary } from "@plansmith/kernel";
import type { SessionSummary } from "@plansmith/journal";
import { formatSources } from "@plansmith/reporter";

// ANSI color helpers
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export function colorForType(type: string): (s: string) => string {
  if (type.includes("completed") || type.includes("accepted")) return green;
  if (type.includes("failed") || type.includes("unparsable")) return red;
  if (type.includes("rejected") || type.includes("ceiling") || type.includes("fallback")) return yellow;
  return cyan;
}

/** `[hh:mm:ss] type`, UTC clock time from the event timestamp. */
export function formatEventLine(event: Pick<JournalEvent, "timestamp" | "type">): string {
  const clock = event.timestamp.slice(11, 19);
  return `${dim(`[${clock}]`)} ${colorForType(event.type)(event.type)}`;
}

export function section(title: string, body: string): string {
  return `${bold(`== ${title} ==`)}\n${body}`;
}

export function formatUsage(usage: UsageSummary): string {
  const parts = [`${usage.call_count} model call(s)`, `${usage.total_tokens} tokens`];
  if (usage.total_cost_usd > 0) parts.push(`$${usage.total_cost_usd.toFixed(4)}`);
  return parts.join(", ");
}

function formatVerdict(validated: boolean, attemptCount: number): string {
  return validated
    ? green(`Plan validated after ${attemptCount} refinement(s).`)
    : yellow(`Plan forwarded unvalidated after ${attemptCount} refinement(s).`);
}

export function formatPlanOutcome(outcome: RefinementOutcome): string {
  return [
    section("Logs", outcome.violation_log.join("\n")),
    section("Plan", JSON.stringify(outcome.plan, null, 2)),
    formatVerdict(outcome.validated, outcome.attempt_count),
  ].join("\n\n");
}

export function formatRunOutcome(outcome: PipelineOutcome): string {
  const blocks = [
    section("Logs", outcome.logs.join("\n")),
    section("Plan", JSON.stringify(outcome.plan, null, 2)),
    section("Research", JSON.stringify(outcome.research, null, 2)),
    section("Report", outcome.report_markdown),
  ];
  if (outcome.sources.length > 0) blocks.push(section("Sources", formatSources(outcome.sources)));
  blocks.push(`${formatVerdict(outcome.validated, outcome.attempt_count)} ${dim(formatUsage(outcome.usage))}`);
  blocks.push(dim(`Session ${outcome.session_id}`));
  return blocks.join("\n\n");
}

export function formatSessionList(sessions: SessionSummary[]): string {
  if (sessions.length === 0) return "No sessions found.";
  return sessions
    .map((s) => `${s.session_id}  ${colorForType(`session.${s.status}`)(s.status.padEnd(9))}  ${s.created}  ${s.events} events  ${s.task ?? ""}`.trimEnd())
    .join("\n");
}

export function formatIntegrity(result: { valid: boolean; brokenAt?: number }): string {
  if (result.valid) return green("Journal integrity: OK");
  return red(`Journal integrity: BROKEN at event ${result.brokenAt ?? "?"}`);
}

export function formatSessionEvents(events: JournalEvent[]): string {
  return events
    .map((e) => {
      const payload = Object.keys(e.payload).length > 0 ? ` ${dim(JSON.stringify(e.payload))}` : "";
      return `${formatEventLine(e)}${payload}`;
    })
    .join("\n");
}
