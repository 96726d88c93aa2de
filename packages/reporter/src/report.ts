import type { ModelCallFn, PlanDocument, Research, SearchResult } from "@plansmith/schemas";
import { AgentRole, wrapUntrusted } from "@plansmith/planner";

export const REPORT_TITLE_PREFIX = "# Project Plan\n\n";

export interface ReportInput {
  plan: PlanDocument;
  research: Research;
  sources: SearchResult[];
}

/** `[n] title — url`, one line per source, numbered from 1. */
export function formatSources(sources: readonly SearchResult[]): string {
  return sources.map((s, i) => `[${i + 1}] ${s.title || s.url} — ${s.url}`).join("\n");
}

function buildReporterSystemPrompt(): string {
  return `${AgentRole.REPORTER} Merge the plan and research into a polished, executive-ready Markdown report.
Include sections: Overview, Assumptions, Timeline (table), Workstreams, Risks & Mitigations, Resources & Tools, Estimates, Validation Checklists, Open Questions, Next Steps, and a Sources section with citations.
Do not invent facts; when unsure, keep it generic.`;
}

function buildReporterUserPrompt(input: ReportInput): string {
  const sections = [
    `## Plan\n${wrapUntrusted(JSON.stringify(input.plan, null, 2), 100_000)}`,
    `## Research\n${wrapUntrusted(JSON.stringify(input.research, null, 2), 100_000)}`,
  ];
  if (input.sources.length > 0) {
    sections.push(`## Sources (append at the end as a list with [n] labels)\n${formatSources(input.sources)}`);
  }
  return sections.join("\n\n");
}

/** One model call; a response without a leading heading gets a title. */
export async function buildReport(callModel: ModelCallFn, input: ReportInput): Promise<string> {
  const { text } = await callModel(buildReporterSystemPrompt(), buildReporterUserPrompt(input));
  const markdown = text.trim();
  return markdown.startsWith("#") ? markdown : REPORT_TITLE_PREFIX + markdown;
}
