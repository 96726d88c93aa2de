import type { ModelCallFn, ModelCallResult, PlanDocument, Research } from "@plansmith/schemas";
import { isGranularScheduleTask } from "@plansmith/schemas";
import { extractJsonObject, isPlainObject } from "./extract.js";
import { AgentRole, roleOf, untrustedBlocks } from "./prompts.js";

const PHASES = ["Discovery", "Planning", "Preparation", "Build", "Validation", "Launch", "Review"];

const WORKSTREAMS = [
  { name: "Discovery/Research", owner: "Project Lead", dependencies: [] },
  { name: "Execution/Build", owner: "Delivery Lead", dependencies: ["Discovery/Research"] },
  { name: "QA/Validation", owner: "QA Lead", dependencies: ["Execution/Build"] },
  { name: "Logistics/Operations", owner: "Operations Manager", dependencies: ["Discovery/Research"] },
];

const RISKS = [
  { risk: "Scope creep", impact: "high", mitigation: "Freeze scope after planning and route changes through the project lead" },
  { risk: "Key people unavailable", impact: "medium", mitigation: "Name a backup owner for every workstream" },
  { risk: "Budget overrun", impact: "medium", mitigation: "Track spend weekly against a 10% contingency" },
  { risk: "Late vendor delivery", impact: "low", mitigation: "Confirm lead times early and keep an alternate supplier" },
];

/** A structurally complete plan for `task`; day- and week-level tasks get seven phases. */
export function buildMockPlan(task: string): PlanDocument {
  const phases = isGranularScheduleTask(task) ? PHASES : PHASES.slice(0, 5);
  return {
    objective: task,
    assumptions: [
      "Stakeholders approve the plan before execution starts",
      "A core team is available for the full duration",
      "Budget covers the listed workstreams",
    ],
    timeline: phases.map((name, i) => ({
      phase: `${isGranularScheduleTask(task) ? "Day" : "Phase"} ${i + 1}: ${name}`,
      milestones: [`${name} kickoff`, `${name} sign-off`],
      deliverables: [`${name} summary`],
    })),
    workstreams: WORKSTREAMS.map((ws) => ({
      name: ws.name,
      tasks: [`Define ${ws.name.toLowerCase()} scope`, `Run ${ws.name.toLowerCase()} activities`],
      owner: ws.owner,
      dependencies: [...ws.dependencies],
    })),
    risks: RISKS.map((r) => ({ ...r })),
    metrics: ["Milestones delivered on time", "Budget variance under 10%", "Stakeholder satisfaction score"],
  };
}

function mockResearch(userPrompt: string): Research {
  const cited = [...userPrompt.matchAll(/^\[(\d+)\] TITLE:/gm)].map((m) => Number(m[1]));
  return {
    resources: [{ workstream: "Discovery/Research", tools: ["Shared planning board"], templates: ["Kickoff checklist"], citations: cited.slice(0, 1) }],
    estimates: [{ workstream: "Execution/Build", effort: "M", notes: "Sized from the plan alone", citations: [] }],
    validation_checklists: [{ workstream: "QA/Validation", checklist: ["Every milestone has an owner"], citations: [] }],
    open_questions: ["Who signs off the final budget?"],
    used_sources: cited,
  };
}

function mockReport(userPrompt: string): string {
  const plan = extractJsonObject(untrustedBlocks(userPrompt)[0] ?? "") ?? {};
  const objective = typeof plan.objective === "string" ? plan.objective : "Project";
  const lines = [`# Project Plan: ${objective}`, "", "## Overview", "", "Report assembled offline by the mock provider."];
  if (Array.isArray(plan.timeline)) {
    lines.push("", "## Timeline", "", "| Phase | Milestones |", "| --- | --- |");
    for (const phase of plan.timeline) {
      if (!isPlainObject(phase)) continue;
      const milestones = Array.isArray(phase.milestones) ? phase.milestones.join(", ") : "";
      lines.push(`| ${String(phase.phase ?? "")} | ${milestones} |`);
    }
  }
  return lines.join("\n");
}

function usageFor(model: string, systemPrompt: string, userPrompt: string, text: string): ModelCallResult["usage"] {
  const input_tokens = Math.ceil((systemPrompt.length + userPrompt.length) / 4);
  const output_tokens = Math.ceil(text.length / 4);
  return { input_tokens, output_tokens, total_tokens: input_tokens + output_tokens, model };
}

/**
 * Deterministic offline provider. Answers each agent role with a canned but
 * structurally valid response, so the whole pipeline runs without network.
 */
export function createMockModelCall(model = "mock"): ModelCallFn {
  return async (systemPrompt, userPrompt) => {
    const task = untrustedBlocks(userPrompt)[0] ?? "";
    let text: string;
    switch (roleOf(systemPrompt)) {
      case AgentRole.PLANNER:
      case AgentRole.REVIEWER:
        text = JSON.stringify(buildMockPlan(task), null, 2);
        break;
      case AgentRole.RESEARCHER:
        text = JSON.stringify(mockResearch(userPrompt), null, 2);
        break;
      case AgentRole.SUMMARIZER:
        text = task.slice(0, 200);
        break;
      case AgentRole.REPORTER:
        text = mockReport(userPrompt);
        break;
      default:
        text = "";
    }
    return { text, usage: usageFor(model, systemPrompt, userPrompt, text) };
  };
}
