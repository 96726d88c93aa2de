import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { rm } from "node:fs/promises";
import type { ModelCallFn, PlanDocument, SearchProvider, SearchResult } from "@plansmith/schemas";
import { TimeoutError } from "@plansmith/schemas";
import { Journal } from "@plansmith/journal";
import { AgentRole, buildMockPlan, createMockModelCall } from "@plansmith/planner";
import { Pipeline, resolveLimits } from "./pipeline.js";

const TEST_DIR = fileURLToPath(new URL("../../../.test-data/kernel", import.meta.url));
const TEST_JOURNAL = resolve(TEST_DIR, "pipeline.jsonl");

function source(n: number): SearchResult {
  return { title: `Source ${n}`, url: `https://example.com/${n}`, snippet: "s", extracted_text: `text ${n}`, score: 1 };
}

function fakeSearch(): { search: Mock<SearchProvider["search"]> } {
  let n = 0;
  return { search: vi.fn<SearchProvider["search"]>(async () => [source(++n)]) };
}

function threeWorkstreamPlan(task: string): PlanDocument {
  const plan = buildMockPlan(task);
  return { ...plan, workstreams: Array.isArray(plan.workstreams) ? plan.workstreams.slice(0, 3) : [] };
}

describe("Pipeline", () => {
  let journal: Journal;

  beforeEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    journal = new Journal(TEST_JOURNAL, { fsync: false });
    await journal.init();
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it("runs plan, report and skips research without a search provider", async () => {
    const pipeline = new Pipeline({ journal, callModel: createMockModelCall() });
    const session = await pipeline.createSession("Organise a product launch");
    const outcome = await pipeline.run();

    expect(outcome.status).toBe("completed");
    expect(outcome.validated).toBe(true);
    expect(outcome.attempt_count).toBe(0);
    expect(outcome.sources).toEqual([]);
    expect(outcome.research.used_sources).toEqual([]);
    expect(outcome.report_markdown.split("\n")[0]).toBe("# Project Plan: Organise a product launch");
    expect(outcome.logs).toEqual([
      "Planner: creating detailed timeline, workstreams, and risks.",
      "Validator: plan passed structural checks (attempt 0/3).",
      "Researcher: skipped (no search provider configured).",
      "Reporter: compiling final report with citations (Markdown).",
      "Reporter: report assembled.",
    ]);
    // generator + reporter
    expect(outcome.usage.call_count).toBe(2);
    expect(outcome.usage.by_model.mock?.calls).toBe(2);

    const types = journal.readSession(session.session_id).map((e) => e.type);
    expect(types[0]).toBe("session.created");
    expect(types[1]).toBe("session.started");
    expect(types).toContain("plan.accepted");
    expect(types).toContain("research.skipped");
    expect(types.filter((t) => t === "usage.recorded")).toHaveLength(2);
    expect(types[types.length - 1]).toBe("session.completed");
    expect(journal.listSessions()[0]).toMatchObject({ status: "completed", task: "Organise a product launch" });
  });

  it("starts each session with its own logs and usage", async () => {
    const pipeline = new Pipeline({ journal, callModel: createMockModelCall() });
    await pipeline.createSession("Launch A");
    const first = await pipeline.run();
    const second = await pipeline.createSession("Launch B");
    const outcome = await pipeline.run();

    expect(first.logs).toHaveLength(5);
    expect(outcome.session_id).toBe(second.session_id);
    expect(outcome.logs).toHaveLength(5);
    expect(outcome.logs[0]).toBe("Planner: creating detailed timeline, workstreams, and risks.");
    expect(outcome.usage.call_count).toBe(2);
    expect(outcome.usage.by_model.mock?.calls).toBe(2);
  });

  it("researches with a search provider and passes sources to the report", async () => {
    const search = fakeSearch();
    const pipeline = new Pipeline({
      journal,
      callModel: createMockModelCall(),
      searchProvider: search,
      summarizeSources: false,
    });
    await pipeline.createSession("Organise a product launch");
    const outcome = await pipeline.run();

    // 3 task queries + 2 workstream queries
    expect(search.search).toHaveBeenCalledTimes(5);
    expect(outcome.sources.map((s) => s.url)).toEqual([1, 2, 3, 4, 5].map((n) => `https://example.com/${n}`));
    expect(outcome.research.used_sources).toEqual([1, 2, 3, 4, 5]);
    expect(outcome.logs).toContain("Researcher: synthesised findings from 5 source(s).");
  });

  it("skips research when disabled even with a provider", async () => {
    const search = fakeSearch();
    const pipeline = new Pipeline({ journal, callModel: createMockModelCall(), searchProvider: search, useWebResearch: false });
    await pipeline.createSession("Organise a product launch");
    const outcome = await pipeline.run();
    expect(search.search).not.toHaveBeenCalled();
    expect(outcome.logs).toContain("Researcher: skipped (web research disabled).");
  });

  it("completes normally when the refinement ceiling is reached", async () => {
    const task = "Plan a 2-week hackathon";
    const callModel: ModelCallFn = async (system) => {
      if (system.startsWith(AgentRole.REPORTER)) return { text: "Overview" };
      return { text: JSON.stringify(threeWorkstreamPlan(task)) };
    };
    const pipeline = new Pipeline({ journal, callModel });
    const session = await pipeline.createSession(task);
    const outcome = await pipeline.run();

    expect(outcome.status).toBe("completed");
    expect(outcome.validated).toBe(false);
    expect(outcome.attempt_count).toBe(3);
    expect(outcome.report_markdown).toBe("# Project Plan\n\nOverview");
    expect(journal.readSession(session.session_id).map((e) => e.type)).toContain("plan.ceiling_reached");
  });

  it("marks the session failed and rethrows a transport failure", async () => {
    const callModel: ModelCallFn = async () => { throw new Error("503 Service Unavailable"); };
    const pipeline = new Pipeline({ journal, callModel });
    const session = await pipeline.createSession("Organise a product launch");

    await expect(pipeline.run()).rejects.toThrow("503 Service Unavailable");
    expect(pipeline.getSession()?.status).toBe("failed");
    const last = journal.readSession(session.session_id).at(-1);
    expect(last?.type).toBe("session.failed");
    expect(last?.payload).toEqual({ error: "503 Service Unavailable", error_name: "Error" });
  });

  it("times out a hanging model request", async () => {
    const callModel: ModelCallFn = () => new Promise(() => {});
    const pipeline = new Pipeline({ journal, callModel, limits: { request_timeout_ms: 20 } });
    await pipeline.createSession("Organise a product launch");

    await expect(pipeline.run()).rejects.toBeInstanceOf(TimeoutError);
    expect(pipeline.getSession()?.status).toBe("failed");
  });

  it("fails the session when research fails", async () => {
    const searchProvider: SearchProvider = { search: async () => { throw new Error("search quota exceeded"); } };
    const pipeline = new Pipeline({ journal, callModel: createMockModelCall(), searchProvider });
    await pipeline.createSession("Organise a product launch");
    await expect(pipeline.run()).rejects.toThrow("search quota exceeded");
    expect(pipeline.getSession()?.status).toBe("failed");
  });

  it("rejects invalid limits and empty tasks before journaling", async () => {
    const pipeline = new Pipeline({ journal, callModel: createMockModelCall(), limits: { max_attempts: -1 } });
    await expect(pipeline.createSession("Launch")).rejects.toThrow("max_attempts must be an integer >= 0");
    await expect(new Pipeline({ journal, callModel: createMockModelCall() }).createSession("  ")).rejects.toThrow(
      "Task text must not be empty"
    );
    expect(await journal.readAll()).toEqual([]);
  });

  it("requires a session before run", async () => {
    const pipeline = new Pipeline({ journal, callModel: createMockModelCall() });
    await expect(pipeline.run()).rejects.toThrow("No session created");
  });
});

describe("resolveLimits", () => {
  it("fills defaults", () => {
    expect(resolveLimits()).toEqual({ max_attempts: 3, max_steps: 20, request_timeout_ms: 60000 });
    expect(resolveLimits({ max_attempts: 5 })).toEqual({ max_attempts: 5, max_steps: 20, request_timeout_ms: 60000 });
    expect(resolveLimits({ max_attempts: 10 }).max_steps).toBe(26);
  });
});
