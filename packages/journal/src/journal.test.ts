import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { rm, readFile, writeFile, appendFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { Journal } from "./journal.js";
import { redactPayload, REDACTED } from "./redact.js";

const TEST_DIR = fileURLToPath(new URL("../../../.test-data/journal", import.meta.url));
const TEST_FILE = resolve(TEST_DIR, "test-journal.jsonl");

describe("Journal", () => {
  beforeEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("creates directory and file on init + emit", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    const event = await journal.emit("sess-1", "session.created", { task: "Plan a launch" });
    expect(event.event_id).toBeTruthy();
    expect(event.session_id).toBe("sess-1");
    expect(event.type).toBe("session.created");
    expect(event.payload).toEqual({ task: "Plan a launch" });
    expect(existsSync(TEST_FILE)).toBe(true);
  });

  it("writes with fsync enabled", async () => {
    const journal = new Journal(TEST_FILE);
    await journal.init();
    await journal.emit("sess-1", "session.created", {});
    expect(await journal.readAll()).toHaveLength(1);
  });

  it("reads all events and the last N", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    await journal.emit("sess-1", "session.created", {});
    await journal.emit("sess-1", "session.started", {});
    await journal.emit("sess-2", "session.created", {});

    expect(await journal.readAll()).toHaveLength(3);
    const tail = await journal.readAll({ limit: 1 });
    expect(tail.map((e) => e.session_id)).toEqual(["sess-2"]);
  });

  it("reads events filtered by session", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    await journal.emit("sess-1", "session.created", {});
    await journal.emit("sess-2", "session.created", {});
    await journal.emit("sess-1", "plan.rejected", { violations: ["risks_min"] });

    const events = journal.readSession("sess-1");
    expect(events.map((e) => e.type)).toEqual(["session.created", "plan.rejected"]);
  });

  it("summarises sessions with their last status and task", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    await journal.emit("sess-1", "session.created", { task: "Plan a 2-week hackathon" });
    await journal.emit("sess-1", "plan.accepted", {});
    await journal.emit("sess-1", "session.completed", {});
    await journal.emit("sess-2", "session.created", {});

    const sessions = journal.listSessions();
    expect(sessions).toHaveLength(2);
    expect(sessions[0]).toMatchObject({
      session_id: "sess-1",
      status: "completed",
      task: "Plan a 2-week hackathon",
      events: 3,
    });
    expect(sessions[1]).toMatchObject({ session_id: "sess-2", status: "created", events: 1 });
    expect(sessions[1]?.task).toBeUndefined();
  });

  it("maintains hash chain integrity", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    const e1 = await journal.emit("sess-1", "session.created", {});
    const e2 = await journal.emit("sess-1", "session.started", {});

    expect(e1.hash_prev).toBeUndefined();
    expect(e2.hash_prev).toMatch(/^[0-9a-f]{64}$/);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("detects a tampered line", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    await journal.emit("sess-1", "session.created", {});
    await journal.emit("sess-1", "session.started", {});
    await journal.emit("sess-1", "session.completed", {});

    const lines = (await readFile(TEST_FILE, "utf-8")).trim().split("\n");
    const parsed = JSON.parse(lines[1] ?? "{}") as Record<string, unknown>;
    parsed.payload = { tampered: true };
    lines[1] = JSON.stringify(parsed);
    await writeFile(TEST_FILE, lines.join("\n") + "\n", "utf-8");

    expect(await journal.verifyIntegrity()).toEqual({ valid: false, brokenAt: 2 });

    const strict = new Journal(TEST_FILE, { fsync: false, recovery: "strict" });
    await expect(strict.init()).rejects.toThrow("Journal integrity violation at event 2");
  });

  it("truncates to the valid prefix on init in truncate mode", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    await journal.emit("sess-1", "session.created", {});
    await journal.emit("sess-1", "session.started", {});
    await journal.emit("sess-1", "session.completed", {});

    const lines = (await readFile(TEST_FILE, "utf-8")).trim().split("\n");
    const parsed = JSON.parse(lines[1] ?? "{}") as Record<string, unknown>;
    parsed.payload = { tampered: true };
    lines[1] = JSON.stringify(parsed);
    await writeFile(TEST_FILE, lines.join("\n") + "\n", "utf-8");

    const reopened = new Journal(TEST_FILE, { fsync: false });
    await reopened.init();
    expect(await reopened.readAll()).toHaveLength(2);
    const next = await reopened.emit("sess-1", "session.failed", {});
    expect(next.seq).toBe(2);
    expect(await reopened.verifyIntegrity()).toEqual({ valid: true });
  });

  it("drops a partial last line left by a crash", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    await journal.emit("sess-1", "session.created", {});
    await appendFile(TEST_FILE, '{"event_id":"half', "utf-8");

    const reopened = new Journal(TEST_FILE, { fsync: false });
    await reopened.init();
    expect(await reopened.readAll()).toHaveLength(1);
    expect(console.error).toHaveBeenCalledWith("Journal: truncated incomplete last line from crash");
  });

  it("returns valid integrity for an empty journal", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("notifies and unsubscribes listeners", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    const received: string[] = [];
    const unsub = journal.on((event) => { received.push(event.type); });
    await journal.emit("sess-1", "session.created", {});
    unsub();
    await journal.emit("sess-1", "session.started", {});
    expect(received).toEqual(["session.created"]);
  });

  it("continues when a listener throws", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    const received: string[] = [];
    journal.on(() => { throw new Error("boom"); });
    journal.on((event) => { received.push(event.type); });
    await journal.emit("sess-1", "session.created", {});
    expect(received).toEqual(["session.created"]);
  });

  it("resumes hash chain and seq from an existing file", async () => {
    const first = new Journal(TEST_FILE, { fsync: false });
    await first.init();
    await first.emit("sess-1", "session.created", {});
    await first.emit("sess-1", "session.started", {});

    const second = new Journal(TEST_FILE, { fsync: false });
    await second.init();
    const e3 = await second.emit("sess-1", "session.completed", {});

    expect(e3.seq).toBe(2);
    expect(await second.verifyIntegrity()).toEqual({ valid: true });
    expect(second.readSession("sess-1")).toHaveLength(3);
  });

  it("returns an empty array for readAll on a missing file", async () => {
    const journal = new Journal(resolve(TEST_DIR, "missing.jsonl"));
    await journal.init();
    expect(await journal.readAll()).toEqual([]);
  });

  it("keeps the chain intact under concurrent emits", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    await Promise.all(
      Array.from({ length: 20 }, (_, i) => journal.emit(`sess-${i % 3}`, "plan.validated", { index: i }))
    );
    const events = await journal.readAll();
    expect(events.map((e) => e.seq)).toEqual(Array.from({ length: 20 }, (_, i) => i));
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("redacts secrets in payloads by default", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    const event = await journal.emit("sess-1", "session.created", {
      task: "Plan a launch",
      api_key: "test-secret",
      nested: { authorization: "Bearer test-token" },
    });
    expect(event.payload).toEqual({
      task: "Plan a launch",
      api_key: REDACTED,
      nested: { authorization: REDACTED },
    });
  });

  it("keeps payloads verbatim when redaction is off", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false, redact: false });
    await journal.init();
    const event = await journal.emit("sess-1", "session.created", { api_key: "test-secret" });
    expect(event.payload).toEqual({ api_key: "test-secret" });
  });

  it("tryEmit returns null instead of throwing", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    // An empty session id fails schema validation
    expect(await journal.tryEmit("", "session.failed", {})).toBeNull();
    await expect(journal.emit("", "session.failed", {})).rejects.toThrow("Invalid journal event");
  });

  it("close waits for pending writes", async () => {
    const journal = new Journal(TEST_FILE, { fsync: false });
    await journal.init();
    const pending = journal.emit("sess-1", "session.created", {});
    await journal.close();
    await pending;
    expect(await journal.readAll()).toHaveLength(1);
  });
});

describe("redactPayload", () => {
  it("redacts values that look like credentials", () => {
    expect(redactPayload("sk-ant-test")).toBe(REDACTED);
    expect(redactPayload(["plain", "Bearer abc"])).toEqual(["plain", REDACTED]);
  });

  it("leaves ordinary plan text alone", () => {
    const plan = { objective: "Run a 2-week hackathon", metrics: ["Teams formed", "Demos shipped"] };
    expect(redactPayload(plan)).toEqual(plan);
  });

  it("passes through non-string scalars", () => {
    expect(redactPayload(3)).toBe(3);
    expect(redactPayload(null)).toBeNull();
    expect(redactPayload({ token: 42 })).toEqual({ token: 42 });
  });
});
