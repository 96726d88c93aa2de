import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType } from "@plansmith/schemas";
import { isJournalEvent, validateJournalEventData } from "@plansmith/schemas";
import { redactPayload } from "./redact.js";

export interface JournalOptions {
  fsync?: boolean;
  redact?: boolean;
  /** How to handle a broken hash chain on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
}

export type JournalListener = (event: JournalEvent) => void;

export interface SessionSummary {
  session_id: string;
  status: string;
  task?: string;
  created: string;
  events: number;
}

/**
 * Append-only JSONL record of pipeline runs. Each line carries the SHA-256
 * of the previous line, so a journal can be checked for tampering or
 * partial writes with verifyIntegrity().
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private sessionIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private redact: boolean;
  private recovery: "truncate" | "strict";

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.redact = options?.redact ?? true;
    this.recovery = options?.recovery ?? "truncate";
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    // A crash mid-append leaves a partial last line
    const last = lines[lines.length - 1];
    if (last !== undefined && parseLine(last) === null) {
      lines.pop();
      await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
      console.error(`Journal: truncated incomplete last line from crash`);
    }

    let maxSeq = -1;
    let prevHash: string | undefined;
    const tempIndex = new Map<string, JournalEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseLine(line);
      if (event === null || (i > 0 && event.hash_prev !== prevHash)) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i}: hash chain broken`);
        }
        console.error(`Journal: recovered from corruption at event ${i}, truncated ${lines.length - i} events`);
        const tmpPath = `${this.filePath}.tmp`;
        const validLines = lines.slice(0, i);
        await writeFile(tmpPath, validLines.length > 0 ? validLines.join("\n") + "\n" : "", "utf-8");
        await rename(tmpPath, this.filePath);
        break;
      }
      prevHash = this.hash(line);
      const bucket = tempIndex.get(event.session_id);
      if (bucket) bucket.push(event);
      else tempIndex.set(event.session_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.sessionIndex = tempIndex;
    this.nextSeq = maxSeq + 1;
    this.lastHash = prevHash;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent> {
    const prev = this.writeLock;
    let releaseLock: () => void = () => {};
    this.writeLock = new Promise<void>((resolve) => { releaseLock = resolve; });
    await prev;

    try {
      const redactedPayload = this.redact ? redactRecord(payload) : payload;
      const seq = this.nextSeq;

      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        session_id: sessionId,
        type,
        payload: redactedPayload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // In-memory state only moves after a successful write
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      const bucket = this.sessionIndex.get(sessionId);
      if (bucket) bucket.push(event);
      else this.sessionIndex.set(sessionId, [event]);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error(`Journal: listener failed on ${event.type}:`, err);
        }
      }

      return event;
    } finally {
      releaseLock();
    }
  }

  /** Emit without failing the caller; used on paths that are already reporting a failure. */
  async tryEmit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(sessionId, type, payload);
    } catch (err) {
      console.error(`Journal: failed to record ${type}:`, err instanceof Error ? err.message : err);
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events = content.trim().split("\n").filter(Boolean)
      .map(parseLine)
      .filter((event): event is JournalEvent => event !== null);
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readSession(sessionId: string): JournalEvent[] {
    return [...(this.sessionIndex.get(sessionId) ?? [])];
  }

  listSessions(): SessionSummary[] {
    const summaries: SessionSummary[] = [];
    for (const [sessionId, events] of this.sessionIndex) {
      const first = events[0];
      if (!first) continue;
      let status = "created";
      for (const event of events) {
        if (event.type.startsWith("session.")) status = event.type.slice("session.".length);
      }
      const task = first.payload.task;
      summaries.push({
        session_id: sessionId,
        status,
        ...(typeof task === "string" ? { task } : {}),
        created: first.timestamp,
        events: events.length,
      });
    }
    return summaries;
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    if (!existsSync(this.filePath)) return { valid: true };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseLine(line);
      if (event === null || (i > 0 && event.hash_prev !== prevHash)) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(line);
    }
    return { valid: true };
  }

  /** Wait for pending writes. Call before process exit so no event is lost. */
  async close(): Promise<void> {
    await this.writeLock;
  }

  /**
   * Register SIGINT/SIGTERM handlers that flush pending writes before exit.
   * Returns a cleanup function to remove the handlers.
   */
  registerShutdownHandler(): () => void {
    const handler = () => {
      void this.close().finally(() => process.exit(130));
    };
    process.on("SIGINT", handler);
    process.on("SIGTERM", handler);
    return () => {
      process.off("SIGINT", handler);
      process.off("SIGTERM", handler);
    };
  }

  getFilePath(): string {
    return this.filePath;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }
}

function parseLine(line: string): JournalEvent | null {
  try {
    const parsed: unknown = JSON.parse(line);
    return isJournalEvent(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function redactRecord(payload: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(payload)) {
    result[k] = redactPayload(v, k);
  }
  return result;
}
