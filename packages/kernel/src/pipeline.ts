import { v4 as uuid } from "uuid";
import type {
  ModelCallFn,
  ModelPricing,
  PlanDocument,
  Research,
  SearchProvider,
  SearchResult,
  Session,
  SessionLimits,
  SessionStatus,
} from "@plansmith/schemas";
import { withRequestTimeout } from "@plansmith/schemas";
import type { Journal } from "@plansmith/journal";
import { PlanGenerator, PlanRefiner } from "@plansmith/planner";
import type { PlannerEventHook } from "@plansmith/planner";
import { ResearchStage, createEmptyResearch } from "@plansmith/research";
import { buildReport } from "@plansmith/reporter";
import { RefinementLoop, assertLoopLimits, defaultMaxSteps, DEFAULT_MAX_ATTEMPTS } from "./refinement-loop.js";
import { UsageAccumulator } from "./usage-accumulator.js";
import type { UsageSummary } from "./usage-accumulator.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 60000;

export interface PipelineConfig {
  journal: Journal;
  callModel: ModelCallFn;
  limits?: Partial<SessionLimits>;
  /** Research runs only when enabled and a provider is given. */
  useWebResearch?: boolean;
  searchProvider?: SearchProvider;
  summarizeSources?: boolean;
  modelPricing?: ModelPricing;
}

export interface PipelineOutcome {
  session_id: string;
  status: SessionStatus;
  task: string;
  plan: PlanDocument;
  validated: boolean;
  attempt_count: number;
  research: Research;
  sources: SearchResult[];
  report_markdown: string;
  logs: string[];
  usage: UsageSummary;
}

const VALID_TRANSITIONS: Record<SessionStatus, SessionStatus[]> = {
  created: ["planning", "failed"],
  planning: ["researching", "failed"],
  researching: ["reporting", "failed"],
  reporting: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function resolveLimits(limits?: Partial<SessionLimits>): SessionLimits {
  const maxAttempts = limits?.max_attempts ?? DEFAULT_MAX_ATTEMPTS;
  return {
    max_attempts: maxAttempts,
    max_steps: limits?.max_steps ?? defaultMaxSteps(maxAttempts),
    request_timeout_ms: limits?.request_timeout_ms ?? DEFAULT_REQUEST_TIMEOUT_MS,
  };
}

/**
 * One plan-research-report run per session. Stages run strictly in order;
 * a collaborator failure marks the session failed and is rethrown.
 */
export class Pipeline {
  private config: PipelineConfig;
  private session: Session | null = null;
  private usage: UsageAccumulator;
  private logs: string[] = [];
  private running = false;

  constructor(config: PipelineConfig) {
    this.config = config;
    this.usage = new UsageAccumulator(config.modelPricing);
  }

  async createSession(task: string): Promise<Session> {
    if (!task.trim()) throw new Error("Task text must not be empty");
    const now = new Date().toISOString();
    const session: Session = {
      session_id: uuid(),
      status: "created",
      task,
      limits: resolveLimits(this.config.limits),
      created_at: now,
      updated_at: now,
    };
    assertLoopLimits(session.limits.max_attempts, session.limits.max_steps);
    this.session = session;
    // Logs and usage are per session
    this.logs = [];
    this.usage = new UsageAccumulator(this.config.modelPricing);
    await this.config.journal.emit(session.session_id, "session.created", {
      task,
      limits: { ...session.limits },
    });
    return session;
  }

  getSession(): Session | null {
    return this.session;
  }

  async run(): Promise<PipelineOutcome> {
    const session = this.session;
    if (!session) throw new Error("No session created. Call createSession first.");
    if (this.running) throw new Error("Pipeline is already running. Concurrent run() calls are not allowed.");
    this.running = true;

    const emit: PlannerEventHook = async (type, payload) => {
      await this.config.journal.emit(session.session_id, type, payload);
    };
    const callModel = this.recordingModelCall(
      withRequestTimeout(this.config.callModel, session.limits.request_timeout_ms),
      session.session_id
    );

    try {
      this.transition("planning");
      await emit("session.started", {});
      this.log("Planner: creating detailed timeline, workstreams, and risks.");
      const loop = new RefinementLoop({
        generator: new PlanGenerator(callModel, { onEvent: emit }),
        refiner: new PlanRefiner(callModel, { onEvent: emit }),
        maxAttempts: session.limits.max_attempts,
        maxSteps: session.limits.max_steps,
        onEvent: emit,
      });
      const outcome = await loop.run(session.task);
      this.logs.push(...outcome.violation_log);

      this.transition("researching");
      let research = createEmptyResearch();
      let sources: SearchResult[] = [];
      const useWeb = this.config.useWebResearch ?? true;
      if (useWeb && this.config.searchProvider) {
        this.log("Researcher: gathering web sources.");
        const stage = new ResearchStage(callModel, this.config.searchProvider, {
          summarize: this.config.summarizeSources ?? true,
          onEvent: emit,
        });
        ({ research, sources } = await stage.run(session.task, outcome.plan));
        this.log(`Researcher: synthesised findings from ${sources.length} source(s).`);
      } else {
        const reason = useWeb ? "no search provider configured" : "web research disabled";
        this.log(`Researcher: skipped (${reason}).`);
        await emit("research.skipped", { reason });
      }

      this.transition("reporting");
      this.log("Reporter: compiling final report with citations (Markdown).");
      await emit("report.started", { sources: sources.length });
      const report = await buildReport(callModel, { plan: outcome.plan, research, sources });
      await emit("report.completed", { chars: report.length });
      this.log("Reporter: report assembled.");

      this.transition("completed");
      const usage = this.usage.getSummary();
      await emit("session.completed", {
        validated: outcome.validated,
        attempt_count: outcome.attempt_count,
        usage: { ...usage },
      });

      return {
        session_id: session.session_id,
        status: session.status,
        task: session.task,
        plan: outcome.plan,
        validated: outcome.validated,
        attempt_count: outcome.attempt_count,
        research,
        sources,
        report_markdown: report,
        logs: [...this.logs],
        usage,
      };
    } catch (err) {
      if (session.status !== "failed" && session.status !== "completed") {
        this.transition("failed");
        await this.config.journal.tryEmit(session.session_id, "session.failed", {
          error: err instanceof Error ? err.message : String(err),
          error_name: err instanceof Error ? err.name : "Error",
        });
      }
      throw err;
    } finally {
      this.running = false;
    }
  }

  private recordingModelCall(callModel: ModelCallFn, sessionId: string): ModelCallFn {
    return async (systemPrompt, userPrompt) => {
      const result = await callModel(systemPrompt, userPrompt);
      if (result.usage) {
        this.usage.record(result.usage);
        await this.config.journal.emit(sessionId, "usage.recorded", { ...result.usage });
      }
      return result;
    };
  }

  private log(line: string): void {
    this.logs.push(line);
  }

  private transition(newStatus: SessionStatus): void {
    if (!this.session) throw new Error("No active session");
    const allowed = VALID_TRANSITIONS[this.session.status];
    if (!allowed.includes(newStatus)) {
      throw new Error(`Invalid session transition: ${this.session.status} → ${newStatus}`);
    }
    this.session.status = newStatus;
    this.session.updated_at = new Date().toISOString();
  }
}
