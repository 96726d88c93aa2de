import { Command, CommanderError } from "commander";
import { resolve } from "node:path";
import { withRequestTimeout } from "@plansmith/schemas";
import { Journal } from "@plansmith/journal";
import { PlanGenerator, PlanRefiner } from "@plansmith/planner";
import type { PlannerEventHook } from "@plansmith/planner";
import { Pipeline, RefinementLoop } from "@plansmith/kernel";
import { TavilySearchProvider } from "@plansmith/research";
import { loadConfig } from "./config.js";
import type { ConfigOverrides, PlansmithConfig } from "./config.js";
import { createModelCall } from "./llm-adapters.js";
import {
  formatEventLine,
  formatIntegrity,
  formatPlanOutcome,
  formatRunOutcome,
  formatSessionEvents,
  formatSessionList,
  red,
  yellow,
} from "./output.js";

export interface CliIO {
  write: (text: string) => void;
  writeError: (text: string) => void;
  env: Record<string, string | undefined>;
}

export const defaultIO: CliIO = {
  write: (text) => { process.stdout.write(text); },
  writeError: (text) => { process.stderr.write(text); },
  env: process.env,
};

interface ModelFlags {
  task: string;
  planner?: string;
  model?: string;
  baseUrl?: string;
  maxAttempts?: string;
}

interface RunFlags extends ModelFlags {
  web: boolean;
  journal?: string;
}

function toOverrides(opts: ModelFlags & Partial<Pick<RunFlags, "web" | "journal">>): ConfigOverrides {
  return {
    planner: opts.planner,
    model: opts.model,
    baseUrl: opts.baseUrl,
    maxAttempts: opts.maxAttempts,
    web: opts.web,
    journal: opts.journal,
  };
}

function addModelOptions(cmd: Command): Command {
  return cmd
    .requiredOption("-t, --task <text>", "Task description")
    .option("--planner <provider>", "Provider: mock, groq, openai, claude, gemini")
    .option("--model <name>", "Model name")
    .option("--base-url <url>", "Base URL for an OpenAI-compatible endpoint")
    .option("--max-attempts <n>", "Refinement ceiling");
}

function sessionLimits(config: PlansmithConfig) {
  return {
    max_attempts: config.maxAttempts,
    max_steps: config.maxSteps,
    request_timeout_ms: config.requestTimeoutMs,
  };
}

/**
 * Build the command tree. Actions report their exit status through
 * `setExitCode` rather than exiting, so the tree can run inside tests.
 */
export function createProgram(io: CliIO = defaultIO, setExitCode: (code: number) => void = () => {}): Command {
  const println = (text: string): void => io.write(`${text}\n`);
  const fail = (err: unknown): void => {
    io.writeError(`${red("Error:")} ${err instanceof Error ? err.message : String(err)}\n`);
    setExitCode(1);
  };

  const program = new Command();
  program
    .name("plansmith")
    .description("Generate, validate and refine project plans, then research and report on them")
    .version("0.1.0")
    .configureOutput({ writeOut: io.write, writeErr: io.writeError })
    .exitOverride();

  addModelOptions(program.command("run").description("Run the full plan, research and report pipeline"))
    .option("--no-web", "Skip the web research stage")
    .option("--journal <path>", "Journal file")
    .action(async (opts: RunFlags) => {
      try {
        const config = loadConfig(io.env, toOverrides(opts));
        const callModel = createModelCall(config);
        const journal = new Journal(resolve(config.journalPath));
        await journal.init();
        const unsubscribe = journal.on((event) => println(formatEventLine(event)));
        const removeShutdownHandler = journal.registerShutdownHandler();

        let sessionId: string | undefined;
        const searchProvider = config.tavilyApiKey
          ? new TavilySearchProvider({
              apiKey: config.tavilyApiKey,
              onFetchError: async (url, error) => {
                println(yellow(`Could not fetch ${url}: ${error.message}`));
                if (sessionId) await journal.tryEmit(sessionId, "research.fetch_failed", { url, error: error.message });
              },
            })
          : undefined;

        try {
          const pipeline = new Pipeline({
            journal,
            callModel,
            limits: sessionLimits(config),
            useWebResearch: config.useWebResearch,
            searchProvider,
          });
          sessionId = (await pipeline.createSession(opts.task)).session_id;
          const outcome = await pipeline.run();
          println("");
          println(formatRunOutcome(outcome));
        } finally {
          unsubscribe();
          removeShutdownHandler();
          await journal.close();
        }
      } catch (err) {
        fail(err);
      }
    });

  addModelOptions(program.command("plan").description("Run the refinement loop only and print the plan"))
    .action(async (opts: ModelFlags) => {
      try {
        const config = loadConfig(io.env, toOverrides(opts));
        const callModel = withRequestTimeout(createModelCall(config), config.requestTimeoutMs);
        const onEvent: PlannerEventHook = (type) => {
          println(formatEventLine({ timestamp: new Date().toISOString(), type }));
        };
        const loop = new RefinementLoop({
          generator: new PlanGenerator(callModel, { onEvent }),
          refiner: new PlanRefiner(callModel, { onEvent }),
          maxAttempts: config.maxAttempts,
          maxSteps: config.maxSteps,
          onEvent,
        });
        const outcome = await loop.run(opts.task);
        println("");
        println(formatPlanOutcome(outcome));
      } catch (err) {
        fail(err);
      }
    });

  const sessionCmd = program.command("session").description("Inspect sessions recorded in the journal");

  sessionCmd.command("ls").description("List sessions")
    .option("--journal <path>", "Journal file")
    .action(async (opts: { journal?: string }) => {
      try {
        const config = loadConfig(io.env, { journal: opts.journal });
        const journal = new Journal(resolve(config.journalPath), { recovery: "strict" });
        await journal.init();
        println(formatSessionList(journal.listSessions()));
      } catch (err) {
        fail(err);
      }
    });

  sessionCmd.command("show").description("Show a session's events and check journal integrity")
    .argument("<id>", "Session ID")
    .option("--journal <path>", "Journal file")
    .action(async (sessionId: string, opts: { journal?: string }) => {
      try {
        const config = loadConfig(io.env, { journal: opts.journal });
        const journal = new Journal(resolve(config.journalPath), { recovery: "strict" });
        // Checked before init, which would refuse a broken chain
        const integrity = await journal.verifyIntegrity();
        if (!integrity.valid) {
          println(formatIntegrity(integrity));
          setExitCode(1);
          return;
        }
        await journal.init();
        const events = journal.readSession(sessionId);
        if (events.length === 0) throw new Error(`Session not found: ${sessionId}`);
        println(formatSessionEvents(events));
        println(formatIntegrity(integrity));
      } catch (err) {
        fail(err);
      }
    });

  return program;
}

/** Parse and run one command line; resolves to the process exit code. */
export async function runCli(args: string[], io: CliIO = defaultIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => { exitCode = code; });
  try {
    await program.parseAsync(args, { from: "user" });
  } catch (err) {
    // Help and version also arrive here, with exit code 0
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
