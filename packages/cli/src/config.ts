import { DEFAULT_MAX_ATTEMPTS, DEFAULT_REQUEST_TIMEOUT_MS, defaultMaxSteps, minLoopSteps } from "@plansmith/kernel";

export const PROVIDERS = ["mock", "groq", "openai", "claude", "gemini"] as const;
export type ProviderName = (typeof PROVIDERS)[number];

export const DEFAULT_JOURNAL_PATH = "journal/events.jsonl";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface ProviderCredentials {
  groqApiKey?: string;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  anthropicApiKey?: string;
  googleApiKey?: string;
}

export interface PlansmithConfig {
  planner: ProviderName;
  /** Undefined means the provider's default model. */
  model?: string;
  maxAttempts: number;
  maxSteps: number;
  requestTimeoutMs: number;
  useWebResearch: boolean;
  journalPath: string;
  tavilyApiKey?: string;
  credentials: ProviderCredentials;
}

/** Values taken from CLI flags; each wins over its environment variable. */
export interface ConfigOverrides {
  planner?: string;
  model?: string;
  baseUrl?: string;
  maxAttempts?: string;
  web?: boolean;
  journal?: string;
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((p) => p === value);
}

function parseProvider(value: string, source: string): ProviderName {
  const name = value.trim().toLowerCase();
  if (!isProviderName(name)) {
    throw new ConfigError(`Invalid ${source}: "${value}" (expected one of ${PROVIDERS.join(", ")})`);
  }
  return name;
}

function parseCount(value: string | undefined, source: string, fallback: number, min: number): number {
  const raw = nonEmpty(value);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) < min) {
    throw new ConfigError(`Invalid ${source}: "${value}" (must be an integer >= ${min})`);
  }
  return Number(raw);
}

function parseFlag(value: string | undefined, source: string, fallback: boolean): boolean {
  const raw = nonEmpty(value)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["true", "1", "yes", "on"].includes(raw)) return true;
  if (["false", "0", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`Invalid ${source}: "${value}" (expected true or false)`);
}

function defaultProvider(env: Env): ProviderName {
  if (nonEmpty(env.GROQ_API_KEY)) return "groq";
  if (nonEmpty(env.ANTHROPIC_API_KEY)) return "claude";
  return "mock";
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): PlansmithConfig {
  const plannerFlag = nonEmpty(overrides.planner);
  const plannerEnv = nonEmpty(env.PLANSMITH_PLANNER);
  const planner = plannerFlag
    ? parseProvider(plannerFlag, "--planner")
    : plannerEnv
      ? parseProvider(plannerEnv, "PLANSMITH_PLANNER")
      : defaultProvider(env);

  const maxAttempts = overrides.maxAttempts !== undefined
    ? parseCount(overrides.maxAttempts, "--max-attempts", DEFAULT_MAX_ATTEMPTS, 0)
    : parseCount(env.PLANSMITH_MAX_ATTEMPTS, "PLANSMITH_MAX_ATTEMPTS", DEFAULT_MAX_ATTEMPTS, 0);

  const maxSteps = parseCount(env.PLANSMITH_MAX_STEPS, "PLANSMITH_MAX_STEPS", defaultMaxSteps(maxAttempts), 1);
  if (maxSteps < minLoopSteps(maxAttempts)) {
    throw new ConfigError(
      `Invalid PLANSMITH_MAX_STEPS: "${maxSteps}" (must be >= ${minLoopSteps(maxAttempts)} for a refinement ceiling of ${maxAttempts})`
    );
  }

  const useWebResearch = parseFlag(env.PLANSMITH_USE_WEB_RESEARCH, "PLANSMITH_USE_WEB_RESEARCH", true);

  return {
    planner,
    model: nonEmpty(overrides.model) ?? nonEmpty(env.PLANSMITH_MODEL),
    maxAttempts,
    maxSteps,
    // 0 turns the model request timeout off
    requestTimeoutMs: parseCount(env.PLANSMITH_TIMEOUT_MS, "PLANSMITH_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, 0),
    // --no-web can only switch research off
    useWebResearch: overrides.web === false ? false : useWebResearch,
    journalPath: nonEmpty(overrides.journal) ?? nonEmpty(env.PLANSMITH_JOURNAL_PATH) ?? DEFAULT_JOURNAL_PATH,
    tavilyApiKey: nonEmpty(env.TAVILY_API_KEY),
    credentials: {
      groqApiKey: nonEmpty(env.GROQ_API_KEY),
      openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
      openaiBaseUrl: nonEmpty(overrides.baseUrl) ?? nonEmpty(env.OPENAI_BASE_URL),
      anthropicApiKey: nonEmpty(env.ANTHROPIC_API_KEY),
      googleApiKey: nonEmpty(env.GOOGLE_API_KEY),
    },
  };
}
