import { describe, it, expect } from "vitest";
import { loadConfig, ConfigError, isProviderName } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      planner: "mock",
      maxAttempts: 3,
      maxSteps: 20,
      requestTimeoutMs: 60000,
      useWebResearch: true,
      journalPath: "journal/events.jsonl",
      credentials: {},
    });
  });

  it("picks the provider from the available credentials", () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: "test-key" }).planner).toBe("claude");
    expect(loadConfig({ GROQ_API_KEY: "test-key", ANTHROPIC_API_KEY: "test-key" }).planner).toBe("groq");
    expect(loadConfig({ GROQ_API_KEY: "   " }).planner).toBe("mock");
  });

  it("reads the provider from PLANSMITH_PLANNER, case-insensitively", () => {
    expect(loadConfig({ PLANSMITH_PLANNER: " Gemini ", GROQ_API_KEY: "test-key" }).planner).toBe("gemini");
  });

  it("lets flags override the environment", () => {
    const config = loadConfig(
      { PLANSMITH_PLANNER: "claude", PLANSMITH_MODEL: "env-model", PLANSMITH_MAX_ATTEMPTS: "5", OPENAI_BASE_URL: "http://env" },
      { planner: "openai", model: "flag-model", maxAttempts: "1", baseUrl: "http://localhost:11434/v1", journal: "tmp/j.jsonl" }
    );
    expect(config).toMatchObject({
      planner: "openai",
      model: "flag-model",
      maxAttempts: 1,
      journalPath: "tmp/j.jsonl",
      credentials: { openaiBaseUrl: "http://localhost:11434/v1" },
    });
  });

  it("sizes the step ceiling to the refinement ceiling", () => {
    expect(loadConfig({}, { maxAttempts: "10" })).toMatchObject({ maxAttempts: 10, maxSteps: 26 });
    expect(loadConfig({ PLANSMITH_MAX_STEPS: "22" }, { maxAttempts: "10" }).maxSteps).toBe(22);
    expect(() => loadConfig({ PLANSMITH_MAX_STEPS: "20" }, { maxAttempts: "10" })).toThrow(
      'Invalid PLANSMITH_MAX_STEPS: "20" (must be >= 22 for a refinement ceiling of 10)'
    );
  });

  it("lets a zero timeout switch the request timeout off", () => {
    expect(loadConfig({ PLANSMITH_TIMEOUT_MS: "0" }).requestTimeoutMs).toBe(0);
  });

  it("accepts a zero refinement ceiling", () => {
    expect(loadConfig({ PLANSMITH_MAX_ATTEMPTS: "0" }).maxAttempts).toBe(0);
  });

  it("names the variable in numeric errors", () => {
    expect(() => loadConfig({ PLANSMITH_MAX_ATTEMPTS: "abc" })).toThrow(
      'Invalid PLANSMITH_MAX_ATTEMPTS: "abc" (must be an integer >= 0)'
    );
    expect(() => loadConfig({ PLANSMITH_MAX_STEPS: "0" })).toThrow(
      'Invalid PLANSMITH_MAX_STEPS: "0" (must be an integer >= 1)'
    );
    expect(() => loadConfig({}, { maxAttempts: "-2" })).toThrow(ConfigError);
  });

  it("rejects unknown providers", () => {
    expect(() => loadConfig({}, { planner: "llama" })).toThrow(
      'Invalid --planner: "llama" (expected one of mock, groq, openai, claude, gemini)'
    );
  });

  it("parses the web research switch", () => {
    expect(loadConfig({ PLANSMITH_USE_WEB_RESEARCH: "false" }).useWebResearch).toBe(false);
    expect(loadConfig({ PLANSMITH_USE_WEB_RESEARCH: "1" }).useWebResearch).toBe(true);
    expect(loadConfig({}, { web: false }).useWebResearch).toBe(false);
    expect(() => loadConfig({ PLANSMITH_USE_WEB_RESEARCH: "maybe" })).toThrow(ConfigError);
  });

  it("collects credentials and the search key", () => {
    const config = loadConfig({ TAVILY_API_KEY: "test-tavily", GOOGLE_API_KEY: "test-google" });
    expect(config.tavilyApiKey).toBe("test-tavily");
    expect(config.credentials.googleApiKey).toBe("test-google");
  });
});

describe("isProviderName", () => {
  it("narrows known providers", () => {
    expect(isProviderName("groq")).toBe(true);
    expect(isProviderName("grok")).toBe(false);
  });
});
