import type Anthropic from "@anthropic-ai/sdk";
import type OpenAI from "openai";
import type { GoogleGenAI } from "@google/genai";
import type { ModelCallFn, ModelCallResult } from "@plansmith/schemas";
import { createMockModelCall } from "@plansmith/planner";
import { ConfigError } from "./config.js";
import type { PlansmithConfig, ProviderName } from "./config.js";

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 500;
const TEMPERATURE = 0.2;
const MAX_OUTPUT_TOKENS = 4096;

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

export const PROVIDER_DEFAULTS: Record<ProviderName, string> = {
  mock: "mock",
  groq: "llama-3.1-8b-instant",
  openai: "gpt-4o-mini",
  claude: "claude-sonnet-4-5",
  gemini: "gemini-2.5-flash",
};

export function isTransientError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  // Network errors
  if (msg.includes("econnreset") || msg.includes("econnrefused") || msg.includes("etimedout") || msg.includes("fetch failed") || msg.includes("socket hang up")) return true;
  // HTTP 5xx or 429 from SDK errors
  if ("status" in err && typeof err.status === "number") {
    if (err.status === 429 || err.status >= 500) return true;
  }
  return false;
}

export async function withRetry<T>(fn: () => Promise<T>, baseDelayMs = BASE_DELAY_MS): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt < MAX_RETRIES && isTransientError(err)) {
        const delay = baseDelayMs * Math.pow(2, attempt) * (0.5 + Math.random() * 0.5);
        await new Promise((r) => setTimeout(r, delay));
        continue;
      }
      throw err;
    }
  }
  throw lastError;
}

export function resolveModel(provider: ProviderName, model?: string): string {
  return model ?? PROVIDER_DEFAULTS[provider];
}

function requireKey(key: string | undefined, variable: string, provider: ProviderName): string {
  if (!key) {
    throw new ConfigError(`${variable} environment variable is required for the ${provider} planner.`);
  }
  return key;
}

function usageOf(model: string, input: number, output: number): ModelCallResult["usage"] {
  return { input_tokens: input, output_tokens: output, total_tokens: input + output, model };
}

interface AdapterOptions {
  retryBaseDelayMs?: number;
}

function createClaudeCallFn(model: string, apiKey: string, opts: AdapterOptions): ModelCallFn {
  // Cache client across calls for HTTP connection pooling; clear on failure so next call retries
  let clientPromise: Promise<Anthropic> | null = null;

  return async (systemPrompt, userPrompt) => {
    if (!clientPromise) {
      clientPromise = import("@anthropic-ai/sdk")
        .then(({ default: AnthropicClient }) => new AnthropicClient({ apiKey }))
        .catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    return withRetry(async () => {
      const response = await client.messages.create({
        model,
        max_tokens: MAX_OUTPUT_TOKENS,
        temperature: TEMPERATURE,
        system: systemPrompt,
        messages: [{ role: "user", content: userPrompt }],
      });
      const text = response.content.map((block) => (block.type === "text" ? block.text : "")).join("");
      return {
        text,
        usage: usageOf(model, response.usage.input_tokens, response.usage.output_tokens),
      };
    }, opts.retryBaseDelayMs);
  };
}

/** OpenAI chat completions; also serves Groq and any OpenAI-compatible endpoint. */
function createOpenAICallFn(model: string, apiKey: string, baseURL: string | undefined, opts: AdapterOptions): ModelCallFn {
  let clientPromise: Promise<OpenAI> | null = null;

  return async (systemPrompt, userPrompt) => {
    if (!clientPromise) {
      clientPromise = import("openai")
        .then(({ default: OpenAIClient }) => new OpenAIClient({ apiKey, ...(baseURL ? { baseURL } : {}) }))
        .catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    return withRetry(async () => {
      const response = await client.chat.completions.create({
        model,
        temperature: TEMPERATURE,
        max_tokens: MAX_OUTPUT_TOKENS,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
      });
      const text = response.choices[0]?.message.content ?? "";
      const input = response.usage?.prompt_tokens ?? 0;
      const output = response.usage?.completion_tokens ?? 0;
      return { text, usage: usageOf(model, input, output) };
    }, opts.retryBaseDelayMs);
  };
}

function createGeminiCallFn(model: string, apiKey: string, opts: AdapterOptions): ModelCallFn {
  let clientPromise: Promise<GoogleGenAI> | null = null;

  return async (systemPrompt, userPrompt) => {
    if (!clientPromise) {
      clientPromise = import("@google/genai")
        .then(({ GoogleGenAI: GeminiClient }) => new GeminiClient({ apiKey }))
        .catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    return withRetry(async () => {
      const response = await client.models.generateContent({
        model,
        contents: [{ role: "user", parts: [{ text: userPrompt }] }],
        config: {
          systemInstruction: systemPrompt,
          temperature: TEMPERATURE,
          maxOutputTokens: MAX_OUTPUT_TOKENS,
        },
      });
      const promptTokens = response.usageMetadata?.promptTokenCount ?? 0;
      const candidatesTokens = response.usageMetadata?.candidatesTokenCount ?? 0;
      return { text: response.text ?? "", usage: usageOf(model, promptTokens, candidatesTokens) };
    }, opts.retryBaseDelayMs);
  };
}

/**
 * Build the generation capability for the configured provider. Missing
 * credentials fail here, before any session is created.
 */
export function createModelCall(
  config: Pick<PlansmithConfig, "planner" | "model" | "credentials">,
  opts: AdapterOptions = {}
): ModelCallFn {
  const provider = config.planner;
  const model = resolveModel(provider, config.model);
  const creds = config.credentials;

  switch (provider) {
    case "mock":
      return createMockModelCall(model);
    case "groq":
      return createOpenAICallFn(model, requireKey(creds.groqApiKey, "GROQ_API_KEY", provider), GROQ_BASE_URL, opts);
    case "openai": {
      // A custom base URL (e.g. a local server) may not need a key
      const baseURL = creds.openaiBaseUrl;
      const apiKey = baseURL ? (creds.openaiApiKey ?? "not-needed") : requireKey(creds.openaiApiKey, "OPENAI_API_KEY", provider);
      return createOpenAICallFn(model, apiKey, baseURL, opts);
    }
    case "claude":
      return createClaudeCallFn(model, requireKey(creds.anthropicApiKey, "ANTHROPIC_API_KEY", provider), opts);
    case "gemini":
      return createGeminiCallFn(model, requireKey(creds.googleApiKey, "GOOGLE_API_KEY", provider), opts);
  }
}
