import type { ModelCallFn } from "./types.js";

/**
 * Races a promise against a timeout. Rejects with a TimeoutError if the
 * timeout fires first. The timer is always cleaned up.
 */
export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = "Operation",
): Promise<T> {
  if (ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
    timer.unref();
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/**
 * Wraps a model call so that every request is bounded by `ms`. A timeout
 * surfaces as a rejection, i.e. as a transport failure of the provider.
 */
export function withRequestTimeout(callModel: ModelCallFn, ms: number): ModelCallFn {
  if (ms <= 0) return callModel;
  return (systemPrompt, userPrompt) =>
    withTimeout(callModel(systemPrompt, userPrompt), ms, "Model request");
}
