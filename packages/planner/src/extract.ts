import type { PlanDocument } from "@plansmith/schemas";

const MAX_RESPONSE_SIZE = 500_000;

/**
 * Pulls the JSON object out of a free-text model response: the span from the
 * first `{` to the last `}`. Fails closed: anything that does not parse to a
 * plain object yields null.
 */
export function extractJsonObject(text: string): PlanDocument | null {
  if (text.length > MAX_RESPONSE_SIZE) return null;
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
  return isPlainObject(parsed) ? parsed : null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
