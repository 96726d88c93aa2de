const SENSITIVE_KEYS = /^(authorization|password|secret|token|api[_-]?key|credential|private[_-]?key|access[_-]?token|client[_-]?secret)$/i;
const SENSITIVE_VALUES = /Bearer\s|sk-ant-|sk-proj-|sk-[A-Za-z0-9]{20,}|gsk_[A-Za-z0-9]{20,}|tvly-[A-Za-z0-9]{10,}|xai-[A-Za-z0-9]{20,}|AIza[A-Za-z0-9_-]{35}|ghp_|github_pat_/;

export const REDACTED = "[REDACTED]";

/**
 * Replaces credential-looking values before they reach the journal. Plans
 * and reports are free text from a model and from fetched pages, so
 * values are scanned as well as keys.
 */
export function redactPayload(value: unknown, key?: string): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") {
    if (key !== undefined && SENSITIVE_KEYS.test(key)) return REDACTED;
    return SENSITIVE_VALUES.test(value) ? REDACTED : value;
  }
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((item) => redactPayload(item));
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    result[k] = redactPayload(v, k);
  }
  return result;
}
