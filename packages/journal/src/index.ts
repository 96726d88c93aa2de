export { Journal } from "./journal.js";
export type { JournalOptions, JournalListener, SessionSummary } from "./journal.js";
export { redactPayload, REDACTED } from "./redact.js";
