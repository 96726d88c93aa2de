import AjvModule, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { JournalEventSchema } from "./journal-event.schema.js";
import { ResearchSchema } from "./research.schema.js";
import type { JournalEvent, Research } from "./types.js";

// Both packages are CommonJS with a nested .default under NodeNext interop.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validateJournalEvent: ValidateFunction<JournalEvent> = ajv.compile<JournalEvent>(JournalEventSchema);
const validateResearch: ValidateFunction<Research> = ajv.compile<Research>(ResearchSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}

export function validateResearchData(data: unknown): ValidationResult {
  const valid = validateResearch(data);
  return toResult(valid, validateResearch.errors);
}

/** Type guard over the same schema, for callers that keep the parsed value. */
export function isResearch(data: unknown): data is Research {
  return validateResearch(data);
}

export function isJournalEvent(data: unknown): data is JournalEvent {
  return validateJournalEvent(data);
}
