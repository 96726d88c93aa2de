import type { JournalEventType } from "@plansmith/schemas";

/**
 * Observer for planner-side outcomes. The kernel forwards these to the
 * journal; a returned promise is awaited so events stay in order.
 */
export type PlannerEventHook = (
  type: JournalEventType,
  payload: Record<string, unknown>
) => void | Promise<void>;
