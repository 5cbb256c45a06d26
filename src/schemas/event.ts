import { z } from "zod";

/** Event types emitted around a drift comparison run. */
export const EventType = z.enum([
  "drift.run.started",
  "drift.run.completed",
  "drift.run.failed",
  "drift.diagnostic",
  "drift.report.written",
]);
export type EventType = z.infer<typeof EventType>;

/**
 * Event log entry: one JSON line in `<eventsDir>/YYYY-MM-DD.jsonl`.
 */
export const BaseEvent = z.object({
  /** Monotonic per-logger sequence number. */
  eventId: z.number().int().positive(),
  type: EventType,
  /** ISO-8601 timestamp. */
  timestamp: z.string().datetime(),
  /** Component that emitted the event (e.g. `cli`, `engine`). */
  actor: z.string(),
  /** Correlates all events of one comparison run. */
  runId: z.string().optional(),
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;
