/**
 * Event logger: append-only JSONL audit trail of drift runs.
 *
 * Events go to date-rotated files (`<eventsDir>/YYYY-MM-DD.jsonl`);
 * `events.jsonl` is a symlink to the current day's file.
 */

import { appendFile, mkdir, readlink, symlink, unlink } from "node:fs/promises";
import { join } from "node:path";
import type { Diagnostic } from "../drift/diagnostics.js";
import type { BaseEvent, EventType } from "../schemas/event.js";

export type EventCallback = (event: BaseEvent) => void;

export interface EventLoggerOptions {
  /** Called synchronously after each event is written. */
  onEvent?: EventCallback;
  /** Clock override (tests). */
  now?: () => Date;
}

export interface LogOptions {
  runId?: string;
  payload?: Record<string, unknown>;
}

export class EventLogger {
  private eventId = 0;
  private currentDate: string | undefined;
  private pending: Promise<unknown> = Promise.resolve();
  private readonly onEvent?: EventCallback;
  private readonly now: () => Date;

  constructor(
    private readonly eventsDir: string,
    options: EventLoggerOptions = {},
  ) {
    this.onEvent = options.onEvent;
    this.now = options.now ?? (() => new Date());
  }

  /** Append one event. Writes are serialized so eventIds stay in file order. */
  async log(type: EventType, actor: string, opts: LogOptions = {}): Promise<BaseEvent> {
    const timestamp = this.now();
    const event: BaseEvent = {
      eventId: ++this.eventId,
      type,
      timestamp: timestamp.toISOString(),
      actor,
      ...(opts.runId !== undefined ? { runId: opts.runId } : {}),
      payload: opts.payload ?? {},
    };

    const write = this.pending.then(() => this.write(event, timestamp));
    this.pending = write.catch(() => undefined);
    await write;

    this.onEvent?.(event);
    return event;
  }

  async logRunStarted(runId: string, payload: { declared: number; live: number; policyVersion: string }): Promise<BaseEvent> {
    return this.log("drift.run.started", "engine", { runId, payload });
  }

  async logRunCompleted(
    runId: string,
    payload: { hasDrift: boolean; highestRisk?: string; totals: Record<string, number>; durationMs: number },
  ): Promise<BaseEvent> {
    return this.log("drift.run.completed", "engine", { runId, payload });
  }

  async logRunFailed(runId: string, error: string): Promise<BaseEvent> {
    return this.log("drift.run.failed", "engine", { runId, payload: { error } });
  }

  async logDiagnostic(runId: string, diagnostic: Diagnostic): Promise<BaseEvent> {
    return this.log("drift.diagnostic", "engine", { runId, payload: { ...diagnostic } });
  }

  async logReportWritten(runId: string, path: string): Promise<BaseEvent> {
    return this.log("drift.report.written", "cli", { runId, payload: { path } });
  }

  private async write(event: BaseEvent, at: Date): Promise<void> {
    const date = at.toISOString().slice(0, 10);
    const fileName = `${date}.jsonl`;

    await mkdir(this.eventsDir, { recursive: true });
    await appendFile(join(this.eventsDir, fileName), JSON.stringify(event) + "\n", "utf-8");

    if (this.currentDate !== date) {
      await this.pointSymlink(fileName);
      this.currentDate = date;
    }
  }

  private async pointSymlink(fileName: string): Promise<void> {
    const link = join(this.eventsDir, "events.jsonl");
    const target = await readlink(link).catch(() => undefined);
    if (target === fileName) return;
    if (target !== undefined) await unlink(link);
    await symlink(fileName, link);
  }
}
