/**
 * Tests for the drift run event logger.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EventLogger } from "../logger.js";
import { BaseEvent } from "../../schemas/event.js";
import { mkdtemp, readFile, readlink, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

async function readEvents(path: string): Promise<BaseEvent[]> {
  const content = await readFile(path, "utf-8");
  return content
    .trim()
    .split("\n")
    .map(line => BaseEvent.parse(JSON.parse(line)));
}

describe("EventLogger", () => {
  let eventsDir: string;
  let clock: Date;
  let logger: EventLogger;

  beforeEach(async () => {
    eventsDir = join(await mkdtemp(join(tmpdir(), "driftlens-events-")), "events");
    clock = new Date("2024-10-01T12:00:00.000Z");
    logger = new EventLogger(eventsDir, { now: () => clock });
  });

  afterEach(async () => {
    await rm(join(eventsDir, ".."), { recursive: true, force: true });
  });

  it("appends run lifecycle events to the day's file", async () => {
    await logger.logRunStarted("run-1", { declared: 2, live: 3, policyVersion: "test-1" });
    await logger.logRunCompleted("run-1", {
      hasDrift: true,
      highestRisk: "high",
      totals: { matched: 2 },
      durationMs: 5,
    });

    const events = await readEvents(join(eventsDir, "2024-10-01.jsonl"));
    expect(events.map(e => [e.eventId, e.type, e.actor, e.runId])).toEqual([
      [1, "drift.run.started", "engine", "run-1"],
      [2, "drift.run.completed", "engine", "run-1"],
    ]);
    expect(events[0]?.timestamp).toBe("2024-10-01T12:00:00.000Z");
    expect(events[0]?.payload).toEqual({ declared: 2, live: 3, policyVersion: "test-1" });
  });

  it("records diagnostics and failures with their payloads", async () => {
    await logger.logDiagnostic("run-2", {
      severity: "warning",
      code: "normalization",
      message: "storage_account 'data01' at 'tags': expected a mapping",
    });
    await logger.logRunFailed("run-2", "policy not found");

    const events = await readEvents(join(eventsDir, "events.jsonl"));
    expect(events[0]?.payload).toEqual({
      severity: "warning",
      code: "normalization",
      message: "storage_account 'data01' at 'tags': expected a mapping",
    });
    expect(events[1]?.payload).toEqual({ error: "policy not found" });
  });

  it("keeps event ids in file order under concurrent writes", async () => {
    await Promise.all(
      Array.from({ length: 10 }, (_, i) => logger.log("drift.report.written", "cli", { payload: { index: i } })),
    );

    const events = await readEvents(join(eventsDir, "2024-10-01.jsonl"));
    expect(events.map(e => e.eventId)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it("rotates files by date and moves the symlink", async () => {
    await logger.logReportWritten("run-3", "/tmp/report.json");
    clock = new Date("2024-10-02T00:00:01.000Z");
    await logger.logReportWritten("run-4", "/tmp/report.json");

    expect(await readlink(join(eventsDir, "events.jsonl"))).toBe("2024-10-02.jsonl");
    expect(await readEvents(join(eventsDir, "2024-10-01.jsonl"))).toHaveLength(1);
    expect((await readEvents(join(eventsDir, "2024-10-02.jsonl")))[0]?.runId).toBe("run-4");
  });

  it("notifies the callback after each write", async () => {
    const seen: string[] = [];
    const notifying = new EventLogger(eventsDir, { now: () => clock, onEvent: e => seen.push(e.type) });

    await notifying.logRunStarted("run-5", { declared: 0, live: 0, policyVersion: "test-1" });

    expect(seen).toEqual(["drift.run.started"]);
  });
});
