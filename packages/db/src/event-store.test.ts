import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logger } from "@equisight/core";

const mocks = vi.hoisted(() => ({
  configured: true,
  insert: vi.fn(),
}));

vi.mock("./supabase.js", () => ({
  isSupabaseConfigured: () => mocks.configured,
  getSupabase: () => ({
    from: (table: string) => ({
      insert: (rows: unknown) => mocks.insert(table, rows),
    }),
  }),
}));

import {
  flushEvents,
  pendingEvents,
  recordRunCompleted,
  recordRunFailed,
  recordRunStarted,
  recordStageEvent,
} from "./event-store.js";

const at = "2024-10-24T12:00:00.000Z";

describe("event store", () => {
  beforeEach(() => {
    mocks.configured = true;
    mocks.insert.mockReset();
    mocks.insert.mockResolvedValue({ error: null });
    logger.silenceConsole();
  });

  afterEach(async () => {
    await flushEvents();
    logger.resetHandlers();
  });

  it("should ignore events when Supabase is not configured", () => {
    mocks.configured = false;

    recordRunStarted("run-1", "Tesla", "autonomous");

    expect(pendingEvents()).toBe(0);
  });

  it("should write stage events as one batch", async () => {
    recordStageEvent({
      runId: "run-1",
      stage: "fetcher",
      status: "warning",
      action: "Failed to load URL",
      details: "timeout",
      timestamp: at,
    });
    recordStageEvent({ runId: "run-1", stage: "fetcher", status: "success", action: "Loaded", timestamp: at });

    expect(pendingEvents()).toBe(2);
    await flushEvents();

    expect(pendingEvents()).toBe(0);
    expect(mocks.insert).toHaveBeenCalledTimes(1);

    const [table, rows] = mocks.insert.mock.calls[0] ?? [];
    expect(table).toBe("events");
    expect(rows).toEqual([
      {
        run_id: "run-1",
        event_type: "stage.warning",
        level: "warn",
        stage: "fetcher",
        message: "Failed to load URL",
        details: "timeout",
        payload: {},
        timestamp: at,
      },
      {
        run_id: "run-1",
        event_type: "stage.success",
        level: "info",
        stage: "fetcher",
        message: "Loaded",
        details: null,
        payload: {},
        timestamp: at,
      },
    ]);
  });

  it("should retry a failed batch", async () => {
    mocks.insert
      .mockResolvedValueOnce({ error: { message: "unavailable" } })
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce({ error: null });

    recordRunStarted("run-2", "Tesla", "urls");
    await flushEvents();

    expect(mocks.insert).toHaveBeenCalledTimes(3);
    const [, rows] = mocks.insert.mock.calls[2] ?? [];
    expect(rows).toEqual([
      expect.objectContaining({
        run_id: "run-2",
        event_type: "run.started",
        stage: null,
        payload: { query: "Tesla", mode: "urls" },
      }),
    ]);
  });

  it("should drop a batch that keeps failing and keep accepting events", async () => {
    mocks.insert.mockResolvedValue({ error: { message: "unavailable" } });

    recordRunStarted("run-3", "Tesla", "autonomous");
    await flushEvents();
    expect(mocks.insert).toHaveBeenCalledTimes(3);

    mocks.insert.mockResolvedValue({ error: null });
    recordRunCompleted("run-3", { status: "degraded", confidence: 0, documents: 0 });
    await flushEvents();

    expect(mocks.insert).toHaveBeenCalledTimes(4);
    const [, rows] = mocks.insert.mock.calls[3] ?? [];
    expect(rows).toEqual([
      expect.objectContaining({
        event_type: "run.completed",
        level: "warn",
        message: "Research run degraded",
        payload: { status: "degraded", confidence: 0, documents: 0 },
      }),
    ]);
  });

  it("should record run failures at error level", async () => {
    recordRunFailed("run-4", "SYNTHESIS_ERROR", "model unavailable");
    await flushEvents();

    const [, rows] = mocks.insert.mock.calls[0] ?? [];
    expect(rows).toEqual([
      expect.objectContaining({
        run_id: "run-4",
        event_type: "run.failed",
        level: "error",
        message: "Research run failed: model unavailable",
        payload: { error_code: "SYNTHESIS_ERROR", error_message: "model unavailable" },
      }),
    ]);
  });

  it("should flush on its own once a full batch builds up", async () => {
    for (let i = 0; i < 50; i++) {
      recordStageEvent({ runId: "run-5", stage: "fetcher", status: "info", action: `Loading ${i}`, timestamp: at });
    }

    expect(pendingEvents()).toBe(0);
    await flushEvents();

    expect(mocks.insert).toHaveBeenCalledTimes(1);
    const [, rows] = mocks.insert.mock.calls[0] ?? [];
    expect(rows).toHaveLength(50);
  });
});
