/**
 * Event Store
 * Buffers run lifecycle and stage activity rows and writes them to `events` in batches
 */

import { errorMessage, logger } from "@equisight/core";
import { getSupabase, isSupabaseConfigured } from "./supabase.js";
import {
  EventTypes,
  type EventLevel,
  type EventRow,
  type EventType,
  type RunMode,
  type RunSummary,
  type StageEvent,
  type StageStatus,
} from "./types.js";

const BATCH_SIZE = 50;
const MAX_ATTEMPTS = 3;
const RETRY_DELAY_MS = 100;

const log = logger.child({ component: "event-store" });

const STAGE_ROWS: Record<StageStatus, { type: EventType; level: EventLevel }> = {
  info: { type: EventTypes.STAGE_INFO, level: "info" },
  success: { type: EventTypes.STAGE_SUCCESS, level: "info" },
  warning: { type: EventTypes.STAGE_WARNING, level: "warn" },
  error: { type: EventTypes.STAGE_ERROR, level: "error" },
};

// ============================================================
// BUFFER
// ============================================================

/**
 * Rows wait for an explicit flush unless a full batch builds up.
 * Writes are chained, so batches land in the order they were taken.
 */
class RunEventBuffer {
  private rows: EventRow[] = [];
  private writing: Promise<void> = Promise.resolve();

  get pending(): number {
    return this.rows.length;
  }

  push(row: EventRow): void {
    this.rows.push(row);
    if (this.rows.length >= BATCH_SIZE) {
      this.flush().catch((error) => log.error("Event flush failed", error));
    }
  }

  flush(): Promise<void> {
    const batch = this.rows.splice(0);
    if (batch.length > 0) {
      this.writing = this.writing.then(() => writeBatch(batch));
    }
    return this.writing;
  }
}

/**
 * Insert one batch, backing off between attempts. A batch that keeps failing is dropped.
 */
async function writeBatch(batch: EventRow[]): Promise<void> {
  let lastError = "";

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    try {
      const { error } = await getSupabase().from("events").insert(batch);
      if (!error) return;
      lastError = error.message;
    } catch (error) {
      lastError = errorMessage(error);
    }

    if (attempt < MAX_ATTEMPTS) {
      await new Promise((resolve) => setTimeout(resolve, RETRY_DELAY_MS * 2 ** (attempt - 1)));
    }
  }

  log.warn("Dropping event batch", {
    events: batch.length,
    runIds: [...new Set(batch.map((row) => row.run_id))],
    error: lastError,
  });
}

const buffer = new RunEventBuffer();

function push(row: EventRow): void {
  if (!isSupabaseConfigured()) return;
  buffer.push(row);
}

function runRow(
  runId: string,
  type: EventType,
  message: string,
  payload: Record<string, unknown>,
  level: EventLevel = "info"
): EventRow {
  return {
    run_id: runId,
    event_type: type,
    level,
    stage: null,
    message,
    details: null,
    payload,
    timestamp: new Date().toISOString(),
  };
}

// ============================================================
// PUBLIC API
// ============================================================

export function recordStageEvent(event: StageEvent): void {
  const { type, level } = STAGE_ROWS[event.status];

  push({
    run_id: event.runId,
    event_type: type,
    level,
    stage: event.stage,
    message: event.action,
    details: event.details ?? null,
    payload: {},
    timestamp: event.timestamp,
  });
}

export function recordRunStarted(runId: string, query: string, mode: RunMode): void {
  push(runRow(runId, EventTypes.RUN_STARTED, "Research run started", { query, mode }));
}

export function recordRunCompleted(runId: string, summary: RunSummary): void {
  push(
    runRow(
      runId,
      EventTypes.RUN_COMPLETED,
      `Research run ${summary.status}`,
      { ...summary },
      summary.status === "degraded" ? "warn" : "info"
    )
  );
}

export function recordRunFailed(runId: string, code: string, message: string): void {
  push(
    runRow(
      runId,
      EventTypes.RUN_FAILED,
      `Research run failed: ${message}`,
      { error_code: code, error_message: message },
      "error"
    )
  );
}

/**
 * Write everything buffered; resolves once earlier batches are written too
 */
export function flushEvents(): Promise<void> {
  return buffer.flush();
}

export function pendingEvents(): number {
  return buffer.pending;
}
