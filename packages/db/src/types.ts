/**
 * Database Types
 * Research run and activity event tables
 */

// ============================================================
// STATUS TYPES
// ============================================================

export type RunStatus = "running" | "completed" | "degraded" | "failed";

export type RunMode = "autonomous" | "urls";

export type EventLevel = "debug" | "info" | "warn" | "error";

export type StageStatus = "info" | "success" | "warning" | "error";

// ============================================================
// EVENT TYPES
// ============================================================

export const EventTypes = {
  // Run lifecycle
  RUN_STARTED: "run.started",
  RUN_COMPLETED: "run.completed",
  RUN_FAILED: "run.failed",

  // Stage activity
  STAGE_INFO: "stage.info",
  STAGE_SUCCESS: "stage.success",
  STAGE_WARNING: "stage.warning",
  STAGE_ERROR: "stage.error",
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

// ============================================================
// ROW TYPES (what you get from database)
// ============================================================

export interface ResearchRun {
  id: string;
  query: string;
  mode: RunMode;
  status: RunStatus;
  company_name: string | null;
  ticker: string | null;
  candidate_urls: string[];
  documents_loaded: number;
  trusted_sources: number;
  confidence_score: number | null;
  report: Record<string, unknown> | null;
  report_title: string | null;
  error_message: string | null;
  started_at: string;
  completed_at: string | null;
  duration_ms: number | null;
  created_at: string;
}

/**
 * One row of the `events` table: a run lifecycle step or a stage's activity
 */
export interface EventRow {
  run_id: string;
  event_type: EventType;
  level: EventLevel;
  /** Null for run lifecycle rows */
  stage: string | null;
  message: string;
  details: string | null;
  payload: Record<string, unknown>;
  timestamp: string;
}

// ============================================================
// INSERT / UPDATE TYPES
// ============================================================

export interface ResearchRunInsert {
  id: string;
  query: string;
  mode: RunMode;
  status?: RunStatus;
  started_at?: string;
}

export interface ResearchRunUpdate {
  status?: RunStatus;
  company_name?: string | null;
  ticker?: string | null;
  candidate_urls?: string[];
  documents_loaded?: number;
  trusted_sources?: number;
  confidence_score?: number | null;
  report?: Record<string, unknown> | null;
  report_title?: string | null;
  error_message?: string | null;
  completed_at?: string | null;
  duration_ms?: number | null;
}

// ============================================================
// EVENT INPUTS
// ============================================================

/**
 * Stage activity as the pipeline reports it
 */
export interface StageEvent {
  runId: string;
  stage: string;
  status: StageStatus;
  action: string;
  details?: string;
  timestamp: string;
}

export interface RunSummary {
  status: Extract<RunStatus, "completed" | "degraded">;
  confidence: number;
  documents: number;
}
