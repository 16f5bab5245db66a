/**
 * Run Repository
 * CRUD operations for research_runs table
 */

import { logger } from "@equisight/core";
import { getSupabase, isSupabaseConfigured } from "../supabase.js";
import type {
  ResearchRun,
  ResearchRunInsert,
  ResearchRunUpdate,
  RunStatus,
} from "../types.js";

const log = logger.child({ component: "run-repo" });

export async function create(data: ResearchRunInsert): Promise<ResearchRun | null> {
  if (!isSupabaseConfigured()) return null;

  const supabase = getSupabase();
  const { data: run, error } = await supabase
    .from("research_runs")
    .insert({
      status: "running",
      started_at: new Date().toISOString(),
      ...data,
    })
    .select()
    .single();

  if (error) {
    log.warn("Create error", { runId: data.id, error: error.message });
    return null;
  }

  return run;
}

export async function update(id: string, data: ResearchRunUpdate): Promise<boolean> {
  if (!isSupabaseConfigured()) return false;

  const supabase = getSupabase();
  const { error } = await supabase
    .from("research_runs")
    .update(data)
    .eq("id", id);

  if (error) {
    log.warn("Update error", { runId: id, error: error.message });
    return false;
  }

  return true;
}

export async function complete(
  id: string,
  result: Omit<ResearchRunUpdate, "status" | "completed_at">,
  status: Extract<RunStatus, "completed" | "degraded"> = "completed"
): Promise<boolean> {
  return update(id, {
    ...result,
    status,
    completed_at: new Date().toISOString(),
  });
}

export async function fail(
  id: string,
  errorMessage: string,
  durationMs?: number
): Promise<boolean> {
  return update(id, {
    status: "failed",
    error_message: errorMessage,
    completed_at: new Date().toISOString(),
    duration_ms: durationMs ?? null,
  });
}

export const runRepo = {
  create,
  update,
  complete,
  fail,
};
