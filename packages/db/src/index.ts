/**
 * @equisight/db
 * Database client, run repository and event store for research runs
 */

// Supabase client
export { getSupabase, isSupabaseConfigured } from "./supabase.js";

// Types
export * from "./types.js";

// Repositories
export { runRepo } from "./repositories/index.js";

// Event store
export {
  recordStageEvent,
  recordRunStarted,
  recordRunCompleted,
  recordRunFailed,
  flushEvents,
  pendingEvents,
} from "./event-store.js";
