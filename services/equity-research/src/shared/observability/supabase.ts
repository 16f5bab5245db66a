/**
 * Supabase Activity Sink
 * Hands stage events to the batched event store
 */

import { flushEvents, isSupabaseConfigured, recordStageEvent } from "@equisight/db";
import type { ActivityEvent, IActivitySink } from "./types.js";

export class SupabaseActivitySink implements IActivitySink {
  record(event: ActivityEvent): void {
    recordStageEvent(event);
  }

  flush(): Promise<void> {
    return flushEvents();
  }
}

/**
 * Sink list for a run: the event store when Supabase is configured, nothing otherwise
 */
export function createSupabaseSinks(): IActivitySink[] {
  return isSupabaseConfigured() ? [new SupabaseActivitySink()] : [];
}
