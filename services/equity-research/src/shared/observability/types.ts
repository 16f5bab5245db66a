/**
 * Observability Types
 * Activity channel passed explicitly through every pipeline stage
 */

// ============================================
// ACTIVITY EVENTS
// ============================================

export type ActivityStatus = "info" | "success" | "warning" | "error";

/**
 * One notable step of a run
 */
export interface ActivityEvent {
  /** Run this event belongs to */
  runId: string;

  /** When the event occurred */
  timestamp: string;

  /** Emitting stage (e.g., "discovery", "fetcher") */
  stage: string;

  status: ActivityStatus;

  /** Short description of what happened */
  action: string;

  /** Free-text detail */
  details?: string;
}

export type ActivityListener = (event: ActivityEvent) => void;

// ============================================
// CHANNEL INTERFACE
// ============================================

/**
 * Per-run event channel
 */
export interface IActivityChannel {
  readonly runId: string;

  /**
   * Record an event
   */
  emit(stage: string, status: ActivityStatus, action: string, details?: string): void;

  /**
   * Events recorded so far, in emission order
   */
  events(): ActivityEvent[];

  /**
   * Record a metric
   */
  metric(name: string, value: number, tags?: Record<string, string>): void;
}

// ============================================
// SINKS
// ============================================

/**
 * Outbound destination for a run's events (database, queue, ...)
 */
export interface IActivitySink {
  record(event: ActivityEvent): void;

  /**
   * Deliver whatever is buffered
   */
  flush(): Promise<void>;
}

export interface ActivityChannelOptions {
  /** Mirror events to the structured logger */
  log?: boolean;

  /** Subscriber notified for each event */
  onEvent?: ActivityListener;

  /** Additional destinations */
  sinks?: IActivitySink[];
}
