/**
 * Recording Activity Channel
 * Keeps a run's events in memory, mirrors them to the logger and fans out
 */

import { logger, type ChildLogger } from "@equisight/core";
import type {
  ActivityChannelOptions,
  ActivityEvent,
  ActivityStatus,
  IActivityChannel,
  IActivitySink,
} from "./types.js";

export class RecordingChannel implements IActivityChannel {
  readonly runId: string;

  private readonly recorded: ActivityEvent[] = [];
  private readonly options: ActivityChannelOptions;
  private readonly sinks: IActivitySink[];
  private readonly log: ChildLogger;

  constructor(runId: string, options: ActivityChannelOptions = {}) {
    this.runId = runId;
    this.options = { ...options, log: options.log ?? true };
    this.sinks = options.sinks ?? [];
    this.log = logger.child({ runId });
  }

  emit(stage: string, status: ActivityStatus, action: string, details?: string): void {
    const event: ActivityEvent = {
      runId: this.runId,
      timestamp: new Date().toISOString(),
      stage,
      status,
      action,
      ...(details !== undefined ? { details } : {}),
    };

    this.recorded.push(event);

    if (this.options.log) {
      this.mirror(event);
    }

    // Subscribers and sinks must not break the run
    if (this.options.onEvent) {
      try {
        this.options.onEvent(event);
      } catch (error) {
        this.log.warn("Activity listener failed", {
          stage,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    for (const sink of this.sinks) {
      try {
        sink.record(event);
      } catch (error) {
        this.log.warn("Activity sink rejected event", {
          stage,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  events(): ActivityEvent[] {
    return [...this.recorded];
  }

  metric(name: string, value: number, tags?: Record<string, string>): void {
    this.log.metric(name, value, tags);
  }

  /**
   * Flush every sink; failures are logged
   */
  async flush(): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.flush()));

    for (const result of results) {
      if (result.status === "rejected") {
        this.log.error("Activity sink flush failed", result.reason);
      }
    }
  }

  private mirror(event: ActivityEvent): void {
    const message = `[${event.stage}] ${event.action}`;
    const context = event.details ? { stage: event.stage, details: event.details } : { stage: event.stage };

    switch (event.status) {
      case "error":
        this.log.error(message, undefined, context);
        break;
      case "warning":
        this.log.warn(message, context);
        break;
      default:
        this.log.info(message, context);
    }
  }
}

/**
 * Create a recording channel for a run
 */
export function createActivityChannel(
  runId: string,
  options?: ActivityChannelOptions
): RecordingChannel {
  return new RecordingChannel(runId, options);
}
