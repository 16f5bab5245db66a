/**
 * Structured Logging
 * Leveled logger with context, pluggable handlers and child loggers
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  runId?: string;
  stage?: string;
  component?: string;
  url?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

const handlers: LogHandler[] = [];

/**
 * Default console handler with colors
 */
const consoleHandler: LogHandler = (entry) => {
  const colors = {
    debug: "\x1b[90m", // gray
    info: "\x1b[36m",  // cyan
    warn: "\x1b[33m",  // yellow
    error: "\x1b[31m", // red
  };
  const reset = "\x1b[0m";
  const color = colors[entry.level];

  const prefix = `${color}[${entry.timestamp}] [${entry.level.toUpperCase()}]${reset}`;
  const contextStr = entry.context
    ? ` ${JSON.stringify(entry.context)}`
    : "";

  if (entry.error) {
    console.error(`${prefix} ${entry.message}${contextStr}`);
    console.error(`  Error: ${entry.error.message}`);
    if (entry.error.stack) {
      console.error(`  Stack: ${entry.error.stack.split("\n").slice(1, 4).join("\n")}`);
    }
  } else if (entry.level === "warn" || entry.level === "error") {
    console.error(`${prefix} ${entry.message}${contextStr}`);
  } else {
    console.log(`${prefix} ${entry.message}${contextStr}`);
  }
};

handlers.push(consoleHandler);

function createEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: unknown
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error instanceof Error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  } else if (error !== undefined) {
    // Thrown strings and plain objects still deserve a message
    entry.error = {
      name: "NonError",
      message: typeof error === "string" ? error : JSON.stringify(error),
    };
  }

  return entry;
}

function emit(entry: LogEntry): void {
  if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }

  for (const handler of handlers) {
    try {
      handler(entry);
    } catch (e) {
      console.error("Logger handler error:", e);
    }
  }
}

/**
 * Logger interface
 */
export const logger = {
  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /**
   * Add a custom log handler. Returns a function that removes it again.
   */
  addHandler(handler: LogHandler): () => void {
    handlers.push(handler);
    return () => {
      const index = handlers.indexOf(handler);
      if (index >= 0) {
        handlers.splice(index, 1);
      }
    };
  },

  /**
   * Drop the console handler (tests, or when another sink owns the output)
   */
  silenceConsole(): void {
    const index = handlers.indexOf(consoleHandler);
    if (index >= 0) {
      handlers.splice(index, 1);
    }
  },

  /**
   * Remove all handlers except console
   */
  resetHandlers(): void {
    handlers.length = 0;
    handlers.push(consoleHandler);
  },

  debug(message: string, context?: LogContext): void {
    emit(createEntry("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    emit(createEntry("info", message, context));
  },

  warn(message: string, context?: LogContext): void {
    emit(createEntry("warn", message, context));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    emit(createEntry("error", message, context, error));
  },

  /**
   * Create a child logger with preset context
   */
  child(baseContext: LogContext): ChildLogger {
    return new ChildLogger(baseContext);
  },

  /**
   * Log a metric (durations, counts, scores)
   */
  metric(name: string, value: number, context?: LogContext): void {
    emit(
      createEntry("info", `METRIC: ${name}=${value}`, {
        ...context,
        metric: name,
        value,
      })
    );
  },
};

/**
 * Child logger with preset context
 */
class ChildLogger {
  constructor(private baseContext: LogContext) {}

  debug(message: string, context?: LogContext): void {
    logger.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    logger.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    logger.warn(message, { ...this.baseContext, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    logger.error(message, error, { ...this.baseContext, ...context });
  }

  metric(name: string, value: number, context?: LogContext): void {
    logger.metric(name, value, { ...this.baseContext, ...context });
  }

  /**
   * Create a child with additional context
   */
  child(additionalContext: LogContext): ChildLogger {
    return new ChildLogger({ ...this.baseContext, ...additionalContext });
  }
}

export type { ChildLogger };
