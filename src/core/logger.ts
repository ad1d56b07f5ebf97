/**
 * Structured Logging
 * Leveled logger with pluggable handlers, child contexts and metric events
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";

export interface LogContext {
  runId?: string;
  agent?: string;
  stage?: string;
  component?: string;
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

const COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const RESET = "\x1b[0m";

/**
 * Human-readable console output (stderr, so stdout stays clean for --json)
 */
const prettyHandler: LogHandler = (entry) => {
  const prefix = `${COLORS[entry.level]}[${entry.timestamp}] [${entry.level.toUpperCase()}]${RESET}`;
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";

  console.error(`${prefix} ${entry.message}${contextStr}`);
  if (entry.error) {
    console.error(`  Error: ${entry.error.name}: ${entry.error.message}`);
    if (entry.level === "debug" && entry.error.stack) {
      console.error(`  Stack: ${entry.error.stack.split("\n").slice(1, 4).join("\n")}`);
    }
  }
};

/**
 * One JSON object per line, for log shippers
 */
const jsonHandler: LogHandler = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

const handlers: LogHandler[] = [prettyHandler];

function createEntry(level: LogLevel, message: string, context?: LogContext, error?: unknown): LogEntry {
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
 * Logger interface shared by the root logger and its children
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  metric(name: string, value: number, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  /**
   * Replace the console handler with the given output format
   */
  setFormat(format: LogFormat): void {
    const replacement = format === "json" ? jsonHandler : prettyHandler;
    const index = handlers.findIndex((h) => h === prettyHandler || h === jsonHandler);
    if (index === -1) {
      handlers.unshift(replacement);
    } else {
      handlers[index] = replacement;
    }
  },

  addHandler(handler: LogHandler): void {
    handlers.push(handler);
  },

  /**
   * Drop every handler, console included (tests install their own)
   */
  silence(): void {
    handlers.length = 0;
  },

  resetHandlers(): void {
    handlers.length = 0;
    handlers.push(prettyHandler);
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
   * Log a metric (counters, durations)
   */
  metric(name: string, value: number, context?: LogContext): void {
    emit(
      createEntry("debug", `METRIC: ${name}=${value}`, {
        ...context,
        metric: name,
        value,
      })
    );
  },

  child(baseContext: LogContext): Logger {
    return new ChildLogger(baseContext);
  },
};

/**
 * Child logger with preset context
 */
class ChildLogger implements Logger {
  constructor(private readonly baseContext: LogContext) {}

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

  child(additionalContext: LogContext): Logger {
    return new ChildLogger({ ...this.baseContext, ...additionalContext });
  }
}
