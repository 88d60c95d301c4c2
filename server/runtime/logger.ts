export const logLevels = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export interface SupervisorLogger {
  readonly scope: string;
  debug(message: string, error?: unknown): void;
  info(message: string, error?: unknown): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
  child(scope: string): SupervisorLogger;
}

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  timestamp: string;
  error?: unknown;
}

export type LogSink = (entry: LogEntry) => void;

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
  now?: () => Date;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function formatLogLine(entry: LogEntry): string {
  return `${entry.timestamp} [${entry.scope}] ${entry.message}`;
}

const consoleSink: LogSink = (entry) => {
  const line = formatLogLine(entry);
  const args: unknown[] = entry.error === undefined ? [line] : [line, entry.error];
  switch (entry.level) {
    case "debug":
      console.debug(...args);
      return;
    case "info":
      console.info(...args);
      return;
    case "warn":
      console.warn(...args);
      return;
    case "error":
      console.error(...args);
      return;
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return logLevels.some((level) => level === value);
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): SupervisorLogger {
  const minimum = levelRank[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());

  const build = (scope: string): SupervisorLogger => {
    const emit = (level: LogLevel, message: string, error?: unknown) => {
      if (levelRank[level] < minimum) {
        return;
      }
      sink({
        level,
        scope,
        message,
        timestamp: now().toISOString(),
        ...(error === undefined ? {} : { error })
      });
    };

    return {
      scope,
      debug: (message, error) => emit("debug", message, error),
      info: (message, error) => emit("info", message, error),
      warn: (message, error) => emit("warn", message, error),
      error: (message, error) => emit("error", message, error),
      child: (childScope) => build(`${scope}:${childScope}`)
    };
  };

  return build(options.scope ?? "supervisor");
}

/**
 * Logger that keeps entries in memory instead of writing to the console.
 */
export function createMemoryLogger(options: Omit<ConsoleLoggerOptions, "sink"> = {}): {
  logger: SupervisorLogger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  return {
    logger: createConsoleLogger({
      level: "debug",
      ...options,
      sink: (entry) => {
        entries.push(entry);
      }
    }),
    entries
  };
}
