export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  sink?: Pick<Console, "debug" | "log" | "warn" | "error">;
};

function toLogData(data: unknown): unknown {
  if (data instanceof Error) {
    return { message: data.message, stack: data.stack };
  }
  return data;
}

/**
 * Console-backed logger. Lines read `[LEVEL] message`, followed by the
 * structured data when there is any.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? console;

  const write = (level: LogLevel, message: string, data?: unknown): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = `[${level.toUpperCase()}] ${message}`;
    const args = data === undefined ? [line] : [line, toLogData(data)];
    switch (level) {
      case "debug":
        sink.debug(...args);
        break;
      case "info":
        sink.log(...args);
        break;
      case "warn":
        sink.warn(...args);
        break;
      case "error":
        sink.error(...args);
        break;
    }
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data)
  };
}

export type MemoryLogger = Logger & {
  entries: LogEntry[];
  messages(level: LogLevel): string[];
};

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, data?: unknown) => {
    entries.push(data === undefined ? { level, message } : { level, message, data });
  };
  return {
    entries,
    messages: (level) => entries.filter((entry) => entry.level === level).map((entry) => entry.message),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error")
  };
}
