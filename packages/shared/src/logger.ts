export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEvent {
  ts: string;
  level: LogLevel;
  message: string;
  [field: string]: unknown;
}

export type LogSink = (event: LogEvent) => void;

export interface Logger {
  debug: (message: string, fields?: Record<string, unknown>) => void;
  info: (message: string, fields?: Record<string, unknown>) => void;
  warn: (message: string, fields?: Record<string, unknown>) => void;
  error: (message: string, fields?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const levelWeight: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
}

// stderr for errors keeps stdout parseable when a run aborts.
function writeToStdio(event: LogEvent): void {
  const stream = event.level === "error" ? process.stderr : process.stdout;
  stream.write(`${JSON.stringify(event)}\n`);
}

export function createLogger(tool: string, options: LoggerOptions = {}): Logger {
  const threshold = levelWeight[options.level ?? resolveLogLevel(process.env.LOG_LEVEL)];
  const sink = options.sink ?? writeToStdio;

  const write = (level: LogLevel, message: string, fields?: Record<string, unknown>): void => {
    if (levelWeight[level] < threshold) {
      return;
    }
    sink({
      ts: new Date().toISOString(),
      level,
      message,
      tool,
      ...(fields ?? {})
    });
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields)
  };
}
