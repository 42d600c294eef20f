export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/** Logging port. Components take one so tests can pass spies. */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function envLevel(): LogLevel {
  const raw = process.env.TOKENVEIL_LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : "warn";
}

/**
 * Console logger prefixed with a module scope, e.g. "[tokenveil:session-store]".
 * Everything goes to stderr so CLI stdout stays clean.
 */
export function createLogger(scope: string, level: LogLevel = envLevel()): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[tokenveil:${scope}]`;

  function emit(at: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[at] < threshold) return;
    const line = `${prefix} ${message}`;
    const sink = at === "error" ? console.error : at === "warn" ? console.warn : console.debug;
    if (context && Object.keys(context).length > 0) {
      sink(line, context);
    } else {
      sink(line);
    }
  }

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
