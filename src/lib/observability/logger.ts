export type LogLevel = "debug" | "info" | "warn" | "error";

type LogThreshold = LogLevel | "silent";

type LogPayload = Record<string, unknown> | undefined;

export type Logger = {
  info: (message: string, data?: LogPayload) => void;
  warn: (message: string, data?: LogPayload) => void;
  error: (message: string, data?: LogPayload) => void;
  debug: (message: string, data?: LogPayload) => void;
  child: (scope: string) => Logger;
};

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string): value is LogThreshold {
  return value in LEVEL_RANK;
}

// Read on every call so tests and long-running processes can change LOG_LEVEL.
function currentThreshold(): LogThreshold {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isThreshold(raw) ? raw : "info";
}

function serialize(data: Record<string, unknown>): string {
  return JSON.stringify(data, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

function emit(level: LogLevel, scope: string | undefined, message: string, data?: LogPayload) {
  if (LEVEL_RANK[level] < LEVEL_RANK[currentThreshold()]) {
    return;
  }
  const prefixed = scope ? `[${scope}] ${message}` : message;
  const entry = data ? `${prefixed} ${serialize(data)}` : prefixed;
  switch (level) {
    case "warn":
      console.warn(entry);
      break;
    case "error":
      console.error(entry);
      break;
    case "debug":
      console.debug(entry);
      break;
    default:
      console.log(entry);
  }
}

function createLogger(scope?: string): Logger {
  return {
    info: (message, data) => emit("info", scope, message, data),
    warn: (message, data) => emit("warn", scope, message, data),
    error: (message, data) => emit("error", scope, message, data),
    debug: (message, data) => emit("debug", scope, message, data),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
}

export const logger: Logger = createLogger();
