export interface LogMetadata {
  [key: string]: unknown;
}

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info: (event: string, metadata?: LogMetadata) => void;
  warn: (event: string, metadata?: LogMetadata) => void;
  error: (event: string, metadata?: LogMetadata) => void;
}

const REDACTED = "[REDACTED]";
const MAX_DEPTH = 6;
const MIN_SECRET_LENGTH = 6;
const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

const REDACTED_HEADERS = new Set(["authorization", "cookie", "set-cookie", "proxy-authorization", "x-api-key"]);

// Post and comment bodies count as user content and never reach the log.
const SENSITIVE_KEY_PATTERN =
  /(authorization|cookie|password|passwd|secret|token|session|api[_-]?key|private[_-]?key|database[_-]?url|connection[_-]?string|credential|body|markdown|content|env)/i;

const SECRET_ENV_KEY_PATTERN = /(key|token|secret|password|cookie|private|database_url|connection|credential|auth)/i;

function collectSecretEnvValues(env: NodeJS.ProcessEnv): string[] {
  return Object.entries(env).flatMap(([key, value]) => {
    const trimmed = value?.trim() ?? "";
    return SECRET_ENV_KEY_PATTERN.test(key) && trimmed.length >= MIN_SECRET_LENGTH ? [trimmed] : [];
  });
}

const SECRET_ENV_VALUES = collectSecretEnvValues(process.env);

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function redactString(value: string): string {
  return SECRET_ENV_VALUES.some((secret) => value.includes(secret)) ? REDACTED : value;
}

function redactEntries(input: Record<string, unknown>, depth: number, headers: boolean): Record<string, unknown> {
  const output: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(input)) {
    const lower = key.toLowerCase();
    if (headers ? REDACTED_HEADERS.has(lower) : SENSITIVE_KEY_PATTERN.test(lower)) {
      output[key] = REDACTED;
    } else if (!headers && lower === "headers" && isPlainRecord(value)) {
      output[key] = redactEntries(value, depth + 1, true);
    } else {
      output[key] = redactValue(value, depth + 1);
    }
  }

  return output;
}

function redactValue(value: unknown, depth: number): unknown {
  if (depth > MAX_DEPTH) {
    return "[Truncated]";
  }

  switch (typeof value) {
    case "string":
      return redactString(value);
    case "number":
    case "boolean":
    case "undefined":
      return value;
    case "bigint":
      return value.toString();
    case "object":
      break;
    default:
      return String(value);
  }

  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, depth + 1));
  }
  return isPlainRecord(value) ? redactEntries(value, depth, false) : String(value);
}

export function sanitizeLogMetadata(metadata: LogMetadata = {}): LogMetadata {
  return redactEntries(metadata, 0, false);
}

export function formatLogLine(level: LogLevel, event: string, metadata: LogMetadata = {}): string {
  return JSON.stringify({
    level,
    timestamp: new Date().toISOString(),
    event,
    metadata: sanitizeLogMetadata(metadata)
  });
}

export function parseLogLevel(value: string | undefined, defaultLevel: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized === "info" || normalized === "warn" || normalized === "error" ? normalized : defaultLevel;
}

export interface LoggerOptions {
  level?: LogLevel;
}

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

/** One JSON line per event on the console stream matching its level; events below `level` are dropped. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const emit = (level: LogLevel) => (event: string, metadata: LogMetadata = {}) => {
    if (LEVEL_RANK[level] >= threshold) {
      CONSOLE_WRITERS[level](formatLogLine(level, event, metadata));
    }
  };

  return { info: emit("info"), warn: emit("warn"), error: emit("error") };
}

export const appLogger: Logger = createLogger({ level: parseLogLevel(process.env.LOG_LEVEL) });
