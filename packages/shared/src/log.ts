export type LogMeta = Record<string, unknown>;

export type LogLevel = "silent" | "error" | "warn" | "info";

export type Logger = {
  info: (event: string, meta?: LogMeta) => void;
  warn: (event: string, meta?: LogMeta) => void;
  error: (event: string, meta?: LogMeta) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3 };

const SENSITIVE_KEY =
  /secret|private|password|pepper|seed|mnemonic|token|authorization|bearer|api[_-]?key/i;
const JWT_PATTERN = /eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g;

const redactString = (value: string) => {
  if (value.toLowerCase().startsWith("bearer ")) {
    return "Bearer [redacted]";
  }
  return value.replace(JWT_PATTERN, "[redacted]");
};

export const redact = (value: unknown, depth = 0): unknown => {
  if (depth > 4) {
    return "[redacted]";
  }
  if (value instanceof Uint8Array) {
    return { bytes: value.length };
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redact(entry, depth + 1));
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === "string") {
    return redactString(value);
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) ? "[redacted]" : redact(entry, depth + 1);
    }
    return result;
  }
  return value;
};

export const formatLogLine = (
  service: string,
  level: Exclude<LogLevel, "silent">,
  event: string,
  meta?: LogMeta
) => {
  const safeMeta = meta ? redact(meta) : undefined;
  const fields = safeMeta && typeof safeMeta === "object" ? safeMeta : {};
  return JSON.stringify({ level, service, event, ...fields });
};

export const createLogger = (input: { service: string; level?: LogLevel }): Logger => {
  const threshold = LEVEL_RANK[input.level ?? "info"];

  const write = (level: Exclude<LogLevel, "silent">, event: string, meta?: LogMeta) => {
    if (LEVEL_RANK[level] > threshold) {
      return;
    }
    const line = formatLogLine(input.service, level, event, meta);
    if (level === "error") {
      console.error(line);
      return;
    }
    if (level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  };

  return {
    info: (event, meta) => write("info", event, meta),
    warn: (event, meta) => write("warn", event, meta),
    error: (event, meta) => write("error", event, meta)
  };
};
