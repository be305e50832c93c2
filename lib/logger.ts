/**
 * Structured logging utility.
 *
 * Outputs JSON in production for log aggregation, and human-readable
 * formatted output in development.
 *
 * Every log entry includes the app version (`v`) for deployment tracing.
 * Modules log through a scoped child so entries carry their origin:
 *
 *   const log = logger.child("metadata");
 *   log.debug("cache miss", { key });
 *   log.warn("warehouse warmup failed", { error: err.message });
 *
 * Metadata keys that look like credentials are replaced before output.
 */

import packageJson from "@/package.json";

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogMeta = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  v: string;
  scope?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

const APP_VERSION = packageJson.version;
const IS_PRODUCTION = process.env.NODE_ENV === "production";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_PRIORITY, value);
}

const envLevel = process.env.LOG_LEVEL;
const MIN_LEVEL: LogLevel = isLogLevel(envLevel)
  ? envLevel
  : IS_PRODUCTION
    ? "info"
    : "debug";

const SENSITIVE_KEY_RE = /token|secret|authorization|password/i;

export function redact(meta: LogMeta | undefined): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta ?? {})) {
    out[key] = SENSITIVE_KEY_RE.test(key) ? "[redacted]" : value;
  }
  return out;
}

function formatDev(entry: LogEntry): string {
  const { level, message, timestamp, v, scope, ...rest } = entry;
  const prefix = `[${level.toUpperCase().padEnd(5)}]`;
  const time = timestamp.split("T")[1]?.replace("Z", "") ?? timestamp;
  const origin = scope ? `[${scope}] ` : "";
  const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  return `${time} ${prefix} [v${v}] ${origin}${message}${extra}`;
}

function emit(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[MIN_LEVEL]) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    v: APP_VERSION,
    ...(scope ? { scope } : {}),
    ...redact(meta),
  };

  const output = IS_PRODUCTION ? JSON.stringify(entry) : formatDev(entry);

  switch (level) {
    case "error":
      console.error(output);
      break;
    case "warn":
      console.warn(output);
      break;
    default:
      console.log(output);
      break;
  }
}

function createLogger(scope?: string): Logger {
  return {
    debug: (message, meta) => emit("debug", scope, message, meta),
    info: (message, meta) => emit("info", scope, message, meta),
    warn: (message, meta) => emit("warn", scope, message, meta),
    error: (message, meta) => emit("error", scope, message, meta),
    child: (name) => createLogger(scope ? `${scope}:${name}` : name),
  };
}

export const logger = createLogger();

const _g = globalThis as unknown as { __explorerStartupLogged?: boolean };
if (IS_PRODUCTION && !_g.__explorerStartupLogged) {
  _g.__explorerStartupLogged = true;
  emit("info", undefined, `Metadata Explorer v${APP_VERSION} starting`);
}
