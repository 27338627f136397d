/**
 * Minimal structured logger for the MCP server.
 * - All output goes to stderr (stdout is reserved for the MCP stdio protocol)
 * - Log level controlled by ELEVENLABS_MCP_LOG_LEVEL
 * - JSON mode via ELEVENLABS_MCP_LOG_FORMAT=json
 * - Payload-like fields in structured data (base64 audio, secret values) are
 *   truncated to a 64 character preview. Controlled via
 *   ELEVENLABS_MCP_LOG_SANITIZE (default on) and
 *   ELEVENLABS_MCP_LOG_SANITIZE_KEYS (comma-separated list).
 *   This only changes what gets logged, never tool results.
 */

type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) return normalized;
  return "info";
}

const minLevel = LEVELS[parseLogLevel(process.env["ELEVENLABS_MCP_LOG_LEVEL"])];

const LOG_SANITIZE = (() => {
  const raw = process.env["ELEVENLABS_MCP_LOG_SANITIZE"];
  if (!raw) return true;
  const v = raw.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
})();

const LOG_TRUNCATE_DATA_MAX = 64;

const DEFAULT_LOG_SANITIZE_KEYS: string[] = ["audio_base_64", "audio_base64", "blob", "data", "value", "api_key"];

const LOG_SANITIZE_KEYS: string[] = (() => {
  const raw = process.env["ELEVENLABS_MCP_LOG_SANITIZE_KEYS"];
  if (!raw) return DEFAULT_LOG_SANITIZE_KEYS;
  const keys = raw
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
  return keys.length > 0 ? keys : DEFAULT_LOG_SANITIZE_KEYS;
})();

function isJsonFormat(): boolean {
  return process.env["ELEVENLABS_MCP_LOG_FORMAT"] === "json";
}
const PREFIX = "elevenlabs-mcp";

function shouldLog(lvl: LogLevel): boolean {
  return LEVELS[lvl] >= minLevel;
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

function truncateString(value: unknown, max: number): unknown {
  if (typeof value !== "string") return value;
  if (value.length <= max) return value;
  return `${value.slice(0, max)}...(${value.length} chars)`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// LOG-ONLY: recursively shortens configured keys so base64 audio does not
// flood stderr.
function truncatePayloadFields(obj: unknown): unknown {
  if (!LOG_SANITIZE) return obj;
  if (obj instanceof Error) return obj;
  if (Array.isArray(obj)) {
    return obj.map((item) => truncatePayloadFields(item));
  }
  if (!isRecord(obj)) return obj;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (LOG_SANITIZE_KEYS.includes(key) && typeof value === "string") {
      result[key] = truncateString(value, LOG_TRUNCATE_DATA_MAX);
    } else {
      result[key] = truncatePayloadFields(value);
    }
  }
  return result;
}

function serializeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized = truncatePayloadFields(data);
  const source = isRecord(sanitized) ? sanitized : data;
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    result[key] = serializeValue(value);
  }
  return result;
}

function formatMessage(lvl: LogLevel, scope: string, msg: string, data?: Record<string, unknown>): string {
  if (isJsonFormat()) {
    const serialized = data ? serializeLogData(data) : undefined;
    return JSON.stringify({ ts: new Date().toISOString(), level: lvl, scope, msg, ...serialized });
  }
  const prefix = `[${PREFIX}] [${lvl.toUpperCase()}]${scope ? ` [${scope}]` : ""}`;
  const suffix = data ? ` ${JSON.stringify(serializeLogData(data))}` : "";
  return `${prefix} ${msg}${suffix}`;
}

function write(lvl: LogLevel, scope: string, msg: string, data?: Record<string, unknown>): void {
  if (!shouldLog(lvl)) return;
  console.error(formatMessage(lvl, scope, msg, data));
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

function createLogger(scope = ""): Logger {
  return {
    debug: (msg, data) => write("debug", scope, msg, data),
    info: (msg, data) => write("info", scope, msg, data),
    warn: (msg, data) => write("warn", scope, msg, data),
    error: (msg, data) => write("error", scope, msg, data),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
}

export const log = createLogger();
