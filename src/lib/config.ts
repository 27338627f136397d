import os from "node:os";
import { z } from "zod";

import { envNonEmpty, getDefaultBaseDir, normalizeDirectory, parseEnvBool, parseEnvList, maskSecret } from "./env.js";
import { ElevenLabsMcpError } from "./errors.js";
import { OUTPUT_MODES, type OutputMode } from "./delivery.js";

export const DEFAULT_VOICE_ID = "cgSgspJ2msm6clMCkdW9";
export const DEFAULT_ALLOWED_ORIGINS = ["http://localhost", "http://localhost:3000", "http://127.0.0.1"];

export const RESIDENCY_ORIGINS = {
  us: "https://api.elevenlabs.io",
  global: "https://api.elevenlabs.io",
  "eu-residency": "https://api.eu.residency.elevenlabs.io",
  "in-residency": "https://api.in.residency.elevenlabs.io",
} as const;

export type Residency = keyof typeof RESIDENCY_ORIGINS;
export type TransportKind = "stdio" | "http";

export interface HttpConfig {
  host: string;
  port: number;
  allowedOrigins: string[];
  /** When set, REST facade callers must send it as `x-api-key`. */
  restApiKey?: string;
}

export interface AppConfig {
  apiKey: string;
  residency: Residency;
  apiBaseUrl: string;
  outputMode: OutputMode;
  baseDirectory: string;
  baseDirectoryConfigured: boolean;
  strictPaths: boolean;
  defaultVoiceId: string;
  defaultModelId?: string;
  transport: TransportKind;
  http: HttpConfig;
  version: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  version?: string;
}

const residencySchema = z.enum(["us", "global", "eu-residency", "in-residency"]);
const outputModeSchema = z.enum(OUTPUT_MODES);
const transportSchema = z.enum(["stdio", "http"]);
const portSchema = z.coerce.number().int().min(0).max(65535);

function parseOrFail<T>(schema: z.ZodType<T>, raw: string, name: string, expected: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ElevenLabsMcpError("InvalidConfiguration", `Invalid ${name}: ${JSON.stringify(raw)}. Expected ${expected}`);
  }
  return parsed.data;
}

/** Build the immutable process configuration. Throws InvalidConfiguration. */
export function loadConfig(env: NodeJS.ProcessEnv, options: LoadConfigOptions = {}): Readonly<AppConfig> {
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? os.homedir();

  const apiKey = envNonEmpty(env, "ELEVENLABS_API_KEY");
  if (!apiKey) {
    throw new ElevenLabsMcpError("InvalidConfiguration", "ELEVENLABS_API_KEY environment variable is required");
  }

  const outputMode = parseOrFail(
    outputModeSchema,
    (envNonEmpty(env, "ELEVENLABS_MCP_OUTPUT_MODE") ?? "files").toLowerCase(),
    "ELEVENLABS_MCP_OUTPUT_MODE",
    `one of: ${OUTPUT_MODES.join(", ")}`,
  );

  const residency = parseOrFail(
    residencySchema,
    (envNonEmpty(env, "ELEVENLABS_API_RESIDENCY") ?? "us").toLowerCase(),
    "ELEVENLABS_API_RESIDENCY",
    `one of: ${residencySchema.options.join(", ")}`,
  );

  const transport = parseOrFail(
    transportSchema,
    (envNonEmpty(env, "ELEVENLABS_MCP_TRANSPORT") ?? "stdio").toLowerCase(),
    "ELEVENLABS_MCP_TRANSPORT",
    `one of: ${transportSchema.options.join(", ")}`,
  );

  const port = parseOrFail(portSchema, envNonEmpty(env, "PORT") ?? "8000", "PORT", "an integer between 0 and 65535");

  const rawBase = envNonEmpty(env, "ELEVENLABS_MCP_BASE_PATH");
  const baseDirectory = rawBase ? normalizeDirectory(rawBase, cwd, home) : getDefaultBaseDir(home);

  const allowedOrigins = parseEnvList(env["ALLOWED_ORIGINS"]);
  const restApiKey = envNonEmpty(env, "API_KEY");
  const defaultModelId = envNonEmpty(env, "ELEVENLABS_MODEL_ID");

  const http: HttpConfig = {
    host: envNonEmpty(env, "HOST") ?? "0.0.0.0",
    port,
    allowedOrigins: allowedOrigins.length > 0 ? allowedOrigins : [...DEFAULT_ALLOWED_ORIGINS],
    ...(restApiKey ? { restApiKey } : {}),
  };

  return Object.freeze({
    apiKey,
    residency,
    apiBaseUrl: RESIDENCY_ORIGINS[residency],
    outputMode,
    baseDirectory,
    baseDirectoryConfigured: rawBase !== undefined,
    strictPaths: parseEnvBool(env["ELEVENLABS_MCP_STRICT_PATHS"], true),
    defaultVoiceId: envNonEmpty(env, "ELEVENLABS_DEFAULT_VOICE_ID") ?? DEFAULT_VOICE_ID,
    ...(defaultModelId ? { defaultModelId } : {}),
    transport,
    http: Object.freeze(http),
    version: options.version ?? "0.0.0",
  });
}

/** Config summary safe for logs. */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    apiKey: maskSecret(config.apiKey),
    residency: config.residency,
    apiBaseUrl: config.apiBaseUrl,
    outputMode: config.outputMode,
    baseDirectory: config.baseDirectory,
    strictPaths: config.strictPaths,
    defaultVoiceId: config.defaultVoiceId,
    defaultModelId: config.defaultModelId,
    transport: config.transport,
    host: config.http.host,
    port: config.http.port,
    allowedOrigins: config.http.allowedOrigins,
    restApiKey: config.http.restApiKey ? maskSecret(config.http.restApiKey) : undefined,
  };
}
