/**
 * Shared helpers for tool handlers.
 * Exported for unit testing.
 */

import { ZodError } from "zod";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { log } from "./logger.js";

// Helper: check if string is an HTTP(S) URL
export function isHttpUrl(val: string): boolean {
  return val.startsWith("http://") || val.startsWith("https://");
}

// Shared tool annotations
export const vendorReadAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
} as const;

export const vendorWriteAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
} as const;

export const vendorDestructiveAnnotations = {
  readOnlyHint: false,
  destructiveHint: true,
  idempotentHint: true,
  openWorldHint: true,
} as const;

export const COST_WARNING =
  "⚠️ COST WARNING: This tool makes an API call to ElevenLabs which may incur costs. Only use when explicitly requested by the user.";

export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(input)"}: ${issue.message}`)
    .join("; ");
}

// Helper: build error result for tool handlers
export function buildErrorResult(err: unknown, toolName: string): CallToolResult {
  const message = err instanceof ZodError
    ? `Invalid arguments: ${formatZodError(err)}`
    : err instanceof Error ? err.message : String(err);
  log.child(toolName).error(message, { stack: err instanceof Error ? err.stack : undefined });
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

export function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
    structuredContent: toStructuredContentRecord(value),
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function toStructuredContentRecord(value: unknown): Record<string, unknown> | undefined {
  if (value === undefined) return undefined;
  if (isPlainRecord(value)) return value;

  const jsonValue: unknown = JSON.parse(JSON.stringify(value));
  if (isPlainRecord(jsonValue)) return jsonValue;
  return { value: jsonValue } satisfies Record<string, unknown>;
}

function truncateLogString(value: string, max: number): string {
  if (value.length <= max) return value;
  return `${value.slice(0, max)}...(${value.length} chars)`;
}

function summarizeArgsForLog(value: unknown): unknown {
  if (typeof value === "string") return truncateLogString(value, 256);
  if (Array.isArray(value)) return value.map((item) => summarizeArgsForLog(item));
  if (!isPlainRecord(value)) return value;

  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    result[key] = summarizeArgsForLog(val);
  }
  return result;
}

export function debugLogRawArgs(toolName: string, args: unknown): void {
  log.child(toolName).debug("raw args", { args: summarizeArgsForLog(args) });
}
