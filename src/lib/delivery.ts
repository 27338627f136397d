/**
 * Artifact delivery: write generated bytes to disk, embed them as an MCP
 * resource, or both, depending on the process-wide output mode.
 */

import fs from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { EmbeddedResource, TextContent, ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";

import { ElevenLabsMcpError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { makeOutputFileName } from "./naming.js";
import { resolveOutputDir, resolveResourcePath } from "./paths.js";

export const OUTPUT_MODES = ["files", "resources", "both"] as const;
export type OutputMode = (typeof OUTPUT_MODES)[number];

export const RESOURCE_SCHEME = "elevenlabs";

const deliveryLog = log.child("delivery");

const MIME_TYPES: Record<string, string> = {
  mp3: "audio/mpeg",
  wav: "audio/wav",
  ogg: "audio/ogg",
  flac: "audio/flac",
  m4a: "audio/mp4",
  aac: "audio/aac",
  opus: "audio/opus",
  txt: "text/plain",
  csv: "text/csv",
  html: "text/html",
  json: "application/json",
  xml: "application/xml",
  zip: "application/zip",
  mp4: "video/mp4",
  avi: "video/x-msvideo",
  mov: "video/quicktime",
  wmv: "video/x-ms-wmv",
};

export function getMimeType(filename: string): string {
  const ext = path.extname(filename).slice(1).toLowerCase();
  return MIME_TYPES[ext] ?? "application/octet-stream";
}

export function isTextMimeType(mimeType: string): boolean {
  return mimeType.startsWith("text/") || mimeType === "application/json" || mimeType === "application/xml";
}

export function resourceUri(filename: string): string {
  return `${RESOURCE_SCHEME}://${encodeURIComponent(filename)}`;
}

/** Tool description fragment for the active output mode. */
export function outputModeDescription(mode: OutputMode, baseDirectory: string): string {
  switch (mode) {
    case "files":
      return `Saves output file to directory (default: ${baseDirectory})`;
    case "resources":
      return "Returns output as base64-encoded MCP resource";
    case "both":
      return `Saves file to directory (default: ${baseDirectory}) AND returns as base64-encoded MCP resource`;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Materializer
// ═══════════════════════════════════════════════════════════════════════════════

export interface FileReference {
  path: string;
  message: string;
}

/** At least one of `file` and `resource` is set; `both` mode sets the two. */
export interface DeliveredResult {
  file?: FileReference;
  resource?: EmbeddedResource;
}

export interface DeliverRequest {
  data: Uint8Array | string;
  directory: string;
  filename: string;
  mode: OutputMode;
  /** Must contain `{file_path}`, replaced by the absolute path written. */
  successTemplate?: string;
}

function toBuffer(data: Uint8Array | string): Buffer {
  return typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

function assertPlainFilename(filename: string): void {
  if (!filename || filename === "." || filename === ".." || path.basename(filename) !== filename || filename.includes("\0")) {
    throw new ElevenLabsMcpError("InvalidPath", `Invalid output file name: ${JSON.stringify(filename)}`);
  }
}

async function writeFileAtomic(target: string, bytes: Buffer): Promise<void> {
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);
  try {
    await fs.promises.writeFile(tmp, bytes);
    await fs.promises.rename(tmp, target);
  } catch (err: unknown) {
    await fs.promises.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
      deliveryLog.warn("failed to remove temporary file", { tmp, error: errorMessage(cleanupErr) });
    });
    throw new ElevenLabsMcpError("IOFailure", `Failed to write ${target}: ${errorMessage(err)}`, { cause: err });
  }
}

function decodeUtf8(bytes: Buffer): string | undefined {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function buildEmbeddedResource(filename: string, bytes: Buffer): EmbeddedResource {
  const mimeType = getMimeType(filename);
  const uri = resourceUri(filename);
  const text = isTextMimeType(mimeType) ? decodeUtf8(bytes) : undefined;
  if (text !== undefined) {
    return { type: "resource", resource: { uri, mimeType, text } };
  }
  return { type: "resource", resource: { uri, mimeType, blob: bytes.toString("base64") } };
}

export async function deliverArtifact(request: DeliverRequest): Promise<DeliveredResult> {
  assertPlainFilename(request.filename);
  const bytes = toBuffer(request.data);
  const result: DeliveredResult = {};

  if (request.mode === "files" || request.mode === "both") {
    const filePath = path.resolve(request.directory, request.filename);
    await writeFileAtomic(filePath, bytes);
    const message = request.successTemplate
      ? request.successTemplate.replaceAll("{file_path}", filePath)
      : `Success. File saved as: ${filePath}`;
    deliveryLog.debug("artifact written", { path: filePath, bytes: bytes.byteLength });
    result.file = { path: filePath, message };
  }

  if (request.mode === "resources" || request.mode === "both") {
    result.resource = buildEmbeddedResource(request.filename, bytes);
  }

  return result;
}

export type DeliveryContent = TextContent | EmbeddedResource;

export function toToolContent(result: DeliveredResult): DeliveryContent[] {
  const content: DeliveryContent[] = [];
  if (result.file) content.push({ type: "text", text: result.file.message });
  if (result.resource) content.push(result.resource);
  return content;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Aggregator
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Combine several delivered artifacts into one tool response, keeping input
 * order. `files` mode yields one summary text; the other modes yield the
 * resources followed by `extraText`, when given.
 */
export function aggregateResults(results: readonly DeliveredResult[], mode: OutputMode, extraText?: string): DeliveryContent[] {
  if (mode === "files") {
    const lines = results.flatMap((r) => (r.file ? [r.file.message] : []));
    let text = lines.join("\n");
    if (extraText) text += `\n\n${extraText}`;
    return [{ type: "text", text }];
  }

  const content: DeliveryContent[] = results.flatMap((r) => (r.resource ? [r.resource] : []));
  if (extraText) content.push({ type: "text", text: extraText });
  return content;
}

/** Concatenate a streamed vendor answer before delivery. */
export async function collectChunks(chunks: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  const parts: Buffer[] = [];
  for await (const chunk of chunks) {
    parts.push(Buffer.from(chunk));
  }
  return Buffer.concat(parts);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Read-back
// ═══════════════════════════════════════════════════════════════════════════════

export type ResourceContents = ReadResourceResult["contents"][number];

export async function readResource(filename: string, baseDirectory: string): Promise<ResourceContents> {
  const resolved = await resolveResourcePath(filename, baseDirectory);
  let bytes: Buffer;
  try {
    bytes = await fs.promises.readFile(resolved);
  } catch (err: unknown) {
    throw new ElevenLabsMcpError("IOFailure", `Failed to read resource ${filename}: ${errorMessage(err)}`, { cause: err });
  }

  const mimeType = getMimeType(resolved);
  const uri = resourceUri(filename);
  if (isTextMimeType(mimeType)) {
    const text = decodeUtf8(bytes);
    if (text === undefined) {
      throw new ElevenLabsMcpError("IOFailure", `Resource ${filename} is not valid UTF-8 text`);
    }
    return { uri, mimeType, text };
  }
  return { uri, mimeType, blob: bytes.toString("base64") };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Large text
// ═══════════════════════════════════════════════════════════════════════════════

export interface LargeTextOptions {
  maxLength: number;
  /** Naming hint, e.g. "conversation_transcript". */
  contentType: string;
  baseDirectory: string;
  now?: Date;
}

export async function handleLargeText(text: string, options: LargeTextOptions): Promise<string> {
  if (text.length <= options.maxLength) return text;
  const filename = makeOutputFileName("large", options.contentType, "txt", { now: options.now });
  const directory = await resolveOutputDir(undefined, { baseDirectory: options.baseDirectory, strict: true });
  const delivered = await deliverArtifact({
    data: text,
    directory,
    filename,
    mode: "files",
    successTemplate: "Content saved to file: {file_path} due to large size",
  });
  return delivered.file?.message ?? text;
}
