import fs from "node:fs";
import path from "node:path";
import type { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult, ToolAnnotations } from "@modelcontextprotocol/sdk/types.js";

import type { AppConfig } from "../lib/config.js";
import { deliverArtifact, outputModeDescription, toToolContent, type DeliveredResult } from "../lib/delivery.js";
import { ElevenLabsMcpError, errorMessage } from "../lib/errors.js";
import { buildErrorResult, COST_WARNING, debugLogRawArgs } from "../lib/helpers.js";
import { handleInputFile } from "../lib/input.js";
import { makeOutputFileName } from "../lib/naming.js";
import { resolveOutputDir } from "../lib/paths.js";
import type { ElevenLabsApi } from "../lib/vendor/api.js";
import type { VendorFile } from "../lib/vendor/transport.js";

/** Everything a tool handler may touch. Built once per process. */
export interface ToolContext {
  config: Readonly<AppConfig>;
  api: ElevenLabsApi;
  now: () => Date;
}

export interface ToolMeta {
  title: string;
  description: string;
  annotations: ToolAnnotations;
  /** Append the vendor cost warning to the description. */
  costly?: boolean;
}

/**
 * Register a tool whose arguments are parsed with `schema` before `handler`
 * runs. Any failure becomes an `isError` result carrying the message.
 */
export function defineTool<Shape extends z.ZodRawShape>(
  server: McpServer,
  name: string,
  meta: ToolMeta,
  schema: z.ZodObject<Shape>,
  handler: (args: z.output<z.ZodObject<Shape>>) => Promise<CallToolResult>,
): void {
  const description = meta.costly ? `${meta.description}\n\n${COST_WARNING}` : meta.description;
  server.registerTool<z.ZodRawShape, z.ZodRawShape>(
    name,
    {
      title: meta.title,
      description,
      inputSchema: schema.shape,
      annotations: meta.annotations,
    },
    async (args: unknown) => {
      try {
        debugLogRawArgs(name, args);
        return await handler(schema.parse(args));
      } catch (err) {
        return buildErrorResult(err, name);
      }
    },
  );
}

/** Description suffix naming where artifacts end up under the active output mode. */
export function outputModeNote(ctx: ToolContext): string {
  return `${outputModeDescription(ctx.config.outputMode, ctx.config.baseDirectory)}.`;
}

export function outputDirectory(ctx: ToolContext, requested: string | undefined): Promise<string> {
  return resolveOutputDir(requested, { baseDirectory: ctx.config.baseDirectory, strict: ctx.config.strictPaths });
}

export interface ArtifactSpec {
  data: Uint8Array | string;
  tag: string;
  hint: string;
  ext: string;
  outputDirectory?: string;
  successTemplate?: string;
  fullId?: boolean;
  /** Explicit file name; skips the namer. */
  filename?: string;
}

export async function materialize(ctx: ToolContext, artifact: ArtifactSpec): Promise<DeliveredResult> {
  const directory = await outputDirectory(ctx, artifact.outputDirectory);
  const filename = artifact.filename ?? makeOutputFileName(artifact.tag, artifact.hint, artifact.ext, { fullId: artifact.fullId, now: ctx.now() });
  return deliverArtifact({
    data: artifact.data,
    directory,
    filename,
    mode: ctx.config.outputMode,
    ...(artifact.successTemplate ? { successTemplate: artifact.successTemplate } : {}),
  });
}

export async function deliverToolResult(ctx: ToolContext, artifact: ArtifactSpec): Promise<CallToolResult> {
  return { content: toToolContent(await materialize(ctx, artifact)) };
}

export interface InputFile {
  path: string;
  file: VendorFile;
}

/** Validate a user-supplied input path and read it for upload. */
export async function readInputFile(ctx: ToolContext, filePath: string, audioCheck = true): Promise<InputFile> {
  const resolved = await handleInputFile(filePath, {
    audioCheck,
    baseDirectory: ctx.config.baseDirectory,
    baseConfigured: ctx.config.baseDirectoryConfigured,
  });
  let data: Buffer;
  try {
    data = await fs.promises.readFile(resolved);
  } catch (err: unknown) {
    throw new ElevenLabsMcpError("IOFailure", `Failed to read ${resolved}: ${errorMessage(err)}`, { cause: err });
  }
  return { path: resolved, file: { filename: path.basename(resolved), data } };
}

/** Voice id to use when the caller names none. */
export function voiceOrDefault(ctx: ToolContext, voiceId: string | undefined): string {
  return voiceId && voiceId.trim() ? voiceId : ctx.config.defaultVoiceId;
}

export function deliveredContent(result: DeliveredResult): CallToolResult {
  return { content: toToolContent(result) };
}
