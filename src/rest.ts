/**
 * Plain JSON routes under /api for callers that do not speak MCP.
 * They reuse the vendor client and the tool defaults but skip file delivery:
 * audio comes back inline as base64 or as a streamed body.
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { z, ZodError } from "zod";

import { AGENT_DEFAULTS, createConversationConfig, createPlatformSettings } from "./lib/convai.js";
import { ElevenLabsMcpError, VendorError, errorMessage, isErrorWithCode } from "./lib/errors.js";
import { formatZodError } from "./lib/helpers.js";
import { log } from "./lib/logger.js";
import { formatDiarizedTranscript } from "./lib/transcript.js";
import type { ToolContext } from "./tools/context.js";
import { defaultTtsModel } from "./tools/speech.js";

const restLog = log.child("rest");

const base64File = z.object({
  filename: z.string().min(1),
  data_base64: z.string().min(1),
});

const ttsBody = z.object({
  text: z.string().trim().min(1),
  voice_id: z.string().optional(),
  model_id: z.string().optional(),
  language: z.string().default("en"),
  stability: z.number().min(0).max(1).default(0.5),
  similarity_boost: z.number().min(0).max(1).default(0.75),
  output_format: z.string().default("mp3_44100_128"),
});

const cloneBody = z.object({
  name: z.string().trim().min(1),
  description: z.string().optional(),
  files: z.array(base64File).min(1),
});

const agentBody = z.object({
  name: z.string().trim().min(1),
  first_message: z.string().trim().min(1),
  system_prompt: z.string().trim().min(1),
  voice_id: z.string().optional(),
  language: z.string().default(AGENT_DEFAULTS.language),
  llm: z.string().default(AGENT_DEFAULTS.llm),
  temperature: z.number().min(0).max(1).default(0.5),
});

const sfxBody = z.object({
  text: z.string().trim().min(1),
  duration_seconds: z.number().min(0.5).max(5).default(2),
  output_format: z.string().default("mp3_44100_128"),
  loop: z.boolean().default(false),
});

const sttBody = base64File.extend({
  language_code: z.string().optional(),
  diarize: z.boolean().default(false),
});

/** HTTP status for a failure raised while serving a request. */
export function httpStatusFor(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof VendorError) return err.status === 404 ? 404 : 500;
  if (isErrorWithCode(err, "InvalidArgument")) return 400;
  if (isErrorWithCode(err, "NotFound")) return 404;
  return 500;
}

export function sendError(res: Response, err: unknown): void {
  const status = httpStatusFor(err);
  const detail = err instanceof ZodError ? `Invalid request: ${formatZodError(err)}` : errorMessage(err);
  if (status >= 500) {
    restLog.error(detail, { stack: err instanceof Error ? err.stack : undefined });
  }
  res.status(status).json({ detail });
}

/** Express 4 does not await handlers; failures are answered here. */
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res) => {
    handler(req, res).catch((err: unknown) => {
      if (res.headersSent) {
        restLog.error("request failed after headers were sent", { path: req.path, error: errorMessage(err) });
        res.end();
        return;
      }
      sendError(res, err);
    });
  };
}

function requireApiKey(expected: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected || req.header("x-api-key") === expected) {
      next();
      return;
    }
    res.status(401).json({ detail: "Invalid API key" });
  };
}

function stringParam(req: Request, name: string): string {
  const value = req.params[name];
  if (!value) throw new ElevenLabsMcpError("InvalidArgument", `Missing path parameter: ${name}`);
  return value;
}

export function createRestRouter(ctx: ToolContext): express.Router {
  const router = express.Router();
  router.use(requireApiKey(ctx.config.http.restApiKey));

  router.post(
    "/tts",
    route(async (req, res) => {
      const body = ttsBody.parse(req.body);
      const voiceId = body.voice_id || ctx.config.defaultVoiceId;
      const audio = await ctx.api.textToSpeech({
        voiceId,
        text: body.text,
        modelId: body.model_id ?? defaultTtsModel(body.language, ctx.config.defaultModelId),
        outputFormat: body.output_format,
        voiceSettings: { stability: body.stability, similarity_boost: body.similarity_boost },
      });
      res.json({ audio_base64: Buffer.from(audio).toString("base64"), content_type: "audio/mpeg", voice_id: voiceId });
    }),
  );

  router.post(
    "/tts/stream",
    route(async (req, res) => {
      const body = ttsBody.parse(req.body);
      const chunks = await ctx.api.textToSpeechStream({
        voiceId: body.voice_id || ctx.config.defaultVoiceId,
        text: body.text,
        modelId: body.model_id ?? "eleven_turbo_v2",
        outputFormat: body.output_format,
        voiceSettings: { stability: body.stability, similarity_boost: body.similarity_boost },
      });
      res.status(200).type("audio/mpeg");
      for await (const chunk of chunks) {
        res.write(chunk);
      }
      res.end();
    }),
  );

  router.get(
    "/voices",
    route(async (_req, res) => {
      const { voices } = await ctx.api.searchVoices({});
      res.json({ voices: voices.map((v) => ({ voice_id: v.voice_id, name: v.name ?? null, category: v.category ?? null })) });
    }),
  );

  router.get(
    "/voices/:voiceId",
    route(async (req, res) => {
      res.json(await ctx.api.getVoice(stringParam(req, "voiceId")));
    }),
  );

  router.post(
    "/voices/clone",
    route(async (req, res) => {
      const body = cloneBody.parse(req.body);
      const created = await ctx.api.addVoice({
        name: body.name,
        files: body.files.map((f) => ({ filename: f.filename, data: Buffer.from(f.data_base64, "base64") })),
        ...(body.description ? { description: body.description } : {}),
      });
      res.status(201).json({ voice_id: created.voice_id, name: body.name });
    }),
  );

  router.get(
    "/agents",
    route(async (_req, res) => {
      const { agents } = await ctx.api.listAgents();
      res.json({ agents });
    }),
  );

  router.post(
    "/agents",
    route(async (req, res) => {
      const body = agentBody.parse(req.body);
      const created = await ctx.api.createAgent({
        name: body.name,
        conversation_config: createConversationConfig({
          language: body.language,
          systemPrompt: body.system_prompt,
          llm: body.llm,
          firstMessage: body.first_message,
          temperature: body.temperature,
          asrQuality: AGENT_DEFAULTS.asrQuality,
          voiceId: body.voice_id || ctx.config.defaultVoiceId,
          modelId: AGENT_DEFAULTS.modelId,
          optimizeStreamingLatency: AGENT_DEFAULTS.optimizeStreamingLatency,
          stability: 0.5,
          similarityBoost: 0.8,
          turnTimeout: AGENT_DEFAULTS.turnTimeout,
          maxDurationSeconds: AGENT_DEFAULTS.maxDurationSeconds,
        }),
        platform_settings: createPlatformSettings(AGENT_DEFAULTS.recordVoice, AGENT_DEFAULTS.retentionDays),
      });
      res.status(201).json({ agent_id: created.agent_id, name: body.name });
    }),
  );

  router.get(
    "/agents/:agentId",
    route(async (req, res) => {
      res.json(await ctx.api.getAgent(stringParam(req, "agentId")));
    }),
  );

  router.post(
    "/sfx",
    route(async (req, res) => {
      const body = sfxBody.parse(req.body);
      const audio = await ctx.api.soundGeneration({
        text: body.text,
        durationSeconds: body.duration_seconds,
        outputFormat: body.output_format,
        loop: body.loop,
      });
      res.json({ audio_base64: Buffer.from(audio).toString("base64"), content_type: "audio/mpeg" });
    }),
  );

  router.post(
    "/stt",
    route(async (req, res) => {
      const body = sttBody.parse(req.body);
      const payload = await ctx.api.speechToText({
        file: { filename: body.filename, data: Buffer.from(body.data_base64, "base64") },
        modelId: "scribe_v1",
        ...(body.language_code ? { languageCode: body.language_code } : {}),
        diarize: body.diarize,
        tagAudioEvents: true,
      });
      res.json({
        text: payload.text,
        ...(body.diarize ? { transcript: formatDiarizedTranscript(payload) } : {}),
        language_code: payload.language_code ?? null,
      });
    }),
  );

  return router;
}
