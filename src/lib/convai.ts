import fs from "node:fs";
import { z } from "zod";

import { ElevenLabsMcpError, errorMessage } from "./errors.js";
import type { JsonObject } from "./vendor/responses.js";

export interface ConversationConfigInput {
  language: string;
  systemPrompt: string;
  llm: string;
  firstMessage: string;
  temperature: number;
  maxTokens?: number;
  asrQuality: string;
  voiceId?: string;
  modelId: string;
  optimizeStreamingLatency: number;
  stability: number;
  similarityBoost: number;
  turnTimeout: number;
  maxDurationSeconds: number;
}

/** Defaults shared by template, basic and explicitly configured agents. */
export const AGENT_DEFAULTS = {
  language: "en",
  llm: "gemini-2.0-flash-001",
  asrQuality: "high",
  modelId: "eleven_turbo_v2",
  optimizeStreamingLatency: 3,
  turnTimeout: 7,
  maxDurationSeconds: 300,
  recordVoice: true,
  retentionDays: 730,
} as const;

export function createConversationConfig(input: ConversationConfigInput): JsonObject {
  return {
    agent: {
      language: input.language,
      first_message: input.firstMessage,
      prompt: {
        prompt: input.systemPrompt,
        llm: input.llm,
        temperature: input.temperature,
        ...(input.maxTokens !== undefined ? { max_tokens: input.maxTokens } : {}),
        tools: [{ type: "system", name: "end_call", description: "" }],
        knowledge_base: [],
      },
    },
    asr: {
      quality: input.asrQuality,
      provider: "elevenlabs",
      user_input_audio_format: "pcm_16000",
      keywords: [],
    },
    tts: {
      ...(input.voiceId ? { voice_id: input.voiceId } : {}),
      model_id: input.modelId,
      agent_output_audio_format: "pcm_16000",
      optimize_streaming_latency: input.optimizeStreamingLatency,
      stability: input.stability,
      similarity_boost: input.similarityBoost,
    },
    turn: { turn_timeout: input.turnTimeout },
    conversation: { max_duration_seconds: input.maxDurationSeconds },
  };
}

export function createPlatformSettings(recordVoice: boolean, retentionDays: number): JsonObject {
  return {
    widget: { variant: "full", avatar: { type: "orb" } },
    data_collection: {},
    overrides: {},
    privacy: {
      record_voice: recordVoice,
      retention_days: retentionDays,
      delete_transcript_and_pii: true,
      delete_audio: true,
      apply_to_existing_conversations: false,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Templates
// ═══════════════════════════════════════════════════════════════════════════════

export const TEMPLATE_TYPES = [
  "customer_service",
  "sales_assistant",
  "technical_support",
  "personal_assistant",
  "creative_writer",
  "educator",
  "therapist",
  "interviewer",
  "trainer",
] as const;
export type TemplateType = (typeof TEMPLATE_TYPES)[number];

const templateSchema = z.object({
  system_prompt: z.string().min(1),
  first_message: z.string().min(1),
  llm: z.string().min(1),
  stability: z.number().min(0).max(1),
  similarity_boost: z.number().min(0).max(1),
});
export type AgentTemplate = z.infer<typeof templateSchema>;

const templatesSchema = z.object({
  customer_service: templateSchema,
  sales_assistant: templateSchema,
  technical_support: templateSchema,
  personal_assistant: templateSchema,
  creative_writer: templateSchema,
  educator: templateSchema,
  therapist: templateSchema,
  interviewer: templateSchema,
  trainer: templateSchema,
}) satisfies z.ZodType<Record<TemplateType, AgentTemplate>>;

export const TEMPLATES_FILE = new URL("../../data/agent-templates.json", import.meta.url);

let cachedTemplates: Map<TemplateType, AgentTemplate> | undefined;

export function loadAgentTemplates(file: URL = TEMPLATES_FILE): Map<TemplateType, AgentTemplate> {
  if (file === TEMPLATES_FILE && cachedTemplates) return cachedTemplates;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err: unknown) {
    throw new ElevenLabsMcpError("InvalidConfiguration", `Cannot read agent templates: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = templatesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ElevenLabsMcpError("InvalidConfiguration", `Invalid agent templates: ${parsed.error.issues[0]?.message ?? "unknown error"}`);
  }
  const templates = new Map<TemplateType, AgentTemplate>();
  for (const type of TEMPLATE_TYPES) {
    templates.set(type, parsed.data[type]);
  }
  if (file === TEMPLATES_FILE) cachedTemplates = templates;
  return templates;
}

/** "customer_service" -> "Customer_Service" */
export function templateTitle(type: string): string {
  return type.replace(/(^|[^A-Za-z])([a-z])/g, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}
