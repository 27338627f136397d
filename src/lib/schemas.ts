/**
 * Zod schemas for the ElevenLabs MCP tools.
 * Exported for unit testing and type inference.
 *
 * Every schema is a plain z.object so its `.shape` can be handed to
 * `registerTool`; rules that span several fields are checked in the handlers.
 */

import { z } from "zod";

import { TEMPLATE_TYPES } from "./convai.js";

const nonEmptyString = z.string().refine((val) => val.trim().length > 0, { message: "Must be a non-empty string" });

const idSchema = z.string().min(1).max(200);

const unitInterval = z.number().min(0).max(1);

const outputDirectory = z.string().optional()
  .describe("Directory for the output file, relative to the base directory (absolute paths must stay inside it).");

const outputFormat = z.string().default("mp3_44100_128")
  .describe("Output format as codec_samplerate_bitrate, e.g. mp3_44100_128, mp3_22050_32, pcm_16000, ulaw_8000.");

const jsonObject = z.record(z.unknown());

// ─────────────────────────────────────────────────────────────────────────────
// Speech & audio
// ─────────────────────────────────────────────────────────────────────────────

const voiceSettingsShape = {
  stability: unitInterval.default(0.5).describe("Voice stability, 0..1. Lower is more expressive."),
  similarity_boost: unitInterval.default(0.75).describe("Adherence to the original voice, 0..1."),
  style: unitInterval.default(0).describe("Style exaggeration, 0..1."),
  use_speaker_boost: z.boolean().default(true),
  speed: z.number().min(0.7).max(1.2).default(1.0).describe("Speech rate, 0.7..1.2."),
};

export const textToSpeechSchema = z.object({
  text: nonEmptyString.describe("Text to convert to speech."),
  voice_name: z.string().optional().describe("Exact voice name. Do not combine with voice_id."),
  voice_id: z.string().optional().describe("Voice id. Do not combine with voice_name."),
  model_id: z.string().optional()
    .describe("Model id; defaults to ELEVENLABS_MODEL_ID or a language-based choice."),
  ...voiceSettingsShape,
  language: z.string().default("en").describe("ISO 639-1 language code."),
  output_format: outputFormat,
  output_directory: outputDirectory,
});
export type TextToSpeechArgs = z.input<typeof textToSpeechSchema>;

export const textToSpeechWithTimestampsSchema = z.object({
  text: nonEmptyString,
  voice_id: z.string().optional(),
  model_id: z.string().default("eleven_turbo_v2"),
  ...voiceSettingsShape,
  language: z.string().default("en"),
  output_format: outputFormat,
  output_directory: outputDirectory,
});

export const textToSpeechStreamSchema = z.object({
  text: nonEmptyString,
  voice_id: z.string().optional(),
  model_id: z.string().default("eleven_turbo_v2"),
  stability: unitInterval.default(0.5),
  similarity_boost: unitInterval.default(0.75),
  language: z.string().default("en"),
  output_format: outputFormat,
  output_directory: outputDirectory,
});

export const batchTextToSpeechSchema = z.object({
  input_directory: nonEmptyString.describe("Directory holding .txt and .md files."),
  voice_id: z.string().optional(),
  model_id: z.string().default("eleven_turbo_v2"),
  output_directory: outputDirectory,
});

export const speechToTextSchema = z.object({
  input_file_path: nonEmptyString.describe("Audio or video file to transcribe."),
  language_code: z.string().optional().describe("ISO 639-3 or 639-1 code; detected when omitted."),
  diarize: z.boolean().default(false).describe("Label speakers in the transcript."),
  save_transcript_to_file: z.boolean().default(true),
  return_transcript_to_client_directly: z.boolean().default(false),
  output_directory: outputDirectory,
});

export const textToSoundEffectsSchema = z.object({
  text: nonEmptyString.describe("Description of the sound effect."),
  duration_seconds: z.number()
    .min(0.5, { message: "Duration must be between 0.5 and 5 seconds" })
    .max(5, { message: "Duration must be between 0.5 and 5 seconds" })
    .default(2.0),
  output_format: outputFormat,
  loop: z.boolean().default(false),
  output_directory: outputDirectory,
});

export const isolateAudioSchema = z.object({
  input_file_path: nonEmptyString,
  output_directory: outputDirectory,
});

export const speechToSpeechSchema = z.object({
  input_file_path: nonEmptyString,
  voice_name: z.string().default("Adam"),
  output_directory: outputDirectory,
});

export const forcedAlignmentSchema = z.object({
  audio_file_path: nonEmptyString,
  transcript: nonEmptyString,
  output_directory: outputDirectory,
});

export const composeMusicSchema = z.object({
  prompt: z.string().optional(),
  composition_plan: jsonObject.optional().describe("Plan from create_composition_plan. Do not combine with prompt."),
  music_length_ms: z.number().int().min(10000).max(300000).optional(),
  output_directory: outputDirectory,
});

export const compositionPlanSchema = z.object({
  prompt: nonEmptyString,
  music_length_ms: z.number().int().min(10000).max(300000).optional(),
  source_composition_plan: jsonObject.optional(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Voices
// ─────────────────────────────────────────────────────────────────────────────

export const searchVoicesSchema = z.object({
  search: z.string().optional(),
  sort: z.enum(["created_at_unix", "name"]).default("name"),
  sort_direction: z.enum(["asc", "desc"]).default("desc"),
});

export const voiceIdSchema = z.object({ voice_id: idSchema });

export const emptySchema = z.object({});

const labelsSchema = z.record(z.string());

export const voiceCloneSchema = z.object({
  name: nonEmptyString,
  files: z.array(nonEmptyString).min(1).describe("Audio samples of the voice."),
  description: z.string().optional(),
  labels: labelsSchema.optional().describe("Labels such as accent, age, gender."),
});

export const textToVoiceSchema = z.object({
  voice_description: nonEmptyString,
  text: z.string().min(100).max(1000).optional()
    .describe("Preview text, 100..1000 characters; generated when omitted."),
  output_directory: outputDirectory,
});

export const createVoiceFromPreviewSchema = z.object({
  generated_voice_id: idSchema,
  voice_name: nonEmptyString,
  voice_description: nonEmptyString,
});

export const searchVoiceLibrarySchema = z.object({
  page: z.number().int().min(0).default(0),
  page_size: z.number().int().min(1).max(100).default(10),
  search: z.string().optional(),
});

export const editVoiceSchema = z.object({
  voice_id: idSchema,
  name: z.string().optional(),
  description: z.string().optional(),
  labels: labelsSchema.optional(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Agents
// ─────────────────────────────────────────────────────────────────────────────

export const createAgentSchema = z.object({
  name: nonEmptyString,
  first_message: nonEmptyString.describe("First message the agent says, e.g. \"Hi, how can I help you today?\""),
  system_prompt: nonEmptyString,
  voice_id: z.string().optional(),
  language: z.string().default("en"),
  llm: z.string().default("gemini-2.0-flash-001"),
  temperature: unitInterval.default(0.5),
  max_tokens: z.number().int().positive().optional(),
  asr_quality: z.enum(["high", "low"]).default("high"),
  model_id: z.string().default("eleven_turbo_v2"),
  optimize_streaming_latency: z.number().int().min(0).max(4).default(3),
  stability: unitInterval.default(0.5),
  similarity_boost: unitInterval.default(0.8),
  turn_timeout: z.number().int().positive().default(7),
  max_duration_seconds: z.number().int().positive().default(300),
  record_voice: z.boolean().default(true),
  retention_days: z.number().int().positive().default(730),
});

export const createAgentFromTemplateSchema = z.object({
  name: nonEmptyString,
  template_type: z.enum(TEMPLATE_TYPES),
  custom_instructions: z.string().optional().describe("Replaces the template's system prompt."),
  voice_id: z.string().optional(),
  language: z.string().default("en"),
  knowledge_base_source: z.string().optional().describe("URL, existing file path, or plain text."),
});

export const addKnowledgeBaseSchema = z.object({
  agent_id: idSchema,
  knowledge_base_name: nonEmptyString,
  url: z.string().url().optional(),
  input_file_path: z.string().optional().describe("epub, pdf, docx, txt or html file."),
  text: z.string().optional(),
});

export const agentIdSchema = z.object({ agent_id: idSchema });

export const updateAgentSchema = z.object({
  agent_id: idSchema,
  new_name: z.string().optional(),
  new_system_prompt: z.string().optional(),
  new_voice_id: z.string().optional(),
  new_language: z.string().optional(),
  new_temperature: unitInterval.optional(),
  new_stability: unitInterval.optional(),
  new_similarity_boost: unitInterval.optional(),
  update_first_message: z.boolean().default(false),
  first_message: z.string().optional(),
});

export const duplicateAgentSchema = z.object({
  agent_id: idSchema,
  name: z.string().optional(),
});

export const simulateConversationSchema = z.object({
  agent_id: idSchema,
  simulation_specification: jsonObject.describe("Simulated user configuration, e.g. { simulated_user_config: { first_message, language } }."),
  extra_evaluation_criteria: z.array(jsonObject).optional(),
  new_turns_limit: z.number().int().positive().optional(),
});

export const calculateLlmUsageSchema = z.object({
  agent_id: idSchema,
  prompt_length: z.number().int().min(0).optional().describe("Prompt length in characters; the agent's prompt when omitted."),
  number_of_pages: z.number().int().min(0).optional().describe("Pages of knowledge base content."),
  rag_enabled: z.boolean().optional(),
});

export const manageAgentLifecycleSchema = z.object({
  action: z.enum(["create", "update", "delete", "duplicate", "list"]),
  agent_id: z.string().optional(),
  new_name: z.string().optional(),
  copy_settings_from: z.string().optional(),
});

export const analyzeAgentPerformanceSchema = z.object({
  agent_id: idSchema,
  days_back: z.number().int().min(1).max(365).default(30),
  min_conversations: z.number().int().min(1).default(5),
});

export const analyticsReportSchema = z.object({
  agent_ids: nonEmptyString.describe("Comma-separated agent ids, or 'all'."),
  days_back: z.number().int().min(1).max(365).default(30),
  report_format: z.enum(["summary", "json", "csv"]).default("summary"),
  output_directory: outputDirectory,
});

// ─────────────────────────────────────────────────────────────────────────────
// Conversations
// ─────────────────────────────────────────────────────────────────────────────

export const listConversationsSchema = z.object({
  agent_id: z.string().optional(),
  cursor: z.string().optional(),
  call_start_before_unix: z.number().int().optional(),
  call_start_after_unix: z.number().int().optional(),
  page_size: z.number().int().min(1).default(30).describe("1..100; larger values are capped at 100."),
  max_length: z.number().int().positive().default(10000).describe("Longer output is saved to a file."),
});

export const conversationIdSchema = z.object({ conversation_id: idSchema });

export const conversationAudioSchema = z.object({
  conversation_id: idSchema,
  output_directory: outputDirectory,
});

export const conversationFeedbackSchema = z.object({
  conversation_id: idSchema,
  feedback: z.boolean().describe("true for like, false for dislike."),
});

// ─────────────────────────────────────────────────────────────────────────────
// Telephony
// ─────────────────────────────────────────────────────────────────────────────

export const phoneNumberIdSchema = z.object({ phone_number_id: idSchema });

export const createPhoneNumberSchema = z.object({
  phone_number: nonEmptyString,
  provider_type: z.enum(["twilio", "sip_trunk"]),
  label: z.string().optional(),
  twilio_sid: z.string().optional(),
  twilio_token: z.string().optional(),
});

export const updatePhoneNumberSchema = z.object({
  phone_number_id: idSchema,
  label: z.string().optional(),
  agent_id: z.string().optional().describe("Agent to assign to the number."),
});

export const outboundCallSchema = z.object({
  agent_id: idSchema,
  agent_phone_number_id: idSchema,
  to_number: z.string().regex(/^\+[1-9]\d{1,14}$/, { message: "Expected E.164 format, e.g. +15551234567" }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Knowledge base
// ─────────────────────────────────────────────────────────────────────────────

export const documentIdSchema = z.object({ document_id: idSchema });

export const listDocumentsSchema = z.object({
  search: z.string().optional(),
  page_size: z.number().int().min(1).max(100).default(30),
  cursor: z.string().optional(),
});

export const documentFromUrlSchema = z.object({ url: z.string().url(), name: nonEmptyString });

export const documentFromTextSchema = z.object({ name: nonEmptyString, text: nonEmptyString });

export const documentFromFileSchema = z.object({ file_path: nonEmptyString, name: z.string().optional() });

export const deleteDocumentSchema = z.object({
  document_id: idSchema,
  force: z.boolean().default(false).describe("Delete even when agents depend on the document."),
});

export const updateDocumentSchema = z.object({ document_id: idSchema, name: nonEmptyString });

export const documentChunkSchema = z.object({ document_id: idSchema, chunk_id: idSchema });

export const computeRagIndexSchema = z.object({
  document_id: idSchema,
  model: z.string().default("e5_mistral_7b_instruct"),
});

export const deleteRagIndexSchema = z.object({ document_id: idSchema, rag_index_id: idSchema });

// ─────────────────────────────────────────────────────────────────────────────
// Workspace
// ─────────────────────────────────────────────────────────────────────────────

export const getHistorySchema = z.object({
  page_size: z.number().int().min(1).max(1000).default(100),
  start_after_history_item_id: z.string().optional(),
});

export const historyItemIdSchema = z.object({ history_item_id: idSchema });

export const historyItemAudioSchema = z.object({ history_item_id: idSchema, output_directory: outputDirectory });

export const downloadHistorySchema = z.object({
  history_item_ids: z.array(idSchema).min(1),
  output_directory: outputDirectory,
});

export const pronunciationRuleSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("alias"), string_to_replace: nonEmptyString, alias: nonEmptyString }),
  z.object({
    type: z.literal("phoneme"),
    string_to_replace: nonEmptyString,
    phoneme: nonEmptyString,
    alphabet: z.enum(["ipa", "cmu-arpabet"]).default("ipa"),
  }),
]);

export const dictionaryIdSchema = z.object({ dictionary_id: idSchema });

export const createDictionarySchema = z.object({
  name: nonEmptyString,
  description: z.string().optional(),
  rules: z.array(pronunciationRuleSchema).default([]),
});
export type CreateDictionaryArgs = z.input<typeof createDictionarySchema>;

export const addRulesSchema = z.object({ dictionary_id: idSchema, rules: z.array(pronunciationRuleSchema).min(1) });

export const removeRulesSchema = z.object({ dictionary_id: idSchema, rule_strings: z.array(nonEmptyString).min(1) });

export const projectIdSchema = z.object({ project_id: idSchema });

export const createProjectSchema = z.object({
  name: nonEmptyString,
  from_url: z.string().url().optional().describe("Web page to import as the project's content."),
  voice_id: z.string().optional(),
  model_id: z.string().optional(),
});

export const createAudioNativeSchema = z.object({
  name: nonEmptyString,
  title: z.string().optional(),
  author: z.string().optional(),
  voice_id: z.string().optional(),
  model_id: z.string().optional(),
  input_file_path: z.string().optional().describe("Text or HTML file with the content to narrate."),
});

export const toolIdSchema = z.object({ tool_id: idSchema });

export const updateToolSchema = z.object({ tool_id: idSchema, tool_config: jsonObject });

export const createSecretSchema = z.object({ name: nonEmptyString, value: nonEmptyString });

export const secretIdSchema = z.object({ secret_id: idSchema });
