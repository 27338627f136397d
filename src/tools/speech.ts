import fs from "node:fs";
import path from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { expandHome } from "../lib/env.js";
import { ElevenLabsMcpError, errnoCode, errorMessage, invalidArgument } from "../lib/errors.js";
import { collectChunks, deliverArtifact } from "../lib/delivery.js";
import { textResult, vendorWriteAnnotations } from "../lib/helpers.js";
import { log } from "../lib/logger.js";
import {
  batchTextToSpeechSchema,
  forcedAlignmentSchema,
  isolateAudioSchema,
  speechToSpeechSchema,
  speechToTextSchema,
  textToSoundEffectsSchema,
  textToSpeechSchema,
  textToSpeechStreamSchema,
  textToSpeechWithTimestampsSchema,
} from "../lib/schemas.js";
import { formatDiarizedTranscript } from "../lib/transcript.js";
import type { Voice } from "../lib/vendor/responses.js";
import { defineTool, deliverToolResult, outputDirectory, outputModeNote, readInputFile, voiceOrDefault, type ToolContext } from "./context.js";

const FLASH_LANGUAGES = ["hu", "no", "vi"];
const STS_MODEL = "eleven_multilingual_sts_v2";
const STT_MODEL = "scribe_v1";
const BATCH_EXTENSIONS = [".txt", ".md"];

/** Caller's model, else the configured default, else a language-based choice. */
export function defaultTtsModel(language: string, configured: string | undefined): string {
  if (configured) return configured;
  return FLASH_LANGUAGES.includes(language) ? "eleven_flash_v2_5" : "eleven_multilingual_v2";
}

/** Exact name match among the vendor's search results. */
export async function findVoiceByName(ctx: ToolContext, name: string): Promise<Voice> {
  const { voices } = await ctx.api.searchVoices({ search: name });
  if (voices.length === 0) {
    throw new ElevenLabsMcpError("NotFound", "No voices found with that name.");
  }
  const voice = voices.find((v) => v.name === name);
  if (!voice) {
    throw new ElevenLabsMcpError("NotFound", `Voice with name: ${name} does not exist.`);
  }
  return voice;
}

async function listBatchFiles(directory: string): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(directory, { withFileTypes: true });
  } catch (err: unknown) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new ElevenLabsMcpError("FileNotFound", `Input directory ${directory} does not exist or is not a directory`, { cause: err });
    }
    throw new ElevenLabsMcpError("IOFailure", `Cannot read input directory ${directory}: ${errorMessage(err)}`, { cause: err });
  }
  return entries
    .filter((e) => e.isFile() && BATCH_EXTENSIONS.includes(path.extname(e.name).toLowerCase()))
    .map((e) => e.name)
    .sort();
}

export function registerSpeechTools(server: McpServer, ctx: ToolContext): void {
  const modeNote = outputModeNote(ctx);

  defineTool(
    server,
    "text_to_speech",
    {
      title: "Text to Speech",
      description: `Convert text to speech with a given voice. ${modeNote}\n\nOnly one of voice_id or voice_name can be provided. If none are provided, the default voice is used.`,
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    textToSpeechSchema,
    async (args) => {
      if (args.voice_id && args.voice_name) {
        throw invalidArgument("voice_id and voice_name cannot both be provided.");
      }

      let voice: Voice | undefined;
      if (args.voice_id) {
        voice = await ctx.api.getVoice(args.voice_id);
      } else if (args.voice_name) {
        voice = await findVoiceByName(ctx, args.voice_name);
      }
      const voiceId = voice?.voice_id ?? ctx.config.defaultVoiceId;
      const modelId = args.model_id ?? defaultTtsModel(args.language, ctx.config.defaultModelId);

      const audio = await ctx.api.textToSpeech({
        voiceId,
        text: args.text,
        modelId,
        outputFormat: args.output_format,
        voiceSettings: {
          stability: args.stability,
          similarity_boost: args.similarity_boost,
          style: args.style,
          use_speaker_boost: args.use_speaker_boost,
          speed: args.speed,
        },
      });

      return deliverToolResult(ctx, {
        data: audio,
        tag: "tts",
        hint: args.text,
        ext: "mp3",
        outputDirectory: args.output_directory,
        successTemplate: `Success. File saved as: {file_path}. Voice used: ${voice?.name ?? voiceId}`,
      });
    },
  );

  defineTool(
    server,
    "text_to_speech_with_timestamps",
    {
      title: "Text to Speech with Timestamps",
      description: `Convert text to speech with character-level timestamps and save the alignment as JSON. ${modeNote}`,
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    textToSpeechWithTimestampsSchema,
    async (args) => {
      const voiceId = voiceOrDefault(ctx, args.voice_id);
      if (args.voice_id) await ctx.api.getVoice(voiceId);

      const payload = await ctx.api.textToSpeechWithTimestamps({
        voiceId,
        text: args.text,
        modelId: args.model_id,
        outputFormat: args.output_format,
        voiceSettings: {
          stability: args.stability,
          similarity_boost: args.similarity_boost,
          style: args.style,
          use_speaker_boost: args.use_speaker_boost,
          speed: args.speed,
        },
      });

      return deliverToolResult(ctx, {
        data: JSON.stringify(payload, null, 2),
        tag: "tts_ts",
        hint: args.text,
        ext: "json",
        outputDirectory: args.output_directory,
      });
    },
  );

  defineTool(
    server,
    "text_to_speech_stream",
    {
      title: "Text to Speech (Streaming)",
      description: `Synthesize speech through the streaming endpoint; the stream is collected into one audio file. ${modeNote}`,
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    textToSpeechStreamSchema,
    async (args) => {
      const voiceId = voiceOrDefault(ctx, args.voice_id);
      if (args.voice_id) await ctx.api.getVoice(voiceId);

      const chunks = await ctx.api.textToSpeechStream({
        voiceId,
        text: args.text,
        modelId: args.model_id,
        outputFormat: args.output_format,
        voiceSettings: { stability: args.stability, similarity_boost: args.similarity_boost },
      });
      const audio = await collectChunks(chunks);

      return deliverToolResult(ctx, {
        data: audio,
        tag: "tts_stream",
        hint: args.text,
        ext: "mp3",
        outputDirectory: args.output_directory,
      });
    },
  );

  defineTool(
    server,
    "batch_text_to_speech",
    {
      title: "Batch Text to Speech",
      description:
        "Convert every .txt and .md file in a directory to speech. Each file becomes <name>.mp3 in the output directory " +
        `(default: ${ctx.config.baseDirectory}). A failing file is reported and the batch continues.`,
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    batchTextToSpeechSchema,
    async (args) => {
      const inputDir = path.resolve(ctx.config.baseDirectory, expandHome(args.input_directory.trim()));
      const files = await listBatchFiles(inputDir);
      if (files.length === 0) {
        throw invalidArgument("No .txt or .md files found in the input directory");
      }

      const outDir = await outputDirectory(ctx, args.output_directory);
      const voiceId = voiceOrDefault(ctx, args.voice_id);
      const batchLog = log.child("tools:batch_text_to_speech");
      const lines: string[] = [];

      for (const name of files) {
        try {
          const text = (await fs.promises.readFile(path.join(inputDir, name), "utf8")).trim();
          if (!text) {
            lines.push(`⚠ ${name} (empty file)`);
            continue;
          }
          const audio = await ctx.api.textToSpeech({
            voiceId,
            text,
            modelId: args.model_id,
            outputFormat: "mp3_44100_128",
            voiceSettings: { stability: 0.5, similarity_boost: 0.75 },
          });
          const target = `${path.parse(name).name}.mp3`;
          await deliverArtifact({ data: audio, directory: outDir, filename: target, mode: "files" });
          lines.push(`✓ ${name} -> ${target}`);
        } catch (err: unknown) {
          batchLog.warn("file failed", { file: name, error: errorMessage(err) });
          lines.push(`✗ ${name} (error: ${errorMessage(err)})`);
        }
      }

      return textResult(`Batch TTS completed for ${files.length} files:\n${lines.join("\n")}`);
    },
  );

  defineTool(
    server,
    "speech_to_text",
    {
      title: "Speech to Text",
      description:
        `Transcribe speech from an audio or video file. When save_transcript_to_file is true: ${modeNote} ` +
        "When return_transcript_to_client_directly is true the transcript is returned as text regardless of output mode.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    speechToTextSchema,
    async (args) => {
      if (!args.save_transcript_to_file && !args.return_transcript_to_client_directly) {
        throw invalidArgument("Must save transcript to file or return it to the client directly.");
      }
      const input = await readInputFile(ctx, args.input_file_path);
      const languageCode = args.language_code?.trim() ? args.language_code : undefined;

      const transcription = await ctx.api.speechToText({
        file: input.file,
        modelId: STT_MODEL,
        ...(languageCode ? { languageCode } : {}),
        diarize: args.diarize,
        tagAudioEvents: true,
      });
      const transcript = args.diarize ? formatDiarizedTranscript(transcription) : transcription.text;

      if (args.return_transcript_to_client_directly) {
        return textResult(transcript);
      }
      return deliverToolResult(ctx, {
        data: transcript,
        tag: "stt",
        hint: path.basename(input.path),
        ext: "txt",
        outputDirectory: args.output_directory,
        successTemplate: "Transcription saved to {file_path}",
      });
    },
  );

  defineTool(
    server,
    "text_to_sound_effects",
    {
      title: "Text to Sound Effects",
      description: `Convert a text description of a sound effect into audio. Duration must be between 0.5 and 5 seconds. ${modeNote}`,
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    textToSoundEffectsSchema,
    async (args) => {
      const audio = await ctx.api.soundGeneration({
        text: args.text,
        durationSeconds: args.duration_seconds,
        outputFormat: args.output_format,
        loop: args.loop,
      });
      return deliverToolResult(ctx, { data: audio, tag: "sfx", hint: args.text, ext: "mp3", outputDirectory: args.output_directory });
    },
  );

  defineTool(
    server,
    "isolate_audio",
    {
      title: "Isolate Audio",
      description: `Remove background noise and isolate speech from an audio file. ${modeNote}`,
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    isolateAudioSchema,
    async (args) => {
      const input = await readInputFile(ctx, args.input_file_path);
      const audio = await ctx.api.audioIsolation(input.file);
      return deliverToolResult(ctx, {
        data: audio,
        tag: "iso",
        hint: path.basename(input.path),
        ext: "mp3",
        outputDirectory: args.output_directory,
      });
    },
  );

  defineTool(
    server,
    "speech_to_speech",
    {
      title: "Speech to Speech",
      description: `Transform the voice in an audio file into another voice, selected by name. ${modeNote}`,
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    speechToSpeechSchema,
    async (args) => {
      const voice = await findVoiceByName(ctx, args.voice_name);
      const input = await readInputFile(ctx, args.input_file_path);
      const audio = await ctx.api.speechToSpeech({
        voiceId: voice.voice_id,
        file: input.file,
        modelId: STS_MODEL,
        outputFormat: "mp3_44100_128",
      });
      return deliverToolResult(ctx, {
        data: audio,
        tag: "sts",
        hint: path.basename(input.path),
        ext: "mp3",
        outputDirectory: args.output_directory,
      });
    },
  );

  defineTool(
    server,
    "create_forced_alignment",
    {
      title: "Create Forced Alignment",
      description: `Align an audio file with its transcript and save word and character timings as JSON. ${modeNote}`,
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    forcedAlignmentSchema,
    async (args) => {
      const input = await readInputFile(ctx, args.audio_file_path);
      const alignment = await ctx.api.forcedAlignment(input.file, args.transcript);
      return deliverToolResult(ctx, {
        data: JSON.stringify(alignment, null, 2),
        tag: "alignment",
        hint: path.basename(input.path),
        ext: "json",
        outputDirectory: args.output_directory,
      });
    },
  );
}
