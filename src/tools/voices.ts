import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { aggregateResults, type DeliveredResult } from "../lib/delivery.js";
import { errorMessage } from "../lib/errors.js";
import {
  jsonResult,
  textResult,
  vendorDestructiveAnnotations,
  vendorReadAnnotations,
  vendorWriteAnnotations,
} from "../lib/helpers.js";
import { log } from "../lib/logger.js";
import {
  createVoiceFromPreviewSchema,
  editVoiceSchema,
  emptySchema,
  searchVoiceLibrarySchema,
  searchVoicesSchema,
  textToVoiceSchema,
  voiceCloneSchema,
  voiceIdSchema,
} from "../lib/schemas.js";
import type { SharedVoice, Voice } from "../lib/vendor/responses.js";
import { defineTool, materialize, outputModeNote, readInputFile, type ToolContext } from "./context.js";

function fineTuningStatus(voice: Voice): string {
  const state = voice.fine_tuning?.state;
  if (!state) return "Not applicable";
  const entries = Object.entries(state);
  return entries.length > 0 ? entries.map(([model, s]) => `${model}: ${s}`).join(", ") : "Not applicable";
}

/** One block per shared voice; optional attributes are left out when empty. */
export function formatSharedVoice(voice: SharedVoice): string {
  const languages = voice.verified_languages?.length
    ? voice.verified_languages.map((l) => (l.accent ? `${l.language} (${l.accent})` : l.language)).join(", ")
    : "N/A";
  const details = [`Name: ${voice.name}`, `ID: ${voice.voice_id}`, `Category: ${voice.category ?? "N/A"}`];
  if (voice.gender) details.push(`Gender: ${voice.gender}`);
  if (voice.age) details.push(`Age: ${voice.age}`);
  if (voice.accent) details.push(`Accent: ${voice.accent}`);
  if (voice.description) details.push(`Description: ${voice.description}`);
  if (voice.use_case) details.push(`Use Case: ${voice.use_case}`);
  details.push(`Languages: ${languages}`);
  if (voice.preview_url) details.push(`Preview URL: ${voice.preview_url}`);
  return details.join("\n");
}

export function registerVoiceTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "search_voices",
    {
      title: "Search Voices",
      description: "Search the voices already in the user's library. Searches name, description, labels and category.",
      annotations: vendorReadAnnotations,
    },
    searchVoicesSchema,
    async (args) => {
      const { voices } = await ctx.api.searchVoices({
        ...(args.search ? { search: args.search } : {}),
        sort: args.sort,
        sort_direction: args.sort_direction,
      });
      return jsonResult(voices.map((v) => ({ id: v.voice_id, name: v.name ?? null, category: v.category ?? null })));
    },
  );

  defineTool(
    server,
    "get_voice",
    { title: "Get Voice", description: "Get details of a specific voice.", annotations: vendorReadAnnotations },
    voiceIdSchema,
    async (args) => {
      const voice = await ctx.api.getVoice(args.voice_id);
      return jsonResult({
        id: voice.voice_id,
        name: voice.name ?? null,
        category: voice.category ?? null,
        fine_tuning_status: voice.fine_tuning?.state ?? null,
      });
    },
  );

  defineTool(
    server,
    "list_models",
    { title: "List Models", description: "List all available models.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => {
      const models = await ctx.api.listModels();
      return jsonResult(
        models.map((m) => ({
          id: m.model_id,
          name: m.name ?? null,
          languages: (m.languages ?? []).map((l) => ({ language_id: l.language_id, name: l.name })),
        })),
      );
    },
  );

  defineTool(
    server,
    "voice_clone",
    {
      title: "Voice Clone",
      description: "Create an instant voice clone from one or more audio samples. Optional labels describe accent, age, gender or use case.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    voiceCloneSchema,
    async (args) => {
      const inputs = [];
      for (const file of args.files) {
        inputs.push(await readInputFile(ctx, file));
      }
      const created = await ctx.api.addVoice({
        name: args.name,
        files: inputs.map((i) => i.file),
        ...(args.description ? { description: args.description } : {}),
        ...(args.labels ? { labels: args.labels } : {}),
      });
      return textResult(
        `Voice cloned successfully: Name: ${args.name}\nID: ${created.voice_id}\nDescription: ${args.description ?? "N/A"}`,
      );
    },
  );

  defineTool(
    server,
    "text_to_voice",
    {
      title: "Text to Voice",
      description:
        `Design a voice from a text description. Creates three previews with slight variations. ${outputModeNote(ctx)} ` +
        "Preview text is generated when none is given. Preview files are named voice_design_<generated_voice_id>_<timestamp>.mp3.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    textToVoiceSchema,
    async (args) => {
      const { previews } = await ctx.api.createVoicePreviews({
        voice_description: args.voice_description,
        ...(args.text ? { text: args.text } : {}),
        auto_generate_text: args.text === undefined,
      });

      const results: DeliveredResult[] = [];
      for (const preview of previews) {
        results.push(
          await materialize(ctx, {
            data: Buffer.from(preview.audio_base_64, "base64"),
            tag: "voice_design",
            hint: preview.generated_voice_id,
            ext: "mp3",
            fullId: true,
            outputDirectory: args.output_directory,
          }),
        );
      }
      const ids = previews.map((p) => p.generated_voice_id).join(", ");
      return { content: aggregateResults(results, ctx.config.outputMode, `Generated voice IDs are: ${ids}`) };
    },
  );

  defineTool(
    server,
    "create_voice_from_preview",
    {
      title: "Create Voice from Preview",
      description: "Add a generated voice to the voice library, using a generated_voice_id from text_to_voice.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    createVoiceFromPreviewSchema,
    async (args) => {
      const voice = await ctx.api.createVoiceFromPreview(args);
      return textResult(`Success. Voice created: ${voice.name ?? args.voice_name} with ID:${voice.voice_id}`);
    },
  );

  defineTool(
    server,
    "search_voice_library",
    {
      title: "Search Voice Library",
      description: "Search the shared voice library across all users (0-indexed pages of 1-100 voices).",
      annotations: vendorReadAnnotations,
    },
    searchVoiceLibrarySchema,
    async (args) => {
      const { voices } = await ctx.api.searchSharedVoices({
        page: args.page,
        page_size: args.page_size,
        ...(args.search ? { search: args.search } : {}),
      });
      if (voices.length === 0) {
        return textResult("No shared voices found with the specified criteria.");
      }
      return textResult(`Shared Voices:\n\n${voices.map(formatSharedVoice).join("\n\n")}`);
    },
  );

  defineTool(
    server,
    "edit_voice",
    {
      title: "Edit Voice",
      description: "Change the name, description or labels of a voice. The current name is kept when none is given.",
      annotations: vendorWriteAnnotations,
    },
    editVoiceSchema,
    async (args) => {
      const name = args.name ?? (await ctx.api.getVoice(args.voice_id)).name ?? args.voice_id;
      await ctx.api.editVoice(args.voice_id, {
        name,
        ...(args.description !== undefined ? { description: args.description } : {}),
        ...(args.labels ? { labels: args.labels } : {}),
      });
      return textResult(`Voice updated successfully: ${name} (ID: ${args.voice_id})`);
    },
  );

  defineTool(
    server,
    "get_voice_settings",
    { title: "Get Voice Settings", description: "Get the settings of a specific voice.", annotations: vendorReadAnnotations },
    voiceIdSchema,
    async (args) => jsonResult(await ctx.api.getVoiceSettings(args.voice_id)),
  );

  defineTool(
    server,
    "get_default_voice_settings",
    { title: "Get Default Voice Settings", description: "Get the default voice settings.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => jsonResult(await ctx.api.getDefaultVoiceSettings()),
  );

  defineTool(
    server,
    "delete_voice",
    { title: "Delete Voice", description: "Delete a voice from the library.", annotations: vendorDestructiveAnnotations },
    voiceIdSchema,
    async (args) => {
      await ctx.api.deleteVoice(args.voice_id);
      return textResult(`Voice ${args.voice_id} deleted successfully.`);
    },
  );

  defineTool(
    server,
    "analyze_voice_quality",
    {
      title: "Analyze Voice Quality",
      description: "Summarize a voice's basic information, settings and fine-tuning state.",
      annotations: vendorReadAnnotations,
    },
    voiceIdSchema,
    async (args) => {
      const voice = await ctx.api.getVoice(args.voice_id);

      let settingsInfo: string;
      try {
        const settings = await ctx.api.getVoiceSettings(args.voice_id);
        settingsInfo = `Voice Settings:\n${JSON.stringify(settings, null, 2)}`;
      } catch (err: unknown) {
        log.child("tools:analyze_voice_quality").warn("voice settings unavailable", { voiceId: args.voice_id, error: errorMessage(err) });
        settingsInfo = "Voice Settings: Not available";
      }

      const name = voice.name ?? "N/A";
      return textResult(
        [
          `Voice Quality Analysis for ${name} (ID: ${args.voice_id})`,
          "",
          "Basic Information:",
          `- Name: ${name}`,
          `- Category: ${voice.category ?? "N/A"}`,
          `- Description: ${voice.description || "N/A"}`,
          "",
          settingsInfo,
          "",
          "Quality Indicators:",
          `- Fine-tuning Status: ${fineTuningStatus(voice)}`,
          "- Available: Yes",
        ].join("\n"),
      );
    },
  );

  defineTool(
    server,
    "check_subscription",
    {
      title: "Check Subscription",
      description: "Check the current subscription status. Useful to measure API usage.",
      annotations: vendorReadAnnotations,
    },
    emptySchema,
    async () => jsonResult(await ctx.api.getSubscription()),
  );

  defineTool(
    server,
    "get_user_info",
    { title: "Get User Info", description: "Get information about the current user.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => jsonResult(await ctx.api.getUser()),
  );
}
