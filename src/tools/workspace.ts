import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { formatDateTime } from "../lib/analytics.js";
import {
  jsonResult,
  textResult,
  vendorDestructiveAnnotations,
  vendorReadAnnotations,
  vendorWriteAnnotations,
} from "../lib/helpers.js";
import { formatTimestamp } from "../lib/naming.js";
import {
  addRulesSchema,
  createAudioNativeSchema,
  createDictionarySchema,
  createProjectSchema,
  createSecretSchema,
  dictionaryIdSchema,
  downloadHistorySchema,
  emptySchema,
  getHistorySchema,
  historyItemAudioSchema,
  historyItemIdSchema,
  projectIdSchema,
  removeRulesSchema,
  secretIdSchema,
  toolIdSchema,
  updateToolSchema,
} from "../lib/schemas.js";
import { defineTool, deliverToolResult, outputModeNote, readInputFile, voiceOrDefault, type ToolContext } from "./context.js";
import { formatDependentAgents } from "./knowledge-base.js";

/** The vendor answers a single-item download with the audio itself, several with a zip. */
export function downloadExtension(contentType: string): string {
  return contentType.toLowerCase().includes("zip") ? "zip" : "mp3";
}

function registerHistoryTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "get_history",
    { title: "Get History", description: "List the generation history, newest first.", annotations: vendorReadAnnotations },
    getHistorySchema,
    async (args) => {
      const { history } = await ctx.api.getHistory({
        page_size: args.page_size,
        ...(args.start_after_history_item_id ? { start_after_history_item_id: args.start_after_history_item_id } : {}),
      });
      const lines = [`History Items: ${history.length}`];
      for (const item of history) {
        lines.push(
          `ID: ${item.history_item_id}`,
          `Voice: ${item.voice_name ?? "N/A"}`,
          `Content Type: ${item.content_type ?? "N/A"}`,
          `Date: ${item.date_unix != null ? formatDateTime(new Date(item.date_unix * 1000)) : "N/A"}`,
          "",
        );
      }
      return textResult(lines.join("\n"));
    },
  );

  defineTool(
    server,
    "get_history_item",
    { title: "Get History Item", description: "Get details of a history item.", annotations: vendorReadAnnotations },
    historyItemIdSchema,
    async (args) => jsonResult(await ctx.api.getHistoryItem(args.history_item_id)),
  );

  defineTool(
    server,
    "get_history_item_audio",
    { title: "Get History Item Audio", description: `Get the audio of a history item. ${outputModeNote(ctx)}`, annotations: vendorReadAnnotations },
    historyItemAudioSchema,
    async (args) => {
      const audio = await ctx.api.getHistoryItemAudio(args.history_item_id);
      return deliverToolResult(ctx, {
        data: audio,
        tag: "history",
        hint: args.history_item_id,
        ext: "mp3",
        outputDirectory: args.output_directory,
      });
    },
  );

  defineTool(
    server,
    "delete_history_item",
    { title: "Delete History Item", description: "Delete a history item.", annotations: vendorDestructiveAnnotations },
    historyItemIdSchema,
    async (args) => {
      await ctx.api.deleteHistoryItem(args.history_item_id);
      return textResult(`History item ${args.history_item_id} deleted successfully.`);
    },
  );

  defineTool(
    server,
    "download_history_items",
    {
      title: "Download History Items",
      description: `Download history items as one zip archive (a single item comes back as audio). ${outputModeNote(ctx)}`,
      annotations: vendorReadAnnotations,
    },
    downloadHistorySchema,
    async (args) => {
      const response = await ctx.api.downloadHistoryItems(args.history_item_ids);
      const ext = downloadExtension(response.contentType);
      return deliverToolResult(ctx, {
        data: response.body,
        tag: "history_download",
        hint: "",
        ext,
        filename: `history_download_${formatTimestamp(ctx.now())}.${ext}`,
        outputDirectory: args.output_directory,
      });
    },
  );
}

function registerPronunciationTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "list_pronunciation_dictionaries",
    { title: "List Pronunciation Dictionaries", description: "List pronunciation dictionaries.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => {
      const { pronunciation_dictionaries: dictionaries } = await ctx.api.listPronunciationDictionaries({});
      const lines = [`Pronunciation Dictionaries: ${dictionaries.length}`];
      for (const dictionary of dictionaries) {
        lines.push(`Name: ${dictionary.name}`, `ID: ${dictionary.id}`, "");
      }
      return textResult(lines.join("\n"));
    },
  );

  defineTool(
    server,
    "get_pronunciation_dictionary",
    { title: "Get Pronunciation Dictionary", description: "Get a pronunciation dictionary.", annotations: vendorReadAnnotations },
    dictionaryIdSchema,
    async (args) => jsonResult(await ctx.api.getPronunciationDictionary(args.dictionary_id)),
  );

  defineTool(
    server,
    "create_pronunciation_dictionary_from_rules",
    {
      title: "Create Pronunciation Dictionary",
      description:
        "Create a pronunciation dictionary from rules. Alias rules: {type: 'alias', string_to_replace, alias}. " +
        "Phoneme rules: {type: 'phoneme', string_to_replace, phoneme, alphabet: 'ipa' | 'cmu-arpabet'}.",
      annotations: vendorWriteAnnotations,
    },
    createDictionarySchema,
    async (args) => {
      const dictionary = await ctx.api.createPronunciationDictionary({
        name: args.name,
        ...(args.description ? { description: args.description } : {}),
        rules: args.rules,
      });
      return textResult(`Pronunciation dictionary created: ${dictionary.name} (ID: ${dictionary.id})`);
    },
  );

  defineTool(
    server,
    "add_pronunciation_rules",
    { title: "Add Pronunciation Rules", description: "Add rules to a pronunciation dictionary.", annotations: vendorWriteAnnotations },
    addRulesSchema,
    async (args) => {
      await ctx.api.addPronunciationRules(args.dictionary_id, args.rules);
      return textResult(`Added ${args.rules.length} rules to dictionary ${args.dictionary_id}`);
    },
  );

  defineTool(
    server,
    "remove_pronunciation_rules",
    {
      title: "Remove Pronunciation Rules",
      description: "Remove rules from a pronunciation dictionary by the strings they replace.",
      annotations: vendorDestructiveAnnotations,
    },
    removeRulesSchema,
    async (args) => {
      await ctx.api.removePronunciationRules(args.dictionary_id, args.rule_strings);
      return textResult(`Removed ${args.rule_strings.length} rules from dictionary ${args.dictionary_id}`);
    },
  );
}

function registerProjectTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "list_studio_projects",
    { title: "List Studio Projects", description: "List Studio projects.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => {
      const { projects } = await ctx.api.listStudioProjects();
      const lines = [`Studio Projects: ${projects.length}`];
      for (const project of projects) {
        lines.push(`Name: ${project.name}`, `ID: ${project.project_id}`, "");
      }
      return textResult(lines.join("\n"));
    },
  );

  defineTool(
    server,
    "create_studio_project",
    {
      title: "Create Studio Project",
      description: "Create a Studio project, optionally importing a web page as its content.",
      annotations: vendorWriteAnnotations,
    },
    createProjectSchema,
    async (args) => {
      const voiceId = voiceOrDefault(ctx, args.voice_id);
      const { project } = await ctx.api.createStudioProject({
        name: args.name,
        default_title_voice_id: voiceId,
        default_paragraph_voice_id: voiceId,
        ...(args.model_id ? { default_model_id: args.model_id } : {}),
        ...(args.from_url ? { from_url: args.from_url } : {}),
      });
      return textResult(`Studio project created: ${project.name} (ID: ${project.project_id})`);
    },
  );

  defineTool(
    server,
    "get_studio_project",
    { title: "Get Studio Project", description: "Get details of a Studio project.", annotations: vendorReadAnnotations },
    projectIdSchema,
    async (args) => jsonResult(await ctx.api.getStudioProject(args.project_id)),
  );

  defineTool(
    server,
    "delete_studio_project",
    { title: "Delete Studio Project", description: "Delete a Studio project.", annotations: vendorDestructiveAnnotations },
    projectIdSchema,
    async (args) => {
      await ctx.api.deleteStudioProject(args.project_id);
      return textResult(`Studio project ${args.project_id} deleted successfully.`);
    },
  );

  defineTool(
    server,
    "create_audio_native_project",
    {
      title: "Create Audio Native Project",
      description: "Create an Audio Native player project, optionally from a local text or HTML file.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    createAudioNativeSchema,
    async (args) => {
      const input = args.input_file_path ? await readInputFile(ctx, args.input_file_path, false) : undefined;
      const created = await ctx.api.createAudioNativeProject({
        name: args.name,
        ...(args.title ? { title: args.title } : {}),
        ...(args.author ? { author: args.author } : {}),
        ...(args.voice_id ? { voice_id: args.voice_id } : {}),
        ...(args.model_id ? { model_id: args.model_id } : {}),
        ...(input ? { file: input.file, auto_convert: true } : {}),
      });
      return textResult(`Audio Native project created: ${args.name} (ID: ${created.project_id})`);
    },
  );
}

function registerPlatformTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "list_webhooks",
    { title: "List Webhooks", description: "List the workspace webhooks.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => {
      const { webhooks } = await ctx.api.listWebhooks();
      const lines = [`Webhooks: ${webhooks.length}`];
      for (const webhook of webhooks) {
        lines.push(`URL: ${webhook.webhook_url}`, `ID: ${webhook.webhook_id}`, `Status: ${webhook.is_disabled ? "disabled" : "enabled"}`, "");
      }
      return textResult(lines.join("\n"));
    },
  );

  defineTool(
    server,
    "list_tools",
    { title: "List Tools", description: "List the agent platform tools of the workspace.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => {
      const { tools } = await ctx.api.listPlatformTools();
      const lines = [`Tools: ${tools.length}`, ""];
      for (const tool of tools) {
        lines.push(
          `Name: ${tool.tool_config.name}`,
          `ID: ${tool.id}`,
          `Type: ${tool.tool_config.type ?? "N/A"}`,
          `Description: ${tool.tool_config.description ?? "N/A"}`,
          "",
        );
      }
      return textResult(lines.join("\n"));
    },
  );

  defineTool(
    server,
    "get_tool",
    { title: "Get Tool", description: "Get an agent platform tool.", annotations: vendorReadAnnotations },
    toolIdSchema,
    async (args) => jsonResult(await ctx.api.getPlatformTool(args.tool_id)),
  );

  defineTool(
    server,
    "update_tool",
    { title: "Update Tool", description: "Replace the configuration of an agent platform tool.", annotations: vendorWriteAnnotations },
    updateToolSchema,
    async (args) => {
      const tool = await ctx.api.updatePlatformTool(args.tool_id, args.tool_config);
      return textResult(`Tool ${args.tool_id} updated successfully.\n${JSON.stringify(tool, null, 2)}`);
    },
  );

  defineTool(
    server,
    "delete_tool",
    { title: "Delete Tool", description: "Delete an agent platform tool.", annotations: vendorDestructiveAnnotations },
    toolIdSchema,
    async (args) => {
      await ctx.api.deletePlatformTool(args.tool_id);
      return textResult(`Tool ${args.tool_id} deleted successfully.`);
    },
  );

  defineTool(
    server,
    "get_tool_dependent_agents",
    { title: "Get Tool Dependent Agents", description: "List the agents that use a platform tool.", annotations: vendorReadAnnotations },
    toolIdSchema,
    async (args) => textResult(formatDependentAgents(`tool ${args.tool_id}`, await ctx.api.getPlatformToolDependentAgents(args.tool_id))),
  );

  defineTool(
    server,
    "list_workspace_secrets",
    { title: "List Workspace Secrets", description: "List workspace secrets (names only).", annotations: vendorReadAnnotations },
    emptySchema,
    async () => {
      const { secrets } = await ctx.api.listWorkspaceSecrets();
      const lines = [`Workspace Secrets: ${secrets.length}`];
      for (const secret of secrets) {
        lines.push(`Name: ${secret.name}`, `ID: ${secret.secret_id}`, "");
      }
      return textResult(lines.join("\n"));
    },
  );

  defineTool(
    server,
    "create_workspace_secret",
    { title: "Create Workspace Secret", description: "Store a secret for use by agent tools.", annotations: vendorWriteAnnotations },
    createSecretSchema,
    async (args) => {
      const secret = await ctx.api.createWorkspaceSecret(args.name, args.value);
      return textResult(`Workspace secret created: ${secret.name} (ID: ${secret.secret_id})`);
    },
  );

  defineTool(
    server,
    "delete_workspace_secret",
    { title: "Delete Workspace Secret", description: "Delete a workspace secret.", annotations: vendorDestructiveAnnotations },
    secretIdSchema,
    async (args) => {
      await ctx.api.deleteWorkspaceSecret(args.secret_id);
      return textResult(`Workspace secret ${args.secret_id} deleted successfully.`);
    },
  );
}

export function registerWorkspaceTools(server: McpServer, ctx: ToolContext): void {
  registerHistoryTools(server, ctx);
  registerPronunciationTools(server, ctx);
  registerProjectTools(server, ctx);
  registerPlatformTools(server, ctx);
}
