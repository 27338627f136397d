import fs from "node:fs";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import {
  analysisPeriod,
  buildAnalyticsReport,
  computeStats,
  formatDate,
  formatDateTime,
  formatPerformanceReport,
  renderAnalyticsReport,
  unixSeconds,
  type AgentReportInput,
} from "../lib/analytics.js";
import {
  AGENT_DEFAULTS,
  createConversationConfig,
  createPlatformSettings,
  loadAgentTemplates,
  templateTitle,
} from "../lib/convai.js";
import { collectChunks } from "../lib/delivery.js";
import { ElevenLabsMcpError, errorMessage, invalidArgument } from "../lib/errors.js";
import {
  isHttpUrl,
  jsonResult,
  textResult,
  vendorDestructiveAnnotations,
  vendorReadAnnotations,
  vendorWriteAnnotations,
} from "../lib/helpers.js";
import { log } from "../lib/logger.js";
import { formatTimestamp } from "../lib/naming.js";
import {
  addKnowledgeBaseSchema,
  agentIdSchema,
  analyticsReportSchema,
  analyzeAgentPerformanceSchema,
  calculateLlmUsageSchema,
  createAgentFromTemplateSchema,
  createAgentSchema,
  duplicateAgentSchema,
  emptySchema,
  manageAgentLifecycleSchema,
  simulateConversationSchema,
  updateAgentSchema,
} from "../lib/schemas.js";
import type { JsonObject, KnowledgeBaseLocator } from "../lib/vendor/responses.js";
import { defineTool, deliverToolResult, outputModeNote, readInputFile, voiceOrDefault, type ToolContext } from "./context.js";

const agentsLog = log.child("tools:agents");

/** Conversation pages fetched for analysis; the vendor caps a page at 100. */
const ANALYSIS_PAGE_SIZE = 100;

export type KnowledgeBaseSource =
  | { type: "url"; url: string }
  | { type: "file"; path: string }
  | { type: "text"; text: string };

/**
 * Create a knowledge base document and append it to the agent's prompt
 * knowledge base. Returns the new document id.
 */
export async function attachKnowledgeBase(
  ctx: ToolContext,
  agentId: string,
  name: string,
  source: KnowledgeBaseSource,
): Promise<string> {
  let document: { id: string };
  switch (source.type) {
    case "url":
      document = await ctx.api.createKnowledgeBaseFromUrl(source.url, name);
      break;
    case "file": {
      const input = await readInputFile(ctx, source.path, false);
      document = await ctx.api.createKnowledgeBaseFromFile(input.file, name);
      break;
    }
    case "text":
      document = await ctx.api.createKnowledgeBaseFromText(source.text, name);
      break;
  }

  const agent = await ctx.api.getAgent(agentId);
  const current = agent.conversation_config?.agent?.prompt?.knowledge_base ?? [];
  const knowledgeBase: KnowledgeBaseLocator[] = [...current, { type: source.type, name, id: document.id }];
  await ctx.api.updateAgent(agentId, { conversation_config: { agent: { prompt: { knowledge_base: knowledgeBase } } } });
  return document.id;
}

/** A template's knowledge base source may be a URL, an existing file or plain text. */
export function classifyKnowledgeBaseSource(source: string): KnowledgeBaseSource {
  if (isHttpUrl(source)) return { type: "url", url: source };
  if (fs.existsSync(source)) return { type: "file", path: source };
  return { type: "text", text: source };
}

function knowledgeBaseNote(source: KnowledgeBaseSource): string {
  switch (source.type) {
    case "url":
      return `\n\nKnowledge base added from URL: ${source.url}`;
    case "file":
      return `\n\nKnowledge base added from file: ${source.path}`;
    case "text":
      return "\n\nKnowledge base added from provided text.";
  }
}

function basicConversationConfig(ctx: ToolContext, systemPrompt: string, firstMessage: string): JsonObject {
  return createConversationConfig({
    language: AGENT_DEFAULTS.language,
    systemPrompt,
    llm: AGENT_DEFAULTS.llm,
    firstMessage,
    temperature: 0.7,
    asrQuality: AGENT_DEFAULTS.asrQuality,
    voiceId: ctx.config.defaultVoiceId,
    modelId: AGENT_DEFAULTS.modelId,
    optimizeStreamingLatency: AGENT_DEFAULTS.optimizeStreamingLatency,
    stability: 0.5,
    similarityBoost: 0.8,
    turnTimeout: AGENT_DEFAULTS.turnTimeout,
    maxDurationSeconds: AGENT_DEFAULTS.maxDurationSeconds,
  });
}

function defaultPlatformSettings(): JsonObject {
  return createPlatformSettings(AGENT_DEFAULTS.recordVoice, AGENT_DEFAULTS.retentionDays);
}

async function hasRecentActivity(ctx: ToolContext, agentId: string): Promise<string> {
  try {
    const { conversations } = await ctx.api.listConversations({ agent_id: agentId, page_size: 1 });
    return conversations.length > 0 ? "Yes" : "No conversations yet";
  } catch (err: unknown) {
    agentsLog.debug("recent activity probe failed", { agentId, error: errorMessage(err) });
    return "Unknown";
  }
}

async function manageLifecycleList(ctx: ToolContext): Promise<string> {
  const { agents } = await ctx.api.listAgents();
  if (agents.length === 0) return "No agents found in your account.";

  const lines = ["🤖 CONVERSATIONAL AI AGENTS", `Total: ${agents.length} agents`, ""];
  for (const agent of agents) {
    try {
      const details = await ctx.api.getAgent(agent.agent_id);
      const created = details.metadata?.created_at_unix_secs;
      lines.push(`• ${agent.name}`, `  ID: ${agent.agent_id}`);
      lines.push(`  Created: ${created !== undefined && created !== null ? formatDate(new Date(created * 1000)) : "Unknown"}`);
      lines.push(`  Recent Activity: ${await hasRecentActivity(ctx, agent.agent_id)}`, "");
    } catch (err: unknown) {
      lines.push(`• ${agent.name} (ID: ${agent.agent_id}) - Error loading details: ${errorMessage(err)}`, "");
    }
  }
  return lines.join("\n");
}

async function agentReportInputs(ctx: ToolContext, agentIds: string, afterUnix: number): Promise<AgentReportInput[]> {
  let ids: string[];
  if (agentIds.trim().toLowerCase() === "all") {
    const { agents } = await ctx.api.listAgents({ page_size: ANALYSIS_PAGE_SIZE });
    ids = agents.map((a) => a.agent_id);
  } else {
    ids = agentIds.split(",").map((id) => id.trim()).filter((id) => id.length > 0);
  }
  if (ids.length === 0) throw invalidArgument("No agent ids given.");

  const inputs: AgentReportInput[] = [];
  for (const agentId of ids) {
    try {
      const agent = await ctx.api.getAgent(agentId);
      const { conversations } = await ctx.api.listConversations({
        agent_id: agentId,
        call_start_after_unix: afterUnix,
        page_size: ANALYSIS_PAGE_SIZE,
      });
      inputs.push({ agentId, agentName: agent.name, conversations });
    } catch (err: unknown) {
      agentsLog.warn("analytics for agent failed", { agentId, error: errorMessage(err) });
      inputs.push({ agentId, error: errorMessage(err) });
    }
  }
  return inputs;
}

export function registerAgentTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "create_agent",
    {
      title: "Create Agent",
      description: "Create a conversational AI agent with a custom configuration.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    createAgentSchema,
    async (args) => {
      const voiceId = voiceOrDefault(ctx, args.voice_id);
      const conversationConfig = createConversationConfig({
        language: args.language,
        systemPrompt: args.system_prompt,
        llm: args.llm,
        firstMessage: args.first_message,
        temperature: args.temperature,
        ...(args.max_tokens !== undefined ? { maxTokens: args.max_tokens } : {}),
        asrQuality: args.asr_quality,
        voiceId,
        modelId: args.model_id,
        optimizeStreamingLatency: args.optimize_streaming_latency,
        stability: args.stability,
        similarityBoost: args.similarity_boost,
        turnTimeout: args.turn_timeout,
        maxDurationSeconds: args.max_duration_seconds,
      });
      const created = await ctx.api.createAgent({
        name: args.name,
        conversation_config: conversationConfig,
        platform_settings: createPlatformSettings(args.record_voice, args.retention_days),
      });
      return textResult(
        `Agent created successfully: Name: ${args.name}, Agent ID: ${created.agent_id}, System Prompt: ${args.system_prompt}, ` +
          `Voice ID: ${voiceId || "Default"}, Language: ${args.language}, LLM: ${args.llm}, ` +
          "You can use this agent ID for future interactions with the agent.",
      );
    },
  );

  defineTool(
    server,
    "create_agent_from_template",
    {
      title: "Create Agent from Template",
      description:
        "Create an agent from a predefined template: customer_service, sales_assistant, technical_support, personal_assistant, " +
        "creative_writer, educator, therapist, interviewer or trainer. An optional knowledge base source may be a URL, a file path or text.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    createAgentFromTemplateSchema,
    async (args) => {
      const template = loadAgentTemplates().get(args.template_type);
      if (!template) {
        throw new ElevenLabsMcpError("NotFound", `Unknown template type: ${args.template_type}`);
      }
      const systemPrompt = args.custom_instructions ?? template.system_prompt;
      const voiceId = voiceOrDefault(ctx, args.voice_id);
      const created = await ctx.api.createAgent({
        name: args.name,
        conversation_config: createConversationConfig({
          language: args.language,
          systemPrompt,
          llm: template.llm,
          firstMessage: template.first_message,
          temperature: 0.7,
          asrQuality: AGENT_DEFAULTS.asrQuality,
          voiceId,
          modelId: AGENT_DEFAULTS.modelId,
          optimizeStreamingLatency: AGENT_DEFAULTS.optimizeStreamingLatency,
          stability: template.stability,
          similarityBoost: template.similarity_boost,
          turnTimeout: AGENT_DEFAULTS.turnTimeout,
          maxDurationSeconds: AGENT_DEFAULTS.maxDurationSeconds,
        }),
        platform_settings: defaultPlatformSettings(),
      });

      let message =
        `Agent created successfully from '${args.template_type}' template: \n` +
        `Name: ${args.name}\n` +
        `Agent ID: ${created.agent_id}\n` +
        `Template Type: ${args.template_type}\n` +
        `System Prompt: ${systemPrompt}\n` +
        `Voice ID: ${voiceId}\n` +
        `Language: ${args.language}\n` +
        `LLM: ${template.llm}\n\n` +
        "You can use this agent ID for future interactions with the agent.";

      if (args.knowledge_base_source) {
        const source = classifyKnowledgeBaseSource(args.knowledge_base_source);
        try {
          await attachKnowledgeBase(ctx, created.agent_id, `${templateTitle(args.template_type)} Knowledge Base`, source);
          message += knowledgeBaseNote(source);
        } catch (err: unknown) {
          agentsLog.warn("knowledge base for template agent failed", { agentId: created.agent_id, error: errorMessage(err) });
          message += `\n\nWarning: Failed to add knowledge base: ${errorMessage(err)}`;
        }
      }
      return textResult(message);
    },
  );

  defineTool(
    server,
    "add_knowledge_base_to_agent",
    {
      title: "Add Knowledge Base to Agent",
      description: "Add a knowledge base document to an agent. Provide exactly one of url, input_file_path or text.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    addKnowledgeBaseSchema,
    async (args) => {
      const sources: KnowledgeBaseSource[] = [];
      if (args.url !== undefined) sources.push({ type: "url", url: args.url });
      if (args.input_file_path !== undefined) sources.push({ type: "file", path: args.input_file_path });
      if (args.text !== undefined) sources.push({ type: "text", text: args.text });
      const [source, ...rest] = sources;
      if (!source) throw invalidArgument("Must provide either a URL, a file, or text");
      if (rest.length > 0) throw invalidArgument("Must provide exactly one of: URL, file, or text");

      const documentId = await attachKnowledgeBase(ctx, args.agent_id, args.knowledge_base_name, source);
      return textResult(`Knowledge base created with ID: ${documentId} and added to agent ${args.agent_id} successfully.`);
    },
  );

  defineTool(
    server,
    "list_agents",
    { title: "List Agents", description: "List all available conversational AI agents.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => {
      const { agents } = await ctx.api.listAgents();
      if (agents.length === 0) return textResult("No agents found.");
      return textResult(`Available agents: ${agents.map((a) => `${a.name} (ID: ${a.agent_id})`).join(", ")}`);
    },
  );

  defineTool(
    server,
    "get_agent",
    { title: "Get Agent", description: "Get details about a specific conversational AI agent.", annotations: vendorReadAnnotations },
    agentIdSchema,
    async (args) => {
      const agent = await ctx.api.getAgent(args.agent_id);
      const voiceId = agent.conversation_config?.tts?.voice_id ?? "None";
      const created = agent.metadata?.created_at_unix_secs;
      const createdAt = created !== undefined && created !== null ? formatDateTime(new Date(created * 1000)) : "Unknown";
      return textResult(
        `Agent Details: Name: ${agent.name}, Agent ID: ${agent.agent_id}, Voice Configuration: Voice ID: ${voiceId}, Created At: ${createdAt}`,
      );
    },
  );

  defineTool(
    server,
    "update_agent",
    {
      title: "Update Agent",
      description: "Update an agent's name, system prompt, voice, language, temperature, voice settings or first message.",
      annotations: vendorWriteAnnotations,
    },
    updateAgentSchema,
    async (args) => {
      const prompt: JsonObject = {};
      const agentSection: JsonObject = {};
      const tts: JsonObject = {};
      const changes: string[] = [];

      if (args.new_name !== undefined) changes.push(`New Name: ${args.new_name}`);
      if (args.new_system_prompt !== undefined) {
        prompt.prompt = args.new_system_prompt;
        changes.push("System Prompt: Updated");
      }
      if (args.new_voice_id !== undefined) {
        tts.voice_id = args.new_voice_id;
        changes.push(`Voice ID: ${args.new_voice_id}`);
      }
      if (args.new_language !== undefined) {
        agentSection.language = args.new_language;
        changes.push(`Language: ${args.new_language}`);
      }
      if (args.new_temperature !== undefined) {
        prompt.temperature = args.new_temperature;
        changes.push(`Temperature: ${args.new_temperature}`);
      }
      if (args.new_stability !== undefined) {
        tts.stability = args.new_stability;
        changes.push(`Stability: ${args.new_stability}`);
      }
      if (args.new_similarity_boost !== undefined) {
        tts.similarity_boost = args.new_similarity_boost;
        changes.push(`Similarity Boost: ${args.new_similarity_boost}`);
      }
      if (args.update_first_message && args.first_message !== undefined) {
        agentSection.first_message = args.first_message;
        changes.push("First Message: Updated");
      }
      if (changes.length === 0) {
        throw invalidArgument("At least one update parameter is required.");
      }

      if (Object.keys(prompt).length > 0) agentSection.prompt = prompt;
      const conversationConfig: JsonObject = {};
      if (Object.keys(agentSection).length > 0) conversationConfig.agent = agentSection;
      if (Object.keys(tts).length > 0) conversationConfig.tts = tts;

      await ctx.api.updateAgent(args.agent_id, {
        ...(args.new_name !== undefined ? { name: args.new_name } : {}),
        ...(Object.keys(conversationConfig).length > 0 ? { conversation_config: conversationConfig } : {}),
      });
      return textResult(
        `Agent updated successfully:\nAgent ID: ${args.agent_id}\n${changes.join("\n")}\n\nNote: Some changes may take a few minutes to take effect.`,
      );
    },
  );

  defineTool(
    server,
    "duplicate_agent",
    { title: "Duplicate Agent", description: "Duplicate an existing agent, optionally under a new name.", annotations: vendorWriteAnnotations },
    duplicateAgentSchema,
    async (args) => {
      const duplicate = await ctx.api.duplicateAgent(args.agent_id, args.name);
      return textResult(`Agent duplicated successfully. New agent ID: ${duplicate.agent_id}`);
    },
  );

  defineTool(
    server,
    "get_agent_link",
    { title: "Get Agent Link", description: "Get the shareable link of an agent.", annotations: vendorReadAnnotations },
    agentIdSchema,
    async (args) => jsonResult(await ctx.api.getAgentLink(args.agent_id)),
  );

  defineTool(
    server,
    "simulate_conversation",
    {
      title: "Simulate Conversation",
      description: "Run a simulated conversation between the agent and a simulated user, returning the transcript and analysis.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    simulateConversationSchema,
    async (args) =>
      jsonResult(
        await ctx.api.simulateConversation(args.agent_id, {
          simulation_specification: args.simulation_specification,
          ...(args.extra_evaluation_criteria ? { extra_evaluation_criteria: args.extra_evaluation_criteria } : {}),
          ...(args.new_turns_limit !== undefined ? { new_turns_limit: args.new_turns_limit } : {}),
        }),
      ),
  );

  defineTool(
    server,
    "stream_simulate_conversation",
    {
      title: "Stream Simulate Conversation",
      description: "Run a simulated conversation with streamed output, returned once complete.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    simulateConversationSchema,
    async (args) => {
      const chunks = await ctx.api.streamSimulateConversation(args.agent_id, {
        simulation_specification: args.simulation_specification,
        ...(args.extra_evaluation_criteria ? { extra_evaluation_criteria: args.extra_evaluation_criteria } : {}),
        ...(args.new_turns_limit !== undefined ? { new_turns_limit: args.new_turns_limit } : {}),
      });
      const text = Buffer.from(await collectChunks(chunks)).toString("utf8");
      return textResult(`Conversation simulation completed:\n\n${text}`);
    },
  );

  defineTool(
    server,
    "calculate_llm_usage",
    {
      title: "Calculate LLM Usage",
      description: "Estimate the LLM cost of an agent. The prompt length defaults to the agent's current system prompt.",
      annotations: vendorReadAnnotations,
    },
    calculateLlmUsageSchema,
    async (args) => {
      let promptLength = args.prompt_length;
      if (promptLength === undefined) {
        const agent = await ctx.api.getAgent(args.agent_id);
        promptLength = agent.conversation_config?.agent?.prompt?.prompt?.length ?? 0;
      }
      return jsonResult(
        await ctx.api.calculateLlmUsage(args.agent_id, {
          prompt_length: promptLength,
          ...(args.number_of_pages !== undefined ? { number_of_pages: args.number_of_pages } : {}),
          ...(args.rag_enabled !== undefined ? { rag_enabled: args.rag_enabled } : {}),
        }),
      );
    },
  );

  defineTool(
    server,
    "manage_agent_lifecycle",
    {
      title: "Manage Agent Lifecycle",
      description:
        "Create, update, delete, duplicate or list agents. agent_id is required for update, delete and duplicate; " +
        "new_name for create, update and duplicate; copy_settings_from copies another agent's configuration on create.",
      annotations: vendorDestructiveAnnotations,
    },
    manageAgentLifecycleSchema,
    async (args) => {
      switch (args.action) {
        case "list":
          return textResult(await manageLifecycleList(ctx));

        case "delete": {
          if (!args.agent_id) throw invalidArgument("Agent ID is required for delete action.");
          const agent = await ctx.api.getAgent(args.agent_id);
          await ctx.api.deleteAgent(args.agent_id);
          return textResult(`✅ Agent '${agent.name}' (ID: ${args.agent_id}) has been deleted successfully.`);
        }

        case "duplicate": {
          if (!args.agent_id) throw invalidArgument("Agent ID is required for duplicate action.");
          if (!args.new_name) throw invalidArgument("New name is required for duplicate action.");
          const original = await ctx.api.getAgent(args.agent_id);
          const created = await ctx.api.createAgent({
            name: args.new_name,
            conversation_config: original.conversation_config ?? {},
            platform_settings: defaultPlatformSettings(),
          });
          return textResult(
            "✅ Agent duplicated successfully!\n" +
              `Original: ${original.name} (ID: ${args.agent_id})\n` +
              `Duplicate: ${args.new_name} (ID: ${created.agent_id})\n` +
              "All settings and configurations have been copied.",
          );
        }

        case "create": {
          if (!args.new_name) throw invalidArgument("Name is required for create action.");
          if (args.copy_settings_from) {
            const source = await ctx.api.getAgent(args.copy_settings_from);
            const sourceConfig = source.conversation_config ?? {};
            const conversationConfig = sourceConfig.agent
              ? {
                  ...sourceConfig,
                  agent: {
                    ...sourceConfig.agent,
                    first_message: `Hello! I'm ${args.new_name}, your AI assistant. How can I help you today?`,
                  },
                }
              : sourceConfig;
            const created = await ctx.api.createAgent({
              name: args.new_name,
              conversation_config: conversationConfig,
              platform_settings: defaultPlatformSettings(),
            });
            return textResult(
              "✅ Agent created successfully by copying settings!\n" +
                `Source: ${source.name} (ID: ${args.copy_settings_from})\n` +
                `New Agent: ${args.new_name} (ID: ${created.agent_id})\n` +
                "All configurations have been copied and adapted.",
            );
          }
          const created = await ctx.api.createAgent({
            name: args.new_name,
            conversation_config: basicConversationConfig(
              ctx,
              "You are a helpful AI assistant. Be friendly, professional, and solution-focused.",
              "Hello! I'm your AI assistant. How can I help you today?",
            ),
            platform_settings: defaultPlatformSettings(),
          });
          return textResult(
            "✅ Agent created successfully!\n" +
              `Name: ${args.new_name}\n` +
              `Agent ID: ${created.agent_id}\n` +
              "Configuration: Basic conversational AI agent ready for customization.",
          );
        }

        case "update": {
          if (!args.agent_id) throw invalidArgument("Agent ID is required for update action.");
          if (!args.new_name) throw invalidArgument("New name is required for update action.");
          const agent = await ctx.api.getAgent(args.agent_id);
          await ctx.api.updateAgent(args.agent_id, { name: args.new_name });
          return textResult(
            "✅ Agent updated successfully!\n" +
              `Old Name: ${agent.name}\n` +
              `New Name: ${args.new_name}\n` +
              `Agent ID: ${args.agent_id}`,
          );
        }
      }
    },
  );

  defineTool(
    server,
    "analyze_agent_performance",
    {
      title: "Analyze Agent Performance",
      description: "Analyze an agent's conversations over a period: success rate, durations, status breakdown, score and recommendations.",
      annotations: vendorReadAnnotations,
    },
    analyzeAgentPerformanceSchema,
    async (args) => {
      const period = analysisPeriod(ctx.now(), args.days_back);
      const { conversations } = await ctx.api.listConversations({
        agent_id: args.agent_id,
        call_start_after_unix: unixSeconds(period.start),
        page_size: ANALYSIS_PAGE_SIZE,
      });
      if (conversations.length === 0) {
        return textResult(`No conversations found for agent ${args.agent_id} in the last ${args.days_back} days.`);
      }
      if (conversations.length < args.min_conversations) {
        return textResult(
          `Only ${conversations.length} conversations found (minimum ${args.min_conversations} required for analysis).`,
        );
      }
      return textResult(formatPerformanceReport(computeStats(conversations), period, args.min_conversations));
    },
  );

  defineTool(
    server,
    "generate_conversation_analytics_report",
    {
      title: "Generate Conversation Analytics Report",
      description:
        "Build a conversation analytics report for a comma-separated list of agent ids, or 'all', as summary text, JSON or CSV. " +
        outputModeNote(ctx),
      annotations: vendorReadAnnotations,
    },
    analyticsReportSchema,
    async (args) => {
      const now = ctx.now();
      const period = analysisPeriod(now, args.days_back);
      const inputs = await agentReportInputs(ctx, args.agent_ids, unixSeconds(period.start));
      const report = buildAnalyticsReport(inputs, period, now);
      const rendered = renderAnalyticsReport(report, args.report_format, period, now);
      return deliverToolResult(ctx, {
        data: rendered.text,
        tag: "conversation_analytics",
        hint: "",
        ext: rendered.ext,
        filename: `conversation_analytics_${formatTimestamp(now)}.${rendered.ext}`,
        outputDirectory: args.output_directory,
        successTemplate:
          `Conversation analytics report generated: ${report.summary.total_conversations} conversations analyzed. ` +
          "Saved to {file_path}",
      });
    },
  );
}
