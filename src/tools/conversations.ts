import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { formatDateTime } from "../lib/analytics.js";
import { handleLargeText } from "../lib/delivery.js";
import {
  jsonResult,
  textResult,
  vendorDestructiveAnnotations,
  vendorReadAnnotations,
  vendorWriteAnnotations,
} from "../lib/helpers.js";
import {
  agentIdSchema,
  conversationAudioSchema,
  conversationFeedbackSchema,
  conversationIdSchema,
  listConversationsSchema,
} from "../lib/schemas.js";
import { formatConversationTranscript, MAX_TRANSCRIPT_LENGTH } from "../lib/transcript.js";
import type { Conversation, ConversationSummary } from "../lib/vendor/responses.js";
import { defineTool, deliverToolResult, outputModeNote, type ToolContext } from "./context.js";

const MAX_PAGE_SIZE = 100;

function formatUnix(seconds: number | null | undefined): string {
  return seconds != null ? formatDateTime(new Date(seconds * 1000)) : "N/A";
}

export function formatConversationSummary(conv: ConversationSummary): string {
  return [
    `Conversation ID: ${conv.conversation_id}`,
    `Status: ${conv.status}`,
    `Agent: ${conv.agent_name || "N/A"} (ID: ${conv.agent_id})`,
    `Started: ${formatUnix(conv.start_time_unix_secs)}`,
    `Duration: ${conv.call_duration_secs ?? "N/A"} seconds`,
    `Messages: ${conv.message_count ?? "N/A"}`,
    `Call Successful: ${conv.call_successful ?? "N/A"}`,
  ].join("\n");
}

export function formatConversationDetails(conv: Conversation, transcript: string): string {
  let text =
    "Conversation Details:\n" +
    `ID: ${conv.conversation_id}\n` +
    `Status: ${conv.status}\n` +
    `Agent ID: ${conv.agent_id}\n` +
    `Message Count: ${conv.transcript.length}\n\n` +
    `Transcript:\n${transcript}`;
  if (conv.metadata) {
    text += `\n\nMetadata:\nDuration: ${conv.metadata.call_duration_secs ?? "N/A"} seconds\nStarted: ${formatUnix(conv.metadata.start_time_unix_secs)}`;
  }
  if (conv.analysis) {
    text += `\n\nAnalysis:\n${conv.analysis.transcript_summary ?? "Analysis available but no summary"}`;
  }
  return text;
}

export function registerConversationTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "get_conversation",
    {
      title: "Get Conversation",
      description: "Get a conversation with its transcript. Very long transcripts are saved to a file.",
      annotations: vendorReadAnnotations,
    },
    conversationIdSchema,
    async (args) => {
      const conv = await ctx.api.getConversation(args.conversation_id);
      const transcript = await handleLargeText(formatConversationTranscript(conv.transcript), {
        maxLength: MAX_TRANSCRIPT_LENGTH,
        contentType: "conversation_transcript",
        baseDirectory: ctx.config.baseDirectory,
        now: ctx.now(),
      });
      return textResult(formatConversationDetails(conv, transcript));
    },
  );

  defineTool(
    server,
    "list_conversations",
    {
      title: "List Conversations",
      description:
        "List agent conversations with optional agent and start-time filters. page_size is capped at 100; " +
        "output longer than max_length characters is saved to a file.",
      annotations: vendorReadAnnotations,
    },
    listConversationsSchema,
    async (args) => {
      const page = await ctx.api.listConversations({
        ...(args.agent_id ? { agent_id: args.agent_id } : {}),
        ...(args.cursor ? { cursor: args.cursor } : {}),
        ...(args.call_start_before_unix !== undefined ? { call_start_before_unix: args.call_start_before_unix } : {}),
        ...(args.call_start_after_unix !== undefined ? { call_start_after_unix: args.call_start_after_unix } : {}),
        page_size: Math.min(args.page_size, MAX_PAGE_SIZE),
      });
      if (page.conversations.length === 0) return textResult("No conversations found.");

      let pagination = `Showing ${page.conversations.length} conversations`;
      if (page.has_more) pagination += ` (more available, next cursor: ${page.next_cursor ?? "N/A"})`;

      const fullText = `${pagination}\n\n${page.conversations.map(formatConversationSummary).join("\n\n")}`;
      const result = await handleLargeText(fullText, {
        maxLength: args.max_length,
        contentType: "conversation_list",
        baseDirectory: ctx.config.baseDirectory,
        now: ctx.now(),
      });
      return textResult(result === fullText ? result : `${pagination}\n\n${result}`);
    },
  );

  defineTool(
    server,
    "get_conversation_audio",
    {
      title: "Get Conversation Audio",
      description: `Download the audio recording of a conversation. ${outputModeNote(ctx)}`,
      annotations: vendorReadAnnotations,
    },
    conversationAudioSchema,
    async (args) => {
      const audio = await ctx.api.getConversationAudio(args.conversation_id);
      return deliverToolResult(ctx, {
        data: audio,
        tag: "conversation",
        hint: args.conversation_id,
        ext: "mp3",
        outputDirectory: args.output_directory,
      });
    },
  );

  defineTool(
    server,
    "delete_conversation",
    { title: "Delete Conversation", description: "Delete a conversation.", annotations: vendorDestructiveAnnotations },
    conversationIdSchema,
    async (args) => {
      await ctx.api.deleteConversation(args.conversation_id);
      return textResult(`Conversation ${args.conversation_id} deleted successfully.`);
    },
  );

  defineTool(
    server,
    "send_conversation_feedback",
    {
      title: "Send Conversation Feedback",
      description: "Send positive (true) or negative (false) feedback for a conversation.",
      annotations: vendorWriteAnnotations,
    },
    conversationFeedbackSchema,
    async (args) => {
      await ctx.api.sendConversationFeedback(args.conversation_id, args.feedback ? "like" : "dislike");
      return textResult(`Feedback ${args.feedback ? "positive" : "negative"} sent for conversation ${args.conversation_id}.`);
    },
  );

  defineTool(
    server,
    "get_conversation_signed_url",
    {
      title: "Get Conversation Signed URL",
      description: "Get a signed URL to start a conversation with a private agent.",
      annotations: vendorReadAnnotations,
    },
    agentIdSchema,
    async (args) => jsonResult(await ctx.api.getConversationSignedUrl(args.agent_id)),
  );

  defineTool(
    server,
    "get_conversation_token",
    {
      title: "Get Conversation Token",
      description: "Get a WebRTC session token for a conversation with an agent.",
      annotations: vendorReadAnnotations,
    },
    agentIdSchema,
    async (args) => jsonResult(await ctx.api.getConversationToken(args.agent_id)),
  );
}
