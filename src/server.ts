import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { AppConfig } from "./lib/config.js";
import type { ElevenLabsApi } from "./lib/vendor/api.js";
import { registerAgentTools } from "./tools/agents.js";
import type { ToolContext } from "./tools/context.js";
import { registerConversationTools } from "./tools/conversations.js";
import { registerKnowledgeBaseTools } from "./tools/knowledge-base.js";
import { registerMusicTools } from "./tools/music.js";
import { registerResources } from "./tools/resources.js";
import { registerSpeechTools } from "./tools/speech.js";
import { registerTelephonyTools } from "./tools/telephony.js";
import { registerVoiceTools } from "./tools/voices.js";
import { registerWorkspaceTools } from "./tools/workspace.js";

export const SERVER_NAME = "elevenlabs-mcp";

export function createToolContext(config: Readonly<AppConfig>, api: ElevenLabsApi, now: () => Date = () => new Date()): ToolContext {
  return { config, api, now };
}

/**
 * One fully registered server. stdio uses a single instance; the HTTP host
 * builds one per session.
 */
export function createServer(ctx: ToolContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: ctx.config.version },
    {
      capabilities: {
        tools: { listChanged: false },
        resources: { listChanged: false },
      },
    },
  );

  registerSpeechTools(server, ctx);
  registerMusicTools(server, ctx);
  registerVoiceTools(server, ctx);
  registerAgentTools(server, ctx);
  registerConversationTools(server, ctx);
  registerTelephonyTools(server, ctx);
  registerKnowledgeBaseTools(server, ctx);
  registerWorkspaceTools(server, ctx);
  registerResources(server, ctx);

  return server;
}
