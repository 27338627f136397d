import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { invalidArgument } from "../lib/errors.js";
import { jsonResult, vendorWriteAnnotations } from "../lib/helpers.js";
import { composeMusicSchema, compositionPlanSchema } from "../lib/schemas.js";
import { defineTool, deliverToolResult, outputModeNote, type ToolContext } from "./context.js";

export function registerMusicTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "compose_music",
    {
      title: "Compose Music",
      description:
        "Generate music from a prompt or from a composition plan (see create_composition_plan). " +
        `Provide exactly one of prompt and composition_plan; music_length_ms only applies to prompts. ${outputModeNote(ctx)}`,
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    composeMusicSchema,
    async (args) => {
      if (args.prompt === undefined && args.composition_plan === undefined) {
        throw invalidArgument("Either prompt or composition_plan must be provided.");
      }
      if (args.prompt !== undefined && args.composition_plan !== undefined) {
        throw invalidArgument("Only one of prompt or composition_plan must be provided");
      }
      if (args.music_length_ms !== undefined && args.composition_plan !== undefined) {
        throw invalidArgument("music_length_ms cannot be used if composition_plan is provided");
      }

      const audio = await ctx.api.composeMusic({
        ...(args.prompt !== undefined ? { prompt: args.prompt } : {}),
        ...(args.composition_plan !== undefined ? { composition_plan: args.composition_plan } : {}),
        ...(args.music_length_ms !== undefined ? { music_length_ms: args.music_length_ms } : {}),
      });
      return deliverToolResult(ctx, { data: audio, tag: "music", hint: "", ext: "mp3", outputDirectory: args.output_directory });
    },
  );

  defineTool(
    server,
    "create_composition_plan",
    {
      title: "Create Composition Plan",
      description:
        "Create a composition plan for music generation. Plans cost no credits but are rate limited. " +
        "Pass the result to compose_music as composition_plan.",
      annotations: vendorWriteAnnotations,
    },
    compositionPlanSchema,
    async (args) => {
      const plan = await ctx.api.createCompositionPlan({
        prompt: args.prompt,
        ...(args.music_length_ms !== undefined ? { music_length_ms: args.music_length_ms } : {}),
        ...(args.source_composition_plan !== undefined ? { source_composition_plan: args.source_composition_plan } : {}),
      });
      return jsonResult(plan);
    },
  );
}
