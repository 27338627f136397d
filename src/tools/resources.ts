import { ResourceTemplate, type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { readResource, RESOURCE_SCHEME } from "../lib/delivery.js";
import { ElevenLabsMcpError } from "../lib/errors.js";
import { log } from "../lib/logger.js";
import type { ToolContext } from "./context.js";

const resourceLog = log.child("resources");

function decodeFilename(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/** The template variable arrives as a string, or an array when the URI repeats it. */
export function filenameVariable(value: string | string[] | undefined): string {
  const raw = Array.isArray(value) ? value[0] : value;
  if (!raw) {
    throw new ElevenLabsMcpError("InvalidPath", "Resource URI carries no file name");
  }
  return decodeFilename(raw);
}

/** Read-back of delivered artifacts through `elevenlabs://{filename}`. */
export function registerResources(server: McpServer, ctx: ToolContext): void {
  server.registerResource(
    "elevenlabs-output",
    new ResourceTemplate(`${RESOURCE_SCHEME}://{filename}`, { list: undefined }),
    {
      title: "ElevenLabs output file",
      description: "A file previously written by one of the tools, resolved inside the base directory.",
    },
    async (uri, variables) => {
      const filename = filenameVariable(variables["filename"]);
      resourceLog.debug("read", { uri: uri.href, filename });
      return { contents: [await readResource(filename, ctx.config.baseDirectory)] };
    },
  );
}
