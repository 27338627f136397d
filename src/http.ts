import { randomUUID } from "node:crypto";
import type { Server } from "node:http";

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";

import { errorMessage } from "./lib/errors.js";
import { log } from "./lib/logger.js";
import { createRestRouter } from "./rest.js";
import { createServer, SERVER_NAME } from "./server.js";
import type { ToolContext } from "./tools/context.js";

const httpLog = log.child("http");

export const MCP_PATH = "/mcp";
export const SSE_PATH = "/sse";
export const SSE_MESSAGES_PATH = "/messages";

const LOCAL_HOSTNAMES = new Set(["localhost", "127.0.0.1"]);
const OPEN_PATHS = new Set(["/", "/health"]);

type ActiveTransport = StreamableHTTPServerTransport | SSEServerTransport;

export interface HttpApp {
  app: Express;
  /** Number of live MCP sessions across both transports. */
  sessionCount(): number;
  closeSessions(): Promise<void>;
}

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

function normalizeOrigin(value: string): string | undefined {
  try {
    return new URL(value).origin;
  } catch {
    return undefined;
  }
}

/**
 * Local callers and callers without an Origin header pass. A browser Origin
 * must equal one of the allowed origins after scheme/host/port normalization.
 */
export function isAllowedOrigin(hostname: string, origin: string | undefined, allowed: readonly string[]): boolean {
  if (LOCAL_HOSTNAMES.has(hostname)) return true;
  if (!origin) return true;
  const normalized = normalizeOrigin(origin);
  if (normalized === undefined) return false;
  return allowed.some((entry) => normalizeOrigin(entry) === normalized);
}

export function createHttpApp(ctx: ToolContext): HttpApp {
  const { config } = ctx;
  const app = express();
  const transports = new Map<string, ActiveTransport>();
  const sessionServers = new Map<string, McpServer>();

  const closeSession = async (sessionId: string): Promise<void> => {
    const server = sessionServers.get(sessionId);
    transports.delete(sessionId);
    sessionServers.delete(sessionId);
    if (server) {
      await server.close().catch((err: unknown) => {
        httpLog.warn("failed to close session server", { sessionId, error: errorMessage(err) });
      });
    }
  };

  app.use(express.json({ limit: "25mb" }));
  app.use(
    cors({
      origin: config.http.allowedOrigins,
      credentials: true,
      exposedHeaders: ["Mcp-Session-Id"],
    }),
  );

  app.use((req: Request, res: Response, next: NextFunction) => {
    if (OPEN_PATHS.has(req.path) || isAllowedOrigin(req.hostname, req.header("origin"), config.http.allowedOrigins)) {
      next();
      return;
    }
    httpLog.warn("rejected origin", { origin: req.header("origin"), path: req.path });
    res.status(403).json({ detail: "Unauthorized origin" });
  });

  app.get("/", (_req: Request, res: Response) => {
    res.json({
      name: SERVER_NAME,
      version: config.version,
      endpoints: { mcp: MCP_PATH, sse: SSE_PATH, messages: SSE_MESSAGES_PATH, api: "/api", health: "/health" },
    });
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      api_configured: config.apiKey.length > 0,
      output_mode: config.outputMode,
      residency: config.residency,
    });
  });

  app.all(MCP_PATH, async (req: Request, res: Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      const existing = sessionId ? transports.get(sessionId) : undefined;
      let transport: StreamableHTTPServerTransport;

      if (existing) {
        if (!(existing instanceof StreamableHTTPServerTransport)) {
          jsonRpcError(res, 400, -32000, "Session exists but uses a different transport protocol.");
          return;
        }
        transport = existing;
      } else if (!sessionId && req.method === "POST" && isInitializeRequest(req.body)) {
        const sessionServer = createServer(ctx);
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (newSessionId) => {
            transports.set(newSessionId, created);
            sessionServers.set(newSessionId, sessionServer);
            httpLog.info("streamable session initialized", { sessionId: newSessionId });
          },
        });
        created.onclose = () => {
          if (created.sessionId) {
            transports.delete(created.sessionId);
            sessionServers.delete(created.sessionId);
          }
        };
        await sessionServer.connect(created);
        transport = created;
      } else {
        jsonRpcError(res, 400, -32000, "No valid MCP session. Send an initialize request first.");
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      httpLog.error("error handling MCP request", { error: errorMessage(err) });
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  });

  app.get(SSE_PATH, async (_req: Request, res: Response) => {
    const transport = new SSEServerTransport(SSE_MESSAGES_PATH, res);
    const sessionId = transport.sessionId;
    const sessionServer = createServer(ctx);
    transports.set(sessionId, transport);
    sessionServers.set(sessionId, sessionServer);

    res.on("close", () => {
      void closeSession(sessionId);
    });

    try {
      await sessionServer.connect(transport);
      httpLog.info("sse session opened", { sessionId });
    } catch (err) {
      httpLog.error("failed to open sse session", { sessionId, error: errorMessage(err) });
      await closeSession(sessionId);
    }
  });

  app.post(SSE_MESSAGES_PATH, async (req: Request, res: Response) => {
    const sessionId = typeof req.query["sessionId"] === "string" ? req.query["sessionId"] : "";
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!(transport instanceof SSEServerTransport)) {
      res.status(400).json({ detail: "No SSE session found for sessionId." });
      return;
    }
    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (err) {
      httpLog.error("error handling SSE message", { sessionId, error: errorMessage(err) });
      if (!res.headersSent) {
        res.status(500).json({ detail: "Internal server error" });
      }
    }
  });

  app.use("/api", createRestRouter(ctx));

  return {
    app,
    sessionCount: () => transports.size,
    closeSessions: async () => {
      for (const [sessionId, transport] of [...transports]) {
        transport.onclose = undefined;
        await transport.close().catch((err: unknown) => {
          httpLog.warn("failed to close transport", { sessionId, error: errorMessage(err) });
        });
        await closeSession(sessionId);
      }
    },
  };
}

export interface RunningHttpServer {
  server: Server;
  port: number;
  close(): Promise<void>;
}

/** Listen on the configured host and port; port 0 picks a free one. */
export async function startHttpServer(ctx: ToolContext): Promise<RunningHttpServer> {
  const { host, port } = ctx.config.http;
  const httpApp = createHttpApp(ctx);
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = httpApp.app.listen(port, host, () => resolve(listening));
    listening.once("error", reject);
  });
  const address = server.address();
  const boundPort = typeof address === "object" && address ? address.port : port;
  httpLog.info("listening", { url: `http://${host}:${boundPort}`, mcp: MCP_PATH, sse: SSE_PATH });

  let closing: Promise<void> | undefined;
  return {
    server,
    port: boundPort,
    close: () => {
      closing ??= (async () => {
        await httpApp.closeSessions();
        await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      })();
      return closing;
    },
  };
}
