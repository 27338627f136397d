#!/usr/bin/env node
import fs from "node:fs";

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import { z } from "zod";

import { startHttpServer } from "./http.js";
import { describeConfig, loadConfig, type TransportKind } from "./lib/config.js";
import { errorMessage } from "./lib/errors.js";
import { log } from "./lib/logger.js";
import { applySecretsToEnv, loadSecretsYaml, resolveSecretsFilePath } from "./lib/secrets.js";
import { ElevenLabsApi } from "./lib/vendor/api.js";
import { FetchTransport } from "./lib/vendor/transport.js";
import { createServer, createToolContext } from "./server.js";

const configLog = log.child("config");

function argValue(argv: readonly string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

// `--env-file` without a path falls back to ./.env
function loadEnvFile(argv: readonly string[]): void {
  if (!argv.includes("--env-file")) {
    dotenv.config();
    return;
  }
  const envPath = argValue(argv, "--env-file");
  dotenv.config(envPath ? { path: envPath, override: false } : { override: false });
}

// Keys in secrets.yaml override environment variables.
function loadSecrets(argv: string[]): void {
  const secretsPath = resolveSecretsFilePath(argv, process.cwd());
  if (!secretsPath) return;
  try {
    const applied = applySecretsToEnv(loadSecretsYaml(secretsPath));
    if (applied.length > 0) {
      configLog.info("loaded secrets.yaml", { path: secretsPath, applied });
    } else {
      configLog.debug("secrets.yaml found (no env changes)", { path: secretsPath });
    }
  } catch (err: unknown) {
    configLog.warn("failed to load secrets.yaml", { path: secretsPath, error: errorMessage(err) });
  }
}

const packageSchema = z.object({ version: z.string() });

function packageVersion(): string {
  try {
    const raw = fs.readFileSync(new URL("../package.json", import.meta.url), "utf8");
    return packageSchema.parse(JSON.parse(raw)).version;
  } catch {
    return "0.0.0";
  }
}

function transportFlag(argv: readonly string[], fallback: TransportKind): TransportKind {
  const value = argValue(argv, "--transport");
  if (value === undefined) return fallback;
  if (value === "stdio" || value === "http") return value;
  throw new Error(`Unknown --transport ${JSON.stringify(value)}. Expected stdio or http`);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  loadEnvFile(argv);
  loadSecrets(argv);

  const config = loadConfig(process.env, { version: packageVersion() });
  configLog.info("configuration loaded", describeConfig(config));

  const api = new ElevenLabsApi(
    new FetchTransport({ baseUrl: config.apiBaseUrl, apiKey: config.apiKey, version: config.version }),
  );
  const ctx = createToolContext(config, api);

  if (transportFlag(argv, config.transport) === "http") {
    const running = await startHttpServer(ctx);
    const shutdown = (signal: string) => {
      log.info("shutting down", { signal });
      running.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error("shutdown failed", { error: errorMessage(err) });
          process.exit(1);
        },
      );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    return;
  }

  await createServer(ctx).connect(new StdioServerTransport());
  log.info("stdio transport connected");
}

main().catch((err: unknown) => {
  log.error("fatal", { error: errorMessage(err) });
  process.exit(1);
});
