import fs from "node:fs";
import path from "node:path";

type JsonObject = Record<string, unknown>;

const API_KEY_HINT_TEXT = "<your-api-key-here>";

const RESIDENCY_VALUES = ["us", "global", "eu-residency", "in-residency"];

function stripInlineComment(value: string): string {
  let inSingle = false;
  let inDouble = false;

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === "'" && !inDouble) {
      inSingle = !inSingle;
      continue;
    }
    if (ch === "\"" && !inSingle) {
      inDouble = !inDouble;
      continue;
    }
    if (ch === "#" && !inSingle && !inDouble) {
      return value.slice(0, i).trimEnd();
    }
  }

  return value;
}

function parseScalar(raw: string): unknown {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "";

  const lower = trimmed.toLowerCase();
  if (lower === "true") return true;
  if (lower === "false") return false;
  if (lower === "null") return null;

  if (/^-?\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10);
  if (/^-?\d+\.\d+$/.test(trimmed)) return Number.parseFloat(trimmed);

  if (
    (trimmed.startsWith("\"") && trimmed.endsWith("\"") && trimmed.length >= 2)
    || (trimmed.startsWith("'") && trimmed.endsWith("'") && trimmed.length >= 2)
  ) {
    return trimmed.slice(1, -1);
  }

  return trimmed;
}

function parseSimpleYamlMapping(input: string): JsonObject {
  const root: JsonObject = {};
  const stack: Array<{ indent: number; obj: JsonObject }> = [{ indent: -1, obj: root }];

  const lines = input.split(/\r?\n/);
  for (const lineRaw of lines) {
    const line = lineRaw.replace(/\t/g, "  "); // normalize tabs to spaces
    const trimmedLine = line.trim();
    if (!trimmedLine || trimmedLine.startsWith("#")) continue;

    const indent = line.length - line.trimStart().length;

    let top = stack[stack.length - 1];
    while (stack.length > 1 && top && indent <= top.indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    if (!top) continue;

    const current = top.obj;

    const colonIndex = trimmedLine.indexOf(":");
    if (colonIndex === -1) continue;

    const key = trimmedLine.slice(0, colonIndex).trim();
    if (!key) continue;

    const rest = trimmedLine.slice(colonIndex + 1);
    const valuePart = stripInlineComment(rest).trim();

    if (!valuePart) {
      const next: JsonObject = {};
      current[key] = next;
      stack.push({ indent, obj: next });
      continue;
    }

    current[key] = parseScalar(valuePart);
  }

  return root;
}

function asObject(value: unknown): JsonObject | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

function asSecretString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;
  if (trimmed === API_KEY_HINT_TEXT) return undefined;
  if (trimmed.startsWith("<your-") && trimmed.endsWith("-here>")) return undefined;
  return trimmed;
}

export type SecretsYaml = {
  elevenlabs?: {
    api_key?: string;
    residency?: string;
  };
  /** Key required from REST facade callers (`x-api-key`). */
  http?: { api_key?: string };
};

export function resolveSecretsFilePath(argv: string[], cwd: string = process.cwd()): string | undefined {
  const secretsFileIndex = argv.indexOf("--secrets-file");
  const secretsFileArg = secretsFileIndex !== -1 ? argv[secretsFileIndex + 1] : undefined;
  if (typeof secretsFileArg === "string" && secretsFileArg.trim().length > 0) {
    return path.resolve(cwd, secretsFileArg);
  }

  const defaultPath = path.join(cwd, "secrets.yaml");
  return fs.existsSync(defaultPath) ? defaultPath : undefined;
}

export function parseSecretsYaml(raw: string): SecretsYaml {
  const parsed = parseSimpleYamlMapping(raw);
  const secrets: SecretsYaml = {};

  const elevenlabs = asObject(parsed["elevenlabs"]);
  if (elevenlabs) {
    const section: NonNullable<SecretsYaml["elevenlabs"]> = {};
    const apiKey = asSecretString(elevenlabs["api_key"]);
    if (apiKey) section.api_key = apiKey;
    const residency = asSecretString(elevenlabs["residency"])?.toLowerCase();
    if (residency && RESIDENCY_VALUES.includes(residency)) section.residency = residency;
    if (Object.keys(section).length > 0) secrets.elevenlabs = section;
  }

  const httpSection = asObject(parsed["http"]);
  if (httpSection) {
    const apiKey = asSecretString(httpSection["api_key"]);
    if (apiKey) secrets.http = { api_key: apiKey };
  }

  return secrets;
}

export function loadSecretsYaml(filePath: string): SecretsYaml {
  return parseSecretsYaml(fs.readFileSync(filePath, "utf8"));
}

/** Keys in secrets.yaml override the environment. Returns the variable names set. */
export function applySecretsToEnv(secrets: SecretsYaml, env: NodeJS.ProcessEnv = process.env): string[] {
  const applied: string[] = [];

  if (secrets.elevenlabs?.api_key) {
    env["ELEVENLABS_API_KEY"] = secrets.elevenlabs.api_key;
    applied.push("ELEVENLABS_API_KEY");
  }

  if (secrets.elevenlabs?.residency) {
    env["ELEVENLABS_API_RESIDENCY"] = secrets.elevenlabs.residency;
    applied.push("ELEVENLABS_API_RESIDENCY");
  }

  if (secrets.http?.api_key) {
    env["API_KEY"] = secrets.http.api_key;
    applied.push("API_KEY");
  }

  return applied;
}
