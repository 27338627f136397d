import path from "node:path";
import os from "node:os";

// ═══════════════════════════════════════════════════════════════════════════════
// Parsing & Defaults
// ═══════════════════════════════════════════════════════════════════════════════

export function parseEnvList(value: string | undefined): string[] {
  return value?.split(",").map(s => s.trim()).filter(Boolean) ?? [];
}

export function parseEnvBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === "") return defaultValue;
  const v = value.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

export function envNonEmpty(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const trimmed = env[name]?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

/** Expand a leading `~` to the user's home directory. */
export function expandHome(value: string, home: string = os.homedir()): string {
  if (value === "~") return home;
  if (value.startsWith("~/") || value.startsWith("~\\")) {
    return path.join(home, value.slice(2));
  }
  return value;
}

/** Per-user desktop directory used when no base directory is configured. */
export function getDefaultBaseDir(home: string = os.homedir()): string {
  return path.join(home, "Desktop");
}

export function normalizeDirectory(dir: string, cwd: string = process.cwd(), home: string = os.homedir()): string {
  return path.resolve(cwd, expandHome(dir, home));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Containment
// ═══════════════════════════════════════════════════════════════════════════════

/** True when `candidate` is `root` itself or lies below it. Both are resolved first. */
export function isPathWithin(root: string, candidate: string): boolean {
  const norm = path.resolve(root);
  const resolved = path.resolve(candidate);
  if (resolved === norm) return true;
  const prefix = norm.endsWith(path.sep) ? norm : norm + path.sep;
  return resolved.startsWith(prefix);
}

export function maskSecret(value: string | undefined): string {
  if (!value) return "<unset>";
  if (value.length <= 8) return `${value[0] ?? "*"}...${value[value.length - 1] ?? "*"}`;
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}
