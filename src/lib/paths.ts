import fs from "node:fs";
import path from "node:path";

import { isPathWithin, expandHome } from "./env.js";
import { ElevenLabsMcpError, errnoCode, errorMessage } from "./errors.js";

export interface OutputDirOptions {
  baseDirectory: string;
  /** Reject directories outside baseDirectory (InvalidPath). */
  strict: boolean;
}

async function realpathOrSelf(p: string): Promise<string> {
  try {
    return await fs.promises.realpath(p);
  } catch (err: unknown) {
    if (errnoCode(err) === "ENOENT") return path.resolve(p);
    throw err;
  }
}

/**
 * Resolve an optional output directory against the base directory, create it
 * and return its canonical absolute path.
 *
 * Containment is checked twice: lexically before anything is created, then
 * on the real path once the directory exists (symlinked parents).
 */
export async function resolveOutputDir(requested: string | undefined, options: OutputDirOptions): Promise<string> {
  const base = path.resolve(options.baseDirectory);
  const trimmed = requested?.trim();
  const target = trimmed ? path.resolve(base, expandHome(trimmed)) : base;

  if (options.strict && !isPathWithin(base, target)) {
    throw new ElevenLabsMcpError("InvalidPath", `Output directory ${requested ?? ""} resolves outside of base directory ${base}`);
  }

  try {
    await fs.promises.mkdir(target, { recursive: true });
  } catch (err: unknown) {
    const code = errnoCode(err);
    if (code === "EEXIST" || code === "ENOTDIR") {
      throw new ElevenLabsMcpError("InvalidPath", `Output path is not a directory: ${target}`, { cause: err });
    }
    throw new ElevenLabsMcpError("IOFailure", `Failed to create output directory ${target}: ${errorMessage(err)}`, { cause: err });
  }

  const real = await fs.promises.realpath(target);
  if (options.strict) {
    const realBase = await realpathOrSelf(base);
    if (!isPathWithin(realBase, real)) {
      throw new ElevenLabsMcpError("InvalidPath", `Output directory ${requested ?? ""} resolves outside of base directory ${base}`);
    }
  }
  return real;
}

/**
 * Resolve a read-back filename to an existing file inside the base directory.
 * Absolute filenames are taken as-is but still have to stay inside the base.
 */
export async function resolveResourcePath(filename: string, baseDirectory: string): Promise<string> {
  const base = path.resolve(baseDirectory);
  const candidate = path.isAbsolute(filename) ? path.resolve(filename) : path.resolve(base, filename);

  if (!isPathWithin(base, candidate) || candidate === base) {
    throw new ElevenLabsMcpError("PathEscape", `Resource ${filename} resolves outside of base directory`);
  }

  let real: string;
  try {
    real = await fs.promises.realpath(candidate);
  } catch (err: unknown) {
    if (errnoCode(err) === "ENOENT") {
      throw new ElevenLabsMcpError("NotFound", `Resource not found: ${filename}`, { cause: err });
    }
    throw new ElevenLabsMcpError("IOFailure", `Failed to resolve resource ${filename}: ${errorMessage(err)}`, { cause: err });
  }

  const realBase = await realpathOrSelf(base);
  if (!isPathWithin(realBase, real)) {
    throw new ElevenLabsMcpError("PathEscape", `Resource ${filename} resolves outside of base directory`);
  }

  const stat = await fs.promises.stat(real);
  if (!stat.isFile()) {
    throw new ElevenLabsMcpError("NotFound", `Resource is not a file: ${filename}`);
  }
  return real;
}
