import fs from "node:fs";
import path from "node:path";

import { expandHome } from "./env.js";
import { ElevenLabsMcpError, errnoCode, errorMessage } from "./errors.js";

export const AUDIO_EXTENSIONS: readonly string[] = [
  ".wav", ".mp3", ".m4a", ".aac", ".ogg", ".flac", ".mp4", ".avi", ".mov", ".wmv",
];

const SUGGESTION_THRESHOLD = 0.7;
const SUGGESTION_LIMIT = 5;

export interface InputFileOptions {
  audioCheck?: boolean;
  baseDirectory: string;
  /** Whether the base directory was configured explicitly (relative inputs need it). */
  baseConfigured: boolean;
}

export function hasAudioExtension(filePath: string): boolean {
  return AUDIO_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

// Container signatures for files whose extension says nothing.
export function sniffAudioContainer(header: Uint8Array): boolean {
  const ascii = (start: number, end: number): string => String.fromCharCode(...header.subarray(start, end));
  if (header.length >= 12 && ascii(0, 4) === "RIFF" && (ascii(8, 12) === "WAVE" || ascii(8, 12) === "AVI ")) return true;
  if (header.length >= 3 && ascii(0, 3) === "ID3") return true;
  if (header.length >= 4 && (ascii(0, 4) === "OggS" || ascii(0, 4) === "fLaC")) return true;
  if (header.length >= 8 && ascii(4, 8) === "ftyp") return true;
  const b0 = header[0];
  const b1 = header[1];
  // MPEG audio frame sync (also ADTS AAC)
  return b0 === 0xff && b1 !== undefined && (b1 & 0xe0) === 0xe0;
}

async function readHeader(filePath: string, length = 12): Promise<Uint8Array> {
  const handle = await fs.promises.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/** Levenshtein similarity in [0, 1]. */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row.push(Math.min((prev[j] ?? 0) + 1, (row[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost));
    }
    prev = row;
  }
  return 1 - (prev[b.length] ?? longest) / longest;
}

/** Audio files in `directory` whose names resemble `name`, best match first. */
export async function findSimilarFiles(directory: string, name: string): Promise<string[]> {
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  const target = name.toLowerCase();
  return entries
    .filter((e) => e.isFile() && hasAudioExtension(e.name))
    .map((e) => ({ file: path.join(directory, e.name), score: similarity(target, e.name.toLowerCase()) }))
    .filter((m) => m.score >= SUGGESTION_THRESHOLD)
    .sort((x, y) => y.score - x.score)
    .slice(0, SUGGESTION_LIMIT)
    .map((m) => m.file);
}

async function missingFileMessage(resolved: string): Promise<string> {
  const base = `File (${resolved}) does not exist`;
  const parent = path.dirname(resolved);
  try {
    const suggestions = await findSimilarFiles(parent, path.basename(resolved));
    return suggestions.length > 0 ? `${base}. Did you mean any of these files: ${suggestions.join(", ")}?` : base;
  } catch (err: unknown) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return base;
    throw err;
  }
}

/**
 * Validate a user-supplied input file and return its absolute path. Reads are
 * not confined to the base directory.
 */
export async function handleInputFile(filePath: string, options: InputFileOptions): Promise<string> {
  const expanded = expandHome(filePath.trim());
  if (!path.isAbsolute(expanded) && !options.baseConfigured) {
    throw new ElevenLabsMcpError("InvalidPath", "File path must be an absolute path if ELEVENLABS_MCP_BASE_PATH is not set");
  }
  const resolved = path.resolve(options.baseDirectory, expanded);

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(resolved);
  } catch (err: unknown) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") {
      throw new ElevenLabsMcpError("FileNotFound", await missingFileMessage(resolved), { cause: err });
    }
    throw new ElevenLabsMcpError("IOFailure", `Cannot access file (${resolved}): ${errorMessage(err)}`, { cause: err });
  }
  if (!stat.isFile()) {
    throw new ElevenLabsMcpError("FileNotFound", `File (${resolved}) is not a file`);
  }

  if ((options.audioCheck ?? true) && !hasAudioExtension(resolved)) {
    const header = await readHeader(resolved);
    if (!sniffAudioContainer(header)) {
      throw new ElevenLabsMcpError("UnsupportedContent", `File (${resolved}) is not an audio or video file`);
    }
  }
  return resolved;
}
