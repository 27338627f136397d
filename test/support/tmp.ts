import fs from "node:fs";
import os from "node:os";
import path from "node:path";

/** Fresh directory under the OS temp dir, canonicalized (macOS links /var). */
export function makeTempDir(prefix = "elevenlabs-mcp-test-"): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
