import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  aggregateResults,
  collectChunks,
  deliverArtifact,
  getMimeType,
  handleLargeText,
  outputModeDescription,
  readResource,
  resourceUri,
  toToolContent,
  type DeliveredResult,
} from "../src/lib/delivery.js";
import { makeTempDir, removeDir } from "./support/tmp.js";

const AUDIO = new Uint8Array([0x49, 0x44, 0x33, 0x04, 0x00]);
const AUDIO_B64 = Buffer.from(AUDIO).toString("base64");

describe("delivery", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  describe("mime types and uris", () => {
    it("maps known extensions case-insensitively", () => {
      expect(getMimeType("a.MP3")).toBe("audio/mpeg");
      expect(getMimeType("/x/y/report.json")).toBe("application/json");
      expect(getMimeType("history.zip")).toBe("application/zip");
    });

    it("falls back to octet-stream", () => {
      expect(getMimeType("blob.bin")).toBe("application/octet-stream");
      expect(getMimeType("noext")).toBe("application/octet-stream");
    });

    it("percent-encodes the filename in the resource uri", () => {
      expect(resourceUri("a b.mp3")).toBe("elevenlabs://a%20b.mp3");
    });

    it("describes each output mode", () => {
      expect(outputModeDescription("files", "/out")).toBe("Saves output file to directory (default: /out)");
      expect(outputModeDescription("resources", "/out")).toBe("Returns output as base64-encoded MCP resource");
      expect(outputModeDescription("both", "/out")).toBe(
        "Saves file to directory (default: /out) AND returns as base64-encoded MCP resource",
      );
    });
  });

  describe("deliverArtifact", () => {
    it("writes the file in files mode", async () => {
      const result = await deliverArtifact({ data: AUDIO, directory: dir, filename: "tts_hi_20240102_030405.mp3", mode: "files" });
      const filePath = path.join(dir, "tts_hi_20240102_030405.mp3");
      expect(result).toEqual({ file: { path: filePath, message: `Success. File saved as: ${filePath}` } });
      expect(fs.readFileSync(filePath)).toEqual(Buffer.from(AUDIO));
    });

    it("embeds without touching disk in resources mode", async () => {
      const result = await deliverArtifact({ data: AUDIO, directory: dir, filename: "a.mp3", mode: "resources" });
      expect(result).toEqual({
        resource: { type: "resource", resource: { uri: "elevenlabs://a.mp3", mimeType: "audio/mpeg", blob: AUDIO_B64 } },
      });
      expect(fs.readdirSync(dir)).toEqual([]);
    });

    it("does both in both mode", async () => {
      const result = await deliverArtifact({ data: AUDIO, directory: dir, filename: "a.mp3", mode: "both" });
      expect(result.file?.path).toBe(path.join(dir, "a.mp3"));
      expect(result.resource?.resource.uri).toBe("elevenlabs://a.mp3");
      expect(fs.readdirSync(dir)).toEqual(["a.mp3"]);
    });

    it("embeds text types as text", async () => {
      const result = await deliverArtifact({ data: "héllo", directory: dir, filename: "notes.txt", mode: "resources" });
      expect(result.resource).toEqual({
        type: "resource",
        resource: { uri: "elevenlabs://notes.txt", mimeType: "text/plain", text: "héllo" },
      });
    });

    it("falls back to a blob when text bytes are not UTF-8", async () => {
      const bytes = new Uint8Array([0xff, 0xfe, 0x00]);
      const result = await deliverArtifact({ data: bytes, directory: dir, filename: "bad.txt", mode: "resources" });
      expect(result.resource?.resource).toEqual({
        uri: "elevenlabs://bad.txt",
        mimeType: "text/plain",
        blob: Buffer.from(bytes).toString("base64"),
      });
    });

    it("fills the success template", async () => {
      const result = await deliverArtifact({
        data: "x",
        directory: dir,
        filename: "r.txt",
        mode: "files",
        successTemplate: "Report saved to {file_path}",
      });
      expect(result.file?.message).toBe(`Report saved to ${path.join(dir, "r.txt")}`);
    });

    it("replaces an existing file with the same name", async () => {
      await deliverArtifact({ data: "first", directory: dir, filename: "same.txt", mode: "files" });
      await deliverArtifact({ data: "second", directory: dir, filename: "same.txt", mode: "files" });
      expect(fs.readFileSync(path.join(dir, "same.txt"), "utf8")).toBe("second");
      expect(fs.readdirSync(dir)).toEqual(["same.txt"]);
    });

    it("rejects names that carry a path", async () => {
      await expect(deliverArtifact({ data: "x", directory: dir, filename: "../x.txt", mode: "files" })).rejects.toMatchObject({
        code: "InvalidPath",
      });
      await expect(deliverArtifact({ data: "x", directory: dir, filename: "", mode: "resources" })).rejects.toMatchObject({
        code: "InvalidPath",
      });
    });

    it("reports write failures as IOFailure", async () => {
      await expect(
        deliverArtifact({ data: "x", directory: path.join(dir, "missing"), filename: "a.txt", mode: "files" }),
      ).rejects.toMatchObject({ code: "IOFailure" });
    });
  });

  describe("toToolContent", () => {
    it("puts the text before the resource", async () => {
      const result = await deliverArtifact({ data: AUDIO, directory: dir, filename: "a.mp3", mode: "both" });
      const content = toToolContent(result);
      expect(content.map((c) => c.type)).toEqual(["text", "resource"]);
    });
  });

  describe("aggregateResults", () => {
    const first: DeliveredResult = {
      file: { path: "/out/1.mp3", message: "Success. File saved as: /out/1.mp3" },
      resource: { type: "resource", resource: { uri: "elevenlabs://1.mp3", mimeType: "audio/mpeg", blob: "AA==" } },
    };
    const second: DeliveredResult = {
      file: { path: "/out/2.mp3", message: "Success. File saved as: /out/2.mp3" },
      resource: { type: "resource", resource: { uri: "elevenlabs://2.mp3", mimeType: "audio/mpeg", blob: "AQ==" } },
    };

    it("summarizes files in order", () => {
      expect(aggregateResults([first, second], "files", "Generated voice IDs are: a, b")).toEqual([
        {
          type: "text",
          text: "Success. File saved as: /out/1.mp3\nSuccess. File saved as: /out/2.mp3\n\nGenerated voice IDs are: a, b",
        },
      ]);
    });

    it("lists resources then the extra text", () => {
      expect(aggregateResults([first, second], "resources", "done")).toEqual([
        first.resource,
        second.resource,
        { type: "text", text: "done" },
      ]);
    });

    it("uses resources only in both mode", () => {
      expect(aggregateResults([first], "both")).toEqual([first.resource]);
    });

    it("handles an empty batch", () => {
      expect(aggregateResults([], "files")).toEqual([{ type: "text", text: "" }]);
      expect(aggregateResults([], "resources")).toEqual([]);
    });
  });

  it("concatenates streamed chunks", async () => {
    async function* chunks(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array([1, 2]);
      yield new Uint8Array([3]);
    }
    expect(Array.from(await collectChunks(chunks()))).toEqual([1, 2, 3]);
  });

  describe("readResource", () => {
    it("returns audio as a blob", async () => {
      fs.writeFileSync(path.join(dir, "a.mp3"), AUDIO);
      expect(await readResource("a.mp3", dir)).toEqual({ uri: "elevenlabs://a.mp3", mimeType: "audio/mpeg", blob: AUDIO_B64 });
    });

    it("returns text types as text", async () => {
      fs.writeFileSync(path.join(dir, "report.csv"), "a,b\n1,2\n");
      expect(await readResource("report.csv", dir)).toEqual({
        uri: "elevenlabs://report.csv",
        mimeType: "text/csv",
        text: "a,b\n1,2\n",
      });
    });

    it("keeps the containment check", async () => {
      await expect(readResource("../../etc/passwd", dir)).rejects.toMatchObject({ code: "PathEscape" });
    });
  });

  describe("handleLargeText", () => {
    const now = new Date(2024, 0, 2, 3, 4, 5);

    it("returns short text unchanged", async () => {
      expect(await handleLargeText("short", { maxLength: 10, contentType: "conversation_transcript", baseDirectory: dir, now })).toBe(
        "short",
      );
      expect(fs.readdirSync(dir)).toEqual([]);
    });

    it("moves long text to a file", async () => {
      const text = "x".repeat(11);
      const message = await handleLargeText(text, { maxLength: 10, contentType: "conversation_transcript", baseDirectory: dir, now });
      const filePath = path.join(dir, "large_conve_20240102_030405.txt");
      expect(message).toBe(`Content saved to file: ${filePath} due to large size`);
      expect(fs.readFileSync(filePath, "utf8")).toBe(text);
    });
  });
});
