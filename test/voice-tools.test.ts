import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { VendorError } from "../src/lib/errors.js";
import { jsonBody, startHarness, STAMP, textOf, type Harness } from "./support/harness.js";
import { makeTempDir, removeDir } from "./support/tmp.js";

const PREVIEWS = {
  previews: [
    { generated_voice_id: "gen-A1", audio_base_64: Buffer.from([1]).toString("base64") },
    { generated_voice_id: "gen-B2", audio_base_64: Buffer.from([2]).toString("base64") },
  ],
};

describe("voice tools", () => {
  let dir: string;
  let h: Harness;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(async () => {
    await h.close();
    removeDir(dir);
  });

  describe("text_to_voice", () => {
    it("saves every preview under its full generated id", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", "/v1/text-to-voice/create-previews", jsonBody(PREVIEWS));

      const result = await h.call("text_to_voice", { voice_description: "A calm narrator" });

      const first = path.join(dir, `voice_design_gen-A1_${STAMP}.mp3`);
      const second = path.join(dir, `voice_design_gen-B2_${STAMP}.mp3`);
      expect(result.content).toEqual([
        {
          type: "text",
          text: `Success. File saved as: ${first}\nSuccess. File saved as: ${second}\n\nGenerated voice IDs are: gen-A1, gen-B2`,
        },
      ]);
      expect(h.vendor.sentTo("/v1/text-to-voice/create-previews")[0]?.json).toEqual({
        voice_description: "A calm narrator",
        auto_generate_text: true,
      });
    });

    it("returns resources followed by the ids", async () => {
      h = await startHarness({ baseDirectory: dir, outputMode: "resources" });
      h.vendor.on("POST", "/v1/text-to-voice/create-previews", jsonBody(PREVIEWS));

      const result = await h.call("text_to_voice", { voice_description: "A calm narrator" });

      expect(result.content).toEqual([
        { type: "resource", resource: { uri: `elevenlabs://voice_design_gen-A1_${STAMP}.mp3`, mimeType: "audio/mpeg", blob: "AQ==" } },
        { type: "resource", resource: { uri: `elevenlabs://voice_design_gen-B2_${STAMP}.mp3`, mimeType: "audio/mpeg", blob: "Ag==" } },
        { type: "text", text: "Generated voice IDs are: gen-A1, gen-B2" },
      ]);
    });
  });

  it("search_voices returns a compact list", async () => {
    h = await startHarness({ baseDirectory: dir });
    h.vendor.on("GET", "/v2/voices", jsonBody({ voices: [{ voice_id: "v1", name: "Ada", category: "premade" }, { voice_id: "v2" }] }));

    const result = await h.call("search_voices", { search: "a" });

    expect(result.structuredContent).toEqual({
      value: [
        { id: "v1", name: "Ada", category: "premade" },
        { id: "v2", name: null, category: null },
      ],
    });
    expect(h.vendor.sentTo("/v2/voices")[0]?.query).toEqual({ search: "a", sort: "name", sort_direction: "desc" });
  });

  it("voice_clone uploads every sample", async () => {
    h = await startHarness({ baseDirectory: dir });
    fs.writeFileSync(path.join(dir, "one.wav"), "RIFF");
    fs.writeFileSync(path.join(dir, "two.mp3"), "ID3");
    h.vendor.on("POST", "/v1/voices/add", jsonBody({ voice_id: "cloned-1" }));

    const result = await h.call("voice_clone", { name: "Me", files: ["one.wav", "two.mp3"], labels: { accent: "british" } });

    expect(textOf(result)).toBe("Voice cloned successfully: Name: Me\nID: cloned-1\nDescription: N/A");
    const form = h.vendor.sentTo("/v1/voices/add")[0]?.form;
    expect(form?.["labels"]).toBe('{"accent":"british"}');
    expect(form?.["files"]).toEqual([
      { filename: "one.wav", data: Buffer.from("RIFF") },
      { filename: "two.mp3", data: Buffer.from("ID3") },
    ]);
  });

  it("edit_voice keeps the current name", async () => {
    h = await startHarness({ baseDirectory: dir });
    h.vendor
      .on("GET", "/v1/voices/v1", jsonBody({ voice_id: "v1", name: "Ada" }))
      .on("POST", "/v1/voices/v1/edit", jsonBody({ status: "ok" }));

    const result = await h.call("edit_voice", { voice_id: "v1", description: "warmer" });

    expect(textOf(result)).toBe("Voice updated successfully: Ada (ID: v1)");
    expect(h.vendor.sentTo("/v1/voices/v1/edit")[0]?.form).toEqual({ name: "Ada", description: "warmer", labels: undefined });
  });

  it("analyze_voice_quality tolerates missing settings", async () => {
    h = await startHarness({ baseDirectory: dir });
    h.vendor
      .on("GET", "/v1/voices/v1", jsonBody({ voice_id: "v1", name: "Ada", category: "cloned", fine_tuning: { state: { eleven_turbo_v2: "fine_tuned" } } }))
      .on("GET", "/v1/voices/v1/settings", { error: new VendorError(500, "boom") });

    const result = await h.call("analyze_voice_quality", { voice_id: "v1" });

    expect(textOf(result)).toBe(
      [
        "Voice Quality Analysis for Ada (ID: v1)",
        "",
        "Basic Information:",
        "- Name: Ada",
        "- Category: cloned",
        "- Description: N/A",
        "",
        "Voice Settings: Not available",
        "",
        "Quality Indicators:",
        "- Fine-tuning Status: eleven_turbo_v2: fine_tuned",
        "- Available: Yes",
      ].join("\n"),
    );
  });

  it("search_voice_library reports an empty page", async () => {
    h = await startHarness({ baseDirectory: dir });
    h.vendor.on("GET", "/v1/shared-voices", jsonBody({ voices: [] }));
    expect(textOf(await h.call("search_voice_library", {}))).toBe("No shared voices found with the specified criteria.");
  });

  describe("resource read-back", () => {
    it("reads a delivered file through elevenlabs://", async () => {
      h = await startHarness({ baseDirectory: dir });
      fs.writeFileSync(path.join(dir, `voice_design_gen-A1_${STAMP}.mp3`), Buffer.from([1, 2, 3]));

      const result = await h.client.readResource({ uri: `elevenlabs://voice_design_gen-A1_${STAMP}.mp3` });

      expect(result.contents).toEqual([
        { uri: `elevenlabs://voice_design_gen-A1_${STAMP}.mp3`, mimeType: "audio/mpeg", blob: "AQID" },
      ]);
    });

    it("reads text files as text", async () => {
      h = await startHarness({ baseDirectory: dir });
      fs.writeFileSync(path.join(dir, "report.txt"), "all good");

      const result = await h.client.readResource({ uri: "elevenlabs://report.txt" });

      expect(result.contents).toEqual([{ uri: "elevenlabs://report.txt", mimeType: "text/plain", text: "all good" }]);
    });

    it("fails for missing files", async () => {
      h = await startHarness({ baseDirectory: dir });
      await expect(h.client.readResource({ uri: "elevenlabs://missing.mp3" })).rejects.toThrow(/Resource not found: missing\.mp3/);
    });
  });
});
