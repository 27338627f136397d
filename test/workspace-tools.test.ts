import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { downloadExtension } from "../src/tools/workspace.js";
import { jsonBody, startHarness, STAMP, textOf, type Harness } from "./support/harness.js";
import { makeTempDir, removeDir } from "./support/tmp.js";

const ZIP = [0x50, 0x4b, 0x03, 0x04];

describe("downloadExtension", () => {
  it("picks zip for archives and mp3 otherwise", () => {
    expect(downloadExtension("application/zip")).toBe("zip");
    expect(downloadExtension("Application/x-ZIP-compressed")).toBe("zip");
    expect(downloadExtension("audio/mpeg")).toBe("mp3");
  });
});

describe("workspace tools", () => {
  let dir: string;
  let h: Harness;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(async () => {
    await h.close();
    removeDir(dir);
  });

  describe("download_history_items", () => {
    it("saves several items as a zip", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", "/v1/history/download", { bytes: new Uint8Array(ZIP), contentType: "application/zip" });

      const result = await h.call("download_history_items", { history_item_ids: ["h1", "h2"] });

      const filePath = path.join(dir, `history_download_${STAMP}.zip`);
      expect(textOf(result)).toBe(`Success. File saved as: ${filePath}`);
      expect(Array.from(fs.readFileSync(filePath))).toEqual(ZIP);
      expect(h.vendor.requests[0]?.json).toEqual({ history_item_ids: ["h1", "h2"] });
    });

    it("embeds a single item's audio in resources mode", async () => {
      h = await startHarness({ baseDirectory: dir, outputMode: "resources" });
      h.vendor.on("POST", "/v1/history/download", { bytes: new Uint8Array([1, 2]), contentType: "audio/mpeg" });

      const result = await h.call("download_history_items", { history_item_ids: ["h1"] });

      expect(result.content).toEqual([
        {
          type: "resource",
          resource: { uri: `elevenlabs://history_download_${STAMP}.mp3`, mimeType: "audio/mpeg", blob: Buffer.from([1, 2]).toString("base64") },
        },
      ]);
    });
  });

  describe("pronunciation dictionaries", () => {
    it("creates a dictionary with defaulted phoneme alphabets", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", "/v1/pronunciation-dictionaries/add-from-rules", jsonBody({ id: "dict-1", name: "Brands" }));

      const result = await h.call("create_pronunciation_dictionary_from_rules", {
        name: "Brands",
        rules: [
          { type: "alias", string_to_replace: "NYSE", alias: "New York Stock Exchange" },
          { type: "phoneme", string_to_replace: "tomato", phoneme: "təˈmɑːtoʊ" },
        ],
      });

      expect(textOf(result)).toBe("Pronunciation dictionary created: Brands (ID: dict-1)");
      expect(h.vendor.requests[0]?.json).toEqual({
        name: "Brands",
        rules: [
          { type: "alias", string_to_replace: "NYSE", alias: "New York Stock Exchange" },
          { type: "phoneme", string_to_replace: "tomato", phoneme: "təˈmɑːtoʊ", alphabet: "ipa" },
        ],
      });
    });

    it("rejects an unknown rule type", async () => {
      h = await startHarness({ baseDirectory: dir });

      const result = await h.call("add_pronunciation_rules", {
        dictionary_id: "dict-1",
        rules: [{ type: "spelling", string_to_replace: "x" }],
      });

      expect(result.isError).toBe(true);
      expect(h.vendor.requests).toEqual([]);
    });

    it("counts removed rules", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", "/v1/pronunciation-dictionaries/dict-1/remove-rules", jsonBody({ id: "dict-1" }));

      const result = await h.call("remove_pronunciation_rules", { dictionary_id: "dict-1", rule_strings: ["NYSE", "tomato"] });

      expect(textOf(result)).toBe("Removed 2 rules from dictionary dict-1");
    });
  });

  it("create_studio_project uses the default voice for titles and paragraphs", async () => {
    h = await startHarness({ baseDirectory: dir, env: { ELEVENLABS_DEFAULT_VOICE_ID: "voice-x" } });
    h.vendor.on("POST", "/v1/studio/projects", jsonBody({ project: { project_id: "p1", name: "Book" } }));

    const result = await h.call("create_studio_project", { name: "Book" });

    expect(textOf(result)).toBe("Studio project created: Book (ID: p1)");
    expect(h.vendor.requests[0]?.form).toEqual({
      name: "Book",
      default_title_voice_id: "voice-x",
      default_paragraph_voice_id: "voice-x",
    });
  });

  it("list_workspace_secrets shows names and ids only", async () => {
    h = await startHarness({ baseDirectory: dir });
    h.vendor.on("GET", "/v1/convai/secrets", jsonBody({ secrets: [{ secret_id: "s1", name: "CRM_TOKEN" }] }));

    expect(textOf(await h.call("list_workspace_secrets"))).toBe("Workspace Secrets: 1\nName: CRM_TOKEN\nID: s1\n");
  });
});

describe("music tools", () => {
  let dir: string;
  let h: Harness;

  beforeEach(async () => {
    dir = makeTempDir();
    h = await startHarness({ baseDirectory: dir });
  });

  afterEach(async () => {
    await h.close();
    removeDir(dir);
  });

  it("compose_music saves the track", async () => {
    h.vendor.on("POST", "/v1/music", { bytes: new Uint8Array([7, 7]) });

    const result = await h.call("compose_music", { prompt: "calm piano", music_length_ms: 10000 });

    const filePath = path.join(dir, `music__${STAMP}.mp3`);
    expect(textOf(result)).toBe(`Success. File saved as: ${filePath}`);
    expect(h.vendor.requests[0]?.json).toEqual({ prompt: "calm piano", music_length_ms: 10000 });
  });

  it("compose_music needs exactly one of prompt and plan", async () => {
    const none = await h.call("compose_music", {});
    const both = await h.call("compose_music", { prompt: "calm piano", composition_plan: { sections: [] } });
    const lengthWithPlan = await h.call("compose_music", { composition_plan: { sections: [] }, music_length_ms: 10000 });

    expect(textOf(none)).toBe("Either prompt or composition_plan must be provided.");
    expect(textOf(both)).toBe("Only one of prompt or composition_plan must be provided");
    expect(textOf(lengthWithPlan)).toBe("music_length_ms cannot be used if composition_plan is provided");
    expect(h.vendor.requests).toEqual([]);
  });

  it("create_composition_plan returns the plan as structured content", async () => {
    const plan = { positive_global_styles: ["piano"], sections: [{ section_name: "Intro", duration_ms: 10000 }] };
    h.vendor.on("POST", "/v1/music/plan", jsonBody(plan));

    const result = await h.call("create_composition_plan", { prompt: "calm piano" });

    expect(result.structuredContent).toEqual(plan);
  });
});
