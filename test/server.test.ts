import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { COST_WARNING } from "../src/lib/helpers.js";
import { filenameVariable } from "../src/tools/resources.js";
import { startHarness, type Harness } from "./support/harness.js";
import { makeTempDir, removeDir } from "./support/tmp.js";

describe("filenameVariable", () => {
  it("decodes percent-escapes", () => {
    expect(filenameVariable("tts%20one.mp3")).toBe("tts one.mp3");
  });

  it("takes the first value of a repeated variable", () => {
    expect(filenameVariable(["a.mp3", "b.mp3"])).toBe("a.mp3");
  });

  it("keeps a malformed escape as written", () => {
    expect(filenameVariable("100%.txt")).toBe("100%.txt");
  });

  it("rejects a missing name", () => {
    expect(() => filenameVariable(undefined)).toThrow("Resource URI carries no file name");
  });
});

describe("server catalogue", () => {
  let dir: string;
  let h: Harness;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(async () => {
    await h.close();
    removeDir(dir);
  });

  it("registers every tool once", async () => {
    h = await startHarness({ baseDirectory: dir });

    const { tools } = await h.client.listTools();
    const names = tools.map((t) => t.name);

    expect(names).toHaveLength(91);
    expect(new Set(names).size).toBe(91);
    expect(names).toEqual(expect.arrayContaining(["text_to_speech", "compose_music", "manage_agent_lifecycle", "make_outbound_call"]));
  });

  it("describes where output goes and warns about cost", async () => {
    h = await startHarness({ baseDirectory: dir, outputMode: "resources" });

    const { tools } = await h.client.listTools();
    const tts = tools.find((t) => t.name === "text_to_speech");

    expect(tts?.description).toContain("Returns output as base64-encoded MCP resource");
    expect(tts?.description?.endsWith(`\n\n${COST_WARNING}`)).toBe(true);
    expect(tools.find((t) => t.name === "list_agents")?.description).toBe("List all available conversational AI agents.");
  });

  it("exposes the output resource template", async () => {
    h = await startHarness({ baseDirectory: dir });

    const { resourceTemplates } = await h.client.listResourceTemplates();

    expect(resourceTemplates.map((t) => t.uriTemplate)).toEqual(["elevenlabs://{filename}"]);
  });
});
