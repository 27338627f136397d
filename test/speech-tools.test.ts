import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { DEFAULT_VOICE_ID } from "../src/lib/config.js";
import { VendorError } from "../src/lib/errors.js";
import { audio, jsonBody, startHarness, STAMP, textOf, type Harness } from "./support/harness.js";
import { makeTempDir, removeDir } from "./support/tmp.js";

const TTS_PATH = `/v1/text-to-speech/${DEFAULT_VOICE_ID}`;
const MP3 = [0x49, 0x44, 0x33, 0x04];
const MP3_B64 = Buffer.from(MP3).toString("base64");

describe("speech tools", () => {
  let dir: string;
  let h: Harness;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(async () => {
    await h.close();
    removeDir(dir);
  });

  describe("text_to_speech", () => {
    it("saves the audio in files mode", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", TTS_PATH, audio(...MP3));

      const result = await h.call("text_to_speech", { text: "Hello world" });

      const filePath = path.join(dir, `tts_Hello_${STAMP}.mp3`);
      expect(result.isError).toBeUndefined();
      expect(result.content).toEqual([
        { type: "text", text: `Success. File saved as: ${filePath}. Voice used: ${DEFAULT_VOICE_ID}` },
      ]);
      expect(Array.from(fs.readFileSync(filePath))).toEqual(MP3);
    });

    it("sends the text, model and voice settings", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", TTS_PATH, audio(...MP3));

      await h.call("text_to_speech", { text: "Hello", stability: 0.3 });

      expect(h.vendor.sentTo(TTS_PATH)).toEqual([
        {
          method: "POST",
          path: TTS_PATH,
          query: { output_format: "mp3_44100_128" },
          json: {
            text: "Hello",
            model_id: "eleven_multilingual_v2",
            voice_settings: { stability: 0.3, similarity_boost: 0.75, style: 0, use_speaker_boost: true, speed: 1 },
          },
        },
      ]);
    });

    it("embeds the audio in resources mode without writing", async () => {
      h = await startHarness({ baseDirectory: dir, outputMode: "resources" });
      h.vendor.on("POST", TTS_PATH, audio(...MP3));

      const result = await h.call("text_to_speech", { text: "Hello world" });

      expect(result.content).toEqual([
        {
          type: "resource",
          resource: { uri: `elevenlabs://tts_Hello_${STAMP}.mp3`, mimeType: "audio/mpeg", blob: MP3_B64 },
        },
      ]);
      expect(fs.readdirSync(dir)).toEqual([]);
    });

    it("does both in both mode, text first", async () => {
      h = await startHarness({ baseDirectory: dir, outputMode: "both" });
      h.vendor.on("POST", TTS_PATH, audio(...MP3));

      const result = await h.call("text_to_speech", { text: "Hello world" });

      expect(result.content.map((c) => c.type)).toEqual(["text", "resource"]);
      expect(fs.existsSync(path.join(dir, `tts_Hello_${STAMP}.mp3`))).toBe(true);
    });

    it("resolves a voice by exact name", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor
        .on("GET", "/v2/voices", jsonBody({ voices: [{ voice_id: "v-rachel-2", name: "Rachel 2" }, { voice_id: "v-rachel", name: "Rachel" }] }))
        .on("POST", "/v1/text-to-speech/v-rachel", audio(...MP3));

      const result = await h.call("text_to_speech", { text: "Hi", voice_name: "Rachel" });

      expect(textOf(result)).toBe(`Success. File saved as: ${path.join(dir, `tts_Hi_${STAMP}.mp3`)}. Voice used: Rachel`);
    });

    it("refuses voice_id together with voice_name", async () => {
      h = await startHarness({ baseDirectory: dir });
      const result = await h.call("text_to_speech", { text: "Hi", voice_id: "a", voice_name: "b" });
      expect(result).toEqual({
        content: [{ type: "text", text: "voice_id and voice_name cannot both be provided." }],
        isError: true,
      });
      expect(h.vendor.requests).toEqual([]);
    });

    it("reports an output directory outside the base", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", TTS_PATH, audio(...MP3));

      const result = await h.call("text_to_speech", { text: "Hi", output_directory: "../escape" });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(`Output directory ../escape resolves outside of base directory ${dir}`);
    });

    it("surfaces vendor failures as tool errors", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", TTS_PATH, { error: new VendorError(401, "Invalid API key") });

      const result = await h.call("text_to_speech", { text: "Hi" });

      expect(result).toEqual({ content: [{ type: "text", text: "Invalid API key" }], isError: true });
    });

    it("reports invalid arguments", async () => {
      h = await startHarness({ baseDirectory: dir });
      const result = await h.call("text_to_speech", { text: "Hi", stability: 2 });
      expect(result.isError).toBe(true);
    });
  });

  it("text_to_speech_stream collects the chunks into one file", async () => {
    h = await startHarness({ baseDirectory: dir });
    h.vendor.on("POST", `${TTS_PATH}/stream`, { chunks: [new Uint8Array([1, 2]), new Uint8Array([3])] });

    const result = await h.call("text_to_speech_stream", { text: "Streamed" });

    const filePath = path.join(dir, `tts_stream_Strea_${STAMP}.mp3`);
    expect(textOf(result)).toBe(`Success. File saved as: ${filePath}`);
    expect(Array.from(fs.readFileSync(filePath))).toEqual([1, 2, 3]);
  });

  it("text_to_speech_with_timestamps delivers JSON as a text resource", async () => {
    h = await startHarness({ baseDirectory: dir, outputMode: "resources" });
    h.vendor.on("POST", `${TTS_PATH}/with-timestamps`, jsonBody({ audio_base64: MP3_B64, alignment: { characters: ["H"] } }));

    const result = await h.call("text_to_speech_with_timestamps", { text: "H" });

    expect(result.content).toEqual([
      {
        type: "resource",
        resource: {
          uri: `elevenlabs://tts_ts_H_${STAMP}.json`,
          mimeType: "application/json",
          text: JSON.stringify({ audio_base64: MP3_B64, alignment: { characters: ["H"] } }, null, 2),
        },
      },
    ]);
  });

  describe("speech_to_text", () => {
    const diarized = {
      text: "Hello there Hi",
      words: [
        { text: "Hello", type: "word", speaker_id: "speaker_0" },
        { text: "there", type: "word", speaker_id: "speaker_0" },
        { text: "Hi", type: "word", speaker_id: "speaker_1" },
      ],
    };

    beforeEach(() => {
      fs.writeFileSync(path.join(dir, "talk.mp3"), Buffer.from(MP3));
    });

    it("returns the diarized transcript directly", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", "/v1/speech-to-text", jsonBody(diarized));

      const result = await h.call("speech_to_text", {
        input_file_path: "talk.mp3",
        diarize: true,
        return_transcript_to_client_directly: true,
      });

      expect(textOf(result)).toBe("SPEAKER 0: Hello there\n\nSPEAKER 1: Hi");
      const form = h.vendor.sentTo("/v1/speech-to-text")[0]?.form;
      expect(form).toMatchObject({ model_id: "scribe_v1", diarize: true, tag_audio_events: true });
      expect(form?.["file"]).toEqual({ filename: "talk.mp3", data: Buffer.from(MP3) });
    });

    it("saves the plain transcript", async () => {
      h = await startHarness({ baseDirectory: dir });
      h.vendor.on("POST", "/v1/speech-to-text", jsonBody(diarized));

      const result = await h.call("speech_to_text", { input_file_path: path.join(dir, "talk.mp3") });

      const filePath = path.join(dir, `stt_talk._${STAMP}.txt`);
      expect(textOf(result)).toBe(`Transcription saved to ${filePath}`);
      expect(fs.readFileSync(filePath, "utf8")).toBe("Hello there Hi");
    });

    it("needs at least one destination", async () => {
      h = await startHarness({ baseDirectory: dir });
      const result = await h.call("speech_to_text", { input_file_path: "talk.mp3", save_transcript_to_file: false });
      expect(textOf(result)).toBe("Must save transcript to file or return it to the client directly.");
    });

    it("rejects non-audio input before calling the vendor", async () => {
      h = await startHarness({ baseDirectory: dir });
      fs.writeFileSync(path.join(dir, "notes.txt"), "hello");

      const result = await h.call("speech_to_text", { input_file_path: "notes.txt" });

      expect(textOf(result)).toBe(`File (${path.join(dir, "notes.txt")}) is not an audio or video file`);
      expect(h.vendor.requests).toEqual([]);
    });
  });

  it("text_to_sound_effects names files after the description", async () => {
    h = await startHarness({ baseDirectory: dir });
    h.vendor.on("POST", "/v1/sound-generation", audio(...MP3));

    const result = await h.call("text_to_sound_effects", { text: "rain on a tin roof", duration_seconds: 3 });

    expect(textOf(result)).toBe(`Success. File saved as: ${path.join(dir, `sfx_rain__${STAMP}.mp3`)}`);
    expect(h.vendor.sentTo("/v1/sound-generation")[0]?.json).toEqual({ text: "rain on a tin roof", duration_seconds: 3, loop: false });
  });

  it("batch_text_to_speech converts each text file and keeps going", async () => {
    h = await startHarness({ baseDirectory: dir, outputMode: "resources" });
    const input = path.join(dir, "chapters");
    fs.mkdirSync(input);
    fs.writeFileSync(path.join(input, "a.txt"), "First");
    fs.writeFileSync(path.join(input, "b.md"), "  ");
    fs.writeFileSync(path.join(input, "c.txt"), "Third");
    fs.writeFileSync(path.join(input, "skip.json"), "{}");
    h.vendor.on("POST", TTS_PATH, audio(1), { error: new VendorError(429, "Too many requests") });

    const result = await h.call("batch_text_to_speech", { input_directory: "chapters", output_directory: "out" });

    expect(textOf(result)).toBe(
      "Batch TTS completed for 3 files:\n✓ a.txt -> a.mp3\n⚠ b.md (empty file)\n✗ c.txt (error: Too many requests)",
    );
    expect(fs.readdirSync(path.join(dir, "out"))).toEqual(["a.mp3"]);
  });
});
