import { ElevenLabsMcpError } from "./errors.js";
import { speechToTextSchema, type TranscriptEntry } from "./vendor/responses.js";

export const MAX_TRANSCRIPT_LENGTH = 50000;

function speakerLabel(speakerId: string): string {
  return speakerId.toUpperCase().replace(/_/g, " ");
}

/**
 * Group a diarized speech-to-text payload into speaker blocks:
 *
 *     SPEAKER 0: Hello there
 *
 *     SPEAKER 1: Hi
 *
 * Returns the plain transcript when no word carries a speaker id.
 * A payload that does not match the schema is rejected with UnexpectedResponse.
 */
export function formatDiarizedTranscript(payload: unknown): string {
  const parsed = speechToTextSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ElevenLabsMcpError("UnexpectedResponse", `speech_to_text: cannot parse diarized transcript at ${where}: ${issue?.message ?? "invalid payload"}`);
  }

  const blocks: Array<{ speaker: string; words: string[] }> = [];
  for (const word of parsed.data.words ?? []) {
    if (word.type === "spacing" || !word.speaker_id || !word.text.trim()) continue;
    const last = blocks[blocks.length - 1];
    if (last && last.speaker === word.speaker_id) {
      last.words.push(word.text.trim());
    } else {
      blocks.push({ speaker: word.speaker_id, words: [word.text.trim()] });
    }
  }

  if (blocks.length === 0) return parsed.data.text;
  return blocks.map((b) => `${speakerLabel(b.speaker)}: ${b.words.join(" ")}`).join("\n\n");
}

/** One line per entry: `[12.5s] agent: Hello`. */
export function formatConversationTranscript(entries: readonly TranscriptEntry[]): string {
  return entries
    .map((entry) => {
      const time = entry.time_in_call_secs != null ? `[${entry.time_in_call_secs}s] ` : "";
      return `${time}${entry.role}: ${entry.message ?? ""}`;
    })
    .join("\n");
}
