/**
 * Heuristic split of a voice reply into what the user said and the answer.
 *
 * The model is asked to answer as "Transcription: ... Response: ...", but it
 * does not always comply. Every input yields a pair; nothing here throws.
 */

import { TRANSCRIPT_PLACEHOLDER } from "./constants";
import type { TranscriptPair } from "./types";

export const TRANSCRIPT_MARKERS = ["transcription:", "i heard:", "user said:"] as const;
export const REPLY_MARKERS = ["response:", "answer:", "reply:"] as const;

interface MarkerMatch {
  start: number;
  end: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function markerPattern(markers: readonly string[]): RegExp {
  return new RegExp(markers.map(escapeRegExp).join("|"), "i");
}

const TRANSCRIPT_PATTERN = markerPattern(TRANSCRIPT_MARKERS);
const REPLY_PATTERN = markerPattern(REPLY_MARKERS);

// Leftmost match across all markers, matched against the original text so
// offsets stay valid for any casing.
function findMarker(text: string, pattern: RegExp): MarkerMatch | null {
  const match = pattern.exec(text);
  if (!match) return null;
  return { start: match.index, end: match.index + match[0].length };
}

function firstSentence(text: string): string {
  const period = text.indexOf(".");
  const sentence = (period >= 0 ? text.slice(0, period + 1) : text).trim();
  if (sentence.replace(/\.+$/, "").trim() === "") return "";
  return sentence.endsWith(".") ? sentence : `${sentence}.`;
}

export function splitTranscript(raw: string): TranscriptPair {
  const transcriptMarker = findMarker(raw, TRANSCRIPT_PATTERN);
  if (!transcriptMarker) {
    return { transcription: TRANSCRIPT_PLACEHOLDER, reply: raw };
  }

  const after = raw.slice(transcriptMarker.end);
  const replyMarker = findMarker(after, REPLY_PATTERN);

  if (replyMarker) {
    const transcription = after.slice(0, replyMarker.start).trim();
    return {
      transcription: transcription || TRANSCRIPT_PLACEHOLDER,
      reply: after.slice(replyMarker.end).trim(),
    };
  }

  // No reply marker: the first sentence is taken as the transcription and the
  // whole remainder is reused as the reply, duplicating that sentence.
  return {
    transcription: firstSentence(after) || TRANSCRIPT_PLACEHOLDER,
    reply: after.trim(),
  };
}
