/**
 * Turns backend output into the text shown to the user and cuts it into
 * message-sized segments.
 */

import { chunkResponse } from "./chunker";
import { ICONS, NOTICES, TRANSCRIPT_PLACEHOLDER } from "./constants";
import { splitTranscript } from "./transcript-splitter";
import type { TranscriptPair } from "./types";

const MARKUP_TAG = /<[^>]*>/g;

/** Remove anything that looks like an HTML/XML tag. */
export function stripMarkupTags(text: string): string {
  return text.replace(MARKUP_TAG, "");
}

export interface FormattedReply {
  header: string;
  body: string;
}

export function formatTextReply(raw: string): FormattedReply {
  const body = stripMarkupTags(raw).trim();
  return { header: "", body: body || NOTICES.emptyResponse };
}

export function formatVoiceReply(raw: string): FormattedReply & { transcript: TranscriptPair } {
  const split = splitTranscript(raw);
  const transcript: TranscriptPair = {
    transcription: stripMarkupTags(split.transcription).trim() || TRANSCRIPT_PLACEHOLDER,
    reply: stripMarkupTags(split.reply).trim(),
  };
  return {
    header: `${ICONS.voice} ${transcript.transcription}\n\n`,
    body: `${ICONS.reply} ${transcript.reply || NOTICES.emptyResponse}`,
    transcript,
  };
}

/**
 * Chunk a formatted reply. A header too long to fit the first segment is
 * folded into the body so nothing is lost.
 */
export function toSegments(reply: FormattedReply, limit: number): string[] {
  if (reply.header.length >= limit) {
    return chunkResponse("", reply.header + reply.body, limit);
  }
  return chunkResponse(reply.header, reply.body, limit);
}
