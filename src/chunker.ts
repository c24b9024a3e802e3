/**
 * Split a reply into transport-sized segments.
 *
 * The header only prefixes the first segment. Splits fall at fixed offsets
 * and may land mid-word, but never between the two halves of a surrogate
 * pair: such a cut moves one unit earlier. Joining the segments gives back
 * `header + body`.
 */

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

// End offset for a slice of `text` ending at `end`, pulled back one unit when
// that would split a pair. Never pulled back below `min`.
function cutPoint(text: string, end: number, min: number): number {
  if (end >= text.length) return text.length;
  if (end - 1 >= min && isHighSurrogate(text.charCodeAt(end - 1))) return end - 1;
  return end;
}

/** Longest prefix of `text` within `limit` UTF-16 units that keeps emoji whole. */
export function truncateText(text: string, limit: number): string {
  return text.slice(0, cutPoint(text, limit, 0));
}

export function chunkResponse(header: string, body: string, limit: number): string[] {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }
  if (header.length >= limit) {
    throw new RangeError(`header length ${header.length} must be below limit ${limit}`);
  }

  let offset = cutPoint(body, limit - header.length, 0);
  const segments = [header + body.slice(0, offset)];

  while (offset < body.length) {
    const end = cutPoint(body, offset + limit, offset + 1);
    segments.push(body.slice(offset, end));
    offset = end;
  }

  return segments;
}
