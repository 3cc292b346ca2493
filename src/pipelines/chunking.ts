import { EmptyDocumentError } from "../domain/errors.js";
import { ChunkDraft } from "../domain/types.js";
import { normalizeText } from "../utils/text.js";

export const DEFAULT_MAX_CHARS = 1000;
export const DEFAULT_OVERLAP = 200;

interface Boundary {
  pattern: RegExp;
  /** Cut position relative to the match start. */
  cutOffset: number;
}

// Tried in order; the first kind that yields an acceptable cut wins.
const BOUNDARIES: Boundary[] = [
  { pattern: /\n[ ]*\n/g, cutOffset: 0 },
  { pattern: /[.!?。](?=\s)/g, cutOffset: 1 },
  { pattern: /\s/g, cutOffset: 0 },
];

/**
 * Splits text into overlapping spans over its normalized form. Chunk `i + 1`
 * starts exactly `overlap` characters before chunk `i` ends, the last chunk
 * ends at the end of the text, and the same input always yields the same
 * spans.
 */
export function chunkText(
  text: string,
  maxChars: number = DEFAULT_MAX_CHARS,
  overlap: number = DEFAULT_OVERLAP,
): ChunkDraft[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`maxChars must be a positive integer, got ${maxChars}.`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxChars) {
    throw new RangeError(`overlap must satisfy 0 <= overlap < maxChars, got ${overlap}.`);
  }

  const normalized = normalizeText(text);
  if (!normalized) {
    throw new EmptyDocumentError();
  }

  // A soft cut must keep at least half a chunk and move past the overlap.
  const minAdvance = Math.max(overlap + 1, Math.ceil(maxChars / 2));
  const drafts: ChunkDraft[] = [];
  let start = 0;

  while (true) {
    const hardEnd = Math.min(start + maxChars, normalized.length);
    const end =
      hardEnd >= normalized.length
        ? normalized.length
        : findCut(normalized, start, hardEnd, start + minAdvance);

    drafts.push({
      sequenceIndex: drafts.length,
      start,
      end,
      text: normalized.slice(start, end),
    });

    if (end >= normalized.length) {
      return drafts;
    }
    start = end - overlap;
  }
}

function findCut(text: string, start: number, hardEnd: number, minEnd: number): number {
  // One extra character so a boundary sitting right at hardEnd is still seen.
  const window = text.slice(start, Math.min(hardEnd + 1, text.length));

  for (const boundary of BOUNDARIES) {
    let best = -1;
    for (const match of window.matchAll(boundary.pattern)) {
      const cut = start + (match.index ?? 0) + boundary.cutOffset;
      if (cut >= minEnd && cut <= hardEnd) {
        best = cut;
      }
    }
    if (best >= 0) {
      return best;
    }
  }

  return hardEnd;
}
