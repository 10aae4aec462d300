// Shared deterministic helpers: sentence segmentation for transcript spans,
// timestamp formatting for reasoning text, and numeric rounding/clamping.

// ─── Sentence segmentation ──────────────────────────────────────────────────────

/**
 * Lowercase tokens (without the trailing period) that end in "." without
 * ending a sentence. Multi-period forms keep their inner periods ("e.g").
 */
const ABBREVIATIONS = new Set([
  "mr",
  "mrs",
  "ms",
  "dr",
  "prof",
  "sr",
  "jr",
  "st",
  "vs",
  "etc",
  "approx",
  "dept",
  "inc",
  "ltd",
  "e.g",
  "i.e",
]);

/** Sentence-ending punctuation cluster followed by whitespace or end of text. */
const BOUNDARY = /[.!?]+(?=\s|$)/g;

/**
 * Split text into sentences at `.`, `!` and `?`, keeping the punctuation with
 * the preceding sentence. Periods after known abbreviations do not split, and
 * decimals never match because the period is not followed by whitespace.
 */
export function splitSentences(text: string): string[] {
  if (!text || text.trim().length === 0) return [];

  const sentences: string[] = [];
  let start = 0;

  for (const match of text.matchAll(BOUNDARY)) {
    const index = match.index ?? 0;
    if (match[0] === "." && endsWithAbbreviation(text.slice(start, index))) {
      continue;
    }
    const end = index + match[0].length;
    const sentence = text.slice(start, end).trim();
    if (sentence.length > 0) sentences.push(sentence);
    start = end;
  }

  const rest = text.slice(start).trim();
  if (rest.length > 0) sentences.push(rest);
  return sentences;
}

function endsWithAbbreviation(before: string): boolean {
  const word = /(?:^|[\s(])([A-Za-z][A-Za-z.]*)$/.exec(before);
  if (!word) return false;
  return ABBREVIATIONS.has(word[1].toLowerCase());
}

/**
 * Break text longer than `maxChars` into chunks at word boundaries. Speech
 * transcripts often arrive without punctuation, which would otherwise turn a
 * whole answer into one span.
 */
export function chunkByLength(text: string, maxChars: number): string[] {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return trimmed.length > 0 ? [trimmed] : [];

  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const word of trimmed.split(/\s+/)) {
    const wordLength = word.length + 1;
    if (currentLength + wordLength > maxChars && current.length > 0) {
      chunks.push(current.join(" "));
      current = [];
      currentLength = 0;
    }
    current.push(word);
    currentLength += wordLength;
  }
  if (current.length > 0) chunks.push(current.join(" "));
  return chunks;
}

/** Sentences of `text`, with over-long sentences chunked at word boundaries. */
export function segmentSpans(text: string, maxChars: number = 150): string[] {
  return splitSentences(text).flatMap((sentence) => chunkByLength(sentence, maxChars));
}

// ─── Formatting ─────────────────────────────────────────────────────────────────

/** Format seconds as `MM:SS`. Negative and fractional values are floored at 0. */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(Number.isFinite(seconds) ? seconds : 0));
  const minutes = Math.floor(total / 60);
  const secs = total % 60;
  return `${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
}

// ─── Numbers ────────────────────────────────────────────────────────────────────

/** Round to `decimals` places, half away from zero for positive scores. */
export function roundTo(value: number, decimals: number = 1): number {
  const factor = Math.pow(10, decimals);
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
