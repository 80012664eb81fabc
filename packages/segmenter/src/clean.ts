// C0 controls except \t and \n, DEL, C1 controls, zero-width and BOM.
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F\u200B-\u200D\uFEFF]/g;

const SENTENCE_BOUNDARY = /(?<=[.!?\u2026])\s+(?=[\p{Lu}\p{N}"'\u00AB\u201C(\[])/u;

/**
 * Normalize line endings, drop control characters and collapse horizontal
 * whitespace. Line breaks survive; they separate units.
 */
export function cleanText(raw: string): string {
  return raw
    .replace(/\r\n?/g, "\n")
    .replace(CONTROL_CHARS, "")
    .replace(/[^\S\n]+/g, " ")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * Split cleaned text into sentence-like units. Every line is at least one
 * unit; a line is further split after terminal punctuation followed by an
 * upper-case letter, digit, quote or bracket in any script.
 */
export function splitSentences(cleaned: string): string[] {
  const units: string[] = [];
  for (const line of cleaned.split("\n")) {
    for (const part of line.split(SENTENCE_BOUNDARY)) {
      const unit = part.trim();
      if (unit.length > 0) units.push(unit);
    }
  }
  return units;
}

/**
 * Break a unit longer than `maxChars` at whitespace. A single word longer
 * than the budget is cut hard.
 */
export function splitLongUnit(unit: string, maxChars: number): string[] {
  if (unit.length <= maxChars) return [unit];

  const pieces: string[] = [];
  let current = "";
  for (const word of unit.split(" ")) {
    if (word.length > maxChars) {
      if (current) pieces.push(current);
      current = "";
      const cuts = cutWord(word, maxChars);
      current = cuts.pop() ?? "";
      pieces.push(...cuts);
      continue;
    }
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= maxChars) {
      current = `${current} ${word}`;
    } else {
      pieces.push(current);
      current = word;
    }
  }
  if (current) pieces.push(current);
  return pieces;
}

/** Fixed-width cuts that never separate a surrogate pair. */
function cutWord(word: string, maxChars: number): string[] {
  const cuts: string[] = [];
  let start = 0;
  while (start < word.length) {
    let end = Math.min(start + maxChars, word.length);
    if (end < word.length && end - start > 1 && isHighSurrogate(word.charCodeAt(end - 1))) end -= 1;
    cuts.push(word.slice(start, end));
    start = end;
  }
  return cuts;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export interface InformativeFilter {
  minWords: number;
  minAlphaRatio: number;
}

/**
 * A unit is informative when it has at least `minWords` purely alphabetic
 * words and letters make up at least `minAlphaRatio` of its alphanumerics.
 */
export function isInformative(unit: string, filter: InformativeFilter): boolean {
  const words = unit.split(/[^\p{L}\p{N}]+/u).filter((t) => /^\p{L}+$/u.test(t));
  if (words.length < filter.minWords) return false;

  const alnum = unit.match(/[\p{L}\p{N}]/gu)?.length ?? 0;
  const alpha = unit.match(/\p{L}/gu)?.length ?? 0;
  if (alnum === 0) return false;
  return alpha / alnum >= filter.minAlphaRatio;
}
