/**
 * Safe truncation: shorten text without cutting a word or a sentence,
 * and without leaving a dangling preposition/article at the end.
 */

const SENTENCE_SEPARATORS = [". ", "! ", "? "] as const;

/** Function words that must not end a truncated string. */
export const DANGLING_WORDS: ReadonlySet<string> = new Set([
  "a",
  "de",
  "en",
  "y",
  "o",
  "u",
  "con",
  "por",
  "para",
  "al",
  "del",
  "un",
  "una",
  "el",
  "la",
  "los",
  "las",
  "se",
]);

function lastWord(text: string): string {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  return words.length > 0 ? words[words.length - 1] : "";
}

/**
 * Truncate `text` to at most `maxLength` characters.
 *
 * Prefers the last sentence end inside the window (when it is not absurdly
 * early), then the last word boundary, walking further back past dangling
 * words. Text that already fits is returned unchanged; a single word longer
 * than the budget yields "".
 */
export function truncateAtSentence(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  let truncated = text.slice(0, Math.max(0, maxLength));

  for (const sep of SENTENCE_SEPARATORS) {
    const last = truncated.lastIndexOf(sep);
    if (last >= 0 && (last >= 10 || last > Math.floor(maxLength / 2))) {
      return truncated.slice(0, last + sep.length).trimEnd();
    }
  }

  // A prefix with no usable space is only kept when the cut already falls
  // on a word boundary.
  let atBoundary = /\s/.test(text.charAt(truncated.length));
  for (;;) {
    const lastSpace = truncated.lastIndexOf(" ");
    if (lastSpace <= 0) break;
    const result = truncated.slice(0, lastSpace).trimEnd();
    atBoundary = true;
    if (!DANGLING_WORDS.has(lastWord(result).toLowerCase())) {
      return result;
    }
    truncated = result;
  }
  return atBoundary ? truncated.trimEnd() : "";
}

export function endsWithDanglingWord(text: string): boolean {
  return DANGLING_WORDS.has(lastWord(text).toLowerCase());
}
