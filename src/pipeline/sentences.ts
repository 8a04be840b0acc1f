/**
 * Sentence extraction: pick only complete sentences that fit a budget.
 * Nothing returned here is ever truncated.
 */

const TERMINAL_PUNCTUATION = /[.!?]$/;
const NUMERIC_TOKEN = /\d+[.,]?\d*\s*%?/;

export const DEFAULT_MAX_LENGTH = 110;
export const DEFAULT_MAX_SENTENCES = 4;
export const DEFAULT_MIN_LENGTH = 15;

/** Characters compared to detect a restatement of an earlier candidate. */
const OVERLAP_PREFIX = 25;
/** Characters used as the identity key when de-duplicating. */
const DEDUPE_PREFIX = 40;

export interface ExtractOptions {
  maxLength?: number;
  maxSentences?: number;
  minLength?: number;
}

interface Candidate {
  score: number;
  text: string;
}

/** Split on `.`, `!` or `?` followed by whitespace, keeping the punctuation. */
export function splitSentences(text: string): string[] {
  if (!text || !text.trim()) return [];
  return text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function hasNumericToken(text: string): boolean {
  return NUMERIC_TOKEN.test(text);
}

/**
 * Title as a sentence: ends in terminal punctuation, adding a period when
 * needed. Returns null when it does not fit or was already shortened.
 */
function titleCandidate(title: string, maxLength: number): string | null {
  const clean = title.trim();
  if (!clean || clean.endsWith("…") || clean.endsWith("...")) return null;
  const sentence = TERMINAL_PUNCTUATION.test(clean)
    ? clean
    : `${clean.replace(/[\s,;:]+$/, "")}.`;
  return sentence.length <= maxLength ? sentence : null;
}

function restates(a: string, b: string): boolean {
  return b.includes(a.slice(0, OVERLAP_PREFIX)) || a.includes(b.slice(0, OVERLAP_PREFIX));
}

/**
 * Rank the title and the body's complete sentences, best first.
 *
 * Sentences with a number outrank those without; among equals the longer
 * one wins. Body sentences outside [minLength, maxLength] are never returned.
 */
export function extractKeySentences(
  title: string,
  cleaned: string,
  options: ExtractOptions = {}
): string[] {
  const maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
  const maxSentences = options.maxSentences ?? DEFAULT_MAX_SENTENCES;
  const minLength = options.minLength ?? DEFAULT_MIN_LENGTH;

  const candidates: Candidate[] = [];

  const titleSentence = titleCandidate(title, maxLength);
  if (titleSentence) {
    candidates.push({ score: 2, text: titleSentence });
  }

  for (const sentence of splitSentences(cleaned)) {
    if (sentence.length < minLength || sentence.length > maxLength) continue;
    if (!TERMINAL_PUNCTUATION.test(sentence)) continue;
    if (candidates.some((c) => restates(sentence, c.text))) continue;
    candidates.push({ score: hasNumericToken(sentence) ? 2 : 1, text: sentence });
  }

  // Array.prototype.sort is stable, so ties keep source order.
  candidates.sort((a, b) => b.score - a.score || b.text.length - a.text.length);

  const seen = new Set<string>();
  const result: string[] = [];
  for (const { text } of candidates) {
    const key = text.slice(0, DEDUPE_PREFIX);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(text);
    if (result.length >= maxSentences) break;
  }
  return result;
}
