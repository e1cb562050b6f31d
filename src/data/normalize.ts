import { MIN_INDEXED_WORD_LENGTH } from "../utils/constants.js";

/**
 * Canonical form used for every index key and every query.
 *
 * Lowercases, strips everything except letters, digits, underscores and
 * whitespace, collapses whitespace runs and trims. Idempotent. Accented
 * letters are kept, so "Société Générale" stays readable as a key.
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Whitespace-separated words of an already normalized string.
 */
export function words(normalized: string): string[] {
  return normalized.split(" ").filter((word) => word.length > 0);
}

/**
 * Words long enough to be indexed or used to look up candidates.
 */
export function indexableWords(normalized: string): string[] {
  return words(normalized).filter(
    (word) => word.length >= MIN_INDEXED_WORD_LENGTH
  );
}
