import type { ConfidenceBand } from "../types/sponsor.js";
import { CONFIRMED_THRESHOLD, POSSIBLE_THRESHOLD } from "./constants.js";

/**
 * Determine the display band for a match score.
 *
 * - confirmed: score >= CONFIRMED_THRESHOLD (0.8)
 * - possible: score >= POSSIBLE_THRESHOLD (0.5)
 * - not_found: anything lower
 *
 * The bands are fixed; a caller's search threshold does not move them.
 */
export function getConfidenceBand(score: number): ConfidenceBand {
  if (score >= CONFIRMED_THRESHOLD) return "confirmed";
  if (score >= POSSIBLE_THRESHOLD) return "possible";
  return "not_found";
}

/**
 * Whether a score is high enough to call the company a registered sponsor.
 */
export function isConfirmedScore(score: number): boolean {
  return getConfidenceBand(score) === "confirmed";
}
