import type {
  ConfidenceBand,
  MatchResult,
  SponsorMatch,
  SponsorRecord
} from "../types/sponsor.js";
import { getConfidenceBand, isConfirmedScore } from "../utils/confidence.js";

const VERDICT_DIVIDER = "-".repeat(50);

/**
 * Collapse results to one entry per company name.
 *
 * Keeps the first entry with the highest score for each exact name and
 * re-sorts by score, highest first. Scores are never changed.
 */
export function deduplicateResults(results: readonly MatchResult[]): MatchResult[] {
  const best = new Map<string, MatchResult>();

  for (const result of results) {
    const current = best.get(result.record.name);
    if (!current || current.score < result.score) {
      best.set(result.record.name, result);
    }
  }

  return [...best.values()].sort((a, b) => b.score - a.score);
}

/**
 * Flatten a match into the payload shown to callers.
 */
export function toSponsorMatch({ record, score }: MatchResult): SponsorMatch {
  const band = getConfidenceBand(score);
  return {
    name: record.name,
    city: record.city,
    county: record.county,
    rating: record.rating,
    route: record.route,
    score: Math.round(score * 1000) / 1000,
    band,
    isConfirmed: band === "confirmed"
  };
}

/**
 * "London" or "London, Greater London"; county omitted when blank.
 */
export function formatLocation(record: SponsorRecord): string {
  return record.county ? `${record.city}, ${record.county}` : record.city;
}

/**
 * Render one sponsor match as an indented text block.
 */
export function formatMatch(record: SponsorRecord, score = 1.0): string {
  const confirmed = isConfirmedScore(score);
  const status = confirmed ? "CONFIRMED" : "POSSIBLE MATCH";
  const icon = confirmed ? "✅" : "⚠️";

  return [
    `${icon} ${status} (Match: ${Math.round(score * 100)}%)`,
    `   Company: ${record.name}`,
    `   Location: ${formatLocation(record)}`,
    `   Rating: ${record.rating}`,
    `   Route: ${record.route}`
  ].join("\n");
}

const VERDICTS: Record<ConfidenceBand, string> = {
  confirmed: "✅ CONFIRMED: This is a registered UK visa sponsor",
  possible: "⚠️  POSSIBLE MATCH: Review results above",
  not_found: "❌ NOT FOUND: Not a registered sponsor"
};

/**
 * One-line verdict for the best match score.
 */
export function formatVerdict(bestScore: number): string {
  return VERDICTS[getConfidenceBand(bestScore)];
}

/**
 * Verdict line framed by dividers, as printed after a result list.
 */
export function formatVerdictBlock(bestScore: number): string {
  return [VERDICT_DIVIDER, formatVerdict(bestScore), VERDICT_DIVIDER].join("\n");
}
