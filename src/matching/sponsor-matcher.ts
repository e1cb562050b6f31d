import type {
  MatchResult,
  Registry,
  RegistryStats,
  SponsorRecord
} from "../types/sponsor.js";
import { indexableWords, normalize, words } from "../data/normalize.js";
import {
  DEFAULT_MAX_RESULTS,
  DEFAULT_SEARCH_THRESHOLD,
  DEFAULT_SPONSOR_THRESHOLD,
  MATCH_SCORES,
  MIN_ABBREVIATION_LENGTH,
  MIN_QUERY_LENGTH_FOR_NAME_IN_QUERY,
  TOP_ROUTES_LIMIT
} from "../utils/constants.js";

/**
 * Jaccard index of two word sets; 0 when either is empty.
 */
export function jaccardSimilarity(
  a: ReadonlySet<string>,
  b: ReadonlySet<string>
): number {
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const word of a) {
    if (b.has(word)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return intersection / union;
}

/**
 * Score a candidate name against a query, both normalized.
 *
 * Starts from word-set Jaccard similarity, then lifts the score to the
 * highest boost that applies: a prefix relation between any pair of words,
 * or a 3+ character query word appearing inside a name word.
 */
export function scoreCandidate(queryNorm: string, nameNorm: string): number {
  const queryTokens = new Set(words(queryNorm));
  const nameTokens = new Set(words(nameNorm));
  let score = jaccardSimilarity(queryTokens, nameTokens);

  for (const qt of queryTokens) {
    for (const nt of nameTokens) {
      if (nt.startsWith(qt) || qt.startsWith(nt)) {
        score = Math.max(score, MATCH_SCORES.PREFIX_BOOST);
      }
      if (qt.length >= MIN_ABBREVIATION_LENGTH && nt.includes(qt)) {
        score = Math.max(score, MATCH_SCORES.ABBREVIATION_BOOST);
      }
    }
  }

  return score;
}

/**
 * Fuzzy lookup over a loaded sponsor registry.
 *
 * Holds the registry by reference only; every search keeps its own
 * working state, so one matcher can serve concurrent callers.
 */
export class SponsorMatcher {
  constructor(private readonly registry: Registry) {}

  /** Number of loaded sponsor records */
  get size(): number {
    return this.registry.sponsors.length;
  }

  /**
   * Rank registry entries against a free-text company name.
   *
   * Stages, each skipping names already resolved by an earlier one:
   * 1. exact normalized name (1.0)
   * 2. query inside a name (0.9), or name inside a query longer than
   *    five characters (0.85); kept whatever the threshold
   * 3. candidates sharing an indexed word with the query
   * 4. candidates scored by `scoreCandidate`, kept at or above threshold
   *
   * @param query - Company name as typed or extracted
   * @param threshold - Minimum score for word-index candidates
   * @param maxResults - Maximum number of results
   * @returns Matches sorted by score, highest first
   */
  search(
    query: string,
    threshold: number = DEFAULT_SEARCH_THRESHOLD,
    maxResults: number = DEFAULT_MAX_RESULTS
  ): MatchResult[] {
    const queryNorm = normalize(query);
    if (!queryNorm) return [];

    const results: MatchResult[] = [];
    const resolved = new Set<string>();
    const { byNormalizedName, wordIndex } = this.registry;

    const addAll = (name: string, records: readonly SponsorRecord[], score: number) => {
      for (const record of records) {
        results.push({ record, score });
      }
      resolved.add(name);
    };

    // 1. Exact
    const exact = byNormalizedName.get(queryNorm);
    if (exact) {
      addAll(queryNorm, exact, MATCH_SCORES.EXACT);
    }

    // 2. Substring
    for (const [name, records] of byNormalizedName) {
      if (!name || resolved.has(name)) continue;

      if (name.includes(queryNorm)) {
        addAll(name, records, MATCH_SCORES.QUERY_IN_NAME);
      } else if (
        queryNorm.length > MIN_QUERY_LENGTH_FOR_NAME_IN_QUERY &&
        queryNorm.includes(name)
      ) {
        addAll(name, records, MATCH_SCORES.NAME_IN_QUERY);
      }
    }

    // 3. Word-index candidates
    const candidates = new Set<string>();
    for (const word of indexableWords(queryNorm)) {
      const names = wordIndex.get(word);
      if (!names) continue;
      for (const name of names) {
        candidates.add(name);
      }
    }

    // 4. Scoring
    for (const name of candidates) {
      if (resolved.has(name)) continue;

      const score = scoreCandidate(queryNorm, name);
      if (score >= threshold) {
        addAll(name, byNormalizedName.get(name) ?? [], score);
      }
    }

    // Array.prototype.sort is stable, so ties keep stage order
    results.sort((a, b) => b.score - a.score);
    return results.slice(0, maxResults);
  }

  /**
   * Check whether a company is a registered sponsor.
   *
   * @returns The best matching record, or null when nothing reaches threshold
   */
  isSponsor(
    companyName: string,
    threshold: number = DEFAULT_SPONSOR_THRESHOLD
  ): SponsorRecord | null {
    const [best] = this.search(companyName, threshold, 1);
    if (best && best.score >= threshold) {
      return best.record;
    }
    return null;
  }

  /**
   * Aggregate figures over the loaded registry.
   */
  stats(): RegistryStats {
    const routes = new Map<string, number>();
    const ratings: Record<string, number> = {};
    const names = new Set<string>();

    for (const sponsor of this.registry.sponsors) {
      names.add(sponsor.name);
      routes.set(sponsor.route, (routes.get(sponsor.route) ?? 0) + 1);
      ratings[sponsor.rating] = (ratings[sponsor.rating] ?? 0) + 1;
    }

    const topRoutes = [...routes.entries()]
      .map(([route, count]) => ({ route, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, TOP_ROUTES_LIMIT);

    return {
      totalSponsors: this.registry.sponsors.length,
      uniqueCompanies: names.size,
      topRoutes,
      ratings
    };
  }
}
