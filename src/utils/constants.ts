// ═══════════════════════════════════════════════════════════════════════════
// MATCH SCORES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Fixed scores assigned by the matcher stages.
 * Substring scores apply regardless of the caller's threshold.
 */
export const MATCH_SCORES = {
  /** Normalized query equals an indexed normalized name */
  EXACT: 1.0,
  /** Normalized query is contained in an indexed name */
  QUERY_IN_NAME: 0.9,
  /** Indexed name is contained in a longer query */
  NAME_IN_QUERY: 0.85,
  /** Some query word is a prefix of some name word, or the reverse */
  PREFIX_BOOST: 0.7,
  /** Some query word (3+ chars) occurs inside some name word */
  ABBREVIATION_BOOST: 0.75
} as const;

/** Words shorter than this are neither indexed nor used to find candidates */
export const MIN_INDEXED_WORD_LENGTH = 3;

/** Minimum query word length for the abbreviation boost */
export const MIN_ABBREVIATION_LENGTH = 3;

/** A name inside the query only counts when the query is longer than this */
export const MIN_QUERY_LENGTH_FOR_NAME_IN_QUERY = 5;

// ═══════════════════════════════════════════════════════════════════════════
// THRESHOLDS
// ═══════════════════════════════════════════════════════════════════════════

/** Default threshold for ranked searches */
export const DEFAULT_SEARCH_THRESHOLD = 0.5;

/** Default threshold for yes/no sponsor checks */
export const DEFAULT_SPONSOR_THRESHOLD = 0.8;

/** Score at or above which a match is displayed as confirmed */
export const CONFIRMED_THRESHOLD = 0.8;

/** Score at or above which a match is displayed as a possible match */
export const POSSIBLE_THRESHOLD = 0.5;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT LIMITS
// ═══════════════════════════════════════════════════════════════════════════

/** Default maximum results returned by a search */
export const DEFAULT_MAX_RESULTS = 10;

/** Raw results fetched before deduplication for ranked listings */
export const PRE_DEDUP_RESULTS = 50;

/** Matches shown by the CLI for --company and --url */
export const CLI_DISPLAY_LIMIT = 5;

/** Matches shown per query in interactive mode */
export const INTERACTIVE_DISPLAY_LIMIT = 3;

/** Routes listed in registry statistics */
export const TOP_ROUTES_LIMIT = 10;

// ═══════════════════════════════════════════════════════════════════════════
// ENRICHMENT
// ═══════════════════════════════════════════════════════════════════════════

/** Days before a cached profile must be refreshed */
export const DEFAULT_PROFILE_TTL_DAYS = 30;

/** Pause between profile refreshes in a batch (ms) */
export const REFRESH_DELAY_MS = 1000;

/** Timeout for fetching a job posting page (ms) */
export const PAGE_FETCH_TIMEOUT_MS = 10000;

/** Timeout for a single web search call (ms) */
export const SEARCH_TIMEOUT_MS = 15000;

/** Backoff bounds between retries of an outbound call (ms) */
export const RETRY_MIN_DELAY_MS = 1000;
export const RETRY_MAX_DELAY_MS = 10000;

/** Failures in a row that open a service's circuit */
export const CIRCUIT_FAILURE_THRESHOLD = 5;

/** How long an open circuit waits before letting a trial call through (ms) */
export const CIRCUIT_COOLDOWN_MS = 30000;

/** Where the register of licensed sponsors is published */
export const SPONSOR_REGISTER_URL =
  "https://www.gov.uk/government/publications/register-of-licensed-sponsors-workers";
