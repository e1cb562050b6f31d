/**
 * One licensed organisation from the register of sponsors.
 * Created once per retained source row and never mutated.
 */
export interface SponsorRecord {
  readonly name: string;
  readonly city: string;
  readonly county: string;
  readonly rating: string;
  readonly route: string;
}

/**
 * In-memory sponsor registry with its lookup indexes.
 * Built once by `buildRegistry` and read-only afterwards.
 */
export interface Registry {
  /** Every retained record, in source file order */
  readonly sponsors: readonly SponsorRecord[];

  /** Normalized full name -> records sharing that normalized name */
  readonly byNormalizedName: ReadonlyMap<string, readonly SponsorRecord[]>;

  /** Normalized word (length > 2) -> normalized names containing it */
  readonly wordIndex: ReadonlyMap<string, ReadonlySet<string>>;
}

/**
 * A scored registry hit for a single query.
 */
export interface MatchResult {
  record: SponsorRecord;
  /** Match score in [0, 1] */
  score: number;
}

/**
 * Display band derived from a match score.
 */
export type ConfidenceBand = "confirmed" | "possible" | "not_found";

/**
 * Flat match payload handed to formatting layers (CLI, JSON output).
 */
export interface SponsorMatch {
  name: string;
  city: string;
  county: string;
  rating: string;
  route: string;
  score: number;
  band: ConfidenceBand;
  isConfirmed: boolean;
}

/**
 * Aggregate figures about a loaded registry.
 */
export interface RegistryStats {
  totalSponsors: number;
  uniqueCompanies: number;
  /** Most frequent routes, highest count first */
  topRoutes: Array<{ route: string; count: number }>;
  /** Record count per rating, in first-seen order */
  ratings: Record<string, number>;
}
