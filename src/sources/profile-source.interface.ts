/**
 * External profile data for one company.
 * Link fields are null when the source found nothing for them.
 */
export interface ProfileData {
  companyName: string;
  linkedinUrl: string | null;
  linkedinTitle: string | null;
  indeedUrl: string | null;
  glassdoorUrl: string | null;
  glassdoorRating: string | null;
  websiteUrl: string | null;
}

/**
 * Where an enriched profile came from.
 * "cache" and "algorithmic" are fixed; live sources use their own name.
 */
export type ProfileOrigin = "cache" | "algorithmic" | (string & {});

/**
 * Profile handed back to callers, tagged with its origin.
 */
export interface EnrichedProfile extends ProfileData {
  source: ProfileOrigin;
  /** ISO timestamp of when the profile was cached, if it came from cache */
  cachedAt?: string;
}

/**
 * Interface for profile enrichment sources.
 * Implementations must handle their own error cases.
 */
export interface ProfileSource {
  /**
   * Look up external profiles for a company.
   *
   * @param companyName - Registered company name
   * @param correlationId - Optional correlation ID for tracing
   * @returns Profile data, or null if the source found nothing
   * @throws DataSourceError if the lookup fails
   */
  lookup(companyName: string, correlationId?: string | null): Promise<ProfileData | null>;

  /**
   * Get human-readable name of this source.
   */
  getName(): string;

  /**
   * Check if this source can be used (e.g., API key configured).
   */
  isAvailable(): boolean;
}
