import { setTimeout as sleep } from "node:timers/promises";
import type { ProfileCache } from "./profile-cache.js";
import type {
  EnrichedProfile,
  ProfileSource
} from "../sources/profile-source.interface.js";
import { AlgorithmicProfileSource } from "../sources/algorithmic-source.js";
import {
  createLoggerWithCorrelationId,
  generateCorrelationId
} from "../utils/logger.js";
import {
  DEFAULT_PROFILE_TTL_DAYS,
  REFRESH_DELAY_MS
} from "../utils/constants.js";

export interface ProfileEnricherOptions {
  /** Days a fetched profile stays fresh */
  ttlDays?: number;
}

export interface RefreshOptions {
  /** Maximum stale entries to refresh */
  limit?: number;
  /** Pause between refreshes, to stay inside search API rate limits */
  delayMs?: number;
}

export interface RefreshSummary {
  refreshed: number;
  totalStale: number;
}

/**
 * Adds external profile links to sponsor matches.
 *
 * Order: fresh cache entry, then the live source (result cached), then
 * algorithmic search links, which are never cached.
 */
export class ProfileEnricher {
  private readonly fallback = new AlgorithmicProfileSource();
  private readonly ttlDays: number;

  constructor(
    private readonly cache: ProfileCache,
    private readonly source: ProfileSource,
    options: ProfileEnricherOptions = {}
  ) {
    this.ttlDays = options.ttlDays ?? DEFAULT_PROFILE_TTL_DAYS;
  }

  async enrich(
    companyName: string,
    correlationId: string = generateCorrelationId()
  ): Promise<EnrichedProfile> {
    const logger = createLoggerWithCorrelationId("profile-enricher", correlationId);

    const cached = this.cache.get(companyName);
    if (cached) {
      logger.debug("Profile cache hit", { companyName });
      const { refreshAfter: _refreshAfter, ...profile } = cached;
      return { ...profile, source: "cache" };
    }

    if (this.source.getName() !== this.fallback.getName() && this.source.isAvailable()) {
      try {
        const data = await this.source.lookup(companyName, correlationId);
        if (data) {
          this.cache.set(companyName, data, this.ttlDays);
          return { ...data, source: this.source.getName() };
        }
      } catch (error) {
        logger.warn("Profile source failed, using algorithmic links", {
          companyName,
          source: this.source.getName(),
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    return { ...this.fallback.buildProfile(companyName), source: "algorithmic" };
  }

  /** Release the cache (closes the SQLite handle, if any) */
  close(): void {
    this.cache.close();
  }

  /**
   * Re-fetch stale cached profiles, one at a time.
   * Failures are logged and do not stop the batch.
   */
  async refreshStale(options: RefreshOptions = {}): Promise<RefreshSummary> {
    const correlationId = generateCorrelationId();
    const logger = createLoggerWithCorrelationId("profile-refresh", correlationId);
    const stale = this.cache.getStaleEntries(options.limit ?? 50);
    const delayMs = options.delayMs ?? REFRESH_DELAY_MS;

    let refreshed = 0;
    for (const [index, companyName] of stale.entries()) {
      if (index > 0 && delayMs > 0) {
        await sleep(delayMs);
      }
      try {
        await this.enrich(companyName, correlationId);
        refreshed++;
      } catch (error) {
        logger.error("Failed to refresh profile", {
          companyName,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    logger.info("Stale profile refresh finished", {
      refreshed,
      totalStale: stale.length
    });
    return { refreshed, totalStale: stale.length };
  }
}
