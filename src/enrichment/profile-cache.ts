import type { ProfileData } from "../sources/profile-source.interface.js";
import { DEFAULT_PROFILE_TTL_DAYS } from "../utils/constants.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * A cached profile with its timestamps.
 */
export interface CachedProfile extends ProfileData {
  cachedAt: string;
  refreshAfter: string;
}

/**
 * TTL cache for enriched profiles, keyed by company name.
 */
export interface ProfileCache {
  /** Fresh cached profile, or null when missing or stale */
  get(companyName: string): CachedProfile | null;

  /** Store a profile that goes stale after `ttlDays` */
  set(companyName: string, data: ProfileData, ttlDays?: number): void;

  /** Names of cached profiles that are due for a refresh */
  getStaleEntries(limit?: number): string[];

  close(): void;
}

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

/**
 * Cache that lives for the lifetime of the process.
 */
export class MemoryProfileCache implements ProfileCache {
  private entries = new Map<string, CachedProfile>();

  constructor(private readonly now: Clock = systemClock) {}

  get(companyName: string): CachedProfile | null {
    const entry = this.entries.get(companyName);
    if (!entry) return null;
    return Date.parse(entry.refreshAfter) > this.now().getTime() ? entry : null;
  }

  set(
    companyName: string,
    data: ProfileData,
    ttlDays: number = DEFAULT_PROFILE_TTL_DAYS
  ): void {
    const now = this.now();
    this.entries.set(companyName, {
      ...data,
      companyName,
      cachedAt: now.toISOString(),
      refreshAfter: refreshAfter(now, ttlDays)
    });
  }

  getStaleEntries(limit = 100): string[] {
    const now = this.now().getTime();
    const stale: string[] = [];
    for (const [name, entry] of this.entries) {
      if (stale.length >= limit) break;
      if (Date.parse(entry.refreshAfter) < now) stale.push(name);
    }
    return stale;
  }

  close(): void {
    this.entries.clear();
  }
}

/**
 * Timestamp `ttlDays` after `from`, as ISO text.
 */
export function refreshAfter(from: Date, ttlDays: number): string {
  return new Date(from.getTime() + ttlDays * DAY_MS).toISOString();
}
