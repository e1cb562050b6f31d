import Database from "better-sqlite3";
import { z } from "zod";
import type { ProfileData } from "../sources/profile-source.interface.js";
import {
  refreshAfter,
  type CachedProfile,
  type Clock,
  type ProfileCache
} from "./profile-cache.js";
import { DEFAULT_PROFILE_TTL_DAYS } from "../utils/constants.js";
import { Logger } from "../utils/logger.js";

const logger = new Logger("sqlite-profile-cache");

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS profiles (
    company_name TEXT PRIMARY KEY,
    linkedin_url TEXT,
    linkedin_title TEXT,
    indeed_url TEXT,
    glassdoor_url TEXT,
    glassdoor_rating TEXT,
    website_url TEXT,
    cached_at TEXT NOT NULL,
    refresh_after TEXT NOT NULL
  )
`;

/**
 * Zod schema for a row of the profiles table.
 */
const ProfileRowSchema = z.object({
  company_name: z.string(),
  linkedin_url: z.string().nullable(),
  linkedin_title: z.string().nullable(),
  indeed_url: z.string().nullable(),
  glassdoor_url: z.string().nullable(),
  glassdoor_rating: z.string().nullable(),
  website_url: z.string().nullable(),
  cached_at: z.string(),
  refresh_after: z.string()
});

const CompanyNameRowSchema = z.object({ company_name: z.string() });

/**
 * Profile cache persisted in a SQLite file.
 * Timestamps are stored as ISO text so they compare lexically.
 */
export class SqliteProfileCache implements ProfileCache {
  private db: Database.Database;

  constructor(
    dbPath: string,
    private readonly now: Clock = () => new Date()
  ) {
    this.db = new Database(dbPath);
    this.db.exec(CREATE_TABLE_SQL);
    logger.debug("Profile cache opened", { path: dbPath });
  }

  get(companyName: string): CachedProfile | null {
    const row: unknown = this.db
      .prepare(
        "SELECT * FROM profiles WHERE company_name = ? AND refresh_after > ?"
      )
      .get(companyName, this.now().toISOString());

    if (row === undefined) return null;

    const parsed = ProfileRowSchema.safeParse(row);
    if (!parsed.success) {
      logger.warn("Ignoring malformed cache row", { companyName });
      return null;
    }

    const data = parsed.data;
    return {
      companyName: data.company_name,
      linkedinUrl: data.linkedin_url,
      linkedinTitle: data.linkedin_title,
      indeedUrl: data.indeed_url,
      glassdoorUrl: data.glassdoor_url,
      glassdoorRating: data.glassdoor_rating,
      websiteUrl: data.website_url,
      cachedAt: data.cached_at,
      refreshAfter: data.refresh_after
    };
  }

  set(
    companyName: string,
    data: ProfileData,
    ttlDays: number = DEFAULT_PROFILE_TTL_DAYS
  ): void {
    const now = this.now();
    this.db
      .prepare(
        `INSERT OR REPLACE INTO profiles
          (company_name, linkedin_url, linkedin_title, indeed_url, glassdoor_url,
           glassdoor_rating, website_url, cached_at, refresh_after)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        companyName,
        data.linkedinUrl,
        data.linkedinTitle,
        data.indeedUrl,
        data.glassdoorUrl,
        data.glassdoorRating,
        data.websiteUrl,
        now.toISOString(),
        refreshAfter(now, ttlDays)
      );
  }

  getStaleEntries(limit = 100): string[] {
    const rows: unknown[] = this.db
      .prepare(
        "SELECT company_name FROM profiles WHERE refresh_after < ? LIMIT ?"
      )
      .all(this.now().toISOString(), limit);

    return rows.flatMap((row) => {
      const parsed = CompanyNameRowSchema.safeParse(row);
      return parsed.success ? [parsed.data.company_name] : [];
    });
  }

  close(): void {
    this.db.close();
  }
}
