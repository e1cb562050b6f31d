import { z } from "zod";
import { MemoryProfileCache, type ProfileCache } from "./profile-cache.js";
import { Logger } from "../utils/logger.js";

const logger = new Logger("profile-cache-factory");

const SQLITE_DRIVER = "better-sqlite3";

/**
 * Zod schema for profile cache configuration.
 */
const ProfileCacheConfigSchema = z.object({
  type: z.enum(["memory", "sqlite"]),
  sqlitePath: z.string().optional()
});

export type ProfileCacheConfig = z.infer<typeof ProfileCacheConfigSchema>;

/**
 * Create a profile cache.
 *
 * - memory: lives as long as the process
 * - sqlite: persisted to `sqlitePath` (":memory:" when omitted); the
 *   native driver is only loaded when this backend is chosen
 */
export async function createProfileCache(
  config: ProfileCacheConfig = { type: "memory" }
): Promise<ProfileCache> {
  const result = ProfileCacheConfigSchema.safeParse(config);
  if (!result.success) {
    throw new Error(
      `Invalid profile cache configuration: ${result.error.errors
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join(", ")}`
    );
  }

  const validated = result.data;
  logger.info("Creating profile cache", { type: validated.type });

  switch (validated.type) {
    case "sqlite": {
      // better-sqlite3 is optional; only this backend needs it
      const sqliteModule = await import("./sqlite-profile-cache.js").catch(
        (error: unknown) => {
          logger.error("Failed to load SQLite profile cache", {
            error: error instanceof Error ? error.message : String(error)
          });
          throw new Error(
            `SQLite profile cache requires ${SQLITE_DRIVER}. ` +
              `Install with: npm install ${SQLITE_DRIVER}`
          );
        }
      );
      const dbPath = validated.sqlitePath ?? ":memory:";
      logger.info("Opening SQLite profile cache", { path: dbPath });
      return new sqliteModule.SqliteProfileCache(dbPath);
    }
    case "memory":
      return new MemoryProfileCache();
  }
}
