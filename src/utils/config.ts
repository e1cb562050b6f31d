import { z } from "zod";
import { config as loadEnv } from "dotenv";
import {
  DEFAULT_PROFILE_TTL_DAYS,
  DEFAULT_SEARCH_THRESHOLD
} from "./constants.js";

loadEnv();

/**
 * Zod schema for application configuration.
 */
const AppConfigSchema = z
  .object({
    sponsorCsvPath: z.string().min(1).default("uk_sponsors.csv"),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    matchThreshold: z.coerce
      .number()
      .min(0)
      .max(1)
      .default(DEFAULT_SEARCH_THRESHOLD),
    profileSource: z.enum(["algorithmic", "tavily", "auto"]).default("auto"),
    tavilyApiKey: z.string().optional(),
    profileCache: z.enum(["memory", "sqlite"]).default("memory"),
    profileCachePath: z.string().min(1).default("profile_cache.db"),
    profileCacheTtlDays: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_PROFILE_TTL_DAYS)
  })
  .refine((data) => data.profileSource !== "tavily" || data.tavilyApiKey, {
    message: "TAVILY_API_KEY required when PROFILE_SOURCE=tavily",
    path: ["tavilyApiKey"]
  });

export type AppConfig = z.infer<typeof AppConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Build the application configuration from environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws Error listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    sponsorCsvPath: emptyToUndefined(env.SPONSOR_CSV),
    logLevel: emptyToUndefined(env.LOG_LEVEL)?.toLowerCase(),
    matchThreshold: emptyToUndefined(env.MATCH_THRESHOLD),
    profileSource: emptyToUndefined(env.PROFILE_SOURCE),
    tavilyApiKey: emptyToUndefined(env.TAVILY_API_KEY),
    profileCache: emptyToUndefined(env.PROFILE_CACHE),
    profileCachePath: emptyToUndefined(env.PROFILE_CACHE_PATH),
    profileCacheTtlDays: emptyToUndefined(env.PROFILE_CACHE_TTL_DAYS)
  };

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new Error(
      `Invalid configuration: ${result.error.errors
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join(", ")}`
    );
  }

  return result.data;
}
