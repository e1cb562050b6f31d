import type { ProfileSource } from "./profile-source.interface.js";
import { AlgorithmicProfileSource } from "./algorithmic-source.js";
import { TavilyProfileSource } from "./tavily-source.js";
import { Logger } from "../utils/logger.js";

const logger = new Logger("profile-source-factory");

export type ProfileSourceType = "algorithmic" | "tavily" | "auto";

/**
 * Create a profile source.
 *
 * "auto" picks Tavily when an API key is given and the algorithmic
 * source otherwise.
 *
 * @param apiKey - Tavily API key, usually `AppConfig.tavilyApiKey`
 * @throws Error if "tavily" is requested without an API key
 */
export function createProfileSource(
  type: ProfileSourceType = "auto",
  apiKey?: string
): ProfileSource {
  let resolved = type;
  if (resolved === "auto") {
    resolved = apiKey ? "tavily" : "algorithmic";
  }

  switch (resolved) {
    case "tavily":
      if (!apiKey) {
        throw new Error("TAVILY_API_KEY required for Tavily profile source");
      }
      logger.info("Using Tavily profile source");
      return new TavilyProfileSource({ apiKey });

    case "algorithmic":
    default:
      logger.info("Using algorithmic profile source");
      return new AlgorithmicProfileSource();
  }
}

export { AlgorithmicProfileSource } from "./algorithmic-source.js";
export { TavilyProfileSource } from "./tavily-source.js";
export type {
  EnrichedProfile,
  ProfileData,
  ProfileOrigin,
  ProfileSource
} from "./profile-source.interface.js";
