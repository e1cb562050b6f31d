import { z } from "zod";
import { TavilySearch } from "@langchain/tavily";
import type { ProfileData, ProfileSource } from "./profile-source.interface.js";
import { DataSourceError, getErrorCode, getErrorStatus } from "../data/errors.js";
import { createLoggerWithCorrelationId } from "../utils/logger.js";
import { isRetryableError, withRetry } from "../utils/retry.js";
import { createCircuitBreaker, isCircuitOpenError } from "../utils/resilience.js";
import { withTimeout } from "../utils/timeout.js";
import { SEARCH_TIMEOUT_MS } from "../utils/constants.js";

/**
 * Zod schema for a single Tavily search result item.
 */
const TavilyResultItemSchema = z
  .object({
    title: z.string().optional(),
    url: z.string(),
    content: z.string().optional()
  })
  .passthrough();

/**
 * Zod schema for a Tavily response carrying results.
 */
const TavilyResponseSchema = z
  .object({
    results: z.array(TavilyResultItemSchema)
  })
  .passthrough();

type TavilyResultItem = z.infer<typeof TavilyResultItemSchema>;

/** Sites skipped when looking for a company's own website */
export const NON_OFFICIAL_DOMAINS = [
  "linkedin.com",
  "indeed.com",
  "glassdoor.com",
  "wikipedia.org"
];

const LINKEDIN_TITLE_SUFFIX = / \| LinkedIn$/;

interface TavilyProfileConfig {
  apiKey?: string;
  maxResults?: number;
  timeoutMs?: number;
  retries?: number;
}

const tavilyCircuitBreaker = createCircuitBreaker("tavily");

/**
 * Finds a company's LinkedIn page and official website with Tavily search.
 */
export class TavilyProfileSource implements ProfileSource {
  private linkedinTool: TavilySearch | null = null;
  private websiteTool: TavilySearch | null = null;
  private apiKey: string | undefined;
  private config: Required<Omit<TavilyProfileConfig, "apiKey">>;

  constructor(config: TavilyProfileConfig = {}) {
    this.apiKey = config.apiKey;
    this.config = {
      maxResults: config.maxResults ?? 3,
      timeoutMs: config.timeoutMs ?? SEARCH_TIMEOUT_MS,
      retries: config.retries ?? 2
    };
  }

  private getLinkedinTool(): TavilySearch {
    if (!this.linkedinTool) {
      this.linkedinTool = new TavilySearch({
        tavilyApiKey: this.apiKey,
        maxResults: this.config.maxResults,
        includeDomains: ["linkedin.com"]
      });
    }
    return this.linkedinTool;
  }

  private getWebsiteTool(): TavilySearch {
    if (!this.websiteTool) {
      this.websiteTool = new TavilySearch({
        tavilyApiKey: this.apiKey,
        maxResults: this.config.maxResults,
        excludeDomains: NON_OFFICIAL_DOMAINS
      });
    }
    return this.websiteTool;
  }

  getName(): string {
    return "tavily";
  }

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  async lookup(
    companyName: string,
    correlationId?: string | null
  ): Promise<ProfileData | null> {
    if (!this.isAvailable()) {
      throw new DataSourceError(
        "Tavily API key not configured",
        this.getName(),
        false
      );
    }

    const logger = createLoggerWithCorrelationId("tavily-source", correlationId);
    logger.info("Profile search started", { companyName });

    const linkedin = (
      await this.search(this.getLinkedinTool(), `${companyName} LinkedIn company UK`, correlationId)
    ).find((item) => item.url.includes("linkedin.com/company"));

    const website = (
      await this.search(this.getWebsiteTool(), `${companyName} official website UK`, correlationId)
    )[0];

    logger.info("Profile search completed", {
      companyName,
      foundLinkedin: !!linkedin,
      foundWebsite: !!website
    });

    if (!linkedin && !website) return null;

    return {
      companyName,
      linkedinUrl: linkedin?.url ?? null,
      linkedinTitle: linkedin?.title?.replace(LINKEDIN_TITLE_SUFFIX, "") ?? null,
      indeedUrl: null,
      glassdoorUrl: null,
      glassdoorRating: null,
      websiteUrl: website?.url ?? null
    };
  }

  private async search(
    tool: TavilySearch,
    query: string,
    correlationId?: string | null
  ): Promise<TavilyResultItem[]> {
    try {
      const raw: unknown = await withRetry(
        () =>
          tavilyCircuitBreaker.execute(() =>
            withTimeout(tool.invoke({ query }), this.config.timeoutMs, "tavily-search")
          ),
        {
          retries: this.config.retries,
          correlationId,
          operation: "tavily-search"
        }
      );

      const parsed = TavilyResponseSchema.safeParse(raw);
      return parsed.success ? parsed.data.results : [];
    } catch (error) {
      const circuitOpen = isCircuitOpenError(error);
      throw new DataSourceError(
        circuitOpen
          ? "Tavily service temporarily unavailable (circuit breaker open)"
          : `Tavily search failed: ${error instanceof Error ? error.message : "Unknown"}`,
        this.getName(),
        isRetryableError(error),
        {
          originalError: error instanceof Error ? error : undefined,
          statusCode: getErrorStatus(error),
          errorCode: getErrorCode(error)
        }
      );
    }
  }
}
