/**
 * Best-effort company extraction from a fetched job posting page.
 *
 * Separate from `extractCompany`: that function never touches the network.
 * Callers use this only when URL heuristics come up empty.
 */

import * as cheerio from "cheerio";
import { z } from "zod";
import { withRetry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import { PAGE_FETCH_TIMEOUT_MS } from "../utils/constants.js";
import { createLoggerWithCorrelationId } from "../utils/logger.js";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

/**
 * Zod schema for the JSON-LD fields used to find an employer.
 */
const JobPostingLdSchema = z
  .object({
    name: z.string().optional(),
    hiringOrganization: z
      .union([z.object({ name: z.string().optional() }).passthrough(), z.string()])
      .optional()
  })
  .passthrough();

const TITLE_BOARD_SUFFIX = / - (Indeed|LinkedIn|Glassdoor|Jobs).*$/i;
const TITLE_PIPE_SUFFIX = / \|.*$/;

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function companyFromJsonLd(raw: string, url: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = JobPostingLdSchema.safeParse(parsed);
  if (!result.success) return null;

  const { hiringOrganization, name } = result.data;
  if (typeof hiringOrganization === "object") {
    return nonEmpty(hiringOrganization.name);
  }
  if (url.toLowerCase().includes("job")) {
    return nonEmpty(name);
  }
  return null;
}

/**
 * Reduce a page title to a company name.
 * "Data Engineer at Acme Widgets - Indeed" -> "Acme Widgets"
 */
export function companyFromTitle(title: string): string | null {
  const stripped = title
    .replace(TITLE_BOARD_SUFFIX, "")
    .replace(TITLE_PIPE_SUFFIX, "");

  if (stripped.toLowerCase().includes(" at ")) {
    const parts = stripped.split(" at ");
    if (parts.length >= 2) {
      return nonEmpty(parts[parts.length - 1]);
    }
  }
  return nonEmpty(stripped);
}

/**
 * Find the employer named in a job posting page.
 *
 * Looks at, in order: a `data-company-name` attribute, the first JSON-LD
 * block (`hiringOrganization.name`, or `name` on job URLs), then `<title>`.
 */
export function extractCompanyFromHtml(html: string, url: string): string | null {
  const $ = cheerio.load(html);

  const attribute = nonEmpty($("[data-company-name]").first().attr("data-company-name"));
  if (attribute) return attribute;

  const jsonLd = $('script[type="application/ld+json"]').first().html();
  if (jsonLd) {
    const fromLd = companyFromJsonLd(jsonLd, url);
    if (fromLd) return fromLd;
  }

  const title = $("title").first().text();
  return title ? companyFromTitle(title) : null;
}

/**
 * Options for fetching a job posting page.
 */
export interface PageFetchOptions {
  timeoutMs?: number;
  retries?: number;
  correlationId?: string | null;
}

async function fetchPage(url: string, signal: AbortSignal): Promise<string> {
  const response = await fetch(url, {
    headers: { "User-Agent": USER_AGENT },
    signal
  });
  if (!response.ok) {
    throw Object.assign(
      new Error(`Page fetch failed with HTTP ${response.status}`),
      { status: response.status }
    );
  }
  return response.text();
}

/**
 * Fetch a job posting page and extract its employer.
 * Network and HTTP failures resolve to null after being logged.
 * A request that times out is aborted before the next attempt starts.
 */
export async function fetchCompanyFromPage(
  url: string,
  options: PageFetchOptions = {}
): Promise<string | null> {
  const logger = createLoggerWithCorrelationId("page-extractor", options.correlationId);
  const timeoutMs = options.timeoutMs ?? PAGE_FETCH_TIMEOUT_MS;

  try {
    const html = await withRetry(
      () => {
        const controller = new AbortController();
        return withTimeout(fetchPage(url, controller.signal), timeoutMs, "page-fetch").catch(
          (error: unknown) => {
            controller.abort();
            throw error;
          }
        );
      },
      {
        retries: options.retries ?? 1,
        correlationId: options.correlationId,
        operation: "page-fetch"
      }
    );

    const company = extractCompanyFromHtml(html, url);
    logger.debug("Page extraction finished", { url, company });
    return company;
  } catch (error) {
    logger.warn("Could not fetch job posting page", {
      url,
      error: error instanceof Error ? error.message : String(error)
    });
    return null;
  }
}
