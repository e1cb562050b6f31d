import {
  CAREER_SUBDOMAIN_PATTERN,
  KNOWN_COMPANY_DOMAINS,
  NOISE_WORDS,
  UNRELIABLE_URL_PATTERNS,
  URL_PATTERN_RULES
} from "./url-rules.js";
import { Logger } from "../utils/logger.js";

const logger = new Logger("url-extractor");

/**
 * Name of the strategy that settled an extraction.
 */
export type ExtractionStrategy =
  | "known-domain"
  | "url-pattern"
  | "career-subdomain"
  | "unreliable-pattern";

/**
 * Outcome of running the extraction strategies over one URL.
 */
export type ExtractionOutcome =
  | { kind: "company"; company: string; strategy: ExtractionStrategy; detail: string }
  | { kind: "refused"; strategy: "unreliable-pattern"; detail: string }
  | { kind: "none" };

/**
 * URL pieces every strategy reads.
 */
interface UrlParts {
  /** Full URL, lowercased */
  url: string;
  /** Host with port, lowercased; empty when the URL has no scheme */
  host: string;
}

/**
 * One extraction step. Returns null to let the next step run.
 */
interface ExtractionRule {
  strategy: ExtractionStrategy;
  apply(parts: UrlParts): ExtractionOutcome | null;
}

const NOISE_WORD_PATTERNS = NOISE_WORDS.map(
  (word) => new RegExp(`\\b${word}\\b`, "gi")
);

/**
 * Upper-case the first letter of every run of letters, lower-case the rest.
 */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/\p{L}+/gu, (run) => run.charAt(0).toUpperCase() + run.slice(1));
}

/**
 * Strip noise words from an extracted name and validate what is left.
 *
 * @returns The cleaned name, or null if it is shorter than two characters
 *          or has no letters
 */
export function cleanCompanyName(name: string): string | null {
  if (!name) return null;

  let cleaned = name;
  for (const pattern of NOISE_WORD_PATTERNS) {
    cleaned = cleaned.replace(pattern, "");
  }
  cleaned = cleaned.trim();

  if (cleaned.length < 2) return null;
  if (!/\p{L}/u.test(cleaned)) return null;

  return cleaned;
}

function parseUrl(url: string): UrlParts {
  try {
    return { url: url.toLowerCase(), host: new URL(url).host.toLowerCase() };
  } catch {
    // Scheme-less input: only the path patterns can apply
    return { url: url.toLowerCase(), host: "" };
  }
}

/**
 * Extraction steps in priority order. The first non-null outcome wins.
 */
export const EXTRACTION_RULES: readonly ExtractionRule[] = [
  {
    strategy: "known-domain",
    apply({ host }) {
      if (!host) return null;
      for (const [domain, company] of Object.entries(KNOWN_COMPANY_DOMAINS)) {
        if (host.includes(domain)) {
          return { kind: "company", company, strategy: "known-domain", detail: domain };
        }
      }
      return null;
    }
  },
  {
    strategy: "url-pattern",
    apply({ url }) {
      for (const rule of URL_PATTERN_RULES) {
        const match = rule.pattern.exec(url);
        const slug = match?.[1];
        if (!slug) continue;

        const company = cleanCompanyName(titleCase(slug.replace(/-/g, " ")));
        if (company) {
          return { kind: "company", company, strategy: "url-pattern", detail: rule.source };
        }
      }
      return null;
    }
  },
  {
    strategy: "career-subdomain",
    apply({ host }) {
      const label = CAREER_SUBDOMAIN_PATTERN.exec(host)?.[1];
      if (!label || label === "www") return null;

      const company = cleanCompanyName(titleCase(label));
      return company
        ? { kind: "company", company, strategy: "career-subdomain", detail: host }
        : null;
    }
  },
  {
    strategy: "unreliable-pattern",
    apply({ url }) {
      const pattern = UNRELIABLE_URL_PATTERNS.find((p) => url.includes(p));
      return pattern
        ? { kind: "refused", strategy: "unreliable-pattern", detail: pattern }
        : null;
    }
  }
];

/**
 * Run every extraction rule and report which one settled the URL.
 */
export function explainExtraction(url: string): ExtractionOutcome {
  const parts = parseUrl(url);

  for (const rule of EXTRACTION_RULES) {
    const outcome = rule.apply(parts);
    if (outcome) return outcome;
  }

  return { kind: "none" };
}

/**
 * Derive a company name from a job posting URL without fetching it.
 *
 * Prefers no answer to a wrong one: job detail pages that do not encode
 * the employer return null.
 */
export function extractCompany(url: string): string | null {
  const outcome = explainExtraction(url);

  switch (outcome.kind) {
    case "company":
      logger.debug("Company extracted from URL", {
        strategy: outcome.strategy,
        detail: outcome.detail,
        company: outcome.company
      });
      return outcome.company;
    case "refused":
      logger.debug("URL does not name its employer", { pattern: outcome.detail });
      return null;
    case "none":
      return null;
  }
}
