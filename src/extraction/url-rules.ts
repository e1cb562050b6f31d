/**
 * Data tables driving company extraction from job posting URLs.
 *
 * Kept apart from the extractor so each table can be inspected and
 * tested on its own.
 */

/**
 * Careers sites whose host alone identifies the employer.
 * Matched as a substring of the URL host.
 */
export const KNOWN_COMPANY_DOMAINS: Readonly<Record<string, string>> = {
  "careers.google.com": "Google",
  "jobs.apple.com": "Apple",
  "careers.microsoft.com": "Microsoft",
  "amazon.jobs": "Amazon",
  "careers.barclays.co.uk": "Barclays",
  "jobs.hsbc.co.uk": "HSBC",
  "careers.nhs.uk": "NHS",
  "jobs.tesco.com": "Tesco",
  "careers.sainsburys.co.uk": "Sainsburys"
};

export type UrlPatternSource =
  | "linkedin"
  | "indeed"
  | "glassdoor"
  | "reed"
  | "totaljobs";

/**
 * A job board URL shape that carries the company in its path.
 * The first capture group is the company slug.
 */
export interface UrlPatternRule {
  source: UrlPatternSource;
  pattern: RegExp;
}

/**
 * Company page patterns, tried in order against the lowercased URL.
 */
export const URL_PATTERN_RULES: readonly UrlPatternRule[] = [
  // Company pages, optionally their jobs or about tab
  { source: "linkedin", pattern: /linkedin\.com\/company\/([^/]+)\/?(?:jobs|about)?$/ },
  { source: "indeed", pattern: /indeed\.(?:com|co\.uk)\/cmp\/([^/]+)/ },
  { source: "glassdoor", pattern: /glassdoor\.(?:com|co\.uk)\/overview\/working-at-([^-]+)-/ },
  { source: "reed", pattern: /reed\.co\.uk\/company\/([^/]+)/ },
  { source: "totaljobs", pattern: /totaljobs\.com\/company\/([^/]+)/ }
];

/**
 * Hosts such as `acme.careers.example.com`; the first label is the company.
 */
export const CAREER_SUBDOMAIN_PATTERN =
  /^([^.]+)\.(?:careers?|jobs|apply|workday)\./;

/**
 * Job detail pages that never name the employer in the URL.
 * Extraction refuses these instead of guessing from the host.
 */
export const UNRELIABLE_URL_PATTERNS: readonly string[] = [
  "indeed.com/viewjob",
  "indeed.co.uk/viewjob",
  "linkedin.com/jobs/view",
  "glassdoor.com/job",
  "reed.co.uk/jobs/"
];

/**
 * Words stripped from extracted names before they are used as queries.
 */
export const NOISE_WORDS: readonly string[] = [
  "Jobs",
  "Careers",
  "Ltd",
  "Limited",
  "Inc",
  "Corp",
  "Corporation",
  "PLC",
  "LLC"
];
