import type { SponsorMatcher } from "../matching/sponsor-matcher.js";
import type { ProfileEnricher } from "../enrichment/profile-enricher.js";
import type { EnrichedProfile } from "../sources/profile-source.interface.js";
import type { MatchResult, SponsorMatch } from "../types/sponsor.js";
import {
  deduplicateResults,
  formatMatch,
  formatVerdict,
  formatVerdictBlock,
  toSponsorMatch
} from "../formatting/result-formatter.js";
import {
  generateExternalLinks,
  type ExternalLinks
} from "../formatting/external-links.js";
import { extractCompany } from "../extraction/url-extractor.js";
import { fetchCompanyFromPage } from "../extraction/page-extractor.js";
import {
  validateCompanyQuery,
  validateJobUrl
} from "../utils/input-validation.js";
import {
  CLI_DISPLAY_LIMIT,
  INTERACTIVE_DISPLAY_LIMIT,
  PRE_DEDUP_RESULTS
} from "../utils/constants.js";
import { Logger } from "../utils/logger.js";

const logger = new Logger("cli");

/**
 * Where command output goes. stdout in the CLI, a buffer in tests.
 */
export interface CliOutput {
  write(line: string): void;
}

/**
 * The part of a readline interface the interactive loop needs.
 */
export interface QuestionPrompt {
  question(query: string): Promise<string>;
}

export interface SearchCommandOptions {
  threshold: number;
  /** Print machine-readable JSON instead of text */
  json?: boolean;
  /** Attach external profiles to each match */
  enricher?: ProfileEnricher;
}

export interface UrlCommandOptions extends SearchCommandOptions {
  /** Fetch the page when the URL alone does not name the employer */
  fetchPage?: boolean;
}

/**
 * JSON shape of one match in --json output.
 */
export interface MatchPayload extends SponsorMatch {
  links: ExternalLinks;
  profile?: EnrichedProfile;
}

const EXIT_OK = 0;
const EXIT_INVALID_INPUT = 1;

const QUIT_WORDS = new Set(["quit", "exit", "q"]);

/**
 * Search, collapse duplicate company names and keep the top `limit`.
 */
export function rankedMatches(
  matcher: SponsorMatcher,
  company: string,
  threshold: number,
  limit: number
): MatchResult[] {
  return deduplicateResults(
    matcher.search(company, threshold, PRE_DEDUP_RESULTS)
  ).slice(0, limit);
}

async function toPayload(
  result: MatchResult,
  enricher?: ProfileEnricher
): Promise<MatchPayload> {
  const match = toSponsorMatch(result);
  const payload: MatchPayload = {
    ...match,
    links: generateExternalLinks(match.name, match.city, match.county)
  };
  if (enricher) {
    payload.profile = await enricher.enrich(match.name);
  }
  return payload;
}

function writeProfile(out: CliOutput, profile: EnrichedProfile): void {
  out.write(`   Profiles (${profile.source}):`);
  if (profile.linkedinUrl) out.write(`     LinkedIn: ${profile.linkedinUrl}`);
  if (profile.websiteUrl) out.write(`     Website: ${profile.websiteUrl}`);
}

async function writeMatches(
  out: CliOutput,
  matches: MatchResult[],
  enricher?: ProfileEnricher
): Promise<void> {
  if (matches.length === 0) {
    out.write("No matching sponsors found");
    return;
  }

  for (const match of matches) {
    out.write(formatMatch(match.record, match.score));
    if (enricher) {
      writeProfile(out, await enricher.enrich(match.record.name));
    }
    out.write("");
  }

  out.write(formatVerdictBlock(matches[0].score));
}

function reportInvalid(out: CliOutput, error: unknown): number {
  out.write(error instanceof Error ? error.message : String(error));
  return EXIT_INVALID_INPUT;
}

/**
 * `--company`: list the best matches for a company name.
 */
export async function runCompanySearch(
  matcher: SponsorMatcher,
  rawCompany: string,
  options: SearchCommandOptions,
  out: CliOutput
): Promise<number> {
  let company: string;
  try {
    company = validateCompanyQuery(rawCompany);
  } catch (error) {
    return reportInvalid(out, error);
  }

  const matches = rankedMatches(matcher, company, options.threshold, CLI_DISPLAY_LIMIT);

  if (options.json) {
    const results = await Promise.all(
      matches.map((match) => toPayload(match, options.enricher))
    );
    out.write(JSON.stringify({ query: company, count: results.length, results }, null, 2));
    return EXIT_OK;
  }

  out.write(`\nSearching for: '${company}'\n`);
  await writeMatches(out, matches, options.enricher);
  return EXIT_OK;
}

/**
 * `--url`: detect the employer of a job posting, then check it.
 */
export async function runUrlCheck(
  matcher: SponsorMatcher,
  rawUrl: string,
  options: UrlCommandOptions,
  out: CliOutput
): Promise<number> {
  let url: string;
  try {
    url = validateJobUrl(rawUrl);
  } catch (error) {
    return reportInvalid(out, error);
  }

  let company = extractCompany(url);
  if (!company && options.fetchPage) {
    company = await fetchCompanyFromPage(url);
  }

  if (options.json) {
    const sponsor = company ? matcher.isSponsor(company) : null;
    const sponsorDetails = sponsor
      ? {
          ...sponsor,
          links: generateExternalLinks(sponsor.name, sponsor.city, sponsor.county)
        }
      : null;
    out.write(
      JSON.stringify(
        { url, extractedCompany: company, isSponsor: sponsor !== null, sponsorDetails },
        null,
        2
      )
    );
    return EXIT_OK;
  }

  out.write(`\nAnalyzing URL: ${url}\n`);
  if (!company) {
    out.write("Could not extract company name from URL");
    out.write("Try using --company with the company name directly");
    return EXIT_OK;
  }

  out.write(`Detected company: '${company}'\n`);
  const matches = rankedMatches(matcher, company, options.threshold, CLI_DISPLAY_LIMIT);
  await writeMatches(out, matches, options.enricher);
  return EXIT_OK;
}

/**
 * `--stats`: registry totals as JSON.
 */
export function runStats(matcher: SponsorMatcher, out: CliOutput): number {
  out.write(JSON.stringify(matcher.stats(), null, 2));
  return EXIT_OK;
}

/**
 * Answer one interactive query.
 */
export function answerInteractiveQuery(
  matcher: SponsorMatcher,
  query: string,
  threshold: number,
  out: CliOutput
): void {
  const matches = rankedMatches(matcher, query, threshold, INTERACTIVE_DISPLAY_LIMIT);
  if (matches.length === 0) {
    out.write("No matching sponsors found\n");
    return;
  }

  for (const match of matches) {
    out.write(formatMatch(match.record, match.score));
    out.write("");
  }
  out.write(`${formatVerdict(matches[0].score)}\n`);
}

/**
 * `--interactive`: prompt for company names until the user quits.
 */
export async function runInteractive(
  matcher: SponsorMatcher,
  threshold: number,
  rl: QuestionPrompt,
  out: CliOutput
): Promise<number> {
  out.write("\n" + "=".repeat(50));
  out.write("   UK SPONSOR LOOKUP - Interactive Mode");
  out.write("=".repeat(50));
  out.write("Enter a company name or 'quit' to exit\n");

  while (true) {
    let query: string;
    try {
      query = (await rl.question("Company name > ")).trim();
    } catch (error) {
      // Ctrl+C or end of input closes the interface
      logger.debug("Prompt closed", {
        error: error instanceof Error ? error.message : String(error)
      });
      out.write("\nGoodbye!");
      break;
    }

    if (QUIT_WORDS.has(query.toLowerCase())) {
      out.write("\nGoodbye!");
      break;
    }
    if (!query) continue;

    answerInteractiveQuery(matcher, query, threshold, out);
  }

  return EXIT_OK;
}
