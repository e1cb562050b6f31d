#!/usr/bin/env node
// Load environment variables FIRST: config.ts runs dotenv at module level
import "./utils/config.js";

import * as readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { parseArgs } from "node:util";
import { loadConfig, type AppConfig } from "./utils/config.js";
import { Logger, setLogLevel } from "./utils/logger.js";
import { validateThreshold } from "./utils/input-validation.js";
import { SPONSOR_REGISTER_URL } from "./utils/constants.js";
import { loadRegistry } from "./data/registry-loader.js";
import { DataSourceError } from "./data/errors.js";
import { SponsorMatcher } from "./matching/sponsor-matcher.js";
import { ProfileEnricher } from "./enrichment/profile-enricher.js";
import { createProfileCache } from "./enrichment/cache-factory.js";
import { createProfileSource } from "./sources/index.js";
import {
  runCompanySearch,
  runInteractive,
  runStats,
  runUrlCheck,
  type CliOutput
} from "./cli/commands.js";

const logger = new Logger("cli");

const USAGE = `UK Visa Sponsor Lookup Tool

Usage:
  sponsor-lookup --company "Company Name"
  sponsor-lookup --url "https://job-board.com/job/123"
  sponsor-lookup --interactive
  sponsor-lookup --stats

Options:
  -c, --company <name>     Company name to search
  -u, --url <url>          Job posting URL to analyze
  -i, --interactive        Interactive mode
      --stats              Registry statistics
      --csv <path>         Path to sponsor CSV file (default: SPONSOR_CSV or uk_sponsors.csv)
  -t, --threshold <0-1>    Match threshold (default: MATCH_THRESHOLD or 0.5)
      --json               JSON output
      --enrich             Attach external profile links to matches
      --fetch-page         Fetch the job page when the URL does not name the employer
  -h, --help               Show this help

Examples:
  sponsor-lookup --company "Google UK"
  sponsor-lookup --url "https://www.linkedin.com/company/monzo-bank"
`;

const stdoutOutput: CliOutput = {
  write: (line) => console.log(line)
};

function parseCliArgs() {
  return parseArgs({
    options: {
      company: { type: "string", short: "c" },
      url: { type: "string", short: "u" },
      interactive: { type: "boolean", short: "i", default: false },
      stats: { type: "boolean", default: false },
      csv: { type: "string" },
      threshold: { type: "string", short: "t" },
      json: { type: "boolean", default: false },
      enrich: { type: "boolean", default: false },
      "fetch-page": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false }
    },
    strict: true
  }).values;
}

async function createEnricher(config: AppConfig): Promise<ProfileEnricher> {
  const cache = await createProfileCache({
    type: config.profileCache,
    sqlitePath: config.profileCachePath
  });
  const source = createProfileSource(config.profileSource, config.tavilyApiKey);
  return new ProfileEnricher(cache, source, {
    ttlDays: config.profileCacheTtlDays
  });
}

async function main(): Promise<number> {
  const args = parseCliArgs();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (args.help || (!args.company && !args.url && !args.interactive && !args.stats)) {
    console.log(USAGE);
    return 0;
  }

  const threshold = validateThreshold(args.threshold ?? config.matchThreshold);
  const csvPath = args.csv ?? config.sponsorCsvPath;

  let matcher: SponsorMatcher;
  try {
    matcher = new SponsorMatcher(loadRegistry(csvPath));
  } catch (error) {
    if (error instanceof DataSourceError) {
      console.error(`Error: ${error.message}`);
      console.error(`Download from: ${SPONSOR_REGISTER_URL}`);
      return 1;
    }
    throw error;
  }

  const enricher = args.enrich ? await createEnricher(config) : undefined;
  const options = { threshold, json: args.json, enricher };

  try {
    if (args.company) {
      return await runCompanySearch(matcher, args.company, options, stdoutOutput);
    }

    if (args.url) {
      return await runUrlCheck(
        matcher,
        args.url,
        { ...options, fetchPage: args["fetch-page"] },
        stdoutOutput
      );
    }

    if (args.stats) {
      return runStats(matcher, stdoutOutput);
    }

    const rl = readline.createInterface({ input, output });
    try {
      return await runInteractive(matcher, threshold, rl, stdoutOutput);
    } finally {
      rl.close();
    }
  } finally {
    enricher?.close();
  }
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error("Fatal error", {
      error: error instanceof Error ? error.message : String(error)
    });
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
