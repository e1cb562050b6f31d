import { readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { Registry } from "../types/sponsor.js";
import { DataSourceError, getErrorCode } from "./errors.js";
import { buildRegistry, type RawSponsorRow } from "./registry.js";
import { Logger } from "../utils/logger.js";

const logger = new Logger("registry-loader");

/**
 * Column headers of the published register of licensed sponsors.
 */
export const SPONSOR_COLUMNS = {
  name: "Organisation Name",
  city: "Town/City",
  county: "County",
  rating: "Type & Rating",
  route: "Route"
} as const;

/**
 * Zod schema for one parsed CSV record.
 * Every column is optional so short rows still load.
 */
const SponsorCsvRowSchema = z
  .object({
    [SPONSOR_COLUMNS.name]: z.string().optional(),
    [SPONSOR_COLUMNS.city]: z.string().optional(),
    [SPONSOR_COLUMNS.county]: z.string().optional(),
    [SPONSOR_COLUMNS.rating]: z.string().optional(),
    [SPONSOR_COLUMNS.route]: z.string().optional()
  })
  .passthrough();

/**
 * Result of parsing register text, before indexing.
 */
export interface ParsedSponsorCsv {
  rows: RawSponsorRow[];
  /** Records the parser returned that did not have the expected shape */
  malformed: number;
}

/**
 * Decode register bytes, substituting U+FFFD for invalid UTF-8.
 */
export function decodeRegisterBytes(bytes: Uint8Array): string {
  return new TextDecoder("utf-8", { fatal: false }).decode(bytes);
}

/**
 * Parse register CSV text into raw sponsor rows.
 *
 * Quoting and column counts are relaxed, and records the parser still
 * rejects are skipped rather than failing the whole file.
 */
export function parseSponsorCsv(text: string): ParsedSponsorCsv {
  const records: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_quotes: true,
    relax_column_count: true,
    skip_records_with_error: true
  });

  const rows: RawSponsorRow[] = [];
  let malformed = 0;

  for (const record of Array.isArray(records) ? records : []) {
    const result = SponsorCsvRowSchema.safeParse(record);
    if (!result.success) {
      malformed++;
      continue;
    }

    const row = result.data;
    rows.push({
      name: row[SPONSOR_COLUMNS.name],
      city: row[SPONSOR_COLUMNS.city],
      county: row[SPONSOR_COLUMNS.county],
      rating: row[SPONSOR_COLUMNS.rating],
      route: row[SPONSOR_COLUMNS.route]
    });
  }

  return { rows, malformed };
}

/**
 * Load and index the sponsor register from a CSV file.
 *
 * @param csvPath - Path to the register export
 * @throws DataSourceError if the file is missing or unreadable
 */
export function loadRegistry(csvPath: string): Registry {
  logger.info("Loading sponsor data", { path: csvPath });

  let bytes: Uint8Array;
  try {
    bytes = readFileSync(csvPath);
  } catch (error) {
    const errorCode = getErrorCode(error);
    throw new DataSourceError(
      errorCode === "ENOENT"
        ? `Sponsor CSV not found: ${csvPath}`
        : `Sponsor CSV could not be read: ${csvPath}`,
      csvPath,
      false,
      {
        originalError: error instanceof Error ? error : undefined,
        errorCode
      }
    );
  }

  const { rows, malformed } = parseSponsorCsv(decodeRegisterBytes(bytes));
  const registry = buildRegistry(rows);

  logger.info("Loaded sponsor records", {
    records: registry.sponsors.length,
    skippedRows: rows.length - registry.sponsors.length + malformed,
    distinctNames: registry.byNormalizedName.size
  });

  return registry;
}
