import type { Registry, SponsorRecord } from "../types/sponsor.js";
import { indexableWords, normalize } from "./normalize.js";

/**
 * Raw column values for one sponsor row, before cleaning.
 * Missing columns are allowed and become empty strings.
 */
export interface RawSponsorRow {
  name?: string;
  city?: string;
  county?: string;
  rating?: string;
  route?: string;
}

/**
 * Trim whitespace and surrounding double quotes from a cell.
 */
export function cleanField(value: string | undefined): string {
  if (!value) return "";
  return value.trim().replace(/^"+|"+$/g, "").trim();
}

/**
 * Turn a raw row into a frozen SponsorRecord.
 *
 * @returns null when the organisation name is empty after cleaning
 */
export function toSponsorRecord(row: RawSponsorRow): SponsorRecord | null {
  const name = cleanField(row.name);
  if (!name) return null;

  return Object.freeze({
    name,
    city: cleanField(row.city),
    county: cleanField(row.county),
    rating: cleanField(row.rating),
    route: cleanField(row.route)
  });
}

/**
 * Index sponsor rows into a Registry.
 *
 * Rows without a name are dropped. Records sharing a normalized name are
 * kept together in source order, and every indexable word of a normalized
 * name points back to that name. The returned value is complete before it
 * is handed to any caller and is never modified afterwards.
 */
export function buildRegistry(rows: Iterable<RawSponsorRow>): Registry {
  const sponsors: SponsorRecord[] = [];
  const byNormalizedName = new Map<string, SponsorRecord[]>();
  const wordIndex = new Map<string, Set<string>>();

  for (const row of rows) {
    const record = toSponsorRecord(row);
    if (!record) continue;

    sponsors.push(record);

    const key = normalize(record.name);
    const existing = byNormalizedName.get(key);
    if (existing) {
      existing.push(record);
    } else {
      byNormalizedName.set(key, [record]);
    }

    for (const word of indexableWords(key)) {
      const names = wordIndex.get(word);
      if (names) {
        names.add(key);
      } else {
        wordIndex.set(word, new Set([key]));
      }
    }
  }

  return { sponsors, byNormalizedName, wordIndex };
}
