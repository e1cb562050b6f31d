/**
 * Validation for values typed at the command line.
 *
 * The matcher itself trusts its inputs; these schemas are applied at the
 * edge, before a query reaches it.
 */

import { z } from "zod";

/** Longer inputs are not company names */
const MAX_COMPANY_LENGTH = 500;

/**
 * Zod schema for a company name query.
 */
export const CompanyQuerySchema = z
  .string({
    required_error: "Company name is required",
    invalid_type_error: "Company name must be a string"
  })
  .transform((s) => s.trim())
  .refine((s) => s.length > 0, {
    message: "Company name cannot be empty or only whitespace"
  })
  .refine((s) => s.length <= MAX_COMPANY_LENGTH, {
    message: `Company name is too long. Maximum length is ${MAX_COMPANY_LENGTH} characters.`
  })
  .refine((s) => !s.includes("\0"), {
    message: "Company name contains invalid characters (null bytes)"
  });

/**
 * Zod schema for a match threshold between 0 and 1.
 */
export const ThresholdSchema = z.coerce
  .number({ invalid_type_error: "Threshold must be a number" })
  .min(0, { message: "Threshold must be between 0 and 1" })
  .max(1, { message: "Threshold must be between 0 and 1" });

/**
 * Zod schema for a job posting URL.
 */
export const JobUrlSchema = z
  .string({ required_error: "URL is required" })
  .trim()
  .url({ message: "URL must be absolute, e.g. https://example.com/job/1" });

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const error = result.error.errors[0]?.message ?? "Unknown validation error";
  throw new Error(`Invalid ${label}: ${error}`);
}

/**
 * Validate and trim a company name.
 *
 * @throws Error if the name is empty, too long or malformed
 */
export function validateCompanyQuery(query: unknown): string {
  return validate(CompanyQuerySchema, query, "company name");
}

/**
 * Validate a threshold given as a number or numeric string.
 *
 * @throws Error if it is not a number in [0, 1]
 */
export function validateThreshold(value: unknown): number {
  return validate(ThresholdSchema, value, "threshold");
}

/**
 * Validate a job posting URL.
 *
 * @throws Error if it is not an absolute URL
 */
export function validateJobUrl(value: unknown): string {
  return validate(JobUrlSchema, value, "URL");
}
