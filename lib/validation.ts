/**
 * Input validation utilities for API routes and SQL identifier safety.
 */

import { z } from "zod/v4";

// ---------------------------------------------------------------------------
// SQL identifier validation
// ---------------------------------------------------------------------------

/**
 * Strict regex for Unity Catalog identifiers (catalog, schema, table names).
 * Allows letters and digits of any script, underscores, hyphens and dollar
 * signs. Rejects dots, quotes, backticks, whitespace, control characters,
 * semicolons and comment markers.
 */
const SAFE_IDENTIFIER_RE = /^[\p{L}\p{N}_\-$]+$/u;

const MAX_IDENTIFIER_LENGTH = 255;

export class IdentifierValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IdentifierValidationError";
  }
}

/**
 * Validate a SQL identifier is safe for interpolation.
 * Throws if the identifier contains dangerous characters.
 */
export function validateIdentifier(value: string, label: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new IdentifierValidationError(`${label} cannot be empty`);
  }
  if (trimmed.length > MAX_IDENTIFIER_LENGTH) {
    throw new IdentifierValidationError(
      `${label} exceeds maximum length (${MAX_IDENTIFIER_LENGTH} chars)`
    );
  }
  if (!SAFE_IDENTIFIER_RE.test(trimmed)) {
    throw new IdentifierValidationError(
      `${label} contains invalid characters. Only letters, digits, underscores, hyphens, and dollar signs are allowed.`
    );
  }
  return trimmed;
}

/**
 * Validate and backtick-quote an identifier. Quoting keeps names with
 * hyphens or reserved words legal; the allow-list keeps backticks out.
 */
export function quoteIdentifier(value: string, label: string): string {
  return `\`${validateIdentifier(value, label)}\``;
}

// ---------------------------------------------------------------------------
// Preview limit
// ---------------------------------------------------------------------------

export const DEFAULT_PREVIEW_LIMIT = 10;
export const MAX_PREVIEW_LIMIT = 1_000;

export function validatePreviewLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PREVIEW_LIMIT) {
    throw new IdentifierValidationError(
      `limit must be a whole number between 1 and ${MAX_PREVIEW_LIMIT}`
    );
  }
  return limit;
}

// ---------------------------------------------------------------------------
// Zod schemas for API routes
// ---------------------------------------------------------------------------

const identifierParam = z.string().trim().min(1).max(MAX_IDENTIFIER_LENGTH);

export const MetadataQuerySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("warmup") }),
  z.object({ type: z.literal("catalogs") }),
  z.object({
    type: z.literal("schemas"),
    catalog: identifierParam,
  }),
  z.object({
    type: z.literal("tables"),
    catalog: identifierParam,
    schema: identifierParam,
  }),
  z.object({
    type: z.literal("preview"),
    catalog: identifierParam,
    schema: identifierParam,
    table: identifierParam,
    limit: z.coerce
      .number()
      .int()
      .min(1)
      .max(MAX_PREVIEW_LIMIT)
      .default(DEFAULT_PREVIEW_LIMIT),
  }),
]);

export type MetadataQuery = z.infer<typeof MetadataQuerySchema>;

/**
 * Parse URL search params into a MetadataQuery. Missing `type` means
 * `catalogs`; absent params are passed as undefined so defaults apply.
 */
export function parseMetadataQuery(
  searchParams: URLSearchParams
): { success: true; data: MetadataQuery } | { success: false; error: string } {
  const raw = {
    type: searchParams.get("type") ?? "catalogs",
    catalog: searchParams.get("catalog") ?? undefined,
    schema: searchParams.get("schema") ?? undefined,
    table: searchParams.get("table") ?? undefined,
    limit: searchParams.get("limit") ?? undefined,
  };

  const result = MetadataQuerySchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    return { success: false, error: messages };
  }
  return { success: true, data: result.data };
}
