// ATC Phrase Relay - Mapping Table loader
// Reads the phrase mapping document once at startup and freezes it.
// Loading is all-or-nothing: any malformed entry rejects the whole document.
// The shape is MappingDocumentSchema:
//   { "mappings": [ { "id"?: string, "canonical": string, "variants": string[] }, ... ] }

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";
import { matchPhrase } from "./phrase-matcher.js";
import type {
  CanonicalPhrase,
  LoadedMappingTable,
  MappingTable,
  MappingTableWarning,
  Result,
} from "./types.js";
import { describeIssues, formatIssuePath } from "./validation.js";

/** Variants shorter than this (after trimming) match almost any fragment. */
export const SHORT_VARIANT_LENGTH = 3;

// ─── Parsing ────────────────────────────────────────────────────────────────────

/**
 * Derive an id from canonical text: lower-cased, runs of anything other than
 * letters and digits collapsed to "_".
 *
 * "Cleared to land, runway 27" → "cleared_to_land_runway_27"
 */
export function derivePhraseId(canonicalText: string): string {
  return canonicalText
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

const NON_BLANK = "must be a non-blank string";

export const PhraseEntrySchema = z.object(
  {
    id: z.string({ invalid_type_error: NON_BLANK }).trim().min(1, NON_BLANK).optional(),
    canonical: z
      .string({ required_error: "is required", invalid_type_error: NON_BLANK })
      .trim()
      .min(1, NON_BLANK),
    // Variant text is kept as authored; the matcher normalizes it.
    variants: z
      .array(
        z.string({ invalid_type_error: NON_BLANK }).refine((variant) => variant.trim().length > 0, NON_BLANK),
        { required_error: "is required", invalid_type_error: "must be a list of strings" },
      )
      .min(1, "must list at least one variant"),
  },
  { invalid_type_error: 'must be an object with "canonical" and "variants"' },
);

export const MappingDocumentSchema = z.object(
  {
    mappings: z
      .array(PhraseEntrySchema, { required_error: "is required", invalid_type_error: "must be an array" })
      .min(1, "is empty; at least one phrase is required"),
  },
  { invalid_type_error: 'expected an object with a "mappings" array' },
);

const entryPath = (index: number) => `"${formatIssuePath(["mappings", index])}"`;

/**
 * Validate a parsed mapping document and build the frozen table.
 *
 * @param source  File path or label used in error messages.
 */
export function parseMappingTable(
  document: unknown,
  source: string,
): Result<LoadedMappingTable, ConfigError> {
  const fail = (message: string): Result<LoadedMappingTable, ConfigError> => ({
    ok: false,
    error: new ConfigError(`${source}: ${message}`, source),
  });

  const parsed = MappingDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return fail(describeIssues(parsed.error.issues).join("; "));
  }

  const phrases: CanonicalPhrase[] = [];
  const seenIds = new Map<string, number>();

  for (const [i, entry] of parsed.data.mappings.entries()) {
    const id = entry.id ?? derivePhraseId(entry.canonical);
    if (id.length === 0) {
      return fail(`${entryPath(i)} ("${entry.canonical}") needs an explicit "id"; none can be derived from its text`);
    }

    const firstIndex = seenIds.get(id);
    if (firstIndex !== undefined) {
      return fail(`${entryPath(i)} reuses id "${id}" already taken by ${entryPath(firstIndex)}`);
    }
    seenIds.set(id, i);

    phrases.push(
      Object.freeze({
        id,
        canonicalText: entry.canonical,
        variants: Object.freeze(entry.variants),
      }),
    );
  }

  const table: MappingTable = Object.freeze({
    phrases: Object.freeze(phrases),
    source,
  });

  return { ok: true, value: { table, warnings: lintMappingTable(table) } };
}

/**
 * Read, parse, and validate the mapping document at `path`.
 */
export async function loadMappingTable(
  path: string,
): Promise<Result<LoadedMappingTable, ConfigError>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: new ConfigError(
        `Phrase mappings file could not be read: ${path} (${describeError(err)})`,
        path,
        { cause: err },
      ),
    };
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    return {
      ok: false,
      error: new ConfigError(
        `Phrase mappings file is not valid JSON: ${path} (${describeError(err)})`,
        path,
        { cause: err },
      ),
    };
  }

  return parseMappingTable(document, path);
}

// ─── Lint ───────────────────────────────────────────────────────────────────────

/**
 * Flag variants that are likely to surprise the table author. Matching
 * semantics are untouched; these are tuning hints only.
 *
 *  - short_variant:    fewer than SHORT_VARIANT_LENGTH characters
 *  - shadowed_variant: saying the variant exactly selects an earlier phrase
 */
export function lintMappingTable(table: MappingTable): MappingTableWarning[] {
  const warnings: MappingTableWarning[] = [];

  for (const phrase of table.phrases) {
    for (const variant of phrase.variants) {
      if (variant.trim().length < SHORT_VARIANT_LENGTH) {
        warnings.push({ kind: "short_variant", phraseId: phrase.id, variant });
      }

      const result = matchPhrase(variant, table);
      if (result.kind === "matched" && result.phraseId !== phrase.id) {
        warnings.push({
          kind: "shadowed_variant",
          phraseId: phrase.id,
          variant,
          capturedBy: result.phraseId,
        });
      }
    }
  }

  return warnings;
}

export function formatWarning(warning: MappingTableWarning): string {
  switch (warning.kind) {
    case "short_variant":
      return `phrase "${warning.phraseId}": variant "${warning.variant}" is shorter than ${SHORT_VARIANT_LENGTH} characters and will match most fragments`;
    case "shadowed_variant":
      return `phrase "${warning.phraseId}": variant "${warning.variant}" is captured by earlier phrase "${warning.capturedBy}"`;
  }
}
