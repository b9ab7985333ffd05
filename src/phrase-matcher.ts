// ATC Phrase Relay - Phrase Matcher
// Maps one recognized fragment onto the first canonical phrase whose variant
// overlaps it by substring containment (in either direction).
//
// Precedence: table order first, then variant order within a phrase. Table
// authors order ambiguous variants from most specific to least.
//
// No I/O, no state: the result depends only on the fragment and the table.

import type { MappingTable, MatchResult } from "./types.js";

const NO_MATCH: MatchResult = Object.freeze({ kind: "no_match" });

/**
 * Comparison form of a fragment: surrounding whitespace trimmed, lower-cased.
 * Punctuation and inner whitespace are left as recognized.
 */
export function normalizeFragment(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Bidirectional containment between an already-normalized fragment and a
 * variant. The variant is only case-folded; its spacing is kept as authored.
 *
 * An empty fragment never matches (it would be a substring of every variant).
 */
export function variantMatches(normalizedFragment: string, variant: string): boolean {
  if (normalizedFragment.length === 0) return false;
  const normalizedVariant = variant.toLowerCase();
  return (
    normalizedFragment.includes(normalizedVariant) ||
    normalizedVariant.includes(normalizedFragment)
  );
}

/**
 * Select the canonical phrase for a recognized fragment.
 *
 * @example
 * matchPhrase("you are clear to land now", table)
 * // → { kind: "matched", phraseId: "landing_clearance", canonicalText: "Cleared to land runway two seven", variant: "clear to land" }
 */
export function matchPhrase(fragmentText: string, table: MappingTable): MatchResult {
  const fragment = normalizeFragment(fragmentText);
  if (fragment.length === 0) {
    return NO_MATCH;
  }

  for (const phrase of table.phrases) {
    for (const variant of phrase.variants) {
      if (variantMatches(fragment, variant)) {
        return {
          kind: "matched",
          phraseId: phrase.id,
          canonicalText: phrase.canonicalText,
          variant,
        };
      }
    }
  }

  return NO_MATCH;
}
