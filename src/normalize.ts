/**
 * Field Normalization
 *
 * Canonicalizes venue names, postcodes and addresses into comparable keys.
 * Every function here is pure, total and idempotent.
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Symbol abbreviations expanded before punctuation is stripped.
 * Format: [symbol, replacement]
 */
export const NAME_SYMBOL_EXPANSIONS: ReadonlyArray<readonly [string, string]> = [
  ['&', ' AND '],
  ['+', ' AND '],
];

/**
 * Legal-entity suffixes dropped when they terminate a name.
 */
export const LEGAL_SUFFIXES: readonly string[] = ['LTD', 'LIMITED'];

// ============================================================================
// NAMES
// ============================================================================

function stripLegalSuffixes(name: string): string {
  let result = name;
  let changed = true;

  // "FOO LTD LIMITED" loses both, otherwise a second pass would change it again
  while (changed) {
    changed = false;
    for (const suffix of LEGAL_SUFFIXES) {
      if (result === suffix) {
        result = '';
        changed = true;
      } else if (result.endsWith(` ${suffix}`)) {
        result = result.slice(0, -(suffix.length + 1)).trimEnd();
        changed = true;
      }
    }
  }

  return result;
}

/**
 * Normalize a venue name for comparison
 *
 * Processing order:
 * 1. Uppercase
 * 2. Expand symbol abbreviations (& → AND)
 * 3. Drop characters outside [A-Z0-9 ] and collapse whitespace
 * 4. Strip trailing legal suffixes (LTD, LIMITED)
 *
 * "The Crown & Anchor Ltd." → "THE CROWN AND ANCHOR"
 */
export function normalizeName(raw: string | null | undefined): string {
  if (!raw) return '';

  let normalized = raw.toUpperCase();

  for (const [symbol, replacement] of NAME_SYMBOL_EXPANSIONS) {
    normalized = normalized.split(symbol).join(replacement);
  }

  normalized = normalized
    .replace(/[^A-Z0-9 ]+/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  return stripLegalSuffixes(normalized);
}

// ============================================================================
// POSTCODES & ADDRESSES
// ============================================================================

/**
 * Normalize a postcode: uppercase, all whitespace removed.
 * "sw1a 1aa" → "SW1A1AA"
 */
export function normalizePostcode(raw: string | null | undefined): string {
  if (!raw) return '';
  return raw.toUpperCase().replace(/\s+/g, '');
}

/**
 * Compact an address so a normalized postcode can be found inside it.
 * Applies the same transformation as `normalizePostcode`.
 */
export function compactAddress(raw: string | null | undefined): string {
  return normalizePostcode(raw);
}
