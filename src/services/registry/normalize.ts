/**
 * Clinic name normalization.
 *
 * The clinic name is the identity key of the id map, so spelling noise
 * (full-width characters, stray or repeated spaces, letter case) must not
 * produce a new clinic.
 */

const WHITESPACE_RUN = /\s+/gu;

/**
 * NFKC, trim, collapse every whitespace run to one space. Case is kept:
 * this is the spelling stored in the id map and shown on pages.
 */
export function normalizeName(raw: string): string {
  return raw.normalize("NFKC").replace(WHITESPACE_RUN, " ").trim();
}

/**
 * Identity key used for duplicate detection and id-map lookups
 */
export function nameKey(raw: string): string {
  return normalizeName(raw).toLowerCase();
}

/**
 * Spreadsheet cell text to a trimmed string ("" for blank cells)
 */
export function cleanText(value: string | null | undefined): string {
  return (value ?? "").trim();
}
