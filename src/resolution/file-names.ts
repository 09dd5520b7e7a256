/**
 * File-name normalization for local cache matching
 *
 * The same function is applied to the candidate built from an identifier and
 * to every directory entry, so matching is case-insensitive and tolerant of a
 * missing `.ssp` extension on either side.
 *
 * @module resolution/file-names
 */

/** Extension of MEPS SAS transport files */
export const SSP_EXTENSION = '.ssp';

/**
 * Lower-case a name and append `.ssp` when it is not already there
 *
 * @example
 * normalizeFileName('H171')     // 'h171.ssp'
 * normalizeFileName('h171.SSP') // 'h171.ssp'
 */
export function normalizeFileName(name: string): string {
  const lower = name.toLowerCase();
  return lower.endsWith(SSP_EXTENSION) ? lower : `${lower}${SSP_EXTENSION}`;
}

/**
 * Lower-cased identifier without the `.ssp` extension, as used in remote URLs
 *
 * @example
 * toFileStem('H171.ssp') // 'h171'
 */
export function toFileStem(identifier: string): string {
  const normalized = normalizeFileName(identifier);
  return normalized.slice(0, normalized.length - SSP_EXTENSION.length);
}

/**
 * Find the directory entry whose normalized name equals the normalized
 * identifier. Entries are compared in name order so the choice is stable.
 */
export function findMatchingEntry(
  identifier: string,
  entries: readonly string[]
): string | null {
  const candidate = normalizeFileName(identifier);
  const sorted = [...entries].sort();

  for (const entry of sorted) {
    if (normalizeFileName(entry) === candidate) {
      return entry;
    }
  }

  return null;
}
