/**
 * Pre-cleaning of raw symbol and species strings
 *
 * Symbols arrive from spreadsheets and web exports, so whitespace and HTML
 * entities are stripped before any family pattern is applied.
 */

function removeWhitespaceAndEntities(value: string): string {
  return value.replace(/\s+/g, "").replaceAll("&nbsp;", "").replaceAll("&ndash;", "-");
}

/**
 * Strip whitespace and HTML entities, then uppercase
 */
export function cleanSymbol(symbol: string): string {
  return removeWhitespaceAndEntities(symbol).toUpperCase();
}

/**
 * IG cleaning keeps the lowercase a/b suffix of orphon genes such as
 * IGHD1/OR15-1a
 */
export function cleanIgSymbol(symbol: string): string {
  return cleanSymbol(symbol).replace(
    /^(.*?OR15-\d)([AB])/,
    (_match: string, head: string, suffix: string) => head + suffix.toLowerCase()
  );
}

/**
 * Species keys compare without whitespace and case: "Homo Sapiens" is
 * "homosapiens"
 */
export function normalizeSpeciesKey(species: string): string {
  return removeWhitespaceAndEntities(species).toLowerCase();
}
