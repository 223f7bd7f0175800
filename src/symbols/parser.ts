/**
 * Family-specific parsing of cleaned symbols
 *
 * A parser splits a cleaned symbol into a candidate gene name and its
 * ordered allele-designation fields. Parsing never fails: input that
 * matches no pattern becomes a gene name with no fields, and the cascade
 * decides what to do with it.
 */

import type { ParsedSymbol } from "../types";

export type SymbolParser = (cleaned: string) => ParsedSymbol;

const NUMERIC_FIELD = /^\d+$/;

/**
 * Pad a numeric designation field to at least two digits, keeping its width
 * otherwise ("1" becomes "01", "0501" stays as it is)
 */
export function padField(field: string): string {
  return NUMERIC_FIELD.test(field) ? field.padStart(2, "0") : field;
}

/**
 * Render a single TR/IG allele number as two digits ("1" and "001" become
 * "01")
 */
export function normalizeAlleleNumber(field: string): string {
  return String(Number.parseInt(field, 10)).padStart(2, "0");
}

function parseSingleAllele(pattern: RegExp, cleaned: string): ParsedSymbol {
  const match = pattern.exec(cleaned);
  const gene = match?.[1];
  if (match === null || gene === undefined) {
    return { gene: cleaned, allele: [] };
  }

  const allele = match[3];
  return { gene, allele: allele === undefined ? [] : [normalizeAlleleNumber(allele)] };
}

const TR_PATTERN = /^([A-Z0-9\-.()/]+)(\*(\d+))?/;
const IG_PATTERN = /^([A-Z0-9\-.()/ab]+)(\*(\d+))?/;

/**
 * TR and mouse MH symbols: `GENE*NN`
 */
export const parseTrSymbol: SymbolParser = (cleaned) => parseSingleAllele(TR_PATTERN, cleaned);

/**
 * IG symbols, which may carry a lowercase orphon suffix
 */
export const parseIgSymbol: SymbolParser = (cleaned) => parseSingleAllele(IG_PATTERN, cleaned);

// =============================================================================
// HLA
// =============================================================================

const HLA_CLASS_II_PATTERN = /^((HLA-)?(D[PQ][AB]|DRB|TAP)\d)(\*?([\d:]+G?P?)[LSCAQN]?)?/;
const HLA_GENERIC_PATTERN = /^([A-Z0-9\-.:/]+)(\*([\d:]+G?P?)[LSCAQN]?)?/;

function splitDesignation(designation: string | undefined): readonly string[] {
  return designation === undefined ? [] : designation.split(":").map(padField);
}

/**
 * HLA symbols: `HLA-GENE*F1:F2[:F3[:F4]][G|P][expression suffix]`
 *
 * Class II genes may omit the asterisk (`DQA10501`). Periods between digits
 * are read as colons, and the expression suffix is dropped.
 */
export const parseHlaSymbol: SymbolParser = (cleaned) => {
  if (cleaned === "B2M") {
    return { gene: "B2M", allele: [] };
  }

  const symbol = cleaned.replace(/(?<=\d)\.(?=\d)/g, ":");

  const classTwo = HLA_CLASS_II_PATTERN.exec(symbol);
  const classTwoGene = classTwo?.[1];
  if (classTwo !== null && classTwoGene !== undefined) {
    return { gene: classTwoGene, allele: splitDesignation(classTwo[5]) };
  }

  const generic = HLA_GENERIC_PATTERN.exec(symbol);
  const genericGene = generic?.[1];
  if (generic !== null && genericGene !== undefined) {
    return { gene: genericGene, allele: splitDesignation(generic[3]) };
  }

  return { gene: symbol, allele: [] };
};
