/**
 * Lookup of reference amino-acid sequences by allele symbol
 */

import { type } from "arktype";
import { getBundledContext } from "../catalog/bundled";
import type { ReferenceContext } from "../catalog/context";
import { createOptionsValidator } from "../core/validation-utils";
import { UnknownSymbolError, UnsupportedSpeciesError, ValidationError } from "../errors";
import type { GeneFamily } from "../types";
import { lookup, Species } from "../types";
import { normalizeSpeciesKey } from "./cleaning";

export interface AminoAcidSequenceOptions {
  /** Defaults to "homosapiens" */
  readonly species?: string;
  readonly context?: ReferenceContext;
}

const validateSequenceOptions = createOptionsValidator(
  type({ "species?": "string | undefined" })
);

function familyOf(symbol: string): GeneFamily {
  if (symbol.startsWith("TR")) {
    return "tr";
  }
  if (symbol.startsWith("IG")) {
    return "ig";
  }
  throw new ValidationError(
    `Cannot tell the gene family of "${symbol}"`,
    "Expected a standardized TR or IG allele symbol such as TRBV2*01"
  );
}

/**
 * Region sequences of a TR or IG allele: FR1-IMGT ... FR3-IMGT, V-REGION,
 * J-REGION, J-MOTIF, and so on
 *
 * The symbol must already be standardized; no repair is attempted.
 *
 * @throws {UnsupportedSpeciesError} When no sequence catalog is loaded for the species and family
 * @throws {UnknownSymbolError} When the catalog holds no entry for the symbol
 */
export function getAminoAcidSequence(
  symbol: string,
  options: AminoAcidSequenceOptions = {}
): Record<string, string> {
  if (typeof symbol !== "string") {
    throw new ValidationError(`Symbol must be a string, got ${typeof symbol}`);
  }

  const { context = getBundledContext(), ...rest } = options;
  const validated = validateSequenceOptions(rest);
  const species = normalizeSpeciesKey(validated.species ?? Species.HOMO_SAPIENS);
  const family = familyOf(symbol);

  const catalog = context.catalogFor(species, family);
  if (catalog === undefined || Object.keys(catalog.sequences).length === 0) {
    throw new UnsupportedSpeciesError(species, family, "No amino-acid sequences are loaded for this pair");
  }

  const regions = lookup(catalog.sequences, symbol);
  if (regions === undefined) {
    throw new UnknownSymbolError(symbol, `${family.toUpperCase()} sequences of species ${species}`);
  }
  return { ...regions };
}
