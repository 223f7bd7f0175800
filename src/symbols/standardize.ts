/**
 * Symbol standardization: clean, parse, repair, validate, compile
 *
 * @example
 * ```typescript
 * standardizeSymbol("TCRAV32S1").gene;                          // "TRAV25"
 * standardizeSymbol("HLA-B*5701", { family: "mh" }).allele;     // "HLA-B*57:01"
 * standardizeSymbol("foobarbaz").error;                         // "unrecognized gene name"
 * ```
 */

import { type } from "arktype";
import { getBundledContext } from "../catalog/bundled";
import type { FamilyCatalog, ReferenceContext } from "../catalog/context";
import { ValidationError } from "../errors";
import type { FailureLogger } from "../core/logging";
import { logWarning } from "../core/logging";
import { createOptionsValidator } from "../core/validation-utils";
import type { PrecisionLevels } from "../results";
import { SymbolStandardizationResult } from "../results";
import type { GeneFamily, ParsedSymbol } from "../types";
import { ANY_SPECIES, Precision, Species } from "../types";
import type { CascadeEnvironment, SymbolScheme } from "./cascade";
import { namesKnownGene, runCascade } from "./cascade";
import { normalizeSpeciesKey } from "./cleaning";
import { compileSymbol } from "./compiler";
import { schemeFor } from "./schemes";

export interface StandardizeSymbolOptions {
  /** Gene family of the symbol; defaults to "tr" */
  readonly family?: GeneFamily;
  /** Species key, or "any" to try every species; defaults to "homosapiens" */
  readonly species?: string;
  /** Reject alleles not labelled functional, and genes without one */
  readonly enforceFunctional?: boolean;
  /** Accept a symbol that names a subgroup rather than a gene */
  readonly allowSubgroup?: boolean;
  readonly logFailures?: boolean;
  readonly logger?: FailureLogger;
  readonly context?: ReferenceContext;
}

export const DEFAULT_STANDARDIZE_SYMBOL_OPTIONS = {
  family: "tr",
  species: Species.HOMO_SAPIENS,
  enforceFunctional: false,
  allowSubgroup: false,
  logFailures: true,
} as const satisfies Required<
  Omit<StandardizeSymbolOptions, "logger" | "context">
>;

const StandardizeSymbolOptionsSchema = type({
  "family?": "'tr' | 'ig' | 'mh' | undefined",
  "species?": "string | undefined",
  "enforceFunctional?": "boolean | undefined",
  "allowSubgroup?": "boolean | undefined",
  "logFailures?": "boolean | undefined",
});

const validateStandardizeSymbolOptions = createOptionsValidator(StandardizeSymbolOptionsSchema);

interface Attempt {
  readonly species: string;
  readonly scheme: SymbolScheme;
  readonly error: string | undefined;
  readonly symbol: ParsedSymbol;
  readonly levels: PrecisionLevels;
}

function reachedLevels(
  scheme: SymbolScheme,
  symbol: ParsedSymbol,
  catalog: FamilyCatalog
): PrecisionLevels {
  const supports = (precision: Precision) => scheme.precisions.includes(precision);
  const subgroupOnly = supports(Precision.SUBGROUP) && !Object.hasOwn(catalog.genes, symbol.gene);
  const fields = symbol.allele.length;

  return {
    ...(supports(Precision.SUBGROUP) && { subgroup: compileSymbol(symbol, Precision.SUBGROUP) }),
    ...(supports(Precision.GENE) && !subgroupOnly && { gene: compileSymbol(symbol, Precision.GENE) }),
    ...(supports(Precision.PROTEIN) &&
      fields >= 1 && { protein: compileSymbol(symbol, Precision.PROTEIN) }),
    ...(supports(Precision.ALLELE) &&
      !subgroupOnly &&
      fields >= 1 && { allele: compileSymbol(symbol, Precision.ALLELE) }),
  };
}

function attempt(
  input: string,
  species: string,
  scheme: SymbolScheme,
  catalog: FamilyCatalog,
  settings: { readonly enforceFunctional: boolean; readonly allowSubgroup: boolean }
): Attempt {
  const env: CascadeEnvironment = { catalog, ...settings };
  const initial = scheme.parse(scheme.clean(input));
  const outcome = runCascade(initial, scheme, env);

  // Rewrites that never reached a known gene are not reported as a fix
  const symbol = outcome.resolved || namesKnownGene(outcome.symbol, catalog) ? outcome.symbol : initial;
  const error = scheme.diagnose(symbol, env);

  return {
    species,
    scheme,
    error,
    symbol,
    levels: error === undefined ? reachedLevels(scheme, symbol, catalog) : {},
  };
}

function toResult(input: string, family: GeneFamily, result: Attempt): SymbolStandardizationResult {
  const highest = result.scheme.precisions.at(-1) ?? Precision.GENE;
  return new SymbolStandardizationResult({
    originalInput: input,
    species: result.species,
    family,
    error: result.error,
    attemptedFix: compileSymbol(result.symbol, highest),
    levels: result.levels,
  });
}

/**
 * Standardize a TR, IG or MH gene or allele symbol
 *
 * Resolution failures are returned in the result and logged as warnings;
 * only malformed arguments throw.
 *
 * @throws {ValidationError} When the symbol is not a string or an option is malformed
 */
export function standardizeSymbol(
  symbol: string,
  options: StandardizeSymbolOptions = {}
): SymbolStandardizationResult {
  if (typeof symbol !== "string") {
    throw new ValidationError(`Symbol must be a string, got ${typeof symbol}`);
  }

  const { context = getBundledContext(), logger, ...rest } = options;
  const validated = validateStandardizeSymbolOptions(rest);
  const family = validated.family ?? DEFAULT_STANDARDIZE_SYMBOL_OPTIONS.family;
  const species = normalizeSpeciesKey(validated.species ?? DEFAULT_STANDARDIZE_SYMBOL_OPTIONS.species);
  const settings = {
    enforceFunctional: validated.enforceFunctional ?? DEFAULT_STANDARDIZE_SYMBOL_OPTIONS.enforceFunctional,
    allowSubgroup: validated.allowSubgroup ?? DEFAULT_STANDARDIZE_SYMBOL_OPTIONS.allowSubgroup,
  };
  const log = {
    logFailures: validated.logFailures ?? DEFAULT_STANDARDIZE_SYMBOL_OPTIONS.logFailures,
    logger,
  };
  const annotations = { species, family, input: symbol };

  const candidates = (species === ANY_SPECIES ? context.speciesFor(family) : [species]).flatMap(
    (key) => {
      const scheme = schemeFor(key, family);
      const catalog = context.catalogFor(key, family);
      return scheme === undefined || catalog === undefined ? [] : [{ key, scheme, catalog }];
    }
  );

  const [first, ...others] = candidates;
  if (first === undefined) {
    logWarning(
      `Unsupported species "${species}" for ${family.toUpperCase()} genes. Skipping standardization of "${symbol}".`,
      annotations,
      log
    );
    return new SymbolStandardizationResult({
      originalInput: symbol,
      species,
      family,
      error: `unsupported species: ${species}`,
      attemptedFix: symbol,
    });
  }

  let reported = attempt(symbol, first.key, first.scheme, first.catalog, settings);
  if (reported.error === undefined) {
    return toResult(symbol, family, reported);
  }

  for (const { key, scheme, catalog } of others) {
    const current = attempt(symbol, key, scheme, catalog, settings);
    if (current.error === undefined) {
      return toResult(symbol, family, current);
    }
    // Human is the reference species when every attempt fails
    if (key === Species.HOMO_SAPIENS) {
      reported = current;
    }
  }

  const result = toResult(symbol, family, reported);
  logWarning(
    `Failed to standardize "${symbol}" for species ${reported.species}: ${result.error ?? ""}. Attempted fix "${result.attemptedFix ?? ""}".`,
    annotations,
    log
  );
  return result;
}
