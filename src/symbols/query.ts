/**
 * Enumeration of catalog contents
 *
 * @example
 * ```typescript
 * query({ family: "tr", precision: "gene", functionality: "NF", pattern: /^TRBV/ });
 * // Set { "TRBV1", "TRBV20/OR9-2" }
 * ```
 */

import { type } from "arktype";
import { getBundledContext } from "../catalog/bundled";
import type { FamilyCatalog, ReferenceContext } from "../catalog/context";
import { subgroupOf } from "../catalog/context";
import type { FailureLogger, LogSettings } from "../core/logging";
import { logWarning } from "../core/logging";
import { CommonValidators, createOptionsValidator } from "../core/validation-utils";
import { UnsupportedSpeciesError } from "../errors";
import type { AlleleNode, FunctionalityFilter, GeneFamily } from "../types";
import { isBranch, Precision, Species } from "../types";
import type { SymbolScheme } from "./cascade";
import { normalizeSpeciesKey } from "./cleaning";
import { schemeFor } from "./schemes";

export interface QueryOptions {
  readonly family: GeneFamily;
  /** Defaults to "homosapiens" */
  readonly species?: string;
  /** Defaults to "allele" */
  readonly precision?: Precision;
  /** "NF" selects ORF and pseudogenes together; defaults to "any" */
  readonly functionality?: FunctionalityFilter;
  /** Keep only results in which the pattern is found */
  readonly pattern?: string | RegExp;
  readonly logFailures?: boolean;
  readonly logger?: FailureLogger;
  readonly context?: ReferenceContext;
}

const QueryOptionsSchema = type({
  family: "'tr' | 'ig' | 'mh'",
  "species?": "string | undefined",
  "precision?": "'subgroup' | 'gene' | 'protein' | 'allele' | undefined",
  "functionality?": "'any' | 'F' | 'NF' | 'P' | 'ORF' | undefined",
  "pattern?": "string | RegExp | undefined",
  "logFailures?": "boolean | undefined",
});

const validateQueryOptions = createOptionsValidator(QueryOptionsSchema, [
  CommonValidators.compilablePattern,
]);

const PRECISION_ORDER: readonly Precision[] = [
  Precision.SUBGROUP,
  Precision.GENE,
  Precision.PROTEIN,
  Precision.ALLELE,
];

export function matchesFunctionality(label: string, filter: FunctionalityFilter): boolean {
  if (filter === "any" || filter === label) {
    return true;
  }
  return filter === "NF" && (label === "P" || label === "ORF");
}

/**
 * Every leaf of an allele tree with the fields leading to it
 */
function leaves(node: AlleleNode, path: readonly string[] = []): Array<[readonly string[], string]> {
  if (!isBranch(node)) {
    return [[path, node]];
  }
  return Object.entries(node).flatMap(([field, child]) => leaves(child, [...path, field]));
}

/**
 * The requested precision, or the closest coarser one the family supports
 */
function supportedPrecision(scheme: SymbolScheme, requested: Precision): Precision {
  const coarser = PRECISION_ORDER.slice(0, PRECISION_ORDER.indexOf(requested) + 1).reverse();
  return (
    coarser.find((precision) => scheme.precisions.includes(precision)) ??
    scheme.precisions[0] ??
    Precision.GENE
  );
}

function queryReceptorGenes(
  catalog: FamilyCatalog,
  precision: Precision,
  functionality: FunctionalityFilter
): string[] {
  return Object.entries(catalog.genes).flatMap(([gene, tree]) => {
    const qualifying = leaves(tree).filter(([, label]) => matchesFunctionality(label, functionality));

    if (precision === Precision.ALLELE) {
      return qualifying.map(([fields]) => `${gene}*${fields.join(":")}`);
    }
    if (qualifying.length === 0) {
      return [];
    }
    return [precision === Precision.SUBGROUP ? subgroupOf(gene) : gene];
  });
}

/**
 * HLA catalogs list alleles to the protein level; groups are skipped
 */
function queryHlaGenes(catalog: FamilyCatalog, precision: Precision): string[] {
  return Object.entries(catalog.genes).flatMap(([gene, tree]) => {
    if (precision === Precision.GENE || !isBranch(tree)) {
      return [gene];
    }
    return Object.entries(tree).flatMap(([first, proteins]) =>
      isBranch(proteins)
        ? Object.keys(proteins)
            .filter((second) => /^\d+$/.test(second))
            .map((second) => `${gene}*${first}:${second}`)
        : []
    );
  });
}

/**
 * List the symbols of a catalog at a given precision
 *
 * @throws {UnsupportedSpeciesError} When no catalog is loaded for the species and family
 * @throws {ValidationError} When an option is malformed
 */
export function query(options: QueryOptions): ReadonlySet<string> {
  const { context = getBundledContext(), logger, ...rest } = options;
  const validated = validateQueryOptions(rest);
  const { family } = validated;
  const species = normalizeSpeciesKey(validated.species ?? Species.HOMO_SAPIENS);
  const requested = validated.precision ?? Precision.ALLELE;
  const functionality = validated.functionality ?? "any";
  const log: LogSettings = { logFailures: validated.logFailures ?? true, logger };

  const scheme = schemeFor(species, family);
  const catalog = context.catalogFor(species, family);
  if (scheme === undefined || catalog === undefined) {
    throw new UnsupportedSpeciesError(species, family, "No reference catalog is loaded for this pair");
  }

  const precision = supportedPrecision(scheme, requested);
  if (precision !== requested) {
    logWarning(
      `${family.toUpperCase()} genes of species ${species} cannot be listed at ${requested} precision; listing at ${precision} precision.`,
      { species, family, precision: requested },
      log
    );
  }

  let symbols: string[];
  if (family !== "mh") {
    symbols = queryReceptorGenes(catalog, precision, functionality);
  } else if (precision === Precision.GENE) {
    symbols = Object.keys(catalog.genes);
  } else {
    if (precision === Precision.ALLELE) {
      logWarning(
        "HLA alleles are listed up to the protein level (two designation fields).",
        { species, family, precision: requested },
        log
      );
    }
    symbols = queryHlaGenes(catalog, precision);
  }

  const { pattern } = validated;
  const matcher = pattern === undefined ? undefined : new RegExp(pattern);
  return new Set(
    matcher === undefined ? symbols : symbols.filter((symbol) => symbol.search(matcher) !== -1)
  );
}
