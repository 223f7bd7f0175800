/**
 * Building blocks shared by the TR and IG schemes
 */

import { hasFunctionalLeaf, walkAlleleTree } from "../../catalog/oracle";
import type { ParsedSymbol } from "../../types";
import { lookup } from "../../types";
import type { CascadeEnvironment, Strategy } from "../cascade";
import { withGene } from "../cascade";

/**
 * Replace a deprecated or alternate name by its current gene
 */
export function synonymStrategy(keyOf: (gene: string) => string = (gene) => gene): Strategy {
  return {
    name: "synonym",
    apply: (symbol, { catalog }) => {
      const target = lookup(catalog.synonyms, keyOf(symbol.gene));
      return target === undefined ? symbol : withGene(symbol, target);
    },
  };
}

/**
 * Prepend the family prefix when the gene lacks it
 */
export function prefixStrategy(prefix: string): Strategy {
  return {
    name: "prefix",
    apply: (symbol) =>
      symbol.gene.startsWith(prefix) ? symbol : withGene(symbol, prefix + symbol.gene),
  };
}

/**
 * Rewrites applied to every receptor gene name: legacy `-OR` orphon
 * separators and leading zeros
 */
export function repairOrphonAndZeros(gene: string): string {
  return gene.replace(/(?<!\/)-?OR/g, "/OR").replace(/(?<!\d)0+/g, "");
}

// =============================================================================
// "-1" SUFFIX VARIANTS
// =============================================================================

/**
 * `toggle` may add or drop a `-1` after every number; `remove` may only
 * drop an existing one
 */
export type DashOneMode = "toggle" | "remove";

interface NumberToken {
  readonly base: string;
  readonly start: number;
  readonly end: number;
}

function numberTokens(gene: string, mode: DashOneMode): NumberToken[] {
  const eligible = mode === "toggle" ? /^(\d+)(-1)?$/ : /^(\d+)(-1)$/;
  const pattern = /\d+(-\d+)?/g;
  const tokens: NumberToken[] = [];

  let match = pattern.exec(gene);
  while (match !== null) {
    const base = eligible.exec(match[0])?.[1];
    if (base !== undefined) {
      tokens.push({ base, start: match.index, end: match.index + match[0].length });
    }
    match = pattern.exec(gene);
  }
  return tokens;
}

/**
 * Every spelling of the gene with `-1` present or absent on each eligible
 * number, the unchanged name excluded
 *
 * Variants are ordered with the first number varying slowest, and the
 * "with -1" choice before the "without" one.
 */
export function dashOneVariants(gene: string, mode: DashOneMode): string[] {
  const tokens = numberTokens(gene, mode);
  const variants: string[] = [];

  for (let combination = 0; combination < 2 ** tokens.length; combination++) {
    let variant = "";
    let cursor = 0;
    tokens.forEach((token, position) => {
      const withDash = ((combination >> (tokens.length - 1 - position)) & 1) === 0;
      variant += gene.slice(cursor, token.start) + (withDash ? `${token.base}-1` : token.base);
      cursor = token.end;
    });
    variant += gene.slice(cursor);

    if (variant !== gene) {
      variants.push(variant);
    }
  }
  return variants;
}

// =============================================================================
// RESOLUTION AND DIAGNOSIS
// =============================================================================

/**
 * The gene is in the catalog, or is a subgroup and subgroups are allowed
 *
 * Allele fields and functionality do not take part: a known gene ends the
 * cascade, and `diagnoseReceptorSymbol` judges the rest.
 */
export function isReceptorGeneResolved(symbol: ParsedSymbol, env: CascadeEnvironment): boolean {
  const { catalog } = env;
  return (
    Object.hasOwn(catalog.genes, symbol.gene) ||
    (env.allowSubgroup && catalog.subgroups.has(symbol.gene))
  );
}

export function diagnoseReceptorSymbol(
  symbol: ParsedSymbol,
  env: CascadeEnvironment
): string | undefined {
  const { catalog, enforceFunctional } = env;
  const gene = lookup(catalog.genes, symbol.gene);

  if (gene === undefined) {
    if (catalog.subgroups.has(symbol.gene)) {
      return env.allowSubgroup ? undefined : "is subgroup";
    }
    return "unrecognized gene name";
  }

  if (symbol.allele.length === 0) {
    return enforceFunctional && !hasFunctionalLeaf(gene) ? "gene has no functional alleles" : undefined;
  }

  const allele = walkAlleleTree(gene, symbol.allele);
  if (allele === undefined) {
    return "nonexistent allele for recognized gene";
  }
  if (enforceFunctional && !hasFunctionalLeaf(allele)) {
    return "nonfunctional allele";
  }
  return undefined;
}
