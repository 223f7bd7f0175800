/**
 * Heuristic resolution cascade
 *
 * A family scheme lists its repair strategies in order. The cascade folds
 * them over the parsed symbol and stops as soon as the scheme's resolution
 * check passes. Strategies are pure: each returns a new candidate, or the
 * same one when it does not apply.
 */

import type { FamilyCatalog } from "../catalog/context";
import type { GeneFamily, ParsedSymbol, Precision } from "../types";
import type { SymbolParser } from "./parser";

/**
 * Per-call inputs shared by every strategy and check
 */
export interface CascadeEnvironment {
  readonly catalog: FamilyCatalog;
  readonly enforceFunctional: boolean;
  readonly allowSubgroup: boolean;
}

export interface StrategyControls {
  /** False inside the one permitted nested run of the cascade */
  readonly mayRetry: boolean;
  /** Run the cascade on a variant without retries; the resolved symbol or undefined */
  readonly resolve: (candidate: ParsedSymbol) => ParsedSymbol | undefined;
}

export interface Strategy {
  readonly name: string;
  readonly apply: (
    symbol: ParsedSymbol,
    env: CascadeEnvironment,
    controls: StrategyControls
  ) => ParsedSymbol;
}

/**
 * Everything that distinguishes one (species, family) pair from another
 */
export interface SymbolScheme {
  readonly name: string;
  readonly family: GeneFamily;
  /** Precisions a resolved symbol can be reported at, coarsest first */
  readonly precisions: readonly Precision[];
  readonly clean: (symbol: string) => string;
  readonly parse: SymbolParser;
  readonly strategies: readonly Strategy[];
  readonly isResolved: (symbol: ParsedSymbol, env: CascadeEnvironment) => boolean;
  /** Reason the symbol is invalid, or undefined when it is valid */
  readonly diagnose: (symbol: ParsedSymbol, env: CascadeEnvironment) => string | undefined;
}

export interface CascadeOutcome {
  readonly symbol: ParsedSymbol;
  readonly resolved: boolean;
  /** Names of the strategies that were applied, in order */
  readonly steps: readonly string[];
}

/**
 * Fold the scheme's strategies over a parsed symbol
 *
 * With `mayRetry` false, strategies that recurse leave the candidate as it
 * is, so a nested run is a straight pass over the list.
 */
export function runCascade(
  initial: ParsedSymbol,
  scheme: SymbolScheme,
  env: CascadeEnvironment,
  mayRetry = true
): CascadeOutcome {
  if (scheme.isResolved(initial, env)) {
    return { symbol: initial, resolved: true, steps: [] };
  }

  const controls: StrategyControls = {
    mayRetry,
    resolve: (candidate) => {
      if (!mayRetry) {
        return undefined;
      }
      const nested = runCascade(candidate, scheme, env, false);
      return nested.resolved ? nested.symbol : undefined;
    },
  };

  const steps: string[] = [];
  let current = initial;
  for (const strategy of scheme.strategies) {
    current = strategy.apply(current, env, controls);
    steps.push(strategy.name);
    if (scheme.isResolved(current, env)) {
      return { symbol: current, resolved: true, steps };
    }
  }

  return { symbol: current, resolved: false, steps };
}

/**
 * Replace the gene name, keeping the allele fields
 */
export function withGene(symbol: ParsedSymbol, gene: string): ParsedSymbol {
  return gene === symbol.gene ? symbol : { gene, allele: symbol.allele };
}

/**
 * Whether the gene, or its subgroup, is present in the catalog at all
 */
export function namesKnownGene(symbol: ParsedSymbol, catalog: FamilyCatalog): boolean {
  return Object.hasOwn(catalog.genes, symbol.gene) || catalog.subgroups.has(symbol.gene);
}
