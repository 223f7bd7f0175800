/**
 * Immunoglobulin scheme (human)
 */

import { Precision } from "../../types";
import type { Strategy, SymbolScheme } from "../cascade";
import { withGene } from "../cascade";
import { cleanIgSymbol } from "../cleaning";
import { parseIgSymbol } from "../parser";
import {
  dashOneVariants,
  diagnoseReceptorSymbol,
  isReceptorGeneResolved,
  prefixStrategy,
  repairOrphonAndZeros,
  synonymStrategy,
} from "./receptor";

const repairCommonErrors: Strategy = {
  name: "repair",
  apply: (symbol) => withGene(symbol, repairOrphonAndZeros(symbol.gene.replaceAll(".", "-"))),
};

/**
 * IGLV(VI)-22-1-1 -> IGLV(VI)-22-1
 *
 * Only a `-1` that is present can be dropped, and only a variant that is a
 * catalog gene is adopted.
 */
const removeDashOne: Strategy = {
  name: "remove-dash-one",
  apply: (symbol, { catalog }) => {
    const variant = dashOneVariants(symbol.gene, "remove").find((name) =>
      Object.hasOwn(catalog.genes, name)
    );
    return variant === undefined ? symbol : withGene(symbol, variant);
  },
};

export const IG_SCHEME: SymbolScheme = {
  name: "ig",
  family: "ig",
  precisions: [Precision.SUBGROUP, Precision.GENE, Precision.ALLELE],
  clean: cleanIgSymbol,
  parse: parseIgSymbol,
  strategies: [synonymStrategy(), repairCommonErrors, prefixStrategy("IG"), removeDashOne],
  isResolved: isReceptorGeneResolved,
  diagnose: diagnoseReceptorSymbol,
};
