/**
 * T-cell receptor scheme, shared by the human and mouse catalogs
 *
 * Besides the usual legacy spellings (TCRAV1S1, TRAV1.1), TR has genes
 * named in two nomenclatures at once: TRAV14/DV4 is both an alpha and a
 * delta V segment, so either half can be used to find the compound name.
 */

import { Precision } from "../../types";
import type { Strategy, SymbolScheme } from "../cascade";
import { withGene } from "../cascade";
import { cleanSymbol } from "../cleaning";
import { parseTrSymbol } from "../parser";
import {
  dashOneVariants,
  diagnoseReceptorSymbol,
  isReceptorGeneResolved,
  prefixStrategy,
  repairOrphonAndZeros,
  synonymStrategy,
} from "./receptor";

/**
 * Legacy TCR spellings: TCR prefix, S or period as the subfamily
 * separator, missing slash before DV or OR, zero padding
 */
export function repairTrGeneName(gene: string): string {
  const repaired = gene
    .replaceAll("TCR", "TR")
    .replaceAll("S", "-")
    .replaceAll(".", "-")
    .replace(/(?<!TR)(?<!\/)-?DV/g, "/DV");
  return repairOrphonAndZeros(repaired);
}

const repairCommonErrors: Strategy = {
  name: "repair",
  apply: (symbol) => withGene(symbol, repairTrGeneName(symbol.gene)),
};

/**
 * TRAV14 -> TRAV14/DV4, TRAV14/4 -> TRAV14/DV4
 */
const alphaToDelta: Strategy = {
  name: "trav-to-dv",
  apply: (symbol, { catalog }) => {
    const { gene } = symbol;
    if (!gene.startsWith("TRAV") || gene.includes("DV")) {
      return symbol;
    }

    if (gene.includes("/")) {
      const segments = gene.split("/");
      const last = segments.pop() ?? "";
      return withGene(symbol, [...segments, `DV${last}`].join("/"));
    }

    const compound = Object.keys(catalog.genes).find((name) => name.startsWith(`${gene}/DV`));
    return compound === undefined ? symbol : withGene(symbol, compound);
  },
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * TRDV4 -> TRAV14/DV4, TR29/DV5 -> TRAV29/DV5
 */
const deltaToAlpha: Strategy = {
  name: "dv-to-trav",
  apply: (symbol, { catalog }) => {
    const { gene } = symbol;
    if (!gene.includes("DV")) {
      return symbol;
    }

    if (gene.startsWith("TRDV")) {
      const compound = new RegExp(`^TRAV\\d+(-\\d)?/${escapeRegExp(gene.slice(2))}$`);
      const match = Object.keys(catalog.genes).find((name) => compound.test(name));
      return match === undefined ? symbol : withGene(symbol, match);
    }

    const bare = /^TR([\d-]+)\/(DV[\d-]+)$/.exec(gene);
    return bare === null ? symbol : withGene(symbol, `TRAV${bare[1]}/${bare[2]}`);
  },
};

/**
 * TRAV1 -> TRAV1-1, TRAV30-1 -> TRAV30
 *
 * Each variant runs through the whole cascade once more, without this step.
 */
const toggleDashOne: Strategy = {
  name: "toggle-dash-one",
  apply: (symbol, _env, { mayRetry, resolve }) => {
    if (!mayRetry) {
      return symbol;
    }

    for (const variant of dashOneVariants(symbol.gene, "toggle")) {
      const resolved = resolve(withGene(symbol, variant));
      if (resolved !== undefined) {
        return resolved;
      }
    }
    return symbol;
  },
};

export const TR_SCHEME: SymbolScheme = {
  name: "tr",
  family: "tr",
  precisions: [Precision.SUBGROUP, Precision.GENE, Precision.ALLELE],
  clean: cleanSymbol,
  parse: parseTrSymbol,
  strategies: [
    synonymStrategy(),
    repairCommonErrors,
    prefixStrategy("TR"),
    alphaToDelta,
    deltaToAlpha,
    toggleDashOne,
  ],
  isResolved: isReceptorGeneResolved,
  diagnose: diagnoseReceptorSymbol,
};
