/**
 * Human MH (HLA) scheme
 *
 * HLA catalogs hold designation fields down to the protein level (two
 * fields) plus G and P groups. Synonymous and non-coding fields beyond the
 * protein are checked for form only.
 */

import { walkAlleleTree } from "../../catalog/oracle";
import type { ParsedSymbol } from "../../types";
import { lookup, Precision } from "../../types";
import type { CascadeEnvironment, Strategy, SymbolScheme } from "../cascade";
import { withGene } from "../cascade";
import { cleanSymbol } from "../cleaning";
import { padField, parseHlaSymbol } from "../parser";
import { synonymStrategy } from "./receptor";

/**
 * Genes accepted as they are, without allele fields
 */
const LITERAL_GENES: ReadonlySet<string> = new Set(["B2M"]);

const NUMERIC = /^\d+$/;

function isGroupDesignation(allele: readonly string[]): boolean {
  const last = allele.at(-1);
  return last !== undefined && (last.endsWith("G") || last.endsWith("P"));
}

export function diagnoseHlaSymbol(
  symbol: ParsedSymbol,
  env: CascadeEnvironment
): string | undefined {
  if (LITERAL_GENES.has(symbol.gene) && symbol.allele.length === 0) {
    return undefined;
  }

  const gene = lookup(env.catalog.genes, symbol.gene);
  if (gene === undefined) {
    return "unrecognized gene name";
  }

  const group = isGroupDesignation(symbol.allele);
  const walked = group ? symbol.allele : symbol.allele.slice(0, 2);
  if (walkAlleleTree(gene, walked) === undefined) {
    return "nonexistent allele for recognized gene";
  }

  if (group || symbol.allele.length <= 2) {
    return undefined;
  }

  const further = symbol.allele.slice(2);
  if (further.length > 2) {
    return "too many allele designators";
  }
  if (further.some((field) => !NUMERIC.test(field))) {
    return "non-numerical allele designators";
  }
  if (further.some((field) => field.length < 2)) {
    return "non-2-digit allele designators";
  }
  return undefined;
}

const isHlaResolved = (symbol: ParsedSymbol, env: CascadeEnvironment): boolean =>
  diagnoseHlaSymbol(symbol, env) === undefined;

// =============================================================================
// STRATEGIES
// =============================================================================

/**
 * A -> HLA-A, CW7 -> HLA-C7
 */
const addPrefix: Strategy = {
  name: "prefix",
  apply: (symbol) => {
    const prefixed = symbol.gene.startsWith("HLA-") ? symbol.gene : `HLA-${symbol.gene}`;
    return withGene(symbol, prefixed.replaceAll("CW", "C"));
  },
};

/**
 * HLA-B8 -> HLA-B*08
 */
const splitForgottenAsterisk: Strategy = {
  name: "forgotten-asterisk",
  apply: (symbol) => {
    if (symbol.allele.length > 0) {
      return symbol;
    }
    const match = /^(HLA-[A-Z]+)([\d:]+G?P?)$/.exec(symbol.gene);
    if (match === null) {
      return symbol;
    }
    return { gene: match[1] ?? symbol.gene, allele: (match[2] ?? "").split(":").map(padField) };
  },
};

/**
 * HLA-B*5701 -> HLA-B*57:01
 */
const splitForgottenColon: Strategy = {
  name: "forgotten-colon",
  apply: (symbol) => {
    const [first, ...rest] = symbol.allele;
    if (first === undefined || first.length !== 4) {
      return symbol;
    }
    return { gene: symbol.gene, allele: [first.slice(0, 2), first.slice(2), ...rest] };
  },
};

function cartesian(lists: readonly (readonly string[])[]): string[][] {
  return lists.reduce<string[][]>(
    (combinations, options) =>
      combinations.flatMap((combination) => options.map((option) => [...combination, option])),
    [[]]
  );
}

/**
 * HLA-A*1:1 -> HLA-A*01:01, HLA-B*57:001 -> HLA-B*57:01
 *
 * Tries two- and three-digit widths for the first two fields; the first
 * valid combination is kept.
 */
const tryLeadingZeroWidths: Strategy = {
  name: "leading-zero-widths",
  apply: (symbol, env) => {
    const head = symbol.allele.slice(0, 2);
    if (head.length === 0 || !head.every((field) => NUMERIC.test(field))) {
      return symbol;
    }

    const widths = head.map((field) => {
      const value = String(Number.parseInt(field, 10));
      return [value.padStart(2, "0"), value.padStart(3, "0")];
    });

    for (const combination of cartesian(widths)) {
      const candidate: ParsedSymbol = {
        gene: symbol.gene,
        allele: [...combination, ...symbol.allele.slice(2)],
      };
      if (isHlaResolved(candidate, env)) {
        return candidate;
      }
    }
    return symbol;
  },
};

export const HLA_SCHEME: SymbolScheme = {
  name: "hla",
  family: "mh",
  precisions: [Precision.GENE, Precision.PROTEIN, Precision.ALLELE],
  clean: cleanSymbol,
  parse: parseHlaSymbol,
  strategies: [
    synonymStrategy(),
    addPrefix,
    splitForgottenAsterisk,
    splitForgottenColon,
    tryLeadingZeroWidths,
  ],
  isResolved: isHlaResolved,
  diagnose: diagnoseHlaSymbol,
};
