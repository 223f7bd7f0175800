/**
 * Rendering of parsed symbols at a chosen precision
 *
 * Compiling never fails, so it also renders the best attempted fix of a
 * symbol that did not resolve.
 */

import { subgroupOf } from "../catalog/context";
import type { ParsedSymbol, Precision } from "../types";

export function compileSymbol(symbol: ParsedSymbol, precision: Precision): string {
  const { gene, allele } = symbol;

  switch (precision) {
    case "subgroup":
      return subgroupOf(gene);
    case "gene":
      return gene;
    case "protein":
      return allele.length === 0 ? gene : `${gene}*${allele.slice(0, 2).join(":")}`;
    case "allele":
      return allele.length === 0 ? gene : `${gene}*${allele.join(":")}`;
  }
}
