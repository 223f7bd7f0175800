/**
 * Mouse MH scheme: gene level only
 *
 * H-2 symbols are written with and without dashes (H-2Eb1, H2-Eb1), so
 * synonyms are keyed on the dash-free spelling.
 */

import type { ParsedSymbol } from "../../types";
import { Precision } from "../../types";
import type { CascadeEnvironment, SymbolScheme } from "../cascade";
import { cleanSymbol } from "../cleaning";
import { parseTrSymbol } from "../parser";
import { synonymStrategy } from "./receptor";

const isKnownGene = (symbol: ParsedSymbol, env: CascadeEnvironment): boolean =>
  Object.hasOwn(env.catalog.genes, symbol.gene);

export const MOUSE_MH_SCHEME: SymbolScheme = {
  name: "mouse-mh",
  family: "mh",
  precisions: [Precision.GENE],
  clean: cleanSymbol,
  parse: parseTrSymbol,
  strategies: [synonymStrategy((gene) => gene.replaceAll("-", ""))],
  isResolved: isKnownGene,
  diagnose: (symbol, env) => (isKnownGene(symbol, env) ? undefined : "unrecognized gene name"),
};
