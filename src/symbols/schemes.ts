/**
 * Dispatch from (species, gene family) to a symbol scheme
 *
 * TR and IG follow the same rules for every species. MH nomenclature is
 * species-specific, so only species with a known MH scheme are supported
 * for that family.
 */

import type { GeneFamily } from "../types";
import { lookup, Species } from "../types";
import type { SymbolScheme } from "./cascade";
import { HLA_SCHEME } from "./families/hla";
import { IG_SCHEME } from "./families/ig";
import { MOUSE_MH_SCHEME } from "./families/mouse-mh";
import { TR_SCHEME } from "./families/tr";

const MH_SCHEMES: Readonly<Record<string, SymbolScheme>> = {
  [Species.HOMO_SAPIENS]: HLA_SCHEME,
  [Species.MUS_MUSCULUS]: MOUSE_MH_SCHEME,
};

export function schemeFor(species: string, family: GeneFamily): SymbolScheme | undefined {
  switch (family) {
    case "tr":
      return TR_SCHEME;
    case "ig":
      return IG_SCHEME;
    case "mh":
      return lookup(MH_SCHEMES, species);
  }
}
