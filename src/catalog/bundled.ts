/**
 * Reference catalogs shipped with the package
 *
 * The JSON resources are decoded on first use only, and the resulting
 * context is memoized for the rest of the process.
 */

import humanIgSequences from "../../resources/homosapiens/ig-aa-sequences.json";
import humanIgGenes from "../../resources/homosapiens/ig-genes.json";
import humanIgSynonyms from "../../resources/homosapiens/ig-synonyms.json";
import humanMhGenes from "../../resources/homosapiens/mh-genes.json";
import humanMhSynonyms from "../../resources/homosapiens/mh-synonyms.json";
import humanTrSequences from "../../resources/homosapiens/tr-aa-sequences.json";
import humanTrGenes from "../../resources/homosapiens/tr-genes.json";
import humanTrSynonyms from "../../resources/homosapiens/tr-synonyms.json";
import mouseMhGenes from "../../resources/musmusculus/mh-genes.json";
import mouseMhSynonyms from "../../resources/musmusculus/mh-synonyms.json";
import mouseTrSequences from "../../resources/musmusculus/tr-aa-sequences.json";
import mouseTrGenes from "../../resources/musmusculus/tr-genes.json";
import { Species } from "../types";
import { ReferenceContext } from "./context";
import { decodeFamilyCatalog } from "./decode";

let bundledContext: ReferenceContext | undefined;

function buildBundledContext(): ReferenceContext {
  const human = `bundled/${Species.HOMO_SAPIENS}`;
  const mouse = `bundled/${Species.MUS_MUSCULUS}`;

  return new ReferenceContext({
    [Species.HOMO_SAPIENS]: {
      tr: decodeFamilyCatalog(
        "tr",
        { genes: humanTrGenes, synonyms: humanTrSynonyms, sequences: humanTrSequences },
        human
      ),
      ig: decodeFamilyCatalog(
        "ig",
        { genes: humanIgGenes, synonyms: humanIgSynonyms, sequences: humanIgSequences },
        human
      ),
      mh: decodeFamilyCatalog("mh", { genes: humanMhGenes, synonyms: humanMhSynonyms }, human),
    },
    [Species.MUS_MUSCULUS]: {
      tr: decodeFamilyCatalog("tr", { genes: mouseTrGenes, sequences: mouseTrSequences }, mouse),
      mh: decodeFamilyCatalog("mh", { genes: mouseMhGenes, synonyms: mouseMhSynonyms }, mouse),
    },
  });
}

/**
 * The bundled reference context, built once on first request
 */
export function getBundledContext(): ReferenceContext {
  bundledContext ??= buildBundledContext();
  return bundledContext;
}
