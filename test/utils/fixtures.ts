/**
 * Small in-memory reference contexts shared by the tests
 */

import { getBundledContext } from "../../src/catalog/bundled";
import type { FamilyCatalog, ReferenceContext } from "../../src/catalog/context";
import { createReferenceContext } from "../../src/catalog/context";
import type { GeneFamily } from "../../src/types";

export const fixtureContext: ReferenceContext = createReferenceContext({
  homosapiens: {
    tr: {
      genes: {
        "TRAV1-1": { "01": "F" },
        "TRAV1-2": { "01": "F" },
        "TRAV14/DV4": { "01": "F", "02": "F" },
        TRDV1: { "01": "F" },
        TRBV9: { "01": "F", "02": "F" },
        TRBV10: { "01": "P" },
        "TRBV20/OR9-2": { "01": "ORF", "02": "F" },
        TRBJ1: { "01": "F", "02": "F" },
      },
      synonyms: { TCRBV9S1: "TRBV9" },
      sequences: {
        "TRAV1-1*01": { "V-REGION": "SYLCAV", "FR3-IMGT": "SYLC", functionality: "F" },
        "TRDV1*01": { "V-REGION": "KYYCALG", "FR3-IMGT": "KYYC", functionality: "F" },
        "TRBV9*01": { "V-REGION": "AFYLCASSV", "FR3-IMGT": "AFYLC", functionality: "F" },
        "TRBV9*02": { "V-REGION": "AFYLCASSV", "FR3-IMGT": "AFYLC", functionality: "F" },
        "TRBV10*01": { "V-REGION": "AMYLCASSL", "FR3-IMGT": "AMYLC", functionality: "P" },
        "TRBJ1*01": { "J-REGION": "NTEAFFGQGTRL", "J-MOTIF": "FGQG", functionality: "F" },
        "TRBJ1*02": { "J-REGION": "NTEAFFGQGTRV", "J-MOTIF": "FGQG", functionality: "F" },
      },
    },
    ig: {
      genes: { "IGHV9-1": { "01": "F" } },
      sequences: {
        "IGHV9-1*01": { "V-REGION": "AVYYCARDYYCAK", "FR3-IMGT": "AVYY", functionality: "F" },
      },
    },
  },
  testmouse: {
    tr: { genes: { TRBV9: { "01": "F" } } },
  },
});

/**
 * A catalog of the fixture context, failing the test when it is absent
 */
export function fixtureCatalog(family: GeneFamily, species = "homosapiens"): FamilyCatalog {
  const catalog = fixtureContext.catalogFor(species, family);
  if (catalog === undefined) {
    throw new Error(`fixture has no ${family} catalog for ${species}`);
  }
  return catalog;
}

/**
 * A catalog of the bundled context, failing the test when it is absent
 */
export function bundledCatalog(family: GeneFamily, species = "homosapiens"): FamilyCatalog {
  const catalog = getBundledContext().catalogFor(species, family);
  if (catalog === undefined) {
    throw new Error(`bundled context has no ${family} catalog for ${species}`);
  }
  return catalog;
}
