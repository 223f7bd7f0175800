/**
 * Validity oracle over allele-designation trees
 *
 * Pure functions of a catalog and a candidate: walking a tree one
 * designation field at a time, and checking functionality labels.
 */

import type { AlleleNode, GeneCatalog } from "../types";
import { isBranch, lookup } from "../types";

/**
 * Follow designation fields down a tree; undefined when any field is missing
 */
export function walkAlleleTree(
  node: AlleleNode | undefined,
  fields: readonly string[]
): AlleleNode | undefined {
  let current = node;
  for (const field of fields) {
    if (!isBranch(current)) {
      return undefined;
    }
    current = lookup(current, field);
  }
  return current;
}

/**
 * Whether any leaf below the node is labelled functional
 */
export function hasFunctionalLeaf(node: AlleleNode): boolean {
  if (!isBranch(node)) {
    return node === "F";
  }
  return Object.values(node).some(hasFunctionalLeaf);
}

/**
 * Whether a gene, or a gene plus allele fields, exists in the catalog
 *
 * With `enforceFunctional`, an allele must itself be labelled functional
 * and a bare gene must have at least one functional allele.
 */
export function isValid(
  catalog: GeneCatalog,
  gene: string,
  fields: readonly string[],
  enforceFunctional: boolean
): boolean {
  const node = walkAlleleTree(lookup(catalog, gene), fields);
  if (node === undefined) {
    return false;
  }
  return !enforceFunctional || hasFunctionalLeaf(node);
}
