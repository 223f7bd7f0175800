/**
 * Reference V and J segments a junction is aligned against
 *
 * Candidates come from the amino-acid sequence catalog of the locus, or
 * from the entries named by an explicit V or J symbol. Alleles of one gene
 * that share their alignment-relevant sequence are aligned once, under the
 * gene name.
 */

import type { FamilyCatalog } from "../catalog/context";
import { ValidationError } from "../errors";
import type { Locus, RegionSequences } from "../types";
import { lookup } from "../types";

export type Side = "V" | "J";

/**
 * A reference region and the index of its conserved anchor residue
 *
 * For J the anchor is the first residue of the J motif (the F or W). For V
 * it is the conserved cysteine, as a negative index from the region's end.
 */
export interface SegmentCandidate {
  readonly name: string;
  readonly region: string;
  readonly anchor: number;
}

const TR_V = ["TRAV", "TRDV"];

const V_PREFIXES: Readonly<Record<Locus, readonly string[]>> = {
  TRA: TR_V,
  TRD: TR_V,
  TRB: ["TRBV"],
  TRG: ["TRGV"],
  TR: ["TRAV", "TRBV", "TRGV", "TRDV"],
  IGH: ["IGHV"],
  IGK: ["IGKV"],
  IGL: ["IGLV"],
  IG: ["IGHV", "IGKV", "IGLV"],
};

const J_PREFIXES: Readonly<Record<Locus, readonly string[]>> = {
  TRA: ["TRAJ"],
  TRD: ["TRDJ"],
  TRB: ["TRBJ"],
  TRG: ["TRGJ"],
  TR: ["TRAJ", "TRBJ", "TRGJ", "TRDJ"],
  IGH: ["IGHJ"],
  IGK: ["IGKJ"],
  IGL: ["IGLJ"],
  IG: ["IGHJ", "IGKJ", "IGLJ"],
};

export function prefixesFor(locus: Locus, side: Side): readonly string[] {
  return side === "V" ? V_PREFIXES[locus] : J_PREFIXES[locus];
}

/**
 * Whether a catalog entry is the symbol itself or a more precise name for
 * it: TRAV1 extends to TRAV1-1*01, never to TRAV12*01
 */
export function isSymbolExtension(symbol: string, entry: string): boolean {
  if (!entry.startsWith(symbol)) {
    return false;
  }
  const next = entry.charAt(symbol.length);
  return !(/\d$/.test(symbol) && /^\d$/.test(next));
}

/**
 * @throws {ValidationError} When the symbol does not name a segment of the locus
 */
export function assertSymbolInLocus(symbol: string, locus: Locus, side: Side): void {
  if (!prefixesFor(locus, side).some((prefix) => symbol.startsWith(prefix))) {
    throw new ValidationError(
      `"${symbol}" is not a valid ${side} gene for locus ${locus}`,
      `Expected a symbol starting with ${prefixesFor(locus, side).join(" or ")}`
    );
  }
}

// =============================================================================
// ANCHORS
// =============================================================================

function jAnchor(regions: RegionSequences): SegmentCandidate | undefined {
  const region = lookup(regions, "J-REGION");
  const motif = lookup(regions, "J-MOTIF");
  if (region === undefined || motif === undefined) {
    return undefined;
  }
  const anchor = region.indexOf(motif);
  return anchor === -1 ? undefined : { name: "", region, anchor };
}

function lastCysteineOfMotif(region: string): number {
  let found = -1;
  for (const match of region.matchAll(/Y[YFH]C/g)) {
    found = (match.index ?? -1) + 2;
  }
  return found;
}

function vAnchor(name: string, regions: RegionSequences): SegmentCandidate | undefined {
  const region = lookup(regions, "V-REGION");
  const fr3 = lookup(regions, "FR3-IMGT");
  if (region === undefined || fr3 === undefined) {
    return undefined;
  }

  let cysteine = -1;
  if (name.startsWith("IGHV") && !fr3.endsWith("C")) {
    cysteine = lastCysteineOfMotif(region);
  } else {
    const start = region.indexOf(fr3);
    cysteine = start === -1 ? -1 : start + fr3.length - 1;
  }

  return cysteine < 0 ? undefined : { name: "", region, anchor: cysteine - region.length };
}

// =============================================================================
// SELECTION
// =============================================================================

export interface CandidateQuery {
  readonly locus: Locus;
  readonly side: Side;
  readonly symbol?: string | undefined;
  readonly enforceFunctional: boolean;
}

export interface CandidateSelection {
  readonly candidates: readonly SegmentCandidate[];
  /** Set when an explicit symbol names nothing in the catalog */
  readonly error?: string;
}

function geneOf(allele: string): string {
  const star = allele.indexOf("*");
  return star === -1 ? allele : allele.slice(0, star);
}

/**
 * Alleles whose region and anchor agree collapse into one gene-level candidate
 */
function collapseAlleles(candidates: readonly SegmentCandidate[]): SegmentCandidate[] {
  const byGene = new Map<string, SegmentCandidate[]>();
  for (const candidate of candidates) {
    const gene = geneOf(candidate.name);
    byGene.set(gene, [...(byGene.get(gene) ?? []), candidate]);
  }

  return [...byGene.entries()].flatMap(([gene, alleles]) => {
    const [first] = alleles;
    const identical =
      first !== undefined &&
      alleles.every((allele) => allele.region === first.region && allele.anchor === first.anchor);
    return identical && alleles.length > 1 ? [{ ...first, name: gene }] : alleles;
  });
}

export function selectCandidates(catalog: FamilyCatalog, query: CandidateQuery): CandidateSelection {
  const { symbol, side, enforceFunctional } = query;
  const prefixes = prefixesFor(query.locus, side);

  const entries = Object.entries(catalog.sequences).filter(([name]) =>
    symbol === undefined
      ? prefixes.some((prefix) => name.startsWith(prefix))
      : isSymbolExtension(symbol, name)
  );
  if (symbol !== undefined && entries.length === 0) {
    return { candidates: [], error: `no known sequence information for ${symbol}` };
  }

  const candidates = entries.flatMap(([name, regions]) => {
    if (enforceFunctional && lookup(regions, "functionality") !== "F") {
      return [];
    }
    const anchored = side === "J" ? jAnchor(regions) : vAnchor(name, regions);
    return anchored === undefined ? [] : [{ ...anchored, name }];
  });

  return { candidates: collapseAlleles(candidates) };
}
