/**
 * V-side alignment and correction
 *
 * Offsets are negative indices into the V region: at offset `o` the
 * junction's first residue sits under `region.at(o)`. The conserved
 * cysteine then falls at junction index `anchor - o`, which is negative
 * when the junction starts after it.
 */

import type { SegmentCandidate } from "./candidates";
import type { Alignment, Correction, ScoringSettings } from "./scoring";
import { matchFlags, NO_ALIGNMENT, scoreMatches, topAlignments } from "./scoring";

function cysteineIndex(candidate: SegmentCandidate, offset: number): number {
  return candidate.anchor - offset;
}

/**
 * The junction starts after the cysteine, or its head up to the cysteine
 * equals the region
 */
export function isValidVAnchor(sequence: string, candidate: SegmentCandidate, offset: number): boolean {
  const cysteine = cysteineIndex(candidate, offset);
  if (cysteine < 0) {
    return true;
  }
  const { region, anchor } = candidate;
  const end = region.length + anchor + 1;
  return sequence.slice(0, cysteine + 1) === region.slice(end - cysteine - 1, end);
}

/**
 * Mismatches after the last match are free, mirroring the J side
 */
export function scoreVAlignment(
  sequence: string,
  region: string,
  offset: number,
  settings: ScoringSettings
): number {
  const tail = region.slice(region.length + offset);
  return scoreMatches(matchFlags(sequence, tail).reverse(), settings);
}

export function bestVAlignment(
  sequence: string,
  candidate: SegmentCandidate,
  settings: ScoringSettings
): Alignment | undefined {
  let best: Alignment | undefined;
  const last = Math.max(candidate.anchor - sequence.length + 1, -candidate.region.length);
  for (let offset = -1; offset >= last; offset--) {
    if (!isValidVAnchor(sequence, candidate, offset)) {
      continue;
    }
    const score = scoreVAlignment(sequence, candidate.region, offset, settings);
    if (score > (best?.score ?? NO_ALIGNMENT)) {
      best = { candidate, offset, score };
    }
  }
  return best;
}

export function alignV(
  sequence: string,
  candidates: readonly SegmentCandidate[],
  settings: ScoringSettings & { readonly minScore: number }
): Alignment[] {
  return topAlignments(
    candidates.map((candidate) => bestVAlignment(sequence, candidate, settings)),
    settings.minScore
  );
}

export function correctV(sequence: string, alignment: Alignment): Correction {
  const { candidate, offset } = alignment;
  const cysteine = cysteineIndex(candidate, offset);

  if (cysteine >= 0) {
    return { sequence: sequence.slice(cysteine), added: 0 - cysteine };
  }
  const length = candidate.region.length;
  return {
    sequence: candidate.region.slice(length + candidate.anchor, length + offset) + sequence,
    added: -cysteine,
  };
}
