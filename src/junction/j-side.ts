/**
 * J-side alignment and correction
 *
 * The J region slides along the end of the junction. An offset is the
 * position in the junction where the region's first residue would sit; it
 * may be negative when the junction holds only the end of the region.
 */

import type { SegmentCandidate } from "./candidates";
import type { Alignment, Correction, ScoringSettings } from "./scoring";
import { matchFlags, NO_ALIGNMENT, scoreMatches, topAlignments } from "./scoring";

/**
 * The anchor lies past the junction's end, or the junction's tail from the
 * anchor on equals the region
 */
export function isValidJAnchor(sequence: string, candidate: SegmentCandidate, offset: number): boolean {
  const position = offset + candidate.anchor;
  if (position >= sequence.length) {
    return true;
  }
  if (position < 0) {
    return false;
  }
  const tail = sequence.slice(position);
  return tail === candidate.region.slice(candidate.anchor, candidate.anchor + tail.length);
}

export function scoreJAlignment(
  sequence: string,
  region: string,
  offset: number,
  settings: ScoringSettings
): number {
  const sequenceStart = Math.max(offset, 0);
  const regionStart = Math.max(-offset, 0);
  const length = Math.min(sequence.length - sequenceStart, region.length - regionStart);
  if (length <= 0) {
    return NO_ALIGNMENT;
  }

  return scoreMatches(
    matchFlags(
      sequence.slice(sequenceStart, sequenceStart + length),
      region.slice(regionStart, regionStart + length)
    ),
    settings
  );
}

/**
 * Best-scoring valid offset of one candidate; the first one wins a tie
 */
export function bestJAlignment(
  sequence: string,
  candidate: SegmentCandidate,
  settings: ScoringSettings
): Alignment | undefined {
  let best: Alignment | undefined;
  for (let offset = sequence.length - candidate.region.length; offset < sequence.length; offset++) {
    if (!isValidJAnchor(sequence, candidate, offset)) {
      continue;
    }
    const score = scoreJAlignment(sequence, candidate.region, offset, settings);
    if (score > (best?.score ?? NO_ALIGNMENT)) {
      best = { candidate, offset, score };
    }
  }
  return best;
}

export function alignJ(
  sequence: string,
  candidates: readonly SegmentCandidate[],
  settings: ScoringSettings & { readonly minScore: number }
): Alignment[] {
  return topAlignments(
    candidates.map((candidate) => bestJAlignment(sequence, candidate, settings)),
    settings.minScore
  );
}

export function correctJ(sequence: string, alignment: Alignment): Correction {
  const { candidate, offset } = alignment;
  const implied = offset + candidate.anchor + 1;

  if (implied <= sequence.length) {
    return { sequence: sequence.slice(0, implied), added: implied - sequence.length };
  }
  return {
    sequence: sequence + candidate.region.slice(sequence.length - offset, candidate.anchor + 1),
    added: implied - sequence.length,
  };
}
