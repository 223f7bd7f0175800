/**
 * Ungapped alignment scoring
 *
 * Positions are compared pairwise. Mismatches before the first match are
 * free, as they stand for residues lost to junctional deletion. Past that,
 * each match scores +1 and each mismatch the (negative) penalty.
 */

import type { SegmentCandidate } from "./candidates";

export interface ScoringSettings {
  readonly mismatchPenalty: number;
  readonly maxMismatches: number;
}

/** Score of a position that does not align */
export const NO_ALIGNMENT = -1;

/**
 * Score a run of match flags whose leading mismatches are free
 *
 * Returns NO_ALIGNMENT when nothing matches, when more than
 * `maxMismatches` mismatches remain, or when the score is negative.
 */
export function scoreMatches(matches: readonly boolean[], settings: ScoringSettings): number {
  const first = matches.indexOf(true);
  if (first === -1) {
    return NO_ALIGNMENT;
  }

  const scored = matches.slice(first);
  const mismatches = scored.filter((match) => !match).length;
  if (mismatches > settings.maxMismatches) {
    return NO_ALIGNMENT;
  }

  const score = scored.length - mismatches + mismatches * settings.mismatchPenalty;
  return score < 0 ? NO_ALIGNMENT : score;
}

/**
 * Pairwise equality of two strings over their common length
 */
export function matchFlags(left: string, right: string): boolean[] {
  const length = Math.min(left.length, right.length);
  return Array.from({ length }, (_, index) => left[index] === right[index]);
}

// =============================================================================
// ALIGNMENTS
// =============================================================================

export interface Alignment {
  readonly candidate: SegmentCandidate;
  readonly offset: number;
  readonly score: number;
}

/**
 * Candidates reaching `minScore`, restricted to those sharing the top score
 */
export function topAlignments(alignments: readonly (Alignment | undefined)[], minScore: number): Alignment[] {
  const retained = alignments.filter(
    (alignment): alignment is Alignment => alignment !== undefined && alignment.score >= minScore
  );
  const top = Math.max(...retained.map((alignment) => alignment.score));
  return retained.filter((alignment) => alignment.score === top);
}

/**
 * A junction rewritten to start or end on the anchor residue of an alignment
 */
export interface Correction {
  readonly sequence: string;
  /** Residues added (positive) or removed (negative) */
  readonly added: number;
}
