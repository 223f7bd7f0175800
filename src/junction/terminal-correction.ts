/**
 * Optional repair of a single miscalled terminal residue
 *
 * A replacement is adopted only when it aligns strictly better than the
 * sequence as given.
 */

import { C_SUBSTITUTABLE, FW_SUBSTITUTABLE } from "./alphabet";

/**
 * Best alignment score of a sequence against the candidates of one side
 */
export type SideScorer = (sequence: string) => number;

/**
 * Replace the last residue by F, else W, when that improves the J alignment
 */
export function correctTrailingResidue(sequence: string, scoreJ: SideScorer): string {
  if (!FW_SUBSTITUTABLE.has(sequence.slice(-1))) {
    return sequence;
  }

  let best = sequence;
  let bestScore = scoreJ(sequence);
  for (const anchor of ["F", "W"]) {
    const candidate = sequence.slice(0, -1) + anchor;
    const score = scoreJ(candidate);
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Replace the first residue by C when that improves the V alignment
 */
export function correctLeadingResidue(sequence: string, scoreV: SideScorer): string {
  if (!C_SUBSTITUTABLE.has(sequence.charAt(0))) {
    return sequence;
  }
  const candidate = `C${sequence.slice(1)}`;
  return scoreV(candidate) > scoreV(sequence) ? candidate : sequence;
}
