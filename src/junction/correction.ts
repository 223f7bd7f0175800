/**
 * Choosing one correction per side from the retained alignments
 */

import { TRAILING_ANCHORS } from "./alphabet";
import type { Side } from "./candidates";
import type { Alignment, Correction } from "./scoring";

export interface SideRules {
  readonly side: Side;
  readonly correct: (sequence: string, alignment: Alignment) => Correction;
  /** Keep extensions of more than one residue */
  readonly allowReconstruction: boolean;
  /** Prefer results ending in F or W when there are any (J side, no explicit symbol) */
  readonly preferCanonicalEnd: boolean;
}

export interface SideOutcome {
  readonly sequence: string;
  readonly reasons: readonly string[];
}

/**
 * V results must start on the conserved cysteine
 */
function startsOnAnchor(sequence: string, side: Side): boolean {
  return side === "J" || sequence.startsWith("C");
}

function retainedCorrections(corrections: readonly Correction[], rules: SideRules): Correction[] {
  const single = corrections.filter((correction) => correction.added === 1);
  let kept =
    single.length > 0
      ? single
      : corrections.filter(
          (correction) =>
            correction.added < 0 || (rules.allowReconstruction && correction.added > 1)
        );

  if (rules.preferCanonicalEnd) {
    const canonical = kept.filter((correction) => TRAILING_ANCHORS.has(correction.sequence.slice(-1)));
    if (canonical.length > 0) {
      kept = canonical;
    }
  }
  return kept.filter((correction) => startsOnAnchor(correction.sequence, rules.side));
}

/**
 * Correct one side of a junction
 *
 * The sequence is returned unchanged, with reasons, when the alignments
 * lead to no correction or to several different ones.
 */
export function resolveSide(
  sequence: string,
  alignments: readonly Alignment[],
  rules: SideRules
): SideOutcome {
  const { side } = rules;
  if (alignments.length === 0) {
    return {
      sequence,
      reasons: [`${side} alignment unsuccessful`, `${side} side reconstruction unsuccessful`],
    };
  }

  const corrections = alignments.map((alignment) => rules.correct(sequence, alignment));
  if (corrections.some((correction) => correction.added === 0) && startsOnAnchor(sequence, side)) {
    return { sequence, reasons: [] };
  }

  const distinct = [...new Set(retainedCorrections(corrections, rules).map((c) => c.sequence))];
  const [only] = distinct;
  if (distinct.length === 1 && only !== undefined) {
    return { sequence: only, reasons: [] };
  }
  return {
    sequence,
    reasons: [`${side} side reconstruction ${distinct.length === 0 ? "unsuccessful" : "ambiguous"}`],
  };
}
