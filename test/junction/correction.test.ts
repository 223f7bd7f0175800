/**
 * Tests for choosing one correction per side
 */

import { describe, expect, test } from "vitest";
import type { SideRules } from "../../src/junction/correction";
import { resolveSide } from "../../src/junction/correction";
import type { Alignment, Correction } from "../../src/junction/scoring";

/**
 * Alignments whose corrections are given up front, keyed by candidate name
 */
function planned(corrections: readonly Correction[]): {
  readonly alignments: Alignment[];
  readonly correct: SideRules["correct"];
} {
  const byName = new Map(corrections.map((correction, index) => [`S${index}`, correction]));
  const alignments = [...byName.keys()].map((name) => ({
    candidate: { name, region: "", anchor: 0 },
    offset: 0,
    score: 5,
  }));
  const correct = (sequence: string, alignment: Alignment): Correction =>
    byName.get(alignment.candidate.name) ?? { sequence, added: 0 };
  return { alignments, correct };
}

function resolveJ(
  sequence: string,
  corrections: readonly Correction[],
  overrides: Partial<Omit<SideRules, "correct">> = {}
) {
  const { alignments, correct } = planned(corrections);
  return resolveSide(sequence, alignments, {
    side: "J",
    correct,
    allowReconstruction: false,
    preferCanonicalEnd: false,
    ...overrides,
  });
}

describe("resolveSide", () => {
  test("fails without alignments", () => {
    expect(resolveJ("CASS", [])).toEqual({
      sequence: "CASS",
      reasons: ["J alignment unsuccessful", "J side reconstruction unsuccessful"],
    });
  });

  test("keeps the sequence when one alignment needs no change", () => {
    expect(
      resolveJ("CASSF", [
        { sequence: "CASSF", added: 0 },
        { sequence: "CASSFW", added: 1 },
      ])
    ).toEqual({ sequence: "CASSF", reasons: [] });
  });

  test("prefers single-residue corrections", () => {
    expect(
      resolveJ("CASS", [
        { sequence: "CASSQYF", added: 3 },
        { sequence: "CASSF", added: 1 },
      ])
    ).toEqual({ sequence: "CASSF", reasons: [] });
  });

  test("keeps trims without reconstruction", () => {
    expect(resolveJ("CASSFGQ", [{ sequence: "CASSF", added: -2 }])).toEqual({
      sequence: "CASSF",
      reasons: [],
    });
  });

  test("keeps longer extensions only when reconstruction is allowed", () => {
    const extension = [{ sequence: "CASSQYF", added: 3 }];
    expect(resolveJ("CASS", extension)).toEqual({
      sequence: "CASS",
      reasons: ["J side reconstruction unsuccessful"],
    });
    expect(resolveJ("CASS", extension, { allowReconstruction: true })).toEqual({
      sequence: "CASSQYF",
      reasons: [],
    });
  });

  test("merges identical corrections", () => {
    expect(
      resolveJ("CASS", [
        { sequence: "CASSF", added: 1 },
        { sequence: "CASSF", added: 1 },
      ])
    ).toEqual({ sequence: "CASSF", reasons: [] });
  });

  test("reports different corrections as ambiguous", () => {
    const corrections = [
      { sequence: "CASSF", added: 1 },
      { sequence: "CASSL", added: 1 },
    ];
    expect(resolveJ("CASS", corrections)).toEqual({
      sequence: "CASS",
      reasons: ["J side reconstruction ambiguous"],
    });
    expect(resolveJ("CASS", corrections, { preferCanonicalEnd: true })).toEqual({
      sequence: "CASSF",
      reasons: [],
    });
  });

  test("does not keep an unchanged V sequence lacking the cysteine", () => {
    expect(resolveJ("SASSF", [{ sequence: "SASSF", added: 0 }], { side: "V" })).toEqual({
      sequence: "SASSF",
      reasons: ["V side reconstruction unsuccessful"],
    });
    expect(resolveJ("CASSF", [{ sequence: "CASSF", added: 0 }], { side: "V" })).toEqual({
      sequence: "CASSF",
      reasons: [],
    });
  });

  test("requires V corrections to start on a cysteine", () => {
    expect(resolveJ("ASSF", [{ sequence: "SASSF", added: 1 }], { side: "V" })).toEqual({
      sequence: "ASSF",
      reasons: ["V side reconstruction unsuccessful"],
    });
    expect(resolveJ("ASSF", [{ sequence: "CASSF", added: 1 }], { side: "V" })).toEqual({
      sequence: "CASSF",
      reasons: [],
    });
  });
});
