/**
 * Tests for reference segment selection
 */

import { describe, expect, test } from "vitest";
import {
  assertSymbolInLocus,
  isSymbolExtension,
  prefixesFor,
  selectCandidates,
} from "../../src/junction/candidates";
import { ValidationError } from "../../src/errors";
import { fixtureCatalog } from "../utils/fixtures";

describe("prefixesFor", () => {
  test("shares the V segments of TRA and TRD", () => {
    expect(prefixesFor("TRA", "V")).toEqual(["TRAV", "TRDV"]);
    expect(prefixesFor("TRD", "J")).toEqual(["TRDJ"]);
    expect(prefixesFor("IG", "J")).toEqual(["IGHJ", "IGKJ", "IGLJ"]);
  });
});

describe("isSymbolExtension", () => {
  test("extends a symbol without crossing a number", () => {
    expect(isSymbolExtension("TRAV1", "TRAV1-1*01")).toBe(true);
    expect(isSymbolExtension("TRAV1", "TRAV12*01")).toBe(false);
    expect(isSymbolExtension("TRBV20/OR9", "TRBV20/OR9-2*01")).toBe(true);
    expect(isSymbolExtension("TRBV9*01", "TRBV9*01")).toBe(true);
  });
});

describe("assertSymbolInLocus", () => {
  test("accepts a segment of the locus", () => {
    expect(() => assertSymbolInLocus("TRDV1", "TRA", "V")).not.toThrow();
  });

  test("rejects a segment of another locus or side", () => {
    try {
      assertSymbolInLocus("TRBJ1", "TRA", "J");
      expect.unreachable("Should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('"TRBJ1" is not a valid J gene for locus TRA');
      }
    }
    expect(() => assertSymbolInLocus("TRBJ1", "TRB", "V")).toThrow(ValidationError);
  });
});

describe("selectCandidates", () => {
  const tr = fixtureCatalog("tr");

  test("collapses alleles with identical sequences and skips nonfunctional V", () => {
    expect(selectCandidates(tr, { locus: "TRB", side: "V", enforceFunctional: true })).toEqual({
      candidates: [{ name: "TRBV9", region: "AFYLCASSV", anchor: -5 }],
    });
  });

  test("keeps nonfunctional segments when not enforced", () => {
    const { candidates } = selectCandidates(tr, { locus: "TRB", side: "V", enforceFunctional: false });
    expect(candidates.map((candidate) => candidate.name)).toEqual(["TRBV9", "TRBV10*01"]);
  });

  test("anchors J segments on the motif", () => {
    const { candidates } = selectCandidates(tr, { locus: "TRB", side: "J", enforceFunctional: false });
    expect(candidates).toEqual([
      { name: "TRBJ1*01", region: "NTEAFFGQGTRL", anchor: 5 },
      { name: "TRBJ1*02", region: "NTEAFFGQGTRV", anchor: 5 },
    ]);
  });

  test("reads both alpha and delta V segments for TRA", () => {
    const { candidates } = selectCandidates(tr, { locus: "TRA", side: "V", enforceFunctional: true });
    expect(candidates).toEqual([
      { name: "TRAV1-1*01", region: "SYLCAV", anchor: -3 },
      { name: "TRDV1*01", region: "KYYCALG", anchor: -4 },
    ]);
  });

  test("finds the cysteine of IGHV segments whose FR3 stops short", () => {
    const { candidates } = selectCandidates(fixtureCatalog("ig"), {
      locus: "IGH",
      side: "V",
      enforceFunctional: true,
    });
    expect(candidates).toEqual([{ name: "IGHV9-1*01", region: "AVYYCARDYYCAK", anchor: -3 }]);
  });

  test("narrows to an explicit symbol", () => {
    expect(
      selectCandidates(tr, { locus: "TRB", side: "V", symbol: "TRBV9*02", enforceFunctional: true })
    ).toEqual({ candidates: [{ name: "TRBV9*02", region: "AFYLCASSV", anchor: -5 }] });
  });

  test("reports a symbol without sequences", () => {
    expect(
      selectCandidates(tr, { locus: "TRB", side: "V", symbol: "TRBV1", enforceFunctional: true })
    ).toEqual({ candidates: [], error: "no known sequence information for TRBV1" });
  });
});
