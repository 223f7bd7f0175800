import { describe, expect, test } from "vitest";
import { cleanSequence, isAminoAcidSequence } from "../../src/junction/alphabet";

describe("cleanSequence", () => {
  test("removes whitespace and uppercases", () => {
    expect(cleanSequence(" cas sf\n")).toBe("CASSF");
  });
});

describe("isAminoAcidSequence", () => {
  test("accepts the twenty standard residues", () => {
    expect(isAminoAcidSequence("ACDEFGHIKLMNPQRSTVWY")).toBe(true);
  });

  test("rejects other letters, digits and the empty string", () => {
    expect(isAminoAcidSequence("CASSBF")).toBe(false);
    expect(isAminoAcidSequence("CASS*F")).toBe(false);
    expect(isAminoAcidSequence("123")).toBe(false);
    expect(isAminoAcidSequence("")).toBe(false);
  });
});
