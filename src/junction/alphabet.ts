/**
 * Amino-acid alphabet and junction input cleaning
 */

const AMINO_ACID_SEQUENCE = /^[ACDEFGHIKLMNPQRSTVWY]+$/;

/**
 * Remove whitespace and uppercase
 */
export function cleanSequence(sequence: string): string {
  return sequence.replace(/\s+/g, "").toUpperCase();
}

/**
 * Non-empty and made only of the twenty standard residues
 */
export function isAminoAcidSequence(sequence: string): boolean {
  return AMINO_ACID_SEQUENCE.test(sequence);
}

/**
 * Residues that conventionally close a junction
 */
export const TRAILING_ANCHORS: ReadonlySet<string> = new Set(["F", "W"]);

/**
 * Residues one codon change away from F or W
 */
export const FW_SUBSTITUTABLE: ReadonlySet<string> = new Set(["I", "L", "V", "Y", "S", "C", "G", "R"]);

/**
 * Residues one codon change away from C
 */
export const C_SUBSTITUTABLE: ReadonlySet<string> = new Set(["W", "S", "R", "G", "Y", "F"]);
