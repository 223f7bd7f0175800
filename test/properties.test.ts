/**
 * Behaviour that holds across whole catalogs
 */

import { describe, expect, test } from "vitest";
import { standardizeJunction } from "../src/junction/standardize";
import { query } from "../src/symbols/query";
import { standardizeSymbol } from "../src/symbols/standardize";
import type { GeneFamily } from "../src/types";

const quiet = { logFailures: false } as const;

describe("standardized symbols", () => {
  const catalogs: Array<[GeneFamily, string]> = [
    ["tr", "homosapiens"],
    ["tr", "musmusculus"],
    ["ig", "homosapiens"],
    ["mh", "homosapiens"],
    ["mh", "musmusculus"],
  ];

  test.each(catalogs)("every %s gene of %s standardizes to itself", (family, species) => {
    const genes = [...query({ family, species, precision: "gene", ...quiet })];
    const changed = genes.filter(
      (gene) => standardizeSymbol(gene, { family, species, ...quiet }).gene !== gene
    );
    expect(genes.length).toBeGreaterThan(0);
    expect(changed).toEqual([]);
  });

  const alleleCatalogs: Array<[GeneFamily, string]> = [
    ["tr", "TRBV"],
    ["ig", "IGHV"],
  ];

  test.each(alleleCatalogs)("every %s allele standardizes to itself", (family, prefix) => {
    const alleles = [...query({ family, pattern: `^${prefix}`, ...quiet })];
    const changed = alleles.filter(
      (allele) => standardizeSymbol(allele, { family, ...quiet }).allele !== allele
    );
    expect(changed).toEqual([]);
  });

  test("standardizing twice changes nothing", () => {
    for (const input of ["aj1", "TCRAV32S1", "hv3.23", "TRBV2*1"]) {
      const family = input.startsWith("hv") ? "ig" : "tr";
      const once = standardizeSymbol(input, { family, ...quiet }).highestPrecision;
      expect(once).toBeDefined();
      if (once !== undefined) {
        expect(standardizeSymbol(once, { family, ...quiet }).highestPrecision).toBe(once);
      }
    }
  });

  test("gives the same result on every call", () => {
    const first = standardizeSymbol("TCRAV14/4", quiet);
    const second = standardizeSymbol("TCRAV14/4", quiet);
    expect(second.gene).toBe(first.gene);
    expect(first.gene).toBe("TRAV14/DV4");
  });

  test("never loses a success when subgroups are allowed", () => {
    for (const input of ["TRAV1", "TRBV2", "TRAV14"]) {
      const strict = standardizeSymbol(input, quiet);
      const relaxed = standardizeSymbol(input, { ...quiet, allowSubgroup: true });
      if (strict.success) {
        expect(relaxed.success).toBe(true);
      }
    }
  });

  test("never gains a success when functionality is enforced", () => {
    for (const input of ["TRBV1", "TRBV1*01", "TRBV2*01", "TRAJ1"]) {
      const enforced = standardizeSymbol(input, { ...quiet, enforceFunctional: true });
      const relaxed = standardizeSymbol(input, quiet);
      if (enforced.success) {
        expect(relaxed.success).toBe(true);
      }
    }
  });
});

describe("standardized junctions", () => {
  test("a corrected junction is accepted as it is", () => {
    for (const input of ["ASSIRSSYEQYF", "CASSIRSSYEQY", "CASSIRSSYEQYFGPG"]) {
      const corrected = standardizeJunction(input, { ...quiet, locus: "TRB" }).junction;
      expect(corrected).toBe("CASSIRSSYEQYF");
      if (corrected !== undefined) {
        expect(standardizeJunction(corrected, { ...quiet, locus: "TRB" }).junction).toBe(corrected);
      }
    }
  });

  test("resolves common inputs", () => {
    expect(standardizeSymbol("aj1", quiet).gene).toBe("TRAJ1");
    expect(standardizeSymbol("TCRAV32S1", quiet).gene).toBe("TRAV25");
    expect(standardizeSymbol("HLA-B*5701", { ...quiet, family: "mh", enforceFunctional: true }).allele).toBe(
      "HLA-B*57:01"
    );
    expect(standardizeSymbol("foobarbaz", quiet).error).toBe("unrecognized gene name");
    expect(standardizeJunction("ASSIRSSYEQYF", { ...quiet, locus: "TRB", vSymbol: "TRBV19" }).junction).toBe(
      "CASSIRSSYEQYF"
    );
    expect(standardizeJunction("sadaf", quiet).junction).toBe("CSADAFF");
  });
});
