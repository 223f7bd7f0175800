/**
 * Tests for the T-cell receptor scheme
 */

import { describe, expect, test } from "vitest";
import type { CascadeEnvironment } from "../../../src/symbols/cascade";
import { runCascade } from "../../../src/symbols/cascade";
import { repairTrGeneName, TR_SCHEME } from "../../../src/symbols/families/tr";
import { bundledCatalog } from "../../utils/fixtures";

function resolveTr(input: string, species = "homosapiens") {
  const env: CascadeEnvironment = {
    catalog: bundledCatalog("tr", species),
    enforceFunctional: false,
    allowSubgroup: false,
  };
  return runCascade(TR_SCHEME.parse(TR_SCHEME.clean(input)), TR_SCHEME, env);
}

describe("repairTrGeneName", () => {
  test("rewrites legacy TCR spellings", () => {
    expect(repairTrGeneName("TCRAV32S1")).toBe("TRAV32-1");
    expect(repairTrGeneName("TRAV1.2")).toBe("TRAV1-2");
    expect(repairTrGeneName("TCRAV36-01")).toBe("TRAV36-1");
  });

  test("inserts the slash before DV", () => {
    expect(repairTrGeneName("TRAV14DV4")).toBe("TRAV14/DV4");
    expect(repairTrGeneName("TRAV29-DV5")).toBe("TRAV29/DV5");
    expect(repairTrGeneName("TRDV1")).toBe("TRDV1");
  });
});

describe("TR_SCHEME", () => {
  describe("strategies", () => {
    test("adds the TR prefix", () => {
      const outcome = resolveTr("aj1");
      expect(outcome.symbol.gene).toBe("TRAJ1");
      expect(outcome.steps).toEqual(["synonym", "repair", "prefix"]);
    });

    test("replaces legacy synonyms", () => {
      const outcome = resolveTr("TCRAV32S1");
      expect(outcome.symbol.gene).toBe("TRAV25");
      expect(outcome.steps).toEqual(["synonym"]);
    });

    test("finds the DV half of an alpha gene", () => {
      expect(resolveTr("TRAV14").symbol.gene).toBe("TRAV14/DV4");
      expect(resolveTr("TCRAV14/4").symbol.gene).toBe("TRAV14/DV4");
    });

    test("finds the alpha half of a delta gene", () => {
      const outcome = resolveTr("TRDV4");
      expect(outcome.symbol.gene).toBe("TRAV14/DV4");
      expect(outcome.steps).toEqual(["synonym", "repair", "prefix", "trav-to-dv", "dv-to-trav"]);
    });

    test("completes a bare compound name", () => {
      expect(resolveTr("29/DV5*01").symbol).toEqual({ gene: "TRAV29/DV5", allele: ["01"] });
    });

    test("toggles -1 suffixes", () => {
      expect(resolveTr("TRAV1").symbol.gene).toBe("TRAV1-1");
      expect(resolveTr("TCRAV30-1").symbol.gene).toBe("TRAV30");
      expect(resolveTr("TRAV15/DV6", "musmusculus").symbol.gene).toBe("TRAV15-1/DV6-1");
    });

    test("combines repairs", () => {
      expect(resolveTr("TCRAV38S2").symbol.gene).toBe("TRAV38-2/DV8");
      expect(resolveTr("TCRAV36-01*01").symbol).toEqual({ gene: "TRAV36/DV7", allele: ["01"] });
      expect(resolveTr("TCRDV01-01*01").symbol).toEqual({ gene: "TRDV1", allele: ["01"] });
    });
  });

  test("gives up on unknown names", () => {
    const outcome = resolveTr("foobarbaz");
    expect(outcome.resolved).toBe(false);
    expect(outcome.steps).toEqual([
      "synonym",
      "repair",
      "prefix",
      "trav-to-dv",
      "dv-to-trav",
      "toggle-dash-one",
    ]);
  });
});
