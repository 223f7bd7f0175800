import { describe, expect, test } from "vitest";
import { runCascade } from "../../../src/symbols/cascade";
import { MOUSE_MH_SCHEME } from "../../../src/symbols/families/mouse-mh";
import { bundledCatalog } from "../../utils/fixtures";

describe("MOUSE_MH_SCHEME", () => {
  const env = { catalog: bundledCatalog("mh", "musmusculus"), enforceFunctional: false, allowSubgroup: false };
  const resolve = (input: string) =>
    runCascade(MOUSE_MH_SCHEME.parse(MOUSE_MH_SCHEME.clean(input)), MOUSE_MH_SCHEME, env);

  test("looks synonyms up without dashes", () => {
    expect(resolve("H-2Eb1").symbol.gene).toBe("MH2-EB1");
    expect(resolve("H2-Eb1").symbol.gene).toBe("MH2-EB1");
  });

  test("accepts current names as they are", () => {
    expect(resolve("MH1-K1")).toEqual({ symbol: { gene: "MH1-K1", allele: [] }, resolved: true, steps: [] });
  });

  test("reports unknown genes", () => {
    const outcome = resolve("H2-XX");
    expect(outcome.resolved).toBe(false);
    expect(MOUSE_MH_SCHEME.diagnose(outcome.symbol, env)).toBe("unrecognized gene name");
  });
});
