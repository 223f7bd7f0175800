/**
 * Tests for the immutable reference context
 */

import { describe, expect, test } from "vitest";
import { getBundledContext } from "../../src/catalog/bundled";
import { createReferenceContext, subgroupOf } from "../../src/catalog/context";
import { fixtureCatalog, fixtureContext } from "../utils/fixtures";

describe("ReferenceContext", () => {
  test("lists species in insertion order", () => {
    expect(fixtureContext.species).toEqual(["homosapiens", "testmouse"]);
  });

  test("returns catalogs per species and family", () => {
    expect(fixtureContext.catalogFor("homosapiens", "tr")?.family).toBe("tr");
    expect(fixtureContext.catalogFor("homosapiens", "mh")).toBeUndefined();
    expect(fixtureContext.catalogFor("rattus", "tr")).toBeUndefined();
  });

  test("lists the species holding a family", () => {
    expect(fixtureContext.speciesFor("tr")).toEqual(["homosapiens", "testmouse"]);
    expect(fixtureContext.speciesFor("ig")).toEqual(["homosapiens"]);
    expect(fixtureContext.speciesFor("mh")).toEqual([]);
  });

  test("fills absent tables with empty ones", () => {
    const catalog = fixtureCatalog("tr", "testmouse");
    expect(catalog.synonyms).toEqual({});
    expect(catalog.sequences).toEqual({});
  });

  test("derives subgroups from gene names", () => {
    const catalog = fixtureCatalog("tr");
    expect([...catalog.subgroups]).toEqual([
      "TRAV1",
      "TRAV14/DV4",
      "TRDV1",
      "TRBV9",
      "TRBV10",
      "TRBV20/OR9",
      "TRBJ1",
    ]);
  });

  test("is frozen", () => {
    const context = createReferenceContext({ homosapiens: { tr: { genes: {} } } });
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.catalogFor("homosapiens", "tr")?.genes)).toBe(true);
  });
});

describe("subgroupOf", () => {
  test("keeps everything before the first dash", () => {
    expect(subgroupOf("TRBV20/OR9-2")).toBe("TRBV20/OR9");
    expect(subgroupOf("IGHV5-10-1")).toBe("IGHV5");
    expect(subgroupOf("TRBV9")).toBe("TRBV9");
  });
});

describe("getBundledContext", () => {
  test("is built once", () => {
    expect(getBundledContext()).toBe(getBundledContext());
  });

  test("holds human and mouse catalogs", () => {
    const context = getBundledContext();
    expect(context.species).toEqual(["homosapiens", "musmusculus"]);
    expect(context.speciesFor("ig")).toEqual(["homosapiens"]);
    expect(context.speciesFor("mh")).toEqual(["homosapiens", "musmusculus"]);
  });
});
