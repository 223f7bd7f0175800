/**
 * Immutable reference context shared by every resolution call
 *
 * A context holds the catalogs of each (species, gene family) pair. It is
 * built once and never written to afterwards, so one instance can serve
 * any number of callers.
 */

import type {
  AaSequenceCatalog,
  FamilyCatalogInput,
  GeneCatalog,
  GeneFamily,
  ReferenceCatalogInput,
  SynonymTable,
} from "../types";
import { GENE_FAMILIES } from "../types";

const EMPTY_TABLE: Readonly<Record<string, never>> = Object.freeze({});

/**
 * Catalogs of one gene family of one species
 */
export interface FamilyCatalog {
  readonly species: string;
  readonly family: GeneFamily;
  readonly genes: GeneCatalog;
  readonly synonyms: SynonymTable;
  readonly sequences: AaSequenceCatalog;
  /** Gene names truncated before their first dash */
  readonly subgroups: ReadonlySet<string>;
}

/**
 * Subgroup of a gene: everything before the first dash
 */
export function subgroupOf(gene: string): string {
  const dash = gene.indexOf("-");
  return dash === -1 ? gene : gene.slice(0, dash);
}

function buildFamilyCatalog(
  species: string,
  family: GeneFamily,
  input: FamilyCatalogInput
): FamilyCatalog {
  const genes = Object.freeze({ ...input.genes });
  return Object.freeze({
    species,
    family,
    genes,
    synonyms: Object.freeze({ ...(input.synonyms ?? EMPTY_TABLE) }),
    sequences: Object.freeze({ ...(input.sequences ?? EMPTY_TABLE) }),
    subgroups: new Set(Object.keys(genes).map(subgroupOf)),
  });
}

export class ReferenceContext {
  private readonly catalogs: ReadonlyMap<string, ReadonlyMap<GeneFamily, FamilyCatalog>>;

  constructor(input: ReferenceCatalogInput) {
    const catalogs = new Map<string, ReadonlyMap<GeneFamily, FamilyCatalog>>();
    for (const [species, families] of Object.entries(input)) {
      const byFamily = new Map<GeneFamily, FamilyCatalog>();
      for (const family of GENE_FAMILIES) {
        const familyInput = families[family];
        if (familyInput !== undefined) {
          byFamily.set(family, buildFamilyCatalog(species, family, familyInput));
        }
      }
      catalogs.set(species, byFamily);
    }
    this.catalogs = catalogs;
    Object.freeze(this);
  }

  /**
   * Every species key known to this context, in insertion order
   */
  get species(): readonly string[] {
    return [...this.catalogs.keys()];
  }

  catalogFor(species: string, family: GeneFamily): FamilyCatalog | undefined {
    return this.catalogs.get(species)?.get(family);
  }

  /**
   * Species holding a catalog for the given family
   */
  speciesFor(family: GeneFamily): readonly string[] {
    return this.species.filter((species) => this.catalogs.get(species)?.has(family) === true);
  }
}

/**
 * Build a context from already-typed catalogs
 *
 * @example
 * ```typescript
 * const context = createReferenceContext({
 *   homosapiens: { tr: { genes: { "TRBV2": { "01": "F" } } } },
 * });
 * ```
 */
export function createReferenceContext(input: ReferenceCatalogInput): ReferenceContext {
  return new ReferenceContext(input);
}
