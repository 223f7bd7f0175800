/**
 * Decoding of raw reference data into typed, frozen catalogs
 *
 * Used for the bundled JSON resources and for catalog directories loaded
 * at run time. The allele trees are copied while they are checked, so the
 * catalogs never share structure with the parsed JSON.
 */

import { type } from "arktype";
import { CatalogError } from "../errors";
import {
  AaSequenceCatalogSchema,
  GeneCatalogShapeSchema,
  isFunctionalityLabel,
  SynonymTableSchema,
} from "../types";
import type {
  AaSequenceCatalog,
  AlleleNode,
  FamilyCatalogInput,
  GeneCatalog,
  GeneFamily,
  SynonymTable,
} from "../types";

/**
 * Raw, undecoded catalogs for one family
 */
export interface RawFamilyCatalog {
  readonly genes: unknown;
  readonly synonyms?: unknown;
  readonly sequences?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAlleleNode(
  value: unknown,
  path: string,
  source: string,
  requireLabels: boolean
): AlleleNode {
  if (typeof value === "string") {
    if (requireLabels && !isFunctionalityLabel(value)) {
      throw new CatalogError(
        `Unknown functionality label "${value}" at ${path}`,
        source,
        "Leaves must be one of F, ORF, P"
      );
    }
    return value;
  }

  if (isRecord(value)) {
    const branch: Record<string, AlleleNode> = {};
    for (const [field, child] of Object.entries(value)) {
      branch[field] = toAlleleNode(child, `${path}*${field}`, source, requireLabels);
    }
    return Object.freeze(branch);
  }

  throw new CatalogError(`Invalid allele designation at ${path}`, source);
}

/**
 * Decode a gene catalog; TR and IG leaves must be functionality labels
 */
export function decodeGeneCatalog(data: unknown, source: string, requireLabels: boolean): GeneCatalog {
  const shape = GeneCatalogShapeSchema(data);
  if (shape instanceof type.errors) {
    throw new CatalogError(`Invalid gene catalog: ${shape.summary}`, source);
  }

  const catalog: Record<string, AlleleNode> = {};
  for (const [gene, node] of Object.entries(shape)) {
    catalog[gene] = toAlleleNode(node, gene, source, requireLabels);
  }
  return Object.freeze(catalog);
}

export function decodeSynonymTable(data: unknown, source: string): SynonymTable {
  const table = SynonymTableSchema(data);
  if (table instanceof type.errors) {
    throw new CatalogError(`Invalid synonym table: ${table.summary}`, source);
  }
  return Object.freeze({ ...table });
}

export function decodeSequenceCatalog(data: unknown, source: string): AaSequenceCatalog {
  const catalog = AaSequenceCatalogSchema(data);
  if (catalog instanceof type.errors) {
    throw new CatalogError(`Invalid amino-acid sequence catalog: ${catalog.summary}`, source);
  }

  const frozen: Record<string, Readonly<Record<string, string>>> = {};
  for (const [symbol, regions] of Object.entries(catalog)) {
    frozen[symbol] = Object.freeze({ ...regions });
  }
  return Object.freeze(frozen);
}

/**
 * Decode every catalog of one family
 */
export function decodeFamilyCatalog(
  family: GeneFamily,
  raw: RawFamilyCatalog,
  source: string
): FamilyCatalogInput {
  return {
    genes: decodeGeneCatalog(raw.genes, `${source}/${family}-genes`, family !== "mh"),
    synonyms:
      raw.synonyms === undefined
        ? undefined
        : decodeSynonymTable(raw.synonyms, `${source}/${family}-synonyms`),
    sequences:
      raw.sequences === undefined
        ? undefined
        : decodeSequenceCatalog(raw.sequences, `${source}/${family}-aa-sequences`),
  };
}
