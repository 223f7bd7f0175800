/**
 * Core type definitions for immune-receptor nomenclature
 *
 * Reference catalogs are plain nested records, so they can be shipped as
 * JSON and validated at load time. Everything here is read-only once
 * constructed.
 */

import { type } from "arktype";

// =============================================================================
// ENUMERATIONS
// =============================================================================

/**
 * Species keys with bundled reference data
 */
export const Species = {
  HOMO_SAPIENS: "homosapiens",
  MUS_MUSCULUS: "musmusculus",
} as const;

export type BundledSpecies = (typeof Species)[keyof typeof Species];

/**
 * Pseudo-species that tries every species holding a catalog for the family
 */
export const ANY_SPECIES = "any";

/**
 * Gene families handled by the resolution engine
 */
export const GeneFamily = {
  TR: "tr",
  IG: "ig",
  MH: "mh",
} as const;

export type GeneFamily = (typeof GeneFamily)[keyof typeof GeneFamily];

export const GENE_FAMILIES: readonly GeneFamily[] = [GeneFamily.TR, GeneFamily.IG, GeneFamily.MH];

/**
 * Specificity levels a resolved symbol can be rendered at
 */
export const Precision = {
  SUBGROUP: "subgroup",
  GENE: "gene",
  PROTEIN: "protein",
  ALLELE: "allele",
} as const;

export type Precision = (typeof Precision)[keyof typeof Precision];

/**
 * Functionality labels found at the leaves of TR and IG catalogs
 */
export type FunctionalityLabel = "F" | "ORF" | "P";

/**
 * Functionality filters accepted by catalog queries ("NF" is ORF or P)
 */
export const FunctionalityFilter = {
  ANY: "any",
  FUNCTIONAL: "F",
  NON_FUNCTIONAL: "NF",
  PSEUDOGENE: "P",
  ORF: "ORF",
} as const;

export type FunctionalityFilter = (typeof FunctionalityFilter)[keyof typeof FunctionalityFilter];

/**
 * Receptor loci accepted by junction standardization
 */
export const Locus = {
  TRA: "TRA",
  TRB: "TRB",
  TRG: "TRG",
  TRD: "TRD",
  TR: "TR",
  IGH: "IGH",
  IGK: "IGK",
  IGL: "IGL",
  IG: "IG",
} as const;

export type Locus = (typeof Locus)[keyof typeof Locus];

// =============================================================================
// CATALOG STRUCTURES
// =============================================================================

/**
 * One node of an allele-designation tree: a leaf label or a further level
 * of designation fields
 */
export type AlleleNode = string | AlleleBranch;

export interface AlleleBranch {
  readonly [field: string]: AlleleNode;
}

/**
 * Gene name to allele-designation tree
 */
export type GeneCatalog = Readonly<Record<string, AlleleNode>>;

/**
 * Deprecated or alternate symbol to current gene name
 */
export type SynonymTable = Readonly<Record<string, string>>;

/**
 * Region name (FR3-IMGT, J-REGION, J-MOTIF, ...) to amino-acid string
 */
export type RegionSequences = Readonly<Record<string, string>>;

/**
 * Allele symbol to its region sequences
 */
export type AaSequenceCatalog = Readonly<Record<string, RegionSequences>>;

/**
 * Raw catalogs for one gene family of one species
 */
export interface FamilyCatalogInput {
  readonly genes: GeneCatalog;
  readonly synonyms?: SynonymTable;
  readonly sequences?: AaSequenceCatalog;
}

/**
 * Raw catalogs for every family of every species
 */
export type ReferenceCatalogInput = Readonly<
  Record<string, Partial<Record<GeneFamily, FamilyCatalogInput>>>
>;

/**
 * Candidate gene name plus ordered allele-designation fields
 */
export interface ParsedSymbol {
  readonly gene: string;
  readonly allele: readonly string[];
}

// =============================================================================
// SCHEMAS
// =============================================================================

export const SynonymTableSchema = type({ "[string]": "string" });

export const RegionSequencesSchema = type({ "[string]": "string" });

export const AaSequenceCatalogSchema = type({ "[string]": RegionSequencesSchema });

/**
 * Top level of a gene catalog; leaves are checked while the tree is copied
 */
export const GeneCatalogShapeSchema = type({ "[string]": "string | object" });

export const FunctionalityLabelSchema = type("'F' | 'ORF' | 'P'");

export const GeneFamilySchema = type("'tr' | 'ig' | 'mh'");

export const PrecisionSchema = type("'subgroup' | 'gene' | 'protein' | 'allele'");

export const FunctionalityFilterSchema = type("'any' | 'F' | 'NF' | 'P' | 'ORF'");

export const LocusSchema = type("'TRA' | 'TRB' | 'TRG' | 'TRD' | 'TR' | 'IGH' | 'IGK' | 'IGL' | 'IG'");

/**
 * Look up a key without falling through to the prototype chain
 */
export function lookup<V>(record: Readonly<Record<string, V>>, key: string): V | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function isBranch(node: AlleleNode | undefined): node is AlleleBranch {
  return typeof node === "object";
}

export function isFunctionalityLabel(value: string): value is FunctionalityLabel {
  return value === "F" || value === "ORF" || value === "P";
}
