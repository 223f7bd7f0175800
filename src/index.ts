/**
 * receptor-nomenclature - standardization of immune-receptor gene symbols
 * and junction sequences
 *
 * Resolves messy TR, IG and MH/HLA gene and allele symbols to their
 * current names, and repairs CDR3 junctions against reference V and J
 * segments.
 */

// Catalogs and reference context
export { getBundledContext } from "./catalog/bundled";
export {
  createReferenceContext,
  type FamilyCatalog,
  ReferenceContext,
  subgroupOf,
} from "./catalog/context";
export { decodeFamilyCatalog, type RawFamilyCatalog } from "./catalog/decode";
export { readCatalogDirectory } from "./catalog/loader";
export { hasFunctionalLeaf, isValid, walkAlleleTree } from "./catalog/oracle";
export { loadReferenceContext, ReferenceCatalogs } from "./catalog/service";
// Logging and validation
export type { FailureLogger, LogSettings } from "./core/logging";
// Error types
export {
  CatalogError,
  NomenclatureError,
  UnknownSymbolError,
  UnsupportedSpeciesError,
  ValidationError,
} from "./errors";
// Junction standardization
export {
  DEFAULT_STANDARDIZE_JUNCTION_OPTIONS,
  type StandardizeJunctionOptions,
  standardizeJunction,
} from "./junction/standardize";
// Results
export {
  JunctionStandardizationResult,
  type JunctionResultInit,
  type PrecisionLevels,
  SymbolStandardizationResult,
  type SymbolResultInit,
} from "./results";
export { compileSymbol } from "./symbols/compiler";
export { type QueryOptions, query } from "./symbols/query";
export { type AminoAcidSequenceOptions, getAminoAcidSequence } from "./symbols/sequences";
// Symbol standardization
export {
  DEFAULT_STANDARDIZE_SYMBOL_OPTIONS,
  type StandardizeSymbolOptions,
  standardizeSymbol,
} from "./symbols/standardize";
// Core types
export {
  type AaSequenceCatalog,
  type AlleleBranch,
  type AlleleNode,
  ANY_SPECIES,
  FunctionalityFilter,
  type FunctionalityLabel,
  GeneFamily,
  type GeneCatalog,
  Locus,
  type ParsedSymbol,
  Precision,
  type ReferenceCatalogInput,
  type RegionSequences,
  Species,
  type SynonymTable,
} from "./types";
