/**
 * Read-only outcomes of symbol and junction standardization
 *
 * A failed standardization is a normal result, not an exception: the
 * result carries the reason and, where one exists, the best attempted fix.
 */

import type { GeneFamily, Precision } from "./types";

/**
 * Renderings of a resolved symbol, one per precision it reached
 */
export type PrecisionLevels = Readonly<Partial<Record<Precision, string>>>;

export interface SymbolResultInit {
  readonly originalInput: string;
  readonly species: string;
  readonly family: GeneFamily;
  readonly error?: string | undefined;
  readonly attemptedFix?: string | undefined;
  readonly levels?: PrecisionLevels;
}

export class SymbolStandardizationResult {
  readonly originalInput: string;
  readonly species: string;
  readonly family: GeneFamily;
  readonly error: string | undefined;
  private readonly fix: string | undefined;
  private readonly levels: PrecisionLevels;

  constructor(init: SymbolResultInit) {
    this.originalInput = init.originalInput;
    this.species = init.species;
    this.family = init.family;
    this.error = init.error;
    this.fix = init.attemptedFix;
    this.levels = init.error === undefined ? Object.freeze({ ...init.levels }) : {};
    Object.freeze(this);
  }

  get success(): boolean {
    return this.error === undefined;
  }

  get failed(): boolean {
    return !this.success;
  }

  /**
   * Best attempt at fixing a symbol that failed; undefined on success
   */
  get attemptedFix(): string | undefined {
    return this.failed ? this.fix : undefined;
  }

  get subgroup(): string | undefined {
    return this.levels.subgroup;
  }

  get gene(): string | undefined {
    return this.levels.gene;
  }

  get protein(): string | undefined {
    return this.levels.protein;
  }

  get allele(): string | undefined {
    return this.levels.allele;
  }

  /**
   * The most specific rendering reached: allele, else gene, else subgroup
   */
  get highestPrecision(): string | undefined {
    return this.allele ?? this.gene ?? this.subgroup;
  }

  toString(): string {
    return this.success
      ? `${this.originalInput} -> ${this.highestPrecision ?? ""}`
      : `${this.originalInput} failed (${this.error ?? ""})`;
  }
}

// =============================================================================
// JUNCTION
// =============================================================================

export interface JunctionResultInit {
  readonly originalInput: string;
  readonly error?: string | undefined;
  /** The sequence as corrected so far, whether or not correction succeeded */
  readonly correctedJunction?: string | undefined;
}

export class JunctionStandardizationResult {
  readonly originalInput: string;
  readonly error: string | undefined;
  readonly correctedJunction: string | undefined;

  constructor(init: JunctionResultInit) {
    this.originalInput = init.originalInput;
    this.error = init.error;
    this.correctedJunction = init.correctedJunction;
    Object.freeze(this);
  }

  get success(): boolean {
    return this.error === undefined;
  }

  get failed(): boolean {
    return !this.success;
  }

  /**
   * The junction, conserved cysteine and trailing anchor included
   */
  get junction(): string | undefined {
    return this.success ? this.correctedJunction : undefined;
  }

  /**
   * The junction without its two conserved terminal residues
   */
  get cdr3(): string | undefined {
    const junction = this.junction;
    return junction !== undefined && junction.length > 2 ? junction.slice(1, -1) : undefined;
  }

  get attemptedFix(): string | undefined {
    return this.failed ? this.correctedJunction : undefined;
  }

  toString(): string {
    return this.success
      ? `${this.originalInput} -> ${this.junction ?? ""}`
      : `${this.originalInput} failed (${this.error ?? ""})`;
  }
}
