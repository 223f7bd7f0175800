/**
 * Error handling for nomenclature resolution
 *
 * Only programming errors and broken reference data are raised. A symbol
 * or junction that cannot be resolved is reported through its result
 * object instead.
 */

/**
 * Base error class for all nomenclature-related errors
 */
export class NomenclatureError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "NomenclatureError";
  }

  /**
   * Render the message together with its context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Malformed caller arguments: wrong value types, disallowed enum values
 */
export class ValidationError extends NomenclatureError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Reference data that cannot be read or does not match the catalog schemas
 */
export class CatalogError extends NomenclatureError {
  constructor(
    message: string,
    public readonly source: string,
    context?: string
  ) {
    super(message, "CATALOG_ERROR", context);
    this.name = "CatalogError";
  }

  /**
   * Wrap a failure raised while reading or decoding a catalog file
   */
  static fromSystemError(source: string, systemError: unknown): CatalogError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    return new CatalogError(
      `Failed to load reference catalog: ${errorMessage}`,
      source,
      `System error: ${errorMessage}`
    );
  }

  override toString(): string {
    return `${super.toString()}\nSource: ${this.source}`;
  }
}

/**
 * No catalog is loaded for the requested species and gene family
 */
export class UnsupportedSpeciesError extends NomenclatureError {
  constructor(
    public readonly species: string,
    public readonly family: string,
    context?: string
  ) {
    super(`Unsupported species "${species}" for ${family.toUpperCase()} genes`, "UNSUPPORTED_SPECIES", context);
    this.name = "UnsupportedSpeciesError";
  }
}

/**
 * A lookup-only operation was asked for a symbol the catalog does not hold
 */
export class UnknownSymbolError extends NomenclatureError {
  constructor(
    public readonly symbol: string,
    context?: string
  ) {
    super(`No data for ${symbol}`, "UNKNOWN_SYMBOL", context);
    this.name = "UnknownSymbolError";
  }
}

