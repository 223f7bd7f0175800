/**
 * Shared option validation for the public operations
 *
 * Every public entry point accepts a loosely typed options object from
 * callers that may not be using TypeScript. The arktype schema checks
 * structure and enum membership, then custom validators check the rules a
 * schema cannot express. Failures are programming errors and are thrown
 * as ValidationError immediately.
 */

import { type } from "arktype";
import type { ArkErrors } from "arktype";
import { NomenclatureError, ValidationError } from "../errors";

/**
 * Domain-specific validation beyond the schema
 */
export type CustomValidator<T> = (options: T) => void;

/**
 * Creates a reusable validation function for operation options
 *
 * @example
 * ```typescript
 * const validateQueryOptions = createOptionsValidator(
 *   type({ family: "'tr' | 'ig' | 'mh'", "pattern?": "string | RegExp | undefined" }),
 *   [CommonValidators.compilablePattern],
 * );
 *
 * const options = validateQueryOptions(input);
 * ```
 */
export function createOptionsValidator<T>(
  schema: (options: unknown) => T | ArkErrors,
  customValidators: readonly CustomValidator<NoInfer<T>>[] = []
): (options: unknown) => T {
  return (options: unknown): T => {
    const validated = schema(options);
    if (validated instanceof type.errors) {
      throw new ValidationError(
        `Invalid options: ${validated.summary}`,
        "Review the options structure and types"
      );
    }

    for (const validator of customValidators) {
      try {
        validator(validated);
      } catch (error) {
        if (error instanceof NomenclatureError) {
          throw error;
        }
        throw new ValidationError(
          error instanceof Error ? error.message : "Unknown validation error",
          "Custom validation failed"
        );
      }
    }

    return validated;
  };
}

/**
 * Validation rules shared by several operations
 */
export const CommonValidators = {
  /**
   * String patterns must compile as regular expressions
   */
  compilablePattern: <T extends { pattern?: string | RegExp | undefined }>(options: T): void => {
    if (typeof options.pattern === "string") {
      try {
        new RegExp(options.pattern);
      } catch (error) {
        throw new ValidationError(
          `Invalid pattern: ${options.pattern}`,
          error instanceof Error ? error.message : undefined
        );
      }
    }
  },

  /**
   * Alignment thresholds must be non-negative integers
   */
  nonNegativeIntegers:
    <T extends Record<string, unknown>>(fields: readonly (keyof T)[]) =>
    (options: T): void => {
      for (const field of fields) {
        const value = options[field];
        if (typeof value === "number" && (value < 0 || !Number.isInteger(value))) {
          throw new Error(`${String(field)} must be a non-negative integer, got: ${value}`);
        }
      }
    },
};
