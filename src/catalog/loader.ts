/**
 * Reference catalogs read from a directory at run time
 *
 * The directory mirrors the bundled resources: one subdirectory per
 * species key, holding `<family>-genes.json` and, optionally,
 * `<family>-synonyms.json` and `<family>-aa-sequences.json`. A family is
 * loaded only when its genes file exists.
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CatalogError } from "../errors";
import type { FamilyCatalogInput, GeneFamily } from "../types";
import { GENE_FAMILIES } from "../types";
import { ReferenceContext } from "./context";
import { decodeFamilyCatalog } from "./decode";

const JsonDocument = type("string.json.parse");

/**
 * Read and parse one JSON file, or yield undefined when it does not exist
 */
const readOptionalJson = (
  fs: FileSystem.FileSystem,
  file: string
): Effect.Effect<unknown, CatalogError> =>
  Effect.gen(function* () {
    const present = yield* fs.exists(file);
    if (!present) {
      return undefined;
    }

    const text = yield* fs.readFileString(file);
    const parsed = JsonDocument(text);
    if (parsed instanceof type.errors) {
      return yield* Effect.fail(new CatalogError(`Malformed JSON: ${parsed.summary}`, file));
    }
    return parsed;
  }).pipe(
    Effect.mapError((error) =>
      error instanceof CatalogError ? error : CatalogError.fromSystemError(file, error)
    )
  );

const readFamily = (
  fs: FileSystem.FileSystem,
  path: Path.Path,
  speciesDirectory: string,
  family: GeneFamily
): Effect.Effect<FamilyCatalogInput | undefined, CatalogError> =>
  Effect.gen(function* () {
    const file = (suffix: string) => path.join(speciesDirectory, `${family}-${suffix}.json`);

    const genes = yield* readOptionalJson(fs, file("genes"));
    if (genes === undefined) {
      return undefined;
    }
    const synonyms = yield* readOptionalJson(fs, file("synonyms"));
    const sequences = yield* readOptionalJson(fs, file("aa-sequences"));

    return yield* Effect.try({
      try: () => decodeFamilyCatalog(family, { genes, synonyms, sequences }, speciesDirectory),
      catch: (error) =>
        error instanceof CatalogError ? error : CatalogError.fromSystemError(speciesDirectory, error),
    });
  });

/**
 * Build a reference context from a catalog directory
 */
export const readCatalogDirectory = (
  directory: string
): Effect.Effect<ReferenceContext, CatalogError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const entries = yield* fs
      .readDirectory(directory)
      .pipe(Effect.mapError((error) => CatalogError.fromSystemError(directory, error)));

    const input: Record<string, Partial<Record<GeneFamily, FamilyCatalogInput>>> = {};
    for (const entry of [...entries].sort()) {
      const speciesDirectory = path.join(directory, entry);
      const info = yield* fs
        .stat(speciesDirectory)
        .pipe(Effect.mapError((error) => CatalogError.fromSystemError(speciesDirectory, error)));
      if (info.type !== "Directory") {
        continue;
      }

      const families: Partial<Record<GeneFamily, FamilyCatalogInput>> = {};
      for (const family of GENE_FAMILIES) {
        const catalog = yield* readFamily(fs, path, speciesDirectory, family);
        if (catalog !== undefined) {
          families[family] = catalog;
        }
      }
      if (Object.keys(families).length > 0) {
        input[entry.toLowerCase()] = families;
      }
    }

    if (Object.keys(input).length === 0) {
      return yield* Effect.fail(
        new CatalogError(
          "No reference catalogs found",
          directory,
          "Expected <species>/<family>-genes.json files"
        )
      );
    }

    return new ReferenceContext(input);
  });
