/**
 * Effect service providing the reference context
 *
 * Programs written with Effect ask for `ReferenceCatalogs` and pick the
 * source of their catalogs when they provide a layer:
 *
 * - `ReferenceCatalogs.Bundled` - the catalogs shipped with the package
 * - `ReferenceCatalogs.fromDirectory(path)` - catalogs read from disk
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const context = yield* ReferenceCatalogs;
 *   return standardizeSymbol("TRBV20OR9-2", { context });
 * });
 *
 * Effect.runSync(program.pipe(Effect.provide(ReferenceCatalogs.Bundled)));
 * ```
 */

import type { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Context, Effect, Either, Layer } from "effect";
import type { CatalogError } from "../errors";
import { getBundledContext } from "./bundled";
import type { ReferenceContext } from "./context";
import { readCatalogDirectory } from "./loader";

export class ReferenceCatalogs extends Context.Tag("@receptor-nomenclature/ReferenceCatalogs")<
  ReferenceCatalogs,
  ReferenceContext
>() {
  /**
   * Catalogs shipped with the package, decoded on first use
   */
  static readonly Bundled: Layer.Layer<ReferenceCatalogs> = Layer.sync(
    ReferenceCatalogs,
    getBundledContext
  );

  /**
   * Catalogs read from a directory laid out like the bundled resources
   */
  static fromDirectory(
    directory: string
  ): Layer.Layer<ReferenceCatalogs, CatalogError, FileSystem.FileSystem | Path.Path> {
    return Layer.effect(ReferenceCatalogs, readCatalogDirectory(directory));
  }
}

/**
 * Load a reference context from a directory using the Node.js platform
 *
 * @throws {CatalogError} If the directory cannot be read or holds invalid data
 */
export async function loadReferenceContext(directory: string): Promise<ReferenceContext> {
  const program = Effect.gen(function* () {
    return yield* ReferenceCatalogs;
  });

  const result = await Effect.runPromise(
    program.pipe(
      Effect.provide(ReferenceCatalogs.fromDirectory(directory)),
      Effect.provide(NodeContext.layer),
      Effect.either
    )
  );

  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
