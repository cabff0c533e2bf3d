/**
 * Effect runtime wiring for file operations
 *
 * File programs run against the Node platform layer (FileSystem, Path) and the
 * gzip compression service. Failures come back as the codec's own error
 * classes rather than wrapped fiber failures.
 */

import type { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either, Layer } from "effect";
import { CompressionService } from "../compression/service";

export type FileProgramContext = FileSystem.FileSystem | Path.Path | CompressionService;

/**
 * Platform layer providing every service a file program may require
 */
export function getPlatform(): Layer.Layer<FileProgramContext> {
  return Layer.merge(NodeContext.layer, CompressionService.Live);
}

/**
 * Run a file program, rejecting with its typed failure
 */
export async function runFileProgram<A, E>(
  program: Effect.Effect<A, E, FileProgramContext>
): Promise<A> {
  const result = await Effect.runPromise(
    program.pipe(Effect.provide(getPlatform()), Effect.either)
  );
  if (Either.isLeft(result)) throw result.left;
  return result.right;
}
