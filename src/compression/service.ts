/**
 * Compression service for Effect-based dependency injection
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const svc = yield* CompressionService;
 *   return yield* svc.compress(data, "gzip");
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { compress as compressGzip, decompress as decompressGzip, type GzipLevel } from "./gzip";

export interface CompressionServiceShape {
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: GzipLevel
  ) => Effect.Effect<Uint8Array, CompressionError>;

  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

function toCompressionError(operation: CompressionError["operation"]) {
  return (error: unknown): CompressionError =>
    error instanceof CompressionError ? error : CompressionError.fromSystemError(operation, error);
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.try({
            try: () => compressGzip(data, level),
            catch: toCompressionError("compress"),
          }),

    decompress: (data, format) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.try({
            try: () => decompressGzip(data),
            catch: toCompressionError("decompress"),
          }),
  };
}

export class CompressionService extends Context.Tag("scalar-csv/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}
