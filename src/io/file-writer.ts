/**
 * Writing CSV files through the Effect platform FileSystem
 *
 * Rows are encoded into an in-memory sink acquired with
 * `Effect.acquireUseRelease`, so the sink is closed whether encoding succeeds
 * or fails, then optionally gzip compressed and written in one go.
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector } from "../compression/detector";
import { CompressionService } from "../compression/service";
import { ConfigurationError, FileError } from "../errors";
import { MemorySink } from "../writer/sink";
import type { WriterOptions } from "../writer/types";
import { CSVWriter } from "../writer/writer";
import { runFileProgram } from "./runtime";
import { type CSVFileWriteOptions, FileOptionsSchema } from "./types";

/**
 * Encode rows to bytes with a scoped in-memory sink
 */
export function encodeRows(
  rows: Iterable<Iterable<string>>,
  options: WriterOptions
): Effect.Effect<Uint8Array, unknown> {
  return Effect.acquireUseRelease(
    Effect.sync(() => new MemorySink().open()),
    (sink) =>
      Effect.try({
        try: () => {
          new CSVWriter(sink, options).writeRows(rows);
          return sink.toUint8Array();
        },
        catch: (error) => error,
      }),
    (sink) => Effect.sync(() => sink.close())
  );
}

/**
 * Write rows to a CSV file, gzip compressing `.gz` paths
 *
 * @example
 * ```typescript
 * await writeCSVFile("out/orders.csv.gz", rows, { headers: ["id", "total"] });
 * ```
 *
 * @throws {ConfigurationError} For invalid options
 * @throws {FileError} If the file or its directory cannot be written
 * @throws {CompressionError} If compression fails
 */
export async function writeCSVFile(
  filePath: string,
  rows: Iterable<Iterable<string>>,
  options: CSVFileWriteOptions = {}
): Promise<void> {
  const validation = FileOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid file options: ${validation.summary}`, "options");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const compressionService = yield* CompressionService;

    const encoded = yield* encodeRows(rows, options);
    const format = options.compression ?? CompressionDetector.fromExtension(filePath);
    const data = yield* compressionService.compress(encoded, format, options.compressionLevel);

    if (options.createDirectories ?? true) {
      const parentDir = pathService.dirname(filePath);
      yield* fs
        .makeDirectory(parentDir, { recursive: true })
        .pipe(Effect.mapError((error) => FileError.fromSystemError("write", parentDir, error)));
    }

    yield* fs
      .writeFile(filePath, data)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", filePath, error)));
  });

  await runFileProgram(program);
}
