/**
 * Reading CSV files through the Effect platform FileSystem
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector } from "../compression/detector";
import { CompressionService } from "../compression/service";
import { type CompressionError, ConfigurationError, FileError } from "../errors";
import { CSVReader } from "../reader/reader";
import type { CSVResult } from "../reader/types";
import { runFileProgram } from "./runtime";
import { type CSVFileReadOptions, FileOptionsSchema } from "./types";

/**
 * Read a file's raw bytes, decompressing gzip content
 *
 * Fails with a FileError when the file cannot be read and a CompressionError
 * when gzip content is corrupt.
 */
export function readBytes(
  filePath: string,
  compression?: CSVFileReadOptions["compression"]
): Effect.Effect<
  Uint8Array,
  FileError | CompressionError,
  FileSystem.FileSystem | CompressionService
> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compressionService = yield* CompressionService;

    const bytes = yield* fs
      .readFile(filePath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", filePath, error)));

    const format = compression ?? CompressionDetector.detect(filePath, bytes);
    return yield* compressionService.decompress(bytes, format);
  });
}

/**
 * Read and parse a whole CSV file
 *
 * @example
 * ```typescript
 * const { headers, rows } = await readCSVFile("orders.csv.gz", { header: "firstLine" });
 * ```
 */
export async function readCSVFile(
  filePath: string,
  options: CSVFileReadOptions = {}
): Promise<CSVResult> {
  const validation = FileOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid file options: ${validation.summary}`, "options");
  }

  const { compression, ...readerOptions } = options;
  const program = Effect.gen(function* () {
    const data = yield* readBytes(filePath, compression);
    return yield* Effect.try({
      try: () => CSVReader.parse(data, readerOptions),
      catch: (error) => error,
    });
  });

  return runFileProgram(program);
}
