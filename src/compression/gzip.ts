/**
 * Gzip compression and decompression of whole CSV files, backed by fflate
 */

import { type GzipOptions, gunzipSync, gzipSync } from "fflate";
import { CompressionError } from "../errors";
import { CompressionDetector } from "./detector";

export type GzipLevel = NonNullable<GzipOptions["level"]>;

export const DEFAULT_GZIP_LEVEL: GzipLevel = 6;

/**
 * @throws {CompressionError} If fflate rejects the input
 */
export function compress(data: Uint8Array, level: GzipLevel = DEFAULT_GZIP_LEVEL): Uint8Array {
  try {
    return gzipSync(data, { level });
  } catch (error) {
    throw CompressionError.fromSystemError("compress", error, 0);
  }
}

/**
 * @throws {CompressionError} On empty input, missing magic bytes or a corrupt stream
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "decompress", 0);
  }
  if (CompressionDetector.fromMagicBytes(compressed) !== "gzip") {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "decompress",
      0
    );
  }

  try {
    return gunzipSync(compressed);
  } catch (error) {
    throw CompressionError.fromSystemError("decompress", error, compressed.length);
  }
}
