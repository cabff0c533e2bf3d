/**
 * File I/O options and their ArkType schema
 */

import { type } from "arktype";
import type { GzipLevel } from "../compression/gzip";
import type { ReaderOptions } from "../reader/types";
import type { CompressionFormat } from "../types";
import type { WriterOptions } from "../writer/types";

export interface CSVFileReadOptions extends ReaderOptions {
  /** Detected from magic bytes (then the file name) when left out */
  compression?: CompressionFormat;
}

export interface CSVFileWriteOptions extends WriterOptions {
  /** Detected from the file name when left out */
  compression?: CompressionFormat;
  compressionLevel?: GzipLevel;
  /** Create missing parent directories (default: true) */
  createDirectories?: boolean;
}

export const FileOptionsSchema = type({
  "compression?": "'gzip'|'none'",
  "compressionLevel?": "0 <= number.integer <= 9",
  "createDirectories?": "boolean",
});
