/**
 * Compression format detection for CSV files
 *
 * A file is treated as gzip when its name says so or its first bytes carry
 * the gzip magic number.
 */

import type { CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("/data/orders.csv.gz"); // "gzip"
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])); // "gzip"
 * ```
 */
export const CompressionDetector = {
  fromExtension(filePath: string): CompressionFormat {
    const lower = filePath.toLowerCase();
    return GZIP_EXTENSIONS.some((extension) => lower.endsWith(extension)) ? "gzip" : "none";
  },

  fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    return bytes.length >= 2 &&
      bytes[0] === GZIP_MAGIC_FIRST_BYTE &&
      bytes[1] === GZIP_MAGIC_SECOND_BYTE
      ? "gzip"
      : "none";
  },

  /**
   * Magic bytes win when present; otherwise the extension decides
   */
  detect(filePath: string, bytes?: Uint8Array): CompressionFormat {
    if (bytes !== undefined && bytes.length >= 2) {
      return CompressionDetector.fromMagicBytes(bytes);
    }
    return CompressionDetector.fromExtension(filePath);
  },
} as const;
