/**
 * Shared type definitions for the CSV codec
 *
 * Reader-, decoder- and writer-specific option interfaces live next to their
 * modules; this file holds the vocabulary they share.
 */

// =============================================================================
// CORE TYPES
// =============================================================================

/**
 * A Unicode code point, the atomic symbol the parser reads one at a time
 */
export type CodePoint = number;

/**
 * Resolved field and row delimiters as code point sequences
 *
 * Invariant: neither is empty and they differ.
 */
export interface DelimiterPair {
  readonly field: readonly CodePoint[];
  readonly row: readonly CodePoint[];
}

/**
 * A parsed row: its fields in column order plus its 0-based position
 */
export interface Row {
  readonly index: number;
  readonly fields: readonly string[];
}

/**
 * Header presence: known absent, known present, or to be inferred
 */
export type HeaderStrategy = "none" | "firstLine" | "unknown";

/**
 * Characters trimmed from both ends of unquoted fields
 */
export type TrimStrategy = "none" | "whitespaces" | { readonly characters: string };

/**
 * Row retention policy of the decoding buffer
 */
export type BufferingStrategy = "keepAll" | "sequential";

/**
 * Text encodings the scalar encoder factory can produce
 */
export type TextEncodingName =
  | "ascii"
  | "utf8"
  | "utf16"
  | "utf16be"
  | "utf16le"
  | "utf32"
  | "utf32be"
  | "utf32le"
  | "shiftjis";

/**
 * When to emit a byte order mark ahead of the encoded content
 *
 * - `convention`: only for `utf16`/`utf32`, whose byte order is otherwise unstated
 * - `always`: for every Unicode encoding
 * - `never`: no byte order mark
 */
export type BOMStrategy = "convention" | "always" | "never";

/**
 * Lifecycle state of a byte sink
 */
export type SinkStatus = "notOpen" | "open" | "closed" | "error";

/**
 * Compression applied to CSV files on disk
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Warning callback used for non-fatal diagnostics
 */
export type WarningHandler = (warning: string, rowIndex?: number) => void;

/**
 * Default warning handler
 */
export const defaultWarningHandler: WarningHandler = (warning, rowIndex) => {
  const where = rowIndex === undefined ? "" : ` (row ${rowIndex})`;
  console.warn(`CSV Warning${where}: ${warning}`);
};
