/**
 * Reader Constants
 *
 * Default delimiters, inference limits and candidate sets.
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * The quote character (RFC 4180): encapsulates fields and escapes itself when doubled
 */
export const QUOTE_SCALAR = 0x22;

/**
 * Delimiters used when the caller does not mention them
 */
export const DEFAULT_DELIMITERS = {
  field: ",",
  row: "\n",
} as const;

/**
 * Field delimiter candidates, in tie-break order
 */
export const FIELD_DELIMITER_CANDIDATES = [",", ";", "\t", "|"] as const;

/**
 * Row delimiter candidates, in tie-break order (CRLF before its parts)
 */
export const ROW_DELIMITER_CANDIDATES = ["\r\n", "\n", "\r"] as const;

/**
 * Maximum number of code points read ahead for inference
 */
export const MAX_INFERENCE_SCALARS = 16_384;

/**
 * Maximum number of rows sampled for inference
 */
export const MAX_INFERENCE_ROWS = 16;

/**
 * Rows required before any inference is attempted
 */
export const MIN_INFERENCE_ROWS = 2;

/**
 * Score ratio under which an inferred delimiter is reported as ambiguous
 */
export const AMBIGUOUS_SCORE_RATIO = 0.9;

/**
 * Whitespace trimmed under the `whitespaces` trim strategy (Unicode Zs plus tab)
 */
export const WHITESPACE_SCALARS: readonly number[] = [
  0x09, 0x20, 0xa0, 0x1680, 0x2000, 0x2001, 0x2002, 0x2003, 0x2004, 0x2005, 0x2006, 0x2007,
  0x2008, 0x2009, 0x200a, 0x202f, 0x205f, 0x3000,
];

/**
 * Largest number of code points converted to a string in one call
 */
export const STRING_CHUNK_SIZE = 8192;
