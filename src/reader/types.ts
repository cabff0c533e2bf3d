/**
 * Reader Type Definitions
 *
 * Options, resolved configuration and parser states of the CSV reader.
 */

import type {
  CodePoint,
  DelimiterPair,
  HeaderStrategy,
  TextEncodingName,
  TrimStrategy,
  WarningHandler,
} from "../types";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Anything the reader can pull code points from
 *
 * Byte input is decoded with the `encoding` option (or its byte order mark).
 */
export type ScalarInput = string | Uint8Array | Iterable<CodePoint>;

/**
 * Reader options as given by the caller
 *
 * A delimiter set to `null` is inferred from the input; one left out takes the
 * default (`,` for fields, `\n` for rows).
 */
export interface ReaderOptions {
  delimiters?: {
    field?: string | null;
    row?: string | null;
  };
  header?: HeaderStrategy;
  trim?: TrimStrategy;
  encoding?: TextEncodingName;
  onWarning?: WarningHandler;
}

/**
 * Immutable reader settings, resolved once per parse session
 */
export interface ReaderConfiguration {
  readonly delimiters: DelimiterPair;
  readonly hasHeader: boolean;
  readonly trimScalars: ReadonlySet<CodePoint> | null;
  readonly quoteScalar: CodePoint;
}

/**
 * Row/field parser states
 */
export enum RowParseState {
  BETWEEN_ROWS,
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  AFTER_CLOSING_QUOTE,
  ROW_COMPLETE,
  END_OF_INPUT,
}

/**
 * Whole-input parse result
 */
export interface CSVResult {
  headers: string[];
  rows: string[][];
}
