/**
 * @module reader
 * @description Streaming CSV reader with delimiter and header inference
 *
 * @example Inferring the dialect
 * ```typescript
 * import { CSVReader } from './reader';
 *
 * const { headers, rows } = CSVReader.parse("a;b\r\n1;2\r\n", {
 *   delimiters: { field: null, row: null },
 *   header: "unknown",
 * });
 * ```
 */

export { resolveConfiguration, resolveDelimiters, resolveTrimScalars } from "./configuration";
export {
  DEFAULT_DELIMITERS,
  FIELD_DELIMITER_CANDIDATES,
  MAX_INFERENCE_ROWS,
  MAX_INFERENCE_SCALARS,
  QUOTE_SCALAR,
  ROW_DELIMITER_CANDIDATES,
} from "./constants";
export {
  inferDelimiters,
  inferFieldDelimiter,
  inferHeaderStatus,
  inferRowDelimiter,
  isNumericLike,
  looksLikeHeader,
} from "./inference";
export { decodeBytes, detectBOM, toScalarIterator } from "./input";
export { CSVReader } from "./reader";
export { Lookahead, ScalarBuffer, ScalarSource } from "./scalar-buffer";
export { RowParser, scalarsToString, stringToScalars } from "./state-machine";
export type { CSVResult, ReaderConfiguration, ReaderOptions, ScalarInput } from "./types";
export { RowParseState } from "./types";
export { ReaderOptionsSchema, TextEncodingSchema, validateReaderOptions } from "./validation";
