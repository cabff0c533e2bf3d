/**
 * scalar-csv: a CSV reader and writer working on Unicode code points
 *
 * @example
 * ```typescript
 * import { CSVReader, CSVWriter } from "scalar-csv";
 *
 * const bytes = CSVWriter.serialize([["name", "note"], ["Ada", "a, b"]]);
 * const { headers, rows } = CSVReader.parse(bytes, { header: "firstLine" });
 * ```
 */

export * from "./compression";
export * from "./decoder";
export * from "./errors";
export * from "./io";
export * from "./reader";
export * from "./types";
export * from "./writer";
