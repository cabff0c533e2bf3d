/**
 * @module reader/validation
 * @description ArkType schemas and checks for reader options
 */

import { type } from "arktype";
import { ConfigurationError } from "../errors";
import type { CodePoint, DelimiterPair } from "../types";
import type { ReaderOptions } from "./types";

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

/**
 * Text encodings accepted by readers and writers
 */
export const TextEncodingSchema = type(
  "'ascii'|'utf8'|'utf16'|'utf16be'|'utf16le'|'utf32'|'utf32be'|'utf32le'|'shiftjis'"
);

/**
 * ArkType validation schema for reader options
 */
export const ReaderOptionsSchema = type({
  "delimiters?": {
    "field?": "string|null",
    "row?": "string|null",
  },
  "header?": "'none'|'firstLine'|'unknown'",
  "trim?": type("'none'|'whitespaces'").or({ characters: "string" }),
  "encoding?": TextEncodingSchema,
}).narrow((options, ctx) => {
  const field = options.delimiters?.field;
  const row = options.delimiters?.row;

  if (field === "") {
    return ctx.reject({
      path: ["delimiters", "field"],
      expected: "a non-empty field delimiter",
      actual: "an empty string",
    });
  }
  if (row === "") {
    return ctx.reject({
      path: ["delimiters", "row"],
      expected: "a non-empty row delimiter",
      actual: "an empty string",
    });
  }
  if (typeof field === "string" && field === row) {
    return ctx.reject({
      path: ["delimiters"],
      expected: "different field and row delimiters",
      actual: "the same delimiter for both",
    });
  }
  return true;
});

/**
 * Validate reader options, throwing a ConfigurationError with the ArkType summary
 */
export function validateReaderOptions(options: ReaderOptions): void {
  const validation = ReaderOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid CSV reader options: ${validation.summary}`, "options");
  }
}

// =============================================================================
// RESOLVED SETTINGS CHECKS
// =============================================================================

function startsWith(sequence: readonly CodePoint[], prefix: readonly CodePoint[]): boolean {
  return prefix.length <= sequence.length && prefix.every((scalar, i) => sequence[i] === scalar);
}

/**
 * Check a resolved delimiter pair against the quote and trim settings
 *
 * @throws {ConfigurationError} On empty, equal or overlapping delimiters, a
 *   delimiter containing the quote, or a trim set touching either
 */
export function assertUsableDelimiters(
  delimiters: DelimiterPair,
  quoteScalar: CodePoint,
  trimScalars: ReadonlySet<CodePoint> | null
): void {
  const { field, row } = delimiters;

  if (field.length === 0 || row.length === 0) {
    throw new ConfigurationError("Delimiters must not be empty", "delimiters");
  }
  if (startsWith(field, row) || startsWith(row, field)) {
    throw new ConfigurationError(
      "The field and row delimiters must differ and neither may start the other",
      "delimiters"
    );
  }
  if (field.includes(quoteScalar) || row.includes(quoteScalar)) {
    throw new ConfigurationError("Delimiters must not contain the quote character", "delimiters");
  }
  if (trimScalars !== null) {
    if (trimScalars.has(quoteScalar)) {
      throw new ConfigurationError("The trim set must not contain the quote character", "trim");
    }
    if ([...field, ...row].some((scalar) => trimScalars.has(scalar))) {
      throw new ConfigurationError("The trim set must not contain delimiter characters", "trim");
    }
  }
}
