/**
 * @module writer/validation
 * @description ArkType schema for writer options
 */

import { type } from "arktype";
import { ConfigurationError } from "../errors";
import type { WriterOptions } from "./types";

export const WriterOptionsSchema = type({
  "delimiters?": {
    "field?": "string > 0",
    "row?": "string > 0",
  },
  "encoding?": "string > 0",
  "bomStrategy?": "'convention'|'always'|'never'",
  "headers?": "string[]",
  "quoteAll?": "boolean",
}).narrow((options, ctx) => {
  const field = options.delimiters?.field ?? ",";
  const row = options.delimiters?.row ?? "\n";
  if (field === row) {
    return ctx.reject({
      path: ["delimiters"],
      expected: "different field and row delimiters",
      actual: "the same delimiter for both",
    });
  }
  return true;
});

export function validateWriterOptions(options: WriterOptions): void {
  const validation = WriterOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid CSV writer options: ${validation.summary}`, "options");
  }
}
