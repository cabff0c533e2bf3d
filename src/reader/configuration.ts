/**
 * Reader configuration resolution
 *
 * Turns caller options into the immutable {@link ReaderConfiguration} of a
 * parse session, running inference for whatever was left unknown.
 */

import {
  type CodePoint,
  type DelimiterPair,
  type TrimStrategy,
  type WarningHandler,
  defaultWarningHandler,
} from "../types";
import { DEFAULT_DELIMITERS, QUOTE_SCALAR, WHITESPACE_SCALARS } from "./constants";
import {
  inferDelimiters,
  inferFieldDelimiter,
  inferHeaderStatus,
  inferRowDelimiter,
} from "./inference";
import type { ScalarSource } from "./scalar-buffer";
import { stringToScalars } from "./state-machine";
import type { ReaderConfiguration, ReaderOptions } from "./types";
import { assertUsableDelimiters } from "./validation";

/**
 * Code points trimmed under a trim strategy, or `null` when nothing is trimmed
 */
export function resolveTrimScalars(strategy: TrimStrategy = "none"): ReadonlySet<CodePoint> | null {
  if (strategy === "none") return null;
  if (strategy === "whitespaces") return new Set(WHITESPACE_SCALARS);

  const scalars = stringToScalars(strategy.characters);
  return scalars.length > 0 ? new Set(scalars) : null;
}

function resolveDelimiter(value: string | null | undefined, fallback: string): CodePoint[] | null {
  if (value === null) return null;
  return stringToScalars(value ?? fallback);
}

/**
 * Resolve the delimiter pair, inferring unknown delimiters from the source
 *
 * Inference skips candidates that the trim set would strip.
 */
export function resolveDelimiters(
  options: ReaderOptions,
  source: ScalarSource,
  onWarning?: WarningHandler,
  trimScalars: ReadonlySet<CodePoint> | null = null
): DelimiterPair {
  const field = resolveDelimiter(options.delimiters?.field, DEFAULT_DELIMITERS.field);
  const row = resolveDelimiter(options.delimiters?.row, DEFAULT_DELIMITERS.row);

  if (field !== null && row !== null) return { field, row };
  if (row !== null) return inferFieldDelimiter(source, row, onWarning, trimScalars);
  if (field !== null) return inferRowDelimiter(source, field, onWarning, trimScalars);
  return inferDelimiters(source, onWarning, trimScalars);
}

/**
 * Build the configuration of a parse session
 *
 * Any look-ahead taken by inference is left in the source's buffer, so the
 * parser sees the stream from its first code point. Options are expected to
 * have passed `validateReaderOptions` already.
 *
 * @throws {ConfigurationError} For unusable settings
 * @throws {InferenceError} When unknown settings cannot be inferred
 */
export function resolveConfiguration(
  options: ReaderOptions,
  source: ScalarSource
): ReaderConfiguration {
  const trimScalars = resolveTrimScalars(options.trim);
  const delimiters = resolveDelimiters(
    options,
    source,
    options.onWarning ?? defaultWarningHandler,
    trimScalars
  );
  assertUsableDelimiters(delimiters, QUOTE_SCALAR, trimScalars);

  const header = options.header ?? "none";
  const hasHeader =
    header === "unknown" ? inferHeaderStatus(source, delimiters, trimScalars) : header === "firstLine";

  return Object.freeze({ delimiters, hasHeader, trimScalars, quoteScalar: QUOTE_SCALAR });
}
