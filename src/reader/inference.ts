/**
 * Delimiter and Header Inference Module
 *
 * One-shot scanners run before parsing when the caller left the field
 * delimiter, the row delimiter or the header presence unknown. Samples are
 * taken through a {@link Lookahead}, so the parser later sees the untouched
 * stream whether inference succeeds or fails.
 *
 * Heuristics:
 * - Candidate splits are produced by the real row parser; a candidate whose
 *   split is malformed is discarded.
 * - Candidates containing the quote or a trimmed scalar are never tried.
 * - Field delimiters are scored on consistency of the per-row field count,
 *   the count itself, and low variance.
 * - Row delimiters must yield at least two rows and are penalized when fields
 *   start with LF or end with CR (the remains of a split CRLF).
 * - A header is a first row of non-numeric text above columns whose values
 *   are mostly numeric.
 */

import { InferenceError, MalformedInputError } from "../errors";
import type { CodePoint, DelimiterPair, WarningHandler } from "../types";
import {
  AMBIGUOUS_SCORE_RATIO,
  FIELD_DELIMITER_CANDIDATES,
  MAX_INFERENCE_ROWS,
  MAX_INFERENCE_SCALARS,
  MIN_INFERENCE_ROWS,
  QUOTE_SCALAR,
  ROW_DELIMITER_CANDIDATES,
} from "./constants";
import { Lookahead, ScalarSource } from "./scalar-buffer";
import { RowParser, stringToScalars } from "./state-machine";

// =============================================================================
// SAMPLING
// =============================================================================

/**
 * Code points read ahead for inference
 */
export interface InferenceSample {
  readonly scalars: readonly CodePoint[];
  /** The scalar limit was hit before the end of input */
  readonly truncated: boolean;
}

/**
 * Read a bounded prefix of the input without consuming it
 */
export function sampleInput(source: ScalarSource, limit: number = MAX_INFERENCE_SCALARS): InferenceSample {
  const lookahead = new Lookahead(source);
  const scalars: CodePoint[] = [];

  while (scalars.length < limit) {
    const scalar = lookahead.next();
    if (scalar === undefined) return { scalars, truncated: false };
    scalars.push(scalar);
  }
  return { scalars, truncated: lookahead.next() !== undefined };
}

/**
 * Split a sample into rows with the given delimiters
 *
 * @returns Non-empty rows (at most MAX_INFERENCE_ROWS), or `null` if the
 *   delimiters produce malformed input
 */
export function splitSample(
  sample: InferenceSample,
  delimiters: DelimiterPair,
  trimScalars: ReadonlySet<CodePoint> | null = null
): string[][] | null {
  const parser = new RowParser(new ScalarSource(sample.scalars[Symbol.iterator]()), {
    delimiters,
    hasHeader: false,
    trimScalars,
    quoteScalar: QUOTE_SCALAR,
  });

  const rows: string[][] = [];
  let cutInsideQuotes = false;
  try {
    for (let row = parser.nextRow(); row !== undefined; row = parser.nextRow()) {
      rows.push([...row.fields]);
    }
  } catch (error) {
    if (!(error instanceof MalformedInputError)) throw error;
    // Only an unterminated quote caused by the sample cut is acceptable
    if (!sample.truncated || error.scalar !== undefined) return null;
    cutInsideQuotes = true;
  }

  // The last row of a cut sample is partial, unless the cut fell inside a quoted field
  if (sample.truncated && !cutInsideQuotes) rows.pop();

  return rows.filter((fields) => fields.length > 0).slice(0, MAX_INFERENCE_ROWS);
}

// =============================================================================
// SCORING
// =============================================================================

interface ScoredCandidate {
  readonly delimiters: DelimiterPair;
  readonly label: string;
  readonly score: number;
}

const TARGET_LABELS: Record<InferenceError["target"], string> = {
  fieldDelimiter: "field delimiter",
  rowDelimiter: "row delimiter",
  delimiters: "field and row delimiters",
  header: "header status",
};

function describe(delimiter: string): string {
  return JSON.stringify(delimiter);
}

/**
 * A delimiter may not contain the quote or anything the trim set strips
 */
function isUsableDelimiter(
  delimiter: readonly CodePoint[],
  trimScalars: ReadonlySet<CodePoint> | null
): boolean {
  return delimiter.every((scalar) => scalar !== QUOTE_SCALAR && trimScalars?.has(scalar) !== true);
}

function modalCount(counts: readonly number[]): number {
  const frequencies = new Map<number, number>();
  for (const count of counts) {
    frequencies.set(count, (frequencies.get(count) ?? 0) + 1);
  }

  let mode = 0;
  let best = 0;
  for (const [count, frequency] of frequencies) {
    if (frequency > best || (frequency === best && count > mode)) {
      mode = count;
      best = frequency;
    }
  }
  return mode;
}

/**
 * A row split by the wrong half of a CRLF leaves a CR or LF at the field edges
 */
function hasSplitLineBreak(fields: readonly string[]): boolean {
  const first = fields[0];
  const last = fields[fields.length - 1];
  return (first?.startsWith("\n") ?? false) || (last?.endsWith("\r") ?? false);
}

function consistentRows(rows: readonly (readonly string[])[], mode: number): number {
  return rows.filter((fields) => fields.length === mode && !hasSplitLineBreak(fields)).length;
}

/**
 * Score a split for field delimiter plausibility (0 = not plausible)
 */
export function scoreFieldSplit(rows: readonly (readonly string[])[]): number {
  if (rows.length < MIN_INFERENCE_ROWS) return 0;

  const counts = rows.map((fields) => fields.length);
  const mode = modalCount(counts);
  if (mode < 2) return 0;

  const mean = counts.reduce((a, b) => a + b, 0) / counts.length;
  const variance = counts.reduce((sum, count) => sum + (count - mean) ** 2, 0) / counts.length;
  const consistency = consistentRows(rows, mode) / rows.length;

  return (consistency * mode) / (1 + variance);
}

/**
 * Score a split for row delimiter plausibility (0 = not plausible)
 */
export function scoreRowSplit(rows: readonly (readonly string[])[]): number {
  if (rows.length < MIN_INFERENCE_ROWS) return 0;

  const mode = modalCount(rows.map((fields) => fields.length));
  return consistentRows(rows, mode);
}

function pickBest(
  candidates: readonly ScoredCandidate[],
  target: InferenceError["target"],
  sample: InferenceSample,
  sampledRows: number,
  onWarning?: WarningHandler
): DelimiterPair {
  let best: ScoredCandidate | undefined;
  let runnerUp: ScoredCandidate | undefined;

  for (const candidate of candidates) {
    if (candidate.score <= 0) continue;
    if (best === undefined || candidate.score > best.score) {
      runnerUp = best;
      best = candidate;
    } else if (runnerUp === undefined || candidate.score > runnerUp.score) {
      runnerUp = candidate;
    }
  }

  if (best === undefined) {
    throw new InferenceError(
      `Unable to infer the ${TARGET_LABELS[target]} from the input`,
      target,
      sample.scalars.length,
      sampledRows
    );
  }

  if (runnerUp !== undefined && runnerUp.score >= best.score * AMBIGUOUS_SCORE_RATIO) {
    onWarning?.(`Ambiguous delimiter inference: chose ${best.label} over ${runnerUp.label}`);
  }
  return best.delimiters;
}

// =============================================================================
// INFERENCE
// =============================================================================

/**
 * Infer the field delimiter given a known row delimiter
 *
 * @throws {InferenceError} When no candidate yields a consistent multi-field split
 */
export function inferFieldDelimiter(
  source: ScalarSource,
  rowDelimiter: readonly CodePoint[],
  onWarning?: WarningHandler,
  trimScalars: ReadonlySet<CodePoint> | null = null
): DelimiterPair {
  const sample = sampleInput(source);
  let sampledRows = 0;

  const candidates = FIELD_DELIMITER_CANDIDATES.flatMap((field): ScoredCandidate[] => {
    const delimiters = { field: stringToScalars(field), row: rowDelimiter };
    if (!isUsableDelimiter(delimiters.field, trimScalars)) return [];

    const rows = splitSample(sample, delimiters, trimScalars);
    sampledRows = Math.max(sampledRows, rows?.length ?? 0);
    return [{ delimiters, label: describe(field), score: rows === null ? 0 : scoreFieldSplit(rows) }];
  });

  return pickBest(candidates, "fieldDelimiter", sample, sampledRows, onWarning);
}

/**
 * Infer the row delimiter given a known field delimiter
 *
 * @throws {InferenceError} When no candidate yields at least two consistent rows
 */
export function inferRowDelimiter(
  source: ScalarSource,
  fieldDelimiter: readonly CodePoint[],
  onWarning?: WarningHandler,
  trimScalars: ReadonlySet<CodePoint> | null = null
): DelimiterPair {
  const sample = sampleInput(source);
  let sampledRows = 0;

  const candidates = ROW_DELIMITER_CANDIDATES.flatMap((row): ScoredCandidate[] => {
    const delimiters = { field: fieldDelimiter, row: stringToScalars(row) };
    if (!isUsableDelimiter(delimiters.row, trimScalars)) return [];

    const rows = splitSample(sample, delimiters, trimScalars);
    sampledRows = Math.max(sampledRows, rows?.length ?? 0);
    return [{ delimiters, label: describe(row), score: rows === null ? 0 : scoreRowSplit(rows) }];
  });

  return pickBest(candidates, "rowDelimiter", sample, sampledRows, onWarning);
}

/**
 * Infer both delimiters jointly
 *
 * @throws {InferenceError} When no candidate pair is plausible
 */
export function inferDelimiters(
  source: ScalarSource,
  onWarning?: WarningHandler,
  trimScalars: ReadonlySet<CodePoint> | null = null
): DelimiterPair {
  const sample = sampleInput(source);
  let sampledRows = 0;

  const candidates: ScoredCandidate[] = [];
  for (const row of ROW_DELIMITER_CANDIDATES) {
    for (const field of FIELD_DELIMITER_CANDIDATES) {
      const delimiters = { field: stringToScalars(field), row: stringToScalars(row) };
      if (!isUsableDelimiter(delimiters.field, trimScalars)) continue;
      if (!isUsableDelimiter(delimiters.row, trimScalars)) continue;

      const rows = splitSample(sample, delimiters, trimScalars);
      sampledRows = Math.max(sampledRows, rows?.length ?? 0);
      candidates.push({
        delimiters,
        label: `${describe(field)}/${describe(row)}`,
        score: rows === null ? 0 : scoreFieldSplit(rows),
      });
    }
  }

  return pickBest(candidates, "delimiters", sample, sampledRows, onWarning);
}

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Whether a field looks like a number
 */
export function isNumericLike(field: string): boolean {
  return NUMERIC_PATTERN.test(field.trim());
}

/**
 * Decide whether the first of the sampled rows is a header
 */
export function looksLikeHeader(rows: readonly (readonly string[])[]): boolean {
  const [first, ...rest] = rows;
  if (first === undefined || rest.length === 0) return false;

  if (first.some((field) => field.trim() === "" || isNumericLike(field))) return false;

  return first.some((_, column) => {
    const values = rest
      .map((fields) => fields[column])
      .filter((value): value is string => value !== undefined && value.trim() !== "");
    if (values.length === 0) return false;

    const numeric = values.filter(isNumericLike).length;
    return numeric * 2 > values.length;
  });
}

/**
 * Infer whether the input starts with a header row
 *
 * @throws {InferenceError} When fewer than two rows can be sampled
 */
export function inferHeaderStatus(
  source: ScalarSource,
  delimiters: DelimiterPair,
  trimScalars: ReadonlySet<CodePoint> | null = null
): boolean {
  const sample = sampleInput(source);
  const rows = splitSample(sample, delimiters, trimScalars);

  if (rows === null || rows.length < MIN_INFERENCE_ROWS) {
    throw new InferenceError(
      "Unable to infer header presence: at least two rows are required",
      "header",
      sample.scalars.length,
      rows?.length ?? 0
    );
  }
  return looksLikeHeader(rows);
}
