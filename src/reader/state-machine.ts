/**
 * CSV State Machine Module
 *
 * Consumes code points from a {@link ScalarSource} and yields one row per row
 * boundary. Quoted fields may embed delimiters and doubled quotes; trimming
 * only ever applies to unquoted fields. Any quoting violation is fatal for the
 * parse session.
 */

import { MalformedInputError } from "../errors";
import type { CodePoint, Row } from "../types";
import { STRING_CHUNK_SIZE } from "./constants";
import type { ScalarSource } from "./scalar-buffer";
import { type ReaderConfiguration, RowParseState } from "./types";

/**
 * Build a string from code points without overflowing the argument limit
 */
export function scalarsToString(scalars: readonly CodePoint[]): string {
  if (scalars.length <= STRING_CHUNK_SIZE) {
    return String.fromCodePoint(...scalars);
  }
  let text = "";
  for (let start = 0; start < scalars.length; start += STRING_CHUNK_SIZE) {
    text += String.fromCodePoint(...scalars.slice(start, start + STRING_CHUNK_SIZE));
  }
  return text;
}

/**
 * Split a string into its code points
 */
export function stringToScalars(text: string): CodePoint[] {
  const scalars: CodePoint[] = [];
  for (const char of text) {
    const scalar = char.codePointAt(0);
    if (scalar !== undefined) scalars.push(scalar);
  }
  return scalars;
}

/**
 * Row/field parser
 *
 * @remarks
 * State transitions within a row:
 * BETWEEN_ROWS/FIELD_START → UNQUOTED_FIELD | QUOTED_FIELD → AFTER_CLOSING_QUOTE → FIELD_START,
 * ending in ROW_COMPLETE at a row delimiter or END_OF_INPUT when the source runs dry.
 */
export class RowParser {
  private state = RowParseState.BETWEEN_ROWS;
  private rowIndex = 0;
  private failure: MalformedInputError | undefined;

  constructor(
    private readonly source: ScalarSource,
    private readonly configuration: ReaderConfiguration
  ) {}

  /**
   * Current state of the machine
   */
  get currentState(): RowParseState {
    return this.state;
  }

  /**
   * Parse the next row
   *
   * @returns The row, or `undefined` once the input is exhausted
   * @throws {MalformedInputError} On a quoting violation; every later call rethrows it
   */
  nextRow(): Row | undefined {
    if (this.failure !== undefined) throw this.failure;
    if (this.state === RowParseState.END_OF_INPUT) return undefined;

    try {
      return this.parseRow();
    } catch (error) {
      if (error instanceof MalformedInputError) {
        this.failure = error;
        this.state = RowParseState.END_OF_INPUT;
      }
      throw error;
    }
  }

  private parseRow(): Row | undefined {
    const { quoteScalar, trimScalars, delimiters } = this.configuration;
    const fields: string[] = [];
    let field: CodePoint[] = [];
    // Set once trim scalars follow a closing quote; a doubled quote is no longer possible
    let paddedAfterQuote = false;
    this.state = RowParseState.BETWEEN_ROWS;

    while (true) {
      const scalar = this.source.next();
      if (scalar === undefined) {
        return this.finishInput(fields, field);
      }

      switch (this.state) {
        case RowParseState.BETWEEN_ROWS:
        case RowParseState.FIELD_START:
          if (scalar === quoteScalar) {
            this.state = RowParseState.QUOTED_FIELD;
          } else if (this.matches(scalar, delimiters.field)) {
            fields.push("");
            this.state = RowParseState.FIELD_START;
          } else if (this.matches(scalar, delimiters.row)) {
            if (this.state === RowParseState.FIELD_START) fields.push("");
            return this.completeRow(fields);
          } else if (trimScalars?.has(scalar) !== true) {
            field.push(scalar);
            this.state = RowParseState.UNQUOTED_FIELD;
          }
          break;

        case RowParseState.UNQUOTED_FIELD:
          if (this.matches(scalar, delimiters.field)) {
            fields.push(this.unquotedValue(field));
            field = [];
            this.state = RowParseState.FIELD_START;
          } else if (this.matches(scalar, delimiters.row)) {
            fields.push(this.unquotedValue(field));
            return this.completeRow(fields);
          } else if (scalar === quoteScalar) {
            throw new MalformedInputError(
              "Quote character inside an unquoted field",
              this.rowIndex,
              fields.length,
              scalar
            );
          } else {
            field.push(scalar);
          }
          break;

        case RowParseState.QUOTED_FIELD:
          if (scalar === quoteScalar) {
            paddedAfterQuote = false;
            this.state = RowParseState.AFTER_CLOSING_QUOTE;
          } else {
            field.push(scalar);
          }
          break;

        case RowParseState.AFTER_CLOSING_QUOTE:
          if (scalar === quoteScalar && paddedAfterQuote) {
            throw new MalformedInputError(
              "Quote character after a closed quoted field",
              this.rowIndex,
              fields.length,
              scalar
            );
          } else if (scalar === quoteScalar) {
            // Doubled quote: literal quote character
            field.push(quoteScalar);
            this.state = RowParseState.QUOTED_FIELD;
          } else if (this.matches(scalar, delimiters.field)) {
            fields.push(scalarsToString(field));
            field = [];
            this.state = RowParseState.FIELD_START;
          } else if (this.matches(scalar, delimiters.row)) {
            fields.push(scalarsToString(field));
            return this.completeRow(fields);
          } else if (trimScalars?.has(scalar) === true) {
            paddedAfterQuote = true;
          } else {
            throw new MalformedInputError(
              "Unexpected character after closing quote",
              this.rowIndex,
              fields.length,
              scalar
            );
          }
          break;

        default:
          throw new Error(`Row parser resumed in state ${RowParseState[this.state]}`);
      }
    }
  }

  /**
   * Check whether `first` starts `delimiter` in the stream, consuming the rest of it on a match
   *
   * Scalars read past a partial match are pushed back.
   */
  private matches(first: CodePoint, delimiter: readonly CodePoint[]): boolean {
    if (delimiter[0] !== first) return false;

    const readAhead: CodePoint[] = [];
    for (let i = 1; i < delimiter.length; i++) {
      const scalar = this.source.next();
      if (scalar === undefined) {
        this.source.pushBack(readAhead);
        return false;
      }
      readAhead.push(scalar);
      if (scalar !== delimiter[i]) {
        this.source.pushBack(readAhead);
        return false;
      }
    }
    return true;
  }

  private unquotedValue(field: readonly CodePoint[]): string {
    const trimScalars = this.configuration.trimScalars;
    if (trimScalars === null) return scalarsToString(field);

    let start = 0;
    let end = field.length;
    while (start < end && trimScalars.has(field[start] ?? -1)) start++;
    while (end > start && trimScalars.has(field[end - 1] ?? -1)) end--;
    return scalarsToString(field.slice(start, end));
  }

  private completeRow(fields: string[]): Row {
    this.state = RowParseState.ROW_COMPLETE;
    return { index: this.rowIndex++, fields: Object.freeze(fields) };
  }

  private finishInput(fields: string[], field: CodePoint[]): Row | undefined {
    switch (this.state) {
      case RowParseState.BETWEEN_ROWS:
        this.state = RowParseState.END_OF_INPUT;
        return undefined;
      case RowParseState.QUOTED_FIELD:
        throw new MalformedInputError(
          "Unterminated quoted field at end of input",
          this.rowIndex,
          fields.length
        );
      case RowParseState.FIELD_START:
        fields.push("");
        break;
      case RowParseState.UNQUOTED_FIELD:
        fields.push(this.unquotedValue(field));
        break;
      case RowParseState.AFTER_CLOSING_QUOTE:
        fields.push(scalarsToString(field));
        break;
      default:
        break;
    }

    const row = this.completeRow(fields);
    this.state = RowParseState.END_OF_INPUT;
    return row;
  }
}
