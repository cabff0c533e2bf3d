/**
 * CSV Reader
 *
 * Pull-based reader over a single parse session: configuration (with any
 * inference) is resolved at construction, then rows are produced one at a
 * time by the {@link RowParser}.
 *
 * @example
 * ```typescript
 * const reader = new CSVReader("name,age\nAda,36\n", { header: "firstLine" });
 * reader.headers; // ["name", "age"]
 * for (const row of reader) {
 *   console.log(row.index, row.fields);
 * }
 * ```
 */

import { ConfigurationError } from "../errors";
import type { Row } from "../types";
import { resolveConfiguration } from "./configuration";
import { toScalarIterator } from "./input";
import { ScalarSource } from "./scalar-buffer";
import { RowParser } from "./state-machine";
import type { CSVResult, ReaderConfiguration, ReaderOptions, ScalarInput } from "./types";
import { validateReaderOptions } from "./validation";

export class CSVReader implements IterableIterator<Row> {
  readonly configuration: ReaderConfiguration;
  private readonly parser: RowParser;
  private readonly headerFields: readonly string[];

  /**
   * @throws {ConfigurationError} For invalid options
   * @throws {InferenceError} When unknown settings cannot be inferred
   * @throws {EncodingError} When byte input uses an unsupported encoding
   * @throws {MalformedInputError} When the header row itself is malformed
   */
  constructor(input: ScalarInput, options: ReaderOptions = {}) {
    validateReaderOptions(options);

    const source = new ScalarSource(toScalarIterator(input, options.encoding));
    this.configuration = resolveConfiguration(options, source);
    this.parser = new RowParser(source, this.configuration);

    this.headerFields = this.configuration.hasHeader
      ? Object.freeze([...(this.parser.nextRow()?.fields ?? [])])
      : [];
  }

  /**
   * Header names, empty when the input has no header row
   */
  get headers(): readonly string[] {
    return this.headerFields;
  }

  /**
   * Read the next data row
   *
   * Row indices count data rows only, starting at 0.
   *
   * @returns The row, or `undefined` at end of input
   * @throws {MalformedInputError} On a quoting violation
   */
  readRow(): Row | undefined {
    const row = this.parser.nextRow();
    if (row === undefined) return undefined;
    if (!this.configuration.hasHeader) return row;
    return { index: row.index - 1, fields: row.fields };
  }

  /**
   * Read the next data row as a record keyed by header name
   *
   * Missing trailing fields map to `""`; extra fields are dropped.
   *
   * @throws {ConfigurationError} If the reader has no header row
   */
  readRecord(): Record<string, string> | undefined {
    if (!this.configuration.hasHeader) {
      throw new ConfigurationError("Records require a header row", "header");
    }

    const row = this.readRow();
    if (row === undefined) return undefined;

    const record: Record<string, string> = {};
    this.headerFields.forEach((name, column) => {
      record[name] = row.fields[column] ?? "";
    });
    return record;
  }

  next(): IteratorResult<Row> {
    const row = this.readRow();
    return row === undefined ? { done: true, value: undefined } : { done: false, value: row };
  }

  [Symbol.iterator](): IterableIterator<Row> {
    return this;
  }

  /**
   * Parse a whole input at once
   */
  static parse(input: ScalarInput, options: ReaderOptions = {}): CSVResult {
    const reader = new CSVReader(input, options);
    const rows: string[][] = [];
    for (const row of reader) {
      rows.push([...row.fields]);
    }
    return { headers: [...reader.headers], rows };
  }
}
