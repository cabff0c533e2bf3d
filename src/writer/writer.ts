/**
 * @module writer/writer
 * @description CSV writer over a byte sink
 *
 * Assembles fields into rows, quoting only where the reader would otherwise
 * misread the field:
 * - fields containing a delimiter, the quote, CR or LF
 * - fields whose tail starts a delimiter that ends in the delimiter written
 *   after them, which the reader would match one field too early
 * - a row made of one empty field, which would read back as an empty row
 *
 * Quotes inside quoted fields are doubled.
 */

// =============================================================================
// IMPORTS
// =============================================================================

import { QUOTE_SCALAR } from "../reader/constants";
import { stringToScalars } from "../reader/state-machine";
import { assertUsableDelimiters } from "../reader/validation";
import { byteOrderMark, makeScalarEncoder, resolveEncoding, type ScalarEncoder } from "./encoder";
import { MemorySink, type ByteSink } from "./sink";
import type { WriterOptions } from "./types";
import { validateWriterOptions } from "./validation";

const QUOTE = String.fromCodePoint(QUOTE_SCALAR);

// =============================================================================
// CLASSES - MAIN WRITER
// =============================================================================

export class CSVWriter {
  private readonly encoder: ScalarEncoder;
  private readonly fieldDelimiter: string;
  private readonly rowDelimiter: string;
  private readonly quoteAll: boolean;
  private fieldsInRow = 0;
  private bareEmptyFirstField = false;

  /**
   * @throws {ConfigurationError} For invalid options
   * @throws {StreamError} If the sink is not open
   * @throws {EncodingError} If the encoding is not supported
   */
  constructor(sink: ByteSink, options: WriterOptions = {}) {
    validateWriterOptions(options);

    this.fieldDelimiter = options.delimiters?.field ?? ",";
    this.rowDelimiter = options.delimiters?.row ?? "\n";
    this.quoteAll = options.quoteAll ?? false;
    assertUsableDelimiters(
      { field: stringToScalars(this.fieldDelimiter), row: stringToScalars(this.rowDelimiter) },
      QUOTE_SCALAR,
      null
    );

    const label = options.encoding ?? "utf8";
    const encoding = resolveEncoding(label);
    const preamble =
      encoding === undefined
        ? new Uint8Array(0)
        : byteOrderMark(encoding, options.bomStrategy ?? "convention");
    this.encoder = makeScalarEncoder(sink, label, preamble);

    if (options.headers !== undefined && options.headers.length > 0) {
      this.writeRow(options.headers);
    }
  }

  get encoding(): string {
    return this.encoder.encoding;
  }

  /**
   * Whether a field must be quoted to read back unchanged
   */
  needsQuoting(field: string): boolean {
    return (
      field.includes(QUOTE) ||
      field.includes("\r") ||
      field.includes("\n") ||
      this.delimiterStartsWithin(field)
    );
  }

  /**
   * Whether the reader would see a delimiter begin inside `field`, whichever
   * delimiter follows it
   */
  private delimiterStartsWithin(field: string): boolean {
    const delimiters = [this.fieldDelimiter, this.rowDelimiter];
    return delimiters.some((following) =>
      delimiters.some((delimiter) => {
        const start = (field + following).indexOf(delimiter);
        return start !== -1 && start < field.length;
      })
    );
  }

  /**
   * Format a single field, quoting and doubling quotes as needed
   */
  formatField(field: string): string {
    if (!this.quoteAll && !this.needsQuoting(field)) return field;
    return QUOTE + field.replaceAll(QUOTE, QUOTE + QUOTE) + QUOTE;
  }

  /**
   * Append a field to the current row
   */
  write(field: string): void {
    const formatted = this.formatField(field);
    const text = this.fieldsInRow > 0 ? this.fieldDelimiter + formatted : formatted;

    this.bareEmptyFirstField = this.fieldsInRow === 0 && formatted === "";
    this.fieldsInRow++;
    this.encoder.encodeString(text);
  }

  /**
   * Terminate the current row
   */
  endRow(): void {
    const loneEmpty = this.fieldsInRow === 1 && this.bareEmptyFirstField;
    this.encoder.encodeString(loneEmpty ? QUOTE + QUOTE + this.rowDelimiter : this.rowDelimiter);
    this.fieldsInRow = 0;
    this.bareEmptyFirstField = false;
  }

  writeRow(fields: Iterable<string>): void {
    for (const field of fields) {
      this.write(field);
    }
    this.endRow();
  }

  writeRows(rows: Iterable<Iterable<string>>): void {
    for (const row of rows) {
      this.writeRow(row);
    }
  }

  /**
   * Serialize rows to bytes in memory
   */
  static serialize(rows: Iterable<Iterable<string>>, options: WriterOptions = {}): Uint8Array {
    const sink = new MemorySink().open();
    const writer = new CSVWriter(sink, options);
    writer.writeRows(rows);
    sink.close();
    return sink.toUint8Array();
  }
}
