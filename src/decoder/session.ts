/**
 * Decoding session: random row and field access over one CSV input
 */

import { type } from "arktype";
import { BufferError, ConfigurationError } from "../errors";
import { CSVReader } from "../reader/reader";
import type { ReaderOptions, ScalarInput } from "../reader/types";
import type { BufferingStrategy, Row } from "../types";
import { createDecodingBuffer, type DecodingBuffer } from "./row-buffer";

/**
 * Settings of a decoding session
 *
 * The reader options are kept as a field of their own, not merged in.
 */
export interface DecoderConfiguration {
  reader: ReaderOptions;
  bufferingStrategy: BufferingStrategy;
}

export const DEFAULT_DECODER_CONFIGURATION: DecoderConfiguration = {
  reader: {},
  bufferingStrategy: "keepAll",
};

const BufferingStrategySchema = type("'keepAll'|'sequential'");

export class DecodingSession {
  readonly configuration: DecoderConfiguration;
  private readonly reader: CSVReader;
  private readonly buffer: DecodingBuffer;
  private columnsByName: Map<string, number> | undefined;

  /**
   * @throws {ConfigurationError} For invalid reader options or buffering strategy
   */
  constructor(input: ScalarInput, configuration: Partial<DecoderConfiguration> = {}) {
    this.configuration = { ...DEFAULT_DECODER_CONFIGURATION, ...configuration };

    const strategy = BufferingStrategySchema(this.configuration.bufferingStrategy);
    if (strategy instanceof type.errors) {
      throw new ConfigurationError(
        `Invalid buffering strategy: ${strategy.summary}`,
        "bufferingStrategy"
      );
    }

    this.reader = new CSVReader(input, this.configuration.reader);
    this.buffer = createDecodingBuffer(strategy, () => this.reader.readRow());
  }

  get headers(): readonly string[] {
    return this.reader.headers;
  }

  get bufferingStrategy(): BufferingStrategy {
    return this.buffer.strategy;
  }

  row(index: number): Row {
    return this.buffer.row(index);
  }

  rowIfPresent(index: number): Row | undefined {
    return this.buffer.rowIfPresent(index);
  }

  /**
   * Field of a row by header name or column index
   *
   * @throws {BufferError} If the row is unavailable or the key names no column
   * @throws {ConfigurationError} If a name is looked up while header names repeat
   */
  field(rowIndex: number, key: string | number): string {
    const column = typeof key === "number" ? key : this.columnIndex(key, rowIndex);
    return this.buffer.field(rowIndex, column);
  }

  /**
   * Column index of a header name
   */
  columnIndex(name: string, rowIndex = -1): number {
    const column = this.columnMap().get(name);
    if (column === undefined) {
      throw new BufferError(`Unknown column: ${name}`, rowIndex, this.buffer.strategy, name);
    }
    return column;
  }

  /**
   * Iterate the rows from `start` onwards
   */
  *rows(start = 0): Generator<Row, void, undefined> {
    for (let index = start; ; index++) {
      const row = this.buffer.rowIfPresent(index);
      if (row === undefined) return;
      yield row;
    }
  }

  private columnMap(): Map<string, number> {
    if (this.columnsByName !== undefined) return this.columnsByName;

    const columns = new Map<string, number>();
    this.reader.headers.forEach((name, column) => {
      if (columns.has(name)) {
        throw new ConfigurationError(`Duplicate header name: ${name}`, "header");
      }
      columns.set(name, column);
    });
    this.columnsByName = columns;
    return columns;
  }
}
