/**
 * Decoding Row Buffer
 *
 * Random access over a forward-only row producer. The buffering strategy
 * decides what is retained once the producer has moved past a row:
 *
 * - `keepAll` caches every produced row, so any index can be revisited.
 * - `sequential` retains only the current row; earlier rows are discarded.
 *
 * Rows are always produced in order, so requesting index `n` produces every
 * row before it.
 */

import { BufferError } from "../errors";
import type { BufferingStrategy, Row } from "../types";

/**
 * Forward-only source of rows, returning `undefined` at end of input
 */
export type RowProducer = () => Row | undefined;

/**
 * Row access shared by both buffering strategies
 */
export interface DecodingBuffer {
  readonly strategy: BufferingStrategy;

  /**
   * Row at `index`
   *
   * @throws {BufferError} If the row was discarded or lies past the end of input
   */
  row(index: number): Row;

  /**
   * Row at `index`, or `undefined` past the end of input
   *
   * @throws {BufferError} If the row was discarded
   */
  rowIfPresent(index: number): Row | undefined;

  /**
   * Field `column` of the row at `index`
   *
   * @throws {BufferError} If the row is unavailable or has no such column
   */
  field(index: number, column: number): string;
}

abstract class BaseDecodingBuffer implements DecodingBuffer {
  abstract readonly strategy: BufferingStrategy;
  protected ended = false;

  constructor(protected readonly produce: RowProducer) {}

  abstract rowIfPresent(index: number): Row | undefined;

  row(index: number): Row {
    const row = this.rowIfPresent(index);
    if (row === undefined) {
      throw new BufferError(`Row ${index} is past the end of input`, index, this.strategy);
    }
    return row;
  }

  field(index: number, column: number): string {
    const value = this.row(index).fields[column];
    if (value === undefined) {
      throw new BufferError(`Row ${index} has no column ${column}`, index, this.strategy, column);
    }
    return value;
  }

  protected checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0) {
      throw new BufferError(`Invalid row index: ${index}`, index, this.strategy);
    }
  }

  protected pull(): Row | undefined {
    if (this.ended) return undefined;
    const row = this.produce();
    if (row === undefined) this.ended = true;
    return row;
  }
}

/**
 * Append-only cache of every produced row
 */
export class KeepAllBuffer extends BaseDecodingBuffer {
  override readonly strategy = "keepAll";
  private readonly rows: Row[] = [];

  /**
   * Number of rows produced so far
   */
  get size(): number {
    return this.rows.length;
  }

  override rowIfPresent(index: number): Row | undefined {
    this.checkIndex(index);

    while (this.rows.length <= index) {
      const row = this.pull();
      if (row === undefined) return undefined;
      this.rows.push(row);
    }
    return this.rows[index];
  }
}

/**
 * Buffer holding only the most recently produced row
 */
export class SequentialBuffer extends BaseDecodingBuffer {
  override readonly strategy = "sequential";
  private current: Row | undefined;
  private nextIndex = 0;

  override rowIfPresent(index: number): Row | undefined {
    this.checkIndex(index);

    const currentIndex = this.nextIndex - 1;
    if (index < currentIndex) {
      throw new BufferError(
        `Row ${index} was discarded; the sequential buffer is at row ${currentIndex}`,
        index,
        this.strategy
      );
    }

    while (this.nextIndex <= index) {
      const row = this.pull();
      if (row === undefined) return undefined;
      this.current = row;
      this.nextIndex++;
    }
    return this.current;
  }
}

/**
 * Create the buffer for a buffering strategy
 */
export function createDecodingBuffer(
  strategy: BufferingStrategy,
  produce: RowProducer
): DecodingBuffer {
  switch (strategy) {
    case "keepAll":
      return new KeepAllBuffer(produce);
    case "sequential":
      return new SequentialBuffer(produce);
  }
}
