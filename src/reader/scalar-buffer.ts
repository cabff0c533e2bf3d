/**
 * Pushback buffer for code points
 *
 * Holds code points that were read from the underlying source but not yet
 * handed to the parser: look-ahead taken during inference, and scalars read
 * past a partial delimiter match. Whatever order batches are pushed in, `next`
 * yields code points in the order of the original stream.
 */

import type { CodePoint } from "../types";

/** Consumed slots tolerated at the front before the backing array is compacted */
const COMPACT_THRESHOLD = 1024;

function toBatch(scalars: CodePoint | Iterable<CodePoint>): CodePoint[] {
  return typeof scalars === "number" ? [scalars] : Array.from(scalars);
}

/**
 * FIFO queue of not-yet-consumed code points with push-to-front and push-to-back
 */
export class ScalarBuffer {
  private items: CodePoint[] = [];
  private head = 0;

  /**
   * Number of queued code points
   */
  get length(): number {
    return this.items.length - this.head;
  }

  /**
   * Pop the front code point, or `undefined` when empty
   */
  next(): CodePoint | undefined {
    if (this.head >= this.items.length) return undefined;

    const scalar = this.items[this.head];
    this.head++;

    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return scalar;
  }

  /**
   * Read a queued code point without removing it
   *
   * @param offset - Distance from the front (0 is the next code point)
   */
  peek(offset: number): CodePoint | undefined {
    if (offset < 0) return undefined;
    return this.items[this.head + offset];
  }

  /**
   * Insert code points before everything currently queued, keeping their relative order
   */
  prepend(scalars: CodePoint | Iterable<CodePoint>): void {
    const batch = toBatch(scalars);
    if (batch.length === 0) return;

    if (batch.length <= this.head) {
      this.head -= batch.length;
      batch.forEach((scalar, i) => {
        this.items[this.head + i] = scalar;
      });
    } else {
      this.items = batch.concat(this.items.slice(this.head));
      this.head = 0;
    }
  }

  /**
   * Insert code points after everything currently queued
   */
  append(scalars: CodePoint | Iterable<CodePoint>): void {
    for (const scalar of toBatch(scalars)) {
      this.items.push(scalar);
    }
  }
}

/**
 * Code point source draining the pushback buffer before the underlying iterator
 */
export class ScalarSource {
  private exhausted = false;

  constructor(
    private readonly iterator: Iterator<CodePoint>,
    readonly buffer: ScalarBuffer = new ScalarBuffer()
  ) {}

  /**
   * Next code point of the stream, or `undefined` at end of input
   */
  next(): CodePoint | undefined {
    const buffered = this.buffer.next();
    if (buffered !== undefined) return buffered;
    return this.pull();
  }

  /**
   * Read straight from the underlying iterator, bypassing the buffer
   */
  pull(): CodePoint | undefined {
    if (this.exhausted) return undefined;

    const result = this.iterator.next();
    if (result.done === true) {
      this.exhausted = true;
      return undefined;
    }
    return result.value;
  }

  /**
   * Return over-read code points so they are the next ones handed out
   */
  pushBack(scalars: CodePoint | Iterable<CodePoint>): void {
    this.buffer.prepend(scalars);
  }
}

/**
 * Non-consuming reader over a {@link ScalarSource}
 *
 * Walks the queued code points first, then pulls from the iterator and appends
 * every pulled code point to the buffer. Whenever reading stops (normally or
 * through an exception) the buffer holds the untouched stream prefix.
 */
export class Lookahead {
  private offset = 0;

  constructor(private readonly source: ScalarSource) {}

  /**
   * Code points looked at so far
   */
  get consumed(): number {
    return this.offset;
  }

  next(): CodePoint | undefined {
    const buffer = this.source.buffer;
    if (this.offset < buffer.length) {
      return buffer.peek(this.offset++);
    }

    const scalar = this.source.pull();
    if (scalar !== undefined) {
      buffer.append(scalar);
      this.offset++;
    }
    return scalar;
  }
}
