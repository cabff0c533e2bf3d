import { describe, expect, test } from "vitest";
import {
  createDecodingBuffer,
  KeepAllBuffer,
  type RowProducer,
  SequentialBuffer,
} from "../../src/decoder/row-buffer";
import { BufferError } from "../../src/errors";

function producerOf(data: string[][]): { produce: RowProducer; calls: () => number } {
  let next = 0;
  let calls = 0;
  return {
    produce: () => {
      calls++;
      const fields = data[next];
      if (fields === undefined) return undefined;
      return { index: next++, fields };
    },
    calls: () => calls,
  };
}

const DATA = [
  ["a", "b"],
  ["c", "d"],
  ["e", "f"],
];

describe("KeepAllBuffer", () => {
  test("produces rows on demand and serves earlier ones from cache", () => {
    const { produce, calls } = producerOf(DATA);
    const buffer = new KeepAllBuffer(produce);

    expect(buffer.row(2).fields).toEqual(["e", "f"]);
    expect(calls()).toBe(3);
    expect(buffer.row(0).fields).toEqual(["a", "b"]);
    expect(buffer.field(1, 1)).toBe("d");
    expect(calls()).toBe(3);
    expect(buffer.size).toBe(3);
  });

  test("fails past the end of input without producing again", () => {
    const { produce, calls } = producerOf(DATA);
    const buffer = new KeepAllBuffer(produce);

    expect(() => buffer.row(5)).toThrow(BufferError);
    expect(buffer.rowIfPresent(5)).toBeUndefined();
    expect(calls()).toBe(4);
    expect(buffer.row(1).fields).toEqual(["c", "d"]);
  });

  test("fails on a missing column", () => {
    const buffer = new KeepAllBuffer(producerOf(DATA).produce);
    let caught: unknown;
    try {
      buffer.field(0, 2);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BufferError);
    if (!(caught instanceof BufferError)) return;
    expect(caught.requestedRow).toBe(0);
    expect(caught.column).toBe(2);
    expect(caught.strategy).toBe("keepAll");
  });

  test("rejects invalid indices", () => {
    const buffer = new KeepAllBuffer(producerOf(DATA).produce);
    expect(() => buffer.row(-1)).toThrow("Invalid row index: -1");
    expect(() => buffer.row(0.5)).toThrow(BufferError);
  });
});

describe("SequentialBuffer", () => {
  test("retains only the current row", () => {
    const buffer = new SequentialBuffer(producerOf(DATA).produce);

    expect(buffer.row(1).fields).toEqual(["c", "d"]);
    expect(buffer.field(1, 0)).toBe("c");
    expect(() => buffer.row(0)).toThrow(
      "Row 0 was discarded; the sequential buffer is at row 1"
    );
  });

  test("serves fields of the current row in any order", () => {
    const buffer = new SequentialBuffer(producerOf(DATA).produce);

    expect(buffer.field(2, 1)).toBe("f");
    expect(buffer.field(2, 0)).toBe("e");
  });

  test("returns undefined past the end and keeps the last row", () => {
    const buffer = new SequentialBuffer(producerOf(DATA).produce);

    expect(buffer.rowIfPresent(3)).toBeUndefined();
    expect(buffer.row(2).fields).toEqual(["e", "f"]);
    expect(() => buffer.row(4)).toThrow("Row 4 is past the end of input");
  });
});

describe("createDecodingBuffer", () => {
  test("builds the buffer for each strategy", () => {
    const { produce } = producerOf(DATA);
    expect(createDecodingBuffer("keepAll", produce)).toBeInstanceOf(KeepAllBuffer);
    expect(createDecodingBuffer("sequential", produce)).toBeInstanceOf(SequentialBuffer);
  });
});
