import { describe, expect, test } from "vitest";
import { DecodingSession } from "../../src/decoder/session";
import { BufferError, ConfigurationError } from "../../src/errors";

const PEOPLE = "name,age\nAda,36\nBob,41\n";

describe("DecodingSession", () => {
  test("looks fields up by header name or column index", () => {
    const session = new DecodingSession(PEOPLE, { reader: { header: "firstLine" } });

    expect(session.headers).toEqual(["name", "age"]);
    expect(session.bufferingStrategy).toBe("keepAll");
    expect(session.field(1, "age")).toBe("41");
    expect(session.field(0, 0)).toBe("Ada");
    expect(session.columnIndex("age")).toBe(1);
  });

  test("fails on unknown columns", () => {
    const session = new DecodingSession(PEOPLE, { reader: { header: "firstLine" } });
    expect(() => session.field(0, "email")).toThrow(BufferError);
    expect(() => session.field(0, 7)).toThrow(BufferError);
  });

  test("refuses name lookup when header names repeat", () => {
    const session = new DecodingSession("a,a\n1,2\n", { reader: { header: "firstLine" } });

    expect(() => session.field(0, "a")).toThrow(ConfigurationError);
    expect(session.field(0, 1)).toBe("2");
  });

  test("discards earlier rows under the sequential strategy", () => {
    const session = new DecodingSession(PEOPLE, {
      reader: { header: "firstLine" },
      bufferingStrategy: "sequential",
    });

    expect(session.field(1, "name")).toBe("Bob");
    expect(() => session.row(0)).toThrow(BufferError);
    expect(session.rowIfPresent(2)).toBeUndefined();
  });

  test("iterates rows from a starting index", () => {
    const session = new DecodingSession("1\n2\n3\n");
    expect([...session.rows(1)].map((row) => row.fields[0])).toEqual(["2", "3"]);
    expect([...session.rows()].map((row) => row.index)).toEqual([0, 1, 2]);
  });

  test("validates the buffering strategy", () => {
    const strategy: unknown = "lru";
    expect(
      () => new DecodingSession(PEOPLE, { bufferingStrategy: strategy as "keepAll" })
    ).toThrow(ConfigurationError);
  });
});
