/**
 * CSVReader tests across input kinds and header handling
 */

import { describe, expect, test } from "vitest";
import { ConfigurationError, EncodingError, MalformedInputError } from "../../src/errors";
import { decodeBytes, detectBOM } from "../../src/reader/input";
import { CSVReader } from "../../src/reader/reader";
import type { ReaderOptions } from "../../src/reader/types";

describe("CSVReader", () => {
  describe("headers", () => {
    test("takes the first line as headers and numbers data rows from zero", () => {
      const reader = new CSVReader("name,age\nAda,36\nBob,41\n", { header: "firstLine" });

      expect(reader.headers).toEqual(["name", "age"]);
      expect(reader.readRow()).toEqual({ index: 0, fields: ["Ada", "36"] });
      expect(reader.readRow()).toEqual({ index: 1, fields: ["Bob", "41"] });
      expect(reader.readRow()).toBeUndefined();
    });

    test("has no headers by default", () => {
      const reader = new CSVReader("name,age\n");
      expect(reader.headers).toEqual([]);
      expect(reader.readRow()?.fields).toEqual(["name", "age"]);
    });

    test("reads records keyed by header", () => {
      const reader = new CSVReader("a,b,c\n1\n4,5,6,7\n", { header: "firstLine" });

      expect(reader.readRecord()).toEqual({ a: "1", b: "", c: "" });
      expect(reader.readRecord()).toEqual({ a: "4", b: "5", c: "6" });
      expect(reader.readRecord()).toBeUndefined();
    });

    test("refuses records without headers", () => {
      expect(() => new CSVReader("a\n").readRecord()).toThrow(ConfigurationError);
    });
  });

  test("iterates rows", () => {
    const reader = new CSVReader("1,2\n3,4\n");
    expect([...reader].map((row) => row.fields)).toEqual([
      ["1", "2"],
      ["3", "4"],
    ]);
  });

  test("parses a whole input", () => {
    expect(CSVReader.parse("h1;h2\r\nx;y\r\n", {
      delimiters: { field: ";", row: "\r\n" },
      header: "firstLine",
    })).toEqual({ headers: ["h1", "h2"], rows: [["x", "y"]] });
  });

  test("trims whitespace around unquoted fields", () => {
    expect(CSVReader.parse(" a ,\tb\n", { trim: "whitespaces" }).rows).toEqual([["a", "b"]]);
  });

  test("never joins two quoted sections separated by whitespace", () => {
    expect(() => CSVReader.parse('"abc" "def",x\n', { trim: "whitespaces" })).toThrow(
      MalformedInputError
    );
  });

  describe("input kinds", () => {
    test("reads code point iterables", () => {
      expect(CSVReader.parse([0x61, 0x2c, 0x1f600]).rows).toEqual([["a", "😀"]]);
    });

    test("strips a UTF-8 byte order mark", () => {
      const bytes = Uint8Array.of(0xef, 0xbb, 0xbf, 0x61, 0x2c, 0x62, 0x0a);
      expect(CSVReader.parse(bytes).rows).toEqual([["a", "b"]]);
    });

    test("follows a UTF-16LE byte order mark", () => {
      const bytes = Uint8Array.of(0xff, 0xfe, 0x61, 0x00, 0x2c, 0x00, 0x62, 0x00);
      expect(CSVReader.parse(bytes).rows).toEqual([["a", "b"]]);
    });

    test("reads unmarked UTF-16 as big-endian", () => {
      const bytes = Uint8Array.of(0x00, 0x61, 0x00, 0x2c, 0x00, 0x62);
      expect(CSVReader.parse(bytes, { encoding: "utf16" }).rows).toEqual([["a", "b"]]);
    });

    test("decodes Shift_JIS", () => {
      const bytes = Uint8Array.of(0x82, 0xa0, 0x2c, 0x41);
      expect(CSVReader.parse(bytes, { encoding: "shiftjis" }).rows).toEqual([["あ", "A"]]);
    });
  });
});

describe("byte input", () => {
  test("detects byte order marks", () => {
    expect(detectBOM(Uint8Array.of(0xff, 0xfe, 0x00, 0x00))?.encoding).toBe("utf32le");
    expect(detectBOM(Uint8Array.of(0xff, 0xfe, 0x61, 0x00))?.encoding).toBe("utf16le");
    expect(detectBOM(Uint8Array.of(0x00, 0x00, 0xfe, 0xff))?.encoding).toBe("utf32be");
    expect(detectBOM(Uint8Array.of(0xfe, 0xff))?.encoding).toBe("utf16be");
    expect(detectBOM(Uint8Array.of(0x61))).toBeUndefined();
  });

  test("drops a matching byte order mark and reads unmarked UTF-32 as big-endian", () => {
    expect(decodeBytes(Uint8Array.of(0xef, 0xbb, 0xbf, 0x61), "utf8")).toBe("a");
    expect(decodeBytes(Uint8Array.of(0x00, 0x00, 0x00, 0x41), "utf32")).toBe("A");
  });

  test("validates options before decoding", () => {
    const options: unknown = { encoding: "ebcdic" };
    expect(() => new CSVReader(Uint8Array.of(0x41), options as ReaderOptions)).toThrow(
      ConfigurationError
    );
  });

  test("rejects encodings it cannot decode", () => {
    const encoding: unknown = "ebcdic";
    expect(() => decodeBytes(Uint8Array.of(0x41), encoding as "utf8")).toThrow(EncodingError);
  });
});
