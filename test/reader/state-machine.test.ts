import { describe, expect, test } from "vitest";
import { MalformedInputError } from "../../src/errors";
import { ScalarSource } from "../../src/reader/scalar-buffer";
import { RowParser, scalarsToString, stringToScalars } from "../../src/reader/state-machine";
import { type ReaderConfiguration, RowParseState } from "../../src/reader/types";

function configuration(overrides: Partial<ReaderConfiguration> = {}): ReaderConfiguration {
  return {
    delimiters: { field: stringToScalars(","), row: stringToScalars("\n") },
    hasHeader: false,
    trimScalars: null,
    quoteScalar: 0x22,
    ...overrides,
  };
}

function parserFor(text: string, overrides: Partial<ReaderConfiguration> = {}): RowParser {
  return new RowParser(new ScalarSource(stringToScalars(text)[Symbol.iterator]()), configuration(overrides));
}

function parse(text: string, overrides: Partial<ReaderConfiguration> = {}): string[][] {
  const parser = parserFor(text, overrides);
  const rows: string[][] = [];
  for (let row = parser.nextRow(); row !== undefined; row = parser.nextRow()) {
    rows.push([...row.fields]);
  }
  return rows;
}

describe("RowParser", () => {
  describe("unquoted fields", () => {
    test("splits rows and fields", () => {
      expect(parse("a,b,c\n1,2,3\n")).toEqual([
        ["a", "b", "c"],
        ["1", "2", "3"],
      ]);
    });

    test("emits the last row without a trailing delimiter", () => {
      expect(parse("a,b")).toEqual([["a", "b"]]);
    });

    test("produces no rows for empty input", () => {
      expect(parse("")).toEqual([]);
    });

    test("reads an empty line as a row with zero fields", () => {
      expect(parse("a\n\nb\n")).toEqual([["a"], [], ["b"]]);
    });

    test("keeps empty fields", () => {
      expect(parse("a,\n,b\n")).toEqual([
        ["a", ""],
        ["", "b"],
      ]);
      expect(parse("a,")).toEqual([["a", ""]]);
    });

    test("numbers rows from zero", () => {
      const parser = parserFor("x\ny\n");
      expect(parser.nextRow()?.index).toBe(0);
      expect(parser.nextRow()?.index).toBe(1);
      expect(parser.nextRow()).toBeUndefined();
      expect(parser.currentState).toBe(RowParseState.END_OF_INPUT);
    });
  });

  describe("quoted fields", () => {
    test("embeds delimiters and doubled quotes", () => {
      expect(parse('"a,b","c""d"\n')).toEqual([["a,b", 'c"d']]);
    });

    test("embeds line breaks", () => {
      expect(parse('"x\ny",z\n')).toEqual([["x\ny", "z"]]);
    });

    test("reads a quoted empty field", () => {
      expect(parse('""\n')).toEqual([[""]]);
    });
  });

  describe("malformed input", () => {
    test("rejects text after a closing quote", () => {
      const parser = parserFor('"abc" def,x');
      let caught: unknown;
      try {
        parser.nextRow();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MalformedInputError);
      if (!(caught instanceof MalformedInputError)) return;
      expect(caught.message).toBe("Unexpected character after closing quote");
      expect(caught.rowIndex).toBe(0);
      expect(caught.column).toBe(0);
      expect(caught.scalar).toBe(0x20);
    });

    test("rejects a quote inside an unquoted field", () => {
      expect(() => parse('ab"c\n')).toThrow("Quote character inside an unquoted field");
    });

    test("rejects an unterminated quoted field", () => {
      const parser = parserFor('a\n"abc');
      expect(parser.nextRow()?.fields).toEqual(["a"]);
      expect(() => parser.nextRow()).toThrow("Unterminated quoted field at end of input");
    });

    test("keeps failing after the first error", () => {
      const parser = parserFor('ab"c\nd\n');
      let first: unknown;
      try {
        parser.nextRow();
      } catch (error) {
        first = error;
      }

      expect(first).toBeInstanceOf(MalformedInputError);
      expect(() => parser.nextRow()).toThrow(MalformedInputError);
      try {
        parser.nextRow();
      } catch (error) {
        expect(error).toBe(first);
      }
    });
  });

  describe("trimming", () => {
    const trimScalars = new Set([0x20]);

    test("trims unquoted fields at both ends", () => {
      expect(parse("  a  , b \n", { trimScalars })).toEqual([["a", "b"]]);
    });

    test("keeps interior and quoted spaces", () => {
      expect(parse(' "a b" ,c d\n', { trimScalars })).toEqual([["a b", "c d"]]);
    });

    test("allows trim characters after a closing quote", () => {
      expect(parse('"abc" ,x', { trimScalars })).toEqual([["abc", "x"]]);
    });

    test("rejects a second quoted section after trim characters", () => {
      const parser = parserFor('"abc" "def",x\n', { trimScalars });
      expect(() => parser.nextRow()).toThrow("Quote character after a closed quoted field");
      expect(parser.currentState).toBe(RowParseState.END_OF_INPUT);
    });

    test("still reads a doubled quote without padding", () => {
      expect(parse('"a""b" ,x', { trimScalars })).toEqual([['a"b', "x"]]);
    });
  });

  describe("multi-scalar delimiters", () => {
    const delimiters = { field: stringToScalars("::"), row: stringToScalars("\r\n") };

    test("matches whole delimiters and restores partial matches", () => {
      expect(parse("a::b\r\nc:d\r\n", { delimiters })).toEqual([
        ["a", "b"],
        ["c:d"],
      ]);
    });

    test("keeps a partial delimiter cut by the end of input", () => {
      expect(parse("a\r", { delimiters })).toEqual([["a\r"]]);
    });
  });
});

describe("scalar conversion", () => {
  test("round-trips astral characters", () => {
    const scalars = stringToScalars("a😀é");
    expect(scalars).toEqual([0x61, 0x1f600, 0xe9]);
    expect(scalarsToString(scalars)).toBe("a😀é");
  });

  test("converts long sequences in chunks", () => {
    const text = "x".repeat(20_000);
    expect(scalarsToString(stringToScalars(text))).toBe(text);
  });
});
