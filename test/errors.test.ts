import { describe, expect, test } from "vitest";
import {
  BufferError,
  CompressionError,
  EncodingError,
  ERROR_SUGGESTIONS,
  FileError,
  formatCodePoint,
  getErrorSuggestion,
  InferenceError,
  MalformedInputError,
  StreamError,
} from "../src/errors";

describe("errors", () => {
  test("formats code points", () => {
    expect(formatCodePoint(0xe9)).toBe("U+00E9");
    expect(formatCodePoint(0x1f600)).toBe("U+1F600");
  });

  test("renders row and context", () => {
    const error = new MalformedInputError("Unexpected character after closing quote", 3, 1, 0x20);
    expect(error.toString()).toBe(
      "MalformedInputError: Unexpected character after closing quote (row 3)\nContext: column 1, scalar U+0020"
    );
  });

  test("omits missing details", () => {
    expect(new MalformedInputError("Unterminated quoted field", 0, 2).context).toBe("column 2");
    expect(new EncodingError("Unsupported text encoding: x", "x").context).toBe("encoding x");
    expect(new BufferError("gone", 4, "sequential").toString()).toBe(
      "BufferError: gone (row 4)\nContext: strategy sequential"
    );
  });

  test("carries structured context", () => {
    const inference = new InferenceError("no luck", "header", 12, 1);
    expect(inference.context).toBe("sampled 12 code points, 1 rows");

    const cause = new Error("disk full");
    const stream = new StreamError("failed", "failed", "error", 1, { cause });
    expect(stream.cause).toBe(cause);
    expect(stream.context).toBe("status error, attempts 1");
  });

  test("wraps system errors", () => {
    const file = FileError.fromSystemError("read", "/tmp/x.csv", new Error("ENOENT"));
    expect(file.message).toBe("read operation failed: ENOENT");
    expect(file.filePath).toBe("/tmp/x.csv");

    const compression = CompressionError.fromSystemError("compress", "boom");
    expect(compression.message).toBe("gzip compress failed: boom");
  });

  test("suggests a fix per error code", () => {
    expect(getErrorSuggestion(new EncodingError("bad", "ascii", 0xe9))).toBe(
      ERROR_SUGGESTIONS.ENCODING_ERROR
    );
  });
});
