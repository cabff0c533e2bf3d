/**
 * Scalar Encoder Factory
 *
 * Encodes code points into a {@link ByteSink} in one of the supported text
 * encodings. The factory validates everything up front: an unusable sink or an
 * unknown encoding fails before a single byte is written, and the preamble
 * (typically a byte order mark) is written exactly once.
 *
 * Shift_JIS goes through iconv-lite's mapping tables; the Unicode encodings
 * are produced directly.
 */

import iconv from "iconv-lite";
import { EncodingError, StreamError } from "../errors";
import type { BOMStrategy, CodePoint, TextEncodingName } from "../types";
import type { ByteSink } from "./sink";
import { writeAll } from "./stream";

type ScalarBytes = (scalar: CodePoint, encoding: TextEncodingName) => readonly number[];

const ENCODING_ALIASES: Record<string, TextEncodingName> = {
  ascii: "ascii",
  usascii: "ascii",
  utf8: "utf8",
  utf16: "utf16",
  utf16be: "utf16be",
  utf16le: "utf16le",
  utf32: "utf32",
  utf32be: "utf32be",
  utf32le: "utf32le",
  shiftjis: "shiftjis",
  sjis: "shiftjis",
};

/**
 * Map an encoding label (`"UTF-8"`, `"Shift_JIS"`, ...) to its canonical name
 *
 * @returns The canonical name, or `undefined` when not supported
 */
export function resolveEncoding(label: string): TextEncodingName | undefined {
  const key = label.toLowerCase().replace(/[-_\s]/g, "");
  return Object.hasOwn(ENCODING_ALIASES, key) ? ENCODING_ALIASES[key] : undefined;
}

function isSurrogate(scalar: CodePoint): boolean {
  return scalar >= 0xd800 && scalar <= 0xdfff;
}

function unrepresentable(scalar: CodePoint, encoding: TextEncodingName): EncodingError {
  return new EncodingError(`Character cannot be encoded as ${encoding}`, encoding, scalar);
}

const asciiBytes: ScalarBytes = (scalar, encoding) => {
  if (scalar > 0x7f) throw unrepresentable(scalar, encoding);
  return [scalar];
};

const utf8Bytes: ScalarBytes = (scalar) => {
  if (scalar < 0x80) return [scalar];
  if (scalar < 0x800) return [0xc0 | (scalar >> 6), 0x80 | (scalar & 0x3f)];
  if (scalar < 0x10000) {
    return [0xe0 | (scalar >> 12), 0x80 | ((scalar >> 6) & 0x3f), 0x80 | (scalar & 0x3f)];
  }
  return [
    0xf0 | (scalar >> 18),
    0x80 | ((scalar >> 12) & 0x3f),
    0x80 | ((scalar >> 6) & 0x3f),
    0x80 | (scalar & 0x3f),
  ];
};

function utf16Units(scalar: CodePoint): number[] {
  if (scalar < 0x10000) return [scalar];
  const offset = scalar - 0x10000;
  return [0xd800 | (offset >> 10), 0xdc00 | (offset & 0x3ff)];
}

const utf16beBytes: ScalarBytes = (scalar) =>
  utf16Units(scalar).flatMap((unit) => [unit >> 8, unit & 0xff]);

const utf16leBytes: ScalarBytes = (scalar) =>
  utf16Units(scalar).flatMap((unit) => [unit & 0xff, unit >> 8]);

const utf32beBytes: ScalarBytes = (scalar) => [
  (scalar >>> 24) & 0xff,
  (scalar >> 16) & 0xff,
  (scalar >> 8) & 0xff,
  scalar & 0xff,
];

const utf32leBytes: ScalarBytes = (scalar) => [
  scalar & 0xff,
  (scalar >> 8) & 0xff,
  (scalar >> 16) & 0xff,
  (scalar >>> 24) & 0xff,
];

const QUESTION_MARK = 0x3f;

const shiftJisBytes: ScalarBytes = (scalar, encoding) => {
  const bytes = iconv.encode(String.fromCodePoint(scalar), "shiftjis");
  // iconv-lite substitutes "?" for unmapped characters
  if (bytes.length === 1 && bytes[0] === QUESTION_MARK && scalar !== QUESTION_MARK) {
    throw unrepresentable(scalar, encoding);
  }
  return [...bytes];
};

const SCALAR_BYTES: Record<TextEncodingName, ScalarBytes> = {
  ascii: asciiBytes,
  utf8: utf8Bytes,
  utf16: utf16beBytes,
  utf16be: utf16beBytes,
  utf16le: utf16leBytes,
  utf32: utf32beBytes,
  utf32be: utf32beBytes,
  utf32le: utf32leBytes,
  shiftjis: shiftJisBytes,
};

const BYTE_ORDER_MARKS: Record<TextEncodingName, readonly number[]> = {
  ascii: [],
  utf8: [0xef, 0xbb, 0xbf],
  utf16: [0xfe, 0xff],
  utf16be: [0xfe, 0xff],
  utf16le: [0xff, 0xfe],
  utf32: [0x00, 0x00, 0xfe, 0xff],
  utf32be: [0x00, 0x00, 0xfe, 0xff],
  utf32le: [0xff, 0xfe, 0x00, 0x00],
  shiftjis: [],
};

/**
 * Byte order mark to write ahead of content in the given encoding
 *
 * Under `convention` only `utf16` and `utf32` get one, since their byte order
 * is otherwise unstated.
 */
export function byteOrderMark(encoding: TextEncodingName, strategy: BOMStrategy): Uint8Array {
  switch (strategy) {
    case "never":
      return new Uint8Array(0);
    case "convention":
      return encoding === "utf16" || encoding === "utf32"
        ? Uint8Array.from(BYTE_ORDER_MARKS[encoding])
        : new Uint8Array(0);
    case "always":
      return Uint8Array.from(BYTE_ORDER_MARKS[encoding]);
  }
}

/**
 * Encoder bound to one sink and one encoding
 */
export class ScalarEncoder {
  private readonly toBytes: ScalarBytes;

  constructor(
    private readonly sink: ByteSink,
    readonly encoding: TextEncodingName
  ) {
    this.toBytes = SCALAR_BYTES[encoding];
  }

  /**
   * Bytes of one code point
   *
   * @throws {EncodingError} If the code point is not representable
   */
  bytesOf(scalar: CodePoint): readonly number[] {
    if (!Number.isInteger(scalar) || scalar < 0 || scalar > 0x10ffff || isSurrogate(scalar)) {
      throw new EncodingError("Not a Unicode scalar value", this.encoding, scalar);
    }
    return this.toBytes(scalar, this.encoding);
  }

  /**
   * Encode one code point into the sink
   */
  encode(scalar: CodePoint): void {
    writeAll(this.sink, Uint8Array.from(this.bytesOf(scalar)));
  }

  /**
   * Encode a string into the sink
   *
   * The whole string is encoded before anything is written, so an
   * unrepresentable character leaves the sink untouched.
   */
  encodeString(text: string): void {
    const bytes: number[] = [];
    for (const char of text) {
      const scalar = char.codePointAt(0);
      if (scalar === undefined) continue;
      for (const byte of this.bytesOf(scalar)) bytes.push(byte);
    }
    if (bytes.length > 0) writeAll(this.sink, Uint8Array.from(bytes));
  }
}

/**
 * Create an encoder, writing `preamble` to the sink first
 *
 * @throws {StreamError} If the sink is not open (nothing is written)
 * @throws {EncodingError} If the encoding is not supported (nothing is written)
 */
export function makeScalarEncoder(
  sink: ByteSink,
  encoding: string,
  preamble: Uint8Array = new Uint8Array(0)
): ScalarEncoder {
  if (sink.status !== "open") {
    throw new StreamError(`Output stream is not open (${sink.status})`, "notOpen", sink.status);
  }

  const resolved = resolveEncoding(encoding);
  if (resolved === undefined) {
    throw new EncodingError(`Unsupported text encoding: ${encoding}`, encoding);
  }

  if (preamble.length > 0) writeAll(sink, preamble);
  return new ScalarEncoder(sink, resolved);
}
