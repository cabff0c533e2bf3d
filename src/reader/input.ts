/**
 * Reader input adapters
 *
 * Turns strings, byte arrays and code point iterables into the code point
 * iterator the row parser consumes. Byte input is decoded with iconv-lite,
 * honouring a leading byte order mark.
 */

import iconv from "iconv-lite";
import { EncodingError } from "../errors";
import type { CodePoint, TextEncodingName } from "../types";
import type { ScalarInput } from "./types";

type DecodableEncoding = Exclude<TextEncodingName, "utf16" | "utf32">;

interface ByteOrderMark {
  readonly encoding: DecodableEncoding;
  readonly bytes: readonly number[];
}

// UTF-32LE must be tried before UTF-16LE, whose mark it starts with
const BYTE_ORDER_MARKS: readonly ByteOrderMark[] = [
  { encoding: "utf32le", bytes: [0xff, 0xfe, 0x00, 0x00] },
  { encoding: "utf16le", bytes: [0xff, 0xfe] },
  { encoding: "utf8", bytes: [0xef, 0xbb, 0xbf] },
  { encoding: "utf32be", bytes: [0x00, 0x00, 0xfe, 0xff] },
  { encoding: "utf16be", bytes: [0xfe, 0xff] },
];

const ICONV_NAMES: Record<DecodableEncoding, string> = {
  ascii: "ascii",
  utf8: "utf8",
  utf16be: "utf16be",
  utf16le: "utf16le",
  utf32be: "utf32be",
  utf32le: "utf32le",
  shiftjis: "shiftjis",
};

/**
 * Detect a byte order mark at the start of the input
 */
export function detectBOM(bytes: Uint8Array): ByteOrderMark | undefined {
  return BYTE_ORDER_MARKS.find(
    (mark) => mark.bytes.length <= bytes.length && mark.bytes.every((byte, i) => bytes[i] === byte)
  );
}

function resolveDecoding(
  encoding: TextEncodingName | undefined,
  bom: ByteOrderMark | undefined
): DecodableEncoding {
  switch (encoding) {
    case undefined:
      return bom?.encoding ?? "utf8";
    case "utf16":
      return bom?.encoding === "utf16le" ? "utf16le" : "utf16be";
    case "utf32":
      return bom?.encoding === "utf32le" ? "utf32le" : "utf32be";
    default:
      return encoding;
  }
}

/**
 * Decode bytes to text
 *
 * Unmarked `utf16`/`utf32` input is read big-endian. A byte order mark
 * matching the chosen encoding is dropped.
 *
 * @throws {EncodingError} If the encoding is not supported
 */
export function decodeBytes(bytes: Uint8Array, encoding?: TextEncodingName): string {
  const bom = detectBOM(bytes);
  const resolved = resolveDecoding(encoding, bom);

  const iconvName = ICONV_NAMES[resolved];
  if (iconvName === undefined || !iconv.encodingExists(iconvName)) {
    throw new EncodingError(`Unsupported text encoding: ${String(encoding)}`, String(encoding));
  }

  const skip = bom?.encoding === resolved ? bom.bytes.length : 0;
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset + skip, bytes.byteLength - skip);
  return iconv.decode(buffer, iconvName, { stripBOM: false });
}

function* stringScalars(text: string): Generator<CodePoint, void, undefined> {
  for (const char of text) {
    const scalar = char.codePointAt(0);
    if (scalar !== undefined) yield scalar;
  }
}

/**
 * Code point iterator over any supported reader input
 */
export function toScalarIterator(input: ScalarInput, encoding?: TextEncodingName): Iterator<CodePoint> {
  if (typeof input === "string") return stringScalars(input);
  if (input instanceof Uint8Array) return stringScalars(decodeBytes(input, encoding));
  return input[Symbol.iterator]();
}
