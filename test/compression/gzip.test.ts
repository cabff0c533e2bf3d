import { Effect } from "effect";
import { gzipSync } from "fflate";
import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";
import { compress, decompress } from "../../src/compression/gzip";
import { CompressionService } from "../../src/compression/service";
import { CompressionError } from "../../src/errors";

const CSV_BYTES = new TextEncoder().encode("id,total\n1,9.50\n2,12.00\n");

describe("gzip", () => {
  test("decompresses what it compresses", () => {
    const compressed = compress(CSV_BYTES);
    expect([...compressed.subarray(0, 2)]).toEqual([0x1f, 0x8b]);
    expect(decompress(compressed)).toEqual(CSV_BYTES);
  });

  test("decompresses data from other gzip writers", () => {
    expect(decompress(gzipSync(CSV_BYTES, { level: 9 }))).toEqual(CSV_BYTES);
  });

  test("rejects empty data", () => {
    expect(() => decompress(new Uint8Array(0))).toThrow(/must not be empty/);
  });

  test("rejects invalid magic bytes", () => {
    expect(() => decompress(Uint8Array.of(0x50, 0x4b, 0x03, 0x04))).toThrow(
      /Invalid gzip magic bytes/
    );
  });

  test("wraps library failures", () => {
    // Valid magic bytes, unknown compression method
    const corrupt = Uint8Array.of(0x1f, 0x8b, 0x07, 0, 0, 0, 0, 0, 0, 0, 1, 2, 3, 4, 5, 6, 7, 8);
    expect(() => decompress(corrupt)).toThrow(CompressionError);
    expect(() => decompress(corrupt)).toThrow(/^gzip decompress failed/);
  });
});

describe("CompressionDetector", () => {
  test("detects gzip from the file name", () => {
    expect(CompressionDetector.fromExtension("/data/orders.csv.gz")).toBe("gzip");
    expect(CompressionDetector.fromExtension("ORDERS.CSV.GZIP")).toBe("gzip");
    expect(CompressionDetector.fromExtension("orders.csv")).toBe("none");
  });

  test("prefers magic bytes over the file name", () => {
    expect(CompressionDetector.detect("orders.csv", Uint8Array.of(0x1f, 0x8b, 0x08))).toBe("gzip");
    expect(CompressionDetector.detect("orders.csv.gz", Uint8Array.of(0x69, 0x64))).toBe("none");
    expect(CompressionDetector.detect("orders.csv.gz")).toBe("gzip");
  });
});

describe("CompressionService", () => {
  test("passes data through for the none format", async () => {
    const program = Effect.gen(function* () {
      const svc = yield* CompressionService;
      return yield* svc.compress(CSV_BYTES, "none");
    });

    const result = await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
    expect(result).toBe(CSV_BYTES);
  });

  test("fails with a CompressionError", async () => {
    const program = Effect.gen(function* () {
      const svc = yield* CompressionService;
      return yield* svc.decompress(CSV_BYTES, "gzip");
    });

    const result = await Effect.runPromise(
      program.pipe(Effect.provide(CompressionService.Live), Effect.flip)
    );
    expect(result).toBeInstanceOf(CompressionError);
    expect(result.operation).toBe("decompress");
  });
});
