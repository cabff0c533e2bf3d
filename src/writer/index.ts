/**
 * @module writer
 * @description CSV writing: scalar encoders, byte sinks and the row writer
 *
 * @example
 * ```typescript
 * import { CSVWriter } from './writer';
 *
 * const bytes = CSVWriter.serialize([["id", "note"], ["1", 'say "hi"']], {
 *   encoding: "utf16le",
 *   bomStrategy: "always",
 * });
 * ```
 */

export {
  byteOrderMark,
  makeScalarEncoder,
  resolveEncoding,
  ScalarEncoder,
} from "./encoder";
export { type ByteSink, MemorySink, type MemorySinkOptions } from "./sink";
export { MAX_WRITE_ATTEMPTS, writeAll } from "./stream";
export type { WriterOptions } from "./types";
export { validateWriterOptions, WriterOptionsSchema } from "./validation";
export { CSVWriter } from "./writer";
