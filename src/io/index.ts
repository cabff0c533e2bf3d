/**
 * @module io
 * @description CSV files on disk, with transparent gzip
 */

export { readBytes, readCSVFile } from "./file-reader";
export { encodeRows, writeCSVFile } from "./file-writer";
export { type FileProgramContext, getPlatform, runFileProgram } from "./runtime";
export { type CSVFileReadOptions, type CSVFileWriteOptions, FileOptionsSchema } from "./types";
