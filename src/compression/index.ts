/**
 * @module compression
 * @description Gzip support for CSV files on disk
 */

export { CompressionDetector } from "./detector";
export { compress, DEFAULT_GZIP_LEVEL, decompress, type GzipLevel } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";
