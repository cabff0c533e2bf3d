/**
 * Error handling for CSV reading and writing
 *
 * Every failure in the codec is fatal for the session that raised it. Each
 * error class carries the structured context needed to diagnose the problem
 * (offending code point, stream status, encoding, row/column position).
 */

import type { BufferingStrategy, SinkStatus } from "./types";

/**
 * Render a code point as `U+XXXX` for error messages
 */
export function formatCodePoint(scalar: number): string {
  return `U+${scalar.toString(16).toUpperCase().padStart(4, "0")}`;
}

/**
 * Base error class for all codec errors
 */
export class CSVCodecError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly rowIndex?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "CSVCodecError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.rowIndex !== undefined) {
      msg += ` (row ${this.rowIndex})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Contradictory or unusable reader/writer settings, detected before any I/O
 */
export class ConfigurationError extends CSVCodecError {
  constructor(
    message: string,
    public readonly setting: string,
    context?: string
  ) {
    super(message, "CONFIGURATION_ERROR", undefined, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Not enough sampled data to determine delimiters or header presence
 */
export class InferenceError extends CSVCodecError {
  constructor(
    message: string,
    public readonly target: "fieldDelimiter" | "rowDelimiter" | "delimiters" | "header",
    public readonly sampledScalars: number,
    public readonly sampledRows: number
  ) {
    super(
      message,
      "INFERENCE_ERROR",
      undefined,
      `sampled ${sampledScalars} code points, ${sampledRows} rows`
    );
    this.name = "InferenceError";
  }
}

/**
 * Quoting violation in the input
 */
export class MalformedInputError extends CSVCodecError {
  constructor(
    message: string,
    rowIndex: number,
    public readonly column: number,
    public readonly scalar?: number
  ) {
    const context = [
      `column ${column}`,
      scalar !== undefined && `scalar ${formatCodePoint(scalar)}`,
    ]
      .filter(Boolean)
      .join(", ");

    super(message, "MALFORMED_INPUT", rowIndex, context);
    this.name = "MalformedInputError";
  }
}

/**
 * Access to a row or field the decoding buffer cannot serve
 */
export class BufferError extends CSVCodecError {
  constructor(
    message: string,
    public readonly requestedRow: number,
    public readonly strategy: BufferingStrategy,
    public readonly column?: string | number
  ) {
    super(
      message,
      "BUFFER_ERROR",
      requestedRow,
      column === undefined ? `strategy ${strategy}` : `strategy ${strategy}, column ${column}`
    );
    this.name = "BufferError";
  }
}

/**
 * A code point that cannot be represented, or an unsupported encoding
 */
export class EncodingError extends CSVCodecError {
  constructor(
    message: string,
    public readonly encoding: string,
    public readonly scalar?: number
  ) {
    super(
      message,
      "ENCODING_ERROR",
      undefined,
      scalar === undefined
        ? `encoding ${encoding}`
        : `encoding ${encoding}, scalar ${formatCodePoint(scalar)}`
    );
    this.name = "EncodingError";
  }
}

/**
 * Output sink failures: not open, explicit error, or no progress
 */
export class StreamError extends CSVCodecError {
  constructor(
    message: string,
    public readonly reason: "notOpen" | "failed" | "emptyWrite",
    public readonly status: SinkStatus,
    public readonly attempts?: number,
    options?: { cause?: unknown }
  ) {
    super(
      message,
      "STREAM_ERROR",
      undefined,
      attempts === undefined ? `status ${status}` : `status ${status}, attempts ${attempts}`
    );
    this.name = "StreamError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends CSVCodecError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write",
    public readonly systemError?: unknown
  ) {
    super(message, "FILE_ERROR", undefined, filePath);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    return new FileError(
      `${operation} operation failed: ${errorMessage}`,
      filePath,
      operation,
      systemError
    );
  }
}

/**
 * Gzip compression/decompression failures
 */
export class CompressionError extends CSVCodecError {
  constructor(
    message: string,
    public readonly operation: "compress" | "decompress",
    public readonly bytesProcessed?: number
  ) {
    super(message, "COMPRESSION_ERROR");
    this.name = "CompressionError";
  }

  /**
   * Wrap a failure raised by the compression library
   */
  static fromSystemError(
    operation: CompressionError["operation"],
    error: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const detail = error instanceof Error ? error.message : String(error);
    return new CompressionError(`gzip ${operation} failed: ${detail}`, operation, bytesProcessed);
  }
}

/**
 * Error recovery suggestions keyed by error code
 */
export const ERROR_SUGGESTIONS = {
  CONFIGURATION_ERROR:
    "Use non-empty, distinct field and row delimiters that do not contain the quote character",
  INFERENCE_ERROR: "Provide the delimiters and header strategy explicitly",
  MALFORMED_INPUT:
    'Wrap fields containing quotes in quotes and double the inner quotes (e.g. "a ""b"" c")',
  BUFFER_ERROR: 'Use the "keepAll" buffering strategy to revisit earlier rows',
  ENCODING_ERROR: "Select an encoding able to represent every character (e.g. utf8)",
  STREAM_ERROR: "Make sure the output is open and writable, then try again",
  FILE_ERROR: "Check the file path and permissions",
  COMPRESSION_ERROR: "The file may be truncated or not actually gzip compressed",
} as const;

/**
 * Get helpful suggestion for an error
 */
export function getErrorSuggestion(error: CSVCodecError): string | undefined {
  const suggestions: Record<string, string> = ERROR_SUGGESTIONS;
  return suggestions[error.code];
}
