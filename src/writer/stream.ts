/**
 * Stream Writer
 *
 * Pushes a byte sequence into a {@link ByteSink}, tolerating partial writes.
 */

import { StreamError } from "../errors";
import type { ByteSink } from "./sink";

/** Consecutive attempts allowed without progress before giving up */
export const MAX_WRITE_ATTEMPTS = 2;

/**
 * Write every byte to the sink
 *
 * A write accepting some bytes continues with the rest. A write accepting none
 * is retried; after {@link MAX_WRITE_ATTEMPTS} consecutive attempts without
 * progress the write fails. A negative result fails immediately.
 *
 * @throws {StreamError} If the sink is not open, reports an error, or stalls
 */
export function writeAll(sink: ByteSink, bytes: Uint8Array): void {
  if (sink.status !== "open") {
    throw new StreamError(`Output stream is not open (${sink.status})`, "notOpen", sink.status);
  }

  let offset = 0;
  let attempts = 0;
  while (offset < bytes.length) {
    const written = sink.write(bytes.subarray(offset));
    attempts++;

    if (written < 0) {
      throw new StreamError(
        `Output stream failed: ${sink.error?.message ?? "unknown error"}`,
        "failed",
        sink.status,
        attempts,
        { cause: sink.error }
      );
    }

    if (written > 0) {
      offset += written;
      attempts = 0;
    } else if (attempts >= MAX_WRITE_ATTEMPTS) {
      throw new StreamError(
        `Output stream accepted no bytes after ${attempts} attempts`,
        "emptyWrite",
        sink.status,
        attempts
      );
    }
  }
}
