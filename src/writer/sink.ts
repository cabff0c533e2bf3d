/**
 * Byte sinks for encoded CSV output
 */

import type { SinkStatus } from "../types";

/**
 * Destination for encoded bytes
 *
 * `write` reports progress as a count: positive for bytes accepted, `0` when
 * nothing could be accepted right now, and negative on failure, in which case
 * `status` is `"error"` and `error` describes the failure.
 */
export interface ByteSink {
  readonly status: SinkStatus;
  readonly error: Error | undefined;
  write(bytes: Uint8Array): number;
}

export interface MemorySinkOptions {
  /** Maximum bytes retained; writes beyond it make partial or no progress */
  capacity?: number;
  /** Initial backing buffer size */
  initialSize?: number;
}

/**
 * Growable in-memory sink
 *
 * Must be opened before writing. Writing while not open fails and moves the
 * sink to the `error` state.
 */
export class MemorySink implements ByteSink {
  private buffer: Uint8Array;
  private offset = 0;
  private state: SinkStatus = "notOpen";
  private failure: Error | undefined;
  private readonly capacity: number;

  constructor(options: MemorySinkOptions = {}) {
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
    this.buffer = new Uint8Array(options.initialSize ?? 1024);
  }

  get status(): SinkStatus {
    return this.state;
  }

  get error(): Error | undefined {
    return this.failure;
  }

  /**
   * Bytes written so far
   */
  get length(): number {
    return this.offset;
  }

  open(): this {
    if (this.state === "notOpen") this.state = "open";
    return this;
  }

  close(): void {
    if (this.state === "open") this.state = "closed";
  }

  write(bytes: Uint8Array): number {
    if (this.state !== "open") {
      this.failure = new Error(`Cannot write to a sink that is ${this.state}`);
      this.state = "error";
      return -1;
    }

    const accepted = Math.min(bytes.length, this.capacity - this.offset);
    if (accepted <= 0) return 0;

    this.ensureCapacity(this.offset + accepted);
    this.buffer.set(bytes.subarray(0, accepted), this.offset);
    this.offset += accepted;
    return accepted;
  }

  /**
   * Copy of the bytes written so far
   */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;

    let size = Math.max(this.buffer.length, 1);
    while (size < required) size *= 2;

    const grown = new Uint8Array(size);
    grown.set(this.buffer.subarray(0, this.offset));
    this.buffer = grown;
  }
}
