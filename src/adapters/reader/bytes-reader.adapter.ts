// =============================================================================
// BytesReader — ByteReader over an in-memory document
// =============================================================================

import type { ByteReader } from "../../ports/byte-reader.port.js";

const encoder = new TextEncoder();

export class BytesReader implements ByteReader {
  private readonly bytes: Uint8Array;
  private position = 0;

  constructor(input: Uint8Array | string) {
    this.bytes = typeof input === "string" ? encoder.encode(input) : input;
  }

  async read(into: Uint8Array): Promise<number | null> {
    const remaining = this.bytes.length - this.position;
    if (remaining <= 0) return null;

    const count = Math.min(into.length, remaining);
    into.set(this.bytes.subarray(this.position, this.position + count));
    this.position += count;
    return count;
  }
}
