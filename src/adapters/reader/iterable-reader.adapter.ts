// =============================================================================
// IterableReader — ByteReader over any async sequence of chunks
// =============================================================================
// Node `Readable` streams, web `ReadableStream`s and async generators all
// qualify. Chunks larger than the scanner's request are handed out piecewise.
// =============================================================================

import type { ByteReader } from "../../ports/byte-reader.port.js";

const encoder = new TextEncoder();
const EMPTY = new Uint8Array(0);

export type ChunkSource = AsyncIterable<Uint8Array | string>;

export class IterableReader implements ByteReader {
  private readonly iterator: AsyncIterator<Uint8Array | string>;
  private pending: Uint8Array = EMPTY;
  private done = false;

  constructor(source: ChunkSource) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  async read(into: Uint8Array): Promise<number | null> {
    while (this.pending.length === 0) {
      if (this.done) return null;
      const next = await this.iterator.next();
      if (next.done) {
        this.done = true;
        return null;
      }
      this.pending = typeof next.value === "string" ? encoder.encode(next.value) : next.value;
    }

    const count = Math.min(into.length, this.pending.length);
    into.set(this.pending.subarray(0, count));
    this.pending = this.pending.subarray(count);
    return count;
  }
}
