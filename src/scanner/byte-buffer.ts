// =============================================================================
// ByteBuffer — Growable, left-compacting window over an input stream
// =============================================================================
//
//   0 ........ start ........ cursor ........ end ........ capacity
//              ^ pinned        ^ next unread   ^ filled
//
// Bytes before the cursor are consumed and may be discarded on the next
// reserve(), unless a pin holds them in place.
// =============================================================================

export class ByteBuffer {
  private data: Uint8Array;
  private cursor = 0;
  private end = 0;
  private pin = -1;
  /** Absolute stream offset of `data[0]`. */
  private base = 0;

  constructor(private readonly chunkSize: number) {
    this.data = new Uint8Array(chunkSize);
  }

  get capacity(): number {
    return this.data.length;
  }

  /** Unread bytes currently held. */
  get available(): number {
    return this.end - this.cursor;
  }

  /** Absolute offset of the next unread byte. */
  get position(): number {
    return this.base + this.cursor;
  }

  /** Total bytes received from the stream so far. */
  get received(): number {
    return this.base + this.end;
  }

  /** The unread byte at `index` (relative to the cursor). Caller checks `available`. */
  peek(index: number): number {
    return this.data[this.cursor + index];
  }

  /** View of unread bytes `[from, to)`. Invalidated by the next `reserve()`. */
  view(from: number, to: number): Uint8Array {
    return this.data.subarray(this.cursor + from, this.cursor + to);
  }

  advance(count: number): void {
    this.cursor += count;
  }

  /**
   * Make room for one more chunk after the filled region and return that
   * region. Slides live bytes to the front when that frees enough space,
   * grows the buffer otherwise.
   */
  reserve(): Uint8Array {
    if (this.capacity - this.end < this.chunkSize) {
      const keepFrom = this.pin >= 0 ? Math.min(this.pin, this.cursor) : this.cursor;
      const live = this.end - keepFrom;

      if (this.capacity - live >= this.chunkSize) {
        this.data.copyWithin(0, keepFrom, this.end);
      } else {
        const grown = new Uint8Array(2 * this.capacity + this.chunkSize);
        grown.set(this.data.subarray(keepFrom, this.end));
        this.data = grown;
      }
      this.shift(keepFrom);
    }
    return this.data.subarray(this.end, this.end + this.chunkSize);
  }

  /** Record that `count` bytes were written into the last reserved region. */
  commit(count: number): void {
    this.end += count;
  }

  /** Keep every byte from the cursor onwards until `release()`. */
  hold(): void {
    this.pin = this.cursor;
  }

  /** Copy of the bytes from the pin to the cursor; drops the pin. */
  release(): Uint8Array {
    const held = this.pin >= 0 ? this.data.slice(this.pin, this.cursor) : new Uint8Array(0);
    this.pin = -1;
    return held;
  }

  private shift(by: number): void {
    this.base += by;
    this.cursor -= by;
    this.end -= by;
    if (this.pin >= 0) this.pin -= by;
  }
}
