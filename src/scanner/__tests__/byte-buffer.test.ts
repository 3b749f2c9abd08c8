import { describe, it, expect } from "vitest";

import { ByteBuffer } from "../byte-buffer.js";

function fill(buffer: ByteBuffer, bytes: number[]): void {
  buffer.reserve().set(bytes);
  buffer.commit(bytes.length);
}

describe("ByteBuffer", () => {
  it("hands out chunk-sized regions and tracks unread bytes", () => {
    const buffer = new ByteBuffer(4);
    expect(buffer.reserve().length).toBe(4);
    fill(buffer, [1, 2, 3]);

    expect(buffer.available).toBe(3);
    expect(buffer.peek(1)).toBe(2);
    buffer.advance(2);
    expect(buffer.position).toBe(2);
    expect(buffer.available).toBe(1);
  });

  it("slides unread bytes to the front when that frees a chunk", () => {
    const buffer = new ByteBuffer(4);
    fill(buffer, [1, 2, 3, 4]);
    buffer.advance(4);

    fill(buffer, [5]);
    expect(buffer.capacity).toBe(4);
    expect(buffer.position).toBe(4);
    expect(buffer.received).toBe(5);
    expect(buffer.peek(0)).toBe(5);
  });

  it("grows to twice the capacity plus a chunk when sliding is not enough", () => {
    const buffer = new ByteBuffer(4);
    fill(buffer, [1, 2, 3, 4]);
    buffer.advance(3);

    fill(buffer, [5]);
    expect(buffer.capacity).toBe(12);
    expect(Array.from(buffer.view(0, 2))).toEqual([4, 5]);
    expect(buffer.position).toBe(3);
  });

  it("keeps held bytes across refills and returns a copy on release", () => {
    const buffer = new ByteBuffer(2);
    fill(buffer, [10, 11]);
    buffer.hold();
    buffer.advance(2);

    fill(buffer, [12, 13]);
    buffer.advance(1);
    const held = buffer.release();

    expect(Array.from(held)).toEqual([10, 11, 12]);
    expect(buffer.capacity).toBe(6);
  });
});
