// =============================================================================
// Length validators — strings (code points), bytes and arrays
// =============================================================================

import type { ArrayValidator, BytesValidator, StringValidator } from "../ports/validator.port.js";
import { messages } from "./messages.js";

function codePoints(value: string): number {
  let count = 0;
  for (const _ of value) count++;
  return count;
}

function checkLength(kind: string, length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`${kind} length must be a non-negative integer, got ${length}`);
  }
}

export class MinLength implements StringValidator, BytesValidator, ArrayValidator {
  constructor(readonly length: number) {
    checkLength("Minimum", length);
  }

  validateString(value: string): string | undefined {
    return codePoints(value) < this.length ? messages.minLengthString(this.length) : undefined;
  }

  validateBytes(value: Uint8Array): string | undefined {
    return value.length < this.length ? messages.minLengthBytes(this.length) : undefined;
  }

  validateArray(items: readonly unknown[]): string | undefined {
    return items.length < this.length ? messages.minItems(this.length) : undefined;
  }
}

export class MaxLength implements StringValidator, BytesValidator, ArrayValidator {
  constructor(readonly length: number) {
    checkLength("Maximum", length);
  }

  validateString(value: string): string | undefined {
    return codePoints(value) > this.length ? messages.maxLengthString(this.length) : undefined;
  }

  validateBytes(value: Uint8Array): string | undefined {
    return value.length > this.length ? messages.maxLengthBytes(this.length) : undefined;
  }

  validateArray(items: readonly unknown[]): string | undefined {
    return items.length > this.length ? messages.maxItems(this.length) : undefined;
  }
}

export const minLen = (length: number) => new MinLength(length);
export const maxLen = (length: number) => new MaxLength(length);
