// =============================================================================
// Number validators — ranges and multiples, for integers and floats alike
// =============================================================================

import type { FloatValidator, IntegerValidator } from "../ports/validator.port.js";
import { messages } from "./messages.js";

export type Limit = number | bigint;

/** Sign of `value - limit`, exact whenever the limit is integral. */
function compareInteger(value: bigint, limit: Limit): number {
  if (typeof limit === "bigint" || Number.isInteger(limit)) {
    const l = BigInt(limit);
    return value < l ? -1 : value > l ? 1 : 0;
  }
  return compareFloat(Number(value), limit);
}

function compareFloat(value: number, limit: Limit): number {
  const l = Number(limit);
  return value < l ? -1 : value > l ? 1 : 0;
}

function checkLimit(limit: Limit): void {
  if (typeof limit === "number" && !Number.isFinite(limit)) {
    throw new RangeError(`Limit must be a finite number, got ${limit}`);
  }
}

export class Bound implements IntegerValidator, FloatValidator {
  constructor(
    readonly limit: Limit,
    private readonly accepts: (sign: number) => boolean,
    private readonly message: string,
  ) {
    checkLimit(limit);
  }

  validateInteger(value: bigint): string | undefined {
    return this.accepts(compareInteger(value, this.limit)) ? undefined : this.message;
  }

  validateFloat(value: number): string | undefined {
    return this.accepts(compareFloat(value, this.limit)) ? undefined : this.message;
  }
}

export const max = (limit: Limit) => new Bound(limit, (sign) => sign <= 0, messages.atMost(String(limit)));
export const exclusiveMax = (limit: Limit) => new Bound(limit, (sign) => sign < 0, messages.lessThan(String(limit)));
export const min = (limit: Limit) => new Bound(limit, (sign) => sign >= 0, messages.atLeast(String(limit)));
export const exclusiveMin = (limit: Limit) => new Bound(limit, (sign) => sign > 0, messages.greaterThan(String(limit)));

const FLOAT_TOLERANCE = 1e-9;

export class MultipleOf implements IntegerValidator, FloatValidator {
  private readonly message: string;

  constructor(readonly step: Limit) {
    checkLimit(step);
    if (Number(step) === 0) throw new RangeError("Step of a multiple-of check must not be zero");
    this.message = messages.multipleOf(String(step));
  }

  validateInteger(value: bigint): string | undefined {
    if (typeof this.step === "number" && !Number.isInteger(this.step)) {
      return this.validateFloat(Number(value));
    }
    return value % BigInt(this.step) === 0n ? undefined : this.message;
  }

  validateFloat(value: number): string | undefined {
    const quotient = value / Number(this.step);
    return Math.abs(quotient - Math.round(quotient)) < FLOAT_TOLERANCE ? undefined : this.message;
  }
}

export const multipleOf = (step: Limit) => new MultipleOf(step);
