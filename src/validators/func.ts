// =============================================================================
// Function adapters — plain functions as validator capabilities
// =============================================================================

import type {
  ArrayValidator,
  BytesValidator,
  DateValidator,
  FloatValidator,
  IntegerValidator,
  StringValidator,
} from "../ports/validator.port.js";

export type Check<T> = (value: T) => string | undefined;

export const stringValidator = (check: Check<string>): StringValidator => ({ validateString: check });
export const bytesValidator = (check: Check<Uint8Array>): BytesValidator => ({ validateBytes: check });
export const integerValidator = (check: Check<bigint>): IntegerValidator => ({ validateInteger: check });
export const floatValidator = (check: Check<number>): FloatValidator => ({ validateFloat: check });
export const arrayValidator = (check: Check<readonly unknown[]>): ArrayValidator => ({ validateArray: check });
export const dateValidator = (check: Check<Date>): DateValidator => ({ validateDate: check });
