// =============================================================================
// Validator Port — Per-kind capability contracts invoked while parsing
// =============================================================================
// Each method returns a client-facing message when the value is invalid and
// `undefined` when it passes. A validator may implement several capabilities
// (a length check works for strings, bytes and arrays alike).
// =============================================================================

export interface StringValidator {
  validateString(value: string): string | undefined;
}

export interface BytesValidator {
  validateBytes(value: Uint8Array): string | undefined;
}

/** Integers are checked at full 64-bit precision, before narrowing to the destination width. */
export interface IntegerValidator {
  validateInteger(value: bigint): string | undefined;
}

export interface FloatValidator {
  validateFloat(value: number): string | undefined;
}

export interface ArrayValidator {
  validateArray(items: readonly unknown[]): string | undefined;
}

export interface DateValidator {
  validateDate(value: Date): string | undefined;
}
