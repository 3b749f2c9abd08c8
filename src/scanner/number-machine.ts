// =============================================================================
// Number Machine — Character-level recognizer for JSON number literals
// =============================================================================
//
//   -? (0 | [1-9][0-9]*) (. [0-9]+)? ([eE] [+-]? [0-9]+)?
//
// The scanner feeds one byte at a time. A step either moves to the next
// state, ends the literal (the byte is not part of it), or rejects it.
// =============================================================================

export enum NumberState {
  /** Read the leading `-` */
  Minus,
  /** Integer part is exactly `0` */
  Zero,
  /** Integer part started with 1-9 */
  Integer,
  /** Read the `.` */
  Dot,
  /** At least one fraction digit */
  Fraction,
  /** Read `e` or `E` */
  Exponent,
  /** Read the exponent sign */
  ExponentSign,
  /** At least one exponent digit */
  ExponentDigits,
}

/** The byte just fed terminates the literal and is not part of it. */
export const NUMBER_END = -1;
/** The byte just fed makes the literal malformed. */
export const NUMBER_REJECT = -2;

export type NumberStep = NumberState | typeof NUMBER_END | typeof NUMBER_REJECT;

const isDigit = (c: number) => c >= 0x30 && c <= 0x39;
const isExponentMark = (c: number) => c === 0x65 || c === 0x45;

/** State after the first byte of a literal, or `undefined` if it cannot start one. */
export function startNumber(c: number): NumberState | undefined {
  if (c === 0x2d) return NumberState.Minus;
  if (c === 0x30) return NumberState.Zero;
  if (isDigit(c)) return NumberState.Integer;
  return undefined;
}

export function stepNumber(state: NumberState, c: number): NumberStep {
  switch (state) {
    case NumberState.Minus:
      if (c === 0x30) return NumberState.Zero;
      return isDigit(c) ? NumberState.Integer : NUMBER_REJECT;

    case NumberState.Zero:
      if (c === 0x2e) return NumberState.Dot;
      if (isExponentMark(c)) return NumberState.Exponent;
      return isDigit(c) ? NUMBER_REJECT : NUMBER_END;

    case NumberState.Integer:
      if (isDigit(c)) return NumberState.Integer;
      if (c === 0x2e) return NumberState.Dot;
      if (isExponentMark(c)) return NumberState.Exponent;
      return NUMBER_END;

    case NumberState.Dot:
      return isDigit(c) ? NumberState.Fraction : NUMBER_REJECT;

    case NumberState.Fraction:
      if (isDigit(c)) return NumberState.Fraction;
      if (isExponentMark(c)) return NumberState.Exponent;
      return NUMBER_END;

    case NumberState.Exponent:
      if (isDigit(c)) return NumberState.ExponentDigits;
      return c === 0x2b || c === 0x2d ? NumberState.ExponentSign : NUMBER_REJECT;

    case NumberState.ExponentSign:
      return isDigit(c) ? NumberState.ExponentDigits : NUMBER_REJECT;

    case NumberState.ExponentDigits:
      return isDigit(c) ? NumberState.ExponentDigits : NUMBER_END;
  }
}

/** Why a literal was rejected in `state`. */
export function rejectionMessage(state: NumberState): string {
  switch (state) {
    case NumberState.Minus:
      return "Expected digit after '-' in number literal";
    case NumberState.Zero:
      return "Unexpected digit after leading zero in number literal";
    case NumberState.Dot:
      return "Expected digit after '.' in number literal";
    case NumberState.Exponent:
      return "Expected digit or sign after exponent in number literal";
    case NumberState.ExponentSign:
      return "Expected digit after exponent sign in number literal";
    default:
      return "Malformed number literal";
  }
}
