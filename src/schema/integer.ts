// =============================================================================
// Integer — whole numbers into int/bigint destinations
// =============================================================================

import type { AnyDestType, BigIntType, IntType } from "../dest/types.js";
import type { Slot, ValidationIssue } from "../ports/schema.port.js";
import type { IntegerValidator } from "../ports/validator.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { TokenKind, asciiText } from "../scanner/token.js";
import { messages } from "../validators/messages.js";
import { AbstractSchema } from "./abstract-schema.js";
import { collect, issue, mismatch } from "./issues.js";

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;
const INTEGER_LITERAL = /^-?\d+$/;

/**
 * Parses an integer literal at 64-bit precision, runs the validators on
 * that value and only then narrows it into the destination width. A value
 * the destination cannot hold is a validation issue, never truncated.
 */
export class IntegerSchema extends AbstractSchema<IntType | BigIntType> {
  protected readonly label = "Integer";

  constructor(private readonly validators: readonly IntegerValidator[]) {
    super();
  }

  protected bind(type: AnyDestType): IntType | BigIntType {
    if (type.kind === "int" || type.kind === "bigint") return type;
    throw this.reject(type, "an integer type");
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    const type = this.bound();
    const token = await scanner.readValue();
    if (token.kind !== TokenKind.Number) return mismatch(path, "an integer", token);

    const text = asciiText(token.bytes);
    if (!INTEGER_LITERAL.test(text)) return mismatch(path, "an integer", token);

    const value = BigInt(text);
    const ceiling = type.max > INT64_MAX ? type.max : INT64_MAX;
    if (value < INT64_MIN || value > ceiling) return issue(path, messages.outOfRange(type.name));

    const issues = collect(
      path,
      this.validators.map((v) => v.validateInteger(value)),
    );
    if (issues.length > 0) return issues;

    if (value < type.min || value > type.max) return issue(path, messages.outOfRange(type.name));
    slot.set(type.kind === "int" ? Number(value) : value);
    return [];
  }
}
