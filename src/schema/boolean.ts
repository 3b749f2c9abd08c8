import type { AnyDestType, BooleanType, StringType } from "../dest/types.js";
import type { Slot, ValidationIssue } from "../ports/schema.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { TokenKind } from "../scanner/token.js";
import { AbstractSchema } from "./abstract-schema.js";
import { mismatch } from "./issues.js";

/** `true`/`false` into a boolean, or into a string as the literal text. */
export class BooleanSchema extends AbstractSchema<BooleanType | StringType> {
  protected readonly label = "Boolean";

  protected bind(type: AnyDestType): BooleanType | StringType {
    if (type.kind === "boolean" || type.kind === "string") return type;
    throw this.reject(type, "boolean or string");
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    const type = this.bound();
    const token = await scanner.readValue();
    if (token.kind !== TokenKind.True && token.kind !== TokenKind.False) {
      return mismatch(path, "a boolean", token);
    }

    const value = token.kind === TokenKind.True;
    slot.set(type.kind === "string" ? String(value) : value);
    return [];
  }
}
