import type { AnyDestType, StringType } from "../dest/types.js";
import type { Slot, ValidationIssue } from "../ports/schema.port.js";
import type { StringValidator } from "../ports/validator.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { TokenKind } from "../scanner/token.js";
import { unquote } from "../scanner/unquote.js";
import { messages } from "../validators/messages.js";
import { AbstractSchema } from "./abstract-schema.js";
import { collect, issue, mismatch } from "./issues.js";

/** Decoded text. The value is assigned before the validators run. */
export class StringSchema extends AbstractSchema<StringType> {
  protected readonly label = "String";

  constructor(private readonly validators: readonly StringValidator[]) {
    super();
  }

  protected bind(type: AnyDestType): StringType {
    if (type.kind === "string") return type;
    throw this.reject(type, "string");
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    this.bound();
    const token = await scanner.readValue();
    if (token.kind !== TokenKind.String) return mismatch(path, "a string", token);

    const value = unquote(token.bytes);
    if (value === undefined) return issue(path, messages.invalidString());

    slot.set(value);
    return collect(
      path,
      this.validators.map((v) => v.validateString(value)),
    );
  }
}
