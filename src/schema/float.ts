import type { AnyDestType, FloatType } from "../dest/types.js";
import type { Slot, ValidationIssue } from "../ports/schema.port.js";
import type { FloatValidator } from "../ports/validator.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { TokenKind, asciiText } from "../scanner/token.js";
import { messages } from "../validators/messages.js";
import { AbstractSchema } from "./abstract-schema.js";
import { collect, issue, mismatch } from "./issues.js";

export class FloatSchema extends AbstractSchema<FloatType> {
  protected readonly label = "Float";

  constructor(private readonly validators: readonly FloatValidator[]) {
    super();
  }

  protected bind(type: AnyDestType): FloatType {
    if (type.kind === "float") return type;
    throw this.reject(type, "float64");
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    this.bound();
    const token = await scanner.readValue();
    if (token.kind !== TokenKind.Number) return mismatch(path, "a number", token);

    const value = Number(asciiText(token.bytes));
    if (!Number.isFinite(value)) return issue(path, messages.notFinite());

    const issues = collect(
      path,
      this.validators.map((v) => v.validateFloat(value)),
    );
    if (issues.length > 0) return issues;

    slot.set(value);
    return [];
  }
}
