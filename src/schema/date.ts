// =============================================================================
// Date / DateTime — formatted strings into Date destinations
// =============================================================================

import type { AnyDestType, DateType } from "../dest/types.js";
import type { Slot, ValidationIssue } from "../ports/schema.port.js";
import type { DateValidator } from "../ports/validator.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { TokenKind } from "../scanner/token.js";
import { unquote } from "../scanner/unquote.js";
import { messages } from "../validators/messages.js";
import { AbstractSchema } from "./abstract-schema.js";
import { parseDate, parseDateTime } from "./calendar.js";
import { collect, issue, mismatch } from "./issues.js";

abstract class FormattedDateSchema extends AbstractSchema<DateType> {
  protected abstract readonly format: string;

  constructor(private readonly validators: readonly DateValidator[]) {
    super();
  }

  protected abstract read(text: string): Date | undefined;

  protected bind(type: AnyDestType): DateType {
    if (type.kind === "date") return type;
    throw this.reject(type, "Date");
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    this.bound();
    const token = await scanner.readValue();
    if (token.kind !== TokenKind.String) return mismatch(path, "a date", token);

    const text = unquote(token.bytes);
    const value = text === undefined ? undefined : this.read(text);
    if (value === undefined) return issue(path, messages.badFormat("a date", this.format));

    const issues = collect(
      path,
      this.validators.map((v) => v.validateDate(value)),
    );
    if (issues.length > 0) return issues;

    slot.set(value);
    return [];
  }
}

/** A calendar day, stored as midnight UTC. */
export class DateSchema extends FormattedDateSchema {
  protected readonly label = "Date";
  protected readonly format = "yyyy-mm-dd";

  protected read(text: string): Date | undefined {
    return parseDate(text);
  }
}

/** An RFC 3339 timestamp with a zone designator. */
export class DateTimeSchema extends FormattedDateSchema {
  protected readonly label = "DateTime";
  protected readonly format = "yyyy-mm-ddThh:mm:ssZ";

  protected read(text: string): Date | undefined {
    return parseDateTime(text);
  }
}
