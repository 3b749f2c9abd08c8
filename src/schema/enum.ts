import _ from "lodash";
import type { AnyDestType } from "../dest/types.js";
import { SchemaPrepareError } from "../errors.js";
import type { SchemaType, Slot, ValidationIssue } from "../ports/schema.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { messages } from "../validators/messages.js";
import { AbstractSchema } from "./abstract-schema.js";
import { issue } from "./issues.js";

/**
 * Parses with the wrapped schema, then requires the assigned value to deep
 * equal one of the allowed values.
 */
export class EnumSchema extends AbstractSchema<void> {
  protected readonly label = "Enum";
  private readonly message: string;

  constructor(
    private readonly inner: SchemaType,
    private readonly allowed: readonly unknown[],
  ) {
    super();
    this.message = messages.notOneOf(allowed.map((value) => String(value)).join(","));
  }

  protected bind(type: AnyDestType): void {
    for (const value of this.allowed) {
      if (!type.is(value)) {
        throw new SchemaPrepareError(`Enum value ${String(value)} is not a valid ${type.name}`);
      }
    }
    this.inner.prepare(type);
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    this.bound();
    const issues = await this.inner.parse(path, scanner, slot);
    if (issues.length > 0) return issues;

    const value = slot.get();
    return this.allowed.some((allowed) => _.isEqual(allowed, value)) ? [] : issue(path, this.message);
  }
}
