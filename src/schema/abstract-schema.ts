// =============================================================================
// AbstractSchema — Template Method base for prepare-once schema nodes
// =============================================================================
// Subclasses implement bind() to check a destination type and return what
// parse() needs; prepare() runs it once and keeps the result.
// =============================================================================

import _ from "lodash";
import type { AnyDestType } from "../dest/types.js";
import { JsonbindError, SchemaPrepareError } from "../errors.js";
import type { SchemaType, Slot, ValidationIssue } from "../ports/schema.port.js";
import type { Scanner } from "../scanner/scanner.js";

export abstract class AbstractSchema<B> implements SchemaType {
  /** Node name used in configuration errors. */
  protected abstract readonly label: string;

  private binding: { readonly type: AnyDestType; readonly state: B } | undefined;

  prepare(type: AnyDestType): void {
    if (this.binding) {
      if (this.binding.type === type || _.isEqual(this.binding.type, type)) return;
      // surfaces what the other type lacks before the generic refusal
      this.bind(type);
      throw new SchemaPrepareError(
        `${this.label} schema is bound to ${this.binding.type.name} and cannot be reused for ${type.name}`,
      );
    }
    this.binding = { type, state: this.bind(type) };
  }

  abstract parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]>;

  protected abstract bind(type: AnyDestType): B;

  protected bound(): B {
    if (!this.binding) {
      throw new JsonbindError("NOT_PREPARED", `${this.label} schema was used before prepare()`);
    }
    return this.binding.state;
  }

  protected reject(type: AnyDestType, wanted: string): SchemaPrepareError {
    return new SchemaPrepareError(`${this.label} schema wants ${wanted}, not ${type.name}`);
  }
}
