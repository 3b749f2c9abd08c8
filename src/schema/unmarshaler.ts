import type { AnyDestType, JsonUnmarshaler, UnmarshalerType } from "../dest/types.js";
import type { Slot, ValidationIssue } from "../ports/schema.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { messages } from "../validators/messages.js";
import { AbstractSchema } from "./abstract-schema.js";
import { issue } from "./issues.js";

const utf8 = new TextDecoder();

/**
 * Hands the raw text of one value to a destination that decodes itself.
 * Whatever `unmarshalJSON` throws is reported as a validation issue.
 */
export class UnmarshalerSchema extends AbstractSchema<UnmarshalerType<JsonUnmarshaler>> {
  protected readonly label = "Unmarshaler";

  protected bind(type: AnyDestType): UnmarshalerType<JsonUnmarshaler> {
    if (type.kind === "unmarshaler") return type;
    throw this.reject(type, "a type with unmarshalJSON()");
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    const type = this.bound();
    const raw = utf8.decode(await scanner.readRawValue());

    const current = slot.get();
    const target = type.is(current) ? current : type.zero();
    if (target !== current) slot.set(target);

    try {
      target.unmarshalJSON(raw);
    } catch (err) {
      return issue(path, messages.unmarshalFailed(err instanceof Error ? err.message : String(err)));
    }
    return [];
  }
}
