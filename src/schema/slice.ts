// =============================================================================
// Slice — JSON arrays into array destinations
// =============================================================================

import { unwrapOptional } from "../dest/types.js";
import type { AnyDestType } from "../dest/types.js";
import { SchemaPrepareError, UnexpectedEndError } from "../errors.js";
import type { SchemaType, Slot, ValidationIssue } from "../ports/schema.port.js";
import type { ArrayValidator } from "../ports/validator.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { TokenKind, describeToken } from "../scanner/token.js";
import { collect } from "./issues.js";
import { AbstractSchema } from "./abstract-schema.js";
import { elementPath } from "./path.js";
import { indexSlot } from "./slot.js";

interface SliceBinding {
  /** Declared element type; `optional` elements accept `null`. */
  readonly element: AnyDestType;
  readonly inner: AnyDestType;
}

/**
 * Fills the array found in the slot, truncating it to the decoded length;
 * an empty slot gets a new array. Each element starts from its zero value.
 */
export class SliceSchema extends AbstractSchema<SliceBinding> {
  protected readonly label = "Slice";

  constructor(
    private readonly element: SchemaType,
    private readonly validators: readonly ArrayValidator[],
  ) {
    super();
  }

  protected bind(type: AnyDestType): SliceBinding {
    if (type.kind !== "array") throw this.reject(type, "an array type");

    const inner = unwrapOptional(type.element);
    if (inner.kind === "optional") {
      throw new SchemaPrepareError(`Nested optional element types are not supported: ${type.name}`);
    }
    this.element.prepare(inner);
    return { element: type.element, inner };
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    const { element, inner } = this.bound();

    const open = await scanner.readToken();
    if (open.kind === TokenKind.End) throw new UnexpectedEndError();
    if (open.kind !== TokenKind.ArrayBegin) {
      throw scanner.syntaxError(`Expected '[' not ${describeToken(open.kind)}`);
    }

    const current = slot.get();
    const items: unknown[] = Array.isArray(current) ? current : [];
    items.length = 0;
    if (items !== current) slot.set(items);

    const issues: ValidationIssue[] = [];
    if ((await scanner.peekToken()) === TokenKind.ArrayEnd) {
      await scanner.readToken();
    } else {
      for (let index = 0; ; index++) {
        if (element.kind === "optional" && (await scanner.peekToken()) === TokenKind.Null) {
          await scanner.readToken();
          items.push(undefined);
        } else {
          items.push(inner.zero());
          issues.push(...(await this.element.parse(elementPath(path, index), scanner, indexSlot(items, index))));
        }

        const sep = await scanner.readToken();
        if (sep.kind === TokenKind.ArrayEnd) break;
        if (sep.kind === TokenKind.End) throw new UnexpectedEndError();
        if (sep.kind !== TokenKind.ItemSep) {
          throw scanner.syntaxError(`Expected ',' or ']' not ${describeToken(sep.kind)}`);
        }
      }
    }

    issues.push(
      ...collect(
        path,
        this.validators.map((v) => v.validateArray(items)),
      ),
    );
    return issues;
  }
}
