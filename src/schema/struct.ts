// =============================================================================
// Struct — JSON objects into struct destinations
// =============================================================================
//
//   ExpectOpenBrace → { ExpectKeyOrClose → ExpectColon → ExpectValue
//                       → ExpectCommaOrClose } → Done
//
// Unknown keys are skipped. An explicit `null` counts as absent: optional
// fields are reset to undefined and the property stays unseen.
// =============================================================================

import _ from "lodash";
import { resolveFields } from "../dest/fields.js";
import type { FieldStep, ResolvedField } from "../dest/fields.js";
import { isRecord, unwrapOptional } from "../dest/types.js";
import type { AnyDestType } from "../dest/types.js";
import { DestinationError, SchemaPrepareError, UnexpectedEndError } from "../errors.js";
import type { SchemaType, Slot, ValidationIssue } from "../ports/schema.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { TokenKind, describeToken } from "../scanner/token.js";
import { unquote } from "../scanner/unquote.js";
import { messages } from "../validators/messages.js";
import { AbstractSchema } from "./abstract-schema.js";
import { containerPath } from "./path.js";
import { keySlot } from "./slot.js";

export interface PropOptions {
  /** Assigned, unvalidated, when the property is absent. */
  default?: unknown;
}

/** A JSON property: its name, its schema and an optional default. */
export class Prop {
  constructor(
    readonly name: string,
    readonly schema: SchemaType,
    readonly fallback?: { readonly value: unknown },
  ) {}
}

interface PropBinding {
  readonly prop: Prop;
  readonly field: ResolvedField;
  readonly required: boolean;
}

interface StructBinding {
  readonly props: readonly PropBinding[];
  readonly exact: ReadonlyMap<string, number>;
  readonly folded: ReadonlyMap<string, number>;
}

export class StructSchema extends AbstractSchema<StructBinding> {
  protected readonly label = "Struct";

  constructor(private readonly props: readonly Prop[]) {
    super();
  }

  protected bind(type: AnyDestType): StructBinding {
    if (type.kind !== "struct") throw this.reject(type, "a struct type");

    const fields = resolveFields(type);
    const props: PropBinding[] = [];
    const missing: string[] = [];

    for (const prop of this.props) {
      const field = findField(fields, prop.name);
      if (!field) {
        missing.push(prop.name);
        continue;
      }

      const inner = unwrapOptional(field.type);
      if (inner.kind === "optional") {
        throw new SchemaPrepareError(`Field for prop ${prop.name} has a nested optional type ${field.type.name}`);
      }
      if (prop.fallback) {
        const value = prop.fallback.value;
        if (value === null || value === undefined) {
          throw new SchemaPrepareError(`Default for prop ${prop.name} must not be null or undefined`);
        }
        if (!inner.is(value)) {
          throw new SchemaPrepareError(`Default for prop ${prop.name} is not a valid ${inner.name}`);
        }
      }

      prop.schema.prepare(inner);
      props.push({ prop, field, required: field.type.kind !== "optional" });
    }

    if (missing.length > 0) {
      throw new SchemaPrepareError(`No field for props: ${missing.join(", ")} on struct ${type.name}`);
    }

    const exact = new Map<string, number>();
    const folded = new Map<string, number>();
    props.forEach(({ prop }, index) => {
      if (!exact.has(prop.name)) exact.set(prop.name, index);
      const lower = prop.name.toLowerCase();
      if (!folded.has(lower)) folded.set(lower, index);
    });
    return { props, exact, folded };
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    const binding = this.bound();
    const target = slot.get();
    if (!isRecord(target)) {
      throw new DestinationError(`Struct schema at ${path} needs an object destination`);
    }

    const open = await scanner.readToken();
    if (open.kind === TokenKind.End) throw new UnexpectedEndError();
    if (open.kind !== TokenKind.ObjectBegin) {
      throw scanner.syntaxError(`Expected '{' not ${describeToken(open.kind)}`);
    }

    const base = containerPath(path);
    const seen = binding.props.map(() => false);
    const issues: ValidationIssue[] = [];

    for (;;) {
      // ExpectKeyOrClose
      const keyToken = await scanner.readToken();
      if (keyToken.kind === TokenKind.ObjectEnd) break;
      if (keyToken.kind === TokenKind.End) throw new UnexpectedEndError();
      if (keyToken.kind !== TokenKind.String) {
        throw scanner.syntaxError(`Expected object property name or '}' not ${describeToken(keyToken.kind)}`);
      }
      const key = unquote(keyToken.bytes);
      if (key === undefined) throw scanner.syntaxError("Invalid object property name");

      // ExpectColon
      const colon = await scanner.readToken();
      if (colon.kind === TokenKind.End) throw new UnexpectedEndError();
      if (colon.kind !== TokenKind.KeySep) {
        throw scanner.syntaxError(`Expected ':' not ${describeToken(colon.kind)}`);
      }

      // ExpectValue
      const index = binding.exact.get(key) ?? binding.folded.get(key.toLowerCase());
      if (index === undefined) {
        await scanner.skipValue();
      } else if ((await scanner.peekToken()) === TokenKind.Null) {
        await scanner.readToken();
        const { field } = binding.props[index];
        if (field.type.kind === "optional") clearField(target, field.steps);
      } else {
        const { prop, field } = binding.props[index];
        issues.push(...(await prop.schema.parse(base + key, scanner, openField(target, field))));
        seen[index] = true;
      }

      // ExpectCommaOrClose
      const next = await scanner.readToken();
      if (next.kind === TokenKind.ObjectEnd) break;
      if (next.kind === TokenKind.End) throw new UnexpectedEndError();
      if (next.kind !== TokenKind.ItemSep) {
        throw scanner.syntaxError(`Expected ',' or '}' not ${describeToken(next.kind)}`);
      }
    }

    // Done
    binding.props.forEach(({ prop, field, required }, index) => {
      if (seen[index]) return;
      if (prop.fallback) {
        fieldSlot(target, field.steps).set(_.cloneDeep(prop.fallback.value));
      } else if (required) {
        issues.push({ path: base + prop.name, message: messages.required() });
      }
    });
    return issues;
  }
}

function findField(fields: readonly ResolvedField[], name: string): ResolvedField | undefined {
  const lower = name.toLowerCase();
  return fields.find((f) => f.name === name) ?? fields.find((f) => f.name.toLowerCase() === lower);
}

/** Slot of the field at the end of `steps`, allocating embedded structs on the way. */
function fieldSlot(root: Record<string, unknown>, steps: readonly FieldStep[]): Slot {
  let target = root;
  for (const step of steps.slice(0, -1)) {
    const current = target[step.key];
    if (isRecord(current)) {
      target = current;
      continue;
    }
    const created = unwrapOptional(step.type).zero();
    if (!isRecord(created)) {
      throw new DestinationError(`Embedded field ${step.key} is not a struct`);
    }
    target[step.key] = created;
    target = created;
  }
  return keySlot(target, steps[steps.length - 1].key);
}

/** Reset a field to undefined; embedded structs that are absent stay absent. */
function clearField(root: Record<string, unknown>, steps: readonly FieldStep[]): void {
  let target = root;
  for (const step of steps.slice(0, -1)) {
    const current = target[step.key];
    if (!isRecord(current)) return;
    target = current;
  }
  target[steps[steps.length - 1].key] = undefined;
}

/** Like fieldSlot, but an absent field first receives a zero value to parse into. */
function openField(root: Record<string, unknown>, field: ResolvedField): Slot {
  const slot = fieldSlot(root, field.steps);
  if (slot.get() === undefined) slot.set(unwrapOptional(field.type).zero());
  return slot;
}
