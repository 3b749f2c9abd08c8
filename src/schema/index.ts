// =============================================================================
// Schema builders
// =============================================================================
//
//   const schema = struct(
//     prop("Name", string(minLen(1))),
//     prop("Age", integer(min(0), max(150))),
//     prop("Role", enumOf(string(), "admin", "user"), { default: "user" }),
//     prop("Tags", slice(string(), maxLen(10))),
//   );
//
// =============================================================================

import type { SchemaType } from "../ports/schema.port.js";
import type {
  ArrayValidator,
  BytesValidator,
  DateValidator,
  FloatValidator,
  IntegerValidator,
  StringValidator,
} from "../ports/validator.port.js";
import { BooleanSchema } from "./boolean.js";
import { BytesSchema, RawBytesSchema } from "./bytes.js";
import { DateSchema, DateTimeSchema } from "./date.js";
import { EnumSchema } from "./enum.js";
import { FloatSchema } from "./float.js";
import { IntegerSchema } from "./integer.js";
import { SliceSchema } from "./slice.js";
import { StringSchema } from "./string.js";
import { Prop, StructSchema } from "./struct.js";
import type { PropOptions } from "./struct.js";
import { UnmarshalerSchema } from "./unmarshaler.js";

export const integer = (...validators: IntegerValidator[]) => new IntegerSchema(validators);
export const float = (...validators: FloatValidator[]) => new FloatSchema(validators);
export const boolean = () => new BooleanSchema();
export const string = (...validators: StringValidator[]) => new StringSchema(validators);
export const bytes = (...validators: BytesValidator[]) => new BytesSchema(validators);
export const rawBytes = () => new RawBytesSchema();
export const date = (...validators: DateValidator[]) => new DateSchema(validators);
export const dateTime = (...validators: DateValidator[]) => new DateTimeSchema(validators);
export const slice = (element: SchemaType, ...validators: ArrayValidator[]) => new SliceSchema(element, validators);
export const struct = (...props: Prop[]) => new StructSchema(props);
export const enumOf = (schema: SchemaType, ...allowed: unknown[]) => new EnumSchema(schema, allowed);
export const unmarshaler = () => new UnmarshalerSchema();

export function prop(name: string, schema: SchemaType, options?: PropOptions): Prop {
  const fallback = options && "default" in options ? { value: options.default } : undefined;
  return new Prop(name, schema, fallback);
}

export {
  BooleanSchema,
  BytesSchema,
  DateSchema,
  DateTimeSchema,
  EnumSchema,
  FloatSchema,
  IntegerSchema,
  Prop,
  RawBytesSchema,
  SliceSchema,
  StringSchema,
  StructSchema,
  UnmarshalerSchema,
};
export type { PropOptions };
export { AbstractSchema } from "./abstract-schema.js";
export { containerPath, elementPath } from "./path.js";
