// =============================================================================
// Destination type builders
// =============================================================================
//
//   const Person = d.struct({
//     Name: d.string(),
//     Age: d.int32(),
//     Email: d.optional(d.string()),
//     Tags: d.array(d.string()),
//   });
//   type Person = Infer<typeof Person>;
//
// =============================================================================

import {
  ArrayType,
  BigIntType,
  BooleanType,
  BytesType,
  DateType,
  FieldSpec,
  FloatType,
  IntType,
  OptionalType,
  StringType,
  StructType,
  UnmarshalerType,
} from "./types.js";
import type { AnyDestType, FieldOptions, JsonUnmarshaler, StructShape } from "./types.js";

export const d = {
  int8: () => new IntType(8, true),
  int16: () => new IntType(16, true),
  int32: () => new IntType(32, true),
  uint8: () => new IntType(8, false),
  uint16: () => new IntType(16, false),
  uint32: () => new IntType(32, false),
  /** Any safe integer (`Number.MIN_SAFE_INTEGER`..`Number.MAX_SAFE_INTEGER`). */
  int: () => new IntType(53, true),
  uint: () => new IntType(53, false),
  int64: () => new BigIntType(true),
  uint64: () => new BigIntType(false),
  float64: () => new FloatType(),
  boolean: () => new BooleanType(),
  string: () => new StringType(),
  bytes: () => new BytesType(),
  date: () => new DateType(),

  array: <E extends AnyDestType>(element: E) => new ArrayType(element),
  optional: <I extends AnyDestType>(inner: I) => new OptionalType(inner),
  struct: <S extends StructShape>(shape: S) => new StructType(shape),
  unmarshaler: <T extends JsonUnmarshaler>(ctor: new () => T) => new UnmarshalerType(ctor),

  /** A struct member with a JSON name override (`"-"` hides it). */
  field: <D extends AnyDestType>(type: D, options: FieldOptions) => new FieldSpec(type, options),
  /** A struct member whose fields are promoted into the enclosing struct. */
  embedded: <D extends AnyDestType>(type: D) => new FieldSpec(type, { embedded: true }),
};

export * from "./types.js";
export { resolveFields } from "./fields.js";
export type { FieldStep, ResolvedField } from "./fields.js";
