// =============================================================================
// Destination Types — Runtime descriptors of the values a parser writes into
// =============================================================================
// A schema says how to read and validate JSON; a destination type says what
// the decoded value looks like in memory. Parsers bind one to the other once,
// at construction, and never inspect values reflectively afterwards.
// =============================================================================

import { DestinationError } from "../errors.js";

export type DestKind =
  | "int"
  | "bigint"
  | "float"
  | "boolean"
  | "string"
  | "bytes"
  | "date"
  | "array"
  | "struct"
  | "optional"
  | "unmarshaler";

export interface DestType<T> {
  readonly kind: DestKind;
  /** Human-readable type name used in configuration errors. */
  readonly name: string;
  /** A fresh zero value. Containers are always newly allocated. */
  zero(): T;
  is(value: unknown): value is T;
}

/** Extract the TypeScript type a destination descriptor stands for. */
export type Infer<D> = D extends DestType<infer T> ? T : never;

/** Types that decode their own raw JSON text. */
export interface JsonUnmarshaler {
  unmarshalJSON(raw: string): void;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// -----------------------------------------------------------------------------
// Scalars
// -----------------------------------------------------------------------------

export type IntBits = 8 | 16 | 32 | 53;

/** Integers that fit a JavaScript number: 8/16/32-bit, or any safe integer. */
export class IntType implements DestType<number> {
  readonly kind = "int" as const;
  readonly name: string;
  readonly min: bigint;
  readonly max: bigint;

  constructor(
    readonly bits: IntBits,
    readonly signed: boolean,
  ) {
    if (bits === 53) {
      this.name = signed ? "int" : "uint";
      this.min = signed ? BigInt(Number.MIN_SAFE_INTEGER) : 0n;
      this.max = BigInt(Number.MAX_SAFE_INTEGER);
    } else {
      this.name = `${signed ? "int" : "uint"}${bits}`;
      this.min = signed ? -(1n << BigInt(bits - 1)) : 0n;
      this.max = signed ? (1n << BigInt(bits - 1)) - 1n : (1n << BigInt(bits)) - 1n;
    }
  }

  zero(): number {
    return 0;
  }

  is(value: unknown): value is number {
    return (
      typeof value === "number" &&
      Number.isInteger(value) &&
      value >= Number(this.min) &&
      value <= Number(this.max)
    );
  }
}

/** 64-bit integers, stored as `bigint`. */
export class BigIntType implements DestType<bigint> {
  readonly kind = "bigint" as const;
  readonly name: string;
  readonly min: bigint;
  readonly max: bigint;

  constructor(readonly signed: boolean) {
    this.name = signed ? "int64" : "uint64";
    this.min = signed ? -(1n << 63n) : 0n;
    this.max = signed ? (1n << 63n) - 1n : (1n << 64n) - 1n;
  }

  zero(): bigint {
    return 0n;
  }

  is(value: unknown): value is bigint {
    return typeof value === "bigint" && value >= this.min && value <= this.max;
  }
}

export class FloatType implements DestType<number> {
  readonly kind = "float" as const;
  readonly name = "float64";

  zero(): number {
    return 0;
  }

  is(value: unknown): value is number {
    return typeof value === "number";
  }
}

export class BooleanType implements DestType<boolean> {
  readonly kind = "boolean" as const;
  readonly name = "boolean";

  zero(): boolean {
    return false;
  }

  is(value: unknown): value is boolean {
    return typeof value === "boolean";
  }
}

export class StringType implements DestType<string> {
  readonly kind = "string" as const;
  readonly name = "string";

  zero(): string {
    return "";
  }

  is(value: unknown): value is string {
    return typeof value === "string";
  }
}

export class BytesType implements DestType<Uint8Array> {
  readonly kind = "bytes" as const;
  readonly name = "bytes";

  zero(): Uint8Array {
    return new Uint8Array(0);
  }

  is(value: unknown): value is Uint8Array {
    return value instanceof Uint8Array;
  }
}

export class DateType implements DestType<Date> {
  readonly kind = "date" as const;
  readonly name = "Date";

  zero(): Date {
    return new Date(0);
  }

  is(value: unknown): value is Date {
    return value instanceof Date;
  }
}

export class UnmarshalerType<T extends JsonUnmarshaler> implements DestType<T> {
  readonly kind = "unmarshaler" as const;
  readonly name: string;

  constructor(readonly ctor: new () => T) {
    this.name = ctor.name || "Unmarshaler";
  }

  zero(): T {
    return new this.ctor();
  }

  is(value: unknown): value is T {
    return value instanceof this.ctor;
  }
}

// -----------------------------------------------------------------------------
// Composites
// -----------------------------------------------------------------------------

export class OptionalType<I extends AnyDestType> implements DestType<Infer<I> | undefined> {
  readonly kind = "optional" as const;
  readonly name: string;

  constructor(readonly inner: I) {
    this.name = `${inner.name}?`;
  }

  zero(): Infer<I> | undefined {
    return undefined;
  }

  is(value: unknown): value is Infer<I> | undefined {
    return value === undefined || this.inner.is(value);
  }
}

export class ArrayType<E extends AnyDestType> implements DestType<Array<Infer<E>>> {
  readonly kind = "array" as const;
  readonly name: string;

  constructor(readonly element: E) {
    this.name = `${element.name}[]`;
  }

  zero(): Array<Infer<E>> {
    return [];
  }

  is(value: unknown): value is Array<Infer<E>> {
    return Array.isArray(value) && value.every((item) => this.element.is(item));
  }
}

export interface FieldOptions {
  /** JSON name overriding the key; `-` hides the field from JSON entirely. */
  name?: string;
  /** Promote the fields of this (struct) field into the parent's namespace. */
  embedded?: boolean;
}

/** A struct member carrying options beyond its type. */
export class FieldSpec<D extends AnyDestType> {
  readonly tag: string | undefined;
  readonly embedded: boolean;

  constructor(
    readonly type: D,
    options: FieldOptions = {},
  ) {
    this.tag = options.name;
    this.embedded = options.embedded ?? false;
  }
}

export type StructMember = AnyDestType | FieldSpec<AnyDestType>;
export type StructShape = Record<string, StructMember>;

type MemberOutput<M> = M extends FieldSpec<infer D> ? Infer<D> : Infer<M>;

export type InferShape<S extends StructShape> = {
  [K in keyof S]: MemberOutput<S[K]>;
};

export function memberType(member: StructMember): AnyDestType {
  return member instanceof FieldSpec ? member.type : member;
}

/** A plain object with a fixed set of declared fields. */
export class StructType<S extends StructShape> implements DestType<InferShape<S>> {
  readonly kind = "struct" as const;
  readonly name: string;

  constructor(readonly shape: S) {
    const members = Object.entries(shape).map(([key, member]) => `${key}:${memberType(member).name}`);
    this.name = `{${members.join(",")}}`;
  }

  zero(): InferShape<S> {
    const out: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(this.shape)) {
      out[key] = memberType(member).zero();
    }
    if (this.is(out)) return out;
    throw new DestinationError(`Could not build a zero value for ${this.name}`);
  }

  is(value: unknown): value is InferShape<S> {
    if (!isRecord(value)) return false;
    return Object.entries(this.shape).every(([key, member]) => memberType(member).is(value[key]));
  }
}

export type AnyDestType =
  | IntType
  | BigIntType
  | FloatType
  | BooleanType
  | StringType
  | BytesType
  | DateType
  | UnmarshalerType<JsonUnmarshaler>
  | OptionalType<AnyDestType>
  | ArrayType<AnyDestType>
  | StructType<StructShape>;

/** Strip one optional layer, if present. */
export function unwrapOptional(type: AnyDestType): AnyDestType {
  return type.kind === "optional" ? type.inner : type;
}
