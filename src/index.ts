// =============================================================================
// jsonbind — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Parser
// ─────────────────────────────────────────────────────────────────────────────

export { ValidatingParser, createParser, tryCreateParser, ParserOptionsSchema } from "./parser/index.js";
export type { CreateParserResult, ParseResult, ParserOptions } from "./parser/index.js";

// ─────────────────────────────────────────────────────────────────────────────
// Destination types & schemas
// ─────────────────────────────────────────────────────────────────────────────

export { d, resolveFields } from "./dest/index.js";
export type { AnyDestType, DestType, Infer, JsonUnmarshaler, ResolvedField } from "./dest/index.js";

export {
  integer,
  float,
  boolean,
  string,
  bytes,
  rawBytes,
  date,
  dateTime,
  slice,
  struct,
  prop,
  enumOf,
  unmarshaler,
  AbstractSchema,
} from "./schema/index.js";
export type { PropOptions } from "./schema/index.js";

// ─────────────────────────────────────────────────────────────────────────────
// Validators
// ─────────────────────────────────────────────────────────────────────────────

export {
  minLen,
  maxLen,
  pattern,
  min,
  max,
  exclusiveMin,
  exclusiveMax,
  multipleOf,
  notBefore,
  notAfter,
  stringValidator,
  bytesValidator,
  integerValidator,
  floatValidator,
  arrayValidator,
  dateValidator,
} from "./validators/index.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports, readers & scanner
// ─────────────────────────────────────────────────────────────────────────────

export type { ByteReader } from "./ports/byte-reader.port.js";
export type { SchemaType, Slot, ValidationIssue } from "./ports/schema.port.js";
export type {
  ArrayValidator,
  BytesValidator,
  DateValidator,
  FloatValidator,
  IntegerValidator,
  StringValidator,
} from "./ports/validator.port.js";
export { BytesReader, IterableReader } from "./adapters/reader/index.js";
export type { ChunkSource, ParseInput } from "./adapters/reader/index.js";
export { Scanner } from "./scanner/scanner.js";
export type { ScannerOptions } from "./scanner/scanner.js";
export { TokenKind } from "./scanner/token.js";
export type { Token } from "./scanner/token.js";
export { unquote, unquoteBytes } from "./scanner/unquote.js";

// ─────────────────────────────────────────────────────────────────────────────
// Errors & logging
// ─────────────────────────────────────────────────────────────────────────────

export {
  JsonbindError,
  JsonSyntaxError,
  UnexpectedEndError,
  InputTooLargeError,
  SchemaPrepareError,
  DestinationError,
  ValidationFailedError,
} from "./errors.js";
export { createConsoleLogger } from "./logging.js";
export type { LogEntry, LogLevel, Logger } from "./logging.js";
