/**
 * Structured error hierarchy for jsonbind.
 *
 * Everything thrown by the library extends {@link JsonbindError}, so callers
 * can tell broken input from infrastructure failure:
 *
 * ```ts
 * try {
 *   const issues = await parser.parseInto(req, dest);
 *   if (issues.length > 0) return reply(422, issues);
 * } catch (e) {
 *   if (e instanceof JsonSyntaxError) return reply(400, e.message);
 *   throw e; // reader failure, rethrown unchanged
 * }
 * ```
 *
 * Validation issues are never thrown by the core; they are returned as
 * values. Only {@link ValidationFailedError} wraps them, for `parseOrThrow`.
 *
 * @module errors
 */

import type { ValidationIssue } from "./ports/schema.port.js";

/** Base error for all jsonbind errors. Includes an error code for programmatic matching. */
export class JsonbindError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "JsonbindError";
    this.code = code;
  }
}

/** Thrown when the input is not well-formed JSON. Fatal for the whole document. */
export class JsonSyntaxError extends JsonbindError {
  /** Byte offset (from the start of the document) where the problem was found. */
  readonly offset: number;
  constructor(message: string, offset: number) {
    super("SYNTAX_ERROR", `${message} (at byte ${offset})`);
    this.name = "JsonSyntaxError";
    this.offset = offset;
  }
}

/** Thrown when the input ends in the middle of a value or before one was read. */
export class UnexpectedEndError extends JsonbindError {
  constructor() {
    super("UNEXPECTED_END", "Unexpected end of input");
    this.name = "UnexpectedEndError";
  }
}

/** Thrown when a document exceeds the configured `maxBytes`. */
export class InputTooLargeError extends JsonbindError {
  readonly limit: number;
  constructor(limit: number) {
    super("INPUT_TOO_LARGE", `Input exceeds the limit of ${limit} bytes`);
    this.name = "InputTooLargeError";
    this.limit = limit;
  }
}

/** Thrown at parser construction when a schema does not fit its destination type. */
export class SchemaPrepareError extends JsonbindError {
  constructor(message: string) {
    super("PREPARE_ERROR", message);
    this.name = "SchemaPrepareError";
  }
}

/** Thrown when a parse call is handed a destination the parser was not built for. */
export class DestinationError extends JsonbindError {
  constructor(message: string) {
    super("BAD_DESTINATION", message);
    this.name = "DestinationError";
  }
}

/** Thrown by `parseOrThrow` when the document was valid JSON but failed validation. */
export class ValidationFailedError extends JsonbindError {
  readonly issues: readonly ValidationIssue[];
  constructor(issues: readonly ValidationIssue[]) {
    const first = issues[0];
    const summary = first ? `${first.path}: ${first.message}` : "no issues";
    const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : "";
    super("VALIDATION_FAILED", `Validation failed: ${summary}${more}`);
    this.name = "ValidationFailedError";
    this.issues = issues;
  }
}
