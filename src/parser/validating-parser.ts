// =============================================================================
// ValidatingParser — bind a schema to a destination type once, parse many
// =============================================================================

import { toByteReader } from "../adapters/reader/index.js";
import type { ParseInput } from "../adapters/reader/index.js";
import { isRecord } from "../dest/types.js";
import type { AnyDestType, DestType } from "../dest/types.js";
import {
  DestinationError,
  JsonbindError,
  SchemaPrepareError,
  UnexpectedEndError,
  ValidationFailedError,
} from "../errors.js";
import { createLogEmitter } from "../logging.js";
import type { LogEmitter } from "../logging.js";
import type { SchemaType, Slot, ValidationIssue } from "../ports/schema.port.js";
import { Scanner } from "../scanner/scanner.js";
import { TokenKind, describeToken } from "../scanner/token.js";
import { messages } from "../validators/messages.js";
import { resolveParserOptions } from "./options.js";
import type { ParserOptions, ResolvedParserOptions } from "./options.js";

export type ParseResult<T> =
  | { success: true; data: T }
  /** `data` holds whatever was decoded before and around the failures. */
  | { success: false; issues: ValidationIssue[]; data: T };

export type CreateParserResult<T> =
  | { success: true; parser: ValidatingParser<T> }
  | { success: false; error: SchemaPrepareError };

/**
 * A schema prepared against one destination type. Holds no per-call state:
 * concurrent parses are fine as long as each has its own destination.
 */
export class ValidatingParser<T> {
  private readonly log: LogEmitter;

  constructor(
    private readonly type: DestType<T>,
    private readonly schema: SchemaType,
    private readonly options: ResolvedParserOptions,
  ) {
    this.log = createLogEmitter(options.logger, options.logLevel);
    this.log("debug", "parser:ready", { type: type.name });
  }

  /**
   * Decode one document into `dest`, which must be a value of the type the
   * parser was built for. Resolves to the validation issues, empty on success.
   */
  async parseInto(input: ParseInput, dest: T): Promise<ValidationIssue[]> {
    if (!this.type.is(dest)) {
      throw new DestinationError(`Destination is not a ${this.type.name}`);
    }
    this.reset(dest);
    return this.run(input, dest);
  }

  /** Decode one document into a fresh zero value. */
  async parse(input: ParseInput): Promise<ParseResult<T>> {
    const data = this.type.zero();
    const issues = await this.run(input, data);
    return issues.length === 0 ? { success: true, data } : { success: false, issues, data };
  }

  /** Like `parse`, but validation issues are thrown as a `ValidationFailedError`. */
  async parseOrThrow(input: ParseInput): Promise<T> {
    const result = await this.parse(input);
    if (!result.success) throw new ValidationFailedError(result.issues);
    return result.data;
  }

  /** Put a reused struct destination back to its zero value, keeping its identity. */
  private reset(dest: T): void {
    const fresh = this.type.zero();
    if (!isRecord(dest) || !isRecord(fresh)) return;
    const target: Record<string, unknown> = dest;
    for (const key of Object.keys(target)) delete target[key];
    Object.assign(target, fresh);
  }

  private async run(input: ParseInput, dest: T): Promise<ValidationIssue[]> {
    const scanner = new Scanner(toByteReader(input), {
      readSize: this.options.readSize,
      maxBytes: this.options.maxBytes,
    });
    const root: Slot = {
      get: () => dest,
      set: () => {
        throw new DestinationError("The root destination cannot be replaced");
      },
    };

    let issues: ValidationIssue[];
    try {
      issues = await this.schema.parse("/", scanner, root);
      if (!this.options.allowTrailingContent) {
        const rest = await scanner.peekToken();
        if (rest !== TokenKind.End) {
          throw scanner.syntaxError(`Unexpected ${describeToken(rest)} after the top-level value`);
        }
      }
    } catch (err) {
      if (err instanceof UnexpectedEndError) {
        issues = [{ path: "/", message: messages.unexpectedEnd() }];
      } else {
        this.log("error", "parse:error", {
          code: err instanceof JsonbindError ? err.code : undefined,
          message: err instanceof Error ? err.message : String(err),
          bytesRead: scanner.bytesRead,
        });
        throw err;
      }
    }

    if (issues.length > 0) {
      this.log("info", "parse:invalid", { issues: issues.length, bytesRead: scanner.bytesRead });
    } else {
      this.log("debug", "parse:ok", { bytesRead: scanner.bytesRead });
    }
    return issues;
  }
}

/**
 * Bind `schema` to the destination described by `type`, which must be a
 * struct or an array type. Configuration mistakes throw `SchemaPrepareError`.
 */
export function createParser<T>(
  type: DestType<T> & AnyDestType,
  schema: SchemaType,
  options?: ParserOptions,
): ValidatingParser<T> {
  const resolved = resolveParserOptions(options);
  if (type.kind !== "struct" && type.kind !== "array") {
    throw new SchemaPrepareError(`Destination must be a struct or array type, not ${type.name}`);
  }
  schema.prepare(type);
  return new ValidatingParser<T>(type, schema, resolved);
}

/** `createParser` that reports configuration mistakes as a value. */
export function tryCreateParser<T>(
  type: DestType<T> & AnyDestType,
  schema: SchemaType,
  options?: ParserOptions,
): CreateParserResult<T> {
  try {
    return { success: true, parser: createParser(type, schema, options) };
  } catch (err) {
    if (err instanceof SchemaPrepareError) return { success: false, error: err };
    throw err;
  }
}
