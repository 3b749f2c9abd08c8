// =============================================================================
// Bytes — string contents into a Uint8Array, decoded or verbatim
// =============================================================================

import type { AnyDestType, BytesType } from "../dest/types.js";
import type { Slot, ValidationIssue } from "../ports/schema.port.js";
import type { BytesValidator } from "../ports/validator.port.js";
import type { Scanner } from "../scanner/scanner.js";
import { TokenKind } from "../scanner/token.js";
import { unquoteBytes } from "../scanner/unquote.js";
import { messages } from "../validators/messages.js";
import { AbstractSchema } from "./abstract-schema.js";
import { collect, issue, mismatch } from "./issues.js";

/** Unescaped UTF-8 bytes of a string. */
export class BytesSchema extends AbstractSchema<BytesType> {
  protected readonly label = "Bytes";

  constructor(private readonly validators: readonly BytesValidator[]) {
    super();
  }

  protected bind(type: AnyDestType): BytesType {
    if (type.kind === "bytes") return type;
    throw this.reject(type, "bytes");
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    this.bound();
    const token = await scanner.readValue();
    if (token.kind !== TokenKind.String) return mismatch(path, "a string", token);

    const decoded = unquoteBytes(token.bytes);
    if (decoded === undefined) return issue(path, messages.invalidString());

    // the decoded bytes may be a view of the scanner's buffer
    const value = decoded.slice();
    slot.set(value);
    return collect(
      path,
      this.validators.map((v) => v.validateBytes(value)),
    );
  }
}

/**
 * The bytes between the quotes, copied as they are. For content known to
 * hold no escapes, such as base64.
 */
export class RawBytesSchema extends AbstractSchema<BytesType> {
  protected readonly label = "RawBytes";

  protected bind(type: AnyDestType): BytesType {
    if (type.kind === "bytes") return type;
    throw this.reject(type, "bytes");
  }

  async parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]> {
    this.bound();
    const token = await scanner.readValue();
    if (token.kind !== TokenKind.String) return mismatch(path, "a string", token);

    slot.set(token.bytes.slice(1, token.bytes.length - 1));
    return [];
  }
}
