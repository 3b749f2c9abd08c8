// =============================================================================
// Tokens — Lexical units produced by the scanner
// =============================================================================

export enum TokenKind {
  ObjectBegin,
  ObjectEnd,
  ArrayBegin,
  ArrayEnd,
  /** `,` between array items and object members */
  ItemSep,
  /** `:` between an object key and its value */
  KeySep,
  String,
  Number,
  True,
  False,
  Null,
  /** No more input */
  End,
}

export interface Token {
  readonly kind: TokenKind;
  /**
   * The token's raw bytes (strings keep their quotes). A view into the
   * scanner's buffer: only valid until the next read on that scanner.
   */
  readonly bytes: Uint8Array;
}

const TOKEN_NAMES: Record<TokenKind, string> = {
  [TokenKind.ObjectBegin]: "'{'",
  [TokenKind.ObjectEnd]: "'}'",
  [TokenKind.ArrayBegin]: "'['",
  [TokenKind.ArrayEnd]: "']'",
  [TokenKind.ItemSep]: "','",
  [TokenKind.KeySep]: "':'",
  [TokenKind.String]: "string",
  [TokenKind.Number]: "number",
  [TokenKind.True]: "true",
  [TokenKind.False]: "false",
  [TokenKind.Null]: "null",
  [TokenKind.End]: "end of input",
};

/** Short name of a token kind, for syntax error messages. */
export function describeToken(kind: TokenKind): string {
  return TOKEN_NAMES[kind];
}

const MAX_QUOTED_LENGTH = 40;
const utf8 = new TextDecoder();
const latin1 = new TextDecoder("latin1");

/** How a value token reads in a validation message: its text, or the container it opened. */
export function describeValue(token: Token): string {
  switch (token.kind) {
    case TokenKind.ObjectBegin:
      return "an object";
    case TokenKind.ArrayBegin:
      return "an array";
    case TokenKind.True:
    case TokenKind.False:
    case TokenKind.Null:
    case TokenKind.String:
    case TokenKind.Number: {
      const chars = Array.from(utf8.decode(token.bytes));
      return chars.length > MAX_QUOTED_LENGTH ? `${chars.slice(0, MAX_QUOTED_LENGTH).join("")}...` : chars.join("");
    }
    default:
      return describeToken(token.kind);
  }
}

/** Decode an ASCII-only token (numbers, literals). */
export function asciiText(bytes: Uint8Array): string {
  return latin1.decode(bytes);
}
