// =============================================================================
// Scanner — Incremental JSON tokenizer over a ByteReader
// =============================================================================

import { InputTooLargeError, JsonSyntaxError, JsonbindError, UnexpectedEndError } from "../errors.js";
import type { ByteReader } from "../ports/byte-reader.port.js";
import { ByteBuffer } from "./byte-buffer.js";
import {
  NUMBER_END,
  NUMBER_REJECT,
  NumberState,
  rejectionMessage,
  startNumber,
  stepNumber,
} from "./number-machine.js";
import { TokenKind, describeToken } from "./token.js";
import type { Token } from "./token.js";

export const DEFAULT_READ_SIZE = 512;

/** Consecutive zero-byte reads tolerated before the reader is considered stuck. */
const MAX_EMPTY_READS = 1024;

const SPACE = 0x20;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;

const TRUE_BYTES = new TextEncoder().encode("true");
const FALSE_BYTES = new TextEncoder().encode("false");
const NULL_BYTES = new TextEncoder().encode("null");

const END_TOKEN: Token = { kind: TokenKind.End, bytes: new Uint8Array(0) };

const SINGLE_BYTE_TOKENS: Partial<Record<number, TokenKind>> = {
  0x7b: TokenKind.ObjectBegin,
  0x7d: TokenKind.ObjectEnd,
  0x5b: TokenKind.ArrayBegin,
  0x5d: TokenKind.ArrayEnd,
  0x2c: TokenKind.ItemSep,
  0x3a: TokenKind.KeySep,
};

function isSpace(c: number): boolean {
  return c === 0x20 || c === 0x09 || c === 0x0a || c === 0x0d;
}

export interface ScannerOptions {
  /** Bytes requested from the reader per refill (default: 512) */
  readSize?: number;
  /** Fail once more than this many bytes have been received */
  maxBytes?: number;
}

/**
 * Pulls bytes from a reader and splits them into JSON tokens.
 *
 * Token bytes are views into a buffer the scanner owns and reuses: they are
 * only valid until the next call on the same scanner. A scanner serves one
 * document from one reader and is not reusable.
 */
export class Scanner {
  private readonly buffer: ByteBuffer;
  private readonly maxBytes: number | undefined;
  private ended = false;
  private failure: { readonly error: unknown } | undefined;

  constructor(
    private readonly reader: ByteReader,
    options: ScannerOptions = {},
  ) {
    this.buffer = new ByteBuffer(options.readSize ?? DEFAULT_READ_SIZE);
    this.maxBytes = options.maxBytes;
  }

  /** Bytes consumed so far, whitespace included. */
  get bytesRead(): number {
    return this.buffer.position;
  }

  /**
   * Consume and return the next token. Resolves to an `End` token when the
   * input is exhausted before one starts.
   */
  async readToken(): Promise<Token> {
    if (!(await this.skipSpace())) return END_TOKEN;

    const first = this.buffer.peek(0);
    const single = SINGLE_BYTE_TOKENS[first];
    if (single !== undefined) return this.take(single, 1);

    switch (first) {
      case QUOTE:
        return this.readString();
      case 0x74:
        return this.readLiteral(TokenKind.True, TRUE_BYTES);
      case 0x66:
        return this.readLiteral(TokenKind.False, FALSE_BYTES);
      case 0x6e:
        return this.readLiteral(TokenKind.Null, NULL_BYTES);
    }

    const state = startNumber(first);
    if (state !== undefined) return this.readNumber(state);

    throw this.syntaxError(`Unexpected character ${quoteByte(first)}, expected a JSON value`);
  }

  /** Kind of the next token, judged from its first byte, without consuming it. */
  async peekToken(): Promise<TokenKind> {
    if (!(await this.skipSpace())) return TokenKind.End;

    const first = this.buffer.peek(0);
    const single = SINGLE_BYTE_TOKENS[first];
    if (single !== undefined) return single;

    switch (first) {
      case QUOTE:
        return TokenKind.String;
      case 0x74:
        return TokenKind.True;
      case 0x66:
        return TokenKind.False;
      case 0x6e:
        return TokenKind.Null;
    }
    if (startNumber(first) !== undefined) return TokenKind.Number;

    throw this.syntaxError(`Unexpected character ${quoteByte(first)}, expected a JSON value`);
  }

  /**
   * Read the token of a value in a position where one is required. When the
   * token opens an object or array, the whole container is skipped and the
   * returned token only tells which kind it was.
   */
  async readValue(): Promise<Token> {
    const token = await this.readToken();
    switch (token.kind) {
      case TokenKind.End:
        throw new UnexpectedEndError();
      case TokenKind.ObjectBegin:
      case TokenKind.ArrayBegin:
        await this.skipContainer(token.kind);
        return { kind: token.kind, bytes: END_TOKEN.bytes };
      case TokenKind.ObjectEnd:
      case TokenKind.ArrayEnd:
      case TokenKind.ItemSep:
      case TokenKind.KeySep:
        throw this.syntaxError(`Expected a value not ${describeToken(token.kind)}`);
      default:
        return token;
    }
  }

  /** Consume one complete value without interpreting it. */
  async skipValue(): Promise<void> {
    await this.readValue();
  }

  /**
   * Consume one complete value and return a copy of its exact bytes,
   * nested containers included.
   */
  async readRawValue(): Promise<Uint8Array> {
    if (!(await this.skipSpace())) throw new UnexpectedEndError();
    this.buffer.hold();
    try {
      await this.readValue();
    } catch (err) {
      this.buffer.release();
      throw err;
    }
    return this.buffer.release();
  }

  /**
   * Skip the rest of a container whose opening token (`open`) was already
   * consumed, checking that brackets pair up.
   */
  async skipContainer(open: TokenKind.ObjectBegin | TokenKind.ArrayBegin): Promise<void> {
    const stack: TokenKind[] = [open];
    while (stack.length > 0) {
      const token = await this.readToken();
      switch (token.kind) {
        case TokenKind.End:
          throw new UnexpectedEndError();
        case TokenKind.ObjectBegin:
        case TokenKind.ArrayBegin:
          stack.push(token.kind);
          break;
        case TokenKind.ObjectEnd:
        case TokenKind.ArrayEnd: {
          const expected = token.kind === TokenKind.ObjectEnd ? TokenKind.ObjectBegin : TokenKind.ArrayBegin;
          if (stack.pop() !== expected) {
            throw this.syntaxError(`Unexpected ${describeToken(token.kind)}`);
          }
          break;
        }
      }
    }
  }

  /** A syntax error located at the scanner's current position. */
  syntaxError(message: string, ahead = 0): JsonSyntaxError {
    return new JsonSyntaxError(message, this.buffer.position + ahead);
  }

  // ---------------------------------------------------------------------------
  // Token recognizers
  // ---------------------------------------------------------------------------

  private async readString(): Promise<Token> {
    let escaped = false;
    for (let i = 1; ; i++) {
      if (i >= this.buffer.available && !(await this.fill())) {
        throw new UnexpectedEndError();
      }
      const c = this.buffer.peek(i);
      if (escaped) {
        escaped = false;
      } else if (c === BACKSLASH) {
        escaped = true;
      } else if (c === QUOTE) {
        return this.take(TokenKind.String, i + 1);
      }
    }
  }

  private async readLiteral(kind: TokenKind, expected: Uint8Array): Promise<Token> {
    const complete = await this.ensure(expected.length);
    const length = Math.min(expected.length, this.buffer.available);
    for (let i = 0; i < length; i++) {
      if (this.buffer.peek(i) !== expected[i]) {
        throw this.syntaxError(`Expected '${describeToken(kind)}'`);
      }
    }
    if (!complete) throw new UnexpectedEndError();
    return this.take(kind, expected.length);
  }

  private async readNumber(initial: NumberState): Promise<Token> {
    let state = initial;
    let length = 1;
    for (;;) {
      let atEnd = false;
      if (length >= this.buffer.available && !(await this.fill())) atEnd = true;

      // past the last byte, a space forces the machine to settle
      const next = stepNumber(state, atEnd ? SPACE : this.buffer.peek(length));
      if (next === NUMBER_END) return this.take(TokenKind.Number, length);
      if (next === NUMBER_REJECT) throw this.syntaxError(rejectionMessage(state), length);
      state = next;
      length++;
    }
  }

  // ---------------------------------------------------------------------------
  // Buffer management
  // ---------------------------------------------------------------------------

  private take(kind: TokenKind, length: number): Token {
    const bytes = this.buffer.view(0, length);
    this.buffer.advance(length);
    return { kind, bytes };
  }

  /** Move past whitespace. Resolves to false when the input ends first. */
  private async skipSpace(): Promise<boolean> {
    for (;;) {
      let i = 0;
      const available = this.buffer.available;
      while (i < available && isSpace(this.buffer.peek(i))) i++;
      this.buffer.advance(i);
      if (i < available) return true;
      if (!(await this.fill())) return false;
    }
  }

  /** Buffer at least `count` unread bytes. Resolves to false when the input ends first. */
  private async ensure(count: number): Promise<boolean> {
    while (this.buffer.available < count) {
      if (!(await this.fill())) return false;
    }
    return true;
  }

  /**
   * Read one more chunk. Resolves to false once the reader is exhausted;
   * a reader failure is remembered and rethrown on every later call.
   */
  private async fill(): Promise<boolean> {
    if (this.failure) throw this.failure.error;
    if (this.ended) return false;

    const into = this.buffer.reserve();
    for (let attempt = 0; attempt < MAX_EMPTY_READS; attempt++) {
      let count: number | null;
      try {
        count = await this.reader.read(into);
      } catch (err) {
        this.failure = { error: err };
        throw err;
      }

      if (count === null) {
        this.ended = true;
        return false;
      }
      if (count > 0) {
        this.buffer.commit(count);
        if (this.maxBytes !== undefined && this.buffer.received > this.maxBytes) {
          const error = new InputTooLargeError(this.maxBytes);
          this.failure = { error };
          throw error;
        }
        return true;
      }
    }

    const stalled = new JsonbindError("READER_STALLED", `Reader returned no data ${MAX_EMPTY_READS} times in a row`);
    this.failure = { error: stalled };
    throw stalled;
  }
}

function quoteByte(c: number): string {
  return c >= 0x20 && c < 0x7f ? `'${String.fromCharCode(c)}'` : `0x${c.toString(16).padStart(2, "0")}`;
}
