// =============================================================================
// Unquote — Decode a raw JSON string token into text or bytes
// =============================================================================

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const REPLACEMENT = 0xfffd;

const utf8 = new TextDecoder();

const SIMPLE_ESCAPES: Record<number, number> = {
  0x22: 0x22, // \"
  0x5c: 0x5c, // \\
  0x2f: 0x2f, // \/
  0x62: 0x08, // \b
  0x66: 0x0c, // \f
  0x6e: 0x0a, // \n
  0x72: 0x0d, // \r
  0x74: 0x09, // \t
};

/**
 * Decode a quoted string token (quotes included) into UTF-8 bytes.
 *
 * When the content holds nothing to decode, the result is a view into
 * `raw`; callers that keep it past the scanner's next read must copy.
 * Returns `undefined` for malformed content: raw control characters, a bare
 * quote, an unknown escape or a truncated `\u` sequence.
 */
export function unquoteBytes(raw: Uint8Array): Uint8Array | undefined {
  const last = raw.length - 1;
  if (last < 1 || raw[0] !== QUOTE || raw[last] !== QUOTE) return undefined;
  const inner = raw.subarray(1, last);

  let i = 0;
  while (i < inner.length) {
    const c = inner[i];
    if (c === BACKSLASH || c === QUOTE || c < 0x20) break;
    i++;
  }
  if (i === inner.length) return inner;

  // escapes only ever shrink the content
  const out = new Uint8Array(inner.length);
  out.set(inner.subarray(0, i));
  let w = i;

  while (i < inner.length) {
    const c = inner[i];
    if (c === QUOTE || c < 0x20) return undefined;
    if (c !== BACKSLASH) {
      out[w++] = c;
      i++;
      continue;
    }

    if (i + 1 >= inner.length) return undefined;
    const escape = inner[i + 1];
    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      out[w++] = simple;
      i += 2;
      continue;
    }
    if (escape !== 0x75) return undefined;

    let rune = readHex4(inner, i + 2);
    if (rune < 0) return undefined;
    i += 6;

    if (rune >= 0xd800 && rune <= 0xdbff) {
      const low = inner[i] === BACKSLASH && inner[i + 1] === 0x75 ? readHex4(inner, i + 2) : -1;
      if (low >= 0xdc00 && low <= 0xdfff) {
        rune = 0x10000 + ((rune - 0xd800) << 10) + (low - 0xdc00);
        i += 6;
      } else {
        rune = REPLACEMENT;
      }
    } else if (rune >= 0xdc00 && rune <= 0xdfff) {
      rune = REPLACEMENT;
    }
    w = writeUtf8(out, w, rune);
  }

  return out.subarray(0, w);
}

/** Decode a quoted string token into text. Invalid UTF-8 becomes U+FFFD. */
export function unquote(raw: Uint8Array): string | undefined {
  const bytes = unquoteBytes(raw);
  return bytes === undefined ? undefined : utf8.decode(bytes);
}

function readHex4(bytes: Uint8Array, at: number): number {
  if (at + 4 > bytes.length) return -1;
  let value = 0;
  for (let k = at; k < at + 4; k++) {
    const digit = hexValue(bytes[k]);
    if (digit < 0) return -1;
    value = (value << 4) | digit;
  }
  return value;
}

function hexValue(c: number): number {
  if (c >= 0x30 && c <= 0x39) return c - 0x30;
  if (c >= 0x61 && c <= 0x66) return c - 0x61 + 10;
  if (c >= 0x41 && c <= 0x46) return c - 0x41 + 10;
  return -1;
}

function writeUtf8(out: Uint8Array, at: number, rune: number): number {
  if (rune < 0x80) {
    out[at] = rune;
    return at + 1;
  }
  if (rune < 0x800) {
    out[at] = 0xc0 | (rune >> 6);
    out[at + 1] = 0x80 | (rune & 0x3f);
    return at + 2;
  }
  if (rune < 0x10000) {
    out[at] = 0xe0 | (rune >> 12);
    out[at + 1] = 0x80 | ((rune >> 6) & 0x3f);
    out[at + 2] = 0x80 | (rune & 0x3f);
    return at + 3;
  }
  out[at] = 0xf0 | (rune >> 18);
  out[at + 1] = 0x80 | ((rune >> 12) & 0x3f);
  out[at + 2] = 0x80 | ((rune >> 6) & 0x3f);
  out[at + 3] = 0x80 | (rune & 0x3f);
  return at + 4;
}
