// =============================================================================
// Byte Reader Port — Pull-based byte source the scanner reads from
// =============================================================================

export interface ByteReader {
  /**
   * Copy up to `into.length` bytes into `into`.
   *
   * Resolves to the number of bytes written, or `null` once the input is
   * exhausted. Rejects on transport failure; the scanner treats both the end
   * and a failure as final and never calls `read` again afterwards.
   */
  read(into: Uint8Array): Promise<number | null>;
}
