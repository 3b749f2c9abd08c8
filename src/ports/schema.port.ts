// =============================================================================
// Schema Port — Contract every schema node implements
// =============================================================================

import type { AnyDestType } from "../dest/types.js";
import type { Scanner } from "../scanner/scanner.js";

/** One client-facing validation failure. */
export interface ValidationIssue {
  /** Slash-delimited location, e.g. `/`, `/name`, `/items/0/`. */
  readonly path: string;
  readonly message: string;
}

/** Addressable handle to the destination value a node must fill. */
export interface Slot {
  get(): unknown;
  set(value: unknown): void;
}

export interface SchemaType {
  /**
   * Bind this node to a destination type. Runs once, before any `parse`.
   * Throws `SchemaPrepareError` when the type does not fit.
   */
  prepare(type: AnyDestType): void;

  /**
   * Decode one JSON value from `scanner` into `slot`.
   *
   * Resolves to the validation issues found (empty when valid). Malformed
   * input, reader failures and destination mismatches are thrown instead.
   */
  parse(path: string, scanner: Scanner, slot: Slot): Promise<ValidationIssue[]>;
}
