// =============================================================================
// Parser Options — validated once, at parser construction
// =============================================================================

import { z } from "zod";
import { SchemaPrepareError } from "../errors.js";
import type { Logger } from "../logging.js";
import { DEFAULT_READ_SIZE } from "../scanner/scanner.js";

export const ParserOptionsSchema = z.object({
  readSize: z
    .number()
    .int()
    .min(16)
    .max(65_536)
    .default(DEFAULT_READ_SIZE)
    .describe("Bytes requested from the reader per refill"),
  maxBytes: z.number().int().positive().optional().describe("Reject documents larger than this"),
  allowTrailingContent: z
    .boolean()
    .default(false)
    .describe("Leave anything after the top-level value unread instead of failing"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type ParserOptions = z.input<typeof ParserOptionsSchema> & {
  /** Receives lifecycle events; omit for silence. */
  logger?: Logger;
};

export type ResolvedParserOptions = z.output<typeof ParserOptionsSchema> & {
  logger?: Logger;
};

export function resolveParserOptions(options: ParserOptions = {}): ResolvedParserOptions {
  const { logger, ...rest } = options;
  const result = ParserOptionsSchema.safeParse(rest);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new SchemaPrepareError(`Invalid parser options: ${details.join("; ")}`);
  }
  return { ...result.data, logger };
}
