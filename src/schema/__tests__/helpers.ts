import { BytesReader } from "../../adapters/reader/bytes-reader.adapter.js";
import type { AnyDestType } from "../../dest/types.js";
import type { SchemaType, ValidationIssue } from "../../ports/schema.port.js";
import { Scanner } from "../../scanner/scanner.js";

export interface RunResult {
  issues: ValidationIssue[];
  value: unknown;
  scanner: Scanner;
}

/** Prepare `schema` for `type` and parse `json` into a standalone slot. */
export async function runSchema(
  schema: SchemaType,
  type: AnyDestType,
  json: string,
  options: { path?: string; initial?: unknown } = {},
): Promise<RunResult> {
  schema.prepare(type);
  let value: unknown = "initial" in options ? options.initial : type.zero();
  const scanner = new Scanner(new BytesReader(json));
  const issues = await schema.parse(options.path ?? "/v", scanner, {
    get: () => value,
    set: (next) => {
      value = next;
    },
  });
  return { issues, value, scanner };
}
