import type { ValidationIssue } from "../ports/schema.port.js";
import { describeValue } from "../scanner/token.js";
import type { Token } from "../scanner/token.js";
import { messages } from "../validators/messages.js";

export function issue(path: string, message: string): ValidationIssue[] {
  return [{ path, message }];
}

/** The value had the wrong JSON type. */
export function mismatch(path: string, expected: string, token: Token): ValidationIssue[] {
  return issue(path, messages.invalidType(expected, describeValue(token)));
}

/** Issues for every failed check, in order. */
export function collect(path: string, results: ReadonlyArray<string | undefined>): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const message of results) {
    if (message !== undefined) issues.push({ path, message });
  }
  return issues;
}
