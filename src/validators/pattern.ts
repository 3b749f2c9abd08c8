import type { StringValidator } from "../ports/validator.port.js";
import { messages } from "./messages.js";

/**
 * Unanchored regular expression match; use `^`/`$` to anchor. Global and
 * sticky flags are dropped so repeated checks do not share `lastIndex`.
 */
export class Pattern implements StringValidator {
  private readonly regex: RegExp;
  private readonly message: string;

  constructor(pattern: string | RegExp, message?: string) {
    const source = typeof pattern === "string" ? pattern : pattern.source;
    const flags = typeof pattern === "string" ? "" : pattern.flags.replace(/[gy]/g, "");
    this.regex = new RegExp(source, flags);
    this.message = message || messages.pattern(source);
  }

  validateString(value: string): string | undefined {
    return this.regex.test(value) ? undefined : this.message;
  }
}

export const pattern = (re: string | RegExp, message?: string) => new Pattern(re, message);
