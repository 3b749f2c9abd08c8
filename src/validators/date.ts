import type { DateValidator } from "../ports/validator.port.js";
import { messages } from "./messages.js";

export class DateBound implements DateValidator {
  private readonly message: string;

  constructor(
    readonly limit: Date,
    private readonly direction: "notBefore" | "notAfter",
  ) {
    if (Number.isNaN(limit.getTime())) throw new RangeError("Date limit must be a valid date");
    this.message = messages[direction](limit.toISOString());
  }

  validateDate(value: Date): string | undefined {
    const diff = value.getTime() - this.limit.getTime();
    const ok = this.direction === "notBefore" ? diff >= 0 : diff <= 0;
    return ok ? undefined : this.message;
  }
}

export const notBefore = (limit: Date) => new DateBound(limit, "notBefore");
export const notAfter = (limit: Date) => new DateBound(limit, "notAfter");
