export { messages } from "./messages.js";
export { MinLength, MaxLength, minLen, maxLen } from "./length.js";
export { Pattern, pattern } from "./pattern.js";
export { Bound, MultipleOf, max, exclusiveMax, min, exclusiveMin, multipleOf } from "./number.js";
export type { Limit } from "./number.js";
export { DateBound, notBefore, notAfter } from "./date.js";
export {
  stringValidator,
  bytesValidator,
  integerValidator,
  floatValidator,
  arrayValidator,
  dateValidator,
} from "./func.js";
export type { Check } from "./func.js";
