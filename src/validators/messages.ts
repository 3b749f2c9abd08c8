// =============================================================================
// Messages — Client-facing validation texts
// =============================================================================

export const messages = {
  required: () => "Property is required",
  unexpectedEnd: () => "Unexpected end of input",
  invalidType: (expected: string, got: string) => `Must be ${expected}, got ${got}`,
  invalidString: () => "Invalid string",
  badFormat: (what: string, format: string) => `Must be ${what} in the format ${format}`,
  outOfRange: (typeName: string) => `Must fit in ${typeName}`,
  notFinite: () => "Must be a finite number",
  notOneOf: (allowed: string) => `Must be one of: ${allowed}`,
  unmarshalFailed: (reason: string) => reason,

  minLengthString: (n: number) => `Must be at least ${n} characters long`,
  maxLengthString: (n: number) => `Must be no more than ${n} characters long`,
  minLengthBytes: (n: number) => `Must be at least ${n} bytes long`,
  maxLengthBytes: (n: number) => `Must be no more than ${n} bytes long`,
  minItems: (n: number) => `Must contain at least ${n} items`,
  maxItems: (n: number) => `Must contain no more than ${n} items`,
  pattern: (source: string) => `Must match regex pattern ${source}`,

  lessThan: (limit: string) => `Must be less than ${limit}`,
  atMost: (limit: string) => `Must be less than or equal to ${limit}`,
  greaterThan: (limit: string) => `Must be greater than ${limit}`,
  atLeast: (limit: string) => `Must be greater than or equal to ${limit}`,
  multipleOf: (step: string) => `Must be a multiple of ${step}`,

  notBefore: (date: string) => `Must not be before ${date}`,
  notAfter: (date: string) => `Must not be after ${date}`,
};
