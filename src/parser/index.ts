export { ValidatingParser, createParser, tryCreateParser } from "./validating-parser.js";
export type { CreateParserResult, ParseResult } from "./validating-parser.js";
export { ParserOptionsSchema, resolveParserOptions } from "./options.js";
export type { ParserOptions, ResolvedParserOptions } from "./options.js";
