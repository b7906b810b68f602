export { parseTson } from "./app/program.js"
export type { ParseOptions, ResolvedParseOptions } from "./core/config.js"
export { defaultParseOptions, maxDepthLimit, resolveParseOptions } from "./core/config.js"
export type {
  DuplicateKey,
  InputTooLarge,
  InvalidEscape,
  InvalidNumber,
  NestingTooDeep,
  OptionsError,
  ParseError,
  SourcePosition,
  TrailingInput,
  TsonError,
  UnexpectedChar,
  UnexpectedEndOfInput,
  UnterminatedLiteral
} from "./core/errors.js"
export { isParseError } from "./core/errors.js"
export { parseValue } from "./core/parse.js"
export { describeParseError, describeTsonError, formatLocation, renderParseError } from "./core/report.js"
export type { Scanner } from "./core/scanner.js"
export { makeScanner } from "./core/scanner.js"
export * as Value from "./core/value.js"
