import { Match } from "effect"

import type { ParseError, TsonError } from "./errors.js"

// CHANGE: render parse failures as human-readable diagnostics
// WHY: every error carries a position the caller can point at in the source
// QUOTE(TZ): "All errors carry enough position information (byte or character offset) for the caller to render a human-readable diagnostic."
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e,s: renderParseError(e, s) has exactly three lines
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the caret sits under column e.position.column
// COMPLEXITY: O(n) where n = input length

const quote = (text: string): string => JSON.stringify(text)

export const describeParseError = (error: ParseError): string =>
  Match.value(error).pipe(
    Match.tag("UnexpectedEndOfInput", () => "Unexpected end of input"),
    Match.tag("UnexpectedChar", (value) => `Unexpected character ${quote(value.char)}`),
    Match.tag("InvalidNumber", (value) => `Invalid number ${quote(value.literal)}`),
    Match.tag("InvalidEscape", (value) => `Invalid escape sequence ${value.sequence}`),
    Match.tag("UnterminatedLiteral", (value) => `Unterminated literal, missing closing ${value.delimiter}`),
    Match.tag("TrailingInput", (value) => `Unexpected trailing input starting with ${quote(value.char)}`),
    Match.tag("DuplicateKey", (value) => `Duplicate key ${quote(value.key)}`),
    Match.tag("NestingTooDeep", (value) => `Maximum nesting depth exceeded (${value.maxDepth})`),
    Match.tag(
      "InputTooLarge",
      (value) => `Input exceeds maximum length (${value.length} > ${value.maxInputLength})`
    ),
    Match.exhaustive
  )

export const formatLocation = (error: ParseError): string =>
  `line ${error.position.line}, column ${error.position.column}`

// Padding mirrors tabs in the source line.
const caretPadding = (sourceLine: string, column: number): string => {
  const before = Array.from(sourceLine).slice(0, column - 1)
  return before.map((char) => (char === "\t" ? "\t" : " ")).join("") + " ".repeat(column - 1 - before.length)
}

/**
 * Render a parse error with the offending source line and a caret.
 *
 * @param error - Error returned by parseValue.
 * @param input - The text that was parsed.
 * @returns Three-line diagnostic.
 *
 * @pure true
 * @invariant first line = description + location
 * @complexity O(n)
 */
export const renderParseError = (error: ParseError, input: string): string => {
  const { column, line } = error.position
  const sourceLine = input.split(/\r?\n/u)[line - 1] ?? ""
  return [
    `${describeParseError(error)} at ${formatLocation(error)}`,
    sourceLine,
    `${caretPadding(sourceLine, column)}^`
  ].join("\n")
}

export const describeTsonError = (error: TsonError): string =>
  error._tag === "OptionsError"
    ? `Invalid parse options: ${error.message}`
    : `${describeParseError(error)} at ${formatLocation(error)}`
