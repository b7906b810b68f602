import * as Either from "effect/Either"

import type { ParseOptions } from "./config.js"
import { mergeParseOptions } from "./config.js"
import type { ParseError, SourcePosition } from "./errors.js"
import {
  duplicateKey,
  inputTooLarge,
  invalidEscape,
  invalidNumber,
  nestingTooDeep,
  trailingInput,
  unexpectedChar,
  unexpectedEndOfInput,
  unterminatedLiteral
} from "./errors.js"
import type { Scanner } from "./scanner.js"
import { makeScanner } from "./scanner.js"
import * as V from "./value.js"
import type { Value } from "./value.js"

// CHANGE: parse TSON text into a value tree by recursive descent
// WHY: one rule per production keeps every failure positioned at the rule that rejected it
// QUOTE(TZ): "{ \"error_code\": None, \"body\": Some({ \"response\": \"bleblebleble\" }) }"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parseValue(s) = Right(v) → s is one well-formed value surrounded by whitespace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a Left carries the first rejection; no partial tree escapes
// COMPLEXITY: O(n) time, O(d) stack where d = nesting depth

interface ParserContext {
  readonly scanner: Scanner
  readonly maxDepth: number
}

type Rule<A> = Either.Either<A, ParseError>

const unit: Rule<void> = Either.right(undefined)

const simpleEscapes: ReadonlyMap<string, string> = new Map([
  ["\"", "\""],
  ["'", "'"],
  ["\\", "\\"],
  ["/", "/"],
  ["b", "\b"],
  ["f", "\f"],
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"]
])

const isDigit = (char: string | undefined): boolean => char !== undefined && char >= "0" && char <= "9"

const isHexDigit = (char: string): boolean => /^[0-9a-fA-F]$/u.test(char)

const isHighSurrogate = (code: number): boolean => code >= 0xd8_00 && code <= 0xdb_ff

const isLowSurrogate = (code: number): boolean => code >= 0xdc_00 && code <= 0xdf_ff

const endOrUnexpected = (position: SourcePosition, char: string | undefined): ParseError =>
  char === undefined ? unexpectedEndOfInput(position) : unexpectedChar(position, char)

const expectChar = (scanner: Scanner, expected: string): Rule<void> => {
  const position = scanner.position()
  const char = scanner.peek()
  if (char !== expected) {
    return Either.left(endOrUnexpected(position, char))
  }
  scanner.advance()
  return unit
}

const expectKeyword = (scanner: Scanner, keyword: string): Rule<void> => {
  if (scanner.matchLiteral(keyword)) {
    return unit
  }
  for (const expected of keyword) {
    const checked = expectChar(scanner, expected)
    if (Either.isLeft(checked)) {
      return checked
    }
  }
  return unit
}

const enterContainer = (context: ParserContext, depth: number, opener: SourcePosition): Rule<void> =>
  depth > context.maxDepth
    ? Either.left(nestingTooDeep(opener, context.maxDepth))
    : unit

const readHexEscape = (
  scanner: Scanner,
  escapeStart: SourcePosition,
  literalStart: SourcePosition,
  delimiter: string
): Rule<string> => {
  let hex = ""
  for (let index = 0; index < 4; index++) {
    const char = scanner.peek()
    if (char === undefined) {
      return Either.left(unterminatedLiteral(literalStart, delimiter))
    }
    if (!isHexDigit(char)) {
      return Either.left(invalidEscape(escapeStart, `\\u${hex}${char}`))
    }
    scanner.advance()
    hex += char
  }
  return Either.right(String.fromCharCode(Number.parseInt(hex, 16)))
}

// Consumes one escape sequence starting at the backslash and returns its decoded text.
const readEscape = (
  scanner: Scanner,
  literalStart: SourcePosition,
  delimiter: string
): Rule<string> => {
  const escapeStart = scanner.position()
  scanner.advance()
  const char = scanner.peek()
  if (char === undefined) {
    return Either.left(unterminatedLiteral(literalStart, delimiter))
  }
  scanner.advance()
  if (char === "u") {
    return readHexEscape(scanner, escapeStart, literalStart, delimiter)
  }
  const decoded = simpleEscapes.get(char)
  return decoded === undefined
    ? Either.left(invalidEscape(escapeStart, `\\${char}`))
    : Either.right(decoded)
}

const parseString = (scanner: Scanner): Rule<V.StringValue> => {
  const literalStart = scanner.position()
  scanner.advance()
  const contentStart = scanner.position().offset
  // Stays undefined while the literal can be sliced out of the input as is.
  let decoded: Array<string> | undefined
  let chunkStart = contentStart
  for (;;) {
    const offset = scanner.position().offset
    const char = scanner.peek()
    if (char === undefined) {
      return Either.left(unterminatedLiteral(literalStart, "\""))
    }
    if (char === "\"") {
      scanner.advance()
      const span = { start: contentStart, end: offset }
      const value = decoded === undefined
        ? scanner.slice(contentStart, offset)
        : [...decoded, scanner.slice(chunkStart, offset)].join("")
      return Either.right(V.string(value, span))
    }
    if (char === "\\") {
      decoded ??= []
      decoded.push(scanner.slice(chunkStart, offset))
      const escaped = readEscape(scanner, literalStart, "\"")
      if (Either.isLeft(escaped)) {
        return Either.left(escaped.left)
      }
      decoded.push(escaped.right)
      chunkStart = scanner.position().offset
      continue
    }
    scanner.advance()
  }
}

// A \uXXXX high surrogate only forms a scalar value together with a following \uXXXX low surrogate.
const readCharEscape = (scanner: Scanner, literalStart: SourcePosition): Rule<string> => {
  const escapeStart = scanner.position()
  const first = readEscape(scanner, literalStart, "'")
  if (Either.isLeft(first)) {
    return first
  }
  const code = first.right.charCodeAt(0)
  if (isLowSurrogate(code)) {
    return Either.left(invalidEscape(escapeStart, scanner.slice(escapeStart.offset, scanner.position().offset)))
  }
  if (!isHighSurrogate(code)) {
    return first
  }
  if (scanner.peek() !== "\\") {
    return Either.left(invalidEscape(escapeStart, scanner.slice(escapeStart.offset, scanner.position().offset)))
  }
  const second = readEscape(scanner, literalStart, "'")
  if (Either.isLeft(second)) {
    return second
  }
  if (!isLowSurrogate(second.right.charCodeAt(0))) {
    return Either.left(invalidEscape(escapeStart, scanner.slice(escapeStart.offset, scanner.position().offset)))
  }
  return Either.right(first.right + second.right)
}

const parseChar = (scanner: Scanner): Rule<V.CharValue> => {
  const literalStart = scanner.position()
  scanner.advance()
  const position = scanner.position()
  const char = scanner.peek()
  if (char === undefined) {
    return Either.left(unterminatedLiteral(literalStart, "'"))
  }
  if (char === "'") {
    return Either.left(unexpectedChar(position, char))
  }
  let value = char
  if (char === "\\") {
    const escaped = readCharEscape(scanner, literalStart)
    if (Either.isLeft(escaped)) {
      return Either.left(escaped.left)
    }
    value = escaped.right
  } else {
    const code = char.charCodeAt(0)
    if (char.length === 1 && (isHighSurrogate(code) || isLowSurrogate(code))) {
      return Either.left(unexpectedChar(position, char))
    }
    scanner.advance()
  }
  const closingPosition = scanner.position()
  const closing = scanner.peek()
  if (closing === undefined) {
    return Either.left(unterminatedLiteral(literalStart, "'"))
  }
  if (closing !== "'") {
    return Either.left(unexpectedChar(closingPosition, closing))
  }
  scanner.advance()
  return Either.right(V.char(value))
}

const skipDigits = (scanner: Scanner): number => {
  let count = 0
  while (isDigit(scanner.peek())) {
    scanner.advance()
    count++
  }
  return count
}

const parseNumber = (scanner: Scanner): Rule<V.FloatValue> => {
  const start = scanner.position()
  const fail = (): Rule<V.FloatValue> =>
    Either.left(invalidNumber(start, scanner.slice(start.offset, scanner.position().offset)))
  if (scanner.peek() === "-") {
    scanner.advance()
  }
  if (skipDigits(scanner) === 0) {
    return fail()
  }
  if (scanner.peek() === ".") {
    scanner.advance()
    if (skipDigits(scanner) === 0) {
      return fail()
    }
  }
  const exponent = scanner.peek()
  if (exponent === "e" || exponent === "E") {
    scanner.advance()
    const sign = scanner.peek()
    if (sign === "+" || sign === "-") {
      scanner.advance()
    }
    if (skipDigits(scanner) === 0) {
      return fail()
    }
  }
  return Either.right(V.float(Number(scanner.slice(start.offset, scanner.position().offset))))
}

const parseBoolean = (scanner: Scanner, keyword: "true" | "false"): Rule<V.BooleanValue> =>
  Either.map(expectKeyword(scanner, keyword), () => V.boolean(keyword === "true"))

const parseNone = (scanner: Scanner): Rule<V.OptionalValue> =>
  Either.map(expectKeyword(scanner, "None"), () => V.none)

const parseSome = (context: ParserContext, depth: number): Rule<V.OptionalValue> => {
  const { scanner } = context
  const opener = scanner.position()
  const opened = expectKeyword(scanner, "Some(")
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const entered = enterContainer(context, depth + 1, opener)
  if (Either.isLeft(entered)) {
    return Either.left(entered.left)
  }
  const inner = parseValueAt(context, depth + 1)
  if (Either.isLeft(inner)) {
    return Either.left(inner.left)
  }
  scanner.skipWhitespace()
  return Either.map(expectChar(scanner, ")"), () => V.some(inner.right))
}

const parseList = (context: ParserContext, depth: number): Rule<V.ListValue> => {
  const { scanner } = context
  const entered = enterContainer(context, depth + 1, scanner.position())
  if (Either.isLeft(entered)) {
    return Either.left(entered.left)
  }
  scanner.advance()
  const items: Array<Value> = []
  scanner.skipWhitespace()
  if (scanner.peek() === "]") {
    scanner.advance()
    return Either.right(V.list(items))
  }
  for (;;) {
    const item = parseValueAt(context, depth + 1)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right)
    scanner.skipWhitespace()
    const position = scanner.position()
    const separator = scanner.peek()
    if (separator === "]") {
      scanner.advance()
      return Either.right(V.list(items))
    }
    if (separator !== ",") {
      return Either.left(endOrUnexpected(position, separator))
    }
    scanner.advance()
  }
}

const parseMember = (
  context: ParserContext,
  depth: number,
  members: Map<string, Value>
): Rule<void> => {
  const { scanner } = context
  scanner.skipWhitespace()
  const keyPosition = scanner.position()
  const opening = scanner.peek()
  if (opening !== "\"") {
    return Either.left(endOrUnexpected(keyPosition, opening))
  }
  const key = parseString(scanner)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  if (members.has(key.right.value)) {
    return Either.left(duplicateKey(keyPosition, key.right.value))
  }
  scanner.skipWhitespace()
  const colon = expectChar(scanner, ":")
  if (Either.isLeft(colon)) {
    return colon
  }
  const value = parseValueAt(context, depth + 1)
  if (Either.isLeft(value)) {
    return Either.left(value.left)
  }
  members.set(key.right.value, value.right)
  return unit
}

const parseObject = (context: ParserContext, depth: number): Rule<V.ObjectValue> => {
  const { scanner } = context
  const entered = enterContainer(context, depth + 1, scanner.position())
  if (Either.isLeft(entered)) {
    return Either.left(entered.left)
  }
  scanner.advance()
  const members = new Map<string, Value>()
  scanner.skipWhitespace()
  if (scanner.peek() === "}") {
    scanner.advance()
    return Either.right(V.object(members))
  }
  for (;;) {
    const member = parseMember(context, depth, members)
    if (Either.isLeft(member)) {
      return Either.left(member.left)
    }
    scanner.skipWhitespace()
    const position = scanner.position()
    const separator = scanner.peek()
    if (separator === "}") {
      scanner.advance()
      return Either.right(V.object(members))
    }
    if (separator !== ",") {
      return Either.left(endOrUnexpected(position, separator))
    }
    scanner.advance()
  }
}

// `depth` counts the containers enclosing the value about to be parsed.
const parseValueAt = (context: ParserContext, depth: number): Rule<Value> => {
  const { scanner } = context
  scanner.skipWhitespace()
  const position = scanner.position()
  const char = scanner.peek()
  switch (char) {
    case undefined:
      return Either.left(unexpectedEndOfInput(position))
    case "{":
      return parseObject(context, depth)
    case "[":
      return parseList(context, depth)
    case "S":
      return parseSome(context, depth)
    case "N":
      return parseNone(scanner)
    case "\"":
      return parseString(scanner)
    case "'":
      return parseChar(scanner)
    case "t":
      return parseBoolean(scanner, "true")
    case "f":
      return parseBoolean(scanner, "false")
    default:
      return char === "-" || isDigit(char)
        ? parseNumber(scanner)
        : Either.left(unexpectedChar(position, char))
  }
}

/**
 * Parse one TSON value that spans the whole input.
 *
 * @param input - Source text.
 * @param options - Nesting and size limits; missing fields take the defaults.
 * @returns Either with the value tree or the first ParseError.
 *
 * @pure true
 * @invariant only whitespace may follow the value
 * @complexity O(n)
 */
export const parseValue = (
  input: string,
  options?: ParseOptions
): Either.Either<Value, ParseError> => {
  const { maxDepth, maxInputLength } = mergeParseOptions(options)
  if (input.length > maxInputLength) {
    return Either.left(inputTooLarge(input.length, maxInputLength))
  }
  const scanner = makeScanner(input)
  const parsed = parseValueAt({ scanner, maxDepth }, 0)
  if (Either.isLeft(parsed)) {
    return parsed
  }
  scanner.skipWhitespace()
  const rest = scanner.peek()
  if (rest !== undefined) {
    return Either.left(trailingInput(scanner.position(), rest))
  }
  return parsed
}
