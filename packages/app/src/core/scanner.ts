import * as Either from "effect/Either"

import type { SourcePosition, UnexpectedEndOfInput } from "./errors.js"
import { unexpectedEndOfInput } from "./errors.js"

// CHANGE: provide a positional cursor over TSON source text
// WHY: grammar rules compose peek/advance/skip/match instead of indexing the buffer directly
// QUOTE(TZ): "positional cursor over an immutable text buffer"
// REF: req-scanner-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: matchLiteral(t) = false → position(s) unchanged
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: offset never moves backwards and never splits a surrogate pair
// COMPLEXITY: O(1) per primitive, O(k) for skipWhitespace/matchLiteral

export interface Scanner {
  readonly input: string
  readonly peek: () => string | undefined
  readonly advance: () => Either.Either<string, UnexpectedEndOfInput>
  readonly skipWhitespace: () => void
  readonly matchLiteral: (text: string) => boolean
  readonly position: () => SourcePosition
  readonly slice: (start: number, end: number) => string
  readonly isAtEnd: () => boolean
}

const isWhitespace = (char: string): boolean => char === " " || char === "\t" || char === "\n" || char === "\r"

const scalarAt = (input: string, offset: number): string | undefined => {
  const codePoint = input.codePointAt(offset)
  return codePoint === undefined ? undefined : String.fromCodePoint(codePoint)
}

/**
 * Create a scanner positioned at the start of the input.
 *
 * @param input - Source text; never copied or mutated.
 * @returns Scanner whose primitives share one cursor.
 *
 * @pure false
 * @effect mutates only the scanner's own cursor
 * @invariant peek() = undefined ↔ isAtEnd()
 * @complexity O(1)
 */
export const makeScanner = (input: string): Scanner => {
  let offset = 0
  let line = 1
  let column = 1

  const position = (): SourcePosition => ({ offset, line, column })

  const peek = (): string | undefined => scalarAt(input, offset)

  const consume = (char: string): void => {
    offset += char.length
    if (char === "\n") {
      line++
      column = 1
    } else {
      column++
    }
  }

  const advance = (): Either.Either<string, UnexpectedEndOfInput> => {
    const char = peek()
    if (char === undefined) {
      return Either.left(unexpectedEndOfInput(position()))
    }
    consume(char)
    return Either.right(char)
  }

  const skipWhitespace = (): void => {
    for (let char = peek(); char !== undefined && isWhitespace(char); char = peek()) {
      consume(char)
    }
  }

  const matchLiteral = (text: string): boolean => {
    if (!input.startsWith(text, offset)) {
      return false
    }
    for (let char = scalarAt(text, 0), index = 0; char !== undefined; char = scalarAt(text, index)) {
      consume(char)
      index += char.length
    }
    return true
  }

  return {
    input,
    peek,
    advance,
    skipWhitespace,
    matchLiteral,
    position,
    slice: (start, end) => input.slice(start, end),
    isAtEnd: () => offset >= input.length
  }
}
