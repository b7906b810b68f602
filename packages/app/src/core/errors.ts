// CHANGE: unify the error algebra of the TSON parser
// WHY: every failure must abort the parse with a typed, positioned reason
// QUOTE(TZ): "the first rule that cannot satisfy its production aborts the entire top-level parse"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ ParseError: e._tag is stable and exhaustively matchable ∧ e.position.offset ≥ 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export interface SourcePosition {
  readonly offset: number
  readonly line: number
  readonly column: number
}

export type UnexpectedEndOfInput = {
  readonly _tag: "UnexpectedEndOfInput"
  readonly position: SourcePosition
}
export type UnexpectedChar = {
  readonly _tag: "UnexpectedChar"
  readonly position: SourcePosition
  readonly char: string
}
export type InvalidNumber = {
  readonly _tag: "InvalidNumber"
  readonly position: SourcePosition
  readonly literal: string
}
export type InvalidEscape = {
  readonly _tag: "InvalidEscape"
  readonly position: SourcePosition
  readonly sequence: string
}
export type UnterminatedLiteral = {
  readonly _tag: "UnterminatedLiteral"
  readonly position: SourcePosition
  readonly delimiter: string
}
export type TrailingInput = {
  readonly _tag: "TrailingInput"
  readonly position: SourcePosition
  readonly char: string
}
export type DuplicateKey = {
  readonly _tag: "DuplicateKey"
  readonly position: SourcePosition
  readonly key: string
}
export type NestingTooDeep = {
  readonly _tag: "NestingTooDeep"
  readonly position: SourcePosition
  readonly maxDepth: number
}
export type InputTooLarge = {
  readonly _tag: "InputTooLarge"
  readonly position: SourcePosition
  readonly length: number
  readonly maxInputLength: number
}

export type ParseError =
  | UnexpectedEndOfInput
  | UnexpectedChar
  | InvalidNumber
  | InvalidEscape
  | UnterminatedLiteral
  | TrailingInput
  | DuplicateKey
  | NestingTooDeep
  | InputTooLarge

export type OptionsError = { readonly _tag: "OptionsError"; readonly message: string }

export type TsonError = ParseError | OptionsError

export const startPosition: SourcePosition = { offset: 0, line: 1, column: 1 }

export const unexpectedEndOfInput = (position: SourcePosition): UnexpectedEndOfInput => ({
  _tag: "UnexpectedEndOfInput",
  position
})

export const unexpectedChar = (position: SourcePosition, char: string): UnexpectedChar => ({
  _tag: "UnexpectedChar",
  position,
  char
})

export const invalidNumber = (position: SourcePosition, literal: string): InvalidNumber => ({
  _tag: "InvalidNumber",
  position,
  literal
})

export const invalidEscape = (position: SourcePosition, sequence: string): InvalidEscape => ({
  _tag: "InvalidEscape",
  position,
  sequence
})

export const unterminatedLiteral = (position: SourcePosition, delimiter: string): UnterminatedLiteral => ({
  _tag: "UnterminatedLiteral",
  position,
  delimiter
})

export const trailingInput = (position: SourcePosition, char: string): TrailingInput => ({
  _tag: "TrailingInput",
  position,
  char
})

export const duplicateKey = (position: SourcePosition, key: string): DuplicateKey => ({
  _tag: "DuplicateKey",
  position,
  key
})

export const nestingTooDeep = (position: SourcePosition, maxDepth: number): NestingTooDeep => ({
  _tag: "NestingTooDeep",
  position,
  maxDepth
})

export const inputTooLarge = (length: number, maxInputLength: number): InputTooLarge => ({
  _tag: "InputTooLarge",
  position: startPosition,
  length,
  maxInputLength
})

export const optionsError = (message: string): OptionsError => ({
  _tag: "OptionsError",
  message
})

export const isParseError = (error: TsonError): error is ParseError => error._tag !== "OptionsError"
