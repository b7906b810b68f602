import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { OptionsError } from "./errors.js"
import { optionsError } from "./errors.js"

// CHANGE: define parse limits, their defaults and boundary validation
// WHY: turn stack exhaustion on hostile nesting into a reportable error
// QUOTE(TZ): "impose and document a maximum nesting depth, failing with a dedicated error kind rather than crashing"
// REF: req-config-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(opts).k = opts.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved limits are positive integers and maxDepth never exceeds maxDepthLimit
// COMPLEXITY: O(1)/O(1)

export interface ParseOptions {
  /** Maximum List/Object/Optional nesting (default 256, capped at maxDepthLimit). */
  readonly maxDepth?: number | undefined
  /** Maximum input length in UTF-16 code units (default 10_000_000). */
  readonly maxInputLength?: number | undefined
}

export interface ResolvedParseOptions {
  readonly maxDepth: number
  readonly maxInputLength: number
}

/** Largest accepted maxDepth; deeper recursion risks exhausting the call stack. */
export const maxDepthLimit = 1_000

export const defaultParseOptions: ResolvedParseOptions = {
  maxDepth: 256,
  maxInputLength: 10_000_000
}

const PositiveInt = S.Number.pipe(S.int(), S.positive())

const ParseOptionsSchema = S.partial(
  S.Struct({
    maxDepth: PositiveInt.pipe(S.lessThanOrEqualTo(maxDepthLimit)),
    maxInputLength: PositiveInt
  })
)

const orDefault = (value: number | undefined, fallback: number): number =>
  value === undefined || Number.isNaN(value) ? fallback : value

// Unvalidated options still get a depth guard the recursion can honour.
export const mergeParseOptions = (options: ParseOptions | undefined): ResolvedParseOptions => ({
  maxDepth: Math.min(orDefault(options?.maxDepth, defaultParseOptions.maxDepth), maxDepthLimit),
  maxInputLength: orDefault(options?.maxInputLength, defaultParseOptions.maxInputLength)
})

/**
 * Validate caller-supplied options and merge them over the defaults.
 *
 * @param raw - Untrusted options value; undefined selects the defaults.
 * @returns Either with resolved options or an OptionsError.
 *
 * @pure true
 * @invariant 1 ≤ maxDepth ≤ maxDepthLimit ∧ maxInputLength ≥ 1
 * @complexity O(1)
 */
export const resolveParseOptions = (
  raw: unknown
): Either.Either<ResolvedParseOptions, OptionsError> => {
  if (raw === undefined) {
    return Either.right(defaultParseOptions)
  }
  return pipe(
    S.decodeUnknownEither(ParseOptionsSchema)(raw),
    Either.map(mergeParseOptions),
    Either.mapLeft((error) => optionsError(TreeFormatter.formatErrorSync(error)))
  )
}
