import { Effect } from "effect"
import type * as Either from "effect/Either"

import { resolveParseOptions } from "../core/config.js"
import type { TsonError } from "../core/errors.js"
import { isParseError } from "../core/errors.js"
import { parseValue } from "../core/parse.js"
import { describeTsonError, renderParseError } from "../core/report.js"
import type { Value } from "../core/value.js"

// CHANGE: expose the parser as an Effect with validated options and logging
// WHY: callers composing effects get typed failures and diagnostics in the log instead of a bare Either
// QUOTE(TZ): "a parse either completes or fails synchronously"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s,o: parseTson(s, o) succeeds with v ↔ resolve(o) = Right(r) ∧ parseValue(s, r) = Right(v)
// PURITY: SHELL
// EFFECT: Effect<Value, TsonError>
// INVARIANT: exactly one log entry per call, debug on success, warning on failure
// COMPLEXITY: O(n)

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const renderFailure = (error: TsonError, input: string): string =>
  isParseError(error) ? renderParseError(error, input) : describeTsonError(error)

/**
 * Parse TSON text inside an Effect.
 *
 * @param input - Source text.
 * @param options - Untrusted options object; validated before parsing.
 * @returns Effect with the value tree or a TsonError.
 *
 * @pure false
 * @effect Logger
 * @invariant failures are logged at warning level and re-raised unchanged
 * @complexity O(n)
 */
export const parseTson = (
  input: string,
  options?: unknown
): Effect.Effect<Value, TsonError> =>
  Effect.gen(function*(_) {
    const resolved = yield* _(fromEither(resolveParseOptions(options)))
    const value = yield* _(fromEither(parseValue(input, resolved)))
    yield* _(Effect.logDebug("parsed TSON value").pipe(Effect.annotateLogs("root", value._tag)))
    return value
  }).pipe(
    Effect.tapError((error) => Effect.logWarning(renderFailure(error, input))),
    Effect.annotateLogs("inputLength", input.length),
    Effect.withLogSpan("tson.parse")
  )
