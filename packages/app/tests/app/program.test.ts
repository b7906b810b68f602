import { describe, expect, it } from "@effect/vitest"
import { Effect, List, Logger, LogLevel } from "effect"

import { parseTson } from "../../src/app/program.js"
import type { TsonError } from "../../src/core/errors.js"
import { isParseError } from "../../src/core/errors.js"
import { renderParseError } from "../../src/core/report.js"
import * as V from "../../src/core/value.js"

interface LogEntry {
  readonly level: string
  readonly message: string
  readonly spans: ReadonlyArray<string>
  readonly annotations: Readonly<Record<string, unknown>>
}

const withCapturedLogs = <A, E>(
  entries: Array<LogEntry>,
  effect: Effect.Effect<A, E>
): Effect.Effect<A, E> =>
  effect.pipe(
    Logger.withMinimumLogLevel(LogLevel.Debug),
    Effect.provide(
      Logger.replace(
        Logger.defaultLogger,
        Logger.make(({ annotations, logLevel, message, spans }) => {
          entries.push({
            level: logLevel.label,
            message: String(message),
            spans: List.toArray(spans).map((span) => span.label),
            annotations: Object.fromEntries(annotations)
          })
        })
      )
    )
  )

describe("parseTson", () => {
  it.effect("succeeds with the value tree", () =>
    Effect.gen(function*(_) {
      const value = yield* _(parseTson("Some(400)"))
      expect(V.equals(value, V.some(V.float(400)))).toBe(true)
    }))

  it.effect("fails with the parse error", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(parseTson("{")))
      expect(error).toEqual({
        _tag: "UnexpectedEndOfInput",
        position: { offset: 1, line: 1, column: 2 }
      })
    }))

  it.effect("applies validated options", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(parseTson("[[1]]", { maxDepth: 1 })))
      expect(error).toEqual({
        _tag: "NestingTooDeep",
        position: { offset: 1, line: 1, column: 2 },
        maxDepth: 1
      })
    }))

  it.effect("fails with OptionsError before parsing", () =>
    Effect.gen(function*(_) {
      const error: TsonError = yield* _(Effect.flip(parseTson("1", { maxDepth: -1 })))
      expect(error._tag).toBe("OptionsError")
    }))

  it.effect("logs a debug entry on success", () =>
    Effect.gen(function*(_) {
      const entries: Array<LogEntry> = []
      yield* _(withCapturedLogs(entries, parseTson("[true]")))
      expect(entries).toHaveLength(1)
      const entry = entries[0]
      expect(entry?.level).toBe("DEBUG")
      expect(entry?.message).toBe("parsed TSON value")
      expect(entry?.spans).toEqual(["tson.parse"])
      expect(entry?.annotations).toEqual({ inputLength: 6, root: "List" })
    }))

  it.effect("logs the rendered diagnostic on failure", () =>
    Effect.gen(function*(_) {
      const entries: Array<LogEntry> = []
      const input = "[1, 2,]"
      const error = yield* _(Effect.flip(withCapturedLogs(entries, parseTson(input))))
      expect(entries).toHaveLength(1)
      expect(entries[0]?.level).toBe("WARN")
      expect(isParseError(error)).toBe(true)
      if (isParseError(error)) {
        expect(entries[0]?.message).toBe(renderParseError(error, input))
      }
    }))

  it.effect("logs option failures", () =>
    Effect.gen(function*(_) {
      const entries: Array<LogEntry> = []
      yield* _(Effect.flip(withCapturedLogs(entries, parseTson("1", { maxDepth: 0 }))))
      expect(entries).toHaveLength(1)
      expect(entries[0]?.level).toBe("WARN")
      expect(entries[0]?.message.startsWith("Invalid parse options: ")).toBe(true)
    }))
})
