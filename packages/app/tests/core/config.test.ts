import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { defaultParseOptions, maxDepthLimit, mergeParseOptions, resolveParseOptions } from "../../src/core/config.js"

describe("resolveParseOptions", () => {
  it.effect("returns the defaults when no options are given", () =>
    Effect.sync(() => {
      const resolved = resolveParseOptions(undefined)
      expect(Either.isRight(resolved) && resolved.right).toEqual(defaultParseOptions)
      expect(defaultParseOptions).toEqual({ maxDepth: 256, maxInputLength: 10_000_000 })
    }))

  it.effect("merges provided fields over the defaults", () =>
    Effect.sync(() => {
      const resolved = resolveParseOptions({ maxDepth: 8 })
      expect(Either.isRight(resolved)).toBe(true)
      if (Either.isRight(resolved)) {
        expect(resolved.right).toEqual({ maxDepth: 8, maxInputLength: 10_000_000 })
      }
    }))

  it.effect("rejects limits that are not positive integers", () =>
    Effect.sync(() => {
      for (const raw of [{ maxDepth: 0 }, { maxDepth: 1.5 }, { maxInputLength: -1 }, { maxDepth: "deep" }]) {
        const resolved = resolveParseOptions(raw)
        expect(Either.isLeft(resolved)).toBe(true)
        if (Either.isLeft(resolved)) {
          expect(resolved.left._tag).toBe("OptionsError")
        }
      }
    }))

  it.effect("caps maxDepth at the recursion limit", () =>
    Effect.sync(() => {
      const largest = resolveParseOptions({ maxDepth: maxDepthLimit })
      expect(Either.isRight(largest) && largest.right.maxDepth).toBe(1_000)
      const tooDeep = resolveParseOptions({ maxDepth: 1_000_000 })
      expect(Either.isLeft(tooDeep) && tooDeep.left._tag).toBe("OptionsError")
      expect(Either.isLeft(tooDeep) && tooDeep.left.message).toContain("maxDepth")
    }))

  it.effect("names the offending field", () =>
    Effect.sync(() => {
      const resolved = resolveParseOptions({ maxDepth: 0 })
      expect(Either.isLeft(resolved) && resolved.left.message).toContain("maxDepth")
    }))

  it.effect("rejects options that are not an object", () =>
    Effect.sync(() => {
      expect(Either.isLeft(resolveParseOptions("deep"))).toBe(true)
      expect(Either.isLeft(resolveParseOptions(null))).toBe(true)
    }))
})

describe("mergeParseOptions", () => {
  it.effect("fills missing fields without validation", () =>
    Effect.sync(() => {
      expect(mergeParseOptions(undefined)).toEqual(defaultParseOptions)
      expect(mergeParseOptions({ maxInputLength: 5 })).toEqual({ maxDepth: 256, maxInputLength: 5 })
    }))

  it.effect("clamps limits that bypassed validation", () =>
    Effect.sync(() => {
      expect(mergeParseOptions({ maxDepth: Number.POSITIVE_INFINITY }).maxDepth).toBe(maxDepthLimit)
      expect(mergeParseOptions({ maxDepth: 5_000 }).maxDepth).toBe(maxDepthLimit)
      expect(mergeParseOptions({ maxDepth: Number.NaN, maxInputLength: Number.NaN })).toEqual(defaultParseOptions)
    }))
})
