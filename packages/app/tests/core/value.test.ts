import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import * as V from "../../src/core/value.js"

describe("value equality", () => {
  it.effect("ignores object member order", () =>
    Effect.sync(() => {
      const left = V.object([["a", V.float(1)], ["b", V.none]])
      const right = V.object([["b", V.none], ["a", V.float(1)]])
      expect(V.equals(left, right)).toBe(true)
    }))

  it.effect("compares object key sets and values", () =>
    Effect.sync(() => {
      const base = V.object([["a", V.float(1)]])
      expect(V.equals(base, V.object([["a", V.float(2)]]))).toBe(false)
      expect(V.equals(base, V.object([["b", V.float(1)]]))).toBe(false)
      expect(V.equals(base, V.object([["a", V.float(1)], ["b", V.float(1)]]))).toBe(false)
      expect(V.equals(V.object([]), V.object(new Map()))).toBe(true)
    }))

  it.effect("respects list order and length", () =>
    Effect.sync(() => {
      const list = V.list([V.float(1), V.float(2)])
      expect(V.equals(list, V.list([V.float(1), V.float(2)]))).toBe(true)
      expect(V.equals(list, V.list([V.float(2), V.float(1)]))).toBe(false)
      expect(V.equals(list, V.list([V.float(1)]))).toBe(false)
    }))

  it.effect("ignores string spans", () =>
    Effect.sync(() => {
      expect(V.equals(V.string("x", { start: 3, end: 4 }), V.string("x"))).toBe(true)
      expect(V.string("abc").span).toEqual({ start: 0, end: 3 })
    }))

  it.effect("keeps chars distinct from strings", () =>
    Effect.sync(() => {
      expect(V.equals(V.char("a"), V.string("a"))).toBe(false)
      expect(V.equals(V.char("a"), V.char("a"))).toBe(true)
    }))

  it.effect("compares optionals by presence and payload", () =>
    Effect.sync(() => {
      expect(V.equals(V.none, V.optional(Option.none()))).toBe(true)
      expect(V.equals(V.some(V.float(400)), V.some(V.float(400.0)))).toBe(true)
      expect(V.equals(V.some(V.none), V.none)).toBe(false)
      expect(V.equals(V.some(V.boolean(true)), V.some(V.boolean(false)))).toBe(false)
    }))

  it.effect("narrows with guards", () =>
    Effect.sync(() => {
      const value: V.Value = V.list([V.char("z")])
      expect(V.isList(value)).toBe(true)
      expect(V.isObject(value)).toBe(false)
      if (V.isList(value)) {
        const first = value.items[0]
        expect(first !== undefined && V.isChar(first)).toBe(true)
      }
    }))
})
