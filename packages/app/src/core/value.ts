import * as Option from "effect/Option"

// CHANGE: introduce the TSON value tree as a closed tagged union
// WHY: replace JSON null with typed optionality and keep chars distinct from strings
// QUOTE(TZ): "{ \"error_code\": Some(400), \"body\": None }"
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b ∈ Value: equals(a, b) ↔ a and b have the same shape and leaves
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Value is closed under List/Object/Optional nesting with primitive leaves
// COMPLEXITY: O(n) for equals where n = node count

/** Half-open `[start, end)` range of UTF-16 offsets into the parsed input. */
export interface Span {
  readonly start: number
  readonly end: number
}

export type FloatValue = { readonly _tag: "Float"; readonly value: number }
export type BooleanValue = { readonly _tag: "Boolean"; readonly value: boolean }
export type StringValue = { readonly _tag: "String"; readonly value: string; readonly span: Span }
export type CharValue = { readonly _tag: "Char"; readonly value: string }
export type ListValue = { readonly _tag: "List"; readonly items: ReadonlyArray<Value> }
export type OptionalValue = { readonly _tag: "Optional"; readonly value: Option.Option<Value> }
export type ObjectValue = { readonly _tag: "Object"; readonly members: ReadonlyMap<string, Value> }

export type Value =
  | FloatValue
  | BooleanValue
  | StringValue
  | CharValue
  | ListValue
  | OptionalValue
  | ObjectValue

const detachedSpan = (value: string): Span => ({ start: 0, end: value.length })

export const float = (value: number): FloatValue => ({ _tag: "Float", value })

export const boolean = (value: boolean): BooleanValue => ({ _tag: "Boolean", value })

/**
 * Build a String node. Without a span the node is detached from any input and
 * its span covers the value itself.
 */
export const string = (value: string, span: Span = detachedSpan(value)): StringValue => ({
  _tag: "String",
  value,
  span
})

export const char = (value: string): CharValue => ({ _tag: "Char", value })

export const list = (items: ReadonlyArray<Value>): ListValue => ({ _tag: "List", items })

export const optional = (value: Option.Option<Value>): OptionalValue => ({ _tag: "Optional", value })

export const some = (value: Value): OptionalValue => optional(Option.some(value))

export const none: OptionalValue = optional(Option.none())

export const object = (
  members: ReadonlyMap<string, Value> | Iterable<readonly [string, Value]>
): ObjectValue => ({
  _tag: "Object",
  members: new Map(members)
})

export const isFloat = (value: Value): value is FloatValue => value._tag === "Float"
export const isBoolean = (value: Value): value is BooleanValue => value._tag === "Boolean"
export const isString = (value: Value): value is StringValue => value._tag === "String"
export const isChar = (value: Value): value is CharValue => value._tag === "Char"
export const isList = (value: Value): value is ListValue => value._tag === "List"
export const isOptional = (value: Value): value is OptionalValue => value._tag === "Optional"
export const isObject = (value: Value): value is ObjectValue => value._tag === "Object"

const listEquals = (left: ReadonlyArray<Value>, right: ReadonlyArray<Value>): boolean => {
  if (left.length !== right.length) {
    return false
  }
  for (let index = 0; index < left.length; index++) {
    const a = left[index]
    const b = right[index]
    if (a === undefined || b === undefined || !equals(a, b)) {
      return false
    }
  }
  return true
}

const membersEqual = (
  left: ReadonlyMap<string, Value>,
  right: ReadonlyMap<string, Value>
): boolean => {
  if (left.size !== right.size) {
    return false
  }
  for (const [key, a] of left) {
    const b = right.get(key)
    if (b === undefined || !equals(a, b)) {
      return false
    }
  }
  return true
}

const optionEquals = (left: Option.Option<Value>, right: Option.Option<Value>): boolean => {
  if (Option.isNone(left) || Option.isNone(right)) {
    return Option.isNone(left) && Option.isNone(right)
  }
  return equals(left.value, right.value)
}

/**
 * Structural equality of two value trees.
 *
 * @param left - First tree.
 * @param right - Second tree.
 * @returns true when both trees have the same variants and leaves.
 *
 * @pure true
 * @invariant object member order and string spans do not affect the result
 * @complexity O(n)
 */
export const equals = (left: Value, right: Value): boolean => {
  switch (left._tag) {
    case "Float":
      return right._tag === "Float" && right.value === left.value
    case "Boolean":
      return right._tag === "Boolean" && right.value === left.value
    case "String":
      return right._tag === "String" && right.value === left.value
    case "Char":
      return right._tag === "Char" && right.value === left.value
    case "List":
      return right._tag === "List" && listEquals(left.items, right.items)
    case "Optional":
      return right._tag === "Optional" && optionEquals(left.value, right.value)
    case "Object":
      return right._tag === "Object" && membersEqual(left.members, right.members)
  }
}
