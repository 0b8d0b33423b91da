import type { ArrayValue, BoolValue, NullValue, NumberValue, ObjectValue, StringValue, Value } from "@/value/types"

/**
 * One handler per value kind
 */
export interface ValueCases<R> {
  null: (value: NullValue) => R
  bool: (value: BoolValue) => R
  number: (value: NumberValue) => R
  string: (value: StringValue) => R
  object: (value: ObjectValue) => R
  array: (value: ArrayValue) => R
}

/**
 * Exhaustively dispatch on the kind of a value
 *
 * @example
 * ```ts
 * const size = match(value, {
 *   null: () => 0,
 *   bool: () => 1,
 *   number: () => 1,
 *   string: (v) => v.value.length,
 *   object: (v) => v.entries.size,
 *   array: (v) => v.items.length,
 * })
 * ```
 */
export function match<R>(value: Value, cases: ValueCases<R>): R {
  switch (value.kind) {
    case "null":
      return cases.null(value)
    case "bool":
      return cases.bool(value)
    case "number":
      return cases.number(value)
    case "string":
      return cases.string(value)
    case "object":
      return cases.object(value)
    case "array":
      return cases.array(value)
    default:
      return assertNever(value)
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled value kind: ${JSON.stringify(value)}`)
}
