import type { Value } from "@/value/types"

export type PathSegment = string | number

/**
 * Follows a path of object keys and array indices through a value tree.
 *
 * A string segment looks up an object member, a number segment an array
 * element. Returns undefined as soon as a segment does not apply.
 *
 * @example
 * ```ts
 * const value = parse('{"tags": ["a", "b"]}')
 *
 * select(value, ["tags", 1]) // { kind: "string", value: "b" }
 * select(value, ["tags", "length"]) // undefined
 * ```
 */
export function select(value: Value, path: readonly PathSegment[]): Value | undefined {
  let current: Value | undefined = value

  for (const segment of path) {
    if (current === undefined) return undefined

    if (typeof segment === "number") {
      current = current.kind === "array" ? current.items[segment] : undefined
    } else {
      current = current.kind === "object" ? current.entries.get(segment) : undefined
    }
  }

  return current
}
