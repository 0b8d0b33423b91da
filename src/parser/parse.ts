import { Parser } from "@/parser/parser"
import type { ParserOptions } from "@/parser/options"
import type { Value } from "@/value/types"

/**
 * Parse a complete document into a value tree
 *
 * @example
 * ```ts
 * const value = parse('[1, 2, 3]')
 * // { kind: "array", items: [{ kind: "number", value: 1 }, ...] }
 * ```
 *
 * @throws {JsonParseError} when the input is malformed or has content after the top-level value
 */
export function parse(input: Uint8Array | string, options?: ParserOptions): Value {
  const parser = new Parser(input, options)
  const value = parser.parseValue()
  parser.expectEnd()

  return value
}

/**
 * Parse a buffer holding several top-level documents one after another,
 * e.g. newline-delimited records. Yields each document as it is parsed.
 *
 * @example
 * ```ts
 * for (const record of parseAll('{"id": 1}\n{"id": 2}\n')) {
 *   // ...
 * }
 * ```
 */
export function* parseAll(input: Uint8Array | string, options?: ParserOptions): Generator<Value, void, undefined> {
  const parser = new Parser(input, options)

  while (!parser.done) {
    yield parser.parseValue()
  }
}
