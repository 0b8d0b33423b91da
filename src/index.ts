/**
 * tagged-json
 *
 * A recursive-descent JSON reader that turns one buffered document into an
 * immutable tree of tagged values.
 *
 * @example
 * ```ts
 * import { parse, match, select, toPlain, type Value } from 'tagged-json'
 *
 * const value = parse('{"name": "Ada", "tags": ["a", "b"]}')
 *
 * select(value, ['tags', 0]) // { kind: 'string', value: 'a' }
 * toPlain(value) // { name: 'Ada', tags: ['a', 'b'] }
 *
 * const describe = (v: Value): string =>
 *   match(v, {
 *     null: () => 'null',
 *     bool: (b) => String(b.value),
 *     number: (n) => String(n.value),
 *     string: (s) => s.value,
 *     object: (o) => `object with ${o.entries.size} keys`,
 *     array: (a) => `array of ${a.items.length}`,
 *   })
 * ```
 */

// Value tree
export * from "./value"

// Parser
export * from "./parser"

// Errors
export { JsonParseError, ValueConversionError, ParserOptionsError } from "./errors"
export type { JsonParseErrorKind, SourceLocation } from "./errors"

// Logging
export { consoleLogger, silentLogger, type Logger } from "./logger"

// Utilities
export { select, type PathSegment } from "./utils"
