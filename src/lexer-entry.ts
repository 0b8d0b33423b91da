/**
 * tagged-json/lexer
 *
 * The tokenizer on its own, for callers that want raw tokens instead of a value tree.
 *
 * @example
 * ```ts
 * import { Lexer } from 'tagged-json/lexer'
 *
 * const lexer = new Lexer('[1, "two"]')
 * for (let token = lexer.nextToken(); token; token = lexer.nextToken()) {
 *   console.log(token.kind, token.text)
 * }
 * ```
 */

export * from "@/lexer"

export { JsonParseError, type JsonParseErrorKind, type SourceLocation } from "@/errors"
