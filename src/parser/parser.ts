import { JsonParseError, type JsonParseErrorKind } from "@/errors"
import { Lexer } from "@/lexer/lexer"
import { isPunctuation, type Token } from "@/lexer/token"
import type { Logger } from "@/logger"
import { resolveParserOptions, type ParserOptions } from "@/parser/options"
import { toScalar } from "@/parser/scalar"
import { Value, type ArrayValue, type ObjectValue } from "@/value/types"

/**
 * Recursive-descent parser over a single buffered document.
 *
 * The parser pulls tokens from its own lexer one at a time; the lexer's
 * current token is the single token of lookahead. Each instance owns its
 * input and state, so separate instances can be used independently.
 *
 * Nesting is unlimited by default, so very deep input ends in the runtime's
 * stack overflow `RangeError`. Set `maxDepth` to get a `JsonParseError` instead.
 *
 * @example
 * ```ts
 * const parser = new Parser('{"tags": ["a", "b"]}')
 * const value = parser.parseValue()
 * // { kind: "object", entries: Map { "tags" => { kind: "array", items: [...] } } }
 * ```
 */
export class Parser {
  readonly #lexer: Lexer
  readonly #maxDepth: number
  readonly #logger: Logger
  #depth: number = 0

  /**
   * @throws {ParserOptionsError} when the options fail validation
   */
  constructor(input: Uint8Array | string, options: ParserOptions = {}) {
    const resolved = resolveParserOptions(options)

    this.#lexer = new Lexer(input)
    this.#maxDepth = resolved.maxDepth
    this.#logger = resolved.logger
  }

  /**
   * The token most recently read from the input
   */
  get current(): Token | undefined {
    return this.#lexer.current
  }

  /**
   * True when only whitespace is left in the input
   */
  get done(): boolean {
    return this.#lexer.exhausted()
  }

  /**
   * Read the next token and parse the value it starts
   */
  parseValue(): Value {
    return this.#valueFrom(this.#lexer.nextToken())
  }

  /**
   * Parse the members of an object whose `{` has just been read
   */
  parseObject(): ObjectValue {
    return this.#nested(() => {
      const entries = new Map<string, Value>()

      let token = this.#lexer.nextToken()
      if (isPunctuation(token, "}")) return Value.object(entries)

      while (true) {
        const key = this.#keyFrom(token)

        const separator = this.#lexer.nextToken()
        if (!isPunctuation(separator, ":")) throw this.#error("expected-separator", separator)

        const value = this.parseValue()
        if (entries.has(key)) {
          this.#logger.warn(`Duplicate key '${key}' at line ${separator.start.line}, keeping the last value`)
        }
        entries.set(key, value)

        token = this.#lexer.nextToken()
        if (isPunctuation(token, "}")) return Value.object(entries)
        if (!isPunctuation(token, ",")) throw this.#error("unexpected-token", token)

        token = this.#lexer.nextToken()
      }
    })
  }

  /**
   * Parse the elements of an array whose `[` has just been read
   */
  parseArray(): ArrayValue {
    return this.#nested(() => {
      const items: Value[] = []

      let token = this.#lexer.nextToken()
      if (isPunctuation(token, "]")) return Value.array(items)

      while (true) {
        items.push(this.#valueFrom(token))

        token = this.#lexer.nextToken()
        if (isPunctuation(token, "]")) return Value.array(items)
        if (!isPunctuation(token, ",")) throw this.#error("unexpected-token", token)

        token = this.#lexer.nextToken()
      }
    })
  }

  /**
   * Require that nothing but whitespace follows
   *
   * @throws {JsonParseError} with kind `trailing-content` otherwise
   */
  expectEnd(): void {
    const token = this.#lexer.nextToken()
    if (token !== undefined) throw this.#error("trailing-content", token)
  }

  #valueFrom(token: Token | undefined): Value {
    if (token === undefined) throw this.#error("unexpected-end", token)

    switch (token.kind) {
      case "null":
        return Value.null()
      case "true":
        return Value.bool(true)
      case "false":
        return Value.bool(false)
      case "string":
      case "number":
        return toScalar(token.text)
      case "punctuation":
        if (token.text === "{") return this.parseObject()
        if (token.text === "[") return this.parseArray()
        throw this.#error("unexpected-token", token)
    }
  }

  #keyFrom(token: Token | undefined): string {
    if (token === undefined) throw this.#error("unexpected-end", token)
    if (token.kind === "string") return token.text
    // a stray `,` or `}` is a syntax error rather than a bad key
    if (token.kind === "punctuation") throw this.#error("unexpected-token", token)

    throw this.#error("invalid-key", token)
  }

  #nested<T>(parse: () => T): T {
    if (this.#depth >= this.#maxDepth) {
      throw new JsonParseError({
        kind: "max-depth-exceeded",
        location: this.#lexer.current?.start ?? this.#lexer.location(),
      })
    }

    this.#depth++
    try {
      return parse()
    } finally {
      this.#depth--
    }
  }

  /**
   * Build an error for `token`; a missing token always means the input ran out
   */
  #error(kind: JsonParseErrorKind, token: Token | undefined): JsonParseError {
    if (token === undefined) {
      return new JsonParseError({ kind: "unexpected-end", location: this.#lexer.location() })
    }

    return new JsonParseError({ kind, location: token.start, token: token.text })
  }
}
