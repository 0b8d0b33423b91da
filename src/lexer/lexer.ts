import { JsonParseError, type SourceLocation } from "@/errors"
import { ByteCursor } from "@/lexer/cursor"
import type { LiteralToken, Punctuation, Token } from "@/lexer/token"

// keep a leading U+FEFF in string content; reject bytes that are not UTF-8
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

const WHITESPACE = new Set([" ", "\t", "\r", "\n"].map((c) => c.charCodeAt(0)))
const PUNCTUATION = new Set<string>(["{", "}", "[", "]", ":", ","])
const NUMERIC = new Set("0123456789+-.eE".split("").map((c) => c.charCodeAt(0)))

const QUOTE = 0x22
const BACKSLASH = 0x5c

const isPunctuationChar = (char: string): char is Punctuation => PUNCTUATION.has(char)

/**
 * Printable form of a single byte for error messages
 */
const describeByte = (byte: number): string =>
  byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : `\\x${byte.toString(16).padStart(2, "0")}`

/**
 * Pull-based tokenizer. Each call to `nextToken()` consumes exactly one token
 * and remembers it as the current token.
 *
 * @example
 * ```ts
 * const lexer = new Lexer('{"a": 1}')
 * lexer.nextToken() // { kind: "punctuation", text: "{", ... }
 * lexer.nextToken() // { kind: "string", text: "a", ... }
 * ```
 */
export class Lexer {
  readonly #cursor: ByteCursor
  #current: Token | undefined = undefined

  constructor(input: Uint8Array | string) {
    this.#cursor = new ByteCursor(input)
  }

  /**
   * The most recently read token, or undefined before the first read and at end of input
   */
  get current(): Token | undefined {
    return this.#current
  }

  /**
   * Location of the next unread byte
   */
  location(): SourceLocation {
    return this.#cursor.location()
  }

  /**
   * True when only whitespace remains
   */
  exhausted(): boolean {
    this.#skipWhitespace()
    return this.#cursor.atEnd
  }

  /**
   * Read the next token, or undefined once the input is exhausted
   *
   * @throws {JsonParseError} on a malformed literal, an unterminated or non-UTF-8 string, or a byte that cannot start a token
   */
  nextToken(): Token | undefined {
    this.#current = this.#read()
    return this.#current
  }

  #skipWhitespace(): void {
    let byte = this.#cursor.peek()

    while (byte !== undefined && WHITESPACE.has(byte)) {
      this.#cursor.read()
      byte = this.#cursor.peek()
    }
  }

  #read(): Token | undefined {
    this.#skipWhitespace()

    const start = this.#cursor.location()
    const byte = this.#cursor.read()
    if (byte === undefined) return undefined

    const char = String.fromCharCode(byte)

    if (isPunctuationChar(char)) {
      return { kind: "punctuation", text: char, start }
    }

    switch (char) {
      case "n":
        return this.#readLiteral("null", start)
      case "t":
        return this.#readLiteral("true", start)
      case "f":
        return this.#readLiteral("false", start)
      case '"':
        return this.#readString(start)
      default:
        return this.#readNumber(byte, start)
    }
  }

  /**
   * The first character has already been consumed; the rest must follow exactly
   */
  #readLiteral(literal: LiteralToken["text"], start: SourceLocation): LiteralToken {
    let seen = literal[0] ?? ""

    for (const expected of literal.slice(1)) {
      const byte = this.#cursor.read()

      if (byte === undefined || String.fromCharCode(byte) !== expected) {
        if (byte !== undefined) seen += describeByte(byte)
        throw new JsonParseError({ kind: "malformed-literal", location: start, token: seen })
      }

      seen += expected
    }

    return { kind: literal, text: literal, start }
  }

  #readString(start: SourceLocation): Token {
    const contentStart = this.#cursor.offset

    while (true) {
      const contentEnd = this.#cursor.offset
      const byte = this.#cursor.read()

      if (byte === undefined) {
        throw new JsonParseError({ kind: "unterminated-string", location: start })
      }

      if (byte === QUOTE) {
        return { kind: "string", text: this.#decode(contentStart, contentEnd, start), start }
      }

      // the escaped byte is taken as-is so that \" does not end the string
      if (byte === BACKSLASH && this.#cursor.read() === undefined) {
        throw new JsonParseError({ kind: "unterminated-string", location: start })
      }
    }
  }

  #decode(from: number, to: number, start: SourceLocation): string {
    try {
      return decoder.decode(this.#cursor.slice(from, to))
    } catch (error) {
      if (error instanceof TypeError) {
        throw new JsonParseError({ kind: "invalid-encoding", location: start })
      }
      throw error
    }
  }

  /**
   * Scan the run of numeric characters starting at `first`, stopping before the first byte outside the set
   */
  #readNumber(first: number, start: SourceLocation): Token {
    if (!NUMERIC.has(first)) {
      throw new JsonParseError({ kind: "unexpected-character", location: start, token: describeByte(first) })
    }

    while (true) {
      const byte = this.#cursor.read()
      if (byte === undefined) break

      if (!NUMERIC.has(byte)) {
        this.#cursor.unread()
        break
      }
    }

    return { kind: "number", text: this.#decode(start.offset, this.#cursor.offset, start), start }
  }
}
