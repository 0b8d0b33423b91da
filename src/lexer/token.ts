import type { SourceLocation } from "@/errors"

export type Punctuation = "{" | "}" | "[" | "]" | ":" | ","

interface TokenBase {
  /** Location of the token's first byte */
  start: SourceLocation
}

export interface PunctuationToken extends TokenBase {
  kind: "punctuation"
  text: Punctuation
}

export interface LiteralToken extends TokenBase {
  kind: "null" | "true" | "false"
  text: "null" | "true" | "false"
}

/**
 * Quoted text without its quotes. Backslashes are kept as they appear in the input.
 */
export interface StringToken extends TokenBase {
  kind: "string"
  text: string
}

/**
 * Unvalidated run of `0-9 + - . e E`
 */
export interface NumberToken extends TokenBase {
  kind: "number"
  text: string
}

export type Token = PunctuationToken | LiteralToken | StringToken | NumberToken

export const isPunctuation = (token: Token | undefined, text: Punctuation): token is PunctuationToken =>
  token?.kind === "punctuation" && token.text === text
