import * as z from "zod"

/**
 * Position of a byte in the source document. Line and column are 1-based,
 * the column counts bytes.
 */
export interface SourceLocation {
  offset: number
  line: number
  column: number
}

export type JsonParseErrorKind =
  | "malformed-literal"
  | "expected-separator"
  | "unterminated-string"
  | "invalid-encoding"
  | "unexpected-character"
  | "unexpected-token"
  | "unexpected-end"
  | "invalid-key"
  | "trailing-content"
  | "max-depth-exceeded"

const DESCRIPTIONS: Record<JsonParseErrorKind, string> = {
  "malformed-literal": "Malformed literal",
  "expected-separator": "Expected ':' after object key",
  "unterminated-string": "Unterminated string",
  "invalid-encoding": "String is not valid UTF-8",
  "unexpected-character": "Unexpected character",
  "unexpected-token": "Unexpected token",
  "unexpected-end": "Unexpected end of input",
  "invalid-key": "Object keys must be strings",
  "trailing-content": "Unexpected content after the top-level value",
  "max-depth-exceeded": "Maximum nesting depth exceeded",
}

/**
 * Error thrown when the input is not a well-formed document.
 * Parsing stops at the first error; no partial tree is returned.
 */
export class JsonParseError extends Error {
  override name = "JsonParseError" as const

  public readonly kind: JsonParseErrorKind

  public readonly location: SourceLocation

  /** Text of the offending token, when there is one */
  public readonly token?: string

  constructor(options: { kind: JsonParseErrorKind; location: SourceLocation; token?: string }) {
    const { kind, location, token } = options
    const found = token !== undefined ? ` (found '${token}')` : ""
    super(`${DESCRIPTIONS[kind]}${found} at line ${location.line}, column ${location.column}`)
    this.kind = kind
    this.location = location
    this.token = token

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, JsonParseError)
    }
  }
}

/**
 * Error thrown when plain data cannot be turned into a value tree
 */
export class ValueConversionError extends Error {
  override name = "ValueConversionError" as const

  public readonly issues: z.ZodError["issues"]

  constructor(error: z.ZodError) {
    super(`Input is not JSON-compatible:\n${z.prettifyError(error)}`)
    this.issues = error.issues

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValueConversionError)
    }
  }
}

/**
 * Error thrown when parser options fail validation
 */
export class ParserOptionsError extends Error {
  override name = "ParserOptionsError" as const

  public readonly issues: z.ZodError["issues"]

  constructor(error: z.ZodError) {
    super(`Invalid parser options:\n${z.prettifyError(error)}`)
    this.issues = error.issues

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ParserOptionsError)
    }
  }
}
