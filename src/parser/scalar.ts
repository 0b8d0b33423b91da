import { Value, type NumberValue, type StringValue } from "@/value/types"

// optional sign, digits with an optional fraction (or a bare fraction), optional exponent
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Turn the text of a string or number token into a leaf value.
 *
 * The lexer does not tell the parser whether a token was quoted, so this is
 * the one place that decides between Number and String: text that reads as a
 * finite decimal float becomes a Number, everything else a String. `"30"`
 * therefore yields Number(30), and a malformed run such as `1.2.3` yields
 * String("1.2.3"). Out-of-range numbers (`1e400`) stay strings.
 */
export function toScalar(text: string): NumberValue | StringValue {
  if (DECIMAL.test(text)) {
    const number = Number(text)
    if (Number.isFinite(number)) return Value.number(number)
  }

  return Value.string(text)
}
