import { match, type Value } from "@/value"

/**
 * Test fixture: writes a value tree back to text.
 *
 * Strings are written between quotes exactly as stored. The lexer keeps
 * backslashes, so any quote inside a parsed string is already escaped.
 */
export const serialize = (value: Value, indent: string = ""): string => {
  const pretty = indent.length > 0
  const join = (parts: string[], open: string, close: string, depth: string): string => {
    if (parts.length === 0) return open + close
    if (!pretty) return open + parts.join(",") + close

    const inner = depth + indent
    return `${open}\n${parts.map((part) => inner + part).join(",\n")}\n${depth}${close}`
  }

  const write = (v: Value, depth: string): string =>
    match(v, {
      null: () => "null",
      bool: (b) => String(b.value),
      number: (n) => String(n.value),
      string: (s) => `"${s.value}"`,
      object: (o) =>
        join(
          [...o.entries].map(([key, entry]) => `"${key}":${pretty ? " " : ""}${write(entry, depth + indent)}`),
          "{",
          "}",
          depth,
        ),
      array: (a) =>
        join(
          a.items.map((item) => write(item, depth + indent)),
          "[",
          "]",
          depth,
        ),
    })

  return write(value, "")
}
