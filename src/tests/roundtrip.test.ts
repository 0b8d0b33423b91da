import { describe, it, expect } from "vitest"
import { parse, fromPlain, toPlain, Value } from "@/index"
import { serialize } from "./serialize"

const samples = {
  "a flat object": { name: "Ada", ok: false, none: null, n: -3.5 },
  "nested containers": { nested: { deep: [[], {}, [[1]]] }, tags: ["a", "b"] },
  "a top-level array": [1, "two", true, null, { three: [3] }],
  "large and small numbers": [1e21, 2.5e-7, 0, 123456789],
  "a top-level string": "hello world",
}

describe("parse(serialize(v))", () => {
  Object.entries(samples).forEach(([name, plain]) => {
    it(`should round-trip ${name}`, () => {
      const value = fromPlain(plain)

      expect(parse(serialize(value))).toEqual(value)
    })

    it(`should round-trip ${name} when pretty-printed`, () => {
      const value = fromPlain(plain)

      expect(parse(serialize(value, "  "))).toEqual(value)
    })
  })

  it("should round-trip strings with escaped quotes", () => {
    const value = parse('{"quote": "say \\"hi\\""}')

    expect(serialize(value)).toBe('{"quote":"say \\"hi\\""}')
    expect(parse(serialize(value))).toEqual(value)
  })

  it("should pretty-print with the given indent", () => {
    expect(serialize(parse('{"a": [1, {}]}'), "  ")).toBe('{\n  "a": [\n    1,\n    {}\n  ]\n}')
  })
})

describe("toPlain(parse(text))", () => {
  it("should match the plain form of the document", () => {
    const text = '{"name": "John Doe", "age": 30, "active": true, "tags": ["a", "b"]}'

    expect(toPlain(parse(text))).toEqual({ name: "John Doe", age: 30, active: true, tags: ["a", "b"] })
  })

  it("should round-trip through plain data", () => {
    const value = parse('[{"x": [null, false]}, "y", 7]')

    expect(fromPlain(toPlain(value))).toEqual(value)
    expect(fromPlain(toPlain(value))).not.toBe(value)
    expect(value).toEqual(Value.array([fromPlain({ x: [null, false] }), Value.string("y"), Value.number(7)]))
  })
})
