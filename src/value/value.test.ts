import { describe, it, expect } from "vitest"
import { Value, match, assertNever, toPlain, fromPlain, isValue } from "@/value"
import { ValueConversionError } from "@/errors"

const kindOf = (value: Value): string =>
  match(value, {
    null: () => "null",
    bool: (v) => `bool:${v.value}`,
    number: (v) => `number:${v.value}`,
    string: (v) => `string:${v.value}`,
    object: (v) => `object:${[...v.entries.keys()].join(",")}`,
    array: (v) => `array:${v.items.length}`,
  })

describe("Value", () => {
  it("should share the null and boolean leaves", () => {
    expect(Value.null()).toBe(Value.null())
    expect(Value.bool(true)).toBe(Value.bool(true))
    expect(Value.bool(false)).not.toBe(Value.bool(true))
  })

  it("should copy array items", () => {
    const items = [Value.number(1)]
    const array = Value.array(items)

    items.push(Value.number(2))

    expect(array.items).toHaveLength(1)
    expect(Object.isFrozen(array.items)).toBe(true)
  })

  it("should copy object entries and reject writes", () => {
    const source = new Map([["a", Value.number(1)]])
    const object = Value.object(source)

    source.set("b", Value.number(2))

    expect([...object.entries.keys()]).toEqual(["a"])
    expect(() => (object.entries as Map<string, Value>).delete("a")).toThrow("Cannot modify an object value")
    expect(() => (object.entries as Map<string, Value>).clear()).toThrow("Cannot modify an object value")
  })
})

describe("match", () => {
  it("should dispatch on every kind", () => {
    expect(
      [
        Value.null(),
        Value.bool(true),
        Value.number(2.5),
        Value.string("s"),
        Value.object([["k", Value.null()]]),
        Value.array([Value.null(), Value.null()]),
      ].map(kindOf),
    ).toEqual(["null", "bool:true", "number:2.5", "string:s", "object:k", "array:2"])
  })

  it("should throw on an unknown kind", () => {
    const unknown: never = JSON.parse('{"kind": "date"}') as never

    expect(() => assertNever(unknown)).toThrow('Unhandled value kind: {"kind":"date"}')
  })
})

describe("toPlain / fromPlain", () => {
  const plain = { name: "Ada", tags: ["a", "b"], score: 9.5, active: false, manager: null, nested: { list: [[], {}] } }

  it("should build a tree from plain data", () => {
    expect(fromPlain({ a: [1, "x", null, true] })).toEqual(
      Value.object([["a", Value.array([Value.number(1), Value.string("x"), Value.null(), Value.bool(true)])]]),
    )
  })

  it("should convert a tree back to plain data", () => {
    expect(toPlain(fromPlain(plain))).toEqual(plain)
  })

  it("should keep __proto__ as an ordinary key", () => {
    const value = Value.object([["__proto__", Value.number(1)]])

    expect(Object.keys(toPlain(value) ?? {})).toEqual(["__proto__"])
  })

  it("should reject data that is not JSON-compatible", () => {
    expect(() => fromPlain(undefined)).toThrow(ValueConversionError)
    expect(() => fromPlain({ a: () => 1 })).toThrow(ValueConversionError)
    expect(() => fromPlain([1, Number.NaN])).toThrow(ValueConversionError)
    expect(() => fromPlain(Number.POSITIVE_INFINITY)).toThrow(ValueConversionError)
  })

  it("should reject class instances", () => {
    class Point {
      constructor(
        public x: number,
        public y: number,
      ) {}
    }

    expect(() => fromPlain({ d: new Date(0) })).toThrow(ValueConversionError)
    expect(() => fromPlain([new Point(1, 2)])).toThrow(ValueConversionError)
  })

  it("should report the zod issues", () => {
    try {
      fromPlain({ a: undefined })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ValueConversionError)
      if (error instanceof ValueConversionError) {
        expect(error.name).toBe("ValueConversionError")
        expect(error.message).toMatch(/^Input is not JSON-compatible:\n/)
        expect(error.issues.length).toBeGreaterThan(0)
      }
    }
  })
})

describe("isValue", () => {
  it("should accept value trees", () => {
    expect(isValue(Value.string("x"))).toBe(true)
    expect(isValue(fromPlain({ a: [1, { b: null }] }))).toBe(true)
    expect(isValue({ kind: "object", entries: new Map([["a", { kind: "null" }]]) })).toBe(true)
  })

  it("should reject shapes with the wrong payload", () => {
    expect(isValue({ kind: "string", value: 1 })).toBe(false)
    expect(isValue({ kind: "object", entries: {} })).toBe(false)
    expect(isValue({ kind: "array", items: [{ kind: "bool" }] })).toBe(false)
    expect(isValue("text")).toBe(false)
  })
})
