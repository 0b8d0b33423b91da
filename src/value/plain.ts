import * as z from "zod"
import { ValueConversionError } from "@/errors"
import { match } from "@/value/match"
import { Value, type PlainJson } from "@/value/types"

/**
 * JSON-compatible plain data: no undefined, functions or non-finite numbers
 */
export const plainJsonSchema: z.ZodType<PlainJson> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(plainJsonSchema),
    z.record(z.string(), plainJsonSchema),
  ]),
)

/**
 * Structural schema of the tagged tree
 */
export const valueSchema: z.ZodType<Value> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("null") }),
    z.object({ kind: z.literal("bool"), value: z.boolean() }),
    z.object({ kind: z.literal("number"), value: z.number() }),
    z.object({ kind: z.literal("string"), value: z.string() }),
    z.object({ kind: z.literal("object"), entries: z.map(z.string(), valueSchema) }),
    z.object({ kind: z.literal("array"), items: z.array(valueSchema) }),
  ]),
)

/**
 * Checks whether an unknown input has the shape of a value tree
 */
export function isValue(input: unknown): input is Value {
  return valueSchema.safeParse(input).success
}

/**
 * Converts a value tree into plain JavaScript data
 */
export function toPlain(value: Value): PlainJson {
  return match<PlainJson>(value, {
    null: () => null,
    bool: (v) => v.value,
    number: (v) => v.value,
    string: (v) => v.value,
    object: (v) => Object.fromEntries([...v.entries].map(([key, entry]) => [key, toPlain(entry)])),
    array: (v) => v.items.map(toPlain),
  })
}

/**
 * Converts plain JavaScript data into a frozen value tree
 *
 * @throws {ValueConversionError} when the input is not JSON-compatible
 */
export function fromPlain(input: unknown): Value {
  const result = plainJsonSchema.safeParse(input)

  if (!result.success) {
    throw new ValueConversionError(result.error)
  }

  return build(result.data)
}

const build = (data: PlainJson): Value => {
  if (data === null) return Value.null()
  if (typeof data === "boolean") return Value.bool(data)
  if (typeof data === "number") return Value.number(data)
  if (typeof data === "string") return Value.string(data)
  if (Array.isArray(data)) return Value.array(data.map(build))

  return Value.object(Object.entries(data).map(([key, entry]) => [key, build(entry)] as const))
}
