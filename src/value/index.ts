export { Value, type ValueKind, type PlainJson } from "@/value/types"
export type { NullValue, BoolValue, NumberValue, StringValue, ObjectValue, ArrayValue } from "@/value/types"
export { match, assertNever, type ValueCases } from "@/value/match"
export { toPlain, fromPlain, isValue, plainJsonSchema, valueSchema } from "@/value/plain"
