export { Parser } from "@/parser/parser"
export { parse, parseAll } from "@/parser/parse"
export { toScalar } from "@/parser/scalar"
export { parserOptionsSchema, resolveParserOptions, type ParserOptions } from "@/parser/options"
