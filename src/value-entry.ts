/**
 * tagged-json/value
 *
 * Value constructors and conversions without the parser.
 */

export * from "@/value"
