import * as z from "zod"
import { ParserOptionsError } from "@/errors"
import { consoleLogger, type Logger } from "@/logger"

const isLogger = (input: unknown): input is Logger =>
  typeof input === "object" && input !== null && "warn" in input && typeof input.warn === "function"

export const parserOptionsSchema = z.strictObject({
  /** Deepest allowed nesting of objects and arrays. Unlimited when omitted. */
  maxDepth: z.number().int().positive().optional(),
  /** Receives warnings such as duplicate keys. Defaults to the console. */
  logger: z.custom<Logger>(isLogger, "Expected a logger with a warn() function").optional(),
})

export type ParserOptions = z.input<typeof parserOptionsSchema>

export interface ResolvedParserOptions {
  maxDepth: number
  logger: Logger
}

/**
 * Validate user options and fill in defaults
 *
 * @throws {ParserOptionsError} when an option has the wrong shape
 */
export function resolveParserOptions(options: unknown = {}): ResolvedParserOptions {
  const result = parserOptionsSchema.safeParse(options)

  if (!result.success) {
    throw new ParserOptionsError(result.error)
  }

  return {
    maxDepth: result.data.maxDepth ?? Number.POSITIVE_INFINITY,
    logger: result.data.logger ?? consoleLogger,
  }
}
