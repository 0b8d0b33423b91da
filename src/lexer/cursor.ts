import type { SourceLocation } from "@/errors"

const encoder = new TextEncoder()

/**
 * Forward-only cursor over the input bytes with a single byte of pushback.
 * Tracks line and column so errors can point into the source.
 */
export class ByteCursor {
  readonly #bytes: Uint8Array
  #offset: number = 0
  #line: number = 1
  #column: number = 1
  // location before the most recent read, restored by unread()
  #previous: SourceLocation | null = null

  constructor(input: Uint8Array | string) {
    this.#bytes = typeof input === "string" ? encoder.encode(input) : input
  }

  get offset(): number {
    return this.#offset
  }

  get atEnd(): boolean {
    return this.#offset >= this.#bytes.length
  }

  location(): SourceLocation {
    return { offset: this.#offset, line: this.#line, column: this.#column }
  }

  peek(): number | undefined {
    return this.#bytes[this.#offset]
  }

  read(): number | undefined {
    const byte = this.#bytes[this.#offset]
    if (byte === undefined) return undefined

    this.#previous = this.location()
    this.#offset++

    if (byte === 0x0a) {
      this.#line++
      this.#column = 1
    } else {
      this.#column++
    }

    return byte
  }

  /**
   * Push back the byte returned by the last read()
   */
  unread(): void {
    if (!this.#previous) {
      throw new Error("ByteCursor.unread() called without a preceding read()")
    }

    this.#offset = this.#previous.offset
    this.#line = this.#previous.line
    this.#column = this.#previous.column
    this.#previous = null
  }

  slice(start: number, end: number): Uint8Array {
    return this.#bytes.subarray(start, end)
  }
}
