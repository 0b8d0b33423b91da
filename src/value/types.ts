/**
 * Tagged value tree produced by the parser
 *
 * Every variant carries a `kind` discriminant. Consumers should branch with
 * `match()` or a `switch` on `kind` so that a new variant is a compile error
 * everywhere it is not handled.
 */
export type Value = NullValue | BoolValue | NumberValue | StringValue | ObjectValue | ArrayValue

export type ValueKind = Value["kind"]

export interface NullValue {
  readonly kind: "null"
}

export interface BoolValue {
  readonly kind: "bool"
  readonly value: boolean
}

export interface NumberValue {
  readonly kind: "number"
  readonly value: number
}

export interface StringValue {
  readonly kind: "string"
  readonly value: string
}

export interface ObjectValue {
  readonly kind: "object"
  readonly entries: ReadonlyMap<string, Value>
}

export interface ArrayValue {
  readonly kind: "array"
  readonly items: readonly Value[]
}

/**
 * Plain JavaScript shape of a JSON document
 */
export type PlainJson = null | boolean | number | string | PlainJson[] | { [key: string]: PlainJson }

/**
 * Map that rejects writes once handed out as an object payload
 */
class FrozenMap<K, V> extends Map<K, V> {
  #sealed = false

  constructor(entries: Iterable<readonly [K, V]>) {
    // Map's own constructor would call the overridden set() before #sealed exists
    super()
    for (const [key, value] of entries) super.set(key, value)
    this.#sealed = true
  }

  override set(key: K, value: V): this {
    if (this.#sealed) throw new TypeError("Cannot modify an object value")
    return super.set(key, value)
  }

  override delete(): boolean {
    throw new TypeError("Cannot modify an object value")
  }

  override clear(): void {
    throw new TypeError("Cannot modify an object value")
  }
}

const NULL: NullValue = Object.freeze({ kind: "null" })
const TRUE: BoolValue = Object.freeze({ kind: "bool", value: true })
const FALSE: BoolValue = Object.freeze({ kind: "bool", value: false })

/**
 * Constructors for each variant. Payloads are copied and frozen.
 */
export const Value = {
  null: (): NullValue => NULL,

  bool: (value: boolean): BoolValue => (value ? TRUE : FALSE),

  number: (value: number): NumberValue => Object.freeze({ kind: "number", value }),

  string: (value: string): StringValue => Object.freeze({ kind: "string", value }),

  object: (entries: Iterable<readonly [string, Value]>): ObjectValue =>
    Object.freeze({ kind: "object", entries: new FrozenMap(entries) }),

  array: (items: Iterable<Value>): ArrayValue => Object.freeze({ kind: "array", items: Object.freeze([...items]) }),
} as const
