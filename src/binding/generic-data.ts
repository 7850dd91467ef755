import type * as z from "zod"
import type { FieldShape } from "@/schema/model"
import { BigDecimal } from "@/binding/big-decimal"
import type { BoundField, ClassSchema } from "@/binding/class-registry"
import type { NullValue } from "@/binding/null-registry"

/**
 * A field value: the bound value, or the null sentinel when the document held JSON null
 */
export type FieldValue<T> = T | NullValue

/**
 * Values for the declared fields of a shape, keyed by member name
 */
export type FieldValues<S extends FieldShape> = {
  [K in keyof S]?: FieldValue<z.output<S[K]>>
}

/**
 * Instance of a model: declared field values plus any unknown keys seen in the document.
 *
 * Declared fields are addressed by member name or by wire key. Unknown keys keep their
 * insertion order and are written back out by the generator.
 *
 * @example
 * ```ts
 * const dog = Dog.create({ name: "Fido" })
 * dog.get("name") // "Fido"
 * dog.set("extra", { x: 1 }) // not declared, kept as an unknown key
 * ```
 */
export class GenericData<S extends FieldShape = FieldShape> {
  readonly classSchema: ClassSchema
  /** Declared values, by member name */
  private readonly values = new Map<string, unknown>()
  /** Undeclared values, by JSON key */
  private readonly unknown = new Map<string, unknown>()

  constructor(classSchema: ClassSchema) {
    this.classSchema = classSchema
  }

  get<K extends keyof S & string>(name: K): FieldValue<z.output<S[K]>> | undefined
  get(name: string): unknown
  get(name: string): unknown {
    const field = this.#field(name)
    return field ? this.values.get(field.name) : this.unknown.get(this.#unknownKey(name))
  }

  set<K extends keyof S & string>(name: K, value: FieldValue<z.output<S[K]>> | undefined): this
  set(name: string, value: unknown): this
  set(name: string, value: unknown): this {
    const field = this.#field(name)
    if (field) {
      this.values.set(field.name, value)
    } else {
      this.unknown.set(this.#unknownKey(name), value)
    }
    return this
  }

  /**
   * Value stored under a JSON key that is not a declared wire key
   */
  getUnknownKey(key: string): unknown {
    return this.classSchema.field(key) ? undefined : this.unknown.get(this.#unknownKey(key))
  }

  /**
   * Store a value under a JSON key. Only wire keys are matched against declared fields, so a
   * key that equals a member name but not its wire key stays an unknown key.
   */
  setUnknownKey(key: string, value: unknown): this {
    const field = this.classSchema.field(key)
    if (field) {
      this.values.set(field.name, value)
    } else {
      this.unknown.set(this.#unknownKey(key), value)
    }
    return this
  }

  /**
   * Whether a value (including a null sentinel) is present
   */
  has(name: string): boolean {
    return this.get(name) !== undefined
  }

  delete(name: string): boolean {
    const field = this.#field(name)
    return field ? this.values.delete(field.name) : this.unknown.delete(this.#unknownKey(name))
  }

  /**
   * Values stored under keys that are not declared fields, in insertion order
   */
  get unknownKeys(): ReadonlyMap<string, unknown> {
    return this.unknown
  }

  /**
   * Present entries keyed by wire key: declared fields in wire-key order, then unknown keys
   */
  entries(): [string, unknown][] {
    const out: [string, unknown][] = []
    for (const field of this.classSchema.fields) {
      const value = this.values.get(field.name)
      if (value !== undefined) out.push([field.wireKey, value])
    }
    for (const [key, value] of this.unknown) {
      if (value !== undefined) out.push([key, value])
    }
    return out
  }

  /**
   * Deep copy; null sentinels are shared
   */
  clone(): GenericData<S> {
    const copy = new GenericData<S>(this.classSchema)
    this.copyInto(copy)
    return copy
  }

  protected copyInto(target: GenericData<S>): void {
    for (const [name, value] of this.values) target.values.set(name, cloneValue(value))
    for (const [key, value] of this.unknown) target.unknown.set(key, cloneValue(value))
  }

  #field(name: string): BoundField | undefined {
    return this.classSchema.fieldNamed(name) ?? this.classSchema.field(name)
  }

  /** Key an unknown value is stored under; case-insensitive models keep the first spelling seen */
  #unknownKey(key: string): string {
    if (!this.classSchema.ignoreCase || this.unknown.has(key)) return key
    const folded = key.toLowerCase()
    for (const existing of this.unknown.keys()) {
      if (existing.toLowerCase() === folded) return existing
    }
    return key
  }
}

/**
 * Deep copy of a bound value. Scalars, sentinels and decimals are immutable and shared.
 */
export function cloneValue(value: unknown): unknown {
  if (value instanceof GenericData) return value.clone()
  if (Array.isArray(value)) return value.map(cloneValue)
  if (value instanceof Set) return new Set([...value].map(cloneValue))
  if (value instanceof Map) {
    return new Map([...value].map(([key, entry]): [unknown, unknown] => [key, cloneValue(entry)]))
  }
  if (value instanceof BigDecimal) return value
  if (typeof value === "object" && value !== null && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, cloneValue(entry)]))
  }
  return value
}
