import { BindingError } from "@/errors"
import type { JsonToken, TokenStream } from "@/tokens/types"
import { BigDecimal } from "@/binding/big-decimal"
import { classRegistry, type BoundField, type ClassRegistry, type ClassSchema } from "@/binding/class-registry"
import { OPEN, typeName } from "@/binding/descriptor"
import type { GenericData } from "@/binding/generic-data"
import { NullValue, sentinelFor } from "@/binding/null-registry"
import { PolymorphicDispatcher } from "@/binding/polymorphic"
import {
  formatDouble,
  isFloatingKind,
  isNonFiniteText,
  isNumberKind,
  parseBoolean,
  parseNumber,
} from "@/binding/scalars"
import type { EnumDescriptor, MapDescriptor, ScalarKind, TypeDescriptor } from "@/binding/types"
import { GenericJson, type JsonSerializer } from "@/json/generic-json"

/**
 * Object being populated when a `stopAt` hook is consulted
 */
export type BindDestination = GenericData | Map<string, unknown> | Record<string, unknown>

export interface BindOptions {
  /**
   * Check scalar and enum field values against their Zod schemas, so refinements such as
   * `.min()` or `.email()` apply while binding. Defaults to false.
   */
  validate?: boolean
  /**
   * Called with each key before its value is bound. Returning true ends binding at that key:
   * the stream is left on the key's value and every enclosing container returns as it is.
   */
  stopAt?: (destination: BindDestination, key: string) => boolean
  /**
   * Called with each key of a model object that matches no declared field, before its value
   * is bound. The value is still kept as an unknown key; throwing rejects the document.
   */
  onUnknownKey?: (destination: GenericData, key: string) => void
  /** Class schema cache; defaults to the shared registry */
  registry?: ClassRegistry
  /** Attached to every instance the binder creates, for `toString()` */
  serializer?: JsonSerializer
}

const TOKEN_NAMES: Record<JsonToken, string> = {
  START_OBJECT: "object",
  END_OBJECT: "end of object",
  START_ARRAY: "array",
  END_ARRAY: "end of array",
  FIELD_NAME: "field name",
  VALUE_STRING: "string",
  VALUE_NUMBER_INT: "number",
  VALUE_NUMBER_FLOAT: "number",
  VALUE_TRUE: "boolean",
  VALUE_FALSE: "boolean",
  VALUE_NULL: "null",
}

const describeToken = (token: JsonToken | undefined): string =>
  token === undefined ? "end of input" : TOKEN_NAMES[token]

const mismatch = (expected: string, token: JsonToken | undefined): BindingError =>
  new BindingError({ message: `expected ${expected} but got ${describeToken(token)}` })

/**
 * Binds a token stream to values of a type descriptor.
 *
 * Values are bound in one pass. Every binding method expects the stream on the first
 * token of a value and leaves it on the last token of that value; `bind()` then moves
 * one token past it.
 *
 * @example
 * ```ts
 * const binder = new ValueBinder({ validate: true })
 * const stream = new TextTokenStream('{"name":"Fido","type":"dog"}')
 * const animal = binder.bind(stream, describeModel(Animal.of({})))
 * ```
 */
export class ValueBinder {
  readonly registry: ClassRegistry
  #validate: boolean
  #stopAt: ((destination: BindDestination, key: string) => boolean) | undefined
  #onUnknownKey: ((destination: GenericData, key: string) => void) | undefined
  #serializer: JsonSerializer | undefined
  #dispatcher: PolymorphicDispatcher
  #stopped: boolean = false

  constructor(options: BindOptions = {}) {
    this.registry = options.registry ?? classRegistry
    this.#validate = options.validate ?? false
    this.#stopAt = options.stopAt
    this.#onUnknownKey = options.onUnknownKey
    this.#serializer = options.serializer
    this.#dispatcher = new PolymorphicDispatcher(this)
  }

  /**
   * Whether the last `bind()` ended early at a `stopAt` key
   */
  get stopped(): boolean {
    return this.#stopped
  }

  /**
   * Bind the value at the current token (or the next one, for a fresh stream)
   */
  bind(stream: TokenStream, descriptor: TypeDescriptor): unknown {
    this.#stopped = false
    const token = stream.currentToken ?? stream.nextToken()
    if (token === undefined) {
      throw new BindingError({ message: "no JSON value to bind" })
    }

    const value = this.bindValue(stream, descriptor)
    if (!this.#stopped) stream.nextToken()
    return value
  }

  /**
   * Bind the value starting at the current token
   */
  bindValue(stream: TokenStream, descriptor: TypeDescriptor, quoted: boolean = false): unknown {
    const token = stream.currentToken

    if (descriptor.kind === "scalar" && descriptor.scalar === "void") {
      stream.skipChildren()
      return undefined
    }

    if (token === "VALUE_NULL") {
      return this.#bindNull(descriptor)
    }

    switch (descriptor.kind) {
      case "open":
        return this.#bindOpen(stream)
      case "scalar":
        return this.#bindScalar(stream, descriptor.scalar, quoted || descriptor.quoted)
      case "enum":
        return this.#bindEnum(stream, descriptor)
      case "array":
        return this.#bindArray(stream, descriptor.element, quoted)
      case "collection":
        return new Set(this.#bindArray(stream, descriptor.element, quoted))
      case "map":
        return this.#bindMap(stream, descriptor, quoted)
      case "object": {
        if (token !== "START_OBJECT") throw mismatch(typeName(descriptor), token)
        const instance = this.newInstance(this.registry.schemaOfDescriptor(descriptor))
        this.bindMembers(stream, instance)
        return instance
      }
      case "polymorphic":
        if (token !== "START_OBJECT") throw mismatch(typeName(descriptor), token)
        return this.#dispatcher.bind(stream, descriptor)
    }
  }

  newInstance(schema: ClassSchema): GenericJson {
    return new GenericJson(schema, this.#serializer)
  }

  /**
   * Bind the members that follow the current token up to the closing brace.
   * A key that names the field with wire key `exclusiveKey` is an error.
   */
  bindMembers(stream: TokenStream, instance: GenericData, exclusiveKey?: string): void {
    let token = stream.nextToken()
    while (token === "FIELD_NAME") {
      const key = stream.text
      if (exclusiveKey !== undefined && instance.classSchema.field(key)?.wireKey === exclusiveKey) {
        throw new BindingError({ message: `duplicate discriminator key "${key}"`, path: [key] })
      }

      stream.nextToken()
      if (this.shouldStop(instance, key)) return
      this.bindMember(stream, instance, key)
      if (this.#stopped) return
      token = stream.nextToken()
    }

    if (token !== "END_OBJECT") throw mismatch("field name or end of object", token)
  }

  /**
   * Bind the value at the current token into `instance` under `key`
   */
  bindMember(stream: TokenStream, instance: GenericData, key: string): void {
    const field = instance.classSchema.field(key)

    try {
      if (field) {
        const value = this.bindValue(stream, field.type, field.quoteAsString)
        if (this.#validate) this.#check(field, value)
        if (instance.get(field.name) !== undefined) warnDuplicate(instance, key)
        instance.set(field.name, value)
      } else {
        this.#onUnknownKey?.(instance, key)
        const value = this.bindValue(stream, OPEN)
        if (instance.getUnknownKey(key) !== undefined) warnDuplicate(instance, key)
        instance.setUnknownKey(key, value)
      }
    } catch (err) {
      if (err instanceof BindingError) throw err.within(key)
      throw err
    }
  }

  /**
   * Consult the `stopAt` hook; once it fires, every enclosing container returns
   */
  shouldStop(destination: BindDestination, key: string): boolean {
    if (this.#stopAt?.(destination, key)) this.#stopped = true
    return this.#stopped
  }

  #check(field: BoundField, value: unknown): void {
    if (value === undefined || value instanceof NullValue) return
    if (field.type.kind !== "scalar" && field.type.kind !== "enum") return

    const result = field.schema.safeParse(value)
    if (!result.success) {
      throw new BindingError({
        message: result.error.issues.map((issue) => issue.message).join("; "),
        cause: result.error,
      })
    }
  }

  #bindNull(descriptor: TypeDescriptor): unknown {
    if (descriptor.kind === "enum") {
      if (descriptor.nullConstant === undefined) {
        throw new BindingError({ message: "null is not allowed for an enum without a null constant" })
      }
      return descriptor.nullConstant
    }
    return sentinelFor(descriptor)
  }

  #bindScalar(stream: TokenStream, kind: ScalarKind, quoted: boolean): unknown {
    const token = stream.currentToken
    const text = stream.text

    switch (token) {
      case "VALUE_TRUE":
      case "VALUE_FALSE":
        if (kind !== "boolean") throw mismatch(kind, token)
        return token === "VALUE_TRUE"

      case "VALUE_NUMBER_INT":
      case "VALUE_NUMBER_FLOAT":
        if (!isNumberKind(kind)) throw mismatch(kind, token)
        if (quoted) {
          throw new BindingError({ message: `expected a JSON string for quoted ${kind} but got number ${text}` })
        }
        return parseNumber(kind, text)

      case "VALUE_STRING":
        if (kind === "string") return text
        if (kind === "boolean") {
          if (!quoted) {
            throw new BindingError({ message: `boolean formatted as a JSON string requires a quoted field: "${text}"` })
          }
          return parseBoolean(text)
        }
        if (!isNumberKind(kind)) throw mismatch(kind, token)
        if (isFloatingKind(kind) && isNonFiniteText(text)) return parseNumber(kind, text)
        if (!quoted) {
          throw new BindingError({ message: `number formatted as a JSON string requires a quoted field: "${text}"` })
        }
        return parseNumber(kind, text)

      default:
        throw mismatch(kind, token)
    }
  }

  #bindEnum(stream: TokenStream, descriptor: EnumDescriptor): string | number {
    const token = stream.currentToken
    if (token !== "VALUE_STRING" && token !== "VALUE_NUMBER_INT") throw mismatch("enum", token)

    const text = stream.text
    const wantString = token === "VALUE_STRING"
    const allowed = descriptor.values.filter((value) => value !== descriptor.nullConstant)
    const match = allowed.find((value) => String(value) === text && (typeof value === "string") === wantString)

    if (match === undefined) {
      throw new BindingError({
        message: `unknown enum value ${JSON.stringify(text)}; expected one of ${allowed.map(String).join(", ")}`,
      })
    }
    return match
  }

  #bindArray(stream: TokenStream, element: TypeDescriptor, quoted: boolean): unknown[] {
    const token = stream.currentToken
    if (token !== "START_ARRAY") throw mismatch("collection or array type", token)

    const out: unknown[] = []
    let next = stream.nextToken()
    while (next !== "END_ARRAY") {
      if (next === undefined) throw mismatch("end of array", next)
      try {
        out.push(this.bindValue(stream, element, quoted))
      } catch (err) {
        if (err instanceof BindingError) throw err.within(out.length)
        throw err
      }
      if (this.#stopped) return out
      next = stream.nextToken()
    }
    return out
  }

  #bindMap(stream: TokenStream, descriptor: MapDescriptor, quoted: boolean): unknown {
    const token = stream.currentToken
    if (token !== "START_OBJECT") throw mismatch("map", token)

    const map = new Map<string, unknown>()
    const record: Record<string, unknown> = {}
    const destination = descriptor.container === "map" ? map : record

    let next = stream.nextToken()
    while (next === "FIELD_NAME") {
      const key = stream.text
      stream.nextToken()
      if (this.shouldStop(destination, key)) return destination

      let value: unknown
      try {
        value = this.bindValue(stream, descriptor.value, quoted)
      } catch (err) {
        if (err instanceof BindingError) throw err.within(key)
        throw err
      }

      if (descriptor.container === "map") {
        map.set(key, value)
      } else {
        Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true })
      }
      if (this.#stopped) return destination
      next = stream.nextToken()
    }

    if (next !== "END_OBJECT") throw mismatch("field name or end of object", next)
    return destination
  }

  /**
   * Bind a value of unknown shape: objects become Maps, integers become numbers when they fit
   * and bigints otherwise, decimals become numbers when the text round-trips and BigDecimals
   * otherwise. `-0` stays a BigDecimal so that its sign is written back.
   */
  #bindOpen(stream: TokenStream): unknown {
    const token = stream.currentToken
    const text = stream.text

    switch (token) {
      case "START_OBJECT": {
        const map = new Map<string, unknown>()
        let next = stream.nextToken()
        while (next === "FIELD_NAME") {
          const key = stream.text
          stream.nextToken()
          try {
            map.set(key, this.#bindOpen(stream))
          } catch (err) {
            if (err instanceof BindingError) throw err.within(key)
            throw err
          }
          next = stream.nextToken()
        }
        if (next !== "END_OBJECT") throw mismatch("field name or end of object", next)
        return map
      }
      case "START_ARRAY": {
        const out: unknown[] = []
        let next = stream.nextToken()
        while (next !== "END_ARRAY") {
          if (next === undefined) throw mismatch("end of array", next)
          out.push(this.#bindOpen(stream))
          next = stream.nextToken()
        }
        return out
      }
      case "VALUE_STRING":
        return text
      case "VALUE_NUMBER_INT": {
        const value = Number(text)
        if (Object.is(value, -0)) return BigDecimal.parse(text)
        return Number.isSafeInteger(value) ? value : BigInt(text)
      }
      case "VALUE_NUMBER_FLOAT": {
        const value = Number(text)
        return Number.isFinite(value) && formatDouble(value) === text ? value : BigDecimal.parse(text)
      }
      case "VALUE_TRUE":
        return true
      case "VALUE_FALSE":
        return false
      case "VALUE_NULL":
        return sentinelFor(OPEN)
      default:
        throw mismatch("JSON value", token)
    }
  }
}

function warnDuplicate(instance: GenericData, key: string): void {
  console.warn(`[wirebind] Duplicate key "${key}" in ${instance.classSchema.model.name}; the last value wins`)
}
