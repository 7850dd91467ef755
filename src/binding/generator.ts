import { BindingError } from "@/errors"
import type { TokenSink } from "@/tokens/types"
import { BigDecimal } from "@/binding/big-decimal"
import { OPEN, typeName } from "@/binding/descriptor"
import { GenericData } from "@/binding/generic-data"
import { NullValue } from "@/binding/null-registry"
import { formatDouble, formatFloat } from "@/binding/scalars"
import type { EnumDescriptor, ScalarKind, TypeDescriptor } from "@/binding/types"

const byKey = <T>([a]: [string, T], [b]: [string, T]) => (a < b ? -1 : a > b ? 1 : 0)

const INTEGER_KINDS = new Set<ScalarKind>(["byte", "short", "int"])

/**
 * Writes bound values to a token sink.
 *
 * Object keys are written in ascending order (declared fields and unknown keys together), so
 * the output of two equal values is byte-identical. Absent fields are omitted and null
 * sentinels are written as null.
 *
 * @example
 * ```ts
 * const writer = new JsonWriter()
 * new Generator().write(dog, describeModel(Dog.of({})), writer)
 * writer.toString() // '{"name":"Fido","type":"dog"}'
 * ```
 */
export class Generator {
  /**
   * Write one value. Under the open descriptor the JSON form follows the runtime type.
   */
  write(value: unknown, descriptor: TypeDescriptor, sink: TokenSink): void {
    if (value === undefined) return
    this.#write(value, descriptor, sink, false)
    sink.flush()
  }

  #write(value: unknown, descriptor: TypeDescriptor, sink: TokenSink, quoted: boolean): void {
    if (value === undefined || value === null || value instanceof NullValue) {
      sink.writeNull()
      return
    }

    switch (descriptor.kind) {
      case "open":
        return this.#writeOpen(value, sink, quoted)
      case "scalar":
        return this.#writeScalar(value, descriptor.scalar, sink, quoted || descriptor.quoted)
      case "enum":
        return this.#writeEnum(value, descriptor, sink)
      case "array":
      case "collection":
        if (!Array.isArray(value) && !(value instanceof Set)) {
          throw mismatch(typeName(descriptor), value)
        }
        sink.writeStartArray()
        for (const element of value) this.#write(element, descriptor.element, sink, quoted)
        sink.writeEndArray()
        return
      case "map": {
        const entries = entriesOf(value)
        if (!entries) throw mismatch("map", value)
        sink.writeStartObject()
        for (const [key, entry] of entries.sort(byKey)) {
          if (entry === undefined) continue
          sink.writeFieldName(key)
          this.#write(entry, descriptor.value, sink, quoted)
        }
        sink.writeEndObject()
        return
      }
      case "object":
      case "polymorphic":
        if (!(value instanceof GenericData)) throw mismatch(descriptor.model.name, value)
        return this.#writeData(value, sink)
    }
  }

  #writeData(data: GenericData, sink: TokenSink): void {
    const members: [string, { value: unknown; type: TypeDescriptor; quoted: boolean }][] = []

    for (const field of data.classSchema.fields) {
      const value = data.get(field.name)
      if (value !== undefined) members.push([field.wireKey, { value, type: field.type, quoted: field.quoteAsString }])
    }
    for (const [key, value] of data.unknownKeys) {
      if (value !== undefined) members.push([key, { value, type: OPEN, quoted: false }])
    }

    sink.writeStartObject()
    for (const [key, member] of members.sort(byKey)) {
      sink.writeFieldName(key)
      try {
        this.#write(member.value, member.type, sink, member.quoted)
      } catch (err) {
        if (err instanceof BindingError) throw err.within(key)
        throw err
      }
    }
    sink.writeEndObject()
  }

  #writeScalar(value: unknown, kind: ScalarKind, sink: TokenSink, quoted: boolean): void {
    switch (kind) {
      case "string":
        if (typeof value !== "string") throw mismatch(kind, value)
        sink.writeString(value)
        return
      case "boolean":
        if (typeof value !== "boolean") throw mismatch(kind, value)
        if (quoted) sink.writeString(String(value))
        else sink.writeBoolean(value)
        return
      case "void":
        sink.writeNull()
        return
      default:
        return writeLiteral(sink, numberLiteral(value, kind), quoted)
    }
  }

  #writeEnum(value: unknown, descriptor: EnumDescriptor, sink: TokenSink): void {
    if (value === descriptor.nullConstant) {
      sink.writeNull()
      return
    }
    if ((typeof value !== "string" && typeof value !== "number") || !descriptor.values.includes(value)) {
      throw new BindingError({
        message: `${String(value)} is not one of ${descriptor.values.map(String).join(", ")}`,
      })
    }
    if (typeof value === "number") sink.writeNumber(String(value))
    else sink.writeString(value)
  }

  #writeOpen(value: unknown, sink: TokenSink, quoted: boolean): void {
    if (value === undefined || value === null || value instanceof NullValue) {
      sink.writeNull()
      return
    }

    switch (typeof value) {
      case "string":
        sink.writeString(value)
        return
      case "boolean":
        if (quoted) sink.writeString(String(value))
        else sink.writeBoolean(value)
        return
      case "number":
        return writeLiteral(sink, numberLiteral(value, "double"), quoted)
      case "bigint":
        return writeLiteral(sink, value.toString(), quoted)
    }

    if (value instanceof BigDecimal) return writeLiteral(sink, value.toString(), quoted)
    if (value instanceof GenericData) return this.#writeData(value, sink)

    if (Array.isArray(value) || value instanceof Set) {
      sink.writeStartArray()
      for (const element of value) this.#writeOpen(element, sink, quoted)
      sink.writeEndArray()
      return
    }

    const entries = entriesOf(value)
    if (!entries) throw mismatch("JSON value", value)

    sink.writeStartObject()
    for (const [key, entry] of entries.sort(byKey)) {
      if (entry === undefined) continue
      sink.writeFieldName(key)
      try {
        this.#writeOpen(entry, sink, quoted)
      } catch (err) {
        if (err instanceof BindingError) throw err.within(key)
        throw err
      }
    }
    sink.writeEndObject()
  }
}

/**
 * Write one value to a sink
 */
export function generate(value: unknown, descriptor: TypeDescriptor, sink: TokenSink): void {
  new Generator().write(value, descriptor, sink)
}

function writeLiteral(sink: TokenSink, literal: string, quoted: boolean): void {
  if (quoted) sink.writeString(literal)
  else sink.writeNumber(literal)
}

/**
 * JSON number text of a numeric value; non-finite values fail before anything is written
 */
function numberLiteral(value: unknown, kind: ScalarKind): string {
  if (typeof value === "bigint") return value.toString()
  if (value instanceof BigDecimal) return value.toString()
  if (typeof value !== "number") throw mismatch(kind, value)

  if (!Number.isFinite(value)) {
    throw new BindingError({ message: `${value} cannot be written as a JSON number` })
  }
  if (INTEGER_KINDS.has(kind) && !Number.isInteger(value)) {
    throw new BindingError({ message: `expected an integer for ${kind} but got ${value}` })
  }
  return kind === "float" ? formatFloat(value) : formatDouble(value)
}

/**
 * Key/value pairs of a Map with string keys or of a plain object
 */
function entriesOf(value: unknown): [string, unknown][] | undefined {
  if (value instanceof Map) {
    const entries: [string, unknown][] = []
    for (const [key, entry] of value) {
      if (typeof key !== "string") {
        throw new BindingError({ message: `map keys must be strings, got ${typeof key}` })
      }
      entries.push([key, entry])
    }
    return entries
  }
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.entries(value)
  }
  return undefined
}

function mismatch(expected: string, value: unknown): BindingError {
  const actual = value === null ? "null" : typeof value === "object" ? value.constructor.name : typeof value
  return new BindingError({ message: `expected ${expected} but got ${actual}` })
}
