import * as z from "zod"
import type { Model, ModelApplication, ModelLink, ModelNode } from "@/schema/model"
import { BindingError } from "@/errors"
import { ValueBinder, type BindOptions } from "@/binding/binder"
import { classRegistry, type ClassRegistry } from "@/binding/class-registry"
import { describe, describeModel, OPEN } from "@/binding/descriptor"
import { Generator } from "@/binding/generator"
import type { NullValue } from "@/binding/null-registry"
import type { TypeDescriptor } from "@/binding/types"
import type { GenericJson, JsonSerializer } from "@/json/generic-json"
import type { JsonSource } from "@/tokens/char-source"
import { JsonWriter } from "@/tokens/json-writer"
import { skipToKey } from "@/tokens/navigation"
import { TextTokenStream } from "@/tokens/text-token-stream"

/**
 * Anything a JSON document can be bound to: a model, a model application, or a Zod schema
 */
export type Bindable = ModelNode | ModelLink | z.ZodType

/**
 * The value a document binds to for a given target
 */
export type Bound<T> =
  T extends Model<infer S>
    ? GenericJson<S>
    : T extends ModelApplication<infer S>
      ? GenericJson<S>
      : T extends z.ZodType
        ? z.output<T>
        : unknown

/**
 * Resolve a bind target into its type descriptor
 */
export function descriptorOf(type: Bindable): TypeDescriptor {
  if (type instanceof z.ZodType) return describe(type)
  if ("model" in type) return describeModel(type)
  return describeModel({ model: type, args: {} })
}

const ENCODINGS: Record<string, BufferEncoding> = {
  "utf-8": "utf8",
  utf8: "utf8",
  "utf-16le": "utf16le",
  utf16le: "utf16le",
  "iso-8859-1": "latin1",
  latin1: "latin1",
  "us-ascii": "ascii",
  ascii: "ascii",
}

export interface JsonFactoryOptions {
  /** Character set of byte input and of `toBytes()` output. Defaults to utf-8. */
  charset?: string
  /** Spaces per level in `toPrettyString()`. Defaults to 2. */
  indent?: number
  /** Check bound scalar values against their Zod schemas. Defaults to false. */
  validate?: boolean
  /** Class schema cache; defaults to the shared registry */
  registry?: ClassRegistry
}

/**
 * Entry point for reading and writing JSON: creates token streams, writers and binders, and
 * converts between documents and bound values.
 *
 * @example
 * ```ts
 * const factory = new JsonFactory()
 * const dog = factory.fromString('{"name":"Fido","type":"dog","tricksKnown":3}', Animal)
 * factory.toString(dog) // '{"name":"Fido","tricksKnown":3,"type":"dog"}'
 * ```
 */
export class JsonFactory implements JsonSerializer {
  readonly charset: string
  readonly registry: ClassRegistry
  #encoding: BufferEncoding
  #indent: number
  #validate: boolean

  constructor(options: JsonFactoryOptions = {}) {
    this.charset = (options.charset ?? "utf-8").toLowerCase()
    const encoding = ENCODINGS[this.charset]
    if (!encoding) {
      throw new BindingError({ message: `unsupported charset ${this.charset}` })
    }
    this.#encoding = encoding
    this.#indent = options.indent ?? 2
    this.#validate = options.validate ?? false
    this.registry = options.registry ?? classRegistry
  }

  createTokenStream(source: JsonSource): TextTokenStream {
    return new TextTokenStream(source, this.charset)
  }

  createWriter(pretty: boolean = false): JsonWriter {
    return new JsonWriter({ indent: pretty ? this.#indent : 0 })
  }

  createBinder(options: Omit<BindOptions, "registry" | "serializer"> = {}): ValueBinder {
    return new ValueBinder({ validate: this.#validate, ...options, registry: this.registry, serializer: this })
  }

  /**
   * Bind a whole document. Trailing content after the root value is an error.
   * A document that is just `null` binds to the null sentinel.
   */
  parse<T extends Bindable>(source: JsonSource, type: T): Bound<T> | NullValue {
    const descriptor = descriptorOf(type)
    const stream = this.createTokenStream(source)
    try {
      return this.createBinder().bind(stream, descriptor) as Bound<T> | NullValue
    } finally {
      stream.close()
    }
  }

  fromString<T extends Bindable>(text: string, type: T): Bound<T> | NullValue {
    return this.parse(text, type)
  }

  /**
   * Compact JSON text of a value. Without a type the JSON form follows the runtime type.
   */
  toString(value: unknown, type?: Bindable): string {
    return this.#write(value, type, this.createWriter())
  }

  toPrettyString(value: unknown, type?: Bindable): string {
    return this.#write(value, type, this.createWriter(true))
  }

  /**
   * Compact JSON encoded in the factory's charset
   */
  toBytes(value: unknown, type?: Bindable): Uint8Array {
    return Buffer.from(this.toString(value, type), this.#encoding)
  }

  #write(value: unknown, type: Bindable | undefined, writer: JsonWriter): string {
    new Generator().write(value, type ? descriptorOf(type) : OPEN, writer)
    return writer.toString()
  }
}

export interface JsonObjectParserOptions {
  factory?: JsonFactory
  /**
   * Keys of an envelope object whose value holds the payload, e.g. `["data"]` for
   * `{"data": {...}}`. The first matching key is used.
   */
  wrapperKeys?: Iterable<string>
}

/**
 * Parses whole documents into bound values, optionally unwrapping an envelope key
 *
 * @example
 * ```ts
 * const parser = new JsonObjectParser({ wrapperKeys: ["data"] })
 * const dog = parser.parse('{"data":{"name":"Fido","type":"dog"}}', Animal)
 * ```
 */
export class JsonObjectParser {
  readonly factory: JsonFactory
  readonly wrapperKeys: ReadonlySet<string>

  constructor(options: JsonObjectParserOptions = {}) {
    this.factory = options.factory ?? defaultFactory
    this.wrapperKeys = new Set(options.wrapperKeys ?? [])
  }

  parse<T extends Bindable>(source: JsonSource, type: T): Bound<T> | NullValue {
    if (this.wrapperKeys.size === 0) return this.factory.parse(source, type)

    const descriptor = descriptorOf(type)
    const stream = this.factory.createTokenStream(source)
    try {
      const key = skipToKey(stream, this.wrapperKeys)
      if (key === undefined) {
        throw new BindingError({ message: `wrapper key(s) ${[...this.wrapperKeys].join(", ")} not found` })
      }
      return this.factory.createBinder().bindValue(stream, descriptor) as Bound<T> | NullValue
    } finally {
      stream.close()
    }
  }
}

/**
 * Factory with the default options
 */
export const defaultFactory = new JsonFactory()
