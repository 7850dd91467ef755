import type { FieldShape } from "@/schema/model"
import type { ClassSchema } from "@/binding/class-registry"
import { OPEN } from "@/binding/descriptor"
import { GenericData } from "@/binding/generic-data"
import { generate } from "@/binding/generator"
import { JsonWriter } from "@/tokens/json-writer"

/**
 * Turns bound values into JSON text. Implemented by JsonFactory.
 */
export interface JsonSerializer {
  toString(value: unknown): string
  toPrettyString(value: unknown): string
}

/**
 * Model instance that remembers the factory it was bound with, so it can print itself
 *
 * @example
 * ```ts
 * const dog = factory.fromString('{"name":"Fido","type":"dog"}', Dog)
 * dog.toString() // '{"name":"Fido","type":"dog"}'
 * ```
 */
export class GenericJson<S extends FieldShape = FieldShape> extends GenericData<S> {
  readonly factory: JsonSerializer | undefined

  constructor(classSchema: ClassSchema, factory?: JsonSerializer) {
    super(classSchema)
    this.factory = factory
  }

  toString(): string {
    return this.factory ? this.factory.toString(this) : render(this, 0)
  }

  toPrettyString(): string {
    return this.factory ? this.factory.toPrettyString(this) : render(this, 2)
  }

  override clone(): GenericJson<S> {
    const copy = new GenericJson<S>(this.classSchema, this.factory)
    this.copyInto(copy)
    return copy
  }
}

function render(value: unknown, indent: number): string {
  const writer = new JsonWriter({ indent })
  generate(value, OPEN, writer)
  return writer.toString()
}
