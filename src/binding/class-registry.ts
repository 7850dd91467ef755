import type * as z from "zod"
import { collectBindingMeta } from "@/schema/meta"
import type { ModelLink, ModelNode, TypeDefinition } from "@/schema/model"
import { BindingError } from "@/errors"
import { describe, describeModel, EMPTY_ENVIRONMENT, modelKey } from "@/binding/descriptor"
import { resolveHierarchy } from "@/binding/generic-resolver"
import type { ObjectDescriptor, PolymorphicDescriptor, TypeDescriptor, TypeEnvironment } from "@/binding/types"

/**
 * A declared field bound to its wire key and resolved type
 */
export interface BoundField {
  /** Member name */
  readonly name: string
  /** JSON key */
  readonly wireKey: string
  readonly schema: z.ZodType
  readonly type: TypeDescriptor
  readonly quoteAsString: boolean
  /** Model that declares the field */
  readonly owner: ModelNode
}

/**
 * Polymorphic type table of a model hierarchy
 */
export interface TypeMap {
  /** The discriminator field */
  readonly field: BoundField
  readonly definitions: ReadonlyMap<string, () => ModelNode>
}

const DISCRIMINATOR_KINDS = new Set(["string", "byte", "short", "int", "long", "big-integer"])

/**
 * Resolved binding information for one model application.
 * Fields of the whole hierarchy are flattened and ordered by wire key.
 */
export class ClassSchema {
  readonly model: ModelNode
  readonly key: string
  readonly fields: readonly BoundField[]
  readonly typeMap: TypeMap | undefined
  /** JSON keys match wire keys regardless of case */
  readonly ignoreCase: boolean
  #byWireKey: Map<string, BoundField>
  #byFoldedKey: Map<string, BoundField>
  #byName: Map<string, BoundField>

  constructor(model: ModelNode, key: string, fields: BoundField[], typeMap: TypeMap | undefined) {
    this.model = model
    this.key = key
    this.fields = Object.freeze([...fields].sort((a, b) => (a.wireKey < b.wireKey ? -1 : a.wireKey > b.wireKey ? 1 : 0)))
    this.typeMap = typeMap
    this.ignoreCase = model.ignoreCase
    this.#byWireKey = new Map(this.fields.map((field) => [field.wireKey, field]))
    this.#byFoldedKey = new Map()
    if (model.ignoreCase) {
      for (const field of this.fields) this.#byFoldedKey.set(field.wireKey.toLowerCase(), field)
    }
    this.#byName = new Map(this.fields.map((field) => [field.name, field]))
    Object.freeze(this)
  }

  /**
   * Field declared under the given JSON key
   */
  field(wireKey: string): BoundField | undefined {
    return this.#byWireKey.get(wireKey) ?? this.#byFoldedKey.get(wireKey.toLowerCase())
  }

  /**
   * Field declared under the given member name
   */
  fieldNamed(name: string): BoundField | undefined {
    return this.#byName.get(name)
  }

  get wireKeys(): string[] {
    return this.fields.map((field) => field.wireKey)
  }
}

/**
 * Process-wide cache of class schemas, keyed by model and type arguments.
 * Schema construction failures are cached too and rethrown on every lookup.
 */
export class ClassRegistry {
  #schemas = new Map<string, ClassSchema | BindingError>()
  #subtypes = new Map<string, ReadonlyMap<string, ClassSchema>>()

  /**
   * Class schema of a model with its type parameters bound as in `args`
   */
  schemaFor(model: ModelNode, args: TypeEnvironment = EMPTY_ENVIRONMENT): ClassSchema {
    const key = modelKey(model, args)
    const cached = this.#schemas.get(key)
    if (cached instanceof BindingError) throw cached
    if (cached) return cached

    let schema: ClassSchema
    try {
      schema = this.#build(model, args, key)
    } catch (err) {
      const error = BindingError.from(err)
      this.#schemas.set(key, error)
      throw error
    }

    this.#schemas.set(key, schema)
    return schema
  }

  /**
   * Class schema of a model application such as `Page.of({ T: Dog.ref() })`
   */
  schemaOf(link: ModelLink): ClassSchema {
    return this.schemaFor(link.model, argsOf(describeModel(link)))
  }

  /**
   * Class schema an object or polymorphic descriptor binds to before dispatch
   */
  schemaOfDescriptor(descriptor: ObjectDescriptor | PolymorphicDescriptor): ClassSchema {
    return this.schemaFor(descriptor.model, descriptor.args)
  }

  /**
   * Subtype schemas of a polymorphic descriptor, keyed by discriminator value
   */
  subtypes(descriptor: PolymorphicDescriptor): ReadonlyMap<string, ClassSchema> {
    const host = this.schemaOfDescriptor(descriptor)
    const cached = this.#subtypes.get(host.key)
    if (cached) return cached

    const typeMap = host.typeMap
    if (!typeMap) {
      throw new BindingError({ message: `${host.model.name} has no polymorphic type table` })
    }

    const subtypes = new Map<string, ClassSchema>()
    for (const [value, ref] of typeMap.definitions) {
      subtypes.set(value, this.schemaFor(ref()))
    }
    this.#subtypes.set(host.key, subtypes)
    return subtypes
  }

  /**
   * Drop every cached schema
   */
  clear(): void {
    this.#schemas.clear()
    this.#subtypes.clear()
  }

  #build(model: ModelNode, args: TypeEnvironment, key: string): ClassSchema {
    const byWireKey = new Map<string, BoundField>()
    const byName = new Map<string, BoundField>()
    let typeMap: TypeMap | undefined

    for (const { model: owner, env } of resolveHierarchy(model, args)) {
      for (const [name, schema] of Object.entries(owner.ownFields)) {
        const meta = collectBindingMeta(schema)
        const wireKey = meta.wireKey ?? name
        const lookupKey = model.ignoreCase ? wireKey.toLowerCase() : wireKey

        const sameKey = byWireKey.get(lookupKey)
        if (sameKey) {
          throw new BindingError({
            message: `${model.name}: duplicate wire key "${wireKey}" on ${sameKey.owner.name}.${sameKey.name} and ${owner.name}.${name}`,
          })
        }
        const sameName = byName.get(name)
        if (sameName) {
          throw new BindingError({
            message: `${model.name}: field ${name} is declared by both ${sameName.owner.name} and ${owner.name}`,
          })
        }

        let type: TypeDescriptor
        try {
          type = describe(schema, env)
        } catch (err) {
          throw new BindingError({ message: `${model.name}.${name}: ${BindingError.from(err).reason}`, cause: err })
        }

        const field: BoundField = Object.freeze({ name, wireKey, schema, type, quoteAsString: meta.quoted ?? false, owner })
        byWireKey.set(lookupKey, field)
        byName.set(name, field)

        if (meta.typeDefinitions) {
          if (typeMap) {
            throw new BindingError({
              message: `${model.name}: both ${typeMap.field.name} and ${name} declare a polymorphic type table`,
            })
          }
          typeMap = buildTypeMap(model, field, meta.typeDefinitions)
        }
      }
    }

    return new ClassSchema(model, key, [...byWireKey.values()], typeMap)
  }
}

function argsOf(descriptor: TypeDescriptor): TypeEnvironment {
  return descriptor.kind === "object" || descriptor.kind === "polymorphic" ? descriptor.args : EMPTY_ENVIRONMENT
}

function buildTypeMap(
  model: ModelNode,
  field: BoundField,
  definitions: readonly TypeDefinition[],
): TypeMap {
  const { type } = field
  if (!(type.kind === "enum" || (type.kind === "scalar" && DISCRIMINATOR_KINDS.has(type.scalar)))) {
    throw new BindingError({
      message: `${model.name}.${field.name}: a discriminator must be a string, enum or integer field`,
    })
  }

  if (definitions.length === 0) {
    throw new BindingError({ message: `${model.name}.${field.name}: polymorphic type table is empty` })
  }

  const table = new Map<string, () => ModelNode>()
  for (const definition of definitions) {
    if (table.has(definition.key)) {
      throw new BindingError({
        message: `${model.name}.${field.name}: duplicate discriminator value "${definition.key}"`,
      })
    }
    table.set(definition.key, definition.ref)
  }

  return Object.freeze({ field, definitions: table })
}

/**
 * Registry shared by every binder and generator that is not given its own
 */
export const classRegistry = new ClassRegistry()
