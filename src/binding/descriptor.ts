import * as z from "zod"
import { collectBindingMeta, unwrapSchema, type ScalarKind } from "@/schema/meta"
import type { ModelLink, ModelNode } from "@/schema/model"
import { BindingError } from "@/errors"
import type { OpenDescriptor, ScalarDescriptor, TypeDescriptor, TypeEnvironment } from "@/binding/types"

export const EMPTY_ENVIRONMENT: TypeEnvironment = new Map()

export const OPEN: OpenDescriptor = { kind: "open" }

const scalar = (kind: ScalarKind, quoted: boolean | undefined): ScalarDescriptor => ({
  kind: "scalar",
  scalar: kind,
  quoted: quoted ?? false,
})

/**
 * Whether a scalar kind can be applied to the given schema
 */
function acceptsKind(kind: ScalarKind, schema: z.core.$ZodType): boolean {
  switch (kind) {
    case "boolean":
      return schema instanceof z.ZodBoolean
    case "byte":
    case "short":
    case "int":
    case "float":
    case "double":
      return schema instanceof z.ZodNumber
    case "long":
    case "big-integer":
      return schema instanceof z.ZodBigInt
    case "big-decimal":
      return schema instanceof z.ZodCustom
    case "string":
      return schema instanceof z.ZodString
    case "void":
      return schema instanceof z.ZodVoid || schema instanceof z.ZodUndefined
  }
}

/**
 * Resolve a Zod schema into the type descriptor the binder and the generator work from.
 * Type variables are looked up in `env`; model references stay lazy so that
 * self-referential models resolve.
 */
export function describe(schema: z.core.$ZodType, env: TypeEnvironment = EMPTY_ENVIRONMENT): TypeDescriptor {
  const meta = collectBindingMeta(schema)
  const inner = unwrapSchema(schema)

  // z.lazy() is how a model refers to itself
  if (inner instanceof z.ZodLazy) {
    return describe(inner._zod.def.getter(), env)
  }

  if (meta.typeVar !== undefined) {
    const resolved = env.get(meta.typeVar)
    if (!resolved) {
      throw new BindingError({ message: `unresolved type variable ${meta.typeVar}` })
    }
    return resolved
  }

  if (meta.model) {
    return describeModel(meta.model, env)
  }

  if (meta.kind !== undefined) {
    if (!acceptsKind(meta.kind, inner)) {
      throw new BindingError({ message: `kind "${meta.kind}" cannot be applied to a ${inner._zod.def.type} schema` })
    }
    return scalar(meta.kind, meta.quoted)
  }

  if (inner instanceof z.ZodString) return scalar("string", meta.quoted)
  if (inner instanceof z.ZodNumber) return scalar("double", meta.quoted)
  if (inner instanceof z.ZodBigInt) return scalar("big-integer", meta.quoted)
  if (inner instanceof z.ZodBoolean) return scalar("boolean", meta.quoted)
  if (inner instanceof z.ZodVoid || inner instanceof z.ZodUndefined) return scalar("void", false)
  if (inner instanceof z.ZodAny || inner instanceof z.ZodUnknown) return OPEN

  if (inner instanceof z.ZodEnum) {
    const values = inner.options
    if (meta.nullConstant !== undefined && !values.includes(meta.nullConstant)) {
      throw new BindingError({ message: `null constant ${JSON.stringify(meta.nullConstant)} is not an enum value` })
    }
    return { kind: "enum", values, nullConstant: meta.nullConstant }
  }

  if (inner instanceof z.ZodArray) {
    return { kind: "array", element: describe(inner._zod.def.element, env) }
  }

  if (inner instanceof z.ZodSet) {
    return { kind: "collection", element: describe(inner._zod.def.valueType, env) }
  }

  if (inner instanceof z.ZodRecord) {
    return { kind: "map", value: describe(inner._zod.def.valueType, env), container: "record" }
  }

  if (inner instanceof z.ZodMap) {
    return { kind: "map", value: describe(inner._zod.def.valueType, env), container: "map" }
  }

  throw new BindingError({ message: `${inner._zod.def.type} schemas cannot be bound to JSON` })
}

/**
 * Descriptor for a model reference, with its type arguments resolved in `env`
 */
export function describeModel(link: ModelLink, env: TypeEnvironment = EMPTY_ENVIRONMENT): TypeDescriptor {
  const { model } = link
  const args = new Map<string, TypeDescriptor>()

  for (const [name, argument] of Object.entries(link.args)) {
    if (!model.typeParams.includes(name)) {
      throw new BindingError({ message: `${model.name} does not declare a type parameter named ${name}` })
    }
    args.set(name, describe(argument, env))
  }

  const discriminator = findDiscriminator(model)
  if (discriminator === undefined) {
    return { kind: "object", model, args }
  }
  return { kind: "polymorphic", model, args, discriminator }
}

/**
 * Wire key of the field carrying a polymorphic type table, searched through the model's
 * own fields and those of its ancestors. Only field metadata is read, so this never
 * builds a class schema.
 */
export function findDiscriminator(model: ModelNode): string | undefined {
  for (let current: ModelNode | undefined = model; current; current = current.parent?.model) {
    for (const [name, field] of Object.entries(current.ownFields)) {
      const meta = collectBindingMeta(field)
      if (meta.typeDefinitions) return meta.wireKey ?? name
    }
  }
  return undefined
}

const byName = ([a]: [string, unknown], [b]: [string, unknown]) => (a < b ? -1 : a > b ? 1 : 0)

/**
 * Stable key identifying a model together with its type arguments
 */
export function modelKey(model: ModelNode, args: TypeEnvironment): string {
  const params = [...args].sort(byName).map(([name, argument]) => `${name}=${descriptorKey(argument)}`)
  return `${model.name}#${model.id}${params.length > 0 ? `<${params.join(",")}>` : ""}`
}

/**
 * Stable key identifying the shape of a descriptor
 */
export function descriptorKey(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case "scalar":
      return descriptor.quoted ? `${descriptor.scalar}!quoted` : descriptor.scalar
    case "enum": {
      const values = descriptor.values.map((value) => JSON.stringify(value)).join("|")
      return descriptor.nullConstant === undefined
        ? `enum(${values})`
        : `enum(${values})!null=${JSON.stringify(descriptor.nullConstant)}`
    }
    case "array":
      return `${descriptorKey(descriptor.element)}[]`
    case "collection":
      return `set<${descriptorKey(descriptor.element)}>`
    case "map":
      return `${descriptor.container}<${descriptorKey(descriptor.value)}>`
    case "object":
    case "polymorphic":
      return modelKey(descriptor.model, descriptor.args)
    case "open":
      return "any"
  }
}

/**
 * Short human-readable name of a descriptor, for error messages
 */
export function typeName(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case "scalar":
      return descriptor.scalar
    case "object":
    case "polymorphic":
      return descriptor.model.name
    case "open":
      return "any"
    default:
      return descriptor.kind
  }
}
