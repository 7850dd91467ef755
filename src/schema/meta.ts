import * as z from "zod"
import type { ModelLink, TypeDefinition } from "@/schema/model"
import { BigDecimal } from "@/binding/big-decimal"

/**
 * Scalar kinds a JSON value can bind to
 */
export type ScalarKind =
  | "boolean"
  | "byte"
  | "short"
  | "int"
  | "long"
  | "float"
  | "double"
  | "big-integer"
  | "big-decimal"
  | "string"
  | "void"

/**
 * Binding metadata stored on Zod schemas
 */
export interface BindingMeta {
  /** JSON key of a model field; defaults to the member name */
  wireKey?: string
  /** Numeric and boolean values travel as JSON strings */
  quoted?: boolean
  /** Scalar kind override, e.g. `int` for a `z.number()` */
  kind?: ScalarKind
  /** Enum constant that JSON null binds to */
  nullConstant?: string | number
  /** Marks the discriminator field of a polymorphic model */
  typeDefinitions?: readonly TypeDefinition[]
  /** Placeholder for a type parameter of a generic model */
  typeVar?: string
  /** The model a `Model.ref()` schema stands for */
  model?: ModelLink
}

/**
 * Key used to identify binding metadata in Zod's meta
 */
const BINDING_META_KEY = "__binding" as const

/**
 * Internal type for metadata stored in Zod's meta system
 */
interface ZodMetaWithBinding {
  [BINDING_META_KEY]?: BindingMeta
}

// Module augmentation to add key(), quoted(), kind(), nullConstant() and polymorphic() to all Zod types
declare module "zod" {
  interface ZodType<out Output, out Input, out Internals> {
    /**
     * Set the JSON key of this schema when used as a model field.
     * @example z.string().key("next_page_token")
     */
    key(wireKey: string): this

    /**
     * Read and write numeric or boolean values as JSON strings.
     * @example long().quoted() // binds "123", writes "123"
     */
    quoted(): this

    /**
     * Override the scalar kind the value binds to.
     * @example z.number().kind("int")
     */
    kind(kind: ScalarKind): this

    /**
     * Designate the enum constant that JSON null binds to and that is written as null.
     * @example z.enum(["red", "green", "unset"]).nullConstant("unset")
     */
    nullConstant(value: string | number): this

    /**
     * Mark this field as the discriminator of a polymorphic model.
     * @example
     * z.string().polymorphic([
     *   { key: "dog", ref: () => Dog },
     *   { key: "bug", ref: () => Bug },
     * ])
     */
    polymorphic(definitions: readonly TypeDefinition[]): this
  }
}

/**
 * Read the binding metadata of a single schema layer
 */
export function readBindingMeta(schema: z.core.$ZodType): BindingMeta {
  const meta = z.globalRegistry.get(schema) as ZodMetaWithBinding | undefined
  return meta?.[BINDING_META_KEY] ?? {}
}

/**
 * Create a new schema with updated binding metadata
 */
function withBindingMeta<T extends z.ZodType>(schema: T, update: BindingMeta): T {
  const current = readBindingMeta(schema)
  return schema.meta({ [BINDING_META_KEY]: { ...current, ...update } })
}

// Add the methods to Zod's prototype
const ZodTypeProto = z.ZodType.prototype as z.ZodType & {
  key(wireKey: string): z.ZodType
  quoted(): z.ZodType
  kind(kind: ScalarKind): z.ZodType
  nullConstant(value: string | number): z.ZodType
  polymorphic(definitions: readonly TypeDefinition[]): z.ZodType
}

ZodTypeProto.key = function (wireKey: string) {
  return withBindingMeta(this, { wireKey })
}

ZodTypeProto.quoted = function () {
  return withBindingMeta(this, { quoted: true })
}

ZodTypeProto.kind = function (kind: ScalarKind) {
  return withBindingMeta(this, { kind })
}

ZodTypeProto.nullConstant = function (value: string | number) {
  return withBindingMeta(this, { nullConstant: value })
}

ZodTypeProto.polymorphic = function (definitions: readonly TypeDefinition[]) {
  return withBindingMeta(this, { typeDefinitions: [...definitions] })
}

/**
 * Unwrap optional/nullable/default wrappers to get to the inner schema
 */
export const unwrapSchema = (schema: z.core.$ZodType): z.core.$ZodType => {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable || schema instanceof z.ZodDefault) {
    return unwrapSchema(schema.unwrap())
  }
  return schema
}

/**
 * Collect binding metadata from all wrapper layers of a schema.
 * This handles cases like long().key("id").optional() where the metadata is on an inner layer.
 * Outer layers take precedence.
 */
export function collectBindingMeta(schema: z.core.$ZodType): BindingMeta {
  const own = readBindingMeta(schema)
  const isWrapper = schema instanceof z.ZodOptional || schema instanceof z.ZodNullable || schema instanceof z.ZodDefault

  if (!isWrapper) return own

  const inner = collectBindingMeta(schema.unwrap())
  const merged: BindingMeta = { ...inner }
  for (const [key, value] of Object.entries(own)) {
    if (value !== undefined) Object.assign(merged, { [key]: value })
  }
  return merged
}

/**
 * Tag a schema as standing for a model application. Used by `Model.ref()`.
 */
export function modelSchema<T extends z.ZodType>(schema: T, model: ModelLink): T {
  return withBindingMeta(schema, { model })
}

/**
 * Create a placeholder for a type parameter of a generic model.
 * Acts like z.unknown() for validation; the binder substitutes the argument the
 * concrete model supplies for it.
 *
 * @example
 * const Page = model("Page", {
 *   typeParams: ["T"],
 *   fields: { items: z.array(typeVar("T")) },
 * })
 */
export function typeVar(name: string): z.ZodUnknown {
  return withBindingMeta(z.unknown(), { typeVar: name })
}

/** 8-bit signed integer */
export const byte = () => z.number().int().kind("byte")

/** 16-bit signed integer */
export const short = () => z.number().int().kind("short")

/** 32-bit signed integer */
export const int = () => z.number().int().kind("int")

/** 64-bit signed integer, bound as a bigint */
export const long = () => z.bigint().kind("long")

/** 32-bit float, bound as a number rounded with Math.fround */
export const float = () => z.number().kind("float")

/** 64-bit float */
export const double = () => z.number().kind("double")

/** Arbitrary-precision integer, bound as a bigint */
export const bigInteger = () => z.bigint().kind("big-integer")

/** Arbitrary-precision decimal */
export const bigDecimal = () => z.instanceof(BigDecimal).kind("big-decimal")

// Re-export z with our extensions applied
export { z }
