import type { ScalarKind } from "@/schema/meta"
import type { ModelNode } from "@/schema/model"

export type { ScalarKind }

/**
 * Resolved type parameters of one model in a hierarchy
 */
export type TypeEnvironment = ReadonlyMap<string, TypeDescriptor>

export type ScalarDescriptor = {
  kind: "scalar"
  scalar: ScalarKind
  /** Numeric and boolean values travel as JSON strings */
  quoted: boolean
}

export type EnumDescriptor = {
  kind: "enum"
  values: readonly (string | number)[]
  /** Constant that JSON null binds to */
  nullConstant: string | number | undefined
}

export type ArrayDescriptor = {
  kind: "array"
  element: TypeDescriptor
}

/** Unordered collection, bound as a Set */
export type CollectionDescriptor = {
  kind: "collection"
  element: TypeDescriptor
}

export type MapDescriptor = {
  kind: "map"
  value: TypeDescriptor
  /** `record` binds to a plain object, `map` to a Map */
  container: "record" | "map"
}

export type ObjectDescriptor = {
  kind: "object"
  model: ModelNode
  args: TypeEnvironment
}

/**
 * Object whose concrete model is chosen by the value of a discriminator key
 */
export type PolymorphicDescriptor = {
  kind: "polymorphic"
  model: ModelNode
  args: TypeEnvironment
  /** Wire key of the discriminator */
  discriminator: string
}

/** Any JSON value */
export type OpenDescriptor = {
  kind: "open"
}

/**
 * Shape of a value the binder and the generator work from
 */
export type TypeDescriptor =
  | ScalarDescriptor
  | EnumDescriptor
  | ArrayDescriptor
  | CollectionDescriptor
  | MapDescriptor
  | ObjectDescriptor
  | PolymorphicDescriptor
  | OpenDescriptor
