export { BigDecimal } from "@/binding/big-decimal"
export { ValueBinder, type BindDestination, type BindOptions } from "@/binding/binder"
export { ClassRegistry, ClassSchema, classRegistry, type BoundField, type TypeMap } from "@/binding/class-registry"
export { describe, describeModel, descriptorKey, findDiscriminator, OPEN } from "@/binding/descriptor"
export { cloneValue, GenericData, type FieldValue, type FieldValues } from "@/binding/generic-data"
export { generate, Generator } from "@/binding/generator"
export { resolveHierarchy, type ResolvedModel } from "@/binding/generic-resolver"
export { isSentinel, NullValue, sentinelFor } from "@/binding/null-registry"
export { PolymorphicDispatcher } from "@/binding/polymorphic"

export type {
  ArrayDescriptor,
  CollectionDescriptor,
  EnumDescriptor,
  MapDescriptor,
  ObjectDescriptor,
  OpenDescriptor,
  PolymorphicDescriptor,
  ScalarDescriptor,
  TypeDescriptor,
  TypeEnvironment,
} from "@/binding/types"
