import { descriptorKey } from "@/binding/descriptor"
import type { TypeDescriptor } from "@/binding/types"

/**
 * Explicit JSON null for a declared type.
 *
 * A field holding a NullValue was present in the document with the value null; a field
 * holding `undefined` was absent. There is exactly one NullValue per descriptor shape, so
 * sentinels are compared by identity.
 */
export class NullValue {
  /** Key of the descriptor shape this sentinel stands for */
  readonly shape: string

  constructor(shape: string) {
    this.shape = shape
    Object.freeze(this)
  }

  toString(): string {
    return "null"
  }

  toJSON(): null {
    return null
  }
}

const sentinels = new Map<string, NullValue>()

/**
 * The null sentinel for a descriptor shape, created on first use
 */
export function sentinelFor(descriptor: TypeDescriptor): NullValue {
  const shape = descriptorKey(descriptor)
  let sentinel = sentinels.get(shape)
  if (!sentinel) {
    sentinel = new NullValue(shape)
    sentinels.set(shape, sentinel)
  }
  return sentinel
}

/**
 * Whether a value is one of the registered null sentinels
 */
export function isSentinel(value: unknown): value is NullValue {
  return value instanceof NullValue && sentinels.get(value.shape) === value
}
