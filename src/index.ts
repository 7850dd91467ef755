/**
 * wirebind
 *
 * Schema-driven JSON binding. Models declared with Zod bind from and generate to JSON in a
 * single pass, with wire-key renaming, quoted numbers, explicit nulls, generic models and
 * polymorphic dispatch on a discriminator key.
 *
 * @example
 * ```ts
 * import { z, model, int, JsonFactory, type ModelNode } from 'wirebind'
 *
 * const Animal = model('Animal', {
 *   fields: {
 *     name: z.string(),
 *     type: z.string().polymorphic([{ key: 'dog', ref: (): ModelNode => Dog }]),
 *   },
 * })
 *
 * const Dog = model('Dog', {
 *   extends: Animal,
 *   fields: { tricksKnown: int() },
 * })
 *
 * const factory = new JsonFactory()
 * const dog = factory.fromString('{"tricksKnown":3,"name":"Fido","type":"dog"}', Animal)
 * factory.toString(dog)
 * // Output: {"name":"Fido","tricksKnown":3,"type":"dog"}
 * ```
 */

// Schema - re-export Zod with the binding extensions
export * from "./schema"

// Binding core
export * from "./binding"

// Reading and writing JSON text
export * from "./json"
export * from "./tokens"

// Errors
export { BindingError, JsonSyntaxError, formatPath, type JsonPath } from "./errors"
