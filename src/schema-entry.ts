/**
 * wirebind/schema
 *
 * Zod extensions and the model DSL without the binder.
 * Use this entry point when you only need to declare models, e.g. in a shared package.
 *
 * This module extends Zod schemas with JSON binding capabilities:
 * - `.key(name)` - JSON key of a model field
 * - `.quoted()` - Numbers and booleans travel as JSON strings
 * - `.polymorphic(definitions)` - Discriminator field of a polymorphic model
 * - `typeVar(name)` - Type parameter of a generic model
 *
 * @example
 * ```ts
 * import { z, model, typeVar } from 'wirebind/schema'
 *
 * const Page = model('Page', {
 *   typeParams: ['T'],
 *   fields: { items: z.array(typeVar('T')) },
 * })
 * ```
 */

export * from "@/schema"
