/**
 * Schema module - re-exports Zod with the binding extensions and the model DSL
 *
 * This module extends Zod schemas with JSON binding capabilities:
 * - `.key("wire_name")` - JSON key of a model field
 * - `.quoted()` - Numbers and booleans travel as JSON strings
 * - `.kind("int")` - Scalar kind override
 * - `.nullConstant(value)` - Enum constant that JSON null binds to
 * - `.polymorphic([...])` - Discriminator field of a polymorphic model
 *
 * @example
 * ```ts
 * import { z, model, long } from 'wirebind'
 *
 * const Page = model('Page', {
 *   fields: {
 *     total: long().quoted(),
 *     nextPageToken: z.string().key('next_page_token').optional(),
 *   },
 * })
 * ```
 */

// Import meta.ts to apply prototype extensions and re-export z
export { z } from "@/schema/meta"

// Export metadata types and helpers
export {
  bigDecimal,
  bigInteger,
  byte,
  collectBindingMeta,
  double,
  float,
  int,
  long,
  short,
  typeVar,
  type BindingMeta,
  type ScalarKind,
} from "@/schema/meta"

export {
  extendsModel,
  model,
  Model,
  ModelApplication,
  type FieldShape,
  type ModelLink,
  type ModelNode,
  type ModelOptions,
  type TypeArguments,
  type TypeDefinition,
} from "@/schema/model"
