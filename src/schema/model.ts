import { modelSchema, z } from "@/schema/meta"
import { GenericData, type FieldValues } from "@/binding/generic-data"
import { classRegistry } from "@/binding/class-registry"
import { GenericJson } from "@/json/generic-json"

/**
 * Declared fields of a model, keyed by member name
 */
export type FieldShape = Record<string, z.ZodType>

/**
 * Schemas supplied for the type parameters of a generic model
 */
export type TypeArguments = Readonly<Record<string, z.ZodType>>

/**
 * Shape-erased view of a model, used wherever the concrete field types do not matter
 */
export interface ModelNode {
  readonly id: number
  readonly name: string
  readonly ownFields: Readonly<FieldShape>
  readonly typeParams: readonly string[]
  readonly parent: ModelLink | undefined
  /** Match JSON keys against wire keys without regard to case */
  readonly ignoreCase: boolean
}

/**
 * A model together with the arguments for its type parameters
 */
export interface ModelLink {
  readonly model: ModelNode
  readonly args: TypeArguments
}

/**
 * One entry of a polymorphic type table
 */
export interface TypeDefinition {
  /** Discriminator value on the wire */
  key: string
  /** The subtype; a thunk so that subtypes declared later can be named */
  ref: () => ModelNode
}

export interface ModelOptions<S extends FieldShape, P extends FieldShape> {
  /** Fields declared by this model */
  fields: S
  /** Parent model; fields are inherited */
  extends?: Model<P> | ModelApplication<P>
  /** Names of the type parameters that `typeVar()` fields refer to */
  typeParams?: readonly string[]
  /** Match JSON keys case-insensitively; inherited from the parent when not given */
  ignoreCase?: boolean
}

let nextModelId = 0

/**
 * A named record type whose JSON form is an object
 *
 * @example
 * ```ts
 * const Animal = model("Animal", {
 *   fields: {
 *     name: z.string(),
 *     type: z.string().polymorphic([{ key: "dog", ref: (): ModelNode => Dog }]),
 *   },
 * })
 *
 * const Dog = model("Dog", {
 *   extends: Animal,
 *   fields: { tricksKnown: int() },
 * })
 *
 * const dog = Dog.create({ name: "Fido", type: "dog", tricksKnown: 3 })
 * ```
 */
export class Model<S extends FieldShape = FieldShape> implements ModelNode {
  readonly id: number
  readonly name: string
  readonly ownFields: Readonly<FieldShape>
  readonly typeParams: readonly string[]
  readonly parent: ModelLink | undefined
  readonly ignoreCase: boolean

  constructor(
    name: string,
    ownFields: FieldShape,
    parent: ModelLink | undefined,
    typeParams: readonly string[],
    ignoreCase: boolean = false,
  ) {
    this.id = nextModelId++
    this.name = name
    this.ownFields = Object.freeze({ ...ownFields })
    this.parent = parent
    this.typeParams = Object.freeze([...typeParams])
    this.ignoreCase = ignoreCase
  }

  /**
   * Apply type arguments to a generic model
   */
  of(args: TypeArguments): ModelApplication<S> {
    return new ModelApplication(this, args)
  }

  /**
   * Schema standing for an instance of this model, for use inside other schemas
   */
  ref(args: TypeArguments = {}): z.ZodCustom<GenericJson<S>, GenericJson<S>> {
    return this.of(args).ref()
  }

  /**
   * New instance holding the given values
   */
  create(values: FieldValues<S> = {}): GenericJson<S> {
    return this.of({}).create(values)
  }

  toString(): string {
    return this.name
  }
}

/**
 * A model with arguments for its type parameters, e.g. `Page.of({ T: Dog.ref() })`
 */
export class ModelApplication<S extends FieldShape = FieldShape> implements ModelLink {
  readonly model: Model<S>
  readonly args: TypeArguments

  constructor(model: Model<S>, args: TypeArguments) {
    this.model = model
    this.args = Object.freeze({ ...args })
  }

  ref(): z.ZodCustom<GenericJson<S>, GenericJson<S>> {
    const schema = z.custom<GenericJson<S>>(
      (value) => value instanceof GenericData && extendsModel(value.classSchema.model, this.model),
      { message: `Expected an instance of ${this.model.name}` },
    )
    return modelSchema(schema, this)
  }

  create(values: FieldValues<S> = {}): GenericJson<S> {
    const instance = new GenericJson<S>(classRegistry.schemaOf(this))
    for (const [name, value] of Object.entries(values)) {
      if (value !== undefined) instance.set(name, value)
    }
    return instance
  }
}

/**
 * Whether `node` is `ancestor` or inherits from it
 */
export function extendsModel(node: ModelNode, ancestor: ModelNode): boolean {
  for (let current: ModelNode | undefined = node; current; current = current.parent?.model) {
    if (current === ancestor) return true
  }
  return false
}

/**
 * Declare a model
 */
export function model<S extends FieldShape, P extends FieldShape = Record<never, never>>(
  name: string,
  options: ModelOptions<S, P>,
): Model<P & S> {
  const parent = options.extends instanceof Model ? options.extends.of({}) : options.extends
  const ignoreCase = options.ignoreCase ?? parent?.model.ignoreCase ?? false
  return new Model<P & S>(name, options.fields, parent, options.typeParams ?? [], ignoreCase)
}
