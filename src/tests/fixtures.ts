import { z, model, int, long, typeVar, type ModelNode } from "@/schema"
import { GenericJson } from "@/json/generic-json"

export const Animal = model("Animal", {
  fields: {
    name: z.string(),
    legCount: int().optional(),
    type: z.string().polymorphic([
      { key: "dog", ref: (): ModelNode => Dog },
      { key: "bug", ref: (): ModelNode => Bug },
    ]),
  },
})

export const Dog = model("Dog", {
  extends: Animal,
  fields: {
    tricksKnown: int().optional(),
  },
})

export const Bug = model("Bug", {
  extends: Animal,
  fields: {
    wings: z.boolean().optional(),
  },
})

export const Page = model("Page", {
  typeParams: ["T"],
  fields: {
    items: z.array(typeVar("T")),
    nextPageToken: z.string().key("next_page_token").optional(),
    total: long().quoted().optional(),
  },
})

export const Shape = model("Shape", {
  fields: {
    kind: int().polymorphic([{ key: "1", ref: (): ModelNode => Circle }]),
  },
})

export const Circle = model("Circle", {
  extends: Shape,
  fields: {
    radius: z.number(),
  },
})

export const Color = z.enum(["red", "green", "unset"]).nullConstant("unset")

export const Settings = model("Settings", {
  fields: {
    color: Color.optional(),
    retries: int().optional(),
    ratio: z.number().optional(),
    enabled: z.boolean().optional(),
    tags: z.array(z.string()).optional(),
  },
})

/**
 * Narrow a bound result to a model instance
 */
export function asData(value: unknown): GenericJson {
  if (!(value instanceof GenericJson)) {
    throw new Error(`expected a model instance but got ${String(value)}`)
  }
  return value
}
