import { describe, it, expect } from "vitest"
import { z, int, float } from "@/schema"
import { BigDecimal } from "@/binding/big-decimal"
import { describe as describeSchema, describeModel, OPEN } from "@/binding/descriptor"
import { Generator } from "@/binding/generator"
import { sentinelFor } from "@/binding/null-registry"
import type { TypeDescriptor } from "@/binding/types"
import { JsonWriter } from "@/tokens/json-writer"
import { Color, Dog, Page, Settings } from "@/tests/fixtures"

const write = (value: unknown, descriptor: TypeDescriptor, indent = 0): string => {
  const writer = new JsonWriter({ indent })
  new Generator().write(value, descriptor, writer)
  return writer.toString()
}

const SETTINGS = describeModel(Settings.of({}))

describe("Generator", () => {
  describe("models", () => {
    it("should write fields ordered by wire key", () => {
      const dog = Dog.create({ type: "dog", tricksKnown: 3, name: "Fido" })

      expect(write(dog, describeModel(Dog.of({})))).toBe('{"name":"Fido","tricksKnown":3,"type":"dog"}')
    })

    it("should merge unknown keys into the key order", () => {
      const dog = Dog.create({ name: "Fido", type: "dog" })
      dog.set("alpha", 1)
      dog.set("omega", [true])

      expect(write(dog, describeModel(Dog.of({})))).toBe('{"alpha":1,"name":"Fido","omega":[true],"type":"dog"}')
    })

    it("should write wire keys and quoted numbers", () => {
      const page = Page.of({ T: z.string() }).create({ items: ["a"], nextPageToken: "n1", total: 42n })

      expect(write(page, describeModel(Page.of({ T: z.string() })))).toBe(
        '{"items":["a"],"next_page_token":"n1","total":"42"}',
      )
    })

    it("should write null sentinels and null enum constants as null", () => {
      const settings = Settings.create({
        color: "unset",
        retries: sentinelFor({ kind: "scalar", scalar: "int", quoted: false }),
      })

      expect(write(settings, SETTINGS)).toBe('{"color":null,"retries":null}')
    })

    it("should omit absent fields", () => {
      expect(write(Settings.create({}), SETTINGS)).toBe("{}")
    })

    it("should indent nested values", () => {
      const settings = Settings.create({ retries: 2, tags: ["x"] })

      expect(write(settings, SETTINGS, 2)).toBe('{\n  "retries": 2,\n  "tags": [\n    "x"\n  ]\n}')
    })

    it("should locate errors by key", () => {
      const settings = Settings.create({ retries: 1 })
      settings.set("tags", ["a", 2])

      expect(() => write(settings, SETTINGS)).toThrow("expected string but got number (at $.tags)")
    })

    it("should reject a value that is not a model instance", () => {
      expect(() => write({ retries: 1 }, SETTINGS)).toThrow("expected Settings but got Object")
    })
  })

  describe("scalars", () => {
    it("should write the shortest text of a float", () => {
      expect(write(Math.fround(3.14), describeSchema(float()))).toBe("3.14")
      expect(write(Math.fround(0.1), describeSchema(float()))).toBe("0.1")
    })

    it("should write negative zero as 0", () => {
      expect(write(-0, describeSchema(z.number()))).toBe("0")
    })

    it("should reject non-finite numbers", () => {
      expect(() => write(NaN, describeSchema(z.number()))).toThrow("NaN cannot be written as a JSON number")
      expect(() => write(Infinity, describeSchema(z.number()))).toThrow("Infinity cannot be written as a JSON number")
    })

    it("should reject fractions for integer kinds", () => {
      expect(() => write(1.5, describeSchema(int()))).toThrow("expected an integer for int but got 1.5")
    })

    it("should reject values of the wrong type", () => {
      expect(() => write("x", describeSchema(int()))).toThrow("expected int but got string")
      expect(() => write(1, describeSchema(z.string()))).toThrow("expected string but got number")
    })

    it("should write quoted booleans as strings", () => {
      expect(write(true, describeSchema(z.boolean().quoted()))).toBe('"true"')
    })

    it("should reject values outside an enum", () => {
      expect(() => write("blue", describeSchema(Color))).toThrow("blue is not one of red, green, unset")
    })
  })

  describe("containers", () => {
    it("should write sets in insertion order", () => {
      expect(write(new Set(["b", "a"]), describeSchema(z.set(z.string())))).toBe('["b","a"]')
    })

    it("should sort map keys", () => {
      const map = new Map([
        ["b", 1],
        ["a", 2],
      ])

      expect(write(map, describeSchema(z.map(z.string(), int())))).toBe('{"a":2,"b":1}')
      expect(write({ b: 1, a: 2 }, describeSchema(z.record(z.string(), int())))).toBe('{"a":2,"b":1}')
    })
  })

  describe("open values", () => {
    it("should follow the runtime type", () => {
      const value = new Map<string, unknown>([
        ["b", 1n],
        ["a", [true, null, BigDecimal.parse("1.50")]],
      ])

      expect(write(value, OPEN)).toBe('{"a":[true,null,1.50],"b":1}')
    })

    it("should skip undefined entries of plain objects", () => {
      expect(write({ b: undefined, a: "x" }, OPEN)).toBe('{"a":"x"}')
    })

    it("should write nothing for undefined", () => {
      expect(write(undefined, OPEN)).toBe("")
    })

    it("should write model instances", () => {
      expect(write(Dog.create({ name: "Rex", type: "dog" }), OPEN)).toBe('{"name":"Rex","type":"dog"}')
    })

    it("should reject map keys that are not strings", () => {
      expect(() => write(new Map([[1, "x"]]), OPEN)).toThrow("map keys must be strings, got number")
    })
  })
})
