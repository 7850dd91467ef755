import { describe, it, expect } from "vitest"
import { z, model, int, type ModelNode } from "@/schema"
import { ValueBinder } from "@/binding/binder"
import { describe as describeSchema, describeModel } from "@/binding/descriptor"
import type { TypeDescriptor } from "@/binding/types"
import { TextTokenStream } from "@/tokens/text-token-stream"
import { Animal, asData, Bug, Circle, Dog, Shape } from "@/tests/fixtures"

const bindText = (text: string, descriptor: TypeDescriptor): unknown =>
  new ValueBinder().bind(new TextTokenStream(text), descriptor)

const ANIMAL = describeModel(Animal.of({}))

describe("PolymorphicDispatcher", () => {
  it("should pick the subtype named by the discriminator", () => {
    const dog = asData(bindText('{"name":"Fido","type":"dog","tricksKnown":3}', ANIMAL))

    expect(dog.classSchema.model).toBe(Dog)
    expect(dog.get("name")).toBe("Fido")
    expect(dog.get("type")).toBe("dog")
    expect(dog.get("tricksKnown")).toBe(3)
  })

  it("should replay members that precede the discriminator", () => {
    const dog = asData(bindText('{"legCount":4,"name":"Fido","tricksKnown":3,"type":"dog"}', ANIMAL))

    expect(dog.classSchema.model).toBe(Dog)
    expect(dog.get("legCount")).toBe(4)
    expect(dog.get("name")).toBe("Fido")
    expect(dog.get("tricksKnown")).toBe(3)
  })

  it("should replay nested values and unknown keys", () => {
    const bug = asData(bindText('{"extra":{"a":[1,{"b":true}]},"wings":true,"type":"bug"}', ANIMAL))

    expect(bug.classSchema.model).toBe(Bug)
    expect(bug.get("wings")).toBe(true)
    expect(bug.get("extra")).toEqual(new Map([["a", [1, new Map([["b", true]])]]]))
  })

  it("should dispatch on integer discriminators", () => {
    const circle = asData(bindText('{"radius":2.5,"kind":1}', describeModel(Shape.of({}))))

    expect(circle.classSchema.model).toBe(Circle)
    expect(circle.get("kind")).toBe(1)
    expect(circle.get("radius")).toBe(2.5)
  })

  it("should dispatch each element of an array", () => {
    const animals = bindText('[{"type":"bug"},{"type":"dog","name":"Rex"}]', describeSchema(z.array(Animal.ref())))

    if (!Array.isArray(animals)) throw new Error("expected an array")
    expect(animals.map((animal) => asData(animal).classSchema.model)).toEqual([Bug, Dog])
    expect(asData(animals[1]).get("name")).toBe("Rex")
  })

  it("should find the discriminator regardless of case in a case-insensitive model", () => {
    const Vehicle = model("Vehicle", {
      ignoreCase: true,
      fields: { type: z.string().polymorphic([{ key: "car", ref: (): ModelNode => Car }]) },
    })
    const Car = model("Car", { extends: Vehicle, fields: { wheels: int().optional() } })
    const VEHICLE = describeModel(Vehicle.of({}))

    const car = asData(bindText('{"Wheels":4,"TYPE":"car"}', VEHICLE))

    expect(car.classSchema.model).toBe(Car)
    expect(car.get("wheels")).toBe(4)
    expect(car.get("type")).toBe("car")
    expect(() => bindText('{"type":"car","Type":"car"}', VEHICLE)).toThrow(
      'duplicate discriminator key "Type" (at $.Type)',
    )
  })

  it("should fail without a discriminator", () => {
    expect(() => bindText('{"name":"Fido"}', ANIMAL)).toThrow("heterogeneous schema without type field specified")
  })

  it("should fail on an unknown discriminator value", () => {
    expect(() => bindText('{"type":"cat"}', ANIMAL)).toThrow(
      'no type definition for discriminator value "cat"; known values: dog, bug (at $.type)',
    )
  })

  it("should locate a failed dispatch inside an array", () => {
    expect(() => bindText('[{"type":"dog"},{"type":"cat"}]', describeSchema(z.array(Animal.ref())))).toThrow(
      'no type definition for discriminator value "cat"; known values: dog, bug (at $[1].type)',
    )
  })

  it("should fail on a null discriminator", () => {
    expect(() => bindText('{"name":"Fido","type":null}', ANIMAL)).toThrow("discriminator value is null (at $.type)")
  })

  it("should fail on a discriminator that is neither a string nor an integer", () => {
    expect(() => bindText('{"type":true}', ANIMAL)).toThrow("discriminator must be a string or integer (at $.type)")
  })

  it("should fail when the discriminator repeats", () => {
    expect(() => bindText('{"type":"dog","name":"Fido","type":"dog"}', ANIMAL)).toThrow(
      'duplicate discriminator key "type" (at $.type)',
    )
  })

  it("should reject a non-object", () => {
    expect(() => bindText('"dog"', ANIMAL)).toThrow("expected Animal but got string")
  })
})
