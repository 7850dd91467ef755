import { describe, it, expect } from "vitest"
import { BigDecimal } from "@/binding/big-decimal"
import { BindingError } from "@/errors"

describe("BigDecimal", () => {
  describe("parse()", () => {
    it("should keep the scale of the text", () => {
      const value = BigDecimal.parse("1.50")

      expect(value.unscaled).toBe(150n)
      expect(value.scale).toBe(2)
    })

    it("should fold the exponent into the scale", () => {
      const value = BigDecimal.parse("-12.5e3")

      expect(value.unscaled).toBe(-125n)
      expect(value.scale).toBe(-2)
    })

    it("should keep the sign of a zero", () => {
      const zero = BigDecimal.parse("-0.0")

      expect(zero.negative).toBe(true)
      expect(zero.toString()).toBe("-0.0")
      expect(zero.equals(BigDecimal.parse("0.0"))).toBe(false)
      expect(zero.toBigInt()).toBe(0n)
    })

    it("should reject exponents beyond the safe integer range", () => {
      expect(() => BigDecimal.parse("5e99999999999999999999")).toThrow(
        'exponent of "5e99999999999999999999" is out of range',
      )
    })

    it("should reject text that is not a number", () => {
      expect(() => BigDecimal.parse("1.2.3")).toThrow(BindingError)
      expect(() => BigDecimal.parse("")).toThrow('invalid decimal number ""')
    })
  })

  describe("toString()", () => {
    it.each([
      ["1.50", "1.50"],
      ["-0.001", "-0.001"],
      ["0.0000001", "1E-7"],
      ["123", "123"],
      ["1e3", "1E+3"],
      ["12.5e3", "1.25E+4"],
      ["0.000001", "0.000001"],
    ])("should print %s as %s", (text, expected) => {
      expect(BigDecimal.parse(text).toString()).toBe(expected)
    })
  })

  describe("integers", () => {
    it("should detect integral values", () => {
      expect(BigDecimal.parse("2.00").isInteger()).toBe(true)
      expect(BigDecimal.parse("2.01").isInteger()).toBe(false)
      expect(BigDecimal.parse("1e2").isInteger()).toBe(true)
      expect(BigDecimal.parse("1e-1000000000").isInteger()).toBe(false)
      expect(BigDecimal.parse("1000e-3").isInteger()).toBe(true)
    })

    it("should compute the adjusted exponent", () => {
      expect(BigDecimal.parse("123").adjustedExponent()).toBe(2)
      expect(BigDecimal.parse("0.00123").adjustedExponent()).toBe(-3)
      expect(BigDecimal.parse("1e1000000000").adjustedExponent()).toBe(1000000000)
    })

    it("should convert integral values to bigint", () => {
      expect(BigDecimal.parse("2.00").toBigInt()).toBe(2n)
      expect(BigDecimal.parse("1e2").toBigInt()).toBe(100n)
      expect(() => BigDecimal.parse("0.5").toBigInt()).toThrow("0.5 has a fractional part")
      expect(BigDecimal.parse("-1200e-2").toBigInt()).toBe(-12n)
      expect(() => BigDecimal.parse("1e1000000000").toBigInt()).toThrow(
        "1E+1000000000 is too large to convert to an integer",
      )
    })
  })

  it("should compare by unscaled value and scale", () => {
    expect(BigDecimal.parse("1.5").equals(new BigDecimal(15n, 1))).toBe(true)
    expect(BigDecimal.parse("1.5").equals(BigDecimal.parse("1.50"))).toBe(false)
  })

  it("should convert from numbers", () => {
    expect(BigDecimal.from(0.25).toString()).toBe("0.25")
    expect(BigDecimal.from(7n).toString()).toBe("7")
    expect(() => BigDecimal.from(Infinity)).toThrow("cannot convert Infinity to a decimal")
  })
})
