import { BindingError } from "@/errors"
import { BigDecimal } from "@/binding/big-decimal"
import type { ScalarKind } from "@/binding/types"

const NUMBER = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/

/** Strings a quoted or bare string value may use for non-finite floats */
const NON_FINITE: ReadonlyMap<string, number> = new Map([
  ["NaN", NaN],
  ["Infinity", Infinity],
  ["-Infinity", -Infinity],
])

const INTEGER_RANGES: Partial<Record<ScalarKind, readonly [bigint, bigint]>> = {
  byte: [-128n, 127n],
  short: [-32768n, 32767n],
  int: [-2147483648n, 2147483647n],
  long: [-(2n ** 63n), 2n ** 63n - 1n],
}

export type NumberKind = "byte" | "short" | "int" | "long" | "float" | "double" | "big-integer" | "big-decimal"

export const isNumberKind = (kind: ScalarKind): kind is NumberKind =>
  kind !== "string" && kind !== "boolean" && kind !== "void"

export const isFloatingKind = (kind: ScalarKind): boolean => kind === "float" || kind === "double"

/**
 * Whether `text` names a non-finite float value
 */
export const isNonFiniteText = (text: string): boolean => NON_FINITE.has(text)

/**
 * Convert number text to the runtime representation of `kind`.
 * Integral floats such as `2.0` or `1e2` narrow to integer kinds; fractions and
 * out-of-range values fail.
 */
export function parseNumber(kind: NumberKind, text: string): number | bigint | BigDecimal {
  switch (kind) {
    case "float":
    case "double": {
      const special = NON_FINITE.get(text)
      if (special !== undefined) return special
      const value = Number(checkSyntax(kind, text))
      if (!Number.isFinite(value)) outOfRange(kind, text)
      const result = kind === "float" ? Math.fround(value) : value
      if (!Number.isFinite(result)) outOfRange(kind, text)
      return result
    }
    case "big-decimal":
      return BigDecimal.parse(checkSyntax(kind, text))
    default: {
      const decimal = BigDecimal.parse(checkSyntax(kind, text))
      if (!decimal.isInteger()) {
        throw new BindingError({ message: `expected an integer for ${kind} but got ${text}` })
      }
      const range = INTEGER_RANGES[kind]
      // every fixed-width range lies below 10^19
      if (range && decimal.unscaled !== 0n && decimal.adjustedExponent() > 18) outOfRange(kind, text)
      const value = decimal.toBigInt()
      if (range && (value < range[0] || value > range[1])) outOfRange(kind, text)
      return kind === "long" || kind === "big-integer" ? value : Number(value)
    }
  }
}

/**
 * Convert the text of a quoted boolean
 */
export function parseBoolean(text: string): boolean {
  if (text === "true") return true
  if (text === "false") return false
  throw new BindingError({ message: `expected "true" or "false" but got "${text}"` })
}

/**
 * Shortest decimal text that reads back as the same 32-bit float
 */
export function formatFloat(value: number): string {
  if (Object.is(value, -0)) return "0"
  for (let precision = 1; precision < 10; precision++) {
    const candidate = Number(value.toPrecision(precision))
    if (Math.fround(candidate) === value) return String(candidate)
  }
  return String(value)
}

/**
 * Shortest decimal text that reads back as the same 64-bit float
 */
export function formatDouble(value: number): string {
  return Object.is(value, -0) ? "0" : String(value)
}

function checkSyntax(kind: NumberKind, text: string): string {
  if (!NUMBER.test(text)) {
    throw new BindingError({ message: `invalid ${kind} value "${text}"` })
  }
  return text
}

function outOfRange(kind: NumberKind, text: string): never {
  throw new BindingError({ message: `value ${text} is out of range for ${kind}` })
}
