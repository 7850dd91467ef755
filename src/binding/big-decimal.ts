import { BindingError } from "@/errors"

const DECIMAL = /^([+-]?)(\d+)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/

/** Largest integer, in decimal digits, that `toBigInt()` expands an exponent into */
export const MAX_INTEGER_DIGITS = 1_000_000

const absDigits = (value: bigint): string => (value < 0n ? -value : value).toString()

const trailingZeros = (value: bigint): number => {
  const digits = absDigits(value)
  return digits.length - digits.replace(/0+$/, "").length
}

/**
 * Arbitrary-precision decimal: `unscaled × 10^-scale`.
 *
 * The scale of a parsed value is kept, so `1.50` and `1.5` are different values that
 * print differently.
 *
 * @example
 * ```ts
 * BigDecimal.parse("1.50").toString() // "1.50"
 * BigDecimal.parse("1e-7").toString() // "1E-7"
 * ```
 */
export class BigDecimal {
  readonly unscaled: bigint
  readonly scale: number
  /** Sign of the value; kept apart from `unscaled` so that `-0` survives */
  readonly negative: boolean

  constructor(unscaled: bigint, scale: number = 0, negative: boolean = unscaled < 0n) {
    if (!Number.isInteger(scale)) {
      throw new RangeError(`scale must be an integer, got ${scale}`)
    }
    this.unscaled = unscaled
    this.scale = scale
    this.negative = unscaled === 0n ? negative : unscaled < 0n
  }

  /**
   * Parse decimal text such as `-12.5`, `3E+2` or `0.000001`
   */
  static parse(text: string): BigDecimal {
    const match = DECIMAL.exec(text)
    if (!match) {
      throw new BindingError({ message: `invalid decimal number "${text}"` })
    }

    const [, sign = "", integer = "", fraction = "", exponent = "0"] = match
    const scale = fraction.length - Number(exponent)
    if (!Number.isSafeInteger(scale)) {
      throw new BindingError({ message: `exponent of "${text}" is out of range` })
    }
    return new BigDecimal(BigInt(sign + integer + fraction), scale, sign === "-")
  }

  static from(value: number | bigint | string): BigDecimal {
    if (typeof value === "bigint") return new BigDecimal(value)
    if (typeof value === "number") {
      if (!Number.isFinite(value)) {
        throw new BindingError({ message: `cannot convert ${value} to a decimal` })
      }
      return BigDecimal.parse(String(value))
    }
    return BigDecimal.parse(value)
  }

  /**
   * Whether the value has no fractional part
   */
  isInteger(): boolean {
    if (this.scale <= 0 || this.unscaled === 0n) return true
    return trailingZeros(this.unscaled) >= this.scale
  }

  /**
   * Exponent of the leading digit, e.g. 2 for `123` and -3 for `0.00123`
   */
  adjustedExponent(): number {
    return absDigits(this.unscaled).length - 1 - this.scale
  }

  /**
   * Integer value; throws when there is a fractional part or the integer would exceed
   * MAX_INTEGER_DIGITS digits
   */
  toBigInt(): bigint {
    if (this.unscaled === 0n) return 0n
    if (this.scale > 0) {
      if (!this.isInteger()) {
        throw new BindingError({ message: `${this.toString()} has a fractional part` })
      }
      const text = this.unscaled.toString()
      return BigInt(text.slice(0, text.length - this.scale))
    }

    if (this.adjustedExponent() >= MAX_INTEGER_DIGITS) {
      throw new BindingError({ message: `${this.toString()} is too large to convert to an integer` })
    }
    try {
      return this.unscaled * 10n ** BigInt(-this.scale)
    } catch (err) {
      if (err instanceof RangeError) {
        throw new BindingError({ message: `${this.toString()} is too large to convert to an integer`, cause: err })
      }
      throw err
    }
  }

  toNumber(): number {
    return Number(this.toString())
  }

  equals(other: BigDecimal): boolean {
    return this.unscaled === other.unscaled && this.scale === other.scale && this.negative === other.negative
  }

  /**
   * Plain notation when the scale is non-negative and the adjusted exponent is at least -6,
   * scientific notation otherwise.
   */
  toString(): string {
    const digits = absDigits(this.unscaled)
    const sign = this.negative ? "-" : ""
    const adjusted = digits.length - 1 - this.scale

    if (this.scale >= 0 && adjusted >= -6) {
      if (this.scale === 0) return sign + digits
      if (digits.length > this.scale) {
        const point = digits.length - this.scale
        return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`
      }
      return `${sign}0.${"0".repeat(this.scale - digits.length)}${digits}`
    }

    const mantissa = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits
    return `${sign}${mantissa}E${adjusted >= 0 ? "+" : ""}${adjusted}`
  }

  toJSON(): string {
    return this.toString()
  }
}
