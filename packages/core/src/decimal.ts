/**
 * Exact decimal arithmetic for numeric JSON values.
 *
 * JSON numbers arrive as binary floating-point values, so `0.1 * 3` style
 * distortions make checks such as `multipleOf: 0.01` fail for values that are
 * exact multiples in decimal. Converting through the shortest decimal string
 * of each float recovers the value the producer wrote.
 *
 * @module
 */
import * as BigDecimal from "effect/BigDecimal"
import * as Option from "effect/Option"

/**
 * Converts a number to the decimal given by its shortest string
 * representation. Non-finite numbers have no decimal form.
 */
export const toDecimal = (value: number): Option.Option<BigDecimal.BigDecimal> =>
  Number.isFinite(value) ? BigDecimal.fromString(String(value)) : Option.none()

/**
 * Whether `value` is an exact multiple of `divisor` in decimal arithmetic.
 */
export const isMultipleOf = (value: number, divisor: number): boolean =>
  Option.zipWith(
    toDecimal(value),
    toDecimal(divisor),
    (value, divisor) => BigDecimal.remainder(value, divisor)
  ).pipe(
    Option.flatten,
    Option.exists(BigDecimal.isZero)
  )
