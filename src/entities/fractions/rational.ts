import invariant from 'tiny-invariant'
import JSBI from 'jsbi'
import Decimal from 'decimal.js-light'

import { BigintIsh, ONE, Rounding, Sign, ZERO } from '../../constants'
import { DivisionByZeroError } from '../../errors'
import { getConfig } from '../../config'
import { gcd, lcm, parseBigintIsh } from '../../utils'

const toDecimalRounding = {
    [Rounding.ROUND_DOWN]: Decimal.ROUND_DOWN,
    [Rounding.ROUND_HALF_UP]: Decimal.ROUND_HALF_UP,
    [Rounding.ROUND_UP]: Decimal.ROUND_UP,
}

function absolute(value: JSBI): JSBI {
    return JSBI.lessThan(value, ZERO) ? JSBI.unaryMinus(value) : value
}

/**
 * Exact signed fraction over arbitrary-precision integers.
 *
 * The magnitude lives in `numerator` and `denominator`, both non-negative; the sign lives only in `sign`.
 * Instances are immutable and are not necessarily in lowest terms: every arithmetic operation reduces its
 * result, the factories do not.
 */
export class Rational {
    public readonly numerator: JSBI
    public readonly denominator: JSBI
    public readonly sign: Sign

    public static readonly ZERO = new Rational(ZERO)
    public static readonly ONE = new Rational(ONE)

    public constructor(numerator: BigintIsh, denominator: BigintIsh = ONE, sign: Sign = Sign.Positive) {
        const parsedNumerator = parseBigintIsh(numerator)
        const parsedDenominator = parseBigintIsh(denominator)
        invariant(JSBI.greaterThanOrEqual(parsedNumerator, ZERO), 'NUMERATOR')
        if (JSBI.equal(parsedDenominator, ZERO)) {
            getConfig().logger.debug({ numerator: parsedNumerator.toString() }, 'rational: zero denominator')
            throw new DivisionByZeroError(`Zero denominator for numerator ${parsedNumerator.toString()}`)
        }
        invariant(JSBI.greaterThan(parsedDenominator, ZERO), 'DENOMINATOR')

        this.numerator = parsedNumerator
        this.denominator = parsedDenominator
        this.sign = sign
    }

    // positive iff n and d are both >= 0 or both < 0, so fromInt(0, -1) is negative until reduced
    public static fromInt(n: number, d: number): Rational {
        invariant(Number.isSafeInteger(n) && Number.isSafeInteger(d), 'INTEGER')
        const sign = (n >= 0 && d >= 0) || (n < 0 && d < 0) ? Sign.Positive : Sign.Negative
        return new Rational(JSBI.BigInt(Math.abs(n)), JSBI.BigInt(Math.abs(d)), sign)
    }

    public static fromBigInt(n: BigintIsh, d: BigintIsh): Rational {
        const parsedN = parseBigintIsh(n)
        const parsedD = parseBigintIsh(d)
        let sign: Sign
        if (JSBI.greaterThanOrEqual(parsedN, ZERO)) {
            sign = JSBI.greaterThanOrEqual(parsedD, ZERO) ? Sign.Positive : Sign.Negative
        } else {
            sign = JSBI.lessThan(parsedD, ZERO) ? Sign.Positive : Sign.Negative
        }
        return new Rational(absolute(parsedN), absolute(parsedD), sign)
    }

    public static sameSign(a: Rational, b: Rational): boolean {
        return a.sign === b.sign
    }

    /**
     * Rescales both values to the least common multiple of their denominators. Signs are kept as they are.
     */
    public static normalize(a: Rational, b: Rational): [Rational, Rational] {
        const common = lcm(a.denominator, b.denominator)
        return [
            new Rational(JSBI.multiply(a.numerator, JSBI.divide(common, a.denominator)), common, a.sign),
            new Rational(JSBI.multiply(b.numerator, JSBI.divide(common, b.denominator)), common, b.sign),
        ]
    }

    private static parse(other: Rational | BigintIsh): Rational {
        return other instanceof Rational ? other : Rational.fromBigInt(other, ONE)
    }

    public isPositive(): boolean {
        return this.sign === Sign.Positive
    }

    public isZero(): boolean {
        return JSBI.equal(this.numerator, ZERO)
    }

    // truncates towards zero
    public get quotient(): JSBI {
        const quotient = JSBI.divide(this.numerator, this.denominator)
        return this.isPositive() ? quotient : JSBI.unaryMinus(quotient)
    }

    public get remainder(): Rational {
        return new Rational(JSBI.remainder(this.numerator, this.denominator), this.denominator, this.sign)
    }

    public negate(): Rational {
        return new Rational(this.numerator, this.denominator, this.isPositive() ? Sign.Negative : Sign.Positive)
    }

    public abs(): Rational {
        return new Rational(this.numerator, this.denominator)
    }

    // keeps the sign, so dividing by a negative value still flips the product's sign
    public invert(): Rational {
        return new Rational(this.denominator, this.numerator, this.sign)
    }

    public reduce(): Rational {
        if (this.isZero()) {
            return Rational.ZERO
        }
        const divisor = gcd(this.numerator, this.denominator)
        return new Rational(JSBI.divide(this.numerator, divisor), JSBI.divide(this.denominator, divisor), this.sign)
    }

    public add(other: Rational | BigintIsh): Rational {
        const [a, b] = Rational.normalize(this, Rational.parse(other))

        if (Rational.sameSign(a, b)) {
            return new Rational(JSBI.add(a.numerator, b.numerator), a.denominator, a.sign).reduce()
        }

        const [positive, negative] = a.isPositive() ? [a, b] : [b, a]
        const difference = JSBI.subtract(positive.numerator, negative.numerator)
        const sign = JSBI.greaterThanOrEqual(difference, ZERO) ? Sign.Positive : Sign.Negative
        return new Rational(absolute(difference), a.denominator, sign).reduce()
    }

    public sub(other: Rational | BigintIsh): Rational {
        return this.add(Rational.parse(other).negate())
    }

    public mul(other: Rational | BigintIsh): Rational {
        const otherParsed = Rational.parse(other)
        return new Rational(
            JSBI.multiply(this.numerator, otherParsed.numerator),
            JSBI.multiply(this.denominator, otherParsed.denominator),
            Rational.sameSign(this, otherParsed) ? Sign.Positive : Sign.Negative
        ).reduce()
    }

    public div(other: Rational | BigintIsh): Rational {
        return this.mul(Rational.parse(other).invert())
    }

    public gt(other: Rational | BigintIsh): boolean {
        const otherParsed = Rational.parse(other)
        // +0 and -0 are the same value
        if (this.isZero() && otherParsed.isZero()) {
            return false
        }
        if (!Rational.sameSign(this, otherParsed)) {
            return this.isPositive()
        }

        const [a, b] = Rational.normalize(this, otherParsed)
        return a.isPositive()
            ? JSBI.greaterThan(a.numerator, b.numerator)
            : JSBI.greaterThan(b.numerator, a.numerator)
    }

    public gte(other: Rational | BigintIsh): boolean {
        const otherParsed = Rational.parse(other)
        return this.gt(otherParsed) || this.reduce().equals(otherParsed.reduce())
    }

    public lt(other: Rational | BigintIsh): boolean {
        return Rational.parse(other).gt(this)
    }

    public lte(other: Rational | BigintIsh): boolean {
        return Rational.parse(other).gte(this)
    }

    /**
     * Structural equality: numerator, denominator and sign must match, so `2/4` does not equal `1/2`.
     * Use {@link equalTo} to compare values.
     */
    public equals(other: Rational): boolean {
        return (
            JSBI.equal(this.numerator, other.numerator) &&
            JSBI.equal(this.denominator, other.denominator) &&
            this.sign === other.sign
        )
    }

    public equalTo(other: Rational | BigintIsh): boolean {
        return this.reduce().equals(Rational.parse(other).reduce())
    }

    public toSignificant(significantDigits = 6, rounding: Rounding = Rounding.ROUND_HALF_UP): string {
        invariant(Number.isInteger(significantDigits) && significantDigits > 0, 'SIGNIFICANT_DIGITS')

        const quotient = this.toDecimal(significantDigits).toSignificantDigits(
            significantDigits,
            toDecimalRounding[rounding]
        )
        return quotient.toFixed(quotient.decimalPlaces())
    }

    public toFixed(decimalPlaces = 4, rounding: Rounding = Rounding.ROUND_HALF_UP): string {
        invariant(Number.isInteger(decimalPlaces) && decimalPlaces >= 0, 'DECIMAL_PLACES')

        return this.toDecimal(this.numerator.toString().length + decimalPlaces).toFixed(
            decimalPlaces,
            toDecimalRounding[rounding]
        )
    }

    public toString(): string {
        return `${this.isPositive() ? '' : '-'}${this.numerator.toString()}/${this.denominator.toString()}`
    }

    // truncated quotient carrying enough digits past `digits` that the final rounding sees any non-zero tail
    private toDecimal(digits: number): Decimal {
        const Exact = Decimal.clone({
            precision: digits + this.denominator.toString().length + 1,
            rounding: Decimal.ROUND_DOWN,
        })
        const magnitude = this.numerator.toString()
        return new Exact(this.isPositive() || this.isZero() ? magnitude : `-${magnitude}`).div(
            this.denominator.toString()
        )
    }
}
