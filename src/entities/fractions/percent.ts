import { Rounding, _100 } from '../../constants'
import { Rational } from './rational'

const _100_PERCENT = new Rational(_100)

export class Percent extends Rational {
    public static fromRational(rational: Rational): Percent {
        return new Percent(rational.numerator, rational.denominator, rational.sign)
    }

    public toSignificant(significantDigits = 5, rounding?: Rounding): string {
        return this.mul(_100_PERCENT).toSignificant(significantDigits, rounding)
    }

    public toFixed(decimalPlaces = 2, rounding?: Rounding): string {
        return this.mul(_100_PERCENT).toFixed(decimalPlaces, rounding)
    }
}
