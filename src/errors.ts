/**
 * Indicates that a rational value would end up with a zero denominator, either at construction or as the divisor of a
 * division. I.e. the value `n/0` is never representable.
 */
export class DivisionByZeroError extends Error {
    public constructor(message = 'Division by zero') {
        super(message)
        this.name = this.constructor.name
    }
}
