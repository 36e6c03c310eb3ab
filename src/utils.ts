import JSBI from 'jsbi'

import { BigintIsh, ZERO } from './constants'
import { getConfig } from './config'

export function parseBigintIsh(bigintIsh: BigintIsh): JSBI {
    if (bigintIsh instanceof JSBI) {
        return bigintIsh
    }
    if (typeof bigintIsh === 'bigint') {
        return JSBI.BigInt(bigintIsh.toString())
    }
    return JSBI.BigInt(bigintIsh)
}

/**
 * Greatest common divisor by Euclid's algorithm. A zero operand yields the other one unchanged,
 * so `gcd(0, 0)` is zero.
 */
export function gcd(a: JSBI, b: JSBI): JSBI {
    if (JSBI.equal(a, ZERO)) {
        return b
    }

    let x = a
    let y = b
    while (JSBI.notEqual(y, ZERO)) {
        let rest: JSBI
        try {
            rest = JSBI.remainder(x, y)
        } catch (error) {
            getConfig().logger.warn(
                { a: a.toString(), b: b.toString(), err: error },
                'gcd: remainder failed, returning zero'
            )
            return ZERO
        }
        x = y
        y = rest
    }
    return x
}

// caller must ensure gcd(a, b) is not zero, i.e. a or b is non-zero
export function lcm(a: JSBI, b: JSBI): JSBI {
    return JSBI.divide(JSBI.multiply(a, b), gcd(a, b))
}
