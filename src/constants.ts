import JSBI from 'jsbi'

// exports for external consumption
export type BigintIsh = JSBI | bigint | string | number

export enum Sign {
    Positive,
    Negative,
}

export enum Rounding {
    ROUND_DOWN,
    ROUND_HALF_UP,
    ROUND_UP,
}

// exports for internal consumption
export const ZERO = JSBI.BigInt(0)
export const ONE = JSBI.BigInt(1)
export const TEN = JSBI.BigInt(10)
export const _100 = JSBI.BigInt(100)
