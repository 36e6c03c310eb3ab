import JSBI from 'jsbi'
export { JSBI }

export type { BigintIsh } from './constants'
export { Rounding, Sign, ZERO, ONE } from './constants'
export type { Config } from './config'
export { configure, getConfig, resetConfig } from './config'
export { gcd, lcm, parseBigintIsh } from './utils'

export * from './entities'
export * from './errors'
