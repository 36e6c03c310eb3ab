import { JSBI, ZERO, configure, gcd, lcm, parseBigintIsh, resetConfig } from '../src'
import pino from 'pino'
import { afterEach, describe, expect, test, vi } from 'vitest'

describe('utils', () => {
    afterEach(() => {
        vi.restoreAllMocks()
        resetConfig()
    })

    describe('#parseBigintIsh', () => {
        test('converts every input kind', () => {
            expect(parseBigintIsh(10n).toString()).toBe('10')
            expect(parseBigintIsh('-42').toString()).toBe('-42')
            expect(parseBigintIsh(7).toString()).toBe('7')
        })
        test('passes JSBI through', () => {
            const value = JSBI.BigInt(3)
            expect(parseBigintIsh(value)).toBe(value)
        })
    })

    describe('#gcd', () => {
        test('euclid', () => {
            expect(gcd(JSBI.BigInt(12), JSBI.BigInt(18)).toString()).toBe('6')
            expect(gcd(JSBI.BigInt(17), JSBI.BigInt(5)).toString()).toBe('1')
        })
        test('zero yields the other operand', () => {
            expect(gcd(ZERO, JSBI.BigInt(7)).toString()).toBe('7')
            expect(gcd(JSBI.BigInt(7), ZERO).toString()).toBe('7')
            expect(gcd(ZERO, ZERO).toString()).toBe('0')
        })
        test('large operands', () => {
            const a = JSBI.multiply(JSBI.exponentiate(JSBI.BigInt(2), JSBI.BigInt(100)), JSBI.BigInt(3))
            const b = JSBI.multiply(JSBI.exponentiate(JSBI.BigInt(2), JSBI.BigInt(98)), JSBI.BigInt(9))
            const expected = JSBI.multiply(JSBI.exponentiate(JSBI.BigInt(2), JSBI.BigInt(98)), JSBI.BigInt(3))
            expect(gcd(a, b).toString()).toBe(expected.toString())
        })
        test('falls back to zero when the remainder fails', () => {
            const lines: string[] = []
            configure({ logger: pino({ level: 'warn' }, { write: (line: string) => lines.push(line) }) })
            vi.spyOn(JSBI, 'remainder').mockImplementationOnce(() => {
                throw new RangeError('remainder failed')
            })

            expect(gcd(JSBI.BigInt(12), JSBI.BigInt(18)).toString()).toBe('0')
            expect(lines).toHaveLength(1)
            const entry = JSON.parse(lines[0])
            expect(entry.level).toBe(40)
            expect(entry.msg).toBe('gcd: remainder failed, returning zero')
            expect(entry.a).toBe('12')
            expect(entry.b).toBe('18')
        })
    })

    describe('#lcm', () => {
        test('correct', () => {
            expect(lcm(JSBI.BigInt(4), JSBI.BigInt(6)).toString()).toBe('12')
            expect(lcm(JSBI.BigInt(3), JSBI.BigInt(5)).toString()).toBe('15')
            expect(lcm(ZERO, JSBI.BigInt(5)).toString()).toBe('0')
        })
    })
})
