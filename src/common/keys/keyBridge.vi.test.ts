import { describe, expect, it } from 'vitest'

import type { Logger } from '../utils/log.js'
import { bitsetToString, generateRandomKey, keyToHex, printKeyHex, stringToBitset } from './keyBridge.js'
import type { RandomSource } from './randomSource.js'

const sequenceSource = (values: number[]): RandomSource => {
    let index = 0
    return { nextUint32: () => values[index++ % values.length] ?? 0 }
}

describe('keyBridge', () => {
    it('should pack bytes little-endian into a 64-bit word', () => {
        expect(stringToBitset('ABCDEFGH')).toBe(0x4847464544434241n)
        expect(stringToBitset('AB')).toBe(0x4241n)
        expect(stringToBitset('ABCDEFGHIJ')).toBe(0x4847464544434241n)
        expect(stringToBitset('')).toBe(0n)
    })

    it('should unpack a word into 8 bytes', () => {
        expect(bitsetToString(0x4847464544434241n)).toBe('ABCDEFGH')
        expect(bitsetToString(0x4241n)).toBe('AB\0\0\0\0\0\0')
        expect(bitsetToString(stringToBitset('\xff\x00\x80key!!'))).toBe('\xff\x00\x80key!!')
    })

    it('should format keys as upper-case hex', () => {
        expect(keyToHex('\x01\xab')).toBe('01 AB')
        expect(keyToHex('')).toBe('')
    })

    it('should print the key through the logger', () => {
        const printed: unknown[] = []
        const logger: Logger = {
            debug: () => undefined,
            info: () => undefined,
            warn: () => undefined,
            error: () => undefined,
            print: (...args) => {
                printed.push(...args)
            },
        }
        printKeyHex('\x0f\xf0', logger)
        expect(printed).toEqual(['Generated key (hex): 0F F0'])
    })

    it('should generate 8 random bytes', () => {
        const key = generateRandomKey(sequenceSource([0x100, 0x1ff, 2, 3, 4, 5, 6, 7]))
        expect(key).toBe('\x00\xff\x02\x03\x04\x05\x06\x07')
        expect(generateRandomKey()).toHaveLength(8)
    })
})

describe('keyBridge with wide characters', () => {
    it('should reject keys that are not byte strings', () => {
        expect(() => stringToBitset('Ł')).toThrow('Block must be a byte string')
        expect(() => keyToHex('Ł')).toThrow('Key must be a byte string')
    })
})
