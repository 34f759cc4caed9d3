import { assertByteString, byteAt } from '../utils/bytes.js'
import { createLogger, type Logger } from '../utils/log.js'
import { createRandomSource, type RandomSource } from './randomSource.js'

export const KEY_BYTES = 8

/**
 * Eight random bytes, as a byte string, from a freshly seeded source.
 */
export const generateRandomKey = (source: RandomSource = createRandomSource()): string => {
    let key = ''
    for (let i = 0; i < KEY_BYTES; i++) {
        key += String.fromCharCode(source.nextUint32() & 0xff)
    }
    return key
}

/**
 * Packs the first 8 bytes into a 64-bit word: bit j of byte i lands on
 * bit 8i + j, so byte 0 is the least significant. Missing bytes are zero.
 */
export const stringToBitset = (text: string): bigint => {
    assertByteString(text, 'Block')
    let word = 0n
    for (let i = 0; i < text.length && i < KEY_BYTES; i++) {
        word |= BigInt(byteAt(text, i)) << BigInt(8 * i)
    }
    return word
}

export const bitsetToString = (word: bigint): string => {
    let text = ''
    for (let i = 0; i < KEY_BYTES; i++) {
        text += String.fromCharCode(Number((word >> BigInt(8 * i)) & 0xffn))
    }
    return text
}

export const keyToHex = (key: string): string => {
    assertByteString(key, 'Key')
    const parts: string[] = []
    for (let i = 0; i < key.length; i++) {
        parts.push(byteAt(key, i).toString(16).toUpperCase().padStart(2, '0'))
    }
    return parts.join(' ')
}

export const printKeyHex = (key: string, logger: Logger = createLogger('keys')): void => {
    logger.print(`Generated key (hex): ${keyToHex(key)}`)
}
